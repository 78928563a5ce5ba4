import { describe, it, expect } from 'vitest';
import { pageQuerySchema, toPage, offsetOf } from '../../src/paging/page';

const schema = pageQuerySchema(['id', 'name'] as const);

describe('pageQuerySchema', () => {
  it('applies defaults', () => {
    expect(schema.parse({})).toEqual({
      page: 0,
      size: 20,
      sort: { field: 'id', direction: 'asc' },
    });
  });

  it('parses page, size and a case-insensitive sort direction from query strings', () => {
    expect(schema.parse({ page: '2', size: '5', sort: 'name,DESC' })).toEqual({
      page: 2,
      size: 5,
      sort: { field: 'name', direction: 'desc' },
    });
  });

  it('defaults the direction when only a field is given', () => {
    expect(schema.parse({ sort: 'name' }).sort).toEqual({ field: 'name', direction: 'asc' });
  });

  it('rejects unknown sort fields and directions', () => {
    expect(schema.safeParse({ sort: 'password' }).success).toBe(false);
    expect(schema.safeParse({ sort: 'name,sideways' }).success).toBe(false);
  });

  it('rejects out-of-range sizes and negative pages', () => {
    expect(schema.safeParse({ size: '0' }).success).toBe(false);
    expect(schema.safeParse({ size: '101' }).success).toBe(false);
    expect(schema.safeParse({ page: '-1' }).success).toBe(false);
  });
});

describe('toPage', () => {
  it('computes the envelope from a slice', () => {
    const query = schema.parse({ page: '1', size: '5' });

    expect(offsetOf(query)).toBe(5);
    expect(toPage({ items: ['f', 'g'], totalElements: 11 }, query)).toEqual({
      content: ['f', 'g'],
      page: 1,
      size: 5,
      totalElements: 11,
      totalPages: 3,
    });
  });

  it('reports zero pages for an empty store', () => {
    const query = schema.parse({});
    expect(toPage({ items: [], totalElements: 0 }, query).totalPages).toBe(0);
  });
});
