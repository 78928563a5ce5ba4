/**
 * packages/shared/src/testing/inject-adapter.ts
 *
 * WHY:
 * - Cross-service tests must not open sockets. These axios adapters let a peer client
 *   talk to an in-process Fastify app through `app.inject()`, or fail the way a
 *   dead or slow peer would.
 *
 * RULES:
 * - Test wiring only; production DI never passes an adapter.
 * - Mirrors axios' own settle(): non-2xx rejects with an AxiosError carrying the response.
 */

import axios, {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import type { FastifyInstance } from 'fastify';

type InjectMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

function toInjectMethod(method: string | undefined): InjectMethod {
  switch ((method ?? 'get').toUpperCase()) {
    case 'POST':
      return 'POST';
    case 'PUT':
      return 'PUT';
    case 'PATCH':
      return 'PATCH';
    case 'DELETE':
      return 'DELETE';
    default:
      return 'GET';
  }
}

function toHeaderRecord(config: InternalAxiosRequestConfig): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(config.headers.toJSON())) {
    if (typeof v === 'string') out[k] = v;
    else if (typeof v === 'number') out[k] = String(v);
  }
  return out;
}

function toPathAndQuery(config: InternalAxiosRequestConfig): string {
  const url = new URL(axios.getUri(config));
  return `${url.pathname}${url.search}`;
}

/**
 * Routes every request of an axios instance to `target().inject(...)`.
 * `target` is a thunk so two apps can be wired to each other before both exist.
 */
export function createInjectAdapter(target: () => FastifyInstance | undefined): AxiosAdapter {
  return async (config) => {
    const app = target();
    if (!app) {
      throw new AxiosError('Peer app is not wired', AxiosError.ERR_NETWORK, config);
    }

    const path = toPathAndQuery(config);

    const res = await app.inject({
      method: toInjectMethod(config.method),
      url: path,
      headers: toHeaderRecord(config),
      payload: typeof config.data === 'string' ? config.data : undefined,
    });

    const headers = new AxiosHeaders();
    for (const [k, v] of Object.entries(res.headers)) {
      if (typeof v === 'string') headers.set(k, v);
    }

    const response: AxiosResponse = {
      data: res.body,
      status: res.statusCode,
      statusText: res.statusMessage,
      headers,
      config,
      request: { path },
    };

    const validateStatus = config.validateStatus;
    if (!validateStatus || validateStatus(response.status)) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${response.status}`,
      response.status < 500 ? AxiosError.ERR_BAD_REQUEST : AxiosError.ERR_BAD_RESPONSE,
      config,
      response.request,
      response,
    );
  };
}

/**
 * A peer that never answers: connection refused, or a timeout if `kind` is 'timeout'.
 */
export function createUnreachableAdapter(kind: 'refused' | 'timeout' = 'refused'): AxiosAdapter {
  return (config) =>
    Promise.reject(
      kind === 'timeout'
        ? new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, AxiosError.ECONNABORTED, config)
        : new AxiosError('connect ECONNREFUSED', AxiosError.ERR_NETWORK, config),
    );
}
