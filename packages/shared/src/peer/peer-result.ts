/**
 * packages/shared/src/peer/peer-result.ts
 *
 * WHY:
 * - A peer call can fail in ways that matter differently to each caller:
 *   a write that validates a reference must abort, a read that decorates must not.
 * - Peer clients therefore never throw. They return a PeerResult and the caller
 *   decides whether the failure is hard (raise AppError) or soft (log, degrade).
 *
 * RULES:
 * - HTTP 404 from the peer => NOT_FOUND.
 * - Timeout, connection error, any other non-2xx => UNAVAILABLE.
 * - 2xx body that fails schema validation => BAD_RESPONSE.
 */

import axios from 'axios';
import { ZodError } from 'zod';

export type PeerFailureReason = 'NOT_FOUND' | 'UNAVAILABLE' | 'BAD_RESPONSE';

export type PeerSuccess<T> = {
  ok: true;
  value: T;
};

export type PeerFailure = {
  ok: false;
  reason: PeerFailureReason;
  status: number | null;
  message: string;
};

export type PeerResult<T> = PeerSuccess<T> | PeerFailure;

export function peerOk<T>(value: T): PeerSuccess<T> {
  return { ok: true, value };
}

export function peerFailure(
  reason: PeerFailureReason,
  message: string,
  status: number | null = null,
): PeerFailure {
  return { ok: false, reason, status, message };
}

export function toPeerFailure(err: unknown): PeerFailure {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status ?? null;

    if (status === 404) {
      return peerFailure('NOT_FOUND', 'Peer resource not found', status);
    }

    if (status !== null) {
      return peerFailure('UNAVAILABLE', `Peer responded with status ${status}`, status);
    }

    return peerFailure('UNAVAILABLE', `Peer unreachable (${err.code ?? 'unknown'}): ${err.message}`);
  }

  if (err instanceof ZodError) {
    return peerFailure('BAD_RESPONSE', 'Peer response did not match the expected shape');
  }

  return peerFailure('UNAVAILABLE', err instanceof Error ? err.message : String(err));
}

/**
 * Meta for a log line describing a failed peer call.
 */
export function describeFailure(failure: PeerFailure): Record<string, unknown> {
  return {
    reason: failure.reason,
    peerStatus: failure.status,
    peerMessage: failure.message,
  };
}
