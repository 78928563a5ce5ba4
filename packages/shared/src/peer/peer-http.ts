/**
 * packages/shared/src/peer/peer-http.ts
 *
 * WHY:
 * - Minimal shared HTTP shim for service -> service calls (axios).
 * - One place that applies the per-call timeout, forwards x-request-id,
 *   validates the peer's JSON with Zod and folds every failure into a PeerResult.
 *
 * HOW TO USE:
 * - DI builds one instance per peer: `new PeerHttpClient(createPeerHttp({...}), 'company-service')`.
 * - Concrete clients (CompanyClient, UserClient) own the paths and schemas.
 *
 * RULES:
 * - Never throws; see peer-result.ts for the failure taxonomy.
 * - No retries: a failed call is final for that attempt.
 * - The adapter option exists so tests can route calls to an in-process app.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { z } from 'zod';

import { REQUEST_ID_HEADER, type FlowContext } from '../http/request-context';
import { logger } from '../logger/logger';
import { peerOk, toPeerFailure, type PeerResult } from './peer-result';

export const DEFAULT_PEER_TIMEOUT_MS = 3000;

export type PeerHttpOptions = {
  baseUrl: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
};

export function createPeerHttp(opts: PeerHttpOptions): AxiosInstance {
  return axios.create({
    baseURL: opts.baseUrl.replace(/\/+$/, ''),
    timeout: opts.timeoutMs ?? DEFAULT_PEER_TIMEOUT_MS,
    headers: { accept: 'application/json' },
    ...(opts.adapter ? { adapter: opts.adapter } : {}),
  });
}

export class PeerHttpClient {
  constructor(
    private readonly http: AxiosInstance,
    readonly peerName: string,
  ) {}

  get<T>(
    ctx: FlowContext,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<PeerResult<T>> {
    return this.request(ctx, { method: 'GET', url }, (data) => schema.parse(data));
  }

  put(ctx: FlowContext, url: string, body: unknown): Promise<PeerResult<void>> {
    return this.request(ctx, { method: 'PUT', url, data: body }, () => undefined);
  }

  private async request<T>(
    ctx: FlowContext,
    config: AxiosRequestConfig,
    read: (data: unknown) => T,
  ): Promise<PeerResult<T>> {
    const startedAt = Date.now();

    try {
      const res = await this.http.request<unknown>({
        ...config,
        headers: { [REQUEST_ID_HEADER]: ctx.requestId },
      });

      const value = read(res.data);

      logger.debug('peer.request.success', {
        flow: 'peer.request',
        requestId: ctx.requestId,
        peer: this.peerName,
        method: config.method,
        url: config.url,
        status: res.status,
        durationMs: Date.now() - startedAt,
      });

      return peerOk(value);
    } catch (err: unknown) {
      const failure = toPeerFailure(err);

      logger.debug('peer.request.failed', {
        flow: 'peer.request',
        requestId: ctx.requestId,
        peer: this.peerName,
        method: config.method,
        url: config.url,
        reason: failure.reason,
        status: failure.status,
        durationMs: Date.now() - startedAt,
      });

      return failure;
    }
  }
}
