// src/rpc/client.ts
/**
 * JSON-RPC client for an Ethereum node, with token-bucket rate limiting,
 * per-request timeouts and exponential backoff on transient failures.
 *
 * HTTP 5xx/429, aborted requests and reset connections are retried.
 * A JSON-RPC `error` object in the response is the node's answer and is
 * raised as {@link RpcError} without retrying.
 */
import { Agent, fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { numberToHex } from 'viem';
import { createTokenBucket, type TokenBucket } from './ratelimit.js';
import { normalizeBlock, normalizeLogs, normalizeQuantity } from './normalize.js';
import type { EthBlock, EthLog } from '../eth/types.js';
import { RpcError } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

/**
 * Options for configuring the RPC client.
 */
export type RpcClientOptions = {
  baseUrl: string; // http(s)://host:8545
  timeoutMs: number; // per-request timeout
  retries: number; // max retries for transient/5xx
  backoffMs: number; // base backoff
  backoffJitter: number; // 0..1
  rps: number; // target req/s (token bucket)
  headers?: Record<string, string>;
  /** undici dispatcher; a keep-alive Agent by default. */
  dispatcher?: Dispatcher;
};

export type RpcClient = {
  /** Raw JSON-RPC call; resolves with the `result` member. */
  call: (method: string, params?: unknown[]) => Promise<unknown>;
  /** Block with full transaction objects. */
  fetchBlock: (number: bigint | number) => Promise<EthBlock>;
  /** All logs emitted in the block. */
  fetchLogs: (number: bigint | number) => Promise<EthLog[]>;
  /** Latest block number known to the node. */
  fetchBlockNumber: () => Promise<bigint>;
  /** Closes the keep-alive agent, unless the dispatcher was passed in. */
  close: () => Promise<void>;
};

const log = getLogger('rpc/client');

const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

function jitter(base: number, j: number): number {
  if (j <= 0) return base;
  const delta = base * j;
  return base + (Math.random() * 2 - 1) * delta;
}

function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  if ('code' in e && typeof e.code === 'string') return e.code;
  if ('cause' in e) return errorCode(e.cause);
  return undefined;
}

function isTransient(e: unknown): boolean {
  if (e instanceof Error && e.name === 'AbortError') return true;
  const code = errorCode(e);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/**
 * Creates and configures a new RpcClient with the given options.
 */
export function createRpcClient(opts: RpcClientOptions): RpcClient {
  const bucket: TokenBucket = createTokenBucket(Math.max(1, Math.floor(opts.rps)));
  const dispatcher =
    opts.dispatcher ??
    new Agent({
      connections: 128,
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
    });
  const headers: Record<string, string> = {
    accept: 'application/json',
    'content-type': 'application/json',
    ...(opts.headers ?? {}),
  };
  let nextId = 1;

  async function backoff(attempt: number, why: Record<string, unknown>): Promise<void> {
    const delay = jitter(opts.backoffMs * Math.pow(2, attempt), opts.backoffJitter);
    log.debug('retry', { attempt, delay, ...why });
    await sleep(delay);
  }

  async function post(method: string, params: unknown[]): Promise<unknown> {
    const body = JSON.stringify({ jsonrpc: '2.0', id: nextId++, method, params });

    for (let attempt = 0; ; attempt++) {
      await bucket.take(1);

      const ac = new AbortController();
      const t = setTimeout(() => ac.abort(), opts.timeoutMs);

      try {
        const res = await fetch(opts.baseUrl, { method: 'POST', headers, body, signal: ac.signal, dispatcher });
        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw new HttpStatusError(
            res.status,
            `HTTP ${res.status} ${res.statusText} for ${method} :: ${text.slice(0, 200)}`,
          );
        }
        return await res.json();
      } catch (e: unknown) {
        const retryable = e instanceof HttpStatusError ? e.status >= 500 || e.status === 429 : isTransient(e);
        if (retryable && attempt < opts.retries) {
          await backoff(attempt, { method, error: e instanceof Error ? e.message : String(e) });
          continue;
        }
        throw e;
      } finally {
        clearTimeout(t);
      }
    }
  }

  async function call(method: string, params: unknown[] = []): Promise<unknown> {
    const payload = JsonRpcResponseSchema.parse(await post(method, params));
    if (payload.error) {
      throw new RpcError(method, payload.error.code, payload.error.message);
    }
    return payload.result ?? null;
  }

  async function fetchBlock(number: bigint | number): Promise<EthBlock> {
    const json = await call('eth_getBlockByNumber', [numberToHex(number), true]);
    if (json === null) throw new Error(`Block ${number} not found`);
    return normalizeBlock(json);
  }

  async function fetchLogs(number: bigint | number): Promise<EthLog[]> {
    const tag = numberToHex(number);
    return normalizeLogs(await call('eth_getLogs', [{ fromBlock: tag, toBlock: tag }]));
  }

  async function fetchBlockNumber(): Promise<bigint> {
    return normalizeQuantity(await call('eth_blockNumber'));
  }

  async function close(): Promise<void> {
    if (!opts.dispatcher) await dispatcher.close();
  }

  return { call, fetchBlock, fetchLogs, fetchBlockNumber, close };
}

/**
 * Creates an RpcClient from the runtime configuration.
 */
export function createRpcClientFromConfig(cfg: {
  rpcUrl: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  backoffJitter: number;
  rps: number;
}): RpcClient {
  return createRpcClient({
    baseUrl: cfg.rpcUrl,
    timeoutMs: cfg.timeoutMs,
    retries: cfg.retries,
    backoffMs: cfg.backoffMs,
    backoffJitter: cfg.backoffJitter,
    rps: cfg.rps,
  });
}
