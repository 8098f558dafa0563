// src/rpc/ratelimit.ts
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

const logger = getLogger('rpc/ratelimit');

export type TokenBucket = {
  take: (n?: number) => Promise<void>;
  /** Tokens currently available, after refill. */
  available: () => number;
};

export type TokenBucketOptions = {
  /** Capacity is `rps * burstMultiplier`, at least 1. */
  burstMultiplier?: number;
  now?: () => number;
  wait?: (ms: number) => Promise<void>;
};

/**
 * Token bucket limiting node requests to `rps` per second, with bursts up to
 * the bucket capacity. Starts full.
 */
export function createTokenBucket(rps: number, opts: TokenBucketOptions = {}): TokenBucket {
  const now = opts.now ?? Date.now;
  const wait = opts.wait ?? sleep;
  const capacity = Math.max(1, Math.floor(rps * (opts.burstMultiplier ?? 2)));
  const refillPerMs = rps / 1000;
  let tokens = capacity;
  let last = now();

  function refill(): void {
    const t = now();
    const elapsed = t - last;
    if (elapsed > 0) {
      tokens = Math.min(capacity, tokens + elapsed * refillPerMs);
      last = t;
    }
  }

  async function take(n = 1): Promise<void> {
    refill();
    if (tokens >= n) {
      tokens -= n;
      return;
    }
    const deficit = n - tokens;
    const ms = Math.max(1, Math.ceil(deficit / refillPerMs));
    logger.debug(`waiting ${ms}ms for ${deficit.toFixed(2)} token(s)`);
    await wait(ms);
    refill();
    tokens = Math.max(0, tokens - n);
  }

  function available(): number {
    refill();
    return tokens;
  }

  return { take, available };
}
