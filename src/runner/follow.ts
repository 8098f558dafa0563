// src/runner/follow.ts
/**
 * Live mode: after the initial range, keeps scanning new blocks as the node
 * reports them, until the signal aborts.
 */
import type { RpcClient } from '../rpc/client.js';
import type { Sink } from '../sink/types.js';
import { scanRange, type ScanRangeOptions } from './scanRange.js';
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

const log = getLogger('runner/follow');

export interface FollowOptions
  extends Pick<ScanRangeOptions, 'table' | 'columns' | 'concurrency' | 'zone' | 'blockTimeoutMs' | 'maxBlockRetries'> {
  /** First block not scanned yet. */
  startNext: number;
  /** Poll interval for eth_blockNumber while caught up. */
  pollMs: number;
  signal: AbortSignal;
}

/**
 * @returns The next block that would have been scanned.
 */
export async function followLoop(
  rpc: Pick<RpcClient, 'fetchBlock' | 'fetchLogs' | 'fetchBlockNumber'>,
  sink: Pick<Sink, 'write' | 'flush'>,
  opts: FollowOptions,
): Promise<number> {
  let next = opts.startNext;
  log.info(`[follow] entering live mode from block ${next}, poll=${opts.pollMs}ms`);
  while (!opts.signal.aborted) {
    const latest = Number(await rpc.fetchBlockNumber());
    if (next <= latest) {
      const live = await scanRange(rpc, sink, {
        ...opts,
        from: next,
        to: latest,
        concurrency: Math.min(opts.concurrency, 16),
        progressEveryBlocks: 25,
        progressIntervalSec: 2,
        reportProgress: false,
      });
      next += live.blocks;
      await sink.flush?.();
      log.info(`[follow] wrote ${live.blocks} block(s), ${live.rows} row(s), next=${next}, latest=${latest}`);
    } else {
      const jitter = 0.8 + Math.random() * 0.4;
      await sleep(Math.floor(opts.pollMs * jitter), opts.signal);
    }
  }
  return next;
}
