// src/runner/scanRange.ts
/**
 * Scans an inclusive block range: opens a record cursor per block, reads its
 * rows and streams them into the sink in block order, with bounded
 * concurrency, per-block timeouts and retries.
 */
import type { ZoneRule } from '../column/scalar.js';
import type { RpcClient } from '../rpc/client.js';
import type { Sink } from '../sink/types.js';
import type { EthereumTable } from '../schema/tables.js';
import { openRecordCursor } from '../query/recordSet.js';
import { readAllRows, type Row } from '../query/rowReader.js';
import { estimateRemainingSeconds, formatDuration } from '../utils/time.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('runner/scanRange');

export interface ScanRangeOptions {
  table: EthereumTable;
  /** Column names in output order; all columns when omitted. */
  columns?: readonly string[];
  from: number;
  to: number;
  /** Maximum number of blocks in flight (sliding window). */
  concurrency: number;
  progressEveryBlocks: number;
  progressIntervalSec: number;
  /** Per-block deadline for fetching and reading. Defaults to 60000. */
  blockTimeoutMs?: number;
  /** Retries per block before the scan fails. Defaults to 2. */
  maxBlockRetries?: number;
  zone?: ZoneRule;
  /** Stops scheduling new blocks; rows of blocks already in flight are still written. */
  signal?: AbortSignal;
  /** If false, no progress lines. Defaults to true. */
  reportProgress?: boolean;
}

export type ScanResult = {
  /** Blocks whose rows reached the sink. */
  blocks: number;
  rows: number;
  aborted: boolean;
};

/**
 * Rejects with a labeled error if `p` does not settle within `ms`.
 */
export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let t: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    t = setTimeout(() => reject(new Error(`timeout: ${label} after ${ms}ms`)), ms);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(t));
}

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export async function scanRange(
  rpc: Pick<RpcClient, 'fetchBlock' | 'fetchLogs'>,
  sink: Pick<Sink, 'write'>,
  opts: ScanRangeOptions,
): Promise<ScanResult> {
  const {
    table,
    columns,
    from,
    to,
    concurrency,
    progressEveryBlocks,
    progressIntervalSec,
    blockTimeoutMs = 60_000,
    maxBlockRetries = 2,
    zone,
    signal,
    reportProgress = true,
  } = opts;

  if (to < from) return { blocks: 0, rows: 0, aborted: false };

  const totalBlocks = to - from + 1;
  let processed = 0;
  let rowsWritten = 0;
  const t0 = Date.now();
  let lastLogAt = t0;

  function maybeReportProgress(force = false): void {
    if (!reportProgress) return;
    const now = Date.now();
    const elapsedSec = (now - t0) / 1000;
    const needByCount = processed > 0 && processed % progressEveryBlocks === 0;
    const needByTime = (now - lastLogAt) / 1000 >= progressIntervalSec;
    if (!(force || needByCount || needByTime)) return;

    let msg = `[progress] ${processed}/${totalBlocks} blocks | ${rowsWritten} rows | elapsed ${formatDuration(elapsedSec)}`;
    if (processed > 0 && elapsedSec > 0) {
      const eta = estimateRemainingSeconds(processed, totalBlocks, elapsedSec);
      msg += ` | rate ${(processed / elapsedSec).toFixed(1)} blk/s | ETA ${formatDuration(eta)}`;
    }
    msg += ` | inFlight=${inFlight} retryQ=${retryQueue.length} next=${nextBlock}`;
    log.info(msg);
    lastLogAt = now;
  }

  // Rows of finished blocks wait here until every earlier block is written.
  const ready = new Map<number, Row[]>();
  let nextToFlush = from;
  let flushChain: Promise<void> = Promise.resolve();

  async function drain(): Promise<void> {
    for (let rows = ready.get(nextToFlush); rows !== undefined; rows = ready.get(nextToFlush)) {
      ready.delete(nextToFlush);
      for (const row of rows) await sink.write(row);
      rowsWritten += rows.length;
      processed++;
      nextToFlush++;
    }
    maybeReportProgress();
  }

  async function readBlockRows(n: number): Promise<Row[]> {
    const opened = await openRecordCursor(rpc, { table, blockNumber: n, columns, zone });
    return readAllRows(opened.cursor, opened.columns);
  }

  const attempts = new Map<number, number>();
  const retryQueue: number[] = [];
  let failure: { error: unknown } | null = null;

  async function processBlock(n: number): Promise<void> {
    try {
      ready.set(n, await withTimeout(readBlockRows(n), blockTimeoutMs, `block ${n}`));
    } catch (e: unknown) {
      const k = (attempts.get(n) ?? 0) + 1;
      attempts.set(n, k);
      if (k <= maxBlockRetries) {
        retryQueue.push(n);
        log.warn(`retry ${k}/${maxBlockRetries} for block ${n}: ${message(e)}`);
      } else {
        log.error(`giving up block ${n}: ${message(e)}`);
        failure ??= { error: new Error(`block ${n} failed after ${k} attempt(s): ${message(e)}`, { cause: e }) };
      }
      return;
    }
    flushChain = flushChain.then(drain);
    await flushChain;
  }

  let nextBlock = from;
  let inFlight = 0;
  const stopped = (): boolean => failure !== null || signal?.aborted === true;

  await new Promise<void>((resolve, reject) => {
    const maybeSpawn = (): void => {
      while (!stopped() && inFlight < concurrency && (nextBlock <= to || retryQueue.length > 0)) {
        const n = retryQueue.shift() ?? nextBlock++;
        inFlight++;
        void processBlock(n)
          .catch((e: unknown) => {
            failure ??= { error: e };
          })
          .finally(() => {
            inFlight--;
            maybeSpawn();
          });
      }
      if (inFlight > 0) return;
      if (failure) reject(failure.error);
      else resolve();
    };
    maybeSpawn();
  });

  const aborted = processed < totalBlocks;
  if (aborted) log.warn(`scan stopped at block ${nextToFlush} of [${from}, ${to}]`);
  maybeReportProgress(true);
  return { blocks: processed, rows: rowsWritten, aborted };
}
