import { describe, it, expect } from 'vitest';
import { scanRange, withTimeout, type ScanRangeOptions } from './scanRange.js';
import type { RpcClient } from '../rpc/client.js';
import type { Row } from '../query/rowReader.js';
import { makeBlock, makeLog, makeTx } from '../__fixtures__/eth.js';
import { sleep } from '../utils/sleep.js';

type FakeRpc = Pick<RpcClient, 'fetchBlock' | 'fetchLogs'> & { blockCalls: number[]; logCalls: number[] };

/**
 * Node stand-in: block `n` has `n` transactions. `delayMs` and `fail`
 * shape how each fetch behaves.
 */
function fakeRpc(opts: { delayMs?: (n: number) => number; fail?: (n: number, attempt: number) => boolean } = {}): FakeRpc {
  const blockCalls: number[] = [];
  const logCalls: number[] = [];
  return {
    blockCalls,
    logCalls,
    async fetchBlock(number) {
      const n = Number(number);
      blockCalls.push(n);
      const attempt = blockCalls.filter((x) => x === n).length;
      await sleep(opts.delayMs?.(n) ?? 0);
      if (opts.fail?.(n, attempt)) throw new Error('boom');
      return makeBlock({ number: BigInt(n), transactions: Array.from({ length: n }, () => makeTx()) });
    },
    async fetchLogs(number) {
      logCalls.push(Number(number));
      return [makeLog({ blockNumber: BigInt(number) })];
    },
  };
}

function collect() {
  const rows: Row[] = [];
  return { rows, sink: { write: async (row: Row) => void rows.push(row) } };
}

const base: ScanRangeOptions = {
  table: 'block',
  columns: ['block_number'],
  from: 1,
  to: 3,
  concurrency: 3,
  progressEveryBlocks: 100,
  progressIntervalSec: 60,
  reportProgress: false,
};

describe('scanRange', () => {
  it('should write rows in block order when blocks finish out of order', async () => {
    const rpc = fakeRpc({ delayMs: (n) => (n === 1 ? 30 : n === 3 ? 10 : 0) });
    const { rows, sink } = collect();
    const result = await scanRange(rpc, sink, base);
    expect(rows).toEqual([{ block_number: 1n }, { block_number: 2n }, { block_number: 3n }]);
    expect(result).toEqual({ blocks: 3, rows: 3, aborted: false });
    expect(rpc.logCalls).toEqual([]);
  });

  it('should write one row per transaction for the transaction table', async () => {
    const { rows, sink } = collect();
    const result = await scanRange(fakeRpc(), sink, { ...base, table: 'transaction', columns: ['tx_blockNumber'] });
    expect(result.rows).toBe(6);
    expect(rows).toHaveLength(6);
  });

  it('should fetch logs for the erc20 table', async () => {
    const rpc = fakeRpc();
    const { rows, sink } = collect();
    await scanRange(rpc, sink, { ...base, table: 'erc20', columns: ['erc20_blockNumber'], concurrency: 1 });
    expect(rpc.logCalls).toEqual([1, 2, 3]);
    expect(rows).toEqual([{ erc20_blockNumber: 1n }, { erc20_blockNumber: 2n }, { erc20_blockNumber: 3n }]);
  });

  it('should retry a failed block', async () => {
    const rpc = fakeRpc({ fail: (n, attempt) => n === 2 && attempt === 1 });
    const { rows, sink } = collect();
    const result = await scanRange(rpc, sink, base);
    expect(result).toEqual({ blocks: 3, rows: 3, aborted: false });
    expect(rows.map((r) => r.block_number)).toEqual([1n, 2n, 3n]);
    expect(rpc.blockCalls.filter((n) => n === 2)).toHaveLength(2);
  });

  it('should fail once a block exhausts its retries', async () => {
    const rpc = fakeRpc({ fail: (n) => n === 3 });
    const { rows, sink } = collect();
    await expect(scanRange(rpc, sink, { ...base, concurrency: 1, maxBlockRetries: 1 })).rejects.toThrow(
      'block 3 failed after 2 attempt(s): boom',
    );
    expect(rows).toHaveLength(2);
  });

  it('should treat a slow block as failed', async () => {
    const rpc = fakeRpc({ delayMs: () => 50 });
    const { sink } = collect();
    await expect(
      scanRange(rpc, sink, { ...base, to: 1, blockTimeoutMs: 5, maxBlockRetries: 0 }),
    ).rejects.toThrow('block 1 failed after 1 attempt(s): timeout: block 1 after 5ms');
  });

  it('should stop scheduling once the signal aborts', async () => {
    const ac = new AbortController();
    const rows: Row[] = [];
    const sink = {
      write: async (row: Row) => {
        rows.push(row);
        ac.abort();
      },
    };
    const result = await scanRange(fakeRpc(), sink, { ...base, concurrency: 1, signal: ac.signal });
    expect(result).toEqual({ blocks: 1, rows: 1, aborted: true });
  });

  it('should do nothing for an empty range', async () => {
    const rpc = fakeRpc();
    const { sink } = collect();
    expect(await scanRange(rpc, sink, { ...base, from: 5, to: 4 })).toEqual({ blocks: 0, rows: 0, aborted: false });
    expect(rpc.blockCalls).toEqual([]);
  });
});

describe('withTimeout', () => {
  it('should pass through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(1), 50, 'x')).resolves.toBe(1);
  });

  it('should reject with a labeled error after the deadline', async () => {
    await expect(withTimeout(new Promise<never>(() => {}), 5, 'block 9')).rejects.toThrow('timeout: block 9 after 5ms');
  });
});
