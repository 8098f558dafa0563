import { describe, it, expect } from 'vitest';
import { followLoop } from './follow.js';
import type { Row } from '../query/rowReader.js';
import { makeBlock } from '../__fixtures__/eth.js';

function fakeRpc(latest: () => bigint) {
  let heads = 0;
  return {
    get heads() {
      return heads;
    },
    async fetchBlockNumber() {
      heads++;
      return latest();
    },
    async fetchBlock(number: bigint | number) {
      return makeBlock({ number: BigInt(number) });
    },
    async fetchLogs() {
      return [];
    },
  };
}

describe('followLoop', () => {
  it('should scan new blocks as the head advances', async () => {
    const ac = new AbortController();
    const rows: Row[] = [];
    const rpc = fakeRpc(() => 5n);
    const sink = {
      write: async (row: Row) => void rows.push(row),
      flush: async () => ac.abort(),
    };
    const next = await followLoop(rpc, sink, {
      table: 'block',
      columns: ['block_number'],
      concurrency: 4,
      startNext: 4,
      pollMs: 10,
      signal: ac.signal,
    });
    expect(next).toBe(6);
    expect(rows).toEqual([{ block_number: 4n }, { block_number: 5n }]);
    expect(rpc.heads).toBe(1);
  });

  it('should poll while caught up', async () => {
    const ac = new AbortController();
    let polls = 0;
    const rpc = fakeRpc(() => {
      if (++polls === 2) ac.abort();
      return 3n;
    });
    const rows: Row[] = [];
    const next = await followLoop(rpc, { write: async (row: Row) => void rows.push(row) }, {
      table: 'block',
      concurrency: 1,
      startNext: 4,
      pollMs: 10,
      signal: ac.signal,
    });
    expect(next).toBe(4);
    expect(polls).toBe(2);
    expect(rows).toEqual([]);
  });
});
