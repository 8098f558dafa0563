import { describe, it, expect } from 'vitest';
import { normalizeBlock, normalizeLogs, normalizeQuantity } from './normalize.js';
import { BLOCK_HASH, DAI, FROM, TX_HASH, rpcBlockJson, rpcLogJson } from '../__fixtures__/eth.js';

describe('normalizeBlock', () => {
  it('should decode quantities to bigints', () => {
    const block = normalizeBlock(rpcBlockJson());
    expect(block.number).toBe(100n);
    expect(block.hash).toBe(BLOCK_HASH);
    expect(block.size).toBe(1234n);
    expect(block.gasLimit).toBe(30_000_000n);
    expect(block.timestamp).toBe(1_700_000_000n);
    expect(block.totalDifficulty).toBe(200n);
  });

  it('should decode embedded transactions and drop unknown fields', () => {
    const [tx] = normalizeBlock(rpcBlockJson()).transactions;
    expect(tx).toEqual({
      hash: TX_HASH,
      nonce: 7n,
      blockHash: BLOCK_HASH,
      blockNumber: 100n,
      transactionIndex: 0n,
      from: FROM,
      to: null,
      value: 1_000_000_000_000_000_000n,
      gas: 21_000n,
      gasPrice: 20_000_000_000n,
      input: '0x60806040',
    });
  });

  it('should keep hash-only transaction references', () => {
    const block = normalizeBlock({ ...rpcBlockJson(), transactions: [TX_HASH] });
    expect(block.transactions).toEqual([TX_HASH]);
  });

  it('should map absent optional fields to null', () => {
    const json = rpcBlockJson();
    delete json.totalDifficulty;
    delete json.uncles;
    const block = normalizeBlock(json);
    expect(block.totalDifficulty).toBeNull();
    expect(block.uncles).toEqual([]);
  });

  it('should reject malformed payloads', () => {
    expect(() => normalizeBlock({ ...rpcBlockJson(), size: 'big' })).toThrow(/^Malformed block from node\n/);
    expect(() => normalizeBlock(null)).toThrow('Malformed block from node');
  });
});

describe('normalizeLogs', () => {
  it('should decode log indexes to numbers', () => {
    expect(normalizeLogs([rpcLogJson()])).toEqual([
      {
        address: DAI,
        topics: rpcLogJson().topics,
        data: rpcLogJson().data,
        blockNumber: 100n,
        transactionHash: TX_HASH,
        logIndex: 3,
      },
    ]);
  });

  it('should reject a non-array', () => {
    expect(() => normalizeLogs({})).toThrow('Malformed logs from node');
  });
});

describe('normalizeQuantity', () => {
  it('should decode a hex quantity', () => {
    expect(normalizeQuantity('0x10')).toBe(16n);
  });
});
