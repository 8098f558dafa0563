import { describe, it, expect } from 'vitest';
import { fromUtf8 } from '@cosmjs/encoding';
import { EthereumRecordCursor } from './recordCursor.js';
import { resolveColumns, type EthereumTable } from '../schema/tables.js';
import { readBlock } from '../column/reader.js';
import { readAllRows } from '../query/rowReader.js';
import { ShapeMismatchError } from '../errors.js';
import { TRANSFER_EVENT_TOPIC } from '../erc20/transfer.js';
import { fixedOffsetZone } from '../column/scalar.js';
import { BLOCK_HASH, FROM, TO, TX_HASH, addressTopic, hashOf, makeBlock, makeLog, makeTx, word } from '../__fixtures__/eth.js';

const UTC = { zone: fixedOffsetZone(0) };

function cursorFor(table: EthereumTable, names?: string[], block = makeBlock(), logs = [makeLog()]) {
  return new EthereumRecordCursor(resolveColumns(table, names), block, table, logs, UTC);
}

describe('EthereumRecordCursor block table', () => {
  it('should yield exactly one row', () => {
    const c = cursorFor('block');
    expect(c.advance()).toBe(true);
    expect(c.getLong(0)).toBe(100n);
    expect(fromUtf8(c.getBytes(1))).toBe(BLOCK_HASH);
    expect(c.getLong(11)).toBe(1234n);
    expect(c.getDouble(13)).toBe(30_000_000);
    expect(c.advance()).toBe(false);
    expect(c.advance()).toBe(false);
  });

  it('should expose the transaction hash list as an array column', () => {
    const block = makeBlock({ transactions: [makeTx(), hashOf('bb')] });
    const c = cursorFor('block', ['block_transactions'], block);
    c.advance();
    const type = c.getType(0);
    expect(readBlock(type, c.getObject(0))).toEqual([TX_HASH, hashOf('bb')]);
  });

  it('should address fields by requested position', () => {
    const c = cursorFor('block', ['block_timestamp', 'block_number']);
    c.advance();
    expect(c.getLong(0)).toBe(1_700_000_000n);
    expect(c.getLong(1)).toBe(100n);
    expect(c.getType(1)).toEqual({ kind: 'bigint' });
  });

  it('should report nulls', () => {
    const c = cursorFor('block', ['block_hash', 'block_totalDifficulty'], makeBlock({ hash: null }));
    c.advance();
    expect(c.isNull(0)).toBe(true);
    expect(c.isNull(1)).toBe(false);
  });

  it('should refuse accessors that do not match the column kind', () => {
    const c = cursorFor('block', ['block_number']);
    c.advance();
    expect(() => c.getBytes(0)).toThrow('getBytes cannot read column block_number of type bigint');
    expect(() => c.getObject(0)).toThrow(TypeError);
    expect(() => c.getBoolean(0)).toThrow(ShapeMismatchError);
    expect(() => c.getLong(1)).toThrow(RangeError);
  });

  it('should fail reads before the first row and after exhaustion', () => {
    const c = cursorFor('block', ['block_number']);
    expect(() => c.getLong(0)).toThrow('cursor is not positioned on a row');
    c.advance();
    c.advance();
    expect(() => c.getLong(0)).toThrow('cursor is not positioned on a row');
  });

  it('should report the block size as completed bytes', () => {
    expect(cursorFor('block').getCompletedBytes()).toBe(1234);
    expect(cursorFor('block').getReadTimeNanos()).toBe(0);
  });
});

describe('EthereumRecordCursor transaction table', () => {
  it('should yield one row per transaction in order', () => {
    const block = makeBlock({ transactions: [makeTx(), makeTx({ hash: hashOf('bb'), to: null })] });
    const columns = resolveColumns('transaction', ['tx_hash', 'tx_to', 'tx_value']);
    const rows = readAllRows(new EthereumRecordCursor(columns, block, 'transaction', [], UTC), columns);
    expect(rows).toEqual([
      { tx_hash: TX_HASH, tx_to: TO, tx_value: 1e18 },
      { tx_hash: hashOf('bb'), tx_to: null, tx_value: 1e18 },
    ]);
  });

  it('should be exhausted at once for an empty block', () => {
    const c = cursorFor('transaction');
    expect(c.advance()).toBe(false);
    expect(c.advance()).toBe(false);
  });

  it('should reject hash-only transaction references', () => {
    const c = cursorFor('transaction', undefined, makeBlock({ transactions: [TX_HASH] }));
    expect(() => c.advance()).toThrow(ShapeMismatchError);
  });

  it('should not expose the previous row after a failed advance', () => {
    const c = cursorFor('transaction', ['tx_nonce'], makeBlock({ transactions: [makeTx(), TX_HASH] }));
    expect(c.advance()).toBe(true);
    expect(c.getLong(0)).toBe(7n);
    expect(() => c.advance()).toThrow(ShapeMismatchError);
    expect(() => c.getLong(0)).toThrow('cursor is not positioned on a row');
  });
});

describe('EthereumRecordCursor erc20 table', () => {
  it('should yield one row per conforming transfer and skip the rest', () => {
    const logs = [
      makeLog({ topics: [hashOf('ee')] }),
      makeLog(),
      makeLog({ topics: [TRANSFER_EVENT_TOPIC], data: `0x${word(FROM)}${word(TO)}${word(5n)}${word(6n)}` }),
      makeLog({ topics: [TRANSFER_EVENT_TOPIC], data: `0x${word(TO)}${word(FROM)}${word(7n)}` }),
    ];
    const columns = resolveColumns('erc20');
    const rows = readAllRows(new EthereumRecordCursor(columns, makeBlock(), 'erc20', logs, UTC), columns);
    expect(rows).toEqual([
      {
        erc20_token: 'DAI',
        erc20_from: FROM,
        erc20_to: TO,
        erc20_value: 1000,
        erc20_txHash: TX_HASH,
        erc20_blockNumber: 100n,
      },
      {
        erc20_token: 'DAI',
        erc20_from: TO,
        erc20_to: FROM,
        erc20_value: 7,
        erc20_txHash: TX_HASH,
        erc20_blockNumber: 100n,
      },
    ]);
  });

  it('should stay exhausted once logs run out', () => {
    const c = cursorFor('erc20', ['erc20_value'], makeBlock(), [makeLog({ topics: [addressTopic(FROM)] })]);
    expect(c.advance()).toBe(false);
    expect(c.advance()).toBe(false);
  });

  it('should consume logs lazily', () => {
    let pulled = 0;
    function* source() {
      for (const log of [makeLog(), makeLog()]) {
        pulled++;
        yield log;
      }
    }
    const columns = resolveColumns('erc20', ['erc20_value']);
    const c = new EthereumRecordCursor(columns, makeBlock(), 'erc20', source(), UTC);
    c.advance();
    expect(pulled).toBe(1);
  });
});

describe('EthereumRecordCursor column order', () => {
  const block = makeBlock({ transactions: [makeTx(), makeTx({ hash: hashOf('bb'), to: null })] });
  const logs = [makeLog(), makeLog({ data: `0x${word(9n)}` })];

  it.each(['block', 'transaction', 'erc20'] as const)('should read the %s schema in reverse order', (table) => {
    const declared = resolveColumns(table);
    const reversed = [...declared].reverse();
    const expected = readAllRows(new EthereumRecordCursor(declared, block, table, logs, UTC), declared);
    const actual = readAllRows(new EthereumRecordCursor(reversed, block, table, logs, UTC), reversed);
    expect(expected.length).toBeGreaterThan(0);
    expect(actual).toEqual(expected);
    expect(Object.keys(actual[0] ?? {})).toEqual(reversed.map((c) => c.name));
  });
});
