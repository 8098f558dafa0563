// src/cursor/recordCursor.ts
/**
 * Row-by-row cursor over one block, in one of three traversal modes:
 * the block itself (one row), its transactions, or the ERC-20 transfers
 * decoded from its logs.
 *
 * The host drives it with `advance()` and then reads fields by their index
 * in the list of columns it requested. Each successful `advance()` builds a
 * fresh supplier array for the row; values are produced and converted to
 * column-native form only when a field is read.
 */
import type { ColumnHandle, ColumnType } from '../column/types.js';
import { formatColumnType, isLongType, isSliceType, isStructuralType } from '../column/types.js';
import type { ColumnBlock } from '../column/builder.js';
import { serializeObject } from '../column/serializer.js';
import { toBoolean, toDouble, toLongExpressedValue, toSlice, type ZoneRule, systemZone } from '../column/scalar.js';
import type { EthBlock, EthLog } from '../eth/types.js';
import { isEthTransaction } from '../eth/types.js';
import { transactionRowType, type EthereumTable } from '../schema/tables.js';
import { matchTransferLog } from '../erc20/transfer.js';
import { ShapeMismatchError } from '../errors.js';
import { blockSuppliers, transactionSuppliers, transferSuppliers, type FieldSupplier } from './suppliers.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('cursor/record');

/**
 * What the host query engine needs from a cursor.
 */
export interface RecordCursor {
  /** Advisory size of the data behind the cursor, in bytes. */
  getCompletedBytes(): number;
  getReadTimeNanos(): number;
  getType(field: number): ColumnType;
  /** Moves to the next row; `false` once the rows are exhausted, and on every call after. */
  advance(): boolean;
  getBoolean(field: number): boolean;
  getLong(field: number): bigint;
  getDouble(field: number): number;
  getBytes(field: number): Uint8Array;
  getObject(field: number): ColumnBlock;
  isNull(field: number): boolean;
  close(): void;
}

export type EthereumRecordCursorOptions = {
  /** Timezone for date and timestamp columns; the host zone by default. */
  zone?: ZoneRule;
};

export class EthereumRecordCursor implements RecordCursor {
  private readonly fieldToColumnIndex: readonly number[];
  private readonly zone: ZoneRule;
  private readonly logIter: Iterator<EthLog>;

  private suppliers: readonly FieldSupplier[] = [];
  private blockRead = false;
  private txIndex = 0;
  private exhausted = false;

  /**
   * @param columns Requested columns, in the order the host will address them.
   * @param logs Logs of the block; only consumed by the `erc20` table. May be lazy.
   */
  constructor(
    private readonly columns: readonly ColumnHandle[],
    private readonly block: EthBlock,
    private readonly table: EthereumTable,
    logs: Iterable<EthLog> = [],
    opts: EthereumRecordCursorOptions = {},
  ) {
    this.fieldToColumnIndex = columns.map((c) => c.ordinalPosition);
    this.zone = opts.zone ?? systemZone;
    this.logIter = logs[Symbol.iterator]();
  }

  getCompletedBytes(): number {
    return Number(this.block.size);
  }

  getReadTimeNanos(): number {
    return 0;
  }

  getType(field: number): ColumnType {
    return this.column(field).type;
  }

  advance(): boolean {
    if (this.exhausted) return false;

    this.suppliers = [];
    const next = this.nextRow();
    if (!next) {
      this.exhausted = true;
      log.debug('cursor exhausted', { table: this.table, block: this.block.number?.toString() });
      return false;
    }
    this.suppliers = next;
    return true;
  }

  getBoolean(field: number): boolean {
    return toBoolean(this.getType(field), this.value(field));
  }

  getLong(field: number): bigint {
    const type = this.getType(field);
    if (!isLongType(type)) throw this.wrongAccessor(field, 'getLong');
    return toLongExpressedValue(type, this.value(field), this.zone);
  }

  getDouble(field: number): number {
    return toDouble(this.getType(field), this.value(field));
  }

  getBytes(field: number): Uint8Array {
    const type = this.getType(field);
    if (!isSliceType(type)) throw this.wrongAccessor(field, 'getBytes');
    return toSlice(type, this.value(field));
  }

  getObject(field: number): ColumnBlock {
    const type = this.getType(field);
    if (!isStructuralType(type)) throw this.wrongAccessor(field, 'getObject');
    return serializeObject(type, null, this.value(field), { zone: this.zone });
  }

  isNull(field: number): boolean {
    const v = this.value(field);
    return v === null || v === undefined;
  }

  close(): void {}

  private nextRow(): readonly FieldSupplier[] | null {
    switch (this.table) {
      case 'block': {
        if (this.blockRead) return null;
        this.blockRead = true;
        return blockSuppliers(this.block);
      }
      case 'transaction': {
        if (this.txIndex >= this.block.transactions.length) return null;
        const ref = this.block.transactions[this.txIndex++];
        if (!isEthTransaction(ref)) {
          throw new ShapeMismatchError(transactionRowType(), ref, 'block was fetched without full transaction objects');
        }
        return transactionSuppliers(ref);
      }
      case 'erc20': {
        for (let r = this.logIter.next(); !r.done; r = this.logIter.next()) {
          const transfer = matchTransferLog(r.value);
          if (transfer) return transferSuppliers(transfer);
        }
        return null;
      }
    }
  }

  private column(field: number): ColumnHandle {
    const c = this.columns[field];
    if (!c) throw new RangeError(`Invalid field index ${field}`);
    return c;
  }

  private value(field: number): unknown {
    const ordinal = this.fieldToColumnIndex[field];
    if (ordinal === undefined) throw new RangeError(`Invalid field index ${field}`);
    const supplier = this.suppliers[ordinal];
    if (!supplier) throw new Error('cursor is not positioned on a row');
    return supplier();
  }

  private wrongAccessor(field: number, accessor: string): TypeError {
    const c = this.column(field);
    return new TypeError(`${accessor} cannot read column ${c.name} of type ${formatColumnType(c.type)}`);
  }
}
