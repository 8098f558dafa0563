// src/column/builder.ts
/**
 * In-memory column storage.
 *
 * A {@link ColumnBuilder} is an append-only list of positions. Each position
 * holds the column-native form of one value: `null`, a boolean, a 64-bit
 * integer (`bigint`), a double, a byte sequence, or a finished nested entry
 * ({@link ColumnBlock}). Nested entries are written through
 * `beginEntry` / `closeEntry`, which may themselves nest.
 */
import type { ColumnType } from './types.js';
import { formatColumnType } from './types.js';

export type ColumnValue = null | boolean | bigint | number | Uint8Array | ColumnBlock;

/**
 * A finished nested value. For an array it holds the elements, for a map the
 * keys and values alternating, for a row the field values in declared order.
 */
export class ColumnBlock {
  constructor(
    readonly type: ColumnType,
    readonly values: readonly ColumnValue[],
  ) {}

  get positionCount(): number {
    return this.values.length;
  }

  isNull(position: number): boolean {
    return this.at(position) === null;
  }

  getBoolean(position: number): boolean {
    const v = this.at(position);
    if (typeof v !== 'boolean') throw this.wrongKind(position, 'boolean');
    return v;
  }

  getLong(position: number): bigint {
    const v = this.at(position);
    if (typeof v !== 'bigint') throw this.wrongKind(position, 'long');
    return v;
  }

  getDouble(position: number): number {
    const v = this.at(position);
    if (typeof v !== 'number') throw this.wrongKind(position, 'double');
    return v;
  }

  getBytes(position: number): Uint8Array {
    const v = this.at(position);
    if (!(v instanceof Uint8Array)) throw this.wrongKind(position, 'bytes');
    return v;
  }

  getBlock(position: number): ColumnBlock {
    const v = this.at(position);
    if (!(v instanceof ColumnBlock)) throw this.wrongKind(position, 'block');
    return v;
  }

  private at(position: number): ColumnValue {
    if (!Number.isInteger(position) || position < 0 || position >= this.values.length) {
      throw new RangeError(`position ${position} out of range [0, ${this.values.length})`);
    }
    return this.values[position] ?? null;
  }

  private wrongKind(position: number, wanted: string): Error {
    return new TypeError(`position ${position} of ${formatColumnType(this.type)} block is not a ${wanted}`);
  }
}

type OpenEntry = { type: ColumnType; builder: ColumnBuilder };

export class ColumnBuilder {
  private readonly values: ColumnValue[] = [];
  private open: OpenEntry | null = null;

  get positionCount(): number {
    return this.values.length;
  }

  appendNull(): this {
    return this.push(null);
  }

  writeBoolean(v: boolean): this {
    return this.push(v);
  }

  writeLong(v: bigint): this {
    return this.push(BigInt.asIntN(64, v));
  }

  writeDouble(v: number): this {
    return this.push(v);
  }

  writeBytes(v: Uint8Array): this {
    return this.push(v);
  }

  /**
   * Opens a nested entry of the given structural type and returns the builder
   * that receives its positions. Exactly one entry may be open at a time.
   */
  beginEntry(type: ColumnType): ColumnBuilder {
    if (this.open) throw new Error('nested entry already open');
    const child = new ColumnBuilder();
    this.open = { type, builder: child };
    return child;
  }

  /**
   * Closes the open nested entry and appends it as a single position.
   */
  closeEntry(): this {
    const entry = this.open;
    if (!entry) throw new Error('no nested entry open');
    if (entry.builder.open) throw new Error('inner nested entry still open');
    this.open = null;
    return this.push(entry.builder.build(entry.type));
  }

  /** Returns the nested entry written at `position`. */
  getBlock(position: number): ColumnBlock {
    const v = this.values[position];
    if (!(v instanceof ColumnBlock)) throw new TypeError(`position ${position} is not a nested entry`);
    return v;
  }

  /**
   * Freezes the appended positions into a block tagged with `type`.
   */
  build(type: ColumnType): ColumnBlock {
    if (this.open) throw new Error('cannot build with an open nested entry');
    return new ColumnBlock(type, [...this.values]);
  }

  private push(v: ColumnValue): this {
    if (this.open) throw new Error('cannot append while a nested entry is open');
    this.values.push(v);
    return this;
  }
}
