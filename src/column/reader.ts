// src/column/reader.ts
/**
 * Reads column storage back into native values.
 */
import { fromUtf8 } from '@cosmjs/encoding';
import type { ColumnType } from './types.js';
import { ColumnBlock, type ColumnValue } from './builder.js';
import { intBitsToFloat } from './scalar.js';

/**
 * Native form of a stored value: `bigint` for integral, date and timestamp
 * kinds, `number` for double and real, `string` for varchar and char,
 * `Uint8Array` for varbinary, arrays for array and row kinds, `Map` for maps.
 */
export type NativeValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | Uint8Array
  | NativeValue[]
  | Map<NativeValue, NativeValue>;

function mismatch(type: ColumnType): TypeError {
  return new TypeError(`stored value does not match column kind ${type.kind}`);
}

/**
 * Converts one stored position of type `type` back to its native value.
 */
export function readColumnValue(type: ColumnType, value: ColumnValue): NativeValue {
  if (value === null) return null;
  switch (type.kind) {
    case 'boolean':
      if (typeof value !== 'boolean') throw mismatch(type);
      return value;
    case 'tinyint':
    case 'smallint':
    case 'integer':
    case 'bigint':
    case 'date':
    case 'timestamp':
      if (typeof value !== 'bigint') throw mismatch(type);
      return value;
    case 'real':
      if (typeof value !== 'bigint') throw mismatch(type);
      return intBitsToFloat(Number(BigInt.asIntN(32, value)));
    case 'double':
      if (typeof value !== 'number') throw mismatch(type);
      return value;
    case 'varchar':
    case 'char':
      if (!(value instanceof Uint8Array)) throw mismatch(type);
      return fromUtf8(value, true);
    case 'varbinary':
      if (!(value instanceof Uint8Array)) throw mismatch(type);
      return value;
    case 'array':
    case 'map':
    case 'row':
      if (!(value instanceof ColumnBlock)) throw mismatch(type);
      return readBlock(type, value);
  }
}

/**
 * Converts a nested entry back to its native form: an element array for
 * arrays, a `Map` for maps, a positional tuple for rows.
 */
export function readBlock(type: ColumnType, block: ColumnBlock): NativeValue {
  switch (type.kind) {
    case 'array':
      return block.values.map((v) => readColumnValue(type.element, v));
    case 'map': {
      if (block.positionCount % 2 !== 0) throw new TypeError('map entry has an odd number of positions');
      const out = new Map<NativeValue, NativeValue>();
      for (let i = 0; i < block.positionCount; i += 2) {
        out.set(readColumnValue(type.key, block.values[i] ?? null), readColumnValue(type.value, block.values[i + 1] ?? null));
      }
      return out;
    }
    case 'row':
      return type.fields.map((f, i) => readColumnValue(f.type, block.values[i] ?? null));
    default:
      throw new TypeError(`${type.kind} is not a structural type`);
  }
}
