import { describe, it, expect } from 'vitest';
import { fromUtf8, toUtf8 } from '@cosmjs/encoding';
import {
  dateToEpochDays,
  fixedOffsetZone,
  floatToRawIntBits,
  intBitsToFloat,
  serializePrimitive,
  timestampToLocalMillis,
  toBoolean,
  toDouble,
  toLong,
  toLongExpressedValue,
  toSlice,
} from './scalar.js';
import { BIGINT, BOOLEAN, DATE, DOUBLE, REAL, TIMESTAMP, arrayOf } from './types.js';
import { ColumnBuilder } from './builder.js';
import { ShapeMismatchError } from '../errors.js';

const UTC = fixedOffsetZone(0);
const HOUR = 3_600_000;

describe('real encoding', () => {
  it('should store the raw float32 bit pattern', () => {
    expect(floatToRawIntBits(1.5)).toBe(0x3fc00000);
    expect(toLongExpressedValue(REAL, 1.5)).toBe(1069547520n);
    expect(toLongExpressedValue(REAL, -2)).toBe(-1073741824n);
  });

  it('should decode bits back to the float', () => {
    expect(intBitsToFloat(0x3fc00000)).toBe(1.5);
  });

  it('should reject non-numbers', () => {
    expect(() => toLongExpressedValue(REAL, 1n)).toThrow(ShapeMismatchError);
  });
});

describe('integral encoding', () => {
  it('should truncate numbers toward zero', () => {
    expect(toLong(BIGINT, 3.9)).toBe(3n);
    expect(toLong(BIGINT, -3.9)).toBe(-3n);
  });

  it('should wrap bigints to 64 bits', () => {
    expect(toLong(BIGINT, 2n ** 64n + 5n)).toBe(5n);
  });

  it('should reject strings and non-finite numbers', () => {
    expect(() => toLong(BIGINT, '1')).toThrow(ShapeMismatchError);
    expect(() => toLong(BIGINT, Number.NaN)).toThrow('unsupported number value for column type bigint');
  });
});

describe('date and timestamp encoding', () => {
  const jan2 = new Date(Date.UTC(2024, 0, 2));

  it('should count whole days in the given zone', () => {
    expect(dateToEpochDays(jan2, UTC)).toBe(19724n);
    expect(dateToEpochDays(jan2, fixedOffsetZone(-5 * HOUR))).toBe(19723n);
  });

  it('should shift timestamps by the zone offset', () => {
    expect(timestampToLocalMillis(new Date(1000), fixedOffsetZone(HOUR))).toBe(3_601_000n);
  });

  it('should take numbers as already converted', () => {
    expect(toLongExpressedValue(DATE, 19724, UTC)).toBe(19724n);
    expect(toLongExpressedValue(TIMESTAMP, 5n, UTC)).toBe(5n);
  });
});

describe('toSlice', () => {
  it('should truncate varchar by code points', () => {
    const bytes = toSlice({ kind: 'varchar', length: 2 } as const, 'héllo');
    expect(fromUtf8(bytes)).toBe('hé');
    expect(bytes.length).toBe(3);
    expect(fromUtf8(toSlice({ kind: 'varchar', length: 1 } as const, '😀x'))).toBe('😀');
  });

  it('should truncate char and trim trailing spaces', () => {
    expect(fromUtf8(toSlice({ kind: 'char', length: 5 } as const, 'ab   cd'))).toBe('ab');
    expect(fromUtf8(toSlice({ kind: 'char', length: 3 } as const, 'abc'))).toBe('abc');
  });

  it('should pass bytes through for varbinary', () => {
    const raw = new Uint8Array([1, 2, 3]);
    expect(toSlice({ kind: 'varbinary' } as const, raw)).toBe(raw);
  });

  it('should render integers as decimal text', () => {
    expect(fromUtf8(toSlice({ kind: 'varchar' } as const, 42n))).toBe('42');
    expect(toSlice({ kind: 'varchar' } as const, 7)).toEqual(toUtf8('7'));
  });

  it('should reject other shapes', () => {
    expect(() => toSlice({ kind: 'varchar' } as const, 1.5)).toThrow(ShapeMismatchError);
    expect(() => toSlice({ kind: 'varchar' } as const, {})).toThrow(ShapeMismatchError);
  });
});

describe('serializePrimitive', () => {
  it('should write null markers without coercion', () => {
    const b = new ColumnBuilder();
    serializePrimitive(BIGINT, b, null);
    serializePrimitive(BIGINT, b, undefined);
    expect(b.build(arrayOf(BIGINT)).values).toEqual([null, null]);
  });

  it('should convert by column kind', () => {
    const b = new ColumnBuilder();
    serializePrimitive(DOUBLE, b, 7n);
    serializePrimitive(BOOLEAN, b, true);
    serializePrimitive(REAL, b, 1.5);
    expect(b.build(arrayOf(DOUBLE)).values).toEqual([7, true, 1069547520n]);
  });

  it('should reject a wrong boolean shape', () => {
    expect(() => toBoolean(BOOLEAN, 'true')).toThrow(ShapeMismatchError);
    expect(toDouble(DOUBLE, 2n)).toBe(2);
  });
});
