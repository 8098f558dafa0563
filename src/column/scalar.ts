// src/column/scalar.ts
/**
 * Scalar codec: native value + target column kind → column-native form.
 *
 * Integral, real, date and timestamp kinds are stored as 64-bit integers,
 * double as a float64, text and binary kinds as byte sequences.
 */
import { toUtf8 } from '@cosmjs/encoding';
import type { ColumnType, ScalarType } from './types.js';
import type { ColumnBuilder } from './builder.js';
import { isIntegralType } from './types.js';
import { ShapeMismatchError, UnsupportedTypeError } from '../errors.js';

const MILLIS_PER_DAY = 86_400_000;

/**
 * Offset (ms, local minus UTC) of a timezone at a given instant.
 */
export type ZoneRule = (epochMillis: number) => number;

/** The host process's default timezone. */
export const systemZone: ZoneRule = (epochMillis) => -new Date(epochMillis).getTimezoneOffset() * 60_000;

export function fixedOffsetZone(offsetMillis: number): ZoneRule {
  return () => offsetMillis;
}

export type ScalarCodecOptions = {
  zone?: ZoneRule;
};

/**
 * Native value → 64-bit integer for integral columns.
 * Numbers are truncated toward zero; bigints wrap to 64 bits.
 */
export function toLong(type: ColumnType, value: unknown): bigint {
  if (typeof value === 'bigint') return BigInt.asIntN(64, value);
  if (typeof value === 'number' && Number.isFinite(value)) return BigInt.asIntN(64, BigInt(Math.trunc(value)));
  throw new ShapeMismatchError(type, value, 'expected a number');
}

/**
 * Local-time date → whole days since the epoch. The zone offset is applied
 * once, at the instant itself.
 */
export function dateToEpochDays(value: Date, zone: ZoneRule = systemZone): bigint {
  const storageTime = value.getTime();
  const utcMillis = storageTime + zone(storageTime);
  return BigInt(Math.trunc(utcMillis / MILLIS_PER_DAY));
}

/**
 * Process-local timestamp → milliseconds under the zone's UTC-to-local rule.
 */
export function timestampToLocalMillis(value: Date, zone: ZoneRule = systemZone): bigint {
  const millis = value.getTime();
  return BigInt(millis + zone(millis));
}

const f32 = new Float32Array(1);
const i32 = new Int32Array(f32.buffer);

/** Raw IEEE-754 single-precision bit pattern of `value`, as a signed 32-bit int. */
export function floatToRawIntBits(value: number): number {
  f32[0] = value;
  return i32[0] ?? 0;
}

/** Inverse of {@link floatToRawIntBits}. */
export function intBitsToFloat(bits: number): number {
  i32[0] = bits;
  return f32[0] ?? 0;
}

/**
 * Byte offset just past the first `codePoints` code points of a UTF-8 slice.
 */
function offsetOfCodePoint(bytes: Uint8Array, codePoints: number): number {
  let seen = 0;
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i] ?? 0;
    // continuation bytes are 10xxxxxx
    if ((b & 0xc0) !== 0x80) {
      if (seen === codePoints) return i;
      seen++;
    }
  }
  return bytes.length;
}

export function truncateToLength(bytes: Uint8Array, length: number): Uint8Array {
  const end = offsetOfCodePoint(bytes, length);
  return end === bytes.length ? bytes : bytes.subarray(0, end);
}

export function truncateToLengthAndTrimSpaces(bytes: Uint8Array, length: number): Uint8Array {
  let end = offsetOfCodePoint(bytes, length);
  while (end > 0 && bytes[end - 1] === 0x20) end--;
  return end === bytes.length ? bytes : bytes.subarray(0, end);
}

/**
 * Native value → byte sequence for varchar, char and varbinary columns.
 */
export function toSlice(type: Extract<ScalarType, { kind: 'varchar' | 'char' | 'varbinary' }>, value: unknown): Uint8Array {
  let bytes: Uint8Array;
  if (typeof value === 'string') {
    bytes = toUtf8(value);
  } else if (value instanceof Uint8Array) {
    bytes = value;
  } else if (typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value))) {
    bytes = toUtf8(value.toString());
  } else {
    throw new ShapeMismatchError(type, value, 'unsupported string field type');
  }
  if (type.kind === 'varchar' && type.length !== undefined) return truncateToLength(bytes, type.length);
  if (type.kind === 'char') return truncateToLengthAndTrimSpaces(bytes, type.length);
  return bytes;
}

/**
 * Native value → 64-bit integer for every kind stored as a long
 * (integral, real, date, timestamp).
 */
export function toLongExpressedValue(type: ColumnType, value: unknown, zone: ZoneRule = systemZone): bigint {
  switch (type.kind) {
    case 'date':
      return value instanceof Date ? dateToEpochDays(value, zone) : toLong(type, value);
    case 'timestamp':
      return value instanceof Date ? timestampToLocalMillis(value, zone) : toLong(type, value);
    case 'real':
      if (typeof value !== 'number') throw new ShapeMismatchError(type, value, 'expected a number');
      return BigInt(floatToRawIntBits(value));
    default:
      if (isIntegralType(type)) return toLong(type, value);
      throw new UnsupportedTypeError(type.kind);
  }
}

/**
 * Native value → float64 for double columns.
 */
export function toDouble(type: ColumnType, value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new ShapeMismatchError(type, value, 'expected a number');
}

export function toBoolean(type: ColumnType, value: unknown): boolean {
  if (typeof value !== 'boolean') throw new ShapeMismatchError(type, value, 'expected a boolean');
  return value;
}

/**
 * Writes one scalar into `builder`. Null and undefined write a null marker
 * without any coercion.
 */
export function serializePrimitive(
  type: ScalarType,
  builder: ColumnBuilder,
  value: unknown,
  opts: ScalarCodecOptions = {},
): void {
  if (value === null || value === undefined) {
    builder.appendNull();
    return;
  }
  switch (type.kind) {
    case 'boolean':
      builder.writeBoolean(toBoolean(type, value));
      return;
    case 'tinyint':
    case 'smallint':
    case 'integer':
    case 'bigint':
    case 'real':
    case 'date':
    case 'timestamp':
      builder.writeLong(toLongExpressedValue(type, value, opts.zone));
      return;
    case 'double':
      builder.writeDouble(toDouble(type, value));
      return;
    case 'varchar':
    case 'char':
    case 'varbinary':
      builder.writeBytes(toSlice(type, value));
      return;
    default:
      return unsupportedKind(type);
  }
}

function unsupportedKind(type: never): never {
  throw new UnsupportedTypeError(JSON.stringify(type));
}
