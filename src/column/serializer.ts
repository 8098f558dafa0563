// src/column/serializer.ts
/**
 * Recursive, type-directed serializer from native values to column storage.
 *
 * Every call either writes into a caller-supplied builder and returns
 * `undefined`, or, when no builder is given (the outermost call for a
 * structural column), synthesizes its own builder and returns the finished
 * {@link ColumnBlock}.
 */
import type { ArrayType, ColumnType, MapType, RowType } from './types.js';
import { isStructuralType } from './types.js';
import { ColumnBlock, ColumnBuilder } from './builder.js';
import { serializePrimitive, type ScalarCodecOptions } from './scalar.js';
import { ShapeMismatchError } from '../errors.js';
import { isEthTransaction } from '../eth/types.js';
import { transactionSuppliers } from '../cursor/suppliers.js';

export function serializeObject(
  type: ColumnType,
  builder: ColumnBuilder,
  value: unknown,
  opts?: ScalarCodecOptions,
): undefined;
export function serializeObject(type: ColumnType, builder: null, value: unknown, opts?: ScalarCodecOptions): ColumnBlock;
export function serializeObject(
  type: ColumnType,
  builder: ColumnBuilder | null,
  value: unknown,
  opts?: ScalarCodecOptions,
): ColumnBlock | undefined;
export function serializeObject(
  type: ColumnType,
  builder: ColumnBuilder | null,
  value: unknown,
  opts: ScalarCodecOptions = {},
): ColumnBlock | undefined {
  if (!isStructuralType(type)) {
    serializePrimitive(type, requireBuilder(builder), value, opts);
    return undefined;
  }
  switch (type.kind) {
    case 'array':
      return serializeList(type, builder, value, opts);
    case 'map':
      return serializeMap(type, builder, value, opts);
    case 'row':
      return serializeStruct(type, builder, value, opts);
  }
}

function requireBuilder(builder: ColumnBuilder | null): ColumnBuilder {
  if (builder === null) throw new Error('parent builder is null');
  return builder;
}

function serializeList(
  type: ArrayType,
  builder: ColumnBuilder | null,
  value: unknown,
  opts: ScalarCodecOptions,
): ColumnBlock | undefined {
  if (value === null || value === undefined) {
    requireBuilder(builder).appendNull();
    return undefined;
  }
  if (!Array.isArray(value)) throw new ShapeMismatchError(type, value, 'expected an array');
  const elements: readonly unknown[] = value;

  const current = builder ? builder.beginEntry(type) : new ColumnBuilder();
  for (const element of elements) {
    serializeObject(type.element, current, element, opts);
  }

  if (builder) {
    builder.closeEntry();
    return undefined;
  }
  return current.build(type);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function entriesOf(value: unknown): Iterable<readonly [unknown, unknown]> | null {
  if (value instanceof Map) return value.entries();
  if (isPlainRecord(value)) return Object.entries(value);
  return null;
}

function serializeMap(
  type: MapType,
  builder: ColumnBuilder | null,
  value: unknown,
  opts: ScalarCodecOptions,
): ColumnBlock | undefined {
  if (value === null || value === undefined) {
    requireBuilder(builder).appendNull();
    return undefined;
  }
  const entries = entriesOf(value);
  if (!entries) throw new ShapeMismatchError(type, value, 'expected a Map or a plain object');

  const synthesized = builder === null;
  const target = builder ?? new ColumnBuilder();
  const current = target.beginEntry(type);

  for (const [key, entryValue] of entries) {
    // null keys are dropped, not rejected
    if (key === null || key === undefined) continue;
    serializeObject(type.key, current, key, opts);
    serializeObject(type.value, current, entryValue, opts);
  }

  target.closeEntry();
  return synthesized ? target.getBlock(0) : undefined;
}

function serializeStruct(
  type: RowType,
  builder: ColumnBuilder | null,
  value: unknown,
  opts: ScalarCodecOptions,
): ColumnBlock | undefined {
  if (value === null || value === undefined) {
    requireBuilder(builder).appendNull();
    return undefined;
  }
  if (!isEthTransaction(value)) throw new ShapeMismatchError(type, value, 'expected a transaction record');

  const fields = transactionSuppliers(value);
  if (type.fields.length > fields.length) {
    throw new ShapeMismatchError(type, value, `row declares ${type.fields.length} fields, record has ${fields.length}`);
  }

  const synthesized = builder === null;
  const target = builder ?? new ColumnBuilder();
  const current = target.beginEntry(type);

  type.fields.forEach((field, i) => {
    const supplier = fields[i];
    serializeObject(field.type, current, supplier ? supplier() : null, opts);
  });

  target.closeEntry();
  return synthesized ? target.getBlock(0) : undefined;
}
