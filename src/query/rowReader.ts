// src/query/rowReader.ts
import type { ColumnHandle } from '../column/types.js';
import { readBlock, readColumnValue, type NativeValue } from '../column/reader.js';
import type { RecordCursor } from '../cursor/recordCursor.js';

export type Row = Record<string, NativeValue>;

/**
 * Reads the current row of `cursor` the way a host engine does: `isNull`
 * first, then the one accessor matching the column kind. Values come back
 * in native form, keyed by column name.
 */
export function readRow(cursor: RecordCursor, columns: readonly ColumnHandle[]): Row {
  const row: Row = {};
  columns.forEach((column, field) => {
    row[column.name] = readField(cursor, field, column);
  });
  return row;
}

function readField(cursor: RecordCursor, field: number, { type }: ColumnHandle): NativeValue {
  if (cursor.isNull(field)) return null;
  switch (type.kind) {
    case 'boolean':
      return cursor.getBoolean(field);
    case 'tinyint':
    case 'smallint':
    case 'integer':
    case 'bigint':
    case 'real':
    case 'date':
    case 'timestamp':
      return readColumnValue(type, cursor.getLong(field));
    case 'double':
      return cursor.getDouble(field);
    case 'varchar':
    case 'char':
    case 'varbinary':
      return readColumnValue(type, cursor.getBytes(field));
    case 'array':
    case 'map':
    case 'row':
      return readBlock(type, cursor.getObject(field));
  }
}

/**
 * Drains the cursor into rows and closes it.
 */
export function readAllRows(cursor: RecordCursor, columns: readonly ColumnHandle[]): Row[] {
  const rows: Row[] = [];
  try {
    while (cursor.advance()) rows.push(readRow(cursor, columns));
  } finally {
    cursor.close();
  }
  return rows;
}
