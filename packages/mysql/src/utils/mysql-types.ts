import type { FieldInfo } from '@nestedtx/core';
import type { FieldPacket } from 'mysql2';

export const MYSQL_TYPE_MAP: Readonly<Record<number, string>> = {
  0: 'DECIMAL',
  1: 'TINY',
  2: 'SHORT',
  3: 'LONG',
  4: 'FLOAT',
  5: 'DOUBLE',
  6: 'NULL',
  7: 'TIMESTAMP',
  8: 'LONGLONG',
  9: 'INT24',
  10: 'DATE',
  11: 'TIME',
  12: 'DATETIME',
  13: 'YEAR',
  14: 'NEWDATE',
  15: 'VARCHAR',
  16: 'BIT',
  245: 'JSON',
  246: 'NEWDECIMAL',
  247: 'ENUM',
  248: 'SET',
  249: 'TINY_BLOB',
  250: 'MEDIUM_BLOB',
  251: 'LONG_BLOB',
  252: 'BLOB',
  253: 'VAR_STRING',
  254: 'STRING',
  255: 'GEOMETRY',
};

export function getMySQLType(field: FieldPacket): string {
  if (field.type === undefined) {
    return 'UNKNOWN';
  }
  return MYSQL_TYPE_MAP[field.type] ?? 'UNKNOWN';
}

/**
 * NOT NULL is bit 0 of the column flags
 */
export function isNullable(field: FieldPacket): boolean {
  return field.flags === undefined ? true : !(Number(field.flags) & 1);
}

export function describeField(field: FieldPacket): FieldInfo {
  return { name: field.name, type: getMySQLType(field), nullable: isNullable(field) };
}

export function isFieldList(value: unknown): value is FieldPacket[] {
  return (
    Array.isArray(value) &&
    value.every((field) => typeof field === 'object' && field !== null && 'name' in field && typeof field.name === 'string')
  );
}
