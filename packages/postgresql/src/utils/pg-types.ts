import { types } from 'pg';

const TYPE_NAMES: Readonly<Record<number, string>> = {
  [types.builtins.BOOL]: 'boolean',
  [types.builtins.BYTEA]: 'bytea',
  [types.builtins.INT2]: 'smallint',
  [types.builtins.INT4]: 'integer',
  [types.builtins.INT8]: 'bigint',
  [types.builtins.FLOAT4]: 'real',
  [types.builtins.FLOAT8]: 'double',
  [types.builtins.NUMERIC]: 'numeric',
  [types.builtins.VARCHAR]: 'varchar',
  [types.builtins.TEXT]: 'text',
  [types.builtins.DATE]: 'date',
  [types.builtins.TIMESTAMP]: 'timestamp',
  [types.builtins.TIMESTAMPTZ]: 'timestamptz',
  [types.builtins.JSON]: 'json',
  [types.builtins.JSONB]: 'jsonb',
  [types.builtins.UUID]: 'uuid',
};

export function pgTypeName(oid: number): string {
  return TYPE_NAMES[oid] ?? 'unknown';
}
