import { NotImplementedError } from '@nestedtx/core';

import type { QueryParams, SessionSettings } from '@nestedtx/core';

function flag(value: boolean | null): string {
  if (value === null) {
    return 'DEFAULT';
  }
  return value ? 'ON' : 'OFF';
}

/**
 * SET statements applying session settings. MySQL has no deferrable
 * transactions; asking for one is refused.
 */
export function buildSessionStatements(settings: SessionSettings): string[] {
  if (settings.deferrable === true) {
    throw new NotImplementedError('deferrable transactions on MySQL');
  }

  const statements: string[] = [];

  if (settings.isolationLevel !== undefined) {
    const value =
      settings.isolationLevel === null ? 'DEFAULT' : `'${settings.isolationLevel.replaceAll(' ', '-')}'`;
    statements.push(`SET SESSION transaction_isolation = ${value}`);
  }

  if (settings.readOnly !== undefined) {
    statements.push(`SET SESSION transaction_read_only = ${flag(settings.readOnly)}`);
  }

  if (settings.statementTimeout !== undefined) {
    const value = settings.statementTimeout === null ? 'DEFAULT' : String(settings.statementTimeout);
    statements.push(`SET SESSION max_execution_time = ${value}`);
  }

  return statements;
}

export function normalizeParams(params?: QueryParams): unknown[] {
  if (!params) {
    return [];
  }
  return Array.isArray(params) ? params : Object.values(params);
}

/**
 * A result set read with `rowsAsArray`: one array per row
 */
export function isRowList(value: unknown): value is unknown[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row));
}
