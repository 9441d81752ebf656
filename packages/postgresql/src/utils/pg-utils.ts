import type { QueryParams, SessionSettings } from '@nestedtx/core';

function flag(value: boolean | null): string {
  if (value === null) {
    return 'DEFAULT';
  }
  return value ? 'on' : 'off';
}

/**
 * SET statements applying session settings. Transaction characteristics go
 * through the `default_transaction_*` parameters so that they hold for every
 * transaction begun afterwards.
 */
export function buildSessionStatements(settings: SessionSettings): string[] {
  const statements: string[] = [];

  if (settings.isolationLevel !== undefined) {
    const value =
      settings.isolationLevel === null ? 'DEFAULT' : `'${settings.isolationLevel.toLowerCase()}'`;
    statements.push(`SET default_transaction_isolation TO ${value}`);
  }

  if (settings.readOnly !== undefined) {
    statements.push(`SET default_transaction_read_only TO ${flag(settings.readOnly)}`);
  }

  if (settings.deferrable !== undefined) {
    statements.push(`SET default_transaction_deferrable TO ${flag(settings.deferrable)}`);
  }

  if (settings.statementTimeout !== undefined) {
    const value = settings.statementTimeout === null ? 'DEFAULT' : String(settings.statementTimeout);
    statements.push(`SET statement_timeout TO ${value}`);
  }

  return statements;
}

export function normalizeParams(params?: QueryParams): unknown[] {
  if (!params) {
    return [];
  }
  return Array.isArray(params) ? params : Object.values(params);
}
