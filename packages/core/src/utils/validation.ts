import { ValidationError } from '../errors';
import { ConnectionConfig, IsolationLevel, SessionSettings, TransactionOptions } from '../types';

const ISOLATION_LEVELS: ReadonlySet<string> = new Set(Object.values(IsolationLevel));

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!config) {
    throw new ValidationError('Connection configuration is required');
  }

  if (!config.connectionString) {
    if (!config.host) {
      throw new ValidationError('Host is required when connectionString is not provided', 'host');
    }

    if (!config.database) {
      throw new ValidationError(
        'Database name is required when connectionString is not provided',
        'database',
      );
    }
  }

  if (config.port !== undefined && (typeof config.port !== 'number' || config.port < 1 || config.port > 65535)) {
    throw new ValidationError('Port must be a number between 1 and 65535', 'port');
  }

  if (
    config.connectionTimeout !== undefined &&
    (typeof config.connectionTimeout !== 'number' || config.connectionTimeout < 0)
  ) {
    throw new ValidationError('Connection timeout must be a non-negative number', 'connectionTimeout');
  }
}

export function validateSQL(sql: string): void {
  if (!sql || typeof sql !== 'string') {
    throw new ValidationError('SQL query must be a non-empty string');
  }

  if (sql.trim().length === 0) {
    throw new ValidationError('SQL query cannot be empty');
  }
}

function validateIsolationLevel(level: unknown): void {
  if (typeof level !== 'string' || !ISOLATION_LEVELS.has(level)) {
    throw new ValidationError(`Unknown isolation level "${String(level)}"`, 'isolationLevel');
  }
}

function validateFlag(value: unknown, field: string): void {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, field);
  }
}

export function validateTransactionOptions(options: TransactionOptions): void {
  if (options.isolationLevel !== undefined) {
    validateIsolationLevel(options.isolationLevel);
  }
  if (options.readOnly !== undefined) {
    validateFlag(options.readOnly, 'readOnly');
  }
  if (options.deferrable !== undefined) {
    validateFlag(options.deferrable, 'deferrable');
  }
}

export function validateSessionSettings(settings: SessionSettings): void {
  if (settings.isolationLevel !== undefined && settings.isolationLevel !== null) {
    validateIsolationLevel(settings.isolationLevel);
  }
  if (settings.readOnly !== undefined && settings.readOnly !== null) {
    validateFlag(settings.readOnly, 'readOnly');
  }
  if (settings.deferrable !== undefined && settings.deferrable !== null) {
    validateFlag(settings.deferrable, 'deferrable');
  }

  const timeout = settings.statementTimeout;
  if (
    timeout !== undefined &&
    timeout !== null &&
    (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout < 0)
  ) {
    throw new ValidationError('Statement timeout must be a non-negative integer', 'statementTimeout');
  }
}

/**
 * Savepoint identifiers are generated, never user supplied; this guards
 * against a name reaching SQL text in any other shape.
 */
/**
 * Procedure names are spliced into the CALL text; allow `name` or `schema.name`.
 */
export function validateProcedureName(name: string): void {
  if (typeof name !== 'string' || !/^[A-Za-z_][\w$]*(\.[A-Za-z_][\w$]*)?$/.test(name)) {
    throw new ValidationError(`Invalid procedure name "${String(name)}"`, 'procedure');
  }
}

export function validateSavepointName(name: string): void {
  if (!/^sp_\d+$/.test(name)) {
    throw new ValidationError(`Invalid savepoint name "${name}"`, 'savepoint');
  }
}
