import { SimpleConnection, mergeSession, splitSession, validateSessionSettings } from '@nestedtx/core';

import { describeField, isFieldList } from '../utils/mysql-types';
import { buildSessionStatements, isRowList, normalizeParams } from '../utils/mysql-utils';

import type {
  ConnectionCapability,
  Logger,
  QueryParams,
  QueryValue,
  RawResult,
  SessionSettings,
} from '@nestedtx/core';
import type * as mysql from 'mysql2/promise';

/**
 * The part of a `mysql2/promise` connection or pool connection this adapter drives
 */
export type MySQLClient = Pick<mysql.Connection, 'query' | 'beginTransaction' | 'commit' | 'rollback'>;

export interface MySQLConnectionOptions {
  logger?: Logger;
}

/**
 * Connection capability over a `mysql2/promise` connection. Rows are read
 * as arrays so duplicate column names survive.
 */
export class MySQLConnection implements ConnectionCapability {
  private _inTransaction = false;
  private settings: SessionSettings = {};
  private readonly logger?: Logger;

  constructor(
    private readonly connection: MySQLClient,
    options: MySQLConnectionOptions = {},
  ) {
    if (options.logger) {
      this.logger = options.logger;
    }
  }

  get inTransaction(): boolean {
    return this._inTransaction;
  }

  get session(): Readonly<SessionSettings> {
    return this.settings;
  }

  getConnection(): MySQLClient {
    return this.connection;
  }

  async begin(): Promise<void> {
    await this.connection.beginTransaction();
    this._inTransaction = true;
  }

  async commit(): Promise<void> {
    await this.connection.commit();
    this._inTransaction = false;
  }

  async rollback(): Promise<void> {
    try {
      await this.connection.rollback();
    } finally {
      this._inTransaction = false;
    }
  }

  async execute(sql: string, params?: QueryParams): Promise<RawResult> {
    const command = sql.trim().split(/\s+/)[0]?.toUpperCase();
    const [result, fields] = await this.connection.query<mysql.RowDataPacket[][] | mysql.ResultSetHeader>(
      { sql, rowsAsArray: true },
      normalizeParams(params),
    );

    // INSERT/UPDATE/DELETE and other statements without a result set
    if (!Array.isArray(result)) {
      return {
        rows: [],
        fields: [],
        rowCount: result.affectedRows,
        lastInsertId: result.insertId,
        ...(command ? { command } : {}),
      };
    }

    return {
      rows: result,
      fields: (fields ?? []).map(describeField),
      rowCount: result.length,
      ...(command ? { command } : {}),
    };
  }

  async callProcedure(name: string, params: readonly QueryValue[] = []): Promise<RawResult> {
    const placeholders = params.map(() => '?').join(', ');
    const [results, fields] = await this.connection.query<mysql.RowDataPacket[][] | mysql.ResultSetHeader>(
      { sql: `CALL ${name}(${placeholders})`, rowsAsArray: true },
      [...params],
    );

    // CALL answers with the procedure's result sets followed by its own status
    const rows: unknown = Array.isArray(results) ? results[0] : undefined;
    const columns: unknown = Array.isArray(fields) ? fields[0] : undefined;

    if (!isRowList(rows)) {
      return {
        rows: [],
        fields: [],
        rowCount: Array.isArray(results) ? 0 : results.affectedRows,
        command: 'CALL',
      };
    }

    return {
      rows,
      fields: isFieldList(columns) ? columns.map(describeField) : [],
      rowCount: rows.length,
      command: 'CALL',
    };
  }

  async setSession(settings: SessionSettings): Promise<void> {
    validateSessionSettings(settings);

    // built up front so a refused setting fails before anything is applied
    const updates = splitSession(settings).map((update) => ({
      update,
      statements: buildSessionStatements(update),
    }));
    for (const { update, statements } of updates) {
      for (const statement of statements) {
        await this.connection.query(statement);
      }
      this.settings = mergeSession(this.settings, update);
    }
    this.logger?.debug('MySQL session updated', { settings });
  }
}

/**
 * Wrap a `mysql2/promise` connection in a SimpleConnection
 */
export function createMySQLConnection(
  connection: MySQLClient,
  options: MySQLConnectionOptions = {},
): SimpleConnection {
  return new SimpleConnection(new MySQLConnection(connection, options), options);
}
