import { Client } from 'pg';
import {
  ConnectionError,
  SimpleConnection,
  TransactionAbortedError,
  mergeSession,
  splitSession,
  toError,
  validateConnectionConfig,
  validateSessionSettings,
} from '@nestedtx/core';

import { pgTypeName } from '../utils/pg-types';
import { buildSessionStatements, normalizeParams } from '../utils/pg-utils';

import type {
  ConnectionCapability,
  ConnectionConfig,
  Logger,
  QueryParams,
  QueryValue,
  RawResult,
  SessionSettings,
} from '@nestedtx/core';
import type { ClientBase, ClientConfig } from 'pg';

/**
 * The part of a `pg` client or pooled client this adapter drives
 */
export type PostgreSQLClient = Pick<ClientBase, 'query'>;

export interface PostgreSQLConnectionOptions {
  logger?: Logger;
  /** Closes the underlying client on end(); set when this connection owns it */
  close?: () => Promise<void>;
}

export interface PostgreSQLConnectOptions {
  logger?: Logger;
  pgOptions?: ClientConfig;
}

/**
 * Connection capability over a `pg` client.
 *
 * The driver does not report transaction status, so it is tracked from the
 * BEGIN/COMMIT/ROLLBACK issued through this object.
 */
export class PostgreSQLConnection implements ConnectionCapability {
  private _inTransaction = false;
  private settings: SessionSettings = {};
  private readonly logger?: Logger;
  private readonly close?: () => Promise<void>;

  constructor(
    private readonly client: PostgreSQLClient,
    options: PostgreSQLConnectionOptions = {},
  ) {
    if (options.logger) {
      this.logger = options.logger;
    }
    if (options.close) {
      this.close = options.close;
    }
  }

  static async connect(
    config: ConnectionConfig,
    options: PostgreSQLConnectOptions = {},
  ): Promise<PostgreSQLConnection> {
    validateConnectionConfig(config);

    const clientConfig: ClientConfig = {
      host: config.host,
      port: config.port || 5432,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionTimeoutMillis: config.connectionTimeout || 10000,
      ...options.pgOptions,
    };

    if (config.ssl) {
      clientConfig.ssl = config.ssl;
    }

    if (config.connectionString) {
      clientConfig.connectionString = config.connectionString;
    }

    const client = new Client(clientConfig);
    try {
      await client.connect();
    } catch (error) {
      throw new ConnectionError('Failed to connect to PostgreSQL database', toError(error));
    }

    options.logger?.info('Connected to PostgreSQL database', { database: config.database });
    return new PostgreSQLConnection(client, {
      close: () => client.end(),
      ...(options.logger ? { logger: options.logger } : {}),
    });
  }

  get inTransaction(): boolean {
    return this._inTransaction;
  }

  get session(): Readonly<SessionSettings> {
    return this.settings;
  }

  getClient(): PostgreSQLClient {
    return this.client;
  }

  async begin(): Promise<void> {
    await this.client.query('BEGIN');
    this._inTransaction = true;
  }

  async commit(): Promise<void> {
    // a failed COMMIT still ends the transaction on the server
    let command: string;
    try {
      ({ command } = await this.client.query('COMMIT'));
    } finally {
      this._inTransaction = false;
    }

    // an aborted transaction answers COMMIT with a ROLLBACK tag and no error
    if (command === 'ROLLBACK') {
      throw new TransactionAbortedError('COMMIT was rolled back: the transaction had already failed');
    }
  }

  async rollback(): Promise<void> {
    try {
      await this.client.query('ROLLBACK');
    } finally {
      this._inTransaction = false;
    }
  }

  async execute(sql: string, params?: QueryParams): Promise<RawResult> {
    const result = await this.client.query({
      text: sql,
      values: normalizeParams(params),
      rowMode: 'array',
    });

    return {
      rows: result.rows,
      fields: result.fields.map((field) => ({
        name: field.name,
        type: pgTypeName(field.dataTypeID),
        nullable: true,
      })),
      rowCount: result.rowCount,
      command: result.command,
    };
  }

  /**
   * Procedures that return rows are functions in PostgreSQL; read their result set.
   */
  async callProcedure(name: string, params: readonly QueryValue[] = []): Promise<RawResult> {
    const placeholders = params.map((_, i) => `$${i + 1}`).join(', ');
    return this.execute(`SELECT * FROM ${name}(${placeholders})`, [...params]);
  }

  async setSession(settings: SessionSettings): Promise<void> {
    validateSessionSettings(settings);

    const updates = splitSession(settings).map((update) => ({
      update,
      statements: buildSessionStatements(update),
    }));
    for (const { update, statements } of updates) {
      for (const statement of statements) {
        await this.client.query(statement);
      }
      // kept as each setting lands, so a later failure leaves the snapshot in step
      this.settings = mergeSession(this.settings, update);
    }
    this.logger?.debug('PostgreSQL session updated', { settings });
  }

  async end(): Promise<void> {
    if (!this.close) {
      return;
    }
    await this.close();
    this.logger?.info('Disconnected from PostgreSQL database');
  }
}

/**
 * Wrap a `pg` client in a SimpleConnection
 */
export function createPostgreSQLConnection(
  client: PostgreSQLClient,
  options: PostgreSQLConnectionOptions = {},
): SimpleConnection {
  return new SimpleConnection(
    new PostgreSQLConnection(client, options),
    options.logger ? { logger: options.logger } : {},
  );
}
