/**
 * Simple Connection
 *
 * Adds transaction factories, session helpers and result-wrapping query
 * helpers to anything that holds a driver connection.
 *
 * @example
 * ```typescript
 * const conn = new SimpleConnection(new PostgreSQLConnection(client), { logger });
 *
 * await conn.withTransaction(async (tx) => {
 *   await conn.execute('INSERT INTO orders (id) VALUES (1)');
 *
 *   await tx.withSavepoint(async () => {
 *     await conn.execute('INSERT INTO order_items (order_id) VALUES (1)');
 *   });
 * });
 * ```
 */

import { NotImplementedError, SessionStateError, TransactionStateError } from '../errors';
import { Result } from '../result';
import { Transaction } from '../transaction';
import {
  changedSessionKeys,
  characteristicsDiffer,
  snapshotSession,
  validateProcedureName,
  validateSQL,
  validateSessionSettings,
  validateTransactionOptions,
} from '../utils';
import { ConnectionHost } from './connection-host';

import type { Row } from '../result';
import type { TransactionHost, TransactionScope, TransactionSlot } from '../transaction';
import type { QueryParams, QueryValue, SessionSettings, TransactionOptions } from '../types';

/**
 * Constructor type for class mixins
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Constructor<T = object> = new (...args: any[]) => T;

export function SimpleConnectionMixin<TBase extends Constructor<TransactionHost>>(Base: TBase) {
  return class SimpleConnection extends Base {
    private readonly transactionSlot: TransactionSlot = { current: undefined };

    /**
     * The transaction currently open (or beginning) on this connection
     */
    get activeTransaction(): Transaction | undefined {
      return this.transactionSlot.current;
    }

    // ============ Transactions ============

    /**
     * Create a transaction bound to this connection. It is not begun yet.
     */
    transaction(options: TransactionOptions = {}): Transaction {
      validateTransactionOptions(options);

      const active = this.transactionSlot.current;
      if (active) {
        throw new TransactionStateError(
          'Cannot start a transaction while one is already in progress',
          active.id,
        );
      }
      if (this.capability.inTransaction) {
        throw new TransactionStateError(
          'Cannot start a transaction while one is already in progress (connection not idle)',
        );
      }

      return new Transaction(this, this.transactionSlot, options);
    }

    async withTransaction<T>(
      fn: (transaction: Transaction) => Promise<T> | T,
      options: TransactionOptions = {},
    ): Promise<T> {
      return this.transaction(options).run(fn);
    }

    /**
     * Run `fn` atomically: in a new transaction when none is open, otherwise
     * in a savepoint nested in the innermost open scope.
     */
    async atomic<T>(
      fn: (scope: TransactionScope) => Promise<T> | T,
      options: TransactionOptions = {},
    ): Promise<T> {
      const active = this.transactionSlot.current;
      if (!active) {
        return this.withTransaction(fn, options);
      }

      validateTransactionOptions(options);
      if (characteristicsDiffer(active.options, options)) {
        this.logger?.warn(
          'Ignoring transaction characteristics requested for a nested atomic block',
          { transactionId: active.id, requested: options, current: active.options },
        );
      }

      const top = active.savepoints.top;
      return top ? top.withSavepoint(fn) : active.withSavepoint(fn);
    }

    // ============ Session ============

    async setSession(settings: SessionSettings): Promise<void> {
      validateSessionSettings(settings);

      if (this.transactionSlot.current || this.capability.inTransaction) {
        throw new SessionStateError(
          'Cannot change session settings while a transaction is in progress',
        );
      }

      await this.capability.setSession(settings);
      this.logger?.debug('Session settings applied', { settings });
      this.emit('session', { settings: { ...settings } });
    }

    /**
     * Apply `settings` for the duration of `fn`, then put back the previous
     * values of the keys it changed.
     */
    async withSession<T>(settings: SessionSettings, fn: () => Promise<T> | T): Promise<T> {
      validateSessionSettings(settings);
      const previous = snapshotSession(this.capability.session, changedSessionKeys(settings));

      await this.setSession(settings);
      try {
        return await fn();
      } finally {
        await this.setSession(previous);
      }
    }

    // ============ Statements ============

    async execute(sql: string, params?: QueryParams): Promise<Result> {
      validateSQL(sql);
      const raw = await this.capability.execute(sql, params);
      return Result.from(raw);
    }

    async query(sql: string, params?: QueryParams): Promise<readonly Row[]> {
      const result = await this.execute(sql, params);
      return result.rows;
    }

    /**
     * First row of the result, or null when there is none
     */
    async queryOne(sql: string, params?: QueryParams): Promise<Row | null> {
      const result = await this.execute(sql, params);
      return this.firstRow(result, { sql });
    }

    // ============ Procedures ============

    async callProcedure(name: string, params: readonly QueryValue[] = []): Promise<Result> {
      validateProcedureName(name);
      if (!this.capability.callProcedure) {
        throw new NotImplementedError('stored procedure calls');
      }

      const raw = await this.capability.callProcedure(name, params);
      return Result.from(raw);
    }

    async callProcedureOne(name: string, params: readonly QueryValue[] = []): Promise<Row | null> {
      const result = await this.callProcedure(name, params);
      return this.firstRow(result, { procedure: name });
    }

    private firstRow(result: Result, context: Record<string, unknown>): Row | null {
      if (result.rows.length > 1) {
        this.logger?.warn('Query generated more than one row', {
          ...context,
          rows: result.rows.length,
        });
      }
      return result.first();
    }
  };
}

export class SimpleConnection extends SimpleConnectionMixin(ConnectionHost) {}
