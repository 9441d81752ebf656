/**
 * Transaction
 *
 * The outermost scope of a nested transaction, bound to the real database
 * transaction. Nested scopes are savepoints on a per-transaction LIFO stack;
 * only the innermost open scope may issue state-changing statements.
 *
 * @example
 * ```typescript
 * const tx = conn.transaction();
 * await tx.begin();
 * const sp = await tx.savepoint();      // SAVEPOINT sp_1
 * await conn.execute('UPDATE accounts SET balance = balance - 10 WHERE id = 1');
 * await sp.release();                   // RELEASE SAVEPOINT sp_1
 * await tx.commit();                    // COMMIT
 * ```
 */

import { TransactionStateError } from '../errors';
import {
  changedSessionKeys,
  generateUUID,
  snapshotSession,
  transactionSettings,
  validateSavepointName,
} from '../utils';
import { Savepoint } from './savepoint';
import { SavepointManager } from './savepoint-manager';

import type EventEmitter from 'eventemitter3';
import type {
  ConnectionCapability,
  ConnectionEvents,
  Logger,
  SessionSettings,
  TransactionOptions,
  TransactionState,
} from '../types';

/**
 * What a transaction needs from the connection that opened it
 */
export interface TransactionHost {
  readonly capability: ConnectionCapability;
  readonly logger?: Logger | undefined;
  emit: EventEmitter<ConnectionEvents>['emit'];
}

/**
 * The connection's single open-transaction slot
 */
export interface TransactionSlot {
  current: Transaction | undefined;
}

export type TransactionScope = Transaction | Savepoint;

export class Transaction {
  readonly id: string;
  readonly options: Readonly<TransactionOptions>;
  readonly savepoints = new SavepointManager<Savepoint>();
  private _state: TransactionState = 'pending';
  private resolving: 'committing' | 'rolling back' | undefined;
  private sessionSnapshot: SessionSettings | undefined;

  constructor(
    readonly host: TransactionHost,
    private readonly slot: TransactionSlot,
    options: TransactionOptions = {},
  ) {
    this.id = generateUUID();
    this.options = Object.freeze({ ...options });
  }

  get state(): TransactionState {
    return this._state;
  }

  get isActive(): boolean {
    return this._state === 'open';
  }

  /**
   * Innermost open scope: the savepoint on top of the stack, or this transaction
   */
  get current(): TransactionScope {
    return this.savepoints.top ?? this;
  }

  // ============ Resolution ============

  async begin(): Promise<void> {
    if (this._state !== 'pending') {
      throw new TransactionStateError(`Cannot begin: transaction is ${this._state}`, this.id);
    }
    if (this.slot.current !== undefined) {
      throw new TransactionStateError(
        'Cannot begin: connection already has an open transaction',
        this.id,
      );
    }
    if (this.host.capability.inTransaction) {
      throw new TransactionStateError(
        'Cannot begin: connection is already inside a transaction (not idle)',
        this.id,
      );
    }

    // claimed before the first await so an overlapping begin() is refused
    this.slot.current = this;

    try {
      await this.applySession();
      await this.host.capability.begin();
    } catch (error) {
      this.slot.current = undefined;
      await this.restoreSessionAfterFailure(error);
      throw error;
    }

    this._state = 'open';
    this.host.logger?.debug('Transaction started', { transactionId: this.id, options: this.options });
    this.host.emit('begin', { transactionId: this.id, options: { ...this.options } });
  }

  async commit(): Promise<void> {
    this.ensureOpen('commit');

    if (this.savepoints.depth > 0) {
      throw new TransactionStateError(
        `Cannot commit: ${this.savepoints.depth} savepoint(s) still open (${this.savepoints.names.join(', ')})`,
        this.id,
      );
    }

    // marked before the first await so an overlapping commit() or rollback() is refused
    this.resolving = 'committing';

    try {
      await this.host.capability.commit();
    } catch (error) {
      // the driver ended the transaction despite the failed COMMIT
      if (!this.host.capability.inTransaction) {
        await this.finishAfterFailure(error);
      }
      throw error;
    } finally {
      this.resolving = undefined;
    }

    await this.finish('committed');
    this.host.logger?.debug('Transaction committed', { transactionId: this.id });
    this.host.emit('commit', { transactionId: this.id });
  }

  async rollback(): Promise<void> {
    this.ensureOpen('rollback');

    this.resolving = 'rolling back';
    const discarded = this.savepoints.discard().map((sp) => sp.name);

    try {
      await this.host.capability.rollback();
    } catch (error) {
      await this.finishAfterFailure(error);
      throw error;
    } finally {
      this.resolving = undefined;
    }

    await this.finish('rolled_back');
    this.host.logger?.debug('Transaction rolled back', { transactionId: this.id, discarded });
    this.host.emit('rollback', { transactionId: this.id, discarded });
  }

  // ============ Nesting ============

  /**
   * Open a first-level savepoint. Deeper levels are opened from the
   * savepoint on top of the stack.
   */
  async savepoint(): Promise<Savepoint> {
    this.ensureOpen('create savepoint');

    const top = this.savepoints.top;
    if (top) {
      throw new TransactionStateError(
        `Cannot create savepoint from the transaction while savepoint "${top.name}" is open; nest it from "${top.name}"`,
        this.id,
      );
    }

    return this.openSavepoint(null);
  }

  /**
   * Issue SAVEPOINT and push the new savepoint. Callers have already checked
   * that `parent` (or this transaction) is the innermost open scope.
   * @internal
   */
  async openSavepoint(parent: Savepoint | null): Promise<Savepoint> {
    const { name, sequence } = this.savepoints.next();
    validateSavepointName(name);

    const savepoint = new Savepoint(this, name, sequence, parent?.name ?? null);
    this.savepoints.push(savepoint);

    try {
      await this.host.capability.execute(`SAVEPOINT ${name}`);
    } catch (error) {
      this.savepoints.abandon(savepoint);
      throw error;
    }

    this.host.logger?.debug('Savepoint created', { transactionId: this.id, savepoint: name });
    this.host.emit('savepoint', { transactionId: this.id, savepoint: name, parent: savepoint.parent });
    return savepoint;
  }

  // ============ Scoped acquisition ============

  /**
   * Begin, run `fn`, then commit on normal exit or roll back when `fn`
   * throws. The failure is rethrown unchanged. A transaction `fn` already
   * resolved itself is left as it is.
   */
  async run<T>(fn: (transaction: Transaction) => Promise<T> | T): Promise<T> {
    await this.begin();

    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      await this.abort(error);
      throw error;
    }

    if (this._state === 'open') {
      try {
        await this.commit();
      } catch (error) {
        await this.abort(error);
        throw error;
      }
    }

    return result;
  }

  /**
   * Open a savepoint and run `fn` inside it
   */
  async withSavepoint<T>(fn: (savepoint: Savepoint) => Promise<T> | T): Promise<T> {
    const savepoint = await this.savepoint();
    return savepoint.run(fn);
  }

  /**
   * @internal
   */
  ensureOpen(operation: string): void {
    if (this._state !== 'open') {
      throw new TransactionStateError(
        `Cannot ${operation}: transaction is ${this._state === 'pending' ? 'not begun' : this._state}`,
        this.id,
      );
    }
    if (this.resolving) {
      throw new TransactionStateError(`Cannot ${operation}: transaction is ${this.resolving}`, this.id);
    }
  }

  private async abort(reason: unknown): Promise<void> {
    if (this._state !== 'open' || this.resolving) {
      return;
    }

    try {
      await this.rollback();
    } catch (rollbackError) {
      this.host.logger?.error('Rollback failed while unwinding transaction', {
        transactionId: this.id,
        error: rollbackError,
        reason,
      });
    }
  }

  private async applySession(): Promise<void> {
    const settings = transactionSettings(this.options);
    const keys = changedSessionKeys(settings);
    if (keys.length === 0) {
      return;
    }

    const snapshot = snapshotSession(this.host.capability.session, keys);
    await this.host.capability.setSession(settings);
    this.sessionSnapshot = snapshot;
  }

  private async restoreSession(): Promise<void> {
    const snapshot = this.sessionSnapshot;
    if (!snapshot) {
      return;
    }

    this.sessionSnapshot = undefined;
    await this.host.capability.setSession(snapshot);
  }

  private async restoreSessionAfterFailure(reason: unknown): Promise<void> {
    try {
      await this.restoreSession();
    } catch (restoreError) {
      this.host.logger?.error('Failed to restore session settings', {
        transactionId: this.id,
        error: restoreError,
        reason,
      });
    }
  }

  private async finish(state: 'committed' | 'rolled_back'): Promise<void> {
    this._state = state;
    if (this.slot.current === this) {
      this.slot.current = undefined;
    }
    await this.restoreSession();
  }

  private async finishAfterFailure(reason: unknown): Promise<void> {
    this._state = 'rolled_back';
    if (this.slot.current === this) {
      this.slot.current = undefined;
    }
    await this.restoreSessionAfterFailure(reason);
  }
}
