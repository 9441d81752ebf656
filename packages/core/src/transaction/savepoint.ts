/**
 * Savepoint
 *
 * A nested scope inside an open transaction, bound to a named database
 * savepoint. Savepoints resolve strictly inside-out: only the top of the
 * transaction's stack may be released or rolled back.
 */

import { OutOfOrderResolutionError, StaleSavepointError, TransactionStateError } from '../errors';

import type { SavepointState } from '../types';
import type { Transaction } from './transaction';

export class Savepoint {
  private resolution: 'released' | 'rolled_back' | undefined;
  private resolving: 'releasing' | 'rolling back' | undefined;

  constructor(
    readonly transaction: Transaction,
    readonly name: string,
    readonly sequence: number,
    readonly parent: string | null,
  ) {}

  /**
   * Whether a rollback of an enclosing scope has undone this savepoint
   */
  get stale(): boolean {
    return this.transaction.savepoints.isStale(this.sequence);
  }

  get state(): SavepointState {
    return this.resolution ?? (this.stale ? 'rolled_back' : 'open');
  }

  get isTop(): boolean {
    return this.transaction.savepoints.isTop(this);
  }

  /**
   * RELEASE SAVEPOINT: keep the work done since this savepoint
   */
  async release(): Promise<void> {
    this.ensureResolvable('release');

    this.resolving = 'releasing';
    try {
      await this.transaction.host.capability.execute(`RELEASE SAVEPOINT ${this.name}`);
    } finally {
      this.resolving = undefined;
    }
    this.resolution = 'released';
    this.transaction.savepoints.pop(this);

    this.transaction.host.logger?.debug('Savepoint released', {
      transactionId: this.transaction.id,
      savepoint: this.name,
    });
    this.transaction.host.emit('release', this.eventPayload());
  }

  /**
   * ROLLBACK TO SAVEPOINT: undo the work done since this savepoint. Every
   * savepoint created after this one is invalidated.
   */
  async rollback(): Promise<void> {
    this.ensureResolvable('rollback');

    this.resolving = 'rolling back';
    try {
      await this.transaction.host.capability.execute(`ROLLBACK TO SAVEPOINT ${this.name}`);
    } finally {
      this.resolving = undefined;
    }
    this.resolution = 'rolled_back';
    this.transaction.savepoints.pop(this);
    const invalidated = this.transaction.savepoints.invalidateAfter(this.sequence);

    this.transaction.host.logger?.debug('Rolled back to savepoint', {
      transactionId: this.transaction.id,
      savepoint: this.name,
      invalidated,
    });
    this.transaction.host.emit('rollbackToSavepoint', { ...this.eventPayload(), invalidated });
  }

  async savepoint(): Promise<Savepoint> {
    if (this.state !== 'open') {
      throw new TransactionStateError(
        `Cannot create savepoint inside "${this.name}": savepoint is ${this.state}`,
        this.transaction.id,
      );
    }
    if (this.resolving) {
      throw new TransactionStateError(
        `Cannot create savepoint inside "${this.name}": savepoint is ${this.resolving}`,
        this.transaction.id,
      );
    }
    this.transaction.ensureOpen('create savepoint');

    const top = this.transaction.savepoints.top;
    if (top !== this) {
      throw new TransactionStateError(
        `Cannot create savepoint inside "${this.name}": "${top?.name ?? 'none'}" is the innermost open scope`,
        this.transaction.id,
      );
    }

    return this.transaction.openSavepoint(this);
  }

  /**
   * Run `fn` inside this savepoint: release on normal exit, roll back when
   * `fn` throws. The failure is rethrown so enclosing scopes roll back too.
   */
  async run<T>(fn: (savepoint: Savepoint) => Promise<T> | T): Promise<T> {
    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      await this.abort(error);
      throw error;
    }

    if (this.state === 'open' && this.transaction.state === 'open') {
      try {
        await this.release();
      } catch (error) {
        await this.abort(error);
        throw error;
      }
    }

    return result;
  }

  async withSavepoint<T>(fn: (savepoint: Savepoint) => Promise<T> | T): Promise<T> {
    const savepoint = await this.savepoint();
    return savepoint.run(fn);
  }

  private ensureResolvable(operation: string): void {
    if (this.stale) {
      throw new StaleSavepointError(
        `Cannot ${operation} savepoint "${this.name}": it was invalidated by an enclosing rollback`,
        this.name,
      );
    }
    if (this.resolution) {
      throw new TransactionStateError(
        `Cannot ${operation} savepoint "${this.name}": already ${this.resolution.replace('_', ' ')}`,
        this.transaction.id,
      );
    }
    if (this.resolving) {
      throw new TransactionStateError(
        `Cannot ${operation} savepoint "${this.name}": already ${this.resolving}`,
        this.transaction.id,
      );
    }
    this.transaction.ensureOpen(`${operation} savepoint "${this.name}"`);

    const top = this.transaction.savepoints.top;
    if (top !== this) {
      throw new OutOfOrderResolutionError(
        `Cannot ${operation} savepoint "${this.name}": "${top?.name ?? 'none'}" must be resolved first`,
        this.name,
        top?.name,
      );
    }
  }

  /**
   * Roll this scope back after a failure, first dropping any savepoints
   * still open above it.
   */
  private async abort(reason: unknown): Promise<void> {
    if (this.state !== 'open' || this.resolving || this.transaction.state !== 'open') {
      return;
    }

    this.transaction.savepoints.unwindTo(this);

    try {
      await this.rollback();
    } catch (rollbackError) {
      this.transaction.host.logger?.error('Rollback to savepoint failed while unwinding', {
        transactionId: this.transaction.id,
        savepoint: this.name,
        error: rollbackError,
        reason,
      });
    }
  }

  private eventPayload(): { transactionId: string; savepoint: string; parent: string | null } {
    return { transactionId: this.transaction.id, savepoint: this.name, parent: this.parent };
  }
}
