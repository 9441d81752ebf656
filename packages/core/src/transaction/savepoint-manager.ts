/**
 * Savepoint Manager
 *
 * Per-transaction bookkeeping for savepoints: a strictly increasing counter
 * that names them and the LIFO stack of the ones still open. Names are never
 * reused within a transaction, even after release.
 */

import { OutOfOrderResolutionError } from '../errors';

export interface StackEntry {
  readonly name: string;
  readonly sequence: number;
}

export const SAVEPOINT_PREFIX = 'sp_';

export class SavepointManager<TEntry extends StackEntry> {
  private counter = 0;
  private readonly stack: TEntry[] = [];
  private readonly stale = new Set<number>();

  /**
   * Reserve the next savepoint identity
   */
  next(): StackEntry {
    this.counter += 1;
    return { name: `${SAVEPOINT_PREFIX}${this.counter}`, sequence: this.counter };
  }

  get created(): number {
    return this.counter;
  }

  get depth(): number {
    return this.stack.length;
  }

  get top(): TEntry | undefined {
    return this.stack.at(-1);
  }

  get names(): string[] {
    return this.stack.map((entry) => entry.name);
  }

  isTop(entry: TEntry): boolean {
    return this.top === entry;
  }

  isStale(sequence: number): boolean {
    return this.stale.has(sequence);
  }

  push(entry: TEntry): void {
    this.stack.push(entry);
  }

  /**
   * Pop `entry`, which must be the stack top
   */
  pop(entry: TEntry): void {
    if (this.top !== entry) {
      throw new OutOfOrderResolutionError(
        `Savepoint "${entry.name}" is not the top of the stack`,
        entry.name,
        this.top?.name,
      );
    }
    this.stack.pop();
  }

  /**
   * Drop an entry whose SAVEPOINT statement never took effect
   */
  abandon(entry: TEntry): void {
    const index = this.stack.indexOf(entry);
    if (index !== -1) {
      this.stack.splice(index, 1);
    }
    this.stale.add(entry.sequence);
  }

  /**
   * Mark every savepoint created after `sequence` as invalidated.
   * Returns the names of the ones newly marked.
   */
  invalidateAfter(sequence: number): string[] {
    const invalidated: string[] = [];
    for (let i = sequence + 1; i <= this.counter; i++) {
      if (!this.stale.has(i)) {
        this.stale.add(i);
        invalidated.push(`${SAVEPOINT_PREFIX}${i}`);
      }
    }
    return invalidated;
  }

  /**
   * Pop every open savepoint above `entry`, marking them invalidated
   */
  unwindTo(entry: TEntry): TEntry[] {
    const index = this.stack.indexOf(entry);
    if (index === -1) {
      return [];
    }
    const removed = this.stack.splice(index + 1);
    for (const sp of removed) {
      this.stale.add(sp.sequence);
    }
    return removed;
  }

  /**
   * Empty the stack, marking everything on it invalidated
   */
  discard(): TEntry[] {
    const removed = this.stack.splice(0);
    for (const sp of removed) {
      this.stale.add(sp.sequence);
    }
    return removed;
  }
}
