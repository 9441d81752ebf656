import { describe, it, expect, vi, beforeEach } from 'vitest';

import { SimpleConnection } from '../../connection';
import {
  OutOfOrderResolutionError,
  StaleSavepointError,
  TransactionStateError,
} from '../../errors';
import { RecordingConnection, createMockLogger } from '../../__tests__/helpers/recording-connection';

import type { MockLogger } from '../../__tests__/helpers/recording-connection';
import type { Savepoint } from '../savepoint';
import type { Transaction } from '../transaction';

describe('Savepoint', () => {
  let driver: RecordingConnection;
  let logger: MockLogger;
  let conn: SimpleConnection;
  let tx: Transaction;

  beforeEach(async () => {
    driver = new RecordingConnection();
    logger = createMockLogger();
    conn = new SimpleConnection(driver, { logger });
    tx = conn.transaction();
    await tx.begin();
  });

  describe('statement sequences', () => {
    it('should issue SAVEPOINT and RELEASE SAVEPOINT around a released scope', async () => {
      const s1 = await tx.savepoint();
      await conn.execute('WRITE a=1');
      await s1.release();
      await tx.commit();

      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'WRITE a=1',
        'RELEASE SAVEPOINT sp_1',
        'COMMIT',
      ]);
    });

    it('should roll back an inner savepoint and release the outer one', async () => {
      const s1 = await tx.savepoint();
      const s2 = await s1.savepoint();
      await s2.rollback();
      await s1.release();
      await tx.commit();

      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'SAVEPOINT sp_2',
        'ROLLBACK TO SAVEPOINT sp_2',
        'RELEASE SAVEPOINT sp_1',
        'COMMIT',
      ]);
      expect(s2.state).toBe('rolled_back');
      expect(s1.state).toBe('released');
      expect(tx.state).toBe('committed');
    });

    it('should roll back the savepoint and then the transaction when a failure escapes', async () => {
      const failure = new Error('constraint violated');
      const scoped = conn.transaction();
      await tx.rollback();
      driver.statements.length = 0;

      await expect(
        scoped.run(async (t) => {
          await t.withSavepoint(async () => {
            throw failure;
          });
        }),
      ).rejects.toBe(failure);

      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'ROLLBACK TO SAVEPOINT sp_1',
        'ROLLBACK',
      ]);
      expect(scoped.state).toBe('rolled_back');
    });
  });

  describe('identity', () => {
    it('should record its parent', async () => {
      const s1 = await tx.savepoint();
      const s2 = await s1.savepoint();

      expect(s1.parent).toBeNull();
      expect(s2.parent).toBe('sp_1');
      expect(s2.transaction).toBe(tx);
    });

    it('should generate pairwise distinct names across interleaved resolutions', async () => {
      const names: string[] = [];
      for (let i = 0; i < 10; i++) {
        const outer = await tx.savepoint();
        const inner = await outer.savepoint();
        names.push(outer.name, inner.name);
        await inner.release();
        if (i % 2 === 0) {
          await outer.rollback();
        } else {
          await outer.release();
        }
      }

      expect(new Set(names).size).toBe(20);
      for (const name of names) {
        expect(name).toMatch(/^sp_\d+$/);
      }
    });
  });

  describe('ordering', () => {
    it('should refuse to release a savepoint that is not on top', async () => {
      const s1 = await tx.savepoint();
      const s2 = await s1.savepoint();

      await expect(s1.release()).rejects.toThrow(OutOfOrderResolutionError);
      await expect(s1.release()).rejects.toThrow(
        'Cannot release savepoint "sp_1": "sp_2" must be resolved first',
      );
      expect(s1.state).toBe('open');
      expect(s2.isTop).toBe(true);
    });

    it('should refuse to roll back a savepoint that is not on top', async () => {
      const s1 = await tx.savepoint();
      await s1.savepoint();

      await expect(s1.rollback()).rejects.toBeInstanceOf(OutOfOrderResolutionError);
      expect(driver.statements).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'SAVEPOINT sp_2']);
    });

    it('should refuse to nest from a savepoint that is not the innermost scope', async () => {
      const s1 = await tx.savepoint();
      await s1.savepoint();

      await expect(s1.savepoint()).rejects.toThrow(
        'Cannot create savepoint inside "sp_1": "sp_2" is the innermost open scope',
      );
    });
  });

  describe('double resolution', () => {
    it('should refuse to release twice', async () => {
      const s1 = await tx.savepoint();
      await s1.release();

      await expect(s1.release()).rejects.toThrow(TransactionStateError);
      await expect(s1.release()).rejects.toThrow('Cannot release savepoint "sp_1": already released');
    });

    it('should refuse to roll back after a rollback', async () => {
      const s1 = await tx.savepoint();
      await s1.rollback();

      await expect(s1.rollback()).rejects.toThrow('Cannot rollback savepoint "sp_1": already rolled back');
    });

    it('should refuse to nest from a resolved savepoint', async () => {
      const s1 = await tx.savepoint();
      await s1.release();

      await expect(s1.savepoint()).rejects.toThrow(
        'Cannot create savepoint inside "sp_1": savepoint is released',
      );
    });
  });

  describe('overlapping resolution', () => {
    it('should issue RELEASE SAVEPOINT once for overlapping releases', async () => {
      const s1 = await tx.savepoint();

      const results = await Promise.allSettled([s1.release(), s1.release()]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(results[1]).toMatchObject({
        reason: { message: 'Cannot release savepoint "sp_1": already releasing' },
      });
      expect(s1.state).toBe('released');
      expect(driver.statements).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'RELEASE SAVEPOINT sp_1']);
    });

    it('should refuse a rollback while the release is in flight', async () => {
      const s1 = await tx.savepoint();
      await conn.execute('WRITE a=1');

      const [release, rollback] = await Promise.allSettled([s1.release(), s1.rollback()]);

      expect(release.status).toBe('fulfilled');
      expect(rollback).toEqual({ status: 'rejected', reason: expect.any(TransactionStateError) });
      expect(s1.state).toBe('released');
      expect(driver.visibleData).toEqual({ a: '1' });
    });

    it('should refuse to nest from a savepoint that is rolling back', async () => {
      const s1 = await tx.savepoint();

      const results = await Promise.allSettled([s1.rollback(), s1.savepoint()]);

      expect(results[1]).toMatchObject({
        status: 'rejected',
        reason: { message: 'Cannot create savepoint inside "sp_1": savepoint is rolling back' },
      });
      expect(driver.statements).toEqual(['BEGIN', 'SAVEPOINT sp_1', 'ROLLBACK TO SAVEPOINT sp_1']);
    });

    it('should stay resolvable after a failed release', async () => {
      const failure = new Error('connection reset');
      driver.failures.set('RELEASE SAVEPOINT sp_1', failure);
      const s1 = await tx.savepoint();

      await expect(s1.release()).rejects.toBe(failure);
      await s1.rollback();

      expect(s1.state).toBe('rolled_back');
      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'RELEASE SAVEPOINT sp_1',
        'ROLLBACK TO SAVEPOINT sp_1',
      ]);
    });
  });

  describe('invalidation', () => {
    it('should make savepoints created after a rolled back one stale', async () => {
      const s1 = await tx.savepoint();
      const s2 = await s1.savepoint();
      await s2.release();
      await s1.rollback();

      expect(s2.stale).toBe(true);
      expect(s2.state).toBe('released');
      await expect(s2.release()).rejects.toThrow(StaleSavepointError);
      await expect(s2.rollback()).rejects.toThrow(
        'Cannot rollback savepoint "sp_2": it was invalidated by an enclosing rollback',
      );
    });

    it('should make savepoints discarded by the transaction rollback stale', async () => {
      const s1 = await tx.savepoint();
      await tx.rollback();

      await expect(s1.release()).rejects.toBeInstanceOf(StaleSavepointError);
    });

    it('should not invalidate savepoints created after the rollback', async () => {
      const s1 = await tx.savepoint();
      await s1.rollback();
      const s2 = await tx.savepoint();

      expect(s2.stale).toBe(false);
      await s2.release();
      expect(s2.state).toBe('released');
    });
  });

  describe('visible state', () => {
    it('should return to the state from just before the savepoint on rollback', async () => {
      await conn.execute('WRITE a=1');
      const s1 = await tx.savepoint();
      await conn.execute('WRITE a=2');
      await conn.execute('WRITE b=2');
      const s2 = await s1.savepoint();
      await conn.execute('WRITE c=3');
      await s2.release();

      await s1.rollback();

      expect(driver.visibleData).toEqual({ a: '1' });
    });

    it('should commit released effects and none of the rolled back ones', async () => {
      const s1 = await tx.savepoint();
      await conn.execute('WRITE kept=1');
      const s2 = await s1.savepoint();
      await conn.execute('WRITE dropped=1');
      await s2.rollback();
      const s3 = await s1.savepoint();
      await conn.execute('WRITE nested=1');
      await s3.release();
      await s1.release();
      const s4 = await tx.savepoint();
      await conn.execute('WRITE discarded=1');
      await s4.rollback();
      await tx.commit();

      expect(driver.committedData).toEqual({ kept: '1', nested: '1' });
    });
  });

  describe('run()', () => {
    it('should release on normal exit and return the callback value', async () => {
      const s1 = await tx.savepoint();
      const value = await s1.run(async () => {
        await conn.execute('WRITE a=1');
        return 'done';
      });

      expect(value).toBe('done');
      expect(s1.state).toBe('released');
      expect(driver.statements.slice(-1)).toEqual(['RELEASE SAVEPOINT sp_1']);
    });

    it('should roll back on failure and let the transaction continue', async () => {
      const failure = new Error('duplicate key');

      await expect(
        tx.withSavepoint(async () => {
          await conn.execute('WRITE a=1');
          throw failure;
        }),
      ).rejects.toBe(failure);

      await conn.execute('WRITE b=2');
      await tx.commit();

      expect(driver.committedData).toEqual({ b: '2' });
      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'WRITE a=1',
        'ROLLBACK TO SAVEPOINT sp_1',
        'WRITE b=2',
        'COMMIT',
      ]);
    });

    it('should nest scopes and unwind them inside-out on failure', async () => {
      const failure = new Error('boom');
      let inner: Savepoint | undefined;

      await expect(
        tx.withSavepoint(async (outer) => {
          await outer.withSavepoint(async (sp) => {
            inner = sp;
            throw failure;
          });
        }),
      ).rejects.toBe(failure);

      expect(inner?.state).toBe('rolled_back');
      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'SAVEPOINT sp_2',
        'ROLLBACK TO SAVEPOINT sp_2',
        'ROLLBACK TO SAVEPOINT sp_1',
      ]);
      expect(tx.savepoints.depth).toBe(0);
    });

    it('should unwind savepoints the callback left open before rolling back', async () => {
      const failure = new Error('boom');
      let leftOpen: Savepoint | undefined;

      await expect(
        tx.withSavepoint(async (outer) => {
          leftOpen = await outer.savepoint();
          throw failure;
        }),
      ).rejects.toBe(failure);

      expect(leftOpen?.stale).toBe(true);
      expect(leftOpen?.state).toBe('rolled_back');
      expect(driver.statements).toEqual([
        'BEGIN',
        'SAVEPOINT sp_1',
        'SAVEPOINT sp_2',
        'ROLLBACK TO SAVEPOINT sp_1',
      ]);
    });

    it('should roll back when normal exit finds a child still open', async () => {
      await expect(
        tx.withSavepoint(async (outer) => {
          await outer.savepoint();
        }),
      ).rejects.toBeInstanceOf(OutOfOrderResolutionError);

      expect(driver.statements.slice(-1)).toEqual(['ROLLBACK TO SAVEPOINT sp_1']);
      expect(tx.savepoints.depth).toBe(0);
    });

    it('should log and keep the original failure when rolling back to the savepoint fails', async () => {
      const failure = new Error('boom');
      const rollbackFailure = new Error('no such savepoint');
      driver.failures.set('ROLLBACK TO SAVEPOINT sp_1', rollbackFailure);

      await expect(
        tx.withSavepoint(() => {
          throw failure;
        }),
      ).rejects.toBe(failure);

      expect(logger.error).toHaveBeenCalledWith('Rollback to savepoint failed while unwinding', {
        transactionId: tx.id,
        savepoint: 'sp_1',
        error: rollbackFailure,
        reason: failure,
      });
    });
  });

  describe('events', () => {
    it('should emit savepoint, release and rollbackToSavepoint', async () => {
      const onSavepoint = vi.fn();
      const onRelease = vi.fn();
      const onRollback = vi.fn();
      conn.on('savepoint', onSavepoint);
      conn.on('release', onRelease);
      conn.on('rollbackToSavepoint', onRollback);

      const s1 = await tx.savepoint();
      const s2 = await s1.savepoint();
      await s2.release();
      await s1.rollback();

      expect(onSavepoint).toHaveBeenNthCalledWith(1, {
        transactionId: tx.id,
        savepoint: 'sp_1',
        parent: null,
      });
      expect(onSavepoint).toHaveBeenNthCalledWith(2, {
        transactionId: tx.id,
        savepoint: 'sp_2',
        parent: 'sp_1',
      });
      expect(onRelease).toHaveBeenCalledWith({ transactionId: tx.id, savepoint: 'sp_2', parent: 'sp_1' });
      expect(onRollback).toHaveBeenCalledWith({
        transactionId: tx.id,
        savepoint: 'sp_1',
        parent: null,
        invalidated: ['sp_2'],
      });
    });
  });
});
