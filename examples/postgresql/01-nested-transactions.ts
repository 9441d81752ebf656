/**
 * Nested Transaction Examples
 *
 * This example demonstrates transactions, savepoints and atomic blocks
 * on a PostgreSQL connection.
 */

import { IsolationLevel, SimpleConnection, StaleSavepointError } from '@nestedtx/core';
import { PostgreSQLConnection } from '@nestedtx/postgresql';

import type { Logger } from '@nestedtx/core';

const logger: Logger = {
  error: (message, ...args) => console.error(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  debug: () => undefined,
};

async function explicitResolution(conn: SimpleConnection) {
  console.log('\n=== Explicit Resolution ===');

  const tx = conn.transaction();
  await tx.begin();
  await conn.execute('INSERT INTO accounts (name, balance) VALUES ($1, $2)', ['Main Account', 1000]);

  const sp = await tx.savepoint();
  await conn.execute('INSERT INTO ledger (account_id, amount) VALUES ($1, $2)', [1, -100]);
  await sp.release();

  await tx.commit();
  console.log('✅ Committed with savepoint', sp.name);
}

async function scopedSavepoints(conn: SimpleConnection) {
  console.log('\n=== Scoped Savepoints ===');

  await conn.withTransaction(async (tx) => {
    await conn.execute('INSERT INTO orders (user_id, status) VALUES ($1, $2)', [1, 'pending']);

    try {
      await tx.withSavepoint(async () => {
        await conn.execute('INSERT INTO order_items (order_id, product_id) VALUES ($1, $2)', [1, 999]);
        throw new Error('Unknown product');
      });
    } catch (error) {
      // only the order item is undone; the order stays
      console.log('✅ Rolled back to savepoint:', error);
    }
  });
}

async function atomicBlocks(conn: SimpleConnection) {
  console.log('\n=== Atomic Blocks ===');

  async function recordAudit(event: string) {
    await conn.atomic(async () => {
      await conn.execute('INSERT INTO audit_log (event) VALUES ($1)', [event]);
    });
  }

  // outermost call opens a transaction, the nested one a savepoint
  await conn.atomic(async () => {
    await conn.execute('UPDATE users SET last_login = now() WHERE id = $1', [1]);
    await recordAudit('login');
  });

  const row = await conn.queryOne('SELECT count(*) AS events FROM audit_log');
  console.log('Audit events:', row?.get('events'));
}

async function staleSavepoints(conn: SimpleConnection) {
  console.log('\n=== Stale Savepoints ===');

  await conn.withTransaction(async (tx) => {
    const outer = await tx.savepoint();
    const inner = await outer.savepoint();
    await inner.release();
    await outer.rollback();

    try {
      await inner.rollback();
    } catch (error) {
      if (error instanceof StaleSavepointError) {
        console.log('✅ Savepoint was invalidated by the enclosing rollback');
      }
    }
  });
}

async function readOnlyReport(conn: SimpleConnection) {
  console.log('\n=== Read-only Serializable Report ===');

  const totals = await conn.withTransaction(
    async () => conn.query('SELECT account_id, sum(amount) AS total FROM ledger GROUP BY account_id'),
    { isolationLevel: IsolationLevel.SERIALIZABLE, readOnly: true, deferrable: true },
  );

  for (const row of totals) {
    console.log(row.toObject());
  }
}

async function main() {
  const driver = await PostgreSQLConnection.connect(
    {
      host: 'localhost',
      port: 5432,
      user: 'app',
      password: 'test-secret',
      database: 'app',
    },
    { logger },
  );
  const conn = new SimpleConnection(driver, { logger });

  conn.on('rollbackToSavepoint', ({ savepoint, invalidated }) => {
    console.log(`Rolled back to ${savepoint}, invalidated: ${invalidated.join(', ') || 'none'}`);
  });

  try {
    await explicitResolution(conn);
    await scopedSavepoints(conn);
    await atomicBlocks(conn);
    await staleSavepoints(conn);
    await conn.withSession({ statementTimeout: 5000 }, () => readOnlyReport(conn));
  } finally {
    await driver.end();
  }
}

main().catch((error) => {
  console.error('❌ Example failed:', error);
  process.exit(1);
});
