/**
 * MySQL Pooled Transactions
 *
 * Borrows a connection from a mysql2 pool and mixes transaction support
 * into a small wrapper class.
 */

import { EventEmitter } from 'eventemitter3';
import { createPool } from 'mysql2/promise';
import { SimpleConnectionMixin } from '@nestedtx/core';
import { MySQLConnection } from '@nestedtx/mysql';

import type { ConnectionCapability, ConnectionEvents, Logger } from '@nestedtx/core';
import type { PoolConnection } from 'mysql2/promise';

class PooledSession extends EventEmitter<ConnectionEvents> {
  readonly capability: ConnectionCapability;

  constructor(
    readonly raw: PoolConnection,
    readonly logger: Logger | undefined,
  ) {
    super();
    this.capability = new MySQLConnection(raw, logger ? { logger } : {});
  }

  release(): void {
    this.raw.release();
  }
}

class TransactionalSession extends SimpleConnectionMixin(PooledSession) {}

async function main() {
  const pool = createPool({
    host: 'localhost',
    port: 3306,
    user: 'app',
    password: 'test-secret',
    database: 'app',
    connectionLimit: 5,
  });

  const session = new TransactionalSession(await pool.getConnection(), console);

  try {
    const orderId = await session.atomic(async () => {
      const created = await session.execute('INSERT INTO orders (user_id, status) VALUES (?, ?)', [1, 'pending']);

      // an item that fails only undoes itself
      await session
        .atomic(async () => {
          await session.execute('INSERT INTO order_items (order_id, product_id) VALUES (?, ?)', [
            created.lastInsertId,
            999,
          ]);
        })
        .catch((error: unknown) => console.warn('Skipped item:', error));

      return created.lastInsertId;
    });

    console.log('✅ Created order', orderId);
  } finally {
    session.release();
    await pool.end();
  }
}

main().catch((error) => {
  console.error('❌ Example failed:', error);
  process.exit(1);
});
