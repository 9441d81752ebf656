/**
 * Transaction Module
 *
 * Nested transactions: the outermost Transaction and the Savepoints nested
 * inside it, resolved strictly inside-out.
 *
 * @module transaction
 */

export {
  Transaction,
  type TransactionHost,
  type TransactionScope,
  type TransactionSlot,
} from './transaction';
export { Savepoint } from './savepoint';
export { SavepointManager, SAVEPOINT_PREFIX, type StackEntry } from './savepoint-manager';
