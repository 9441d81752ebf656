export { MySQLConnection, createMySQLConnection } from './adapter/mysql-connection';
export type { MySQLClient, MySQLConnectionOptions } from './adapter/mysql-connection';
export { buildSessionStatements } from './utils/mysql-utils';
export { getMySQLType, isNullable } from './utils/mysql-types';

// Re-export core types
export type {
  ConnectionCapability,
  SessionSettings,
  TransactionOptions,
} from '@nestedtx/core';
