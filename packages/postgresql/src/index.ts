export { PostgreSQLConnection, createPostgreSQLConnection } from './adapter/postgresql-connection';
export type {
  PostgreSQLClient,
  PostgreSQLConnectionOptions,
  PostgreSQLConnectOptions,
} from './adapter/postgresql-connection';
export { buildSessionStatements } from './utils/pg-utils';
export { pgTypeName } from './utils/pg-types';

// Re-export core types
export type {
  ConnectionCapability,
  ConnectionConfig,
  SessionSettings,
  TransactionOptions,
} from '@nestedtx/core';
