import type { ConnectionOptions as TlsOptions } from 'node:tls';

export enum IsolationLevel {
  READ_UNCOMMITTED = 'READ UNCOMMITTED',
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

/**
 * Characteristics a transaction is opened with.
 * @example
 * ```typescript
 * const options: TransactionOptions = {
 *   isolationLevel: IsolationLevel.SERIALIZABLE,
 *   readOnly: true,
 *   deferrable: true,
 * };
 * ```
 */
export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
  deferrable?: boolean;
}

/**
 * Session-level parameters of a connection.
 *
 * A key left out is not touched; a key set to `null` is reset to the
 * server default.
 */
export interface SessionSettings {
  isolationLevel?: IsolationLevel | null;
  readOnly?: boolean | null;
  deferrable?: boolean | null;
  /** Statement timeout in milliseconds, 0 disables it */
  statementTimeout?: number | null;
}

export type SessionKey = keyof SessionSettings;

export type QueryValue = string | number | bigint | boolean | Date | Buffer | null | undefined;
export type QueryParams = QueryValue[] | Record<string, QueryValue>;

export interface FieldInfo {
  name: string;
  type: string;
  nullable?: boolean;
}

/**
 * What a driver hands back for a single statement.
 */
export interface RawResult {
  rows: ReadonlyArray<readonly unknown[]>;
  fields?: readonly FieldInfo[];
  rowCount?: number | null;
  lastInsertId?: number | bigint | null;
  command?: string;
}

/**
 * The database session the transaction layer drives.
 *
 * Implementations own the wire protocol; the transaction layer only issues
 * `begin`/`commit`/`rollback` and the savepoint statements through `execute`.
 */
export interface ConnectionCapability {
  /** Whether the driver session is currently inside a transaction */
  readonly inTransaction: boolean;
  /** The session settings last applied through `setSession` */
  readonly session: Readonly<SessionSettings>;

  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  execute(sql: string, params?: QueryParams): Promise<RawResult>;
  setSession(settings: SessionSettings): Promise<void>;
  /** Call a stored procedure; drivers without procedure support leave this out */
  callProcedure?(name: string, params?: readonly QueryValue[]): Promise<RawResult>;
}

export type TransactionState = 'pending' | 'open' | 'committed' | 'rolled_back';

export type SavepointState = 'open' | 'released' | 'rolled_back';

export interface TransactionEventPayload {
  transactionId: string;
}

export interface SavepointEventPayload extends TransactionEventPayload {
  savepoint: string;
  parent: string | null;
}

export interface ConnectionEvents {
  begin: (event: TransactionEventPayload & { options?: TransactionOptions }) => void;
  commit: (event: TransactionEventPayload) => void;
  rollback: (event: TransactionEventPayload & { discarded: string[] }) => void;
  savepoint: (event: SavepointEventPayload) => void;
  release: (event: SavepointEventPayload) => void;
  rollbackToSavepoint: (event: SavepointEventPayload & { invalidated: string[] }) => void;
  session: (event: { settings: SessionSettings }) => void;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Connection configuration used by the driver adapters.
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'app',
 *   password: 'test-secret',
 *   database: 'app',
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  ssl?: boolean | TlsOptions;
  connectionTimeout?: number;
}
