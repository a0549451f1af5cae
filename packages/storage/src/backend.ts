/**
 * Storage Backend Interface
 *
 * The synchronous SQLite surface the task store is written against.
 * Every method maps driver errors through mapStorageError.
 */

import type {
  Row,
  MutationResult,
  PreparedStatement,
  Transaction,
  TransactionOptions,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

export interface StorageBackend {
  readonly isOpen: boolean;

  /** Database file path, or :memory: */
  readonly path: string;

  close(): void;

  exec(sql: string): void;

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;

  run(sql: string, params?: unknown[]): MutationResult;

  prepare<T extends Row = Row>(sql: string): PreparedStatement<T>;

  /**
   * Runs `fn` atomically. A throw rolls back and is rethrown mapped.
   * Calls made inside another transaction run as a savepoint.
   */
  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T;

  readonly inTransaction: boolean;

  getSchemaVersion(): number;

  setSchemaVersion(version: number): void;

  /** Applies migrations above the current version, each in its own transaction */
  migrate(migrations: readonly Migration[]): MigrationResult;

  checkIntegrity(): boolean;
}

export type StorageFactory = (config: StorageConfig) => StorageBackend;
