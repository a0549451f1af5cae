/**
 * Storage System Type Definitions
 *
 * Core types for the storage abstraction layer:
 * - Query result types
 * - Transaction interfaces
 * - Configuration types
 */

// ============================================================================
// Query Result Types
// ============================================================================

/**
 * A single row result from a query
 */
export type Row = Record<string, unknown>;

/**
 * Result of a mutation (INSERT, UPDATE, DELETE)
 */
export interface MutationResult {
  /** Number of rows affected by the mutation */
  changes: number;
  /** Last inserted row ID (for auto-increment tables) */
  lastInsertRowid?: number | bigint;
}

// ============================================================================
// Prepared Statement Interface
// ============================================================================

/**
 * A prepared SQL statement that can be executed multiple times
 */
export interface PreparedStatement<T extends Row = Row> {
  all(...params: unknown[]): T[];
  get(...params: unknown[]): T | undefined;
  run(...params: unknown[]): MutationResult;
}

// ============================================================================
// Transaction Interface
// ============================================================================

export type IsolationLevel = 'deferred' | 'immediate' | 'exclusive';

export interface TransactionOptions {
  /** Ignored for nested transactions, which run as savepoints */
  isolation?: IsolationLevel;
}

/**
 * A database transaction context
 */
export interface Transaction {
  exec(sql: string): void;
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;
  run(sql: string, params?: unknown[]): MutationResult;
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * SQLite pragma settings for database configuration
 */
export interface SqlitePragmas {
  /** Journal mode (default: WAL) */
  journal_mode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  /** Synchronous mode (default: NORMAL) */
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  /** Foreign key enforcement (default: ON) */
  foreign_keys?: boolean;
  /** Busy timeout in milliseconds (default: 5000) */
  busy_timeout?: number;
}

export interface StorageConfig {
  /** Path to the database file (or :memory: for in-memory) */
  path: string;
  pragmas?: SqlitePragmas;
  /** Open in read-only mode (default: false) */
  readonly?: boolean;
}

/**
 * WAL lets several orchestrators on one machine read while one writes;
 * the busy timeout absorbs short write contention between them.
 */
export const DEFAULT_PRAGMAS: Required<SqlitePragmas> = {
  journal_mode: 'wal',
  synchronous: 'normal',
  foreign_keys: true,
  busy_timeout: 5000,
};

// ============================================================================
// Schema Migration Types
// ============================================================================

export interface Migration {
  version: number;
  description: string;
  /** SQL to apply the migration */
  up: string;
  /** SQL to roll the migration back */
  down?: string;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  /** Versions applied by this call */
  applied: number[];
  success: boolean;
}
