/**
 * Node.js SQLite Backend Implementation
 *
 * Implements the StorageBackend interface using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';
import type { StorageBackend, StorageFactory } from './backend.js';
import type {
  Row,
  MutationResult,
  PreparedStatement,
  Transaction,
  TransactionOptions,
  IsolationLevel,
  StorageConfig,
  Migration,
  MigrationResult,
  SqlitePragmas,
} from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';
import { isTasklaneError } from '@tasklane/core';
import { connectionError, mapStorageError, migrationError } from './errors.js';

/**
 * SQLite rejects undefined bindings; booleans are stored as 0/1
 */
function bindable(params: unknown[] | undefined): unknown[] {
  if (!params) return [];
  return params.map((p) => {
    if (p === undefined) return null;
    if (typeof p === 'boolean') return p ? 1 : 0;
    return p;
  });
}

// ============================================================================
// Prepared Statement Wrapper
// ============================================================================

class NodePreparedStatement<T extends Row = Row> implements PreparedStatement<T> {
  constructor(private stmt: Statement<unknown[]>) {}

  all(...params: unknown[]): T[] {
    return this.stmt.all(...bindable(params)) as T[];
  }

  get(...params: unknown[]): T | undefined {
    return this.stmt.get(...bindable(params)) as T | undefined;
  }

  run(...params: unknown[]): MutationResult {
    const result = this.stmt.run(...bindable(params));
    return {
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    };
  }
}

// ============================================================================
// Transaction Implementation
// ============================================================================

class NodeTransaction implements Transaction {
  constructor(private db: DatabaseType) {}

  exec(sql: string): void {
    this.db.exec(sql);
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    return this.db.prepare<unknown[]>(sql).all(...bindable(params)) as T[];
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    return this.db.prepare<unknown[]>(sql).get(...bindable(params)) as T | undefined;
  }

  run(sql: string, params?: unknown[]): MutationResult {
    const result = this.db.prepare<unknown[]>(sql).run(...bindable(params));
    return {
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    };
  }
}

// ============================================================================
// Node.js Storage Backend
// ============================================================================

export class NodeStorageBackend implements StorageBackend {
  private db: DatabaseType | null;
  private readonly _path: string;
  private depth = 0;

  constructor(config: StorageConfig) {
    this._path = config.path;

    try {
      this.db = new Database(config.path, {
        readonly: config.readonly ?? false,
      });
      this.applyPragmas(this.db, config.pragmas);
    } catch (error) {
      throw connectionError(config.path, error);
    }
  }

  private applyPragmas(db: DatabaseType, pragmas?: SqlitePragmas): void {
    const settings = { ...DEFAULT_PRAGMAS, ...pragmas };

    // In-memory databases report journal_mode=memory whatever is requested
    db.pragma(`journal_mode = ${settings.journal_mode}`);
    db.pragma(`synchronous = ${settings.synchronous}`);
    db.pragma(`foreign_keys = ${settings.foreign_keys ? 'ON' : 'OFF'}`);
    db.pragma(`busy_timeout = ${settings.busy_timeout}`);
  }

  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this._path;
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureOpen(): DatabaseType {
    if (!this.db) {
      throw mapStorageError(new Error('Database is closed'), { operation: 'open' });
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  exec(sql: string): void {
    try {
      this.ensureOpen().exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    try {
      return this.ensureOpen().prepare<unknown[]>(sql).all(...bindable(params)) as T[];
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    try {
      return this.ensureOpen().prepare<unknown[]>(sql).get(...bindable(params)) as T | undefined;
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params?: unknown[]): MutationResult {
    try {
      const result = this.ensureOpen().prepare<unknown[]>(sql).run(...bindable(params));
      return {
        changes: result.changes,
        lastInsertRowid: result.lastInsertRowid,
      };
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  prepare<T extends Row = Row>(sql: string): PreparedStatement<T> {
    try {
      return new NodePreparedStatement<T>(this.ensureOpen().prepare<unknown[]>(sql));
    } catch (error) {
      throw mapStorageError(error, { operation: 'prepare' });
    }
  }

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T {
    const db = this.ensureOpen();
    const nested = this.depth > 0;
    const savepoint = `sp_${this.depth}`;

    try {
      db.exec(nested ? `SAVEPOINT ${savepoint}` : this.getBeginSql(options?.isolation ?? 'deferred'));
    } catch (error) {
      throw mapStorageError(error, { operation: 'begin' });
    }
    this.depth++;
    try {
      const result = fn(new NodeTransaction(db));
      db.exec(nested ? `RELEASE SAVEPOINT ${savepoint}` : 'COMMIT');
      return result;
    } catch (error) {
      if (nested) {
        db.exec(`ROLLBACK TO SAVEPOINT ${savepoint}`);
        db.exec(`RELEASE SAVEPOINT ${savepoint}`);
      } else if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      // Domain errors raised by fn keep their class
      throw isTasklaneError(error) ? error : mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth--;
    }
  }

  private getBeginSql(isolation: IsolationLevel): string {
    switch (isolation) {
      case 'immediate':
        return 'BEGIN IMMEDIATE';
      case 'exclusive':
        return 'BEGIN EXCLUSIVE';
      case 'deferred':
      default:
        return 'BEGIN DEFERRED';
    }
  }

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number {
    const version: unknown = this.ensureOpen().pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  setSchemaVersion(version: number): void {
    if (!Number.isInteger(version) || version < 0) {
      throw migrationError(version, new Error('schema version must be a non-negative integer'));
    }
    this.ensureOpen().pragma(`user_version = ${version}`);
  }

  migrate(migrations: readonly Migration[]): MigrationResult {
    const fromVersion = this.getSchemaVersion();
    const pending = migrations
      .filter((m) => m.version > fromVersion)
      .sort((a, b) => a.version - b.version);

    const applied: number[] = [];
    for (const migration of pending) {
      try {
        this.transaction(() => {
          this.exec(migration.up);
          this.setSchemaVersion(migration.version);
        });
      } catch (error) {
        throw migrationError(migration.version, error);
      }
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getSchemaVersion(),
      applied,
      success: true,
    };
  }

  checkIntegrity(): boolean {
    const result: unknown = this.ensureOpen().pragma('integrity_check', { simple: true });
    return result === 'ok';
  }
}

/**
 * Create a new Node.js storage backend
 */
export const createNodeStorage: StorageFactory = (config: StorageConfig): StorageBackend => {
  return new NodeStorageBackend(config);
};
