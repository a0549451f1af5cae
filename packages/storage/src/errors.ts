/**
 * Storage Error Mapping
 *
 * Maps SQLite error codes and messages to tasklane error types.
 */

import { StorageError, ConflictError, ConstraintError, ErrorCode } from '@tasklane/core';

// ============================================================================
// SQLite Error Codes
// ============================================================================

/**
 * SQLite primary result codes we distinguish
 * @see https://www.sqlite.org/rescode.html
 */
export const SqliteResultCode = {
  ERROR: 1,
  BUSY: 5,
  LOCKED: 6,
  READONLY: 8,
  IOERR: 10,
  CORRUPT: 11,
  FULL: 13,
  CANTOPEN: 14,
  CONSTRAINT: 19,
  NOTADB: 26,
} as const;

export type SqliteResultCode = (typeof SqliteResultCode)[keyof typeof SqliteResultCode];

const CONSTRAINT_PATTERNS = {
  UNIQUE: /UNIQUE constraint failed/i,
  PRIMARY_KEY: /PRIMARY KEY constraint failed/i,
  FOREIGN_KEY: /FOREIGN KEY constraint failed/i,
  NOT_NULL: /NOT NULL constraint failed/i,
  CHECK: /CHECK constraint failed/i,
} as const;

/**
 * better-sqlite3 reports string codes (SQLITE_BUSY, SQLITE_CONSTRAINT_UNIQUE);
 * other drivers report the numeric primary code.
 */
function sqliteCode(error: Error): string | number | undefined {
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    return error.code;
  }
  return undefined;
}

function codeMatches(error: Error, numeric: number, name: string): boolean {
  const code = sqliteCode(error);
  if (typeof code === 'number') {
    return code === numeric;
  }
  return code === name || (code !== undefined && code.startsWith(`${name}_`));
}

/**
 * "UNIQUE constraint failed: tasks.id" → { table: 'tasks', column: 'id' }
 */
function parseConstraintError(message: string): { table?: string; column?: string } {
  const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
  if (match) {
    return { table: match[1], column: match[2] };
  }
  return {};
}

// ============================================================================
// Error Detection
// ============================================================================

export function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return (
    codeMatches(error, SqliteResultCode.BUSY, 'SQLITE_BUSY') ||
    codeMatches(error, SqliteResultCode.LOCKED, 'SQLITE_LOCKED') ||
    /database is locked/i.test(error.message)
  );
}

export function isConstraintError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (codeMatches(error, SqliteResultCode.CONSTRAINT, 'SQLITE_CONSTRAINT')) {
    return true;
  }
  return Object.values(CONSTRAINT_PATTERNS).some((pattern) => pattern.test(error.message));
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return CONSTRAINT_PATTERNS.UNIQUE.test(error.message) || CONSTRAINT_PATTERNS.PRIMARY_KEY.test(error.message);
}

function isForeignKeyViolation(error: unknown): boolean {
  return error instanceof Error && CONSTRAINT_PATTERNS.FOREIGN_KEY.test(error.message);
}

function isCorruptionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return (
    codeMatches(error, SqliteResultCode.CORRUPT, 'SQLITE_CORRUPT') ||
    codeMatches(error, SqliteResultCode.NOTADB, 'SQLITE_NOTADB') ||
    /malformed|not a database/i.test(error.message)
  );
}

// ============================================================================
// Error Conversion
// ============================================================================

export interface StorageErrorContext {
  operation?: string;
  taskId?: string;
  table?: string;
}

/**
 * Convert a SQLite error to the matching tasklane error
 */
export function mapStorageError(
  error: unknown,
  context: StorageErrorContext = {}
): StorageError | ConflictError | ConstraintError {
  if (error instanceof StorageError || error instanceof ConflictError || error instanceof ConstraintError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new StorageError(`Storage operation failed: ${String(error)}`, ErrorCode.DATABASE_ERROR, {
      operation: context.operation,
    });
  }

  const message = error.message;

  if (isUniqueViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConflictError(
      `Row already exists${column ? ` (duplicate ${column})` : ''}`,
      ErrorCode.ALREADY_EXISTS,
      { taskId: context.taskId, table: table ?? context.table, column, operation: context.operation },
      error
    );
  }

  if (isForeignKeyViolation(error)) {
    return new ConstraintError(
      'Referenced row does not exist',
      ErrorCode.HAS_DEPENDENTS,
      { taskId: context.taskId, operation: context.operation },
      error
    );
  }

  if (isConstraintError(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConstraintError(
      `Database constraint violation: ${message}`,
      ErrorCode.HAS_DEPENDENTS,
      { table: table ?? context.table, column, operation: context.operation },
      error
    );
  }

  if (isBusyError(error)) {
    return new StorageError(
      'Database is busy. Please retry the operation.',
      ErrorCode.DATABASE_BUSY,
      { operation: context.operation, retryable: true },
      error
    );
  }

  if (isCorruptionError(error)) {
    return new StorageError(
      'Database is corrupted or not a valid database file',
      ErrorCode.DATABASE_ERROR,
      { operation: context.operation, corrupted: true },
      error
    );
  }

  return new StorageError(
    `Database operation failed: ${message}`,
    ErrorCode.DATABASE_ERROR,
    { sqliteCode: sqliteCode(error), operation: context.operation, taskId: context.taskId },
    error
  );
}

export function connectionError(path: string, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  return new StorageError(
    `Failed to open database at ${path}: ${cause?.message ?? String(error)}`,
    ErrorCode.DATABASE_ERROR,
    { path },
    cause
  );
}

export function migrationError(version: number, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  return new StorageError(
    `Failed to apply migration version ${version}: ${cause?.message ?? String(error)}`,
    ErrorCode.MIGRATION_FAILED,
    { version, operation: 'migrate' },
    cause
  );
}
