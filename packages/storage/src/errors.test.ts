import { describe, it, expect } from 'vitest';
import {
  SqliteResultCode,
  isBusyError,
  isConstraintError,
  isUniqueViolation,
  mapStorageError,
  connectionError,
  migrationError,
} from './errors.js';
import { StorageError, ConflictError, ConstraintError, ErrorCode } from '@tasklane/core';

function sqliteError(message: string, code: string | number): Error {
  return Object.assign(new Error(message), { code });
}

describe('isBusyError', () => {
  it('should detect numeric and string busy codes', () => {
    expect(isBusyError(sqliteError('busy', SqliteResultCode.BUSY))).toBe(true);
    expect(isBusyError(sqliteError('locked', 'SQLITE_LOCKED'))).toBe(true);
    expect(isBusyError(sqliteError('snapshot', 'SQLITE_BUSY_SNAPSHOT'))).toBe(true);
  });

  it('should detect busy errors by message', () => {
    expect(isBusyError(new Error('database is locked'))).toBe(true);
  });

  it('should ignore other values', () => {
    expect(isBusyError(new Error('some other error'))).toBe(false);
    expect(isBusyError('database is locked')).toBe(false);
    expect(isBusyError(null)).toBe(false);
  });
});

describe('constraint detection', () => {
  it('should detect constraint codes with extended suffixes', () => {
    expect(isConstraintError(sqliteError('x', 'SQLITE_CONSTRAINT_CHECK'))).toBe(true);
    expect(isConstraintError(sqliteError('x', SqliteResultCode.CONSTRAINT))).toBe(true);
  });

  it('should detect unique and primary key violations by message', () => {
    expect(isUniqueViolation(new Error('UNIQUE constraint failed: tasks.id'))).toBe(true);
    expect(isUniqueViolation(new Error('PRIMARY KEY constraint failed'))).toBe(true);
    expect(isUniqueViolation(new Error('NOT NULL constraint failed: tasks.title'))).toBe(false);
  });
});

describe('mapStorageError', () => {
  it('should map unique violations to ConflictError', () => {
    const mapped = mapStorageError(new Error('UNIQUE constraint failed: tasks.id'), {
      operation: 'create',
      taskId: 'TASK-1',
    });
    expect(mapped).toBeInstanceOf(ConflictError);
    expect(mapped.code).toBe(ErrorCode.ALREADY_EXISTS);
    expect(mapped.message).toBe('Row already exists (duplicate id)');
    expect(mapped.details.table).toBe('tasks');
    expect(mapped.details.taskId).toBe('TASK-1');
  });

  it('should map foreign key violations to ConstraintError', () => {
    const mapped = mapStorageError(new Error('FOREIGN KEY constraint failed'));
    expect(mapped).toBeInstanceOf(ConstraintError);
    expect(mapped.message).toBe('Referenced row does not exist');
  });

  it('should map busy errors to a retryable StorageError', () => {
    const mapped = mapStorageError(sqliteError('database is locked', 'SQLITE_BUSY'), { operation: 'run' });
    expect(mapped).toBeInstanceOf(StorageError);
    expect(mapped.code).toBe(ErrorCode.DATABASE_BUSY);
    expect(mapped.details.retryable).toBe(true);
    expect(mapped.retryable).toBe(true);
    expect(mapped.httpStatus).toBe(503);
  });

  it('should map a corrupt file to a non-retryable StorageError', () => {
    const mapped = mapStorageError(sqliteError('file is not a database', 'SQLITE_NOTADB'), { operation: 'open' });
    expect(mapped.message).toBe('Database is corrupted or not a valid database file');
    expect(mapped.details).toMatchObject({ operation: 'open', corrupted: true });
    expect(mapped.retryable).toBe(false);
  });

  it('should pass tasklane storage errors through', () => {
    const original = new StorageError('already mapped');
    expect(mapStorageError(original)).toBe(original);
  });

  it('should wrap unknown errors', () => {
    const mapped = mapStorageError(new Error('no such table: nope'), { operation: 'query' });
    expect(mapped.message).toBe('Database operation failed: no such table: nope');
    expect(mapped.code).toBe(ErrorCode.DATABASE_ERROR);
    expect(mapStorageError('odd').message).toBe('Storage operation failed: odd');
  });
});

describe('connection and migration errors', () => {
  it('should name the path', () => {
    const error = connectionError('/tmp/x.db', new Error('SQLITE_CANTOPEN'));
    expect(error.message).toBe('Failed to open database at /tmp/x.db: SQLITE_CANTOPEN');
  });

  it('should carry MIGRATION_FAILED', () => {
    const error = migrationError(2, new Error('syntax error'));
    expect(error.code).toBe(ErrorCode.MIGRATION_FAILED);
    expect(error.message).toBe('Failed to apply migration version 2: syntax error');
  });
});
