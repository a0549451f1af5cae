/**
 * @tasklane/storage
 *
 * SQLite storage layer: the backend interface, the better-sqlite3
 * implementation, error mapping and the task store schema.
 */

export type {
  Row,
  MutationResult,
  PreparedStatement,
  IsolationLevel,
  TransactionOptions,
  Transaction,
  SqlitePragmas,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

export { DEFAULT_PRAGMAS } from './types.js';

export type { StorageBackend, StorageFactory } from './backend.js';

export { NodeStorageBackend, createNodeStorage } from './node-backend.js';

export {
  SqliteResultCode,
  isBusyError,
  isConstraintError,
  isUniqueViolation,
  mapStorageError,
  connectionError,
  migrationError,
  type StorageErrorContext,
} from './errors.js';

export {
  CURRENT_SCHEMA_VERSION,
  MIGRATIONS,
  EXPECTED_TABLES,
  initializeSchema,
  isSchemaUpToDate,
  getPendingMigrations,
  resetSchema,
  validateSchema,
  getTableIndexes,
} from './schema.js';
