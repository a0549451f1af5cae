/**
 * Error handling module for tasklane
 *
 * Provides structured errors with codes, messages, and details
 * for consistent error handling across the API, scheduler, and storage layers.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  StorageErrorCode,
  OrchestrationErrorCode,
  ErrorHttpStatus,
  isCodeIn,
} from './codes.js';

// Error classes
export {
  TasklaneError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  OrchestrationError,
  isTasklaneError,
  isConflictError,
  hasErrorCode,
  errorMessage,
  type ErrorDetails,
  type SerializedError,
} from './error.js';

// Factory functions
export {
  // Not Found
  notFound,
  taskNotFound,
  flowNotFound,
  // Validation
  invalidInput,
  invalidTransition,
  titleTooLong,
  invalidJson,
  missingRequiredField,
  // Conflict
  alreadyExists,
  concurrentModification,
  claimConflict,
  mergeConflict,
  // Constraint
  immutable,
  dependencyUnresolved,
  leaseNotHeld,
  leaseExpired,
  roleMismatch,
  checksPending,
  // Storage
  databaseError,
  migrationFailed,
  // Orchestration
  spawnFailed,
  agentCrashed,
  housekeepingJobFailed,
  gitError,
} from './factories.js';
