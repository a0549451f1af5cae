/**
 * Error codes for tasklane.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - Input validation failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** ID format invalid */
  INVALID_ID: 'INVALID_ID',
  /** Queue name unknown to the task's flow */
  INVALID_QUEUE: 'INVALID_QUEUE',
  /** Requested transition is not in the flow's transition table */
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  /** Title exceeds 500 characters */
  TITLE_TOO_LONG: 'TITLE_TOO_LONG',
  /** JSON content invalid */
  INVALID_JSON: 'INVALID_JSON',
  /** Required field missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Timestamp format invalid */
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  /** Flow definition failed validation */
  INVALID_FLOW: 'INVALID_FLOW',
  /** Configuration value failed validation */
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes - Resource not found
 */
export const NotFoundErrorCode = {
  /** Generic element not found */
  NOT_FOUND: 'NOT_FOUND',
  /** Task not found */
  TASK_NOT_FOUND: 'TASK_NOT_FOUND',
  /** No flow registered for (name, cluster) */
  FLOW_NOT_FOUND: 'FLOW_NOT_FOUND',
  /** Blueprint not configured */
  BLUEPRINT_NOT_FOUND: 'BLUEPRINT_NOT_FOUND',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * Conflict error codes - State conflicts
 */
export const ConflictErrorCode = {
  /** Element with ID already exists */
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  /** Element was modified by another process (optimistic locking failure) */
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
  /** A concurrent claim won the conditional update */
  CLAIM_CONFLICT: 'CLAIM_CONFLICT',
  /** Branch cannot be merged mechanically */
  MERGE_CONFLICT: 'MERGE_CONFLICT',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Constraint error codes - Business rule violations
 */
export const ConstraintErrorCode = {
  /** Cannot modify a task in a terminal queue */
  IMMUTABLE: 'IMMUTABLE',
  /** Task depends on an unresolved task */
  DEPENDENCY_UNRESOLVED: 'DEPENDENCY_UNRESOLVED',
  /** Caller does not hold the lease */
  LEASE_NOT_HELD: 'LEASE_NOT_HELD',
  /** Lease has expired */
  LEASE_EXPIRED: 'LEASE_EXPIRED',
  /** Not every required check has passed */
  CHECKS_PENDING: 'CHECKS_PENDING',
  /** Referenced row missing */
  HAS_DEPENDENTS: 'HAS_DEPENDENTS',
  /** Claimant role differs from the task's role */
  ROLE_MISMATCH: 'ROLE_MISMATCH',
} as const;

export type ConstraintErrorCode = typeof ConstraintErrorCode[keyof typeof ConstraintErrorCode];

/**
 * Storage error codes - Database and persistence errors
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Schema migration failed */
  MIGRATION_FAILED: 'MIGRATION_FAILED',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * Orchestration error codes - Worker lifecycle and scheduling failures
 */
export const OrchestrationErrorCode = {
  /** Workspace preparation or process launch failed */
  SPAWN_FAILED: 'SPAWN_FAILED',
  /** Worker exited without leaving a result */
  AGENT_CRASHED: 'AGENT_CRASHED',
  /** A housekeeping job threw */
  HOUSEKEEPING_JOB_FAILED: 'HOUSEKEEPING_JOB_FAILED',
  /** A post-commit side effect failed */
  SIDE_EFFECT_FAILED: 'SIDE_EFFECT_FAILED',
  /** Git operation failed */
  GIT_ERROR: 'GIT_ERROR',
} as const;

export type OrchestrationErrorCode = typeof OrchestrationErrorCode[keyof typeof OrchestrationErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
  ...ConflictErrorCode,
  ...ConstraintErrorCode,
  ...StorageErrorCode,
  ...OrchestrationErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Maps error codes to HTTP status codes for API responses
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_ID]: 400,
  [ErrorCode.INVALID_QUEUE]: 400,
  [ErrorCode.INVALID_TRANSITION]: 400,
  [ErrorCode.TITLE_TOO_LONG]: 400,
  [ErrorCode.INVALID_JSON]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_TIMESTAMP]: 400,
  [ErrorCode.INVALID_FLOW]: 400,
  [ErrorCode.INVALID_CONFIG]: 400,

  // Not Found errors -> 404
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.TASK_NOT_FOUND]: 404,
  [ErrorCode.FLOW_NOT_FOUND]: 404,
  [ErrorCode.BLUEPRINT_NOT_FOUND]: 404,

  // Conflict errors -> 409
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,
  [ErrorCode.CLAIM_CONFLICT]: 409,
  [ErrorCode.MERGE_CONFLICT]: 409,

  // Constraint errors -> 403/409
  [ErrorCode.IMMUTABLE]: 403,
  [ErrorCode.DEPENDENCY_UNRESOLVED]: 409,
  [ErrorCode.LEASE_NOT_HELD]: 403,
  [ErrorCode.LEASE_EXPIRED]: 409,
  [ErrorCode.CHECKS_PENDING]: 409,
  [ErrorCode.HAS_DEPENDENTS]: 409,
  [ErrorCode.ROLE_MISMATCH]: 403,

  // Storage errors -> 500/503
  [ErrorCode.DATABASE_ERROR]: 500,
  [ErrorCode.DATABASE_BUSY]: 503,
  [ErrorCode.MIGRATION_FAILED]: 500,

  // Orchestration errors -> 500
  [ErrorCode.SPAWN_FAILED]: 500,
  [ErrorCode.AGENT_CRASHED]: 500,
  [ErrorCode.HOUSEKEEPING_JOB_FAILED]: 500,
  [ErrorCode.SIDE_EFFECT_FAILED]: 500,
  [ErrorCode.GIT_ERROR]: 500,
};

/**
 * Whether a code belongs to the given category object
 */
export function isCodeIn(
  category: Readonly<Record<string, string>>,
  code: string
): boolean {
  return Object.values(category).includes(code);
}
