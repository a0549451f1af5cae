import {
  ErrorCode,
  ErrorHttpStatus,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  StorageErrorCode,
  OrchestrationErrorCode,
} from './codes.js';

/**
 * Context attached to an error. The named keys are the ones the factories
 * and the storage mapper fill in.
 */
export interface ErrorDetails {
  /** Input field at fault */
  field?: string;
  value?: unknown;
  expected?: unknown;
  actual?: unknown;
  taskId?: string;
  flow?: string;
  cluster?: string;
  /** Work branch and its merge target */
  branch?: string;
  target?: string;
  /** Worker process */
  pid?: number;
  /** Housekeeping job name */
  job?: string;
  /** Set by the storage layer for a busy database */
  retryable?: boolean;
  [key: string]: unknown;
}

/** Codes a caller may retry as is: someone else got there first, or the database was busy */
const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.CONCURRENT_MODIFICATION,
  ErrorCode.CLAIM_CONFLICT,
  ErrorCode.DATABASE_BUSY,
]);

export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  details: ErrorDetails;
  httpStatus: number;
  retryable: boolean;
}

/**
 * Base of every tasklane error: a code from the table in codes.ts, the HTTP
 * status that code maps to, and structured details.
 */
export class TasklaneError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;
  readonly httpStatus: number;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'TasklaneError';
    this.code = code;
    this.details = details;
    this.httpStatus = ErrorHttpStatus[code];
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TasklaneError);
    }
  }

  /** Task the error concerns, when there is one */
  get taskId(): string | undefined {
    return this.details.taskId;
  }

  /** True when the same call may succeed on a later attempt */
  get retryable(): boolean {
    return this.details.retryable === true || RETRYABLE_CODES.has(this.code);
  }

  /** Body of an API error response */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      httpStatus: this.httpStatus,
      retryable: this.retryable,
    };
  }
}

/**
 * Error for input validation failures
 */
export class ValidationError extends TasklaneError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error for resources that cannot be found
 */
export class NotFoundError extends TasklaneError {
  constructor(
    message: string,
    code: NotFoundErrorCode = ErrorCode.NOT_FOUND,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for state conflicts: a taken id, a stale version, a lost claim race
 * or a branch that will not merge
 */
export class ConflictError extends TasklaneError {
  constructor(
    message: string,
    code: ConflictErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConflictError';
  }
}

/**
 * Error for a rule the task's current state forbids (terminal queue, lease,
 * pending checks, unresolved dependency)
 */
export class ConstraintError extends TasklaneError {
  constructor(
    message: string,
    code: ConstraintErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConstraintError';
  }
}

/**
 * Error for storage/database operations
 */
export class StorageError extends TasklaneError {
  constructor(
    message: string,
    code: StorageErrorCode = ErrorCode.DATABASE_ERROR,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'StorageError';
  }
}

/**
 * Error for worker lifecycle, git and housekeeping failures. Never mapped to
 * a 4xx: these come from the orchestrator's own machinery.
 */
export class OrchestrationError extends TasklaneError {
  constructor(
    message: string,
    code: OrchestrationErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'OrchestrationError';
  }
}

/**
 * Type guard to check if an error is a TasklaneError
 */
export function isTasklaneError(error: unknown): error is TasklaneError {
  return error instanceof TasklaneError;
}

/**
 * Type guard to check if an error is a ConflictError
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is TasklaneError {
  return isTasklaneError(error) && error.code === code;
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
