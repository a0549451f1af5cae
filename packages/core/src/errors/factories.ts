import { ErrorCode } from './codes.js';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  OrchestrationError,
  ErrorDetails,
} from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for an element that doesn't exist
 */
export function notFound(
  type: string,
  id: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(`${capitalize(type)} not found: ${id}`, ErrorCode.NOT_FOUND, {
    value: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a missing task
 */
export function taskNotFound(id: string, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(`Task not found: ${id}`, ErrorCode.TASK_NOT_FOUND, {
    taskId: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a flow missing from the registry
 */
export function flowNotFound(name: string, cluster: string): NotFoundError {
  return new NotFoundError(
    `Flow not found: ${name} (cluster ${cluster})`,
    ErrorCode.FLOW_NOT_FOUND,
    { flow: name, cluster }
  );
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  const valueStr = truncateValue(value);
  return new ValidationError(
    `Invalid ${field}: ${valueStr}`,
    ErrorCode.INVALID_INPUT,
    {
      field,
      value,
      expected,
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for a transition missing from the flow table
 */
export function invalidTransition(
  from: string,
  to: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid transition: cannot move from ${from} to ${to}`,
    ErrorCode.INVALID_TRANSITION,
    {
      fromQueue: from,
      toQueue: to,
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for title that's too long
 */
export function titleTooLong(length: number, maxLength = 500): ValidationError {
  return new ValidationError(
    `Title too long: ${length} characters (max ${maxLength})`,
    ErrorCode.TITLE_TOO_LONG,
    {
      actual: length,
      expected: `<= ${maxLength}`,
    }
  );
}

/**
 * Creates a ValidationError for invalid JSON
 */
export function invalidJson(
  value: string,
  parseError?: Error
): ValidationError {
  return new ValidationError(
    `Invalid JSON content: ${parseError?.message || 'parse error'}`,
    ErrorCode.INVALID_JSON,
    { value: truncateValue(value) },
    parseError
  );
}

/**
 * Creates a ValidationError for missing required field
 */
export function missingRequiredField(field: string): ValidationError {
  return new ValidationError(
    `Missing required field: ${field}`,
    ErrorCode.MISSING_REQUIRED_FIELD,
    { field }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for duplicate element
 */
export function alreadyExists(
  type: string,
  id: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `${capitalize(type)} already exists: ${id}`,
    ErrorCode.ALREADY_EXISTS,
    { value: id, ...details }
  );
}

/**
 * Creates a ConflictError for an optimistic version mismatch
 */
export function concurrentModification(
  taskId: string,
  expectedVersion: number,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Task ${taskId} was modified concurrently (expected version ${expectedVersion})`,
    ErrorCode.CONCURRENT_MODIFICATION,
    { taskId, expected: expectedVersion, ...details }
  );
}

/**
 * Creates a ConflictError for a claim lost to another claimant
 */
export function claimConflict(taskId: string, details: ErrorDetails = {}): ConflictError {
  return new ConflictError(
    `Task ${taskId} was claimed by another agent`,
    ErrorCode.CLAIM_CONFLICT,
    { taskId, ...details }
  );
}

/**
 * Creates a ConflictError for a branch that cannot be merged
 */
export function mergeConflict(
  branch: string,
  target: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Branch ${branch} cannot be merged into ${target}`,
    ErrorCode.MERGE_CONFLICT,
    { branch, target, ...details }
  );
}

// =============================================================================
// Constraint Factories
// =============================================================================

/**
 * Creates a ConstraintError for mutating a task in a terminal queue
 */
export function immutable(taskId: string, queue: string): ConstraintError {
  return new ConstraintError(
    `Task ${taskId} is in terminal queue ${queue} and cannot be modified`,
    ErrorCode.IMMUTABLE,
    { taskId, actual: queue }
  );
}

/**
 * Creates a ConstraintError for a task whose dependency is not done
 */
export function dependencyUnresolved(taskId: string, blockedBy: string): ConstraintError {
  return new ConstraintError(
    `Task ${taskId} is blocked by unresolved task ${blockedBy}`,
    ErrorCode.DEPENDENCY_UNRESOLVED,
    { taskId, blockedBy }
  );
}

/**
 * Creates a ConstraintError for an operation by someone other than the lease holder
 */
export function leaseNotHeld(
  taskId: string,
  agent: string,
  holder: string | null
): ConstraintError {
  return new ConstraintError(
    `Agent ${agent} does not hold the lease on task ${taskId}`,
    ErrorCode.LEASE_NOT_HELD,
    { taskId, actual: holder, expected: agent }
  );
}

/**
 * Creates a ConstraintError for an operation under an expired lease
 */
export function leaseExpired(taskId: string, expiredAt: string): ConstraintError {
  return new ConstraintError(
    `Lease on task ${taskId} expired at ${expiredAt}`,
    ErrorCode.LEASE_EXPIRED,
    { taskId, expiredAt }
  );
}

/**
 * Creates a ConstraintError for a claimant whose role the task does not accept
 */
export function roleMismatch(taskId: string, role: string, required: string): ConstraintError {
  return new ConstraintError(
    `Task ${taskId} requires role ${required}, not ${role}`,
    ErrorCode.ROLE_MISMATCH,
    { taskId, actual: role, expected: required }
  );
}

/**
 * Creates a ConstraintError for acceptance before every check passed
 */
export function checksPending(taskId: string, pending: string[]): ConstraintError {
  return new ConstraintError(
    `Task ${taskId} has checks that have not passed: ${pending.join(', ')}`,
    ErrorCode.CHECKS_PENDING,
    { taskId, pending }
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for database errors
 */
export function databaseError(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Database error: ${message}`,
    ErrorCode.DATABASE_ERROR,
    details,
    cause
  );
}

/**
 * Creates a StorageError for migration failures
 */
export function migrationFailed(
  version: number,
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Migration to version ${version} failed: ${message}`,
    ErrorCode.MIGRATION_FAILED,
    { ...details, version },
    cause
  );
}

// =============================================================================
// Orchestration Factories
// =============================================================================

/**
 * Creates an OrchestrationError for a failed workspace prep or launch
 */
export function spawnFailed(
  taskId: string,
  message: string,
  cause?: Error
): OrchestrationError {
  return new OrchestrationError(
    `Failed to spawn worker for task ${taskId}: ${message}`,
    ErrorCode.SPAWN_FAILED,
    { taskId },
    cause
  );
}

/**
 * Creates an OrchestrationError for a worker that died without a result
 */
export function agentCrashed(taskId: string, pid: number): OrchestrationError {
  return new OrchestrationError(
    `Worker ${pid} exited without a result for task ${taskId}`,
    ErrorCode.AGENT_CRASHED,
    { taskId, pid }
  );
}

/**
 * Creates an OrchestrationError for a housekeeping job that threw
 */
export function housekeepingJobFailed(job: string, cause?: Error): OrchestrationError {
  return new OrchestrationError(
    `Housekeeping job ${job} failed: ${cause?.message ?? 'unknown error'}`,
    ErrorCode.HOUSEKEEPING_JOB_FAILED,
    { job },
    cause
  );
}

/**
 * Creates an OrchestrationError for a failed git command
 */
export function gitError(
  command: string,
  message: string,
  cause?: Error
): OrchestrationError {
  return new OrchestrationError(
    `git ${command} failed: ${message}`,
    ErrorCode.GIT_ERROR,
    { command },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Capitalizes the first letter of a string
 */
function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str = typeof value === 'string' ? value : JSON.stringify(value);
  if (str === undefined) {
    return String(value);
  }
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}
