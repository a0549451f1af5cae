/**
 * Task Type - the unit of work moving through named queues
 *
 * A Task is validated once, where it enters the system (the task store or
 * an API payload). Everything past that boundary works with this record.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import { titleTooLong, missingRequiredField } from '../errors/factories.js';
import { createTimestamp, isValidTimestamp, type Clock, type Timestamp } from './timestamp.js';

// ============================================================================
// Queues
// ============================================================================

/**
 * Built-in queues. Flows may declare further cluster-defined queue names.
 */
export const TaskQueue = {
  INCOMING: 'incoming',
  CLAIMED: 'claimed',
  PROVISIONAL: 'provisional',
  DONE: 'done',
  FAILED: 'failed',
  BLOCKED: 'blocked',
  NEEDS_CONTINUATION: 'needs_continuation',
  BACKLOG: 'backlog',
} as const;

export type BuiltinQueue = (typeof TaskQueue)[keyof typeof TaskQueue];

export const BUILTIN_QUEUES: readonly string[] = Object.values(TaskQueue);

/** Queues no transition may leave */
export const TERMINAL_QUEUES: readonly string[] = [TaskQueue.DONE, TaskQueue.FAILED];

export function isTerminalQueue(queue: string): boolean {
  return TERMINAL_QUEUES.includes(queue);
}

/** Queues a task may be created in or requeued to */
export const ENTRY_QUEUES: readonly string[] = [TaskQueue.INCOMING, TaskQueue.BACKLOG, TaskQueue.BLOCKED];

export function isEntryQueue(queue: string): boolean {
  return ENTRY_QUEUES.includes(queue);
}

/** Queue names: lowercase words joined by underscores or hyphens */
const QUEUE_NAME_PATTERN = /^[a-z][a-z0-9_-]{0,63}$/;

export function isValidQueueName(value: unknown): value is string {
  return typeof value === 'string' && QUEUE_NAME_PATTERN.test(value);
}

export function validateQueueName(value: unknown, field = 'queue'): string {
  if (!isValidQueueName(value)) {
    throw new ValidationError(`Invalid queue name: ${String(value)}`, ErrorCode.INVALID_QUEUE, {
      field,
      value,
      expected: QUEUE_NAME_PATTERN.source,
    });
  }
  return value;
}

// ============================================================================
// Priority
// ============================================================================

export const Priority = {
  P0: 'P0',
  P1: 'P1',
  P2: 'P2',
  P3: 'P3',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const VALID_PRIORITIES: readonly Priority[] = [Priority.P0, Priority.P1, Priority.P2, Priority.P3];

export const DEFAULT_PRIORITY: Priority = Priority.P2;

export function isValidPriority(value: unknown): value is Priority {
  return typeof value === 'string' && VALID_PRIORITIES.some((p) => p === value);
}

export function validatePriority(value: unknown): Priority {
  if (!isValidPriority(value)) {
    throw new ValidationError(
      `Invalid priority: ${String(value)}. Must be one of P0, P1, P2, P3`,
      ErrorCode.INVALID_INPUT,
      { field: 'priority', value, expected: VALID_PRIORITIES }
    );
  }
  return value;
}

// ============================================================================
// Claims and checks
// ============================================================================

/**
 * What a claimant intends to do with the task. `work` moves it to `claimed`;
 * `review` leaves it in its source queue and only takes the lease.
 */
export type ClaimIntent = 'work' | 'review';

export function isClaimIntent(value: unknown): value is ClaimIntent {
  return value === 'work' || value === 'review';
}

export type CheckStatus = 'pass' | 'fail' | 'pending';

export function isCheckStatus(value: unknown): value is CheckStatus {
  return value === 'pass' || value === 'fail' || value === 'pending';
}

export interface CheckResult {
  status: CheckStatus;
  summary: string;
  recordedAt: Timestamp;
}

// ============================================================================
// Task
// ============================================================================

export const MIN_TITLE_LENGTH = 1;
export const MAX_TITLE_LENGTH = 500;
export const DEFAULT_CLUSTER = 'default';
export const DEFAULT_FLOW = 'default';
export const DEFAULT_BASE_BRANCH = 'main';
export const DEFAULT_MAX_ATTEMPTS = 3;

/** Caller-supplied ids: alphanumerics, dot, underscore, hyphen */
const TASK_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export interface Task {
  readonly id: string;
  title: string;
  description: string;
  /** Tenant scope. Flow lookups are keyed by (flow, cluster). */
  cluster: string;
  flow: string;
  queue: string;
  priority: Priority;
  /** Only claimants with this role may take the task; null matches any role */
  role: string | null;
  /** Optimistic lock, +1 on every mutation */
  version: number;
  claimedBy: string | null;
  claimedAt: Timestamp | null;
  leaseExpiresAt: Timestamp | null;
  orchestratorId: string | null;
  attemptCount: number;
  rejectionCount: number;
  maxAttempts: number;
  checks: string[];
  checkResults: Record<string, CheckResult>;
  blockedBy: string | null;
  /** Base reference the workspace is created from */
  branch: string;
  /** Named branch materialized at push time */
  workBranch: string | null;
  prReference: string | null;
  needsRebase: boolean;
  /** Last failure reason; also where failed result applications are recorded */
  executionNotes: string | null;
  submittedAt: Timestamp | null;
  completedAt: Timestamp | null;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

// ============================================================================
// Validation
// ============================================================================

export function isValidTaskId(value: unknown): value is string {
  return typeof value === 'string' && TASK_ID_PATTERN.test(value);
}

export function validateTaskId(value: unknown): string {
  if (!isValidTaskId(value)) {
    throw new ValidationError(`Invalid task id: ${String(value)}`, ErrorCode.INVALID_ID, {
      field: 'id',
      value,
      expected: TASK_ID_PATTERN.source,
    });
  }
  return value;
}

export function validateTitle(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Task title must be a string', ErrorCode.INVALID_INPUT, {
      field: 'title',
      value,
      expected: 'string',
    });
  }
  const trimmed = value.trim();
  if (trimmed.length < MIN_TITLE_LENGTH) {
    throw missingRequiredField('title');
  }
  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw titleTooLong(trimmed.length, MAX_TITLE_LENGTH);
  }
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldError(field: string, value: unknown, expected: string): ValidationError {
  return new ValidationError(`Invalid task field ${field}`, ErrorCode.INVALID_INPUT, {
    field,
    value,
    expected,
  });
}

function readString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field];
  if (typeof value !== 'string') {
    throw fieldError(field, value, 'string');
  }
  return value;
}

function readNullableString(obj: Record<string, unknown>, field: string): string | null {
  const value = obj[field];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw fieldError(field, value, 'string or null');
  }
  return value;
}

function readNullableTimestamp(obj: Record<string, unknown>, field: string): Timestamp | null {
  const value = readNullableString(obj, field);
  if (value !== null && !isValidTimestamp(value)) {
    throw fieldError(field, value, 'ISO 8601 timestamp');
  }
  return value;
}

function readTimestamp(obj: Record<string, unknown>, field: string): Timestamp {
  const value = obj[field];
  if (!isValidTimestamp(value)) {
    throw fieldError(field, value, 'ISO 8601 timestamp');
  }
  return value;
}

function readCount(obj: Record<string, unknown>, field: string, min = 0): number {
  const value = obj[field];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw fieldError(field, value, `integer >= ${min}`);
  }
  return value;
}

function readChecks(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((name): name is string => typeof name === 'string' && name.length > 0)) {
    throw fieldError('checks', value, 'array of check names');
  }
  return [...value];
}

function readCheckResults(value: unknown): Record<string, CheckResult> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw fieldError('checkResults', value, 'object');
  }
  const results: Record<string, CheckResult> = {};
  for (const [name, raw] of Object.entries(value)) {
    if (!isRecord(raw) || !isCheckStatus(raw.status) || !isValidTimestamp(raw.recordedAt)) {
      throw fieldError(`checkResults.${name}`, raw, '{ status, summary, recordedAt }');
    }
    results[name] = {
      status: raw.status,
      summary: typeof raw.summary === 'string' ? raw.summary : '',
      recordedAt: raw.recordedAt,
    };
  }
  return results;
}

/**
 * Builds a Task from an untrusted object, rejecting anything malformed.
 */
export function validateTask(value: unknown): Task {
  if (!isRecord(value)) {
    throw new ValidationError('Task must be an object', ErrorCode.INVALID_INPUT, { value });
  }
  const claimedBy = readNullableString(value, 'claimedBy');
  const queue = validateQueueName(value.queue);
  const leaseExpiresAt = readNullableTimestamp(value, 'leaseExpiresAt');
  if (queue === TaskQueue.CLAIMED && leaseExpiresAt === null) {
    throw fieldError('leaseExpiresAt', null, 'set while the task is claimed');
  }

  return {
    id: validateTaskId(value.id),
    title: validateTitle(value.title),
    description: readString(value, 'description'),
    cluster: readString(value, 'cluster'),
    flow: readString(value, 'flow'),
    queue,
    priority: validatePriority(value.priority),
    role: readNullableString(value, 'role'),
    version: readCount(value, 'version', 1),
    claimedBy,
    claimedAt: readNullableTimestamp(value, 'claimedAt'),
    leaseExpiresAt,
    orchestratorId: readNullableString(value, 'orchestratorId'),
    attemptCount: readCount(value, 'attemptCount'),
    rejectionCount: readCount(value, 'rejectionCount'),
    maxAttempts: readCount(value, 'maxAttempts', 1),
    checks: readChecks(value.checks),
    checkResults: readCheckResults(value.checkResults),
    blockedBy: readNullableString(value, 'blockedBy'),
    branch: readString(value, 'branch'),
    workBranch: readNullableString(value, 'workBranch'),
    prReference: readNullableString(value, 'prReference'),
    needsRebase: value.needsRebase === true,
    executionNotes: readNullableString(value, 'executionNotes'),
    submittedAt: readNullableTimestamp(value, 'submittedAt'),
    completedAt: readNullableTimestamp(value, 'completedAt'),
    createdAt: readTimestamp(value, 'createdAt'),
    updatedAt: readTimestamp(value, 'updatedAt'),
  };
}

// ============================================================================
// Creation
// ============================================================================

export interface CreateTaskInput {
  id?: string;
  title: string;
  description?: string;
  cluster?: string;
  flow?: string;
  /** Defaults to `blocked` when blockedBy is set, otherwise `incoming` */
  queue?: string;
  priority?: Priority;
  role?: string | null;
  checks?: string[];
  blockedBy?: string | null;
  branch?: string;
  maxAttempts?: number;
}

export interface CreateTaskDefaults {
  clock?: Clock;
  defaultBranch?: string;
  maxAttempts?: number;
}

/**
 * Builds a fresh version-1 Task. The id must already be resolved.
 */
export function createTask(id: string, input: CreateTaskInput, defaults: CreateTaskDefaults = {}): Task {
  const now = createTimestamp(defaults.clock);
  const blockedBy = input.blockedBy ?? null;
  const queue = input.queue ?? (blockedBy !== null ? TaskQueue.BLOCKED : TaskQueue.INCOMING);
  const maxAttempts = input.maxAttempts ?? defaults.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw fieldError('maxAttempts', maxAttempts, 'integer >= 1');
  }

  return {
    id: validateTaskId(id),
    title: validateTitle(input.title),
    description: input.description ?? '',
    cluster: input.cluster ?? DEFAULT_CLUSTER,
    flow: input.flow ?? DEFAULT_FLOW,
    queue: validateQueueName(queue),
    priority: input.priority === undefined ? DEFAULT_PRIORITY : validatePriority(input.priority),
    role: input.role ?? null,
    version: 1,
    claimedBy: null,
    claimedAt: null,
    leaseExpiresAt: null,
    orchestratorId: null,
    attemptCount: 0,
    rejectionCount: 0,
    maxAttempts,
    checks: readChecks(input.checks),
    checkResults: {},
    blockedBy,
    branch: input.branch ?? defaults.defaultBranch ?? DEFAULT_BASE_BRANCH,
    workBranch: null,
    prReference: null,
    needsRebase: false,
    executionNotes: null,
    submittedAt: null,
    completedAt: null,
    createdAt: now,
    updatedAt: now,
  };
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Claim order: priority (P0 first), then creation time, then id.
 */
export function compareClaimOrder(a: Task, b: Task): number {
  if (a.priority !== b.priority) {
    return a.priority < b.priority ? -1 : 1;
  }
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

/** Names of required checks that have not recorded a pass */
export function pendingChecks(task: Task): string[] {
  return task.checks.filter((name) => task.checkResults[name]?.status !== 'pass');
}

export function hasPassedAllChecks(task: Task): boolean {
  return pendingChecks(task).length === 0;
}

export function isLeaseExpired(task: Task, now: Date): boolean {
  return task.leaseExpiresAt !== null && task.leaseExpiresAt < now.toISOString();
}
