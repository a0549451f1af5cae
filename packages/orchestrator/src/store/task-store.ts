/**
 * Task Store
 *
 * The single source of truth for task state. Every mutation is guarded by the
 * task's version (optimistic locking, no row locks) and appends a history
 * entry in the same transaction. Rows are validated into Task records here,
 * so nothing past this boundary sees an untyped row.
 */

import type { StorageBackend, Row } from '@tasklane/storage';
import type {
  Task,
  TaskHistoryEntry,
  TaskEvent as TaskEventType,
  CreateTaskInput,
  CheckStatus,
  Clock,
  Priority,
} from '@tasklane/core';
import {
  createTask,
  validateTask,
  generateTaskId,
  createTimestamp,
  systemClock,
  TaskQueue,
  TaskEvent,
  ENTRY_QUEUES,
  isEntryQueue,
  isTerminalQueue,
  taskNotFound,
  notFound,
  concurrentModification,
  immutable,
  invalidJson,
  alreadyExists,
  invalidInput,
} from '@tasklane/core';

// ============================================================================
// Database Row Types
// ============================================================================

interface TaskRow extends Row {
  id: string;
  title: string;
  description: string;
  cluster: string;
  flow: string;
  queue: string;
  priority: string;
  role: string | null;
  version: number;
  claimed_by: string | null;
  claimed_at: string | null;
  lease_expires_at: string | null;
  orchestrator_id: string | null;
  attempt_count: number;
  rejection_count: number;
  max_attempts: number;
  checks: string;
  check_results: string;
  blocked_by: string | null;
  branch: string;
  work_branch: string | null;
  pr_reference: string | null;
  needs_rebase: number;
  execution_notes: string | null;
  submitted_at: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

interface HistoryRow extends Row {
  id: number;
  task_id: string;
  event: string;
  from_queue: string | null;
  to_queue: string | null;
  actor: string | null;
  details: string;
  created_at: string;
}

interface CountRow extends Row {
  count: number;
}

interface OrchestratorRow extends Row {
  id: string;
  cluster: string;
  machine: string;
  registered_at: string;
  last_heartbeat: string;
}

// ============================================================================
// Public Types
// ============================================================================

/**
 * Fields a mutation may set. id, version and the timestamps the store owns
 * are excluded.
 */
export type TaskPatch = Partial<Omit<Task, 'id' | 'version' | 'createdAt' | 'updatedAt'>>;

type PatchKey = keyof TaskPatch;

const PATCH_COLUMNS: Record<PatchKey, string> = {
  title: 'title',
  description: 'description',
  cluster: 'cluster',
  flow: 'flow',
  queue: 'queue',
  priority: 'priority',
  role: 'role',
  claimedBy: 'claimed_by',
  claimedAt: 'claimed_at',
  leaseExpiresAt: 'lease_expires_at',
  orchestratorId: 'orchestrator_id',
  attemptCount: 'attempt_count',
  rejectionCount: 'rejection_count',
  maxAttempts: 'max_attempts',
  checks: 'checks',
  checkResults: 'check_results',
  blockedBy: 'blocked_by',
  branch: 'branch',
  workBranch: 'work_branch',
  prReference: 'pr_reference',
  needsRebase: 'needs_rebase',
  executionNotes: 'execution_notes',
  submittedAt: 'submitted_at',
  completedAt: 'completed_at',
};

const PATCH_KEYS = Object.keys(PATCH_COLUMNS).filter(isPatchKey);

function isPatchKey(key: string): key is PatchKey {
  return key in PATCH_COLUMNS;
}

/** Patch that clears every claim field */
export const CLEAR_CLAIM: TaskPatch = {
  claimedBy: null,
  claimedAt: null,
  leaseExpiresAt: null,
  orchestratorId: null,
};

export interface TaskFilter {
  queue?: string | string[];
  cluster?: string;
  flow?: string;
  role?: string;
  priority?: Priority;
  claimedBy?: string;
  orchestratorId?: string;
  blockedBy?: string;
  /** Only tasks holding a claim */
  claimed?: boolean;
  /** Tasks whose lease expired before this instant */
  leaseExpiredBefore?: string;
  needsRebase?: boolean;
  limit?: number;
  offset?: number;
}

export interface ClaimCandidateQuery {
  sourceQueue: string;
  cluster?: string;
  /** A null task role matches every claimant; omitted matches every task */
  role?: string | null;
  limit?: number;
}

export interface HistoryInput {
  event: TaskEventType | string;
  actor?: string | null;
  details?: Record<string, unknown>;
}

export interface RequeueOptions {
  /** Destination queue (default: incoming) */
  queue?: string;
  reason?: string;
  actor?: string;
  /** Counts the requeue against the retry budget */
  countAttempt?: boolean;
  event?: TaskEventType;
}

export interface OrchestratorRecord {
  id: string;
  cluster: string;
  machine: string;
  registeredAt: string;
  lastHeartbeat: string;
}

export interface TaskStoreOptions {
  clock?: Clock;
  defaultBranch?: string;
  maxAttempts?: number;
}

// ============================================================================
// Row mapping
// ============================================================================

function parseJsonColumn(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw invalidJson(value, err instanceof Error ? err : undefined);
  }
}

function rowToTask(row: TaskRow): Task {
  return validateTask({
    id: row.id,
    title: row.title,
    description: row.description,
    cluster: row.cluster,
    flow: row.flow,
    queue: row.queue,
    priority: row.priority,
    role: row.role,
    version: row.version,
    claimedBy: row.claimed_by,
    claimedAt: row.claimed_at,
    leaseExpiresAt: row.lease_expires_at,
    orchestratorId: row.orchestrator_id,
    attemptCount: row.attempt_count,
    rejectionCount: row.rejection_count,
    maxAttempts: row.max_attempts,
    checks: parseJsonColumn(row.checks),
    checkResults: parseJsonColumn(row.check_results),
    blockedBy: row.blocked_by,
    branch: row.branch,
    workBranch: row.work_branch,
    prReference: row.pr_reference,
    needsRebase: row.needs_rebase === 1,
    executionNotes: row.execution_notes,
    submittedAt: row.submitted_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function rowToHistory(row: HistoryRow): TaskHistoryEntry {
  const details = parseJsonColumn(row.details);
  return {
    id: row.id,
    taskId: row.task_id,
    event: row.event,
    fromQueue: row.from_queue,
    toQueue: row.to_queue,
    actor: row.actor,
    details:
      typeof details === 'object' && details !== null && !Array.isArray(details)
        ? Object.fromEntries(Object.entries(details))
        : {},
    createdAt: row.created_at,
  };
}

function assertEntryQueue(queue: string): void {
  if (!isEntryQueue(queue)) {
    throw invalidInput('queue', queue, ENTRY_QUEUES);
  }
}

function toColumnValue(value: unknown): unknown {
  if (Array.isArray(value) || (typeof value === 'object' && value !== null)) {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

// ============================================================================
// TaskStore
// ============================================================================

export class TaskStore {
  private readonly clock: Clock;

  constructor(
    private readonly db: StorageBackend,
    private readonly options: TaskStoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Runs fn in a transaction. Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(() => fn(), { isolation: 'immediate' });
  }

  // --------------------------------------------------------------------------
  // Create / read
  // --------------------------------------------------------------------------

  /**
   * Creates a task. A task blocked by an already-done task starts in incoming.
   * Only the entry queues are accepted; every other queue is reached through
   * a flow transition.
   *
   * @throws ValidationError if the queue is not an entry queue
   * @throws ConflictError if the id is taken
   * @throws NotFoundError if blockedBy names an unknown task
   */
  create(input: CreateTaskInput, actor: string | null = null): Task {
    if (input.queue !== undefined) {
      assertEntryQueue(input.queue);
    }
    return this.transaction(() => {
      let resolved = input;
      if (input.blockedBy) {
        const blocker = this.getOrThrow(input.blockedBy);
        if (blocker.queue === TaskQueue.DONE && input.queue === undefined) {
          resolved = { ...input, queue: TaskQueue.INCOMING };
        }
      }

      const id =
        input.id ?? generateTaskId({ title: input.title, createdAt: this.clock() });
      if (this.get(id)) {
        throw alreadyExists('task', id);
      }

      const task = createTask(id, resolved, {
        clock: this.clock,
        defaultBranch: this.options.defaultBranch,
        maxAttempts: this.options.maxAttempts,
      });

      this.db.run(
        `INSERT INTO tasks (
          id, title, description, cluster, flow, queue, priority, role, version,
          claimed_by, claimed_at, lease_expires_at, orchestrator_id,
          attempt_count, rejection_count, max_attempts, checks, check_results,
          blocked_by, branch, work_branch, pr_reference, needs_rebase,
          execution_notes, submitted_at, completed_at, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          task.id,
          task.title,
          task.description,
          task.cluster,
          task.flow,
          task.queue,
          task.priority,
          task.role,
          task.version,
          task.claimedBy,
          task.claimedAt,
          task.leaseExpiresAt,
          task.orchestratorId,
          task.attemptCount,
          task.rejectionCount,
          task.maxAttempts,
          JSON.stringify(task.checks),
          JSON.stringify(task.checkResults),
          task.blockedBy,
          task.branch,
          task.workBranch,
          task.prReference,
          task.needsRebase ? 1 : 0,
          task.executionNotes,
          task.submittedAt,
          task.completedAt,
          task.createdAt,
          task.updatedAt,
        ]
      );
      this.appendHistory(task.id, { event: TaskEvent.CREATED, actor }, null, task.queue);
      return task;
    });
  }

  get(id: string): Task | undefined {
    const row = this.db.queryOne<TaskRow>('SELECT * FROM tasks WHERE id = ?', [id]);
    return row ? rowToTask(row) : undefined;
  }

  getOrThrow(id: string): Task {
    const task = this.get(id);
    if (!task) {
      throw taskNotFound(id);
    }
    return task;
  }

  list(filter: TaskFilter = {}): Task[] {
    const { where, params } = buildWhere(filter);
    let sql = `SELECT * FROM tasks ${where} ORDER BY priority ASC, created_at ASC, id ASC`;
    if (filter.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
      if (filter.offset !== undefined) {
        sql += ' OFFSET ?';
        params.push(filter.offset);
      }
    }
    return this.db.query<TaskRow>(sql, params).map(rowToTask);
  }

  count(filter: TaskFilter = {}): number {
    const { where, params } = buildWhere(filter);
    const row = this.db.queryOne<CountRow>(`SELECT COUNT(*) AS count FROM tasks ${where}`, params);
    return row?.count ?? 0;
  }

  /**
   * Unclaimed tasks in the source queue whose dependency (if any) is done,
   * in claim order: priority, created_at, id.
   */
  selectClaimCandidates(query: ClaimCandidateQuery): Task[] {
    const conditions = ['t.queue = ?', 't.claimed_by IS NULL'];
    const params: unknown[] = [query.sourceQueue];
    if (query.cluster !== undefined) {
      conditions.push('t.cluster = ?');
      params.push(query.cluster);
    }
    if (query.role !== undefined) {
      if (query.role === null) {
        conditions.push('t.role IS NULL');
      } else {
        conditions.push('(t.role IS NULL OR t.role = ?)');
        params.push(query.role);
      }
    }
    conditions.push(
      `(t.blocked_by IS NULL OR EXISTS (SELECT 1 FROM tasks d WHERE d.id = t.blocked_by AND d.queue = '${TaskQueue.DONE}'))`
    );
    params.push(query.limit ?? 10);

    const rows = this.db.query<TaskRow>(
      `SELECT t.* FROM tasks t WHERE ${conditions.join(' AND ')}
       ORDER BY t.priority ASC, t.created_at ASC, t.id ASC LIMIT ?`,
      params
    );
    return rows.map(rowToTask);
  }

  // --------------------------------------------------------------------------
  // Versioned mutation
  // --------------------------------------------------------------------------

  /**
   * The conditional update every state change goes through:
   * `UPDATE ... WHERE id = ? AND queue = ? AND version = ?`.
   *
   * @returns the updated task, or undefined when another writer got there first
   */
  compareAndSwap(
    id: string,
    expectedQueue: string,
    expectedVersion: number,
    patch: TaskPatch,
    history?: HistoryInput
  ): Task | undefined {
    return this.transaction(() => {
      const changes = this.applyPatch(id, expectedVersion, patch, expectedQueue);
      if (changes === 0) {
        return undefined;
      }
      const updated = this.getOrThrow(id);
      if (history) {
        this.appendHistory(id, history, expectedQueue, updated.queue);
      }
      return updated;
    });
  }

  /**
   * Version-checked update without a queue precondition.
   *
   * @throws NotFoundError if the task does not exist
   * @throws ConflictError if the version moved
   */
  updateWithVersion(id: string, expectedVersion: number, patch: TaskPatch, history?: HistoryInput): Task {
    return this.transaction(() => {
      const current = this.getOrThrow(id);
      if (current.version !== expectedVersion) {
        throw concurrentModification(id, expectedVersion, { actual: current.version });
      }
      const changes = this.applyPatch(id, expectedVersion, patch);
      if (changes === 0) {
        throw concurrentModification(id, expectedVersion);
      }
      const updated = this.getOrThrow(id);
      this.appendHistory(id, history ?? { event: TaskEvent.UPDATED }, current.queue, updated.queue);
      return updated;
    });
  }

  /**
   * Administrative requeue. Bypasses flow validation: clears the claim and
   * moves the task to an entry queue (incoming unless given).
   *
   * @throws ConstraintError if the task is done or failed
   * @throws ValidationError if the destination is not an entry queue
   */
  requeue(id: string, options: RequeueOptions = {}): Task {
    const queue = options.queue ?? TaskQueue.INCOMING;
    assertEntryQueue(queue);
    return this.transaction(() => {
      const current = this.getOrThrow(id);
      if (isTerminalQueue(current.queue)) {
        throw immutable(id, current.queue);
      }
      const patch: TaskPatch = { ...CLEAR_CLAIM, queue };
      if (options.countAttempt) {
        patch.attemptCount = current.attemptCount + 1;
      }
      if (options.reason !== undefined) {
        patch.executionNotes = options.reason;
      }
      return this.updateWithVersion(id, current.version, patch, {
        event: options.event ?? TaskEvent.REQUEUED,
        actor: options.actor ?? null,
        details: options.reason !== undefined ? { reason: options.reason } : {},
      });
    });
  }

  /**
   * Records one named check on a task in a non-terminal queue.
   */
  recordCheckResult(id: string, name: string, status: CheckStatus, summary: string, actor: string | null = null): Task {
    return this.transaction(() => {
      const current = this.getOrThrow(id);
      if (isTerminalQueue(current.queue)) {
        throw immutable(id, current.queue);
      }
      const checkResults = {
        ...current.checkResults,
        [name]: { status, summary, recordedAt: createTimestamp(this.clock) },
      };
      return this.updateWithVersion(
        id,
        current.version,
        { checkResults },
        { event: TaskEvent.CHECK_RECORDED, actor, details: { check: name, status, summary } }
      );
    });
  }

  // --------------------------------------------------------------------------
  // History
  // --------------------------------------------------------------------------

  appendHistory(taskId: string, entry: HistoryInput, fromQueue: string | null, toQueue: string | null): void {
    this.db.run(
      `INSERT INTO task_history (task_id, event, from_queue, to_queue, actor, details, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        taskId,
        entry.event,
        fromQueue,
        toQueue,
        entry.actor ?? null,
        JSON.stringify(entry.details ?? {}),
        createTimestamp(this.clock),
      ]
    );
  }

  history(taskId: string): TaskHistoryEntry[] {
    return this.db
      .query<HistoryRow>('SELECT * FROM task_history WHERE task_id = ? ORDER BY id ASC', [taskId])
      .map(rowToHistory);
  }

  /** Tasks whose blocked_by names this task */
  dependents(taskId: string): Task[] {
    return this.list({ blockedBy: taskId });
  }

  // --------------------------------------------------------------------------
  // Orchestrator registry
  // --------------------------------------------------------------------------

  registerOrchestrator(id: string, cluster: string, machine: string): OrchestratorRecord {
    const now = createTimestamp(this.clock);
    this.db.run(
      `INSERT INTO orchestrators (id, cluster, machine, registered_at, last_heartbeat)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET last_heartbeat = excluded.last_heartbeat`,
      [id, cluster, machine, now, now]
    );
    const row = this.db.queryOne<OrchestratorRow>('SELECT * FROM orchestrators WHERE id = ?', [id]);
    if (!row) {
      throw notFound('orchestrator', id);
    }
    return rowToOrchestrator(row);
  }

  listOrchestrators(cluster?: string): OrchestratorRecord[] {
    const rows =
      cluster === undefined
        ? this.db.query<OrchestratorRow>('SELECT * FROM orchestrators ORDER BY id')
        : this.db.query<OrchestratorRow>('SELECT * FROM orchestrators WHERE cluster = ? ORDER BY id', [cluster]);
    return rows.map(rowToOrchestrator);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private applyPatch(id: string, expectedVersion: number, patch: TaskPatch, expectedQueue?: string): number {
    const assignments = ['version = version + 1', 'updated_at = ?'];
    const params: unknown[] = [createTimestamp(this.clock)];
    for (const key of PATCH_KEYS) {
      const value = patch[key];
      if (value !== undefined) {
        assignments.push(`${PATCH_COLUMNS[key]} = ?`);
        params.push(toColumnValue(value));
      }
    }

    let sql = `UPDATE tasks SET ${assignments.join(', ')} WHERE id = ? AND version = ?`;
    params.push(id, expectedVersion);
    if (expectedQueue !== undefined) {
      sql += ' AND queue = ?';
      params.push(expectedQueue);
    }
    return this.db.run(sql, params).changes;
  }
}

function rowToOrchestrator(row: OrchestratorRow): OrchestratorRecord {
  return {
    id: row.id,
    cluster: row.cluster,
    machine: row.machine,
    registeredAt: row.registered_at,
    lastHeartbeat: row.last_heartbeat,
  };
}

function buildWhere(filter: TaskFilter): { where: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filter.queue !== undefined) {
    const queues = Array.isArray(filter.queue) ? filter.queue : [filter.queue];
    if (queues.length === 0) {
      conditions.push('0');
    } else {
      conditions.push(`queue IN (${queues.map(() => '?').join(', ')})`);
      params.push(...queues);
    }
  }
  const equals: Array<[string, string | undefined]> = [
    ['cluster', filter.cluster],
    ['flow', filter.flow],
    ['role', filter.role],
    ['priority', filter.priority],
    ['claimed_by', filter.claimedBy],
    ['orchestrator_id', filter.orchestratorId],
    ['blocked_by', filter.blockedBy],
  ];
  for (const [column, value] of equals) {
    if (value !== undefined) {
      conditions.push(`${column} = ?`);
      params.push(value);
    }
  }
  if (filter.claimed !== undefined) {
    conditions.push(filter.claimed ? 'claimed_by IS NOT NULL' : 'claimed_by IS NULL');
  }
  if (filter.leaseExpiredBefore !== undefined) {
    conditions.push('lease_expires_at IS NOT NULL AND lease_expires_at < ?');
    params.push(filter.leaseExpiredBefore);
  }
  if (filter.needsRebase !== undefined) {
    conditions.push('needs_rebase = ?');
    params.push(filter.needsRebase ? 1 : 0);
  }

  return { where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '', params };
}
