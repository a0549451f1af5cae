/**
 * Housekeeping
 *
 * Named jobs run at the start of every tick, each on its own interval and
 * each isolated: a job that throws is logged and reported, and the rest
 * still run. The order is fixed: results are applied before leases are
 * expired, so a finished worker's result is never lost to its lease, and
 * merges are retried before workspaces are swept.
 *
 * @module
 */

import * as fs from 'node:fs';
import type { Task, Clock } from '@tasklane/core';
import {
  TaskQueue,
  TaskEvent,
  systemClock,
  isTerminalQueue,
  pendingChecks,
  errorMessage,
  housekeepingJobFailed,
  type OrchestrationError,
} from '@tasklane/core';
import type { Configuration, Duration, HousekeepingJobName } from '../config/types.js';
import { HOUSEKEEPING_JOB_NAMES } from '../config/types.js';
import type { TaskStore } from '../store/task-store.js';
import type { LeaseService } from './lease-service.js';
import type { ReviewService } from './review-service.js';
import type { MergeRequestProvider } from './merge-request-provider.js';
import type { InstanceTracker } from '../pool/instance-tracker.js';
import type { ProcessTracker, ReapReport } from '../pool/process-tracker.js';
import { hasPendingResult } from '../pool/worker-result.js';
import type { WorkspaceManager } from '../git/worktree-manager.js';
import { workBranchFor } from '../git/worktree-manager.js';
import {
  tasksRoot,
  taskDirectoryFor,
  taskDirectoryAt,
  archiveTaskLogs,
  removeTaskDirectory,
} from '../runtime/task-directory.js';
import { runCheck } from './check-runner.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('housekeeping');

const ACTOR = 'housekeeping';
const CHECK_ACTOR = 'check-runner';

// ============================================================================
// Types
// ============================================================================

export interface HousekeepingJob {
  name: HousekeepingJobName;
  /** 0 runs on every tick */
  interval: Duration;
  run(now: Date): Promise<void> | void;
}

export interface HousekeepingJobReport {
  name: HousekeepingJobName;
  ran: boolean;
  error?: OrchestrationError;
}

export interface HousekeepingDeps {
  config: Configuration;
  orchestratorId: string;
  store: TaskStore;
  leases: LeaseService;
  reviews: ReviewService;
  instances: InstanceTracker;
  tracker: ProcessTracker;
  workspaces: WorkspaceManager;
  /** Backend for merge-retry; without it the job does nothing */
  mergeRequests?: MergeRequestProvider;
  /** Receives each reap pass's reports */
  onReaped?: (reports: ReapReport[]) => void;
}

// ============================================================================
// Runner
// ============================================================================

export class Housekeeping {
  private readonly lastRun = new Map<HousekeepingJobName, number>();
  private readonly clock: Clock;

  constructor(
    private readonly jobs: readonly HousekeepingJob[],
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get jobNames(): HousekeepingJobName[] {
    return this.jobs.map((job) => job.name);
  }

  /**
   * Runs every job whose interval has elapsed, in order.
   */
  async runDue(): Promise<HousekeepingJobReport[]> {
    const reports: HousekeepingJobReport[] = [];
    for (const job of this.jobs) {
      const now = this.clock();
      const last = this.lastRun.get(job.name);
      if (last !== undefined && job.interval > 0 && now.getTime() - last < job.interval) {
        reports.push({ name: job.name, ran: false });
        continue;
      }
      this.lastRun.set(job.name, now.getTime());
      try {
        await job.run(now);
        reports.push({ name: job.name, ran: true });
      } catch (error) {
        const failure = housekeepingJobFailed(job.name, error instanceof Error ? error : new Error(String(error)));
        logger.error(failure.message);
        reports.push({ name: job.name, ran: true, error: failure });
      }
    }
    return reports;
  }
}

// ============================================================================
// Jobs
// ============================================================================

export function createHousekeepingJobs(deps: HousekeepingDeps): HousekeepingJob[] {
  const { config } = deps;
  const intervals = config.housekeeping.intervals;
  const cluster = config.orchestrator.cluster;
  const runtimeDir = config.orchestrator.runtimeDir;

  const jobs: Record<HousekeepingJobName, HousekeepingJob['run']> = {
    'reap-finished-agents': async () => {
      const reports = await deps.tracker.reapFinished();
      if (reports.length > 0) {
        deps.onReaped?.(reports);
      }
    },

    'register-orchestrator': () => {
      deps.store.registerOrchestrator(deps.orchestratorId, cluster, config.orchestrator.machine);
    },

    'lease-expiry-sweep': (now) => {
      const expired = deps.store.list({ cluster, claimed: true, leaseExpiredBefore: now.toISOString() });
      for (const task of expired) {
        const instance = deps.instances.forTask(task.id);
        if (instance && hasPendingResult(taskDirectoryAt(instance.taskDir, task.id))) {
          logger.debug(`Lease on ${task.id} expired but a result is waiting to be applied`);
          continue;
        }
        logger.warn(`Lease on ${task.id} held by ${task.claimedBy ?? 'unknown'} expired at ${task.leaseExpiresAt ?? '?'}`);
        deps.leases.expireLease(task, ACTOR);
      }
    },

    'orphan-scan': () => {
      const claimed = deps.store.list({ cluster, claimed: true, orchestratorId: deps.orchestratorId });
      for (const task of claimed) {
        if (deps.instances.forTask(task.id)) {
          continue;
        }
        requeueOrphan(deps, task);
      }
    },

    'process-checks': async () => {
      await processChecks(deps);
    },

    'merge-retry': async () => {
      const mergeRequests = deps.mergeRequests;
      if (!mergeRequests) return;
      for (const task of deps.store.list({ cluster, queue: TaskQueue.DONE, needsRebase: true })) {
        try {
          await retryMerge(deps, mergeRequests, task);
        } catch (error) {
          logger.warn(`Merge retry for ${task.id} failed, retrying next run: ${errorMessage(error)}`);
        }
      }
    },

    'stale-workspace-sweep': async (now) => {
      const root = tasksRoot(runtimeDir);
      if (!fs.existsSync(root)) return;
      const cutoff = now.getTime() - config.housekeeping.workspaceGracePeriod;
      for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
        if (!entry.isDirectory()) continue;
        const task = deps.store.get(entry.name);
        if (!task || !isTerminalQueue(task.queue)) continue;
        // merge-retry still needs the worktree
        if (task.queue === TaskQueue.DONE && task.needsRebase) continue;
        const finishedAt = Date.parse(task.completedAt ?? task.updatedAt);
        if (finishedAt > cutoff) continue;
        try {
          await sweepTask(deps, task);
        } catch (error) {
          logger.warn(`Sweeping ${task.id} failed, retrying next run: ${errorMessage(error)}`);
        }
      }
    },
  };

  return HOUSEKEEPING_JOB_NAMES.map((name) => ({
    name,
    interval: intervals[name],
    run: jobs[name],
  }));
}

function requeueOrphan(deps: HousekeepingDeps, task: Task): void {
  const reason = `Orphaned claim: no local worker for ${task.claimedBy ?? 'unknown'}`;
  logger.warn(`Task ${task.id}: ${reason}`);
  if (task.queue === TaskQueue.CLAIMED) {
    deps.leases.failAttempt(task, { reason, actor: ACTOR, event: TaskEvent.REQUEUED });
    return;
  }
  if (task.claimedBy !== null) {
    deps.leases.release(task.id, task.claimedBy, reason);
  }
}

async function processChecks(deps: HousekeepingDeps): Promise<void> {
  const commands = deps.config.checks;
  const provisional = deps.store.list({ cluster: deps.config.orchestrator.cluster, queue: TaskQueue.PROVISIONAL });
  for (const task of provisional) {
    if (task.claimedBy !== null) continue;
    const runnable = pendingChecks(task).filter((name) => commands[name] !== undefined);
    if (runnable.length === 0) continue;
    const workspace = deps.workspaces.open(task.id);
    if (!workspace) {
      logger.debug(`No workspace for ${task.id}; its checks wait`);
      continue;
    }
    for (const name of runnable) {
      const command = commands[name];
      if (command === undefined) continue;
      logger.info(`Running check ${name} for ${task.id}`);
      const outcome = await runCheck(command, { cwd: workspace.path, env: { TASK_ID: task.id } });
      const result = await deps.reviews.recordCheck(task.id, name, outcome.status, outcome.summary, CHECK_ACTOR);
      if (result.rejection) {
        break;
      }
    }
  }
}

/**
 * A done task whose merge conflicted: rebase its work branch onto the latest
 * base, force-push it and merge again. A rebase that still conflicts leaves
 * the flag set for someone to resolve by hand.
 */
async function retryMerge(deps: HousekeepingDeps, mergeRequests: MergeRequestProvider, task: Task): Promise<void> {
  const branch = workBranchFor(task);
  const workspace = deps.workspaces.open(task.id);
  if (workspace) {
    await deps.workspaces.ensureNamedBranch(workspace, branch);
    const rebase = await deps.workspaces.rebaseOnBase(workspace);
    if (!rebase.success) {
      const kind = rebase.hasConflict ? 'conflicts' : 'fails';
      logger.warn(`Rebasing ${branch} onto ${task.branch} still ${kind} for ${task.id}: ${rebase.error ?? 'unknown error'}`);
      return;
    }
    await deps.workspaces.push(workspace, { force: true });
  }

  const outcome = await mergeRequests.merge(task, {
    sourceBranch: branch,
    targetBranch: task.branch,
    commitMessage: `${task.title} (${task.id})`,
  });
  if (!outcome.merged) {
    logger.warn(`Merging ${branch} into ${task.branch} for ${task.id} did not land: ${outcome.error ?? 'unknown error'}`);
    return;
  }
  deps.store.updateWithVersion(
    task.id,
    task.version,
    { needsRebase: false, executionNotes: `Merged ${branch} into ${task.branch} after rebase` },
    { event: TaskEvent.MERGE_RETRIED, actor: ACTOR, details: { commitHash: outcome.commitHash ?? null } }
  );
  logger.info(`Task ${task.id}: ${branch} merged into ${task.branch} on retry`);
}

/**
 * Archives the worker log, removes the worktree and the task directory. The
 * work branch goes too, but only for done tasks.
 */
async function sweepTask(deps: HousekeepingDeps, task: Task): Promise<void> {
  const runtimeDir = deps.config.orchestrator.runtimeDir;
  const dir = taskDirectoryFor(runtimeDir, task.id);
  const archived = archiveTaskLogs(dir, runtimeDir);
  const deleteBranch = task.queue === TaskQueue.DONE ? workBranchFor(task) : undefined;
  if (fs.existsSync(deps.workspaces.worktreePath(task.id)) || (deleteBranch !== undefined && task.workBranch !== null)) {
    await deps.workspaces.cleanupTask(task.id, { deleteBranch });
  }
  removeTaskDirectory(dir);
  logger.info(
    `Swept ${task.queue} task ${task.id}` +
      (archived ? `, log archived to ${archived}` : '') +
      (deleteBranch ? `, branch ${deleteBranch} deleted` : '')
  );
}
