/**
 * Process Tracker
 *
 * Polls tracked workers for exit and applies their results to the task
 * store. A dead worker's record is removed only once its result has been
 * applied (or discarded as stale); a failed application keeps the record so
 * the next tick retries, up to MAX_APPLY_FAILURES.
 *
 * @module
 */

import type { Task, Clock } from '@tasklane/core';
import {
  TaskQueue,
  TaskEvent,
  systemClock,
  createTimestamp,
  isTerminalQueue,
  pendingChecks,
  agentCrashed,
  errorMessage,
} from '@tasklane/core';
import type { TaskStore } from '../store/task-store.js';
import { CLEAR_CLAIM } from '../store/task-store.js';
import type { FlowEngine } from '../flow/engine.js';
import type { LeaseService } from '../services/lease-service.js';
import type { ReviewService } from '../services/review-service.js';
import { taskDirectoryAt } from '../runtime/task-directory.js';
import { createLogger } from '../utils/logger.js';
import type { AgentInstance, InstanceTracker, ProcessProbe } from './instance-tracker.js';
import { systemProcessProbe } from './instance-tracker.js';
import { readAgentExit, type AgentExit } from './worker-result.js';

const logger = createLogger('process-tracker');

/** Consecutive failed result applications before the task is failed */
export const MAX_APPLY_FAILURES = 3;

const POOL_ACTOR = 'pool';

export interface FinishedInstance {
  instance: AgentInstance;
  exit: AgentExit;
}

export type ReapStatus = 'applied' | 'stale' | 'retry' | 'failed';

export interface ReapReport {
  taskId: string;
  pid: number;
  exit: AgentExit['kind'];
  status: ReapStatus;
}

export interface ProcessTrackerDeps {
  store: TaskStore;
  engine: FlowEngine;
  leases: LeaseService;
  reviews: ReviewService;
  instances: InstanceTracker;
  probe?: ProcessProbe;
  clock?: Clock;
}

export class ProcessTracker {
  private readonly store: TaskStore;
  private readonly engine: FlowEngine;
  private readonly leases: LeaseService;
  private readonly reviews: ReviewService;
  private readonly instances: InstanceTracker;
  private readonly probe: ProcessProbe;
  private readonly clock: Clock;

  constructor(deps: ProcessTrackerDeps) {
    this.store = deps.store;
    this.engine = deps.engine;
    this.leases = deps.leases;
    this.reviews = deps.reviews;
    this.instances = deps.instances;
    this.probe = deps.probe ?? systemProcessProbe;
    this.clock = deps.clock ?? systemClock;
  }

  /** Tracked instances whose process is confirmed dead, with their outcome */
  poll(): FinishedInstance[] {
    const finished: FinishedInstance[] = [];
    for (const instance of this.instances.list()) {
      if (this.probe.isAlive(instance.pid)) {
        continue;
      }
      finished.push({ instance, exit: readAgentExit(taskDirectoryAt(instance.taskDir, instance.taskId)) });
    }
    return finished;
  }

  async reapFinished(): Promise<ReapReport[]> {
    const reports: ReapReport[] = [];
    for (const finished of this.poll()) {
      const status = await this.reap(finished);
      reports.push({ taskId: finished.instance.taskId, pid: finished.instance.pid, exit: finished.exit.kind, status });
    }
    return reports;
  }

  isRunning(taskId: string): boolean {
    const instance = this.instances.forTask(taskId);
    return instance !== undefined && this.probe.isAlive(instance.pid);
  }

  async reap(finished: FinishedInstance): Promise<ReapStatus> {
    const { instance, exit } = finished;
    const task = this.store.get(instance.taskId);
    if (!task || task.queue !== instance.expectedQueue || task.claimedBy !== instance.agent) {
      logger.info(
        `Discarding stale ${exit.kind} result from pid ${instance.pid} for ${instance.taskId}` +
          (task ? ` (now ${task.queue}, claimed by ${task.claimedBy ?? 'nobody'})` : ' (task gone)')
      );
      this.instances.remove(instance.pid);
      return 'stale';
    }

    try {
      if (instance.intent === 'review') {
        await this.applyReview(task, instance, exit);
      } else {
        await this.applyWork(task, instance, exit);
      }
    } catch (error) {
      return this.recordApplyFailure(instance, exit, error);
    }
    this.instances.remove(instance.pid);
    return 'applied';
  }

  // --------------------------------------------------------------------------
  // Outcomes
  // --------------------------------------------------------------------------

  private async applyWork(task: Task, instance: AgentInstance, exit: AgentExit): Promise<void> {
    switch (exit.kind) {
      case 'success': {
        const result = await this.reviews.submit(task.id, instance.agent, {
          notes: exit.notes,
          acceptExpiredLease: true,
        });
        logger.info(`Task ${task.id} submitted by ${instance.agent} (now ${result.task.queue})`);
        return;
      }
      case 'needs_continuation': {
        if (!this.engine.canTransition(task, TaskQueue.NEEDS_CONTINUATION)) {
          this.leases.release(task.id, instance.agent, 'needs continuation');
          return;
        }
        await this.engine.applyTransition(task, TaskQueue.NEEDS_CONTINUATION, {
          actor: instance.agent,
          acceptExpiredLease: true,
          patch: { ...CLEAR_CLAIM, executionNotes: exit.notes },
        });
        logger.info(`Task ${task.id} needs continuation`);
        return;
      }
      case 'failure':
        this.leases.failAttempt(task, { reason: exit.reason, actor: instance.agent });
        return;
      case 'crash': {
        const crash = agentCrashed(task.id, instance.pid);
        logger.warn(`${crash.message}: ${exit.reason}`);
        this.leases.failAttempt(task, { reason: `${crash.message} (${exit.reason})`, actor: POOL_ACTOR });
        return;
      }
      case 'review':
        this.leases.failAttempt(task, {
          reason: `Work worker returned a review decision (${exit.decision})`,
          actor: instance.agent,
        });
        return;
    }
  }

  private async applyReview(task: Task, instance: AgentInstance, exit: AgentExit): Promise<void> {
    if (exit.kind !== 'review') {
      const reason = 'reason' in exit ? exit.reason : `review ended without a decision (${exit.kind})`;
      logger.warn(`Review of ${task.id} by ${instance.agent} produced no decision: ${reason}`);
      this.leases.release(task.id, instance.agent, reason);
      return;
    }

    if (exit.decision === 'reject') {
      await this.reviews.reject(task.id, instance.agent, exit.comment || 'Rejected by reviewer');
      return;
    }

    const pending = pendingChecks(task);
    if (pending.length > 0) {
      logger.info(`Approval of ${task.id} waits for checks: ${pending.join(', ')}`);
      this.leases.release(task.id, instance.agent, `approved, waiting for checks: ${pending.join(', ')}`);
      return;
    }
    await this.reviews.accept(task.id, instance.agent);
  }

  // --------------------------------------------------------------------------
  // Circuit breaker
  // --------------------------------------------------------------------------

  private recordApplyFailure(instance: AgentInstance, exit: AgentExit, error: unknown): ReapStatus {
    const failures = instance.applyFailures + 1;
    const message = `Applying ${exit.kind} result failed: ${errorMessage(error)}`;
    logger.error(`${message} (task ${instance.taskId}, attempt ${failures}/${MAX_APPLY_FAILURES})`);

    const task = this.store.get(instance.taskId);
    if (!task || isTerminalQueue(task.queue)) {
      this.instances.remove(instance.pid);
      return 'stale';
    }

    if (failures >= MAX_APPLY_FAILURES) {
      this.store.updateWithVersion(
        task.id,
        task.version,
        { ...CLEAR_CLAIM, queue: TaskQueue.FAILED, completedAt: createTimestamp(this.clock), executionNotes: message },
        { event: TaskEvent.FAILED, actor: POOL_ACTOR, details: { reason: message, applyFailures: failures } }
      );
      this.instances.remove(instance.pid);
      logger.error(`Task ${task.id} failed after ${failures} failed result applications`);
      return 'failed';
    }

    this.instances.update(instance.pid, { applyFailures: failures });
    this.store.updateWithVersion(
      task.id,
      task.version,
      { executionNotes: message },
      { event: TaskEvent.RESULT_APPLY_FAILED, actor: POOL_ACTOR, details: { error: errorMessage(error), applyFailures: failures } }
    );
    return 'retry';
  }
}
