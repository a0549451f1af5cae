/**
 * Review Service
 *
 * Submit, accept and reject, plus check recording. Each runs through the
 * flow engine so the task's flow decides which moves are legal.
 *
 * @module
 */

import type { Task, CheckStatus, Clock } from '@tasklane/core';
import { TaskQueue, TaskEvent, systemClock, createTimestamp, pendingChecks } from '@tasklane/core';
import type { TaskStore } from '../store/task-store.js';
import { CLEAR_CLAIM } from '../store/task-store.js';
import type { FlowEngine, TransitionResult } from '../flow/engine.js';
import { checkTransitionGuards } from '../flow/guards.js';
import { GuardName } from '../flow/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('review-service');

export interface SubmitOptions {
  /** Worker's summary, kept in execution_notes */
  notes?: string;
  /** Set when applying a worker's result after its lease lapsed */
  acceptExpiredLease?: boolean;
}

export interface RecordCheckResult {
  task: Task;
  /** Set when a failing check sent the task back */
  rejection?: TransitionResult;
}

export class ReviewService {
  private readonly clock: Clock;

  constructor(
    private readonly store: TaskStore,
    private readonly engine: FlowEngine,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * claimed -> provisional. Only the holder of a live lease may submit,
   * whatever guards the flow lists.
   */
  async submit(taskId: string, agent: string, options: SubmitOptions = {}): Promise<TransitionResult> {
    const task = this.store.getOrThrow(taskId);
    checkTransitionGuards([GuardName.LEASE_VALID], task, {
      actor: agent,
      acceptExpiredLease: options.acceptExpiredLease,
      now: this.clock(),
      store: this.store,
    });
    return this.engine.applyTransition(task, TaskQueue.PROVISIONAL, {
      actor: agent,
      acceptExpiredLease: options.acceptExpiredLease,
      event: TaskEvent.SUBMITTED,
      patch: {
        ...CLEAR_CLAIM,
        submittedAt: createTimestamp(this.clock),
        executionNotes: options.notes,
      },
    });
  }

  /**
   * provisional -> done. The merge runs after the move; a conflict leaves
   * the task done with needs_rebase set for the merge-retry job.
   */
  async accept(taskId: string, actor: string): Promise<TransitionResult> {
    const task = this.store.getOrThrow(taskId);
    const result = await this.engine.applyTransition(task, TaskQueue.DONE, {
      actor,
      event: TaskEvent.ACCEPTED,
      patch: { ...CLEAR_CLAIM, completedAt: createTimestamp(this.clock) },
    });
    logger.info(`Task ${taskId} accepted by ${actor}`);
    return result;
  }

  /**
   * provisional -> incoming. Counts the rejection and clears the claim; the
   * work branch stays so the next attempt can build on it.
   */
  async reject(taskId: string, actor: string, reason: string): Promise<TransitionResult> {
    const task = this.store.getOrThrow(taskId);
    const result = await this.engine.applyTransition(task, TaskQueue.INCOMING, {
      actor,
      event: TaskEvent.REJECTED,
      patch: {
        ...CLEAR_CLAIM,
        rejectionCount: task.rejectionCount + 1,
        executionNotes: reason,
      },
      details: { reason },
    });
    logger.info(`Task ${taskId} rejected by ${actor} (rejection ${result.task.rejectionCount}): ${reason}`);
    return result;
  }

  /**
   * Records one check. A failing check on a provisional task rejects it;
   * all checks passing leaves it provisional, ready for acceptance.
   */
  async recordCheck(
    taskId: string,
    name: string,
    status: CheckStatus,
    summary: string,
    actor: string
  ): Promise<RecordCheckResult> {
    const task = this.store.recordCheckResult(taskId, name, status, summary, actor);
    if (task.queue !== TaskQueue.PROVISIONAL) {
      return { task };
    }
    if (status === 'fail') {
      const rejection = await this.reject(taskId, actor, `Check ${name} failed: ${summary}`);
      return { task: rejection.task, rejection };
    }
    if (pendingChecks(task).length === 0) {
      logger.info(`Task ${taskId} passed all checks and awaits acceptance`);
    }
    return { task };
  }
}
