/**
 * Lease Service
 *
 * The claim protocol. A claim is one conditional update against the task's
 * queue and version; losing the race to another claimant is not an error,
 * the next candidate is tried instead. A lease bounds how long the claim is
 * honoured, and its expiry is how a silent worker gets timed out.
 *
 * @module
 */

import type { Task, Clock, ClaimIntent } from '@tasklane/core';
import {
  TaskQueue,
  TaskEvent,
  systemClock,
  addSeconds,
  createTimestamp,
  isLeaseExpired,
  claimConflict,
  leaseNotHeld,
  leaseExpired,
} from '@tasklane/core';
import type { TaskStore, TaskPatch } from '../store/task-store.js';
import { CLEAR_CLAIM } from '../store/task-store.js';
import type { FlowRegistry } from '../flow/registry.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('lease-service');

/** Candidates fetched per claim attempt */
export const CLAIM_BATCH_SIZE = 10;

// ============================================================================
// Types
// ============================================================================

export interface ClaimRequest {
  sourceQueue: string;
  /** `work` moves the task to claimed; `review` leaves it in the source queue */
  intent: ClaimIntent;
  /** Identity recorded in claimed_by */
  agent: string;
  orchestratorId: string;
  leaseSeconds: number;
  /** Claimant role; omitted matches tasks of any role */
  role?: string | null;
  cluster?: string;
}

export interface FailAttemptOptions {
  reason: string;
  actor?: string;
  event?: TaskEvent;
}

export interface LeaseServiceOptions {
  clock?: Clock;
}

// ============================================================================
// LeaseService
// ============================================================================

export class LeaseService {
  private readonly clock: Clock;

  constructor(
    private readonly store: TaskStore,
    private readonly registry: FlowRegistry,
    options: LeaseServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Claims the first eligible task in claim order.
   *
   * @returns the claimed task, or null when nothing could be claimed
   */
  claim(request: ClaimRequest): Task | null {
    const candidates = this.store.selectClaimCandidates({
      sourceQueue: request.sourceQueue,
      cluster: request.cluster,
      role: request.role,
      limit: CLAIM_BATCH_SIZE,
    });

    for (const candidate of candidates) {
      if (
        request.intent === 'work' &&
        !this.registry.canTransition(candidate.flow, candidate.cluster, candidate.queue, TaskQueue.CLAIMED)
      ) {
        logger.debug(`Skipping ${candidate.id}: flow ${candidate.flow} has no ${candidate.queue} -> claimed`);
        continue;
      }

      const now = this.clock();
      const patch: TaskPatch = {
        claimedBy: request.agent,
        claimedAt: now.toISOString(),
        leaseExpiresAt: addSeconds(now, request.leaseSeconds),
        orchestratorId: request.orchestratorId,
      };
      if (request.intent === 'work') {
        patch.queue = TaskQueue.CLAIMED;
      }

      const claimed = this.store.compareAndSwap(candidate.id, candidate.queue, candidate.version, patch, {
        event: TaskEvent.CLAIMED,
        actor: request.agent,
        details: { intent: request.intent, orchestratorId: request.orchestratorId, leaseExpiresAt: patch.leaseExpiresAt },
      });
      if (claimed) {
        logger.info(`${request.agent} claimed ${claimed.id} (${request.intent}) until ${claimed.leaseExpiresAt}`);
        return claimed;
      }
      logger.debug(claimConflict(candidate.id, { agent: request.agent }).message);
    }
    return null;
  }

  /**
   * Extends the holder's lease.
   *
   * @throws ConstraintError if the agent does not hold a live lease
   */
  renewLease(taskId: string, agent: string, leaseSeconds: number): Task {
    const task = this.store.getOrThrow(taskId);
    this.assertHolder(task, agent);
    const leaseExpiresAt = addSeconds(this.clock(), leaseSeconds);
    return this.store.updateWithVersion(
      task.id,
      task.version,
      { leaseExpiresAt },
      { event: TaskEvent.LEASE_RENEWED, actor: agent, details: { leaseExpiresAt } }
    );
  }

  /**
   * Gives a claim back without counting an attempt. A work claim returns the
   * task to incoming; a review claim leaves it where it is.
   */
  release(taskId: string, agent: string, reason?: string): Task {
    const task = this.store.getOrThrow(taskId);
    if (task.claimedBy !== agent) {
      throw leaseNotHeld(task.id, agent, task.claimedBy);
    }
    const patch: TaskPatch = { ...CLEAR_CLAIM };
    if (task.queue === TaskQueue.CLAIMED) {
      patch.queue = TaskQueue.INCOMING;
    }
    return this.store.updateWithVersion(task.id, task.version, patch, {
      event: TaskEvent.RELEASED,
      actor: agent,
      details: reason !== undefined ? { reason } : {},
    });
  }

  /**
   * Ends an expired lease. Work claims count as a failed attempt; review
   * claims just drop the claim so another reviewer can take the task.
   */
  expireLease(task: Task, actor = 'housekeeping'): Task {
    const reason = `Lease expired at ${task.leaseExpiresAt ?? 'unknown'}`;
    if (task.queue !== TaskQueue.CLAIMED) {
      return this.store.updateWithVersion(task.id, task.version, { ...CLEAR_CLAIM }, {
        event: TaskEvent.LEASE_EXPIRED,
        actor,
        details: { reason },
      });
    }
    return this.failAttempt(task, { reason, actor, event: TaskEvent.LEASE_EXPIRED });
  }

  /**
   * Counts a failed attempt: back to incoming while the retry budget lasts,
   * to failed once attempt_count reaches max_attempts.
   */
  failAttempt(task: Task, options: FailAttemptOptions): Task {
    const attemptCount = task.attemptCount + 1;
    const exhausted = attemptCount >= task.maxAttempts;
    const patch: TaskPatch = {
      ...CLEAR_CLAIM,
      queue: exhausted ? TaskQueue.FAILED : TaskQueue.INCOMING,
      attemptCount,
      executionNotes: options.reason,
    };
    if (exhausted) {
      patch.completedAt = createTimestamp(this.clock);
    }
    const updated = this.store.updateWithVersion(task.id, task.version, patch, {
      event: exhausted ? TaskEvent.FAILED : (options.event ?? TaskEvent.REQUEUED),
      actor: options.actor ?? null,
      details: { reason: options.reason, attemptCount, maxAttempts: task.maxAttempts },
    });
    if (exhausted) {
      logger.warn(`Task ${task.id} failed after ${attemptCount} attempts: ${options.reason}`);
    } else {
      logger.info(`Task ${task.id} requeued (attempt ${attemptCount}/${task.maxAttempts}): ${options.reason}`);
    }
    return updated;
  }

  private assertHolder(task: Task, agent: string): void {
    if (task.claimedBy !== agent) {
      throw leaseNotHeld(task.id, agent, task.claimedBy);
    }
    if (task.leaseExpiresAt !== null && isLeaseExpired(task, this.clock())) {
      throw leaseExpired(task.id, task.leaseExpiresAt);
    }
  }
}
