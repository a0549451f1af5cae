/**
 * Transition guards
 *
 * Each guard inspects the task as read before the mutation and returns the
 * error that rejects the transition, or undefined to let it through.
 */

import type { Task, TasklaneError } from '@tasklane/core';
import {
  TaskQueue,
  isLeaseExpired,
  pendingChecks,
  dependencyUnresolved,
  roleMismatch,
  leaseNotHeld,
  leaseExpired,
  concurrentModification,
  checksPending,
} from '@tasklane/core';
import type { TaskStore } from '../store/task-store.js';
import type { GuardName } from './types.js';

export interface GuardContext {
  /** Agent performing the transition */
  actor?: string | null;
  /** Role of the claimant */
  role?: string;
  /** Version the caller last read */
  expectedVersion?: number;
  /** Applying a finished worker's result: a lapsed lease still counts */
  acceptExpiredLease?: boolean;
  now: Date;
  store: TaskStore;
}

export type TransitionGuard = (task: Task, ctx: GuardContext) => TasklaneError | undefined;

export const TRANSITION_GUARDS: Record<GuardName, TransitionGuard> = {
  dependency_resolved: (task, ctx) => {
    if (task.blockedBy === null) return undefined;
    const blocker = ctx.store.get(task.blockedBy);
    return blocker?.queue === TaskQueue.DONE ? undefined : dependencyUnresolved(task.id, task.blockedBy);
  },

  role_matches: (task, ctx) => {
    if (task.role === null || ctx.role === undefined || ctx.role === task.role) return undefined;
    return roleMismatch(task.id, ctx.role, task.role);
  },

  lease_valid: (task, ctx) => {
    if (task.claimedBy === null) {
      return leaseNotHeld(task.id, ctx.actor ?? 'unknown', null);
    }
    if (ctx.actor && ctx.actor !== task.claimedBy) {
      return leaseNotHeld(task.id, ctx.actor, task.claimedBy);
    }
    if (!ctx.acceptExpiredLease && task.leaseExpiresAt !== null && isLeaseExpired(task, ctx.now)) {
      return leaseExpired(task.id, task.leaseExpiresAt);
    }
    return undefined;
  },

  version_matches: (task, ctx) => {
    if (ctx.expectedVersion === undefined || ctx.expectedVersion === task.version) return undefined;
    return concurrentModification(task.id, ctx.expectedVersion, { actual: task.version });
  },

  checks_passed: (task) => {
    const pending = pendingChecks(task);
    return pending.length === 0 ? undefined : checksPending(task.id, pending);
  },
};

/**
 * Throws the first failing guard's error.
 */
export function checkTransitionGuards(guards: readonly GuardName[], task: Task, ctx: GuardContext): void {
  for (const name of guards) {
    const error = TRANSITION_GUARDS[name](task, ctx);
    if (error) {
      throw error;
    }
  }
}
