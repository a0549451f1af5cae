/**
 * Transition effects
 *
 * Effects are named side effects a flow transition lists. They run after the
 * queue change commits; a failure is recorded on the task without undoing
 * the move.
 */

import type { Task } from '@tasklane/core';
import { TaskQueue, TaskEvent, mergeConflict } from '@tasklane/core';
import type { TaskStore, TaskPatch } from '../store/task-store.js';
import type { MergeRequestProvider } from '../services/merge-request-provider.js';
import { buildDefaultBody, formatMergeReference } from '../services/merge-request-provider.js';
import { workBranchFor, type Mergeability } from '../git/worktree-manager.js';
import { createLogger } from '../utils/logger.js';
import { BuiltinEffect, transitionKey, type FlowDefinition, type TransitionDefinition } from './types.js';

const logger = createLogger('flow-effects');

// ============================================================================
// Types
// ============================================================================

export interface EffectContext {
  /** The task as it stands when the effect runs */
  task: Task;
  /** The task as read before the transition */
  previous: Task;
  transition: TransitionDefinition;
  flow: FlowDefinition;
  actor: string | null;
  /** History event the queue change was recorded under */
  commitEvent: string;
  store: TaskStore;
}

export interface EffectResult {
  status?: 'ok' | 'skipped';
  /** Fields to write back to the task, on failure too */
  patch?: TaskPatch;
  /** Marks the effect failed without throwing, so the patch still lands */
  error?: string;
}

export type EffectHandler = (ctx: EffectContext) => Promise<EffectResult>;

export interface EffectOutcome {
  name: string;
  status: 'ok' | 'skipped' | 'failed';
  error?: string;
}

export interface TransitionNotification {
  taskId: string;
  title: string;
  flow: string;
  from: string;
  to: string;
  actor: string | null;
}

export interface BranchPublisher {
  /** Materializes and pushes the task's work branch, returning its name */
  publish(task: Task): Promise<string>;
}

export interface MergeabilityChecker {
  /** Trial merge of the task's work branch into its base, leaving no trace */
  checkMergeable(task: Task): Promise<Mergeability>;
}

export interface EffectServices {
  publisher?: BranchPublisher;
  mergeRequests?: MergeRequestProvider;
  mergeability?: MergeabilityChecker;
  notify?: (notification: TransitionNotification) => Promise<void> | void;
}

// ============================================================================
// Built-in effects
// ============================================================================

const SKIPPED: EffectResult = { status: 'skipped' };

export function createBuiltinEffects(services: EffectServices = {}): Map<string, EffectHandler> {
  const effects = new Map<string, EffectHandler>();

  effects.set(BuiltinEffect.RECORD_HISTORY, async (ctx) => {
    // The commit already logged a generic transition entry
    if (ctx.commitEvent === TaskEvent.TRANSITIONED) {
      return SKIPPED;
    }
    ctx.store.appendHistory(
      ctx.task.id,
      {
        event: TaskEvent.TRANSITIONED,
        actor: ctx.actor,
        details: { flow: ctx.flow.name, transition: transitionKey(ctx.transition.from, ctx.transition.to) },
      },
      ctx.previous.queue,
      ctx.task.queue
    );
    return {};
  });

  effects.set(BuiltinEffect.UNBLOCK_DEPENDENTS, async (ctx) => {
    if (ctx.task.queue !== TaskQueue.DONE) {
      return SKIPPED;
    }
    for (const dependent of ctx.store.dependents(ctx.task.id)) {
      if (dependent.queue !== TaskQueue.BLOCKED) continue;
      const moved = ctx.store.compareAndSwap(
        dependent.id,
        TaskQueue.BLOCKED,
        dependent.version,
        { queue: TaskQueue.INCOMING },
        { event: TaskEvent.UNBLOCKED, actor: ctx.actor, details: { unblockedBy: ctx.task.id } }
      );
      if (!moved) {
        logger.debug(`Dependent ${dependent.id} changed while unblocking; left as is`);
      }
    }
    return {};
  });

  effects.set(BuiltinEffect.PUSH_BRANCH, async (ctx) => {
    if (!services.publisher) {
      return SKIPPED;
    }
    const workBranch = await services.publisher.publish(ctx.task);
    return { patch: { workBranch } };
  });

  effects.set(BuiltinEffect.CREATE_PR, async (ctx) => {
    if (!services.mergeRequests) {
      return SKIPPED;
    }
    const sourceBranch = workBranchFor(ctx.task);
    const result = await services.mergeRequests.createMergeRequest(ctx.task, {
      title: ctx.task.title,
      body: buildDefaultBody(ctx.task),
      sourceBranch,
      targetBranch: ctx.task.branch,
    });
    return { patch: { prReference: formatMergeReference(result, sourceBranch) } };
  });

  // Advisory: a conflict is reported to the reviewer, the transition stands
  effects.set(BuiltinEffect.CHECK_MERGEABLE, async (ctx) => {
    if (!services.mergeability || ctx.task.workBranch === null) {
      return SKIPPED;
    }
    const result = await services.mergeability.checkMergeable(ctx.task);
    if (result.mergeable) {
      return ctx.task.needsRebase ? { patch: { needsRebase: false } } : {};
    }
    const conflict = mergeConflict(workBranchFor(ctx.task), ctx.task.branch, { files: result.conflictFiles });
    const advisory = result.conflictFiles.length > 0 ? `${conflict.message}: ${result.conflictFiles.join(', ')}` : conflict.message;
    logger.warn(`Task ${ctx.task.id}: ${advisory}`);
    ctx.store.appendHistory(
      ctx.task.id,
      {
        event: TaskEvent.MERGE_CONFLICT_DETECTED,
        actor: ctx.actor,
        details: { code: conflict.code, ...conflict.details },
      },
      ctx.task.queue,
      ctx.task.queue
    );
    const notes = ctx.task.executionNotes ? `${ctx.task.executionNotes}\n\n${advisory}` : advisory;
    return { patch: { needsRebase: true, executionNotes: notes } };
  });

  effects.set(BuiltinEffect.MERGE_PR, async (ctx) => {
    if (!services.mergeRequests) {
      return SKIPPED;
    }
    const sourceBranch = workBranchFor(ctx.task);
    const outcome = await services.mergeRequests.merge(ctx.task, {
      sourceBranch,
      targetBranch: ctx.task.branch,
      commitMessage: `${ctx.task.title} (${ctx.task.id})`,
    });
    if (outcome.conflict) {
      const files = outcome.conflictFiles?.length ? `: ${outcome.conflictFiles.join(', ')}` : '';
      return {
        error: `Merge conflict merging ${sourceBranch} into ${ctx.task.branch}${files}`,
        patch: { needsRebase: true },
      };
    }
    if (!outcome.merged) {
      return { error: outcome.error ?? `Merging ${sourceBranch} failed` };
    }
    return { patch: { needsRebase: false } };
  });

  effects.set(BuiltinEffect.NOTIFY, async (ctx) => {
    const notification: TransitionNotification = {
      taskId: ctx.task.id,
      title: ctx.task.title,
      flow: ctx.flow.name,
      from: ctx.previous.queue,
      to: ctx.task.queue,
      actor: ctx.actor,
    };
    logger.info(`Task ${notification.taskId} moved ${notification.from} -> ${notification.to}`);
    if (!services.notify) {
      return SKIPPED;
    }
    await services.notify(notification);
    return {};
  });

  return effects;
}
