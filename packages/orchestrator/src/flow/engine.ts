/**
 * Flow Engine
 *
 * Applies a flow transition to a task:
 *
 *  1. reject tasks in a terminal queue and transitions the flow lacks
 *  2. check the transition's guards against the task as read
 *  3. commit the queue change with a version-checked conditional update
 *  4. run the effects in order, recording failures without rolling back
 */

import type { Task, Clock } from '@tasklane/core';
import {
  TaskEvent,
  systemClock,
  isTerminalQueue,
  immutable,
  invalidTransition,
  concurrentModification,
  errorMessage,
} from '@tasklane/core';
import type { TaskStore, TaskPatch } from '../store/task-store.js';
import { createLogger } from '../utils/logger.js';
import { transitionKey } from './types.js';
import type { TransitionDefinition } from './types.js';
import type { FlowRegistry } from './registry.js';
import { checkTransitionGuards } from './guards.js';
import {
  createBuiltinEffects,
  type EffectContext,
  type EffectHandler,
  type EffectOutcome,
  type EffectResult,
  type EffectServices,
} from './effects.js';

const logger = createLogger('flow-engine');

export interface TransitionOptions {
  /** Agent performing the transition; checked by lease_valid */
  actor?: string | null;
  /** Claimant role; checked by role_matches */
  role?: string;
  /** Let lease_valid pass on a lease that lapsed while the worker finished */
  acceptExpiredLease?: boolean;
  /** Version the caller read; defaults to the task's own */
  expectedVersion?: number;
  /** Extra fields committed together with the queue change */
  patch?: TaskPatch;
  /** History event for the commit (default: transitioned) */
  event?: string;
  details?: Record<string, unknown>;
}

export interface TransitionResult {
  task: Task;
  effects: EffectOutcome[];
}

export interface FlowEngineOptions {
  clock?: Clock;
  services?: EffectServices;
}

export class FlowEngine {
  private readonly clock: Clock;
  private readonly effects: Map<string, EffectHandler>;

  constructor(
    private readonly store: TaskStore,
    private readonly registry: FlowRegistry,
    options: FlowEngineOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.effects = createBuiltinEffects(options.services);
  }

  /**
   * Registers a custom effect, or replaces a built-in one.
   */
  registerEffect(name: string, handler: EffectHandler): void {
    this.effects.set(name, handler);
  }

  canTransition(task: Task, to: string): boolean {
    return this.registry.canTransition(task.flow, task.cluster, task.queue, to);
  }

  /**
   * @throws ConstraintError if the task is terminal or a guard fails
   * @throws ValidationError if the flow has no such transition
   * @throws ConflictError if the task changed since it was read
   */
  async applyTransition(task: Task, to: string, options: TransitionOptions = {}): Promise<TransitionResult> {
    if (isTerminalQueue(task.queue)) {
      throw immutable(task.id, task.queue);
    }
    const flow = this.registry.require(task.flow, task.cluster);
    const transition = flow.transitions.find((t) => t.from === task.queue && t.to === to);
    if (!transition) {
      throw invalidTransition(task.queue, to, { taskId: task.id, flow: flow.name, cluster: flow.cluster });
    }

    const actor = options.actor ?? null;
    const expectedVersion = options.expectedVersion ?? task.version;
    checkTransitionGuards(transition.guards, task, {
      actor,
      role: options.role,
      expectedVersion: options.expectedVersion,
      acceptExpiredLease: options.acceptExpiredLease,
      now: this.clock(),
      store: this.store,
    });

    const commitEvent = options.event ?? TaskEvent.TRANSITIONED;
    const outcomes: EffectOutcome[] = [];
    const base = { previous: task, transition, flow, actor, commitEvent, store: this.store };

    const committed = this.store.compareAndSwap(
      task.id,
      task.queue,
      expectedVersion,
      { ...options.patch, queue: to },
      {
        event: commitEvent,
        actor,
        details: { flow: flow.name, transition: transitionKey(task.queue, to), ...options.details },
      }
    );
    if (!committed) {
      throw concurrentModification(task.id, expectedVersion, { to });
    }

    let current = committed;
    for (const name of transition.effects) {
      const run = await this.runEffect(name, { ...base, task: current });
      const error = run.error ?? run.result?.error;
      if (error !== undefined) {
        outcomes.push({ name, status: 'failed', error });
        current = this.recordEffectFailure(current, name, error, actor, run.result?.patch);
        continue;
      }
      const patch = run.result?.patch;
      if (patch && Object.keys(patch).length > 0) {
        current = this.store.updateWithVersion(current.id, current.version, patch, {
          event: TaskEvent.UPDATED,
          actor,
          details: { effect: name },
        });
      }
      outcomes.push({ name, status: run.result?.status ?? 'ok' });
    }

    return { task: current, effects: outcomes };
  }

  /** Transitions the task's flow allows out of its current queue */
  transitionsFor(task: Task): TransitionDefinition[] {
    return this.registry.transitionsFrom(task.flow, task.cluster, task.queue);
  }

  private async runEffect(name: string, ctx: EffectContext): Promise<{ result?: EffectResult; error?: string }> {
    const handler = this.effects.get(name);
    if (!handler) {
      return { error: `Unknown effect: ${name}` };
    }
    try {
      return { result: await handler(ctx) };
    } catch (error) {
      return { error: errorMessage(error) };
    }
  }

  private recordEffectFailure(
    task: Task,
    name: string,
    error: string,
    actor: string | null,
    patch: TaskPatch = {}
  ): Task {
    logger.warn(`Effect ${name} failed for ${task.id}: ${error}`);
    return this.store.updateWithVersion(
      task.id,
      task.version,
      { ...patch, executionNotes: `${name}: ${error}` },
      { event: TaskEvent.EFFECT_FAILED, actor, details: { effect: name, error } }
    );
  }
}
