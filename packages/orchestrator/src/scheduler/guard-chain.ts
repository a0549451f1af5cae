/**
 * Guard Chain
 *
 * Ordered eligibility checks run for each free slot of a blueprint before a
 * claim is attempted. The first guard that blocks stops the chain; blocking
 * is a normal scheduling outcome, logged at debug level only.
 *
 * @module
 */

import { TaskQueue, errorMessage } from '@tasklane/core';
import type { BlueprintConfig, QueueLimitsSection } from '../config/types.js';
import type { TaskStore } from '../store/task-store.js';
import type { InstanceTracker, ProcessProbe } from '../pool/instance-tracker.js';
import { runCommand } from '../services/check-runner.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('guard-chain');

export interface GuardVerdict {
  proceed: boolean;
  reason?: string;
}

export interface GuardChainContext {
  blueprint: BlueprintConfig;
  slot: number;
  cluster: string;
  /** System-wide pause */
  paused: boolean;
  now: Date;
  /** When the blueprint last spawned, if ever */
  lastSpawnAt?: Date;
  queueLimits: QueueLimitsSection;
  store: TaskStore;
  instances: InstanceTracker;
  probe: ProcessProbe;
  /** Where the pre-check runs */
  cwd: string;
}

export type SchedulerGuard = (ctx: GuardChainContext) => GuardVerdict | Promise<GuardVerdict>;

export interface NamedGuard {
  name: string;
  check: SchedulerGuard;
}

const PROCEED: GuardVerdict = { proceed: true };

function blocked(reason: string): GuardVerdict {
  return { proceed: false, reason };
}

// ============================================================================
// Guards
// ============================================================================

export const pausedGuard: SchedulerGuard = (ctx) => {
  if (ctx.paused) return blocked('system paused');
  if (ctx.blueprint.paused) return blocked(`blueprint ${ctx.blueprint.name} paused`);
  return PROCEED;
};

/**
 * A slot with a recorded pid is busy while the probe says the process
 * lives. A dead one stays busy until the reaper has applied its result and
 * removed the record; this guard never removes it.
 */
export const livenessGuard: SchedulerGuard = (ctx) => {
  const instance = ctx.instances.forSlot(ctx.blueprint.name, ctx.slot);
  if (!instance) return PROCEED;
  if (ctx.probe.isAlive(instance.pid)) {
    return blocked(`slot ${ctx.slot} running pid ${instance.pid}`);
  }
  return blocked(`slot ${ctx.slot} pid ${instance.pid} exited, awaiting reap`);
};

export const intervalGuard: SchedulerGuard = (ctx) => {
  if (ctx.lastSpawnAt === undefined || ctx.blueprint.interval <= 0) return PROCEED;
  const elapsed = ctx.now.getTime() - ctx.lastSpawnAt.getTime();
  if (elapsed < ctx.blueprint.interval) {
    return blocked(`interval: ${elapsed}ms of ${ctx.blueprint.interval}ms elapsed`);
  }
  return PROCEED;
};

/**
 * Needs claimable work in the source queue. Work claims also respect the
 * claimed and provisional ceilings; review claims drain provisional and
 * are not held back by it.
 */
export const backpressureGuard: SchedulerGuard = (ctx) => {
  const { blueprint, store } = ctx;
  const source = blueprint.capabilities.claimSourceQueue;
  const available = store.selectClaimCandidates({
    sourceQueue: source,
    cluster: ctx.cluster,
    role: blueprint.role,
    limit: 1,
  });
  if (available.length === 0) {
    return blocked(`no claimable tasks in ${source}`);
  }
  if (blueprint.capabilities.claimIntent === 'review') {
    return PROCEED;
  }

  const maxClaimed = blueprint.maxClaimed ?? ctx.queueLimits.maxClaimed;
  const claimed = store.count({ queue: TaskQueue.CLAIMED, cluster: ctx.cluster });
  if (claimed >= maxClaimed) {
    return blocked(`claimed ${claimed} >= ${maxClaimed}`);
  }
  const maxProvisional = blueprint.maxProvisional ?? ctx.queueLimits.maxProvisional;
  const provisional = store.count({ queue: TaskQueue.PROVISIONAL, cluster: ctx.cluster });
  if (provisional >= maxProvisional) {
    return blocked(`provisional ${provisional} >= ${maxProvisional}`);
  }
  return PROCEED;
};

export const poolCapacityGuard: SchedulerGuard = (ctx) => {
  const running = ctx.instances.count(ctx.blueprint.name);
  if (running >= ctx.blueprint.maxInstances) {
    return blocked(`${running} of ${ctx.blueprint.maxInstances} instances running`);
  }
  return PROCEED;
};

export const preCheckGuard: SchedulerGuard = async (ctx) => {
  const command = ctx.blueprint.preCheck;
  if (command === undefined) return PROCEED;
  const result = await runCommand(command, { cwd: ctx.cwd, env: ctx.blueprint.env, timeout: 60_000 });
  return result.success ? PROCEED : blocked(`pre-check: ${result.error ?? 'failed'}`);
};

export const DEFAULT_GUARDS: readonly NamedGuard[] = [
  { name: 'paused', check: pausedGuard },
  { name: 'liveness', check: livenessGuard },
  { name: 'interval', check: intervalGuard },
  { name: 'backpressure', check: backpressureGuard },
  { name: 'poolCapacity', check: poolCapacityGuard },
  { name: 'preCheck', check: preCheckGuard },
];

// ============================================================================
// Chain
// ============================================================================

export interface GuardChainResult extends GuardVerdict {
  /** The guard that blocked */
  guard?: string;
}

/**
 * Runs the guards in order. A guard that throws blocks the slot and is
 * logged; it does not abort the tick.
 */
export async function runGuardChain(
  ctx: GuardChainContext,
  guards: readonly NamedGuard[] = DEFAULT_GUARDS
): Promise<GuardChainResult> {
  for (const guard of guards) {
    let verdict: GuardVerdict;
    try {
      verdict = await guard.check(ctx);
    } catch (error) {
      logger.warn(`Guard ${guard.name} failed for ${ctx.blueprint.name}[${ctx.slot}]: ${errorMessage(error)}`);
      return { proceed: false, guard: guard.name, reason: errorMessage(error) };
    }
    if (!verdict.proceed) {
      logger.debug(`${ctx.blueprint.name}[${ctx.slot}] blocked by ${guard.name}: ${verdict.reason ?? ''}`);
      return { ...verdict, guard: guard.name };
    }
  }
  return PROCEED;
}
