/**
 * Scheduler
 *
 * The tick loop. Each tick runs housekeeping, then (unless paused) walks the
 * blueprints in configuration order and, for each free slot, runs the guard
 * chain, claims a task, prepares its workspace and task directory, and
 * spawns a worker. Workers are never awaited; their exit is picked up by
 * the reaper on a later tick.
 *
 * @module
 */

import { EventEmitter } from 'node:events';
import type { Task, Clock, OrchestrationError } from '@tasklane/core';
import { TaskEvent, systemClock, createTimestamp, errorMessage, spawnFailed } from '@tasklane/core';
import type { BlueprintConfig, Configuration } from '../config/types.js';
import type { TaskStore } from '../store/task-store.js';
import type { LeaseService } from '../services/lease-service.js';
import type { Housekeeping, HousekeepingJobReport } from '../services/housekeeping.js';
import type { WorkspaceManager } from '../git/worktree-manager.js';
import { workBranchFor } from '../git/worktree-manager.js';
import type { AgentInstance, InstanceTracker, ProcessProbe } from '../pool/instance-tracker.js';
import { systemProcessProbe } from '../pool/instance-tracker.js';
import type { WorkerSpawner } from '../runtime/spawner.js';
import { taskDirectoryFor, prepareTaskDirectory } from '../runtime/task-directory.js';
import { runGuardChain, DEFAULT_GUARDS, type NamedGuard } from './guard-chain.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('scheduler');

const ACTOR = 'scheduler';

/** How long stop() waits for an in-flight tick */
const STOP_TIMEOUT_MS = 30_000;

// ============================================================================
// Types
// ============================================================================

export interface BlockedSlot {
  blueprint: string;
  slot: number;
  guard: string;
  reason?: string;
}

export interface TickResult {
  startedAt: string;
  completedAt: string;
  paused: boolean;
  housekeeping: HousekeepingJobReport[];
  spawned: AgentInstance[];
  blocked: BlockedSlot[];
  /** Tasks put back after a failed spawn */
  requeued: string[];
}

export interface SchedulerStatus {
  running: boolean;
  paused: boolean;
  orchestratorId: string;
  instances: AgentInstance[];
  lastTick?: TickResult;
}

export interface SchedulerEvents {
  'tick:start': [startedAt: string];
  'tick:complete': [result: TickResult];
  'agent:spawned': [instance: AgentInstance];
  'task:claimed': [task: Task, blueprint: string];
  'task:requeued': [task: Task, reason: string];
  'housekeeping:error': [job: string, error: OrchestrationError];
}

export interface SchedulerDeps {
  config: Configuration;
  orchestratorId: string;
  store: TaskStore;
  leases: LeaseService;
  instances: InstanceTracker;
  housekeeping: Housekeeping;
  workspaces: WorkspaceManager;
  spawner: WorkerSpawner;
  probe?: ProcessProbe;
  guards?: readonly NamedGuard[];
  clock?: Clock;
}

/** claimed_by of a blueprint slot's worker */
export function agentIdentity(blueprint: BlueprintConfig, slot: number): string {
  return `${blueprint.name}-${slot}`;
}

// ============================================================================
// Scheduler
// ============================================================================

export class Scheduler {
  private readonly config: Configuration;
  private readonly orchestratorId: string;
  private readonly store: TaskStore;
  private readonly leases: LeaseService;
  private readonly instances: InstanceTracker;
  private readonly housekeeping: Housekeeping;
  private readonly workspaces: WorkspaceManager;
  private readonly spawner: WorkerSpawner;
  private readonly probe: ProcessProbe;
  private readonly guards: readonly NamedGuard[];
  private readonly clock: Clock;
  private readonly emitter = new EventEmitter();
  private readonly lastSpawnAt = new Map<string, Date>();

  private running = false;
  private paused: boolean;
  private tickIntervalHandle?: NodeJS.Timeout;
  private currentTick?: Promise<TickResult>;
  private lastTick?: TickResult;

  constructor(deps: SchedulerDeps) {
    this.config = deps.config;
    this.orchestratorId = deps.orchestratorId;
    this.store = deps.store;
    this.leases = deps.leases;
    this.instances = deps.instances;
    this.housekeeping = deps.housekeeping;
    this.workspaces = deps.workspaces;
    this.spawner = deps.spawner;
    this.probe = deps.probe ?? systemProcessProbe;
    this.guards = deps.guards ?? DEFAULT_GUARDS;
    this.clock = deps.clock ?? systemClock;
    this.paused = deps.config.orchestrator.paused;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info(
      `Scheduler ${this.orchestratorId} started: ${this.config.blueprints.length} blueprint(s), ` +
        `tick every ${this.config.orchestrator.tickInterval}ms, ${this.instances.count()} tracked instance(s)`
    );
    this.tickIntervalHandle = setInterval(() => {
      this.tick().catch((error) => {
        logger.error(`Tick failed: ${errorMessage(error)}`);
      });
    }, this.config.orchestrator.tickInterval);
    this.tick().catch((error) => {
      logger.error(`Initial tick failed: ${errorMessage(error)}`);
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.tickIntervalHandle) {
      clearInterval(this.tickIntervalHandle);
      this.tickIntervalHandle = undefined;
    }
    if (this.currentTick) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(() => {
          logger.warn(`In-flight tick still running after ${STOP_TIMEOUT_MS}ms; stopping anyway`);
          resolve();
        }, STOP_TIMEOUT_MS);
      });
      await Promise.race([this.currentTick.then(() => undefined, () => undefined), timeout]);
      clearTimeout(timer);
    }
    logger.info(`Scheduler ${this.orchestratorId} stopped`);
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Suspends claims and spawns. Reaping and housekeeping continue. */
  pause(): void {
    this.paused = true;
    logger.info('Scheduling paused');
  }

  resume(): void {
    this.paused = false;
    logger.info('Scheduling resumed');
  }

  isPaused(): boolean {
    return this.paused;
  }

  status(): SchedulerStatus {
    return {
      running: this.running,
      paused: this.paused,
      orchestratorId: this.orchestratorId,
      instances: this.instances.list(),
      lastTick: this.lastTick,
    };
  }

  // --------------------------------------------------------------------------
  // Ticks
  // --------------------------------------------------------------------------

  /**
   * Runs one tick. A call while a tick is in flight joins that tick.
   */
  tick(): Promise<TickResult> {
    if (this.currentTick) {
      return this.currentTick;
    }
    const current = this.runTick().finally(() => {
      this.currentTick = undefined;
    });
    this.currentTick = current;
    return current;
  }

  /**
   * Single-shot mode: registers the orchestrator and runs one tick without
   * starting the loop.
   */
  async runOnce(): Promise<TickResult> {
    this.store.registerOrchestrator(this.orchestratorId, this.config.orchestrator.cluster, this.config.orchestrator.machine);
    return this.tick();
  }

  private async runTick(): Promise<TickResult> {
    const startedAt = createTimestamp(this.clock);
    this.emitter.emit('tick:start', startedAt);

    const housekeeping = await this.housekeeping.runDue();
    for (const report of housekeeping) {
      if (report.error) {
        this.emitter.emit('housekeeping:error', report.name, report.error);
      }
    }

    const result: TickResult = {
      startedAt,
      completedAt: startedAt,
      paused: this.paused,
      housekeeping,
      spawned: [],
      blocked: [],
      requeued: [],
    };

    if (!this.paused) {
      for (const blueprint of this.config.blueprints) {
        await this.scheduleBlueprint(blueprint, result);
      }
    }

    result.completedAt = createTimestamp(this.clock);
    this.lastTick = result;
    this.emitter.emit('tick:complete', result);
    return result;
  }

  private async scheduleBlueprint(blueprint: BlueprintConfig, result: TickResult): Promise<void> {
    for (let slot = 0; slot < blueprint.maxInstances; slot++) {
      const verdict = await runGuardChain(
        {
          blueprint,
          slot,
          cluster: this.config.orchestrator.cluster,
          paused: this.paused,
          now: this.clock(),
          lastSpawnAt: this.lastSpawnAt.get(blueprint.name),
          queueLimits: this.config.queueLimits,
          store: this.store,
          instances: this.instances,
          probe: this.probe,
          cwd: this.config.workspace.repoRoot,
        },
        this.guards
      );
      if (!verdict.proceed) {
        result.blocked.push({ blueprint: blueprint.name, slot, guard: verdict.guard ?? 'unknown', reason: verdict.reason });
        // An occupied slot says nothing about the next one
        if (verdict.guard === 'liveness') continue;
        return;
      }

      const agent = agentIdentity(blueprint, slot);
      const task = this.leases.claim({
        sourceQueue: blueprint.capabilities.claimSourceQueue,
        intent: blueprint.capabilities.claimIntent,
        agent,
        orchestratorId: this.orchestratorId,
        leaseSeconds: blueprint.capabilities.leaseSeconds ?? Math.ceil(this.config.leases.duration / 1000),
        role: blueprint.role,
        cluster: this.config.orchestrator.cluster,
      });
      if (!task) {
        result.blocked.push({ blueprint: blueprint.name, slot, guard: 'claim', reason: 'no task claimed' });
        return;
      }
      this.emitter.emit('task:claimed', task, blueprint.name);

      try {
        const instance = await this.spawnWorker(blueprint, slot, agent, task);
        this.lastSpawnAt.set(blueprint.name, this.clock());
        result.spawned.push(instance);
        this.emitter.emit('agent:spawned', instance);
      } catch (error) {
        const requeued = this.handleSpawnFailure(blueprint, agent, task, error);
        if (requeued) {
          result.requeued.push(task.id);
          this.emitter.emit('task:requeued', requeued, errorMessage(error));
        }
      }
    }
  }

  private async spawnWorker(blueprint: BlueprintConfig, slot: number, agent: string, task: Task): Promise<AgentInstance> {
    const needsWorkspace = blueprint.capabilities.needsWorkspace;
    const freshWorkspace = needsWorkspace && this.workspaces.open(task.id) === undefined;
    try {
      const worktree = needsWorkspace ? (await this.workspaces.prepare(task)).path : undefined;
      return this.launch(blueprint, slot, agent, task, worktree);
    } catch (error) {
      // A reused workspace may hold earlier work; only a fresh one goes
      if (freshWorkspace) {
        await this.discardWorkspace(task.id);
      }
      throw error;
    }
  }

  private launch(blueprint: BlueprintConfig, slot: number, agent: string, task: Task, worktree: string | undefined): AgentInstance {
    const dir = taskDirectoryFor(this.config.orchestrator.runtimeDir, task.id);
    const env = prepareTaskDirectory(dir, task, {
      cluster: this.config.orchestrator.cluster,
      workBranch: workBranchFor(task),
      worktree,
      scriptsSource: blueprint.scriptsDir,
      env: blueprint.env,
    });

    const record: Omit<AgentInstance, 'pid'> = {
      blueprint: blueprint.name,
      slot,
      taskId: task.id,
      agent,
      intent: blueprint.capabilities.claimIntent,
      expectedQueue: task.queue,
      taskDir: dir.root,
      startedAt: createTimestamp(this.clock),
      applyFailures: 0,
    };
    const pid = this.spawner.spawn(
      {
        taskId: task.id,
        command: blueprint.command,
        cwd: worktree ?? dir.root,
        env,
        logFile: dir.logFile,
        exitCodeFile: dir.exitCodeFile,
      },
      (spawnedPid) => this.instances.register({ ...record, pid: spawnedPid })
    );
    const instance = this.instances.get(pid);
    if (!instance) {
      throw spawnFailed(task.id, `worker ${pid} was not registered`);
    }
    return instance;
  }

  private async discardWorkspace(taskId: string): Promise<void> {
    try {
      await this.workspaces.cleanupTask(taskId);
    } catch (error) {
      logger.warn(`Removing the workspace of ${taskId} after a failed spawn failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Puts the task straight back: a work claim counts the attempt and
   * returns to incoming, a review claim is released. If that fails too the
   * claim stays for the orphan scan, and undefined is returned.
   */
  private handleSpawnFailure(blueprint: BlueprintConfig, agent: string, task: Task, error: unknown): Task | undefined {
    const failure = spawnFailed(task.id, errorMessage(error), error instanceof Error ? error : undefined);
    logger.error(failure.message);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    try {
      if (blueprint.capabilities.claimIntent === 'review') {
        return this.leases.release(task.id, agent, failure.message);
      }
      const current = this.store.getOrThrow(task.id);
      return this.leases.failAttempt(current, { reason: failure.message, actor: ACTOR, event: TaskEvent.REQUEUED });
    } catch (requeueError) {
      logger.error(`Putting ${task.id} back after a failed spawn failed, leaving it to the orphan scan: ${errorMessage(requeueError)}`);
      return undefined;
    }
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  on<E extends keyof SchedulerEvents>(event: E, listener: (...args: SchedulerEvents[E]) => void): void {
    this.emitter.on(event, listener);
  }

  off<E extends keyof SchedulerEvents>(event: E, listener: (...args: SchedulerEvents[E]) => void): void {
    this.emitter.off(event, listener);
  }
}
