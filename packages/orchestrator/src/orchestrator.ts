/**
 * Orchestrator wiring
 *
 * Builds every service from a loaded configuration: storage, the task
 * store, flows, leases and reviews, git workspaces, the agent pool,
 * housekeeping and the scheduler.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Hono } from 'hono';
import type { Clock } from '@tasklane/core';
import { systemClock } from '@tasklane/core';
import { createNodeStorage, initializeSchema, type StorageBackend } from '@tasklane/storage';
import type { Configuration } from './config/types.js';
import { getOrchestratorId } from './config/config.js';
import { TaskStore } from './store/task-store.js';
import { FlowRegistry, createFlowRegistry } from './flow/registry.js';
import { FlowEngine } from './flow/engine.js';
import type { TransitionNotification } from './flow/effects.js';
import { LeaseService } from './services/lease-service.js';
import { ReviewService } from './services/review-service.js';
import { createMergeRequestProvider, type MergeProviderName } from './services/merge-request-provider.js';
import { Housekeeping, createHousekeepingJobs } from './services/housekeeping.js';
import { WorkspaceManager } from './git/worktree-manager.js';
import { InstanceTracker, systemProcessProbe, type ProcessProbe } from './pool/instance-tracker.js';
import { ProcessTracker } from './pool/process-tracker.js';
import { ProcessSpawner, type WorkerSpawner } from './runtime/spawner.js';
import { taskDirectoryFor } from './runtime/task-directory.js';
import { Scheduler } from './scheduler/scheduler.js';
import { createApp } from './server/index.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('orchestrator');

export interface OrchestratorOptions {
  /** Backend for merge_pr and create_pr (default: local) */
  mergeProvider?: MergeProviderName;
  /** Receives every committed transition */
  notify?: (notification: TransitionNotification) => Promise<void> | void;
  spawner?: WorkerSpawner;
  probe?: ProcessProbe;
  clock?: Clock;
}

export interface Orchestrator {
  config: Configuration;
  orchestratorId: string;
  backend: StorageBackend;
  store: TaskStore;
  registry: FlowRegistry;
  engine: FlowEngine;
  leases: LeaseService;
  reviews: ReviewService;
  workspaces: WorkspaceManager;
  instances: InstanceTracker;
  tracker: ProcessTracker;
  housekeeping: Housekeeping;
  scheduler: Scheduler;
  /** HTTP API over this orchestrator */
  createApp(): Hono;
  /** Stops the scheduler and closes the database */
  close(): Promise<void>;
}

export function createOrchestrator(config: Configuration, options: OrchestratorOptions = {}): Orchestrator {
  const clock = options.clock ?? systemClock;
  const probe = options.probe ?? systemProcessProbe;
  const orchestratorId = getOrchestratorId(config);
  const { runtimeDir, databasePath } = config.orchestrator;

  fs.mkdirSync(runtimeDir, { recursive: true });
  if (databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  }
  const backend = createNodeStorage({ path: databasePath });
  const migration = initializeSchema(backend);
  logger.debug(`Schema at version ${migration.toVersion}`);

  const store = new TaskStore(backend, {
    clock,
    defaultBranch: config.workspace.defaultBaseBranch,
    maxAttempts: config.leases.maxAttempts,
  });
  const registry = createFlowRegistry({ flowsDir: config.flowsDir });

  const workspaces = new WorkspaceManager({
    repoRoot: config.workspace.repoRoot,
    worktreeDir: config.workspace.worktreeDir,
    remote: config.workspace.remote,
    defaultBaseBranch: config.workspace.defaultBaseBranch,
    worktreePathFor: (taskId) => taskDirectoryFor(runtimeDir, taskId).worktree,
  });

  const mergeRequests = createMergeRequestProvider(options.mergeProvider ?? 'local', workspaces);
  const engine = new FlowEngine(store, registry, {
    clock,
    services: {
      publisher: workspaces,
      mergeRequests,
      mergeability: workspaces,
      notify: options.notify,
    },
  });
  const leases = new LeaseService(store, registry, { clock });
  const reviews = new ReviewService(store, engine, { clock });

  const instances = new InstanceTracker({ statePath: path.join(runtimeDir, 'instances.json') });
  const tracker = new ProcessTracker({ store, engine, leases, reviews, instances, probe, clock });
  const housekeeping = new Housekeeping(
    createHousekeepingJobs({
      config,
      orchestratorId,
      store,
      leases,
      reviews,
      instances,
      tracker,
      workspaces,
      mergeRequests,
    }),
    { clock }
  );
  const scheduler = new Scheduler({
    config,
    orchestratorId,
    store,
    leases,
    instances,
    housekeeping,
    workspaces,
    spawner: options.spawner ?? new ProcessSpawner(),
    probe,
    clock,
  });

  logger.info(`Orchestrator ${orchestratorId} ready (database ${databasePath}, runtime ${runtimeDir})`);

  return {
    config,
    orchestratorId,
    backend,
    store,
    registry,
    engine,
    leases,
    reviews,
    workspaces,
    instances,
    tracker,
    housekeeping,
    scheduler,
    createApp: () => createApp({ config, store, leases, reviews, scheduler }),
    close: async () => {
      await scheduler.stop();
      backend.close();
    },
  };
}
