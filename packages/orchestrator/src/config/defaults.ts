/**
 * Default configuration values
 */

import { hostname } from 'node:os';
import { DEFAULT_BASE_BRANCH, DEFAULT_CLUSTER, DEFAULT_MAX_ATTEMPTS } from '@tasklane/core';
import type { Configuration, HousekeepingJobName, Duration } from './types.js';

/** Directory holding config, database, runtime state and worktrees */
export const CONFIG_DIR = '.tasklane';

export const CONFIG_FILE_NAME = 'config.yaml';

export const MIN_TICK_INTERVAL: Duration = 100;
export const MIN_LEASE_DURATION: Duration = 1000;

export const DEFAULT_HOUSEKEEPING_INTERVALS: Record<HousekeepingJobName, Duration> = {
  'reap-finished-agents': 0,
  'register-orchestrator': 30_000,
  'lease-expiry-sweep': 0,
  'orphan-scan': 60_000,
  'process-checks': 0,
  'merge-retry': 5 * 60_000,
  'stale-workspace-sweep': 10 * 60_000,
};

/**
 * Fresh defaults. Relative paths resolve against workspace.repoRoot.
 */
export function getDefaultConfig(): Configuration {
  return {
    orchestrator: {
      cluster: DEFAULT_CLUSTER,
      machine: hostname().split('.')[0] || 'local',
      runtimeDir: `${CONFIG_DIR}/runtime`,
      databasePath: `${CONFIG_DIR}/tasks.db`,
      tickInterval: 5_000,
      paused: false,
    },
    leases: {
      duration: 30 * 60_000,
      maxAttempts: DEFAULT_MAX_ATTEMPTS,
    },
    queueLimits: {
      maxClaimed: 10,
      maxProvisional: 20,
    },
    housekeeping: {
      intervals: { ...DEFAULT_HOUSEKEEPING_INTERVALS },
      workspaceGracePeriod: 24 * 60 * 60_000,
    },
    workspace: {
      repoRoot: process.cwd(),
      worktreeDir: `${CONFIG_DIR}/worktrees`,
      defaultBaseBranch: DEFAULT_BASE_BRANCH,
      remote: 'origin',
    },
    blueprints: [],
    checks: {},
  };
}
