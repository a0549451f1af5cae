/**
 * Configuration System Types
 *
 * Precedence, highest first: explicit overrides, TASKLANE_* environment
 * variables, `.tasklane/config.yaml`, built-in defaults.
 */

import type { ClaimIntent } from '@tasklane/core';

/**
 * Duration in milliseconds. Config files may also give '500ms', '5m', '1h'.
 */
export type Duration = number;

export type DurationString = `${number}${'ms' | 's' | 'm' | 'h' | 'd'}`;

// ============================================================================
// Blueprints
// ============================================================================

/**
 * Declares how a blueprint's workers are launched. The scheduler has a
 * single spawn path; these fields, not branching code, select behavior.
 */
export interface BlueprintCapabilities {
  /** Create a git worktree for the task before spawning */
  needsWorkspace: boolean;
  /** Queue the blueprint claims from */
  claimSourceQueue: string;
  claimIntent: ClaimIntent;
  /** Overrides leases.duration for this blueprint */
  leaseSeconds?: number;
}

export interface BlueprintConfig {
  name: string;
  /** Role matched against task.role on claim */
  role: string;
  maxInstances: number;
  /** Minimum time between spawns */
  interval: Duration;
  /** Worker argv */
  command: string[];
  capabilities: BlueprintCapabilities;
  /** Optional argv; exit 0 lets the slot proceed */
  preCheck?: string[];
  paused: boolean;
  /** Per-blueprint backpressure ceilings; fall back to queueLimits */
  maxClaimed?: number;
  maxProvisional?: number;
  env: Record<string, string>;
  /** Copied into each task directory's scripts/ */
  scriptsDir?: string;
}

// ============================================================================
// Sections
// ============================================================================

export interface OrchestratorSection {
  cluster: string;
  machine: string;
  /** Task directories and archived logs live here */
  runtimeDir: string;
  databasePath: string;
  tickInterval: Duration;
  /** Suspends claims and spawns; housekeeping keeps running */
  paused: boolean;
}

export interface LeaseSection {
  duration: Duration;
  maxAttempts: number;
}

export interface QueueLimitsSection {
  maxClaimed: number;
  maxProvisional: number;
}

export const HOUSEKEEPING_JOB_NAMES = [
  'reap-finished-agents',
  'register-orchestrator',
  'lease-expiry-sweep',
  'orphan-scan',
  'process-checks',
  'merge-retry',
  'stale-workspace-sweep',
] as const;

export type HousekeepingJobName = (typeof HOUSEKEEPING_JOB_NAMES)[number];

export interface HousekeepingSection {
  intervals: Record<HousekeepingJobName, Duration>;
  /** How long a terminal task keeps its worktree */
  workspaceGracePeriod: Duration;
}

export interface WorkspaceSection {
  repoRoot: string;
  /** Relative to repoRoot unless absolute */
  worktreeDir: string;
  defaultBaseBranch: string;
  remote: string;
}

export interface Configuration {
  orchestrator: OrchestratorSection;
  leases: LeaseSection;
  queueLimits: QueueLimitsSection;
  housekeeping: HousekeepingSection;
  workspace: WorkspaceSection;
  blueprints: BlueprintConfig[];
  /** Directory of flow YAML files loaded on top of the bundled default flow */
  flowsDir?: string;
  /** Check name → shell command run inside the task's worktree */
  checks: Record<string, string>;
}

export interface PartialConfiguration {
  orchestrator?: Partial<OrchestratorSection>;
  leases?: Partial<LeaseSection>;
  queueLimits?: Partial<QueueLimitsSection>;
  housekeeping?: {
    intervals?: Partial<Record<HousekeepingJobName, Duration>>;
    workspaceGracePeriod?: Duration;
  };
  workspace?: Partial<WorkspaceSection>;
  blueprints?: BlueprintConfig[];
  flowsDir?: string;
  checks?: Record<string, string>;
}

// ============================================================================
// Environment
// ============================================================================

export const EnvVars = {
  CONFIG: 'TASKLANE_CONFIG',
  CLUSTER: 'TASKLANE_CLUSTER',
  MACHINE: 'TASKLANE_MACHINE',
  RUNTIME_DIR: 'TASKLANE_RUNTIME_DIR',
  DATABASE: 'TASKLANE_DB',
  TICK_INTERVAL: 'TASKLANE_TICK_INTERVAL',
  PAUSED: 'TASKLANE_PAUSED',
  LEASE_DURATION: 'TASKLANE_LEASE_DURATION',
  MAX_ATTEMPTS: 'TASKLANE_MAX_ATTEMPTS',
  REPO_ROOT: 'TASKLANE_REPO_ROOT',
  BASE_BRANCH: 'TASKLANE_BASE_BRANCH',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file; otherwise TASKLANE_CONFIG, then discovery */
  configPath?: string;
  /** Where discovery starts walking up (default: cwd) */
  startDir?: string;
  skipEnv?: boolean;
  skipFile?: boolean;
  /** Highest-precedence values, e.g. from an embedding process */
  overrides?: PartialConfiguration;
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
}

export interface ConfigFileDiscovery {
  path?: string;
  exists: boolean;
  /** The `.tasklane` directory that holds the file */
  configDir?: string;
}
