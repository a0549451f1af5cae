/**
 * Environment variable configuration
 */

import type { PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';
import { parseDurationValue } from './duration.js';

type Env = Record<string, string | undefined>;

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * 'yes' → true, 'off' → false, anything unrecognized → undefined
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase().trim();
  if (TRUTHY_VALUES.has(lower)) return true;
  if (FALSY_VALUES.has(lower)) return false;
  return undefined;
}

export function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

export function getEnvConfigPath(env: Env = process.env): string | undefined {
  return nonEmpty(env[EnvVars.CONFIG]);
}

/**
 * Reads TASKLANE_* variables. Malformed durations throw; other malformed
 * values are ignored.
 */
export function loadEnvConfig(env: Env = process.env): PartialConfiguration {
  const result: PartialConfiguration = {};

  const orchestrator: NonNullable<PartialConfiguration['orchestrator']> = {};
  const cluster = nonEmpty(env[EnvVars.CLUSTER]);
  if (cluster !== undefined) orchestrator.cluster = cluster;
  const machine = nonEmpty(env[EnvVars.MACHINE]);
  if (machine !== undefined) orchestrator.machine = machine;
  const runtimeDir = nonEmpty(env[EnvVars.RUNTIME_DIR]);
  if (runtimeDir !== undefined) orchestrator.runtimeDir = runtimeDir;
  const databasePath = nonEmpty(env[EnvVars.DATABASE]);
  if (databasePath !== undefined) orchestrator.databasePath = databasePath;
  const tickInterval = nonEmpty(env[EnvVars.TICK_INTERVAL]);
  if (tickInterval !== undefined) {
    orchestrator.tickInterval = parseDurationValue(tickInterval, EnvVars.TICK_INTERVAL);
  }
  const paused = parseEnvBoolean(env[EnvVars.PAUSED]);
  if (paused !== undefined) orchestrator.paused = paused;
  if (Object.keys(orchestrator).length > 0) {
    result.orchestrator = orchestrator;
  }

  const leases: NonNullable<PartialConfiguration['leases']> = {};
  const leaseDuration = nonEmpty(env[EnvVars.LEASE_DURATION]);
  if (leaseDuration !== undefined) {
    leases.duration = parseDurationValue(leaseDuration, EnvVars.LEASE_DURATION);
  }
  const maxAttempts = parseEnvInteger(env[EnvVars.MAX_ATTEMPTS]);
  if (maxAttempts !== undefined) leases.maxAttempts = maxAttempts;
  if (Object.keys(leases).length > 0) {
    result.leases = leases;
  }

  const workspace: NonNullable<PartialConfiguration['workspace']> = {};
  const repoRoot = nonEmpty(env[EnvVars.REPO_ROOT]);
  if (repoRoot !== undefined) workspace.repoRoot = repoRoot;
  const baseBranch = nonEmpty(env[EnvVars.BASE_BRANCH]);
  if (baseBranch !== undefined) workspace.defaultBaseBranch = baseBranch;
  if (Object.keys(workspace).length > 0) {
    result.workspace = workspace;
  }

  return result;
}
