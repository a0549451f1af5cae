/**
 * Configuration merging
 */

import type { Configuration, PartialConfiguration } from './types.js';
import { HOUSEKEEPING_JOB_NAMES } from './types.js';

/**
 * Overlays `partial` on `base`; undefined leaves the base value.
 * Blueprints are replaced as a list, checks merge by name.
 */
export function mergeConfiguration(base: Configuration, partial: PartialConfiguration): Configuration {
  const o = partial.orchestrator;
  const l = partial.leases;
  const q = partial.queueLimits;
  const h = partial.housekeeping;
  const w = partial.workspace;

  const intervals = { ...base.housekeeping.intervals };
  for (const name of HOUSEKEEPING_JOB_NAMES) {
    const value = h?.intervals?.[name];
    if (value !== undefined) {
      intervals[name] = value;
    }
  }

  return {
    orchestrator: {
      cluster: o?.cluster ?? base.orchestrator.cluster,
      machine: o?.machine ?? base.orchestrator.machine,
      runtimeDir: o?.runtimeDir ?? base.orchestrator.runtimeDir,
      databasePath: o?.databasePath ?? base.orchestrator.databasePath,
      tickInterval: o?.tickInterval ?? base.orchestrator.tickInterval,
      paused: o?.paused ?? base.orchestrator.paused,
    },
    leases: {
      duration: l?.duration ?? base.leases.duration,
      maxAttempts: l?.maxAttempts ?? base.leases.maxAttempts,
    },
    queueLimits: {
      maxClaimed: q?.maxClaimed ?? base.queueLimits.maxClaimed,
      maxProvisional: q?.maxProvisional ?? base.queueLimits.maxProvisional,
    },
    housekeeping: {
      intervals,
      workspaceGracePeriod: h?.workspaceGracePeriod ?? base.housekeeping.workspaceGracePeriod,
    },
    workspace: {
      repoRoot: w?.repoRoot ?? base.workspace.repoRoot,
      worktreeDir: w?.worktreeDir ?? base.workspace.worktreeDir,
      defaultBaseBranch: w?.defaultBaseBranch ?? base.workspace.defaultBaseBranch,
      remote: w?.remote ?? base.workspace.remote,
    },
    blueprints: partial.blueprints ?? base.blueprints,
    flowsDir: partial.flowsDir ?? base.flowsDir,
    checks: { ...base.checks, ...partial.checks },
  };
}

export function mergeConfigurations(base: Configuration, ...partials: PartialConfiguration[]): Configuration {
  return partials.reduce(mergeConfiguration, base);
}
