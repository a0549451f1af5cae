/**
 * Configuration Validation
 */

import { ValidationError, ErrorCode, isValidQueueName } from '@tasklane/core';
import type { BlueprintConfig, Configuration } from './types.js';
import { HOUSEKEEPING_JOB_NAMES } from './types.js';
import { MIN_LEASE_DURATION, MIN_TICK_INTERVAL } from './defaults.js';
import { formatDuration } from './duration.js';

/** Cluster and machine names become part of the orchestrator id */
const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function fail(field: string, message: string, value: unknown): never {
  throw new ValidationError(`Invalid configuration: ${field} ${message}`, ErrorCode.INVALID_CONFIG, {
    field,
    value,
  });
}

function requireName(field: string, value: string): void {
  if (!NAME_PATTERN.test(value)) {
    fail(field, 'must contain only alphanumeric characters, hyphens, and underscores', value);
  }
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    fail(field, 'must be a positive integer', value);
  }
}

function requireNonEmpty(field: string, value: string): void {
  if (value.trim().length === 0) {
    fail(field, 'cannot be empty', value);
  }
}

function validateBlueprint(blueprint: BlueprintConfig, index: number): void {
  const field = `blueprints[${index}]`;
  requireName(`${field}.name`, blueprint.name);
  requireNonEmpty(`${field}.role`, blueprint.role);
  requirePositiveInteger(`${field}.maxInstances`, blueprint.maxInstances);
  if (blueprint.interval < 0) {
    fail(`${field}.interval`, 'cannot be negative', blueprint.interval);
  }
  if (blueprint.command.length === 0) {
    fail(`${field}.command`, 'cannot be empty', blueprint.command);
  }
  if (!isValidQueueName(blueprint.capabilities.claimSourceQueue)) {
    fail(`${field}.claimSourceQueue`, 'is not a valid queue name', blueprint.capabilities.claimSourceQueue);
  }
  if (blueprint.capabilities.leaseSeconds !== undefined) {
    requirePositiveInteger(`${field}.leaseSeconds`, blueprint.capabilities.leaseSeconds);
  }
  if (blueprint.maxClaimed !== undefined) {
    requirePositiveInteger(`${field}.maxClaimed`, blueprint.maxClaimed);
  }
  if (blueprint.maxProvisional !== undefined) {
    requirePositiveInteger(`${field}.maxProvisional`, blueprint.maxProvisional);
  }
}

/**
 * Throws a ValidationError naming the first invalid field
 */
export function validateConfiguration(config: Configuration): Configuration {
  requireName('orchestrator.cluster', config.orchestrator.cluster);
  requireName('orchestrator.machine', config.orchestrator.machine);
  requireNonEmpty('orchestrator.runtimeDir', config.orchestrator.runtimeDir);
  requireNonEmpty('orchestrator.databasePath', config.orchestrator.databasePath);
  if (config.orchestrator.tickInterval < MIN_TICK_INTERVAL) {
    fail('orchestrator.tickInterval', `must be at least ${formatDuration(MIN_TICK_INTERVAL)}`, config.orchestrator.tickInterval);
  }

  if (config.leases.duration < MIN_LEASE_DURATION) {
    fail('leases.duration', `must be at least ${formatDuration(MIN_LEASE_DURATION)}`, config.leases.duration);
  }
  requirePositiveInteger('leases.maxAttempts', config.leases.maxAttempts);

  requirePositiveInteger('queueLimits.maxClaimed', config.queueLimits.maxClaimed);
  requirePositiveInteger('queueLimits.maxProvisional', config.queueLimits.maxProvisional);

  for (const name of HOUSEKEEPING_JOB_NAMES) {
    if (config.housekeeping.intervals[name] < 0) {
      fail(`housekeeping.intervals.${name}`, 'cannot be negative', config.housekeeping.intervals[name]);
    }
  }
  if (config.housekeeping.workspaceGracePeriod < 0) {
    fail('housekeeping.workspaceGracePeriod', 'cannot be negative', config.housekeeping.workspaceGracePeriod);
  }

  requireNonEmpty('workspace.repoRoot', config.workspace.repoRoot);
  requireNonEmpty('workspace.worktreeDir', config.workspace.worktreeDir);
  requireNonEmpty('workspace.defaultBaseBranch', config.workspace.defaultBaseBranch);
  requireNonEmpty('workspace.remote', config.workspace.remote);

  const seen = new Set<string>();
  config.blueprints.forEach((blueprint, index) => {
    validateBlueprint(blueprint, index);
    if (seen.has(blueprint.name)) {
      fail(`blueprints[${index}].name`, 'is a duplicate', blueprint.name);
    }
    seen.add(blueprint.name);
  });

  for (const [name, command] of Object.entries(config.checks)) {
    requireNonEmpty(`checks.${name}`, command);
  }

  return config;
}
