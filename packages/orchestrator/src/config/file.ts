/**
 * Configuration file discovery and YAML parsing
 *
 * The file uses snake_case keys:
 *
 * ```yaml
 * orchestrator:
 *   cluster: acme
 *   tick_interval: 5s
 * leases:
 *   duration: 30m
 * blueprints:
 *   - name: implementer
 *     role: implement
 *     max_instances: 2
 *     command: ["./bin/worker"]
 *     claim_source_queue: incoming
 *     claim_intent: work
 * checks:
 *   tests: npm test
 * ```
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode, isClaimIntent, errorMessage } from '@tasklane/core';
import type { BlueprintConfig, ConfigFileDiscovery, HousekeepingJobName, PartialConfiguration } from './types.js';
import { HOUSEKEEPING_JOB_NAMES } from './types.js';
import { CONFIG_DIR, CONFIG_FILE_NAME } from './defaults.js';
import { parseDurationValue } from './duration.js';

// ============================================================================
// File Discovery
// ============================================================================

/**
 * Walks up from startDir looking for a `.tasklane` directory
 */
export function findConfigDir(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(currentDir, CONFIG_DIR);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

export function discoverConfigFile(overridePath?: string, startDir: string = process.cwd()): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(overridePath);
    const exists = fs.existsSync(resolvedPath);
    return { path: resolvedPath, exists, configDir: exists ? path.dirname(resolvedPath) : undefined };
  }

  const configDir = findConfigDir(startDir);
  if (configDir) {
    const configPath = path.join(configDir, CONFIG_FILE_NAME);
    return { path: configPath, exists: fs.existsSync(configPath), configDir };
  }
  return { exists: false };
}

// ============================================================================
// Field readers
// ============================================================================

type YamlObject = Record<string, unknown>;

function isYamlObject(value: unknown): value is YamlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(field: string, value: unknown, expected: string): ValidationError {
  return new ValidationError(`Invalid configuration value for ${field}: expected ${expected}`, ErrorCode.INVALID_CONFIG, {
    field,
    value,
    expected,
  });
}

function readSection(obj: YamlObject, key: string, field: string): YamlObject | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isYamlObject(value)) throw invalid(field, value, 'mapping');
  return value;
}

function readString(obj: YamlObject, key: string, field: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw invalid(field, value, 'string');
  return value;
}

function readInteger(obj: YamlObject, key: string, field: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) throw invalid(field, value, 'integer');
  return value;
}

function readBoolean(obj: YamlObject, key: string, field: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw invalid(field, value, 'boolean');
  return value;
}

function readDuration(obj: YamlObject, key: string, field: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  return parseDurationValue(value, field);
}

/**
 * A list is an argv; a string runs through `sh -c`
 */
function readCommand(obj: YamlObject, key: string, field: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return ['sh', '-c', value];
  if (Array.isArray(value) && value.length > 0 && value.every((part): part is string => typeof part === 'string')) {
    return [...value];
  }
  throw invalid(field, value, 'command string or non-empty list of strings');
}

function readStringMap(obj: YamlObject, key: string, field: string): Record<string, string> | undefined {
  const section = readSection(obj, key, field);
  if (section === undefined) return undefined;
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(section)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw invalid(`${field}.${name}`, value, 'scalar');
    }
    result[name] = String(value);
  }
  return result;
}

function isHousekeepingJobName(value: string): value is HousekeepingJobName {
  return HOUSEKEEPING_JOB_NAMES.some((name) => name === value);
}

// ============================================================================
// Conversion
// ============================================================================

function convertBlueprint(raw: unknown, index: number): BlueprintConfig {
  const field = `blueprints[${index}]`;
  if (!isYamlObject(raw)) throw invalid(field, raw, 'mapping');

  const name = readString(raw, 'name', `${field}.name`);
  if (name === undefined) throw invalid(`${field}.name`, undefined, 'string');
  const command = readCommand(raw, 'command', `${field}.command`);
  if (command === undefined) throw invalid(`${field}.command`, undefined, 'command');

  const claimIntent = raw.claim_intent ?? 'work';
  if (!isClaimIntent(claimIntent)) throw invalid(`${field}.claim_intent`, claimIntent, "'work' or 'review'");

  const blueprint: BlueprintConfig = {
    name,
    role: readString(raw, 'role', `${field}.role`) ?? name,
    maxInstances: readInteger(raw, 'max_instances', `${field}.max_instances`) ?? 1,
    interval: readDuration(raw, 'interval', `${field}.interval`) ?? 0,
    command,
    capabilities: {
      needsWorkspace: readBoolean(raw, 'needs_workspace', `${field}.needs_workspace`) ?? true,
      claimSourceQueue: readString(raw, 'claim_source_queue', `${field}.claim_source_queue`) ?? 'incoming',
      claimIntent,
      leaseSeconds: readInteger(raw, 'lease_seconds', `${field}.lease_seconds`),
    },
    preCheck: readCommand(raw, 'pre_check', `${field}.pre_check`),
    paused: readBoolean(raw, 'paused', `${field}.paused`) ?? false,
    maxClaimed: readInteger(raw, 'max_claimed', `${field}.max_claimed`),
    maxProvisional: readInteger(raw, 'max_provisional', `${field}.max_provisional`),
    env: readStringMap(raw, 'env', `${field}.env`) ?? {},
    scriptsDir: readString(raw, 'scripts_dir', `${field}.scripts_dir`),
  };
  return blueprint;
}

/**
 * Converts a parsed YAML document to a partial configuration
 */
export function convertYamlToConfig(doc: YamlObject): PartialConfiguration {
  const result: PartialConfiguration = {};

  const orchestrator = readSection(doc, 'orchestrator', 'orchestrator');
  if (orchestrator) {
    result.orchestrator = {
      cluster: readString(orchestrator, 'cluster', 'orchestrator.cluster'),
      machine: readString(orchestrator, 'machine', 'orchestrator.machine'),
      runtimeDir: readString(orchestrator, 'runtime_dir', 'orchestrator.runtime_dir'),
      databasePath: readString(orchestrator, 'database_path', 'orchestrator.database_path'),
      tickInterval: readDuration(orchestrator, 'tick_interval', 'orchestrator.tick_interval'),
      paused: readBoolean(orchestrator, 'paused', 'orchestrator.paused'),
    };
  }

  const leases = readSection(doc, 'leases', 'leases');
  if (leases) {
    result.leases = {
      duration: readDuration(leases, 'duration', 'leases.duration'),
      maxAttempts: readInteger(leases, 'max_attempts', 'leases.max_attempts'),
    };
  }

  const limits = readSection(doc, 'queue_limits', 'queue_limits');
  if (limits) {
    result.queueLimits = {
      maxClaimed: readInteger(limits, 'max_claimed', 'queue_limits.max_claimed'),
      maxProvisional: readInteger(limits, 'max_provisional', 'queue_limits.max_provisional'),
    };
  }

  const housekeeping = readSection(doc, 'housekeeping', 'housekeeping');
  if (housekeeping) {
    const intervals: Partial<Record<HousekeepingJobName, number>> = {};
    const rawIntervals = readSection(housekeeping, 'intervals', 'housekeeping.intervals') ?? {};
    for (const name of Object.keys(rawIntervals)) {
      if (!isHousekeepingJobName(name)) {
        throw invalid(`housekeeping.intervals.${name}`, name, HOUSEKEEPING_JOB_NAMES.join(', '));
      }
      intervals[name] = readDuration(rawIntervals, name, `housekeeping.intervals.${name}`);
    }
    result.housekeeping = {
      intervals,
      workspaceGracePeriod: readDuration(housekeeping, 'workspace_grace_period', 'housekeeping.workspace_grace_period'),
    };
  }

  const workspace = readSection(doc, 'workspace', 'workspace');
  if (workspace) {
    result.workspace = {
      repoRoot: readString(workspace, 'repo_root', 'workspace.repo_root'),
      worktreeDir: readString(workspace, 'worktree_dir', 'workspace.worktree_dir'),
      defaultBaseBranch: readString(workspace, 'default_base_branch', 'workspace.default_base_branch'),
      remote: readString(workspace, 'remote', 'workspace.remote'),
    };
  }

  const blueprints = doc.blueprints;
  if (blueprints !== undefined && blueprints !== null) {
    if (!Array.isArray(blueprints)) throw invalid('blueprints', blueprints, 'list');
    result.blueprints = blueprints.map((raw: unknown, index) => convertBlueprint(raw, index));
  }

  result.flowsDir = readString(doc, 'flows_dir', 'flows_dir');
  result.checks = readStringMap(doc, 'checks', 'checks');

  return result;
}

export function parseYamlConfig(content: string, filePath?: string): YamlObject {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${filePath ? ` (${filePath})` : ''}: ${errorMessage(err)}`,
      ErrorCode.INVALID_CONFIG,
      { filePath }
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isYamlObject(parsed)) {
    throw new ValidationError(
      `Configuration file must contain a mapping${filePath ? ` (${filePath})` : ''}`,
      ErrorCode.INVALID_CONFIG,
      { value: parsed }
    );
  }
  return parsed;
}

/**
 * Reads and converts a config file; a missing file is an empty config
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return convertYamlToConfig(parseYamlConfig(content, filePath));
}
