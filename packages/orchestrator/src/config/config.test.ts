/**
 * Configuration Tests
 *
 * Durations, environment parsing, YAML conversion, merging, validation and
 * the precedence of the full loader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ErrorCode } from '@tasklane/core';

import { parseDuration, parseDurationValue, formatDuration } from './duration.js';
import { parseEnvBoolean, parseEnvInteger, loadEnvConfig } from './env.js';
import { convertYamlToConfig, parseYamlConfig, findConfigDir, discoverConfigFile } from './file.js';
import { mergeConfiguration } from './merge.js';
import { validateConfiguration } from './validation.js';
import { getDefaultConfig, CONFIG_DIR, CONFIG_FILE_NAME } from './defaults.js';
import { loadConfig, loadConfigWithSource, getOrchestratorId } from './config.js';
import type { BlueprintConfig } from './types.js';

// ============================================================================
// Test Helpers
// ============================================================================

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tasklane-config-'));
}

function writeConfig(dir: string, content: string): string {
  const configDir = path.join(dir, CONFIG_DIR);
  fs.mkdirSync(configDir, { recursive: true });
  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  fs.writeFileSync(configPath, content);
  return configPath;
}

function blueprint(overrides: Partial<BlueprintConfig> = {}): BlueprintConfig {
  return {
    name: 'implementer',
    role: 'implement',
    maxInstances: 1,
    interval: 0,
    command: ['./worker'],
    capabilities: { needsWorkspace: true, claimSourceQueue: 'incoming', claimIntent: 'work' },
    paused: false,
    env: {},
    ...overrides,
  };
}

// ============================================================================
// Durations
// ============================================================================

describe('parseDuration', () => {
  it('parses each unit', () => {
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('2s')).toBe(2000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('1d')).toBe(86_400_000);
  });

  it('accepts fractional values', () => {
    expect(parseDuration('1.5s')).toBe(1500);
  });

  it('rejects malformed input', () => {
    expect(() => parseDuration('soon')).toThrow(
      "Invalid duration format: 'soon'. Expected format: <number><unit> (e.g., '500ms', '5m', '1h')"
    );
  });
});

describe('parseDurationValue', () => {
  it('treats numbers and digit strings as milliseconds', () => {
    expect(parseDurationValue(250)).toBe(250);
    expect(parseDurationValue('1000')).toBe(1000);
    expect(parseDurationValue('30s')).toBe(30_000);
  });

  it('rejects negative numbers and other types', () => {
    expect(() => parseDurationValue(-1)).toThrow('Invalid duration value: -1. Must be a non-negative finite number');
    expect(() => parseDurationValue(true, 'leases.duration')).toThrow('Invalid duration value for leases.duration');
  });
});

describe('formatDuration', () => {
  it('uses the largest whole unit', () => {
    expect(formatDuration(86_400_000)).toBe('1d');
    expect(formatDuration(300_000)).toBe('5m');
    expect(formatDuration(2000)).toBe('2s');
    expect(formatDuration(1500)).toBe('1500ms');
  });
});

// ============================================================================
// Environment
// ============================================================================

describe('environment parsing', () => {
  it('parses booleans', () => {
    expect(parseEnvBoolean('YES')).toBe(true);
    expect(parseEnvBoolean(' off ')).toBe(false);
    expect(parseEnvBoolean('maybe')).toBeUndefined();
    expect(parseEnvBoolean(undefined)).toBeUndefined();
  });

  it('parses integers', () => {
    expect(parseEnvInteger('12')).toBe(12);
    expect(parseEnvInteger('1.5')).toBeUndefined();
    expect(parseEnvInteger('')).toBeUndefined();
  });

  it('builds only the sections that are set', () => {
    const result = loadEnvConfig({
      TASKLANE_CLUSTER: 'east',
      TASKLANE_PAUSED: '1',
      TASKLANE_LEASE_DURATION: '10m',
      TASKLANE_MAX_ATTEMPTS: 'many',
    });
    expect(result).toEqual({
      orchestrator: { cluster: 'east', paused: true },
      leases: { duration: 600_000 },
    });
  });

  it('returns an empty object for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({});
  });
});

// ============================================================================
// YAML
// ============================================================================

describe('convertYamlToConfig', () => {
  it('converts snake_case sections', () => {
    const doc = parseYamlConfig(`
orchestrator:
  cluster: acme
  tick_interval: 2s
leases:
  duration: 15m
  max_attempts: 5
housekeeping:
  intervals:
    orphan-scan: 2m
checks:
  tests: npm test
`);
    const result = convertYamlToConfig(doc);
    expect(result.orchestrator?.cluster).toBe('acme');
    expect(result.orchestrator?.tickInterval).toBe(2000);
    expect(result.leases).toEqual({ duration: 900_000, maxAttempts: 5 });
    expect(result.housekeeping?.intervals).toEqual({ 'orphan-scan': 120_000 });
    expect(result.checks).toEqual({ tests: 'npm test' });
  });

  it('fills blueprint defaults and wraps string commands in a shell', () => {
    const doc = parseYamlConfig(`
blueprints:
  - name: reviewer
    command: ./review.sh --fast
    claim_source_queue: provisional
    claim_intent: review
`);
    const [reviewer] = convertYamlToConfig(doc).blueprints ?? [];
    expect(reviewer).toEqual({
      name: 'reviewer',
      role: 'reviewer',
      maxInstances: 1,
      interval: 0,
      command: ['sh', '-c', './review.sh --fast'],
      capabilities: {
        needsWorkspace: true,
        claimSourceQueue: 'provisional',
        claimIntent: 'review',
        leaseSeconds: undefined,
      },
      preCheck: undefined,
      paused: false,
      maxClaimed: undefined,
      maxProvisional: undefined,
      env: {},
    });
  });

  it('rejects unknown housekeeping jobs', () => {
    const doc = parseYamlConfig('housekeeping:\n  intervals:\n    vacuum: 1m\n');
    expect(() => convertYamlToConfig(doc)).toThrow(/housekeeping\.intervals\.vacuum/);
  });

  it('rejects wrongly typed values', () => {
    const doc = parseYamlConfig('leases:\n  max_attempts: three\n');
    expect(() => convertYamlToConfig(doc)).toThrow(
      'Invalid configuration value for leases.max_attempts: expected integer'
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseYamlConfig('- a\n- b\n', 'x.yaml')).toThrow('Configuration file must contain a mapping (x.yaml)');
  });

  it('treats an empty document as empty config', () => {
    expect(parseYamlConfig('')).toEqual({});
  });
});

// ============================================================================
// Merge and validation
// ============================================================================

describe('mergeConfiguration', () => {
  it('keeps base values where the partial is silent', () => {
    const base = getDefaultConfig();
    const merged = mergeConfiguration(base, { orchestrator: { cluster: 'west' }, checks: { lint: 'npm run lint' } });
    expect(merged.orchestrator.cluster).toBe('west');
    expect(merged.orchestrator.tickInterval).toBe(base.orchestrator.tickInterval);
    expect(merged.checks).toEqual({ lint: 'npm run lint' });
  });

  it('merges housekeeping intervals per job', () => {
    const merged = mergeConfiguration(getDefaultConfig(), {
      housekeeping: { intervals: { 'orphan-scan': 5000 } },
    });
    expect(merged.housekeeping.intervals['orphan-scan']).toBe(5000);
    expect(merged.housekeeping.intervals['register-orchestrator']).toBe(30_000);
  });
});

describe('validateConfiguration', () => {
  it('accepts the defaults', () => {
    const config = getDefaultConfig();
    expect(validateConfiguration(config)).toBe(config);
  });

  it('rejects a tick interval below the minimum', () => {
    const config = mergeConfiguration(getDefaultConfig(), { orchestrator: { tickInterval: 50 } });
    expect(() => validateConfiguration(config)).toThrow(
      'Invalid configuration: orchestrator.tickInterval must be at least 100ms'
    );
  });

  it('rejects cluster names with separators', () => {
    const config = mergeConfiguration(getDefaultConfig(), { orchestrator: { cluster: 'a b' } });
    expect(() => validateConfiguration(config)).toThrow(
      'Invalid configuration: orchestrator.cluster must contain only alphanumeric characters, hyphens, and underscores'
    );
  });

  it('rejects duplicate blueprint names', () => {
    const config = mergeConfiguration(getDefaultConfig(), { blueprints: [blueprint(), blueprint()] });
    expect(() => validateConfiguration(config)).toThrow('Invalid configuration: blueprints[1].name is a duplicate');
  });

  it('rejects an invalid claim source queue', () => {
    const config = mergeConfiguration(getDefaultConfig(), {
      blueprints: [
        blueprint({ capabilities: { needsWorkspace: false, claimSourceQueue: 'Bad Queue', claimIntent: 'work' } }),
      ],
    });
    let caught: unknown;
    try {
      validateConfiguration(config);
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: 'Invalid configuration: blueprints[0].claimSourceQueue is not a valid queue name',
    });
  });
});

// ============================================================================
// Loader
// ============================================================================

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('discovers the config file by walking up', () => {
    const configPath = writeConfig(tempDir, 'orchestrator:\n  cluster: found\n');
    const nested = path.join(tempDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });

    expect(findConfigDir(nested)).toBe(path.join(tempDir, CONFIG_DIR));
    expect(discoverConfigFile(undefined, nested)).toEqual({
      path: configPath,
      exists: true,
      configDir: path.join(tempDir, CONFIG_DIR),
    });
  });

  it('applies defaults < file < env < overrides', () => {
    writeConfig(
      tempDir,
      'orchestrator:\n  cluster: from-file\n  machine: box\n  tick_interval: 2s\nleases:\n  max_attempts: 7\n'
    );

    const { config, configPath } = loadConfigWithSource({
      startDir: tempDir,
      env: { TASKLANE_CLUSTER: 'from-env', TASKLANE_TICK_INTERVAL: '4s' },
      overrides: { orchestrator: { tickInterval: 3000 } },
    });

    expect(configPath).toBe(path.join(tempDir, CONFIG_DIR, CONFIG_FILE_NAME));
    expect(config.orchestrator.cluster).toBe('from-env');
    expect(config.orchestrator.machine).toBe('box');
    expect(config.orchestrator.tickInterval).toBe(3000);
    expect(config.leases.maxAttempts).toBe(7);
    expect(getOrchestratorId(config)).toBe('from-env-box');
  });

  it('reads the file named by TASKLANE_CONFIG', () => {
    const custom = path.join(tempDir, 'custom.yaml');
    fs.writeFileSync(custom, 'orchestrator:\n  cluster: custom\n');
    const config = loadConfig({ startDir: tempDir, env: { TASKLANE_CONFIG: custom } });
    expect(config.orchestrator.cluster).toBe('custom');
  });

  it('resolves relative paths against the repository root', () => {
    const config = loadConfig({
      startDir: tempDir,
      env: {},
      overrides: { workspace: { repoRoot: 'repo' }, flowsDir: 'flows' },
    });
    const repoRoot = path.join(tempDir, 'repo');
    expect(config.workspace.repoRoot).toBe(repoRoot);
    expect(config.orchestrator.runtimeDir).toBe(path.join(repoRoot, '.tasklane', 'runtime'));
    expect(config.orchestrator.databasePath).toBe(path.join(repoRoot, '.tasklane', 'tasks.db'));
    expect(config.workspace.worktreeDir).toBe(path.join(repoRoot, '.tasklane', 'worktrees'));
    expect(config.flowsDir).toBe(path.join(repoRoot, 'flows'));
  });

  it('keeps an in-memory database path', () => {
    const config = loadConfig({ startDir: tempDir, env: {}, overrides: { orchestrator: { databasePath: ':memory:' } } });
    expect(config.orchestrator.databasePath).toBe(':memory:');
  });

  it('uses defaults when no file exists', () => {
    const config = loadConfig({ startDir: tempDir, env: {}, skipFile: true });
    expect(config.orchestrator.cluster).toBe('default');
    expect(config.leases.duration).toBe(30 * 60_000);
  });
});
