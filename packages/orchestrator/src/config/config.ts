/**
 * Configuration loading
 */

import * as path from 'node:path';
import type { Configuration, LoadConfigOptions } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { mergeConfiguration } from './merge.js';
import { validateConfiguration } from './validation.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { loadEnvConfig, getEnvConfigPath } from './env.js';

export interface LoadedConfiguration {
  config: Configuration;
  /** The file that was read, if any */
  configPath?: string;
}

/**
 * Resolves every relative path against the repository root
 */
export function resolveConfigPaths(config: Configuration, baseDir: string = process.cwd()): Configuration {
  const repoRoot = path.resolve(baseDir, config.workspace.repoRoot);
  const fromRoot = (p: string): string => path.resolve(repoRoot, p);
  return {
    ...config,
    orchestrator: {
      ...config.orchestrator,
      runtimeDir: fromRoot(config.orchestrator.runtimeDir),
      databasePath: config.orchestrator.databasePath === ':memory:' ? ':memory:' : fromRoot(config.orchestrator.databasePath),
    },
    workspace: {
      ...config.workspace,
      repoRoot,
      worktreeDir: fromRoot(config.workspace.worktreeDir),
    },
    blueprints: config.blueprints.map((blueprint) =>
      blueprint.scriptsDir === undefined ? blueprint : { ...blueprint, scriptsDir: fromRoot(blueprint.scriptsDir) }
    ),
    flowsDir: config.flowsDir === undefined ? undefined : fromRoot(config.flowsDir),
  };
}

/**
 * Loads defaults < YAML file < environment < overrides, then validates.
 */
export function loadConfigWithSource(options: LoadConfigOptions = {}): LoadedConfiguration {
  const env = options.env ?? process.env;
  const startDir = options.startDir ?? process.cwd();
  let config = getDefaultConfig();
  let configPath: string | undefined;

  if (!options.skipFile) {
    const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath(env);
    const discovery = discoverConfigFile(options.configPath ?? envConfigPath, startDir);
    if (discovery.exists && discovery.path) {
      config = mergeConfiguration(config, readConfigFile(discovery.path));
      configPath = discovery.path;
    }
  }

  if (!options.skipEnv) {
    config = mergeConfiguration(config, loadEnvConfig(env));
  }

  if (options.overrides) {
    config = mergeConfiguration(config, options.overrides);
  }

  return { config: resolveConfigPaths(validateConfiguration(config), startDir), configPath };
}

export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  return loadConfigWithSource(options).config;
}

/**
 * `<cluster>-<machine>`, recorded on every task this orchestrator claims
 */
export function getOrchestratorId(config: Configuration): string {
  return `${config.orchestrator.cluster}-${config.orchestrator.machine}`;
}
