/**
 * Flow loading from YAML
 *
 * ```yaml
 * name: default
 * cluster: default
 * states: [incoming, claimed, provisional, done, failed]
 * transitions:
 *   "incoming -> claimed":
 *     agent: implementer
 *     guards: [dependency_resolved, role_matches]
 *   "provisional -> done":
 *     guards: [checks_passed]
 *     effects: [merge_pr, unblock_dependents]
 * ```
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode, DEFAULT_CLUSTER, errorMessage } from '@tasklane/core';
import type { ConditionDefinition, FlowDefinition, GuardName, TransitionDefinition } from './types.js';
import { isGuardName } from './types.js';

/** The flow shipped with the package */
export const DEFAULT_FLOW_PATH = fileURLToPath(new URL('../../flows/default.yaml', import.meta.url));

type YamlObject = Record<string, unknown>;

function isYamlObject(value: unknown): value is YamlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flowError(source: string, message: string): ValidationError {
  return new ValidationError(`Invalid flow definition (${source}): ${message}`, ErrorCode.INVALID_FLOW, {
    source,
  });
}

function readStringList(value: unknown, field: string, source: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw flowError(source, `${field} must be a list of strings`);
  }
  return [...value];
}

function readOptionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw flowError(source, `${field} must be a string`);
  }
  return value;
}

function parseCondition(raw: unknown, field: string, source: string): ConditionDefinition {
  if (!isYamlObject(raw)) {
    throw flowError(source, `${field} must be a mapping`);
  }
  const name = readOptionalString(raw.name, `${field}.name`, source);
  if (!name) {
    throw flowError(source, `${field}.name is required`);
  }
  const type = raw.type;
  if (type !== 'script' && type !== 'agent' && type !== 'manual') {
    throw flowError(source, `${field}.type must be script, agent, or manual`);
  }
  return {
    name,
    type,
    script: readOptionalString(raw.script, `${field}.script`, source),
    agent: readOptionalString(raw.agent, `${field}.agent`, source),
    onFail: readOptionalString(raw.on_fail, `${field}.on_fail`, source),
  };
}

function parseTransition(key: string, raw: unknown, source: string): TransitionDefinition {
  const parts = key.split('->');
  const from = parts[0]?.trim();
  const to = parts[1]?.trim();
  if (parts.length !== 2 || !from || !to) {
    throw flowError(source, `invalid transition key '${key}' (must be 'state1 -> state2')`);
  }
  const body = raw === null || raw === undefined ? {} : raw;
  if (!isYamlObject(body)) {
    throw flowError(source, `transition '${key}' must be a mapping`);
  }

  const guards: GuardName[] = [];
  for (const guard of readStringList(body.guards, `transition '${key}' guards`, source)) {
    if (!isGuardName(guard)) {
      throw flowError(source, `transition '${key}' has unknown guard '${guard}'`);
    }
    guards.push(guard);
  }

  const rawConditions = body.conditions ?? [];
  if (!Array.isArray(rawConditions)) {
    throw flowError(source, `transition '${key}' conditions must be a list`);
  }

  return {
    from,
    to,
    agent: readOptionalString(body.agent, `transition '${key}' agent`, source),
    guards,
    effects: readStringList(body.effects, `transition '${key}' effects`, source),
    conditions: rawConditions.map((condition: unknown, index) =>
      parseCondition(condition, `transition '${key}' conditions[${index}]`, source)
    ),
  };
}

/**
 * Builds a flow from a parsed YAML document. When `states` is omitted it is
 * derived from the transitions in order of first appearance.
 */
export function parseFlow(doc: unknown, source = 'inline'): FlowDefinition {
  if (!isYamlObject(doc)) {
    throw flowError(source, 'document must be a mapping');
  }
  const name = readOptionalString(doc.name, 'name', source);
  if (!name) {
    throw flowError(source, 'name is required');
  }
  const rawTransitions = doc.transitions ?? {};
  if (!isYamlObject(rawTransitions)) {
    throw flowError(source, 'transitions must be a mapping of "from -> to" keys');
  }
  const transitions = Object.entries(rawTransitions).map(([key, value]) => parseTransition(key, value, source));

  let states = readStringList(doc.states, 'states', source);
  if (states.length === 0) {
    const derived = new Set<string>();
    for (const transition of transitions) {
      derived.add(transition.from);
      derived.add(transition.to);
      for (const condition of transition.conditions) {
        if (condition.onFail) derived.add(condition.onFail);
      }
    }
    states = [...derived];
  }

  return {
    name,
    cluster: readOptionalString(doc.cluster, 'cluster', source) ?? DEFAULT_CLUSTER,
    description: readOptionalString(doc.description, 'description', source) ?? '',
    states,
    transitions,
  };
}

export function parseFlowYaml(content: string, source = 'inline'): FlowDefinition {
  let doc: unknown;
  try {
    doc = yaml.parse(content);
  } catch (err) {
    throw flowError(source, `invalid YAML: ${errorMessage(err)}`);
  }
  return parseFlow(doc, source);
}

export function loadFlowFile(filePath: string): FlowDefinition {
  return parseFlowYaml(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Loads every `*.yaml` / `*.yml` file in a directory, sorted by file name.
 * A missing directory yields no flows.
 */
export function loadFlowsFromDir(dir: string): FlowDefinition[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith('.yaml') || file.endsWith('.yml'))
    .sort()
    .map((file) => loadFlowFile(path.join(dir, file)));
}

export function loadDefaultFlow(): FlowDefinition {
  return loadFlowFile(DEFAULT_FLOW_PATH);
}
