/**
 * Flow validation
 */

import { ValidationError, ErrorCode, TaskQueue, ENTRY_QUEUES, isTerminalQueue, isValidQueueName } from '@tasklane/core';
import type { FlowDefinition } from './types.js';
import { transitionKey } from './types.js';

/**
 * Returns every problem found; an empty list means the flow is usable.
 */
export function validateFlow(flow: FlowDefinition): string[] {
  const errors: string[] = [];
  const prefix = `Flow '${flow.name}' (cluster ${flow.cluster})`;
  const states = new Set(flow.states);

  if (!states.has(TaskQueue.INCOMING)) {
    errors.push(`${prefix} must include the '${TaskQueue.INCOMING}' state`);
  }
  for (const state of flow.states) {
    if (!isValidQueueName(state)) {
      errors.push(`${prefix} has an invalid state name '${state}'`);
    }
  }

  const seen = new Set<string>();
  for (const transition of flow.transitions) {
    const key = transitionKey(transition.from, transition.to);
    if (seen.has(key)) {
      errors.push(`${prefix} defines '${key}' more than once`);
    }
    seen.add(key);

    if (!states.has(transition.from)) {
      errors.push(`${prefix} transition '${key}': unknown state '${transition.from}'`);
    }
    if (!states.has(transition.to)) {
      errors.push(`${prefix} transition '${key}': unknown state '${transition.to}'`);
    }
    if (isTerminalQueue(transition.from)) {
      errors.push(`${prefix} transition '${key}': '${transition.from}' is terminal`);
    }

    for (const condition of transition.conditions) {
      if (condition.type === 'script' && !condition.script) {
        errors.push(`${prefix} transition '${key}' condition '${condition.name}': script conditions must specify 'script'`);
      }
      if (condition.type === 'agent' && !condition.agent) {
        errors.push(`${prefix} transition '${key}' condition '${condition.name}': agent conditions must specify 'agent'`);
      }
      if (condition.onFail !== undefined && !states.has(condition.onFail)) {
        errors.push(
          `${prefix} transition '${key}' condition '${condition.name}': on_fail state '${condition.onFail}' is not a valid state`
        );
      }
    }
  }

  const reachable = new Set(ENTRY_QUEUES.filter((queue) => states.has(queue)));
  let changed = true;
  while (changed) {
    changed = false;
    for (const transition of flow.transitions) {
      const targets = [transition.to, ...transition.conditions.flatMap((c) => (c.onFail ? [c.onFail] : []))];
      if (!reachable.has(transition.from)) continue;
      for (const target of targets) {
        if (!reachable.has(target)) {
          reachable.add(target);
          changed = true;
        }
      }
    }
  }
  const unreachable = flow.states.filter((state) => !reachable.has(state) && !isTerminalQueue(state));
  if (unreachable.length > 0) {
    errors.push(`${prefix} has unreachable states: ${[...unreachable].sort().join(', ')}`);
  }

  return errors;
}

/**
 * @throws ValidationError listing every problem
 */
export function assertValidFlow(flow: FlowDefinition): FlowDefinition {
  const errors = validateFlow(flow);
  if (errors.length > 0) {
    throw new ValidationError(`Invalid flow ${flow.name}: ${errors.join('; ')}`, ErrorCode.INVALID_FLOW, {
      flow: flow.name,
      cluster: flow.cluster,
      errors,
    });
  }
  return flow;
}
