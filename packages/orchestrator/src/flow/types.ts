/**
 * Flow definitions
 *
 * A flow is a named, cluster-scoped state machine over task queues. Each
 * transition lists the guards checked before the mutation and the effects run
 * once it has committed.
 */

export const GuardName = {
  DEPENDENCY_RESOLVED: 'dependency_resolved',
  ROLE_MATCHES: 'role_matches',
  LEASE_VALID: 'lease_valid',
  VERSION_MATCHES: 'version_matches',
  CHECKS_PASSED: 'checks_passed',
} as const;

export type GuardName = (typeof GuardName)[keyof typeof GuardName];

export const GUARD_NAMES: readonly GuardName[] = Object.values(GuardName);

export function isGuardName(value: unknown): value is GuardName {
  return typeof value === 'string' && GUARD_NAMES.some((name) => name === value);
}

export const BuiltinEffect = {
  RECORD_HISTORY: 'record_history',
  UNBLOCK_DEPENDENTS: 'unblock_dependents',
  PUSH_BRANCH: 'push_branch',
  CREATE_PR: 'create_pr',
  CHECK_MERGEABLE: 'check_mergeable',
  MERGE_PR: 'merge_pr',
  NOTIFY: 'notify',
} as const;

export type BuiltinEffect = (typeof BuiltinEffect)[keyof typeof BuiltinEffect];

export type ConditionType = 'script' | 'agent' | 'manual';

/**
 * A gate on a transition: a configured check script, a review agent, or a
 * human decision.
 */
export interface ConditionDefinition {
  name: string;
  type: ConditionType;
  /** Check name for script conditions */
  script?: string;
  /** Blueprint or role for agent conditions */
  agent?: string;
  /** Queue the task moves to when the condition fails */
  onFail?: string;
}

export interface TransitionDefinition {
  from: string;
  to: string;
  /** Blueprint or role that works on tasks in `from` */
  agent?: string;
  guards: GuardName[];
  /** Effect names in run order */
  effects: string[];
  conditions: ConditionDefinition[];
}

export interface FlowDefinition {
  name: string;
  cluster: string;
  description: string;
  /** Ordered list of queues the flow uses */
  states: string[];
  transitions: TransitionDefinition[];
}

export function transitionKey(from: string, to: string): string {
  return `${from} -> ${to}`;
}
