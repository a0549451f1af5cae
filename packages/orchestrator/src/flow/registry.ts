/**
 * Flow registry, keyed by (name, cluster)
 */

import { DEFAULT_CLUSTER, flowNotFound } from '@tasklane/core';
import type { FlowDefinition, TransitionDefinition } from './types.js';
import { assertValidFlow } from './validation.js';
import { loadDefaultFlow, loadFlowsFromDir } from './loader.js';

function registryKey(name: string, cluster: string): string {
  return `${cluster}/${name}`;
}

export class FlowRegistry {
  private readonly flows = new Map<string, FlowDefinition>();

  /**
   * Validates and registers a flow, replacing any flow with the same key.
   */
  register(flow: FlowDefinition): void {
    assertValidFlow(flow);
    this.flows.set(registryKey(flow.name, flow.cluster), flow);
  }

  /**
   * A cluster's own flow wins. Only when the cluster defines no flow of that
   * name does the lookup fall back to the default cluster; another tenant's
   * flow is never returned.
   */
  get(name: string, cluster: string): FlowDefinition | undefined {
    return this.flows.get(registryKey(name, cluster)) ?? this.flows.get(registryKey(name, DEFAULT_CLUSTER));
  }

  /**
   * @throws NotFoundError when neither the cluster nor the default cluster has the flow
   */
  require(name: string, cluster: string): FlowDefinition {
    const flow = this.get(name, cluster);
    if (!flow) {
      throw flowNotFound(name, cluster);
    }
    return flow;
  }

  findTransition(name: string, cluster: string, from: string, to: string): TransitionDefinition | undefined {
    return this.get(name, cluster)?.transitions.find((t) => t.from === from && t.to === to);
  }

  canTransition(name: string, cluster: string, from: string, to: string): boolean {
    return this.findTransition(name, cluster, from, to) !== undefined;
  }

  transitionsFrom(name: string, cluster: string, from: string): TransitionDefinition[] {
    return this.get(name, cluster)?.transitions.filter((t) => t.from === from) ?? [];
  }

  list(): FlowDefinition[] {
    return [...this.flows.values()];
  }
}

export interface FlowRegistryOptions {
  /** Directory of additional flow files */
  flowsDir?: string;
  /** Register the bundled default flow first (default: true) */
  includeDefault?: boolean;
}

export function createFlowRegistry(options: FlowRegistryOptions = {}): FlowRegistry {
  const registry = new FlowRegistry();
  if (options.includeDefault !== false) {
    registry.register(loadDefaultFlow());
  }
  if (options.flowsDir) {
    for (const flow of loadFlowsFromDir(options.flowsDir)) {
      registry.register(flow);
    }
  }
  return registry;
}
