export * from './types.js';
export { validateFlow, assertValidFlow } from './validation.js';
export {
  parseFlow,
  parseFlowYaml,
  loadFlowFile,
  loadFlowsFromDir,
  loadDefaultFlow,
  DEFAULT_FLOW_PATH,
} from './loader.js';
export { FlowRegistry, createFlowRegistry, type FlowRegistryOptions } from './registry.js';
export { TRANSITION_GUARDS, checkTransitionGuards, type GuardContext, type TransitionGuard } from './guards.js';
export {
  createBuiltinEffects,
  type EffectContext,
  type EffectHandler,
  type EffectResult,
  type EffectOutcome,
  type EffectServices,
  type BranchPublisher,
  type MergeabilityChecker,
  type TransitionNotification,
} from './effects.js';
export {
  FlowEngine,
  type FlowEngineOptions,
  type TransitionOptions,
  type TransitionResult,
} from './engine.js';
