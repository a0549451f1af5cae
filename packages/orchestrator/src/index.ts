/**
 * @tasklane/orchestrator
 *
 * Task store, flows, claims and leases, the guarded scheduler, the agent
 * pool, git worktrees and the HTTP API.
 */

// Wiring
export { createOrchestrator, type Orchestrator, type OrchestratorOptions } from './orchestrator.js';

// Configuration
export * from './config/index.js';

// Task store
export {
  TaskStore,
  CLEAR_CLAIM,
  type TaskPatch,
  type TaskFilter,
  type ClaimCandidateQuery,
  type HistoryInput,
  type RequeueOptions,
  type OrchestratorRecord,
  type TaskStoreOptions,
} from './store/task-store.js';

// Flows
export * from './flow/index.js';

// Services
export {
  LeaseService,
  CLAIM_BATCH_SIZE,
  type ClaimRequest,
  type FailAttemptOptions,
  type LeaseServiceOptions,
} from './services/lease-service.js';
export { ReviewService, type SubmitOptions, type RecordCheckResult } from './services/review-service.js';
export {
  LocalMergeProvider,
  GitHubMergeProvider,
  createMergeRequestProvider,
  formatMergeReference,
  buildDefaultBody,
  type MergeProviderName,
  type MergeRequestProvider,
  type MergeRequestResult,
  type CreateMergeRequestOptions,
  type MergeOptions,
  type MergeOutcome,
} from './services/merge-request-provider.js';
export {
  runCommand,
  runCheck,
  DEFAULT_CHECK_TIMEOUT_MS,
  type CommandOptions,
  type CommandResult,
  type CheckOutcome,
} from './services/check-runner.js';
export {
  Housekeeping,
  createHousekeepingJobs,
  type HousekeepingJob,
  type HousekeepingJobReport,
  type HousekeepingDeps,
} from './services/housekeeping.js';

// Git
export * from './git/index.js';

// Agent pool and worker runtime
export {
  InstanceTracker,
  systemProcessProbe,
  type AgentInstance,
  type InstanceAuditEntry,
  type ProcessProbe,
  type InstanceTrackerOptions,
} from './pool/instance-tracker.js';
export {
  ProcessTracker,
  MAX_APPLY_FAILURES,
  type FinishedInstance,
  type ReapStatus,
  type ReapReport,
  type ProcessTrackerDeps,
} from './pool/process-tracker.js';
export {
  interpretResult,
  readAgentExit,
  hasPendingResult,
  type AgentExit,
  type WorkOutcome,
  type ReviewDecision,
  type OutcomeSource,
} from './pool/worker-result.js';
export { ProcessSpawner, type WorkerSpawner, type SpawnRequest } from './runtime/spawner.js';
export {
  tasksRoot,
  taskDirectoryFor,
  taskDirectoryAt,
  workerEnvironment,
  prepareTaskDirectory,
  archiveTaskLogs,
  removeTaskDirectory,
  type TaskDirectory,
  type PrepareTaskDirectoryOptions,
} from './runtime/task-directory.js';

// Scheduling
export {
  runGuardChain,
  DEFAULT_GUARDS,
  pausedGuard,
  livenessGuard,
  intervalGuard,
  backpressureGuard,
  poolCapacityGuard,
  preCheckGuard,
  type GuardVerdict,
  type GuardChainContext,
  type GuardChainResult,
  type SchedulerGuard,
  type NamedGuard,
} from './scheduler/guard-chain.js';
export {
  Scheduler,
  agentIdentity,
  type SchedulerDeps,
  type SchedulerEvents,
  type SchedulerStatus,
  type TickResult,
  type BlockedSlot,
} from './scheduler/scheduler.js';

// HTTP API
export {
  createApp,
  startServer,
  DEFAULT_PORT,
  DEFAULT_HOST,
  API_ORCHESTRATOR_ID,
  type ServerServices,
  type ServerOptions,
  type RunningServer,
} from './server/index.js';

// Logging
export { createLogger, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';
