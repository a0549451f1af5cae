/**
 * @tasklane/core
 *
 * Task types, structured errors and id generation shared by the
 * storage and orchestrator packages.
 */

// Types - Task, queues, priorities, checks, history, timestamps
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';

// ID Generation
export * from './id/index.js';
