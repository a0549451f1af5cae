export { createHealthRoutes } from './health.js';
export { createTaskRoutes, API_ORCHESTRATOR_ID } from './tasks.js';
export { createSchedulerRoutes } from './scheduler.js';
