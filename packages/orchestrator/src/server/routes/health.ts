/**
 * Health Route
 */

import { Hono } from 'hono';
import type { ServerServices } from '../types.js';

export function createHealthRoutes(services: ServerServices) {
  const app = new Hono();

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      cluster: services.config.orchestrator.cluster,
      scheduler: services.scheduler.isRunning() ? 'running' : 'stopped',
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
