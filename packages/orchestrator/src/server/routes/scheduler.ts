/**
 * Scheduler Routes
 *
 * Status, pause/resume and a manual tick.
 */

import { Hono } from 'hono';
import type { ServerServices } from '../types.js';

export function createSchedulerRoutes(services: ServerServices) {
  const { scheduler } = services;
  const app = new Hono();

  // GET /api/scheduler/status
  app.get('/api/scheduler/status', (c) => {
    return c.json(scheduler.status());
  });

  // POST /api/scheduler/pause
  app.post('/api/scheduler/pause', (c) => {
    scheduler.pause();
    return c.json({ paused: true });
  });

  // POST /api/scheduler/resume
  app.post('/api/scheduler/resume', (c) => {
    scheduler.resume();
    return c.json({ paused: false });
  });

  // POST /api/scheduler/tick
  // Runs one tick now, or joins the one in flight
  app.post('/api/scheduler/tick', async (c) => {
    const result = await scheduler.tick();
    return c.json(result);
  });

  return app;
}
