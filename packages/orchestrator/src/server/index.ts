/**
 * HTTP Server
 *
 * JSON API over the task store and scheduler. Errors carrying a tasklane
 * error code are returned as `{ error }` with the code's HTTP status;
 * anything else is a logged 500.
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { isTasklaneError, errorMessage } from '@tasklane/core';
import { createLogger } from '../utils/logger.js';
import { createHealthRoutes, createTaskRoutes, createSchedulerRoutes } from './routes/index.js';
import { errorResponse } from './request.js';
import type { ServerServices } from './types.js';

export type { ServerServices } from './types.js';
export { API_ORCHESTRATOR_ID } from './routes/index.js';

const logger = createLogger('server');

export const DEFAULT_PORT = 4317;
export const DEFAULT_HOST = '127.0.0.1';

export interface ServerOptions {
  port?: number;
  host?: string;
}

export interface RunningServer {
  port: number;
  host: string;
  close(): Promise<void>;
}

export function createApp(services: ServerServices): Hono {
  const app = new Hono();

  app.onError((error, c) => {
    if (isTasklaneError(error)) {
      if (error.httpStatus >= 500) {
        logger.error(`${c.req.method} ${c.req.path} failed: ${error.message}`);
      }
      return errorResponse(error);
    }
    logger.error(`${c.req.method} ${c.req.path} failed: ${errorMessage(error)}`);
    return c.json({ error: { code: 'INTERNAL_ERROR', message: errorMessage(error) } }, 500);
  });

  app.notFound((c) => c.json({ error: { code: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` } }, 404));

  app.route('/', createHealthRoutes(services));
  app.route('/', createTaskRoutes(services));
  app.route('/', createSchedulerRoutes(services));

  return app;
}

export function startServer(app: Hono, options: ServerOptions = {}): RunningServer {
  const port = options.port ?? DEFAULT_PORT;
  const host = options.host ?? DEFAULT_HOST;
  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info(`Listening on http://${host}:${info.port}`);
  });

  return {
    port,
    host,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
