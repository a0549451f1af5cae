/**
 * Task Routes
 *
 * Task CRUD plus the queue operations: claim, renew, release, submit,
 * accept, reject, requeue and check recording.
 */

import { Hono } from 'hono';
import type { CreateTaskInput, ClaimIntent } from '@tasklane/core';
import { TaskQueue, invalidInput, isClaimIntent, isCheckStatus, validatePriority } from '@tasklane/core';
import type { TransitionResult } from '../../flow/engine.js';
import type { TaskFilter } from '../../store/task-store.js';
import type { ServerServices } from '../types.js';
import {
  readJsonBody,
  requireString,
  optionalString,
  optionalInteger,
  optionalStringArray,
  queryInteger,
  type JsonBody,
} from '../request.js';

/** Orchestrator id recorded on claims made through the API */
export const API_ORCHESTRATOR_ID = 'api';

const DEFAULT_PAGE_SIZE = 100;

function transitionBody(result: TransitionResult) {
  return { task: result.task, effects: result.effects };
}

function readCreateInput(body: JsonBody): CreateTaskInput {
  const priority = body.priority;
  return {
    id: optionalString(body, 'id'),
    title: requireString(body, 'title'),
    description: optionalString(body, 'description'),
    cluster: optionalString(body, 'cluster'),
    flow: optionalString(body, 'flow'),
    queue: optionalString(body, 'queue'),
    priority: priority === undefined || priority === null ? undefined : validatePriority(priority),
    role: optionalString(body, 'role'),
    checks: optionalStringArray(body, 'checks'),
    blockedBy: optionalString(body, 'blockedBy'),
    branch: optionalString(body, 'branch'),
    maxAttempts: optionalInteger(body, 'maxAttempts'),
  };
}

function readIntent(body: JsonBody): ClaimIntent {
  const intent = body.intent ?? 'work';
  if (!isClaimIntent(intent)) {
    throw invalidInput('intent', intent, "'work' or 'review'");
  }
  return intent;
}

export function createTaskRoutes(services: ServerServices) {
  const { config, store, leases, reviews } = services;
  const cluster = config.orchestrator.cluster;
  const defaultLeaseSeconds = Math.ceil(config.leases.duration / 1000);
  const app = new Hono();

  // GET /api/tasks?queue=&cluster=&role=&flow=&limit=&offset=
  app.get('/api/tasks', (c) => {
    const queue = c.req.queries('queue');
    const filter: TaskFilter = {
      queue: queue && queue.length > 0 ? queue : undefined,
      cluster: c.req.query('cluster') ?? cluster,
      role: c.req.query('role'),
      flow: c.req.query('flow'),
    };
    const total = store.count(filter);
    const limit = queryInteger(c, 'limit') ?? DEFAULT_PAGE_SIZE;
    const offset = queryInteger(c, 'offset') ?? 0;
    const tasks = store.list({ ...filter, limit, offset });
    return c.json({ tasks, total, limit, offset });
  });

  // POST /api/tasks
  app.post('/api/tasks', async (c) => {
    const body = await readJsonBody(c);
    const input = readCreateInput(body);
    const task = store.create({ ...input, cluster: input.cluster ?? cluster }, optionalString(body, 'actor') ?? null);
    return c.json({ task }, 201);
  });

  // POST /api/tasks/claim
  // Registered before /api/tasks/:id so "claim" is never read as an id
  app.post('/api/tasks/claim', async (c) => {
    const body = await readJsonBody(c);
    const intent = readIntent(body);
    const task = leases.claim({
      agent: requireString(body, 'agent'),
      intent,
      sourceQueue:
        optionalString(body, 'sourceQueue') ?? (intent === 'review' ? TaskQueue.PROVISIONAL : TaskQueue.INCOMING),
      role: optionalString(body, 'role'),
      cluster: optionalString(body, 'cluster') ?? cluster,
      leaseSeconds: optionalInteger(body, 'leaseSeconds') ?? defaultLeaseSeconds,
      orchestratorId: optionalString(body, 'orchestratorId') ?? API_ORCHESTRATOR_ID,
    });
    return c.json({ task });
  });

  // GET /api/tasks/:id
  app.get('/api/tasks/:id', (c) => {
    const task = store.getOrThrow(c.req.param('id'));
    return c.json({ task, history: store.history(task.id) });
  });

  // POST /api/tasks/:id/renew
  app.post('/api/tasks/:id/renew', async (c) => {
    const body = await readJsonBody(c);
    const task = leases.renewLease(
      c.req.param('id'),
      requireString(body, 'agent'),
      optionalInteger(body, 'leaseSeconds') ?? defaultLeaseSeconds
    );
    return c.json({ task });
  });

  // POST /api/tasks/:id/release
  app.post('/api/tasks/:id/release', async (c) => {
    const body = await readJsonBody(c);
    const task = leases.release(c.req.param('id'), requireString(body, 'agent'), optionalString(body, 'reason'));
    return c.json({ task });
  });

  // POST /api/tasks/:id/submit
  app.post('/api/tasks/:id/submit', async (c) => {
    const body = await readJsonBody(c);
    const result = await reviews.submit(c.req.param('id'), requireString(body, 'agent'), {
      notes: optionalString(body, 'notes'),
    });
    return c.json(transitionBody(result));
  });

  // POST /api/tasks/:id/accept
  app.post('/api/tasks/:id/accept', async (c) => {
    const body = await readJsonBody(c);
    const result = await reviews.accept(c.req.param('id'), requireString(body, 'actor'));
    return c.json(transitionBody(result));
  });

  // POST /api/tasks/:id/reject
  app.post('/api/tasks/:id/reject', async (c) => {
    const body = await readJsonBody(c);
    const result = await reviews.reject(c.req.param('id'), requireString(body, 'actor'), requireString(body, 'reason'));
    return c.json(transitionBody(result));
  });

  // POST /api/tasks/:id/requeue
  app.post('/api/tasks/:id/requeue', async (c) => {
    const body = await readJsonBody(c);
    const countAttempt = body.countAttempt;
    if (countAttempt !== undefined && typeof countAttempt !== 'boolean') {
      throw invalidInput('countAttempt', countAttempt, 'boolean');
    }
    const task = store.requeue(c.req.param('id'), {
      queue: optionalString(body, 'queue'),
      reason: optionalString(body, 'reason'),
      actor: optionalString(body, 'actor'),
      countAttempt,
    });
    return c.json({ task });
  });

  // POST /api/tasks/:id/checks
  app.post('/api/tasks/:id/checks', async (c) => {
    const body = await readJsonBody(c);
    const status = body.status;
    if (!isCheckStatus(status)) {
      throw invalidInput('status', status, "'pass', 'fail' or 'pending'");
    }
    const result = await reviews.recordCheck(
      c.req.param('id'),
      requireString(body, 'name'),
      status,
      optionalString(body, 'summary') ?? '',
      requireString(body, 'actor')
    );
    return c.json({ task: result.task, rejected: result.rejection !== undefined });
  });

  // GET /api/orchestrators
  app.get('/api/orchestrators', (c) => {
    return c.json({ orchestrators: store.listOrchestrators(c.req.query('cluster') ?? cluster) });
  });

  return app;
}
