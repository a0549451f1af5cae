import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Hono } from 'hono';
import type { Task } from '@tasklane/core';
import { createFlowRegistry } from '../flow/registry.js';
import { FlowEngine } from '../flow/engine.js';
import { LeaseService } from '../services/lease-service.js';
import { ReviewService } from '../services/review-service.js';
import { Housekeeping } from '../services/housekeeping.js';
import { WorkspaceManager } from '../git/worktree-manager.js';
import { InstanceTracker } from '../pool/instance-tracker.js';
import { Scheduler } from '../scheduler/scheduler.js';
import { setupTestStore, testConfig, type TestStoreContext } from '../testing/test-context.js';
import { createApp } from './index.js';

describe('HTTP API', () => {
  let ctx: TestStoreContext;
  let runtimeDir: string;
  let scheduler: Scheduler;
  let app: Hono;

  function post(url: string, body?: unknown): Promise<Response> {
    return Promise.resolve(
      app.request(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      })
    );
  }

  function get(url: string): Promise<Response> {
    return Promise.resolve(app.request(url));
  }

  beforeEach(() => {
    ctx = setupTestStore();
    runtimeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tasklane-server-'));
    const config = testConfig(runtimeDir, runtimeDir);
    const registry = createFlowRegistry();
    const publisher = { publish: async (task: Task): Promise<string> => `tasklane/${task.id}` };
    const engine = new FlowEngine(ctx.store, registry, { clock: ctx.clock.clock, services: { publisher } });
    const leases = new LeaseService(ctx.store, registry, { clock: ctx.clock.clock });
    const reviews = new ReviewService(ctx.store, engine, { clock: ctx.clock.clock });
    const instances = new InstanceTracker();
    scheduler = new Scheduler({
      config,
      orchestratorId: 'default-box',
      store: ctx.store,
      leases,
      instances,
      housekeeping: new Housekeeping([]),
      workspaces: new WorkspaceManager({
        repoRoot: runtimeDir,
        worktreeDir: config.workspace.worktreeDir,
        remote: 'origin',
        defaultBaseBranch: 'main',
      }),
      spawner: {
        spawn: () => {
          throw new Error('no workers in this test');
        },
      },
      probe: { isAlive: () => false },
      clock: ctx.clock.clock,
    });
    app = createApp({ config, store: ctx.store, leases, reviews, scheduler });
  });

  afterEach(() => {
    ctx.backend.close();
    fs.rmSync(runtimeDir, { recursive: true, force: true });
  });

  it('should report health', async () => {
    const res = await get('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', cluster: 'default', scheduler: 'stopped' });
  });

  describe('tasks', () => {
    it('should create a task in the local cluster', async () => {
      const res = await post('/api/tasks', { id: 'T-1', title: 'Add parser', priority: 'P1', checks: ['unit'] });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        task: { id: 'T-1', title: 'Add parser', queue: 'incoming', cluster: 'default', priority: 'P1', checks: ['unit'] },
      });
    });

    it('should reject a task without a title', async () => {
      const res = await post('/api/tasks', { description: 'no title' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'MISSING_REQUIRED_FIELD', message: 'Missing required field: title' },
      });
    });

    it('should reject an unknown priority', async () => {
      const res = await post('/api/tasks', { title: 'Add parser', priority: 'urgent' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_INPUT', message: 'Invalid priority: urgent. Must be one of P0, P1, P2, P3' },
      });
    });

    it('should refuse to create a task straight into a terminal queue', async () => {
      const res = await post('/api/tasks', { id: 'T-1', title: 'Add parser', queue: 'done' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_INPUT', message: 'Invalid queue: done', details: { field: 'queue' } },
      });
      expect((await get('/api/tasks/T-1')).status).toBe(404);
    });

    it('should reject a body that is not JSON', async () => {
      const res = await Promise.resolve(
        app.request('/api/tasks', { method: 'POST', headers: { 'content-type': 'application/json' }, body: '{' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'INVALID_JSON' } });
    });

    it('should return a task with its history', async () => {
      await post('/api/tasks', { id: 'T-1', title: 'Add parser' });

      const res = await get('/api/tasks/T-1');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ task: { id: 'T-1' }, history: [{ event: 'created' }] });
    });

    it('should 404 on an unknown task', async () => {
      const res = await get('/api/tasks/T-9');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'TASK_NOT_FOUND', message: 'Task not found: T-9' } });
    });

    it('should list tasks by queue', async () => {
      await post('/api/tasks', { id: 'T-1', title: 'First' });
      await post('/api/tasks', { id: 'T-2', title: 'Second', queue: 'backlog' });

      const res = await get('/api/tasks?queue=incoming');

      expect(await res.json()).toMatchObject({ tasks: [{ id: 'T-1' }], total: 1, limit: 100, offset: 0 });
    });
  });

  describe('claims', () => {
    beforeEach(async () => {
      await post('/api/tasks', { id: 'T-1', title: 'Add parser' });
    });

    it('should claim with the default lease', async () => {
      const res = await post('/api/tasks/claim', { agent: 'worker-1' });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        task: {
          id: 'T-1',
          queue: 'claimed',
          claimedBy: 'worker-1',
          orchestratorId: 'api',
          leaseExpiresAt: '2024-01-01T00:05:00.000Z',
        },
      });
    });

    it('should return null when nothing is claimable', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });

      const res = await post('/api/tasks/claim', { agent: 'worker-2' });

      expect(await res.json()).toEqual({ task: null });
    });

    it('should reject an unknown intent', async () => {
      const res = await post('/api/tasks/claim', { agent: 'worker-1', intent: 'steal' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'INVALID_INPUT', details: { field: 'intent' } } });
    });

    it('should submit a claimed task for review', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });

      const res = await post('/api/tasks/T-1/submit', { agent: 'worker-1', notes: 'parser added' });

      expect(await res.json()).toMatchObject({
        task: { queue: 'provisional', claimedBy: null, executionNotes: 'parser added', workBranch: 'tasklane/T-1' },
      });
    });

    it('should refuse a submit from an agent without the lease', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });

      const res = await post('/api/tasks/T-1/submit', { agent: 'worker-2' });

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({
        error: { code: 'LEASE_NOT_HELD', message: 'Agent worker-2 does not hold the lease on task T-1' },
      });
    });

    it('should release a claim back to incoming', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });

      const res = await post('/api/tasks/T-1/release', { agent: 'worker-1', reason: 'shift over' });

      expect(await res.json()).toMatchObject({ task: { queue: 'incoming', claimedBy: null } });
    });

    it('should accept a reviewed task', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });
      await post('/api/tasks/T-1/submit', { agent: 'worker-1' });

      const res = await post('/api/tasks/T-1/accept', { actor: 'reviewer-1' });

      expect(await res.json()).toMatchObject({ task: { queue: 'done' } });
    });

    it('should refuse to requeue a completed task', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });
      await post('/api/tasks/T-1/submit', { agent: 'worker-1' });
      await post('/api/tasks/T-1/accept', { actor: 'reviewer-1' });

      const res = await post('/api/tasks/T-1/requeue', { reason: 'try again' });

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({
        error: { code: 'IMMUTABLE', message: 'Task T-1 is in terminal queue done and cannot be modified' },
      });
      expect(ctx.store.getOrThrow('T-1').queue).toBe('done');
    });

    it('should not ask for a retry when another agent holds the lease', async () => {
      await post('/api/tasks/claim', { agent: 'worker-1' });

      const res = await post('/api/tasks/T-1/renew', { agent: 'worker-2' });

      expect(res.status).toBe(403);
      expect(res.headers.get('retry-after')).toBeNull();
      expect(await res.json()).toMatchObject({ error: { code: 'LEASE_NOT_HELD', retryable: false } });
    });

    it('should reject a provisional task when a check fails', async () => {
      await post('/api/tasks', { id: 'T-2', title: 'Checked', checks: ['unit'], priority: 'P0' });
      await post('/api/tasks/claim', { agent: 'worker-1' });
      await post('/api/tasks/T-2/submit', { agent: 'worker-1' });

      const res = await post('/api/tasks/T-2/checks', { name: 'unit', status: 'fail', summary: '2 failing', actor: 'ci' });

      expect(await res.json()).toMatchObject({
        rejected: true,
        task: { queue: 'incoming', executionNotes: 'Check unit failed: 2 failing' },
      });
    });

    it('should reject an unknown check status', async () => {
      const res = await post('/api/tasks/T-1/checks', { name: 'unit', status: 'green', actor: 'ci' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'INVALID_INPUT', details: { field: 'status' } } });
    });
  });

  describe('scheduler', () => {
    it('should pause and resume scheduling', async () => {
      expect(await (await post('/api/scheduler/pause')).json()).toEqual({ paused: true });
      expect(await (await get('/api/scheduler/status')).json()).toMatchObject({
        paused: true,
        running: false,
        orchestratorId: 'default-box',
        instances: [],
      });

      await post('/api/scheduler/resume');

      expect(scheduler.isPaused()).toBe(false);
    });

    it('should run a tick on demand', async () => {
      const res = await post('/api/scheduler/tick');

      expect(await res.json()).toMatchObject({ paused: false, spawned: [], blocked: [], requeued: [] });
    });
  });

  it('should 404 on an unknown route', async () => {
    const res = await get('/api/nothing');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
  });
});
