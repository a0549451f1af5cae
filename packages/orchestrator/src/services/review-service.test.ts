import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorCode, TaskQueue, type Task } from '@tasklane/core';
import { createFlowRegistry } from '../flow/registry.js';
import { FlowEngine } from '../flow/engine.js';
import { setupTestStore, type TestStoreContext } from '../testing/test-context.js';
import { LeaseService, type ClaimRequest } from './lease-service.js';
import { ReviewService } from './review-service.js';

const WORK: ClaimRequest = {
  sourceQueue: TaskQueue.INCOMING,
  intent: 'work',
  agent: 'implementer-1',
  orchestratorId: 'default-box',
  leaseSeconds: 300,
};

describe('ReviewService', () => {
  let ctx: TestStoreContext;
  let leases: LeaseService;
  let reviews: ReviewService;
  let published: string[];

  function claim(): Task {
    const task = leases.claim(WORK);
    if (!task) throw new Error('nothing to claim');
    return task;
  }

  beforeEach(() => {
    ctx = setupTestStore();
    const registry = createFlowRegistry();
    published = [];
    const publisher = {
      publish: async (task: Task): Promise<string> => {
        published.push(task.id);
        return `tasklane/${task.id}`;
      },
    };
    const engine = new FlowEngine(ctx.store, registry, { clock: ctx.clock.clock, services: { publisher } });
    leases = new LeaseService(ctx.store, registry, { clock: ctx.clock.clock });
    reviews = new ReviewService(ctx.store, engine, { clock: ctx.clock.clock });
  });

  afterEach(() => {
    ctx.backend.close();
  });

  describe('submit', () => {
    it('should move the holder task to provisional and clear the claim', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      claim();
      ctx.clock.advance(120_000);

      const result = await reviews.submit('T-1', 'implementer-1', { notes: 'done, see diff' });

      expect(result.task).toMatchObject({
        queue: TaskQueue.PROVISIONAL,
        claimedBy: null,
        leaseExpiresAt: null,
        workBranch: 'tasklane/T-1',
        submittedAt: '2024-01-01T00:02:00.000Z',
        executionNotes: 'done, see diff',
      });
      expect(published).toEqual(['T-1']);
    });

    it('should refuse a submit from an agent without the lease', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      claim();

      await expect(reviews.submit('T-1', 'someone-else')).rejects.toMatchObject({ code: ErrorCode.LEASE_NOT_HELD });
    });

    it('should refuse a submit after the lease expired', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      claim();
      ctx.clock.advance(6 * 60_000);

      await expect(reviews.submit('T-1', 'implementer-1')).rejects.toMatchObject({ code: ErrorCode.LEASE_EXPIRED });
      expect(ctx.store.getOrThrow('T-1').queue).toBe(TaskQueue.CLAIMED);
    });
  });

  describe('reject', () => {
    it('should count the rejection, return to incoming and keep the branch', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      claim();
      await reviews.submit('T-1', 'implementer-1');
      leases.claim({ ...WORK, sourceQueue: TaskQueue.PROVISIONAL, intent: 'review', agent: 'reviewer-1' });

      const result = await reviews.reject('T-1', 'reviewer-1', 'missing tests');

      expect(result.task).toMatchObject({
        queue: TaskQueue.INCOMING,
        rejectionCount: 1,
        claimedBy: null,
        claimedAt: null,
        leaseExpiresAt: null,
        orchestratorId: null,
        workBranch: 'tasklane/T-1',
        executionNotes: 'missing tests',
      });
      expect(ctx.store.history('T-1').filter((h) => h.event === 'rejected')).toEqual([
        expect.objectContaining({ fromQueue: 'provisional', toQueue: 'incoming', details: expect.objectContaining({ reason: 'missing tests' }) }),
      ]);
    });

    it('should refuse to reject a task that is not provisional', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      await expect(reviews.reject('T-1', 'reviewer-1', 'nope')).rejects.toMatchObject({
        code: ErrorCode.INVALID_TRANSITION,
      });
    });
  });

  describe('accept', () => {
    it('should complete a provisional task', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      claim();
      await reviews.submit('T-1', 'implementer-1');
      ctx.clock.advance(1000);

      const result = await reviews.accept('T-1', 'reviewer-1');

      expect(result.task).toMatchObject({ queue: TaskQueue.DONE, completedAt: '2024-01-01T00:00:01.000Z' });
    });
  });

  describe('checks', () => {
    it('should reject on a failing check and wait for acceptance once all pass', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task', checks: ['A', 'B'] });
      claim();
      await reviews.submit('T-1', 'implementer-1');

      const failed = await reviews.recordCheck('T-1', 'A', 'fail', '2 tests failed', 'ci');

      expect(failed.rejection?.task.queue).toBe(TaskQueue.INCOMING);
      expect(failed.task).toMatchObject({ queue: TaskQueue.INCOMING, rejectionCount: 1 });
      expect(failed.task.checkResults.A).toMatchObject({ status: 'fail', summary: '2 tests failed' });
      expect(failed.task.executionNotes).toBe('Check A failed: 2 tests failed');

      claim();
      await reviews.submit('T-1', 'implementer-1');
      await reviews.recordCheck('T-1', 'A', 'pass', 'ok', 'ci');
      const passed = await reviews.recordCheck('T-1', 'B', 'pass', 'ok', 'ci');

      expect(passed.rejection).toBeUndefined();
      expect(passed.task).toMatchObject({ queue: TaskQueue.PROVISIONAL, rejectionCount: 1 });
      expect(passed.task.checkResults).toMatchObject({ A: { status: 'pass' }, B: { status: 'pass' } });
    });

    it('should only record checks on tasks outside provisional', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task', checks: ['A'] });
      const result = await reviews.recordCheck('T-1', 'A', 'fail', 'early run', 'ci');
      expect(result.rejection).toBeUndefined();
      expect(result.task).toMatchObject({ queue: TaskQueue.INCOMING, rejectionCount: 0 });
    });
  });
});
