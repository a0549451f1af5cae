import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { TaskQueue, TaskEvent, type ClaimIntent, type Task } from '@tasklane/core';
import { createFlowRegistry } from '../flow/registry.js';
import { FlowEngine } from '../flow/engine.js';
import { LeaseService } from '../services/lease-service.js';
import { ReviewService } from '../services/review-service.js';
import { ProcessSpawner } from '../runtime/spawner.js';
import { taskDirectoryFor, type TaskDirectory } from '../runtime/task-directory.js';
import { setupTestStore, TEST_EPOCH, type TestStoreContext } from '../testing/test-context.js';
import { waitFor } from '../testing/test-utils.js';
import { InstanceTracker, systemProcessProbe } from './instance-tracker.js';
import { ProcessTracker, MAX_APPLY_FAILURES } from './process-tracker.js';

describe('ProcessTracker', () => {
  let ctx: TestStoreContext;
  let runtimeDir: string;
  let leases: LeaseService;
  let reviews: ReviewService;
  let instances: InstanceTracker;
  let alive: Set<number>;
  let tracker: ProcessTracker;

  function claim(intent: ClaimIntent = 'work'): Task {
    const task = leases.claim({
      sourceQueue: intent === 'work' ? TaskQueue.INCOMING : TaskQueue.PROVISIONAL,
      intent,
      agent: intent === 'work' ? 'implementer-0' : 'reviewer-0',
      orchestratorId: 'default-box',
      leaseSeconds: 300,
    });
    if (!task) throw new Error('nothing to claim');
    return task;
  }

  function track(task: Task, intent: ClaimIntent = 'work', pid = 1001): TaskDirectory {
    const dir = taskDirectoryFor(runtimeDir, task.id);
    fs.mkdirSync(dir.root, { recursive: true });
    instances.register({
      pid,
      blueprint: intent === 'work' ? 'implementer' : 'reviewer',
      slot: 0,
      taskId: task.id,
      agent: task.claimedBy ?? 'nobody',
      intent,
      expectedQueue: task.queue,
      taskDir: dir.root,
      startedAt: TEST_EPOCH,
      applyFailures: 0,
    });
    return dir;
  }

  function writeResult(dir: TaskDirectory, result: unknown): void {
    fs.writeFileSync(dir.resultFile, JSON.stringify(result));
    fs.writeFileSync(dir.exitCodeFile, '0\n');
  }

  async function submitted(): Promise<Task> {
    ctx.store.create({ id: 'T-1', title: 'Task' });
    claim();
    await reviews.submit('T-1', 'implementer-0');
    return claim('review');
  }

  beforeEach(() => {
    ctx = setupTestStore();
    runtimeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tasklane-pool-'));
    const registry = createFlowRegistry();
    const publisher = { publish: async (task: Task): Promise<string> => `tasklane/${task.id}` };
    const engine = new FlowEngine(ctx.store, registry, { clock: ctx.clock.clock, services: { publisher } });
    leases = new LeaseService(ctx.store, registry, { clock: ctx.clock.clock });
    reviews = new ReviewService(ctx.store, engine, { clock: ctx.clock.clock });
    instances = new InstanceTracker();
    alive = new Set();
    tracker = new ProcessTracker({
      store: ctx.store,
      engine,
      leases,
      reviews,
      instances,
      probe: { isAlive: (pid) => alive.has(pid) },
      clock: ctx.clock.clock,
    });
  });

  afterEach(() => {
    ctx.backend.close();
    fs.rmSync(runtimeDir, { recursive: true, force: true });
  });

  describe('work results', () => {
    it('should leave running workers alone', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      track(claim());
      alive.add(1001);

      expect(await tracker.reapFinished()).toEqual([]);
      expect(tracker.isRunning('T-1')).toBe(true);
      expect(instances.count()).toBe(1);
    });

    it('should submit a successful result', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const dir = track(claim());
      writeResult(dir, { outcome: 'done', notes: 'all green' });

      expect(await tracker.reapFinished()).toEqual([{ taskId: 'T-1', pid: 1001, exit: 'success', status: 'applied' }]);
      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.PROVISIONAL,
        claimedBy: null,
        executionNotes: 'all green',
        workBranch: 'tasklane/T-1',
      });
      expect(instances.count()).toBe(0);
      expect(tracker.isRunning('T-1')).toBe(false);
    });

    it('should apply a result that finished after the lease lapsed', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const dir = track(claim());
      writeResult(dir, { outcome: 'submitted' });
      ctx.clock.advance(10 * 60_000);

      await tracker.reapFinished();

      expect(ctx.store.getOrThrow('T-1').queue).toBe(TaskQueue.PROVISIONAL);
    });

    it('should count a reported failure as an attempt', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const dir = track(claim());
      writeResult(dir, { outcome: 'failed', reason: 'cannot reproduce' });

      await tracker.reapFinished();

      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.INCOMING,
        attemptCount: 1,
        claimedBy: null,
        executionNotes: 'cannot reproduce',
      });
    });

    it('should requeue a crashed worker with the crash recorded', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const dir = track(claim());
      fs.writeFileSync(dir.exitCodeFile, '137\n');

      expect(await tracker.reapFinished()).toEqual([{ taskId: 'T-1', pid: 1001, exit: 'crash', status: 'applied' }]);
      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.INCOMING,
        attemptCount: 1,
        executionNotes: 'Worker 1001 exited without a result for task T-1 (Worker exited with code 137)',
      });
      expect(ctx.store.history('T-1').at(-1)).toMatchObject({ event: TaskEvent.REQUEUED, actor: 'pool' });
    });

    it('should park a task that asks to continue', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const dir = track(claim());
      fs.writeFileSync(dir.notesFile, 'migrated half the handlers');
      fs.writeFileSync(dir.exitCodeFile, '0\n');

      await tracker.reapFinished();

      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.NEEDS_CONTINUATION,
        claimedBy: null,
        attemptCount: 0,
        executionNotes: 'migrated half the handlers',
      });
    });

    it('should discard a result for a task that moved on', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const task = claim();
      const dir = track(task);
      leases.expireLease(task);
      writeResult(dir, { outcome: 'done' });

      expect(await tracker.reapFinished()).toEqual([{ taskId: 'T-1', pid: 1001, exit: 'success', status: 'stale' }]);
      expect(ctx.store.getOrThrow('T-1')).toMatchObject({ queue: TaskQueue.INCOMING, attemptCount: 1 });
      expect(instances.count()).toBe(0);
    });

    it('should reap a real worker killed by a signal as a crash', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const task = claim();
      const dir = taskDirectoryFor(runtimeDir, task.id);
      fs.mkdirSync(dir.root, { recursive: true });
      const realTracker = new ProcessTracker({
        store: ctx.store,
        engine: new FlowEngine(ctx.store, createFlowRegistry(), { clock: ctx.clock.clock }),
        leases,
        reviews,
        instances,
        probe: systemProcessProbe,
        clock: ctx.clock.clock,
      });

      const pid = new ProcessSpawner().spawn(
        {
          taskId: task.id,
          command: ['sh', '-c', 'kill -9 $$'],
          cwd: dir.root,
          env: {},
          logFile: dir.logFile,
          exitCodeFile: dir.exitCodeFile,
        },
        (spawned) =>
          instances.register({
            pid: spawned,
            blueprint: 'implementer',
            slot: 0,
            taskId: task.id,
            agent: 'implementer-0',
            intent: 'work',
            expectedQueue: TaskQueue.CLAIMED,
            taskDir: dir.root,
            startedAt: TEST_EPOCH,
            applyFailures: 0,
          })
      );
      await waitFor(() => fs.existsSync(dir.exitCodeFile) && !systemProcessProbe.isAlive(pid), { timeout: 5000 });

      const reports = await realTracker.reapFinished();

      expect(reports).toEqual([{ taskId: 'T-1', pid, exit: 'crash', status: 'applied' }]);
      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.INCOMING,
        attemptCount: 1,
        executionNotes: `Worker ${pid} exited without a result for task T-1 (Worker exited with code 137)`,
      });
    });
  });

  describe('circuit breaker', () => {
    it('should retry a failing result application, then fail the task', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      const dir = track(claim());
      writeResult(dir, { outcome: 'done' });
      vi.spyOn(reviews, 'submit').mockRejectedValue(new Error('database is locked'));

      expect((await tracker.reapFinished())[0]?.status).toBe('retry');
      expect(instances.get(1001)?.applyFailures).toBe(1);
      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.CLAIMED,
        claimedBy: 'implementer-0',
        executionNotes: 'Applying success result failed: database is locked',
      });
      expect(ctx.store.history('T-1').at(-1)?.event).toBe(TaskEvent.RESULT_APPLY_FAILED);

      for (let i = 2; i < MAX_APPLY_FAILURES; i++) {
        expect((await tracker.reapFinished())[0]?.status).toBe('retry');
      }
      expect((await tracker.reapFinished())[0]?.status).toBe('failed');

      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.FAILED,
        claimedBy: null,
        completedAt: TEST_EPOCH,
      });
      expect(ctx.store.history('T-1').at(-1)).toMatchObject({ event: TaskEvent.FAILED, actor: 'pool' });
      expect(instances.count()).toBe(0);
    });
  });

  describe('review results', () => {
    it('should accept on approval', async () => {
      const task = await submitted();
      const dir = track(task, 'review', 2001);
      writeResult(dir, { status: 'success', decision: 'approve', comment: 'lgtm' });

      expect(await tracker.reapFinished()).toEqual([{ taskId: 'T-1', pid: 2001, exit: 'review', status: 'applied' }]);
      expect(ctx.store.getOrThrow('T-1')).toMatchObject({ queue: TaskQueue.DONE, claimedBy: null });
    });

    it('should reject with the reviewer comment', async () => {
      const task = await submitted();
      const dir = track(task, 'review', 2001);
      writeResult(dir, { status: 'success', decision: 'reject', comment: 'missing tests' });

      await tracker.reapFinished();

      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.INCOMING,
        rejectionCount: 1,
        executionNotes: 'missing tests',
        claimedBy: null,
      });
    });

    it('should hold an approval until checks pass', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task', checks: ['unit'] });
      claim();
      await reviews.submit('T-1', 'implementer-0');
      const dir = track(claim('review'), 'review', 2001);
      writeResult(dir, { decision: 'approve' });

      await tracker.reapFinished();

      expect(ctx.store.getOrThrow('T-1')).toMatchObject({ queue: TaskQueue.PROVISIONAL, claimedBy: null });
      expect(ctx.store.history('T-1').at(-1)).toMatchObject({
        event: TaskEvent.RELEASED,
        actor: 'reviewer-0',
        details: { reason: 'approved, waiting for checks: unit' },
      });
    });

    it('should release the review claim when the reviewer crashes', async () => {
      const task = await submitted();
      const dir = track(task, 'review', 2001);
      fs.writeFileSync(dir.exitCodeFile, '1\n');

      await tracker.reapFinished();

      expect(ctx.store.getOrThrow('T-1')).toMatchObject({
        queue: TaskQueue.PROVISIONAL,
        claimedBy: null,
        attemptCount: 0,
      });
    });
  });
});
