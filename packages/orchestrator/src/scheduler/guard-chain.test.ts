import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as os from 'node:os';
import { TaskQueue } from '@tasklane/core';
import { InstanceTracker, type ProcessProbe } from '../pool/instance-tracker.js';
import { seedTask, setupTestStore, testBlueprint, TEST_EPOCH, type TestStoreContext } from '../testing/test-context.js';
import {
  runGuardChain,
  pausedGuard,
  livenessGuard,
  intervalGuard,
  backpressureGuard,
  poolCapacityGuard,
  preCheckGuard,
  type GuardChainContext,
} from './guard-chain.js';

describe('guard chain', () => {
  let ctx: TestStoreContext;
  let instances: InstanceTracker;
  let alive: Set<number>;
  const probe: ProcessProbe = { isAlive: (pid) => alive.has(pid) };

  function guardContext(overrides: Partial<GuardChainContext> = {}): GuardChainContext {
    return {
      blueprint: testBlueprint(),
      slot: 0,
      cluster: 'default',
      paused: false,
      now: new Date(TEST_EPOCH),
      queueLimits: { maxClaimed: 2, maxProvisional: 2 },
      store: ctx.store,
      instances,
      probe,
      cwd: os.tmpdir(),
      ...overrides,
    };
  }

  function track(pid: number, slot = 0): void {
    instances.register({
      pid,
      blueprint: 'implementer',
      slot,
      taskId: `T-${pid}`,
      agent: `implementer-${slot}`,
      intent: 'work',
      expectedQueue: TaskQueue.CLAIMED,
      taskDir: `/tmp/tasks/T-${pid}`,
      startedAt: TEST_EPOCH,
      applyFailures: 0,
    });
  }

  beforeEach(() => {
    ctx = setupTestStore();
    instances = new InstanceTracker();
    alive = new Set();
  });

  afterEach(() => {
    ctx.backend.close();
  });

  it('should block on a system or blueprint pause', () => {
    expect(pausedGuard(guardContext({ paused: true }))).toEqual({ proceed: false, reason: 'system paused' });
    expect(pausedGuard(guardContext({ blueprint: testBlueprint({ paused: true }) }))).toEqual({
      proceed: false,
      reason: 'blueprint implementer paused',
    });
    expect(pausedGuard(guardContext())).toEqual({ proceed: true });
  });

  it('should keep a slot busy until its instance is reaped', () => {
    track(1001);
    alive.add(1001);
    expect(livenessGuard(guardContext())).toEqual({ proceed: false, reason: 'slot 0 running pid 1001' });

    alive.delete(1001);
    expect(livenessGuard(guardContext())).toEqual({ proceed: false, reason: 'slot 0 pid 1001 exited, awaiting reap' });
    expect(livenessGuard(guardContext({ slot: 1 }))).toEqual({ proceed: true });
  });

  it('should space spawns by the blueprint interval', () => {
    const blueprint = testBlueprint({ interval: 60_000 });
    const lastSpawnAt = new Date(Date.parse(TEST_EPOCH) - 10_000);

    expect(intervalGuard(guardContext({ blueprint, lastSpawnAt }))).toEqual({
      proceed: false,
      reason: 'interval: 10000ms of 60000ms elapsed',
    });
    expect(intervalGuard(guardContext({ blueprint, lastSpawnAt: new Date(Date.parse(TEST_EPOCH) - 60_000) }))).toEqual({
      proceed: true,
    });
    expect(intervalGuard(guardContext({ blueprint }))).toEqual({ proceed: true });
  });

  describe('backpressure', () => {
    it('should need a claimable task for the blueprint role', () => {
      expect(backpressureGuard(guardContext())).toEqual({ proceed: false, reason: 'no claimable tasks in incoming' });

      ctx.store.create({ id: 'T-1', title: 'Docs', role: 'writer' });
      expect(backpressureGuard(guardContext())).toEqual({ proceed: false, reason: 'no claimable tasks in incoming' });

      ctx.store.create({ id: 'T-2', title: 'Code', role: 'implementer' });
      expect(backpressureGuard(guardContext())).toEqual({ proceed: true });
    });

    it('should hold work claims at the claimed and provisional ceilings', () => {
      ctx.store.create({ id: 'T-1', title: 'Next' });
      seedTask(ctx, { id: 'T-2', title: 'Busy', queue: TaskQueue.CLAIMED });
      seedTask(ctx, { id: 'T-3', title: 'Busy', queue: TaskQueue.CLAIMED });
      expect(backpressureGuard(guardContext())).toEqual({ proceed: false, reason: 'claimed 2 >= 2' });

      const blueprint = testBlueprint({ maxClaimed: 5, maxProvisional: 1 });
      seedTask(ctx, { id: 'T-4', title: 'Waiting', queue: TaskQueue.PROVISIONAL });
      expect(backpressureGuard(guardContext({ blueprint }))).toEqual({ proceed: false, reason: 'provisional 1 >= 1' });
    });

    it('should let review claims drain provisional past its ceiling', () => {
      for (const id of ['T-1', 'T-2', 'T-3']) {
        seedTask(ctx, { id, title: 'Review me', queue: TaskQueue.PROVISIONAL });
      }
      const blueprint = testBlueprint({
        name: 'reviewer',
        role: 'reviewer',
        capabilities: { needsWorkspace: false, claimSourceQueue: TaskQueue.PROVISIONAL, claimIntent: 'review' },
      });
      expect(backpressureGuard(guardContext({ blueprint }))).toEqual({ proceed: true });
    });
  });

  it('should cap running instances per blueprint', () => {
    track(1001, 0);
    const blueprint = testBlueprint({ maxInstances: 2 });
    expect(poolCapacityGuard(guardContext({ blueprint, slot: 1 }))).toEqual({ proceed: true });

    track(1002, 1);
    expect(poolCapacityGuard(guardContext({ blueprint, slot: 1 }))).toEqual({
      proceed: false,
      reason: '2 of 2 instances running',
    });
  });

  it('should run the pre-check command', async () => {
    expect(await preCheckGuard(guardContext({ blueprint: testBlueprint({ preCheck: ['true'] }) }))).toEqual({
      proceed: true,
    });
    expect(await preCheckGuard(guardContext({ blueprint: testBlueprint({ preCheck: ['false'] }) }))).toEqual({
      proceed: false,
      reason: 'pre-check: Command exited with code 1',
    });
  });

  describe('runGuardChain', () => {
    it('should stop at the first blocking guard', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      track(1001);
      alive.add(1001);

      expect(await runGuardChain(guardContext())).toEqual({
        proceed: false,
        reason: 'slot 0 running pid 1001',
        guard: 'liveness',
      });
    });

    it('should proceed when every guard passes', async () => {
      ctx.store.create({ id: 'T-1', title: 'Task' });
      expect(await runGuardChain(guardContext())).toEqual({ proceed: true });
    });

    it('should block the slot when a guard throws', async () => {
      const result = await runGuardChain(guardContext(), [
        {
          name: 'broken',
          check: () => {
            throw new Error('probe unavailable');
          },
        },
      ]);
      expect(result).toEqual({ proceed: false, guard: 'broken', reason: 'probe unavailable' });
    });
  });
});
