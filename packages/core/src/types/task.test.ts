import { describe, it, expect } from 'vitest';
import {
  TaskQueue,
  Priority,
  createTask,
  validateTask,
  validateTitle,
  validatePriority,
  validateQueueName,
  compareClaimOrder,
  pendingChecks,
  hasPassedAllChecks,
  isTerminalQueue,
  isEntryQueue,
  isLeaseExpired,
  type Task,
} from './task.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

const fixedClock = () => new Date('2026-01-05T10:00:00.000Z');

function makeTask(overrides: Partial<Task> = {}): Task {
  return { ...createTask('TASK-1', { title: 'Write parser' }, { clock: fixedClock }), ...overrides };
}

describe('createTask', () => {
  it('should fill defaults', () => {
    const task = createTask('TASK-1', { title: '  Write parser  ' }, { clock: fixedClock });

    expect(task.title).toBe('Write parser');
    expect(task.queue).toBe(TaskQueue.INCOMING);
    expect(task.priority).toBe(Priority.P2);
    expect(task.cluster).toBe('default');
    expect(task.flow).toBe('default');
    expect(task.branch).toBe('main');
    expect(task.version).toBe(1);
    expect(task.maxAttempts).toBe(3);
    expect(task.createdAt).toBe('2026-01-05T10:00:00.000Z');
    expect(task.updatedAt).toBe(task.createdAt);
  });

  it('should start dependent tasks in blocked', () => {
    const task = createTask('TASK-2', { title: 'Follow-up', blockedBy: 'TASK-1' });
    expect(task.queue).toBe(TaskQueue.BLOCKED);
    expect(task.blockedBy).toBe('TASK-1');
  });

  it('should honor configured defaults', () => {
    const task = createTask('TASK-3', { title: 'x' }, { defaultBranch: 'develop', maxAttempts: 5 });
    expect(task.branch).toBe('develop');
    expect(task.maxAttempts).toBe(5);
  });

  it('should reject an invalid id', () => {
    expect(() => createTask('bad id!', { title: 'x' })).toThrow(ValidationError);
  });

  it('should reject a zero retry budget', () => {
    expect(() => createTask('TASK-4', { title: 'x', maxAttempts: 0 })).toThrow('Invalid task field maxAttempts');
  });
});

describe('validateTitle', () => {
  it('should reject empty titles', () => {
    try {
      validateTitle('   ');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: ErrorCode.MISSING_REQUIRED_FIELD });
    }
  });

  it('should reject titles over 500 characters', () => {
    expect(() => validateTitle('a'.repeat(501))).toThrow('Title too long: 501 characters (max 500)');
  });

  it('should accept 500 characters', () => {
    expect(validateTitle('a'.repeat(500))).toHaveLength(500);
  });
});

describe('validatePriority and validateQueueName', () => {
  it('should accept P0 through P3 only', () => {
    expect(validatePriority('P0')).toBe('P0');
    expect(() => validatePriority('P4')).toThrow('Invalid priority: P4. Must be one of P0, P1, P2, P3');
    expect(() => validatePriority(1)).toThrow(ValidationError);
  });

  it('should accept cluster-defined queue names', () => {
    expect(validateQueueName('security_review')).toBe('security_review');
    expect(() => validateQueueName('Bad Queue')).toThrow('Invalid queue name: Bad Queue');
  });
});

describe('validateTask', () => {
  it('should round-trip a created task', () => {
    const task = makeTask({ checks: ['lint'] });
    expect(validateTask(JSON.parse(JSON.stringify(task)))).toEqual(task);
  });

  it('should reject a claimed task with no lease', () => {
    const raw = { ...makeTask(), queue: 'claimed', claimedBy: 'impl-1' };
    expect(() => validateTask(raw)).toThrow('Invalid task field leaseExpiresAt');
  });

  it('should reject a negative attempt count', () => {
    expect(() => validateTask({ ...makeTask(), attemptCount: -1 })).toThrow('Invalid task field attemptCount');
  });

  it('should reject malformed check results', () => {
    const raw = { ...makeTask(), checkResults: { lint: { status: 'maybe', summary: '' } } };
    expect(() => validateTask(raw)).toThrow('Invalid task field checkResults.lint');
  });

  it('should reject non-objects', () => {
    expect(() => validateTask(null)).toThrow('Task must be an object');
    expect(() => validateTask([])).toThrow('Task must be an object');
  });
});

describe('compareClaimOrder', () => {
  it('should order by priority, then creation time, then id', () => {
    const tasks = [
      makeTask({ id: 'TASK-c', priority: 'P1', createdAt: '2026-01-01T00:00:00.000Z' }),
      makeTask({ id: 'TASK-b', priority: 'P1', createdAt: '2026-01-01T00:00:00.000Z' }),
      makeTask({ id: 'TASK-a', priority: 'P1', createdAt: '2026-01-02T00:00:00.000Z' }),
      makeTask({ id: 'TASK-z', priority: 'P0', createdAt: '2026-01-03T00:00:00.000Z' }),
    ];
    expect(tasks.sort(compareClaimOrder).map((t) => t.id)).toEqual(['TASK-z', 'TASK-b', 'TASK-c', 'TASK-a']);
  });
});

describe('checks and leases', () => {
  it('should list checks without a pass', () => {
    const task = makeTask({
      checks: ['lint', 'tests', 'review'],
      checkResults: {
        lint: { status: 'pass', summary: '', recordedAt: '2026-01-05T10:00:00.000Z' },
        tests: { status: 'fail', summary: '2 failed', recordedAt: '2026-01-05T10:00:00.000Z' },
      },
    });
    expect(pendingChecks(task)).toEqual(['tests', 'review']);
    expect(hasPassedAllChecks(task)).toBe(false);
    expect(hasPassedAllChecks(makeTask())).toBe(true);
  });

  it('should treat done and failed as terminal', () => {
    expect(isTerminalQueue('done')).toBe(true);
    expect(isTerminalQueue('failed')).toBe(true);
    expect(isTerminalQueue('provisional')).toBe(false);
  });

  it('should only take incoming, backlog and blocked as entry queues', () => {
    expect(['incoming', 'backlog', 'blocked'].every(isEntryQueue)).toBe(true);
    expect(isEntryQueue('claimed')).toBe(false);
    expect(isEntryQueue('provisional')).toBe(false);
    expect(isEntryQueue('done')).toBe(false);
  });

  it('should detect expired leases', () => {
    const task = makeTask({ leaseExpiresAt: '2026-01-05T10:05:00.000Z' });
    expect(isLeaseExpired(task, new Date('2026-01-05T10:06:00.000Z'))).toBe(true);
    expect(isLeaseExpired(task, new Date('2026-01-05T10:04:00.000Z'))).toBe(false);
    expect(isLeaseExpired(makeTask(), new Date('2030-01-01T00:00:00.000Z'))).toBe(false);
  });
});
