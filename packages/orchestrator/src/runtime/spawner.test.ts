import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCode } from '@tasklane/core';
import { systemProcessProbe } from '../pool/instance-tracker.js';
import { waitFor } from '../testing/test-utils.js';
import { ProcessSpawner, type SpawnRequest } from './spawner.js';

describe('ProcessSpawner', () => {
  let root: string;
  let request: SpawnRequest;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tasklane-spawn-'));
    request = {
      taskId: 'T-1',
      command: ['sh', '-c', 'echo "working on $TASK_ID"; exit 3'],
      cwd: root,
      env: { TASK_ID: 'T-1' },
      logFile: path.join(root, 'worker.log'),
      exitCodeFile: path.join(root, 'exit_code'),
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should register the pid and record output and exit code', async () => {
    const registered: number[] = [];
    const pid = new ProcessSpawner().spawn(request, (p) => registered.push(p));

    expect(registered).toEqual([pid]);
    await waitFor(() => fs.existsSync(request.exitCodeFile), { timeout: 5000 });
    await waitFor(() => !systemProcessProbe.isAlive(pid), { timeout: 5000 });

    expect(fs.readFileSync(request.exitCodeFile, 'utf8')).toBe('3\n');
    expect(fs.readFileSync(request.logFile, 'utf8')).toBe('working on T-1\n');
  });

  it('should reject an empty command', () => {
    expect(() => new ProcessSpawner().spawn({ ...request, command: [] }, () => undefined)).toThrowError(
      expect.objectContaining({ code: ErrorCode.SPAWN_FAILED })
    );
  });

  it('should reject a missing working directory', () => {
    const cwd = path.join(root, 'missing');
    expect(() => new ProcessSpawner().spawn({ ...request, cwd }, () => undefined)).toThrowError(
      `Failed to spawn worker for task T-1: working directory ${cwd} does not exist`
    );
  });

  it('should kill the worker when registration fails', async () => {
    let spawned = 0;
    const spawner = new ProcessSpawner();

    expect(() =>
      spawner.spawn({ ...request, command: ['sleep', '30'] }, (pid) => {
        spawned = pid;
        throw new Error('state file is read-only');
      })
    ).toThrowError(/registering pid \d+ failed: state file is read-only/);

    await waitFor(() => !systemProcessProbe.isAlive(spawned), { timeout: 5000 });
  });
});
