/**
 * Worker Spawner
 *
 * Launches a worker detached from the orchestrator, through a small sh
 * wrapper that records the worker's exit status in the task directory.
 * The caller's register callback runs as soon as the OS has reported the
 * pid, before the child is unref'd, so a spawned worker is never
 * untracked.
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import { spawnFailed, errorMessage } from '@tasklane/core';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('spawner');

/** `$0` is the exit file, the worker argv follows */
const EXIT_WRAPPER = '"$@"; code=$?; printf "%s\\n" "$code" > "$0"; exit "$code"';

export interface SpawnRequest {
  taskId: string;
  /** Worker argv */
  command: string[];
  cwd: string;
  env: Record<string, string>;
  /** stdout and stderr are appended here */
  logFile: string;
  /** Written by the wrapper when the worker exits */
  exitCodeFile: string;
}

export interface WorkerSpawner {
  /**
   * Starts the worker and calls register with its pid before letting go of
   * it. Throws if the process could not be started or register throws.
   *
   * @returns the pid
   */
  spawn(request: SpawnRequest, register: (pid: number) => void): number;
}

/**
 * Workers are spawned detached, so each leads its own process group; the
 * negative pid reaches the wrapper and everything it started.
 */
function killProcessGroup(pid: number): void {
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (error) {
    logger.warn(`Could not kill process group ${pid}: ${errorMessage(error)}`);
  }
}

export class ProcessSpawner implements WorkerSpawner {
  constructor(private readonly baseEnv: NodeJS.ProcessEnv = process.env) {}

  spawn(request: SpawnRequest, register: (pid: number) => void): number {
    const [program] = request.command;
    if (program === undefined) {
      throw spawnFailed(request.taskId, 'empty worker command');
    }
    if (!fs.existsSync(request.cwd)) {
      throw spawnFailed(request.taskId, `working directory ${request.cwd} does not exist`);
    }

    const log = fs.openSync(request.logFile, 'a');
    try {
      const child = spawn('/bin/sh', ['-c', EXIT_WRAPPER, request.exitCodeFile, ...request.command], {
        cwd: request.cwd,
        env: { ...this.baseEnv, ...request.env },
        detached: true,
        stdio: ['ignore', log, log],
      });
      child.on('error', (error) => {
        logger.error(`Worker for ${request.taskId} reported an error: ${error.message}`);
      });

      const pid = child.pid;
      if (pid === undefined) {
        throw spawnFailed(request.taskId, 'the OS did not report a pid');
      }
      try {
        register(pid);
      } catch (error) {
        // An unregistered worker would be invisible to reaping
        killProcessGroup(pid);
        throw spawnFailed(request.taskId, `registering pid ${pid} failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
      }
      child.unref();
      logger.info(`Spawned worker ${pid} for ${request.taskId}: ${request.command.join(' ')}`);
      return pid;
    } finally {
      fs.closeSync(log);
    }
  }
}
