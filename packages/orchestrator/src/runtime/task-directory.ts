/**
 * Task Directory
 *
 * The worker's side of the contract lives in `<runtimeDir>/tasks/<taskId>/`:
 *
 * - `worktree/`   the git workspace (when the blueprint needs one)
 * - `task.json`   the task as claimed
 * - `env.sh`      the variables the worker is also spawned with
 * - `scripts/`    the blueprint's helper scripts
 * - `result.json` written by the worker on completion
 * - `notes.md`    progress notes; non-empty without a result means "continue"
 * - `exit_code`   written by the spawn wrapper
 * - `worker.log`  stdout and stderr
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Task } from '@tasklane/core';
import { createTimestamp } from '@tasklane/core';

export interface TaskDirectory {
  taskId: string;
  root: string;
  worktree: string;
  taskFile: string;
  envFile: string;
  scriptsDir: string;
  resultFile: string;
  notesFile: string;
  exitCodeFile: string;
  logFile: string;
}

export interface PrepareTaskDirectoryOptions {
  cluster: string;
  workBranch: string;
  /** Set when the worker runs inside a worktree */
  worktree?: string;
  /** Blueprint scripts copied into scripts/ */
  scriptsSource?: string;
  /** Blueprint env, applied after the standard variables */
  env?: Record<string, string>;
}

export function tasksRoot(runtimeDir: string): string {
  return path.join(runtimeDir, 'tasks');
}

export function taskDirectoryFor(runtimeDir: string, taskId: string): TaskDirectory {
  return taskDirectoryAt(path.join(tasksRoot(runtimeDir), taskId), taskId);
}

export function taskDirectoryAt(root: string, taskId: string): TaskDirectory {
  return {
    taskId,
    root,
    worktree: path.join(root, 'worktree'),
    taskFile: path.join(root, 'task.json'),
    envFile: path.join(root, 'env.sh'),
    scriptsDir: path.join(root, 'scripts'),
    resultFile: path.join(root, 'result.json'),
    notesFile: path.join(root, 'notes.md'),
    exitCodeFile: path.join(root, 'exit_code'),
    logFile: path.join(root, 'worker.log'),
  };
}

/** Single-quoted for sh */
function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function workerEnvironment(
  dir: TaskDirectory,
  task: Task,
  options: PrepareTaskDirectoryOptions
): Record<string, string> {
  return {
    TASK_ID: task.id,
    TASK_TITLE: task.title,
    BASE_BRANCH: task.branch,
    WORK_BRANCH: options.workBranch,
    RESULT_FILE: dir.resultFile,
    NOTES_FILE: dir.notesFile,
    WORKTREE: options.worktree ?? '',
    SCRIPTS_DIR: dir.scriptsDir,
    TASKLANE_CLUSTER: options.cluster,
    ...options.env,
  };
}

/**
 * Writes task.json, env.sh and scripts/, and clears the previous attempt's
 * result and exit code. notes.md survives so a continuation can read it.
 *
 * @returns the worker environment
 */
export function prepareTaskDirectory(
  dir: TaskDirectory,
  task: Task,
  options: PrepareTaskDirectoryOptions
): Record<string, string> {
  fs.mkdirSync(dir.scriptsDir, { recursive: true });
  fs.rmSync(dir.resultFile, { force: true });
  fs.rmSync(dir.exitCodeFile, { force: true });

  const env = workerEnvironment(dir, task, options);
  fs.writeFileSync(dir.taskFile, `${JSON.stringify(task, null, 2)}\n`);
  const exports = Object.entries(env).map(([name, value]) => `export ${name}=${shellQuote(value)}`);
  fs.writeFileSync(dir.envFile, `${exports.join('\n')}\n`);

  if (options.scriptsSource !== undefined && fs.existsSync(options.scriptsSource)) {
    fs.cpSync(options.scriptsSource, dir.scriptsDir, { recursive: true });
  }
  return env;
}

/**
 * Moves worker.log to `<runtimeDir>/logs/` under a timestamped name.
 *
 * @returns the archived path, or undefined when there was no log
 */
export function archiveTaskLogs(dir: TaskDirectory, runtimeDir: string): string | undefined {
  if (!fs.existsSync(dir.logFile)) {
    return undefined;
  }
  const logsDir = path.join(runtimeDir, 'logs');
  fs.mkdirSync(logsDir, { recursive: true });
  const stamp = createTimestamp().replace(/[:.]/g, '-');
  const target = path.join(logsDir, `${dir.taskId}-${stamp}.log`);
  fs.renameSync(dir.logFile, target);
  return target;
}

export function removeTaskDirectory(dir: TaskDirectory): void {
  fs.rmSync(dir.root, { recursive: true, force: true });
}
