/**
 * git command execution
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { gitError } from '@tasklane/core';

const execFileAsync = promisify(execFile);

export const GIT_OPERATION_TIMEOUT_MS = 120_000;

export interface GitOutput {
  stdout: string;
  stderr: string;
}

interface ExecFailure {
  stdout?: unknown;
  stderr?: unknown;
  message?: unknown;
}

function isExecFailure(value: unknown): value is ExecFailure {
  return typeof value === 'object' && value !== null;
}

/**
 * stdout, stderr and message of a failed child process, concatenated
 */
export function execFailureOutput(error: unknown): string {
  if (!isExecFailure(error)) {
    return String(error);
  }
  return [error.stdout, error.stderr, error.message]
    .filter((part): part is string => typeof part === 'string' && part.length > 0)
    .join('\n');
}

/**
 * Runs git in `cwd`. Failures become an OrchestrationError with code
 * GIT_ERROR whose message carries git's stderr.
 */
export async function runGit(args: string[], cwd: string): Promise<GitOutput> {
  try {
    const { stdout, stderr } = await execFileAsync('git', args, {
      cwd,
      encoding: 'utf8',
      timeout: GIT_OPERATION_TIMEOUT_MS,
      maxBuffer: 10 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (err) {
    const output = execFailureOutput(err).trim();
    throw gitError(args.join(' '), output || 'unknown error', err instanceof Error ? err : undefined);
  }
}

/**
 * Runs a git query whose failure is an answer, e.g. `rev-parse --verify`.
 *
 * @returns trimmed stdout, or undefined when git exits non-zero
 */
export async function queryGit(args: string[], cwd: string): Promise<string | undefined> {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd, encoding: 'utf8', timeout: GIT_OPERATION_TIMEOUT_MS });
    return stdout.trim();
  } catch (err) {
    if (isExecFailure(err) && 'code' in err && typeof err.code === 'number') {
      return undefined;
    }
    throw gitError(args.join(' '), execFailureOutput(err), err instanceof Error ? err : undefined);
  }
}
