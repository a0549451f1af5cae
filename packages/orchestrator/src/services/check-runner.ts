/**
 * Check Runner
 *
 * Runs configured commands (review checks and blueprint pre-checks) to
 * completion with a timeout, capturing bounded output.
 */

import { spawn } from 'node:child_process';
import type { CheckStatus } from '@tasklane/core';

export const DEFAULT_CHECK_TIMEOUT_MS = 10 * 60_000;

/** Per stream */
const MAX_OUTPUT_LENGTH = 64 * 1024;

/** Characters of output kept in a check summary */
const SUMMARY_LENGTH = 500;

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  timeout?: number;
}

export interface CommandResult {
  success: boolean;
  exitCode?: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: string;
  durationMs: number;
}

export interface CheckOutcome {
  status: CheckStatus;
  summary: string;
}

/**
 * Runs an argv, or a string through `sh -c`.
 */
export function runCommand(command: string | string[], options: CommandOptions): Promise<CommandResult> {
  const [program, ...args] = typeof command === 'string' ? ['sh', '-c', command] : command;
  const timeout = options.timeout ?? DEFAULT_CHECK_TIMEOUT_MS;
  const startTime = Date.now();

  return new Promise((resolve) => {
    if (program === undefined) {
      resolve({ success: false, stdout: '', stderr: '', timedOut: false, error: 'empty command', durationMs: 0 });
      return;
    }
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const child = spawn(program, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    child.stdout.on('data', (data: Buffer) => {
      const chunk = data.toString();
      if (stdout.length + chunk.length <= MAX_OUTPUT_LENGTH) {
        stdout += chunk;
      }
    });

    child.stderr.on('data', (data: Buffer) => {
      const chunk = data.toString();
      if (stderr.length + chunk.length <= MAX_OUTPUT_LENGTH) {
        stderr += chunk;
      }
    });

    child.on('error', (error) => {
      clearTimeout(timeoutHandle);
      resolve({
        success: false,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        timedOut: false,
        error: error.message,
        durationMs: Date.now() - startTime,
      });
    });

    child.on('close', (code) => {
      clearTimeout(timeoutHandle);
      const success = !timedOut && code === 0;
      resolve({
        success,
        exitCode: code ?? undefined,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        timedOut,
        error: timedOut ? `Timed out after ${timeout}ms` : success ? undefined : `Command exited with code ${code}`,
        durationMs: Date.now() - startTime,
      });
    });
  });
}

function lastChars(text: string, length: number): string {
  return text.length <= length ? text : `...${text.slice(text.length - length)}`;
}

/**
 * Runs a check command and reduces it to a pass/fail with a summary: the
 * tail of stderr (or stdout) on failure, "passed" otherwise.
 */
export async function runCheck(command: string, options: CommandOptions): Promise<CheckOutcome> {
  const result = await runCommand(command, options);
  if (result.success) {
    return { status: 'pass', summary: 'passed' };
  }
  const output = result.stderr || result.stdout;
  const summary = output ? `${result.error ?? 'failed'}: ${lastChars(output, SUMMARY_LENGTH)}` : (result.error ?? 'failed');
  return { status: 'fail', summary };
}
