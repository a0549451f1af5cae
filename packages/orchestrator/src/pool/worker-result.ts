/**
 * Worker outcome determination
 *
 * Signals, strongest first:
 *  1. result.json written by the worker
 *  2. exit_code written by the spawn wrapper (non-zero is a crash)
 *  3. a non-empty notes.md, read as a request to continue
 *  4. nothing at all: a failure, logged as degraded
 */

import * as fs from 'node:fs';
import { errorMessage } from '@tasklane/core';
import type { TaskDirectory } from '../runtime/task-directory.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('worker-result');

export type WorkOutcome = 'done' | 'submitted' | 'failed' | 'needs_continuation';
export type ReviewDecision = 'approve' | 'reject';

export type OutcomeSource = 'result' | 'exit_code' | 'notes' | 'degraded';

export type AgentExit =
  | { kind: 'success'; source: OutcomeSource; notes?: string }
  | { kind: 'failure'; source: OutcomeSource; reason: string }
  | { kind: 'crash'; source: OutcomeSource; reason: string; exitCode: number }
  | { kind: 'needs_continuation'; source: OutcomeSource; notes?: string }
  | { kind: 'review'; source: OutcomeSource; decision: ReviewDecision; comment: string };

const WORK_OUTCOMES: readonly string[] = ['done', 'submitted', 'failed', 'needs_continuation'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Interprets a parsed result.json.
 *
 * Work workers write `{outcome, reason?, notes?}`; review workers write
 * `{status: 'success', decision, comment}` or `{status: 'failure', message}`.
 */
export function interpretResult(raw: unknown): AgentExit {
  if (!isRecord(raw)) {
    return { kind: 'failure', source: 'result', reason: 'result.json is not an object' };
  }

  if (raw.decision === 'approve' || raw.decision === 'reject') {
    return {
      kind: 'review',
      source: 'result',
      decision: raw.decision,
      comment: optionalString(raw.comment) ?? '',
    };
  }
  if (raw.status === 'failure') {
    return { kind: 'failure', source: 'result', reason: optionalString(raw.message) ?? 'Worker reported failure' };
  }

  const outcome = raw.outcome;
  if (typeof outcome !== 'string' || !WORK_OUTCOMES.includes(outcome)) {
    return { kind: 'failure', source: 'result', reason: `Unknown outcome in result.json: ${String(outcome)}` };
  }
  switch (outcome) {
    case 'failed':
      return { kind: 'failure', source: 'result', reason: optionalString(raw.reason) ?? 'Worker reported failure' };
    case 'needs_continuation':
      return { kind: 'needs_continuation', source: 'result', notes: optionalString(raw.notes) };
    default:
      return { kind: 'success', source: 'result', notes: optionalString(raw.notes) };
  }
}

function readExitCode(file: string): number | undefined {
  if (!fs.existsSync(file)) return undefined;
  const code = Number.parseInt(fs.readFileSync(file, 'utf8').trim(), 10);
  return Number.isNaN(code) ? undefined : code;
}

function readNotes(file: string): string | undefined {
  if (!fs.existsSync(file)) return undefined;
  const notes = fs.readFileSync(file, 'utf8').trim();
  return notes.length > 0 ? notes : undefined;
}

/**
 * True when the worker left something that decides its outcome. The lease
 * sweep leaves such tasks to the reaper.
 */
export function hasPendingResult(dir: TaskDirectory): boolean {
  return fs.existsSync(dir.resultFile) || fs.existsSync(dir.exitCodeFile);
}

/**
 * Reads the outcome of a finished worker. Never infers success from
 * anything but result.json.
 */
export function readAgentExit(dir: TaskDirectory): AgentExit {
  if (fs.existsSync(dir.resultFile)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(dir.resultFile, 'utf8'));
    } catch (error) {
      return { kind: 'failure', source: 'result', reason: `Invalid result.json: ${errorMessage(error)}` };
    }
    return interpretResult(parsed);
  }

  const exitCode = readExitCode(dir.exitCodeFile);
  if (exitCode !== undefined && exitCode !== 0) {
    return { kind: 'crash', source: 'exit_code', reason: `Worker exited with code ${exitCode}`, exitCode };
  }

  const notes = readNotes(dir.notesFile);
  if (notes !== undefined) {
    return { kind: 'needs_continuation', source: 'notes', notes };
  }

  if (exitCode === 0) {
    return { kind: 'failure', source: 'exit_code', reason: 'Worker exited cleanly without writing result.json' };
  }

  logger.warn(`No result.json, exit_code or notes for ${dir.taskId}; treating the run as failed`);
  return { kind: 'failure', source: 'degraded', reason: 'No result.json produced' };
}
