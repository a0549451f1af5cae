/**
 * Merge Request Provider
 *
 * Abstracts opening and merging a task's branch so flows work against a
 * hosting backend (GitHub through the `gh` CLI) or with plain git.
 *
 * @module
 */

import { spawn } from 'node:child_process';
import type { Task } from '@tasklane/core';
import type { WorkspaceManager } from '../git/worktree-manager.js';

// ============================================================================
// Types
// ============================================================================

export interface MergeRequestResult {
  readonly url?: string;
  readonly id?: number;
  readonly provider: string;
}

export interface CreateMergeRequestOptions {
  readonly title: string;
  readonly body: string;
  readonly sourceBranch: string;
  readonly targetBranch: string;
}

export interface MergeOptions {
  readonly sourceBranch: string;
  readonly targetBranch: string;
  readonly commitMessage: string;
}

export interface MergeOutcome {
  readonly merged: boolean;
  readonly conflict: boolean;
  readonly commitHash?: string;
  readonly error?: string;
  readonly conflictFiles?: string[];
}

export interface MergeRequestProvider {
  readonly name: string;
  createMergeRequest(task: Task, options: CreateMergeRequestOptions): Promise<MergeRequestResult>;
  merge(task: Task, options: MergeOptions): Promise<MergeOutcome>;
}

/**
 * The reference stored on the task: the URL when there is one, otherwise
 * `<provider>:<branch>`.
 */
export function formatMergeReference(result: MergeRequestResult, sourceBranch: string): string {
  if (result.url) return result.url;
  if (result.id !== undefined) return `${result.provider}#${result.id}`;
  return `${result.provider}:${sourceBranch}`;
}

export function buildDefaultBody(task: Task): string {
  return `## Task\n\n**ID:** ${task.id}\n**Title:** ${task.title}\n\n${task.description}`.trimEnd();
}

// ============================================================================
// LocalMergeProvider: plain git, no hosting backend
// ============================================================================

/**
 * Opens nothing remotely; merging squash-merges in a temporary worktree.
 */
export class LocalMergeProvider implements MergeRequestProvider {
  readonly name = 'local';

  constructor(private readonly workspaces: WorkspaceManager) {}

  async createMergeRequest(_task: Task, _options: CreateMergeRequestOptions): Promise<MergeRequestResult> {
    return { provider: this.name };
  }

  async merge(_task: Task, options: MergeOptions): Promise<MergeOutcome> {
    const result = await this.workspaces.mergeBranches(options.sourceBranch, options.targetBranch, options.commitMessage);
    return {
      merged: result.success,
      conflict: result.hasConflict,
      commitHash: result.commitHash,
      error: result.error,
      conflictFiles: result.conflictFiles,
    };
  }
}

// ============================================================================
// GitHubMergeProvider: pull requests through the `gh` CLI
// ============================================================================

interface GhResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function runGh(args: string[], cwd: string): Promise<GhResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn('gh', args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code: number | null) => {
      resolve({ code, stdout, stderr });
    });

    proc.on('error', (err: Error) => {
      reject(new Error(`Failed to spawn gh: ${err.message}`));
    });
  });
}

export class GitHubMergeProvider implements MergeRequestProvider {
  readonly name = 'github';

  constructor(private readonly repoRoot: string) {}

  async createMergeRequest(task: Task, options: CreateMergeRequestOptions): Promise<MergeRequestResult> {
    const result = await runGh(
      [
        'pr', 'create',
        '--title', options.title || task.title,
        '--body', options.body || buildDefaultBody(task),
        '--head', options.sourceBranch,
        '--base', options.targetBranch,
      ],
      this.repoRoot
    );
    if (result.code !== 0) {
      throw new Error(`gh pr create failed (code ${result.code}): ${result.stderr}`);
    }
    const url = result.stdout.trim();
    const match = url.match(/\/pull\/(\d+)$/);
    return { url, id: match?.[1] ? parseInt(match[1], 10) : undefined, provider: this.name };
  }

  async merge(task: Task, options: MergeOptions): Promise<MergeOutcome> {
    const target = task.prReference ?? options.sourceBranch;
    const result = await runGh(
      ['pr', 'merge', target, '--squash', '--subject', options.commitMessage],
      this.repoRoot
    );
    if (result.code === 0) {
      return { merged: true, conflict: false };
    }
    const conflict = /not mergeable|merge conflict/i.test(result.stderr);
    return { merged: false, conflict, error: result.stderr.trim() || `gh pr merge exited with ${result.code}` };
  }
}

// ============================================================================
// Factory
// ============================================================================

export type MergeProviderName = 'local' | 'github';

export function createMergeRequestProvider(name: MergeProviderName, workspaces: WorkspaceManager): MergeRequestProvider {
  return name === 'github' ? new GitHubMergeProvider(workspaces.repoRoot) : new LocalMergeProvider(workspaces);
}
