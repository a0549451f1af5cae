/**
 * Branch merging in a temporary worktree
 *
 *  1. Fetch the remote (when there is one)
 *  2. Create a temp worktree with detached HEAD at <remote>/<target>, or the
 *     local target when the remote ref is missing
 *  3. Squash merge (or --no-ff merge) the source branch
 *  4. Push HEAD:<target>, or move the local target ref when there is no remote
 *  5. Remove the temp worktree (always)
 *  6. Fast-forward the local target branch after a push
 *
 * A dry run stops after step 3: it reports whether the merge would apply and
 * which files conflict, and nothing is committed or pushed.
 *
 * The main checkout's HEAD and index are never touched.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { errorMessage } from '@tasklane/core';
import { createLogger } from '../utils/logger.js';
import { runGit, queryGit, execFailureOutput } from './exec.js';

const logger = createLogger('git-merge');

export interface MergeBranchOptions {
  /** The main repository checkout */
  repoRoot: string;
  /** Where the temporary worktree is created */
  worktreeDir: string;
  sourceBranch: string;
  targetBranch: string;
  /** Remote name; pass undefined for a purely local merge */
  remote?: string;
  /** 'squash' (default) or 'merge' (--no-ff) */
  strategy?: 'squash' | 'merge';
  commitMessage?: string;
  /** Trial merge only */
  dryRun?: boolean;
}

export interface MergeBranchResult {
  success: boolean;
  commitHash?: string;
  hasConflict: boolean;
  error?: string;
  conflictFiles?: string[];
}

const CONFLICT_LINE = /CONFLICT \([^)]+\): Merge conflict in (.+)/g;

export function parseConflictFiles(output: string): string[] {
  const files = [...output.matchAll(CONFLICT_LINE)].map((match) => match[1]?.trim() ?? '').filter(Boolean);
  return [...new Set(files)];
}

export async function hasRemote(repoRoot: string, remote: string): Promise<boolean> {
  return (await queryGit(['remote', 'get-url', remote], repoRoot)) !== undefined;
}

/**
 * Merges `sourceBranch` into `targetBranch` without touching the main
 * checkout. Conflicts are reported in the result rather than thrown.
 */
export async function mergeBranch(options: MergeBranchOptions): Promise<MergeBranchResult> {
  const { repoRoot, sourceBranch, targetBranch, strategy = 'squash' } = options;
  const remote = options.remote && (await hasRemote(repoRoot, options.remote)) ? options.remote : undefined;
  const message =
    options.commitMessage ??
    (strategy === 'squash' ? `Squash merge ${sourceBranch} into ${targetBranch}` : `Merge branch '${sourceBranch}'`);

  let startPoint = targetBranch;
  if (remote) {
    await runGit(['fetch', remote], repoRoot);
    if ((await queryGit(['rev-parse', '--verify', `${remote}/${targetBranch}`], repoRoot)) !== undefined) {
      startPoint = `${remote}/${targetBranch}`;
    }
  }
  const previousTarget = await queryGit(['rev-parse', '--verify', `refs/heads/${targetBranch}`], repoRoot);

  const safeName = sourceBranch.replace(/[^a-zA-Z0-9-]/g, '-');
  const mergeDir = path.join(options.worktreeDir, `_merge-${safeName}-${Date.now()}`);
  fs.mkdirSync(options.worktreeDir, { recursive: true });
  await runGit(['worktree', 'add', '--detach', mergeDir, startPoint], repoRoot);

  let result: MergeBranchResult;
  try {
    if (options.dryRun) {
      await runGit(
        strategy === 'squash' ? ['merge', '--squash', sourceBranch] : ['merge', '--no-commit', '--no-ff', sourceBranch],
        mergeDir
      );
      return { success: true, hasConflict: false };
    }
    if (strategy === 'squash') {
      await runGit(['merge', '--squash', sourceBranch], mergeDir);
      await runGit(['commit', '-m', message], mergeDir);
    } else {
      await runGit(['merge', '--no-ff', '-m', message, sourceBranch], mergeDir);
    }
    const commitHash = (await runGit(['rev-parse', 'HEAD'], mergeDir)).stdout.trim();

    if (remote) {
      await runGit(['push', remote, `HEAD:${targetBranch}`], mergeDir);
    } else {
      const updateArgs = ['update-ref', `refs/heads/${targetBranch}`, commitHash];
      if (previousTarget) updateArgs.push(previousTarget);
      await runGit(updateArgs, repoRoot);
    }
    result = { success: true, commitHash, hasConflict: false };
  } catch (error) {
    const output = `${execFailureOutput(error)}\n${errorMessage(error)}`;
    if (output.includes('CONFLICT') || output.includes('Automatic merge failed')) {
      await abortMerge(mergeDir, strategy);
      result = {
        success: false,
        hasConflict: true,
        error: 'Merge conflict detected',
        conflictFiles: parseConflictFiles(output),
      };
    } else {
      result = { success: false, hasConflict: false, error: errorMessage(error) };
    }
  } finally {
    await removeTempWorktree(repoRoot, mergeDir);
  }

  if (result.success && remote) {
    await syncLocalBranch(repoRoot, remote, targetBranch);
  }
  return result;
}

async function abortMerge(mergeDir: string, strategy: 'squash' | 'merge'): Promise<void> {
  try {
    await runGit(strategy === 'squash' ? ['reset', '--hard', 'HEAD'] : ['merge', '--abort'], mergeDir);
  } catch (error) {
    logger.warn(`Failed to abort merge in ${mergeDir}: ${errorMessage(error)}`);
  }
}

async function removeTempWorktree(repoRoot: string, mergeDir: string): Promise<void> {
  try {
    await runGit(['worktree', 'remove', '--force', mergeDir], repoRoot);
  } catch (error) {
    logger.warn(`Failed to remove temporary worktree ${mergeDir}: ${errorMessage(error)}`);
  }
}

/**
 * Fast-forwards the local target ref to the remote after a push.
 *
 * - Not on the target: `git fetch <remote> target:target` moves the ref only.
 * - On the target: `git merge --ff-only <remote>/target` in place.
 *
 * Divergence is logged; the merge has already landed on the remote.
 */
export async function syncLocalBranch(repoRoot: string, remote: string, targetBranch: string): Promise<void> {
  const currentBranch = await queryGit(['symbolic-ref', '--short', 'HEAD'], repoRoot);
  try {
    if (currentBranch === targetBranch) {
      await runGit(['merge', '--ff-only', `${remote}/${targetBranch}`], repoRoot);
    } else {
      await runGit(['fetch', remote, `${targetBranch}:${targetBranch}`], repoRoot);
    }
  } catch (error) {
    logger.warn(`Failed to fast-forward local ${targetBranch}: ${errorMessage(error)}`);
  }
}
