/**
 * Workspace Manager
 *
 * One git worktree per task attempt. Worktrees are always created detached at
 * the task's base reference (preferring <remote>/<base>), because the base may
 * already be checked out as a named branch elsewhere. A named branch is only
 * materialized right before pushing.
 *
 * Each worktree has a manifest beside it recording the reference it was
 * created from and the commit it started at; reuse decisions read that
 * manifest instead of comparing against the base's current tip. A task whose
 * work branch survives from an earlier attempt starts from that branch.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Task, Timestamp } from '@tasklane/core';
import { createTimestamp, errorMessage, gitError, isValidTimestamp } from '@tasklane/core';
import { createLogger } from '../utils/logger.js';
import { runGit, queryGit } from './exec.js';
import { mergeBranch, hasRemote, type MergeBranchResult } from './merge.js';

const logger = createLogger('workspace');

// ============================================================================
// Types
// ============================================================================

export interface WorkspaceManifest {
  taskId: string;
  /** Branch the task asked for, e.g. `main` */
  originRef: string;
  /** Ref actually checked out, e.g. `origin/main` */
  startPoint: string;
  startCommit: string;
  createdAt: Timestamp;
}

export interface WorkspaceHandle {
  taskId: string;
  path: string;
  manifestPath: string;
  manifest: WorkspaceManifest;
}

export interface WorkspaceManagerConfig {
  repoRoot: string;
  /** Default parent of worktrees, also used for temporary merge worktrees */
  worktreeDir: string;
  remote: string;
  defaultBaseBranch: string;
  /** Where a task's worktree lives (default: <worktreeDir>/<taskId>) */
  worktreePathFor?: (taskId: string) => string;
}

export interface CleanupOptions {
  /** Delete the work branch locally and on the remote. Only for done tasks. */
  deleteBranch?: string;
}

export interface PushOptions {
  /** Overwrite the remote branch, as after a rebase; refused if it moved since the last fetch */
  force?: boolean;
}

export interface Mergeability {
  mergeable: boolean;
  conflictFiles: string[];
}

export interface RebaseResult {
  success: boolean;
  hasConflict: boolean;
  error?: string;
}

// ============================================================================
// Manifest
// ============================================================================

function isManifest(value: unknown): value is WorkspaceManifest {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    typeof record.taskId === 'string' &&
    typeof record.originRef === 'string' &&
    typeof record.startPoint === 'string' &&
    typeof record.startCommit === 'string' &&
    isValidTimestamp(record.createdAt)
  );
}

export function workBranchFor(task: Pick<Task, 'id' | 'workBranch'>): string {
  return task.workBranch ?? `tasklane/${task.id}`;
}

export function manifestPathFor(worktreePath: string): string {
  return path.join(path.dirname(worktreePath), `${path.basename(worktreePath)}.manifest.json`);
}

export function readManifest(manifestPath: string): WorkspaceManifest | undefined {
  if (!fs.existsSync(manifestPath)) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
  } catch (error) {
    logger.warn(`Ignoring unreadable workspace manifest ${manifestPath}: ${errorMessage(error)}`);
    return undefined;
  }
  return isManifest(parsed) ? parsed : undefined;
}

// ============================================================================
// WorkspaceManager
// ============================================================================

export class WorkspaceManager {
  private readonly config: Required<WorkspaceManagerConfig>;

  constructor(config: WorkspaceManagerConfig) {
    this.config = {
      ...config,
      repoRoot: path.resolve(config.repoRoot),
      worktreeDir: path.resolve(config.worktreeDir),
      worktreePathFor: config.worktreePathFor ?? ((taskId) => path.join(path.resolve(config.worktreeDir), taskId)),
    };
  }

  get repoRoot(): string {
    return this.config.repoRoot;
  }

  worktreePath(taskId: string): string {
    return this.config.worktreePathFor(taskId);
  }

  /** Name of the branch pushed for a task */
  workBranchName(task: Task): string {
    return workBranchFor(task);
  }

  /**
   * The existing workspace for a task, if its directory and manifest are present
   */
  open(taskId: string): WorkspaceHandle | undefined {
    const worktreePath = this.worktreePath(taskId);
    const manifestPath = manifestPathFor(worktreePath);
    const manifest = readManifest(manifestPath);
    if (!manifest || !fs.existsSync(worktreePath)) {
      return undefined;
    }
    return { taskId, path: worktreePath, manifestPath, manifest };
  }

  /**
   * Reuses a matching workspace or creates a fresh detached one.
   */
  async prepare(task: Task): Promise<WorkspaceHandle> {
    const existing = this.open(task.id);
    if (existing) {
      if (await this.shouldReuse(existing, task)) {
        logger.debug(`Reusing workspace for ${task.id} at ${existing.path}`);
        return existing;
      }
      logger.info(`Recreating workspace for ${task.id}: created from ${existing.manifest.originRef}, task wants ${task.branch}`);
      await this.cleanup(existing);
    } else if (fs.existsSync(this.worktreePath(task.id))) {
      await this.removeWorktree(this.worktreePath(task.id));
    }
    return this.create(task);
  }

  /**
   * Reuse when the workspace was created from the task's branch and its HEAD
   * still descends from the commit it started at. A base that has moved
   * ahead since does not matter.
   */
  async shouldReuse(handle: WorkspaceHandle, task: Task): Promise<boolean> {
    if (handle.manifest.originRef !== task.branch) {
      return false;
    }
    if (!fs.existsSync(handle.path)) {
      return false;
    }
    const head = await queryGit(['rev-parse', 'HEAD'], handle.path);
    if (head === undefined) {
      return false;
    }
    const onOriginalLine = await queryGit(
      ['merge-base', '--is-ancestor', handle.manifest.startCommit, head],
      handle.path
    );
    return onOriginalLine !== undefined;
  }

  /**
   * Puts the workspace on branch `name`. Already on it is a no-op. From a
   * detached HEAD a missing branch is created; an existing one is checked out
   * and fast-forwarded to HEAD. A HEAD that diverged from the existing branch
   * is an error, as is any other branch.
   */
  async ensureNamedBranch(handle: WorkspaceHandle, name: string): Promise<void> {
    const current = await queryGit(['symbolic-ref', '--quiet', '--short', 'HEAD'], handle.path);
    if (current === name) {
      return;
    }
    if (current !== undefined) {
      throw gitError('checkout', `workspace for ${handle.taskId} is on branch ${current}, expected ${name} or a detached HEAD`);
    }
    const branchTip = await queryGit(['rev-parse', '--verify', '--quiet', `refs/heads/${name}`], handle.path);
    if (branchTip === undefined) {
      await runGit(['checkout', '-b', name], handle.path);
      return;
    }

    const head = (await runGit(['rev-parse', 'HEAD'], handle.path)).stdout.trim();
    if (await this.isAncestor(head, branchTip, handle.path)) {
      await runGit(['checkout', name], handle.path);
      return;
    }
    if (await this.isAncestor(branchTip, head, handle.path)) {
      await runGit(['checkout', name], handle.path);
      await runGit(['merge', '--ff-only', head], handle.path);
      return;
    }
    throw gitError(
      'checkout',
      `workspace for ${handle.taskId} at ${head.slice(0, 8)} has diverged from existing branch ${name} at ${branchTip.slice(0, 8)}`
    );
  }

  /**
   * Pushes the current branch. Without a configured remote there is nothing
   * to push to and false is returned.
   */
  async push(handle: WorkspaceHandle, options: PushOptions = {}): Promise<boolean> {
    if (!(await hasRemote(this.config.repoRoot, this.config.remote))) {
      return false;
    }
    const branch = await queryGit(['symbolic-ref', '--quiet', '--short', 'HEAD'], handle.path);
    if (branch === undefined) {
      throw gitError('push', `workspace for ${handle.taskId} has no named branch to push`);
    }
    const args = options.force ? ['push', '--force-with-lease', '--set-upstream'] : ['push', '--set-upstream'];
    await runGit([...args, this.config.remote, branch], handle.path);
    return true;
  }

  /**
   * Materializes the work branch and pushes it. Returns the branch name.
   */
  async publish(task: Task): Promise<string> {
    const handle = this.open(task.id);
    if (!handle) {
      throw gitError('push', `no workspace for task ${task.id}`);
    }
    const branch = this.workBranchName(task);
    await this.ensureNamedBranch(handle, branch);
    await this.push(handle);
    return branch;
  }

  /**
   * Removes the worktree and its manifest. The work branch is deleted only
   * when asked, which callers do for done tasks alone.
   */
  async cleanup(handle: Pick<WorkspaceHandle, 'path' | 'manifestPath'>, options: CleanupOptions = {}): Promise<void> {
    await this.removeWorktree(handle.path);
    fs.rmSync(handle.manifestPath, { force: true });

    const branch = options.deleteBranch;
    if (!branch) {
      return;
    }
    if (await hasRemote(this.config.repoRoot, this.config.remote)) {
      try {
        await runGit(['push', this.config.remote, '--delete', branch], this.config.repoRoot);
      } catch (error) {
        logger.warn(`Failed to delete remote branch ${this.config.remote}/${branch}: ${errorMessage(error)}`);
      }
    }
    if ((await queryGit(['rev-parse', '--verify', `refs/heads/${branch}`], this.config.repoRoot)) !== undefined) {
      await runGit(['branch', '-D', branch], this.config.repoRoot);
    }
  }

  /**
   * Cleans up by task id, whether or not a manifest survived.
   */
  async cleanupTask(taskId: string, options: CleanupOptions = {}): Promise<void> {
    const worktreePath = this.worktreePath(taskId);
    await this.cleanup({ path: worktreePath, manifestPath: manifestPathFor(worktreePath) }, options);
  }

  /**
   * Rebases the workspace onto the latest base. A conflict aborts the rebase
   * and is reported, not thrown.
   */
  async rebaseOnBase(handle: WorkspaceHandle): Promise<RebaseResult> {
    await this.fetchBase(handle.manifest.originRef);
    const onto = await this.resolveStartPoint(handle.manifest.originRef);
    try {
      await runGit(['rebase', onto], handle.path);
      return { success: true, hasConflict: false };
    } catch (error) {
      const message = errorMessage(error);
      if (message.includes('CONFLICT') || message.includes('could not apply')) {
        await runGit(['rebase', '--abort'], handle.path);
        return { success: false, hasConflict: true, error: message };
      }
      return { success: false, hasConflict: false, error: message };
    }
  }

  mergeBranches(sourceBranch: string, targetBranch: string, commitMessage?: string): Promise<MergeBranchResult> {
    return mergeBranch({
      repoRoot: this.config.repoRoot,
      worktreeDir: this.config.worktreeDir,
      sourceBranch,
      targetBranch,
      remote: this.config.remote,
      commitMessage,
    });
  }

  /**
   * Trial-merges the task's work branch into its base in a throwaway
   * worktree. Failures other than a conflict are thrown.
   */
  async checkMergeable(task: Task): Promise<Mergeability> {
    const sourceBranch = workBranchFor(task);
    const result = await mergeBranch({
      repoRoot: this.config.repoRoot,
      worktreeDir: this.config.worktreeDir,
      sourceBranch,
      targetBranch: task.branch,
      remote: this.config.remote,
      dryRun: true,
    });
    if (result.success) {
      return { mergeable: true, conflictFiles: [] };
    }
    if (result.hasConflict) {
      return { mergeable: false, conflictFiles: result.conflictFiles ?? [] };
    }
    throw gitError('merge', `checking ${sourceBranch} against ${task.branch}: ${result.error ?? 'unknown error'}`);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async create(task: Task): Promise<WorkspaceHandle> {
    const worktreePath = this.worktreePath(task.id);
    const originRef = task.branch || this.config.defaultBaseBranch;

    await this.fetchBase(originRef);
    const workBranch = workBranchFor(task);
    const hasWorkBranch =
      (await queryGit(['rev-parse', '--verify', '--quiet', `refs/heads/${workBranch}`], this.config.repoRoot)) !== undefined;
    const startPoint = hasWorkBranch ? workBranch : await this.resolveStartPoint(originRef);

    await runGit(['worktree', 'prune'], this.config.repoRoot);
    fs.mkdirSync(path.dirname(worktreePath), { recursive: true });
    await runGit(['worktree', 'add', '--detach', worktreePath, startPoint], this.config.repoRoot);

    const startCommit = (await runGit(['rev-parse', 'HEAD'], worktreePath)).stdout.trim();
    const manifest: WorkspaceManifest = {
      taskId: task.id,
      originRef,
      startPoint,
      startCommit,
      createdAt: createTimestamp(),
    };
    const manifestPath = manifestPathFor(worktreePath);
    fs.writeFileSync(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);
    logger.info(`Created workspace for ${task.id} at ${worktreePath} (${startPoint} @ ${startCommit.slice(0, 8)})`);
    return { taskId: task.id, path: worktreePath, manifestPath, manifest };
  }

  private async fetchBase(ref: string): Promise<void> {
    if (!(await hasRemote(this.config.repoRoot, this.config.remote))) {
      return;
    }
    try {
      await runGit(['fetch', this.config.remote, ref], this.config.repoRoot);
    } catch (error) {
      logger.warn(`Fetching ${this.config.remote}/${ref} failed, using local refs: ${errorMessage(error)}`);
    }
  }

  private async isAncestor(ancestor: string, descendant: string, cwd: string): Promise<boolean> {
    return (await queryGit(['merge-base', '--is-ancestor', ancestor, descendant], cwd)) !== undefined;
  }

  /** `<remote>/<ref>` when the remote has it, otherwise the local ref */
  private async resolveStartPoint(ref: string): Promise<string> {
    const remoteRef = `${this.config.remote}/${ref}`;
    const exists = await queryGit(['rev-parse', '--verify', '--quiet', `refs/remotes/${remoteRef}`], this.config.repoRoot);
    return exists !== undefined ? remoteRef : ref;
  }

  private async removeWorktree(worktreePath: string): Promise<void> {
    if (fs.existsSync(worktreePath)) {
      try {
        await runGit(['worktree', 'remove', '--force', worktreePath], this.config.repoRoot);
      } catch (error) {
        // Not a registered worktree (left over from a crash): remove the directory
        logger.warn(`Removing stray workspace directory ${worktreePath}: ${errorMessage(error)}`);
        fs.rmSync(worktreePath, { recursive: true, force: true });
      }
    }
    await runGit(['worktree', 'prune'], this.config.repoRoot);
  }
}

export function createWorkspaceManager(config: WorkspaceManagerConfig): WorkspaceManager {
  return new WorkspaceManager(config);
}
