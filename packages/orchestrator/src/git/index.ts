export { runGit, queryGit, execFailureOutput, GIT_OPERATION_TIMEOUT_MS, type GitOutput } from './exec.js';
export {
  mergeBranch,
  syncLocalBranch,
  parseConflictFiles,
  hasRemote,
  type MergeBranchOptions,
  type MergeBranchResult,
} from './merge.js';
export {
  WorkspaceManager,
  createWorkspaceManager,
  manifestPathFor,
  workBranchFor,
  readManifest,
  type WorkspaceManifest,
  type WorkspaceHandle,
  type WorkspaceManagerConfig,
  type CleanupOptions,
  type RebaseResult,
  type PushOptions,
  type Mergeability,
} from './worktree-manager.js';
