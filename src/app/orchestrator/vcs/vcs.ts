/**
 * VCS adapter interface for sync runs.
 * Purpose: the only surface through which the workflow reads or mutates the repository.
 * Assumptions: implementations operate on a local working copy named by repoPath.
 * Usage: inject into RunContext ports; tests use FakeVcs.
 */

import type { CommitSummary, MergeAttempt } from "../../../git/git.js";
import type { FastForwardResult, PromotionRequest } from "../../../git/merge.js";

// =============================================================================
// TYPES
// =============================================================================

export interface Vcs {
  listDirtyPaths(repoPath: string): Promise<string[]>;
  ensureCleanWorkingTree(repoPath: string): Promise<void>;
  currentBranch(repoPath: string): Promise<string>;
  headSha(repoPath: string, ref?: string): Promise<string>;
  branchExists(repoPath: string, branch: string): Promise<boolean>;
  createBranch(repoPath: string, branch: string, startRef: string): Promise<void>;
  checkout(repoPath: string, branch: string): Promise<void>;
  forceCheckout(repoPath: string, branch: string): Promise<void>;
  checkoutNewBranch(repoPath: string, branch: string, startRef: string): Promise<void>;
  deleteLocalBranch(repoPath: string, branch: string): Promise<void>;
  resetHard(repoPath: string, ref: string): Promise<void>;

  remoteExists(repoPath: string, remote: string): Promise<boolean>;
  addRemote(repoPath: string, remote: string, url: string): Promise<void>;
  fetchRemote(repoPath: string, remote: string, branch: string): Promise<void>;
  fetchTag(repoPath: string, remote: string, tag: string): Promise<void>;

  countCommits(repoPath: string, range: string): Promise<number>;
  mergeBase(repoPath: string, left: string, right: string): Promise<string | null>;
  diffNames(repoPath: string, fromRef: string, toRef: string): Promise<string[]>;
  listCommits(repoPath: string, range: string, limit: number): Promise<CommitSummary[]>;
  readFileAtRef(repoPath: string, ref: string, filePath: string): Promise<Buffer | null>;
  readStagedFile(repoPath: string, filePath: string): Promise<Buffer | null>;

  mergeNoCommit(repoPath: string, ref: string): Promise<MergeAttempt>;
  listConflictedPaths(repoPath: string): Promise<string[]>;
  restorePathFromRef(repoPath: string, ref: string, filePath: string): Promise<void>;
  stagePath(repoPath: string, filePath: string): Promise<void>;
  mergeInProgress(repoPath: string): Promise<boolean>;
  abortMerge(repoPath: string): Promise<void>;
  commitMerge(repoPath: string, message: string): Promise<string>;
  fastForward(request: PromotionRequest): Promise<FastForwardResult>;
}
