/**
 * Git-backed VCS adapter.
 * Purpose: map Vcs interface calls to the execa git helpers.
 * Assumptions: git is available and repo paths are local.
 * Usage: createGitVcs() and inject into RunContext ports.
 */

import {
  abortMerge,
  addRemote,
  branchExists,
  checkout,
  checkoutNewBranch,
  commitMerge,
  countCommits,
  createBranch,
  currentBranch,
  deleteLocalBranch,
  diffNames,
  ensureCleanWorkingTree,
  fetchRemote,
  fetchTag,
  forceCheckout,
  headSha,
  listCommits,
  listConflictedPaths,
  listDirtyPaths,
  mergeBase,
  mergeInProgress,
  mergeNoCommit,
  readFileAtRef,
  readStagedFile,
  remoteExists,
  resetHard,
  restorePathFromRef,
  stagePath,
} from "../../../git/git.js";
import { fastForward } from "../../../git/merge.js";

import type { Vcs } from "./vcs.js";

export function createGitVcs(): Vcs {
  return {
    listDirtyPaths,
    ensureCleanWorkingTree,
    currentBranch,
    headSha,
    branchExists,
    createBranch,
    checkout,
    forceCheckout,
    checkoutNewBranch,
    deleteLocalBranch,
    resetHard,
    remoteExists,
    addRemote,
    fetchRemote,
    fetchTag,
    countCommits,
    mergeBase,
    diffNames,
    listCommits,
    readFileAtRef,
    readStagedFile,
    mergeNoCommit,
    listConflictedPaths,
    restorePathFromRef,
    stagePath,
    mergeInProgress,
    abortMerge,
    commitMerge,
    fastForward,
  };
}
