// Promotion of a committed update branch onto the fork's primary branch.
// The primary branch only ever moves by fast-forward, and only from the sha the run backed up.

import {
  checkout,
  deleteLocalBranch,
  ensureCleanWorkingTree,
  fastForwardTo,
  headSha,
  isAncestor,
} from "./git.js";

export type PromotionRequest = {
  repoPath: string;
  mainBranch: string;
  targetRef: string;
  expectedBaseSha?: string;
  cleanupBranch?: string;
};

export type BlockedReason = "main_advanced" | "non_fast_forward";

export type FastForwardResult =
  | { status: "fast_forwarded"; previousHead: string; head: string; cleanupError?: string }
  | {
      status: "blocked";
      reason: BlockedReason;
      message: string;
      currentHead: string;
      targetRef: string;
    };

export async function fastForward(request: PromotionRequest): Promise<FastForwardResult> {
  const { repoPath, mainBranch, targetRef } = request;

  await ensureCleanWorkingTree(repoPath);
  await checkout(repoPath, mainBranch);
  const previousHead = await headSha(repoPath);

  const reason = await findBlocker(request, previousHead);
  if (reason) {
    return {
      status: "blocked",
      reason,
      message: describeBlocker(reason, request, previousHead),
      currentHead: previousHead,
      targetRef,
    };
  }

  await fastForwardTo(repoPath, targetRef);
  const head = await headSha(repoPath);

  // The primary branch has already moved: a failed cleanup is reported, never thrown.
  const cleanupError = request.cleanupBranch
    ? await deleteBranchReportingFailure(repoPath, request.cleanupBranch)
    : null;

  return cleanupError
    ? { status: "fast_forwarded", previousHead, head, cleanupError }
    : { status: "fast_forwarded", previousHead, head };
}

async function deleteBranchReportingFailure(repoPath: string, branch: string): Promise<string | null> {
  try {
    await deleteLocalBranch(repoPath, branch);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

async function findBlocker(request: PromotionRequest, currentHead: string): Promise<BlockedReason | null> {
  if (request.expectedBaseSha && currentHead !== request.expectedBaseSha) return "main_advanced";
  if (!(await isAncestor(request.repoPath, currentHead, request.targetRef))) return "non_fast_forward";
  return null;
}

function describeBlocker(reason: BlockedReason, request: PromotionRequest, currentHead: string): string {
  if (reason === "main_advanced") {
    return `${request.mainBranch} moved to ${currentHead} after the sync started from ${request.expectedBaseSha ?? "its backup"}; ${request.targetRef} was kept for review.`;
  }
  return `${request.targetRef} does not contain ${request.mainBranch} at ${currentHead}; a fast-forward is not possible.`;
}
