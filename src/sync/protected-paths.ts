/**
 * Protected-path resolver.
 * Purpose: after a merge, force protected paths back to their pre-merge local content.
 * Assumptions: a merge is in progress on the update branch; localRef names the pre-merge primary head.
 * Usage: resolveProtectedPaths({ handle, vcs, policy, localRef, changedPaths }).
 */

import type { Vcs } from "../app/orchestrator/vcs/vcs.js";

import { classifyPath } from "./policy/classification.js";
import type { FileClassification, RepositoryHandle, ResolvedPath } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProtectedPathInput = {
  handle: RepositoryHandle;
  vcs: Vcs;
  policy: readonly FileClassification[];
  localRef: string;
  changedPaths?: string[];
};

export type ProtectedPathResult = {
  resolved: ResolvedPath[];
  restored: ResolvedPath[];
  deferred: string[];
  unresolved: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveProtectedPaths(input: ProtectedPathInput): Promise<ProtectedPathResult> {
  const { handle, vcs, policy, localRef } = input;
  const repoPath = handle.repoPath;

  const result: ProtectedPathResult = { resolved: [], restored: [], deferred: [], unresolved: [] };
  const conflicts = await vcs.listConflictedPaths(repoPath);

  for (const filePath of conflicts) {
    const classification = classifyPath(policy, filePath);

    switch (classification.strategy) {
      case "FORCE_LOCAL":
        await vcs.restorePathFromRef(repoPath, localRef, filePath);
        result.resolved.push({ path: filePath, strategy: "FORCE_LOCAL", action: "kept-local" });
        break;
      case "REGENERATE":
        result.deferred.push(filePath);
        break;
      case "MANUAL":
        result.unresolved.push(filePath);
        break;
    }
  }

  // Protected files upstream changed without a textual conflict still merged upstream content.
  const conflictSet = new Set(conflicts);
  for (const filePath of input.changedPaths ?? []) {
    if (conflictSet.has(filePath)) continue;
    if (classifyPath(policy, filePath).strategy !== "FORCE_LOCAL") continue;

    const local = await vcs.readFileAtRef(repoPath, localRef, filePath);
    const staged = await vcs.readStagedFile(repoPath, filePath);
    if (sameBytes(local, staged)) continue;

    await vcs.restorePathFromRef(repoPath, localRef, filePath);
    result.restored.push({ path: filePath, strategy: "FORCE_LOCAL", action: "restored-local" });
  }

  return result;
}

function sameBytes(left: Buffer | null, right: Buffer | null): boolean {
  if (left === null || right === null) return left === right;
  return left.equals(right);
}
