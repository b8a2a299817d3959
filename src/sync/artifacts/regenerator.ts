/**
 * Build-artifact regenerator.
 * Purpose: replace generated directories with a validated copy of the canonical build instead of merging them.
 * Assumptions: the canonical source tree is built by an external step; a merge is in progress on the update branch.
 * Usage: regenerateArtifacts({ handle, vcs, store, policy, touchedPaths, localRef }).
 */

import path from "node:path";

import type { Vcs } from "../../app/orchestrator/vcs/vcs.js";
import { RegenerationValidationError } from "../../core/errors.js";
import { isInsideDirectory, matchesClassification } from "../policy/classification.js";
import type { ArtifactSpec, FileClassification, RepositoryHandle } from "../types.js";

import type { ArtifactStore } from "./artifact-store.js";
import { validateArtifactTree } from "./validate.js";

// =============================================================================
// TYPES
// =============================================================================

export type RegenerationInput = {
  handle: RepositoryHandle;
  vcs: Vcs;
  store: ArtifactStore;
  policy: readonly FileClassification[];
  touchedPaths: string[];
  localRef: string;
};

export type RegeneratedArtifact = {
  target: string;
  source: string;
  fileCount: number;
  resolvedConflicts: string[];
};

export type RegenerationResult = {
  regenerated: RegeneratedArtifact[];
  untouched: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function listArtifactEntries(
  policy: readonly FileClassification[],
): Array<FileClassification & { artifact: ArtifactSpec }> {
  const seen = new Set<string>();
  const entries: Array<FileClassification & { artifact: ArtifactSpec }> = [];

  for (const entry of policy) {
    const artifact = entry.artifact;
    if (entry.strategy !== "REGENERATE" || !artifact) continue;
    if (seen.has(artifact.target)) continue;

    seen.add(artifact.target);
    entries.push({ ...entry, artifact });
  }

  return entries;
}

export function findTouchedArtifacts(
  policy: readonly FileClassification[],
  touchedPaths: string[],
): Array<FileClassification & { artifact: ArtifactSpec }> {
  return listArtifactEntries(policy).filter((entry) =>
    touchedPaths.some((p) => isUnderArtifact(entry, entry.artifact, p)),
  );
}

export async function regenerateArtifacts(input: RegenerationInput): Promise<RegenerationResult> {
  const { handle, vcs, store } = input;
  const result: RegenerationResult = { regenerated: [], untouched: [] };
  const touchedTargets = new Set(
    findTouchedArtifacts(input.policy, input.touchedPaths).map((entry) => entry.artifact.target),
  );

  for (const entry of listArtifactEntries(input.policy)) {
    if (!touchedTargets.has(entry.artifact.target)) {
      result.untouched.push(entry.artifact.target);
      continue;
    }

    const regenerated = await regenerateOne({
      handle,
      vcs,
      store,
      entry,
      artifact: entry.artifact,
      localRef: input.localRef,
    });
    result.regenerated.push(regenerated);
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function regenerateOne(args: {
  handle: RepositoryHandle;
  vcs: Vcs;
  store: ArtifactStore;
  entry: FileClassification;
  artifact: ArtifactSpec;
  localRef: string;
}): Promise<RegeneratedArtifact> {
  const { handle, vcs, store, entry, artifact, localRef } = args;
  const repoPath = handle.repoPath;
  const sourceAbs = path.resolve(repoPath, artifact.source);
  const targetAbs = path.resolve(repoPath, artifact.target);

  const conflictsBefore = (await vcs.listConflictedPaths(repoPath)).filter((p) =>
    isUnderArtifact(entry, artifact, p),
  );

  const sourceCheck = await validateArtifactTree(store, sourceAbs, artifact);
  if (!sourceCheck.ok) {
    await discardTarget(vcs, repoPath, localRef, artifact.target);
    throw new RegenerationValidationError(
      `Canonical build at ${artifact.source} is not valid: ${sourceCheck.violations.join("; ")}`,
      artifact.target,
      sourceCheck.violations,
    );
  }

  await store.remove(targetAbs);
  await store.copyDir(sourceAbs, targetAbs);

  const targetCheck = await validateArtifactTree(store, targetAbs, artifact);
  if (!targetCheck.ok) {
    // The copied files are untracked; a later reset --hard would leave them behind.
    await store.remove(targetAbs);
    await discardTarget(vcs, repoPath, localRef, artifact.target);
    throw new RegenerationValidationError(
      `Regenerated ${artifact.target} is not valid: ${targetCheck.violations.join("; ")}`,
      artifact.target,
      targetCheck.violations,
    );
  }

  await vcs.stagePath(repoPath, artifact.target);

  return {
    target: artifact.target,
    source: artifact.source,
    fileCount: targetCheck.fileCount,
    resolvedConflicts: conflictsBefore,
  };
}

// Nothing under the target may stay staged once validation fails: the restore runs without
// overlay, so files the merge added under the target leave the index too.
async function discardTarget(
  vcs: Vcs,
  repoPath: string,
  localRef: string,
  target: string,
): Promise<void> {
  await vcs.restorePathFromRef(repoPath, localRef, target);
}

function isUnderArtifact(entry: FileClassification, artifact: ArtifactSpec, filePath: string): boolean {
  return isInsideDirectory(filePath, artifact.target) || matchesClassification(entry, filePath);
}
