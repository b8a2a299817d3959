// Divergence analysis between the fork's primary branch and the fetched upstream branch.
// Purpose: ahead/behind counts plus every path upstream changed since the common ancestor.
// Assumes fetchUpstream has already updated the remote-tracking ref.

import type { Vcs } from "../app/orchestrator/vcs/vcs.js";

import { classifyPath } from "./policy/classification.js";
import type { DivergenceReport, FileClassification, RepositoryHandle } from "./types.js";

export const INCOMING_COMMIT_LIMIT = 20;

export type DivergenceOptions = {
  // Enables the potential-conflict preview for FORCE_LOCAL paths.
  policy?: readonly FileClassification[];
};

export async function fetchUpstream(handle: RepositoryHandle, vcs: Vcs): Promise<void> {
  const { repoPath, remote, remoteUrl, upstreamBranch, upstreamTag } = handle;

  if (remoteUrl && !(await vcs.remoteExists(repoPath, remote))) {
    await vcs.addRemote(repoPath, remote, remoteUrl);
  }

  if (upstreamTag) {
    await vcs.fetchTag(repoPath, remote, upstreamTag);
    return;
  }
  await vcs.fetchRemote(repoPath, remote, upstreamBranch);
}

export async function analyzeDivergence(
  handle: RepositoryHandle,
  vcs: Vcs,
  options: DivergenceOptions = {},
): Promise<DivergenceReport> {
  const { repoPath, mainBranch, upstreamRef } = handle;

  const localSha = await vcs.headSha(repoPath, mainBranch);
  const upstreamSha = await vcs.headSha(repoPath, upstreamRef);

  if (localSha === upstreamSha) {
    return {
      local_ref: mainBranch,
      upstream_ref: upstreamRef,
      local_sha: localSha,
      upstream_sha: upstreamSha,
      merge_base: localSha,
      ahead: 0,
      behind: 0,
      changed_paths: [],
      incoming_commits: [],
      potential_conflicts: [],
    };
  }

  const ahead = await vcs.countCommits(repoPath, `${upstreamRef}..${mainBranch}`);
  const behind = await vcs.countCommits(repoPath, `${mainBranch}..${upstreamRef}`);
  const base = await vcs.mergeBase(repoPath, mainBranch, upstreamRef);

  // Unrelated histories have no ancestor; compare the two tips instead.
  const changedPaths = behind === 0 ? [] : await vcs.diffNames(repoPath, base ?? localSha, upstreamSha);
  const incoming =
    behind === 0 ? [] : await vcs.listCommits(repoPath, `${mainBranch}..${upstreamRef}`, INCOMING_COMMIT_LIMIT);

  const potentialConflicts =
    options.policy && behind > 0 && ahead > 0
      ? await findPotentialConflicts(vcs, repoPath, {
          policy: options.policy,
          base,
          localSha,
          changedPaths,
        })
      : [];

  return {
    local_ref: mainBranch,
    upstream_ref: upstreamRef,
    local_sha: localSha,
    upstream_sha: upstreamSha,
    merge_base: base,
    ahead,
    behind,
    changed_paths: Array.from(new Set(changedPaths)).sort(),
    incoming_commits: incoming,
    potential_conflicts: potentialConflicts,
  };
}

// FORCE_LOCAL paths edited on both sides since the common ancestor. Without one, every
// protected path upstream changed counts.
async function findPotentialConflicts(
  vcs: Vcs,
  repoPath: string,
  input: {
    policy: readonly FileClassification[];
    base: string | null;
    localSha: string;
    changedPaths: string[];
  },
): Promise<string[]> {
  const protectedPaths = input.changedPaths.filter(
    (filePath) => classifyPath(input.policy, filePath).strategy === "FORCE_LOCAL",
  );
  if (protectedPaths.length === 0) return [];
  if (!input.base) return Array.from(new Set(protectedPaths)).sort();

  const localChanged = new Set(await vcs.diffNames(repoPath, input.base, input.localSha));
  return Array.from(new Set(protectedPaths.filter((filePath) => localChanged.has(filePath)))).sort();
}

export function isNoOp(report: DivergenceReport): boolean {
  return report.behind === 0;
}

export function formatDivergenceSummary(report: DivergenceReport): string {
  if (report.behind === 0 && report.ahead === 0) {
    return `${report.local_ref} is identical to ${report.upstream_ref}.`;
  }
  if (report.behind === 0) {
    return `${report.local_ref} is ${report.ahead} commit(s) ahead of ${report.upstream_ref}; nothing to pull.`;
  }
  return `${report.local_ref} is ${report.behind} commit(s) behind and ${report.ahead} ahead of ${report.upstream_ref}; ${report.changed_paths.length} path(s) changed upstream.`;
}
