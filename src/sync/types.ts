// Shared sync types.
// Purpose: keep repository, divergence, drift and resolution shapes consistent across components.

import type { FileCategory, ResolutionStrategy } from "../core/config.js";

// =============================================================================
// REPOSITORY
// =============================================================================

export type RepositoryHandle = {
  repoPath: string;
  gitDir: string;
  mainBranch: string;
  remote: string;
  remoteUrl?: string;
  upstreamBranch: string;
  // Set when syncing to an upstream release tag instead of the branch tip.
  upstreamTag?: string;
  upstreamRef: string;
};

export function buildRepositoryHandle(input: {
  repoPath: string;
  gitDir: string;
  mainBranch: string;
  remote: string;
  remoteUrl?: string;
  upstreamBranch: string;
  upstreamTag?: string;
}): RepositoryHandle {
  return {
    ...input,
    upstreamRef: input.upstreamTag
      ? `refs/tags/${input.upstreamTag}`
      : `${input.remote}/${input.upstreamBranch}`,
  };
}

// =============================================================================
// DIVERGENCE
// =============================================================================

export type DivergenceReport = {
  local_ref: string;
  upstream_ref: string;
  local_sha: string;
  upstream_sha: string;
  merge_base: string | null;
  ahead: number;
  behind: number;
  changed_paths: string[];
  // Newest first, capped; `behind` holds the full count.
  incoming_commits: IncomingCommit[];
  potential_conflicts: string[];
};

export type IncomingCommit = {
  sha: string;
  subject: string;
};

// =============================================================================
// DRIFT
// =============================================================================

export type DriftSeverity = "CLEAN" | "WARNING" | "CRITICAL";

export type DriftReason = "gating-path-modified" | "watched-path-modified" | "new-gating-reference";

export type DriftFinding = {
  path: string;
  severity: DriftSeverity;
  reason: DriftReason;
  matched: string[];
  excerpt: string[];
};

export type DriftScanResult = {
  severity: DriftSeverity;
  findings: DriftFinding[];
};

// =============================================================================
// CLASSIFICATION
// =============================================================================

export type ArtifactSpec = {
  target: string;
  source: string;
  marker: string;
  markerFiles: string;
  minFiles: number;
  maxFiles: number;
};

export type FileClassification = {
  pattern: string;
  category: FileCategory;
  strategy: ResolutionStrategy;
  artifact?: ArtifactSpec;
};

export type ResolvedPath = {
  path: string;
  strategy: ResolutionStrategy;
  action: "kept-local" | "restored-local" | "regenerated";
};
