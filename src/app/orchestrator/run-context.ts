/**
 * RunContext + composition root for sync runs.
 * Purpose: centralize run-scoped settings and injected ports so no step reads ambient state.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: buildRunContext({ handle, config, options }) and pass to runSync / checkUpstream.
 */

import type { ProjectConfig } from "../../core/config.js";
import { acquireRepoLock } from "../../core/lock.js";
import { JsonlLogger, logOrchestratorEvent } from "../../core/logger.js";
import { lockPath, runLogPath } from "../../core/paths.js";
import { defaultRunId } from "../../core/utils.js";
import { createFsArtifactStore } from "../../sync/artifacts/artifact-store.js";
import { buildDriftRules, type DriftRule } from "../../sync/drift/rules.js";
import { buildClassificationPolicy } from "../../sync/policy/classification.js";
import type { FileClassification, RepositoryHandle } from "../../sync/types.js";

import type { OrchestratorPorts } from "./ports.js";
import { RunStore } from "./run-store.js";
import { createGitVcs } from "./vcs/git-vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncOptions = {
  allowDrift: boolean;
  promote: boolean;
  branchPrefix: string;
  commitMessage?: string;
  runId?: string;
  signal?: AbortSignal;
};

export type DriftSettings = {
  gatingPaths: string[];
  watchedPaths: string[];
  include: string[];
  rules: DriftRule[];
};

export type RunContext = {
  handle: RepositoryHandle;
  policy: readonly FileClassification[];
  drift: DriftSettings;
  options: SyncOptions;
  ports: OrchestratorPorts;
};

export type BuildRunContextInput = {
  handle: RepositoryHandle;
  config: ProjectConfig;
  options?: Partial<SyncOptions>;
  ports?: Partial<OrchestratorPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(handle: RepositoryHandle): OrchestratorPorts {
  const paths = { gitDir: handle.gitDir };

  return {
    vcs: createGitVcs(),
    artifacts: createFsArtifactStore(),
    runStore: new RunStore(paths),
    lock: {
      acquire: (runId) => acquireRepoLock(lockPath(paths), { runId }),
    },
    logSink: {
      createRunLogger: (runId) => new JsonlLogger(runLogPath(paths, runId), { runId }),
      logOrchestratorEvent,
    },
    clock: {
      now: () => new Date(),
    },
    newRunId: defaultRunId,
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const { handle, config } = input;

  const ports: OrchestratorPorts = {
    ...createDefaultPorts(handle),
    ...input.ports,
  };

  return {
    handle,
    policy: buildClassificationPolicy(config.policy),
    drift: {
      gatingPaths: config.drift.gating_paths,
      watchedPaths: config.drift.watched_paths,
      include: config.drift.include,
      rules: buildDriftRules(config.drift.rules),
    },
    options: {
      allowDrift: false,
      promote: config.sync.promote,
      branchPrefix: config.sync.branch_prefix,
      commitMessage: config.sync.commit_message,
      ...input.options,
    },
    ports,
  };
}
