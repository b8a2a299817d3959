/**
 * RunEngine is the orchestrator entrypoint.
 * Purpose: drive one sync run through the workflow states using only injected ports.
 * Assumptions: the primary branch moves only inside promote(); every other step works on
 * the backup and update branches.
 * Usage: const result = await runSync(buildRunContext({ handle, config, options })).
 */

import {
  ForkSyncError,
  WorkflowAbortedError,
  errorCodeFor,
} from "../../core/errors.js";
import type { EventLogger, JsonObject } from "../../core/logger.js";
import type { RepoLock } from "../../core/lock.js";
import { buildBackupBranchName, buildUpdateBranchName, resolveUniqueBranchName } from "../../git/branches.js";
import { regenerateArtifacts } from "../../sync/artifacts/regenerator.js";
import { analyzeDivergence, fetchUpstream, isNoOp } from "../../sync/divergence.js";
import { createVcsContentSource, scanDrift } from "../../sync/drift/scanner.js";
import { resolveProtectedPaths } from "../../sync/protected-paths.js";
import type { DivergenceReport, DriftScanResult } from "../../sync/types.js";

import {
  EXIT_CODES,
  exitCodeForDrift,
  exitCodeForRun,
  type ExitCode,
} from "./report.js";
import type { RunContext } from "./run-context.js";
import {
  createWorkflowRun,
  transition,
  type WorkflowRun,
  type WorkflowState,
} from "./workflow-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncResult = {
  run: WorkflowRun;
  reportPath: string | null;
  exitCode: ExitCode;
  error?: unknown;
};

export type CheckResult = {
  divergence: DivergenceReport;
  drift: DriftScanResult | null;
  exitCode: ExitCode;
};

type RunScope = {
  context: RunContext;
  run: WorkflowRun;
  logger: EventLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runSync(context: RunContext): Promise<SyncResult> {
  const { ports, options, handle } = context;
  const startedAt = ports.clock.now();
  const runId = options.runId ?? ports.newRunId(startedAt);
  const run = createWorkflowRun({ runId, handle, now: startedAt });
  const logger = ports.logSink.createRunLogger(runId);
  const scope: RunScope = { context, run, logger };

  let lock: RepoLock | null = null;
  let failure: unknown;
  let reportPath: string | null = null;

  try {
    try {
      lock = ports.lock.acquire(runId);
      logEvent(scope, "run.start", {
        repo_path: handle.repoPath,
        main_branch: handle.mainBranch,
        upstream_ref: handle.upstreamRef,
        allow_drift: options.allowDrift,
        promote: options.promote,
      });

      await executeWorkflow(scope);
    } catch (err) {
      failure = err;
      await failRun(scope, err);
    }

    enterState(scope, "REPORTED");
    reportPath = await ports.runStore.save(run);
    logEvent(scope, "run.reported", {
      outcome: run.outcome,
      report_path: reportPath,
    });
  } finally {
    lock?.release();
  }

  return {
    run,
    reportPath,
    exitCode: exitCodeForRun(run),
    ...(failure === undefined ? {} : { error: failure }),
  };
}

export async function checkUpstream(context: RunContext): Promise<CheckResult> {
  const { ports, handle } = context;
  const runId = context.options.runId ?? ports.newRunId(ports.clock.now());
  const lock = ports.lock.acquire(runId);

  try {
    await fetchUpstream(handle, ports.vcs);
    const divergence = await analyzeDivergence(handle, ports.vcs, { policy: context.policy });
    if (isNoOp(divergence)) {
      return { divergence, drift: null, exitCode: EXIT_CODES.ok };
    }

    const drift = await scanForDrift(context, divergence);
    return { divergence, drift, exitCode: exitCodeForDrift(drift.severity) };
  } finally {
    lock.release();
  }
}

export async function analyzeOnly(context: RunContext): Promise<DivergenceReport> {
  const { ports, handle } = context;
  const runId = context.options.runId ?? ports.newRunId(ports.clock.now());
  const lock = ports.lock.acquire(runId);

  try {
    await fetchUpstream(handle, ports.vcs);
    return await analyzeDivergence(handle, ports.vcs, { policy: context.policy });
  } finally {
    lock.release();
  }
}

// Abandons a reported UNRESOLVED run: the update branch and its merge are discarded.
export async function abortRun(context: RunContext, runId?: string): Promise<WorkflowRun> {
  const { ports } = context;
  const targetId = runId ?? ports.runStore.findLatestRunId();
  if (!targetId) {
    throw new ForkSyncError("No sync runs recorded for this repository.");
  }

  const run = await ports.runStore.load(targetId);
  if (!run) {
    throw new ForkSyncError(`Run ${targetId} not found.`);
  }
  if (run.outcome !== "UNRESOLVED" || run.state !== "REPORTED") {
    throw new ForkSyncError(
      `Run ${targetId} finished as ${run.outcome ?? run.state}; only unresolved runs can be aborted.`,
    );
  }

  const lock = ports.lock.acquire(targetId);
  const logger = ports.logSink.createRunLogger(targetId);
  const scope: RunScope = { context, run, logger };

  try {
    logEvent(scope, "run.abort.requested", { update_branch: run.update_branch });
    await rollback(scope);
    enterState(scope, "ABORTED");
    enterState(scope, "REPORTED");
    await ports.runStore.save(run);
    return run;
  } finally {
    lock.release();
  }
}

// =============================================================================
// WORKFLOW
// =============================================================================

async function executeWorkflow(scope: RunScope): Promise<void> {
  const { context, run } = scope;
  const { handle, ports, options } = context;
  const { vcs } = ports;
  const repoPath = handle.repoPath;

  // INIT
  throwIfAborted(options.signal);
  await vcs.ensureCleanWorkingTree(repoPath);
  const mainSha = await vcs.headSha(repoPath, handle.mainBranch);
  run.snapshot = {
    branch: await vcs.currentBranch(repoPath),
    head_sha: await vcs.headSha(repoPath),
    main_branch: handle.mainBranch,
    main_sha: mainSha,
    upstream_ref: handle.upstreamRef,
    clean: true,
  };
  logEvent(scope, "snapshot.captured", { branch: run.snapshot.branch, main_sha: mainSha });

  // BACKED_UP
  throwIfAborted(options.signal);
  const backupRef = await resolveUniqueBranchName(
    buildBackupBranchName(options.branchPrefix, run.run_id),
    (name) => vcs.branchExists(repoPath, name),
  );
  await vcs.createBranch(repoPath, backupRef, mainSha);
  run.backup_ref = backupRef;
  enterState(scope, "BACKED_UP", { backup_ref: backupRef });

  // FETCHED
  throwIfAborted(options.signal);
  await fetchUpstream(handle, vcs);
  enterState(scope, "FETCHED");

  // ANALYZED
  throwIfAborted(options.signal);
  const divergence = await analyzeDivergence(handle, vcs, { policy: context.policy });
  run.divergence = divergence;
  enterState(scope, "ANALYZED", {
    ahead: divergence.ahead,
    behind: divergence.behind,
    changed_paths: divergence.changed_paths.length,
    potential_conflicts: divergence.potential_conflicts,
  });

  if (isNoOp(divergence)) {
    enterState(scope, "NO_OP");
    return;
  }

  const drift = await scanForDrift(context, divergence);
  run.drift = drift;
  logEvent(scope, "drift.scanned", {
    severity: drift.severity,
    findings: drift.findings.map((finding) => ({
      path: finding.path,
      severity: finding.severity,
      reason: finding.reason,
    })),
  });

  if (drift.severity === "CRITICAL") {
    if (!options.allowDrift) {
      enterState(scope, "DRIFT_BLOCKED");
      return;
    }
    run.drift_override = true;
    logEvent(scope, "drift.override", {
      paths: drift.findings
        .filter((finding) => finding.severity === "CRITICAL")
        .map((finding) => finding.path),
    });
  }

  // MERGING
  throwIfAborted(options.signal);
  const updateBranch = await resolveUniqueBranchName(
    buildUpdateBranchName(options.branchPrefix, run.run_id),
    (name) => vcs.branchExists(repoPath, name),
  );
  await vcs.checkoutNewBranch(repoPath, updateBranch, handle.mainBranch);
  run.update_branch = updateBranch;
  enterState(scope, "MERGING", { update_branch: updateBranch });

  const merge = await vcs.mergeNoCommit(repoPath, handle.upstreamRef);
  logEvent(scope, "merge.attempted", { clean: merge.clean });

  // CONFLICTS_RESOLVING
  throwIfAborted(options.signal);
  enterState(scope, "CONFLICTS_RESOLVING");
  const conflictsAtMerge = await vcs.listConflictedPaths(repoPath);

  const resolution = await resolveProtectedPaths({
    handle,
    vcs,
    policy: context.policy,
    localRef: backupRef,
    changedPaths: divergence.changed_paths,
  });
  run.resolved_paths = resolution.resolved;
  run.restored_paths = resolution.restored;
  for (const entry of [...resolution.resolved, ...resolution.restored]) {
    logEvent(scope, "path.resolved", { path: entry.path, action: entry.action });
  }

  throwIfAborted(options.signal);
  const regeneration = await regenerateArtifacts({
    handle,
    vcs,
    store: ports.artifacts,
    policy: context.policy,
    touchedPaths: [...divergence.changed_paths, ...conflictsAtMerge],
    localRef: backupRef,
  });
  run.regenerated = regeneration.regenerated.map((artifact) => ({
    target: artifact.target,
    source: artifact.source,
    file_count: artifact.fileCount,
    resolved_conflicts: artifact.resolvedConflicts,
  }));
  for (const artifact of regeneration.regenerated) {
    logEvent(scope, "artifact.regenerated", {
      target: artifact.target,
      file_count: artifact.fileCount,
    });
  }

  const remaining = await vcs.listConflictedPaths(repoPath);
  if (remaining.length > 0) {
    run.unresolved_paths = remaining;
    enterState(scope, "UNRESOLVED", { unresolved: remaining });
    return;
  }

  enterState(scope, "CLEAN_MERGE");
  throwIfAborted(options.signal);
  await promote(scope, updateBranch, mainSha, divergence);
}

async function promote(
  scope: RunScope,
  updateBranch: string,
  mainSha: string,
  divergence: DivergenceReport,
): Promise<void> {
  const { context, run } = scope;
  const { handle, ports, options } = context;
  const repoPath = handle.repoPath;

  const message =
    options.commitMessage ??
    `chore: sync with ${handle.upstreamRef} (${divergence.upstream_sha.slice(0, 7)})`;
  const mergeCommit = await ports.vcs.commitMerge(repoPath, message);
  logEvent(scope, "merge.committed", { commit: mergeCommit });

  if (!options.promote) {
    await ports.vcs.checkout(repoPath, handle.mainBranch);
    run.promotion = { status: "skipped", merge_commit: mergeCommit };
    logEvent(scope, "promotion.skipped", { update_branch: updateBranch });
    return;
  }

  const result = await ports.vcs.fastForward({
    repoPath,
    mainBranch: handle.mainBranch,
    targetRef: updateBranch,
    expectedBaseSha: mainSha,
    cleanupBranch: updateBranch,
  });

  if (result.status === "fast_forwarded") {
    run.promotion = {
      status: "promoted",
      merge_commit: mergeCommit,
      previous_head: result.previousHead,
      head: result.head,
    };
    logEvent(scope, "promotion.done", { previous_head: result.previousHead, head: result.head });
    if (result.cleanupError) {
      logEvent(scope, "promotion.cleanup_failed", {
        update_branch: updateBranch,
        message: result.cleanupError,
      });
    }
    return;
  }

  run.promotion = {
    status: "blocked",
    merge_commit: mergeCommit,
    previous_head: result.currentHead,
    message: result.message,
  };
  logEvent(scope, "promotion.blocked", { reason: result.reason, message: result.message });
}

async function scanForDrift(
  context: RunContext,
  divergence: DivergenceReport,
): Promise<DriftScanResult> {
  return scanDrift({
    changedPaths: divergence.changed_paths,
    gatingPaths: context.drift.gatingPaths,
    watchedPaths: context.drift.watchedPaths,
    include: context.drift.include,
    rules: context.drift.rules,
    source: createVcsContentSource(context.handle, context.ports.vcs),
  });
}

// =============================================================================
// FAILURE + ROLLBACK
// =============================================================================

async function failRun(scope: RunScope, err: unknown): Promise<void> {
  const { run } = scope;
  const aborted = err instanceof WorkflowAbortedError;

  run.error = {
    code: errorCodeFor(err),
    name: err instanceof Error ? err.name : "Error",
    message: err instanceof Error ? err.message : String(err),
  };
  logEvent(scope, aborted ? "run.aborted" : "run.failed", {
    state: run.state,
    code: run.error.code,
    message: run.error.message,
  });

  if (run.update_branch && run.promotion?.status !== "promoted") {
    try {
      await rollback(scope);
    } catch (rollbackErr) {
      const detail = rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr);
      run.error.rollback_error = detail;
      logEvent(scope, "rollback.failed", { message: detail });
    }
  }

  enterState(scope, aborted ? "ABORTED" : "FAILED");
}

// Restores the pre-run layout: primary branch at the backup, update branch gone.
// A primary branch that gained commits since the snapshot is checked out but never reset.
async function rollback(scope: RunScope): Promise<void> {
  const { context, run } = scope;
  const { vcs } = context.ports;
  const { repoPath, mainBranch } = context.handle;

  if (await vcs.mergeInProgress(repoPath)) {
    await vcs.abortMerge(repoPath);
  }
  await vcs.forceCheckout(repoPath, mainBranch);

  const expectedSha = run.snapshot?.main_sha;
  const currentSha = await vcs.headSha(repoPath, mainBranch);
  if (expectedSha === undefined || currentSha === expectedSha) {
    if (run.backup_ref) await vcs.resetHard(repoPath, run.backup_ref);
  } else {
    run.main_kept = true;
    logEvent(scope, "rollback.main_kept", {
      expected_sha: expectedSha ?? null,
      current_sha: currentSha,
    });
  }

  const originalBranch = run.snapshot?.branch;
  if (originalBranch && originalBranch !== mainBranch) {
    await vcs.checkout(repoPath, originalBranch);
  }

  if (run.update_branch) {
    await vcs.deleteLocalBranch(repoPath, run.update_branch);
    logEvent(scope, "rollback.done", { deleted_branch: run.update_branch });
  }
  run.rolled_back = true;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;

  const reason = signal.reason;
  const label = typeof reason === "string" ? ` (${reason})` : "";
  throw new WorkflowAbortedError(`Sync aborted by signal${label}.`, reason);
}

// =============================================================================
// LOGGING
// =============================================================================

function enterState(scope: RunScope, state: WorkflowState, payload: JsonObject = {}): void {
  transition(scope.run, state, scope.context.ports.clock.now());
  logEvent(scope, "state.enter", { state, ...payload });
}

function logEvent(scope: RunScope, type: string, payload?: JsonObject): void {
  scope.context.ports.logSink.logOrchestratorEvent(scope.logger, type, payload);
}
