// Run report helpers.
// Purpose: map finished runs and errors to the CLI exit-code contract and a compact summary.

import { USER_FACING_ERROR_CODES, errorCodeFor, type UserFacingErrorCode } from "../../core/errors.js";
import type { DriftSeverity } from "../../sync/types.js";

import type { WorkflowRun } from "./workflow-state.js";

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  ok: 0,
  attention: 1,
  driftCritical: 2,
  fetch: 3,
  dirtyTree: 4,
  regeneration: 5,
  busy: 6,
  config: 7,
  aborted: 8,
  fatal: 9,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const ERROR_EXIT_CODES: Partial<Record<UserFacingErrorCode, ExitCode>> = {
  [USER_FACING_ERROR_CODES.fetch]: EXIT_CODES.fetch,
  [USER_FACING_ERROR_CODES.dirtyTree]: EXIT_CODES.dirtyTree,
  [USER_FACING_ERROR_CODES.regeneration]: EXIT_CODES.regeneration,
  [USER_FACING_ERROR_CODES.busy]: EXIT_CODES.busy,
  [USER_FACING_ERROR_CODES.config]: EXIT_CODES.config,
  [USER_FACING_ERROR_CODES.aborted]: EXIT_CODES.aborted,
};

export function exitCodeForErrorCode(code: string): ExitCode {
  const known = Object.entries(ERROR_EXIT_CODES).find(([key]) => key === code);
  return known?.[1] ?? EXIT_CODES.fatal;
}

export function exitCodeForError(error: unknown): ExitCode {
  return exitCodeForErrorCode(errorCodeFor(error));
}

export function exitCodeForDrift(severity: DriftSeverity): ExitCode {
  if (severity === "CRITICAL") return EXIT_CODES.driftCritical;
  if (severity === "WARNING") return EXIT_CODES.attention;
  return EXIT_CODES.ok;
}

export function exitCodeForRun(run: WorkflowRun): ExitCode {
  switch (run.outcome) {
    case "NO_OP":
      return EXIT_CODES.ok;
    case "DRIFT_BLOCKED":
      return EXIT_CODES.driftCritical;
    case "UNRESOLVED":
      return EXIT_CODES.attention;
    case "ABORTED":
      return run.error ? exitCodeForErrorCode(run.error.code) : EXIT_CODES.aborted;
    case "FAILED":
      return run.error ? exitCodeForErrorCode(run.error.code) : EXIT_CODES.fatal;
    case "CLEAN_MERGE": {
      if (run.promotion?.status === "blocked") return EXIT_CODES.attention;
      const severity = run.drift?.severity ?? "CLEAN";
      return severity === "CLEAN" ? EXIT_CODES.ok : EXIT_CODES.attention;
    }
    default:
      return EXIT_CODES.fatal;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export type RunSummary = {
  runId: string;
  outcome: string;
  state: string;
  startedAt: string;
  finishedAt: string | null;
  backupRef: string | null;
  updateBranch: string | null;
  behind: number | null;
  ahead: number | null;
  driftSeverity: DriftSeverity | null;
  driftOverride: boolean;
  resolved: string[];
  restored: string[];
  regenerated: string[];
  unresolved: string[];
  promotion: string | null;
  error: string | null;
};

export function summarizeRun(run: WorkflowRun): RunSummary {
  return {
    runId: run.run_id,
    outcome: run.outcome ?? "IN_PROGRESS",
    state: run.state,
    startedAt: run.started_at,
    finishedAt: run.finished_at,
    backupRef: run.backup_ref,
    updateBranch: run.update_branch,
    behind: run.divergence?.behind ?? null,
    ahead: run.divergence?.ahead ?? null,
    driftSeverity: run.drift?.severity ?? null,
    driftOverride: run.drift_override,
    resolved: run.resolved_paths.map((entry) => entry.path),
    restored: run.restored_paths.map((entry) => entry.path),
    regenerated: run.regenerated.map((entry) => entry.target),
    unresolved: run.unresolved_paths,
    promotion: run.promotion ? run.promotion.status : null,
    error: run.error ? `${run.error.code}: ${run.error.message}` : null,
  };
}
