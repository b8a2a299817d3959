/**
 * Workflow run state.
 * Purpose: the WorkflowRun record, its persisted schema, and the legal state transitions.
 * Assumptions: only the run engine mutates a run, and only through transition().
 * Usage: const run = createWorkflowRun({ runId, handle, now }); transition(run, "BACKED_UP", now).
 */

import { z } from "zod";

import { InvalidTransitionError } from "../../core/errors.js";
import type { RepositoryHandle } from "../../sync/types.js";

// =============================================================================
// STATES
// =============================================================================

export const WORKFLOW_STATES = [
  "INIT",
  "BACKED_UP",
  "FETCHED",
  "ANALYZED",
  "NO_OP",
  "DRIFT_BLOCKED",
  "MERGING",
  "CONFLICTS_RESOLVING",
  "CLEAN_MERGE",
  "UNRESOLVED",
  "ABORTED",
  "FAILED",
  "REPORTED",
] as const;

export const WorkflowStateSchema = z.enum(WORKFLOW_STATES);
export type WorkflowState = z.infer<typeof WorkflowStateSchema>;

export const OUTCOMES = [
  "NO_OP",
  "DRIFT_BLOCKED",
  "CLEAN_MERGE",
  "UNRESOLVED",
  "ABORTED",
  "FAILED",
] as const;

export const OutcomeSchema = z.enum(OUTCOMES);
export type Outcome = z.infer<typeof OutcomeSchema>;

const TRANSITIONS: Record<WorkflowState, readonly WorkflowState[]> = {
  INIT: ["BACKED_UP"],
  BACKED_UP: ["FETCHED"],
  FETCHED: ["ANALYZED"],
  ANALYZED: ["NO_OP", "DRIFT_BLOCKED", "MERGING"],
  MERGING: ["CONFLICTS_RESOLVING"],
  CONFLICTS_RESOLVING: ["CLEAN_MERGE", "UNRESOLVED"],
  NO_OP: ["REPORTED"],
  DRIFT_BLOCKED: ["REPORTED"],
  CLEAN_MERGE: ["REPORTED"],
  UNRESOLVED: ["REPORTED"],
  ABORTED: ["REPORTED"],
  FAILED: ["REPORTED"],
  // A reported UNRESOLVED run can still be abandoned later.
  REPORTED: ["ABORTED"],
};

const INTERRUPTIBLE: ReadonlySet<WorkflowState> = new Set<WorkflowState>([
  "INIT",
  "BACKED_UP",
  "FETCHED",
  "ANALYZED",
  "MERGING",
  "CONFLICTS_RESOLVING",
  "CLEAN_MERGE",
  "UNRESOLVED",
]);

export function isOutcome(state: WorkflowState): state is Outcome {
  return (OUTCOMES as readonly string[]).includes(state);
}

export function canTransition(from: WorkflowState, to: WorkflowState): boolean {
  if (TRANSITIONS[from].includes(to)) return true;
  return (to === "ABORTED" || to === "FAILED") && INTERRUPTIBLE.has(from);
}

// =============================================================================
// RUN RECORD
// =============================================================================

const SnapshotSchema = z.object({
  branch: z.string(),
  head_sha: z.string(),
  main_branch: z.string(),
  main_sha: z.string(),
  upstream_ref: z.string(),
  clean: z.boolean(),
});

const DivergenceSchema = z.object({
  local_ref: z.string(),
  upstream_ref: z.string(),
  local_sha: z.string(),
  upstream_sha: z.string(),
  merge_base: z.string().nullable(),
  ahead: z.number().int().nonnegative(),
  behind: z.number().int().nonnegative(),
  changed_paths: z.array(z.string()),
  incoming_commits: z.array(z.object({ sha: z.string(), subject: z.string() })).default([]),
  potential_conflicts: z.array(z.string()).default([]),
});

const DriftFindingSchema = z.object({
  path: z.string(),
  severity: z.enum(["CLEAN", "WARNING", "CRITICAL"]),
  reason: z.enum(["gating-path-modified", "watched-path-modified", "new-gating-reference"]),
  matched: z.array(z.string()),
  excerpt: z.array(z.string()),
});

const DriftResultSchema = z.object({
  severity: z.enum(["CLEAN", "WARNING", "CRITICAL"]),
  findings: z.array(DriftFindingSchema),
});

const ResolvedPathSchema = z.object({
  path: z.string(),
  strategy: z.enum(["FORCE_LOCAL", "REGENERATE", "MANUAL"]),
  action: z.enum(["kept-local", "restored-local", "regenerated"]),
});

const RegeneratedSchema = z.object({
  target: z.string(),
  source: z.string(),
  file_count: z.number().int().nonnegative(),
  resolved_conflicts: z.array(z.string()),
});

const PromotionSchema = z.object({
  status: z.enum(["promoted", "skipped", "blocked"]),
  merge_commit: z.string(),
  previous_head: z.string().optional(),
  head: z.string().optional(),
  message: z.string().optional(),
});

const RunErrorSchema = z.object({
  code: z.string(),
  name: z.string(),
  message: z.string(),
  rollback_error: z.string().optional(),
});

export const WorkflowRunSchema = z.object({
  run_id: z.string(),
  repo_path: z.string(),
  main_branch: z.string(),
  upstream_ref: z.string(),
  started_at: z.string(),
  updated_at: z.string(),
  finished_at: z.string().nullable(),
  state: WorkflowStateSchema,
  history: z.array(z.object({ state: WorkflowStateSchema, at: z.string() })),
  snapshot: SnapshotSchema.nullable(),
  backup_ref: z.string().nullable(),
  update_branch: z.string().nullable(),
  divergence: DivergenceSchema.nullable(),
  drift: DriftResultSchema.nullable(),
  drift_override: z.boolean(),
  resolved_paths: z.array(ResolvedPathSchema),
  restored_paths: z.array(ResolvedPathSchema),
  regenerated: z.array(RegeneratedSchema),
  unresolved_paths: z.array(z.string()),
  promotion: PromotionSchema.nullable(),
  rolled_back: z.boolean(),
  // The primary branch had moved past the snapshot, so the rollback left it in place.
  main_kept: z.boolean().default(false),
  outcome: OutcomeSchema.nullable(),
  error: RunErrorSchema.nullable(),
});

export type WorkflowRun = z.infer<typeof WorkflowRunSchema>;
export type PromotionRecord = z.infer<typeof PromotionSchema>;
export type RunErrorRecord = z.infer<typeof RunErrorSchema>;

export function createWorkflowRun(input: {
  runId: string;
  handle: RepositoryHandle;
  now: Date;
}): WorkflowRun {
  const at = input.now.toISOString();
  return {
    run_id: input.runId,
    repo_path: input.handle.repoPath,
    main_branch: input.handle.mainBranch,
    upstream_ref: input.handle.upstreamRef,
    started_at: at,
    updated_at: at,
    finished_at: null,
    state: "INIT",
    history: [{ state: "INIT", at }],
    snapshot: null,
    backup_ref: null,
    update_branch: null,
    divergence: null,
    drift: null,
    drift_override: false,
    resolved_paths: [],
    restored_paths: [],
    regenerated: [],
    unresolved_paths: [],
    promotion: null,
    rolled_back: false,
    main_kept: false,
    outcome: null,
    error: null,
  };
}

export function transition(run: WorkflowRun, to: WorkflowState, now: Date): void {
  if (!canTransition(run.state, to)) {
    throw new InvalidTransitionError(run.state, to);
  }

  const at = now.toISOString();
  run.state = to;
  run.updated_at = at;
  run.history.push({ state: to, at });

  if (isOutcome(to)) {
    run.outcome = to;
  }
  if (to === "REPORTED") {
    run.finished_at = at;
  }
}
