import { describe, expect, it } from "vitest";

import { BusyError, ConfigError, WorkflowAbortedError } from "../../core/errors.js";
import { buildRepositoryHandle } from "../../sync/types.js";

import { EXIT_CODES, exitCodeForDrift, exitCodeForError, exitCodeForRun, summarizeRun } from "./report.js";
import { createWorkflowRun, type WorkflowRun } from "./workflow-state.js";

const handle = buildRepositoryHandle({
  repoPath: "/repo",
  gitDir: "/repo/.git",
  mainBranch: "main",
  remote: "upstream",
  upstreamBranch: "main",
});

function finishedRun(overrides: Partial<WorkflowRun>): WorkflowRun {
  return {
    ...createWorkflowRun({ runId: "r1", handle, now: new Date("2024-01-01T00:00:00.000Z") }),
    state: "REPORTED",
    ...overrides,
  };
}

describe("exitCodeForRun", () => {
  it("maps outcomes to the exit-code contract", () => {
    expect(exitCodeForRun(finishedRun({ outcome: "NO_OP" }))).toBe(0);
    expect(exitCodeForRun(finishedRun({ outcome: "DRIFT_BLOCKED" }))).toBe(2);
    expect(exitCodeForRun(finishedRun({ outcome: "UNRESOLVED" }))).toBe(1);
    expect(exitCodeForRun(finishedRun({ outcome: "ABORTED" }))).toBe(8);
    expect(exitCodeForRun(finishedRun({ outcome: "FAILED" }))).toBe(9);
    expect(exitCodeForRun(finishedRun({ outcome: null }))).toBe(9);
  });

  it("uses the recorded error code for failed runs", () => {
    const run = finishedRun({
      outcome: "FAILED",
      error: { code: "REGENERATION_INVALID", name: "RegenerationValidationError", message: "bad build" },
    });

    expect(exitCodeForRun(run)).toBe(EXIT_CODES.regeneration);
  });

  it("flags clean merges that need attention", () => {
    const promotion = { status: "promoted" as const, merge_commit: "merge-sha" };

    expect(exitCodeForRun(finishedRun({ outcome: "CLEAN_MERGE", promotion }))).toBe(0);
    expect(
      exitCodeForRun(
        finishedRun({ outcome: "CLEAN_MERGE", promotion, drift: { severity: "CRITICAL", findings: [] } }),
      ),
    ).toBe(1);
    expect(
      exitCodeForRun(
        finishedRun({ outcome: "CLEAN_MERGE", promotion: { ...promotion, status: "blocked" } }),
      ),
    ).toBe(1);
  });
});

describe("exitCodeForError", () => {
  it("maps domain errors and falls back to fatal", () => {
    expect(exitCodeForError(new BusyError("held", "/repo/.git/fork-sync/sync.lock"))).toBe(6);
    expect(exitCodeForError(new ConfigError("bad"))).toBe(7);
    expect(exitCodeForError(new WorkflowAbortedError("stop"))).toBe(8);
    expect(exitCodeForError(new Error("boom"))).toBe(9);
  });
});

describe("exitCodeForDrift", () => {
  it("ranks severities", () => {
    expect([exitCodeForDrift("CLEAN"), exitCodeForDrift("WARNING"), exitCodeForDrift("CRITICAL")]).toEqual([
      0, 1, 2,
    ]);
  });
});

describe("summarizeRun", () => {
  it("flattens a run into display fields", () => {
    const run = finishedRun({
      outcome: "UNRESOLVED",
      backup_ref: "fork-sync/backup/r1",
      update_branch: "fork-sync/update/r1",
      unresolved_paths: ["src/app.ts"],
      resolved_paths: [{ path: "src/license/check.ts", strategy: "FORCE_LOCAL", action: "kept-local" }],
    });

    expect(summarizeRun(run)).toMatchObject({
      runId: "r1",
      outcome: "UNRESOLVED",
      backupRef: "fork-sync/backup/r1",
      updateBranch: "fork-sync/update/r1",
      behind: null,
      resolved: ["src/license/check.ts"],
      unresolved: ["src/app.ts"],
      promotion: null,
      error: null,
    });
  });
});
