/*
Purpose: human-readable rendering of divergence, drift and run reports for the CLI.
Assumptions: format helpers return lines and never print; colour follows the target stream's TTY state.
Usage: printLines(formatRunLines(run, stdoutFormatter())); printJson(run) under --json.
*/

import type { WorkflowRun } from "../app/orchestrator/workflow-state.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
} from "../core/error-format.js";
import { formatDivergenceSummary } from "../sync/divergence.js";
import type { DivergenceReport, DriftScanResult, DriftSeverity } from "../sync/types.js";

const SEVERITY_STYLES: Record<DriftSeverity, AnsiStyle[]> = {
  CLEAN: ["green"],
  WARNING: ["yellow"],
  CRITICAL: ["bold", "red"],
};

export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function stdoutFormatter(): AnsiFormatter {
  return createAnsiFormatter(resolveColorEnabled({ stream: process.stdout }));
}

export function printError(error: unknown, opts: { debug: boolean }): void {
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
  const lines = formatErrorLines(error, { mode: opts.debug ? "debug" : "short" });
  for (const line of renderErrorLines(lines, format)) {
    console.error(line);
  }
}

// =============================================================================
// DIVERGENCE + DRIFT
// =============================================================================

export function formatDivergenceLines(report: DivergenceReport): string[] {
  const lines = [
    formatDivergenceSummary(report),
    `  local:    ${report.local_ref} @ ${shortSha(report.local_sha)}`,
    `  upstream: ${report.upstream_ref} @ ${shortSha(report.upstream_sha)}`,
    `  base:     ${report.merge_base ? shortSha(report.merge_base) : "(none)"}`,
  ];

  if (report.incoming_commits.length > 0) {
    lines.push("  incoming:");
    for (const commit of report.incoming_commits) {
      lines.push(`    ${shortSha(commit.sha)} ${commit.subject}`);
    }
    const hidden = report.behind - report.incoming_commits.length;
    if (hidden > 0) lines.push(`    ... and ${hidden} more`);
  }

  if (report.changed_paths.length > 0) {
    lines.push("  changed:");
    for (const filePath of report.changed_paths) {
      lines.push(`    ${filePath}`);
    }
  }

  if (report.potential_conflicts.length > 0) {
    lines.push("  protected paths changed on both sides:");
    for (const filePath of report.potential_conflicts) {
      lines.push(`    ${filePath}`);
    }
  }
  return lines;
}

export function formatDriftLines(drift: DriftScanResult, format: AnsiFormatter): string[] {
  const lines = [`Drift: ${format(drift.severity, SEVERITY_STYLES[drift.severity])}`];

  for (const finding of drift.findings) {
    const rules = finding.matched.length > 0 ? ` [${finding.matched.join(", ")}]` : "";
    lines.push(`  ${finding.severity} ${finding.path} (${finding.reason})${rules}`);
    for (const excerpt of finding.excerpt) {
      lines.push(format(`    | ${excerpt}`, ["dim"]));
    }
  }
  return lines;
}

// =============================================================================
// RUN REPORT
// =============================================================================

export function formatRunLines(run: WorkflowRun, format: AnsiFormatter): string[] {
  const outcome = run.outcome ?? run.state;
  const lines = [`Run ${run.run_id}: ${format(outcome, outcomeStyles(outcome))}`];

  if (run.backup_ref) lines.push(`  Backup: ${run.backup_ref}`);
  if (run.divergence) lines.push(`  ${formatDivergenceSummary(run.divergence)}`);

  if (run.drift) {
    lines.push(...formatDriftLines(run.drift, format).map((line) => `  ${line}`));
    if (run.drift_override) lines.push("  Drift override recorded.");
  }

  pushList(lines, "Kept local", run.resolved_paths.map((entry) => entry.path));
  pushList(lines, "Restored local", run.restored_paths.map((entry) => entry.path));
  pushList(
    lines,
    "Regenerated",
    run.regenerated.map((entry) => `${entry.target} (${entry.file_count} files)`),
  );
  pushList(lines, "Unresolved", run.unresolved_paths);

  if (run.promotion) {
    lines.push(`  Promotion: ${formatPromotion(run)}`);
  }
  if (run.error) {
    lines.push(`  Error: ${run.error.code}: ${run.error.message}`);
    if (run.error.rollback_error) {
      lines.push(`  Rollback failed: ${run.error.rollback_error}`);
    }
  }
  if (run.rolled_back && run.main_kept) {
    lines.push(`  Rolled back; ${run.main_branch} had new commits and was left in place.`);
  } else if (run.rolled_back) {
    lines.push(`  Rolled back to ${run.backup_ref ?? run.main_branch}.`);
  }

  if (run.outcome === "UNRESOLVED" && run.update_branch) {
    lines.push(
      `Next: resolve the conflicts on ${run.update_branch} and commit, or run \`fork-sync abort --run-id ${run.run_id}\`.`,
    );
  }
  return lines;
}

function formatPromotion(run: WorkflowRun): string {
  const promotion = run.promotion;
  if (!promotion) return "none";

  switch (promotion.status) {
    case "promoted":
      return `${run.main_branch} fast-forwarded to ${shortSha(promotion.merge_commit)}`;
    case "skipped":
      return `skipped; merge ${shortSha(promotion.merge_commit)} kept on ${run.update_branch ?? "the update branch"}`;
    case "blocked":
      return `blocked: ${promotion.message ?? "primary branch moved"}`;
  }
}

function pushList(lines: string[], label: string, values: string[]): void {
  if (values.length === 0) return;
  lines.push(`  ${label}: ${values.join(", ")}`);
}

function outcomeStyles(outcome: string): AnsiStyle[] {
  if (outcome === "NO_OP" || outcome === "CLEAN_MERGE") return ["green"];
  if (outcome === "UNRESOLVED") return ["yellow"];
  return ["bold", "red"];
}

function shortSha(sha: string): string {
  return sha.slice(0, 7);
}
