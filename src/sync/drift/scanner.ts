/**
 * License-drift scanner.
 * Purpose: flag upstream edits to the gating logic the fork overrides before anything is merged.
 * Assumptions: textual heuristics only; reads fetched objects and never touches the working tree.
 * Usage: scanDrift({ changedPaths, gatingPaths, rules, source: createVcsContentSource(handle, vcs) }).
 */

import { minimatch } from "minimatch";

import type { Vcs } from "../../app/orchestrator/vcs/vcs.js";
import { uniqueSorted } from "../../core/utils.js";
import type {
  DriftFinding,
  DriftReason,
  DriftScanResult,
  DriftSeverity,
  RepositoryHandle,
} from "../types.js";

import { DEFAULT_DRIFT_RULES, matchRules, type DriftRule } from "./rules.js";

// =============================================================================
// TYPES
// =============================================================================

// Raw bytes: equality is byte-exact, decoding only happens for the rule scan.
export type DriftContentSource = {
  readLocal(filePath: string): Promise<Buffer | null>;
  readUpstream(filePath: string): Promise<Buffer | null>;
};

export type DriftScanInput = {
  changedPaths: string[];
  gatingPaths: string[];
  watchedPaths?: string[];
  include?: string[];
  rules?: readonly DriftRule[];
  source: DriftContentSource;
};

const EXCERPT_LIMIT = 3;
const EXCERPT_WIDTH = 200;

const SEVERITY_RANK: Record<DriftSeverity, number> = {
  CLEAN: 0,
  WARNING: 1,
  CRITICAL: 2,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function scanDrift(input: DriftScanInput): Promise<DriftScanResult> {
  const rules = input.rules ?? DEFAULT_DRIFT_RULES;
  const watched = input.watchedPaths ?? [];
  const include = input.include ?? ["**/*"];
  const findings: DriftFinding[] = [];

  for (const filePath of uniqueSorted(input.changedPaths)) {
    if (matchesAny(filePath, input.gatingPaths)) {
      const finding = await scanGatingPath(filePath, rules, input.source);
      if (finding) findings.push(finding);
      continue;
    }

    if (matchesAny(filePath, watched)) {
      const finding = await scanWatchedPath(filePath, rules, input.source);
      if (finding) findings.push(finding);
      continue;
    }

    if (!matchesAny(filePath, include)) continue;

    const finding = await scanChangedPath(filePath, rules, input.source);
    if (finding) findings.push(finding);
  }

  return { severity: maxSeverity(findings.map((f) => f.severity)), findings };
}

export function createVcsContentSource(handle: RepositoryHandle, vcs: Vcs): DriftContentSource {
  return {
    readLocal: (filePath) => vcs.readFileAtRef(handle.repoPath, handle.mainBranch, filePath),
    readUpstream: (filePath) => vcs.readFileAtRef(handle.repoPath, handle.upstreamRef, filePath),
  };
}

export function maxSeverity(severities: DriftSeverity[]): DriftSeverity {
  return severities.reduce<DriftSeverity>(
    (current, next) => (SEVERITY_RANK[next] > SEVERITY_RANK[current] ? next : current),
    "CLEAN",
  );
}

// =============================================================================
// PER-PATH CHECKS
// =============================================================================

async function scanGatingPath(
  filePath: string,
  rules: readonly DriftRule[],
  source: DriftContentSource,
): Promise<DriftFinding | null> {
  const local = await source.readLocal(filePath);
  const upstream = await source.readUpstream(filePath);
  if (sameContent(local, upstream)) return null;

  const added = isBinary(upstream) ? [] : addedLines(local, upstream);
  const hits = collectHits(added, rules);
  const excerpt = hits.lines.length > 0 ? hits.lines : added.slice(0, EXCERPT_LIMIT).map(clip);

  return buildFinding(filePath, "CRITICAL", "gating-path-modified", hits.matched, excerpt);
}

async function scanWatchedPath(
  filePath: string,
  rules: readonly DriftRule[],
  source: DriftContentSource,
): Promise<DriftFinding | null> {
  const local = await source.readLocal(filePath);
  const upstream = await source.readUpstream(filePath);
  if (upstream === null || isBinary(upstream) || sameContent(local, upstream)) return null;

  const hits = collectHits(addedLines(local, upstream), rules);
  if (hits.matched.length === 0) return null;

  return buildFinding(filePath, "WARNING", "watched-path-modified", hits.matched, hits.lines);
}

async function scanChangedPath(
  filePath: string,
  rules: readonly DriftRule[],
  source: DriftContentSource,
): Promise<DriftFinding | null> {
  const upstream = await source.readUpstream(filePath);
  if (upstream === null || isBinary(upstream)) return null;

  const hits = collectHits(splitLines(upstream), rules);
  if (hits.matched.length === 0) return null;

  return buildFinding(filePath, "WARNING", "new-gating-reference", hits.matched, hits.lines);
}

// =============================================================================
// INTERNALS
// =============================================================================

function buildFinding(
  filePath: string,
  severity: DriftSeverity,
  reason: DriftReason,
  matched: string[],
  excerpt: string[],
): DriftFinding {
  return { path: filePath, severity, reason, matched, excerpt };
}

function collectHits(
  lines: string[],
  rules: readonly DriftRule[],
): { matched: string[]; lines: string[] } {
  const matched = new Set<string>();
  const excerpt: string[] = [];

  for (const line of lines) {
    const names = matchRules(line, rules);
    if (names.length === 0) continue;

    for (const name of names) matched.add(name);
    if (excerpt.length < EXCERPT_LIMIT) excerpt.push(clip(line));
  }

  // Report rule names in rule order, not discovery order.
  const ordered = rules.map((rule) => rule.name).filter((name) => matched.has(name));
  return { matched: Array.from(new Set(ordered)), lines: excerpt };
}

// Lines present upstream that the local side does not have.
function addedLines(local: Buffer | null, upstream: Buffer | null): string[] {
  if (upstream === null) return [];
  const localLines = new Set(local ? splitLines(local) : []);
  return splitLines(upstream).filter((line) => line.trim().length > 0 && !localLines.has(line));
}

function splitLines(content: Buffer): string[] {
  return content.toString("utf8").split(/\r?\n/);
}

function sameContent(left: Buffer | null, right: Buffer | null): boolean {
  if (left === null || right === null) return left === right;
  return left.equals(right);
}

function matchesAny(filePath: string, patterns: string[]): boolean {
  return patterns.some(
    (pattern) => pattern === filePath || minimatch(filePath, pattern, { dot: true }),
  );
}

function isBinary(content: Buffer | null): boolean {
  return content !== null && content.includes(0);
}

function clip(line: string): string {
  const trimmed = line.trim();
  return trimmed.length > EXCERPT_WIDTH ? `${trimmed.slice(0, EXCERPT_WIDTH)}...` : trimmed;
}
