// File classification policy.
// Purpose: map repository paths to a category and resolution strategy, first match wins.
// Assumes patterns are repository-relative globs using forward slashes.

import { minimatch } from "minimatch";

import type { PolicyEntry } from "../../core/config.js";
import { toPosixPath } from "../../core/utils.js";
import type { FileClassification } from "../types.js";

export const DEFAULT_CLASSIFICATION: FileClassification = {
  pattern: "**",
  category: "ordinary",
  strategy: "MANUAL",
};

export function buildClassificationPolicy(entries: PolicyEntry[]): FileClassification[] {
  return entries.map((entry) => {
    const classification: FileClassification = {
      pattern: toPosixPath(entry.pattern),
      category: entry.category,
      strategy: entry.strategy,
    };

    if (entry.artifact) {
      classification.artifact = {
        target: trimSlashes(toPosixPath(entry.artifact.target)),
        source: entry.artifact.source,
        marker: entry.artifact.marker,
        markerFiles: entry.artifact.marker_files,
        minFiles: entry.artifact.min_files,
        maxFiles: entry.artifact.max_files,
      };
    }

    return Object.freeze(classification);
  });
}

export function classifyPath(
  policy: readonly FileClassification[],
  filePath: string,
): FileClassification {
  const normalized = toPosixPath(filePath);
  return policy.find((entry) => matchesClassification(entry, normalized)) ?? DEFAULT_CLASSIFICATION;
}

export function matchesClassification(entry: FileClassification, filePath: string): boolean {
  if (entry.pattern === filePath) return true;
  if (minimatch(filePath, entry.pattern, { dot: true })) return true;
  // A bare directory pattern also covers everything below it.
  return !hasGlobMagic(entry.pattern) && isInsideDirectory(filePath, entry.pattern);
}

export function isInsideDirectory(filePath: string, directory: string): boolean {
  const dir = trimSlashes(toPosixPath(directory));
  const file = toPosixPath(filePath);
  return file === dir || file.startsWith(`${dir}/`);
}

function hasGlobMagic(pattern: string): boolean {
  return /[*?[\]{}!]/.test(pattern);
}

function trimSlashes(value: string): string {
  return value.replace(/^\.\//, "").replace(/\/+$/, "");
}
