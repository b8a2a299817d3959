import path from "node:path";

import { minimatch } from "minimatch";

import type { ArtifactSpec } from "../types.js";

import type { ArtifactStore } from "./artifact-store.js";

export type ArtifactValidation = {
  ok: boolean;
  fileCount: number;
  violations: string[];
};

const MAX_REPORTED_VIOLATIONS = 20;

export async function validateArtifactTree(
  store: ArtifactStore,
  root: string,
  spec: ArtifactSpec,
): Promise<ArtifactValidation> {
  if (!(await store.exists(root))) {
    return { ok: false, fileCount: 0, violations: [`${root} does not exist`] };
  }

  const files = await store.listFiles(root);
  const violations: string[] = [];

  if (files.length < spec.minFiles || files.length > spec.maxFiles) {
    violations.push(
      `expected between ${spec.minFiles} and ${spec.maxFiles} files, found ${files.length}`,
    );
  }

  for (const file of files) {
    if (!minimatch(file, spec.markerFiles, { dot: true })) continue;

    const content = await store.readText(path.join(root, file));
    const count = countOccurrences(content, spec.marker);
    if (count !== 1) {
      violations.push(`${file}: expected exactly one "${spec.marker}", found ${count}`);
    }
  }

  return {
    ok: violations.length === 0,
    fileCount: files.length,
    violations: violations.slice(0, MAX_REPORTED_VIOLATIONS),
  };
}

export function countOccurrences(content: string, marker: string): number {
  if (marker.length === 0) return 0;
  return content.split(marker).length - 1;
}
