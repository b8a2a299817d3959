import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigError } from "../../core/errors.js";
import { runReportPath } from "../../core/paths.js";
import { buildRepositoryHandle } from "../../sync/types.js";

import { RunStore } from "./run-store.js";
import { createWorkflowRun } from "./workflow-state.js";

let gitDir: string;

beforeEach(() => {
  vi.stubEnv("FORK_SYNC_STATE_DIR", "");
  gitDir = fs.mkdtempSync(path.join(os.tmpdir(), "fork-sync-runs-"));
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(gitDir, { recursive: true, force: true });
});

function makeRun(runId: string) {
  const handle = buildRepositoryHandle({
    repoPath: "/repo",
    gitDir,
    mainBranch: "main",
    remote: "upstream",
    upstreamBranch: "main",
  });
  return createWorkflowRun({ runId, handle, now: new Date("2024-01-01T00:00:00.000Z") });
}

describe("RunStore", () => {
  it("saves reports under the git directory and loads them back", async () => {
    const store = new RunStore({ gitDir });
    const run = makeRun("20240101-000000-aaaaaa");

    const savedPath = await store.save(run);

    expect(savedPath).toBe(path.join(gitDir, "fork-sync", "runs", "20240101-000000-aaaaaa.json"));
    await expect(store.load(run.run_id)).resolves.toEqual(run);
  });

  it("returns null for unknown runs", async () => {
    await expect(new RunStore({ gitDir }).load("missing")).resolves.toBeNull();
    expect(new RunStore({ gitDir }).findLatestRunId()).toBeNull();
  });

  it("finds the most recent run by id", async () => {
    const store = new RunStore({ gitDir });
    await store.save(makeRun("20240102-000000-bbbbbb"));
    await store.save(makeRun("20240101-000000-aaaaaa"));

    expect(store.findLatestRunId()).toBe("20240102-000000-bbbbbb");
  });

  it("rejects reports that do not match the run schema", async () => {
    const filePath = runReportPath({ gitDir }, "broken");
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ run_id: "broken" }), "utf8");

    await expect(new RunStore({ gitDir }).load("broken")).rejects.toThrow(ConfigError);
  });
});
