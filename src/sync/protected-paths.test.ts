import { beforeEach, describe, expect, it } from "vitest";

import { FakeVcs } from "../app/orchestrator/__tests__/fakes.js";
import { PolicyEntrySchema } from "../core/config.js";

import { buildClassificationPolicy } from "./policy/classification.js";
import { resolveProtectedPaths } from "./protected-paths.js";
import { buildRepositoryHandle } from "./types.js";

const handle = buildRepositoryHandle({
  repoPath: "/repo",
  gitDir: "/repo/.git",
  mainBranch: "main",
  remote: "upstream",
  upstreamBranch: "main",
});

const policy = buildClassificationPolicy(
  [
    { pattern: "src/license/**", category: "protected", strategy: "FORCE_LOCAL" },
    { pattern: "config/keys.ts", category: "protected", strategy: "FORCE_LOCAL" },
    {
      pattern: "public/app/**",
      category: "generated",
      strategy: "REGENERATE",
      artifact: { target: "public/app", source: "build/app" },
    },
  ].map((entry) => PolicyEntrySchema.parse(entry)),
);

const BACKUP = "fork-sync/backup/r1";
const CHANGED = [
  "config/keys.ts",
  "public/app/index.html",
  "src/app.ts",
  "src/license/check.ts",
  "src/license/new.ts",
];

let vcs: FakeVcs;

beforeEach(async () => {
  vcs = new FakeVcs().seed({
    local: {
      "config/keys.ts": "local keys",
      "public/app/index.html": "local page",
      "src/app.ts": "local app",
      "src/license/check.ts": "local license",
    },
    upstream: {
      "config/keys.ts": "upstream keys",
      "public/app/index.html": "upstream page",
      "src/app.ts": "upstream app",
      "src/license/check.ts": "upstream license",
      "src/license/new.ts": "upstream gate",
    },
    behind: 1,
    changedPaths: CHANGED,
    conflicts: ["public/app/index.html", "src/app.ts", "src/license/check.ts"],
  });

  await vcs.createBranch("/repo", BACKUP, "main");
  await vcs.checkoutNewBranch("/repo", "fork-sync/update/r1", "main");
  await vcs.mergeNoCommit("/repo", "upstream/main");
});

describe("resolveProtectedPaths", () => {
  it("keeps local content for protected conflicts and defers the rest", async () => {
    const result = await resolveProtectedPaths({
      handle,
      vcs,
      policy,
      localRef: BACKUP,
      changedPaths: CHANGED,
    });

    expect(result.resolved).toEqual([
      { path: "src/license/check.ts", strategy: "FORCE_LOCAL", action: "kept-local" },
    ]);
    expect(result.deferred).toEqual(["public/app/index.html"]);
    expect(result.unresolved).toEqual(["src/app.ts"]);
    expect(vcs.index.get("src/license/check.ts")).toBe("local license");
    expect(Array.from(vcs.conflicts).sort()).toEqual(["public/app/index.html", "src/app.ts"]);
  });

  it("restores protected files upstream changed without a conflict", async () => {
    const result = await resolveProtectedPaths({
      handle,
      vcs,
      policy,
      localRef: BACKUP,
      changedPaths: CHANGED,
    });

    expect(result.restored).toEqual([
      { path: "config/keys.ts", strategy: "FORCE_LOCAL", action: "restored-local" },
      { path: "src/license/new.ts", strategy: "FORCE_LOCAL", action: "restored-local" },
    ]);
    expect(vcs.index.get("config/keys.ts")).toBe("local keys");
    expect(vcs.index.has("src/license/new.ts")).toBe(false);
  });

  it("leaves nothing to do on a second pass", async () => {
    const input = { handle, vcs, policy, localRef: BACKUP, changedPaths: CHANGED };
    await resolveProtectedPaths(input);
    const restoresAfterFirstPass = vcs.callsTo("restorePathFromRef").length;
    const indexAfterFirstPass = new Map(vcs.index);

    const second = await resolveProtectedPaths(input);

    expect(second.resolved).toEqual([]);
    expect(second.restored).toEqual([]);
    expect(second.unresolved).toEqual(["src/app.ts"]);
    expect(vcs.callsTo("restorePathFromRef")).toHaveLength(restoresAfterFirstPass);
    expect(vcs.index).toEqual(indexAfterFirstPass);
  });

  it("ignores changed paths when none are given", async () => {
    const result = await resolveProtectedPaths({ handle, vcs, policy, localRef: BACKUP });

    expect(result.restored).toEqual([]);
    expect(vcs.index.get("config/keys.ts")).toBe("upstream keys");
  });
});
