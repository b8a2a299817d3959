import { describe, expect, it } from "vitest";

import { FakeVcs, LOCAL_SHA, UPSTREAM_SHA } from "../app/orchestrator/__tests__/fakes.js";

import { analyzeDivergence, fetchUpstream, formatDivergenceSummary, isNoOp } from "./divergence.js";
import { buildClassificationPolicy } from "./policy/classification.js";
import { buildRepositoryHandle } from "./types.js";

const handle = buildRepositoryHandle({
  repoPath: "/repo",
  gitDir: "/repo/.git",
  mainBranch: "main",
  remote: "upstream",
  upstreamBranch: "main",
});

describe("analyzeDivergence", () => {
  it("short-circuits when both tips are the same commit", async () => {
    const vcs = new FakeVcs();

    const report = await analyzeDivergence(handle, vcs);

    expect(report).toEqual({
      local_ref: "main",
      upstream_ref: "upstream/main",
      local_sha: LOCAL_SHA,
      upstream_sha: LOCAL_SHA,
      merge_base: LOCAL_SHA,
      ahead: 0,
      behind: 0,
      changed_paths: [],
      incoming_commits: [],
      potential_conflicts: [],
    });
    expect(isNoOp(report)).toBe(true);
    expect(vcs.callsTo("countCommits")).toEqual([]);
  });

  it("reports counts and sorted changed paths since the merge base", async () => {
    const vcs = new FakeVcs().seed({
      local: {},
      upstream: {},
      ahead: 2,
      behind: 3,
      changedPaths: ["src/b.ts", "src/a.ts", "src/b.ts"],
    });

    const report = await analyzeDivergence(handle, vcs);

    expect(report.ahead).toBe(2);
    expect(report.behind).toBe(3);
    expect(report.merge_base).toBe("base-sha");
    expect(report.changed_paths).toEqual(["src/a.ts", "src/b.ts"]);
    expect(vcs.callsTo("diffNames")).toEqual([
      { method: "diffNames", args: ["base-sha", UPSTREAM_SHA] },
    ]);
    expect(isNoOp(report)).toBe(false);
    expect(formatDivergenceSummary(report)).toBe(
      "main is 3 commit(s) behind and 2 ahead of upstream/main; 2 path(s) changed upstream.",
    );
  });

  it("lists the incoming upstream commits", async () => {
    const vcs = new FakeVcs().seed({
      local: {},
      upstream: {},
      behind: 2,
      changedPaths: ["src/a.ts"],
      incoming: [
        { sha: "c2", subject: "feat: add router" },
        { sha: "c1", subject: "fix: retry fetch" },
      ],
    });

    const report = await analyzeDivergence(handle, vcs);

    expect(report.incoming_commits).toEqual([
      { sha: "c2", subject: "feat: add router" },
      { sha: "c1", subject: "fix: retry fetch" },
    ]);
    expect(vcs.callsTo("listCommits")).toEqual([
      { method: "listCommits", args: ["main..upstream/main", "20"] },
    ]);
  });

  it("previews protected paths changed on both sides", async () => {
    const policy = buildClassificationPolicy([
      { pattern: "src/license/**", category: "protected", strategy: "FORCE_LOCAL" },
    ]);
    const vcs = new FakeVcs().seed({
      local: {},
      upstream: {},
      ahead: 1,
      behind: 1,
      changedPaths: ["src/app.ts", "src/license/check.ts", "src/license/keys.ts"],
      localChangedPaths: ["src/app.ts", "src/license/check.ts"],
    });

    const report = await analyzeDivergence(handle, vcs, { policy });

    expect(report.potential_conflicts).toEqual(["src/license/check.ts"]);
    expect(vcs.callsTo("diffNames")).toEqual([
      { method: "diffNames", args: ["base-sha", UPSTREAM_SHA] },
      { method: "diffNames", args: ["base-sha", LOCAL_SHA] },
    ]);
  });

  it("skips the preview when the fork has no commits of its own", async () => {
    const policy = buildClassificationPolicy([
      { pattern: "src/license/**", category: "protected", strategy: "FORCE_LOCAL" },
    ]);
    const vcs = new FakeVcs().seed({
      local: {},
      upstream: {},
      behind: 1,
      changedPaths: ["src/license/check.ts"],
    });

    const report = await analyzeDivergence(handle, vcs, { policy });

    expect(report.potential_conflicts).toEqual([]);
    expect(vcs.callsTo("diffNames")).toHaveLength(1);
  });

  it("diffs the two tips when the histories are unrelated", async () => {
    const vcs = new FakeVcs().seed({ local: {}, upstream: {}, behind: 1, changedPaths: ["README.md"] });
    vcs.mergeBaseSha = null;

    const report = await analyzeDivergence(handle, vcs);

    expect(report.merge_base).toBeNull();
    expect(vcs.callsTo("diffNames")).toEqual([
      { method: "diffNames", args: [LOCAL_SHA, UPSTREAM_SHA] },
    ]);
  });

  it("treats a fork that is only ahead as a no-op", async () => {
    const vcs = new FakeVcs().seed({ local: {}, upstream: {}, ahead: 4, changedPaths: ["src/a.ts"] });

    const report = await analyzeDivergence(handle, vcs);

    expect(report.changed_paths).toEqual([]);
    expect(isNoOp(report)).toBe(true);
    expect(formatDivergenceSummary(report)).toBe(
      "main is 4 commit(s) ahead of upstream/main; nothing to pull.",
    );
  });
});

describe("fetchUpstream", () => {
  it("adds a configured remote that is missing before fetching", async () => {
    const vcs = new FakeVcs();
    vcs.remotes.clear();

    await fetchUpstream({ ...handle, remoteUrl: "https://example.invalid/upstream.git" }, vcs);

    expect(vcs.calls.map((call) => call.method)).toEqual(["remoteExists", "addRemote", "fetchRemote"]);
    expect(vcs.callsTo("fetchRemote")[0]?.args).toEqual(["upstream", "main"]);
  });

  it("fetches only the requested tag when syncing to a release", async () => {
    const vcs = new FakeVcs();
    const tagged = buildRepositoryHandle({
      repoPath: "/repo",
      gitDir: "/repo/.git",
      mainBranch: "main",
      remote: "upstream",
      upstreamBranch: "main",
      upstreamTag: "v1.60.0",
    });

    await fetchUpstream(tagged, vcs);

    expect(tagged.upstreamRef).toBe("refs/tags/v1.60.0");
    expect(vcs.calls).toEqual([{ method: "fetchTag", args: ["upstream", "v1.60.0"] }]);
  });

  it("fetches an existing remote without touching its configuration", async () => {
    const vcs = new FakeVcs();

    await fetchUpstream(handle, vcs);

    expect(vcs.calls.map((call) => call.method)).toEqual(["fetchRemote"]);
  });
});
