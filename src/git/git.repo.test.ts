import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempRepo, type TempRepo } from "../app/orchestrator/__tests__/git-repo.js";
import { createGitVcs } from "../app/orchestrator/vcs/git-vcs.js";
import { PolicyEntrySchema } from "../core/config.js";
import { createVcsContentSource, scanDrift } from "../sync/drift/scanner.js";
import { buildClassificationPolicy } from "../sync/policy/classification.js";
import { resolveProtectedPaths } from "../sync/protected-paths.js";
import { buildRepositoryHandle, type RepositoryHandle } from "../sync/types.js";

import {
  diffNames,
  ensureCleanWorkingTree,
  fetchTag,
  listConflictedPaths,
  listDirtyPaths,
  mergeNoCommit,
  readFileAtRef,
  readStagedFile,
  restorePathFromRef,
} from "./git.js";

const UPSTREAM = "upstream-main";

let repo: TempRepo;
let extraRepos: TempRepo[] = [];

beforeEach(async () => {
  repo = await createTempRepo();
});

afterEach(async () => {
  await repo.cleanup();
  for (const extra of extraRepos) await extra.cleanup();
  extraRepos = [];
});

function handleFor(dir: string): RepositoryHandle {
  // The upstream side lives on a local branch so no remote is needed.
  return {
    ...buildRepositoryHandle({
      repoPath: dir,
      gitDir: `${dir}/.git`,
      mainBranch: "main",
      remote: "upstream",
      upstreamBranch: "main",
    }),
    upstreamRef: UPSTREAM,
  };
}

async function commitUpstream(files: Record<string, string>, removed: string[] = []): Promise<void> {
  await repo.git("checkout", "--quiet", "-b", UPSTREAM);
  await repo.write(files);
  for (const relativePath of removed) await repo.remove(relativePath);
  await repo.commit("upstream change");
  await repo.git("checkout", "--quiet", "main");
}

describe("path listings", () => {
  it("returns non-ASCII paths unquoted so the drift scan can read them", async () => {
    await repo.write({ "lic.py": "x = 1\n" });
    await repo.commit("base");
    await commitUpstream({ "licença.py": "is_premium = True\n", "out/new.html": "<p>new</p>\n" });

    const changed = await diffNames(repo.dir, "main", UPSTREAM);
    const drift = await scanDrift({
      changedPaths: changed,
      gatingPaths: [],
      source: createVcsContentSource(handleFor(repo.dir), createGitVcs()),
    });

    expect(changed).toEqual(["licença.py", "out/new.html"]);
    expect(drift).toEqual({
      severity: "WARNING",
      findings: [
        {
          path: "licença.py",
          severity: "WARNING",
          reason: "new-gating-reference",
          matched: ["premium-flag"],
          excerpt: ["is_premium = True"],
        },
      ],
    });
  });

  it("counts tracked edits as dirty and ignores untracked files", async () => {
    await repo.write({ "señal.txt": "one\n" });
    await repo.commit("base");

    await repo.write({ ".fork-sync/config.yaml": "upstream:\n  remote: upstream\n" });
    await expect(ensureCleanWorkingTree(repo.dir)).resolves.toBeUndefined();

    await repo.write({ "señal.txt": "two\n" });
    expect(await listDirtyPaths(repo.dir)).toEqual(["señal.txt"]);
  });
});

describe("blob reads", () => {
  it("keeps trailing newlines so a newline-only edit is a gating change", async () => {
    await repo.write({ "lic.py": "x = 1\n" });
    await repo.commit("base");
    await commitUpstream({ "lic.py": "x = 1" });

    const local = await readFileAtRef(repo.dir, "main", "lic.py");
    const upstream = await readFileAtRef(repo.dir, UPSTREAM, "lic.py");
    const drift = await scanDrift({
      changedPaths: ["lic.py"],
      gatingPaths: ["lic.py"],
      source: createVcsContentSource(handleFor(repo.dir), createGitVcs()),
    });

    expect(local?.toString("utf8")).toBe("x = 1\n");
    expect(upstream?.toString("utf8")).toBe("x = 1");
    expect(drift.severity).toBe("CRITICAL");
    expect(await readFileAtRef(repo.dir, "main", "missing.py")).toBeNull();
  });
});

describe("merge resolution", () => {
  it("checks a conflicted path out of the local ref and clears the conflict", async () => {
    await repo.write({ "src/license/check.py": "base\n" });
    await repo.commit("base");
    await commitUpstream({ "src/license/check.py": "upstream\n" });
    await repo.write({ "src/license/check.py": "local" });
    await repo.commit("local change");
    await repo.git("checkout", "--quiet", "-b", "update");

    const attempt = await mergeNoCommit(repo.dir, UPSTREAM);
    expect(attempt.clean).toBe(false);
    expect(await listConflictedPaths(repo.dir)).toEqual(["src/license/check.py"]);

    await restorePathFromRef(repo.dir, "main", "src/license/check.py");

    expect(await listConflictedPaths(repo.dir)).toEqual([]);
    expect((await readStagedFile(repo.dir, "src/license/check.py"))?.toString("utf8")).toBe("local");
  });

  it("keeps every protected path byte-identical to the local side", async () => {
    await repo.write({
      "src/license/check.py": "base\n",
      "src/license/keys.py": "KEY = 'fork'\n",
      "src/app.py": "app\n",
    });
    await repo.commit("base");
    await commitUpstream({
      "src/license/check.py": "upstream\n",
      "src/license/keys.py": "KEY = 'fork'",
      "src/license/new.py": "def gate(): pass\n",
      "src/app.py": "app v2\n",
    });
    await repo.write({ "src/license/check.py": "local\n" });
    await repo.commit("local change");
    await repo.git("checkout", "--quiet", "-b", "update");

    const vcs = createGitVcs();
    await vcs.mergeNoCommit(repo.dir, UPSTREAM);
    const result = await resolveProtectedPaths({
      handle: handleFor(repo.dir),
      vcs,
      policy: buildClassificationPolicy([
        PolicyEntrySchema.parse({ pattern: "src/license/**", category: "protected", strategy: "FORCE_LOCAL" }),
      ]),
      localRef: "main",
      changedPaths: await diffNames(repo.dir, "main~1", UPSTREAM),
    });

    expect(result.resolved.map((entry) => entry.path)).toEqual(["src/license/check.py"]);
    expect(result.restored.map((entry) => entry.path)).toEqual([
      "src/license/keys.py",
      "src/license/new.py",
    ]);
    expect((await readStagedFile(repo.dir, "src/license/keys.py"))?.toString("utf8")).toBe("KEY = 'fork'\n");
    expect(await readStagedFile(repo.dir, "src/license/new.py")).toBeNull();
    expect((await readStagedFile(repo.dir, "src/app.py"))?.toString("utf8")).toBe("app v2\n");
    expect(await listConflictedPaths(repo.dir)).toEqual([]);
  });

  it("drops files the merge added under a restored directory", async () => {
    await repo.write({ "out/index.html": "<!DOCTYPE html>local\n" });
    await repo.commit("base");
    await commitUpstream({ "out/new.html": "<!DOCTYPE html>new\n" });
    await repo.git("checkout", "--quiet", "-b", "update");
    await mergeNoCommit(repo.dir, UPSTREAM);

    await restorePathFromRef(repo.dir, "main", "out");

    expect(await repo.git("diff", "--cached", "--name-only", "--", "out")).toBe("");
  });
});

describe("fetchTag", () => {
  it("fetches a single release tag from a local upstream", async () => {
    const upstream = await createTempRepo("fork-sync-upstream-");
    extraRepos.push(upstream);
    await upstream.write({ "README.md": "v1\n" });
    const sha = await upstream.commit("release");
    await upstream.git("tag", "v1.0.0");

    await repo.write({ "README.md": "fork\n" });
    await repo.commit("fork");
    await repo.git("remote", "add", "upstream", upstream.dir);

    await fetchTag(repo.dir, "upstream", "v1.0.0");

    expect(await repo.git("rev-parse", "refs/tags/v1.0.0^{commit}")).toBe(sha);
  });
});
