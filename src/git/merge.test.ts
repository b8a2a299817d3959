import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { fastForward } from "./merge.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);
const UPDATE = "fork-sync/update/r1";

function gitOutput(stdout: string, stderr = "", exitCode = 0): Awaited<ReturnType<typeof execa>> {
  return { stdout, stderr, exitCode } as Awaited<ReturnType<typeof execa>>;
}

function gitArgs(): string[][] {
  return execaMock.mock.calls.map((call) => {
    const args = call[1];
    return Array.isArray(args) ? args.map(String) : [];
  });
}

afterEach(() => {
  execaMock.mockReset();
});

describe("fastForward", () => {
  it("moves the primary branch and deletes the update branch", async () => {
    execaMock
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput("base-sha\n"))
      .mockResolvedValueOnce(gitOutput("", "", 0))
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput("merge-sha\n"))
      .mockResolvedValueOnce(gitOutput(""));

    const result = await fastForward({
      repoPath: "/repo",
      mainBranch: "main",
      targetRef: UPDATE,
      expectedBaseSha: "base-sha",
      cleanupBranch: UPDATE,
    });

    expect(result).toEqual({ status: "fast_forwarded", previousHead: "base-sha", head: "merge-sha" });
    expect(gitArgs()).toEqual([
      ["status", "--porcelain"],
      ["checkout", "main"],
      ["rev-parse", "--verify", "HEAD^{commit}"],
      ["merge-base", "--is-ancestor", "base-sha", UPDATE],
      ["merge", "--ff-only", UPDATE],
      ["rev-parse", "--verify", "HEAD^{commit}"],
      ["branch", "-D", UPDATE],
    ]);
  });

  it("reports a failed cleanup without undoing the fast-forward", async () => {
    execaMock
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput("base-sha\n"))
      .mockResolvedValueOnce(gitOutput("", "", 0))
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput("merge-sha\n"))
      .mockRejectedValueOnce(new Error("branch is locked"));

    const result = await fastForward({
      repoPath: "/repo",
      mainBranch: "main",
      targetRef: UPDATE,
      expectedBaseSha: "base-sha",
      cleanupBranch: UPDATE,
    });

    expect(result).toEqual({
      status: "fast_forwarded",
      previousHead: "base-sha",
      head: "merge-sha",
      cleanupError: `git branch -D ${UPDATE} failed: branch is locked`,
    });
  });

  it("refuses when the primary branch moved since the run started", async () => {
    execaMock
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput("other-sha"));

    const result = await fastForward({
      repoPath: "/repo",
      mainBranch: "main",
      targetRef: UPDATE,
      expectedBaseSha: "base-sha",
      cleanupBranch: UPDATE,
    });

    expect(result).toEqual({
      status: "blocked",
      reason: "main_advanced",
      message: `main moved to other-sha after the sync started from base-sha; ${UPDATE} was kept for review.`,
      currentHead: "other-sha",
      targetRef: UPDATE,
    });
    expect(execaMock).toHaveBeenCalledTimes(3);
  });

  it("refuses a promotion that is not a fast-forward", async () => {
    execaMock
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput(""))
      .mockResolvedValueOnce(gitOutput("base-sha"))
      .mockResolvedValueOnce(gitOutput("", "", 1));

    const result = await fastForward({ repoPath: "/repo", mainBranch: "main", targetRef: UPDATE });

    expect(result).toMatchObject({
      status: "blocked",
      reason: "non_fast_forward",
      message: `${UPDATE} does not contain main at base-sha; a fast-forward is not possible.`,
    });
  });
});
