/*
Purpose: thin execa wrappers over the git CLI used by the sync workflow.
Assumptions: git is on PATH; every call names its repository explicitly (no reliance on process.cwd()).
Usage: await git(repoPath, ["status", "--porcelain"]); await mergeNoCommit(repoPath, "upstream/main").
*/

import { execa } from "execa";

import { DirtyTreeError, FetchError, GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type GitOptions = {
  reject?: boolean;
};

export type CommitSummary = {
  sha: string;
  subject: string;
};

export type MergeAttempt = {
  clean: boolean;
  output: string;
};

// =============================================================================
// CORE
// =============================================================================

export async function git(
  repoPath: string,
  args: string[],
  options: GitOptions = {},
): Promise<GitResult> {
  const reject = options.reject ?? true;

  let result: { stdout: unknown; stderr: unknown; exitCode?: number };
  try {
    result = await execa("git", args, { cwd: repoPath, reject, stdio: "pipe" });
  } catch (err) {
    throw new GitError(`git ${args.join(" ")} failed: ${describeExecaError(err)}`, err);
  }

  return {
    stdout: asText(result.stdout),
    stderr: asText(result.stderr),
    exitCode: result.exitCode ?? 0,
  };
}

// =============================================================================
// WORKING TREE
// =============================================================================

// Tracked changes only: untracked files (a fresh config, a canonical build) never block a sync.
export async function listDirtyPaths(repoPath: string): Promise<string[]> {
  const res = await git(repoPath, [
    "status",
    "--porcelain",
    "-z",
    "--untracked-files=no",
    "--no-renames",
  ]);
  return res.stdout
    .split("\0")
    .filter((entry) => entry.length > 3)
    .map((entry) => entry.slice(3));
}

export async function ensureCleanWorkingTree(repoPath: string): Promise<void> {
  const dirty = await listDirtyPaths(repoPath);
  if (dirty.length > 0) {
    throw new DirtyTreeError(
      `Git working tree has uncommitted changes (${dirty.length} path(s)): ${dirty.slice(0, 5).join(", ")}`,
      dirty,
    );
  }
}

export async function resolveGitDir(repoPath: string): Promise<string> {
  const res = await git(repoPath, ["rev-parse", "--absolute-git-dir"]);
  return res.stdout.trim();
}

// =============================================================================
// REFS AND BRANCHES
// =============================================================================

export async function currentBranch(repoPath: string): Promise<string> {
  const res = await git(repoPath, ["branch", "--show-current"]);
  return res.stdout.trim();
}

export async function headSha(repoPath: string, ref = "HEAD"): Promise<string> {
  const res = await git(repoPath, ["rev-parse", "--verify", `${ref}^{commit}`]);
  return res.stdout.trim();
}

export async function branchExists(repoPath: string, branch: string): Promise<boolean> {
  const res = await git(repoPath, ["show-ref", "--verify", "--quiet", `refs/heads/${branch}`], {
    reject: false,
  });
  return res.exitCode === 0;
}

export async function createBranch(repoPath: string, branch: string, startRef: string): Promise<void> {
  await git(repoPath, ["branch", branch, startRef]);
}

export async function checkout(repoPath: string, branch: string): Promise<void> {
  await git(repoPath, ["checkout", branch]);
}

export async function forceCheckout(repoPath: string, branch: string): Promise<void> {
  await git(repoPath, ["checkout", "--force", branch]);
}

export async function checkoutNewBranch(
  repoPath: string,
  branch: string,
  startRef: string,
): Promise<void> {
  await git(repoPath, ["checkout", "-b", branch, startRef]);
}

export async function deleteLocalBranch(repoPath: string, branch: string): Promise<void> {
  await git(repoPath, ["branch", "-D", branch]);
}

export async function resetHard(repoPath: string, ref: string): Promise<void> {
  await git(repoPath, ["reset", "--hard", ref]);
}

export async function isAncestor(
  repoPath: string,
  ancestorRef: string,
  descendantRef: string,
): Promise<boolean> {
  const res = await git(repoPath, ["merge-base", "--is-ancestor", ancestorRef, descendantRef], {
    reject: false,
  });
  if (res.exitCode === 0) return true;
  if (res.exitCode === 1) return false;
  throw new GitError(`git merge-base --is-ancestor failed: ${res.stderr.trim()}`);
}

// =============================================================================
// REMOTES
// =============================================================================

export async function remoteExists(repoPath: string, remote: string): Promise<boolean> {
  const res = await git(repoPath, ["remote"]);
  return res.stdout
    .split("\n")
    .map((line) => line.trim())
    .includes(remote);
}

export async function addRemote(repoPath: string, remote: string, url: string): Promise<void> {
  await git(repoPath, ["remote", "add", remote, url]);
}

export async function fetchRemote(repoPath: string, remote: string, branch: string): Promise<void> {
  await runFetch(repoPath, remote, branch, `${remote}/${branch}`);
}

export async function fetchTag(repoPath: string, remote: string, tag: string): Promise<void> {
  await runFetch(repoPath, remote, `+refs/tags/${tag}:refs/tags/${tag}`, `tag ${tag} from ${remote}`);
}

async function runFetch(repoPath: string, remote: string, refspec: string, label: string): Promise<void> {
  const res = await git(repoPath, ["fetch", "--no-tags", remote, refspec], { reject: false });
  if (res.exitCode !== 0) {
    const detail = res.stderr.trim() || res.stdout.trim() || `exit code ${res.exitCode}`;
    throw new FetchError(`Could not fetch ${label}: ${detail}`, remote);
  }
}

// =============================================================================
// HISTORY AND CONTENT
// =============================================================================

export async function countCommits(repoPath: string, range: string): Promise<number> {
  const res = await git(repoPath, ["rev-list", "--count", range]);
  const count = Number.parseInt(res.stdout.trim(), 10);
  if (!Number.isFinite(count)) {
    throw new GitError(`Unexpected rev-list output for ${range}: ${res.stdout.trim()}`);
  }
  return count;
}

export async function mergeBase(repoPath: string, left: string, right: string): Promise<string | null> {
  const res = await git(repoPath, ["merge-base", left, right], { reject: false });
  if (res.exitCode !== 0) return null;
  return res.stdout.trim() || null;
}

export async function diffNames(repoPath: string, fromRef: string, toRef: string): Promise<string[]> {
  const res = await git(repoPath, ["diff", "--name-only", "-z", "--no-renames", fromRef, toRef]);
  return parsePathList(res.stdout);
}

export async function listCommits(repoPath: string, range: string, limit: number): Promise<CommitSummary[]> {
  const res = await git(repoPath, ["log", `--max-count=${limit}`, "--format=%H%x09%s", range]);
  return res.stdout
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => {
      const tab = line.indexOf("\t");
      return tab === -1
        ? { sha: line, subject: "" }
        : { sha: line.slice(0, tab), subject: line.slice(tab + 1) };
    });
}

export async function readFileAtRef(
  repoPath: string,
  ref: string,
  filePath: string,
): Promise<Buffer | null> {
  return readBlob(repoPath, `${ref}:${filePath}`);
}

export async function readStagedFile(repoPath: string, filePath: string): Promise<Buffer | null> {
  return readBlob(repoPath, `:0:${filePath}`);
}

// Raw blob bytes: no decoding, trailing newlines kept.
async function readBlob(repoPath: string, spec: string): Promise<Buffer | null> {
  const args = ["cat-file", "blob", spec];
  let result: { stdout: Uint8Array; exitCode?: number };
  try {
    result = await execa("git", args, {
      cwd: repoPath,
      reject: false,
      stdio: "pipe",
      encoding: "buffer",
      stripFinalNewline: false,
    });
  } catch (err) {
    throw new GitError(`git ${args.join(" ")} failed: ${describeExecaError(err)}`, err);
  }

  if (result.exitCode !== 0) return null;
  return Buffer.from(result.stdout);
}

export async function pathExistsAtRef(
  repoPath: string,
  ref: string,
  filePath: string,
): Promise<boolean> {
  const res = await git(repoPath, ["cat-file", "-e", `${ref}:${filePath}`], { reject: false });
  return res.exitCode === 0;
}

// =============================================================================
// MERGE
// =============================================================================

export async function mergeNoCommit(repoPath: string, ref: string): Promise<MergeAttempt> {
  const res = await git(repoPath, ["merge", "--no-commit", "--no-ff", ref], { reject: false });
  const output = [res.stdout, res.stderr]
    .map((text) => text.trim())
    .filter((text) => text.length > 0)
    .join("\n");
  if (res.exitCode === 0) return { clean: true, output };

  if (isMergeConflictOutput(output)) return { clean: false, output };
  throw new GitError(`git merge ${ref} failed: ${output || `exit code ${res.exitCode}`}`);
}

export async function listConflictedPaths(repoPath: string): Promise<string[]> {
  const res = await git(repoPath, ["diff", "--name-only", "-z", "--diff-filter=U"]);
  return parsePathList(res.stdout);
}

export async function restorePathFromRef(
  repoPath: string,
  ref: string,
  filePath: string,
): Promise<void> {
  // --no-overlay also drops index entries under filePath that the ref does not have.
  if (await pathExistsAtRef(repoPath, ref, filePath)) {
    await git(repoPath, ["checkout", "--no-overlay", ref, "--", filePath]);
    return;
  }

  await git(repoPath, ["rm", "-r", "--force", "--ignore-unmatch", "--quiet", "--", filePath]);
}

export async function stagePath(repoPath: string, filePath: string): Promise<void> {
  await git(repoPath, ["add", "--all", "--", filePath]);
}

export async function mergeInProgress(repoPath: string): Promise<boolean> {
  const res = await git(repoPath, ["rev-parse", "-q", "--verify", "MERGE_HEAD"], { reject: false });
  return res.exitCode === 0;
}

export async function abortMerge(repoPath: string): Promise<void> {
  if (!(await mergeInProgress(repoPath))) return;
  await git(repoPath, ["merge", "--abort"]);
}

export async function commitMerge(repoPath: string, message: string): Promise<string> {
  await git(repoPath, ["commit", "--no-edit", "--allow-empty", "-m", message]);
  return headSha(repoPath);
}

export async function fastForwardTo(repoPath: string, targetRef: string): Promise<void> {
  await git(repoPath, ["merge", "--ff-only", targetRef]);
}

// =============================================================================
// HELPERS
// =============================================================================

// NUL-separated (-z) output: paths arrive unquoted, whatever characters they hold.
export function parsePathList(stdout: string): string[] {
  const paths = stdout.split("\0").filter((entry) => entry.length > 0);
  return Array.from(new Set(paths)).sort();
}

export function isMergeConflictOutput(output: string): boolean {
  return /CONFLICT|Automatic merge failed|fix conflicts/i.test(output);
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

function describeExecaError(err: unknown): string {
  if (err && typeof err === "object") {
    if ("stderr" in err && typeof err.stderr === "string" && err.stderr.trim()) {
      return err.stderr.trim();
    }
    if ("shortMessage" in err && typeof err.shortMessage === "string") {
      return err.shortMessage;
    }
  }
  return err instanceof Error ? err.message : String(err);
}
