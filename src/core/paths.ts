import path from "node:path";

// Run state lives inside the git directory so it never dirties the working tree
// and is not switched by checkouts.
const STATE_DIR = "fork-sync";

export type PathsContext = {
  gitDir: string;
};

export function stateRoot(ctx: PathsContext): string {
  const override = process.env.FORK_SYNC_STATE_DIR?.trim();
  return override ? path.resolve(override) : path.join(ctx.gitDir, STATE_DIR);
}

export function runsDir(ctx: PathsContext): string {
  return path.join(stateRoot(ctx), "runs");
}

export function runReportPath(ctx: PathsContext, runId: string): string {
  return path.join(runsDir(ctx), `${runId}.json`);
}

export function logsDir(ctx: PathsContext): string {
  return path.join(stateRoot(ctx), "logs");
}

export function runLogPath(ctx: PathsContext, runId: string): string {
  return path.join(logsDir(ctx), `${runId}.jsonl`);
}

export function lockPath(ctx: PathsContext): string {
  return path.join(stateRoot(ctx), "sync.lock");
}
