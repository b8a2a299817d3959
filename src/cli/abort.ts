import { abortRun } from "../app/orchestrator/run-engine.js";
import { buildRunContext } from "../app/orchestrator/run-context.js";

import type { CliContext } from "./config.js";
import { formatRunLines, printLines, stdoutFormatter } from "./output.js";

export async function abortCommand(cli: CliContext, opts: { runId?: string }): Promise<void> {
  const context = buildRunContext({ handle: cli.handle, config: cli.config });
  const run = await abortRun(context, opts.runId);

  printLines(formatRunLines(run, stdoutFormatter()));
  console.log(`Backup ${run.backup_ref ?? "(none)"} kept; ${run.main_branch} restored.`);
}
