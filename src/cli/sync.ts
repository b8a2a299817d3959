import type { SyncResult } from "../app/orchestrator/run-engine.js";
import { checkUpstream, runSync } from "../app/orchestrator/run-engine.js";
import { buildRunContext, type SyncOptions } from "../app/orchestrator/run-context.js";
import { defaultRunId } from "../core/utils.js";

import type { CliContext } from "./config.js";
import {
  formatDivergenceLines,
  formatDriftLines,
  formatRunLines,
  printError,
  printJson,
  printLines,
  stdoutFormatter,
} from "./output.js";
import { createSyncAbortHandler } from "./signal-handlers.js";

export type SyncFlags = {
  checkOnly: boolean;
  allowDrift: boolean;
  promote: boolean;
  json: boolean;
  ref?: string;
};

export async function syncCommand(
  cli: CliContext,
  flags: SyncFlags,
  opts: { debug: boolean },
): Promise<void> {
  if (flags.checkOnly) {
    await checkOnlyCommand(cli, flags);
    return;
  }

  const runId = defaultRunId();
  const abortHandler = createSyncAbortHandler({
    onAbort: (signal) => {
      console.error(`Received ${signal}. Aborting sync ${runId} and restoring ${cli.handle.mainBranch}.`);
    },
    onRepeat: () => {
      console.error("Rollback in progress; waiting for it to finish.");
    },
  });

  let result: SyncResult;
  try {
    const context = buildRunContext({
      handle: cli.handle,
      config: cli.config,
      options: buildSyncOptions(flags, runId, abortHandler.signal),
    });
    result = await runSync(context);
  } finally {
    abortHandler.dispose();
  }

  if (flags.json) {
    printJson({ ...result.run, report_path: result.reportPath, exit_code: result.exitCode });
  } else {
    printLines(formatRunLines(result.run, stdoutFormatter()));
    if (result.reportPath) console.log(`Report: ${result.reportPath}`);
    if (result.error !== undefined) printError(result.error, opts);
  }

  process.exitCode = result.exitCode;
}

export function buildSyncOptions(
  flags: Pick<SyncFlags, "allowDrift" | "promote">,
  runId: string,
  signal?: AbortSignal,
): Partial<SyncOptions> {
  const options: Partial<SyncOptions> = { runId, allowDrift: flags.allowDrift };
  if (signal) options.signal = signal;
  // --no-promote only ever narrows; the config decides otherwise.
  if (!flags.promote) options.promote = false;
  return options;
}

async function checkOnlyCommand(cli: CliContext, flags: SyncFlags): Promise<void> {
  const context = buildRunContext({ handle: cli.handle, config: cli.config });
  const result = await checkUpstream(context);

  if (flags.json) {
    printJson({ divergence: result.divergence, drift: result.drift, exit_code: result.exitCode });
  } else {
    printLines(formatDivergenceLines(result.divergence));
    if (result.drift) printLines(formatDriftLines(result.drift, stdoutFormatter()));
  }

  process.exitCode = result.exitCode;
}
