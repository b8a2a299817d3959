import { summarizeRun } from "../app/orchestrator/report.js";
import { RunStore } from "../app/orchestrator/run-store.js";

import type { CliContext } from "./config.js";
import { formatRunLines, printJson, printLines, stdoutFormatter } from "./output.js";

export async function statusCommand(
  cli: CliContext,
  opts: { runId?: string; json: boolean },
): Promise<void> {
  const store = new RunStore({ gitDir: cli.handle.gitDir });
  const runId = opts.runId ?? store.findLatestRunId();
  const run = runId ? await store.load(runId) : null;

  if (!run) {
    printRunNotFound(opts.runId);
    return;
  }

  if (opts.json) {
    printJson({ summary: summarizeRun(run), run });
    return;
  }

  printLines(formatRunLines(run, stdoutFormatter()));
  console.log(`Started: ${run.started_at}`);
  console.log(`Finished: ${run.finished_at ?? "(in progress)"}`);
  console.log(`States: ${run.history.map((entry) => entry.state).join(" -> ")}`);
}

function printRunNotFound(requestedRunId?: string): void {
  const notFound = requestedRunId
    ? `Run ${requestedRunId} not found.`
    : "No sync runs recorded for this repository.";

  console.log(notFound);
  console.log("Start a run with: fork-sync sync");
  process.exitCode = 1;
}
