import { analyzeOnly } from "../app/orchestrator/run-engine.js";
import { buildRunContext } from "../app/orchestrator/run-context.js";

import type { CliContext } from "./config.js";
import { formatDivergenceLines, printJson, printLines } from "./output.js";

export async function analyzeCommand(cli: CliContext, opts: { json: boolean }): Promise<void> {
  const context = buildRunContext({ handle: cli.handle, config: cli.config });
  const report = await analyzeOnly(context);

  if (opts.json) {
    printJson(report);
    return;
  }
  printLines(formatDivergenceLines(report));
}
