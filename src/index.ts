import { exitCodeForError } from "./app/orchestrator/report.js";
import { buildCli, isDebugRequested } from "./cli/index.js";
import { printError } from "./cli/output.js";

export { buildCli } from "./cli/index.js";
export { buildRunContext, createDefaultPorts } from "./app/orchestrator/run-context.js";
export { abortRun, analyzeOnly, checkUpstream, runSync } from "./app/orchestrator/run-engine.js";
export { EXIT_CODES, exitCodeForRun } from "./app/orchestrator/report.js";
export { parseProjectConfig, loadProjectConfig } from "./core/config-loader.js";

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    printError(err, { debug: isDebugRequested(argv) });
    process.exitCode = exitCodeForError(err);
  }
}
