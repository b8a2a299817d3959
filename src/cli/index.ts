import path from "node:path";

import { Command } from "commander";

import { abortCommand } from "./abort.js";
import { analyzeCommand } from "./analyze.js";
import { loadConfigForCli, type CliContext } from "./config.js";
import { initCommand } from "./init.js";
import { statusCommand } from "./status.js";
import { syncCommand, type SyncFlags } from "./sync.js";

export const CLI_VERSION = "0.1.0";

type GlobalFlags = {
  config?: string;
  repo?: string;
  debug: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("fork-sync")
    .description("Merge upstream changes into a fork without losing its local overrides")
    .version(CLI_VERSION)
    .option("--config <path>", "Config file (default: <repo>/.fork-sync/config.yaml)")
    .option("--repo <path>", "Fork repository (default: current directory)")
    .option("--debug", "Show error codes, causes and stack traces", false)
    .showHelpAfterError();

  program
    .command("sync")
    .description("Back up, fetch, analyze, merge and promote upstream changes")
    .option("--check-only", "Only fetch, analyze divergence and scan for drift", false)
    .option("--allow-drift", "Merge even when critical license drift is detected", false)
    .option("--no-promote", "Keep the merge on the update branch instead of fast-forwarding")
    .option("--json", "Print the run report as JSON", false)
    .option("--ref <tag>", "Sync to an upstream release tag instead of the branch tip")
    .action(async (opts: SyncFlags, command: Command) => {
      const globals = readGlobals(command);
      const cli = await loadCliContext(globals, opts.ref);
      await syncCommand(cli, opts, { debug: globals.debug });
    });

  program
    .command("analyze")
    .description("Fetch upstream and print the divergence report")
    .option("--json", "Print the report as JSON", false)
    .option("--ref <tag>", "Compare against an upstream release tag instead of the branch tip")
    .action(async (opts: { json: boolean; ref?: string }, command: Command) => {
      const cli = await loadCliContext(readGlobals(command), opts.ref);
      await analyzeCommand(cli, { json: opts.json });
    });

  program
    .command("status")
    .description("Show the latest (or a given) sync run report")
    .option("--run-id <id>", "Run ID (default: latest)")
    .option("--json", "Print the report as JSON", false)
    .action(async (opts: { runId?: string; json: boolean }, command: Command) => {
      const cli = await loadCliContext(readGlobals(command));
      await statusCommand(cli, { runId: opts.runId, json: opts.json });
    });

  program
    .command("abort")
    .description("Abandon an unresolved run and restore the primary branch")
    .option("--run-id <id>", "Run ID (default: latest)")
    .action(async (opts: { runId?: string }, command: Command) => {
      const cli = await loadCliContext(readGlobals(command));
      await abortCommand(cli, { runId: opts.runId });
    });

  program
    .command("init")
    .description("Write a starter .fork-sync/config.yaml")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force: boolean }, command: Command) => {
      const globals = readGlobals(command);
      await initCommand({
        force: opts.force,
        cwd: globals.repo ? path.resolve(globals.repo) : undefined,
      });
    });

  return program;
}

// =============================================================================
// HELPERS
// =============================================================================

export function isDebugRequested(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  return argv.includes("--debug") || env.FORK_SYNC_DEBUG === "1";
}

function readGlobals(command: Command): GlobalFlags {
  const flags = command.optsWithGlobals<GlobalFlags>();
  return {
    config: flags.config,
    repo: flags.repo,
    debug: flags.debug || process.env.FORK_SYNC_DEBUG === "1",
  };
}

function loadCliContext(globals: GlobalFlags, upstreamTag?: string): Promise<CliContext> {
  return loadConfigForCli({ repo: globals.repo, explicitConfigPath: globals.config, upstreamTag });
}
