import { initRepoConfig } from "../core/config-discovery.js";

export async function initCommand(opts: { force?: boolean; cwd?: string }): Promise<void> {
  const result = initRepoConfig({ cwd: opts.cwd ?? process.cwd(), force: opts.force });

  if (result.status === "created") {
    console.log(`Created fork-sync config at ${result.configPath}`);
    console.log(`Edit ${result.configPath} to set the upstream remote, policy and gating paths.`);
    return;
  }

  if (result.status === "overwritten") {
    console.log(`Overwrote fork-sync config at ${result.configPath}`);
    console.log(`Review ${result.configPath} for your fork's settings.`);
    return;
  }

  console.log(`Config already exists at ${result.configPath}`);
}
