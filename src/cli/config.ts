import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { findRepoRoot, resolveProjectConfigPath } from "../core/config-discovery.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { ConfigError } from "../core/errors.js";
import { resolveGitDir } from "../git/git.js";
import { buildRepositoryHandle, type RepositoryHandle } from "../sync/types.js";

export type CliContext = {
  repoRoot: string;
  config: ProjectConfig;
  configPath: string;
  handle: RepositoryHandle;
};

export async function loadConfigForCli(args: {
  repo?: string;
  explicitConfigPath?: string;
  upstreamTag?: string;
  cwd?: string;
}): Promise<CliContext> {
  const start = path.resolve(args.cwd ?? process.cwd(), args.repo ?? ".");
  const repoRoot = findRepoRoot(start);
  if (!repoRoot) {
    throw new ConfigError(`No git repository found at ${start} or its parents. Pass --repo <path>.`);
  }

  const resolved = resolveProjectConfigPath({ repoRoot, explicitPath: args.explicitConfigPath });
  const config = loadProjectConfig(resolved.configPath);
  const gitDir = await resolveGitDir(repoRoot);

  const handle = buildRepositoryHandle({
    repoPath: repoRoot,
    gitDir,
    mainBranch: config.repo.main_branch,
    remote: config.upstream.remote,
    remoteUrl: config.upstream.url,
    upstreamBranch: config.upstream.branch,
    upstreamTag: args.upstreamTag,
  });

  return { repoRoot, config, configPath: resolved.configPath, handle };
}
