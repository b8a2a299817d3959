import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "./errors.js";

const REPO_CONFIG_DIR = ".fork-sync";
const REPO_CONFIG_FILE = "config.yaml";

export type ConfigSource = "explicit" | "repo";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  repoRoot: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveProjectConfigPath(args: {
  repoRoot: string;
  explicitPath?: string;
}): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  return { configPath: repoConfigPath(args.repoRoot), source: "repo" };
}

export function initRepoConfig(args: { cwd: string; force?: boolean }): InitResult {
  const repoRoot = findRepoRoot(args.cwd);
  if (!repoRoot) {
    throw new ConfigError(`No git repository found at ${path.resolve(args.cwd)} or its parents.`);
  }

  const configPath = repoConfigPath(repoRoot);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { repoRoot, configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  return { repoRoot, configPath, status: hasConfig ? "overwritten" : "created" };
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, REPO_CONFIG_DIR, REPO_CONFIG_FILE);
}

function buildDefaultConfig(): string {
  return [
    "# fork-sync config. Policy entries are evaluated top to bottom; first match wins.",
    "repo:",
    "  main_branch: main",
    "",
    "upstream:",
    "  remote: upstream",
    "  # url: git@example.com:upstream/project.git",
    "  branch: main",
    "",
    "sync:",
    "  branch_prefix: fork-sync",
    "  promote: true",
    "",
    "policy:",
    "  - pattern: README.md",
    "    category: protected",
    "    strategy: FORCE_LOCAL",
    `  - pattern: ${REPO_CONFIG_DIR}/**`,
    "    category: protected",
    "    strategy: FORCE_LOCAL",
    "  # - pattern: app/static/out/**",
    "  #   category: generated",
    "  #   strategy: REGENERATE",
    "  #   artifact:",
    "  #     target: app/static/out",
    "  #     source: ui/dashboard/out",
    '  #     marker: "<!DOCTYPE"',
    '  #     marker_files: "**/*.html"',
    "",
    "drift:",
    "  # Files whose upstream edits block the sync until reviewed.",
    "  gating_paths: []",
    "  # Files that only raise a warning when gating identifiers change.",
    "  watched_paths: []",
    '  include: ["**/*"]',
    "",
  ].join("\n");
}
