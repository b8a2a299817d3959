import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "fork-sync config missing.",
      message: `No config found at ${resolved}.`,
      hint: "Run `fork-sync init` in the fork to create .fork-sync/config.yaml.",
      cause: new ConfigError(`Config file not found: ${resolved}`),
    });
  }

  return parseProjectConfig(fs.readFileSync(resolved, "utf8"), resolved);
}

export function parseProjectConfig(text: string, source = "<inline>"): ProjectConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Could not parse ${source} as YAML.`, err);
  }

  const parsed = ProjectConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${source}: ${formatZodIssues(parsed.error)}`, parsed.error);
  }

  return parsed.data;
}

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
