import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "../../core/errors.js";
import { runReportPath, runsDir, type PathsContext } from "../../core/paths.js";
import { readJsonFile, writeJsonFile } from "../../core/utils.js";

import { WorkflowRunSchema, type WorkflowRun } from "./workflow-state.js";

// Persists one JSON report per run under <git-dir>/fork-sync/runs.
export class RunStore {
  constructor(private readonly ctx: PathsContext) {}

  async save(run: WorkflowRun): Promise<string> {
    const filePath = runReportPath(this.ctx, run.run_id);
    await writeJsonFile(filePath, run);
    return filePath;
  }

  async load(runId: string): Promise<WorkflowRun | null> {
    const filePath = runReportPath(this.ctx, runId);
    if (!fs.existsSync(filePath)) return null;

    const parsed = WorkflowRunSchema.safeParse(await readJsonFile(filePath));
    if (!parsed.success) {
      throw new ConfigError(`Run report ${filePath} is not a valid fork-sync run.`, parsed.error);
    }
    return parsed.data;
  }

  findLatestRunId(): string | null {
    const dir = runsDir(this.ctx);
    if (!fs.existsSync(dir)) return null;

    // Run ids start with a UTC timestamp, so lexical order is chronological.
    const ids = fs
      .readdirSync(dir)
      .filter((name) => name.endsWith(".json"))
      .map((name) => path.basename(name, ".json"))
      .sort();
    return ids.at(-1) ?? null;
  }
}
