/*
Purpose: append structured run events as JSON lines.
Assumptions: one logger per run; writes are synchronous so events survive a crash mid-run.
Usage: const log = new JsonlLogger(runLogPath(ctx, runId), { runId }); logOrchestratorEvent(log, "state.enter", { state }).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEventInput = {
  type: string;
  payload?: JsonObject;
};

export type LogEvent = {
  ts: string;
  type: string;
  run_id?: string;
  payload?: JsonObject;
};

export interface EventLogger {
  readonly filePath: string;
  log(event: LogEventInput): void;
}

export type JsonlLoggerOptions = {
  runId?: string;
  now?: () => Date;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  readonly filePath: string;
  private readonly runId?: string;
  private readonly now: () => Date;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.runId = options.runId;
    this.now = options.now ?? (() => new Date());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEventInput): void {
    const line: LogEvent = { ts: isoNow(this.now()), type: event.type };
    if (this.runId) line.run_id = this.runId;
    if (event.payload) line.payload = event.payload;

    fs.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

export function logOrchestratorEvent(
  logger: EventLogger,
  type: string,
  payload?: JsonObject,
): void {
  logger.log({ type, payload });
}

export function readLogEvents(filePath: string): LogEvent[] {
  if (!fs.existsSync(filePath)) return [];

  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line): LogEvent => JSON.parse(line));
}
