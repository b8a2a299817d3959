/**
 * Orchestrator ports.
 * Purpose: every side effect the run engine performs goes through one of these.
 * Assumptions: default adapters live in run-context.ts; tests swap in fakes.
 */

import type { RepoLock } from "../../core/lock.js";
import type { EventLogger, JsonObject } from "../../core/logger.js";
import type { ArtifactStore } from "../../sync/artifacts/artifact-store.js";

import type { Vcs } from "./vcs/vcs.js";
import type { WorkflowRun } from "./workflow-state.js";

export type RunRepository = {
  save(run: WorkflowRun): Promise<string>;
  load(runId: string): Promise<WorkflowRun | null>;
  findLatestRunId(): string | null;
};

export type RepoLocker = {
  acquire(runId: string): RepoLock;
};

export type LogSink = {
  createRunLogger(runId: string): EventLogger;
  logOrchestratorEvent(logger: EventLogger, type: string, payload?: JsonObject): void;
};

export type Clock = {
  now(): Date;
};

export type OrchestratorPorts = {
  vcs: Vcs;
  artifacts: ArtifactStore;
  runStore: RunRepository;
  lock: RepoLocker;
  logSink: LogSink;
  clock: Clock;
  newRunId: (now: Date) => string;
};
