/*
Purpose: exclusive per-repository lock so only one sync touches the working tree and refs.
Assumptions: the lock file is created with O_EXCL; a holder whose pid is gone is stale.
Usage: const lock = acquireRepoLock(lockPath(ctx), { runId }); try { ... } finally { lock.release(); }
*/

import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { BusyError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

const LockRecordSchema = z.object({
  pid: z.number().int(),
  run_id: z.string(),
  acquired_at: z.string(),
});

export type LockRecord = z.infer<typeof LockRecordSchema>;

export type RepoLock = {
  path: string;
  record: LockRecord;
  release: () => void;
};

export type AcquireLockOptions = {
  runId: string;
  pid?: number;
  now?: () => Date;
  isProcessAlive?: (pid: number) => boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function acquireRepoLock(filePath: string, options: AcquireLockOptions): RepoLock {
  const record: LockRecord = {
    pid: options.pid ?? process.pid,
    run_id: options.runId,
    acquired_at: (options.now ?? (() => new Date()))().toISOString(),
  };
  const isAlive = options.isProcessAlive ?? isProcessAlive;

  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  if (!tryCreateLock(filePath, record)) {
    const holder = readLockRecord(filePath);
    if (holder && isAlive(holder.pid)) {
      throw new BusyError(
        `Sync run ${holder.run_id} (pid ${holder.pid}) holds the repository lock since ${holder.acquired_at}.`,
        filePath,
        holder.run_id,
      );
    }

    // Stale or unreadable lock: the owner is gone, take it over once.
    fs.rmSync(filePath, { force: true });
    if (!tryCreateLock(filePath, record)) {
      throw new BusyError("Repository lock was taken by another process.", filePath);
    }
  }

  let released = false;
  return {
    path: filePath,
    record,
    release: () => {
      if (released) return;
      released = true;

      const current = readLockRecord(filePath);
      if (current && current.run_id === record.run_id && current.pid === record.pid) {
        fs.rmSync(filePath, { force: true });
      }
    },
  };
}

export function readLockRecord(filePath: string): LockRecord | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch {
    return null;
  }

  try {
    const parsed = LockRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function tryCreateLock(filePath: string, record: LockRecord): boolean {
  let fd: number;
  try {
    fd = fs.openSync(filePath, "wx");
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") return false;
    throw err;
  }

  try {
    fs.writeSync(fd, `${JSON.stringify(record)}\n`);
  } finally {
    fs.closeSync(fd);
  }
  return true;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrnoException(err) && err.code === "EPERM";
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
