import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { BusyError } from "./errors.js";
import { acquireRepoLock, readLockRecord } from "./lock.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeLockPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fork-sync-lock-"));
  tempDirs.push(dir);
  return path.join(dir, "state", "sync.lock");
}

const NOW = () => new Date("2024-01-01T00:00:00.000Z");

describe("acquireRepoLock", () => {
  it("writes the holder record and removes it on release", () => {
    const lockFile = makeLockPath();

    const lock = acquireRepoLock(lockFile, { runId: "r1", pid: 4242, now: NOW });

    expect(readLockRecord(lockFile)).toEqual({
      pid: 4242,
      run_id: "r1",
      acquired_at: "2024-01-01T00:00:00.000Z",
    });

    lock.release();
    lock.release();
    expect(fs.existsSync(lockFile)).toBe(false);
  });

  it("refuses a second holder while the first is alive", () => {
    const lockFile = makeLockPath();
    acquireRepoLock(lockFile, { runId: "r1", pid: 4242, now: NOW });

    let error: unknown;
    try {
      acquireRepoLock(lockFile, { runId: "r2", pid: 4343, isProcessAlive: () => true });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(BusyError);
    expect(error).toMatchObject({
      holder: "r1",
      lockPath: lockFile,
      message: "Sync run r1 (pid 4242) holds the repository lock since 2024-01-01T00:00:00.000Z.",
    });
  });

  it("takes over a lock whose holder is gone", () => {
    const lockFile = makeLockPath();
    acquireRepoLock(lockFile, { runId: "r1", pid: 4242, now: NOW });

    const lock = acquireRepoLock(lockFile, { runId: "r2", pid: 4343, isProcessAlive: () => false });

    expect(lock.record.run_id).toBe("r2");
    expect(readLockRecord(lockFile)?.run_id).toBe("r2");
  });

  it("takes over an unreadable lock file", () => {
    const lockFile = makeLockPath();
    fs.mkdirSync(path.dirname(lockFile), { recursive: true });
    fs.writeFileSync(lockFile, "not json", "utf8");

    const lock = acquireRepoLock(lockFile, { runId: "r2", pid: 4343, isProcessAlive: () => true });

    expect(readLockRecord(lockFile)).toEqual(lock.record);
  });

  it("does not delete a lock another run took over", () => {
    const lockFile = makeLockPath();
    const stale = acquireRepoLock(lockFile, { runId: "r1", pid: 4242 });
    acquireRepoLock(lockFile, { runId: "r2", pid: 4343, isProcessAlive: () => false });

    stale.release();

    expect(readLockRecord(lockFile)?.run_id).toBe("r2");
  });
});
