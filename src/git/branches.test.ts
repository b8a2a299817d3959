import { describe, expect, it } from "vitest";

import { buildBackupBranchName, buildUpdateBranchName, resolveUniqueBranchName } from "./branches.js";

describe("branch names", () => {
  it("namespaces backup and update branches under the prefix", () => {
    expect(buildBackupBranchName("fork-sync", "20240101-000000-abc123")).toBe(
      "fork-sync/backup/20240101-000000-abc123",
    );
    expect(buildUpdateBranchName("/sync/", "20240101-000000-abc123")).toBe(
      "sync/update/20240101-000000-abc123",
    );
  });

  it("sanitizes run ids into valid ref components", () => {
    expect(buildBackupBranchName("fork-sync", "..run id:1")).toBe("fork-sync/backup/run-id-1");
    expect(buildBackupBranchName("  ", "...")).toBe("fork-sync/backup/run");
  });

  it("appends a counter until the name is free", async () => {
    const taken = new Set(["fork-sync/backup/r1", "fork-sync/backup/r1-1"]);

    await expect(
      resolveUniqueBranchName("fork-sync/backup/r1", async (name) => taken.has(name)),
    ).resolves.toBe("fork-sync/backup/r1-2");
    await expect(resolveUniqueBranchName("fork-sync/backup/r2", async () => false)).resolves.toBe(
      "fork-sync/backup/r2",
    );
  });
});
