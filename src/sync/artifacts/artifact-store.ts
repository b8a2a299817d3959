import path from "node:path";

import fse from "fs-extra";

import { toPosixPath } from "../../core/utils.js";

// Filesystem surface the regenerator needs; swapped for temp-dir or in-memory stores in tests.
export interface ArtifactStore {
  exists(absPath: string): Promise<boolean>;
  listFiles(absDir: string): Promise<string[]>;
  readText(absPath: string): Promise<string>;
  remove(absPath: string): Promise<void>;
  copyDir(fromDir: string, toDir: string): Promise<void>;
}

export function createFsArtifactStore(): ArtifactStore {
  return {
    exists: (absPath) => fse.pathExists(absPath),
    listFiles: (absDir) => walkFiles(absDir),
    readText: (absPath) => fse.readFile(absPath, "utf8"),
    remove: (absPath) => fse.remove(absPath),
    copyDir: async (fromDir, toDir) => {
      await fse.ensureDir(path.dirname(toDir));
      await fse.copy(fromDir, toDir, { overwrite: true, errorOnExist: false });
    },
  };
}

async function walkFiles(root: string): Promise<string[]> {
  const files: string[] = [];

  const visit = async (dir: string): Promise<void> => {
    const entries = await fse.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(abs);
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        files.push(toPosixPath(path.relative(root, abs)));
      }
    }
  };

  await visit(root);
  return files.sort();
}
