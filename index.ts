#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export { main };

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm installs the bin as a symlink; compare against the resolved file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

// Allow `node dist/index.js` and the `fork-sync` bin
if (isDirectRun()) {
  void main(process.argv);
}
