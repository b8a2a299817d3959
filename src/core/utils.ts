import crypto from "node:crypto";

import fse from "fs-extra";

export function isoNow(date: Date = new Date()): string {
  return date.toISOString();
}

// Sortable and collision-free: second resolution plus a random suffix.
export function defaultRunId(date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}-${time}-${crypto.randomBytes(3).toString("hex")}`;
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return fse.readJson(filePath);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fse.outputJson(filePath, data, { spaces: 2 });
}

export function toPosixPath(value: string): string {
  return value.replace(/\\/g, "/");
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}
