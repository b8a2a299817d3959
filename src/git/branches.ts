export function buildBackupBranchName(prefix: string, runId: string): string {
  return `${normalizePrefix(prefix)}/backup/${sanitizeRefComponent(runId)}`;
}

export function buildUpdateBranchName(prefix: string, runId: string): string {
  return `${normalizePrefix(prefix)}/update/${sanitizeRefComponent(runId)}`;
}

// Appends -1, -2, ... until the name is free, so an existing branch is never reused.
export async function resolveUniqueBranchName(
  desiredName: string,
  exists: (name: string) => Promise<boolean>,
): Promise<string> {
  let candidate = desiredName;
  let counter = 1;

  while (await exists(candidate)) {
    candidate = `${desiredName}-${counter}`;
    counter += 1;
  }

  return candidate;
}

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/^\/+|\/+$/g, "");
  return trimmed.length > 0 ? trimmed : "fork-sync";
}

function sanitizeRefComponent(value: string): string {
  const safe = value.replace(/[^A-Za-z0-9_.-]/g, "-").replace(/\.{2,}/g, ".");
  return safe.replace(/^[.-]+/, "") || "run";
}
