/*
Purpose: core error types used across the sync workflow and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new FetchError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class ForkSyncError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ForkSyncError";
  }
}

export class ConfigError extends ForkSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends ForkSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class FetchError extends GitError {
  constructor(
    message: string,
    public readonly remote: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "FetchError";
  }
}

export class DirtyTreeError extends GitError {
  constructor(
    message: string,
    public readonly dirtyPaths: string[] = [],
  ) {
    super(message);
    this.name = "DirtyTreeError";
  }
}

export class BusyError extends ForkSyncError {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly holder?: string,
  ) {
    super(message);
    this.name = "BusyError";
  }
}

export class RegenerationValidationError extends ForkSyncError {
  constructor(
    message: string,
    public readonly target: string,
    public readonly violations: string[] = [],
  ) {
    super(message);
    this.name = "RegenerationValidationError";
  }
}

export class InvalidTransitionError extends ForkSyncError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Illegal workflow transition ${from} -> ${to}.`);
    this.name = "InvalidTransitionError";
  }
}

export class WorkflowAbortedError extends ForkSyncError {
  constructor(
    message: string,
    public readonly reason?: unknown,
  ) {
    super(message, reason);
    this.name = "WorkflowAbortedError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  fetch: "FETCH_ERROR",
  dirtyTree: "DIRTY_TREE",
  busy: "BUSY",
  regeneration: "REGENERATION_INVALID",
  aborted: "ABORTED",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function errorCodeFor(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof FetchError) return USER_FACING_ERROR_CODES.fetch;
  if (error instanceof DirtyTreeError) return USER_FACING_ERROR_CODES.dirtyTree;
  if (error instanceof BusyError) return USER_FACING_ERROR_CODES.busy;
  if (error instanceof RegenerationValidationError) return USER_FACING_ERROR_CODES.regeneration;
  if (error instanceof WorkflowAbortedError) return USER_FACING_ERROR_CODES.aborted;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  return USER_FACING_ERROR_CODES.unknown;
}

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCodeFor(error);

  switch (code) {
    case USER_FACING_ERROR_CODES.fetch:
      return new UserFacingError({
        code,
        title: "Could not fetch upstream.",
        message,
        hint: "Check the upstream remote URL and your network or credentials.",
        next: "Nothing was changed. Re-run `fork-sync sync` once the remote is reachable.",
        cause: error,
      });
    case USER_FACING_ERROR_CODES.dirtyTree:
      return new UserFacingError({
        code,
        title: "Git working tree has uncommitted changes.",
        message,
        hint: "Commit or stash your changes before syncing.",
        cause: error,
      });
    case USER_FACING_ERROR_CODES.busy:
      return new UserFacingError({
        code,
        title: "Another sync is already running.",
        message,
        hint:
          error instanceof BusyError
            ? `Wait for it to finish, or remove ${error.lockPath} if that process is gone.`
            : undefined,
        cause: error,
      });
    case USER_FACING_ERROR_CODES.regeneration:
      return new UserFacingError({
        code,
        title: "Generated artifacts failed validation.",
        message,
        hint: "Rebuild the canonical artifact source, then sync again.",
        next: "The workflow was aborted and the primary branch is unchanged.",
        cause: error,
      });
    case USER_FACING_ERROR_CODES.aborted:
      return new UserFacingError({
        code,
        title: "Sync aborted.",
        message,
        next: "The update branch was discarded; the backup branch is kept.",
        cause: error,
      });
    case USER_FACING_ERROR_CODES.config:
      return new UserFacingError({
        code,
        title: "Invalid fork-sync config.",
        message,
        hint: "Run `fork-sync init` to write a starter config, or fix the reported field.",
        cause: error,
      });
    case USER_FACING_ERROR_CODES.git:
      return new UserFacingError({
        code,
        title: "Git command failed.",
        message,
        hint: "Run with --debug for the underlying git output.",
        cause: error,
      });
    default:
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.unknown,
        title: "Unexpected error",
        message,
        cause: error,
      });
  }
}
