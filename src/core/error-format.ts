/*
Purpose: turn thrown errors into printable lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(true)).
*/

import { toUserFacingError, type UserFacingErrorInput } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty && !process.env.NO_COLOR;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const name = resolveDebugName(error, normalized.cause);
    if (name) lines.push({ kind: "name", text: name });

    const cause = resolveCauseMessage(normalized.cause, normalized.message);
    if (cause) lines.push({ kind: "cause", text: cause });

    const stack = resolveDebugStack(error, normalized.cause);
    if (stack) lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

const LINE_LABELS: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint",
  next: "Next",
  code: "Code",
  name: "Name",
  cause: "Cause",
};

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string[] {
  return lines.map((line) => {
    switch (line.kind) {
      case "title":
        return format(`Error: ${line.text}`, ["bold", "red"]);
      case "message":
        return line.text;
      case "stack":
        return format(line.text, ["dim"]);
      default:
        return `${format(`${LINE_LABELS[line.kind] ?? line.kind}:`, ["cyan"])} ${line.text}`;
    }
  });
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return normalizeOptionalText(error.message) ?? normalizeOptionalText(error.name) ?? "Error";
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeError(error: unknown): UserFacingErrorInput {
  if (error === null || error === undefined) {
    return { code: "UNKNOWN", title: DEFAULT_ERROR_TITLE, message: DEFAULT_ERROR_MESSAGE };
  }

  const userError = toUserFacingError(typeof error === "string" ? new Error(error) : error);
  return {
    code: userError.code,
    title: normalizeOptionalText(userError.title) ?? DEFAULT_ERROR_TITLE,
    message: normalizeOptionalText(userError.message) ?? DEFAULT_ERROR_MESSAGE,
    hint: normalizeOptionalText(userError.hint),
    next: normalizeOptionalText(userError.next),
    cause: userError.cause,
  };
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveDebugName(error: unknown, cause?: unknown): string | undefined {
  if (error instanceof Error) return normalizeOptionalText(error.name);
  if (cause instanceof Error) return normalizeOptionalText(cause.name);
  return undefined;
}

function resolveCauseMessage(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) return undefined;

  const inner = cause instanceof Error && "cause" in cause ? cause.cause : undefined;
  const resolved = normalizeOptionalText(formatErrorMessage(inner ?? cause));
  if (!resolved || resolved === message) return undefined;
  return resolved;
}

function resolveDebugStack(error: unknown, cause?: unknown): string | undefined {
  if (error instanceof Error && error.stack) return error.stack;
  if (cause instanceof Error && cause.stack) return cause.stack;
  return undefined;
}
