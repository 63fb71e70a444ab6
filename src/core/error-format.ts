/*
Purpose: turn pipeline failures into staging-output lines, with optional ANSI styling.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  CompileFailedError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  toUserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
  maxProblems?: number;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "problem"
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

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

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
  cyan: "\x1b[36m",
};

const LINE_STYLES: Partial<Record<ErrorFormatLineKind, AnsiStyle[]>> = {
  title: ["bold", "red"],
  problem: ["yellow"],
  hint: ["cyan"],
  next: ["cyan"],
  stack: ["dim"],
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
  return (options.useColor ?? true) && isTty;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string {
  return lines
    .map((line) => {
      const prefix = line.kind === "hint" ? "Hint: " : line.kind === "next" ? "Next: " : "";
      return format(`${prefix}${line.text}`, LINE_STYLES[line.kind]);
    })
    .join("\n");
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";
const DEFAULT_MAX_PROBLEMS = 20;

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

  const compileError = findCompileError(error);
  if (compileError) {
    const limit = options.maxProblems ?? DEFAULT_MAX_PROBLEMS;
    for (const problem of compileError.errors.slice(0, limit)) {
      lines.push({ kind: "problem", text: `[${problem.severity}] ${problem.message}` });
    }
  }

  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const root =
      error instanceof UserFacingError && error.cause instanceof Error ? error.cause : error;
    if (root instanceof Error) {
      lines.push({ kind: "name", text: root.name });
    }

    const cause = root instanceof Error ? root.cause : undefined;
    if (cause !== undefined && cause !== null) {
      const causeText = formatErrorMessage(cause);
      if (causeText !== normalized.message) {
        lines.push({ kind: "cause", text: causeText });
      }
    }

    if (root instanceof Error && root.stack) {
      lines.push({ kind: "stack", text: root.stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeError(error: unknown): UserFacingErrorInput {
  const mapped = toUserFacingError(error);

  if (mapped instanceof UserFacingError) {
    return {
      code: mapped.code,
      title: mapped.title.trim() || DEFAULT_ERROR_TITLE,
      message: mapped.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: mapped.hint?.trim() || undefined,
      next: mapped.next?.trim() || undefined,
      cause: mapped.cause,
    };
  }

  const message = error === null || error === undefined ? "" : formatErrorMessage(error).trim();
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message || DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function findCompileError(error: unknown): CompileFailedError | null {
  if (error instanceof CompileFailedError) return error;
  if (error instanceof UserFacingError && error.cause instanceof CompileFailedError) {
    return error.cause;
  }
  return null;
}
