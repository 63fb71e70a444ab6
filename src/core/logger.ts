/**
 * JSON-lines build logger.
 * Purpose: give every stage boundary one machine-readable line in the staging output.
 * Assumptions: the sink is line-oriented (stdout in production, an array in tests).
 * Usage: const log = new BuildLogger({ level: "debug" }); logBuildEvent(log, "info", "stage.start", { stage });
 */

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type BuildLogEvent = {
  type: string;
  level?: LogLevel;
  payload?: JsonObject;
};

export type LogSink = {
  write(line: string): void;
};

export type BuildLoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
  now?: () => Date;
};

// =============================================================================
// LOGGER
// =============================================================================

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class BuildLogger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(opts: BuildLoggerOptions = {}) {
    this.threshold = LEVEL_RANK[opts.level ?? "info"];
    this.sink = opts.sink ?? { write: (line) => process.stdout.write(line) };
    this.now = opts.now ?? (() => new Date());
  }

  log(event: BuildLogEvent): void {
    const level = event.level ?? "info";
    if (LEVEL_RANK[level] < this.threshold) return;

    const record: JsonObject = { ts: this.now().toISOString(), level, type: event.type };
    if (event.payload) {
      record.payload = event.payload;
    }
    this.sink.write(`${JSON.stringify(record)}\n`);
  }

  debug(type: string, payload?: JsonObject): void {
    this.log({ type, level: "debug", payload });
  }

  info(type: string, payload?: JsonObject): void {
    this.log({ type, level: "info", payload });
  }

  warn(type: string, payload?: JsonObject): void {
    this.log({ type, level: "warn", payload });
  }

  error(type: string, payload?: JsonObject): void {
    this.log({ type, level: "error", payload });
  }
}

export function logBuildEvent(
  logger: BuildLogger,
  level: LogLevel,
  type: string,
  payload?: JsonObject,
): void {
  logger.log({ type, level, payload });
}
