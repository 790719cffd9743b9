// ---------------------------------------------------------------------------
// Tessera SDK – Logger
// ---------------------------------------------------------------------------
// Minimal levelled logger. Consumers may pass their own `Logger`; otherwise
// requests are reported through the console at the configured level.
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Anything with the four level methods can receive SDK logs. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/** Where the console logger writes. Defaults to the global `console`. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Level used when neither config nor `TESSERA_LOG_LEVEL` names one. */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/** Resolve a level name. Unknown names fall back to `info`. */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") return DEFAULT_LOG_LEVEL;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

/** Console-backed logger that drops entries below `level`. */
export function createConsoleLogger(
  level: LogLevel = parseLogLevel(process.env.TESSERA_LOG_LEVEL),
  sink: LogSink = console,
): Logger {
  const minLevel = LEVELS[level];

  const write =
    (entryLevel: Exclude<LogLevel, "silent">) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVELS[entryLevel] < minLevel) return;
      const line = `[tessera] [${entryLevel}] ${message}`;
      if (meta === undefined) {
        sink[entryLevel](line);
      } else {
        sink[entryLevel](line, meta);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
