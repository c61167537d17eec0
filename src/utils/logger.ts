/**
 * Structured logging. Events are emitted as one JSON object per line on
 * stderr, so a host that owns stdout is left alone.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** A record of logging functions, one per level. */
export interface Logger {
  readonly debug: (event: string, details?: Readonly<Record<string, unknown>>) => void;
  readonly info: (event: string, details?: Readonly<Record<string, unknown>>) => void;
  readonly warn: (event: string, details?: Readonly<Record<string, unknown>>) => void;
  readonly error: (event: string, details?: Readonly<Record<string, unknown>>) => void;
}

/** Options for {@link createConsoleLogger}. */
export interface ConsoleLoggerOptions {
  /** Minimum level written. Default: `"info"`. */
  readonly level?: LogLevel | undefined;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Creates a logger writing `{ ts, level, event, ...details }` lines
 * through `console.error`.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.debug("ddb.getItem", { table: "people" });
 * // {"ts":"2024-01-01T00:00:00.000Z","level":"debug","event":"ddb.getItem","table":"people"}
 * ```
 */
export const createConsoleLogger = (options?: ConsoleLoggerOptions): Logger => {
  const minIndex = LEVELS.indexOf(options?.level ?? "info");

  const log =
    (level: LogLevel) =>
    (event: string, details?: Readonly<Record<string, unknown>>): void => {
      if (LEVELS.indexOf(level) < minIndex) return;
      console.error(
        JSON.stringify({ ts: new Date().toISOString(), level, event, ...details }),
      );
    };

  return Object.freeze({
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  });
};

const noop = (): void => {};

/** A logger that drops every event. The client default. */
export const silentLogger: Logger = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});
