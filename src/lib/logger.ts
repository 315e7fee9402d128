/**
 * Levelled console logger.
 *
 * Configuration:
 * - LOG_LEVEL: "debug" | "info" | "warn" | "error" | "silent" (default "info")
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

/** Where log lines go. `console` satisfies it. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, err?: unknown, context?: LogContext): void;
  /** Same level and sink, nested scope */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
}

const LEVEL_WEIGHT: Record<Exclude<LogLevel, "silent">, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const REDACTED_KEYS = new Set([
  "apiKey",
  "authorization",
  "token",
  "accessToken",
  "password",
]);

const APP_PREFIX = "perfume-insights";

export function normalizeLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== "string") return undefined;
  const v = value.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") {
    return v;
  }
  return undefined;
}

function redact(context?: LogContext): LogContext | undefined {
  if (!context) return undefined;
  const out: LogContext = {};
  for (const [k, v] of Object.entries(context)) {
    out[k] = REDACTED_KEYS.has(k) ? "[REDACTED]" : v;
  }
  return out;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? console;
  const scope = options.scope;
  const prefix = scope ? `[${APP_PREFIX}:${scope}]` : `[${APP_PREFIX}]`;

  const enabled = (l: Exclude<LogLevel, "silent">): boolean =>
    level !== "silent" && LEVEL_WEIGHT[l] >= LEVEL_WEIGHT[level];

  return {
    level,
    debug(message, context) {
      if (enabled("debug")) sink.debug(prefix, message, redact(context) ?? "");
    },
    info(message, context) {
      if (enabled("info")) sink.info(prefix, message, redact(context) ?? "");
    },
    warn(message, context) {
      if (enabled("warn")) sink.warn(prefix, message, redact(context) ?? "");
    },
    error(message, err, context) {
      if (!enabled("error")) return;
      const safe = redact(context);
      if (err instanceof Error) {
        sink.error(prefix, message, {
          ...safe,
          name: err.name,
          message: err.message,
          stack: err.stack,
        });
        return;
      }
      sink.error(prefix, message, { ...safe, err });
    },
    child(childScope) {
      return createLogger({
        level,
        sink,
        scope: scope ? `${scope}:${childScope}` : childScope,
      });
    },
  };
}

/** Process-wide default, levelled by LOG_LEVEL */
export const logger: Logger = createLogger({
  level: normalizeLevel(process.env.LOG_LEVEL) ?? "info",
});
