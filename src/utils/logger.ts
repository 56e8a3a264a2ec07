/***
 * Logger - Structured console logging with a level filter.
 *
 * Components take a Logger through their options so callers (and tests)
 * can route diagnostics elsewhere. The default writes to the console,
 * prefixed with a scope, and drops anything below the configured level.
 *
 ***/

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LEVEL: LogLevel = "warn";

export function is_log_level(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_ORDER;
}

/** Resolve the level from LOG_LEVEL, falling back to "warn". */
export function level_from_env(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const raw = env.LOG_LEVEL?.toLowerCase();
  return is_log_level(raw) ? raw : DEFAULT_LEVEL;
}

export function format_log_line(
  scope: string,
  level: LogLevel,
  message: string,
  context?: LogContext,
): string {
  const head = `[${scope}] ${level.toUpperCase()} ${message}`;
  if (context === undefined || Object.keys(context).length === 0) return head;
  return `${head} ${JSON.stringify(context)}`;
}

export function create_console_logger(
  scope: string,
  level: LogLevel = level_from_env(),
): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (
    at: Exclude<LogLevel, "silent">,
    message: string,
    context?: LogContext,
  ): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = format_log_line(scope, at, message, context);
    switch (at) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}

export const console_logger: Logger = create_console_logger("atomstore");
