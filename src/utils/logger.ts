type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minLevel: LogLevel = "info";

/** Drop messages below the given level. Defaults to "info". */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  // stdout belongs to whatever driver consumes the results; logs go to stderr.
  const logger = level === "warn" ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);
export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
