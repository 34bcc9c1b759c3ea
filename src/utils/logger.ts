import pino from "pino";
import { loadConfig } from "./config";

export type { LogLevel } from "./config";

type LogContext = Record<string, unknown>;

/**
 * Create the base logger instance. Logs go to stderr so that stdout only
 * carries command output.
 */
function createBaseLogger(): pino.Logger {
  const config = loadConfig();
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: {
      pid: process.pid,
    },
  };

  if (config.logPretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          singleLine: false,
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

const baseLogger = createBaseLogger();

/**
 * Logger interface that provides structured logging with context
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, contextOrError?: LogContext | Error | unknown, error?: Error | unknown): void;
  error(message: string, contextOrError?: LogContext | Error | unknown, error?: Error | unknown): void;
  fatal(message: string, contextOrError?: LogContext | Error | unknown, error?: Error | unknown): void;

  // Child loggers with context
  child(bindings: LogContext): Logger;
}

function isContext(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Merge an optional context object and an optional error into one pino object.
 * An Error passed in the context position is logged as `err`.
 */
function mergeError(contextOrError: unknown, error: unknown): LogContext {
  if (contextOrError instanceof Error) {
    return { err: contextOrError };
  }
  const context = isContext(contextOrError) ? contextOrError : {};
  if (error instanceof Error) {
    return { ...context, err: error };
  }
  if (error !== undefined) {
    return { ...context, error };
  }
  if (contextOrError !== undefined && !isContext(contextOrError)) {
    return { error: contextOrError };
  }
  return context;
}

/**
 * Create a logger instance
 */
function createLogger(context?: LogContext): Logger {
  const logger = context ? baseLogger.child(context) : baseLogger;

  return {
    trace: (message, ctx) => logger.trace(ctx ?? {}, message),
    debug: (message, ctx) => logger.debug(ctx ?? {}, message),
    info: (message, ctx) => logger.info(ctx ?? {}, message),
    warn: (message, contextOrError, error) => logger.warn(mergeError(contextOrError, error), message),
    error: (message, contextOrError, error) => logger.error(mergeError(contextOrError, error), message),
    fatal: (message, contextOrError, error) => logger.fatal(mergeError(contextOrError, error), message),
    child: (bindings) => createLogger({ ...context, ...bindings }),
  };
}

/**
 * Default logger instance (use this for most cases)
 */
export const logger = createLogger();

/**
 * Create a logger with context (e.g., for a specific command or component)
 */
export function createContextLogger(context: LogContext): Logger {
  return createLogger(context);
}
