/**
 * Environment-driven settings, read once and passed on as plain values.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export interface AppConfig {
  /**
   * Stop option scanning at the first positional argument.
   */
  posixlyCorrect: boolean;
  logLevel: LogLevel;
  logPretty: boolean;
}

export type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from LOG_LEVEL or default to 'info'
 */
export function getLogLevel(env: Env = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

/**
 * Pretty printing unless LOG_PRETTY says otherwise; off by default in production.
 */
export function shouldUsePretty(env: Env = process.env): boolean {
  if (env.LOG_PRETTY === "false") {
    return false;
  }
  if (env.LOG_PRETTY === "true") {
    return true;
  }
  return env.NODE_ENV !== "production";
}

/**
 * POSIXLY_CORRECT is honoured when set to anything, including an empty string.
 */
export function isPosixlyCorrect(env: Env = process.env): boolean {
  return env.POSIXLY_CORRECT !== undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    posixlyCorrect: isPosixlyCorrect(env),
    logLevel: getLogLevel(env),
    logPretty: shouldUsePretty(env),
  };
}
