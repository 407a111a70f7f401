/**
 * Namespaced console logging.
 *
 * Every line is prefixed with `[corral/<namespace>]`. The threshold is read
 * from the config on each call, so `config.set({ log: { level } })` applies
 * to loggers that already exist.
 */

import { config, type LogLevel } from "./config.js";

export type { LogLevel } from "./config.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  readonly namespace: string;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
  isEnabled(level: Exclude<LogLevel, "silent">): boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * The level in force right now: "debug" when debug mode is on, else `log.level`.
 */
export function currentLogLevel(): LogLevel {
  if (config.getBoolean("debug")) return "debug";
  const level = config.getString("log.level");
  return level !== undefined && isLogLevel(level) ? level : "warn";
}

export function createLogger(namespace: string): Logger {
  const prefix = `[corral/${namespace}]`;
  const enabled = (level: Exclude<LogLevel, "silent">): boolean =>
    LEVEL_RANK[currentLogLevel()] >= LEVEL_RANK[level];

  return {
    namespace,
    isEnabled: enabled,
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
  };
}
