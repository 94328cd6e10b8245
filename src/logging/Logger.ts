/**
 * sqlweave Logger
 *
 * Thin leveled wrapper over the console. Every line carries the scope of
 * the component that wrote it, e.g. `[sqlweave:relations]`.
 */

import { ormConfig } from "../config/db.config";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class Logger {
  private readonly scope: string;
  private level: LogLevel;

  constructor(scope: string, level: LogLevel = Logger.defaultLevel()) {
    this.scope = scope;
    this.level = level;
  }

  static defaultLevel(): LogLevel {
    const configured = ormConfig.logLevel.toLowerCase();
    return isLogLevel(configured) ? configured : "warn";
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.isEnabled("debug")) console.debug(this.format(message), ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.isEnabled("info")) console.info(this.format(message), ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.isEnabled("warn")) console.warn(this.format(message), ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.isEnabled("error")) console.error(this.format(message), ...details);
  }

  private format(message: string): string {
    return `[sqlweave:${this.scope}] ${message}`;
  }
}

const loggers = new Map<string, Logger>();

/**
 * Get the shared logger for a scope
 */
export function getLogger(scope: string): Logger {
  let logger = loggers.get(scope);
  if (!logger) {
    logger = new Logger(scope);
    loggers.set(scope, logger);
  }
  return logger;
}
