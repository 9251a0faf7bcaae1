/**
 * Console-backed loggers for instrumented code
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  readonly name: string;
  debug(message: string, error?: unknown): void;
  info(message: string, error?: unknown): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

class ConsoleLogger implements Logger {
  constructor(readonly name: string) {}

  debug(message: string, error?: unknown): void {
    this.log("debug", message, error);
  }

  info(message: string, error?: unknown): void {
    this.log("info", message, error);
  }

  warn(message: string, error?: unknown): void {
    this.log("warn", message, error);
  }

  error(message: string, error?: unknown): void {
    this.log("error", message, error);
  }

  private log(level: LogLevel, message: string, error: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[LoggerFactory.getLevel()]) return;

    const line = `[${this.name}] ${message}`;
    if (error === undefined) {
      console[level](line);
    } else {
      console[level](line, error);
    }
  }
}

/** Hands out one named logger per name; all share a level threshold */
export class LoggerFactory {
  private static readonly loggers = new Map<string, Logger>();
  private static level: LogLevel = "info";

  private constructor() {}

  static getLogger(name: string): Logger {
    let logger = LoggerFactory.loggers.get(name);
    if (!logger) {
      logger = new ConsoleLogger(name);
      LoggerFactory.loggers.set(name, logger);
    }
    return logger;
  }

  static setLevel(level: LogLevel): void {
    LoggerFactory.level = level;
  }

  static getLevel(): LogLevel {
    return LoggerFactory.level;
  }
}
