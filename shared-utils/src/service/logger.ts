import { Logger, LogLevel } from "./types";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(private serviceName: string, level: LogLevel = "info") {
    this.threshold = LEVELS[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= this.threshold;
  }
}

/**
 * Logger that drops everything; handy for tests and scripts
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
