/**
 * Console Logger
 *
 * Level-filtered console output for services. Every line is prefixed so that
 * service diagnostics stand apart from the interactive prompts.
 */

import type { LogLevel } from '../models/config.model';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/** Numeric log level for comparison */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info'
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.debug) {
      this.write(console.debug, message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.info) {
      this.write(console.log, message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.warn) {
      this.write(console.warn, message, context);
    }
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.error) {
      if (error && context) {
        console.error(`[${this.prefix}] ${message}`, error, context);
      } else if (error) {
        console.error(`[${this.prefix}] ${message}`, error);
      } else {
        console.error(`[${this.prefix}] ${message}`);
      }
    }
  }

  private write(
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (context) {
      sink(`[${this.prefix}] ${message}`, context);
    } else {
      sink(`[${this.prefix}] ${message}`);
    }
  }
}

/**
 * Logger that drops everything (tests, quiet tooling)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
