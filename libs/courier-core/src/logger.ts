import type { LogLevel, Logger, LoggerMeta } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger with a minimum level.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) console.debug(message, meta ?? {});
  }

  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) console.info(message, meta ?? {});
  }

  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) console.warn(message, meta ?? {});
  }

  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) console.error(message, meta ?? {});
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

export const silentLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};
