/**
 * Logger Configuration
 * Wrapper around console for simple logging
 */

import { config, type LogLevel } from '../config/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function stringify(data: object): string {
  try {
    return JSON.stringify(data, (_key, value: unknown) =>
      value instanceof Error ? serializeError(value) : value,
    );
  } catch {
    // Circular or BigInt data
    return String(data);
  }
}

function serializeError(error: Error): Record<string, unknown> {
  return {
    message: error.message,
    stack: error.stack,
    ...error,
  };
}

export function formatMessage(module: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let dataStr = '';

  if (data !== undefined) {
    if (data instanceof Error) {
      dataStr = ` ${stringify(serializeError(data))}`;
    } else if (typeof data === 'object' && data !== null) {
      // Nested Error objects have no enumerable fields of their own
      dataStr = ` ${stringify(data)}`;
    } else {
      dataStr = ` ${String(data)}`;
    }
  }

  return `[${timestamp}] [${module}] ${message}${dataStr}`;
}

export class Logger {
  private readonly module: string;
  private readonly threshold: number;

  constructor(module: string = 'app', private readonly level: LogLevel = config.logging.level) {
    this.module = module;
    this.threshold = LOG_LEVELS[level];
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.threshold;
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      console.debug(formatMessage(this.module, message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      console.info(formatMessage(this.module, message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      console.warn(formatMessage(this.module, message, data));
    }
  }

  error(message: string, data?: unknown) {
    if (this.shouldLog('error')) {
      console.error(formatMessage(this.module, message, data));
    }
  }

  child({ module }: { module: string }): Logger {
    return new Logger(module, this.level);
  }
}

export const logger = new Logger();

// Create child loggers for different modules
export const createLogger = (module: string, level?: LogLevel) => new Logger(module, level);
