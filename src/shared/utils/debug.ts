/**
 * Module-scoped logger factory.
 */

import { LogManager, type LogLevel } from '../ui/LogManager.js';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export function formatLogLine(name: string, message: string, data?: LogData): string {
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  return `[${name}] ${message}${suffix}`;
}

/**
 * Create a logger whose lines are prefixed with the module name.
 * Level filtering is delegated to the LogManager singleton at call time.
 */
export function createLogger(name: string): Logger {
  const emit = (level: LogLevel, message: string, data?: LogData): void => {
    const manager = LogManager.getInstance();
    if (!manager.shouldLog(level)) return;
    manager[level](formatLogLine(name, message, data));
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
