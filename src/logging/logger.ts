/**
 * Logging Infrastructure
 *
 * Provides configurable logging using Winston with support for:
 * - Multiple log levels (error, warn, info, debug)
 * - Colored console output (unless noColor is set)
 * - Optional file logging
 */

import winston from 'winston';
import chalk from 'chalk';
import { getConfig } from '../config/loader';
import type { LoggingConfig } from '../config/schema';

export type LogLevel = LoggingConfig['level'];

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  consoleOutput?: boolean;
  filePath?: string;
}

/**
 * Custom formatter for console output with chalk colors
 */
const consoleFormat = (noColor: boolean) => winston.format.printf(({ level, message, timestamp }) => {
  if (noColor) {
    return `[${timestamp}] ${level.toUpperCase()}: ${message}`;
  }

  const colorMap: Record<string, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.blue,
    debug: chalk.gray,
  };

  const colorFn = colorMap[level] || ((text: string) => text);
  const levelText = colorFn(level.toUpperCase());
  const timeText = chalk.gray(`[${timestamp}]`);

  return `${timeText} ${levelText}: ${message}`;
});

/**
 * Plain line format for file output
 */
const fileFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `[${timestamp}] ${level.toUpperCase()}: ${message}`;
});

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const {
    level = 'info',
    noColor = false,
    consoleOutput = true,
    filePath,
  } = options;

  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [];
  if (consoleOutput) {
    transports.push(new winston.transports.Console({ format: consoleFormat(noColor) }));
  }
  if (filePath) {
    transports.push(new winston.transports.File({ filename: filePath, format: fileFormat }));
  }
  if (transports.length === 0) {
    // winston complains about a logger without transports
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.errors({ stack: true }),
    ),
    transports,
  });
}

let globalLogger: winston.Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions = {}): winston.Logger {
  globalLogger = createLogger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 * Creates one from the loaded logging configuration if not initialized
 */
export function getLogger(): winston.Logger {
  if (!globalLogger) {
    globalLogger = createLogger(getConfig().logging);
  }
  return globalLogger;
}
