/**
 * Logging Utility
 *
 * Centralized logging using Winston for structured, level-based logging.
 */

import winston from 'winston';
import path from 'path';
import { config } from '../config';
import { LOG_COLORS, LOG_LEVELS } from './constants';

// Define log level type
export type LogLevel = keyof typeof LOG_LEVELS;

// Tell winston that you want to link the colors
winston.addColors(LOG_COLORS);

// Define the format of the log
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

// Define console format with colors
const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

const isSilent = config.logging.level === 'silent';

// Create the logger instance
const logger = winston.createLogger({
  level: isSilent ? 'error' : config.logging.level,
  levels: LOG_LEVELS,
  silent: isSilent,
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
  exitOnError: false
});

// Add file transports if enabled
if (config.logging.enableFileLogging) {
  const logDir = config.logging.logDir;

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'all.log'),
    })
  );
}

/**
 * Helper method to log with context
 */
function logWithContext(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
  logger.log(level, message, meta);
}

export interface LoggerInterface {
  debug: (message: string, ...meta: unknown[]) => void;
  info: (message: string, ...meta: unknown[]) => void;
  warn: (message: string, ...meta: unknown[]) => void;
  error: (message: string, ...meta: unknown[]) => void;
  debugWithContext: (message: string, meta?: Record<string, unknown>) => void;
  infoWithContext: (message: string, meta?: Record<string, unknown>) => void;
  warnWithContext: (message: string, meta?: Record<string, unknown>) => void;
  errorWithContext: (message: string, meta?: Record<string, unknown>) => void;
  logger: winston.Logger;
}

const loggerExport: LoggerInterface = {
  debug: (message, ...meta) => logger.log('debug', message, ...meta),
  info: (message, ...meta) => logger.log('info', message, ...meta),
  warn: (message, ...meta) => logger.log('warn', message, ...meta),
  error: (message, ...meta) => logger.log('error', message, ...meta),

  // Context-aware methods
  debugWithContext: (message, meta) => logWithContext('debug', message, meta),
  infoWithContext: (message, meta) => logWithContext('info', message, meta),
  warnWithContext: (message, meta) => logWithContext('warn', message, meta),
  errorWithContext: (message, meta) => logWithContext('error', message, meta),

  // Raw logger instance (for advanced usage)
  logger
};

export default loggerExport;
