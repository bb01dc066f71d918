import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { LoggingConfig } from '../config/types.js';

// Default config first; initializeLogger() applies the loaded configuration
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Initialize logger with configuration from ConfigManager
 * Must be called after ConfigManager is fully initialized
 */
export function initializeLogger(config: LoggingConfig): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;
  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/scan-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-scan.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when a logger has no transports at all
  if (!config.file.enabled && !config.console.enabled) {
    logger.silent = true;
  }

  isInitialized = true;
  logger.debug('Logger initialized with configuration');
}
