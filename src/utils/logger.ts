import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';
import { LoggingConfig } from '../config/types.js';

// Create logger with default config first so modules can log at import time
// Configured properly during initializeLogger()
export const logger = winston.createLogger({
  level: 'info',
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
 * Apply logging configuration (level, console, rotated files).
 * Defaults to the ConfigManager singleton's logging section.
 */
export function initializeLogger(
  config: LoggingConfig = ConfigManager.getInstance().getLoggingConfig()
): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;

  // Clear default transports
  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: `${config.file.maxSize}m`,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: `${config.file.maxSize}m`,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-app.json`,
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

  // winston warns when it has nowhere to write
  if (!config.file.enabled && !config.console.enabled) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.debug('Logger initialized with configuration', { level: config.level });
}
