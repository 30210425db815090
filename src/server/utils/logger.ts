import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config, type AppConfig } from '../config';
import { isEngineError } from '../../shared/engine/errors';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

const SERVICE_NAME = 'fusion-ring';

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  // Engine errors carry their own JSON form; plain errors keep name and stack.
  if (isEngineError(info.error)) {
    info.error = info.error.toJSON();
  } else if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Winston Logger Configuration
// ============================================================================

/**
 * Create a logger for the given config. Console output follows
 * `logging.format`; a JSON file transport is added when `logging.file` is
 * set. Everything is silenced under NODE_ENV=test.
 */
export function createLogger(appConfig: Readonly<AppConfig>): winston.Logger {
  const logger = winston.createLogger({
    level: appConfig.logging.level,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: appConfig.nodeEnv,
    },
    silent: appConfig.isTest,
    transports: [
      new winston.transports.Console({
        format: appConfig.logging.format === 'json' ? jsonFormat : consoleFormat,
      }),
    ],
  });

  const logFile = appConfig.logging.file;
  if (logFile) {
    const logPath = path.resolve(logFile);
    const logDir = path.dirname(logPath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    // File output is always JSON
    logger.add(
      new winston.transports.File({
        filename: logPath,
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return logger;
}

const logger = createLogger(config);

// ============================================================================
// Exports
// ============================================================================

export { logger };
