/**
 * Logging Configuration for the Black-Scholes-Merton Terminal
 *
 * Uses Winston for structured logging. Console output goes to stderr so it
 * never interleaves with a report or JSON written to stdout.
 */

import winston from 'winston';
import { LOGGING } from '../core/constants.js';
import type { PricingSystemError } from '../core/errors.js';

// ============================================================================
// LOG FORMATS
// ============================================================================

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.json()
);

// ============================================================================
// LOGGER INSTANCE
// ============================================================================

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? LOGGING.DEFAULT_LEVEL,
  defaultMeta: { service: 'bsm-terminal' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

// Add file transports in non-test environments
if (process.env['NODE_ENV'] !== 'test') {
  logger.add(
    new winston.transports.File({
      filename: `${LOGGING.LOG_DIR}error.log`,
      level: 'error',
      format: fileFormat,
      maxsize: parseInt(LOGGING.FILE_MAX_SIZE),
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: `${LOGGING.LOG_DIR}combined.log`,
      format: fileFormat,
      maxsize: parseInt(LOGGING.FILE_MAX_SIZE),
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );
}

// ============================================================================
// SPECIALIZED LOGGERS
// ============================================================================

/**
 * Pricing logger - engine and IV solver
 */
export const pricingLogger = logger.child({ component: 'pricing' });

/**
 * CLI logger - commands and input handling
 */
export const cliLogger = logger.child({ component: 'cli' });

// ============================================================================
// LOGGING UTILITIES
// ============================================================================

/**
 * Log a system error with full context
 */
export function logError(error: PricingSystemError): void {
  logger.error(error.message, {
    code: error.code,
    context: error.context,
    stack: error.stack,
  });
}

/**
 * Create a performance timer
 */
export function createTimer(operation: string): () => void {
  const start = performance.now();
  return () => {
    const duration = performance.now() - start;
    logger.debug(`${operation} completed`, { durationMs: duration.toFixed(2) });
  };
}

// ============================================================================
// LOG LEVEL CONTROL
// ============================================================================

/**
 * Set log level at runtime
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  logger.debug(`Log level set to ${level}`);
}

/**
 * Get current log level
 */
export function getLogLevel(): string {
  return logger.level;
}
