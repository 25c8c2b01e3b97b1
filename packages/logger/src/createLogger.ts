/**
 * @fileoverview Logger factory.
 * Creates winston loggers with secret redaction, ISO timestamps, cycle ID
 * injection and console, file or stream transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { buildFormat } from './formats.js';

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Engine started', { version: '0.1.0' });
 * ```
 *
 * @example
 * ```typescript
 * const serviceLogger = logger.child({ component: 'signal-service', symbol: 'XAUUSD' });
 * serviceLogger.info('Cycle complete', { signal: 'BUY', confidence: 72 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    consoleToStderr = false,
    stream,
  } = config;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: consoleToStderr ? [...ALL_LEVELS] : [],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level }));
  }

  // winston warns when a logger writes with no transport at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: buildFormat(json),
    transports,
    // Fatal errors are handled in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always carry `context`.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'provider', provider: 'yahoo' });
 * ```
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
