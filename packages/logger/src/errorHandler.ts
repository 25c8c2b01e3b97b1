/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Both are logged with their stack and end the process.
 */

import type { Logger } from './types.js';

/** Upper bound on waiting for transports to flush before exiting */
const FLUSH_TIMEOUT_MS = 3000;

export interface GlobalHandlerOptions {
  /** Process exit; replaced in tests */
  exit?: (code: number) => void;
}

let attachedDetach: (() => void) | null = null;

/**
 * Attaches global handlers. Calling it again while attached is a no-op that
 * returns the same detach function.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(
  logger: Logger,
  options: GlobalHandlerOptions = {}
): () => void {
  if (attachedDetach) {
    logger.warn('Global error handlers already attached, skipping');
    return attachedDetach;
  }

  const exit = options.exit ?? ((code: number) => process.exit(code));

  const onUncaughtException = (error: Error): void => {
    logger.error('Uncaught exception, exiting', {
      error: { name: error.name, message: error.message, stack: error.stack },
      event: 'uncaughtException',
      fatal: true,
    });
    flushAndExit(logger, exit, 1);
  };

  const onUnhandledRejection = (reason: unknown): void => {
    const error =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection, exiting', {
      error,
      event: 'unhandledRejection',
      fatal: true,
    });
    flushAndExit(logger, exit, 1);
  };

  const onWarning = (warning: Error): void => {
    logger.warn('Process warning', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  process.on('warning', onWarning);

  const detach = (): void => {
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
    process.off('warning', onWarning);
    attachedDetach = null;
  };
  attachedDetach = detach;

  logger.debug('Global error handlers attached');
  return detach;
}

function flushAndExit(logger: Logger, exit: (code: number) => void, code: number): void {
  const timeoutId = setTimeout(() => exit(code), FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    exit(code);
  });

  logger.end();
}
