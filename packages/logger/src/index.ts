/**
 * @fileoverview Public API of @xau-signal/logger.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';
export type { GlobalHandlerOptions } from './errorHandler.js';

export { redactValue, isSensitiveKey } from './formats.js';

export {
  generateCycleId,
  getCycleContext,
  getCycleId,
  withCycleContext,
} from './cycle-context.js';
export type { CycleContext } from './cycle-context.js';

export { startTimer } from './perf-timer.js';
export type { PerfTimer } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel, CycleLogFields } from './types.js';
