/**
 * @fileoverview Error taxonomy for the signal engine.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data. All errors extend SignalEngineError and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * Market-data errors (misaligned, unavailable) are recovered inside the
 * engine and never reach the consumer; ConfigurationError is fatal
 * at startup.
 *
 * @module @xau-signal/contracts/errors
 */

/**
 * Base error class for all engine errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new SignalEngineError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SignalEngineError extends Error {
  /** Machine-readable error code (e.g. 'DATA_UNAVAILABLE') */
  readonly code: string;

  /** Structured error data for debugging */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'SignalEngineError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Macro series timestamps cannot be aligned to the instrument's bars, or a
 * series breaks the strictly-increasing timestamp invariant.
 */
export class MisalignedSeriesError extends SignalEngineError {
  constructor(message: string, data: { series: string; [key: string]: unknown }) {
    super('MISALIGNED_SERIES', message, data);
    this.name = 'MisalignedSeriesError';
  }
}

/**
 * Upstream fetch failed or timed out.
 *
 * @example
 * ```typescript
 * throw new DataUnavailableError('Yahoo chart request timed out', {
 *   provider: 'yahoo',
 *   symbol: 'GC=F',
 *   timeoutMs: 8000
 * });
 * ```
 */
export class DataUnavailableError extends SignalEngineError {
  constructor(message: string, data: { provider: string; [key: string]: unknown }) {
    super('DATA_UNAVAILABLE', message, data);
    this.name = 'DataUnavailableError';
  }
}

/**
 * Invalid configuration (e.g. zero or negative window sizes).
 */
export class ConfigurationError extends SignalEngineError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('INVALID_CONFIGURATION', message, data);
    this.name = 'ConfigurationError';
  }
}

export function isSignalEngineError(error: unknown): error is SignalEngineError {
  return error instanceof SignalEngineError;
}

export function isMisalignedSeriesError(error: unknown): error is MisalignedSeriesError {
  return error instanceof MisalignedSeriesError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
