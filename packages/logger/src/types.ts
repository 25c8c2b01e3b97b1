/**
 * @fileoverview Type definitions for the logger package.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 * - 'error': failures that need attention
 * - 'warn': degraded cycles (fetch timeouts, excluded factors)
 * - 'info': one line per evaluation cycle
 * - 'debug': factor-level detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/signal.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of the pretty console format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also append to this file */
  filePath?: string;

  /**
   * Console output.
   * @default true
   */
  console?: boolean;

  /** Write console output to stderr so stdout stays machine-readable */
  consoleToStderr?: boolean;

  /** Extra destination stream (a pipe, a socket, or a capture buffer) */
  stream?: NodeJS.WritableStream;
}

/**
 * Fields the engine's callers attach to cycle logs.
 * Additional fields pass through untouched.
 */
export interface CycleLogFields {
  /** Instrument (e.g. "XAUUSD") */
  symbol?: string;

  /** Evaluation cycle correlation ID */
  cycle_id?: string;

  /** Component name, usually set on a child logger */
  component?: string;

  /** Data provider name ("yahoo", "fixture") */
  provider?: string;

  operation?: string;

  signal?: string;

  confidence?: number;

  lock_reason?: string;

  duration_ms?: number;

  /** "success", "degraded" or "error" */
  result?: string;

  error_code?: string;

  cache?: 'hit' | 'miss' | 'shared';

  [key: string]: unknown;
}

export type Logger = WinstonLogger;
