/**
 * @fileoverview Custom winston formats: secret redaction, standard fields,
 * cycle ID injection and the pretty console layout.
 */

import { format, type Logform } from 'winston';
import { getCycleId } from './cycle-context.js';

/**
 * Field names whose values never reach a log line. Case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** winston's own fields, left untouched */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 * Error instances are passed through so their stack survives.
 *
 * @example
 * ```typescript
 * redactValue({ provider: 'yahoo', headers: { authorization: 'Bearer x' } });
 * // { provider: 'yahoo', headers: { authorization: '[REDACTED]' } }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value !== null && typeof value === 'object' && !(value instanceof Error)) {
    const copy: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      copy[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
    }
    return copy;
  }

  return value;
}

/**
 * Redacts sensitive metadata. Must run before any output format.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks and the active cycle ID.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const cycleId = getCycleId();
    if (cycleId && !info['cycle_id']) {
      info['cycle_id'] = cycleId;
    }
    return info;
  })()
);

/**
 * Human-readable console layout.
 *
 * @example
 * ```
 * [2025-03-10T09:00:00.000Z] info: Cycle complete component=signal-service symbol=XAUUSD signal="BUY"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, cycle_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (cycle_id) context.push(`cycle_id=${String(cycle_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);

/**
 * Full format chain. Order matters: redact first, then standard fields, then
 * the output layout.
 */
export function buildFormat(json: boolean): Logform.Format {
  return format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);
}
