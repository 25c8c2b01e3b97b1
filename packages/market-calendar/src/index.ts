/**
 * @xau-signal/market-calendar
 *
 * Pure functions for trading session classification and news windows.
 * The evaluation instant is always an argument; nothing reads the clock.
 *
 * @example
 * ```typescript
 * import { classifySession, findNewsInWindow } from '@xau-signal/market-calendar';
 *
 * const session = classifySession(new Date('2025-03-10T03:00:00Z'));
 * // { session: 'ASIAN', softLock: true, confidenceMultiplier: 0.5 }
 * ```
 */

export {
  DEFAULT_SESSIONS,
  classifySession,
  sessionContainsHour,
  validateSessionTable,
} from './sessions.js';
export { findNewsInWindow } from './news.js';
export type { SessionDefinition, NewsWindowOptions, NewsWindowHit } from './types.js';
