/**
 * @fileoverview Hard safety lock.
 *
 * Recomputed from scratch every cycle. Any trigger turns it ON; the reported
 * reason is the highest-priority trigger that fired.
 *
 * @module @xau-signal/signal-engine/lock/safety-lock
 */

import type { LockReason, LockState, NewsEvent, Reading } from '@xau-signal/contracts';
import { findNewsInWindow, type NewsWindowOptions } from '@xau-signal/market-calendar';
import type { VolatilityShock } from './volatility.js';

type Trigger = Exclude<LockReason, 'none'>;

const TRIGGER_PRIORITY: readonly Trigger[] = ['data-unavailable', 'news-window', 'volatility-shock'];

export interface LockInputs {
  evaluatedAt: Date;
  /** Absent calendar leaves the news trigger inactive */
  calendar?: readonly NewsEvent[];
  volatility: Reading<VolatilityShock>;
  /** Set when inputs could not be used at all */
  dataUnavailable?: string;
}

export const LOCK_OFF: LockState = Object.freeze({
  state: 'OFF',
  reason: 'none',
  triggers: Object.freeze([]),
});

/**
 * @example
 * ```typescript
 * const lock = evaluateLock(
 *   { evaluatedAt, calendar: snapshot.calendar, volatility },
 *   { bufferMinutes: 5, impacts: ['high'] }
 * );
 * // { state: 'ON', reason: 'news-window', triggers: ['news-window'], detail: 'Non-Farm Payrolls in 3 min' }
 * ```
 */
export function evaluateLock(inputs: LockInputs, news: NewsWindowOptions): LockState {
  const details = new Map<Trigger, string>();

  if (inputs.dataUnavailable !== undefined) {
    details.set('data-unavailable', inputs.dataUnavailable);
  }

  if (inputs.calendar) {
    const [nearest] = findNewsInWindow(inputs.calendar, inputs.evaluatedAt, news);
    if (nearest) {
      details.set('news-window', describeNews(nearest.event, nearest.minutesFromNow));
    }
  }

  if (inputs.volatility.determined && inputs.volatility.value.shocked) {
    details.set(
      'volatility-shock',
      `volatility proxy deviation ${inputs.volatility.value.deviation.toFixed(4)}`
    );
  }

  const triggers = TRIGGER_PRIORITY.filter((trigger) => details.has(trigger));
  const [reason] = triggers;
  if (!reason) {
    return LOCK_OFF;
  }

  return Object.freeze({
    state: 'ON',
    reason,
    triggers: Object.freeze(triggers),
    detail: details.get(reason),
  });
}

function describeNews(event: NewsEvent, minutesFromNow: number): string {
  const title = event.title ?? `${event.impact}-impact release`;
  const minutes = Math.round(Math.abs(minutesFromNow));
  return minutesFromNow >= 0 ? `${title} in ${minutes} min` : `${title} ${minutes} min ago`;
}
