/**
 * News window checks against a scheduled economic calendar.
 */

import type { NewsEvent } from '@xau-signal/contracts';
import type { NewsWindowHit, NewsWindowOptions } from './types.js';

const MINUTE_MS = 60 * 1000;

/**
 * Events of a counted impact whose release time lies within
 * `bufferMinutes` of `at` on either side, nearest first.
 *
 * Events with unparseable timestamps are ignored.
 *
 * @example
 * ```typescript
 * const hits = findNewsInWindow(calendar, new Date('2025-03-07T13:27:00Z'), {
 *   bufferMinutes: 5,
 *   impacts: ['high'],
 * });
 * // [{ event: { title: 'Non-Farm Payrolls', ... }, minutesFromNow: 3 }]
 * ```
 */
export function findNewsInWindow(
  events: readonly NewsEvent[],
  at: Date,
  options: NewsWindowOptions
): NewsWindowHit[] {
  const now = at.getTime();
  const bufferMs = options.bufferMinutes * MINUTE_MS;
  const hits: NewsWindowHit[] = [];

  for (const event of events) {
    if (!options.impacts.includes(event.impact)) {
      continue;
    }

    const releaseAt = Date.parse(event.timestamp);
    if (Number.isNaN(releaseAt)) {
      continue;
    }

    const deltaMs = releaseAt - now;
    if (Math.abs(deltaMs) <= bufferMs) {
      hits.push({ event, minutesFromNow: deltaMs / MINUTE_MS });
    }
  }

  return hits.sort((a, b) => Math.abs(a.minutesFromNow) - Math.abs(b.minutesFromNow));
}

