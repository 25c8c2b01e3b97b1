/**
 * Session classification for spot gold.
 *
 * All functions are pure: the evaluation instant is always passed in.
 */

import type { SessionLock, SessionName } from '@xau-signal/contracts';
import type { SessionDefinition } from './types.js';

/**
 * Default session table, in UTC hours.
 *
 * Boundaries are the Gulf desk's local day (UTC+4) shifted to UTC: Asia
 * 02-12 local is 22-08 UTC, London 08-13, the London/New York overlap 13-17,
 * New York 17-19, then the late New York fade until 22. Only Asia damps
 * confidence; every other session scores at x1.
 */
export const DEFAULT_SESSIONS: readonly SessionDefinition[] = [
  { name: 'ASIAN', startHourUtc: 22, endHourUtc: 8, confidenceMultiplier: 0.5, softLock: true },
  { name: 'LONDON', startHourUtc: 8, endHourUtc: 13, confidenceMultiplier: 1, softLock: false },
  { name: 'OVERLAP', startHourUtc: 13, endHourUtc: 17, confidenceMultiplier: 1, softLock: false },
  { name: 'NEW_YORK', startHourUtc: 17, endHourUtc: 19, confidenceMultiplier: 1, softLock: false },
  {
    name: 'LATE_NEW_YORK',
    startHourUtc: 19,
    endHourUtc: 22,
    confidenceMultiplier: 1,
    softLock: false,
  },
];

/**
 * Whether `hour` falls inside a session, handling windows that wrap midnight.
 */
export function sessionContainsHour(session: SessionDefinition, hour: number): boolean {
  const { startHourUtc: start, endHourUtc: end } = session;
  if (start === end) {
    return true;
  }
  return start < end ? hour >= start && hour < end : hour >= start || hour < end;
}

/**
 * Classifies an instant into its trading session.
 *
 * The first matching definition wins. An hour that no definition covers
 * falls back to the first soft-locked session (the table is validated at
 * startup, so this only happens with a hand-built table).
 *
 * @example
 * ```typescript
 * classifySession(new Date('2025-03-10T14:30:00Z'));
 * // { session: 'OVERLAP', softLock: false, confidenceMultiplier: 1 }
 * ```
 */
export function classifySession(
  at: Date,
  sessions: readonly SessionDefinition[] = DEFAULT_SESSIONS
): SessionLock {
  const hour = at.getUTCHours();
  const match =
    sessions.find((session) => sessionContainsHour(session, hour)) ??
    sessions.find((session) => session.softLock) ??
    sessions[0];

  if (!match) {
    return { session: 'ASIAN', softLock: true, confidenceMultiplier: 1 };
  }

  return {
    session: match.name,
    softLock: match.softLock,
    confidenceMultiplier: match.confidenceMultiplier,
  };
}

/**
 * Checks a session table and returns one message per problem: hours outside
 * 0-23, non-positive multipliers, duplicate names, uncovered or doubly
 * covered hours.
 */
export function validateSessionTable(sessions: readonly SessionDefinition[]): string[] {
  const issues: string[] = [];
  const seen = new Set<SessionName>();

  for (const session of sessions) {
    if (seen.has(session.name)) {
      issues.push(`Duplicate session: ${session.name}`);
    }
    seen.add(session.name);

    for (const hour of [session.startHourUtc, session.endHourUtc]) {
      if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
        issues.push(`${session.name}: hour ${hour} must be an integer between 0 and 23`);
      }
    }

    if (!(session.confidenceMultiplier > 0)) {
      issues.push(`${session.name}: confidenceMultiplier must be positive`);
    }
  }

  for (let hour = 0; hour < 24; hour++) {
    const covering = sessions.filter((session) => sessionContainsHour(session, hour));
    if (covering.length === 0) {
      issues.push(`Hour ${hour} UTC is not covered by any session`);
    } else if (covering.length > 1) {
      issues.push(
        `Hour ${hour} UTC is covered by ${covering.map((session) => session.name).join(', ')}`
      );
    }
  }

  return issues;
}
