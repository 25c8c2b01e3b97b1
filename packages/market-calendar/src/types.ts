/**
 * Type definitions for market-calendar package
 */

import type { NewsEvent, NewsImpact, SessionName } from '@xau-signal/contracts';

/**
 * A trading session expressed in whole UTC hours.
 *
 * A window whose start is after its end wraps past midnight
 * (e.g. 22 → 8 covers 22:00-07:59 UTC).
 */
export interface SessionDefinition {
  name: SessionName;

  /** First hour of the session (0-23, UTC, inclusive) */
  startHourUtc: number;

  /** Hour the session ends (0-23, UTC, exclusive) */
  endHourUtc: number;

  /** Scales the confidence distance from 50 during this session */
  confidenceMultiplier: number;

  /** Lowest-liquidity session flag; never forces WAIT */
  softLock: boolean;
}

/**
 * Options for news window lookups
 */
export interface NewsWindowOptions {
  /** Minutes on either side of a release during which trading is unsafe */
  bufferMinutes: number;

  /** Impact levels that count */
  impacts: readonly NewsImpact[];
}

/**
 * A news event that falls inside the window, with its signed distance
 */
export interface NewsWindowHit {
  event: NewsEvent;

  /** Event time minus evaluation time, in minutes (negative = already released) */
  minutesFromNow: number;
}
