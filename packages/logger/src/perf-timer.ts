/**
 * @fileoverview Duration measurement on performance.now().
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, rounded */
  elapsed(): number;

  /** Freezes the timer and returns the final duration; later calls return the same value */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const snapshot = await provider.fetchSnapshot('XAUUSD', signal);
 * logger.debug('Snapshot fetched', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}
