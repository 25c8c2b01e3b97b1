/**
 * Signal service
 *
 * Runs evaluation cycles for the application shell: fetch a snapshot under a
 * deadline, evaluate it, keep the last report. One computation per symbol is
 * in flight at a time; callers arriving meanwhile get the last completed
 * report, or share the pending one when there is none yet. Failures become
 * degraded WAIT reports, so getSignal() never rejects.
 */

import { DataUnavailableError, isSignalEngineError } from '@xau-signal/contracts';
import type {
  MarketSnapshot,
  NewsEvent,
  SeriesProvider,
  SeriesWindow,
  SignalReport,
} from '@xau-signal/contracts';
import { startTimer, withCycleContext, type Logger } from '@xau-signal/logger';
import type { SignalEngine } from '@xau-signal/signal-engine';

export interface SignalServiceConfig {
  provider: SeriesProvider;
  engine: SignalEngine;
  logger: Logger;
  /** Default symbol for getSignal() */
  symbol: string;
  fast: SeriesWindow;
  slow: SeriesWindow;
  cacheTtlMs: number;
  fetchTimeoutMs: number;
  calendar?: readonly NewsEvent[];
  /** Replaced in tests */
  clock?: () => Date;
}

interface CompletedReport {
  report: SignalReport;
  completedAt: number;
}

export class SignalService {
  private readonly config: SignalServiceConfig;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly inFlight = new Map<string, Promise<SignalReport>>();
  private readonly completed = new Map<string, CompletedReport>();

  constructor(config: SignalServiceConfig) {
    this.config = config;
    this.logger = config.logger.child({ component: 'signal-service' });
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Latest report for `symbol`.
   *
   * @example
   * ```typescript
   * const report = await service.getSignal();
   * if (report.actionable) notify(report);
   * ```
   */
  async getSignal(symbol: string = this.config.symbol): Promise<SignalReport> {
    const last = this.completed.get(symbol);
    if (last && this.clock().getTime() - last.completedAt < this.config.cacheTtlMs) {
      this.logger.debug('Serving cached report', { symbol, cache: 'hit' });
      return last.report;
    }

    const pending = this.inFlight.get(symbol);
    if (pending) {
      this.logger.debug('Evaluation already running', { symbol, cache: last ? 'hit' : 'shared' });
      return last ? last.report : pending;
    }

    const run = this.runCycle(symbol).finally(() => {
      this.inFlight.delete(symbol);
    });
    this.inFlight.set(symbol, run);
    return run;
  }

  /** True while a cycle for `symbol` is running */
  isEvaluating(symbol: string = this.config.symbol): boolean {
    return this.inFlight.has(symbol);
  }

  /** Last completed report, however old */
  lastReport(symbol: string = this.config.symbol): SignalReport | undefined {
    return this.completed.get(symbol)?.report;
  }

  private runCycle(symbol: string): Promise<SignalReport> {
    return withCycleContext(
      async () => {
        const timer = startTimer();
        const asOf = this.clock();
        const { provider } = this.config;
        let report: SignalReport;

        try {
          const snapshot = await this.fetchWithDeadline(symbol, asOf);
          const { calendar } = this.config;
          report = this.config.engine.evaluate(
            calendar && !snapshot.calendar ? { ...snapshot, calendar } : snapshot
          );

          this.logger.info('Signal evaluated', {
            symbol,
            operation: 'evaluate',
            provider: provider.id,
            cache: 'miss',
            signal: report.signal,
            confidence: report.confidence,
            lock_reason: report.lock.reason,
            duration_ms: timer.stop(),
            result: 'success',
          });
        } catch (error) {
          const detail = error instanceof Error ? error.message : String(error);
          report = this.config.engine.degraded(symbol, asOf.toISOString(), detail);

          this.logger.warn('Signal degraded', {
            symbol,
            operation: 'evaluate',
            provider: provider.id,
            cache: 'miss',
            error_code: isSignalEngineError(error) ? error.code : 'UNKNOWN',
            detail,
            duration_ms: timer.stop(),
            result: 'degraded',
          });
        }

        this.completed.set(symbol, { report, completedAt: this.clock().getTime() });
        return report;
      },
      undefined,
      { symbol }
    );
  }

  /**
   * Fetches a snapshot, aborting the provider and rejecting once
   * `fetchTimeoutMs` passes even if the provider ignores the signal.
   */
  private async fetchWithDeadline(symbol: string, asOf: Date): Promise<MarketSnapshot> {
    const { provider, fast, slow, fetchTimeoutMs } = this.config;
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(
          new DataUnavailableError(`${provider.id} fetch timed out after ${fetchTimeoutMs} ms`, {
            provider: provider.id,
            symbol,
            timeoutMs: fetchTimeoutMs,
          })
        );
      }, fetchTimeoutMs);
    });

    try {
      return await Promise.race([
        provider.fetchSnapshot({ symbol, asOf, fast, slow }, controller.signal),
        deadline,
      ]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
