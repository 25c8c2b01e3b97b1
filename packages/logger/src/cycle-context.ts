/**
 * @fileoverview Evaluation cycle context on AsyncLocalStorage.
 * Every log line written while a cycle runs carries its cycle_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface CycleContext {
  /** Unique cycle identifier (UUID v4) */
  cycle_id: string;

  [key: string]: unknown;
}

const cycleStorage = new AsyncLocalStorage<CycleContext>();

export function generateCycleId(): string {
  return randomUUID();
}

export function getCycleContext(): CycleContext | undefined {
  return cycleStorage.getStore();
}

/**
 * ID of the cycle currently running, or undefined outside one.
 */
export function getCycleId(): string | undefined {
  return cycleStorage.getStore()?.cycle_id;
}

/**
 * Runs `fn` inside a new cycle context.
 *
 * @example
 * ```typescript
 * await withCycleContext(async () => {
 *   const report = await service.getReport('XAUUSD');
 *   logger.info('Cycle complete', { signal: report.signal });
 * }, undefined, { symbol: 'XAUUSD' });
 * ```
 */
export async function withCycleContext<T>(
  fn: () => Promise<T> | T,
  cycleId?: string,
  fields?: Record<string, unknown>
): Promise<T> {
  const context: CycleContext = {
    cycle_id: cycleId ?? generateCycleId(),
    ...fields,
  };

  return cycleStorage.run(context, fn);
}
