/**
 * @fileoverview Configured engine instance.
 * @module @xau-signal/signal-engine/engine
 */

import type { MarketSnapshot, SignalReport } from '@xau-signal/contracts';
import { resolveConfig, type EngineConfig, type EngineConfigInput } from './config.js';
import { degradedReport, evaluate } from './evaluate.js';
import { deepFreeze } from './utils/freeze.js';

export interface SignalEngine {
  readonly config: Readonly<EngineConfig>;
  evaluate(snapshot: MarketSnapshot): SignalReport;
  degraded(symbol: string, evaluatedAt: string, detail: string): SignalReport;
}

/**
 * Validates configuration once and binds it to `evaluate`.
 *
 * @throws {ConfigurationError} When the configuration is invalid
 *
 * @example
 * ```typescript
 * const engine = createSignalEngine({ thresholds: { actionable: 65 } });
 * const report = engine.evaluate(snapshot);
 * ```
 */
export function createSignalEngine(overrides: EngineConfigInput = {}): SignalEngine {
  const config = deepFreeze(resolveConfig(overrides));

  return {
    config,
    evaluate: (snapshot) => evaluate(snapshot, config),
    degraded: (symbol, evaluatedAt, detail) => degradedReport(symbol, evaluatedAt, detail, config),
  };
}
