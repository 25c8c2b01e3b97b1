/**
 * @fileoverview Engine configuration schema.
 *
 * Every threshold, window and weight the engine uses is named here with its
 * reference default. Invalid values (zero or negative windows, inverted
 * thresholds, a session table with gaps) fail at startup with a
 * ConfigurationError.
 *
 * @module @xau-signal/signal-engine/config
 */

import { z } from 'zod';
import { ConfigurationError } from '@xau-signal/contracts';
import { DEFAULT_SESSIONS, validateSessionTable } from '@xau-signal/market-calendar';
import { DEFAULT_WEIGHTS } from './scoring/weights.js';

export const ENGINE_VERSION = '0.1.0';

const HOUR_MS = 60 * 60 * 1000;

const windowSize = z.number().int().positive();
const ratio = z.number().positive();
const nonNegative = z.number().nonnegative();
const percent = z.number().min(0).max(100);

const sessionSchema = z.object({
  name: z.enum(['ASIAN', 'LONDON', 'OVERLAP', 'NEW_YORK', 'LATE_NEW_YORK']),
  startHourUtc: z.number().int().min(0).max(23),
  endHourUtc: z.number().int().min(0).max(23),
  confidenceMultiplier: ratio,
  softLock: z.boolean(),
});

export const engineConfigSchema = z
  .object({
    trend: z
      .object({
        period: windowSize.default(200),
        maType: z.enum(['sma', 'ema']).default('ema'),
      })
      .default({}),

    atr: z.object({ period: windowSize.default(14) }).default({}),

    momentum: z
      .object({
        period: windowSize.default(14),
        bullishAbove: percent.default(58),
        bearishBelow: percent.default(42),
      })
      .default({}),

    vsa: z
      .object({
        baselineWindow: windowSize.default(20),
        volumeSpikeRatio: ratio.default(1.5),
        expansionRatio: ratio.default(1.8),
        rangeSpikeRatio: ratio.default(1.5),
      })
      .default({}),

    liquidity: z
      .object({
        lookback: windowSize.default(15),
        sweepMarginAtr: nonNegative.default(0.1),
      })
      .default({}),

    yield: z
      .object({
        window: windowSize.default(12),
        maxStalenessMs: windowSize.default(2 * HOUR_MS),
      })
      .default({}),

    weights: z
      .object({
        trendAlignment: nonNegative.default(DEFAULT_WEIGHTS.trendAlignment),
        vsa: nonNegative.default(DEFAULT_WEIGHTS.vsa),
        liquidity: nonNegative.default(DEFAULT_WEIGHTS.liquidity),
        momentum: nonNegative.default(DEFAULT_WEIGHTS.momentum),
        yieldSupport: nonNegative.default(DEFAULT_WEIGHTS.yieldSupport),
        volatilityPenalty: nonNegative.default(DEFAULT_WEIGHTS.volatilityPenalty),
      })
      .default({}),

    thresholds: z
      .object({
        /** Below this there is no edge at all */
        insufficientEdge: percent.default(45),
        /** Lowest confidence that produces BUY or SELL */
        actionable: percent.default(60),
        /** STRONG_BUY / STRONG_SELL */
        strong: percent.default(80),
        /** VSA confirmation at or above this reads as institutional flow */
        institutional: percent.default(70),
      })
      .default({}),

    lock: z
      .object({
        news: z
          .object({
            bufferMinutes: nonNegative.default(5),
            impacts: z
              .array(z.enum(['high', 'medium', 'low']))
              .min(1)
              .default(['high']),
          })
          .default({}),
        volatility: z
          .object({
            baselineWindow: windowSize.default(1),
            maxDeviation: ratio.default(0.15),
            /** Extra points a past shock keeps the lock ON for; 0 disables */
            cooldownBars: z.number().int().nonnegative().default(0),
          })
          .default({}),
      })
      .default({}),

    sessions: z.array(sessionSchema).default(() => DEFAULT_SESSIONS.map((session) => ({ ...session }))),

    levels: z
      .object({
        swingLookback: windowSize.default(10),
        stopAtrMultiple: ratio.default(1.5),
        riskReward: ratio.default(2),
        pricePrecision: z.number().int().min(0).max(8).default(2),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const { insufficientEdge, actionable, strong } = config.thresholds;
    if (!(insufficientEdge <= actionable && actionable <= strong)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thresholds'],
        message: 'thresholds must satisfy insufficientEdge <= actionable <= strong',
      });
    }

    if (!(config.momentum.bearishBelow < config.momentum.bullishAbove)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['momentum'],
        message: 'bearishBelow must be lower than bullishAbove',
      });
    }

    for (const message of validateSessionTable(config.sessions)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sessions'], message });
    }
  });

/** Fully resolved configuration */
export type EngineConfig = z.infer<typeof engineConfigSchema>;

/** Partial overrides accepted by resolveConfig */
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Applies defaults to `overrides` and validates the result.
 *
 * @throws {ConfigurationError} With one entry per failed rule
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ trend: { maType: 'sma' }, levels: { riskReward: 3 } });
 * ```
 */
export function resolveConfig(overrides: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(overrides);

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveConfig();
