/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { Timeframe } from '@xau-signal/contracts';

const positiveInt = z.number().int().positive();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      /** Instrument reported on every snapshot */
      symbol: z.string().min(1).default('XAUUSD'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['fixture', 'yahoo']).default('fixture'),
      /** Whole-snapshot deadline enforced by the signal service */
      fetchTimeoutMs: positiveInt.default(8000),
      baseUrl: z.string().url().optional(),
      /** Snapshot JSON served by the fixture provider instead of synthetic data */
      fixturePath: z.string().optional(),
    })
    .default({}),

  service: z
    .object({
      /** Completed reports younger than this are served without refetching */
      cacheTtlMs: z.number().int().nonnegative().default(30_000),
      fastTimeframe: z.nativeEnum(Timeframe).default(Timeframe.M5),
      slowTimeframe: z.nativeEnum(Timeframe).default(Timeframe.H1),
      fastLookback: positiveInt.default(300),
      slowLookback: positiveInt.default(300),
    })
    .default({}),

  calendar: z
    .object({
      /** JSON list of scheduled releases; no file leaves the news lock inactive */
      path: z.string().optional(),
    })
    .default({}),

  engine: z
    .object({
      actionableConfidence: z.number().min(0).max(100).optional(),
      strongConfidence: z.number().min(0).max(100).optional(),
      newsBufferMinutes: z.number().nonnegative().optional(),
      riskReward: z.number().positive().optional(),
      trendPeriod: positiveInt.optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  SYMBOL: 'app.symbol',
  PROVIDER_TYPE: 'provider.type',
  FETCH_TIMEOUT_MS: 'provider.fetchTimeoutMs',
  YAHOO_BASE_URL: 'provider.baseUrl',
  FIXTURE_PATH: 'provider.fixturePath',
  CACHE_TTL_MS: 'service.cacheTtlMs',
  FAST_TIMEFRAME: 'service.fastTimeframe',
  SLOW_TIMEFRAME: 'service.slowTimeframe',
  CALENDAR_PATH: 'calendar.path',
  ACTIONABLE_CONFIDENCE: 'engine.actionableConfidence',
  STRONG_CONFIDENCE: 'engine.strongConfidence',
  NEWS_BUFFER_MINUTES: 'engine.newsBufferMinutes',
  RISK_REWARD: 'engine.riskReward',
  TREND_PERIOD: 'engine.trendPeriod',
};
