/**
 * Zod schema for MarketSnapshot JSON files
 */

import { z } from 'zod';
import { Timeframe } from '@xau-signal/contracts';
import { newsEventSchema } from '../config/calendar.js';

const isoTimestamp = z.string().datetime({ offset: true });

const barSchema = z.object({
  timestamp: isoTimestamp,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative().optional(),
});

const seriesSchema = z.object({
  timeframe: z.nativeEnum(Timeframe),
  bars: z.array(barSchema),
});

const macroSeriesSchema = z.object({
  name: z.string(),
  points: z.array(z.object({ timestamp: isoTimestamp, value: z.number() })),
});

export const snapshotSchema = z.object({
  symbol: z.string(),
  evaluatedAt: isoTimestamp,
  fast: seriesSchema,
  slow: seriesSchema,
  yields: macroSeriesSchema,
  volatility: macroSeriesSchema,
  calendar: z.array(newsEventSchema).optional(),
});
