/**
 * News calendar loading
 *
 * The calendar is a JSON array of scheduled releases:
 * `[{ "timestamp": "2025-03-12T12:30:00.000Z", "impact": "high", "title": "CPI" }]`
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, type NewsEvent } from '@xau-signal/contracts';

export const newsEventSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  impact: z.enum(['high', 'medium', 'low']),
  title: z.string().optional(),
});

const calendarSchema = z.array(newsEventSchema);

/**
 * Reads and validates a calendar file, sorted by release time.
 *
 * @throws {ConfigurationError} When the file is missing, not JSON or invalid
 */
export function loadCalendar(path: string): NewsEvent[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read calendar ${path}: ${reason}`, {
      issues: [reason],
      path,
    });
  }

  const result = calendarSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid calendar ${path}`, { issues, path });
  }

  return [...result.data].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}
