/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@xau-signal/contracts';
import type { Logger } from '@xau-signal/logger';
import type { EngineConfigInput } from '@xau-signal/signal-engine';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: unknown };

/**
 * Load configuration from environment and defaults
 *
 * @throws {ConfigurationError} When a value fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, {
      issues,
    });
  }

  logger?.info('Configuration loaded', {
    provider: result.data.provider.type,
    symbol: result.data.app.symbol,
  });

  return result.data;
}

/**
 * Engine overrides carried by the application configuration.
 */
export function toEngineOverrides(config: Config): EngineConfigInput {
  const { actionableConfidence, strongConfidence, newsBufferMinutes, riskReward, trendPeriod } =
    config.engine;
  const overrides: EngineConfigInput = {};

  if (actionableConfidence !== undefined || strongConfidence !== undefined) {
    overrides.thresholds = { actionable: actionableConfidence, strong: strongConfidence };
  }
  if (newsBufferMinutes !== undefined) {
    overrides.lock = { news: { bufferMinutes: newsBufferMinutes } };
  }
  if (riskReward !== undefined) {
    overrides.levels = { riskReward };
  }
  if (trendPeriod !== undefined) {
    overrides.trend = { period: trendPeriod };
  }

  return overrides;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    symbol: config.app.symbol,
    provider: config.provider.type,
    fetchTimeoutMs: config.provider.fetchTimeoutMs,
    cacheTtlMs: config.service.cacheTtlMs,
    timeframes: `${config.service.fastTimeframe}/${config.service.slowTimeframe}`,
    calendar: config.calendar.path ?? 'none',
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

export type { Config } from './schema.js';
