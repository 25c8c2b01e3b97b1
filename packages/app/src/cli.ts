#!/usr/bin/env node

/**
 * CLI entry point
 *
 *   xau-signal evaluate [--source fixture|yahoo] [--symbol XAUUSD] [--json]
 *   xau-signal config
 */

import 'dotenv/config';

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, Option } from 'commander';
import { isConfigurationError } from '@xau-signal/contracts';
import type { SeriesProvider } from '@xau-signal/contracts';
import { attachGlobalHandlers, createLogger, type Logger } from '@xau-signal/logger';
import { YahooSeriesProvider } from '@xau-signal/provider-yahoo';
import { createSignalEngine } from '@xau-signal/signal-engine';
import { getConfigSummary, loadConfig, toEngineOverrides, type Config } from './config/index.js';
import { loadCalendar } from './config/calendar.js';
import { FixtureSeriesProvider } from './providers/fixture-provider.js';
import { SignalService } from './services/signal-service.js';
import { ReportFormatter } from './formatters/report-formatter.js';

export interface CliIO {
  stdout: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Logger factory; the default writes to stderr */
  createLogger?: (config: Config) => Logger;
  /** Evaluation instant for fixture runs; defaults to the clock */
  now?: () => Date;
}

interface EvaluateOptions {
  source?: 'fixture' | 'yahoo';
  symbol?: string;
  json: boolean;
  color: boolean;
  snapshot?: string;
}

function defaultLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    consoleToStderr: true,
  });
}

function createProvider(
  type: 'fixture' | 'yahoo',
  config: Config,
  logger: Logger,
  snapshotPath?: string
): SeriesProvider {
  if (type === 'yahoo') {
    return new YahooSeriesProvider({
      baseUrl: config.provider.baseUrl,
      timeoutMs: config.provider.fetchTimeoutMs,
      logger: logger.child({ component: 'provider', provider: 'yahoo' }),
    });
  }

  return new FixtureSeriesProvider({
    snapshotPath: snapshotPath ?? config.provider.fixturePath,
    logger: logger.child({ component: 'provider', provider: 'fixture' }),
  });
}

async function evaluateCommand(options: EvaluateOptions, io: CliIO): Promise<void> {
  const config = loadConfig(io.env);
  const logger = (io.createLogger ?? defaultLogger)(config);

  const engine = createSignalEngine(toEngineOverrides(config));
  const calendar = config.calendar.path ? loadCalendar(config.calendar.path) : undefined;
  const provider = createProvider(options.source ?? config.provider.type, config, logger, options.snapshot);

  const service = new SignalService({
    provider,
    engine,
    logger,
    symbol: options.symbol ?? config.app.symbol,
    fast: { timeframe: config.service.fastTimeframe, lookback: config.service.fastLookback },
    slow: { timeframe: config.service.slowTimeframe, lookback: config.service.slowLookback },
    cacheTtlMs: config.service.cacheTtlMs,
    fetchTimeoutMs: config.provider.fetchTimeoutMs,
    calendar,
    clock: io.now,
  });

  const report = await service.getSignal();
  const formatter = new ReportFormatter({ color: options.color && !options.json });
  io.stdout(formatter.format(report, options.json ? 'json' : 'text'));
}

/**
 * Builds the command tree. Actions throw; runCli maps errors to exit codes.
 */
export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('xau-signal')
    .description('Score XAU/USD price and macro data into a trading signal')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: (text) => io.stdout(text.trimEnd()) });

  program
    .command('evaluate')
    .description('Run one evaluation cycle and print the report')
    .addOption(new Option('-s, --source <source>', 'series provider').choices(['fixture', 'yahoo']))
    .option('--symbol <symbol>', 'instrument reported on the snapshot')
    .option('--snapshot <path>', 'snapshot JSON for the fixture provider')
    .option('--json', 'print the report as JSON', false)
    .option('--no-color', 'disable colors')
    .action(async (options: EvaluateOptions) => {
      await evaluateCommand(options, io);
    });

  program
    .command('config')
    .description('Print the resolved configuration')
    .action(() => {
      const config = loadConfig(io.env);
      io.stdout(JSON.stringify(getConfigSummary(config), null, 2));
    });

  return program;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO, logger?: Logger): Promise<number> {
  try {
    await createProgram(io).parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
      // commander already printed help, version or a usage error
      return error.exitCode;
    }

    if (isConfigurationError(error)) {
      logger?.error('Invalid configuration', { error_code: error.code, issues: error.data?.['issues'] });
      return 1;
    }

    logger?.error('Command failed', { error });
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  const logger = createLogger({ level: 'info', consoleToStderr: true });
  attachGlobalHandlers(logger);

  const io: CliIO = { stdout: (text) => process.stdout.write(`${text}\n`), env: process.env };
  void runCli(process.argv.slice(2), io, logger).then((code) => {
    process.exitCode = code;
  });
}
