/**
 * Main exports for @xau-signal/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, toEngineOverrides } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config } from './config/schema.js';
export { loadCalendar, newsEventSchema } from './config/calendar.js';

// Provider exports
export {
  FixtureSeriesProvider,
  syntheticBars,
  barTimes,
} from './providers/fixture-provider.js';
export type { FixtureProviderConfig, FixtureProviderStats } from './providers/fixture-provider.js';
export { snapshotSchema } from './providers/snapshot-schema.js';

// Service exports
export { SignalService } from './services/signal-service.js';
export type { SignalServiceConfig } from './services/signal-service.js';

// Formatter exports
export { ReportFormatter, formatReport } from './formatters/report-formatter.js';
export type { OutputFormat, FormatOptions } from './formatters/report-formatter.js';

// CLI exports
export { createProgram, runCli } from './cli.js';
export type { CliIO } from './cli.js';
