/**
 * Signal report formatter
 * Renders a SignalReport as terminal text or JSON with deterministic output
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { FactorSet, IndicatorReadings, Signal, SignalReport, Ternary } from '@xau-signal/contracts';

export type OutputFormat = 'text' | 'json';

export interface FormatOptions {
  format?: OutputFormat;
  /** ANSI colors in text output (default false) */
  color?: boolean;
}

const LABEL_WIDTH = 13;

function label(name: string): string {
  return `${name}:`.padEnd(LABEL_WIDTH);
}

function formatPrice(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

function signed(value: Ternary): string {
  return value > 0 ? '+1' : value < 0 ? '-1' : '0';
}

function formatFactors(factors: FactorSet): string {
  return [
    `trend ${signed(factors.trendAlignment)}`,
    `vsa ${signed(factors.vsaConfirmation)} (${factors.vsaLabel})`,
    `liquidity ${signed(factors.liquidityReversal)}`,
    `momentum ${signed(factors.momentum)}`,
    `yield ${signed(factors.yieldSupport)}`,
    `volatility ${factors.volatilityDanger ? 'shock' : 'calm'}`,
  ].join(', ');
}

function formatReadings(readings: IndicatorReadings): string {
  return [
    `RSI ${readings.rsi === null ? 'n/a' : readings.rsi}`,
    `ATR ${formatPrice(readings.atr)}`,
    `MA ${formatPrice(readings.movingAverage)}`,
    `volume spike ${readings.volumeSpike ? 'yes' : 'no'}`,
    `expansion ${readings.expansion ? 'yes' : 'no'}`,
  ].join(', ');
}

/**
 * Formatter for signal reports
 */
export class ReportFormatter {
  private readonly chalk: ChalkInstance;

  constructor(options: { color?: boolean } = {}) {
    this.chalk = new Chalk({ level: options.color ? 1 : 0 });
  }

  format(report: SignalReport, format: OutputFormat = 'text'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(report, null, 2);
      case 'text':
        return this.formatAsText(report);
    }
  }

  private colorSignal(signal: Signal): string {
    switch (signal) {
      case 'STRONG_BUY':
      case 'BUY':
        return this.chalk.green.bold(signal);
      case 'STRONG_SELL':
      case 'SELL':
        return this.chalk.red.bold(signal);
      case 'WAIT':
        return this.chalk.yellow.bold(signal);
    }
  }

  private formatAsText(report: SignalReport): string {
    const { chalk } = this;
    const lines: string[] = [];

    lines.push(
      `${chalk.bold(report.symbol)}  ${this.colorSignal(report.signal)}  ${report.confidence}% confidence`
    );
    lines.push('='.repeat(50));

    lines.push(`${label('Forecast')}${report.forecast}`);
    lines.push(`${label('Trend')}${report.trendDirection}`);
    lines.push(`${label('Bias')}${report.bias}`);

    if (report.lock.state === 'ON') {
      const detail = report.lock.detail ? `: ${report.lock.detail}` : '';
      lines.push(`${label('Lock')}${chalk.red(`ON (${report.lock.reason}${detail})`)}`);
    } else {
      lines.push(`${label('Lock')}OFF`);
    }

    const soft = report.session.softLock ? ', low liquidity' : '';
    lines.push(
      `${label('Session')}${report.session.session} (x${report.session.confidenceMultiplier}${soft})`
    );

    lines.push(`${label('Entry')}${formatPrice(report.entryPrice)}`);
    lines.push(`${label('Stop loss')}${formatPrice(report.stopLoss)}`);
    lines.push(`${label('Take profit')}${formatPrice(report.takeProfit)} (R:R ${report.riskReward})`);
    lines.push(`${label('Buy / Sell')}${report.probabilities.buy}% / ${report.probabilities.sell}%`);

    if (report.factors) {
      lines.push(`${label('Factors')}${formatFactors(report.factors)}`);
      lines.push(`${label('Readings')}${formatReadings(report.factors.readings)}`);
      if (report.factors.undetermined.length > 0) {
        lines.push(`${label('Excluded')}${chalk.dim(report.factors.undetermined.join(', '))}`);
      }
    }

    lines.push(`${label('Actionable')}${report.actionable ? 'yes' : 'no'}`);
    lines.push(chalk.dim(`Evaluated ${report.evaluatedAt} (engine ${report.engineVersion})`));

    return lines.join('\n');
  }
}

/**
 * Format a report with a one-off formatter
 */
export function formatReport(report: SignalReport, options: FormatOptions = {}): string {
  return new ReportFormatter({ color: options.color }).format(report, options.format);
}
