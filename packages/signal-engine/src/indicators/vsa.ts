/**
 * @fileoverview Volume/spread classification of the latest bar.
 *
 * The latest bar "carries effort" when its volume spikes against the
 * baseline, when its body is an expansion against the average range, or,
 * for feeds without volume, when its range spikes. An effort bar closing in
 * the trend's direction confirms it; one closing against it contradicts.
 *
 * @module @xau-signal/signal-engine/indicators/vsa
 */

import { determined, toTernary, trendSign, undetermined } from '@xau-signal/contracts';
import type { Bar, Reading, Ternary, TrendDirection, VsaLabel } from '@xau-signal/contracts';
import { mean } from '../utils/price-utils.js';

export interface VsaOptions {
  /** Bars before the latest one that form the baseline */
  baselineWindow: number;
  /** Volume at or above this multiple of the average marks a spike */
  volumeSpikeRatio: number;
  /** Body at or above this multiple of the average range marks an expansion */
  expansionRatio: number;
  /** Range spike multiple used when the series carries no volume */
  rangeSpikeRatio: number;
}

export interface VsaClassification {
  label: VsaLabel;
  /** Close-minus-open direction of the latest bar */
  barDirection: Ternary;
  volumeSpike: boolean;
  expansion: boolean;
  rangeSpike: boolean;
}

export function classifyVolumeSpread(
  bars: readonly Bar[],
  trend: Reading<TrendDirection>,
  options: VsaOptions
): Reading<VsaClassification> {
  const latest = bars[bars.length - 1];
  if (bars.length < options.baselineWindow + 1 || !latest) {
    return undetermined(
      `VSA needs ${options.baselineWindow + 1} bars, got ${bars.length}`
    );
  }
  if (!trend.determined) {
    return undetermined(`VSA needs a trend: ${trend.reason}`);
  }

  const baseline = bars.slice(bars.length - 1 - options.baselineWindow, bars.length - 1);
  const averageRange = mean(baseline.map((bar) => bar.high - bar.low));

  const volumes: number[] = [];
  for (const bar of baseline) {
    if (bar.volume !== undefined) volumes.push(bar.volume);
  }
  const averageVolume = volumes.length === baseline.length ? mean(volumes) : 0;
  const hasVolume = latest.volume !== undefined && averageVolume > 0;

  const range = latest.high - latest.low;
  const body = Math.abs(latest.close - latest.open);

  const volumeSpike =
    hasVolume && (latest.volume ?? 0) >= options.volumeSpikeRatio * averageVolume;
  const expansion = averageRange > 0 && body >= options.expansionRatio * averageRange;
  const rangeSpike = !hasVolume && averageRange > 0 && range >= options.rangeSpikeRatio * averageRange;

  const barDirection = toTernary(latest.close - latest.open);
  const direction = trendSign(trend.value);

  let label: VsaLabel = 'neutral';
  if ((volumeSpike || expansion || rangeSpike) && barDirection !== 0 && direction !== 0) {
    label = barDirection === direction ? 'confirm' : 'contradict';
  }

  return determined({ label, barDirection, volumeSpike, expansion, rangeSpike });
}

/**
 * Signed contribution of a classification: the effort bar's direction when
 * it confirms or contradicts, 0 otherwise.
 */
export function vsaFactor(classification: VsaClassification): Ternary {
  return classification.label === 'neutral' ? 0 : classification.barDirection;
}
