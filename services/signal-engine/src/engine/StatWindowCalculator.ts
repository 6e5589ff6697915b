/**
 * StatWindowCalculator - descriptive statistics over a time-bounded slice
 * of a metric series
 *
 * A slice with fewer samples than the configured minimum is reported as
 * invalid; callers must skip it rather than read default statistics.
 */

import {
  MetricSeries,
  StatWindow,
  StatWindowResult,
  Timeframe,
  TIMEFRAME_SECONDS,
  TrendDirection,
} from '../types';
import { StatWindowConfig } from '../config/schema';

const mean = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

export class StatWindowCalculator {
  constructor(private readonly config: StatWindowConfig) {}

  /**
   * Samples inside [nowSec - lookbackSec, nowSec], finite values only
   */
  static sliceSeries(series: MetricSeries, nowSec: number, lookbackSec: number): MetricSeries {
    const from = nowSec - lookbackSec;
    return series.filter(
      (sample) =>
        sample.timestamp >= from && sample.timestamp <= nowSec && Number.isFinite(sample.value),
    );
  }

  minSamplesFor(timeframe?: Timeframe): number {
    if (timeframe === undefined) return this.config.minSamples;
    return this.config.minSamplesByTimeframe[timeframe] ?? this.config.minSamples;
  }

  /**
   * Statistics over the whole of an already-sliced series
   */
  calculate(series: MetricSeries, timeframe?: Timeframe): StatWindowResult {
    const values = series.map((sample) => sample.value).filter((value) => Number.isFinite(value));
    const required = this.minSamplesFor(timeframe);

    if (values.length < required) {
      return { valid: false, reason: 'INSUFFICIENT_DATA', timeframe, count: values.length, required };
    }

    const count = values.length;
    const avg = mean(values);
    const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / count;
    const stdDev = Math.sqrt(variance);
    const first = values[0];
    const current = values[count - 1];
    const momentum = (current - first) / count;

    const earlyEnd = Math.floor(count / 3);
    const recentMomentum = (mean(values.slice(earlyEnd)) - mean(values.slice(0, earlyEnd))) / count;

    const trend: TrendDirection = momentum > 0 ? 'up' : momentum < 0 ? 'down' : 'neutral';
    const trendStrength =
      stdDev === 0 ? 0 : Math.min(1, Math.abs(current - first) / (this.config.trendStrengthScale * stdDev));

    const window: StatWindow = {
      timeframe,
      mean: avg,
      stdDev,
      min: Math.min(...values),
      max: Math.max(...values),
      momentum,
      recentMomentum,
      trend,
      trendStrength,
      first,
      current,
      count,
    };
    return { valid: true, window };
  }

  /**
   * Slice the series to a timeframe's lookback ending at nowSec and compute its statistics
   */
  calculateForTimeframe(series: MetricSeries, nowSec: number, timeframe: Timeframe): StatWindowResult {
    return this.calculate(
      StatWindowCalculator.sliceSeries(series, nowSec, TIMEFRAME_SECONDS[timeframe]),
      timeframe,
    );
  }

  calculateAll(
    series: MetricSeries,
    nowSec: number,
    timeframes: readonly Timeframe[],
  ): Map<Timeframe, StatWindowResult> {
    const results = new Map<Timeframe, StatWindowResult>();
    for (const timeframe of timeframes) {
      results.set(timeframe, this.calculateForTimeframe(series, nowSec, timeframe));
    }
    return results;
  }

  /**
   * Strong momentum: both windows move past a fraction of their own
   * deviation and agree on direction.
   */
  isMomentumStrong(short: StatWindow, long: StatWindow): boolean {
    const { shortStdRatio, longStdRatio } = this.config.momentum;
    return (
      Math.abs(short.recentMomentum) > short.stdDev * shortStdRatio &&
      Math.abs(long.recentMomentum) > long.stdDev * longStdRatio &&
      short.trend === long.trend &&
      short.trend !== 'neutral'
    );
  }
}
