/**
 * TechnicalIndicators - pure indicator calculations over closing prices
 *
 * Each function returns undefined when the input is too short for the
 * indicator's period instead of a made-up value.
 */

export interface MacdReading {
  macd: number;
  signal?: number;
  histogram?: number;
}

export interface BollingerBands {
  upper: number;
  middle: number;
  lower: number;
}

const mean = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

export class TechnicalIndicators {
  /**
   * RSI from simple averages of the last `period` gains and losses
   */
  static rsi(closes: readonly number[], period: number = 14): number | undefined {
    if (closes.length < period + 1) return undefined;

    let gains = 0;
    let losses = 0;
    for (let i = closes.length - period; i < closes.length; i++) {
      const delta = closes[i] - closes[i - 1];
      if (delta > 0) gains += delta;
      else losses -= delta;
    }

    const avgGain = gains / period;
    const avgLoss = losses / period;
    if (avgLoss === 0) return 100;

    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  }

  /**
   * Exponential moving average series seeded with the first value
   */
  static emaSeries(values: readonly number[], period: number): number[] {
    if (values.length === 0) return [];
    const alpha = 2 / (period + 1);
    const series: number[] = [values[0]];
    for (let i = 1; i < values.length; i++) {
      series.push(alpha * values[i] + (1 - alpha) * series[i - 1]);
    }
    return series;
  }

  /**
   * Latest EMA value; falls back to the plain mean for short inputs
   */
  static ema(values: readonly number[], period: number): number | undefined {
    if (values.length === 0) return undefined;
    if (values.length < period) return mean(values);
    const series = TechnicalIndicators.emaSeries(values, period);
    return series[series.length - 1];
  }

  static macd(
    closes: readonly number[],
    fast: number = 12,
    slow: number = 26,
    signalPeriod: number = 9,
  ): MacdReading | undefined {
    if (closes.length < slow) return undefined;

    const fastSeries = TechnicalIndicators.emaSeries(closes, fast);
    const slowSeries = TechnicalIndicators.emaSeries(closes, slow);
    const macdSeries = fastSeries.map((value, i) => value - slowSeries[i]);
    const macd = macdSeries[macdSeries.length - 1];

    if (closes.length < slow + signalPeriod) {
      return { macd };
    }

    const signalSeries = TechnicalIndicators.emaSeries(macdSeries, signalPeriod);
    const signal = signalSeries[signalSeries.length - 1];
    return { macd, signal, histogram: macd - signal };
  }

  static bollinger(
    closes: readonly number[],
    period: number = 20,
    stdDevMultiplier: number = 2,
  ): BollingerBands | undefined {
    if (closes.length < period) return undefined;

    const window = closes.slice(-period);
    const middle = mean(window);
    const stdDev = Math.sqrt(window.reduce((sum, value) => sum + (value - middle) ** 2, 0) / period);
    return {
      upper: middle + stdDevMultiplier * stdDev,
      middle,
      lower: middle - stdDevMultiplier * stdDev,
    };
  }

  /**
   * Recent volume against the longer average. Needs `longPeriod` samples.
   */
  static volumeRatio(
    volumes: readonly number[],
    shortPeriod: number = 5,
    longPeriod: number = 20,
  ): number | undefined {
    if (volumes.length < longPeriod) return undefined;
    const longAvg = mean(volumes.slice(-longPeriod));
    if (longAvg <= 0) return undefined;
    return mean(volumes.slice(-shortPeriod)) / longAvg;
  }

  static isVolumeSpike(volumes: readonly number[], threshold: number = 1.2): boolean {
    const ratio = TechnicalIndicators.volumeRatio(volumes);
    return ratio !== undefined && ratio > threshold;
  }
}
