/**
 * MarketStructure - Dow swing structure and Wyckoff phase reading
 *
 * Core Functions:
 * - findSwings(): 5-candle swing highs and lows
 * - analyzeDow(): HH/HL or LH/LL trend plus break of structure
 * - analyzeWyckoff(): phase, spring/upthrust and signs of strength/weakness
 */

import { Candle, DowReading, TrendDirection, WyckoffPhase, WyckoffReading } from '../types';
import { TechnicalIndicators } from './TechnicalIndicators';

export interface SwingPoint {
  index: number;
  price: number;
}

export interface Swings {
  highs: SwingPoint[];
  lows: SwingPoint[];
}

export const MIN_DOW_CANDLES = 20;
export const MIN_WYCKOFF_CANDLES = 50;

const mean = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

export class MarketStructure {
  /**
   * A swing high's high beats the two bars on each side; a swing low's low
   * undercuts them.
   */
  static findSwings(candles: readonly Candle[]): Swings {
    const highs: SwingPoint[] = [];
    const lows: SwingPoint[] = [];

    for (let i = 2; i < candles.length - 2; i++) {
      const high = candles[i].high;
      if (
        high > candles[i - 1].high &&
        high > candles[i - 2].high &&
        high > candles[i + 1].high &&
        high > candles[i + 2].high
      ) {
        highs.push({ index: i, price: high });
      }

      const low = candles[i].low;
      if (
        low < candles[i - 1].low &&
        low < candles[i - 2].low &&
        low < candles[i + 1].low &&
        low < candles[i + 2].low
      ) {
        lows.push({ index: i, price: low });
      }
    }

    return { highs, lows };
  }

  static analyzeDow(candles: readonly Candle[]): DowReading | undefined {
    if (candles.length < MIN_DOW_CANDLES) return undefined;

    const { highs, lows } = MarketStructure.findSwings(candles);

    let trend: TrendDirection = 'neutral';
    if (highs.length >= 2 && lows.length >= 2) {
      const [prevHigh, lastHigh] = highs.slice(-2);
      const [prevLow, lastLow] = lows.slice(-2);
      if (lastHigh.price > prevHigh.price && lastLow.price > prevLow.price) {
        trend = 'up';
      } else if (lastHigh.price < prevHigh.price && lastLow.price < prevLow.price) {
        trend = 'down';
      }
    }

    const last = candles[candles.length - 1];
    const lastSwingHigh = highs[highs.length - 1];
    const lastSwingLow = lows[lows.length - 1];
    const hasBoth = lastSwingHigh !== undefined && lastSwingLow !== undefined;

    return {
      trend,
      bosUp: hasBoth && last.high > lastSwingHigh.price,
      bosDown: hasBoth && last.low < lastSwingLow.price,
    };
  }

  static analyzeWyckoff(candles: readonly Candle[]): WyckoffReading | undefined {
    if (candles.length < MIN_WYCKOFF_CANDLES) return undefined;

    const closes = candles.map((c) => c.close);
    const highs = candles.map((c) => c.high);
    const lows = candles.map((c) => c.low);
    const n = candles.length;

    const recentHigh = Math.max(...highs.slice(-20));
    const recentLow = Math.min(...lows.slice(-20));
    const range = recentHigh - recentLow;
    const current = closes[n - 1];
    const position = range > 0 ? (current - recentLow) / range : 0.5;

    const volumeRatio = TechnicalIndicators.volumeRatio(candles.map((c) => c.volume)) ?? 1;
    const shortMa = mean(closes.slice(-10));
    const longMa = mean(closes.slice(-30));

    // false breakdown that closes back above the prior low
    const spring = position < 0.3 && lows[n - 1] < lows[n - 2] && current > lows[n - 2];
    // false breakout that closes back below the prior high
    const upthrust = position > 0.7 && highs[n - 1] > highs[n - 2] && current < highs[n - 2];

    const lastChange = (current - closes[n - 2]) / closes[n - 2];
    const signOfStrength = lastChange > 0.02 && volumeRatio > 1.3;
    const signOfWeakness = lastChange < -0.02 && volumeRatio > 1.3;

    let phase: WyckoffPhase = 'UNKNOWN';
    if (position < 0.3 && shortMa < longMa) {
      if (spring || (volumeRatio > 1.2 && current > closes[n - 5])) {
        phase = 'ACCUMULATION';
      }
    } else if (position > 0.3 && shortMa > longMa && volumeRatio > 1.1) {
      phase = 'MARKUP';
    } else if (position > 0.7 && shortMa > longMa) {
      if (upthrust || (volumeRatio < 0.9 && current < closes[n - 5])) {
        phase = 'DISTRIBUTION';
      }
    } else if (position < 0.7 && shortMa < longMa && volumeRatio > 1.1) {
      phase = 'MARKDOWN';
    }

    return { phase, spring, upthrust, signOfStrength, signOfWeakness };
  }
}
