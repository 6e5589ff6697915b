/**
 * Weighted technical score in [-1, 1] from a candle history.
 * Positive reads bullish, negative bearish.
 */

import { Candle, TechnicalDetails, TechnicalScore } from '../types';
import { MarketStructure, MIN_WYCKOFF_CANDLES } from './MarketStructure';
import { TechnicalIndicators } from './TechnicalIndicators';

export const TECHNICAL_WEIGHTS = {
  rsi: 0.2,
  macd: 0.25,
  bollinger: 0.15,
  volume: 0.15,
  wyckoff: 0.15,
  dow: 0.1,
} as const;

const clamp = (value: number): number => Math.max(-1, Math.min(1, value));

function scoreRsi(rsi: number): number {
  if (rsi < 30) return 0.8;
  if (rsi > 70) return -0.8;
  if (rsi < 50) return ((50 - rsi) / 50) * 0.5;
  return (-(rsi - 50) / 50) * 0.5;
}

export function calculateTechnicalScore(candles: readonly Candle[]): TechnicalScore | undefined {
  if (candles.length < MIN_WYCKOFF_CANDLES) return undefined;

  const closes = candles.map((c) => c.close);
  const volumes = candles.map((c) => c.volume);
  const current = closes[closes.length - 1];
  const previous = closes[closes.length - 2];

  const details: { -readonly [K in keyof TechnicalDetails]: TechnicalDetails[K] } = {};
  let total = 0;
  let weightSum = 0;
  const add = (key: keyof TechnicalDetails, value: number): void => {
    const bounded = clamp(value);
    details[key] = bounded;
    total += bounded * TECHNICAL_WEIGHTS[key];
    weightSum += TECHNICAL_WEIGHTS[key];
  };

  const rsi = TechnicalIndicators.rsi(closes);
  if (rsi !== undefined) add('rsi', scoreRsi(rsi));

  const macd = TechnicalIndicators.macd(closes);
  if (macd !== undefined) {
    if (macd.signal !== undefined && macd.histogram !== undefined) {
      if (macd.macd > macd.signal && macd.histogram > 0) add('macd', 0.7);
      else if (macd.macd < macd.signal && macd.histogram < 0) add('macd', -0.7);
      else add('macd', macd.histogram * 10);
    } else {
      add('macd', macd.macd > 0 ? 0.5 : -0.5);
    }
  }

  const bands = TechnicalIndicators.bollinger(closes);
  if (bands !== undefined) {
    if (current < bands.lower) add('bollinger', 0.6);
    else if (current > bands.upper) add('bollinger', -0.6);
    else {
      const width = bands.upper - bands.lower;
      const position = width > 0 ? (current - bands.lower) / width : 0.5;
      add('bollinger', (position - 0.5) * 2);
    }
  }

  const recentVolumes = volumes.slice(-20);
  const avgVolume = recentVolumes.reduce((sum, v) => sum + v, 0) / recentVolumes.length;
  const volumeRatio = avgVolume > 0 ? volumes[volumes.length - 1] / avgVolume : 1;
  const priceChange = previous !== 0 ? (current - previous) / previous : 0;
  if (priceChange > 0 && volumeRatio > 1.2) add('volume', 0.6);
  else if (priceChange < 0 && volumeRatio > 1.2) add('volume', -0.6);
  else add('volume', (volumeRatio - 1) * 0.3);

  const wyckoff = MarketStructure.analyzeWyckoff(candles);
  if (wyckoff !== undefined && wyckoff.phase !== 'UNKNOWN') {
    const strength = wyckoff.signOfStrength || wyckoff.spring ? 0.8 : 0.6;
    const bullish = wyckoff.phase === 'ACCUMULATION' || wyckoff.phase === 'MARKUP';
    add('wyckoff', (bullish ? strength : -strength) * 0.7);
  }

  const dow = MarketStructure.analyzeDow(candles);
  if (dow !== undefined) {
    add('dow', dow.trend === 'up' ? 0.6 : dow.trend === 'down' ? -0.6 : 0);
  }

  return {
    score: weightSum > 0 ? total / weightSum : 0,
    details,
  };
}
