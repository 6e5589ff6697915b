import { AssetAnalysis, Candle, Timeframe, TimeframeAnalysis, TIMEFRAMES } from '../types';
import { MarketStructure, MIN_DOW_CANDLES } from './MarketStructure';
import { TechnicalIndicators } from './TechnicalIndicators';

const NO_WYCKOFF = {
  phase: 'UNKNOWN',
  spring: false,
  upthrust: false,
  signOfStrength: false,
  signOfWeakness: false,
} as const;

/**
 * Structure and indicator readings for one timeframe's candles, ascending by time.
 * Returns undefined below the minimum history for a structure reading.
 */
export function analyzeTimeframe(timeframe: Timeframe, candles: readonly Candle[]): TimeframeAnalysis | undefined {
  const usable = candles.filter(
    (c) => Number.isFinite(c.close) && Number.isFinite(c.high) && Number.isFinite(c.low) && c.close > 0,
  );
  const dow = MarketStructure.analyzeDow(usable);
  if (dow === undefined) return undefined;

  const closes = usable.map((c) => c.close);
  const last = usable[usable.length - 1];

  return {
    timeframe,
    currentPrice: last.close,
    dow,
    wyckoff: MarketStructure.analyzeWyckoff(usable) ?? NO_WYCKOFF,
    indicators: {
      rsi: TechnicalIndicators.rsi(closes),
      macdHistogram: TechnicalIndicators.macd(closes)?.histogram,
      ema20: closes.length >= 20 ? TechnicalIndicators.ema(closes, 20) : undefined,
      ema50: closes.length >= 50 ? TechnicalIndicators.ema(closes, 50) : undefined,
      volumeSpike: TechnicalIndicators.isVolumeSpike(usable.map((c) => c.volume)),
      lastCandleChangePct: last.open > 0 ? ((last.close - last.open) / last.open) * 100 : undefined,
    },
  };
}

export function analyzeAsset(candles: Partial<Record<Timeframe, readonly Candle[]>>): AssetAnalysis {
  const analysis: { [K in Timeframe]?: TimeframeAnalysis } = {};
  for (const timeframe of TIMEFRAMES) {
    const series = candles[timeframe];
    if (!series || series.length < MIN_DOW_CANDLES) continue;
    const reading = analyzeTimeframe(timeframe, series);
    if (reading) analysis[timeframe] = reading;
  }
  return analysis;
}
