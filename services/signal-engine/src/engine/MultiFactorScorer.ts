/**
 * MultiFactorScorer - point-based scoring of a directional candidate
 *
 * Six categories add up to at most 100 points:
 * - Trend structure (30): primary 1d/3d/1w, secondary 4h/8h, minor 1h
 * - Wyckoff pattern (15): phase or event on 4h
 * - Indicators (20): RSI bias, MACD histogram, EMA alignment on 4h
 * - Volume (10): 4h volume spike moving with the candidate
 * - Dominance (15): BTC and stablecoin dominance direction by asset class
 * - Safety (10): funding rate, open interest, liquidity
 *
 * Sub-checks are all-or-nothing. Missing data fails the check.
 */

import {
  AssetAnalysis,
  AssetClass,
  DominanceContext,
  FactorCategory,
  FactorScore,
  MultiFactorScore,
  SafetyMetrics,
  SignalConfidence,
  SignalDirection,
  SubCheck,
  SubCheckResult,
  SubCheckResults,
  Timeframe,
  TimeframeAnalysis,
  TrendDirection,
} from '../types';
import { ScoringConfig } from '../config/schema';

export interface ScoringInput {
  assetClass: AssetClass;
  direction: SignalDirection;
  analysis: AssetAnalysis;
  dominance: DominanceContext;
  safety?: SafetyMetrics;
}

const PRIMARY_TIMEFRAMES: readonly Timeframe[] = ['1d', '3d', '1w'];
const SECONDARY_TIMEFRAMES: readonly Timeframe[] = ['4h', '8h'];

const CATEGORY_CHECKS: ReadonlyArray<{ category: FactorCategory; checks: readonly SubCheck[] }> = [
  { category: FactorCategory.TREND_STRUCTURE, checks: ['primaryTrend', 'secondaryTrend', 'minorTrend'] },
  { category: FactorCategory.WYCKOFF_PATTERN, checks: ['pattern'] },
  { category: FactorCategory.INDICATORS, checks: ['momentumOscillator', 'macd', 'movingAverages'] },
  { category: FactorCategory.VOLUME, checks: ['volume'] },
  { category: FactorCategory.DOMINANCE, checks: ['btcDominance', 'stablecoinDominance'] },
  { category: FactorCategory.SAFETY_CHECKS, checks: ['fundingRate', 'openInterest', 'liquidity'] },
];

const CHECK_DESCRIPTIONS: Record<SubCheck, string> = {
  primaryTrend: 'Primary trend (1d/3d/1w) aligned',
  secondaryTrend: 'Secondary trend (4h/8h) aligned',
  minorTrend: 'Minor trend or break of structure (1h) aligned',
  pattern: 'Wyckoff pattern (4h) supports direction',
  momentumOscillator: 'RSI (4h) on the side of the move',
  macd: 'MACD histogram (4h) on the side of the move',
  movingAverages: 'Price and EMA20/EMA50 (4h) stacked with the move',
  volume: 'Volume spike (4h) confirms the move',
  btcDominance: 'BTC dominance direction supports the trade',
  stablecoinDominance: 'Stablecoin dominance direction supports the trade',
  fundingRate: 'Funding rate within bounds',
  openInterest: 'Open interest change within bounds',
  liquidity: 'Liquidity above minimum',
};

const targetTrend = (direction: SignalDirection): TrendDirection => (direction === 'LONG' ? 'up' : 'down');

export class MultiFactorScorer {
  constructor(private readonly config: ScoringConfig) {}

  /**
   * Evaluate every sub-check for a candidate
   */
  evaluateChecks(input: ScoringInput): SubCheckResults {
    const { analysis, direction, dominance } = input;
    const target = targetTrend(direction);
    const isLong = direction === 'LONG';
    const h4 = analysis['4h'];

    return {
      primaryTrend: this.majorityMatches(analysis, PRIMARY_TIMEFRAMES, target),
      secondaryTrend: this.noneOpposed(analysis, SECONDARY_TIMEFRAMES, target),
      minorTrend: this.minorAligned(analysis['1h'], direction),
      pattern: h4 !== undefined && this.patternSupports(h4, direction),
      momentumOscillator: this.rsiSupports(h4, direction),
      macd:
        h4?.indicators.macdHistogram !== undefined &&
        (isLong ? h4.indicators.macdHistogram > 0 : h4.indicators.macdHistogram < 0),
      movingAverages: this.movingAveragesStacked(h4, direction),
      volume: this.volumeConfirms(h4, direction),
      btcDominance: dominance.btcDominanceTrend === (isLong ? 'down' : 'up'),
      stablecoinDominance: isLong
        ? dominance.stablecoinDominanceTrend !== 'up' && !dominance.stablecoinSpikeUp
        : dominance.stablecoinDominanceTrend === 'up',
      ...this.safetyChecks(input.safety),
    };
  }

  /**
   * Points for a set of sub-check outcomes. Turning a check from failed to
   * passed never lowers the total.
   */
  scoreChecks(
    checks: SubCheckResults,
    assetClass: AssetClass,
    direction: SignalDirection,
  ): Omit<MultiFactorScore, 'direction' | 'assetClass'> {
    const factors: FactorScore[] = CATEGORY_CHECKS.map(({ category, checks: names }) => {
      const results: SubCheckResult[] = names.map((check) => {
        const passed = checks[check];
        return {
          check,
          passed,
          points: passed ? this.pointsFor(check, assetClass, direction) : 0,
          description: CHECK_DESCRIPTIONS[check],
        };
      });
      const max = this.config.categoryMax[category];
      const points = Math.min(max, results.reduce((sum, r) => sum + r.points, 0));
      return { category, points, max, checks: results };
    });

    const total = Math.min(100, factors.reduce((sum, factor) => sum + factor.points, 0));
    const reasons = factors.flatMap((factor) =>
      factor.checks.filter((r) => r.passed).map((r) => `${r.description} (+${r.points})`),
    );

    // Altcoins need BTC dominance moving their way regardless of points
    if (assetClass === 'ALT' && !checks.btcDominance) {
      const gateReason =
        direction === 'LONG'
          ? 'Altcoin LONG requires falling BTC dominance'
          : 'Altcoin SHORT requires rising BTC dominance';
      return { total, confidence: 'NONE', factors, reasons: [...reasons, gateReason], gateReason };
    }

    return { total, confidence: this.classify(total), factors, reasons };
  }

  score(input: ScoringInput): MultiFactorScore {
    const checks = this.evaluateChecks(input);
    return {
      direction: input.direction,
      assetClass: input.assetClass,
      ...this.scoreChecks(checks, input.assetClass, input.direction),
    };
  }

  classify(total: number): SignalConfidence {
    if (total >= this.config.highThreshold) return 'HIGH';
    if (total >= this.config.mediumThreshold) return 'MEDIUM';
    return 'NONE';
  }

  private pointsFor(check: SubCheck, assetClass: AssetClass, direction: SignalDirection): number {
    if (check === 'btcDominance' || check === 'stablecoinDominance') {
      const key =
        assetClass === 'BTC'
          ? direction === 'LONG' ? 'btcLong' : 'btcShort'
          : direction === 'LONG' ? 'altLong' : 'altShort';
      return this.config.dominancePoints[key][check];
    }
    return this.config.points[check];
  }

  private majorityMatches(analysis: AssetAnalysis, timeframes: readonly Timeframe[], target: TrendDirection): boolean {
    const present = timeframes.map((tf) => analysis[tf]).filter((a): a is TimeframeAnalysis => a !== undefined);
    if (present.length === 0) return false;
    const matching = present.filter((a) => a.dow.trend === target).length;
    return matching * 2 > present.length;
  }

  private noneOpposed(analysis: AssetAnalysis, timeframes: readonly Timeframe[], target: TrendDirection): boolean {
    const present = timeframes.map((tf) => analysis[tf]).filter((a): a is TimeframeAnalysis => a !== undefined);
    return (
      present.some((a) => a.dow.trend === target) &&
      present.every((a) => a.dow.trend === target || a.dow.trend === 'neutral')
    );
  }

  private minorAligned(h1: TimeframeAnalysis | undefined, direction: SignalDirection): boolean {
    if (!h1) return false;
    if (h1.dow.trend === targetTrend(direction)) return true;
    return direction === 'LONG' ? h1.dow.bosUp : h1.dow.bosDown;
  }

  private patternSupports(h4: TimeframeAnalysis, direction: SignalDirection): boolean {
    const { phase, spring, upthrust, signOfStrength, signOfWeakness } = h4.wyckoff;
    if (direction === 'LONG') {
      return phase === 'ACCUMULATION' || phase === 'MARKUP' || signOfStrength || spring;
    }
    return phase === 'DISTRIBUTION' || phase === 'MARKDOWN' || signOfWeakness || upthrust;
  }

  private rsiSupports(h4: TimeframeAnalysis | undefined, direction: SignalDirection): boolean {
    const rsi = h4?.indicators.rsi;
    if (rsi === undefined) return false;
    return direction === 'LONG' ? rsi > this.config.rsiNeutral : rsi < this.config.rsiNeutral;
  }

  private movingAveragesStacked(h4: TimeframeAnalysis | undefined, direction: SignalDirection): boolean {
    if (!h4) return false;
    const { ema20, ema50 } = h4.indicators;
    if (ema20 === undefined || ema50 === undefined) return false;
    const price = h4.currentPrice;
    return direction === 'LONG' ? price > ema20 && ema20 > ema50 : price < ema20 && ema20 < ema50;
  }

  private volumeConfirms(h4: TimeframeAnalysis | undefined, direction: SignalDirection): boolean {
    if (!h4 || !h4.indicators.volumeSpike) return false;
    const change = h4.indicators.lastCandleChangePct;
    if (change === undefined) return false;
    return direction === 'LONG' ? change > 0 : change < 0;
  }

  private safetyChecks(safety: SafetyMetrics | undefined): Pick<SubCheckResults, 'fundingRate' | 'openInterest' | 'liquidity'> {
    const limits = this.config.safety;
    return {
      fundingRate:
        safety?.fundingRate !== undefined && Math.abs(safety.fundingRate) <= limits.maxAbsFundingRate,
      openInterest:
        safety?.openInterestChangePct !== undefined &&
        Math.abs(safety.openInterestChangePct) <= limits.maxAbsOpenInterestChangePct,
      liquidity: safety?.liquidityUsd !== undefined && safety.liquidityUsd >= limits.minLiquidityUsd,
    };
  }
}
