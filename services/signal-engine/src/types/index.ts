/**
 * Core types for the Signal Decision Engine
 *
 * Timestamps are integer epoch seconds throughout.
 */

// ============================================================================
// METRIC SERIES
// ============================================================================

export interface MetricSample {
  readonly timestamp: number;
  readonly value: number;
}

/** Ascending by timestamp */
export type MetricSeries = readonly MetricSample[];

export type MetricKey = 'btcDominance' | 'stablecoinDominance' | 'sentiment';

export const METRIC_KEYS: readonly MetricKey[] = ['btcDominance', 'stablecoinDominance', 'sentiment'];

export const METRIC_LABELS: Record<MetricKey, string> = {
  btcDominance: 'BTC dominance',
  stablecoinDominance: 'Stablecoin dominance',
  sentiment: 'Sentiment index',
};

export type Timeframe = '1h' | '4h' | '8h' | '1d' | '3d' | '1w' | '1M';

export const TIMEFRAME_SECONDS: Record<Timeframe, number> = {
  '1h': 3_600,
  '4h': 14_400,
  '8h': 28_800,
  '1d': 86_400,
  '3d': 259_200,
  '1w': 604_800,
  '1M': 2_592_000,
};

export const TIMEFRAMES: readonly Timeframe[] = ['1h', '4h', '8h', '1d', '3d', '1w', '1M'];

// ============================================================================
// STATISTICS
// ============================================================================

export type TrendDirection = 'up' | 'down' | 'neutral';

export interface StatWindow {
  readonly timeframe?: Timeframe;
  readonly mean: number;
  readonly stdDev: number;
  readonly min: number;
  readonly max: number;
  /** (last - first) / count */
  readonly momentum: number;
  /** Mean of the later two thirds minus mean of the first third, per sample */
  readonly recentMomentum: number;
  readonly trend: TrendDirection;
  /** 0..1 */
  readonly trendStrength: number;
  readonly first: number;
  readonly current: number;
  readonly count: number;
}

export type StatWindowResult =
  | { readonly valid: true; readonly window: StatWindow }
  | {
      readonly valid: false;
      readonly reason: 'INSUFFICIENT_DATA';
      readonly timeframe?: Timeframe;
      readonly count: number;
      readonly required: number;
    };

export type Severity = 'high' | 'medium' | 'low' | 'none';

export type AnomalyResult =
  | {
      readonly evaluated: true;
      readonly severity: Exclude<Severity, 'none'>;
      readonly zScore: number;
    }
  | {
      readonly evaluated: false;
      readonly severity: 'none';
      readonly reason: 'INSUFFICIENT_DATA' | 'DEGENERATE_STATISTICS';
    };

export interface TrendConsistency {
  readonly isConsistent: boolean;
  readonly ratio: number;
  readonly dominantTrend: TrendDirection;
  readonly validCount: number;
}

// ============================================================================
// CONFIRMATION
// ============================================================================

export type Bias = 'bullish' | 'bearish';

export interface Confirmation {
  readonly source: MetricKey | 'technical';
  readonly direction: Bias;
  readonly weight: number;
  readonly label: string;
}

/** Per-indicator readings of the technical score, each in [-1, 1] */
export interface TechnicalDetails {
  readonly rsi?: number;
  readonly macd?: number;
  readonly bollinger?: number;
  readonly volume?: number;
  readonly wyckoff?: number;
  readonly dow?: number;
}

export interface TechnicalScore {
  /** Weighted score in [-1, 1] */
  readonly score: number;
  readonly details: TechnicalDetails;
}

export interface ConfirmationResult {
  readonly score: number;
  readonly confirmations: readonly Confirmation[];
  readonly labels: readonly string[];
  readonly minimumRequired: number;
  readonly meetsThreshold: boolean;
}

// ============================================================================
// SIGNALS
// ============================================================================

export type SignalDirection = 'LONG' | 'SHORT';

export type SignalConfidence = 'HIGH' | 'MEDIUM' | 'NONE';

export type AssetClass = 'BTC' | 'ALT';

export type MarketAction =
  | 'LONG_BTC_SHORT_ALT'
  | 'SHORT_BTC_LONG_ALT'
  | 'LONG_MARKET'
  | 'SHORT_MARKET'
  | 'LONG_ACCUMULATE'
  | 'SHORT_OR_TAKE_PROFIT'
  | 'LONG_ALL'
  | 'SHORT_ALL';

export type SignalAction = SignalDirection | MarketAction;

export const ACTION_BIAS: Record<SignalAction, Bias> = {
  LONG: 'bullish',
  SHORT: 'bearish',
  LONG_BTC_SHORT_ALT: 'bearish',
  SHORT_BTC_LONG_ALT: 'bullish',
  LONG_MARKET: 'bullish',
  SHORT_MARKET: 'bearish',
  LONG_ACCUMULATE: 'bullish',
  SHORT_OR_TAKE_PROFIT: 'bearish',
  LONG_ALL: 'bullish',
  SHORT_ALL: 'bearish',
};

export enum EmissionReason {
  NEW = 'NEW',
  COOLDOWN_EXPIRED = 'COOLDOWN_EXPIRED',
  REVERSAL = 'REVERSAL',
  VALUE_CHANGE = 'VALUE_CHANGE',
  CONFIDENCE_UPGRADE = 'CONFIDENCE_UPGRADE',
  SUPPRESSED = 'SUPPRESSED',
}

export interface EmissionDecision {
  readonly emit: boolean;
  readonly reason: EmissionReason;
  /** Relative change against the last emitted value, when a previous value exists */
  readonly valueChange?: number;
}

export interface SignalHistoryEntry {
  readonly signalType: string;
  readonly lastAction: SignalAction;
  readonly lastConfidence: SignalConfidence;
  readonly lastValue: number;
  readonly lastEmittedAt: number;
  readonly lastEvaluatedAt?: number;
}

export interface PriceRange {
  readonly min: number;
  readonly max: number;
}

export interface Signal {
  readonly id: string;
  readonly asset: string;
  readonly assetClass: AssetClass;
  readonly direction: SignalDirection;
  readonly score: number;
  readonly confidence: SignalConfidence;
  readonly reasons: readonly string[];
  readonly entryRange: PriceRange;
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
  readonly timestamp: number;
  readonly emissionReason: EmissionReason;
}

export type MarketSignalType =
  | 'BTC_DOM_SPIKE_UP'
  | 'BTC_DOM_SPIKE_DOWN'
  | 'USDT_DOM_SPIKE_UP'
  | 'USDT_DOM_SPIKE_DOWN'
  | 'FEAR_SPIKE'
  | 'GREED_SPIKE'
  | 'CAPITAL_OUTFLOW'
  | 'BUYING_OPPORTUNITY';

export interface MarketSignal {
  readonly id: string;
  readonly signalType: MarketSignalType;
  readonly action: MarketAction;
  readonly confidence: SignalConfidence;
  readonly metric: MetricKey | 'combined';
  readonly value: number;
  readonly zScore: number;
  readonly confirmationScore: number;
  readonly confirmations: readonly string[];
  readonly consistencyRatio: number;
  readonly reason: string;
  readonly emissionReason: EmissionReason;
  readonly timestamp: number;
}

// ============================================================================
// FACTOR SCORING
// ============================================================================

export enum FactorCategory {
  TREND_STRUCTURE = 'TREND_STRUCTURE',
  WYCKOFF_PATTERN = 'WYCKOFF_PATTERN',
  INDICATORS = 'INDICATORS',
  VOLUME = 'VOLUME',
  DOMINANCE = 'DOMINANCE',
  SAFETY_CHECKS = 'SAFETY_CHECKS',
}

export type SubCheck =
  | 'primaryTrend'
  | 'secondaryTrend'
  | 'minorTrend'
  | 'pattern'
  | 'momentumOscillator'
  | 'macd'
  | 'movingAverages'
  | 'volume'
  | 'btcDominance'
  | 'stablecoinDominance'
  | 'fundingRate'
  | 'openInterest'
  | 'liquidity';

export type SubCheckResults = Record<SubCheck, boolean>;

export interface SubCheckResult {
  readonly check: SubCheck;
  readonly passed: boolean;
  readonly points: number;
  readonly description: string;
}

export interface FactorScore {
  readonly category: FactorCategory;
  readonly points: number;
  readonly max: number;
  readonly checks: readonly SubCheckResult[];
}

export interface MultiFactorScore {
  readonly direction: SignalDirection;
  readonly assetClass: AssetClass;
  readonly total: number;
  readonly confidence: SignalConfidence;
  readonly factors: readonly FactorScore[];
  readonly reasons: readonly string[];
  /** Set when the altcoin dominance gate forced confidence to NONE */
  readonly gateReason?: string;
}

// ============================================================================
// MARKET STRUCTURE AND ASSET ANALYSIS
// ============================================================================

export interface Candle {
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type WyckoffPhase = 'ACCUMULATION' | 'MARKUP' | 'DISTRIBUTION' | 'MARKDOWN' | 'UNKNOWN';

export interface WyckoffReading {
  readonly phase: WyckoffPhase;
  readonly spring: boolean;
  readonly upthrust: boolean;
  readonly signOfStrength: boolean;
  readonly signOfWeakness: boolean;
}

export interface DowReading {
  readonly trend: TrendDirection;
  readonly bosUp: boolean;
  readonly bosDown: boolean;
}

export interface IndicatorSnapshot {
  readonly rsi?: number;
  readonly macdHistogram?: number;
  readonly ema20?: number;
  readonly ema50?: number;
  readonly volumeSpike: boolean;
  /** Percentage change of the last candle, close against open */
  readonly lastCandleChangePct?: number;
}

export interface TimeframeAnalysis {
  readonly timeframe: Timeframe;
  readonly currentPrice: number;
  readonly dow: DowReading;
  readonly wyckoff: WyckoffReading;
  readonly indicators: IndicatorSnapshot;
}

export type AssetAnalysis = Partial<Record<Timeframe, TimeframeAnalysis>>;

export interface DominanceContext {
  readonly btcDominanceTrend: TrendDirection;
  readonly stablecoinDominanceTrend: TrendDirection;
  /** Stablecoin dominance currently spiking upward (risk-off) */
  readonly stablecoinSpikeUp: boolean;
}

export interface SafetyMetrics {
  readonly fundingRate?: number;
  /** Percentage change in open interest over the observation window */
  readonly openInterestChangePct?: number;
  readonly liquidityUsd?: number;
}

// ============================================================================
// GUARDRAILS
// ============================================================================

export interface ActiveSignal {
  readonly asset: string;
  readonly assetClass: AssetClass;
  readonly direction: SignalDirection;
  readonly emittedAt: number;
  /** Correlation of this asset's returns to BTC */
  readonly btcCorrelation?: number;
}

export interface MarketContext {
  readonly dominance: DominanceContext;
  readonly btcCrashActive?: boolean;
  readonly liquidityPass?: boolean;
  readonly liquidityUsd?: number;
  /** Correlation of the candidate asset's returns to BTC */
  readonly btcCorrelation?: number;
  readonly activeSignals?: readonly ActiveSignal[];
}

export type VetoCode =
  | 'RISK_OFF'
  | 'BTC_DOMINANCE_RISING'
  | 'LOW_LIQUIDITY'
  | 'BTC_CRASH'
  | 'CONFLICTING_SIGNAL'
  | 'SIGNAL_IN_FLIGHT';

export interface GuardrailCandidate {
  readonly asset: string;
  readonly assetClass: AssetClass;
  readonly direction: SignalDirection;
}

export type GuardrailVerdict =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly code: VetoCode; readonly reason: string };
