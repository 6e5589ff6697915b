import { z } from 'zod';

export const TimeframeSchema = z.enum(['1h', '4h', '8h', '1d', '3d', '1w', '1M']);

const nonNegative = (fallback: number) => z.number().min(0).default(fallback);
const positive = (fallback: number) => z.number().positive().default(fallback);

/**
 * Anomaly thresholds for one metric, in standard deviations.
 * confirmationBound defaults to thresholdStdDev x mediumRatio when left out.
 */
const metricThresholds = (threshold: number, strongZScore: number) =>
  z
    .object({
      thresholdStdDev: positive(threshold),
      confirmationBound: z.number().positive().optional(),
      strongZScore: positive(strongZScore),
    })
    .refine(
      (data) => data.confirmationBound === undefined || data.confirmationBound <= data.thresholdStdDev,
      { message: 'confirmationBound must not exceed thresholdStdDev', path: ['confirmationBound'] },
    )
    .default({});

const dominancePair = (btcDominance: number, stablecoinDominance: number) =>
  z
    .object({
      btcDominance: nonNegative(btcDominance),
      stablecoinDominance: nonNegative(stablecoinDominance),
    })
    .default({});

export const StatWindowConfigSchema = z.object({
  minSamples: z.number().int().min(3).default(20),
  minSamplesByTimeframe: z.record(TimeframeSchema, z.number().int().min(3)).default({ '1h': 10 }),
  /** Net move, in standard deviations, that counts as full trend strength */
  trendStrengthScale: positive(2),
  momentum: z
    .object({
      shortStdRatio: nonNegative(0.05),
      longStdRatio: nonNegative(0.03),
    })
    .default({}),
});

export const AnomalyConfigSchema = z.object({
  mediumRatio: z.number().gt(0).lt(1).default(0.7),
  metrics: z
    .object({
      btcDominance: metricThresholds(1.5, 2.5),
      stablecoinDominance: metricThresholds(1.2, 2.2),
      sentiment: metricThresholds(1.5, 2.5),
    })
    .default({}),
});

export const TrendConsistencyConfigSchema = z.object({
  minRatio: z.number().min(0).max(1).default(0.6),
  timeframes: z.array(TimeframeSchema).min(2).default(['4h', '1d', '3d', '1w']),
});

export const ConfirmationConfigSchema = z
  .object({
    minScore: nonNegative(2),
    minScoreWithTechnical: nonNegative(1.5),
    /** |technical score| that earns a full point */
    technicalFullCreditAt: positive(0.5),
  })
  .refine((data) => data.minScoreWithTechnical <= data.minScore, {
    message: 'minScoreWithTechnical must not exceed minScore',
    path: ['minScoreWithTechnical'],
  });

export const ScoringConfigSchema = z
  .object({
    highThreshold: z.number().min(0).max(100).default(75),
    mediumThreshold: z.number().min(0).max(100).default(60),
    rsiNeutral: z.number().min(0).max(100).default(50),
    categoryMax: z
      .object({
        TREND_STRUCTURE: nonNegative(30),
        WYCKOFF_PATTERN: nonNegative(15),
        INDICATORS: nonNegative(20),
        VOLUME: nonNegative(10),
        DOMINANCE: nonNegative(15),
        SAFETY_CHECKS: nonNegative(10),
      })
      .default({}),
    points: z
      .object({
        primaryTrend: nonNegative(15),
        secondaryTrend: nonNegative(10),
        minorTrend: nonNegative(5),
        pattern: nonNegative(15),
        momentumOscillator: nonNegative(7),
        macd: nonNegative(7),
        movingAverages: nonNegative(6),
        volume: nonNegative(10),
        fundingRate: nonNegative(4),
        openInterest: nonNegative(3),
        liquidity: nonNegative(3),
      })
      .default({}),
    dominancePoints: z
      .object({
        btcLong: dominancePair(8, 7),
        btcShort: dominancePair(8, 7),
        altLong: dominancePair(10, 5),
        altShort: dominancePair(8, 7),
      })
      .default({}),
    safety: z
      .object({
        maxAbsFundingRate: nonNegative(0.001),
        maxAbsOpenInterestChangePct: nonNegative(25),
        minLiquidityUsd: nonNegative(1_000_000),
      })
      .default({}),
  })
  .refine((data) => data.mediumThreshold < data.highThreshold, {
    message: 'mediumThreshold must be below highThreshold',
    path: ['mediumThreshold'],
  });

export const GuardrailConfigSchema = z.object({
  minLiquidityUsd: nonNegative(500_000),
  crashDropPct: positive(3),
  crashWindowSec: z.number().int().positive().default(900),
  correlationThreshold: z.number().min(0).max(1).default(0.85),
  activeSignalWindowSec: z.number().int().min(0).default(900),
});

export const EmissionConfigSchema = z.object({
  cooldownSec: z.number().int().min(0).default(14_400),
  valueChangeThreshold: nonNegative(0.3),
  /** Records older than this are treated as absent; null leaves the cooldown in charge */
  staleRecordMaxAgeSec: z.number().int().positive().nullable().default(null),
});

export const DominanceConfigSchema = z.object({
  baselineTimeframe: TimeframeSchema.default('3d'),
  /** Window whose trend feeds the asset scorer's dominance checks */
  contextTimeframe: TimeframeSchema.default('1d'),
  combinedZScore: positive(1.2),
});

export const RiskConfigSchema = z.object({
  entryBandPct: nonNegative(0.5),
  stopLossPct: positive(2),
  takeProfitPcts: z.array(z.number().positive()).min(1).default([2, 5]),
});

export const EngineConfigSchema = z.object({
  statWindow: StatWindowConfigSchema.default({}),
  anomaly: AnomalyConfigSchema.default({}),
  trendConsistency: TrendConsistencyConfigSchema.default({}),
  confirmation: ConfirmationConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  guardrails: GuardrailConfigSchema.default({}),
  emission: EmissionConfigSchema.default({}),
  dominance: DominanceConfigSchema.default({}),
  risk: RiskConfigSchema.default({}),
  btcSymbols: z.array(z.string().min(1)).min(1).default(['BTC', 'BTCUSDT', 'XBT']),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type StatWindowConfig = EngineConfig['statWindow'];
export type AnomalyConfig = EngineConfig['anomaly'];
export type MetricThresholds = AnomalyConfig['metrics']['btcDominance'];
export type TrendConsistencyConfig = EngineConfig['trendConsistency'];
export type ConfirmationConfig = EngineConfig['confirmation'];
export type ScoringConfig = EngineConfig['scoring'];
export type GuardrailConfig = EngineConfig['guardrails'];
export type EmissionConfig = EngineConfig['emission'];
export type DominanceConfig = EngineConfig['dominance'];
export type RiskConfig = EngineConfig['risk'];
