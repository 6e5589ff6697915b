/**
 * DominanceSignalDetector - market-wide signals from BTC dominance,
 * stablecoin dominance and the sentiment index
 *
 * For each metric:
 * 1. Stat windows over the trend timeframes plus the 3d baseline
 * 2. Trend consistency across the trend timeframes
 * 3. Anomaly of the current value against the baseline
 * 4. Momentum gate: a strong z-score, or strong momentum on 4h and 1d
 * 5. Confirmation from the other metrics and the technical score
 * 6. Emission decision keyed per metric
 *
 * Conditions that fall short of a signal come back as alert strings.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '@market-pulse/shared';

import {
  ACTION_BIAS,
  AnomalyResult,
  ConfirmationResult,
  DominanceContext,
  EmissionDecision,
  MarketAction,
  MarketSignal,
  MarketSignalType,
  METRIC_KEYS,
  METRIC_LABELS,
  MetricKey,
  MetricSeries,
  SignalConfidence,
  StatWindowResult,
  TechnicalScore,
  Timeframe,
  TrendConsistency,
  TrendDirection,
} from '../types';
import { EngineConfig } from '../config/schema';
import { AnomalyDetector } from '../engine/AnomalyDetector';
import { ConfirmationScorer } from '../engine/ConfirmationScorer';
import { StatWindowCalculator } from '../engine/StatWindowCalculator';
import { TrendConsistencyChecker } from '../engine/TrendConsistencyChecker';
import { EmissionController } from '../emission/EmissionController';

export interface MarketSnapshot {
  /** Evaluation time, epoch seconds */
  nowSec: number;
  series: Partial<Record<MetricKey, MetricSeries>>;
  technical?: TechnicalScore | null;
}

export interface MetricReading {
  metric: MetricKey;
  current?: number;
  windows: Map<Timeframe, StatWindowResult>;
  consistency: TrendConsistency;
  anomaly: AnomalyResult;
}

export interface SuppressedMarketSignal {
  key: string;
  action: MarketAction;
  decision: EmissionDecision;
}

export interface MarketEvaluation {
  signals: MarketSignal[];
  suppressed: SuppressedMarketSignal[];
  alerts: string[];
  dominance: DominanceContext;
  readings: Partial<Record<MetricKey, MetricReading>>;
}

interface ActionMapping {
  rising: { type: MarketSignalType; action: MarketAction };
  falling: { type: MarketSignalType; action: MarketAction };
}

const METRIC_ACTIONS: Record<MetricKey, ActionMapping> = {
  btcDominance: {
    rising: { type: 'BTC_DOM_SPIKE_UP', action: 'LONG_BTC_SHORT_ALT' },
    falling: { type: 'BTC_DOM_SPIKE_DOWN', action: 'SHORT_BTC_LONG_ALT' },
  },
  stablecoinDominance: {
    rising: { type: 'USDT_DOM_SPIKE_UP', action: 'SHORT_MARKET' },
    falling: { type: 'USDT_DOM_SPIKE_DOWN', action: 'LONG_MARKET' },
  },
  sentiment: {
    rising: { type: 'GREED_SPIKE', action: 'SHORT_OR_TAKE_PROFIT' },
    falling: { type: 'FEAR_SPIKE', action: 'LONG_ACCUMULATE' },
  },
};

const EMISSION_KEYS: Record<MetricKey, string> = {
  btcDominance: 'BTC_DOMINANCE',
  stablecoinDominance: 'STABLECOIN_DOMINANCE',
  sentiment: 'SENTIMENT',
};

export const MARKET_FLOW_KEY = 'MARKET_FLOW';

const MOMENTUM_SHORT: Timeframe = '4h';
const MOMENTUM_LONG: Timeframe = '1d';

const fmt = (value: number, digits: number = 2): string => value.toFixed(digits);

export class DominanceSignalDetector {
  private readonly statCalculator: StatWindowCalculator;
  private readonly anomalyDetector: AnomalyDetector;
  private readonly trendChecker: TrendConsistencyChecker;
  private readonly confirmationScorer: ConfirmationScorer;

  constructor(
    private readonly config: EngineConfig,
    private readonly emission: EmissionController,
    private readonly logger: Logger = Logger.getInstance('signal-engine'),
  ) {
    this.statCalculator = new StatWindowCalculator(config.statWindow);
    this.anomalyDetector = new AnomalyDetector(config.anomaly.mediumRatio);
    this.trendChecker = new TrendConsistencyChecker(config.trendConsistency.minRatio);
    this.confirmationScorer = new ConfirmationScorer(config.confirmation);
  }

  /**
   * Windows, consistency and anomaly for every metric present in the snapshot
   */
  readMetrics(snapshot: MarketSnapshot): Partial<Record<MetricKey, MetricReading>> {
    const { trendConsistency, dominance, anomaly } = this.config;
    const timeframes = Array.from(
      new Set<Timeframe>([
        ...trendConsistency.timeframes,
        dominance.baselineTimeframe,
        dominance.contextTimeframe,
        MOMENTUM_SHORT,
        MOMENTUM_LONG,
      ]),
    );

    const readings: Partial<Record<MetricKey, MetricReading>> = {};
    for (const metric of METRIC_KEYS) {
      const series = snapshot.series[metric];
      if (!series) continue;

      const upToNow = StatWindowCalculator.sliceSeries(series, snapshot.nowSec, Number.POSITIVE_INFINITY);
      const current = upToNow.length > 0 ? upToNow[upToNow.length - 1].value : undefined;
      const windows = this.statCalculator.calculateAll(series, snapshot.nowSec, timeframes);
      const consistency = this.trendChecker.check(
        trendConsistency.timeframes.flatMap((tf) => {
          const result = windows.get(tf);
          return result ? [result] : [];
        }),
      );
      const baseline = windows.get(dominance.baselineTimeframe);
      const result: AnomalyResult =
        current === undefined || baseline === undefined
          ? { evaluated: false, severity: 'none', reason: 'INSUFFICIENT_DATA' }
          : this.anomalyDetector.detect(current, baseline, anomaly.metrics[metric].thresholdStdDev);

      readings[metric] = { metric, current, windows, consistency, anomaly: result };
    }
    return readings;
  }

  /**
   * Dominance direction as the asset scorer and guardrails read it
   */
  dominanceContext(readings: Partial<Record<MetricKey, MetricReading>>): DominanceContext {
    const trendOf = (metric: MetricKey): TrendDirection => {
      const result = readings[metric]?.windows.get(this.config.dominance.contextTimeframe);
      return result?.valid ? result.window.trend : 'neutral';
    };
    const stablecoin = readings.stablecoinDominance?.anomaly;

    return {
      btcDominanceTrend: trendOf('btcDominance'),
      stablecoinDominanceTrend: trendOf('stablecoinDominance'),
      stablecoinSpikeUp:
        stablecoin !== undefined && stablecoin.evaluated && stablecoin.severity === 'high' && stablecoin.zScore > 0,
    };
  }

  async evaluate(snapshot: MarketSnapshot): Promise<MarketEvaluation> {
    const readings = this.readMetrics(snapshot);
    const anomalies: Partial<Record<MetricKey, AnomalyResult>> = {};
    for (const metric of METRIC_KEYS) {
      const reading = readings[metric];
      if (reading) anomalies[metric] = reading.anomaly;
    }

    const evaluation: MarketEvaluation = {
      signals: [],
      suppressed: [],
      alerts: [],
      dominance: this.dominanceContext(readings),
      readings,
    };

    for (const metric of METRIC_KEYS) {
      const reading = readings[metric];
      if (reading) {
        await this.evaluateMetric(reading, anomalies, snapshot, evaluation);
      }
    }
    await this.evaluateMarketFlow(readings, anomalies, snapshot, evaluation);

    return evaluation;
  }

  private async evaluateMetric(
    reading: MetricReading,
    anomalies: Partial<Record<MetricKey, AnomalyResult>>,
    snapshot: MarketSnapshot,
    evaluation: MarketEvaluation,
  ): Promise<void> {
    const { metric, anomaly, consistency, windows } = reading;
    const label = METRIC_LABELS[metric];
    const thresholds = this.config.anomaly.metrics[metric];

    const reversal = this.trendReversal(windows);
    if (reversal) {
      evaluation.alerts.push(`${label}: ${reversal}`);
    }

    if (!anomaly.evaluated) {
      this.logger.debug('Metric skipped', undefined, { metric, reason: anomaly.reason });
      return;
    }

    const bound = this.anomalyDetector.confirmationBoundFor(thresholds);
    if (!this.anomalyDetector.qualifiesForSignal(anomaly, bound, consistency.isConsistent)) {
      if (anomaly.severity === 'medium') {
        evaluation.alerts.push(
          `${label}: ${fmt(anomaly.zScore)} sd deviation without confirmation ` +
            `(bound ${fmt(bound)}, trend consistency ${fmt(consistency.ratio * 100, 0)}%)`,
        );
      }
      return;
    }

    const magnitude = Math.abs(anomaly.zScore);
    const momentumStrong = this.momentumStrong(windows);
    if (magnitude < thresholds.strongZScore && !momentumStrong) {
      evaluation.alerts.push(`${label}: ${fmt(anomaly.zScore)} sd deviation lacks momentum`);
      return;
    }

    const mapping = anomaly.zScore > 0 ? METRIC_ACTIONS[metric].rising : METRIC_ACTIONS[metric].falling;
    const confirmation = this.confirmationScorer.score({
      bias: ACTION_BIAS[mapping.action],
      anomalies,
      technical: snapshot.technical,
    });

    if (!confirmation.meetsThreshold && magnitude < thresholds.strongZScore) {
      evaluation.alerts.push(
        `${label}: ${mapping.type} needs confirmation ` +
          `(${fmt(confirmation.score, 1)}/${fmt(confirmation.minimumRequired, 1)})`,
      );
      return;
    }

    const confidence = this.confidenceFor(magnitude >= thresholds.strongZScore, confirmation, momentumStrong);
    const current = reading.current ?? 0;
    const baseline = windows.get(this.config.dominance.baselineTimeframe);
    const baselineMean = baseline?.valid ? baseline.window.mean : current;
    const reason =
      `${label} at ${fmt(current)} is ${fmt(magnitude)} sd ${anomaly.zScore > 0 ? 'above' : 'below'} ` +
      `its ${this.config.dominance.baselineTimeframe} mean of ${fmt(baselineMean)}`;

    await this.emit(
      {
        key: EMISSION_KEYS[metric],
        signalType: mapping.type,
        action: mapping.action,
        confidence,
        metric,
        value: current,
        zScore: anomaly.zScore,
        confirmation,
        consistencyRatio: consistency.ratio,
        reason,
      },
      snapshot.nowSec,
      evaluation,
    );
  }

  /**
   * Capital outflow when BTC and stablecoin dominance rise together; buying
   * opportunity when all three metrics sit well below their baselines
   */
  private async evaluateMarketFlow(
    readings: Partial<Record<MetricKey, MetricReading>>,
    anomalies: Partial<Record<MetricKey, AnomalyResult>>,
    snapshot: MarketSnapshot,
    evaluation: MarketEvaluation,
  ): Promise<void> {
    const limit = this.config.dominance.combinedZScore;
    const zOf = (metric: MetricKey): number | undefined => {
      const anomaly = readings[metric]?.anomaly;
      return anomaly?.evaluated ? anomaly.zScore : undefined;
    };
    const btc = zOf('btcDominance');
    const usdt = zOf('stablecoinDominance');
    const sentiment = zOf('sentiment');

    let involved: MetricKey[];
    let signalType: MarketSignalType;
    let action: MarketAction;
    if (btc !== undefined && usdt !== undefined && btc >= limit && usdt >= limit) {
      involved = ['btcDominance', 'stablecoinDominance'];
      signalType = 'CAPITAL_OUTFLOW';
      action = 'SHORT_ALL';
    } else if (
      btc !== undefined &&
      usdt !== undefined &&
      sentiment !== undefined &&
      btc <= -limit &&
      usdt <= -limit &&
      sentiment <= -limit
    ) {
      involved = ['btcDominance', 'stablecoinDominance', 'sentiment'];
      signalType = 'BUYING_OPPORTUNITY';
      action = 'LONG_ALL';
    } else {
      return;
    }

    const zScores = involved.map((metric) => zOf(metric) ?? 0);
    const value = involved.reduce((sum, metric) => sum + (readings[metric]?.current ?? 0), 0);
    const consistencyRatio = Math.min(...involved.map((metric) => readings[metric]?.consistency.ratio ?? 0));
    const confirmation = this.confirmationScorer.score({
      bias: ACTION_BIAS[action],
      anomalies,
      technical: snapshot.technical,
    });
    const reason = involved
      .map((metric) => `${METRIC_LABELS[metric]} ${fmt(zOf(metric) ?? 0)} sd`)
      .join(', ');

    await this.emit(
      {
        key: MARKET_FLOW_KEY,
        signalType,
        action,
        confidence: 'HIGH',
        metric: 'combined',
        value,
        zScore: zScores.reduce((sum, z) => sum + z, 0) / zScores.length,
        confirmation,
        consistencyRatio,
        reason,
      },
      snapshot.nowSec,
      evaluation,
    );
  }

  private async emit(
    candidate: {
      key: string;
      signalType: MarketSignalType;
      action: MarketAction;
      confidence: SignalConfidence;
      metric: MarketSignal['metric'];
      value: number;
      zScore: number;
      confirmation: ConfirmationResult;
      consistencyRatio: number;
      reason: string;
    },
    nowSec: number,
    evaluation: MarketEvaluation,
  ): Promise<void> {
    const decision = await this.emission.decide({
      key: candidate.key,
      action: candidate.action,
      confidence: candidate.confidence,
      value: candidate.value,
      timestamp: nowSec,
    });

    if (!decision.emit) {
      evaluation.suppressed.push({ key: candidate.key, action: candidate.action, decision });
      return;
    }

    const signal: MarketSignal = Object.freeze({
      id: uuidv4(),
      signalType: candidate.signalType,
      action: candidate.action,
      confidence: candidate.confidence,
      metric: candidate.metric,
      value: candidate.value,
      zScore: candidate.zScore,
      confirmationScore: candidate.confirmation.score,
      confirmations: Object.freeze([...candidate.confirmation.labels]),
      consistencyRatio: candidate.consistencyRatio,
      reason: candidate.reason,
      emissionReason: decision.reason,
      timestamp: nowSec,
    });
    evaluation.signals.push(signal);
    evaluation.alerts.push(`${signal.signalType}: ${signal.action} (${signal.confidence}) - ${signal.reason}`);
  }

  private confidenceFor(
    strongZ: boolean,
    confirmation: ConfirmationResult,
    momentumStrong: boolean,
  ): SignalConfidence {
    if (strongZ || confirmation.score >= 3) return 'HIGH';
    if (confirmation.meetsThreshold) return momentumStrong ? 'HIGH' : 'MEDIUM';
    return 'MEDIUM';
  }

  private momentumStrong(windows: Map<Timeframe, StatWindowResult>): boolean {
    const short = windows.get(MOMENTUM_SHORT);
    const long = windows.get(MOMENTUM_LONG);
    if (!short?.valid || !long?.valid) return false;
    return this.statCalculator.isMomentumStrong(short.window, long.window);
  }

  private trendReversal(windows: Map<Timeframe, StatWindowResult>): string | undefined {
    const short = windows.get(MOMENTUM_SHORT);
    const long = windows.get(MOMENTUM_LONG);
    if (!short?.valid || !long?.valid) return undefined;

    const shortTrend = short.window.trend;
    const longTrend = long.window.trend;
    if (shortTrend === 'neutral' || longTrend === 'neutral' || shortTrend === longTrend) {
      return undefined;
    }
    return `${MOMENTUM_SHORT} trend (${shortTrend}) turning against ${MOMENTUM_LONG} trend (${longTrend})`;
  }
}
