/**
 * SignalEngine - orchestrates one evaluation cycle
 *
 * Market cycle: metric series -> stat windows -> anomalies -> confirmation
 * -> emission, producing market-wide signals and the dominance context.
 *
 * Asset cycle: candles -> timeframe analysis -> LONG and SHORT scoring ->
 * guardrails -> emission, producing at most one signal per asset.
 *
 * The engine never throws on missing or noisy data; every outcome carries
 * its reasons. Only store failures reach the caller.
 */

import { v4 as uuidv4 } from 'uuid';
import { Clock, epochSeconds, KeyedMutex, Logger, SystemClock } from '@market-pulse/shared';

import {
  AssetAnalysis,
  AssetClass,
  Candle,
  EmissionDecision,
  MarketContext,
  MetricSeries,
  MultiFactorScore,
  PriceRange,
  SafetyMetrics,
  Signal,
  SignalDirection,
  TechnicalScore,
  Timeframe,
  VetoCode,
} from './types';
import { createEngineConfig } from './config/ConfigLoader';
import { EngineConfig } from './config/schema';
import { analyzeAsset } from './analysis/TimeframeAnalyzer';
import { calculateTechnicalScore } from './analysis/TechnicalScore';
import { GuardrailFilter } from './engine/GuardrailFilter';
import { MultiFactorScorer } from './engine/MultiFactorScorer';
import { EmissionController } from './emission/EmissionController';
import { SignalHistoryStore } from './emission/SignalHistoryStore';
import { DominanceSignalDetector, MarketEvaluation, MarketSnapshot } from './detectors/DominanceSignalDetector';
import { SignalEventBus } from './events/SignalEventBus';

export interface SignalEngineDeps {
  store?: SignalHistoryStore;
  clock?: Clock;
  logger?: Logger;
  events?: SignalEventBus;
}

export interface MarketSnapshotInput {
  nowSec?: number;
  series: MarketSnapshot['series'];
  /** Precomputed technical score; derived from btcCandles when omitted */
  technical?: TechnicalScore | null;
  btcCandles?: readonly Candle[];
}

export interface AssetEvaluationInput {
  asset: string;
  assetClass?: AssetClass;
  /** Candles per timeframe, ascending; ignored when analysis is given */
  candles?: Partial<Record<Timeframe, readonly Candle[]>>;
  analysis?: AssetAnalysis;
  safety?: SafetyMetrics;
  market: MarketContext;
  nowSec?: number;
}

/** ERROR only comes back from evaluateAssets, for an asset whose evaluation rejected */
export type AssetOutcome = 'EMITTED' | 'SUPPRESSED' | 'VETOED' | 'NO_SIGNAL' | 'ERROR';

export interface AssetDecision {
  asset: string;
  outcome: AssetOutcome;
  signal?: Signal;
  scores: MultiFactorScore[];
  emission?: EmissionDecision;
  veto?: { direction: SignalDirection; code: VetoCode; reason: string };
  reasons: string[];
}

export interface TradeLevels {
  entryRange: PriceRange;
  stopLoss: number;
  takeProfits: number[];
}

/** Emission key for directional signals on one asset */
export function assetSignalKey(asset: string): string {
  return `ASSET:${asset.toUpperCase()}`;
}

const PRICE_TIMEFRAMES: readonly Timeframe[] = ['4h', '1h', '8h', '1d', '3d', '1w', '1M'];

export class SignalEngine {
  readonly events: SignalEventBus;
  private readonly config: EngineConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly scorer: MultiFactorScorer;
  private readonly guardrails: GuardrailFilter;
  private readonly emission: EmissionController;
  private readonly dominanceDetector: DominanceSignalDetector;

  constructor(config: EngineConfig = createEngineConfig(), deps: SignalEngineDeps = {}) {
    this.config = config;
    this.clock = deps.clock ?? new SystemClock();
    this.logger = deps.logger ?? Logger.getInstance('signal-engine');
    this.events = deps.events ?? new SignalEventBus();
    this.scorer = new MultiFactorScorer(config.scoring);
    this.guardrails = new GuardrailFilter(config.guardrails);
    this.emission = new EmissionController(config.emission, {
      store: deps.store,
      clock: this.clock,
      logger: this.logger,
      mutex: new KeyedMutex(),
    });
    this.dominanceDetector = new DominanceSignalDetector(config, this.emission, this.logger.child('dominance-detector'));
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  classifyAsset(asset: string): AssetClass {
    const symbol = asset.toUpperCase();
    return this.config.btcSymbols.some((btc) => btc.toUpperCase() === symbol) ? 'BTC' : 'ALT';
  }

  /**
   * Entry band around the price, stop and take-profit levels by direction
   */
  buildTradeLevels(price: number, direction: SignalDirection): TradeLevels {
    const { entryBandPct, stopLossPct, takeProfitPcts } = this.config.risk;
    const sign = direction === 'LONG' ? 1 : -1;
    return {
      entryRange: {
        min: price * (1 - entryBandPct / 100),
        max: price * (1 + entryBandPct / 100),
      },
      stopLoss: price * (1 - (sign * stopLossPct) / 100),
      takeProfits: takeProfitPcts.map((pct) => price * (1 + (sign * pct) / 100)),
    };
  }

  detectBtcCrash(prices: MetricSeries, nowSec?: number): boolean {
    return this.guardrails.detectBtcCrash(prices, nowSec ?? epochSeconds(this.clock));
  }

  async evaluateMarket(input: MarketSnapshotInput): Promise<MarketEvaluation> {
    const nowSec = input.nowSec ?? epochSeconds(this.clock);
    const technical =
      input.technical !== undefined
        ? input.technical
        : input.btcCandles
          ? calculateTechnicalScore(input.btcCandles) ?? null
          : null;

    const evaluation = await this.dominanceDetector.evaluate({ nowSec, series: input.series, technical });

    for (const signal of evaluation.signals) {
      this.logger.info(`Market signal ${signal.signalType}: ${signal.action}`, signal.id, {
        confidence: signal.confidence,
        zScore: signal.zScore,
        emissionReason: signal.emissionReason,
      });
      this.events.emitEvent('MARKET_SIGNAL_EMITTED', { signal, timestamp: nowSec });
    }
    for (const suppressed of evaluation.suppressed) {
      this.events.emitEvent('SIGNAL_SUPPRESSED', {
        key: suppressed.key,
        action: suppressed.action,
        reason: suppressed.decision.reason,
        valueChange: suppressed.decision.valueChange,
        timestamp: nowSec,
      });
    }
    for (const message of evaluation.alerts) {
      this.events.emitEvent('ALERT', { message, timestamp: nowSec });
    }

    return evaluation;
  }

  async evaluateAsset(input: AssetEvaluationInput): Promise<AssetDecision> {
    const nowSec = input.nowSec ?? epochSeconds(this.clock);
    const correlationId = Logger.generateCorrelationId();
    const timerId = this.logger.startTimer('evaluateAsset', correlationId, { asset: input.asset });

    try {
      return await this.runAssetCycle(input, nowSec, correlationId);
    } finally {
      this.logger.endTimer(timerId);
    }
  }

  /**
   * Evaluate several assets concurrently. Same-key emission decisions are
   * serialised by the emission controller. A failing asset comes back as an
   * ERROR outcome; the other decisions are still returned.
   */
  async evaluateAssets(inputs: readonly AssetEvaluationInput[]): Promise<AssetDecision[]> {
    const settled = await Promise.allSettled(inputs.map((input) => this.evaluateAsset(input)));

    return settled.map((result, index): AssetDecision => {
      if (result.status === 'fulfilled') return result.value;

      const asset = inputs[index].asset;
      const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      this.logger.error(`Evaluation failed for ${asset}`, error, undefined, { asset });
      return { asset, outcome: 'ERROR', scores: [], reasons: [error.message] };
    });
  }

  private async runAssetCycle(
    input: AssetEvaluationInput,
    nowSec: number,
    correlationId: string,
  ): Promise<AssetDecision> {
    const asset = input.asset;
    const assetClass = input.assetClass ?? this.classifyAsset(asset);
    const analysis = input.analysis ?? analyzeAsset(input.candles ?? {});

    const directions: SignalDirection[] = ['LONG', 'SHORT'];
    const scores = directions.map((direction) =>
      this.scorer.score({
        assetClass,
        direction,
        analysis,
        dominance: input.market.dominance,
        safety: input.safety,
      }),
    );

    const candidates = scores
      .filter((score) => score.confidence !== 'NONE')
      .sort((a, b) => b.total - a.total);

    if (candidates.length === 0) {
      const reasons = scores.map((score) =>
        score.gateReason
          ? `${score.direction}: ${score.gateReason}`
          : `${score.direction}: score ${score.total} below ${this.config.scoring.mediumThreshold}`,
      );
      this.logger.debug('No qualifying direction', correlationId, { asset, reasons });
      return { asset, outcome: 'NO_SIGNAL', scores, reasons };
    }

    let firstVeto: AssetDecision['veto'];
    for (const candidate of candidates) {
      const guardrailCandidate = { asset, assetClass, direction: candidate.direction };
      const verdict = this.guardrails.evaluate(guardrailCandidate, input.market, nowSec);

      if (!verdict.allowed) {
        firstVeto = firstVeto ?? { direction: candidate.direction, code: verdict.code, reason: verdict.reason };
        this.logger.info(`Guardrail veto for ${asset} ${candidate.direction}`, correlationId, {
          code: verdict.code,
          reason: verdict.reason,
        });
        this.events.emitEvent('SIGNAL_VETOED', {
          candidate: guardrailCandidate,
          code: verdict.code,
          reason: verdict.reason,
          timestamp: nowSec,
        });
        continue;
      }

      return this.emitCandidate(asset, assetClass, candidate, analysis, scores, nowSec, correlationId);
    }

    return {
      asset,
      outcome: 'VETOED',
      scores,
      veto: firstVeto,
      reasons: firstVeto ? [firstVeto.reason] : [],
    };
  }

  private async emitCandidate(
    asset: string,
    assetClass: AssetClass,
    score: MultiFactorScore,
    analysis: AssetAnalysis,
    scores: MultiFactorScore[],
    nowSec: number,
    correlationId: string,
  ): Promise<AssetDecision> {
    const price = this.currentPrice(analysis);
    if (price === undefined) {
      return { asset, outcome: 'NO_SIGNAL', scores, reasons: ['No current price available'] };
    }

    const key = assetSignalKey(asset);
    const decision = await this.emission.decide({
      key,
      action: score.direction,
      confidence: score.confidence,
      value: score.total,
      timestamp: nowSec,
    });

    if (!decision.emit) {
      this.events.emitEvent('SIGNAL_SUPPRESSED', {
        key,
        asset,
        action: score.direction,
        reason: decision.reason,
        valueChange: decision.valueChange,
        timestamp: nowSec,
      });
      return {
        asset,
        outcome: 'SUPPRESSED',
        scores,
        emission: decision,
        reasons: [`${score.direction} suppressed by emission rules`],
      };
    }

    const levels = this.buildTradeLevels(price, score.direction);
    const signal: Signal = Object.freeze({
      id: uuidv4(),
      asset,
      assetClass,
      direction: score.direction,
      score: score.total,
      confidence: score.confidence,
      reasons: Object.freeze([...score.reasons]),
      entryRange: Object.freeze(levels.entryRange),
      stopLoss: levels.stopLoss,
      takeProfits: Object.freeze(levels.takeProfits),
      timestamp: nowSec,
      emissionReason: decision.reason,
    });

    this.logger.info(`Signal ${signal.direction} ${asset} (${signal.confidence}, ${signal.score})`, correlationId, {
      signalId: signal.id,
      emissionReason: decision.reason,
    });
    this.events.emitEvent('SIGNAL_EMITTED', { signal, score, timestamp: nowSec });

    return {
      asset,
      outcome: 'EMITTED',
      signal,
      scores,
      emission: decision,
      reasons: [...score.reasons],
    };
  }

  private currentPrice(analysis: AssetAnalysis): number | undefined {
    for (const timeframe of PRICE_TIMEFRAMES) {
      const price = analysis[timeframe]?.currentPrice;
      if (price !== undefined && Number.isFinite(price) && price > 0) return price;
    }
    return undefined;
  }
}
