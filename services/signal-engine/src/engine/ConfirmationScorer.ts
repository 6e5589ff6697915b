/**
 * ConfirmationScorer - counts independent signals that agree with a hypothesis
 *
 * Each metric with a high or medium anomaly adds one point when its direction
 * supports the hypothesis bias. Dominance and sentiment all read the same
 * way: a falling reading is bullish (capital leaving BTC and stablecoins,
 * fear to buy into), a rising one bearish. A technical score with the
 * matching sign adds up to one more point.
 */

import {
  AnomalyResult,
  Bias,
  Confirmation,
  ConfirmationResult,
  MetricKey,
  METRIC_KEYS,
  TechnicalDetails,
  TechnicalScore,
} from '../types';
import { ConfirmationConfig } from '../config/schema';

const METRIC_LABEL_PREFIX: Record<MetricKey, { rising: string; falling: string }> = {
  btcDominance: { rising: 'BTC_DOM_UP', falling: 'BTC_DOM_DOWN' },
  stablecoinDominance: { rising: 'USDT_DOM_UP', falling: 'USDT_DOM_DOWN' },
  sentiment: { rising: 'EXTREME_GREED', falling: 'EXTREME_FEAR' },
};

/** Readings strictly past `threshold` in magnitude are labelled */
const DETAIL_LABELS: Record<keyof TechnicalDetails, { bullish: string; bearish: string; threshold: number }> = {
  rsi: { bullish: 'RSI_BULLISH', bearish: 'RSI_BEARISH', threshold: 0.5 },
  macd: { bullish: 'MACD_BULLISH', bearish: 'MACD_BEARISH', threshold: 0.5 },
  bollinger: { bullish: 'BB_OVERSOLD', bearish: 'BB_OVERBOUGHT', threshold: 0.3 },
  volume: { bullish: 'VOLUME_BULLISH', bearish: 'VOLUME_BEARISH', threshold: 0.3 },
  wyckoff: { bullish: 'WYCKOFF_ACCUMULATION', bearish: 'WYCKOFF_DISTRIBUTION', threshold: 0.3 },
  dow: { bullish: 'DOW_BULLISH', bearish: 'DOW_BEARISH', threshold: 0.3 },
};

const DETAIL_KEYS: readonly (keyof TechnicalDetails)[] = ['rsi', 'macd', 'bollinger', 'volume', 'wyckoff', 'dow'];

export interface ConfirmationInput {
  bias: Bias;
  anomalies: Partial<Record<MetricKey, AnomalyResult>>;
  technical?: TechnicalScore | null;
}

export function metricBias(zScore: number): Bias {
  return zScore > 0 ? 'bearish' : 'bullish';
}

export class ConfirmationScorer {
  constructor(private readonly config: ConfirmationConfig) {}

  score(input: ConfirmationInput): ConfirmationResult {
    const confirmations: Confirmation[] = [];

    for (const metric of METRIC_KEYS) {
      const anomaly = input.anomalies[metric];
      if (!anomaly || !anomaly.evaluated) continue;
      if (anomaly.severity !== 'high' && anomaly.severity !== 'medium') continue;

      const direction = metricBias(anomaly.zScore);
      if (direction !== input.bias) continue;

      const labels = METRIC_LABEL_PREFIX[metric];
      confirmations.push({
        source: metric,
        direction,
        weight: 1,
        label: anomaly.zScore > 0 ? labels.rising : labels.falling,
      });
    }

    const technical = input.technical ?? null;
    const hasTechnical = technical !== null && Number.isFinite(technical.score);
    if (technical !== null && hasTechnical) {
      const direction: Bias | null = technical.score > 0 ? 'bullish' : technical.score < 0 ? 'bearish' : null;
      if (direction === input.bias) {
        confirmations.push({
          source: 'technical',
          direction,
          weight: Math.min(1, Math.abs(technical.score) / this.config.technicalFullCreditAt),
          label: direction === 'bullish' ? 'TECH_BULLISH' : 'TECH_BEARISH',
        });
      }
      confirmations.push(...this.detailConfirmations(technical.details, input.bias));
    }

    const score = confirmations.reduce((sum, confirmation) => sum + confirmation.weight, 0);
    const minimumRequired = hasTechnical ? this.config.minScoreWithTechnical : this.config.minScore;

    return {
      score,
      confirmations,
      labels: confirmations.map((confirmation) => confirmation.label),
      minimumRequired,
      meetsThreshold: score >= minimumRequired,
    };
  }

  /**
   * Zero-weight labels naming which indicators agree with the bias
   */
  private detailConfirmations(details: TechnicalDetails, bias: Bias): Confirmation[] {
    const result: Confirmation[] = [];
    for (const key of DETAIL_KEYS) {
      const reading = details[key];
      if (reading === undefined) continue;
      const labels = DETAIL_LABELS[key];
      if (bias === 'bullish' && reading > labels.threshold) {
        result.push({ source: 'technical', direction: bias, weight: 0, label: labels.bullish });
      } else if (bias === 'bearish' && reading < -labels.threshold) {
        result.push({ source: 'technical', direction: bias, weight: 0, label: labels.bearish });
      }
    }
    return result;
  }
}
