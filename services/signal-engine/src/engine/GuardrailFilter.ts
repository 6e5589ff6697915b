/**
 * GuardrailFilter - hard vetoes applied after scoring
 *
 * A veto is final for the evaluation cycle. Checks run in a fixed order and
 * the first one that fails is reported. The filter keeps no state, so the
 * same candidate and context always get the same verdict.
 */

import {
  ActiveSignal,
  GuardrailCandidate,
  GuardrailVerdict,
  MarketContext,
  MetricSeries,
  VetoCode,
} from '../types';
import { GuardrailConfig } from '../config/schema';

const veto = (code: VetoCode, reason: string): GuardrailVerdict => ({ allowed: false, code, reason });

export class GuardrailFilter {
  constructor(private readonly config: GuardrailConfig) {}

  evaluate(candidate: GuardrailCandidate, context: MarketContext, nowSec: number): GuardrailVerdict {
    if (context.btcCrashActive) {
      return veto('BTC_CRASH', 'BTC crash condition active');
    }

    if (!this.liquidityPasses(context)) {
      return veto(
        'LOW_LIQUIDITY',
        `Liquidity below minimum of ${this.config.minLiquidityUsd} USD`,
      );
    }

    if (candidate.direction === 'LONG' && context.dominance.stablecoinSpikeUp) {
      return veto('RISK_OFF', 'Stablecoin dominance spiking up (risk-off), LONG blocked');
    }

    if (
      candidate.assetClass === 'ALT' &&
      candidate.direction === 'LONG' &&
      context.dominance.btcDominanceTrend === 'up'
    ) {
      return veto('BTC_DOMINANCE_RISING', 'BTC dominance rising, altcoin LONG blocked');
    }

    const active = this.activeSignals(context.activeSignals ?? [], nowSec);

    const inFlight = active.find((signal) => signal.asset === candidate.asset);
    if (inFlight) {
      return veto(
        'SIGNAL_IN_FLIGHT',
        `${candidate.asset} already has an active ${inFlight.direction} signal`,
      );
    }

    const conflict = active.find((signal) => this.conflicts(candidate, context, signal));
    if (conflict) {
      return veto(
        'CONFLICTING_SIGNAL',
        `Conflicts with active ${conflict.direction} signal on correlated ${conflict.asset}`,
      );
    }

    return { allowed: true };
  }

  /**
   * Price drop of at least crashDropPct between the oldest and newest prices
   * inside the crash window
   */
  detectBtcCrash(prices: MetricSeries, nowSec: number): boolean {
    const from = nowSec - this.config.crashWindowSec;
    const window = prices.filter(
      (sample) => sample.timestamp >= from && sample.timestamp <= nowSec && Number.isFinite(sample.value),
    );
    if (window.length < 2) return false;

    const oldest = window[0].value;
    const newest = window[window.length - 1].value;
    if (oldest <= 0) return false;

    const changePct = ((newest - oldest) / oldest) * 100;
    return changePct <= -this.config.crashDropPct;
  }

  private liquidityPasses(context: MarketContext): boolean {
    if (context.liquidityPass !== undefined) return context.liquidityPass;
    if (context.liquidityUsd === undefined) return true;
    return context.liquidityUsd >= this.config.minLiquidityUsd;
  }

  private activeSignals(signals: readonly ActiveSignal[], nowSec: number): ActiveSignal[] {
    return signals.filter(
      (signal) =>
        signal.emittedAt <= nowSec && nowSec - signal.emittedAt < this.config.activeSignalWindowSec,
    );
  }

  /**
   * Opposite direction across the BTC/altcoin divide, with the altcoin
   * correlated to BTC at or above the threshold
   */
  private conflicts(candidate: GuardrailCandidate, context: MarketContext, signal: ActiveSignal): boolean {
    if (signal.direction === candidate.direction) return false;
    if (signal.assetClass === candidate.assetClass) return false;

    const correlation = candidate.assetClass === 'ALT' ? context.btcCorrelation : signal.btcCorrelation;
    return correlation !== undefined && correlation >= this.config.correlationThreshold;
  }
}
