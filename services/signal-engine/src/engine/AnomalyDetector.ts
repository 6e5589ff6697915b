/**
 * AnomalyDetector - classifies a current value against a baseline window
 */

import { AnomalyResult, StatWindowResult } from '../types';
import { MetricThresholds } from '../config/schema';

export class AnomalyDetector {
  constructor(private readonly mediumRatio: number) {}

  /**
   * high at |z| >= threshold, medium at |z| >= threshold x mediumRatio, low below.
   * Invalid or flat baselines are skipped, never scored.
   */
  detect(current: number, baseline: StatWindowResult, thresholdStdDev: number): AnomalyResult {
    if (!baseline.valid) {
      return { evaluated: false, severity: 'none', reason: 'INSUFFICIENT_DATA' };
    }

    const { mean, stdDev } = baseline.window;
    if (stdDev === 0 || !Number.isFinite(stdDev) || !Number.isFinite(current)) {
      return { evaluated: false, severity: 'none', reason: 'DEGENERATE_STATISTICS' };
    }

    const zScore = (current - mean) / stdDev;
    const magnitude = Math.abs(zScore);

    if (magnitude >= thresholdStdDev) {
      return { evaluated: true, severity: 'high', zScore };
    }
    if (magnitude >= thresholdStdDev * this.mediumRatio) {
      return { evaluated: true, severity: 'medium', zScore };
    }
    return { evaluated: true, severity: 'low', zScore };
  }

  confirmationBoundFor(thresholds: MetricThresholds): number {
    return thresholds.confirmationBound ?? thresholds.thresholdStdDev * this.mediumRatio;
  }

  /**
   * High severity always qualifies; medium only past the confirmation bound
   * and with the timeframes agreeing on trend.
   */
  qualifiesForSignal(result: AnomalyResult, confirmationBound: number, trendConsistent: boolean): boolean {
    if (!result.evaluated) return false;
    if (result.severity === 'high') return true;
    return result.severity === 'medium' && trendConsistent && Math.abs(result.zScore) >= confirmationBound;
  }
}
