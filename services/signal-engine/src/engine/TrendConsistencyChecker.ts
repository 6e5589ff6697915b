import { StatWindowResult, TrendConsistency, TrendDirection } from '../types';

/**
 * Checks whether several timeframes agree on trend direction.
 * Invalid windows count neither for nor against.
 */
export class TrendConsistencyChecker {
  constructor(private readonly minRatio: number) {}

  check(windows: Iterable<StatWindowResult>): TrendConsistency {
    let up = 0;
    let down = 0;
    let validCount = 0;

    for (const result of windows) {
      if (!result.valid) continue;
      validCount++;
      if (result.window.trend === 'up') up++;
      else if (result.window.trend === 'down') down++;
    }

    if (validCount < 2) {
      return { isConsistent: false, ratio: 0, dominantTrend: 'neutral', validCount };
    }

    const ratio = Math.max(up, down) / validCount;
    const dominantTrend: TrendDirection = up > down ? 'up' : down > up ? 'down' : 'neutral';

    return {
      isConsistent: dominantTrend !== 'neutral' && ratio >= this.minRatio,
      ratio,
      dominantTrend,
      validCount,
    };
  }
}
