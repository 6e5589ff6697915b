/**
 * Unit tests for TrendConsistencyChecker
 */

import { TrendConsistencyChecker } from '../../src/engine/TrendConsistencyChecker';
import { INVALID_WINDOW, trendWindow } from '../helpers/builders';

describe('TrendConsistencyChecker', () => {
  const checker = new TrendConsistencyChecker(0.6);

  it('should report a clear majority as consistent', () => {
    const result = checker.check([trendWindow('up'), trendWindow('up'), trendWindow('up'), trendWindow('down')]);

    expect(result).toEqual({ isConsistent: true, ratio: 0.75, dominantTrend: 'up', validCount: 4 });
  });

  it('should accept a ratio exactly at the minimum', () => {
    const result = checker.check([
      trendWindow('down'),
      trendWindow('down'),
      trendWindow('down'),
      trendWindow('neutral'),
      trendWindow('up'),
    ]);

    expect(result.isConsistent).toBe(true);
    expect(result.ratio).toBeCloseTo(0.6, 10);
    expect(result.dominantTrend).toBe('down');
  });

  it('should not let neutral windows form a majority', () => {
    const result = checker.check([trendWindow('up'), trendWindow('up'), trendWindow('neutral'), trendWindow('neutral')]);

    expect(result).toEqual({ isConsistent: false, ratio: 0.5, dominantTrend: 'up', validCount: 4 });
  });

  it('should report a tie as neutral', () => {
    const result = checker.check([trendWindow('up'), trendWindow('down')]);

    expect(result).toEqual({ isConsistent: false, ratio: 0.5, dominantTrend: 'neutral', validCount: 2 });
  });

  it('should leave invalid windows out of the ratio', () => {
    const result = checker.check([trendWindow('up'), trendWindow('up'), INVALID_WINDOW, INVALID_WINDOW]);

    expect(result).toEqual({ isConsistent: true, ratio: 1, dominantTrend: 'up', validCount: 2 });
  });

  it('should need at least two valid windows', () => {
    expect(checker.check([trendWindow('up'), INVALID_WINDOW])).toEqual({
      isConsistent: false,
      ratio: 0,
      dominantTrend: 'neutral',
      validCount: 1,
    });
    expect(checker.check([])).toEqual({ isConsistent: false, ratio: 0, dominantTrend: 'neutral', validCount: 0 });
  });
});
