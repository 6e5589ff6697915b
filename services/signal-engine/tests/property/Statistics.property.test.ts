/**
 * Property-Based Tests for the statistics pipeline
 *
 * Windows with too few samples are never scored, flat baselines never
 * produce a z-score, and technical readings stay inside [-1, 1].
 */

import * as fc from 'fast-check';

import { StatWindowCalculator } from '../../src/engine/StatWindowCalculator';
import { AnomalyDetector } from '../../src/engine/AnomalyDetector';
import { TrendConsistencyChecker } from '../../src/engine/TrendConsistencyChecker';
import { calculateTechnicalScore } from '../../src/analysis/TechnicalScore';
import { Candle, TrendDirection } from '../../src/types';
import { seriesFrom, testConfig, trendWindow } from '../helpers/builders';

const valueArbitrary = fc.double({ min: 0.01, max: 1_000, noNaN: true });

const candlesArbitrary: fc.Arbitrary<Candle[]> = fc
  .array(fc.record({ close: valueArbitrary, volume: fc.double({ min: 1, max: 1e6, noNaN: true }) }), {
    minLength: 0,
    maxLength: 80,
  })
  .map((bars) =>
    bars.map((bar, i) => {
      const open = i === 0 ? bar.close : bars[i - 1].close;
      return {
        timestamp: i * 3_600,
        open,
        high: Math.max(open, bar.close) * 1.01,
        low: Math.min(open, bar.close) * 0.99,
        close: bar.close,
        volume: bar.volume,
      };
    }),
  );

describe('Statistics Property Tests', () => {
  const config = testConfig();
  const calculator = new StatWindowCalculator(config.statWindow);
  const detector = new AnomalyDetector(config.anomaly.mediumRatio);

  it('should never score a window with fewer samples than required', () => {
    fc.assert(
      fc.property(fc.array(valueArbitrary, { maxLength: 19 }), (values) => {
        const result = calculator.calculate(seriesFrom(values));

        expect(result.valid).toBe(false);
        expect(detector.detect(values[values.length - 1] ?? 0, result, 1.5)).toEqual({
          evaluated: false,
          severity: 'none',
          reason: 'INSUFFICIENT_DATA',
        });
      }),
    );
  });

  it('should treat a flat baseline as degenerate', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 1_000 }),
        fc.integer({ min: 20, max: 60 }),
        valueArbitrary,
        (level, count, current) => {
          const baseline = calculator.calculate(seriesFrom(Array.from({ length: count }, () => level)));

          expect(baseline.valid).toBe(true);
          expect(detector.detect(current, baseline, 1.5)).toMatchObject({
            evaluated: false,
            reason: 'DEGENERATE_STATISTICS',
          });
        },
      ),
    );
  });

  it('should keep the window range around the mean', () => {
    fc.assert(
      fc.property(fc.array(valueArbitrary, { minLength: 20, maxLength: 60 }), (values) => {
        const result = calculator.calculate(seriesFrom(values));
        if (!result.valid) throw new Error('expected a valid window');

        const { min, max, mean, stdDev, trendStrength } = result.window;
        expect(min).toBeLessThanOrEqual(mean + 1e-9);
        expect(max).toBeGreaterThanOrEqual(mean - 1e-9);
        expect(stdDev).toBeGreaterThanOrEqual(0);
        expect(trendStrength).toBeGreaterThanOrEqual(0);
        expect(trendStrength).toBeLessThanOrEqual(1);
      }),
    );
  });

  it('should keep trend consistency ratios within [0, 1]', () => {
    const checker = new TrendConsistencyChecker(config.trendConsistency.minRatio);

    fc.assert(
      fc.property(fc.array(fc.constantFrom<TrendDirection>('up', 'down', 'neutral')), (trends) => {
        const result = checker.check(trends.map(trendWindow));

        expect(result.ratio).toBeGreaterThanOrEqual(0);
        expect(result.ratio).toBeLessThanOrEqual(1);
        expect(result.validCount).toBe(trends.length);
        if (result.isConsistent) {
          expect(result.dominantTrend).not.toBe('neutral');
        }
      }),
    );
  });

  it('should keep the technical score and its details within [-1, 1]', () => {
    fc.assert(
      fc.property(candlesArbitrary, (candles) => {
        const result = calculateTechnicalScore(candles);
        if (result === undefined) return;

        expect(result.score).toBeGreaterThanOrEqual(-1);
        expect(result.score).toBeLessThanOrEqual(1);
        for (const value of Object.values(result.details)) {
          expect(value).toBeGreaterThanOrEqual(-1);
          expect(value).toBeLessThanOrEqual(1);
        }
      }),
    );
  });
});
