/**
 * Unit tests for EmissionController
 */

import { ManualClock } from '@market-pulse/shared';

import { decideEmission, EmissionController, EmissionRequest, relativeChange } from '../../src/emission/EmissionController';
import { InMemorySignalHistoryStore, SignalHistoryStore } from '../../src/emission/SignalHistoryStore';
import { EmissionReason, SignalHistoryEntry } from '../../src/types';
import { HOUR, NOW_SEC, testConfig } from '../helpers/builders';

/**
 * Store that yields to the event loop on every call, so unguarded
 * read-then-write sequences would interleave
 */
class SlowStore implements SignalHistoryStore {
  readonly inner = new InMemorySignalHistoryStore();
  puts = 0;

  private tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }

  async get(key: string): Promise<SignalHistoryEntry | undefined> {
    await this.tick();
    return this.inner.get(key);
  }

  async put(key: string, entry: SignalHistoryEntry): Promise<void> {
    await this.tick();
    this.puts++;
    await this.inner.put(key, entry);
  }

  async delete(key: string): Promise<void> {
    await this.tick();
    await this.inner.delete(key);
  }

  async keys(): Promise<string[]> {
    return this.inner.keys();
  }
}

describe('EmissionController', () => {
  const config = testConfig().emission;
  let store: InMemorySignalHistoryStore;
  let controller: EmissionController;

  beforeEach(() => {
    store = new InMemorySignalHistoryStore();
    controller = new EmissionController(config, { store });
  });

  const request = (overrides: Partial<EmissionRequest> = {}): EmissionRequest => ({
    key: 'BTC_LONG',
    action: 'LONG',
    confidence: 'HIGH',
    value: 100,
    timestamp: NOW_SEC,
    ...overrides,
  });

  describe('decide', () => {
    it('should emit the first signal for a key as NEW and record it', async () => {
      const decision = await controller.decide(request());

      expect(decision).toEqual({ emit: true, reason: EmissionReason.NEW });
      expect(await controller.getHistory('BTC_LONG')).toEqual({
        signalType: 'BTC_LONG',
        lastAction: 'LONG',
        lastConfidence: 'HIGH',
        lastValue: 100,
        lastEmittedAt: NOW_SEC,
        lastEvaluatedAt: NOW_SEC,
      });
    });

    it('should suppress a repeat inside the cooldown with a small value change', async () => {
      await controller.decide(request());

      const decision = await controller.decide(request({ value: 105, timestamp: NOW_SEC + HOUR }));

      expect(decision.emit).toBe(false);
      expect(decision.reason).toBe(EmissionReason.SUPPRESSED);
      expect(decision.valueChange).toBeCloseTo(0.05, 10);
    });

    it('should only touch lastEvaluatedAt when suppressing', async () => {
      await controller.decide(request());
      await controller.decide(request({ value: 105, timestamp: NOW_SEC + HOUR }));

      expect(await controller.getHistory('BTC_LONG')).toEqual({
        signalType: 'BTC_LONG',
        lastAction: 'LONG',
        lastConfidence: 'HIGH',
        lastValue: 100,
        lastEmittedAt: NOW_SEC,
        lastEvaluatedAt: NOW_SEC + HOUR,
      });
    });

    it('should emit a reversal inside the cooldown', async () => {
      await controller.decide(request());

      const decision = await controller.decide(request({ action: 'SHORT', timestamp: NOW_SEC + 30 * 60 }));

      expect(decision).toEqual({ emit: true, reason: EmissionReason.REVERSAL, valueChange: 0 });
      expect((await controller.getHistory('BTC_LONG'))?.lastAction).toBe('SHORT');
    });

    it('should emit again once the cooldown has passed', async () => {
      await controller.decide(request());

      const decision = await controller.decide(request({ timestamp: NOW_SEC + 5 * HOUR }));

      expect(decision).toEqual({ emit: true, reason: EmissionReason.COOLDOWN_EXPIRED, valueChange: 0 });
    });

    it('should emit on a value change past the threshold', async () => {
      await controller.decide(request());

      const decision = await controller.decide(request({ value: 140, timestamp: NOW_SEC + HOUR }));

      expect(decision.emit).toBe(true);
      expect(decision.reason).toBe(EmissionReason.VALUE_CHANGE);
      expect(decision.valueChange).toBeCloseTo(0.4, 10);
    });

    it('should emit a confidence upgrade', async () => {
      await controller.decide(request({ confidence: 'MEDIUM' }));

      const decision = await controller.decide(request({ confidence: 'HIGH', timestamp: NOW_SEC + HOUR }));

      expect(decision.reason).toBe(EmissionReason.CONFIDENCE_UPGRADE);
    });

    it('should not emit a confidence downgrade', async () => {
      await controller.decide(request());

      const decision = await controller.decide(request({ confidence: 'MEDIUM', timestamp: NOW_SEC + HOUR }));

      expect(decision.reason).toBe(EmissionReason.SUPPRESSED);
    });

    it('should keep keys independent', async () => {
      await controller.decide(request());

      const decision = await controller.decide(request({ key: 'ETH_LONG', timestamp: NOW_SEC + HOUR }));

      expect(decision.reason).toBe(EmissionReason.NEW);
      expect(store.size).toBe(2);
    });

    it('should read the clock when no timestamp is given', async () => {
      const clock = new ManualClock(NOW_SEC * 1000 + 999);
      const clocked = new EmissionController(config, { store, clock });

      await clocked.decide({ key: 'SENTIMENT', action: 'LONG_ACCUMULATE', confidence: 'MEDIUM', value: 12 });

      expect((await store.get('SENTIMENT'))?.lastEmittedAt).toBe(NOW_SEC);
    });

    it('should treat stale records as absent when staleness is configured', async () => {
      const stale = new EmissionController(testConfig({ emission: { staleRecordMaxAgeSec: HOUR } }).emission, {
        store,
      });
      await stale.decide(request());

      const decision = await stale.decide(request({ timestamp: NOW_SEC + 2 * HOUR }));

      expect(decision).toEqual({ emit: true, reason: EmissionReason.NEW });
    });

    it('should serialise concurrent decisions on the same key', async () => {
      const slow = new SlowStore();
      const guarded = new EmissionController(config, { store: slow });

      const decisions = await Promise.all([
        guarded.decide(request()),
        guarded.decide(request()),
        guarded.decide(request()),
      ]);

      expect(decisions.map((d) => d.reason)).toEqual([
        EmissionReason.NEW,
        EmissionReason.SUPPRESSED,
        EmissionReason.SUPPRESSED,
      ]);
      expect(decisions.filter((d) => d.emit)).toHaveLength(1);
      expect(slow.puts).toBe(3);
    });

    it('should pass store failures to the caller and release the key', async () => {
      const failing = new SlowStore();
      jest.spyOn(failing, 'get').mockRejectedValueOnce(new Error('store unavailable'));
      const guarded = new EmissionController(config, { store: failing });

      await expect(guarded.decide(request())).rejects.toThrow('store unavailable');
      await expect(guarded.decide(request())).resolves.toEqual({ emit: true, reason: EmissionReason.NEW });
    });
  });

  describe('clearHistory', () => {
    it('should forget the key so the next decision is NEW', async () => {
      await controller.decide(request());
      await controller.clearHistory('BTC_LONG');

      const decision = await controller.decide(request({ timestamp: NOW_SEC + 60 }));

      expect(decision.reason).toBe(EmissionReason.NEW);
    });
  });

  describe('decideEmission', () => {
    const entry: SignalHistoryEntry = {
      signalType: 'BTC_DOMINANCE',
      lastAction: 'LONG_BTC_SHORT_ALT',
      lastConfidence: 'MEDIUM',
      lastValue: 50,
      lastEmittedAt: NOW_SEC,
    };

    it('should check the cooldown before the reversal', () => {
      const decision = decideEmission(
        entry,
        { action: 'SHORT_BTC_LONG_ALT', confidence: 'MEDIUM', value: 50 },
        NOW_SEC + 4 * HOUR,
        config,
      );

      expect(decision.reason).toBe(EmissionReason.COOLDOWN_EXPIRED);
    });

    it('should check the reversal before the value change', () => {
      const decision = decideEmission(
        entry,
        { action: 'SHORT_BTC_LONG_ALT', confidence: 'MEDIUM', value: 80 },
        NOW_SEC + 60,
        config,
      );

      expect(decision.reason).toBe(EmissionReason.REVERSAL);
      expect(decision.valueChange).toBeCloseTo(0.6, 10);
    });

    it('should not count a change exactly at the threshold', () => {
      const decision = decideEmission(
        { ...entry, lastValue: 10 },
        { action: 'LONG_BTC_SHORT_ALT', confidence: 'MEDIUM', value: 13 },
        NOW_SEC + 60,
        config,
      );

      expect(decision.emit).toBe(false);
    });

    it('should fall back to lastEmittedAt for staleness', () => {
      const staleConfig = { ...config, staleRecordMaxAgeSec: 600 };

      expect(
        decideEmission(entry, { action: 'LONG_BTC_SHORT_ALT', confidence: 'MEDIUM', value: 50 }, NOW_SEC + 601, staleConfig)
          .reason,
      ).toBe(EmissionReason.NEW);
      expect(
        decideEmission(
          { ...entry, lastEvaluatedAt: NOW_SEC + 300 },
          { action: 'LONG_BTC_SHORT_ALT', confidence: 'MEDIUM', value: 50 },
          NOW_SEC + 601,
          staleConfig,
        ).reason,
      ).toBe(EmissionReason.SUPPRESSED);
    });
  });

  describe('relativeChange', () => {
    it('should measure against the absolute last value', () => {
      expect(relativeChange(90, 100)).toBeCloseTo(0.1, 10);
      expect(relativeChange(-12, -10)).toBeCloseTo(0.2, 10);
    });

    it('should report no change from a zero baseline', () => {
      expect(relativeChange(5, 0)).toBe(0);
    });
  });
});
