/**
 * EmissionController - decides whether a signal that passed scoring and
 * guardrails is actually published
 *
 * Rules, first match wins:
 * 1. No record for the key (or a stale one): emit, NEW
 * 2. Cooldown elapsed since the last emission: emit, COOLDOWN_EXPIRED
 * 3. Action differs from the last emitted one: emit, REVERSAL
 * 4. Relative value change above the threshold: emit, VALUE_CHANGE
 * 5. Confidence rose (MEDIUM to HIGH): emit, CONFIDENCE_UPGRADE
 * 6. Otherwise suppress; only lastEvaluatedAt is written
 *
 * Read, decide and write for one key happen under that key's lock.
 */

import { Clock, epochSeconds, KeyedMutex, Logger, SystemClock } from '@market-pulse/shared';

import {
  EmissionDecision,
  EmissionReason,
  SignalAction,
  SignalConfidence,
  SignalHistoryEntry,
} from '../types';
import { EmissionConfig } from '../config/schema';
import { InMemorySignalHistoryStore, SignalHistoryStore } from './SignalHistoryStore';

export interface EmissionRequest {
  key: string;
  action: SignalAction;
  confidence: SignalConfidence;
  /** Numeric value compared against the last emission (score or metric level) */
  value: number;
  /** Evaluation time in epoch seconds; the clock is read when omitted */
  timestamp?: number;
}

export interface EmissionControllerDeps {
  store?: SignalHistoryStore;
  clock?: Clock;
  logger?: Logger;
  mutex?: KeyedMutex;
}

const CONFIDENCE_RANK: Record<SignalConfidence, number> = {
  NONE: 0,
  MEDIUM: 1,
  HIGH: 2,
};

/**
 * |current - last| / |last|, or 0 when the last value was 0
 */
export function relativeChange(current: number, last: number): number {
  if (last === 0) return 0;
  return Math.abs(current - last) / Math.abs(last);
}

/**
 * Pure emission rule: same record, request and time give the same decision
 */
export function decideEmission(
  entry: SignalHistoryEntry | undefined,
  request: Pick<EmissionRequest, 'action' | 'confidence' | 'value'>,
  nowSec: number,
  config: EmissionConfig,
): EmissionDecision {
  if (!entry || isStale(entry, nowSec, config)) {
    return { emit: true, reason: EmissionReason.NEW };
  }

  const valueChange = relativeChange(request.value, entry.lastValue);

  if (nowSec - entry.lastEmittedAt >= config.cooldownSec) {
    return { emit: true, reason: EmissionReason.COOLDOWN_EXPIRED, valueChange };
  }
  if (request.action !== entry.lastAction) {
    return { emit: true, reason: EmissionReason.REVERSAL, valueChange };
  }
  if (valueChange > config.valueChangeThreshold) {
    return { emit: true, reason: EmissionReason.VALUE_CHANGE, valueChange };
  }
  if (CONFIDENCE_RANK[request.confidence] > CONFIDENCE_RANK[entry.lastConfidence]) {
    return { emit: true, reason: EmissionReason.CONFIDENCE_UPGRADE, valueChange };
  }
  return { emit: false, reason: EmissionReason.SUPPRESSED, valueChange };
}

function isStale(entry: SignalHistoryEntry, nowSec: number, config: EmissionConfig): boolean {
  if (config.staleRecordMaxAgeSec === null) return false;
  const lastSeen = entry.lastEvaluatedAt ?? entry.lastEmittedAt;
  return nowSec - lastSeen > config.staleRecordMaxAgeSec;
}

export class EmissionController {
  private readonly store: SignalHistoryStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly mutex: KeyedMutex;

  constructor(
    private readonly config: EmissionConfig,
    deps: EmissionControllerDeps = {},
  ) {
    this.store = deps.store ?? new InMemorySignalHistoryStore();
    this.clock = deps.clock ?? new SystemClock();
    this.logger = deps.logger ?? Logger.getInstance('signal-engine');
    this.mutex = deps.mutex ?? new KeyedMutex();
  }

  async decide(request: EmissionRequest): Promise<EmissionDecision> {
    return this.mutex.runExclusive(request.key, async () => {
      const nowSec = request.timestamp ?? epochSeconds(this.clock);
      const entry = await this.store.get(request.key);
      const decision = decideEmission(entry, request, nowSec, this.config);

      if (decision.emit) {
        await this.store.put(request.key, {
          signalType: request.key,
          lastAction: request.action,
          lastConfidence: request.confidence,
          lastValue: request.value,
          lastEmittedAt: nowSec,
          lastEvaluatedAt: nowSec,
        });
        this.logger.debug('Signal cleared for emission', undefined, {
          key: request.key,
          action: request.action,
          reason: decision.reason,
        });
      } else if (entry) {
        await this.store.put(request.key, { ...entry, lastEvaluatedAt: nowSec });
        this.logger.debug('Signal suppressed', undefined, {
          key: request.key,
          action: request.action,
          secondsSinceEmission: nowSec - entry.lastEmittedAt,
          valueChange: decision.valueChange,
        });
      }

      return decision;
    });
  }

  async getHistory(key: string): Promise<SignalHistoryEntry | undefined> {
    return this.store.get(key);
  }

  async clearHistory(key: string): Promise<void> {
    await this.mutex.runExclusive(key, () => this.store.delete(key));
  }
}
