/**
 * Event bus for the Signal Engine
 *
 * Publishing collaborators (message formatting, delivery, persistence)
 * subscribe here instead of being called by the engine.
 */

import { EventEmitter } from 'eventemitter3';

import {
  EmissionReason,
  GuardrailCandidate,
  MarketSignal,
  MultiFactorScore,
  Signal,
  VetoCode,
} from '../types';

export interface EventMap {
  SIGNAL_EMITTED: SignalEmittedEvent;
  SIGNAL_SUPPRESSED: SignalSuppressedEvent;
  SIGNAL_VETOED: SignalVetoedEvent;
  MARKET_SIGNAL_EMITTED: MarketSignalEmittedEvent;
  ALERT: AlertEvent;
}

export interface SignalEmittedEvent {
  signal: Signal;
  score: MultiFactorScore;
  timestamp: number;
}

export interface SignalSuppressedEvent {
  key: string;
  asset?: string;
  action: string;
  reason: EmissionReason;
  valueChange?: number;
  timestamp: number;
}

export interface SignalVetoedEvent {
  candidate: GuardrailCandidate;
  code: VetoCode;
  reason: string;
  timestamp: number;
}

export interface MarketSignalEmittedEvent {
  signal: MarketSignal;
  timestamp: number;
}

export interface AlertEvent {
  message: string;
  timestamp: number;
}

export class SignalEventBus extends EventEmitter {
  emitEvent<K extends keyof EventMap>(event: K, payload: EventMap[K]): boolean {
    return this.emit(event, payload);
  }

  onEvent<K extends keyof EventMap>(event: K, listener: (payload: EventMap[K]) => void): this {
    return this.on(event, listener);
  }

  onceEvent<K extends keyof EventMap>(event: K, listener: (payload: EventMap[K]) => void): this {
    return this.once(event, listener);
  }

  offEvent<K extends keyof EventMap>(event: K, listener: (payload: EventMap[K]) => void): this {
    return this.off(event, listener);
  }
}
