import { SignalHistoryEntry } from '../types';

/**
 * Last-emission record per signal key. Implementations may be backed by a
 * database; the emission controller serialises access per key.
 */
export interface SignalHistoryStore {
  get(key: string): Promise<SignalHistoryEntry | undefined>;
  put(key: string, entry: SignalHistoryEntry): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

export class InMemorySignalHistoryStore implements SignalHistoryStore {
  private entries: Map<string, SignalHistoryEntry> = new Map();

  async get(key: string): Promise<SignalHistoryEntry | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, entry: SignalHistoryEntry): Promise<void> {
    this.entries.set(key, Object.freeze({ ...entry }));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}
