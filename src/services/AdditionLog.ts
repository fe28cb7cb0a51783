import { Logger } from '../utils/logger.js';
import { ConfigError } from '../types/errors.js';
import type { AdditionRecord, AdditionSource, Clock, IDocumentStore } from '../types/index.js';

export const ADDITIONS_KEY = 'additions';

export interface NewAddition {
  date: string;
  trackId: string;
  trackName: string;
  artist: string;
  source: AdditionSource;
}

function parseRecord(raw: unknown): AdditionRecord | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const date = Reflect.get(raw, 'date');
  const trackId = Reflect.get(raw, 'trackId');
  const source = Reflect.get(raw, 'source');
  if (typeof date !== 'string' || typeof trackId !== 'string') return null;
  if (source !== 'user' && source !== 'auto') return null;
  const trackName = Reflect.get(raw, 'trackName');
  const artist = Reflect.get(raw, 'artist');
  const recordedAt = Reflect.get(raw, 'recordedAt');
  return {
    date,
    trackId,
    trackName: typeof trackName === 'string' ? trackName : 'Unknown',
    artist: typeof artist === 'string' ? artist : '',
    source,
    recordedAt: typeof recordedAt === 'string' ? recordedAt : '',
  };
}

/**
 * Ordered log of every playlist addition, one row per (date, track).
 * Provenance only: it never decides whether a track may be picked.
 */
export class AdditionLog {
  private readonly store: IDocumentStore;
  private readonly clock: Clock;

  constructor(store: IDocumentStore, clock: Clock = () => new Date()) {
    this.store = store;
    this.clock = clock;
  }

  async load(): Promise<AdditionRecord[]> {
    const raw = await this.store.get(ADDITIONS_KEY);
    if (raw === null) return [];
    if (!Array.isArray(raw)) {
      throw new ConfigError('Stored additions log is not a JSON array.');
    }
    const records: AdditionRecord[] = [];
    raw.forEach((item, idx) => {
      const rec = parseRecord(item);
      if (rec) records.push(rec);
      else Logger.warn(`Skipping unreadable additions log entry #${idx}.`);
    });
    return records;
  }

  // Returns false when (date, track) was already recorded
  async record(addition: NewAddition): Promise<boolean> {
    const log = await this.load();
    if (log.some((e) => e.date === addition.date && e.trackId === addition.trackId)) {
      return false;
    }
    log.push({ ...addition, recordedAt: this.clock().toISOString() });
    await this.store.set(ADDITIONS_KEY, log);
    return true;
  }

  // Inclusive on both ends; dates are YYYY-MM-DD so string order is date order
  async forPeriod(startDate: string, endDate: string): Promise<AdditionRecord[]> {
    const log = await this.load();
    return log.filter((e) => e.date >= startDate && e.date <= endDate);
  }
}
