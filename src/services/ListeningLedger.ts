import { Logger } from '../utils/logger.js';
import { dayjs } from '../utils/date.js';
import { effectiveDate, effectiveDateOf } from './TargetScheduler.js';
import { ConfigError, TransientIOError } from '../types/errors.js';
import type {
  CatalogTrack,
  Clock,
  DailyLedger,
  ICatalog,
  IDocumentStore,
  PlayEvent,
  PlaybackState,
  RecentPlay,
} from '../types/index.js';

export interface LedgerOptions {
  timezone: string;
  dayBoundaryHour: number;
  dedupWindowSeconds?: number;
  clock?: Clock;
}

export interface PollResult {
  date: string;
  newFromHistory: number;
  newFromCurrent: number;
  ledger: DailyLedger;
}

const DEFAULT_DEDUP_WINDOW_SECONDS = 300;

export function ledgerKey(date: string): string {
  return `daily/${date}`;
}

export function emptyLedger(date: string): DailyLedger {
  return { date, lastPoll: null, lastCurrentTrackId: null, plays: [], playCounts: {} };
}

export function artistDisplay(track: CatalogTrack): string {
  return track.artists.length > 0 ? track.artists.join(', ') : '?';
}

// play_counts is always derived from the plays list
export function computePlayCounts(plays: PlayEvent[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const play of plays) {
    counts[play.trackId] = (counts[play.trackId] ?? 0) + 1;
  }
  return counts;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePlay(raw: unknown): PlayEvent | null {
  if (!isRecord(raw)) return null;
  const { trackId, trackName, artist, playedAt, durationMs, type, contextType, source } = raw;
  if (typeof trackId !== 'string' || trackId.length === 0) return null;
  if (typeof playedAt !== 'string' || !dayjs(playedAt).isValid()) return null;
  return {
    trackId,
    trackName: typeof trackName === 'string' ? trackName : 'Unknown',
    artist: typeof artist === 'string' ? artist : '',
    playedAt,
    durationMs: typeof durationMs === 'number' && durationMs >= 0 ? durationMs : 0,
    type: type === 'episode' ? 'episode' : 'track',
    contextType: typeof contextType === 'string' ? contextType : null,
    source: source === 'current_playback' ? 'current_playback' : 'recently_played',
  };
}

/**
 * Reads a stored ledger. Unreadable plays are dropped with a warning; a
 * document that is not an object at all is a ConfigError.
 */
export function parseLedger(raw: unknown, date: string): DailyLedger {
  if (!isRecord(raw)) {
    throw new ConfigError(`Stored ledger for ${date} is not a JSON object.`);
  }
  const plays: PlayEvent[] = [];
  const rawPlays = Array.isArray(raw.plays) ? raw.plays : [];
  rawPlays.forEach((item, idx) => {
    const play = parsePlay(item);
    if (play) plays.push(play);
    else Logger.warn(`Skipping unreadable play #${idx} in ledger ${date}.`);
  });
  return {
    date,
    lastPoll: typeof raw.lastPoll === 'string' ? raw.lastPoll : null,
    lastCurrentTrackId: typeof raw.lastCurrentTrackId === 'string' ? raw.lastCurrentTrackId : null,
    plays,
    playCounts: computePlayCounts(plays),
  };
}

/**
 * Per-day record of what was played, merged from the recently-played history
 * and the now-playing state. A play belongs to the effective date of its own
 * timestamp, so with a day boundary of 4 a 01:30 play counts toward the
 * previous day.
 */
export class ListeningLedger {
  private readonly store: IDocumentStore;
  private readonly catalog: ICatalog | null;
  private readonly timezone: string;
  private readonly dayBoundaryHour: number;
  private readonly dedupWindowMs: number;
  private readonly clock: Clock;

  constructor(store: IDocumentStore, catalog: ICatalog | null, options: LedgerOptions) {
    this.store = store;
    this.catalog = catalog;
    this.timezone = options.timezone;
    this.dayBoundaryHour = options.dayBoundaryHour;
    this.dedupWindowMs = (options.dedupWindowSeconds ?? DEFAULT_DEDUP_WINDOW_SECONDS) * 1000;
    this.clock = options.clock ?? (() => new Date());
  }

  currentDate(): string {
    return effectiveDate(this.clock(), this.dayBoundaryHour, this.timezone);
  }

  async load(date: string): Promise<DailyLedger> {
    const raw = await this.store.get(ledgerKey(date));
    return raw === null ? emptyLedger(date) : parseLedger(raw, date);
  }

  private async save(ledger: DailyLedger): Promise<void> {
    ledger.playCounts = computePlayCounts(ledger.plays);
    ledger.lastPoll = dayjs(this.clock()).tz(this.timezone).format();
    await this.store.set(ledgerKey(ledger.date), ledger);
  }

  /**
   * Appends history plays that fall on today's effective date and are not
   * yet recorded as the same (track, played_at) pair. Returns the number added.
   */
  async recordFromHistory(events: RecentPlay[]): Promise<number> {
    const ledger = await this.load(this.currentDate());
    const added = this.applyHistory(ledger, events);
    await this.save(ledger);
    return added;
  }

  /**
   * Records the now-playing track once per continuous play. Returns 1 when a
   * new play was appended, otherwise 0.
   */
  async recordFromCurrentPlayback(state: PlaybackState | null): Promise<number> {
    const ledger = await this.load(this.currentDate());
    const added = this.applyCurrentPlayback(ledger, state);
    await this.save(ledger);
    return added;
  }

  /**
   * Fetches both sources and merges them into today's ledger. Transient
   * catalog failures count as zero new plays for that source.
   */
  async poll(): Promise<PollResult> {
    if (!this.catalog) {
      throw new Error('ListeningLedger.poll() needs a catalog.');
    }
    const date = this.currentDate();
    Logger.info(`Polling listening history for ${date} (${this.timezone})`);

    let recent: RecentPlay[] = [];
    try {
      for await (const page of this.catalog.listRecentlyPlayed()) {
        recent = recent.concat(page);
      }
      Logger.info(`  Recently played: fetched ${recent.length} tracks`);
    } catch (err) {
      if (!(err instanceof TransientIOError)) throw err;
      Logger.warn(`  Recently played unavailable this poll: ${err.message}`);
    }
    const newFromHistory = await this.recordFromHistory(recent);
    Logger.info(`  Recently played: added ${newFromHistory} new plays`);

    let playback: PlaybackState | null = null;
    let playbackKnown = true;
    try {
      playback = await this.catalog.getCurrentPlayback();
    } catch (err) {
      if (!(err instanceof TransientIOError)) throw err;
      playbackKnown = false;
      Logger.warn(`  Current playback unavailable this poll: ${err.message}`);
    }
    const newFromCurrent = playbackKnown ? await this.recordFromCurrentPlayback(playback) : 0;

    const ledger = await this.load(date);
    Logger.info(`  Total: ${newFromHistory + newFromCurrent} new plays (${ledger.plays.length} plays on ${date})`);
    return { date, newFromHistory, newFromCurrent, ledger };
  }

  applyHistory(ledger: DailyLedger, events: RecentPlay[]): number {
    const seen = new Set(ledger.plays.map((p) => `${p.trackId}@${p.playedAt}`));
    let added = 0;
    for (const event of events) {
      const trackId = event.track.id;
      if (!trackId) continue; // local or unavailable media

      const day = effectiveDateOf(event.playedAt, this.dayBoundaryHour, this.timezone);
      if (day === null) {
        Logger.warn(`Skipping play of ${event.track.name} with unreadable timestamp "${event.playedAt}".`);
        continue;
      }
      if (day !== ledger.date) continue;

      const key = `${trackId}@${event.playedAt}`;
      if (seen.has(key)) continue;

      ledger.plays.push({
        trackId,
        trackName: event.track.name,
        artist: artistDisplay(event.track),
        playedAt: event.playedAt,
        durationMs: event.track.durationMs,
        type: event.track.type,
        contextType: event.contextType,
        source: 'recently_played',
      });
      seen.add(key);
      added++;
    }
    return added;
  }

  applyCurrentPlayback(ledger: DailyLedger, state: PlaybackState | null): number {
    // Nothing playing or paused: forget the pointer so a resume records again
    if (!state || !state.isPlaying || !state.item) {
      if (ledger.lastCurrentTrackId) {
        ledger.lastCurrentTrackId = null;
        Logger.debug('  Currently: nothing playing');
      }
      return 0;
    }

    const item = state.item;
    if (item.type === 'episode') {
      Logger.debug('  Currently: podcast episode (skipped)');
      return 0;
    }
    if (!item.id) return 0;

    const artist = artistDisplay(item);
    if (item.id === ledger.lastCurrentTrackId) {
      Logger.debug(`  Currently: ${item.name} — ${artist} (still playing)`);
      return 0;
    }

    const now = this.clock();
    if (this.hasRecentPlay(ledger, item.id, now)) {
      Logger.debug(`  Currently: ${item.name} — ${artist} (already recorded)`);
      ledger.lastCurrentTrackId = item.id;
      return 0;
    }

    ledger.plays.push({
      trackId: item.id,
      trackName: item.name,
      artist,
      playedAt: dayjs(now).utc().format('YYYY-MM-DDTHH:mm:ss.000[Z]'),
      durationMs: item.durationMs,
      type: item.type,
      contextType: state.contextType,
      source: 'current_playback',
    });
    ledger.lastCurrentTrackId = item.id;
    Logger.info(`  Currently: ${item.name} — ${artist} (new, recorded)`);
    return 1;
  }

  private hasRecentPlay(ledger: DailyLedger, trackId: string, now: Date): boolean {
    const nowMs = now.getTime();
    return ledger.plays.some((p) => {
      if (p.trackId !== trackId) return false;
      const t = dayjs(p.playedAt);
      return t.isValid() && Math.abs(nowMs - t.valueOf()) <= this.dedupWindowMs;
    });
  }
}
