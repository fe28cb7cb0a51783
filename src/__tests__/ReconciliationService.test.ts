import { describe, expect, it } from 'vitest';
import { ReconciliationService } from '../services/ReconciliationService.js';
import { PlaylistService } from '../services/PlaylistService.js';
import { AdditionLog } from '../services/AdditionLog.js';
import { CandidateResolver } from '../services/CandidateResolver.js';
import { ListeningLedger, emptyLedger, ledgerKey } from '../services/ListeningLedger.js';
import { SongSelector } from '../services/SongSelector.js';
import { PROFILE_SETTINGS_KEY, parseProfileSettings } from '../utils/config.js';
import type { ProfileSettings } from '../utils/config.js';
import type { PlayEvent, PlaylistItem } from '../types/index.js';
import { MemoryDocumentStore } from './helpers/MemoryDocumentStore.js';
import { FakeCatalog, play, track } from './helpers/FakeCatalog.js';

const PLAYLIST = 'Songs of the Day 2026';

class AdditionsUnwritableStore extends MemoryDocumentStore {
  async set(key: string, value: unknown): Promise<void> {
    if (key === 'additions') throw new Error('disk full');
    await super.set(key, value);
  }
}

interface Harness {
  store: MemoryDocumentStore;
  catalog: FakeCatalog;
  settings: ProfileSettings;
  engine: ReconciliationService;
  additions: AdditionLog;
}

function plays(date: string, counts: Record<string, number>): PlayEvent[] {
  return Object.entries(counts).flatMap(([id, n]) =>
    Array.from({ length: n }, (_, i) => play(id, `${date}T0${i}:00:00.000Z`)),
  );
}

async function harness(options: {
  now: string;
  today: Record<string, number>;
  items?: PlaylistItem[];
  withPlaylist?: boolean;
  settings?: Record<string, unknown>;
  store?: MemoryDocumentStore;
}): Promise<Harness> {
  const now = new Date(options.now);
  const clock = () => now;
  const date = options.now.slice(0, 10);
  const store = options.store ?? new MemoryDocumentStore();
  await store.set(ledgerKey(date), { ...emptyLedger(date), plays: plays(date, options.today) });

  const catalog = new FakeCatalog(clock);
  if (options.withPlaylist !== false) catalog.addPlaylist('p1', PLAYLIST, options.items ?? []);

  const settings = parseProfileSettings(
    { playlist_name: PLAYLIST, timezone: 'UTC', cooldown_entries: 2, selection_mode: 'most_played', ...options.settings },
    now,
  );
  const ledger = new ListeningLedger(store, catalog, { timezone: 'UTC', dayBoundaryHour: 0, clock });
  const resolver = new CandidateResolver(ledger, catalog, new SongSelector(() => 0), {
    timezone: 'UTC',
    dayBoundaryHour: 0,
    minDurationMs: settings.minDurationMs,
    selectionMode: settings.selectionMode,
    includeLikedToday: settings.includeLikedToday,
  });
  const playlists = new PlaylistService(catalog, store, settings, clock);
  const additions = new AdditionLog(store, clock);
  const engine = new ReconciliationService({ profile: 'default', settings, playlists, resolver, additions, clock });
  return { store, catalog, settings, engine, additions };
}

describe('ReconciliationService', () => {
  it('catches up several missed days and is idempotent on the next run', async () => {
    const h = await harness({ now: '2026-01-05T20:00:00Z', today: { t1: 6, t2: 5, t3: 4, t4: 3, t5: 2, t6: 1 } });

    const first = await h.engine.run({ dryRun: false });

    expect(first.target).toBe(5);
    expect(first.songsNeeded).toBe(5);
    expect(first.autoAdditions.map((a) => a.trackId)).toEqual(['t1', 't2', 't3', 't4', 't5']);
    expect(first.autoAdditions[0]).toEqual({
      trackId: 't1',
      trackName: 'Song t1',
      artist: 'Test Artist',
      source: 'auto',
      tier: 'today',
      playCount: 6,
    });
    expect(first.countBefore).toBe(0);
    expect(first.countAfter).toBe(5);
    expect(first.ok).toBe(true);
    expect(first.behindSchedule).toBe(false);
    expect(first.state).toBe('DONE');
    expect(h.catalog.trackIdsOf('p1')).toEqual(['t1', 't2', 't3', 't4', 't5']);
    expect((await h.additions.load()).map((r) => [r.trackId, r.source, r.date])).toEqual([
      ['t1', 'auto', '2026-01-05'],
      ['t2', 'auto', '2026-01-05'],
      ['t3', 'auto', '2026-01-05'],
      ['t4', 'auto', '2026-01-05'],
      ['t5', 'auto', '2026-01-05'],
    ]);

    const second = await h.engine.run({ dryRun: false });

    expect(second.songsNeeded).toBe(0);
    expect(second.autoAdditions).toEqual([]);
    expect(second.earlierAdditions.map((a) => [a.trackId, a.source])).toEqual([
      ['t1', 'auto'],
      ['t2', 'auto'],
      ['t3', 'auto'],
      ['t4', 'auto'],
      ['t5', 'auto'],
    ]);
    expect(second.state).toBe('DONE');
    expect(h.catalog.added).toHaveLength(5);
    expect(await h.additions.load()).toHaveLength(5);
  });

  it('logs manual additions and only fills the remaining gap', async () => {
    const manual: PlaylistItem[] = [
      { track: track('m1'), addedAt: '2026-01-03T09:00:00Z' },
      { track: track('m2'), addedAt: '2026-01-03T09:05:00Z' },
    ];
    const h = await harness({ now: '2026-01-03T20:00:00Z', today: { m1: 5, t1: 3 }, items: manual });

    const report = await h.engine.run({ dryRun: false });

    expect(report.earlierAdditions.map((a) => [a.trackId, a.source])).toEqual([
      ['m1', 'user'],
      ['m2', 'user'],
    ]);
    expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['t1']);
    expect(report.countAfter).toBe(3);
    expect((await h.additions.load()).map((r) => [r.trackId, r.source])).toEqual([
      ['m1', 'user'],
      ['m2', 'user'],
      ['t1', 'auto'],
    ]);
  });

  it('reports partial progress when candidates run out', async () => {
    const h = await harness({ now: '2026-01-03T20:00:00Z', today: { t1: 2 } });

    const report = await h.engine.run({ dryRun: false });

    expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['t1']);
    expect(report.warnings).toEqual(['No eligible candidates left; 2 song(s) still missing.']);
    expect(report.countAfter).toBe(1);
    expect(report.behindSchedule).toBe(true);
    expect(report.ok).toBe(true);
    expect(report.state).toBe('DONE');
  });

  it('fails when songs are needed and nothing is eligible', async () => {
    const h = await harness({ now: '2026-01-03T20:00:00Z', today: {} });

    const report = await h.engine.run({ dryRun: false });

    expect(report.ok).toBe(false);
    expect(report.state).toBe('FAILED');
    expect(report.error).toBe('Needed 3 song(s) but could not add any.');
    expect(report.warnings).toEqual(['No eligible candidates left; 3 song(s) still missing.']);
    expect(h.engine.getState()).toBe('FAILED');
  });

  it('stops at a failed playlist write without logging the pick', async () => {
    const h = await harness({ now: '2026-01-03T20:00:00Z', today: { t1: 2, t2: 1 } });
    h.catalog.addError = new Error('playlist is read-only');

    const report = await h.engine.run({ dryRun: false });

    expect(report.error).toBe('Failed to add 1 track(s) to the playlist: playlist is read-only');
    expect(report.autoAdditions).toEqual([]);
    expect(report.ok).toBe(false);
    expect(report.state).toBe('FAILED');
    expect(await h.additions.load()).toEqual([]);
  });

  it('keeps a committed pick when the addition log cannot be written', async () => {
    const h = await harness({ now: '2026-01-01T20:00:00Z', today: { t1: 1 }, store: new AdditionsUnwritableStore() });

    const report = await h.engine.run({ dryRun: false });

    expect(h.catalog.trackIdsOf('p1')).toEqual(['t1']);
    expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['t1']);
    expect(report.countAfter).toBe(1);
    expect(report.warnings).toEqual([
      'Added Song t1 — Test Artist but could not record it in the addition log: disk full',
    ]);
    expect(report.error).toBeNull();
    expect(report.ok).toBe(true);
    expect(report.state).toBe('DONE');
  });

  describe('cooldown', () => {
    const earlier: PlaylistItem[] = [
      { track: track('old1'), addedAt: '2026-01-01T09:00:00Z' },
      { track: track('old2'), addedAt: '2026-01-02T09:00:00Z' },
    ];
    const today = { old1: 3, old2: 5, t1: 1 };

    it('never picks a track from the last cooldown entries', async () => {
      const h = await harness({ now: '2026-01-03T20:00:00Z', today, items: earlier, settings: { cooldown_entries: 2 } });

      const report = await h.engine.run({ dryRun: false });

      expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['t1']);
      const verdict = report.tiers.find((t) => t.tier === 'today')?.considered.find((v) => v.candidate.trackId === 'old2');
      expect(verdict?.eligible).toBe(false);
      expect(verdict?.reason).toBe('in cooldown (recently added to playlist)');
    });

    it('only covers the most recent positions', async () => {
      const h = await harness({ now: '2026-01-03T20:00:00Z', today, items: earlier, settings: { cooldown_entries: 1 } });

      const report = await h.engine.run({ dryRun: false });

      expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['old1']);
    });

    it('allows an immediate repeat when set to zero', async () => {
      const h = await harness({ now: '2026-01-03T20:00:00Z', today, items: earlier, settings: { cooldown_entries: 0 } });

      const report = await h.engine.run({ dryRun: false });

      expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['old2']);
      expect(h.catalog.trackIdsOf('p1')).toEqual(['old1', 'old2', 'old2']);
    });
  });

  it('fails cleanly when the playlist is missing and creation is off', async () => {
    const h = await harness({
      now: '2026-01-03T20:00:00Z',
      today: { t1: 1 },
      withPlaylist: false,
      settings: { create_playlist_if_missing: false },
    });

    const report = await h.engine.run({ dryRun: false });

    expect(report.state).toBe('FAILED');
    expect(report.error).toBe(`Could not load playlist '${PLAYLIST}': Playlist '${PLAYLIST}' not found.`);
    expect(h.catalog.added).toEqual([]);
  });

  it('creates a missing playlist and caches its id', async () => {
    const h = await harness({ now: '2026-01-01T20:00:00Z', today: { t1: 1 }, withPlaylist: false });

    const report = await h.engine.run({ dryRun: false });

    expect(h.catalog.created).toEqual([{ id: 'created-1', name: PLAYLIST }]);
    expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['t1']);
    const stored = await h.store.get(PROFILE_SETTINGS_KEY);
    expect(parseProfileSettings(stored, new Date('2026-01-01T20:00:00Z')).playlistId).toBe('created-1');
  });

  it('changes nothing on a dry run', async () => {
    const h = await harness({ now: '2026-01-02T20:00:00Z', today: { t1: 2, t2: 1 } });

    const report = await h.engine.run({ dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.autoAdditions.map((a) => a.trackId)).toEqual(['t1', 't2']);
    expect(report.countAfter).toBe(2);
    expect(report.ok).toBe(true);
    expect(h.catalog.added).toEqual([]);
    expect(await h.store.get('additions')).toBeNull();
  });
});
