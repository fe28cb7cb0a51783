import { Logger } from '../utils/logger.js';
import { saveProfileSettings } from '../utils/config.js';
import type { ProfileSettings } from '../utils/config.js';
import { artistDisplay } from './ListeningLedger.js';
import { effectiveDateOf } from './TargetScheduler.js';
import { ConfigError, NotFoundError } from '../types/errors.js';
import type { Clock, ICatalog, IDocumentStore, PlaylistEntry, PlaylistRef, PlaylistSnapshot } from '../types/index.js';

export const SNAPSHOT_KEY = 'playlist-snapshot';

export interface LookupOptions {
  // false: never create the playlist, even when the profile allows it
  create?: boolean;
}

const PLAYLIST_DESCRIPTION = 'One song for every day of the year, picked from what I actually listened to.';

/**
 * Locates the managed playlist and takes fresh snapshots of it. Snapshots are
 * always refetched, never patched, so manual edits are picked up.
 */
export class PlaylistService {
  private readonly catalog: ICatalog;
  private readonly store: IDocumentStore;
  private readonly settings: ProfileSettings;
  private readonly clock: Clock;
  private resolved: PlaylistRef | null = null;

  constructor(catalog: ICatalog, store: IDocumentStore, settings: ProfileSettings, clock: Clock = () => new Date()) {
    this.catalog = catalog;
    this.store = store;
    this.settings = settings;
    this.clock = clock;
  }

  /**
   * Cached id first, then a name lookup, then (when allowed) creation.
   * The id is cached in the profile settings after the first lookup.
   */
  async resolvePlaylist(options: LookupOptions = {}): Promise<PlaylistRef> {
    if (this.resolved) return this.resolved;

    if (this.settings.playlistId) {
      this.resolved = { id: this.settings.playlistId, name: this.settings.playlistName };
      return this.resolved;
    }

    const name = this.settings.playlistName;
    let playlist = await this.catalog.findPlaylistByName(name);
    if (playlist) {
      Logger.info(`Using existing playlist: ${playlist.name} (${playlist.id})`);
    } else if (this.settings.createPlaylistIfMissing && options.create !== false) {
      Logger.info(`Creating playlist: ${name}`);
      playlist = await this.catalog.createPlaylist(name, this.settings.playlistPublic, PLAYLIST_DESCRIPTION);
    } else {
      throw new NotFoundError(`Playlist '${name}' not found.`);
    }

    this.settings.playlistId = playlist.id;
    await saveProfileSettings(this.store, this.settings);
    this.resolved = playlist;
    return playlist;
  }

  async fetchEntries(playlistId: string): Promise<PlaylistEntry[]> {
    const entries: PlaylistEntry[] = [];
    let position = 0;
    for await (const page of this.catalog.listPlaylistTracks(playlistId)) {
      for (const item of page) {
        const track = item.track;
        // Local files and unavailable tracks keep their slot but are not entries
        if (track && track.id) {
          entries.push({
            trackId: track.id,
            trackName: track.name,
            artist: artistDisplay(track),
            addedAt: item.addedAt ?? '',
            durationMs: track.durationMs,
            position,
          });
        }
        position++;
      }
    }
    return entries;
  }

  async takeSnapshot(options: LookupOptions = {}): Promise<PlaylistSnapshot> {
    const playlist = await this.resolvePlaylist(options);
    const tracks = await this.fetchEntries(playlist.id);
    const snapshot: PlaylistSnapshot = {
      playlistId: playlist.id,
      playlistName: this.settings.playlistName,
      lastChecked: this.clock().toISOString(),
      trackCount: tracks.length,
      tracks,
    };
    const previous = await this.loadStoredSnapshot();
    if (previous && previous.trackCount !== snapshot.trackCount) {
      const verb = snapshot.trackCount > previous.trackCount ? 'grew' : 'shrunk';
      Logger.info(`Playlist ${verb}: ${previous.trackCount} → ${snapshot.trackCount} tracks`);
    }
    await this.store.set(SNAPSHOT_KEY, snapshot);
    return snapshot;
  }

  async loadStoredSnapshot(): Promise<PlaylistSnapshot | null> {
    const raw = await this.store.get(SNAPSHOT_KEY);
    return raw === null ? null : parseSnapshot(raw);
  }

  async addTrack(playlistId: string, trackId: string): Promise<void> {
    await this.catalog.addTracksToPlaylist(playlistId, [trackId]);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(raw: unknown): PlaylistEntry | null {
  if (!isRecord(raw)) return null;
  const { trackId, trackName, artist, addedAt, durationMs, position } = raw;
  if (typeof trackId !== 'string' || typeof position !== 'number') return null;
  return {
    trackId,
    trackName: typeof trackName === 'string' ? trackName : 'Unknown',
    artist: typeof artist === 'string' ? artist : '',
    addedAt: typeof addedAt === 'string' ? addedAt : '',
    durationMs: typeof durationMs === 'number' ? durationMs : 0,
    position,
  };
}

export function parseSnapshot(raw: unknown): PlaylistSnapshot {
  if (!isRecord(raw) || typeof raw.playlistId !== 'string') {
    throw new ConfigError('Stored playlist snapshot is malformed.');
  }
  const tracks: PlaylistEntry[] = [];
  for (const item of Array.isArray(raw.tracks) ? raw.tracks : []) {
    const entry = parseEntry(item);
    if (entry) tracks.push(entry);
  }
  return {
    playlistId: raw.playlistId,
    playlistName: typeof raw.playlistName === 'string' ? raw.playlistName : '',
    lastChecked: typeof raw.lastChecked === 'string' ? raw.lastChecked : '',
    trackCount: tracks.length,
    tracks,
  };
}

/**
 * Track ids among the last `cooldownEntries` entries by position. With 0 the
 * set is empty; a window longer than the playlist covers the whole playlist.
 */
export function cooldownTrackIds(snapshot: PlaylistSnapshot, cooldownEntries: number): Set<string> {
  if (cooldownEntries <= 0) return new Set();
  const ordered = [...snapshot.tracks].sort((a, b) => a.position - b.position);
  return new Set(ordered.slice(-cooldownEntries).map((t) => t.trackId));
}

// Entries whose add time falls on the effective date `date`
export function entriesAddedOn(snapshot: PlaylistSnapshot, date: string, timezone: string, dayBoundaryHour: number): PlaylistEntry[] {
  return snapshot.tracks.filter((t) => {
    if (!t.addedAt) return false;
    const day = effectiveDateOf(t.addedAt, dayBoundaryHour, timezone);
    if (day === null) {
      Logger.warn(`Ignoring unreadable added_at "${t.addedAt}" for ${t.trackName}.`);
      return false;
    }
    return day === date;
  });
}
