import Bottleneck from 'bottleneck';
import SpotifyWebApi from 'spotify-web-api-node';
import { Logger } from '../../utils/logger.js';
import { defaultRetryPolicy, isTransientError, sleep, withRetry } from '../../utils/retry.js';
import { TransientIOError } from '../../types/errors.js';
import type { RetryPolicy, Sleep } from '../../utils/retry.js';
import type { AppConfig } from '../../utils/config.js';
import type {
  CatalogTrack,
  ICatalog,
  LikedItem,
  PlaybackState,
  PlaylistItem,
  PlaylistRef,
  RecentPlay,
} from '../../types/index.js';

type ApiCall<T> = () => Promise<T>;

// Provider-imposed batch size for playlist add/remove
export const PLAYLIST_BATCH_SIZE = 100;

// Structural subset shared by tracks and episodes in API payloads
export interface SpotifyItemLike {
  id: string | null;
  name: string;
  duration_ms: number;
  type: string;
  artists?: ReadonlyArray<{ name: string }>;
}

export function toCatalogTrack(item: SpotifyItemLike): CatalogTrack {
  return {
    id: item.id && item.id.length > 0 ? item.id : null,
    name: item.name || 'Unknown',
    artists: (item.artists ?? []).map((a) => a.name || '?'),
    durationMs: typeof item.duration_ms === 'number' ? item.duration_ms : 0,
    type: item.type === 'episode' ? 'episode' : 'track',
  };
}

export function toPlaybackState(body: unknown): PlaybackState | null {
  // 204 No Content when nothing is active
  if (typeof body !== 'object' || body === null || !('is_playing' in body)) return null;
  const item = 'item' in body ? body.item : null;
  const context = 'context' in body ? body.context : null;
  return {
    isPlaying: body.is_playing === true,
    item: isItemLike(item) ? toCatalogTrack(item) : null,
    contextType: contextTypeOf(context),
  };
}

function isItemLike(value: unknown): value is SpotifyItemLike {
  return typeof value === 'object' && value !== null && 'name' in value && 'type' in value;
}

function contextTypeOf(context: unknown): string | null {
  if (typeof context !== 'object' || context === null || !('type' in context)) return null;
  return typeof context.type === 'string' ? context.type : null;
}

// Exact case-insensitive match wins; otherwise the first substring match
export function matchPlaylistByName<T extends { name: string }>(playlists: T[], name: string): T | null {
  const target = name.trim().toLowerCase();
  let partial: T | null = null;
  for (const pl of playlists) {
    const plName = (pl.name || '').trim().toLowerCase();
    if (plName === target) return pl;
    if (partial === null && plName.includes(target)) partial = pl;
  }
  return partial;
}

export interface SpotifyCatalogOptions {
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
}

export class SpotifyCatalog implements ICatalog {
  private spotify: SpotifyWebApi;
  private limiter: Bottleneck;
  private readonly retryPolicy: RetryPolicy;
  private readonly wait: Sleep;
  private accessTokenExpiresAt: number | null = null; // epoch ms

  constructor(config: AppConfig, options: SpotifyCatalogOptions = {}) {
    const { clientId, clientSecret, refreshToken } = config.spotify;

    this.spotify = new SpotifyWebApi({ clientId, clientSecret });
    this.spotify.setRefreshToken(refreshToken);

    const { maxConcurrent, minTime } = config.rateLimit.spotify;
    this.limiter = new Bottleneck({ maxConcurrent, minTime });
    this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy(config.retry);
    this.wait = options.sleep ?? sleep;
  }

  // Ensures we have a valid access token, refreshing proactively
  private async ensureAccessToken(): Promise<void> {
    const now = Date.now();
    if (this.accessTokenExpiresAt && now < this.accessTokenExpiresAt - 60_000) {
      return; // still valid
    }

    // Retry logic for token refresh to handle transient network/API failures
    const maxAttempts = 3;
    let lastErr: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        Logger.debug(`Refreshing Spotify access token (attempt ${attempt}/${maxAttempts})...`);
        const data = await this.spotify.refreshAccessToken();
        const token = data.body.access_token;
        const expiresInSec = data.body.expires_in ?? 3600;
        this.spotify.setAccessToken(token);
        this.accessTokenExpiresAt = Date.now() + expiresInSec * 1000;
        Logger.debug(`Spotify access token refreshed (expires in ${Math.floor(expiresInSec / 60)} minutes).`);
        return;
      } catch (err) {
        lastErr = err;

        if (attempt < maxAttempts) {
          const backoffMs = 1000 * Math.pow(2, attempt - 1); // 1s, 2s, 4s
          Logger.warn(`Failed to refresh Spotify access token (attempt ${attempt}/${maxAttempts}). Retrying in ${backoffMs}ms...`);
          await this.wait(backoffMs);
        }
      }
    }

    Logger.error('Failed to refresh Spotify access token after all retry attempts.', lastErr);
    // Network trouble is the caller's to tolerate; a rejected grant is not
    if (isTransientError(lastErr)) {
      throw new TransientIOError('Spotify token refresh', maxAttempts, lastErr);
    }
    throw lastErr;
  }

  // Reads go through the retry policy
  private read<T>(fn: ApiCall<T>, label: string): Promise<T> {
    return this.limiter.schedule(async () => {
      await this.ensureAccessToken();
      return withRetry(fn, this.retryPolicy, `Spotify API ${label}`, this.wait);
    });
  }

  // Writes are attempted once; a retry could insert the same track twice
  private write<T>(fn: ApiCall<T>): Promise<T> {
    return this.limiter.schedule(async () => {
      await this.ensureAccessToken();
      return fn();
    });
  }

  async *listRecentlyPlayed(): AsyncGenerator<RecentPlay[]> {
    const res = await this.read(() => this.spotify.getMyRecentlyPlayedTracks({ limit: 50 }), 'getMyRecentlyPlayedTracks');
    const items = res.body.items ?? [];
    yield items.map((it) => ({
      track: toCatalogTrack(it.track),
      playedAt: it.played_at,
      contextType: contextTypeOf(it.context),
    }));
  }

  async getCurrentPlayback(): Promise<PlaybackState | null> {
    const res = await this.read(() => this.spotify.getMyCurrentPlaybackState(), 'getMyCurrentPlaybackState');
    return toPlaybackState(res.body);
  }

  async findPlaylistByName(name: string): Promise<PlaylistRef | null> {
    const all: PlaylistRef[] = [];
    let offset = 0;
    const limit = 50;
    // paginate through the user's playlists
    while (true) {
      const res = await this.read(() => this.spotify.getUserPlaylists({ limit, offset }), 'getUserPlaylists');
      const items = res.body.items ?? [];
      for (const pl of items) {
        if (pl.name.trim().toLowerCase() === name.trim().toLowerCase()) return { id: pl.id, name: pl.name };
        all.push({ id: pl.id, name: pl.name });
      }
      if (items.length < limit) break;
      offset += limit;
    }
    return matchPlaylistByName(all, name);
  }

  async createPlaylist(name: string, isPublic: boolean, description: string): Promise<PlaylistRef> {
    const res = await this.write(() => this.spotify.createPlaylist(name, { public: isPublic, description }));
    return { id: res.body.id, name: res.body.name };
  }

  async *listPlaylistTracks(playlistId: string): AsyncGenerator<PlaylistItem[]> {
    let offset = 0;
    const limit = 100;
    while (true) {
      const res = await this.read(() => this.spotify.getPlaylistTracks(playlistId, { offset, limit }), 'getPlaylistTracks');
      const items = res.body.items ?? [];
      yield items.map((it) => ({
        track: isItemLike(it.track) ? toCatalogTrack(it.track) : null,
        addedAt: it.added_at || null,
      }));
      if (items.length < limit) break;
      offset += limit;
    }
  }

  async addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
    const uris = trackIds.map((id) => `spotify:track:${id}`);
    for (let i = 0; i < uris.length; i += PLAYLIST_BATCH_SIZE) {
      const batch = uris.slice(i, i + PLAYLIST_BATCH_SIZE);
      await this.write(() => this.spotify.addTracksToPlaylist(playlistId, batch));
      Logger.debug(`Added batch ${Math.floor(i / PLAYLIST_BATCH_SIZE) + 1}: ${batch.length} tracks`);
    }
  }

  async removeTracksFromPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
    const tracks = trackIds.map((id) => ({ uri: `spotify:track:${id}` }));
    for (let i = 0; i < tracks.length; i += PLAYLIST_BATCH_SIZE) {
      const batch = tracks.slice(i, i + PLAYLIST_BATCH_SIZE);
      await this.write(() => this.spotify.removeTracksFromPlaylist(playlistId, batch));
      Logger.debug(`Removed batch ${Math.floor(i / PLAYLIST_BATCH_SIZE) + 1}: ${batch.length} tracks`);
    }
  }

  async *listLikedTracks(): AsyncGenerator<LikedItem[]> {
    let offset = 0;
    const limit = 50;
    while (true) {
      const res = await this.read(() => this.spotify.getMySavedTracks({ limit, offset }), 'getMySavedTracks');
      const items = res.body.items ?? [];
      yield items.map((it) => ({ track: toCatalogTrack(it.track), addedAt: it.added_at }));
      if (items.length < limit) break;
      offset += limit;
    }
  }

  async getCurrentUserDisplay(): Promise<string> {
    const res = await this.read(() => this.spotify.getMe(), 'getMe');
    const me = res.body;
    return me.display_name ? `${me.display_name} (${me.id})` : me.id;
  }
}
