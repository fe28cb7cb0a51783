import path from 'path';
import { describe, expect, it } from 'vitest';
import {
  PROFILE_SETTINGS_KEY,
  createRunContext,
  defaultProfileSettings,
  loadProfileSettings,
  parseAppConfig,
  parseProfileSettings,
  serializeProfileSettings,
} from '../utils/config.js';
import { ConfigError } from '../types/errors.js';
import { MemoryDocumentStore } from './helpers/MemoryDocumentStore.js';

const NOW = new Date('2026-05-01T00:00:00Z');

const credentials = {
  SPOTIFY_CLIENT_ID: 'test-client-id',
  SPOTIFY_CLIENT_SECRET: 'test-secret',
  SPOTIFY_REFRESH_TOKEN: 'test-refresh-token',
};

describe('parseAppConfig', () => {
  it('takes credentials and the state root from the environment', () => {
    const config = parseAppConfig({}, { ...credentials, SONG_OF_THE_DAY_STATE_DIR: '/tmp/sotd-state' });
    expect(config.spotify).toEqual({ clientId: 'test-client-id', clientSecret: 'test-secret', refreshToken: 'test-refresh-token' });
    expect(config.stateDir).toBe('/tmp/sotd-state');
    expect(config.rateLimit.spotify).toEqual({ maxConcurrent: 1, minTime: 100 });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500 });
  });

  it('reads file values when the environment is silent', () => {
    const config = parseAppConfig({
      spotify: { clientId: 'file-id', clientSecret: 'file-secret', refreshToken: 'file-token' },
      stateDir: '/var/lib/sotd',
      retry: { maxAttempts: 5 },
    });
    expect(config.spotify.clientId).toBe('file-id');
    expect(config.stateDir).toBe('/var/lib/sotd');
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 500 });
  });

  it('names the missing credentials', () => {
    expect(() => parseAppConfig({ spotify: { clientId: 'only-id' } })).toThrow(
      'Invalid configuration: missing spotify.clientSecret, spotify.refreshToken (or the matching SPOTIFY_* environment variables).',
    );
  });
});

describe('createRunContext', () => {
  const app = parseAppConfig({}, { ...credentials, SONG_OF_THE_DAY_STATE_DIR: '/tmp/sotd-state' });

  it('gives each profile its own directory', () => {
    expect(createRunContext(app)).toEqual({ profile: 'default', stateDir: path.join('/tmp/sotd-state', 'default') });
    expect(createRunContext(app, 'dave-auto').stateDir).toBe(path.join('/tmp/sotd-state', 'dave-auto'));
  });

  it('rejects names that could escape the state root', () => {
    expect(() => createRunContext(app, '../other')).toThrow(ConfigError);
  });
});

describe('profile settings', () => {
  it('defaults the playlist name to the current year', () => {
    const defaults = defaultProfileSettings(NOW);
    expect(defaults.playlistName).toBe('Songs of the Day 2026');
    expect(defaults.cooldownEntries).toBe(90);
    expect(defaults.minDurationMs).toBe(50_000);
    expect(defaults.selectionMode).toBe('weighted_random');
  });

  it('takes the default year from the profile timezone', () => {
    // 03:00 UTC on New Year's Day is still 31 December in New York
    const newYear = new Date('2027-01-01T03:00:00Z');
    expect(defaultProfileSettings(newYear).playlistName).toBe('Songs of the Day 2026');
    expect(defaultProfileSettings(newYear, 'Europe/Berlin').playlistName).toBe('Songs of the Day 2027');
    expect(parseProfileSettings({ timezone: 'Asia/Tokyo' }, newYear).playlistName).toBe('Songs of the Day 2027');
    expect(parseProfileSettings({}, newYear).playlistName).toBe('Songs of the Day 2026');
  });

  it('fills missing keys from the defaults', () => {
    const settings = parseProfileSettings({ timezone: 'Europe/Berlin', include_liked_today: true }, NOW);
    expect(settings.timezone).toBe('Europe/Berlin');
    expect(settings.includeLikedToday).toBe(true);
    expect(settings.dayBoundaryHour).toBe(0);
    expect(settings.createPlaylistIfMissing).toBe(true);
  });

  it('falls back with a warning for soft settings', () => {
    const settings = parseProfileSettings({ cooldown_entries: -4, min_duration_ms: 'long', selection_mode: 'loudest' }, NOW);
    expect(settings.cooldownEntries).toBe(90);
    expect(settings.minDurationMs).toBe(50_000);
    expect(settings.selectionMode).toBe('weighted_random');
  });

  it('accepts a cooldown of zero', () => {
    expect(parseProfileSettings({ cooldown_entries: 0 }, NOW).cooldownEntries).toBe(0);
  });

  it('rejects settings that decide the target', () => {
    expect(() => parseProfileSettings({ timezone: 'Mars/Olympus' }, NOW)).toThrow(ConfigError);
    expect(() => parseProfileSettings({ day_boundary_hour: 24 }, NOW)).toThrow(ConfigError);
    expect(() => parseProfileSettings({ year_start: '01/01/2026' }, NOW)).toThrow(ConfigError);
  });

  it('round-trips through the stored snake_case form', () => {
    const settings = parseProfileSettings({ playlist_name: 'Daily 2026', cooldown_entries: 30, smtp_port: 465 }, NOW);
    expect(parseProfileSettings(serializeProfileSettings(settings), NOW)).toEqual(settings);
  });

  it('writes defaults on first load', async () => {
    const store = new MemoryDocumentStore();
    const settings = await loadProfileSettings(store, NOW);
    expect(settings).toEqual(defaultProfileSettings(NOW));
    expect(await store.get(PROFILE_SETTINGS_KEY)).toEqual(serializeProfileSettings(settings));
  });
});
