import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { Logger } from './logger.js';
import { isIsoDate, isValidTimezone, localYear } from './date.js';
import { ConfigError } from '../types/errors.js';
import type { IDocumentStore, SelectionMode } from '../types/index.js';

// ---------------------------------------------------------------------------
// Application config: credentials, rate limits, state root (YAML + env)
// ---------------------------------------------------------------------------

export interface SpotifyConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface RateLimitBucketConfig {
  maxConcurrent: number;
  minTime: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface AppConfig {
  spotify: SpotifyConfig;
  stateDir: string;
  rateLimit: { spotify: RateLimitBucketConfig };
  retry: RetryConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
}

function resolveConfigPath(env: NodeJS.ProcessEnv): string {
  const fromEnv = env.CONFIG_PATH;
  if (fromEnv && fromEnv.trim().length > 0) {
    return path.resolve(fromEnv);
  }
  // Assume the app is started from the project root
  return path.resolve(process.cwd(), 'config', 'config.yaml');
}

export function loadAppConfig(filePath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfgPath = filePath ? path.resolve(filePath) : resolveConfigPath(env);
  let raw: unknown = {};
  if (fs.existsSync(cfgPath)) {
    raw = yaml.load(fs.readFileSync(cfgPath, 'utf8')) ?? {};
  } else if (filePath || env.CONFIG_PATH) {
    throw new ConfigError(`Configuration file not found at: ${cfgPath}`);
  }
  // Basic runtime shape check to surface obvious issues early
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid configuration: expected a YAML mapping at the root.');
  }
  return parseAppConfig(raw, env);
}

export function parseAppConfig(raw: Record<string, unknown>, env: NodeJS.ProcessEnv = {}): AppConfig {
  const spotify = isRecord(raw.spotify) ? raw.spotify : {};
  const clientId = str(env.SPOTIFY_CLIENT_ID) ?? str(spotify.clientId);
  const clientSecret = str(env.SPOTIFY_CLIENT_SECRET) ?? str(spotify.clientSecret);
  const refreshToken = str(env.SPOTIFY_REFRESH_TOKEN) ?? str(spotify.refreshToken);
  const missing = [
    clientId ? null : 'spotify.clientId',
    clientSecret ? null : 'spotify.clientSecret',
    refreshToken ? null : 'spotify.refreshToken',
  ].filter((k): k is string => k !== null);
  if (!clientId || !clientSecret || !refreshToken) {
    throw new ConfigError(`Invalid configuration: missing ${missing.join(', ')} (or the matching SPOTIFY_* environment variables).`);
  }

  const rateLimit = isRecord(raw.rateLimit) && isRecord(raw.rateLimit.spotify) ? raw.rateLimit.spotify : {};
  const retry = isRecord(raw.retry) ? raw.retry : {};
  const stateDir = str(env.SONG_OF_THE_DAY_STATE_DIR) ?? str(raw.stateDir) ?? '~/.song-of-the-day';

  return {
    spotify: { clientId, clientSecret, refreshToken },
    stateDir: path.resolve(expandHome(stateDir)),
    rateLimit: {
      spotify: {
        maxConcurrent: num(rateLimit.maxConcurrent) ?? 1,
        minTime: num(rateLimit.minTime) ?? 100,
      },
    },
    retry: {
      maxAttempts: num(retry.maxAttempts) ?? 3,
      baseDelayMs: num(retry.baseDelayMs) ?? 500,
    },
  };
}

// ---------------------------------------------------------------------------
// Run context: which profile this invocation works on
// ---------------------------------------------------------------------------

export interface RunContext {
  profile: string;
  stateDir: string;
}

export function createRunContext(appConfig: AppConfig, profile?: string): RunContext {
  const name = profile && profile.trim().length > 0 ? profile.trim() : 'default';
  if (!/^[A-Za-z0-9._-]+$/.test(name)) {
    throw new ConfigError(`Invalid profile name "${name}": use letters, digits, '.', '_' or '-'.`);
  }
  return { profile: name, stateDir: path.join(appConfig.stateDir, name) };
}

// ---------------------------------------------------------------------------
// Profile settings: the per-profile `config` document
// ---------------------------------------------------------------------------

export const PROFILE_SETTINGS_KEY = 'config';

export const SELECTION_MODES: readonly SelectionMode[] = ['most_played', 'weighted_random', 'strongly_weighted_random'];

export interface EmailSettings {
  enabled: boolean;
  onFinalize: boolean;
  to: string | null;
  from: string | null;
  smtpHost: string;
  smtpPort: number;
  smtpUser: string | null;
  smtpPass: string | null;
}

export interface ProfileSettings {
  playlistName: string;
  playlistId: string | null;
  timezone: string;
  cooldownEntries: number;
  minDurationMs: number;
  selectionMode: SelectionMode;
  dayBoundaryHour: number;
  yearStart: string | null;
  includeLikedToday: boolean;
  createPlaylistIfMissing: boolean;
  playlistPublic: boolean;
  email: EmailSettings;
}

export const DEFAULT_TIMEZONE = 'America/New_York';

// The default name carries the year as seen in the profile's timezone
export function defaultProfileSettings(now: Date, timezone: string = DEFAULT_TIMEZONE): ProfileSettings {
  return {
    playlistName: `Songs of the Day ${localYear(now, timezone)}`,
    playlistId: null,
    timezone,
    cooldownEntries: 90,
    minDurationMs: 50_000,
    selectionMode: 'weighted_random',
    dayBoundaryHour: 0,
    yearStart: null,
    includeLikedToday: false,
    createPlaylistIfMissing: true,
    playlistPublic: false,
    email: {
      enabled: false,
      onFinalize: true,
      to: null,
      from: null,
      smtpHost: 'smtp.gmail.com',
      smtpPort: 587,
      smtpUser: null,
      smtpPass: null,
    },
  };
}

function isSelectionMode(value: unknown): value is SelectionMode {
  return SELECTION_MODES.some((m) => m === value);
}

function nonNegativeInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function optionalStr(value: unknown): string | null {
  return str(value) ?? null;
}

/**
 * Validates a stored settings document. Fields that decide the target
 * (timezone, day boundary, year start) must be valid; cooldown, minimum
 * duration and selection mode fall back to their defaults with a warning.
 */
export function parseProfileSettings(raw: unknown, now: Date): ProfileSettings {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid profile settings: expected a JSON object.');
  }
  const timezone = raw.timezone === undefined ? DEFAULT_TIMEZONE : str(raw.timezone);
  if (!timezone || !isValidTimezone(timezone)) {
    throw new ConfigError(`Invalid profile settings: unknown timezone "${String(raw.timezone)}".`);
  }
  const defaults = defaultProfileSettings(now, timezone);

  const playlistName = raw.playlist_name === undefined ? defaults.playlistName : str(raw.playlist_name);
  if (!playlistName) {
    throw new ConfigError('Invalid profile settings: "playlist_name" must be a non-empty string.');
  }

  let dayBoundaryHour = defaults.dayBoundaryHour;
  if (raw.day_boundary_hour !== undefined) {
    const h = nonNegativeInt(raw.day_boundary_hour);
    if (h === undefined || h > 23) {
      throw new ConfigError(`Invalid profile settings: "day_boundary_hour" must be an integer 0-23, got ${String(raw.day_boundary_hour)}.`);
    }
    dayBoundaryHour = h;
  }

  let yearStart: string | null = null;
  if (raw.year_start !== undefined && raw.year_start !== null) {
    if (typeof raw.year_start !== 'string' || !isIsoDate(raw.year_start)) {
      throw new ConfigError(`Invalid profile settings: "year_start" must be YYYY-MM-DD, got ${String(raw.year_start)}.`);
    }
    yearStart = raw.year_start;
  }

  let cooldownEntries = defaults.cooldownEntries;
  if (raw.cooldown_entries !== undefined) {
    const c = nonNegativeInt(raw.cooldown_entries);
    if (c === undefined) Logger.warn(`Ignoring invalid cooldown_entries ${String(raw.cooldown_entries)}; using ${cooldownEntries}.`);
    else cooldownEntries = c;
  }

  let minDurationMs = defaults.minDurationMs;
  if (raw.min_duration_ms !== undefined) {
    const m = nonNegativeInt(raw.min_duration_ms);
    if (m === undefined) Logger.warn(`Ignoring invalid min_duration_ms ${String(raw.min_duration_ms)}; using ${minDurationMs}.`);
    else minDurationMs = m;
  }

  let selectionMode = defaults.selectionMode;
  if (raw.selection_mode !== undefined) {
    if (isSelectionMode(raw.selection_mode)) selectionMode = raw.selection_mode;
    else Logger.warn(`Ignoring unknown selection_mode ${String(raw.selection_mode)}; using ${selectionMode}.`);
  }

  return {
    playlistName,
    playlistId: optionalStr(raw.playlist_id),
    timezone,
    cooldownEntries,
    minDurationMs,
    selectionMode,
    dayBoundaryHour,
    yearStart,
    includeLikedToday: bool(raw.include_liked_today, defaults.includeLikedToday),
    createPlaylistIfMissing: bool(raw.create_playlist_if_missing, defaults.createPlaylistIfMissing),
    playlistPublic: bool(raw.playlist_public, defaults.playlistPublic),
    email: {
      enabled: bool(raw.email_enabled, defaults.email.enabled),
      onFinalize: bool(raw.email_on_finalize, defaults.email.onFinalize),
      to: optionalStr(raw.email_to),
      from: optionalStr(raw.email_from),
      smtpHost: str(raw.smtp_host) ?? defaults.email.smtpHost,
      smtpPort: nonNegativeInt(raw.smtp_port) ?? defaults.email.smtpPort,
      smtpUser: optionalStr(raw.smtp_user),
      smtpPass: optionalStr(raw.smtp_pass),
    },
  };
}

export function serializeProfileSettings(settings: ProfileSettings): Record<string, unknown> {
  return {
    playlist_name: settings.playlistName,
    playlist_id: settings.playlistId,
    timezone: settings.timezone,
    cooldown_entries: settings.cooldownEntries,
    min_duration_ms: settings.minDurationMs,
    selection_mode: settings.selectionMode,
    day_boundary_hour: settings.dayBoundaryHour,
    year_start: settings.yearStart,
    include_liked_today: settings.includeLikedToday,
    create_playlist_if_missing: settings.createPlaylistIfMissing,
    playlist_public: settings.playlistPublic,
    email_enabled: settings.email.enabled,
    email_on_finalize: settings.email.onFinalize,
    email_to: settings.email.to,
    email_from: settings.email.from,
    smtp_host: settings.email.smtpHost,
    smtp_port: settings.email.smtpPort,
    smtp_user: settings.email.smtpUser,
    smtp_pass: settings.email.smtpPass,
  };
}

// Load the profile's settings, writing defaults on first use
export async function loadProfileSettings(store: IDocumentStore, now: Date): Promise<ProfileSettings> {
  const raw = await store.get(PROFILE_SETTINGS_KEY);
  if (raw === null) {
    const defaults = defaultProfileSettings(now);
    await store.set(PROFILE_SETTINGS_KEY, serializeProfileSettings(defaults));
    Logger.info('Created default profile settings.');
    return defaults;
  }
  return parseProfileSettings(raw, now);
}

export async function saveProfileSettings(store: IDocumentStore, settings: ProfileSettings): Promise<void> {
  await store.set(PROFILE_SETTINGS_KEY, serializeProfileSettings(settings));
}
