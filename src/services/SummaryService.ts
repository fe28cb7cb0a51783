import { Logger } from '../utils/logger.js';
import { addDays, formatLocal } from '../utils/date.js';
import type { ProfileSettings } from '../utils/config.js';
import { computeTargetState } from './TargetScheduler.js';
import { entriesAddedOn } from './PlaylistService.js';
import type { PlaylistService } from './PlaylistService.js';
import type { ListeningLedger } from './ListeningLedger.js';
import type { AdditionLog } from './AdditionLog.js';
import { NotFoundError, TransientIOError } from '../types/errors.js';
import type { AdditionRecord, Clock, PlaylistEntry } from '../types/index.js';

export const SUMMARY_DAYS = 7;
export const STATUS_RECENT_TRACKS = 5;
export const STATUS_TOP_PLAYS = 10;

export interface SummaryDay {
  date: string;
  additions: AdditionRecord[];
}

export interface WeeklySummary {
  startDate: string;
  endDate: string;
  days: SummaryDay[]; // oldest first
  total: number;
  manual: number;
  auto: number;
}

export interface PlayCountLine {
  trackId: string;
  trackName: string;
  artist: string;
  count: number;
}

export interface PlaylistStatus {
  playlistId: string;
  total: number;
  delta: number; // total - target; negative means behind
  addedOnDate: PlaylistEntry[];
  lastTracks: PlaylistEntry[];
}

export interface StatusReport {
  profile: string;
  generatedAt: string;
  timezone: string;
  playlistName: string;
  playlistId: string | null;
  cooldownEntries: number;
  minDurationMs: number;
  effectiveDate: string;
  dayNumber: number;
  target: number;
  playlist: PlaylistStatus | null;
  playlistProblem: string | null;
  lastPoll: string | null;
  totalPlays: number;
  uniqueTracks: number;
  topPlays: PlayCountLine[];
  moreTracks: number;
}

export async function buildWeeklySummary(additions: AdditionLog, endDate: string): Promise<WeeklySummary> {
  const startDate = addDays(endDate, -(SUMMARY_DAYS - 1));
  const records = await additions.forPeriod(startDate, endDate);
  const days: SummaryDay[] = [];
  for (let i = 0; i < SUMMARY_DAYS; i++) {
    const date = addDays(startDate, i);
    days.push({ date, additions: records.filter((r) => r.date === date) });
  }
  return {
    startDate,
    endDate,
    days,
    total: records.length,
    manual: records.filter((r) => r.source === 'user').length,
    auto: records.filter((r) => r.source === 'auto').length,
  };
}

export interface StatusDeps {
  profile: string;
  settings: ProfileSettings;
  playlists: PlaylistService;
  ledger: ListeningLedger;
  clock?: Clock;
}

/**
 * Read-only snapshot of where the profile stands. A missing playlist or an
 * unreachable catalog is reported rather than thrown.
 */
export async function buildStatus(deps: StatusDeps): Promise<StatusReport> {
  const { settings, playlists, ledger } = deps;
  const now = (deps.clock ?? (() => new Date()))();
  const target = computeTargetState(now, settings);

  let playlist: PlaylistStatus | null = null;
  let playlistProblem: string | null = null;
  try {
    const snapshot = await playlists.takeSnapshot({ create: false });
    const ordered = [...snapshot.tracks].sort((a, b) => a.position - b.position);
    playlist = {
      playlistId: snapshot.playlistId,
      total: snapshot.trackCount,
      delta: snapshot.trackCount - target.targetCount,
      addedOnDate: entriesAddedOn(snapshot, target.effectiveDate, settings.timezone, settings.dayBoundaryHour),
      lastTracks: ordered.slice(-STATUS_RECENT_TRACKS),
    };
  } catch (err) {
    if (!(err instanceof NotFoundError || err instanceof TransientIOError)) throw err;
    playlistProblem = err.message;
    Logger.warn(`Playlist state unavailable: ${err.message}`);
  }

  const daily = await ledger.load(target.effectiveDate);
  const ranked = Object.entries(daily.playCounts).sort((a, b) => b[1] - a[1]);
  const topPlays = ranked.slice(0, STATUS_TOP_PLAYS).map(([trackId, count]) => {
    const play = daily.plays.find((p) => p.trackId === trackId);
    return { trackId, trackName: play?.trackName ?? trackId, artist: play?.artist ?? '', count };
  });

  return {
    profile: deps.profile,
    generatedAt: formatLocal(now, settings.timezone, 'HH:mm'),
    timezone: settings.timezone,
    playlistName: settings.playlistName,
    playlistId: playlist?.playlistId ?? settings.playlistId,
    cooldownEntries: settings.cooldownEntries,
    minDurationMs: settings.minDurationMs,
    effectiveDate: target.effectiveDate,
    dayNumber: target.dayNumber,
    target: target.targetCount,
    playlist,
    playlistProblem,
    lastPoll: daily.lastPoll,
    totalPlays: daily.plays.length,
    uniqueTracks: ranked.length,
    topPlays,
    moreTracks: Math.max(0, ranked.length - STATUS_TOP_PLAYS),
  };
}
