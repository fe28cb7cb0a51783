import { Logger } from '../utils/logger.js';
import type { ProfileSettings } from '../utils/config.js';
import { computeTargetState } from './TargetScheduler.js';
import type { TargetState } from './TargetScheduler.js';
import { cooldownTrackIds, entriesAddedOn } from './PlaylistService.js';
import type { PlaylistService } from './PlaylistService.js';
import type { CandidateResolver } from './CandidateResolver.js';
import type { AdditionLog } from './AdditionLog.js';
import { CommitError } from '../types/errors.js';
import type {
  Clock,
  FinalizeReport,
  PlaylistSnapshot,
  ReconcileState,
  ReportedAddition,
  SelectedTrack,
} from '../types/index.js';

export interface ReconcileDeps {
  profile: string;
  settings: ProfileSettings;
  playlists: PlaylistService;
  resolver: CandidateResolver;
  additions: AdditionLog;
  clock?: Clock;
}

export interface ReconcileOptions {
  // Run every step but skip playlist writes and addition-log writes
  dryRun: boolean;
}

/**
 * Brings the playlist's song count up to the day-of-year target.
 *
 * IDLE → SNAPSHOT_TAKEN → ON_TARGET | CATCHING_UP → DONE | FAILED
 *
 * Every run recomputes what is missing from a fresh snapshot, so a killed
 * or repeated run converges on the next invocation. Additions already
 * committed are never rolled back.
 */
export class ReconciliationService {
  private readonly deps: ReconcileDeps;
  private readonly clock: Clock;
  private state: ReconcileState = 'IDLE';

  constructor(deps: ReconcileDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  getState(): ReconcileState {
    return this.state;
  }

  private transition(next: ReconcileState): void {
    Logger.debug(`Reconcile: ${this.state} → ${next}`);
    this.state = next;
  }

  async run(options: ReconcileOptions): Promise<FinalizeReport> {
    const { settings, playlists, resolver } = this.deps;
    this.state = 'IDLE';
    const now = this.clock();
    const target = computeTargetState(now, settings);
    const report = this.emptyReport(target, options.dryRun);

    Logger.info(`Finalizing ${target.effectiveDate} (day ${target.dayNumber}, target ${target.targetCount})${options.dryRun ? ' [dry run]' : ''}`);

    let snapshot: PlaylistSnapshot;
    try {
      snapshot = await playlists.takeSnapshot();
    } catch (err) {
      return this.fail(report, `Could not load playlist '${settings.playlistName}': ${describe(err)}`, err);
    }
    this.transition('SNAPSHOT_TAKEN');
    report.countBefore = snapshot.trackCount;
    report.countAfter = snapshot.trackCount;

    report.earlierAdditions = await this.reconcileManualAdditions(snapshot, target.effectiveDate, options.dryRun);

    const songsNeeded = target.targetCount - snapshot.trackCount;
    report.songsNeeded = Math.max(0, songsNeeded);

    if (songsNeeded <= 0) {
      this.transition('ON_TARGET');
      Logger.info(`Playlist has ${snapshot.trackCount} songs for target ${target.targetCount}; nothing to add.`);
      // Pools only, for the report
      const cooldown = cooldownTrackIds(snapshot, settings.cooldownEntries);
      const resolution = await resolver.resolve(target.effectiveDate, cooldown, { select: false });
      report.tiers = resolution.tiers;
      return this.finish(report);
    }

    this.transition('CATCHING_UP');
    Logger.info(`Playlist has ${snapshot.trackCount} songs, target ${target.targetCount}: ${songsNeeded} to add.`);
    const pickedIds = new Set<string>();

    for (let i = 0; i < songsNeeded; i++) {
      // Refetch after each real addition so the cooldown window includes it
      if (pickedIds.size > 0 && !options.dryRun) {
        try {
          snapshot = await playlists.takeSnapshot();
        } catch (err) {
          report.error = `Could not refresh playlist after ${report.autoAdditions.length} addition(s): ${describe(err)}`;
          Logger.error(report.error, err);
          break;
        }
      }

      const excluded = cooldownTrackIds(snapshot, settings.cooldownEntries);
      for (const id of pickedIds) excluded.add(id);

      const resolution = await resolver.resolve(target.effectiveDate, excluded, { select: true });
      if (i === 0) report.tiers = resolution.tiers;

      const pick = resolution.pick;
      if (!pick) {
        const shortfall = songsNeeded - report.autoAdditions.length;
        const warning = `No eligible candidates left; ${shortfall} song(s) still missing.`;
        Logger.warn(warning);
        report.warnings.push(warning);
        break;
      }

      try {
        await this.commit(snapshot.playlistId, pick, options.dryRun);
      } catch (err) {
        report.error = describe(err);
        Logger.error('Stopping catch-up after a failed playlist write.', err);
        break;
      }
      pickedIds.add(pick.candidate.trackId);
      report.autoAdditions.push(toReported(pick));
      report.countAfter = report.countBefore + report.autoAdditions.length;

      if (!options.dryRun) {
        const warning = await this.logAutoAddition(pick, target.effectiveDate);
        if (warning) report.warnings.push(warning);
      }
    }

    if (report.autoAdditions.length > 0 && !options.dryRun) {
      try {
        const finalSnapshot = await playlists.takeSnapshot();
        report.countAfter = finalSnapshot.trackCount;
      } catch (err) {
        Logger.warn(`Could not refresh the playlist snapshot after adding songs: ${describe(err)}`);
      }
    }

    return this.finish(report);
  }

  /**
   * Logs every entry added on the effective date that is not in the addition
   * log yet as a user addition, whenever the manual edit happened.
   */
  private async reconcileManualAdditions(snapshot: PlaylistSnapshot, date: string, dryRun: boolean): Promise<ReportedAddition[]> {
    const { settings, additions } = this.deps;
    const todays = entriesAddedOn(snapshot, date, settings.timezone, settings.dayBoundaryHour);
    const known = todays.length > 0 ? await additions.load() : [];
    const reported: ReportedAddition[] = [];
    for (const entry of todays) {
      const existing = known.find((e) => e.date === date && e.trackId === entry.trackId);
      if (existing) {
        // Already logged, possibly as one of our own picks
        reported.push({ trackId: entry.trackId, trackName: entry.trackName, artist: entry.artist, source: existing.source });
        continue;
      }
      Logger.info(`Found song added on ${date}: ${entry.trackName} — ${entry.artist}`);
      if (!dryRun) {
        await additions.record({ date, trackId: entry.trackId, trackName: entry.trackName, artist: entry.artist, source: 'user' });
      }
      reported.push({ trackId: entry.trackId, trackName: entry.trackName, artist: entry.artist, source: 'user' });
    }
    return reported;
  }

  // Only the playlist write decides whether a pick counts
  private async commit(playlistId: string, pick: SelectedTrack, dryRun: boolean): Promise<void> {
    const { trackId, trackName, artist } = pick.candidate;
    if (dryRun) {
      Logger.info(`[dryRun] Would add: ${trackName} — ${artist}`);
      return;
    }
    try {
      await this.deps.playlists.addTrack(playlistId, trackId);
    } catch (err) {
      throw new CommitError([trackId], err);
    }
    Logger.info(`Added: ${trackName} — ${artist}`);
  }

  // The track is already in the playlist; a log failure becomes a report warning
  private async logAutoAddition(pick: SelectedTrack, date: string): Promise<string | null> {
    const { trackId, trackName, artist } = pick.candidate;
    try {
      await this.deps.additions.record({ date, trackId, trackName, artist, source: 'auto' });
      return null;
    } catch (err) {
      const warning = `Added ${trackName} — ${artist} but could not record it in the addition log: ${describe(err)}`;
      Logger.error(warning, err);
      return warning;
    }
  }

  private finish(report: FinalizeReport): FinalizeReport {
    report.behindSchedule = report.countAfter < report.target;
    // Partial progress still counts; only "needed songs, added none" fails
    report.ok = report.songsNeeded === 0 || report.autoAdditions.length > 0;
    this.transition(report.ok ? 'DONE' : 'FAILED');
    report.state = this.state;
    if (!report.ok && !report.error) {
      report.error = `Needed ${report.songsNeeded} song(s) but could not add any.`;
    }
    return report;
  }

  private fail(report: FinalizeReport, message: string, err: unknown): FinalizeReport {
    Logger.error(message, err);
    report.error = message;
    report.ok = false;
    report.behindSchedule = true;
    this.transition('FAILED');
    report.state = this.state;
    return report;
  }

  private emptyReport(target: TargetState, dryRun: boolean): FinalizeReport {
    return {
      profile: this.deps.profile,
      playlistName: this.deps.settings.playlistName,
      effectiveDate: target.effectiveDate,
      dayNumber: target.dayNumber,
      target: target.targetCount,
      countBefore: 0,
      countAfter: 0,
      songsNeeded: 0,
      dryRun,
      state: this.state,
      ok: false,
      behindSchedule: false,
      earlierAdditions: [],
      autoAdditions: [],
      tiers: [],
      warnings: [],
      error: null,
    };
  }
}

function toReported(pick: SelectedTrack): ReportedAddition {
  return {
    trackId: pick.candidate.trackId,
    trackName: pick.candidate.trackName,
    artist: pick.candidate.artist,
    source: 'auto',
    tier: pick.tier,
    playCount: pick.playCount,
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
