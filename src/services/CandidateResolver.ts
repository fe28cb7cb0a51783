import { Logger } from '../utils/logger.js';
import { trailingDates } from '../utils/date.js';
import { artistDisplay } from './ListeningLedger.js';
import type { ListeningLedger } from './ListeningLedger.js';
import { effectiveDateOf } from './TargetScheduler.js';
import type { SongSelector } from './SongSelector.js';
import { TransientIOError } from '../types/errors.js';
import type {
  Candidate,
  CandidateVerdict,
  CatalogTrack,
  DailyLedger,
  ICatalog,
  Resolution,
  SelectedTrack,
  SelectionMode,
  TierName,
  TierReport,
} from '../types/index.js';

export interface ResolverSettings {
  timezone: string;
  dayBoundaryHour: number;
  minDurationMs: number;
  selectionMode: SelectionMode;
  includeLikedToday: boolean;
  librarySampleSize?: number;
}

export interface ResolveOptions {
  // false: build the liked-today and today pools for reporting only
  select: boolean;
}

interface Pool {
  candidates: Candidate[];
  playCounts: Record<string, number>;
}

export const TIER_LABELS: Record<TierName, string> = {
  liked_today: 'Liked today',
  today: 'Today',
  last_2_days: 'Last 2 days',
  last_3_days: 'Last 3 days',
  last_7_days: 'Last week',
  library: 'Liked Songs sample',
};

const LEDGER_TIERS: ReadonlyArray<{ tier: TierName; days: number }> = [
  { tier: 'today', days: 1 },
  { tier: 'last_2_days', days: 2 },
  { tier: 'last_3_days', days: 3 },
  { tier: 'last_7_days', days: 7 },
];

const DEFAULT_LIBRARY_SAMPLE = 200;

export function isEligible(
  candidate: Candidate,
  cooldownIds: ReadonlySet<string>,
  minDurationMs: number,
): { eligible: boolean; reason: string } {
  if (cooldownIds.has(candidate.trackId)) {
    return { eligible: false, reason: 'in cooldown (recently added to playlist)' };
  }
  if (candidate.type === 'episode') {
    return { eligible: false, reason: 'podcast episode' };
  }
  if (candidate.durationMs < minDurationMs) {
    const secs = Math.floor(candidate.durationMs / 1000);
    return { eligible: false, reason: `too short (${secs}s < ${Math.floor(minDurationMs / 1000)}s)` };
  }
  return { eligible: true, reason: 'eligible' };
}

/**
 * Merges ledgers into one pool. Play counts add up across days; each
 * track's details come from its most recent play.
 */
export function poolFromLedgers(ledgers: DailyLedger[]): Pool {
  const byTrack = new Map<string, Candidate>();
  const playCounts: Record<string, number> = {};
  for (const ledger of ledgers) {
    for (const play of ledger.plays) {
      playCounts[play.trackId] = (playCounts[play.trackId] ?? 0) + 1;
      const existing = byTrack.get(play.trackId);
      if (!existing || play.playedAt > existing.lastSeenAt) {
        byTrack.set(play.trackId, {
          trackId: play.trackId,
          trackName: play.trackName,
          artist: play.artist,
          durationMs: play.durationMs,
          type: play.type,
          lastSeenAt: play.playedAt,
        });
      }
    }
  }
  return { candidates: [...byTrack.values()], playCounts };
}

/**
 * Walks the tier cascade (liked today, today, 2, 3 and 7 days, then a
 * library sample) and stops at the first tier with an eligible candidate.
 */
export class CandidateResolver {
  private readonly ledger: ListeningLedger;
  private readonly catalog: ICatalog;
  private readonly selector: SongSelector;
  private readonly settings: ResolverSettings;

  constructor(ledger: ListeningLedger, catalog: ICatalog, selector: SongSelector, settings: ResolverSettings) {
    this.ledger = ledger;
    this.catalog = catalog;
    this.selector = selector;
    this.settings = settings;
  }

  async resolve(date: string, excludedIds: ReadonlySet<string>, options: ResolveOptions): Promise<Resolution> {
    const tiers: TierReport[] = [];
    let pick: SelectedTrack | null = null;

    const ledgerCache = new Map<string, DailyLedger>();
    const ledgersFor = async (days: number): Promise<DailyLedger[]> => {
      const out: DailyLedger[] = [];
      for (const d of trailingDates(date, days)) {
        let l = ledgerCache.get(d);
        if (!l) {
          l = await this.ledger.load(d);
          ledgerCache.set(d, l);
        }
        out.push(l);
      }
      return out;
    };

    const todayPool = poolFromLedgers(await ledgersFor(1));

    if (this.settings.includeLikedToday) {
      const liked = await this.likedOn(date);
      const report = this.evaluate('liked_today', liked, todayPool.playCounts, excludedIds, true);
      tiers.push(report.tier);
      if (options.select && report.eligible.length > 0) {
        pick = this.pickFrom('liked_today', report.eligible, todayPool.playCounts);
      }
    }

    for (const entry of LEDGER_TIERS) {
      const isToday = entry.tier === 'today';
      // Today is always reported; wider windows only matter while nothing is picked
      if (!isToday && (pick || !options.select)) {
        tiers.push(skipped(entry.tier));
        continue;
      }
      const pool = isToday ? todayPool : poolFromLedgers(await ledgersFor(entry.days));
      const report = this.evaluate(entry.tier, pool.candidates, pool.playCounts, excludedIds, isToday);
      tiers.push(report.tier);
      if (!pick && options.select && report.eligible.length > 0) {
        pick = this.pickFrom(entry.tier, report.eligible, pool.playCounts);
      }
    }

    if (pick || !options.select) {
      tiers.push(skipped('library'));
      return { pick, tiers };
    }

    const sample = await this.librarySample();
    const report = this.evaluate('library', sample, {}, excludedIds, false);
    tiers.push(report.tier);
    const chosen = this.selector.pickUniform(report.eligible);
    if (chosen) {
      pick = { candidate: chosen, playCount: 0, tier: 'library' };
    } else {
      Logger.warn('No eligible songs found in any tier.');
    }
    return { pick, tiers };
  }

  private evaluate(
    tier: TierName,
    candidates: Candidate[],
    playCounts: Record<string, number>,
    excludedIds: ReadonlySet<string>,
    keepVerdicts: boolean,
  ): { tier: TierReport; eligible: Candidate[] } {
    const label = TIER_LABELS[tier];
    const considered: CandidateVerdict[] = [];
    const eligible: Candidate[] = [];
    for (const candidate of candidates) {
      const verdict = isEligible(candidate, excludedIds, this.settings.minDurationMs);
      if (verdict.eligible) eligible.push(candidate);
      else Logger.debug(`    Skipping ${candidate.trackName}: ${verdict.reason}`);
      considered.push({ candidate, playCount: playCounts[candidate.trackId] ?? 0, ...verdict });
    }
    Logger.debug(`  ${label}: ${eligible.length} eligible of ${candidates.length}`);
    return {
      tier: {
        tier,
        label,
        consulted: true,
        eligibleCount: eligible.length,
        considered: keepVerdicts ? considered.sort((a, b) => b.playCount - a.playCount) : [],
      },
      eligible,
    };
  }

  private pickFrom(tier: TierName, eligible: Candidate[], playCounts: Record<string, number>): SelectedTrack | null {
    const chosen = this.selector.selectFrom(eligible, playCounts, this.settings.selectionMode);
    if (!chosen) return null;
    Logger.info(`  Selected from ${tier}: ${chosen.candidate.trackName} — ${chosen.candidate.artist} (${chosen.playCount} plays)`);
    return { candidate: chosen.candidate, playCount: chosen.playCount, tier };
  }

  /**
   * Library additions on `date`. The source is newest first, so the scan
   * stops at the first entry older than `date`.
   */
  async likedOn(date: string): Promise<Candidate[]> {
    const out: Candidate[] = [];
    try {
      for await (const page of this.catalog.listLikedTracks()) {
        for (const item of page) {
          const day = effectiveDateOf(item.addedAt, this.settings.dayBoundaryHour, this.settings.timezone);
          if (day === null) {
            Logger.warn(`Skipping liked track ${item.track.name} with unreadable added_at "${item.addedAt}".`);
            continue;
          }
          if (day > date) continue;
          if (day < date) return out;
          if (item.track.id) out.push(toCandidate(item.track.id, item.track, item.addedAt));
        }
      }
    } catch (err) {
      if (!(err instanceof TransientIOError)) throw err;
      Logger.warn(`Liked tracks unavailable: ${err.message}`);
    }
    return out;
  }

  async librarySample(): Promise<Candidate[]> {
    const limit = this.settings.librarySampleSize ?? DEFAULT_LIBRARY_SAMPLE;
    const out: Candidate[] = [];
    try {
      for await (const page of this.catalog.listLikedTracks()) {
        for (const item of page) {
          if (item.track.id) out.push(toCandidate(item.track.id, item.track, item.addedAt));
          if (out.length >= limit) return out;
        }
      }
    } catch (err) {
      if (!(err instanceof TransientIOError)) throw err;
      Logger.warn(`Liked tracks unavailable for fallback: ${err.message}`);
    }
    return out;
  }
}

function toCandidate(trackId: string, track: CatalogTrack, seenAt: string): Candidate {
  return {
    trackId,
    trackName: track.name,
    artist: artistDisplay(track),
    durationMs: track.durationMs,
    type: track.type,
    lastSeenAt: seenAt,
  };
}

function skipped(tier: TierName): TierReport {
  return { tier, label: TIER_LABELS[tier], consulted: false, eligibleCount: 0, considered: [] };
}
