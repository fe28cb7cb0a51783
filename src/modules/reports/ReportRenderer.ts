import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import ejs from 'ejs';
import { formatDayName, formatLocal, formatShortDate } from '../../utils/date.js';
import { TIER_LABELS } from '../../services/CandidateResolver.js';
import type { StatusReport, WeeklySummary } from '../../services/SummaryService.js';
import type { AdditionSource, FinalizeReport, RenderedMessage, ReportedAddition, TierName } from '../../types/index.js';

const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../../templates/', import.meta.url));

export const SOURCE_LEGEND = '👤 = manually added, 🤖 = auto-picked';
const RULE = '─'.repeat(50);

export function sourceIcon(source: AdditionSource): string {
  return source === 'user' ? '👤' : '🤖';
}

function plays(n: number): string {
  return `${n} play${n === 1 ? '' : 's'}`;
}

// Why an addition is in the report: manual, picked now, or picked by an earlier run
export function additionNote(addition: ReportedAddition): string {
  if (addition.source === 'user') return 'added manually';
  if (addition.tier) return `${TIER_LABELS[addition.tier]}, ${plays(addition.playCount ?? 0)}`;
  return 'auto-picked earlier';
}

// Pre-filter verdicts of one tier, flattened for the report
function consideredIn(report: FinalizeReport, tier: TierName) {
  return (report.tiers.find((t) => t.tier === tier)?.considered ?? []).map((v) => ({
    trackName: v.candidate.trackName,
    artist: v.candidate.artist,
    playCount: v.playCount,
    eligible: v.eligible,
    reason: v.reason,
  }));
}

export function finalizeTitle(report: FinalizeReport): string {
  return `🎵 Song of the Day — ${report.effectiveDate} (day ${report.dayNumber})`;
}

export function finalizeSubject(report: FinalizeReport): string {
  const prefix = report.ok ? '' : '❌ ';
  const suffix = report.behindSchedule ? ' ⚠️ behind schedule' : '';
  return `${prefix}${finalizeTitle(report)}${suffix}`;
}

export class ReportRenderer {
  private readonly templatesDir: string;

  constructor(templatesDir: string = DEFAULT_TEMPLATES_DIR) {
    this.templatesDir = templatesDir;
  }

  private renderTemplate(name: string, data: Record<string, unknown>): string {
    const template = fs.readFileSync(path.join(this.templatesDir, name), 'utf8');
    return ejs.render(template, data);
  }

  renderFinalize(report: FinalizeReport): RenderedMessage {
    const additions = [...report.earlierAdditions, ...report.autoAdditions].map((a) => ({
      icon: sourceIcon(a.source),
      trackName: a.trackName,
      artist: a.artist,
      note: additionNote(a),
    }));
    const candidates = consideredIn(report, 'today');
    const liked = consideredIn(report, 'liked_today');

    const lines = [
      finalizeTitle(report),
      `Playlist: ${report.playlistName} (profile ${report.profile})`,
      `Songs: ${report.countBefore} → ${report.countAfter} (target ${report.target})`,
    ];
    if (report.dryRun) lines.push('Dry run: no changes were made.');
    if (report.behindSchedule) lines.push(`⚠️ Behind schedule by ${report.target - report.countAfter} song(s).`);
    lines.push('');
    if (additions.length > 0) {
      lines.push('Added:');
      for (const a of additions) lines.push(`  ${a.icon} ${a.trackName} — ${a.artist} (${a.note})`);
    } else {
      lines.push('No songs added.');
    }
    if (candidates.length > 0) {
      lines.push('', "Today's listening:");
      for (const c of candidates) {
        lines.push(`  ${c.playCount}x ${c.trackName} — ${c.artist}${c.eligible ? '' : ` (${c.reason})`}`);
      }
    }
    if (liked.length > 0) {
      lines.push('', 'Liked today:');
      for (const c of liked) {
        lines.push(`  ${c.trackName} — ${c.artist}${c.eligible ? '' : ` (${c.reason})`}`);
      }
    }
    if (report.tiers.length > 0) {
      lines.push('', 'Candidate tiers:');
      for (const t of report.tiers) {
        lines.push(`  ${t.label}: ${t.consulted ? `${t.eligibleCount} eligible` : 'not consulted'}`);
      }
    }
    if (report.warnings.length > 0 || report.error) lines.push('');
    for (const w of report.warnings) lines.push(`⚠️ ${w}`);
    if (report.error) lines.push(`❌ ${report.error}`);
    lines.push('', SOURCE_LEGEND);

    const html = this.renderTemplate('finalize-report.html.ejs', {
      title: finalizeTitle(report),
      report,
      additions,
      candidates,
      liked,
      tiers: report.tiers,
      legend: SOURCE_LEGEND,
    });
    return { subject: finalizeSubject(report), text: lines.join('\n'), html };
  }

  renderWeeklySummary(summary: WeeklySummary): RenderedMessage {
    const period = `Week of ${formatShortDate(summary.startDate)} – ${formatShortDate(summary.endDate, true)}`;
    const totals = `Total songs: ${summary.total} (${summary.manual} manual, ${summary.auto} auto-picked)`;
    const rows = summary.days.map((d) => ({
      dayName: formatDayName(d.date),
      additions: d.additions.map((a) => ({ icon: sourceIcon(a.source), trackName: a.trackName, artist: a.artist })),
    }));

    const lines = ['🎵 Song of the Day — Weekly Summary', period, '', totals, '', RULE];
    for (const row of rows) {
      if (row.additions.length === 0) {
        lines.push(`${row.dayName}: (no song)`);
        continue;
      }
      for (const a of row.additions) lines.push(`${row.dayName}: ${a.icon} ${a.trackName} — ${a.artist}`);
    }
    lines.push(RULE, '', SOURCE_LEGEND);

    const html = this.renderTemplate('weekly-summary.html.ejs', { period, totals, rows, legend: SOURCE_LEGEND });
    return {
      subject: `🎵 Song of the Day — Weekly Summary (${formatShortDate(summary.endDate)})`,
      text: lines.join('\n'),
      html,
    };
  }

  renderFailure(err: unknown, context: string, now: Date, timezone: string): RenderedMessage {
    const error = err instanceof Error ? (err.stack ?? `${err.name}: ${err.message}`) : String(err);
    const text = [
      `Song of the Day failed at ${formatLocal(now, timezone)} ${timezone}`,
      '',
      `Context: ${context || 'Unknown'}`,
      '',
      'Error:',
      error,
      '',
      'Please check the logs and fix the issue.',
    ].join('\n');
    return { subject: `🚨 Song of the Day Failed — ${formatLocal(now, timezone, 'YYYY-MM-DD')}`, text };
  }

  renderStatus(status: StatusReport): string {
    const header = `Song of the Day Status — ${status.effectiveDate} ${status.generatedAt} ${status.timezone}`;
    const lines = [
      '='.repeat(60),
      header,
      '='.repeat(60),
      '',
      `Profile: ${status.profile}`,
      `Playlist: ${status.playlistName}`,
    ];
    if (status.playlistId) lines.push(`Playlist ID: ${status.playlistId}`);
    lines.push(
      `Cooldown: ${status.cooldownEntries} entries`,
      `Min duration: ${Math.floor(status.minDurationMs / 1000)}s`,
      '',
      '--- Playlist State ---',
      `Day ${status.dayNumber}, target ${status.target} songs`,
    );

    const pl = status.playlist;
    if (!pl) {
      lines.push(`⚠️  ${status.playlistProblem ?? 'Playlist unavailable.'}`);
    } else {
      const delta = pl.delta === 0 ? 'on target' : pl.delta < 0 ? `behind by ${-pl.delta}` : `ahead by ${pl.delta}`;
      lines.push(`Total tracks: ${pl.total} (${delta})`);
      if (pl.addedOnDate.length > 0) {
        lines.push(`✅ Song added today: Yes (${pl.addedOnDate.length} track(s))`);
        for (const t of pl.addedOnDate) lines.push(`   → ${t.trackName} — ${t.artist}`);
      } else {
        lines.push('❌ Song added today: No', '   (Will auto-add at finalize time)');
      }
      if (pl.lastTracks.length > 0) {
        lines.push('', `Last ${pl.lastTracks.length} tracks in playlist:`);
        for (const t of pl.lastTracks) lines.push(`  [${t.addedAt.slice(0, 10)}] ${t.trackName} — ${t.artist}`);
      }
    }

    lines.push(
      '',
      "--- Today's Listening ---",
      `Last poll: ${status.lastPoll ?? 'Never'}`,
      `Total plays: ${status.totalPlays}`,
      `Unique tracks: ${status.uniqueTracks}`,
    );
    if (status.topPlays.length > 0) {
      lines.push('', 'Play counts:');
      for (const p of status.topPlays) lines.push(`  ${p.count}x - ${p.trackName} — ${p.artist}`);
      if (status.moreTracks > 0) lines.push(`  ... and ${status.moreTracks} more tracks`);
    }
    return lines.join('\n');
  }
}
