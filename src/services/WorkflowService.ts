import { Logger } from '../utils/logger.js';
import { loadProfileSettings } from '../utils/config.js';
import type { EmailSettings, ProfileSettings, RunContext } from '../utils/config.js';
import { EmailNotifier } from '../modules/notifiers/EmailNotifier.js';
import { ReportRenderer } from '../modules/reports/ReportRenderer.js';
import { ListeningLedger } from './ListeningLedger.js';
import type { PollResult } from './ListeningLedger.js';
import { PlaylistService } from './PlaylistService.js';
import { AdditionLog } from './AdditionLog.js';
import { SongSelector } from './SongSelector.js';
import { CandidateResolver } from './CandidateResolver.js';
import { ReconciliationService } from './ReconciliationService.js';
import { buildStatus, buildWeeklySummary } from './SummaryService.js';
import type { StatusReport, WeeklySummary } from './SummaryService.js';
import { effectiveDate } from './TargetScheduler.js';
import type { Clock, FinalizeReport, ICatalog, IDocumentStore, INotifier, RandomSource } from '../types/index.js';

export type NotifierFactory = (email: EmailSettings) => INotifier;
export type Output = (text: string) => void;

export interface WorkflowDeps {
  context: RunContext;
  store: IDocumentStore;
  catalog: ICatalog;
  random?: RandomSource;
  clock?: Clock;
  createNotifier?: NotifierFactory;
  renderer?: ReportRenderer;
  output?: Output;
}

export interface WeeklySummaryResult {
  summary: WeeklySummary;
  emailed: boolean;
  ok: boolean;
}

/**
 * Wires the engine for one profile and runs one CLI mode against it.
 */
export class WorkflowService {
  readonly settings: ProfileSettings;
  private readonly context: RunContext;
  private readonly clock: Clock;
  private readonly notifier: INotifier;
  private readonly renderer: ReportRenderer;
  private readonly output: Output;
  private readonly ledger: ListeningLedger;
  private readonly playlists: PlaylistService;
  private readonly additions: AdditionLog;
  private readonly reconciler: ReconciliationService;

  private constructor(deps: WorkflowDeps, settings: ProfileSettings) {
    this.settings = settings;
    this.context = deps.context;
    this.clock = deps.clock ?? (() => new Date());
    this.notifier = (deps.createNotifier ?? ((email) => new EmailNotifier(email)))(settings.email);
    this.renderer = deps.renderer ?? new ReportRenderer();
    this.output = deps.output ?? ((text) => console.log(text));

    const { timezone, dayBoundaryHour } = settings;
    this.ledger = new ListeningLedger(deps.store, deps.catalog, { timezone, dayBoundaryHour, clock: this.clock });
    this.playlists = new PlaylistService(deps.catalog, deps.store, settings, this.clock);
    this.additions = new AdditionLog(deps.store, this.clock);
    const resolver = new CandidateResolver(this.ledger, deps.catalog, new SongSelector(deps.random), {
      timezone,
      dayBoundaryHour,
      minDurationMs: settings.minDurationMs,
      selectionMode: settings.selectionMode,
      includeLikedToday: settings.includeLikedToday,
    });
    this.reconciler = new ReconciliationService({
      profile: deps.context.profile,
      settings,
      playlists: this.playlists,
      resolver,
      additions: this.additions,
      clock: this.clock,
    });
  }

  static async create(deps: WorkflowDeps): Promise<WorkflowService> {
    const now = (deps.clock ?? (() => new Date()))();
    const settings = await loadProfileSettings(deps.store, now);
    return new WorkflowService(deps, settings);
  }

  async poll(): Promise<PollResult> {
    return this.ledger.poll();
  }

  async finalize(dryRun: boolean): Promise<FinalizeReport> {
    const report = await this.reconciler.run({ dryRun });
    const message = this.renderer.renderFinalize(report);
    this.output(message.text);

    if (dryRun) {
      Logger.info('[dryRun] Report not emailed.');
    } else if (this.settings.email.onFinalize) {
      await this.notifier.send(message);
    }
    return report;
  }

  async status(refresh: boolean): Promise<StatusReport> {
    if (refresh) {
      Logger.info('Refreshing listening data...');
      await this.ledger.poll();
    }
    const status = await buildStatus({
      profile: this.context.profile,
      settings: this.settings,
      playlists: this.playlists,
      ledger: this.ledger,
      clock: this.clock,
    });
    this.output(this.renderer.renderStatus(status));
    return status;
  }

  async weeklySummary(): Promise<WeeklySummaryResult> {
    const end = effectiveDate(this.clock(), this.settings.dayBoundaryHour, this.settings.timezone);
    Logger.info('Generating weekly summary...');
    const summary = await buildWeeklySummary(this.additions, end);
    const message = this.renderer.renderWeeklySummary(summary);
    this.output(message.text);

    if (!this.settings.email.enabled) {
      Logger.info('Email not enabled; set email_enabled and the SMTP fields in the profile config to send this summary.');
      return { summary, emailed: false, ok: true };
    }
    const emailed = await this.notifier.send(message);
    if (!emailed) Logger.error('Failed to send weekly summary email.');
    return { summary, emailed, ok: emailed };
  }

  async notifyFailure(err: unknown, context: string): Promise<boolean> {
    const message = this.renderer.renderFailure(err, context, this.clock(), this.settings.timezone);
    return this.notifier.send(message);
  }
}
