#!/usr/bin/env node
import { Command } from 'commander';
import { Logger } from './utils/logger.js';
import { PROFILE_SETTINGS_KEY, createRunContext, loadAppConfig } from './utils/config.js';
import type { RunContext } from './utils/config.js';
import { createSeededRandom } from './utils/random.js';
import { JsonDocumentStore } from './modules/store/JsonDocumentStore.js';
import { SpotifyCatalog } from './modules/catalog/SpotifyCatalog.js';
import { WorkflowService } from './services/WorkflowService.js';
import { ConfigError, TransientIOError } from './types/errors.js';

type Mode = 'poll' | 'finalize' | 'status' | 'dry-run' | 'weekly-summary';

interface CliOptions {
  poll?: boolean; // true for --poll, false for --no-poll
  finalize?: boolean;
  status?: boolean;
  dryRun?: boolean;
  weeklySummary?: boolean;
  profile?: string;
  quiet?: boolean;
  seed?: number;
  config?: string;
}

function resolveMode(options: CliOptions): Mode {
  const modes: Mode[] = [];
  if (options.poll === true) modes.push('poll');
  if (options.finalize) modes.push('finalize');
  if (options.status) modes.push('status');
  if (options.dryRun) modes.push('dry-run');
  if (options.weeklySummary) modes.push('weekly-summary');
  const [mode] = modes;
  if (!mode || modes.length > 1) {
    throw new ConfigError('Choose exactly one of --poll, --finalize, --status, --dry-run or --weekly-summary.');
  }
  return mode;
}

function parseSeed(value: string): number {
  const seed = parseInt(value, 10);
  if (Number.isNaN(seed)) throw new ConfigError(`Invalid --seed "${value}": expected an integer.`);
  return seed;
}

async function runMode(mode: Mode, options: CliOptions, workflow: WorkflowService): Promise<number> {
  switch (mode) {
    case 'poll':
      await workflow.poll();
      return 0;
    case 'status':
      await workflow.status(options.poll !== false);
      return 0;
    case 'finalize':
    case 'dry-run': {
      const report = await workflow.finalize(mode === 'dry-run');
      return report.ok ? 0 : 1;
    }
    case 'weekly-summary': {
      const result = await workflow.weeklySummary();
      return result.ok ? 0 : 1;
    }
  }
}

// Informational only; a flaky network must not fail the run before it starts
async function logCurrentUser(catalog: SpotifyCatalog): Promise<void> {
  try {
    Logger.info(`Authenticated as: ${await catalog.getCurrentUserDisplay()}`);
  } catch (err) {
    if (!(err instanceof TransientIOError)) throw err;
    Logger.warn(`Could not look up the Spotify user: ${err.message}`);
  }
}

const program = new Command();

program
  .name('song-of-the-day')
  .description('Keeps a one-song-per-day playlist on target, picking from what you actually listened to.')
  .option('--poll', 'Fetch and record recent listening history (run every few minutes)')
  .option('--no-poll', 'For --status: skip the implicit poll and show stored data only')
  .option('--finalize', 'Bring the playlist up to today\'s target, auto-picking songs if needed')
  .option('--status', 'Show today\'s listening stats and playlist state')
  .option('--dry-run', 'Run finalize without changing the playlist or the addition log')
  .option('--weekly-summary', 'Print and email a summary of the last seven days')
  .option('-p, --profile <name>', 'Profile name; each profile has its own settings and data', 'default')
  .option('-q, --quiet', 'Suppress informational output')
  .option('--seed <n>', 'Seed the random picker for reproducible selection', parseSeed)
  .option('-c, --config <path>', 'Path to the YAML application config')
  .action(async (options: CliOptions) => {
    Logger.setQuiet(options.quiet === true);
    process.on('SIGINT', () => {
      Logger.warn('Aborted by user.');
      process.exit(130);
    });

    let context: RunContext | null = null;
    let workflow: WorkflowService | null = null;
    try {
      const mode = resolveMode(options);
      const appConfig = loadAppConfig(options.config);
      context = createRunContext(appConfig, options.profile);
      const store = new JsonDocumentStore(context.stateDir);
      const catalog = new SpotifyCatalog(appConfig);
      workflow = await WorkflowService.create({
        context,
        store,
        catalog,
        random: options.seed !== undefined ? createSeededRandom(options.seed) : undefined,
      });

      Logger.info(`Profile: ${context.profile}`);
      Logger.info(`State directory: ${context.stateDir}`);
      Logger.info(`Settings: ${store.describe(PROFILE_SETTINGS_KEY)}`);
      if (!options.quiet) {
        await logCurrentUser(catalog);
      }

      process.exitCode = await runMode(mode, options, workflow);
    } catch (err) {
      Logger.error('Unexpected error', err);
      if (workflow) {
        const argv = process.argv.slice(2).join(' ') || 'unknown';
        const profile = context ? ` (profile ${context.profile})` : '';
        await workflow.notifyFailure(err, `Running: ${argv}${profile}`);
      } else {
        Logger.warn('Failure email not sent: profile settings were not loaded.');
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
