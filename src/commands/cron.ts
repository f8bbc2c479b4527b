import { Command } from 'commander';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import ora from 'ora';
import { DATA_DIR } from '../db/index.js';
import { getReader } from '../services/reader.js';
import { printRefreshReport } from './refresh.js';
import { parsePositiveNumber, reportError } from './shared.js';
import { getNumberConfig } from '../utils/config.js';
import { CONFIG_KEYS } from '../models/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const STATE_FILE = join(DATA_DIR, 'cron-state.json');

export interface CronState {
  lastRunAt: string | null;
  lastRunResult: {
    feedsRefreshed: number;
    newArticles: number;
    failedFeeds: number;
    purged: number;
  } | null;
}

interface CronOptions {
  interval?: string;
  force?: boolean;
  quiet?: boolean;
}

const EMPTY_STATE: CronState = { lastRunAt: null, lastRunResult: null };

export function loadState(file = STATE_FILE): CronState {
  if (!existsSync(file)) {
    return EMPTY_STATE;
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'lastRunAt' in parsed && typeof parsed.lastRunAt === 'string') {
      return { ...EMPTY_STATE, lastRunAt: parsed.lastRunAt };
    }
    return EMPTY_STATE;
  } catch (error) {
    logger.debug(`Ignoring unreadable ${file}: ${errorMessage(error)}`);
    return EMPTY_STATE;
  }
}

function saveState(state: CronState, file = STATE_FILE): void {
  if (!existsSync(DATA_DIR)) {
    mkdirSync(DATA_DIR, { recursive: true });
  }
  writeFileSync(file, JSON.stringify(state, null, 2), 'utf-8');
}

export function shouldRun(state: CronState, intervalHours: number, now = new Date()): boolean {
  if (!state.lastRunAt) return true;
  const hoursSinceLastRun = (now.getTime() - new Date(state.lastRunAt).getTime()) / (1000 * 60 * 60);
  return hoursSinceLastRun >= intervalHours;
}

/** `--interval` in hours, or refresh_interval_minutes converted to hours. */
export function resolveIntervalHours(interval: string | undefined): number {
  return interval !== undefined
    ? parsePositiveNumber(interval, 'interval')
    : getNumberConfig(CONFIG_KEYS.REFRESH_INTERVAL_MINUTES, 30) / 60;
}

export function createCronCommand(): Command {
  return new Command('cron')
    .description(`Refresh every feed and purge expired articles, for crontab scheduling.

Steps:
  1. Skip when the last run is more recent than the interval
  2. Refresh all feeds
  3. Purge articles past the retention period
  4. Save the run state to ~/.feedstash/cron-state.json

Examples:
  feedstash cron                 # interval from refresh_interval_minutes (30 minutes)
  feedstash cron --force --quiet # always run, print only the JSON result
  */30 * * * * feedstash cron --quiet >> ~/.feedstash/cron.log 2>&1`)
    .option('-i, --interval <hours>', 'Minimum hours between runs')
    .option('--force', 'Ignore the interval check')
    .option('--quiet', 'Print only the final JSON result')
    .action(async (options: CronOptions) => {
      const quiet = options.quiet ?? false;
      let intervalHours: number;
      try {
        intervalHours = resolveIntervalHours(options.interval);
      } catch (error) {
        reportError(error, { json: quiet });
        return;
      }

      const state = loadState();
      if (!options.force && !shouldRun(state, intervalHours)) {
        const skipped = { skipped: true, reason: 'interval_not_reached', lastRunAt: state.lastRunAt, intervalHours };
        if (quiet) {
          console.log(JSON.stringify(skipped));
        } else {
          logger.info(`Skipped: last run at ${state.lastRunAt}, interval ${intervalHours}h not reached`);
        }
        return;
      }

      if (quiet) {
        logger.setSilent(true);
      }

      const result = {
        success: true,
        startedAt: new Date().toISOString(),
        feedsRefreshed: 0,
        newArticles: 0,
        failedFeeds: 0,
        purged: 0,
        errors: [] as string[],
      };

      try {
        const { presenter } = getReader();

        const spinner = quiet ? null : ora('Refreshing feeds...').start();
        const report = await presenter.refresh();
        result.feedsRefreshed = report.feeds.length;
        result.newArticles = report.inserted;
        result.failedFeeds = report.failed;
        for (const feed of report.feeds) {
          if (feed.error) {
            result.errors.push(`${feed.title}: ${feed.error}`);
          }
        }
        spinner?.succeed(`Refreshed ${result.feedsRefreshed} feeds, ${result.newArticles} new articles`);
        if (!quiet && report.failed > 0) {
          printRefreshReport(report);
        }

        const purgeSpinner = quiet ? null : ora('Purging expired articles...').start();
        result.purged = presenter.purge();
        purgeSpinner?.succeed(`Purged ${result.purged} articles`);

        saveState({
          lastRunAt: new Date().toISOString(),
          lastRunResult: {
            feedsRefreshed: result.feedsRefreshed,
            newArticles: result.newArticles,
            failedFeeds: result.failedFeeds,
            purged: result.purged,
          },
        });

        if (quiet) {
          console.log(JSON.stringify(result));
        }
      } catch (error) {
        result.success = false;
        result.errors.push(errorMessage(error));
        if (quiet) {
          console.log(JSON.stringify(result));
        } else {
          logger.error(errorMessage(error));
        }
        process.exitCode = 1;
      }
    });
}
