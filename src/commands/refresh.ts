import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getReader } from '../services/reader.js';
import type { RefreshReport } from '../services/reconciler.js';
import { logger } from '../utils/logger.js';
import { printJson, reportError, type JsonOption } from './shared.js';

interface RefreshOptions extends JsonOption {
  feed?: string[];
}

export function printRefreshReport(report: RefreshReport): void {
  console.log();
  for (const feed of report.feeds) {
    if (feed.status === 'ok') {
      const counts = `+${feed.inserted} new, ${feed.updated} updated${feed.suppressed ? `, ${feed.suppressed} deleted skipped` : ''}`;
      console.log(`  ${chalk.green('✓')} ${feed.title} ${chalk.dim(counts)}`);
    } else {
      console.log(`  ${chalk.red('✗')} ${feed.title} ${chalk.red(feed.error ?? feed.status)}`);
    }
  }
  console.log();
}

export function createRefreshCommand(): Command {
  return new Command('refresh')
    .description('Fetch feeds and merge new articles into the cache')
    .option('-f, --feed <url...>', 'Only refresh these feeds')
    .option('--json', 'Output as JSON')
    .action(async (options: RefreshOptions) => {
      const spinner = options.json ? null : ora('Refreshing feeds...').start();

      try {
        const report = await getReader().presenter.refresh(options.feed);

        if (options.json) {
          printJson(report);
          return;
        }

        if (report.feeds.length === 0) {
          spinner?.stop();
          logger.info('No feeds found. Use "feedstash feed add <url>" to add one.');
          return;
        }

        const summary = `${report.feeds.length} feed(s), ${report.inserted} new article(s)`;
        if (report.failed > 0) {
          spinner?.warn(`${summary}, ${report.failed} failed`);
        } else {
          spinner?.succeed(summary);
        }
        printRefreshReport(report);
      } catch (error) {
        reportError(error, options, spinner);
      }
    });
}
