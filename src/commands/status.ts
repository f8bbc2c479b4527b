import { Command } from 'commander';
import chalk from 'chalk';
import { getReader } from '../services/reader.js';
import { DB_PATH } from '../db/index.js';
import type { StoreStats } from '../services/store.js';
import type { Feed } from '../models/feed.js';
import { printJson, type JsonOption } from './shared.js';

interface StatusData extends StoreStats {
  database: string;
  lastFetchedAt: string | null;
  failing: { url: string; title: string; error: string }[];
}

function getStatusData(): StatusData {
  const { presenter } = getReader();
  const feeds = presenter.listFeeds();

  let lastFetchedAt: string | null = null;
  for (const feed of feeds) {
    if (feed.last_fetched_at && (!lastFetchedAt || feed.last_fetched_at > lastFetchedAt)) {
      lastFetchedAt = feed.last_fetched_at;
    }
  }

  const failing = feeds
    .filter((f): f is Feed & { last_fetch_error: string } => f.last_fetch_error !== null)
    .map(f => ({ url: f.url, title: f.title, error: f.last_fetch_error }));

  return { ...presenter.counts(), database: DB_PATH, lastFetchedAt, failing };
}

function printColoredStatus(data: StatusData): void {
  console.log(chalk.bold.cyan('\nfeedstash status'));
  console.log(chalk.gray('-'.repeat(60)));

  console.log(chalk.bold('\nFeeds'));
  console.log(`  Total: ${chalk.yellow(data.feeds)}`);
  console.log(`  Last fetch: ${chalk.gray(data.lastFetchedAt ? new Date(data.lastFetchedAt).toLocaleString() : 'Never')}`);
  if (data.failing.length > 0) {
    console.log(`  Failing: ${chalk.red(data.failing.length)}`);
    for (const feed of data.failing) {
      console.log(`    ${feed.title}: ${chalk.red(feed.error)}`);
    }
  }

  console.log(chalk.bold('\nArticles'));
  console.log(`  Live: ${chalk.yellow(data.articles)}`);
  console.log(`  Unread: ${chalk.blue(data.unread)}`);
  console.log(`  Starred: ${chalk.yellow('★')} ${data.starred}`);
  console.log(`  Summarized: ${chalk.green(data.summarized)}`);
  console.log(`  Bookmarked: ${chalk.green(data.bookmarked)}`);
  console.log(`  Deleted (kept until purge): ${chalk.gray(data.deleted)}`);

  console.log(chalk.gray('\n' + '-'.repeat(60)));
  console.log(chalk.gray(`Database: ${data.database}\n`));
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show feed and article counts')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const data = getStatusData();

      if (options.json) {
        printJson(data);
      } else {
        printColoredStatus(data);
      }
    });
}
