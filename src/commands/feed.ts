import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync, writeFileSync } from 'fs';
import { getReader } from '../services/reader.js';
import { logger } from '../utils/logger.js';
import { printJson, reportError, type JsonOption } from './shared.js';

interface AddOptions extends JsonOption {
  title?: string;
}

export function createFeedCommand(): Command {
  const feed = new Command('feed').description('Manage feed subscriptions');

  feed
    .command('add')
    .description('Subscribe to a feed, or to the feed a web page links to')
    .argument('<url>', 'Feed or page URL')
    .option('-t, --title <title>', 'Feed title (taken from the feed if not provided)')
    .option('--json', 'Output as JSON')
    .action(async (url: string, options: AddOptions) => {
      const spinner = options.json ? null : ora('Discovering feed...').start();

      try {
        const result = await getReader().presenter.addFeed(url, options.title);

        if (options.json) {
          printJson(result);
          return;
        }
        if (result.status === 'exists') {
          spinner?.warn(`Feed already exists: ${result.feed.title}`);
          return;
        }

        spinner?.succeed('Feed added');
        console.log(`  Title: ${result.feed.title}`);
        console.log(`  URL:   ${chalk.dim(result.feed.url)}`);
        if (result.feed.site_url) {
          console.log(`  Site:  ${chalk.dim(result.feed.site_url)}`);
        }
      } catch (error) {
        reportError(error, options, spinner);
      }
    });

  feed
    .command('remove')
    .description('Unsubscribe from a feed and drop its articles')
    .argument('<url>', 'Feed URL')
    .option('--json', 'Output as JSON')
    .action((url: string, options: JsonOption) => {
      try {
        const success = getReader().presenter.removeFeed(url);

        if (options.json) {
          printJson({ success });
        } else if (success) {
          logger.success(`Feed removed: ${url}`);
        } else {
          logger.error(`Feed not found: ${url}`);
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  feed
    .command('list')
    .description('List subscribed feeds')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const feeds = getReader().presenter.listFeeds();

      if (options.json) {
        printJson(feeds);
        return;
      }

      if (feeds.length === 0) {
        logger.info('No feeds found. Use "feedstash feed add <url>" to add one.');
        return;
      }

      console.log();
      console.log(chalk.bold(`Feeds (${feeds.length}):`));
      console.log();
      for (const f of feeds) {
        const lastFetch = f.last_fetched_at ? new Date(f.last_fetched_at).toLocaleString() : 'Never';
        console.log(`  ${f.title}`);
        console.log(`      ${chalk.dim(f.url)}`);
        console.log(`      Last fetch: ${chalk.dim(lastFetch)}`);
        if (f.last_fetch_error) {
          console.log(`      ${chalk.red(`Error: ${f.last_fetch_error}`)}`);
        }
      }
      console.log();
    });

  feed
    .command('import')
    .description('Import subscriptions from an OPML file')
    .argument('<file>', 'OPML file')
    .option('--json', 'Output as JSON')
    .action((file: string, options: JsonOption) => {
      try {
        const report = getReader().presenter.importFeeds(readFileSync(file, 'utf-8'));

        if (options.json) {
          printJson(report);
          return;
        }
        logger.success(`Imported ${report.added.length} feed(s), ${report.existing} already subscribed`);
        for (const url of report.invalid) {
          logger.warn(`Skipped invalid URL: ${url}`);
        }
        if (report.added.length > 0) {
          logger.info('Run "feedstash refresh" to fetch their articles.');
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  feed
    .command('export')
    .description('Export subscriptions as OPML (to stdout when no file is given)')
    .argument('[file]', 'Output file')
    .action((file: string | undefined) => {
      try {
        const xml = getReader().presenter.exportFeeds();
        if (file) {
          writeFileSync(file, xml, 'utf-8');
          logger.success(`Exported to ${file}`);
        } else {
          process.stdout.write(xml);
        }
      } catch (error) {
        reportError(error);
      }
    });

  return feed;
}
