import { Command } from 'commander';
import chalk from 'chalk';
import { getReader } from '../services/reader.js';
import { isArticleFilter } from '../models/article.js';
import { logger } from '../utils/logger.js';
import { formatArticleLine, parsePositiveInt, printJson, reportError, type JsonOption } from './shared.js';

interface ListCommandOptions extends JsonOption {
  filter: string;
  feed?: string;
  limit: string;
  oldest?: boolean;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List cached articles, newest first')
    .option('-f, --filter <filter>', 'unread, starred or all', 'unread')
    .option('--feed <url>', 'Only articles of this feed')
    .option('-l, --limit <n>', 'Maximum number of articles', '30')
    .option('--oldest', 'Oldest first')
    .option('--json', 'Output as JSON')
    .action((options: ListCommandOptions) => {
      try {
        if (!isArticleFilter(options.filter)) {
          throw new Error(`Unknown filter "${options.filter}", expected unread, starred or all`);
        }

        const articles = Array.from(
          getReader().presenter.listArticles(options.filter, {
            feedUrl: options.feed,
            limit: parsePositiveInt(options.limit, 'limit'),
            sort: options.oldest ? 'published-asc' : 'published-desc',
          })
        );

        if (options.json) {
          printJson(articles);
          return;
        }

        if (articles.length === 0) {
          logger.info(`No ${options.filter === 'all' ? '' : `${options.filter} `}articles`);
          return;
        }

        console.log();
        console.log(chalk.bold(`Articles (${options.filter}, ${articles.length}):`));
        console.log();
        for (const article of articles) {
          console.log(`  ${formatArticleLine(article)}`);
        }
        console.log();
      } catch (error) {
        reportError(error, options);
      }
    });
}
