#!/usr/bin/env node

import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import { createFeedCommand } from './commands/feed.js';
import { createRefreshCommand } from './commands/refresh.js';
import { createListCommand } from './commands/list.js';
import {
  createBookmarkCommand,
  createFetchCommand,
  createShowCommand,
  createSummarizeCommand,
  createTransitionCommand,
} from './commands/article.js';
import { createBrowseCommand } from './commands/browse.js';
import { createPurgeCommand } from './commands/purge.js';
import { createStatusCommand } from './commands/status.js';
import { createConfigCommand } from './commands/config.js';
import { createCronCommand } from './commands/cron.js';
import { disposeReader } from './services/reader.js';
import { closeDb } from './db/index.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

const program = new Command();

program
  .name('feedstash')
  .description('RSS/Atom reader with a local cache, summaries and bookmarks')
  .version('0.1.0')
  .option('--debug', 'Print debug logs')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ debug?: boolean }>().debug) {
      logger.setDebug(true);
    }
  });

// 阅读
program.addCommand(createBrowseCommand());
program.addCommand(createListCommand());
program.addCommand(createShowCommand());
program.addCommand(createTransitionCommand('read'));
program.addCommand(createTransitionCommand('unread'));
program.addCommand(createTransitionCommand('star'));
program.addCommand(createTransitionCommand('delete'));

// 后台任务
program.addCommand(createFetchCommand());
program.addCommand(createSummarizeCommand());
program.addCommand(createBookmarkCommand());

// 订阅与同步
program.addCommand(createFeedCommand());
program.addCommand(createRefreshCommand());
program.addCommand(createPurgeCommand());
program.addCommand(createCronCommand());

// 诊断与配置
program.addCommand(createStatusCommand());
program.addCommand(createConfigCommand());

program.addHelpText('after', `
Command groups:
  Reading       browse, list, show, read, unread, star, delete
  Jobs          fetch, summarize, bookmark
  Feeds         feed, refresh, purge, cron
  Maintenance   status, config
`);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (!(error instanceof CommanderError)) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  } else if (error.exitCode !== 0) {
    process.exitCode = error.exitCode;
  }
} finally {
  disposeReader();
  closeDb();
}
