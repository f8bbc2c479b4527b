import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getReader } from '../services/reader.js';
import { AUTO_READ_DWELL_MS, type TransitionResult } from '../services/lifecycle.js';
import type { SummarizeResult } from '../services/presenter.js';
import type { JobKind, JobOutcome } from '../models/job.js';
import { logger } from '../utils/logger.js';
import {
  describeOutcome,
  describeStart,
  describeTransition,
  printArticle,
  printJson,
  reportError,
  shortId,
  type JsonOption,
} from './shared.js';

interface ShowOptions extends JsonOption {
  dwell?: boolean;
}

interface SummarizeOptions extends JsonOption {
  regenerate?: boolean;
}

interface BookmarkOptions extends JsonOption {
  tags?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show an article with its summary and text')
    .argument('<ref>', 'Fingerprint or a unique prefix of one')
    .option('--dwell', `Keep the article in view for ${AUTO_READ_DWELL_MS / 1000}s so it is marked read`)
    .option('--json', 'Output as JSON')
    .action(async (ref: string, options: ShowOptions) => {
      try {
        const { presenter } = getReader();
        const article = presenter.getArticle(ref);

        if (options.json) {
          printJson(article);
        } else {
          printArticle(article);
        }

        if (options.dwell) {
          presenter.select(article.fingerprint);
          await sleep(AUTO_READ_DWELL_MS + 100);
          presenter.select(null);
          const after = presenter.getArticle(article.fingerprint);
          if (!options.json && after.is_read && !article.is_read) {
            logger.success('Marked as read');
          }
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}

type Transition = 'read' | 'unread' | 'star' | 'delete';

const TRANSITIONS: Record<Transition, { description: string; applied: string; unchanged: string }> = {
  read: { description: 'Mark an article as read', applied: 'Marked as read', unchanged: 'Already read' },
  unread: { description: 'Mark an article as unread', applied: 'Marked as unread', unchanged: 'Already unread' },
  star: { description: 'Star or unstar an article', applied: 'Star toggled', unchanged: 'Star unchanged' },
  delete: { description: 'Delete an article; it will not come back on refresh', applied: 'Deleted', unchanged: 'Already deleted' },
};

function applyTransition(name: Transition, fingerprint: string): TransitionResult {
  const { presenter } = getReader();
  switch (name) {
    case 'read':
      return presenter.markRead(fingerprint);
    case 'unread':
      return presenter.markUnread(fingerprint);
    case 'star':
      return presenter.toggleStarred(fingerprint);
    case 'delete':
      return presenter.delete(fingerprint);
  }
}

export function createTransitionCommand(name: Transition): Command {
  const meta = TRANSITIONS[name];
  return new Command(name)
    .description(meta.description)
    .argument('<ref>', 'Fingerprint or a unique prefix of one')
    .option('--json', 'Output as JSON')
    .action((ref: string, options: JsonOption) => {
      try {
        const fingerprint = getReader().presenter.getArticle(ref).fingerprint;
        const result = applyTransition(name, fingerprint);

        if (options.json) {
          printJson({ fingerprint, result });
        } else if (result === 'deleted') {
          logger.warn(describeTransition(result, meta.applied, meta.unchanged));
        } else {
          logger.success(`${describeTransition(result, meta.applied, meta.unchanged)}: ${shortId(fingerprint)}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}

async function runJob(
  fingerprint: string,
  kind: JobKind,
  started: SummarizeResult,
  options: JsonOption
): Promise<JobOutcome | undefined> {
  const { jobs } = getReader();
  if (started !== 'ok') {
    if (options.json) {
      printJson({ fingerprint, kind, result: started });
    } else if (started !== 'cached') {
      logger.warn(describeStart(started, kind));
    }
    return undefined;
  }

  const spinner = options.json ? null : ora(`Running ${kind}...`).start();
  const outcome = await jobs.wait(fingerprint, kind);

  if (options.json) {
    printJson({ fingerprint, kind, outcome: outcome && describeOutcome(outcome), status: outcome?.status });
  } else if (outcome?.status === 'completed') {
    spinner?.succeed(describeOutcome(outcome));
  } else if (outcome?.status === 'failed') {
    spinner?.fail(describeOutcome(outcome));
  } else if (outcome) {
    spinner?.warn(describeOutcome(outcome));
  } else {
    spinner?.stop();
  }

  if (outcome?.status === 'failed') {
    process.exitCode = 1;
  }
  return outcome;
}

export function createFetchCommand(): Command {
  return new Command('fetch')
    .description('Fetch the full text of an article from its link')
    .argument('<ref>', 'Fingerprint or a unique prefix of one')
    .option('--json', 'Output as JSON')
    .action(async (ref: string, options: JsonOption) => {
      try {
        const { presenter } = getReader();
        const fingerprint = presenter.getArticle(ref).fingerprint;
        await runJob(fingerprint, 'content-fetch', presenter.fetchContent(fingerprint), options);
      } catch (error) {
        reportError(error, options);
      }
    });
}

export function createSummarizeCommand(): Command {
  return new Command('summarize')
    .description('Summarize an article into a few bullet points')
    .argument('<ref>', 'Fingerprint or a unique prefix of one')
    .option('-r, --regenerate', 'Replace an existing summary')
    .option('--json', 'Output as JSON')
    .action(async (ref: string, options: SummarizeOptions) => {
      try {
        const { presenter } = getReader();
        const fingerprint = presenter.getArticle(ref).fingerprint;
        const started = presenter.summarize(fingerprint, { regenerate: options.regenerate });
        const outcome = await runJob(fingerprint, 'summarize', started, options);

        const article = presenter.getArticle(fingerprint);
        if (options.json || !article.summary) {
          return;
        }
        if (started === 'cached') {
          logger.info('Using cached summary (pass --regenerate to replace it)');
        }
        if (started === 'cached' || outcome?.status === 'completed') {
          console.log();
          console.log(chalk.bold(article.title));
          console.log(article.summary);
          console.log();
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}

export function createBookmarkCommand(): Command {
  return new Command('bookmark')
    .description('Save an article to Raindrop.io, with its summary as the note')
    .argument('<ref>', 'Fingerprint or a unique prefix of one')
    .option('-t, --tags <tags>', 'Extra tags, comma separated')
    .option('--json', 'Output as JSON')
    .action(async (ref: string, options: BookmarkOptions) => {
      try {
        const { presenter } = getReader();
        const fingerprint = presenter.getArticle(ref).fingerprint;
        const tags = (options.tags ?? '').split(',').map(t => t.trim()).filter(Boolean);
        await runJob(fingerprint, 'bookmark', presenter.bookmark(fingerprint, tags), options);
      } catch (error) {
        reportError(error, options);
      }
    });
}
