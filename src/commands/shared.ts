import chalk from 'chalk';
import type { Ora } from 'ora';
import type { ArticleWithFeed } from '../models/article.js';
import type { JobKind, JobOutcome, StartResult } from '../models/job.js';
import type { TransitionResult } from '../services/lifecycle.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface JsonOption {
  json?: boolean;
}

const SHORT_FINGERPRINT = 8;

export function shortId(fingerprint: string): string {
  return fingerprint.slice(0, SHORT_FINGERPRINT);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Stops the spinner and prints the error; the process exits with status 1. */
export function reportError(error: unknown, options: JsonOption = {}, spinner?: Ora | null): void {
  const message = errorMessage(error);
  spinner?.fail(message);
  if (options.json) {
    console.log(JSON.stringify({ error: message }));
  } else if (!spinner) {
    logger.error(message);
  }
  process.exitCode = 1;
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parsePositiveNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

export function formatDate(iso: string | null): string {
  return iso ? new Date(iso).toLocaleDateString() : 'Unknown date';
}

export function articleMarks(article: ArticleWithFeed): string {
  const read = article.is_read ? chalk.dim('○') : chalk.blue('●');
  const star = article.is_starred ? chalk.yellow('★') : ' ';
  const bookmark = article.bookmark_id ? chalk.green('⚑') : ' ';
  return `${read}${star}${bookmark}`;
}

export function formatArticleLine(article: ArticleWithFeed): string {
  const title = article.is_read ? chalk.dim(article.title) : article.title;
  return `${chalk.cyan(shortId(article.fingerprint))} ${articleMarks(article)} ${title} ${chalk.dim(`[${article.feed_title}] ${formatDate(article.published_at)}`)}`;
}

export function printArticle(article: ArticleWithFeed): void {
  console.log();
  console.log(chalk.bold(article.title));
  console.log(`${chalk.dim(`[${article.feed_title}]`)} ${chalk.dim(formatDate(article.published_at))}${article.author ? chalk.dim(` · ${article.author}`) : ''}`);
  if (article.link) {
    console.log(chalk.blue(article.link));
  }
  console.log(`${articleMarks(article)} ${chalk.dim(article.fingerprint)}`);

  if (article.summary_state === 'ready' && article.summary) {
    console.log();
    console.log(chalk.green('Summary:'));
    console.log(article.summary);
  } else if (article.summary_state === 'failed') {
    console.log();
    console.log(chalk.red(`Summary failed: ${article.summary_error ?? 'unknown error'}`));
  } else if (article.summary_state === 'pending') {
    console.log();
    console.log(chalk.yellow('Summary pending...'));
  }

  const body = article.content_text || article.snippet_text;
  if (body) {
    console.log();
    console.log(body);
  }
  console.log();
}

export function describeTransition(result: TransitionResult, applied: string, unchanged: string): string {
  switch (result) {
    case 'applied':
      return applied;
    case 'unchanged':
      return unchanged;
    case 'deleted':
      return 'Article is deleted';
  }
}

export function describeStart(result: StartResult, kind: JobKind): string {
  switch (result) {
    case 'ok':
      return `Started ${kind}`;
    case 'already-running':
      return `A ${kind} job is already running for this article`;
    case 'article-deleted':
      return 'Article is deleted';
  }
}

export function describeOutcome(outcome: JobOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return outcome.detail ? `Completed (${outcome.detail})` : 'Completed';
    case 'failed':
      return `Failed: ${outcome.error.message}`;
    case 'discarded':
      return outcome.reason === 'deleted' ? 'Discarded: article was deleted' : 'Discarded: job was cancelled';
    case 'skipped':
      return `Skipped: ${outcome.detail}`;
  }
}
