import { Command } from 'commander';
import chalk from 'chalk';
import readline from 'readline';
import { getDb } from '../db/index.js';
import { createReader, type Reader } from '../services/reader.js';
import { nextFilter, type ArticleFilter, type ArticleWithFeed } from '../models/article.js';
import type { JobOutcome, JobRecord } from '../models/job.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { describeOutcome, describeStart, describeTransition, formatArticleLine, reportError } from './shared.js';

const LIST_LIMIT = 500;
const PREVIEW_LINES = 12;

const HELP = 'j/k move  enter summarize  g regenerate  s star  m read/unread  d delete  b bookmark  f filter  r refresh  q quit';

class BrowseSession {
  private filter: ArticleFilter = 'unread';
  private articles: ArticleWithFeed[] = [];
  private index = 0;
  private status = '';
  private done: (() => void) | null = null;

  constructor(private readonly reader: Reader) {}

  private get current(): ArticleWithFeed | undefined {
    return this.articles[this.index];
  }

  // 先物化列表，浏览期间会写库
  reload(): void {
    const selected = this.current?.fingerprint;
    this.articles = Array.from(this.reader.presenter.listArticles(this.filter, { limit: LIST_LIMIT }));
    const kept = selected ? this.articles.findIndex(a => a.fingerprint === selected) : -1;
    this.index = kept >= 0 ? kept : Math.min(this.index, Math.max(this.articles.length - 1, 0));
    this.reader.presenter.select(this.current?.fingerprint ?? null);
  }

  // 列表项的状态从库里重新读，保留当前列表成员
  private refreshRows(): void {
    this.articles = this.articles.map(a => this.reader.store.getArticle(a.fingerprint) ?? a);
  }

  onAutoRead = (): void => {
    this.refreshRows();
    this.render();
  };

  onSettled = (record: JobRecord, outcome: JobOutcome): void => {
    this.status = `${record.kind}: ${describeOutcome(outcome)}`;
    this.refreshRows();
    this.render();
  };

  render(): void {
    const rows = process.stdout.rows || 30;
    const listHeight = Math.max(rows - PREVIEW_LINES - 6, 5);
    const start = Math.max(0, Math.min(this.index - Math.floor(listHeight / 2), this.articles.length - listHeight));
    const counts = this.reader.presenter.counts();

    console.clear();
    console.log(chalk.bold(`feedstash · ${this.filter}`) + chalk.dim(` (${this.articles.length} shown, ${counts.unread} unread, ${counts.starred} starred)`));
    console.log();

    if (this.articles.length === 0) {
      console.log(chalk.dim('  No articles. Press r to refresh or f to change the filter.'));
    }
    this.articles.slice(start, start + listHeight).forEach((article, offset) => {
      const selected = start + offset === this.index;
      console.log(`${selected ? chalk.cyan('›') : ' '} ${formatArticleLine(article)}`);
    });

    const article = this.current;
    if (article) {
      console.log();
      console.log(chalk.dim('─'.repeat(Math.min(process.stdout.columns || 80, 100))));
      const body = article.summary_state === 'ready' && article.summary
        ? article.summary
        : article.summary_state === 'pending'
          ? chalk.yellow('Summarizing...')
          : article.snippet_text ?? '';
      console.log(body.split('\n').slice(0, PREVIEW_LINES).join('\n'));
    }

    console.log();
    console.log(chalk.dim(this.status || HELP));
  }

  private move(delta: number): void {
    if (this.articles.length === 0) return;
    this.index = Math.max(0, Math.min(this.articles.length - 1, this.index + delta));
    this.reader.presenter.select(this.current?.fingerprint ?? null);
  }

  private runAsync(task: () => Promise<string>): void {
    void task().then(
      message => {
        this.status = message;
        this.render();
      },
      (error: unknown) => {
        this.status = chalk.red(errorMessage(error));
        this.render();
      }
    );
  }

  handleKey(name: string | undefined, ctrl: boolean): void {
    const { presenter } = this.reader;
    const article = this.current;
    this.status = '';

    if (name === 'q' || (ctrl && name === 'c')) {
      this.done?.();
      return;
    }

    switch (name) {
      case 'j':
      case 'down':
        this.move(1);
        break;
      case 'k':
      case 'up':
        this.move(-1);
        break;
      case 'f':
        this.filter = nextFilter(this.filter);
        this.index = 0;
        this.reload();
        break;
      case 'r':
        this.status = 'Refreshing...';
        this.runAsync(async () => {
          const report = await presenter.refresh();
          this.reload();
          return `Refreshed ${report.feeds.length} feed(s): ${report.inserted} new, ${report.failed} failed`;
        });
        break;
      case 'return':
      case 'g':
        if (article) {
          const result = presenter.summarize(article.fingerprint, { regenerate: name === 'g' });
          this.status = result === 'cached' ? 'Summary is cached (g to regenerate)' : describeStart(result, 'summarize');
          this.refreshRows();
        }
        break;
      case 's':
        if (article) {
          this.status = describeTransition(presenter.toggleStarred(article.fingerprint), 'Star toggled', 'Star unchanged');
          this.refreshRows();
        }
        break;
      case 'm':
        if (article) {
          this.status = describeTransition(presenter.toggleRead(article.fingerprint), 'Read state toggled', 'Unchanged');
          this.refreshRows();
        }
        break;
      case 'd':
        if (article) {
          this.status = describeTransition(presenter.delete(article.fingerprint), 'Deleted', 'Already deleted');
          this.articles.splice(this.index, 1);
          this.index = Math.min(this.index, Math.max(this.articles.length - 1, 0));
          presenter.select(this.current?.fingerprint ?? null);
        }
        break;
      case 'b':
        if (article) {
          this.status = describeStart(presenter.bookmark(article.fingerprint), 'bookmark');
        }
        break;
      default:
        return;
    }
    this.render();
  }

  run(): Promise<void> {
    return new Promise(resolve => {
      this.done = resolve;
      this.reload();
      this.render();
    });
  }
}

export function createBrowseCommand(): Command {
  return new Command('browse')
    .description(`Browse articles interactively. An article kept selected for 2 seconds is marked read.

Keys:
  ${HELP}`)
    .action(async () => {
      if (!process.stdin.isTTY) {
        reportError(new Error('browse needs an interactive terminal'));
        return;
      }

      const hooks: { session?: BrowseSession } = {};
      const reader = createReader(getDb(), {
        onAutoRead: () => hooks.session?.onAutoRead(),
        onSettled: (record, outcome) => hooks.session?.onSettled(record, outcome),
      });
      const session = new BrowseSession(reader);
      hooks.session = session;

      // 浏览界面自己负责输出
      logger.setSilent(true);
      readline.emitKeypressEvents(process.stdin);
      process.stdin.setRawMode(true);
      const onKeypress = (_str: string | undefined, key: readline.Key | undefined): void => {
        session.handleKey(key?.name, key?.ctrl ?? false);
      };
      process.stdin.on('keypress', onKeypress);
      process.stdin.resume();

      try {
        await session.run();
      } finally {
        process.stdin.off('keypress', onKeypress);
        process.stdin.setRawMode(false);
        process.stdin.pause();
        reader.lifecycle.dispose();
        logger.setSilent(false);
        console.clear();
      }

      const pending = reader.jobs.list().filter(job => job.status === 'running').length;
      if (pending > 0) {
        logger.info(`Waiting for ${pending} background job(s)...`);
      }
      await reader.jobs.whenIdle();
    });
}
