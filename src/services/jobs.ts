import PQueue from 'p-queue';
import type { ArticleStore } from './store.js';
import { isLive } from './store.js';
import type { ContentExtractor } from './extractor.js';
import type { Summarizer } from './summarizer.js';
import type { Bookmarker } from './bookmarks.js';
import type { JobCanceller } from './lifecycle.js';
import type { Article } from '../models/article.js';
import {
  JOB_KINDS,
  type JobKind,
  type JobOptions,
  type JobOutcome,
  type JobRecord,
  type JobSettledListener,
  type StartResult,
} from '../models/job.js';
import { CollaboratorError, FeedstashError, RaceDiscardedError } from '../utils/errors.js';
import { firstSentence, truncate } from '../utils/text.js';
import { logger } from '../utils/logger.js';

const JOB_CONCURRENCY = 2;
const EXCERPT_LENGTH = 300;

export interface JobCollaborators {
  extractor: ContentExtractor;
  summarizer: Summarizer;
  bookmarker: Bookmarker;
}

export interface JobCoordinatorOptions {
  defaultTags?: string[];
  concurrency?: number;
  onSettled?: JobSettledListener;
}

interface ActiveJob {
  record: JobRecord;
  done: Promise<JobOutcome>;
}

const log = logger.scope('jobs');

function jobKey(fingerprint: string, kind: JobKind): string {
  return `${fingerprint}:${kind}`;
}

function discarded(record: JobRecord, reason: 'deleted' | 'cancelled'): JobOutcome {
  log.debug(new RaceDiscardedError(record.fingerprint, record.kind, reason).message);
  return { status: 'discarded', reason };
}

function failed(error: FeedstashError): JobOutcome {
  return { status: 'failed', error };
}

/**
 * Background work attached to an article: fetching its content, summarizing
 * and bookmarking it. At most one live job per article and kind.
 *
 * Cancellation is cooperative. A cancelled job still waits for its current
 * collaborator call, then drops the result. Results of jobs whose article was
 * deleted in the meantime are dropped by the store's guarded writes.
 */
export class JobCoordinator implements JobCanceller {
  private readonly queue: PQueue;
  private readonly jobs = new Map<string, ActiveJob>();
  private readonly inFlight = new Set<Promise<JobOutcome>>();
  private readonly defaultTags: string[];
  private readonly onSettled: JobSettledListener | undefined;

  constructor(
    private readonly store: ArticleStore,
    private readonly collaborators: JobCollaborators,
    options: JobCoordinatorOptions = {}
  ) {
    this.queue = new PQueue({ concurrency: options.concurrency ?? JOB_CONCURRENCY });
    this.defaultTags = options.defaultTags ?? [];
    this.onSettled = options.onSettled;
    // 任务记录不落盘，上个进程留下的 pending 标记都已失效
    const orphaned = this.store.resetPendingSummaries();
    if (orphaned > 0) {
      log.debug(`Reset ${orphaned} orphaned pending summaries`);
    }
  }

  start(fingerprint: string, kind: JobKind, options: JobOptions = {}): StartResult {
    const key = jobKey(fingerprint, kind);
    if (this.jobs.get(key)?.record.status === 'running') {
      return 'already-running';
    }
    if (!isLive(this.store.getArticle(fingerprint))) {
      return 'article-deleted';
    }

    if (kind === 'summarize') {
      this.store.setSummaryPending(fingerprint);
    }

    const record: JobRecord = { fingerprint, kind, status: 'running', startedAt: Date.now() };
    const done = this.queue
      .add(() => this.run(record, options), { throwOnTimeout: true })
      .then(outcome => this.settle(key, record, outcome));

    this.jobs.set(key, { record, done });
    this.inFlight.add(done);
    void done.finally(() => this.inFlight.delete(done));

    log.debug(`Started ${kind} for ${fingerprint}`);
    return 'ok';
  }

  cancel(fingerprint: string, kind: JobKind): boolean {
    const job = this.jobs.get(jobKey(fingerprint, kind));
    if (!job || job.record.status !== 'running') {
      return false;
    }
    job.record.status = 'cancelled';
    return true;
  }

  cancelAll(fingerprint: string): number {
    return JOB_KINDS.filter(kind => this.cancel(fingerprint, kind)).length;
  }

  status(fingerprint: string, kind: JobKind): JobRecord | undefined {
    const job = this.jobs.get(jobKey(fingerprint, kind));
    return job ? { ...job.record } : undefined;
  }

  list(): JobRecord[] {
    return Array.from(this.jobs.values(), job => ({ ...job.record }));
  }

  wait(fingerprint: string, kind: JobKind): Promise<JobOutcome | undefined> {
    return this.jobs.get(jobKey(fingerprint, kind))?.done ?? Promise.resolve(undefined);
  }

  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private settle(key: string, record: JobRecord, outcome: JobOutcome): JobOutcome {
    // 被取消后可能已有同类新任务占位，只移除自己的记录
    if (this.jobs.get(key)?.record === record) {
      this.jobs.delete(key);
    }
    if (outcome.status === 'failed') {
      log.debug(`${record.kind} failed for ${record.fingerprint}: ${outcome.error.message}`);
    }
    try {
      this.onSettled?.(record, outcome);
    } catch (error) {
      log.warn(`onSettled listener threw: ${error instanceof Error ? error.message : String(error)}`);
    }
    return outcome;
  }

  private async run(record: JobRecord, options: JobOptions): Promise<JobOutcome> {
    try {
      const article = this.store.getArticle(record.fingerprint);
      if (this.isCancelled(record)) {
        return this.cancelled(record);
      }
      if (!isLive(article)) {
        return discarded(record, 'deleted');
      }

      switch (record.kind) {
        case 'content-fetch':
          return await this.fetchContent(record, article);
        case 'summarize':
          return await this.summarize(record, article);
        case 'bookmark':
          return await this.bookmark(record, article, options);
      }
    } catch (error) {
      return failed(
        error instanceof FeedstashError
          ? error
          : new FeedstashError(`${record.kind} crashed: ${String(error)}`, 'JOB_FAILED', { cause: error })
      );
    }
  }

  // 读取时不让 TypeScript 收窄：状态会在 await 期间被 cancel() 改写
  private isCancelled(record: JobRecord): boolean {
    return record.status === 'cancelled';
  }

  private cancelled(record: JobRecord): JobOutcome {
    // 取消后又启动了同类任务时，pending 标记属于新任务
    const current = this.jobs.get(jobKey(record.fingerprint, record.kind));
    if (record.kind === 'summarize' && current?.record.status !== 'running') {
      this.store.clearSummaryPending(record.fingerprint);
    }
    return discarded(record, 'cancelled');
  }

  private async extract(record: JobRecord, link: string | null): Promise<string | CollaboratorError> {
    if (!link) {
      return new CollaboratorError('extractor', 'extraction', 'Article has no link', record.fingerprint);
    }
    const result = await this.collaborators.extractor.extract(link);
    return result.ok
      ? result.text
      : new CollaboratorError('extractor', result.kind, result.reason, record.fingerprint);
  }

  private async fetchContent(record: JobRecord, article: Article): Promise<JobOutcome> {
    const text = await this.extract(record, article.link);
    if (this.isCancelled(record)) return this.cancelled(record);
    if (text instanceof CollaboratorError) return failed(text);

    if (!this.store.setContent(record.fingerprint, text)) {
      return discarded(record, 'deleted');
    }
    return { status: 'completed', detail: `${text.length} characters` };
  }

  private async summaryInput(record: JobRecord, article: Article): Promise<string | null> {
    if (article.content_text) return article.content_text;

    if (article.link) {
      const text = await this.extract(record, article.link);
      if (typeof text === 'string') {
        this.store.setContent(record.fingerprint, text);
        return text;
      }
      log.debug(`Falling back to feed snippet: ${text.message}`);
    }

    return article.snippet_text || null;
  }

  private async summarize(record: JobRecord, article: Article): Promise<JobOutcome> {
    const text = await this.summaryInput(record, article);
    if (this.isCancelled(record)) return this.cancelled(record);

    if (!text) {
      const error = new CollaboratorError('extractor', 'extraction', 'No content to summarize', record.fingerprint);
      return this.store.setSummary(record.fingerprint, { ok: false, error: error.message })
        ? failed(error)
        : discarded(record, 'deleted');
    }

    const result = await this.collaborators.summarizer.summarize({ title: article.title, text });
    if (this.isCancelled(record)) return this.cancelled(record);

    if (!result.ok) {
      const error = new CollaboratorError('summarizer', result.kind, result.message, record.fingerprint);
      return this.store.setSummary(record.fingerprint, { ok: false, error: result.message })
        ? failed(error)
        : discarded(record, 'deleted');
    }

    if (!this.store.setSummary(record.fingerprint, { ok: true, text: result.text, model: result.model })) {
      return discarded(record, 'deleted');
    }
    return { status: 'completed', detail: result.model };
  }

  private async bookmark(record: JobRecord, article: Article, options: JobOptions): Promise<JobOutcome> {
    if (article.bookmark_id) {
      return { status: 'skipped', detail: `Already bookmarked (${article.bookmark_id})` };
    }
    if (!article.link) {
      return failed(new CollaboratorError('bookmarker', 'invalid-response', 'Article has no link', record.fingerprint));
    }

    const source = article.content_text || article.snippet_text || '';
    const note = article.summary_state === 'ready' && article.summary
      ? article.summary
      : firstSentence(source || article.title);
    const tags = Array.from(new Set([...this.defaultTags, ...(options.tags ?? [])]));

    const result = await this.collaborators.bookmarker.save({
      link: article.link,
      title: article.title,
      excerpt: article.snippet_text ? truncate(article.snippet_text, EXCERPT_LENGTH) : undefined,
      note,
      tags,
    });
    if (this.isCancelled(record)) return this.cancelled(record);

    if (!result.ok) {
      return failed(new CollaboratorError('bookmarker', result.kind, result.message, record.fingerprint));
    }
    if (!this.store.setBookmark(record.fingerprint, result.id, tags)) {
      return discarded(record, 'deleted');
    }
    return { status: 'completed', detail: result.id };
  }
}
