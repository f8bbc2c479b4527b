import type { ArticleStore } from './store.js';
import { isLive } from './store.js';
import { logger } from '../utils/logger.js';

export const AUTO_READ_DWELL_MS = 2000;

export type TransitionResult = 'applied' | 'unchanged' | 'deleted';

/** The part of the job coordinator the lifecycle needs: cancelling on delete. */
export interface JobCanceller {
  cancelAll(fingerprint: string): number;
}

export interface LifecycleOptions {
  dwellMs?: number;
  jobs?: JobCanceller;
  onAutoRead?: (fingerprint: string) => void;
}

const log = logger.scope('lifecycle');

/**
 * Read, star and delete transitions of a single article, plus the dwell timer
 * that marks an article read after it stayed in view long enough. Deleted is
 * absorbing: every transition on a tombstone reports `deleted` and writes
 * nothing.
 */
export class LifecycleEngine {
  private readonly dwellMs: number;
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private jobs: JobCanceller | undefined;
  private readonly onAutoRead: ((fingerprint: string) => void) | undefined;

  constructor(
    private readonly store: ArticleStore,
    options: LifecycleOptions = {}
  ) {
    this.dwellMs = options.dwellMs ?? AUTO_READ_DWELL_MS;
    this.jobs = options.jobs;
    this.onAutoRead = options.onAutoRead;
  }

  attachJobs(jobs: JobCanceller): void {
    this.jobs = jobs;
  }

  markRead(fingerprint: string): TransitionResult {
    return this.setRead(fingerprint, true);
  }

  markUnread(fingerprint: string): TransitionResult {
    return this.setRead(fingerprint, false);
  }

  private setRead(fingerprint: string, read: boolean): TransitionResult {
    const article = this.store.getArticle(fingerprint);
    if (!isLive(article)) return 'deleted';
    if ((article.is_read === 1) === read) return 'unchanged';
    return this.store.setReadState(fingerprint, read ? 'read' : 'unread') ? 'applied' : 'deleted';
  }

  toggleStarred(fingerprint: string): TransitionResult {
    const article = this.store.getArticle(fingerprint);
    if (!isLive(article)) return 'deleted';
    return this.store.setStarred(fingerprint, article.is_starred === 0) ? 'applied' : 'deleted';
  }

  /** Tombstones the article and cancels its jobs. Deleting twice reports `unchanged`. */
  delete(fingerprint: string): TransitionResult {
    this.exitView(fingerprint);

    const article = this.store.getArticle(fingerprint);
    if (!article) return 'deleted';
    if (article.is_deleted === 1) return 'unchanged';

    this.store.softDelete(fingerprint);
    const cancelled = this.jobs?.cancelAll(fingerprint) ?? 0;
    if (cancelled > 0) {
      log.debug(`Cancelled ${cancelled} job(s) of deleted ${fingerprint}`);
    }
    return 'applied';
  }

  /** Starts the dwell timer. An article already in view keeps its running timer. */
  enterView(fingerprint: string): TransitionResult {
    if (!this.store.setLastViewed(fingerprint)) return 'deleted';
    if (this.timers.has(fingerprint)) return 'unchanged';

    const timer = setTimeout(() => {
      this.autoMarkRead(fingerprint);
    }, this.dwellMs);
    this.timers.set(fingerprint, timer);
    return 'applied';
  }

  exitView(fingerprint: string): void {
    const timer = this.timers.get(fingerprint);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(fingerprint);
    }
  }

  exitAllViews(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  isInView(fingerprint: string): boolean {
    return this.timers.has(fingerprint);
  }

  autoMarkRead(fingerprint: string): TransitionResult {
    // 先移除计时器，保证最多触发一次
    this.timers.delete(fingerprint);

    const article = this.store.getArticle(fingerprint);
    if (!isLive(article)) return 'deleted';
    if (article.is_read === 1) return 'unchanged';
    if (!this.store.setReadState(fingerprint, 'read')) return 'deleted';

    this.onAutoRead?.(fingerprint);
    return 'applied';
  }

  dispose(): void {
    this.exitAllViews();
  }
}
