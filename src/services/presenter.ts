import type { ArticleStore, StoreStats } from './store.js';
import { isLive } from './store.js';
import type { LifecycleEngine, TransitionResult } from './lifecycle.js';
import type { JobCoordinator } from './jobs.js';
import type { Reconciler, RefreshReport } from './reconciler.js';
import type { FeedFetcher } from './rss.js';
import { exportOpml, parseOpml } from './opml.js';
import type { ArticleFilter, ArticleWithFeed, ListOptions } from '../models/article.js';
import type { Feed } from '../models/feed.js';
import type { StartResult } from '../models/job.js';
import { CollaboratorError, FeedstashError, NotFoundError } from '../utils/errors.js';
import { canonicalFeedUrl } from '../utils/fingerprint.js';

export const DEFAULT_RETENTION_DAYS = 7;

export type SummarizeResult = StartResult | 'cached';

export type AddFeedResult =
  | { status: 'added'; feed: Feed }
  | { status: 'exists'; feed: Feed };

export interface ImportReport {
  added: Feed[];
  existing: number;
  invalid: string[];
}

export interface PresenterOptions {
  retentionDays?: number;
  now?: () => Date;
}

export interface ReaderComponents {
  store: ArticleStore;
  lifecycle: LifecycleEngine;
  jobs: JobCoordinator;
  reconciler: Reconciler;
  fetcher: FeedFetcher;
}

function normalizeUrl(raw: string): string {
  try {
    return canonicalFeedUrl(raw);
  } catch {
    throw new FeedstashError(`Invalid feed URL: ${raw}`, 'INVALID_URL');
  }
}

/**
 * Command and query surface for the CLI and the interactive browser. Reads
 * come from the store; every write goes through the lifecycle engine, the
 * job coordinator, the reconciler or a feed operation.
 */
export class ReaderPresenter {
  private readonly store: ArticleStore;
  private readonly lifecycle: LifecycleEngine;
  private readonly jobs: JobCoordinator;
  private readonly reconciler: Reconciler;
  private readonly fetcher: FeedFetcher;
  private readonly retentionDays: number;
  private readonly now: () => Date;
  private selected: string | null = null;

  constructor(components: ReaderComponents, options: PresenterOptions = {}) {
    this.store = components.store;
    this.lifecycle = components.lifecycle;
    this.jobs = components.jobs;
    this.reconciler = components.reconciler;
    this.fetcher = components.fetcher;
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  // Read path

  listArticles(filter: ArticleFilter, options: ListOptions = {}): Iterable<ArticleWithFeed> {
    const feedUrl = options.feedUrl === undefined ? undefined : normalizeUrl(options.feedUrl);
    return this.store.listArticles(filter, { ...options, feedUrl });
  }

  /** Resolves a fingerprint or a unique prefix of one to a live article. */
  getArticle(ref: string): ArticleWithFeed {
    const fingerprint = this.store.resolveFingerprint(ref);
    const article = this.store.getArticle(fingerprint);
    if (!article || !isLive(article)) {
      throw new NotFoundError('article', ref);
    }
    return article;
  }

  counts(): StoreStats {
    return this.store.stats();
  }

  listFeeds(): Feed[] {
    return this.store.listFeeds();
  }

  get selection(): string | null {
    return this.selected;
  }

  // Write path

  /** Moves the view to another article, or out of every article with null. */
  select(fingerprint: string | null): TransitionResult | null {
    if (fingerprint === this.selected) {
      return null;
    }
    if (this.selected) {
      this.lifecycle.exitView(this.selected);
    }
    this.selected = fingerprint;
    return fingerprint ? this.lifecycle.enterView(fingerprint) : null;
  }

  markRead(fingerprint: string): TransitionResult {
    return this.lifecycle.markRead(fingerprint);
  }

  markUnread(fingerprint: string): TransitionResult {
    return this.lifecycle.markUnread(fingerprint);
  }

  toggleRead(fingerprint: string): TransitionResult {
    const article = this.store.getArticle(fingerprint);
    if (!isLive(article)) return 'deleted';
    // 手动改为未读时不再自动标记已读
    if (article.is_read === 1) {
      this.lifecycle.exitView(fingerprint);
      return this.lifecycle.markUnread(fingerprint);
    }
    return this.lifecycle.markRead(fingerprint);
  }

  toggleStarred(fingerprint: string): TransitionResult {
    return this.lifecycle.toggleStarred(fingerprint);
  }

  delete(fingerprint: string): TransitionResult {
    if (this.selected === fingerprint) {
      this.selected = null;
    }
    return this.lifecycle.delete(fingerprint);
  }

  fetchContent(fingerprint: string): StartResult {
    return this.jobs.start(fingerprint, 'content-fetch');
  }

  summarize(fingerprint: string, options: { regenerate?: boolean } = {}): SummarizeResult {
    const article = this.store.getArticle(fingerprint);
    if (!isLive(article)) return 'article-deleted';
    if (!options.regenerate && article.summary_state === 'ready' && article.summary) {
      return 'cached';
    }
    return this.jobs.start(fingerprint, 'summarize');
  }

  bookmark(fingerprint: string, tags: string[] = []): StartResult {
    return this.jobs.start(fingerprint, 'bookmark', { tags });
  }

  // Feeds

  /** Subscribes to a feed URL, or to the feed a web page advertises. */
  async addFeed(url: string, title?: string): Promise<AddFeedResult> {
    const target = normalizeUrl(url);
    const known = this.store.getFeed(target);
    if (known) {
      // 已订阅时只更新标题
      return { status: 'exists', feed: title ? this.store.upsertFeed({ url: target, title }) : known };
    }

    const discovered = await this.fetcher.discover(target);
    if (!discovered.ok) {
      const { kind, message } = discovered.error;
      throw new CollaboratorError('feed', kind, message, target);
    }

    const input = { ...discovered.feed, url: normalizeUrl(discovered.feed.url) };
    if (title) {
      input.title = title;
    }

    const feed = this.store.insertFeed(input);
    if (feed) {
      return { status: 'added', feed };
    }
    const existing = this.store.getFeed(input.url);
    if (!existing) {
      throw new NotFoundError('feed', input.url);
    }
    return { status: 'exists', feed: existing };
  }

  /** Unsubscribes and drops the feed's articles, cancelling their jobs first. */
  removeFeed(url: string): boolean {
    const target = normalizeUrl(url);
    for (const fingerprint of this.store.feedFingerprints(target)) {
      this.jobs.cancelAll(fingerprint);
      this.lifecycle.exitView(fingerprint);
      if (this.selected === fingerprint) {
        this.selected = null;
      }
    }
    return this.store.removeFeed(target);
  }

  importFeeds(xml: string): ImportReport {
    const report: ImportReport = { added: [], existing: 0, invalid: [] };

    for (const subscription of parseOpml(xml)) {
      let url: string;
      try {
        url = canonicalFeedUrl(subscription.url);
      } catch {
        report.invalid.push(subscription.url);
        continue;
      }

      const feed = this.store.insertFeed({ url, title: subscription.title });
      if (feed) {
        report.added.push(feed);
      } else {
        report.existing++;
      }
    }

    return report;
  }

  exportFeeds(title?: string): string {
    const feeds = this.store.listFeeds().map(f => ({ url: f.url, title: f.title }));
    return exportOpml(feeds, title, this.now());
  }

  refresh(feedUrls?: string[]): Promise<RefreshReport> {
    return this.reconciler.refresh(feedUrls?.map(normalizeUrl));
  }

  purge(now: Date = this.now(), horizonDays: number = this.retentionDays): number {
    return this.store.purgeExpired(now, horizonDays);
  }
}
