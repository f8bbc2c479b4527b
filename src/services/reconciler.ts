import PQueue from 'p-queue';
import type { ArticleStore } from './store.js';
import type { FeedFetcher } from './rss.js';
import type { UpsertOutcome } from '../models/article.js';
import { fingerprintArticle, type FingerprintFn } from '../utils/fingerprint.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const FEED_CONCURRENCY = 5;

const log = logger.scope('refresh');

export type FeedRefreshStatus = 'ok' | 'fetch-failed' | 'store-failed' | 'not-found';

export interface FeedRefreshResult {
  feedUrl: string;
  title: string;
  status: FeedRefreshStatus;
  inserted: number;
  updated: number;
  suppressed: number;
  error?: string;
}

export interface RefreshReport {
  feeds: FeedRefreshResult[];
  inserted: number;
  updated: number;
  suppressed: number;
  failed: number;
}

export interface ReconcilerOptions {
  fingerprint?: FingerprintFn;
  concurrency?: number;
}

function emptyResult(feedUrl: string, title: string, status: FeedRefreshStatus, error?: string): FeedRefreshResult {
  return { feedUrl, title, status, inserted: 0, updated: 0, suppressed: 0, error };
}

/**
 * Merges freshly fetched feed items into the store. Feeds are fetched
 * concurrently and independently: one feed failing never touches the
 * articles of another, nor its own existing ones.
 */
export class Reconciler {
  private readonly fingerprint: FingerprintFn;
  private readonly concurrency: number;

  constructor(
    private readonly store: ArticleStore,
    private readonly fetcher: FeedFetcher,
    options: ReconcilerOptions = {}
  ) {
    this.fingerprint = options.fingerprint ?? fingerprintArticle;
    this.concurrency = options.concurrency ?? FEED_CONCURRENCY;
  }

  async refreshFeed(feedUrl: string): Promise<FeedRefreshResult> {
    const feed = this.store.getFeed(feedUrl);
    if (!feed) {
      return emptyResult(feedUrl, feedUrl, 'not-found', `Feed not found: ${feedUrl}`);
    }

    const fetched = await this.fetcher.fetch(feed.url);

    try {
      if (!fetched.ok) {
        const message = fetched.error.status
          ? `${fetched.error.kind} ${fetched.error.status}: ${fetched.error.message}`
          : `${fetched.error.kind}: ${fetched.error.message}`;
        this.store.recordFetchFailure(feed.url, message);
        log.debug(`${feed.title}: ${message}`);
        return emptyResult(feed.url, feed.title, 'fetch-failed', message);
      }

      const result = emptyResult(feed.url, feed.title, 'ok');
      const counts: Record<UpsertOutcome, number> = { inserted: 0, updated: 0, suppressed: 0 };

      for (const item of fetched.items) {
        const outcome = this.store.upsertArticleIfNotTombstoned({
          ...item,
          feedUrl: feed.url,
          fingerprint: this.fingerprint(feed.url, item),
        });
        counts[outcome]++;
      }

      this.store.recordFetchSuccess(feed.url, {
        site_url: fetched.siteUrl,
        description: fetched.description,
      });

      log.debug(`${feed.title}: +${counts.inserted} ~${counts.updated} x${counts.suppressed}`);
      return { ...result, ...counts };
    } catch (error) {
      // 存储失败只记在该订阅源上，不中断整批刷新
      return emptyResult(feed.url, feed.title, 'store-failed', errorMessage(error));
    }
  }

  /** Refreshes the given feeds, or every stored feed when none are given. */
  async refresh(feedUrls?: string[]): Promise<RefreshReport> {
    const urls = feedUrls ?? this.store.listFeeds().map(f => f.url);
    const queue = new PQueue({ concurrency: this.concurrency });

    const feeds = await Promise.all(
      urls.map(url => queue.add(() => this.refreshFeed(url), { throwOnTimeout: true }))
    );

    return feeds.reduce<RefreshReport>(
      (report, feed) => ({
        feeds: report.feeds,
        inserted: report.inserted + feed.inserted,
        updated: report.updated + feed.updated,
        suppressed: report.suppressed + feed.suppressed,
        failed: report.failed + (feed.status === 'ok' ? 0 : 1),
      }),
      { feeds, inserted: 0, updated: 0, suppressed: 0, failed: 0 }
    );
  }
}
