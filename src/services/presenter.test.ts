import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ReaderPresenter } from './presenter.js';
import { LifecycleEngine } from './lifecycle.js';
import { JobCoordinator } from './jobs.js';
import { Reconciler } from './reconciler.js';
import type { ArticleStore } from './store.js';
import { AmbiguousReferenceError, CollaboratorError, FeedstashError, NotFoundError } from '../utils/errors.js';
import {
  FakeBookmarker,
  FakeExtractor,
  FakeFeedFetcher,
  FakeSummarizer,
  TEST_FEED,
  candidate,
  createTestStore,
  flush,
} from '../testing/fakes.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('ReaderPresenter', () => {
  let clock: Date;
  let store: ArticleStore;
  let fetcher: FakeFeedFetcher;
  let extractor: FakeExtractor;
  let lifecycle: LifecycleEngine;
  let jobs: JobCoordinator;
  let presenter: ReaderPresenter;

  beforeEach(() => {
    clock = new Date('2026-03-01T00:00:00.000Z');
    ({ store } = createTestStore(() => clock));
    store.upsertArticleIfNotTombstoned(candidate('abcd1234'));
    store.upsertArticleIfNotTombstoned(candidate('abce5678'));

    fetcher = new FakeFeedFetcher();
    extractor = new FakeExtractor();
    lifecycle = new LifecycleEngine(store);
    jobs = new JobCoordinator(store, { extractor, summarizer: new FakeSummarizer(), bookmarker: new FakeBookmarker() });
    lifecycle.attachJobs(jobs);
    presenter = new ReaderPresenter(
      { store, lifecycle, jobs, reconciler: new Reconciler(store, fetcher), fetcher },
      { now: () => clock }
    );
  });

  afterEach(() => {
    lifecycle.dispose();
    vi.useRealTimers();
  });

  describe('getArticle', () => {
    it('resolves a unique fingerprint prefix', () => {
      expect(presenter.getArticle('abcd').fingerprint).toBe('abcd1234');
      expect(presenter.getArticle('ABCE56').feed_title).toBe('Example');
    });

    it('rejects ambiguous, short and deleted references', () => {
      expect(() => presenter.getArticle('abc1')).toThrow(NotFoundError);
      expect(() => presenter.getArticle('abc')).toThrow(NotFoundError);
      store.upsertArticleIfNotTombstoned(candidate('abcd9999'));
      expect(() => presenter.getArticle('abcd')).toThrow(AmbiguousReferenceError);

      presenter.delete('abcd1234');
      expect(() => presenter.getArticle('abcd1234')).toThrow('No article matches "abcd1234".');
    });
  });

  describe('listArticles', () => {
    it('matches the feed filter against the stored feed URL', () => {
      store.insertFeed({ url: 'https://other.example.com/feed', title: 'Other' });
      store.upsertArticleIfNotTombstoned(candidate('ffff0001', { feedUrl: 'https://other.example.com/feed' }));

      const listed = Array.from(presenter.listArticles('all', { feedUrl: ' https://EXAMPLE.com/feed.xml#top ' }));

      expect(listed.map(a => a.fingerprint).sort()).toEqual(['abcd1234', 'abce5678']);
    });
  });

  describe('selection', () => {
    it('arms the dwell only for the selected article', () => {
      vi.useFakeTimers();

      expect(presenter.select('abcd1234')).toBe('applied');
      expect(presenter.select('abcd1234')).toBeNull();
      vi.advanceTimersByTime(1000);
      presenter.select('abce5678');
      vi.advanceTimersByTime(2000);

      expect(store.getArticle('abcd1234')?.is_read).toBe(0);
      expect(store.getArticle('abce5678')?.is_read).toBe(1);
      expect(presenter.selection).toBe('abce5678');
    });

    it('does not re-read an article the user marked unread', () => {
      vi.useFakeTimers();
      presenter.select('abcd1234');

      expect(presenter.toggleRead('abcd1234')).toBe('applied');
      expect(presenter.toggleRead('abcd1234')).toBe('applied');
      vi.advanceTimersByTime(5000);

      expect(store.getArticle('abcd1234')?.is_read).toBe(0);
      expect(lifecycle.isInView('abcd1234')).toBe(false);
    });

    it('clears the selection when the selected article is deleted', () => {
      presenter.select('abcd1234');
      expect(presenter.delete('abcd1234')).toBe('applied');
      expect(presenter.selection).toBeNull();
      expect(presenter.toggleRead('abcd1234')).toBe('deleted');
    });
  });

  describe('summarize', () => {
    it('serves a ready summary from the cache unless asked to regenerate', () => {
      store.setSummary('abcd1234', { ok: true, text: '- cached', model: 'test-model' });

      expect(presenter.summarize('abcd1234')).toBe('cached');
      expect(presenter.summarize('abcd1234', { regenerate: true })).toBe('ok');
      expect(store.getArticle('abcd1234')?.summary_state).toBe('pending');
    });

    it('refuses a deleted article', () => {
      presenter.delete('abcd1234');
      expect(presenter.summarize('abcd1234')).toBe('article-deleted');
    });
  });

  describe('addFeed', () => {
    it('returns the known feed for an equivalent URL', async () => {
      const result = await presenter.addFeed(' https://example.com/feed.xml#latest ');
      expect(result.status).toBe('exists');
      expect(result.feed.url).toBe(TEST_FEED);
    });

    it('renames a known feed when a title is given', async () => {
      const result = await presenter.addFeed(TEST_FEED, 'Renamed');
      expect(result).toMatchObject({ status: 'exists', feed: { url: TEST_FEED, title: 'Renamed' } });
      expect(fetcher.fetched).toEqual([]);
    });

    it('subscribes to the discovered feed', async () => {
      fetcher.pages.set('https://new.example.com/', {
        ok: true,
        feed: { url: 'https://new.example.com/rss', title: 'New Site', site_url: 'https://new.example.com/' },
      });

      const result = await presenter.addFeed('https://new.example.com', 'Custom');

      expect(result.status).toBe('added');
      expect(result.feed).toMatchObject({ url: 'https://new.example.com/rss', title: 'Custom' });
      expect(store.getFeed('https://new.example.com/rss')?.site_url).toBe('https://new.example.com/');
    });

    it('surfaces discovery failures', async () => {
      await expect(presenter.addFeed('https://unknown.example.com')).rejects.toThrow(CollaboratorError);
      await expect(presenter.addFeed('https://unknown.example.com')).rejects.toThrow(
        'feed (parse) for https://unknown.example.com/: No RSS/Atom feed found at https://unknown.example.com/'
      );
    });

    it('rejects an invalid URL', async () => {
      await expect(presenter.addFeed('not a url')).rejects.toMatchObject({ code: 'INVALID_URL' });
      await expect(presenter.addFeed('not a url')).rejects.toBeInstanceOf(FeedstashError);
    });
  });

  describe('removeFeed', () => {
    it('cancels running jobs before dropping the articles', async () => {
      presenter.fetchContent('abcd1234');
      await flush();
      expect(extractor.pending).toHaveLength(1);
      const done = jobs.wait('abcd1234', 'content-fetch');

      expect(presenter.removeFeed(TEST_FEED)).toBe(true);
      expect(jobs.status('abcd1234', 'content-fetch')?.status).toBe('cancelled');
      expect(store.getArticle('abcd1234')).toBeNull();
      expect(presenter.listFeeds()).toEqual([]);

      extractor.settle({ ok: true, text: 'late' });
      expect(await done).toEqual({ status: 'discarded', reason: 'cancelled' });
    });
  });

  describe('importFeeds', () => {
    it('adds new feeds without fetching them', () => {
      const xml = `<opml version="2.0"><body>
        <outline text="Example" xmlUrl="${TEST_FEED}"/>
        <outline text="Fresh" xmlUrl="https://fresh.example.com/feed"/>
        <outline text="Broken" xmlUrl="not a url"/>
      </body></opml>`;

      const report = presenter.importFeeds(xml);

      expect(report.added.map(f => f.url)).toEqual(['https://fresh.example.com/feed']);
      expect(report.existing).toBe(1);
      expect(report.invalid).toEqual(['not a url']);
      expect(fetcher.fetched).toEqual([]);
    });

    it('round-trips with exportFeeds', () => {
      store.insertFeed({ url: 'https://fresh.example.com/feed', title: 'Fresh' });
      const opml = presenter.exportFeeds();

      store.removeFeed(TEST_FEED);
      const report = presenter.importFeeds(opml);

      expect(report.added.map(f => f.url)).toEqual([TEST_FEED]);
      expect(report.existing).toBe(1);
    });
  });

  describe('purge', () => {
    it('uses the default retention of seven days', () => {
      clock = new Date(Date.parse('2026-03-01T00:00:00.000Z') + 6 * DAY_MS);
      expect(presenter.purge()).toBe(0);

      clock = new Date(Date.parse('2026-03-01T00:00:00.000Z') + 8 * DAY_MS);
      expect(presenter.purge()).toBe(2);
      expect(store.getArticle('abcd1234')).toBeNull();
    });
  });
});
