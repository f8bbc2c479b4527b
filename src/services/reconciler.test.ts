import { beforeEach, describe, expect, it } from 'vitest';
import { Reconciler } from './reconciler.js';
import type { ArticleStore } from './store.js';
import { createTestStore, FakeFeedFetcher, TEST_FEED } from '../testing/fakes.js';
import type { CandidateItem } from '../models/article.js';
import type { FingerprintFn } from '../utils/fingerprint.js';

const OTHER_FEED = 'https://other.example.com/rss';

// 测试用指纹：直接取 guid，便于断言
const byGuid: FingerprintFn = (_feedUrl, item) => item.guid ?? item.title;

function item(guid: string, title = `Post ${guid}`): CandidateItem {
  return { guid, title, link: `https://example.com/${guid}` };
}

describe('Reconciler', () => {
  let store: ArticleStore;
  let fetcher: FakeFeedFetcher;
  let reconciler: Reconciler;

  beforeEach(() => {
    ({ store } = createTestStore());
    store.insertFeed({ url: OTHER_FEED, title: 'Other' });
    fetcher = new FakeFeedFetcher();
    reconciler = new Reconciler(store, fetcher, { fingerprint: byGuid });
  });

  it('inserts new items and updates known ones', async () => {
    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', items: [item('aaaa0001'), item('aaaa0002')] });
    fetcher.feeds.set(OTHER_FEED, { ok: true, title: 'Other', items: [] });

    const first = await reconciler.refresh();
    expect(first.inserted).toBe(2);
    expect(first.failed).toBe(0);

    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', items: [item('aaaa0002', 'Edited'), item('aaaa0003')] });
    const second = await reconciler.refresh([TEST_FEED]);

    expect(second.feeds).toEqual([
      { feedUrl: TEST_FEED, title: 'Example', status: 'ok', inserted: 1, updated: 1, suppressed: 0, error: undefined },
    ]);
    expect(store.getArticle('aaaa0002')?.title).toBe('Edited');
    expect(store.getArticle('aaaa0001')).not.toBeNull();
  });

  it('suppresses items matching a tombstone and leaves the row alone', async () => {
    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', items: [item('aaaa0001')] });
    await reconciler.refresh([TEST_FEED]);
    store.setReadState('aaaa0001', 'read');
    store.softDelete('aaaa0001');
    const before = store.getArticle('aaaa0001');

    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', items: [item('aaaa0001', 'Changed upstream')] });
    const report = await reconciler.refresh([TEST_FEED]);

    expect(report.suppressed).toBe(1);
    expect(report.inserted).toBe(0);
    expect(store.getArticle('aaaa0001')).toEqual(before);
  });

  it('isolates a failing feed from the rest of the batch', async () => {
    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', items: [item('aaaa0001')] });
    await reconciler.refresh([TEST_FEED]);

    fetcher.feeds.set(TEST_FEED, { ok: false, error: { kind: 'network', message: 'socket hang up' } });
    fetcher.feeds.set(OTHER_FEED, { ok: true, title: 'Other', items: [item('bbbb0001')] });
    const report = await reconciler.refresh();

    const failing = report.feeds.find(f => f.feedUrl === TEST_FEED);
    expect(failing?.status).toBe('fetch-failed');
    expect(failing?.error).toBe('network: socket hang up');
    expect(store.getFeed(TEST_FEED)?.last_fetch_error).toBe('network: socket hang up');
    expect(store.getArticle('aaaa0001')).not.toBeNull();

    expect(report.failed).toBe(1);
    expect(report.inserted).toBe(1);
    expect(store.getArticle('bbbb0001')?.feed_url).toBe(OTHER_FEED);
  });

  it('includes the HTTP status in the recorded error', async () => {
    const report = await reconciler.refresh([TEST_FEED]);
    expect(report.feeds[0]?.error).toBe('http-status 404: HTTP 404: Not Found');
  });

  it('reports unknown feed URLs without fetching them', async () => {
    const report = await reconciler.refresh(['https://unknown.example.com/feed']);

    expect(report.feeds[0]?.status).toBe('not-found');
    expect(report.failed).toBe(1);
    expect(fetcher.fetched).toEqual([]);
  });

  it('reports a store failure on its own feed', async () => {
    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', items: [item('aaaa0001')] });
    fetcher.feeds.set(OTHER_FEED, { ok: true, title: 'Other', items: [item('bbbb0001')] });
    const failing = new Reconciler(store, fetcher, {
      fingerprint: (feedUrl, candidate) => {
        if (feedUrl === TEST_FEED) throw new Error('disk I/O error');
        return byGuid(feedUrl, candidate);
      },
    });

    const report = await failing.refresh();

    expect(report.feeds.find(f => f.feedUrl === TEST_FEED)).toMatchObject({ status: 'store-failed', error: 'disk I/O error' });
    expect(report.feeds.find(f => f.feedUrl === OTHER_FEED)).toMatchObject({ status: 'ok', inserted: 1 });
  });

  it('clears the last fetch error after a successful fetch', async () => {
    store.recordFetchFailure(TEST_FEED, 'network: timeout');
    fetcher.feeds.set(TEST_FEED, { ok: true, title: 'Example', siteUrl: 'https://example.com', items: [] });

    await reconciler.refresh([TEST_FEED]);

    expect(store.getFeed(TEST_FEED)?.last_fetch_error).toBeNull();
    expect(store.getFeed(TEST_FEED)?.site_url).toBe('https://example.com');
  });
});
