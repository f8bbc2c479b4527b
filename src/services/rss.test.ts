import { beforeEach, describe, expect, it } from 'vitest';
import { findFeedLink, RssFeedFetcher } from './rss.js';
import { HttpStatusError, type FetchedText, type TextFetcher } from './http.js';

const FEED_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title> Example Blog </title>
    <link>https://blog.example.com/</link>
    <description>Notes</description>
    <item>
      <title>First post</title>
      <link>https://blog.example.com/first</link>
      <guid>first-guid</guid>
      <pubDate>Sat, 28 Feb 2026 10:00:00 GMT</pubDate>
      <dc:creator>Alice</dc:creator>
      <content:encoded><![CDATA[<p>Hello <b>world</b>.</p>]]></content:encoded>
    </item>
    <item>
      <link>https://blog.example.com/second</link>
      <description>Plain summary</description>
    </item>
  </channel>
</rss>`;

class FakeTextFetcher implements TextFetcher {
  readonly pages = new Map<string, FetchedText | Error>();
  readonly requested: string[] = [];

  async fetchText(url: string): Promise<FetchedText> {
    this.requested.push(url);
    const page = this.pages.get(url);
    if (!page) throw new HttpStatusError(url, 404, 'Not Found');
    if (page instanceof Error) throw page;
    return page;
  }

  serve(url: string, text: string, contentType = 'application/rss+xml'): void {
    this.pages.set(url, { text, finalUrl: url, contentType });
  }
}

describe('RssFeedFetcher', () => {
  let http: FakeTextFetcher;
  let fetcher: RssFeedFetcher;

  beforeEach(() => {
    http = new FakeTextFetcher();
    fetcher = new RssFeedFetcher(http);
  });

  describe('fetch', () => {
    it('turns feed items into candidates', async () => {
      http.serve('https://blog.example.com/feed.xml', FEED_XML);

      const result = await fetcher.fetch('https://blog.example.com/feed.xml');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.title).toBe('Example Blog');
      expect(result.siteUrl).toBe('https://blog.example.com/');
      expect(result.items).toHaveLength(2);
      expect(result.items[0]).toMatchObject({
        guid: 'first-guid',
        title: 'First post',
        link: 'https://blog.example.com/first',
        author: 'Alice',
        publishedAt: '2026-02-28T10:00:00.000Z',
        snippet: '<p>Hello <b>world</b>.</p>',
        snippetText: 'Hello world.',
      });
      expect(result.items[1]).toMatchObject({
        title: 'Untitled',
        link: 'https://blog.example.com/second',
        snippetText: 'Plain summary',
      });
      expect(result.items[1]?.guid).toBeUndefined();
      expect(result.items[1]?.publishedAt).toBeUndefined();
    });

    it('classifies failures', async () => {
      http.pages.set('https://down.example.com/feed', new Error('socket hang up'));
      http.serve('https://text.example.com/feed', 'not a feed', 'text/plain');

      expect(await fetcher.fetch('https://missing.example.com/feed')).toEqual({
        ok: false,
        error: { kind: 'http-status', status: 404, message: 'HTTP 404: Not Found' },
      });
      expect(await fetcher.fetch('https://down.example.com/feed')).toEqual({
        ok: false,
        error: { kind: 'network', message: 'socket hang up' },
      });

      const parsed = await fetcher.fetch('https://text.example.com/feed');
      expect(parsed.ok).toBe(false);
      if (!parsed.ok) expect(parsed.error.kind).toBe('parse');
    });
  });

  describe('discover', () => {
    it('accepts a feed URL directly', async () => {
      http.serve('https://blog.example.com/feed.xml', FEED_XML);

      expect(await fetcher.discover('https://blog.example.com/feed.xml')).toEqual({
        ok: true,
        feed: {
          url: 'https://blog.example.com/feed.xml',
          title: 'Example Blog',
          site_url: 'https://blog.example.com/',
          description: 'Notes',
        },
      });
    });

    it('follows the alternate link of an HTML page', async () => {
      http.serve(
        'https://blog.example.com/about',
        '<html><head><link rel="alternate" type="application/rss+xml" href="/feed.xml"></head><body></body></html>',
        'text/html; charset=utf-8'
      );
      http.serve('https://blog.example.com/feed.xml', FEED_XML);

      const result = await fetcher.discover('https://blog.example.com/about');

      expect(result.ok && result.feed.url).toBe('https://blog.example.com/feed.xml');
      expect(http.requested).toEqual(['https://blog.example.com/about', 'https://blog.example.com/feed.xml']);
    });

    it('reports a page without any feed', async () => {
      http.serve('https://plain.example.com/', '<html><body>Hello</body></html>', 'text/html');

      expect(await fetcher.discover('https://plain.example.com/')).toEqual({
        ok: false,
        error: { kind: 'parse', message: 'No RSS/Atom feed found at https://plain.example.com/' },
      });
    });
  });
});

describe('findFeedLink', () => {
  it('resolves the link against the page URL', () => {
    const html = '<link type="application/atom+xml" href="atom.xml" rel="alternate">';
    expect(findFeedLink(html, 'https://example.com/blog/')).toBe('https://example.com/blog/atom.xml');
  });

  it('ignores stylesheets and other links', () => {
    expect(findFeedLink('<link rel="stylesheet" href="/main.css">', 'https://example.com/')).toBeNull();
  });
});
