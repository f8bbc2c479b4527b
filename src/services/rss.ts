import Parser from 'rss-parser';
import { HttpStatusError, type FetchedText, type TextFetcher } from './http.js';
import { errorMessage } from '../utils/errors.js';
import { htmlToPlainText, toIsoDate } from '../utils/text.js';
import type { CandidateItem } from '../models/article.js';
import type { FeedInput } from '../models/feed.js';

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

export type FeedFetchErrorKind = 'network' | 'http-status' | 'parse';

export interface FeedFetchError {
  kind: FeedFetchErrorKind;
  message: string;
  status?: number;
}

export type FeedFetchResult =
  | { ok: true; title: string; siteUrl?: string; description?: string; items: CandidateItem[] }
  | { ok: false; error: FeedFetchError };

export type FeedDiscoveryResult =
  | { ok: true; feed: FeedInput }
  | { ok: false; error: FeedFetchError };

export interface FeedFetcher {
  fetch(feedUrl: string): Promise<FeedFetchResult>;
  discover(url: string): Promise<FeedDiscoveryResult>;
}

interface ItemFields {
  contentEncoded?: string;
  creator?: string;
  summary?: string;
  id?: string;
}

type ParsedFeed = Awaited<ReturnType<Parser<Record<string, unknown>, ItemFields>['parseString']>>;

const FEED_LINK_PATTERNS = [
  /<link[^>]*rel=["']alternate["'][^>]*type=["']application\/(?:rss|atom)\+xml["'][^>]*href=["']([^"']+)["']/i,
  /<link[^>]*type=["']application\/(?:rss|atom)\+xml["'][^>]*href=["']([^"']+)["']/i,
  /<link[^>]*href=["']([^"']+)["'][^>]*type=["']application\/(?:rss|atom)\+xml["']/i,
];

function classify(error: unknown): FeedFetchError {
  if (error instanceof HttpStatusError) {
    return { kind: 'http-status', status: error.status, message: error.message };
  }
  return { kind: 'network', message: errorMessage(error) };
}

/** Finds the first RSS/Atom `<link rel="alternate">` of an HTML page, resolved against the page URL. */
export function findFeedLink(html: string, baseUrl: string): string | null {
  for (const pattern of FEED_LINK_PATTERNS) {
    const href = pattern.exec(html)?.[1];
    if (href) {
      try {
        return new URL(href, baseUrl).toString();
      } catch {
        return null;
      }
    }
  }
  return null;
}

function looksLikeHtml(contentType: string, body: string): boolean {
  const head = body.trimStart().slice(0, 15).toLowerCase();
  return contentType.includes('html') || head.startsWith('<!doctype html') || head.startsWith('<html');
}

export class RssFeedFetcher implements FeedFetcher {
  private parser: Parser<Record<string, unknown>, ItemFields>;

  constructor(private readonly http: TextFetcher) {
    this.parser = new Parser({
      customFields: {
        item: [
          ['content:encoded', 'contentEncoded'],
          ['dc:creator', 'creator'],
        ],
      },
    });
  }

  toCandidates(parsed: ParsedFeed): CandidateItem[] {
    return parsed.items.map((item) => {
      const snippet = item.contentEncoded || item.content || item.summary || undefined;
      return {
        guid: item.guid || item.id || undefined,
        title: item.title?.trim() || 'Untitled',
        link: item.link || undefined,
        author: item.creator || undefined,
        publishedAt: toIsoDate(item.isoDate || item.pubDate),
        snippet,
        snippetText: snippet ? htmlToPlainText(snippet) : undefined,
      };
    });
  }

  async parse(xml: string): Promise<ParsedFeed> {
    return this.parser.parseString(xml);
  }

  private async tryParse(xml: string): Promise<ParsedFeed | null> {
    try {
      return await this.parse(xml);
    } catch {
      return null;
    }
  }

  async fetch(feedUrl: string): Promise<FeedFetchResult> {
    let xml: string;
    try {
      ({ text: xml } = await this.http.fetchText(feedUrl, { accept: FEED_ACCEPT }));
    } catch (error) {
      return { ok: false, error: classify(error) };
    }

    let parsed: ParsedFeed;
    try {
      parsed = await this.parse(xml);
    } catch (error) {
      return { ok: false, error: { kind: 'parse', message: errorMessage(error) } };
    }

    return {
      ok: true,
      title: parsed.title?.trim() || feedUrl,
      siteUrl: parsed.link || undefined,
      description: parsed.description || undefined,
      items: this.toCandidates(parsed),
    };
  }

  /**
   * Accepts either a feed URL or a web page advertising one. For a page, the
   * first alternate RSS/Atom link is followed.
   */
  async discover(url: string): Promise<FeedDiscoveryResult> {
    let page: FetchedText;
    try {
      page = await this.http.fetchText(url, { accept: FEED_ACCEPT });
    } catch (error) {
      return { ok: false, error: classify(error) };
    }

    const parsed = await this.tryParse(page.text);
    if (parsed) {
      return { ok: true, feed: this.toFeedInput(page.finalUrl, parsed) };
    }

    // 不是 RSS/Atom，尝试从 HTML 中找订阅链接
    const feedUrl = looksLikeHtml(page.contentType, page.text) ? findFeedLink(page.text, page.finalUrl) : null;
    if (!feedUrl) {
      return { ok: false, error: { kind: 'parse', message: `No RSS/Atom feed found at ${url}` } };
    }

    const result = await this.fetch(feedUrl);
    if (!result.ok) {
      return result;
    }
    return {
      ok: true,
      feed: {
        url: feedUrl,
        title: result.title,
        site_url: result.siteUrl,
        description: result.description,
      },
    };
  }

  private toFeedInput(url: string, parsed: ParsedFeed): FeedInput {
    return {
      url,
      title: parsed.title?.trim() || url,
      site_url: parsed.link || undefined,
      description: parsed.description || undefined,
    };
  }
}
