import { describe, expect, it } from 'vitest';
import { ReadabilityExtractor } from './extractor.js';
import { HttpStatusError, type FetchTextOptions, type FetchedText, type TextFetcher } from './http.js';
import { NoCookies, type CookieSource } from './cookies.js';

const PARAGRAPH =
  'The committee published its findings on Tuesday after a year of hearings and field visits across the region. ';

const ARTICLE_HTML = `<html><head><title>Findings</title></head><body>
  <nav><a href="/">Home</a> <a href="/about">About</a></nav>
  <article>
    <h1>Findings</h1>
    <p>${PARAGRAPH.repeat(3)}</p>
    <p>${PARAGRAPH.repeat(3)}</p>
    <p>The final sentence closes the report.</p>
  </article>
  <footer>Copyright</footer>
</body></html>`;

class StaticFetcher implements TextFetcher {
  readonly requests: { url: string; options: FetchTextOptions | undefined }[] = [];

  constructor(private readonly respond: (url: string) => string | Error) {}

  async fetchText(url: string, options?: FetchTextOptions): Promise<FetchedText> {
    this.requests.push({ url, options });
    const body = this.respond(url);
    if (body instanceof Error) throw body;
    return { text: body, finalUrl: url, contentType: 'text/html' };
  }
}

class DomainCookies implements CookieSource {
  readonly domains: string[] = [];

  cookieHeader(domain: string): string {
    this.domains.push(domain);
    return 'session=abc';
  }
}

describe('ReadabilityExtractor', () => {
  it('extracts the article body and sends the domain cookies', async () => {
    const http = new StaticFetcher(() => ARTICLE_HTML);
    const cookies = new DomainCookies();

    const result = await new ReadabilityExtractor(http, cookies).extract('https://news.example.com/findings');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.text).toContain('The final sentence closes the report.');
      expect(result.text).not.toMatch(/^\s/);
    }
    expect(cookies.domains).toEqual(['news.example.com']);
    expect(http.requests[0]?.options?.headers).toEqual({ Cookie: 'session=abc' });
  });

  it('treats a near-empty page as an extraction failure', async () => {
    const http = new StaticFetcher(() => '<html><body><p>Subscribe to read</p></body></html>');

    const result = await new ReadabilityExtractor(http, new NoCookies()).extract('https://paywall.example.com/a');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.kind).toBe('extraction');
      expect(result.reason).toMatch(/^Only \d+ characters of text at https:\/\/paywall\.example\.com\/a$/);
    }
  });

  it('keeps HTTP and network failures apart', async () => {
    const http = new StaticFetcher(url =>
      url.includes('gone') ? new HttpStatusError(url, 410, 'Gone') : new Error('getaddrinfo ENOTFOUND')
    );
    const extractor = new ReadabilityExtractor(http, new NoCookies());

    expect(await extractor.extract('https://example.com/gone')).toEqual({
      ok: false,
      kind: 'http-status',
      reason: 'HTTP 410: Gone',
    });
    expect(await extractor.extract('https://offline.example.com/')).toEqual({
      ok: false,
      kind: 'network',
      reason: 'getaddrinfo ENOTFOUND',
    });
  });

  it('rejects a link that is not a URL', async () => {
    const http = new StaticFetcher(() => ARTICLE_HTML);

    expect(await new ReadabilityExtractor(http, new NoCookies()).extract('/relative/path')).toEqual({
      ok: false,
      kind: 'extraction',
      reason: 'Invalid URL: /relative/path',
    });
    expect(http.requests).toEqual([]);
  });
});
