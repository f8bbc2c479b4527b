import { Readability } from '@mozilla/readability';
import { JSDOM, VirtualConsole } from 'jsdom';
import { HttpStatusError, type TextFetcher } from './http.js';
import type { CookieSource } from './cookies.js';
import { errorMessage } from '../utils/errors.js';
import { collapseBlankLines, htmlToPlainText } from '../utils/text.js';

/** Extracted text shorter than this is treated as a paywall or an empty page. */
export const MIN_CONTENT_LENGTH = 200;

export type ExtractionErrorKind = 'network' | 'http-status' | 'extraction';

export type ExtractionResult =
  | { ok: true; text: string }
  | { ok: false; kind: ExtractionErrorKind; reason: string };

export interface ContentExtractor {
  extract(url: string): Promise<ExtractionResult>;
}

// 使用 Readability 提取正文，失败时退回整页纯文本
export function extractReadableText(html: string, url: string): string {
  const vConsole = new VirtualConsole();
  vConsole.on('jsdomError', () => {
    // 忽略 CSS 解析错误等噪音
  });

  const dom = new JSDOM(html, { url, virtualConsole: vConsole });
  try {
    const article = new Readability(dom.window.document).parse();
    const text = article?.textContent ? collapseBlankLines(article.textContent) : '';
    return text || collapseBlankLines(htmlToPlainText(html));
  } finally {
    dom.window.close();
  }
}

export class ReadabilityExtractor implements ContentExtractor {
  constructor(
    private readonly http: TextFetcher,
    private readonly cookies: CookieSource
  ) {}

  async extract(url: string): Promise<ExtractionResult> {
    let host: string;
    try {
      host = new URL(url).hostname;
    } catch {
      return { ok: false, kind: 'extraction', reason: `Invalid URL: ${url}` };
    }

    const cookie = this.cookies.cookieHeader(host);
    let html: string;
    try {
      ({ text: html } = await this.http.fetchText(url, {
        accept: 'text/html,application/xhtml+xml',
        headers: cookie ? { Cookie: cookie } : {},
      }));
    } catch (error) {
      return error instanceof HttpStatusError
        ? { ok: false, kind: 'http-status', reason: error.message }
        : { ok: false, kind: 'network', reason: errorMessage(error) };
    }

    const text = extractReadableText(html, url);
    if (text.length <= MIN_CONTENT_LENGTH) {
      return { ok: false, kind: 'extraction', reason: `Only ${text.length} characters of text at ${url}` };
    }
    return { ok: true, text };
  }
}
