import fetch, { type RequestInit, type Response } from 'node-fetch';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { logger } from '../utils/logger.js';

const USER_AGENT = 'Mozilla/5.0 (compatible; feedstash/0.1)';

const log = logger.scope('http');

export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

export interface FetchTextOptions {
  accept?: string;
  headers?: Record<string, string>;
}

export interface FetchedText {
  text: string;
  finalUrl: string;
  contentType: string;
}

export interface TextFetcher {
  fetchText(url: string, options?: FetchTextOptions): Promise<FetchedText>;
}

type Mode = 'direct' | 'proxy';

/**
 * Plain HTTP GET. Connects directly first and, when a proxy is configured,
 * repeats the request through it after a network failure. An HTTP error
 * status is final: the proxy would see the same answer.
 */
export class HttpClient implements TextFetcher {
  private agent: HttpsProxyAgent<string> | null;

  constructor(private readonly proxyUrl: string | null = null) {
    this.agent = proxyUrl ? new HttpsProxyAgent(proxyUrl) : null;
  }

  private async doFetch(url: string, mode: Mode, options: FetchTextOptions): Promise<Response> {
    const init: RequestInit = {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: options.accept ?? '*/*',
        ...options.headers,
      },
    };

    if (mode === 'proxy' && this.agent) {
      init.agent = this.agent;
    }

    const response = await fetch(url, init);
    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }
    return response;
  }

  async fetch(url: string, options: FetchTextOptions = {}): Promise<Response> {
    try {
      return await this.doFetch(url, 'direct', options);
    } catch (error) {
      if (error instanceof HttpStatusError || !this.agent) {
        throw error;
      }
      log.debug(`Direct fetch of ${url} failed, retrying through ${this.proxyUrl}`);
      return await this.doFetch(url, 'proxy', options);
    }
  }

  async fetchText(url: string, options: FetchTextOptions = {}): Promise<FetchedText> {
    const response = await this.fetch(url, options);
    return {
      text: await response.text(),
      finalUrl: response.url || url,
      contentType: response.headers.get('content-type') ?? '',
    };
  }
}
