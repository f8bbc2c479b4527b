import type Database from 'better-sqlite3';
import { getDb } from '../db/index.js';
import { ArticleStore } from './store.js';
import { HttpClient } from './http.js';
import { RssFeedFetcher } from './rss.js';
import { Reconciler } from './reconciler.js';
import { LifecycleEngine } from './lifecycle.js';
import { JobCoordinator } from './jobs.js';
import { ReadabilityExtractor } from './extractor.js';
import { createCookieSource } from './cookies.js';
import { LlmSummarizer } from './summarizer.js';
import { RaindropBookmarker } from './bookmarks.js';
import { DEFAULT_RETENTION_DAYS, ReaderPresenter } from './presenter.js';
import { getConfig, getListConfig, getNumberConfig } from '../utils/config.js';
import { CONFIG_KEYS } from '../models/config.js';
import type { JobSettledListener } from '../models/job.js';

export interface Reader {
  store: ArticleStore;
  lifecycle: LifecycleEngine;
  jobs: JobCoordinator;
  reconciler: Reconciler;
  presenter: ReaderPresenter;
}

export interface ReaderHooks {
  onAutoRead?: (fingerprint: string) => void;
  onSettled?: JobSettledListener;
}

function proxyUrl(db: Database.Database): string | null {
  return getConfig(CONFIG_KEYS.PROXY_URL, db) || process.env.HTTPS_PROXY || process.env.HTTP_PROXY || null;
}

/** Builds the whole engine from the config table and environment. */
export function createReader(db: Database.Database = getDb(), hooks: ReaderHooks = {}): Reader {
  const store = new ArticleStore(db);
  const http = new HttpClient(proxyUrl(db));
  const fetcher = new RssFeedFetcher(http);

  const lifecycle = new LifecycleEngine(store, { onAutoRead: hooks.onAutoRead });
  const jobs = new JobCoordinator(
    store,
    {
      extractor: new ReadabilityExtractor(http, createCookieSource(getConfig(CONFIG_KEYS.COOKIE_SOURCE, db))),
      summarizer: new LlmSummarizer({
        apiKey: getConfig(CONFIG_KEYS.LLM_API_KEY, db),
        baseUrl: getConfig(CONFIG_KEYS.LLM_BASE_URL, db) ?? 'https://api.openai.com/v1',
        model: getConfig(CONFIG_KEYS.LLM_MODEL, db) ?? 'gpt-4o-mini',
      }),
      bookmarker: new RaindropBookmarker(
        getConfig(CONFIG_KEYS.RAINDROP_TOKEN, db),
        getConfig(CONFIG_KEYS.RAINDROP_COLLECTION, db) ?? undefined
      ),
    },
    { defaultTags: getListConfig(CONFIG_KEYS.DEFAULT_TAGS, db), onSettled: hooks.onSettled }
  );
  lifecycle.attachJobs(jobs);

  const reconciler = new Reconciler(store, fetcher);
  const presenter = new ReaderPresenter(
    { store, lifecycle, jobs, reconciler, fetcher },
    { retentionDays: getNumberConfig(CONFIG_KEYS.RETENTION_DAYS, DEFAULT_RETENTION_DAYS, db) }
  );

  return { store, lifecycle, jobs, reconciler, presenter };
}

let reader: Reader | null = null;

export function getReader(): Reader {
  if (!reader) {
    reader = createReader();
  }
  return reader;
}

export function disposeReader(): void {
  reader?.lifecycle.dispose();
  reader = null;
}
