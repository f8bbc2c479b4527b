export type ReadState = 'unread' | 'read';
export type SummaryState = 'absent' | 'pending' | 'ready' | 'failed';
export type ArticleFilter = 'unread' | 'starred' | 'all';
export type ArticleSort = 'published-desc' | 'published-asc';

export const ARTICLE_FILTERS: readonly ArticleFilter[] = ['unread', 'starred', 'all'];

export interface Article {
  fingerprint: string;
  feed_url: string;
  guid: string | null;
  title: string;
  link: string | null;
  author: string | null;
  published_at: string | null;
  snippet: string | null;
  snippet_text: string | null;
  content_text: string | null;
  summary: string | null;
  summary_state: SummaryState;
  summary_error: string | null;
  summary_model: string | null;
  is_read: number;
  is_starred: number;
  is_deleted: number;
  deleted_at: string | null;
  bookmark_id: string | null;
  bookmark_tags: string | null;
  bookmarked_at: string | null;
  last_viewed_at: string | null;
  created_at: string;
  last_seen_at: string;
}

export interface ArticleWithFeed extends Article {
  feed_title: string;
}

/** One entry as parsed from a feed document, before it gets an identity. */
export interface CandidateItem {
  guid?: string;
  title: string;
  link?: string;
  author?: string;
  publishedAt?: string;
  snippet?: string;
  snippetText?: string;
}

export interface ArticleCandidate extends CandidateItem {
  fingerprint: string;
  feedUrl: string;
}

export type UpsertOutcome = 'inserted' | 'updated' | 'suppressed';

export type SummaryWrite =
  | { ok: true; text: string; model: string }
  | { ok: false; error: string };

export interface ListOptions {
  feedUrl?: string;
  sort?: ArticleSort;
  limit?: number;
}

export function nextFilter(filter: ArticleFilter): ArticleFilter {
  const index = ARTICLE_FILTERS.indexOf(filter);
  return ARTICLE_FILTERS[(index + 1) % ARTICLE_FILTERS.length] ?? 'all';
}

export function isArticleFilter(value: string): value is ArticleFilter {
  return (ARTICLE_FILTERS as readonly string[]).includes(value);
}
