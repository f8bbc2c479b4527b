import type Database from 'better-sqlite3';
import type { Feed, FeedInput } from '../models/feed.js';
import type {
  Article,
  ArticleCandidate,
  ArticleFilter,
  ArticleWithFeed,
  ListOptions,
  ReadState,
  SummaryWrite,
  UpsertOutcome,
} from '../models/article.js';
import { AmbiguousReferenceError, NotFoundError, TransientIOError } from '../utils/errors.js';

const TRANSIENT_SQLITE_CODES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_IOERR',
  'SQLITE_FULL',
  'SQLITE_CANTOPEN',
  'SQLITE_READONLY',
  'SQLITE_PROTOCOL',
];

const DAY_MS = 24 * 60 * 60 * 1000;

function isTransientSqliteError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return false;
  }
  const code = error.code;
  return TRANSIENT_SQLITE_CODES.some(prefix => code.startsWith(prefix));
}

export interface StoreOptions {
  now?: () => Date;
}

export interface StoreStats {
  feeds: number;
  failingFeeds: number;
  articles: number;
  unread: number;
  starred: number;
  deleted: number;
  summarized: number;
  bookmarked: number;
}

const ARTICLE_COLUMNS = `a.*, COALESCE(f.title, a.feed_url) AS feed_title`;

export class ArticleStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: StoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // 存储层 I/O 错误统一转成可重试错误，其他错误原样抛出
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isTransientSqliteError(error)) {
        throw new TransientIOError(operation, error);
      }
      throw error;
    }
  }

  // Feed operations
  insertFeed(input: FeedInput): Feed | null {
    return this.guard('insertFeed', () => {
      const row = this.db.prepare(`
        INSERT INTO feeds (url, title, site_url, description, created_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(url) DO NOTHING
        RETURNING *
      `).get(
        input.url,
        input.title,
        input.site_url ?? null,
        input.description ?? null,
        this.timestamp()
      ) as Feed | undefined;
      return row ?? null;
    });
  }

  upsertFeed(input: FeedInput): Feed {
    return this.guard('upsertFeed', () =>
      this.db.prepare(`
        INSERT INTO feeds (url, title, site_url, description, created_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(url) DO UPDATE SET
          title = excluded.title,
          site_url = COALESCE(excluded.site_url, feeds.site_url),
          description = COALESCE(excluded.description, feeds.description)
        RETURNING *
      `).get(
        input.url,
        input.title,
        input.site_url ?? null,
        input.description ?? null,
        this.timestamp()
      ) as Feed
    );
  }

  getFeed(url: string): Feed | null {
    return this.guard('getFeed', () =>
      (this.db.prepare('SELECT * FROM feeds WHERE url = ?').get(url) as Feed | undefined) ?? null
    );
  }

  listFeeds(): Feed[] {
    return this.guard('listFeeds', () =>
      this.db.prepare('SELECT * FROM feeds ORDER BY title COLLATE NOCASE, url').all() as Feed[]
    );
  }

  /** Removes the feed and, through the foreign key, all of its articles. */
  removeFeed(url: string): boolean {
    return this.guard('removeFeed', () =>
      this.db.prepare('DELETE FROM feeds WHERE url = ?').run(url).changes > 0
    );
  }

  feedFingerprints(url: string): string[] {
    return this.guard('feedFingerprints', () => {
      const rows = this.db
        .prepare('SELECT fingerprint FROM articles WHERE feed_url = ?')
        .all(url) as { fingerprint: string }[];
      return rows.map(r => r.fingerprint);
    });
  }

  recordFetchSuccess(url: string, meta: { site_url?: string; description?: string } = {}): void {
    this.guard('recordFetchSuccess', () => {
      this.db.prepare(`
        UPDATE feeds
        SET last_fetched_at = ?, last_fetch_error = NULL,
            site_url = COALESCE(site_url, ?),
            description = COALESCE(description, ?)
        WHERE url = ?
      `).run(this.timestamp(), meta.site_url ?? null, meta.description ?? null, url);
    });
  }

  recordFetchFailure(url: string, message: string): void {
    this.guard('recordFetchFailure', () => {
      this.db
        .prepare('UPDATE feeds SET last_fetched_at = ?, last_fetch_error = ? WHERE url = ?')
        .run(this.timestamp(), message, url);
    });
  }

  // Article operations

  /**
   * Inserts a new article or refreshes the feed-owned fields of a live one.
   * A tombstoned fingerprint is left untouched and reported as `suppressed`;
   * only its sighting time is recorded, outside the article row.
   */
  upsertArticleIfNotTombstoned(candidate: ArticleCandidate): UpsertOutcome {
    const upsert = this.db.transaction((c: ArticleCandidate): UpsertOutcome => {
      const now = this.timestamp();
      const existing = this.db
        .prepare('SELECT is_deleted FROM articles WHERE fingerprint = ?')
        .get(c.fingerprint) as { is_deleted: number } | undefined;

      if (existing?.is_deleted) {
        this.db.prepare(`
          INSERT INTO tombstone_sightings (fingerprint, last_seen_at) VALUES (?, ?)
          ON CONFLICT(fingerprint) DO UPDATE SET last_seen_at = excluded.last_seen_at
        `).run(c.fingerprint, now);
        return 'suppressed';
      }

      if (existing) {
        this.db.prepare(`
          UPDATE articles
          SET title = ?,
              link = COALESCE(?, link),
              author = COALESCE(?, author),
              published_at = COALESCE(?, published_at),
              snippet = COALESCE(?, snippet),
              snippet_text = COALESCE(?, snippet_text),
              last_seen_at = ?
          WHERE fingerprint = ? AND is_deleted = 0
        `).run(
          c.title,
          c.link ?? null,
          c.author ?? null,
          c.publishedAt ?? null,
          c.snippet ?? null,
          c.snippetText ?? null,
          now,
          c.fingerprint
        );
        return 'updated';
      }

      this.db.prepare(`
        INSERT INTO articles (
          fingerprint, feed_url, guid, title, link, author, published_at,
          snippet, snippet_text, created_at, last_seen_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        c.fingerprint,
        c.feedUrl,
        c.guid ?? null,
        c.title,
        c.link ?? null,
        c.author ?? null,
        c.publishedAt ?? null,
        c.snippet ?? null,
        c.snippetText ?? null,
        now,
        now
      );
      return 'inserted';
    });

    return this.guard('upsertArticle', () => upsert(candidate));
  }

  /** Returns the article including tombstones; null when the row is gone. */
  getArticle(fingerprint: string): ArticleWithFeed | null {
    return this.guard('getArticle', () =>
      (this.db.prepare(`
        SELECT ${ARTICLE_COLUMNS}
        FROM articles a
        LEFT JOIN feeds f ON a.feed_url = f.url
        WHERE a.fingerprint = ?
      `).get(fingerprint) as ArticleWithFeed | undefined) ?? null
    );
  }

  /** Resolves a fingerprint prefix (at least 4 hex characters) among live articles. */
  resolveFingerprint(ref: string): string {
    const prefix = ref.trim().toLowerCase();
    if (!/^[0-9a-f]{4,}$/.test(prefix)) {
      throw new NotFoundError('article', ref);
    }

    const rows = this.guard('resolveFingerprint', () =>
      this.db
        .prepare('SELECT fingerprint FROM articles WHERE is_deleted = 0 AND fingerprint LIKE ? LIMIT 2')
        .all(`${prefix}%`) as { fingerprint: string }[]
    );

    const [first, second] = rows;
    if (!first) {
      throw new NotFoundError('article', ref);
    }
    if (second) {
      throw new AmbiguousReferenceError(ref, rows.length);
    }
    return first.fingerprint;
  }

  setReadState(fingerprint: string, state: ReadState): boolean {
    return this.guard('setReadState', () =>
      this.db
        .prepare('UPDATE articles SET is_read = ? WHERE fingerprint = ? AND is_deleted = 0')
        .run(state === 'read' ? 1 : 0, fingerprint).changes > 0
    );
  }

  setStarred(fingerprint: string, starred: boolean): boolean {
    return this.guard('setStarred', () =>
      this.db
        .prepare('UPDATE articles SET is_starred = ? WHERE fingerprint = ? AND is_deleted = 0')
        .run(starred ? 1 : 0, fingerprint).changes > 0
    );
  }

  setLastViewed(fingerprint: string): boolean {
    return this.guard('setLastViewed', () =>
      this.db
        .prepare('UPDATE articles SET last_viewed_at = ? WHERE fingerprint = ? AND is_deleted = 0')
        .run(this.timestamp(), fingerprint).changes > 0
    );
  }

  /**
   * Tombstones the article and clears every field a job writes. Calling it
   * again leaves the row as it is. Returns false only when the row is missing.
   */
  softDelete(fingerprint: string): boolean {
    return this.guard('softDelete', () =>
      this.db.prepare(`
        UPDATE articles
        SET is_deleted = 1,
            deleted_at = COALESCE(deleted_at, ?),
            content_text = NULL,
            summary = NULL,
            summary_state = 'absent',
            summary_error = NULL,
            summary_model = NULL,
            bookmark_id = NULL,
            bookmark_tags = NULL,
            bookmarked_at = NULL
        WHERE fingerprint = ?
      `).run(this.timestamp(), fingerprint).changes > 0
    );
  }

  // 以下写入都带 is_deleted = 0 条件：删除与任务结果竞争时删除优先

  setSummaryPending(fingerprint: string): boolean {
    return this.guard('setSummaryPending', () =>
      this.db.prepare(`
        UPDATE articles SET summary_state = 'pending', summary_error = NULL
        WHERE fingerprint = ? AND is_deleted = 0
      `).run(fingerprint).changes > 0
    );
  }

  /** Drops a pending mark left by a cancelled job, restoring the previous summary state. */
  clearSummaryPending(fingerprint: string): boolean {
    return this.guard('clearSummaryPending', () =>
      this.db.prepare(`
        UPDATE articles
        SET summary_state = CASE WHEN summary IS NULL THEN 'absent' ELSE 'ready' END
        WHERE fingerprint = ? AND is_deleted = 0 AND summary_state = 'pending'
      `).run(fingerprint).changes > 0
    );
  }

  /** Clears every pending mark; used when no job can still be running. */
  resetPendingSummaries(): number {
    return this.guard('resetPendingSummaries', () =>
      this.db.prepare(`
        UPDATE articles
        SET summary_state = CASE WHEN summary IS NULL THEN 'absent' ELSE 'ready' END
        WHERE summary_state = 'pending'
      `).run().changes
    );
  }

  setSummary(fingerprint: string, write: SummaryWrite): boolean {
    return this.guard('setSummary', () => {
      if (write.ok) {
        return this.db.prepare(`
          UPDATE articles
          SET summary = ?, summary_model = ?, summary_state = 'ready', summary_error = NULL
          WHERE fingerprint = ? AND is_deleted = 0
        `).run(write.text, write.model, fingerprint).changes > 0;
      }
      return this.db.prepare(`
        UPDATE articles SET summary_state = 'failed', summary_error = ?
        WHERE fingerprint = ? AND is_deleted = 0
      `).run(write.error, fingerprint).changes > 0;
    });
  }

  setContent(fingerprint: string, text: string): boolean {
    return this.guard('setContent', () =>
      this.db
        .prepare('UPDATE articles SET content_text = ? WHERE fingerprint = ? AND is_deleted = 0')
        .run(text, fingerprint).changes > 0
    );
  }

  /** Stores the external bookmark id; a bookmarked article also counts as read. */
  setBookmark(fingerprint: string, bookmarkId: string, tags: string[]): boolean {
    return this.guard('setBookmark', () =>
      this.db.prepare(`
        UPDATE articles
        SET bookmark_id = ?, bookmark_tags = ?, bookmarked_at = ?, is_read = 1
        WHERE fingerprint = ? AND is_deleted = 0
      `).run(bookmarkId, tags.join(','), this.timestamp(), fingerprint).changes > 0
    );
  }

  /**
   * Physically removes articles last sighted before `now - horizonDays`.
   * Live starred articles are kept; tombstones go regardless of their star.
   */
  purgeExpired(now: Date, horizonDays: number): number {
    const cutoff = new Date(now.getTime() - horizonDays * DAY_MS).toISOString();
    return this.guard('purgeExpired', () =>
      this.db.prepare(`
        DELETE FROM articles
        WHERE (is_starred = 0 OR is_deleted = 1)
          AND last_seen_at < @cutoff
          AND NOT EXISTS (
            SELECT 1 FROM tombstone_sightings s
            WHERE s.fingerprint = articles.fingerprint AND s.last_seen_at >= @cutoff
          )
      `).run({ cutoff }).changes
    );
  }

  /**
   * Live articles matching the filter, newest first by default. The result is
   * lazy and can be iterated again; each pass re-runs the query. Do not write
   * to the store while a pass is in progress.
   */
  listArticles(filter: ArticleFilter, options: ListOptions = {}): Iterable<ArticleWithFeed> {
    const conditions = ['a.is_deleted = 0'];
    const params: (string | number)[] = [];

    if (filter === 'unread') {
      conditions.push('a.is_read = 0');
    } else if (filter === 'starred') {
      conditions.push('a.is_starred = 1');
    }

    if (options.feedUrl) {
      conditions.push('a.feed_url = ?');
      params.push(options.feedUrl);
    }

    const direction = options.sort === 'published-asc' ? 'ASC' : 'DESC';
    let sql = `
      SELECT ${ARTICLE_COLUMNS}
      FROM articles a
      LEFT JOIN feeds f ON a.feed_url = f.url
      WHERE ${conditions.join(' AND ')}
      ORDER BY a.published_at IS NULL, a.published_at ${direction}, a.created_at ${direction}, a.rowid ${direction}
    `;
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    const db = this.db;
    return {
      [Symbol.iterator]: () =>
        this.guard('listArticles', () => db.prepare(sql).iterate(...params) as IterableIterator<ArticleWithFeed>),
    };
  }

  stats(): StoreStats {
    return this.guard('stats', () => {
      const articles = this.db.prepare(`
        SELECT
          COALESCE(SUM(CASE WHEN is_deleted = 0 THEN 1 ELSE 0 END), 0) AS articles,
          COALESCE(SUM(CASE WHEN is_deleted = 0 AND is_read = 0 THEN 1 ELSE 0 END), 0) AS unread,
          COALESCE(SUM(CASE WHEN is_deleted = 0 AND is_starred = 1 THEN 1 ELSE 0 END), 0) AS starred,
          COALESCE(SUM(CASE WHEN is_deleted = 1 THEN 1 ELSE 0 END), 0) AS deleted,
          COALESCE(SUM(CASE WHEN is_deleted = 0 AND summary_state = 'ready' THEN 1 ELSE 0 END), 0) AS summarized,
          COALESCE(SUM(CASE WHEN is_deleted = 0 AND bookmark_id IS NOT NULL THEN 1 ELSE 0 END), 0) AS bookmarked
        FROM articles
      `).get() as Omit<StoreStats, 'feeds' | 'failingFeeds'>;

      const feeds = this.db.prepare(`
        SELECT COUNT(*) AS feeds,
               COALESCE(SUM(CASE WHEN last_fetch_error IS NOT NULL THEN 1 ELSE 0 END), 0) AS failingFeeds
        FROM feeds
      `).get() as Pick<StoreStats, 'feeds' | 'failingFeeds'>;

      return { ...feeds, ...articles };
    });
  }
}

export function isLive(article: Article | null): article is Article {
  return article !== null && article.is_deleted === 0;
}
