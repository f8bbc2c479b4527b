export const SCHEMA_VERSION = 2;

export const SCHEMA = `
-- 订阅源表
CREATE TABLE IF NOT EXISTS feeds (
  url TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  site_url TEXT,
  description TEXT,
  last_fetched_at TEXT,
  last_fetch_error TEXT,
  created_at TEXT NOT NULL
);

-- 文章表（deleted = 1 为墓碑，刷新时不会被重新插入）
CREATE TABLE IF NOT EXISTS articles (
  fingerprint TEXT PRIMARY KEY,
  feed_url TEXT NOT NULL,
  guid TEXT,
  title TEXT NOT NULL,
  link TEXT,
  author TEXT,
  published_at TEXT,
  snippet TEXT,
  snippet_text TEXT,
  content_text TEXT,
  summary TEXT,
  summary_state TEXT NOT NULL DEFAULT 'absent',  -- absent|pending|ready|failed
  summary_error TEXT,
  is_read INTEGER NOT NULL DEFAULT 0,
  is_starred INTEGER NOT NULL DEFAULT 0,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  bookmark_id TEXT,
  last_viewed_at TEXT,
  created_at TEXT NOT NULL,
  last_seen_at TEXT NOT NULL,
  FOREIGN KEY (feed_url) REFERENCES feeds(url) ON DELETE CASCADE
);

-- 墓碑文章在刷新中再次出现的时间（不修改文章行本身）
CREATE TABLE IF NOT EXISTS tombstone_sightings (
  fingerprint TEXT PRIMARY KEY,
  last_seen_at TEXT NOT NULL,
  FOREIGN KEY (fingerprint) REFERENCES articles(fingerprint) ON DELETE CASCADE
);

-- 全局配置表
CREATE TABLE IF NOT EXISTS config (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_articles_feed_url ON articles(feed_url);
CREATE INDEX IF NOT EXISTS idx_articles_published_at ON articles(published_at DESC);
CREATE INDEX IF NOT EXISTS idx_articles_is_read ON articles(is_read);
CREATE INDEX IF NOT EXISTS idx_articles_last_seen_at ON articles(last_seen_at);
`;
