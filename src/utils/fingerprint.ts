import { createHash } from 'crypto';
import type { CandidateItem } from '../models/article.js';

export type FingerprintFn = (feedUrl: string, item: CandidateItem) => string;

export const FINGERPRINT_LENGTH = 40;

function identityKey(item: CandidateItem): string {
  const guid = item.guid?.trim();
  if (guid) return `guid:${guid}`;

  const link = item.link?.trim();
  if (link) return `link:${link}`;

  // 无 GUID 和链接时退化为标题+发布时间；源站改标题会产生新的身份
  return `title:${item.title.trim()}|${item.publishedAt ?? ''}`;
}

/**
 * Stable identity of a feed item. The feed URL is part of the hash, so the
 * same GUID published by two feeds yields two articles.
 */
export const fingerprintArticle: FingerprintFn = (feedUrl, item) =>
  createHash('sha256')
    .update(`${feedUrl}\n${identityKey(item)}`)
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);

export function canonicalFeedUrl(raw: string): string {
  const url = new URL(raw.trim());
  url.hash = '';
  return url.toString();
}
