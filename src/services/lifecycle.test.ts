import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AUTO_READ_DWELL_MS, LifecycleEngine } from './lifecycle.js';
import type { ArticleStore } from './store.js';
import { candidate, createTestStore } from '../testing/fakes.js';

describe('LifecycleEngine', () => {
  let store: ArticleStore;
  let lifecycle: LifecycleEngine;
  let autoRead: string[];
  let cancelled: string[];

  beforeEach(() => {
    vi.useFakeTimers();
    ({ store } = createTestStore());
    store.upsertArticleIfNotTombstoned(candidate('aaaa0001'));
    store.upsertArticleIfNotTombstoned(candidate('bbbb0002'));
    autoRead = [];
    cancelled = [];
    lifecycle = new LifecycleEngine(store, {
      onAutoRead: fp => autoRead.push(fp),
      jobs: {
        cancelAll: fp => {
          cancelled.push(fp);
          return 1;
        },
      },
    });
  });

  afterEach(() => {
    lifecycle.dispose();
    vi.useRealTimers();
  });

  describe('explicit transitions', () => {
    it('marks read and unread', () => {
      expect(lifecycle.markRead('aaaa0001')).toBe('applied');
      expect(lifecycle.markRead('aaaa0001')).toBe('unchanged');
      expect(lifecycle.markUnread('aaaa0001')).toBe('applied');
      expect(store.getArticle('aaaa0001')?.is_read).toBe(0);
    });

    it('toggles the star in any read state', () => {
      lifecycle.markRead('aaaa0001');
      expect(lifecycle.toggleStarred('aaaa0001')).toBe('applied');
      expect(store.getArticle('aaaa0001')?.is_starred).toBe(1);
      expect(lifecycle.toggleStarred('aaaa0001')).toBe('applied');
      expect(store.getArticle('aaaa0001')?.is_starred).toBe(0);
    });

    it('treats deleted as absorbing', () => {
      expect(lifecycle.delete('aaaa0001')).toBe('applied');
      expect(lifecycle.markRead('aaaa0001')).toBe('deleted');
      expect(lifecycle.toggleStarred('aaaa0001')).toBe('deleted');
      expect(lifecycle.enterView('aaaa0001')).toBe('deleted');

      const article = store.getArticle('aaaa0001');
      expect(article?.is_deleted).toBe(1);
      expect(article?.is_read).toBe(0);
      expect(article?.is_starred).toBe(0);
    });

    it('cancels jobs on delete and is idempotent', () => {
      expect(lifecycle.delete('aaaa0001')).toBe('applied');
      expect(lifecycle.delete('aaaa0001')).toBe('unchanged');
      expect(cancelled).toEqual(['aaaa0001']);
    });

    it('treats unknown fingerprints as deleted', () => {
      expect(lifecycle.markRead('ffff9999')).toBe('deleted');
      expect(lifecycle.delete('ffff9999')).toBe('deleted');
    });
  });

  describe('auto-read dwell', () => {
    it('marks read exactly once after the full dwell', () => {
      expect(lifecycle.enterView('aaaa0001')).toBe('applied');
      expect(store.getArticle('aaaa0001')?.last_viewed_at).not.toBeNull();

      vi.advanceTimersByTime(AUTO_READ_DWELL_MS - 1);
      expect(store.getArticle('aaaa0001')?.is_read).toBe(0);

      vi.advanceTimersByTime(1);
      expect(store.getArticle('aaaa0001')?.is_read).toBe(1);
      expect(autoRead).toEqual(['aaaa0001']);

      vi.advanceTimersByTime(AUTO_READ_DWELL_MS * 3);
      expect(autoRead).toEqual(['aaaa0001']);
      expect(lifecycle.isInView('aaaa0001')).toBe(false);
    });

    it('does nothing when the view is left early', () => {
      lifecycle.enterView('aaaa0001');
      vi.advanceTimersByTime(AUTO_READ_DWELL_MS / 2);
      lifecycle.exitView('aaaa0001');
      lifecycle.enterView('bbbb0002');
      vi.advanceTimersByTime(AUTO_READ_DWELL_MS / 2);
      lifecycle.exitAllViews();

      vi.advanceTimersByTime(AUTO_READ_DWELL_MS * 2);
      expect(store.getArticle('aaaa0001')?.is_read).toBe(0);
      expect(store.getArticle('bbbb0002')?.is_read).toBe(0);
      expect(autoRead).toEqual([]);
    });

    it('keeps the original timer when the article is entered again', () => {
      lifecycle.enterView('aaaa0001');
      vi.advanceTimersByTime(1500);
      expect(lifecycle.enterView('aaaa0001')).toBe('unchanged');

      vi.advanceTimersByTime(500);
      expect(store.getArticle('aaaa0001')?.is_read).toBe(1);
    });

    it('leaves a deleted article deleted, not read', () => {
      lifecycle.enterView('aaaa0001');
      vi.advanceTimersByTime(1000);
      store.softDelete('aaaa0001');

      vi.advanceTimersByTime(AUTO_READ_DWELL_MS);
      const article = store.getArticle('aaaa0001');
      expect(article?.is_deleted).toBe(1);
      expect(article?.is_read).toBe(0);
      expect(autoRead).toEqual([]);
    });

    it('disarms the timer on delete', () => {
      lifecycle.enterView('aaaa0001');
      lifecycle.delete('aaaa0001');
      expect(lifecycle.isInView('aaaa0001')).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('does not notify when the article was already read', () => {
      lifecycle.markRead('aaaa0001');
      lifecycle.enterView('aaaa0001');
      vi.advanceTimersByTime(AUTO_READ_DWELL_MS);
      expect(autoRead).toEqual([]);
    });
  });
});
