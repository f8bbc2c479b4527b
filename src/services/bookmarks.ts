import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const RAINDROP_API_URL = 'https://api.raindrop.io/rest/v1';
const REQUEST_TIMEOUT_MS = 30000;

export type BookmarkErrorKind = 'auth' | 'rate-limit' | 'network' | 'invalid-response' | 'not-configured';

export interface BookmarkRequest {
  link: string;
  title: string;
  excerpt?: string;
  note: string;
  tags: string[];
}

export type BookmarkResult =
  | { ok: true; id: string }
  | { ok: false; kind: BookmarkErrorKind; message: string };

export interface Bookmarker {
  save(request: BookmarkRequest): Promise<BookmarkResult>;
}

interface CollectionsResponse {
  items?: { _id: number; title: string }[];
}

interface RaindropResponse {
  result?: boolean;
  item?: { _id?: number };
}

const log = logger.scope('raindrop');

function classifyStatus(status: number): BookmarkErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate-limit';
  return status >= 500 ? 'network' : 'invalid-response';
}

/**
 * Saves bookmarks to Raindrop.io. The target collection is looked up by title
 * once per instance; when it does not exist the bookmark lands in Unsorted.
 */
export class RaindropBookmarker implements Bookmarker {
  // undefined: 尚未查询；null: 查询过但不存在
  private collectionId: number | null | undefined;

  constructor(
    private readonly token: string | null,
    private readonly collectionTitle = 'News Links',
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  private async request(path: string, init: RequestInit = {}): Promise<Response> {
    return this.fetchFn(`${RAINDROP_API_URL}${path}`, {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.token ?? ''}`,
      },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  }

  private async resolveCollection(): Promise<number | null> {
    if (this.collectionId !== undefined) {
      return this.collectionId;
    }

    const response = await this.request('/collections');
    if (!response.ok) {
      // 不缓存失败结果，下次再查
      log.warn(`Failed to fetch collections (HTTP ${response.status}), saving to Unsorted`);
      return null;
    }

    const data = (await response.json()) as CollectionsResponse;
    const found = data.items?.find(c => c.title === this.collectionTitle);
    if (!found) {
      log.warn(`Collection "${this.collectionTitle}" not found, saving to Unsorted`);
    }
    this.collectionId = found?._id ?? null;
    return this.collectionId;
  }

  async save(request: BookmarkRequest): Promise<BookmarkResult> {
    if (!this.token) {
      return { ok: false, kind: 'not-configured', message: 'RAINDROP_TOKEN is not set' };
    }

    try {
      const collectionId = await this.resolveCollection();
      const response = await this.request('/raindrop', {
        method: 'POST',
        body: JSON.stringify({
          link: request.link,
          title: request.title,
          excerpt: request.excerpt,
          note: request.note,
          tags: request.tags,
          pleaseParse: {},
          ...(collectionId !== null ? { collection: { $id: collectionId } } : {}),
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        return { ok: false, kind: classifyStatus(response.status), message: `HTTP ${response.status}: ${errorText}` };
      }

      const data = (await response.json()) as RaindropResponse;
      const id = data.item?._id;
      if (id === undefined) {
        return { ok: false, kind: 'invalid-response', message: 'Response has no item id' };
      }
      return { ok: true, id: String(id) };
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { ok: false, kind: 'invalid-response', message: error.message };
      }
      return { ok: false, kind: 'network', message: errorMessage(error) };
    }
  }
}
