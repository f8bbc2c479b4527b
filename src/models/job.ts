import type { FeedstashError } from '../utils/errors.js';

export type JobKind = 'content-fetch' | 'summarize' | 'bookmark';
export type JobStatus = 'running' | 'cancelled';

export const JOB_KINDS: readonly JobKind[] = ['content-fetch', 'summarize', 'bookmark'];

export interface JobRecord {
  fingerprint: string;
  kind: JobKind;
  status: JobStatus;
  startedAt: number;
}

export interface JobOptions {
  /** Extra bookmark tags, on top of the configured defaults. */
  tags?: string[];
}

export type StartResult = 'ok' | 'already-running' | 'article-deleted';

export type JobOutcome =
  | { status: 'completed'; detail?: string }
  | { status: 'failed'; error: FeedstashError }
  | { status: 'discarded'; reason: 'deleted' | 'cancelled' }
  | { status: 'skipped'; detail: string };

export type JobSettledListener = (record: JobRecord, outcome: JobOutcome) => void;
