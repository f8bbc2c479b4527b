export class FeedstashError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedstashError';
  }
}

/** Storage or network failure; the caller may retry the same operation. */
export class TransientIOError extends FeedstashError {
  readonly retryable = true;

  constructor(operation: string, cause: unknown) {
    super(
      `${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'TRANSIENT_IO',
      { cause }
    );
    this.name = 'TransientIOError';
  }
}

export type CollaboratorName = 'feed' | 'extractor' | 'summarizer' | 'bookmarker';

export type CollaboratorErrorKind =
  | 'network'
  | 'http-status'
  | 'parse'
  | 'auth'
  | 'rate-limit'
  | 'invalid-response'
  | 'not-configured'
  | 'extraction';

/** An external collaborator call failed; surfaced to the user, retried only on request. */
export class CollaboratorError extends FeedstashError {
  readonly retryable = true;

  constructor(
    public readonly collaborator: CollaboratorName,
    public readonly kind: CollaboratorErrorKind,
    message: string,
    public readonly subject?: string
  ) {
    super(
      subject ? `${collaborator} (${kind}) for ${subject}: ${message}` : `${collaborator} (${kind}): ${message}`,
      'COLLABORATOR_FAILED'
    );
    this.name = 'CollaboratorError';
  }
}

export class NotFoundError extends FeedstashError {
  constructor(entity: 'article' | 'feed', ref: string) {
    super(`No ${entity} matches "${ref}".`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class AmbiguousReferenceError extends FeedstashError {
  constructor(ref: string, matches: number) {
    super(`"${ref}" matches ${matches} articles; use a longer prefix.`, 'AMBIGUOUS_REFERENCE');
    this.name = 'AmbiguousReferenceError';
  }
}

/** A job result arrived after its article was deleted or its job cancelled. Logged, never thrown. */
export class RaceDiscardedError extends FeedstashError {
  constructor(fingerprint: string, kind: string, reason: 'deleted' | 'cancelled') {
    super(`Discarded ${kind} result for ${fingerprint}: article ${reason === 'deleted' ? 'was deleted' : 'job was cancelled'}.`, 'RACE_DISCARDED');
    this.name = 'RaceDiscardedError';
  }
}

export class ConfigError extends FeedstashError {
  constructor(key: string, envKey?: string) {
    super(
      envKey
        ? `${key} is not configured. Set ${envKey} or run: feedstash config set ${key} <value>`
        : `${key} is not configured. Run: feedstash config set ${key} <value>`,
      'CONFIG_MISSING'
    );
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
