/**
 * Error taxonomy for an ingestion run.
 *
 * Only `AuthError` and `NotFoundError` (folder resolution) abort a run; every
 * other error is recorded against the message that raised it.
 */

export class IngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Token acquisition or refresh failed. */
export class AuthError extends IngestError {}

/** A configured remote object (folder, message) does not exist. */
export class NotFoundError extends IngestError {}

/** Non-retried HTTP failure from the Graph API. */
export class GraphHttpError extends IngestError {
  readonly status: number;
  /** Parsed `Retry-After` in ms, when the response carried one. */
  readonly retryAfterMs: number | null;

  constructor(status: number, message: string, retryAfterMs: number | null = null) {
    super(message);
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

/** Network failure or 5xx that outlived the retry budget. */
export class TransientNetworkError extends IngestError {}

/** Unparseable HTML body or attachment payload. */
export class MalformedContentError extends IngestError {}

/** Record store write failure. */
export class PersistenceError extends IngestError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Errors that end the whole run rather than a single message. */
export function isRunFatal(err: unknown): boolean {
  return err instanceof AuthError || err instanceof NotFoundError;
}
