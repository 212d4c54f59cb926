/** Core type definitions for newsletter-ingest. */

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
}

// ─── Output Writer ───

export interface OutputWriter {
  writeDocument(
    relativePath: string,
    frontmatter: Record<string, unknown>,
    body: string,
  ): Promise<void>;
  writeBinary(relativePath: string, data: Buffer): Promise<void>;
  remove(relativePath: string): Promise<void>;
}

// ─── Run Summary ───

export type MessageState =
  | "fetched"
  | "validated"
  | "links-unwrapped"
  | "images-resolved"
  | "sanitized"
  | "persisted"
  | "rejected"
  | "errored"
  | "skipped";

export interface MessageOutcome {
  messageId: string;
  subject: string;
  state: MessageState;
  /** Human-readable reason for rejected/errored/skipped outcomes. */
  reason?: string;
}

export interface RunSummary {
  folder: string | null;
  fetched: number;
  skipped: number;
  rejected: number;
  persisted: number;
  errors: number;
  aborted: boolean;
  abortReason?: string;
  outcomes: MessageOutcome[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface RunOptions {
  /** Re-ingest messages that already have a record. */
  force?: boolean;
}

// ─── Persisted Run State ───

export interface PersistedState {
  lastRunAt: string | null;
  lastSummary: RunSummary | null;
}

// ─── Engine ───

/** One complete ingestion run; implemented by the pipeline coordinator. */
export interface IngestRunner {
  run(options?: RunOptions): Promise<RunSummary>;
}
