/**
 * SQLite record store for ingested newsletters.
 *
 * One row per message id (UNIQUE), plus one row per stored inline image.
 * The dashboard reads these tables; only the ingestion pipeline writes them.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import { PersistenceError, errorMessage } from "../core/errors.js";
import type { AuthResults, AuthVerdict } from "../pipeline/types.js";
import type {
  IngestedNewsletter,
  NewsletterInput,
  NewsletterRepository,
  NewsletterStatus,
  StoredImage,
} from "./types.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS newsletters (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  message_id       TEXT NOT NULL UNIQUE,
  subject          TEXT NOT NULL,
  sender_name      TEXT NOT NULL,
  sender_email     TEXT NOT NULL,
  received_at      TEXT NOT NULL,
  sanitized_html   TEXT NOT NULL,
  hero_image_path  TEXT,
  status           TEXT NOT NULL CHECK (status IN ('published', 'draft-rejected')),
  rejection_reason TEXT,
  auth_results     TEXT,
  ingested_at      TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_newsletters_received ON newsletters (received_at DESC);

CREATE TABLE IF NOT EXISTS newsletter_images (
  file_name    TEXT PRIMARY KEY,
  message_id   TEXT NOT NULL,
  path         TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  content_type TEXT NOT NULL,
  size         INTEGER NOT NULL,
  created_at   TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_newsletter_images_message ON newsletter_images (message_id);
`;

interface NewsletterRow {
  id: number;
  message_id: string;
  subject: string;
  sender_name: string;
  sender_email: string;
  received_at: string;
  sanitized_html: string;
  hero_image_path: string | null;
  status: string;
  rejection_reason: string | null;
  auth_results: string | null;
  ingested_at: string;
}

interface ImageRow {
  file_name: string;
  message_id: string;
  path: string;
  content_hash: string;
  content_type: string;
  size: number;
}

interface NewsletterParams {
  messageId: string;
  subject: string;
  senderName: string;
  senderAddress: string;
  receivedAt: string;
  sanitizedHtml: string;
  heroImagePath: string | null;
  status: NewsletterStatus;
  rejectionReason: string | null;
  authResults: string | null;
  ingestedAt: string;
}

interface ImageParams {
  fileName: string;
  messageId: string;
  path: string;
  contentHash: string;
  contentType: string;
  size: number;
  createdAt: string;
}

function toStatus(value: string): NewsletterStatus {
  return value === "draft-rejected" ? value : "published";
}

function isVerdict(value: unknown): value is AuthVerdict {
  return (
    value === "pass" ||
    value === "fail" ||
    value === "softfail" ||
    value === "neutral" ||
    value === "none" ||
    value === "unknown"
  );
}

function parseAuthResults(json: string | null): AuthResults | null {
  if (json === null) return null;
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  if (value == null || typeof value !== "object") return null;
  if (!("spf" in value) || !("dkim" in value) || !("dmarc" in value) || !("overall" in value)) {
    return null;
  }
  const { spf, dkim, dmarc, overall } = value;
  if (!isVerdict(spf) || !isVerdict(dkim) || !isVerdict(dmarc)) return null;
  if (overall !== "pass" && overall !== "partial" && overall !== "unknown") return null;
  return { spf, dkim, dmarc, overall };
}

function toImage(row: ImageRow): StoredImage {
  return {
    fileName: row.file_name,
    path: row.path,
    messageId: row.message_id,
    contentHash: row.content_hash,
    contentType: row.content_type,
    size: row.size,
  };
}

export interface SqliteNewsletterStoreOptions {
  now?: () => number;
}

export class SqliteNewsletterStore implements NewsletterRepository {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(dbPath: string, opts: SqliteNewsletterStoreOptions = {}) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    this.now = opts.now ?? Date.now;
  }

  has(messageId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>(
        "SELECT 1 AS found FROM newsletters WHERE message_id = ?",
      )
      .get(messageId);
    return row !== undefined;
  }

  get(messageId: string): IngestedNewsletter | null {
    const row = this.db
      .prepare<[string], NewsletterRow>("SELECT * FROM newsletters WHERE message_id = ?")
      .get(messageId);
    return row ? this.toRecord(row) : null;
  }

  listRecent(limit: number): IngestedNewsletter[] {
    return this.db
      .prepare<[number], NewsletterRow>(
        "SELECT * FROM newsletters ORDER BY received_at DESC, id DESC LIMIT ?",
      )
      .all(Math.max(0, Math.floor(limit)))
      .map((row) => this.toRecord(row));
  }

  count(): number {
    const row = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM newsletters")
      .get();
    return row?.n ?? 0;
  }

  imagesFor(messageId: string): StoredImage[] {
    return this.db
      .prepare<[string], ImageRow>(
        "SELECT * FROM newsletter_images WHERE message_id = ? ORDER BY rowid",
      )
      .all(messageId)
      .map(toImage);
  }

  insert(input: NewsletterInput): IngestedNewsletter {
    try {
      return this.db.transaction(() => this.insertRows(input))();
    } catch (err) {
      throw new PersistenceError(
        `Failed to store newsletter ${input.messageId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  replace(input: NewsletterInput): { record: IngestedNewsletter; superseded: string[] } {
    try {
      return this.db.transaction(() => {
        const previous = this.imagesFor(input.messageId).map((i) => i.fileName);
        this.db
          .prepare<[string]>("DELETE FROM newsletter_images WHERE message_id = ?")
          .run(input.messageId);
        this.db
          .prepare<[string]>("DELETE FROM newsletters WHERE message_id = ?")
          .run(input.messageId);
        const record = this.insertRows(input);
        const kept = new Set(record.imageFiles);
        return { record, superseded: previous.filter((f) => !kept.has(f)) };
      })();
    } catch (err) {
      throw new PersistenceError(
        `Failed to replace newsletter ${input.messageId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  close(): void {
    this.db.close();
  }

  private insertRows(input: NewsletterInput): IngestedNewsletter {
    const ingestedAt = new Date(this.now()).toISOString();
    const info = this.db
      .prepare<NewsletterParams>(
        `INSERT INTO newsletters (
           message_id, subject, sender_name, sender_email, received_at,
           sanitized_html, hero_image_path, status, rejection_reason,
           auth_results, ingested_at
         ) VALUES (
           @messageId, @subject, @senderName, @senderAddress, @receivedAt,
           @sanitizedHtml, @heroImagePath, @status, @rejectionReason,
           @authResults, @ingestedAt
         )`,
      )
      .run({
        messageId: input.messageId,
        subject: input.subject,
        senderName: input.senderName,
        senderAddress: input.senderAddress,
        receivedAt: input.receivedAt,
        sanitizedHtml: input.sanitizedHtml,
        heroImagePath: input.heroImagePath,
        status: input.status,
        rejectionReason: input.rejectionReason,
        authResults: input.authResults ? JSON.stringify(input.authResults) : null,
        ingestedAt,
      });

    const insertImage = this.db.prepare<ImageParams>(
      `INSERT INTO newsletter_images (
         file_name, message_id, path, content_hash, content_type, size, created_at
       ) VALUES (
         @fileName, @messageId, @path, @contentHash, @contentType, @size, @createdAt
       )`,
    );
    for (const image of input.images) {
      insertImage.run({
        fileName: image.fileName,
        messageId: input.messageId,
        path: image.path,
        contentHash: image.contentHash,
        contentType: image.contentType,
        size: image.size,
        createdAt: ingestedAt,
      });
    }

    return {
      id: Number(info.lastInsertRowid),
      messageId: input.messageId,
      subject: input.subject,
      senderName: input.senderName,
      senderAddress: input.senderAddress,
      receivedAt: input.receivedAt,
      sanitizedHtml: input.sanitizedHtml,
      heroImagePath: input.heroImagePath,
      status: input.status,
      rejectionReason: input.rejectionReason,
      authResults: input.authResults,
      imageFiles: input.images.map((i) => i.fileName),
      ingestedAt,
    };
  }

  private toRecord(row: NewsletterRow): IngestedNewsletter {
    return {
      id: row.id,
      messageId: row.message_id,
      subject: row.subject,
      senderName: row.sender_name,
      senderAddress: row.sender_email,
      receivedAt: row.received_at,
      sanitizedHtml: row.sanitized_html,
      heroImagePath: row.hero_image_path,
      status: toStatus(row.status),
      rejectionReason: row.rejection_reason,
      authResults: parseAuthResults(row.auth_results),
      imageFiles: this.imagesFor(row.message_id).map((i) => i.fileName),
      ingestedAt: row.ingested_at,
    };
  }
}
