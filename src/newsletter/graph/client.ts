/**
 * Microsoft Graph mail client.
 *
 * Thin layer over `fetch` exposing the four calls the pipeline needs: list
 * folders, list messages in a folder, get a message with its headers, and get
 * attachment bytes.
 *
 * Every call acquires a rate-limiter slot and a bearer token first. Network
 * failures and 5xx responses are retried with exponential backoff; other 4xx
 * responses propagate at once; 429 backs off the shared limiter for the
 * server's Retry-After and gets exactly one more attempt.
 */

import {
  AuthError,
  GraphHttpError,
  IngestError,
  MalformedContentError,
  TransientNetworkError,
  errorMessage,
} from "../core/errors.js";
import { isNetworkError, type RetryOptions, withRetry } from "../core/retry.js";
import type { Logger, RateLimiter } from "../core/types.js";
import {
  type AttachmentStub,
  decodeBase64,
  isObject,
  parsePage,
  toAttachmentStub,
  toMailFolder,
  toMessageSummary,
  toRawMessage,
} from "./schema.js";
import type {
  AccessTokenSource,
  Attachment,
  FetchLike,
  FolderSource,
  GraphConfig,
  MailFolder,
  MailSource,
  MessageSummary,
  RawMessage,
} from "./types.js";

const MESSAGE_PAGE_SIZE = 50;
const FOLDER_PAGE_SIZE = 100;
const DEFAULT_RETRY_AFTER_MS = 5_000;

const SUMMARY_FIELDS = "id,subject,from,receivedDateTime,hasAttachments";
const DETAIL_FIELDS =
  "id,subject,from,receivedDateTime,body,hasAttachments,internetMessageHeaders";

export interface MailClientOptions {
  config: GraphConfig;
  tokens: AccessTokenSource;
  rateLimiter: RateLimiter;
  logger: Logger;
  fetch?: FetchLike;
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | null {
  if (value === null || value.trim() === "") return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, Math.round(seconds * 1000));
  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

function isRetryableGraphError(err: unknown): boolean {
  if (err instanceof GraphHttpError) return err.status >= 500;
  if (err instanceof IngestError) return false;
  return isNetworkError(err);
}

const enc = encodeURIComponent;

export class MailClient implements MailSource, FolderSource {
  private readonly config: GraphConfig;
  private readonly tokens: AccessTokenSource;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly fetchFn: FetchLike;
  private readonly retry: MailClientOptions["retry"];

  constructor(opts: MailClientOptions) {
    this.config = opts.config;
    this.tokens = opts.tokens;
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.retry = opts.retry;
  }

  // ── Folders ──

  async listFolders(parentId: string | null): Promise<MailFolder[]> {
    const path = parentId
      ? `mailFolders/${enc(parentId)}/childFolders`
      : "mailFolders";
    const folders: MailFolder[] = [];
    let url: string | null = this.url(path, { $top: String(FOLDER_PAGE_SIZE) });

    while (url) {
      const page = parsePage(await this.getJson(url));
      for (const item of page.items) {
        const folder = toMailFolder(item);
        if (folder) folders.push(folder);
      }
      url = this.nextLink(page.nextLink);
    }
    return folders;
  }

  // ── Messages ──

  /**
   * Most-recent-first summaries of a folder. Pages are fetched lazily, so a
   * caller that stops early never requests the rest; each call starts over.
   */
  async *listMessages(
    folderId: string,
    maxCount: number,
  ): AsyncGenerator<MessageSummary> {
    if (maxCount <= 0) return;

    let yielded = 0;
    let url: string | null = this.url(`mailFolders/${enc(folderId)}/messages`, {
      $top: String(Math.min(maxCount, MESSAGE_PAGE_SIZE)),
      $orderby: "receivedDateTime desc",
      $select: SUMMARY_FIELDS,
    });

    while (url) {
      const page = parsePage(await this.getJson(url));
      for (const item of page.items) {
        const summary = toMessageSummary(item);
        if (!summary) continue;
        yield summary;
        yielded++;
        if (yielded >= maxCount) return;
      }
      url = this.nextLink(page.nextLink);
    }
  }

  async fetchDetail(messageId: string): Promise<RawMessage> {
    const detail = await this.getJson(
      this.url(`messages/${enc(messageId)}`, { $select: DETAIL_FIELDS }),
    );
    if (!isObject(detail)) {
      throw new MalformedContentError(`Message ${messageId} detail is not an object`);
    }

    // Graph reports hasAttachments=false for messages whose only
    // attachments are inline, so a cid: reference also triggers the fetch
    const body = isObject(detail.body) ? detail.body.content : undefined;
    const referencesCid = typeof body === "string" && /cid:/i.test(body);
    const attachments =
      detail.hasAttachments === true || referencesCid
        ? await this.fetchAttachments(messageId)
        : [];

    return toRawMessage(detail, attachments);
  }

  async fetchAttachments(messageId: string): Promise<Attachment[]> {
    const stubs: AttachmentStub[] = [];
    let url: string | null = this.url(`messages/${enc(messageId)}/attachments`);
    while (url) {
      const page = parsePage(await this.getJson(url));
      for (const item of page.items) {
        const stub = toAttachmentStub(item);
        if (stub) stubs.push(stub);
      }
      url = this.nextLink(page.nextLink);
    }

    const attachments: Attachment[] = [];
    for (const stub of stubs) {
      const bytes = stub.contentBytes
        ? decodeBase64(stub.contentBytes, stub.name || stub.attachmentId)
        : await this.fetchAttachmentBytes(messageId, stub.attachmentId);
      attachments.push({
        attachmentId: stub.attachmentId,
        name: stub.name,
        contentId: stub.contentId,
        contentType: stub.contentType,
        bytes,
        size: bytes.length,
        isInline: stub.isInline,
      });
    }
    return attachments;
  }

  /** Raw bytes for attachments too large to be inlined in the listing. */
  async fetchAttachmentBytes(
    messageId: string,
    attachmentId: string,
  ): Promise<Buffer> {
    const url = this.url(
      `messages/${enc(messageId)}/attachments/${enc(attachmentId)}/$value`,
    );
    return this.send(url, async (res) => Buffer.from(await res.arrayBuffer()));
  }

  // ── Request plumbing ──

  private url(path: string, query: Record<string, string> = {}): string {
    const base = `${this.config.baseUrl}/${this.config.mailbox}/${path}`;
    const qs = Object.entries(query)
      .map(([k, v]) => `${k}=${enc(v)}`)
      .join("&");
    return qs ? `${base}?${qs}` : base;
  }

  /** Only follow continuation links that stay on the configured API host. */
  private nextLink(link: string | null): string | null {
    if (link === null) return null;
    if (!link.startsWith(`${this.config.baseUrl}/`)) {
      this.logger.warn("Ignoring @odata.nextLink outside the Graph base URL", {
        link,
      });
      return null;
    }
    return link;
  }

  private getJson(url: string): Promise<unknown> {
    return this.send(url, async (res) => {
      try {
        return await res.json();
      } catch (err) {
        throw new MalformedContentError(`Graph returned invalid JSON for ${url}`, {
          cause: err,
        });
      }
    });
  }

  private async send<T>(
    url: string,
    read: (res: Response) => Promise<T>,
  ): Promise<T> {
    await this.rateLimiter.acquire();
    // once per request, outside the retry loop
    const { token } = await this.tokens.acquire();
    try {
      return await withRetry(() => this.attempt(url, token, read), {
        ...this.retry,
        retryOn: isRetryableGraphError,
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn(`Retrying Graph request (attempt ${attempt})`, {
            error: errorMessage(err),
            delayMs,
          }),
      });
    } catch (err) {
      if (!(err instanceof GraphHttpError) || err.status !== 429) {
        throw this.classify(err);
      }
      const waitMs = err.retryAfterMs ?? DEFAULT_RETRY_AFTER_MS;
      this.logger.warn("Rate limited by Graph, retrying once", { waitMs });
      this.rateLimiter.backoff(waitMs);
      await this.rateLimiter.acquire();
      try {
        return await this.attempt(url, token, read);
      } catch (retryErr) {
        throw this.classify(retryErr);
      }
    }
  }

  private async attempt<T>(
    url: string,
    token: string,
    read: (res: Response) => Promise<T>,
  ): Promise<T> {
    const res = await this.fetchFn(url, {
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
      },
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new GraphHttpError(
        res.status,
        `Graph API error ${res.status}: ${text.slice(0, 300)}`,
        parseRetryAfter(res.headers.get("retry-after")),
      );
    }
    return read(res);
  }

  /** Map a final failure onto the run's error taxonomy. */
  private classify(err: unknown): unknown {
    if (err instanceof GraphHttpError) {
      if (err.status === 401) {
        return new AuthError("Graph rejected the access token (401)", { cause: err });
      }
      if (err.status === 429 || err.status >= 500) {
        return new TransientNetworkError(err.message, { cause: err });
      }
      return err;
    }
    if (err instanceof IngestError) return err;
    if (isNetworkError(err)) {
      return new TransientNetworkError(`Graph request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return err;
  }
}
