/**
 * Narrowing of Graph API JSON (`unknown`) into connector types.
 *
 * Graph omits properties that were not `$select`ed and uses `null` for empty
 * values, so every accessor tolerates both. A message without an `id` is the
 * only hard failure.
 */

import { MalformedContentError } from "../core/errors.js";
import type {
  Attachment,
  MailFolder,
  MessageSummary,
  RawMessage,
} from "./types.js";

type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export function str(obj: JsonObject, key: string): string {
  const v = obj[key];
  return typeof v === "string" ? v : "";
}

function num(obj: JsonObject, key: string): number {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

function objects(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

// ─── Collections ───

export interface GraphPage {
  items: JsonObject[];
  nextLink: string | null;
}

export function parsePage(body: unknown): GraphPage {
  if (!isObject(body)) {
    throw new MalformedContentError("Graph collection response is not an object");
  }
  const next = body["@odata.nextLink"];
  return {
    items: objects(body.value),
    nextLink: typeof next === "string" ? next : null,
  };
}

// ─── Folders ───

export function toMailFolder(obj: JsonObject): MailFolder | null {
  const id = str(obj, "id");
  if (!id) return null;
  const parent = str(obj, "parentFolderId");
  return {
    id,
    displayName: str(obj, "displayName"),
    parentFolderId: parent || null,
    childFolderCount: num(obj, "childFolderCount"),
  };
}

// ─── Messages ───

function emailAddress(obj: JsonObject): { address: string; name: string } {
  const from = obj.from;
  if (!isObject(from) || !isObject(from.emailAddress)) {
    return { address: "", name: "" };
  }
  return {
    address: str(from.emailAddress, "address").trim(),
    name: str(from.emailAddress, "name").trim(),
  };
}

export function toMessageSummary(obj: JsonObject): MessageSummary | null {
  const messageId = str(obj, "id");
  if (!messageId) return null;
  return {
    messageId,
    subject: str(obj, "subject"),
    senderAddress: emailAddress(obj).address,
    receivedAt: str(obj, "receivedDateTime"),
    hasAttachments: obj.hasAttachments === true,
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Plain-text bodies become a `<div>` with one `<br>` per line break. */
export function textToHtml(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n").map(escapeHtml);
  return `<div>${lines.join("<br>")}</div>`;
}

function bodyHtml(obj: JsonObject): string {
  const body = obj.body;
  if (!isObject(body)) return "";
  const content = str(body, "content");
  return str(body, "contentType").toLowerCase() === "text"
    ? textToHtml(content)
    : content;
}

function authenticationResults(obj: JsonObject): string[] {
  return objects(obj.internetMessageHeaders)
    .filter((h) => str(h, "name").toLowerCase() === "authentication-results")
    .map((h) => str(h, "value"))
    .filter((v) => v.length > 0);
}

export function toRawMessage(
  obj: JsonObject,
  attachments: Attachment[],
): RawMessage {
  const messageId = str(obj, "id");
  if (!messageId) {
    throw new MalformedContentError("Graph message detail has no id");
  }
  const sender = emailAddress(obj);
  return {
    messageId,
    subject: str(obj, "subject").trim(),
    senderAddress: sender.address,
    senderName: sender.name || sender.address,
    receivedAt: str(obj, "receivedDateTime"),
    rawHtmlBody: bodyHtml(obj),
    authenticationResults: authenticationResults(obj),
    attachments,
  };
}

// ─── Attachments ───

const FILE_ATTACHMENT = "#microsoft.graph.fileAttachment";

export interface AttachmentStub {
  attachmentId: string;
  name: string;
  contentId?: string;
  contentType: string;
  size: number;
  isInline: boolean;
  /** Base64 payload when Graph inlined it into the listing. */
  contentBytes: string | null;
}

/**
 * Only file attachments carry bytes; item and reference attachments are
 * dropped here.
 */
export function toAttachmentStub(obj: JsonObject): AttachmentStub | null {
  if (str(obj, "@odata.type") !== FILE_ATTACHMENT) return null;
  const attachmentId = str(obj, "id");
  if (!attachmentId) return null;
  const contentId = str(obj, "contentId").trim();
  const bytes = str(obj, "contentBytes");
  return {
    attachmentId,
    name: str(obj, "name"),
    contentId: contentId || undefined,
    contentType: str(obj, "contentType").toLowerCase() || "application/octet-stream",
    size: num(obj, "size"),
    isInline: obj.isInline === true,
    contentBytes: bytes || null,
  };
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64(data: string, label: string): Buffer {
  const compact = data.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new MalformedContentError(`Attachment ${label} is not valid base64`);
  }
  return Buffer.from(compact, "base64");
}
