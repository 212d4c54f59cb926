/**
 * Microsoft Graph connector type definitions.
 *
 * These are the domain types the pipeline consumes, not the raw Graph JSON
 * (see `schema.ts` for the narrowing from `unknown`).
 */

// ─── Configuration ───

export interface AuthConfig {
  clientId: string;
  tenantId: string;
  authorityHost: string;
  scopes: string[];
  /** Cache key for the credential; the mailbox user, or "me". */
  account: string;
  deviceCodeTimeoutMs: number;
}

export interface GraphConfig {
  baseUrl: string;
  /** Path segment of the mailbox root: "me" or "users/{upn}". */
  mailbox: string;
  requestTimeoutMs: number;
}

/** Minimal fetch signature so tests can substitute an in-process stand-in. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// ─── Credentials ───

export interface Credential {
  accessToken: string;
  refreshToken: string;
  /** Unix-ms expiry of the access token. */
  expiresAt: number;
  account: string;
}

/** What leaves TokenProvider: the credential minus its refresh token. */
export interface AccessToken {
  token: string;
  expiresAt: number;
  account: string;
}

export interface DeviceCodePrompt {
  verificationUri: string;
  userCode: string;
  /** Server-provided instruction text. */
  message: string;
  expiresAt: number;
}

export interface TokenStatus {
  account: string;
  cached: boolean;
  expiresAt: number | null;
  expired: boolean;
  hasRefreshToken: boolean;
}

export interface AccessTokenSource {
  acquire(): Promise<AccessToken>;
}

// ─── Folders ───

export interface FolderSpec {
  /** Explicit folder id, used verbatim. */
  id?: string;
  /** Slash-separated path from the mailbox root, or a bare display name. */
  path?: string;
}

export interface FolderRef {
  folderId: string;
  displayPath: string;
}

export interface MailFolder {
  id: string;
  displayName: string;
  parentFolderId: string | null;
  childFolderCount: number;
}

export interface FolderNode extends MailFolder {
  children: FolderNode[];
}

export interface FolderSource {
  listFolders(parentId: string | null): Promise<MailFolder[]>;
}

// ─── Messages ───

export interface MessageSummary {
  messageId: string;
  subject: string;
  senderAddress: string;
  receivedAt: string;
  hasAttachments: boolean;
}

export interface Attachment {
  attachmentId: string;
  name: string;
  /** Content-ID header value for inline parts, as sent (may keep `<…>`). */
  contentId?: string;
  contentType: string;
  bytes: Buffer;
  size: number;
  isInline: boolean;
}

export interface RawMessage {
  messageId: string;
  subject: string;
  senderAddress: string;
  senderName: string;
  /** ISO-8601 UTC timestamp from Graph's receivedDateTime. */
  receivedAt: string;
  rawHtmlBody: string;
  /** Every Authentication-Results header value, in header order. */
  authenticationResults: string[];
  attachments: Attachment[];
}

export interface MailSource {
  listMessages(folderId: string, maxCount: number): AsyncGenerator<MessageSummary>;
  fetchDetail(messageId: string): Promise<RawMessage>;
}
