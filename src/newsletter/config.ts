import type { AuthConfig, FolderSpec, GraphConfig } from "./graph/types.js";
import type { RedirectorRule } from "./pipeline/types.js";

export interface IngestConfig {
  auth: AuthConfig;
  graph: GraphConfig;
  folder: FolderSpec;
  maxMessages: number;
  allowedDomains: string[];
  redirectors: RedirectorRule[];
  tokenCachePath: string;
  databasePath: string;
  imageDir: string;
  imageUrlPrefix: string;
  maxImageBytes: number;
  stateDir: string;
}

const DEFAULT_SCOPES = "https://graph.microsoft.com/Mail.Read offline_access";
const DEFAULT_REDIRECTORS = "safelinks.protection.outlook.com=url";

type Env = Record<string, string | undefined>;

function list(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

/** Parse `host=param,host2=param2`; a bare host defaults to the `url` param. */
export function parseRedirectors(value: string): RedirectorRule[] {
  return list(value).map((entry) => {
    const [host = "", param = "url"] = entry.split("=", 2).map((s) => s.trim());
    return { hostSuffix: host.toLowerCase(), param: param || "url" };
  });
}

export function loadConfig(env: Env = process.env): IngestConfig {
  const missing: string[] = [];
  const clientId = env.GRAPH_CLIENT_ID?.trim() ?? "";
  if (!clientId) missing.push("GRAPH_CLIENT_ID");
  const allowedDomains = list(env.NEWSLETTER_ALLOWED_DOMAINS).map((d) =>
    d.replace(/^@/, "").toLowerCase(),
  );
  if (allowedDomains.length === 0) missing.push("NEWSLETTER_ALLOWED_DOMAINS");

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`,
    );
  }

  const user = env.NEWSLETTER_USER?.trim();
  const folderId = env.NEWSLETTER_FOLDER_ID?.trim();
  const folderPath = env.NEWSLETTER_FOLDER?.trim();

  return {
    auth: {
      clientId,
      tenantId: env.GRAPH_TENANT_ID?.trim() || "organizations",
      authorityHost:
        env.GRAPH_AUTHORITY_HOST?.trim() || "https://login.microsoftonline.com",
      scopes: (env.GRAPH_SCOPES?.trim() || DEFAULT_SCOPES).split(/\s+/),
      account: user ? user.toLowerCase() : "me",
      deviceCodeTimeoutMs: positiveInt(env, "DEVICE_CODE_TIMEOUT_MS", 900_000),
    },
    graph: {
      baseUrl: (env.GRAPH_BASE_URL?.trim() || "https://graph.microsoft.com/v1.0").replace(/\/+$/, ""),
      mailbox: user ? `users/${encodeURIComponent(user)}` : "me",
      requestTimeoutMs: positiveInt(env, "GRAPH_REQUEST_TIMEOUT_MS", 30_000),
    },
    folder: folderId ? { id: folderId } : { path: folderPath || "Inbox" },
    maxMessages: positiveInt(env, "MAX_NEWSLETTERS", 10),
    allowedDomains,
    redirectors: parseRedirectors(env.LINK_REDIRECTORS ?? DEFAULT_REDIRECTORS),
    tokenCachePath: env.TOKEN_CACHE_PATH?.trim() || "./data/token-cache.json",
    databasePath: env.NEWSLETTER_DB_PATH?.trim() || "./data/newsletters.db",
    imageDir: env.NEWSLETTER_IMAGE_DIR?.trim() || "./data/newsletters",
    imageUrlPrefix: (
      env.NEWSLETTER_IMAGE_URL_PREFIX?.trim() || "/static/newsletters"
    ).replace(/\/+$/, ""),
    maxImageBytes: positiveInt(env, "NEWSLETTER_MAX_IMAGE_MB", 10) * 1024 * 1024,
    stateDir: env.NEWSLETTER_STATE_DIR?.trim() || "./data",
  };
}
