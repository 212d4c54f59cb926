/**
 * OAuth credential lifecycle for the Graph mailbox.
 *
 *   cache hit      → return the cached access token while it is still valid
 *   expired        → refresh-token grant, persisted before returning
 *   no/dead refresh→ device-code grant: the verification URL and user code go
 *                    out through `onDeviceCode`, then the token endpoint is
 *                    polled until the user finishes or the wait bound expires
 *
 * Acquisition is single-flight per account: a caller arriving while another
 * acquisition (including an interactive one) is running shares its promise.
 */

import { AuthError, errorMessage } from "../core/errors.js";
import { sleep as defaultSleep } from "../core/retry.js";
import type { Logger } from "../core/types.js";
import { isObject, str } from "./schema.js";
import type { TokenCacheStore } from "./token-cache.js";
import type {
  AccessToken,
  AccessTokenSource,
  AuthConfig,
  Credential,
  DeviceCodePrompt,
  FetchLike,
  TokenStatus,
} from "./types.js";

const DEVICE_CODE_GRANT = "urn:ietf:params:oauth:grant-type:device_code";
const DEFAULT_EXPIRY_SKEW_MS = 5 * 60_000;
const DEFAULT_POLL_INTERVAL_S = 5;
const SLOW_DOWN_STEP_S = 5;

export interface TokenProviderOptions {
  config: AuthConfig;
  cache: TokenCacheStore;
  logger: Logger;
  fetch?: FetchLike;
  /** Side channel for the interactive prompt; defaults to a logger warning. */
  onDeviceCode?: (prompt: DeviceCodePrompt) => void;
  /** When false, a missing or dead refresh token fails instead of prompting. */
  interactive?: boolean;
  /** Treat tokens expiring within this window as already expired. */
  expirySkewMs?: number;
  requestTimeoutMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface TokenEndpointResult {
  status: number;
  body: Record<string, unknown>;
}

export class TokenProvider implements AccessTokenSource {
  private readonly config: AuthConfig;
  private readonly cache: TokenCacheStore;
  private readonly logger: Logger;
  private readonly fetchFn: FetchLike;
  private readonly onDeviceCode: (prompt: DeviceCodePrompt) => void;
  private readonly interactive: boolean;
  private readonly expirySkewMs: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly inflight = new Map<string, Promise<AccessToken>>();

  constructor(opts: TokenProviderOptions) {
    this.config = opts.config;
    this.cache = opts.cache;
    this.logger = opts.logger;
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.onDeviceCode =
      opts.onDeviceCode ??
      ((prompt) => this.logger.warn(prompt.message, { userCode: prompt.userCode }));
    this.interactive = opts.interactive ?? true;
    this.expirySkewMs = opts.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 30_000;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  acquire(): Promise<AccessToken> {
    const account = this.config.account;
    const pending = this.inflight.get(account);
    if (pending) return pending;

    const attempt = this.acquireFresh(account).finally(() => {
      this.inflight.delete(account);
    });
    this.inflight.set(account, attempt);
    return attempt;
  }

  async status(): Promise<TokenStatus> {
    const account = this.config.account;
    const cached = await this.cache.load(account);
    return {
      account,
      cached: cached !== null,
      expiresAt: cached?.expiresAt ?? null,
      expired: cached ? !this.isFresh(cached) : true,
      hasRefreshToken: Boolean(cached?.refreshToken),
    };
  }

  async signOut(): Promise<boolean> {
    return this.cache.clear(this.config.account);
  }

  // ─── Acquisition ───

  private async acquireFresh(account: string): Promise<AccessToken> {
    const cached = await this.cache.load(account);

    if (cached && this.isFresh(cached)) {
      return toAccessToken(cached);
    }

    if (cached?.refreshToken) {
      const refreshed = await this.refresh(cached);
      if (refreshed) {
        await this.cache.save(refreshed);
        this.logger.info("Access token refreshed", { account });
        return toAccessToken(refreshed);
      }
    }

    const credential = await this.deviceCodeFlow(account);
    await this.cache.save(credential);
    this.logger.info("Signed in with device code", { account });
    return toAccessToken(credential);
  }

  private isFresh(credential: Credential): boolean {
    return credential.expiresAt - this.expirySkewMs > this.now();
  }

  /** Returns null when the server rejected the refresh token itself. */
  private async refresh(cached: Credential): Promise<Credential | null> {
    const res = await this.postForm(this.endpoint("token"), {
      client_id: this.config.clientId,
      grant_type: "refresh_token",
      refresh_token: cached.refreshToken,
      scope: this.config.scopes.join(" "),
    });

    const credential = this.toCredential(res.body, cached.account, cached.refreshToken);
    if (credential) return credential;

    if (res.status >= 500) {
      throw new AuthError(`Token endpoint returned HTTP ${res.status} during refresh`);
    }
    this.logger.warn("Refresh token rejected, falling back to device code", {
      error: str(res.body, "error") || `HTTP ${res.status}`,
    });
    return null;
  }

  private async deviceCodeFlow(account: string): Promise<Credential> {
    if (!this.interactive) {
      throw new AuthError(
        `No usable credential for "${account}" and interactive sign-in is disabled; run "newsletter-ingest auth login"`,
      );
    }

    const res = await this.postForm(this.endpoint("devicecode"), {
      client_id: this.config.clientId,
      scope: this.config.scopes.join(" "),
    });
    const deviceCode = str(res.body, "device_code");
    const userCode = str(res.body, "user_code");
    const verificationUri = str(res.body, "verification_uri");
    if (!deviceCode || !userCode || !verificationUri) {
      const reason = str(res.body, "error_description") || str(res.body, "error");
      throw new AuthError(
        `Device code request failed (HTTP ${res.status})${reason ? `: ${reason}` : ""}`,
      );
    }

    const expiresInS = positive(res.body.expires_in) ?? 900;
    let intervalS = positive(res.body.interval) ?? DEFAULT_POLL_INTERVAL_S;
    const expiresAt = this.now() + expiresInS * 1000;
    const deadline = Math.min(expiresAt, this.now() + this.config.deviceCodeTimeoutMs);

    this.onDeviceCode({
      verificationUri,
      userCode,
      message:
        str(res.body, "message") ||
        `To sign in, open ${verificationUri} and enter the code ${userCode}`,
      expiresAt,
    });

    for (;;) {
      await this.sleep(intervalS * 1000);
      if (this.now() > deadline) {
        throw new AuthError("Timed out waiting for device code sign-in");
      }

      const poll = await this.postForm(this.endpoint("token"), {
        client_id: this.config.clientId,
        grant_type: DEVICE_CODE_GRANT,
        device_code: deviceCode,
      });
      const credential = this.toCredential(poll.body, account, "");
      if (credential) return credential;

      const error = str(poll.body, "error");
      if (error === "authorization_pending") continue;
      if (error === "slow_down") {
        intervalS += SLOW_DOWN_STEP_S;
        continue;
      }
      throw new AuthError(
        `Device code sign-in failed: ${error || `HTTP ${poll.status}`}`,
      );
    }
  }

  // ─── Token endpoint plumbing ───

  private endpoint(kind: "token" | "devicecode"): string {
    const host = this.config.authorityHost.replace(/\/+$/, "");
    return `${host}/${encodeURIComponent(this.config.tenantId)}/oauth2/v2.0/${kind}`;
  }

  private async postForm(
    url: string,
    params: Record<string, string>,
  ): Promise<TokenEndpointResult> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams(params).toString(),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new AuthError(`Token endpoint unreachable: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      body = {};
    }
    return { status: response.status, body: isObject(body) ? body : {} };
  }

  private toCredential(
    body: Record<string, unknown>,
    account: string,
    previousRefreshToken: string,
  ): Credential | null {
    const accessToken = str(body, "access_token");
    if (!accessToken) return null;
    const expiresInS = positive(body.expires_in) ?? 3600;
    return {
      accessToken,
      // Refresh responses may omit a rotated token; keep the one we have
      refreshToken: str(body, "refresh_token") || previousRefreshToken,
      expiresAt: this.now() + expiresInS * 1000,
      account,
    };
  }
}

function positive(value: unknown): number | null {
  const n = typeof value === "string" ? Number.parseInt(value, 10) : value;
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? n : null;
}

function toAccessToken(credential: Credential): AccessToken {
  return {
    token: credential.accessToken,
    expiresAt: credential.expiresAt,
    account: credential.account,
  };
}
