import { vi } from "vitest";
import type { Logger, RateLimiter } from "../../src/newsletter/core/types.js";
import type { AccessToken, AccessTokenSource, FetchLike } from "../../src/newsletter/graph/types.js";

export interface RecordingLogger extends Logger {
  lines: Array<{ level: "info" | "warn" | "error"; msg: string }>;
}

export function silentLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    info: (msg) => lines.push({ level: "info", msg }),
    warn: (msg) => lines.push({ level: "warn", msg }),
    error: (msg) => lines.push({ level: "error", msg }),
    progress: () => {},
  };
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function immediateRateLimiter() {
  const limiter = {
    acquire: vi.fn(async (): Promise<void> => {}),
    backoff: vi.fn<(retryAfterMs: number) => void>(),
  };
  return limiter satisfies RateLimiter;
}

export function staticTokens(token = "test-access-token"): AccessTokenSource & {
  calls: number;
} {
  const source = {
    calls: 0,
    async acquire(): Promise<AccessToken> {
      source.calls++;
      return { token, expiresAt: Date.now() + 3_600_000, account: "me" };
    },
  };
  return source;
}

type Handler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

/**
 * In-process stand-in for the Graph and identity endpoints: routes are
 * matched on the URL pathname (suffix), first match wins.
 */
export class FakeFetch {
  readonly requests: Array<{ url: string; init?: RequestInit }> = [];
  private readonly routes: Array<{ suffix: string; handler: Handler }> = [];

  on(suffix: string, handler: Handler): this {
    this.routes.push({ suffix, handler });
    return this;
  }

  readonly fetch: FetchLike = async (url, init) => {
    this.requests.push({ url, init });
    const parsed = new URL(url);
    const route = this.routes.find((r) => parsed.pathname.endsWith(r.suffix));
    if (!route) return jsonResponse(404, { error: { code: "ErrorItemNotFound" } });
    return route.handler(parsed, init);
  };

  countFor(suffix: string): number {
    return this.requests.filter((r) => new URL(r.url).pathname.endsWith(suffix)).length;
  }
}

/** Parse an application/x-www-form-urlencoded request body. */
export function formBody(init?: RequestInit): URLSearchParams {
  return new URLSearchParams(typeof init?.body === "string" ? init.body : "");
}
