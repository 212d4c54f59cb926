/**
 * Replaces redirector-wrapped hrefs (Outlook Safe Links and the like) with
 * the destination URL they carry.
 */

import type { Logger } from "../core/types.js";
import { elementsWithAttribute, parseHtml, renderHtml } from "./html.js";
import { type RedirectorRule, type StagedHtml, staged } from "./types.js";

const MAX_NESTING = 5;

function parseUrl(value: string): URL | null {
  try {
    return new URL(value.trim());
  } catch {
    return null;
  }
}

/**
 * Percent-decoded query parameter. Unlike `searchParams.get`, a literal `+`
 * stays a `+`.
 */
function queryParam(url: URL, name: string): string | null {
  for (const pair of url.search.replace(/^\?/, "").split("&")) {
    const eq = pair.indexOf("=");
    if (eq === -1 || pair.slice(0, eq) !== name) continue;
    try {
      return decodeURIComponent(pair.slice(eq + 1));
    } catch {
      return null;
    }
  }
  return null;
}

export class LinkUnwrapper {
  private readonly rules: RedirectorRule[];
  private readonly logger?: Logger;

  constructor(rules: RedirectorRule[], logger?: Logger) {
    this.rules = rules.map((r) => ({
      hostSuffix: r.hostSuffix.trim().replace(/^\./, "").toLowerCase(),
      param: r.param,
    }));
    this.logger = logger;
  }

  private ruleFor(url: URL): RedirectorRule | undefined {
    const host = url.hostname.toLowerCase();
    return this.rules.find(
      (r) => host === r.hostSuffix || host.endsWith(`.${r.hostSuffix}`),
    );
  }

  /** The destination of a wrapped URL, or null when `href` is not wrapped. */
  unwrapUrl(href: string): string | null {
    let current = href;
    let unwrapped = false;

    for (let depth = 0; depth < MAX_NESTING; depth++) {
      const url = parseUrl(current);
      if (!url) break;
      const rule = this.ruleFor(url);
      const target = rule ? queryParam(url, rule.param) : null;
      if (!target) break;
      current = target;
      unwrapped = true;
    }
    return unwrapped ? current : null;
  }

  unwrap(input: StagedHtml<"validated">): StagedHtml<"links-unwrapped"> {
    if (this.rules.length === 0) return staged("links-unwrapped", input.html);

    const doc = parseHtml(input.html);
    let rewritten = 0;
    for (const el of elementsWithAttribute(doc, "href")) {
      const href = el.attribs.href;
      if (href === undefined) continue;
      const target = this.unwrapUrl(href);
      if (target !== null) {
        el.attribs.href = target;
        rewritten++;
      }
    }

    if (rewritten === 0) return staged("links-unwrapped", input.html);
    this.logger?.info(`Unwrapped ${rewritten} redirector link(s)`);
    return staged("links-unwrapped", renderHtml(doc));
  }
}
