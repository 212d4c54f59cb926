/**
 * Sender acceptance: allow-listed domain plus no failing SPF/DKIM/DMARC
 * verdict in any Authentication-Results header.
 */

import type { RawMessage } from "../graph/types.js";
import {
  type AuthResults,
  type AuthVerdict,
  staged,
  type ValidationResult,
} from "./types.js";

const MECHANISMS = ["spf", "dkim", "dmarc"] as const;
type Mechanism = (typeof MECHANISMS)[number];

const VERDICT = /\b(spf|dkim|dmarc)\s*=\s*([a-z]+)/gi;

function toVerdict(value: string): AuthVerdict {
  const v = value.toLowerCase();
  switch (v) {
    case "pass":
    case "fail":
    case "softfail":
    case "neutral":
    case "none":
      return v;
    default:
      return "unknown";
  }
}

function isMechanism(value: string): value is Mechanism {
  return value === "spf" || value === "dkim" || value === "dmarc";
}

/**
 * Collapse every header into one verdict per mechanism. A `fail` anywhere
 * wins; otherwise the first verdict seen is kept.
 */
export function parseAuthenticationResults(headers: string[]): AuthResults {
  const verdicts: Record<Mechanism, AuthVerdict> = {
    spf: "unknown",
    dkim: "unknown",
    dmarc: "unknown",
  };

  for (const header of headers) {
    for (const match of header.matchAll(VERDICT)) {
      const mechanism = (match[1] ?? "").toLowerCase();
      if (!isMechanism(mechanism)) continue;
      const verdict = toVerdict(match[2] ?? "");
      if (verdict === "fail" || verdicts[mechanism] === "unknown") {
        verdicts[mechanism] = verdict;
      }
    }
  }

  const present = MECHANISMS.map((m) => verdicts[m]).filter((v) => v !== "unknown");
  let overall: AuthResults["overall"] = "unknown";
  if (headers.length > 0 && present.length > 0) {
    overall = present.every((v) => v === "pass") ? "pass" : "partial";
  }
  return { ...verdicts, overall };
}

function normalizeDomain(domain: string): string {
  return domain.trim().replace(/^@/, "").toLowerCase();
}

export function senderDomain(address: string): string {
  const at = address.lastIndexOf("@");
  return at === -1 ? "" : normalizeDomain(address.slice(at + 1));
}

export class SenderValidator {
  private readonly allowedDomains: string[];

  constructor(allowedDomains: string[]) {
    this.allowedDomains = allowedDomains.map(normalizeDomain).filter(Boolean);
  }

  isAllowedDomain(domain: string): boolean {
    const d = normalizeDomain(domain);
    if (!d) return false;
    return this.allowedDomains.some((a) => d === a || d.endsWith(`.${a}`));
  }

  validate(message: RawMessage): ValidationResult {
    if (!message.messageId.trim()) {
      return { accepted: false, reason: "Missing message id" };
    }
    if (!message.subject.trim()) {
      return { accepted: false, reason: "Missing subject" };
    }
    if (!message.senderAddress.trim()) {
      return { accepted: false, reason: "Missing sender address" };
    }

    const domain = senderDomain(message.senderAddress);
    if (!this.isAllowedDomain(domain)) {
      return {
        accepted: false,
        reason: `Sender domain "${domain || message.senderAddress}" is not allow-listed`,
      };
    }

    const auth = parseAuthenticationResults(message.authenticationResults);
    const failed = MECHANISMS.filter((m) => auth[m] === "fail");
    if (failed.length > 0) {
      return {
        accepted: false,
        reason: `Authentication failed: ${failed.map((m) => `${m}=fail`).join(", ")}`,
      };
    }

    return { accepted: true, auth, html: staged("validated", message.rawHtmlBody) };
  }
}
