/**
 * Pipeline stage types.
 *
 * Each stage consumes the previous stage's `StagedHtml` and produces its own,
 * so stages cannot be run out of order without a type error.
 */

import type { StoredImage } from "../store/types.js";

export type PipelineStage =
  | "fetched"
  | "validated"
  | "links-unwrapped"
  | "images-resolved"
  | "sanitized";

export interface StagedHtml<S extends PipelineStage> {
  readonly stage: S;
  readonly html: string;
}

export function staged<S extends PipelineStage>(stage: S, html: string): StagedHtml<S> {
  return { stage, html };
}

// ─── Sender validation ───

export type AuthVerdict = "pass" | "fail" | "softfail" | "neutral" | "none" | "unknown";

export interface AuthResults {
  spf: AuthVerdict;
  dkim: AuthVerdict;
  dmarc: AuthVerdict;
  /** "pass": every recorded verdict passed; "partial": some did; "unknown": no header. */
  overall: "pass" | "partial" | "unknown";
}

export type ValidationResult =
  | { accepted: true; auth: AuthResults; html: StagedHtml<"validated"> }
  | { accepted: false; reason: string };

// ─── Links ───

export interface RedirectorRule {
  /** Host, or parent domain of hosts, that wraps links. */
  hostSuffix: string;
  /** Query parameter holding the original URL. */
  param: string;
}

// ─── Images ───

export interface ImageResolution {
  html: StagedHtml<"images-resolved">;
  heroImagePath: string | null;
  images: StoredImage[];
  /** Content ids referenced by the body that produced no stored image. */
  orphans: string[];
}
