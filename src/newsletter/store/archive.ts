/**
 * Markdown archive of published newsletters: one file per record with YAML
 * frontmatter, the body converted from the sanitized HTML.
 */

import TurndownService from "turndown";
import { slugify } from "../core/slugify.js";
import type { Logger, OutputWriter } from "../core/types.js";
import type { IngestedNewsletter, NewsletterRepository } from "./types.js";

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});

export interface ExportOptions {
  limit?: number;
  logger?: Logger;
}

export interface ExportResult {
  written: string[];
  /** Records not exported because they are drafts. */
  skipped: number;
}

export function archivePath(record: IngestedNewsletter): string {
  const date = record.receivedAt.slice(0, 10) || "undated";
  const slug = slugify(record.subject, 60) || "newsletter";
  return `newsletters/${date}-${slug}.md`;
}

export function toMarkdown(html: string): string {
  return turndown.turndown(html).trim();
}

export async function exportArchive(
  store: NewsletterRepository,
  writer: OutputWriter,
  opts: ExportOptions = {},
): Promise<ExportResult> {
  const records = store.listRecent(opts.limit ?? 50);
  const result: ExportResult = { written: [], skipped: 0 };
  const used = new Set<string>();

  for (const record of records) {
    if (record.status !== "published") {
      result.skipped++;
      continue;
    }

    let relPath = archivePath(record);
    // Same day, same subject: disambiguate by record id
    if (used.has(relPath)) relPath = relPath.replace(/\.md$/, `-${record.id}.md`);
    used.add(relPath);

    const frontmatter: Record<string, unknown> = {
      message_id: record.messageId,
      subject: record.subject,
      sender: record.senderName,
      sender_email: record.senderAddress,
      received: record.receivedAt,
    };
    if (record.heroImagePath) frontmatter.hero_image = record.heroImagePath;

    await writer.writeDocument(relPath, frontmatter, `${toMarkdown(record.sanitizedHtml)}\n`);
    result.written.push(relPath);
  }

  opts.logger?.info(`Exported ${result.written.length} newsletter(s)`, {
    skipped: result.skipped,
  });
  return result;
}
