import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parse as parseYaml } from "yaml";
import { FileOutputWriter } from "../../../src/newsletter/core/output.js";
import { archivePath, exportArchive, toMarkdown } from "../../../src/newsletter/store/archive.js";
import { SqliteNewsletterStore } from "../../../src/newsletter/store/newsletters.js";
import { input } from "./fixtures.js";

function split(content: string): { frontmatter: unknown; body: string } {
  const match = /^---\n([\s\S]*?)\n---\n\n([\s\S]*)$/.exec(content);
  if (!match) throw new Error("missing frontmatter");
  return { frontmatter: parseYaml(match[1] ?? ""), body: match[2] ?? "" };
}

describe("toMarkdown", () => {
  it("converts headings, links and images", () => {
    expect(
      toMarkdown(
        '<h1>Weekly</h1><p>Read <a href="https://x.example/a">this</a></p><img src="/static/newsletters/a.png" alt="logo">',
      ),
    ).toBe("# Weekly\n\nRead [this](https://x.example/a)\n\n![logo](/static/newsletters/a.png)");
  });
});

describe("exportArchive", () => {
  let tmpDir: string;
  let store: SqliteNewsletterStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "newsletter-archive-"));
    store = new SqliteNewsletterStore(":memory:");
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("names files by received date and subject", () => {
    const record = store.insert(input("m1", { subject: "Weekly digest: issue #3" }));
    expect(archivePath(record)).toBe("newsletters/2026-03-01-weekly-digest-issue-3.md");
  });

  it("writes published records with frontmatter and skips drafts", async () => {
    store.insert(
      input("m1", {
        subject: "Weekly digest",
        sanitizedHtml: "<h2>Top story</h2><p>Body</p>",
        heroImagePath: "/static/newsletters/a.png",
      }),
    );
    store.insert(
      input("m2", {
        status: "draft-rejected",
        rejectionReason: "Sanitized body has no visible text or images",
      }),
    );

    const result = await exportArchive(store, new FileOutputWriter(tmpDir));

    expect(result).toEqual({
      written: ["newsletters/2026-03-01-weekly-digest.md"],
      skipped: 1,
    });
    const { frontmatter, body } = split(
      fs.readFileSync(path.join(tmpDir, "newsletters/2026-03-01-weekly-digest.md"), "utf-8"),
    );
    expect(frontmatter).toEqual({
      message_id: "m1",
      subject: "Weekly digest",
      sender: "Digest",
      sender_email: "digest@news.example.com",
      received: "2026-03-01T08:00:00Z",
      hero_image: "/static/newsletters/a.png",
    });
    expect(body).toBe("## Top story\n\nBody\n");
  });

  it("disambiguates records that share a date and subject", async () => {
    store.insert(input("m1", { subject: "Daily" }));
    store.insert(input("m2", { subject: "Daily" }));

    const result = await exportArchive(store, new FileOutputWriter(tmpDir));

    expect(result.written).toEqual([
      "newsletters/2026-03-01-daily.md",
      "newsletters/2026-03-01-daily-1.md",
    ]);
  });
});
