import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AuthError,
  GraphHttpError,
  NotFoundError,
  PersistenceError,
  TransientNetworkError,
} from "../../../src/newsletter/core/errors.js";
import { FileOutputWriter } from "../../../src/newsletter/core/output.js";
import type {
  AccessTokenSource,
  FolderRef,
  FolderSpec,
  MailSource,
  MessageSummary,
  RawMessage,
} from "../../../src/newsletter/graph/types.js";
import { IngestCoordinator } from "../../../src/newsletter/pipeline/coordinator.js";
import { LinkUnwrapper } from "../../../src/newsletter/pipeline/links.js";
import { ContentSanitizer } from "../../../src/newsletter/pipeline/sanitizer.js";
import { SenderValidator } from "../../../src/newsletter/pipeline/sender.js";
import type { StagedHtml } from "../../../src/newsletter/pipeline/types.js";
import { ImageStore } from "../../../src/newsletter/store/images.js";
import { SqliteNewsletterStore } from "../../../src/newsletter/store/newsletters.js";
import type { NewsletterRepository } from "../../../src/newsletter/store/types.js";
import { silentLogger, staticTokens } from "../helpers.js";

const PREFIX = "/static/newsletters";

function newsletter(id: string, overrides: Partial<RawMessage> = {}): RawMessage {
  return {
    messageId: id,
    subject: `Issue ${id}`,
    senderAddress: "digest@news.example.com",
    senderName: "Digest",
    receivedAt: "2026-03-01T08:00:00Z",
    rawHtmlBody: `<p>Body of ${id}</p><img src="cid:logo">`,
    authenticationResults: ["mx.example; spf=pass; dkim=pass; dmarc=pass"],
    attachments: [
      {
        attachmentId: `att-${id}`,
        name: "logo.png",
        contentId: "<logo>",
        contentType: "image/png",
        bytes: Buffer.from(`logo-${id}`),
        size: 8,
        isInline: true,
      },
    ],
    ...overrides,
  };
}

class FakeMail implements MailSource {
  messages: RawMessage[];
  failures = new Map<string, Error>();
  detailCalls: string[] = [];

  constructor(messages: RawMessage[]) {
    this.messages = messages;
  }

  async *listMessages(_folderId: string, maxCount: number): AsyncGenerator<MessageSummary> {
    for (const m of this.messages.slice(0, maxCount)) {
      yield {
        messageId: m.messageId,
        subject: m.subject,
        senderAddress: m.senderAddress,
        receivedAt: m.receivedAt,
        hasAttachments: m.attachments.length > 0,
      };
    }
  }

  async fetchDetail(messageId: string): Promise<RawMessage> {
    this.detailCalls.push(messageId);
    const failure = this.failures.get(messageId);
    if (failure) throw failure;
    const found = this.messages.find((m) => m.messageId === messageId);
    if (!found) throw new GraphHttpError(404, "not found");
    return found;
  }
}

const folders = {
  resolve: async (_folder: FolderSpec): Promise<FolderRef> => ({
    folderId: "folder-1",
    displayPath: "Inbox/Newsletters",
  }),
};

describe("IngestCoordinator", () => {
  let tmpDir: string;
  let store: SqliteNewsletterStore;
  let clock: number;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "newsletter-ingest-"));
    store = new SqliteNewsletterStore(":memory:");
    clock = 1_700_000_000_000;
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function coordinator(
    mail: MailSource,
    opts: {
      tokens?: AccessTokenSource;
      store?: NewsletterRepository;
      folders?: typeof folders;
      sanitizer?: ContentSanitizer;
    } = {},
  ): IngestCoordinator {
    return new IngestCoordinator({
      tokens: opts.tokens ?? staticTokens(),
      folders: opts.folders ?? folders,
      mail,
      validator: new SenderValidator(["news.example.com"]),
      links: new LinkUnwrapper([{ hostSuffix: "safelinks.protection.outlook.com", param: "url" }]),
      sanitizer: opts.sanitizer ?? new ContentSanitizer(PREFIX),
      images: new ImageStore(new FileOutputWriter(tmpDir), PREFIX),
      store: opts.store ?? store,
      logger: silentLogger(),
      folder: { path: "Inbox/Newsletters" },
      maxMessages: 10,
      maxImageBytes: 1024,
      now: () => (clock += 1000),
    });
  }

  const files = () => fs.readdirSync(tmpDir).sort();

  it("stores accepted newsletters with resolved images", async () => {
    const mail = new FakeMail([newsletter("m1")]);
    const summary = await coordinator(mail).run();

    expect(summary).toMatchObject({
      folder: "Inbox/Newsletters",
      fetched: 1,
      persisted: 1,
      skipped: 0,
      rejected: 0,
      errors: 0,
      aborted: false,
    });
    const record = store.get("m1");
    expect(record?.status).toBe("published");
    expect(record?.authResults).toEqual({ spf: "pass", dkim: "pass", dmarc: "pass", overall: "pass" });
    expect(record?.imageFiles).toEqual(files());
    expect(record?.heroImagePath).toBe(`${PREFIX}/${files()[0]}`);
    expect(record?.sanitizedHtml).toBe(`<p>Body of m1</p><img src="${PREFIX}/${files()[0]}" />`);
  });

  it("is a no-op for messages already ingested", async () => {
    const mail = new FakeMail([newsletter("m1"), newsletter("m2")]);
    await coordinator(mail).run();
    const before = { count: store.count(), files: files() };

    const again = await coordinator(mail).run();
    expect(again).toMatchObject({ fetched: 2, skipped: 2, persisted: 0 });
    expect(again.outcomes.map((o) => o.reason)).toEqual(["Already ingested", "Already ingested"]);
    expect(store.count()).toBe(before.count);
    expect(files()).toEqual(before.files);
    expect(mail.detailCalls).toEqual(["m1", "m2"]);
  });

  it("creates no rows or files for rejected senders", async () => {
    const mail = new FakeMail([
      newsletter("m1", { senderAddress: "promo@spam.example.org" }),
      newsletter("m2", { authenticationResults: ["spf=fail"] }),
    ]);
    const summary = await coordinator(mail).run();

    expect(summary).toMatchObject({ fetched: 2, rejected: 2, persisted: 0 });
    expect(summary.outcomes.map((o) => o.reason)).toEqual([
      'Sender domain "spam.example.org" is not allow-listed',
      "Authentication failed: spf=fail",
    ]);
    expect(store.count()).toBe(0);
    expect(files()).toEqual([]);
  });

  it("aborts before any work when authentication fails", async () => {
    const mail = new FakeMail([newsletter("m1")]);
    const tokens: AccessTokenSource = {
      acquire: vi.fn().mockRejectedValue(new AuthError("refresh token revoked")),
    };
    const summary = await coordinator(mail, { tokens }).run();

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe("Authentication failed: refresh token revoked");
    expect(summary.fetched).toBe(0);
    expect(mail.detailCalls).toEqual([]);
    expect(store.count()).toBe(0);
  });

  it("aborts when the folder cannot be resolved", async () => {
    const missing = {
      resolve: async (): Promise<FolderRef> => {
        throw new NotFoundError('Folder "Newsletters" not found under "Inbox"');
      },
    };
    const summary = await coordinator(new FakeMail([newsletter("m1")]), { folders: missing }).run();

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe(
      'Folder resolution failed: Folder "Newsletters" not found under "Inbox"',
    );
    expect(summary.folder).toBeNull();
  });

  it("records a per-message failure and continues", async () => {
    const mail = new FakeMail([newsletter("m1"), newsletter("m2")]);
    mail.failures.set("m1", new TransientNetworkError("Graph API error 503"));
    const summary = await coordinator(mail).run();

    expect(summary).toMatchObject({ fetched: 2, errors: 1, persisted: 1, aborted: false });
    expect(summary.outcomes[0]).toEqual({
      messageId: "m1",
      subject: "Issue m1",
      state: "errored",
      reason: "Fetching message failed: Graph API error 503",
    });
    expect(store.has("m2")).toBe(true);
  });

  it("stops before the next message on an auth failure mid-run", async () => {
    const mail = new FakeMail([newsletter("m1"), newsletter("m2"), newsletter("m3")]);
    mail.failures.set("m2", new AuthError("Graph rejected the access token (401)"));
    const summary = await coordinator(mail).run();

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe("Run aborted: Graph rejected the access token (401)");
    expect(summary.persisted).toBe(1);
    expect(mail.detailCalls).toEqual(["m1", "m2"]);
  });

  it("re-ingests with force and removes superseded image files", async () => {
    const mail = new FakeMail([newsletter("m1")]);
    await coordinator(mail).run();
    const [oldFile] = files();

    mail.messages = [newsletter("m1", { subject: "Issue m1 (corrected)" })];
    const summary = await coordinator(mail).run({ force: true });

    expect(summary).toMatchObject({ persisted: 1, skipped: 0 });
    expect(store.count()).toBe(1);
    expect(store.get("m1")?.subject).toBe("Issue m1 (corrected)");
    const current = files();
    expect(current).toHaveLength(1);
    expect(current).not.toContain(oldFile);
    expect(store.imagesFor("m1").map((i) => i.fileName)).toEqual(current);
  });

  it("stores a body without visible content as a draft", async () => {
    const mail = new FakeMail([
      newsletter("m1", { rawHtmlBody: "<script>track()</script><p> </p>", attachments: [] }),
    ]);
    const summary = await coordinator(mail).run();

    expect(summary.outcomes[0]).toMatchObject({
      state: "persisted",
      reason: "Sanitized body has no visible text or images",
    });
    expect(store.get("m1")?.status).toBe("draft-rejected");
    expect(store.get("m1")?.rejectionReason).toBe("Sanitized body has no visible text or images");
  });

  it("removes written images when the record cannot be stored", async () => {
    const failing: NewsletterRepository = {
      has: () => false,
      get: () => null,
      listRecent: () => [],
      count: () => 0,
      insert: () => {
        throw new PersistenceError("Failed to store newsletter m1: disk I/O error");
      },
      replace: () => {
        throw new PersistenceError("unexpected replace");
      },
      imagesFor: () => [],
      close: () => {},
    };
    const summary = await coordinator(new FakeMail([newsletter("m1")]), { store: failing }).run();

    expect(summary.errors).toBe(1);
    expect(summary.outcomes[0]?.reason).toBe(
      "Storing newsletter failed: Failed to store newsletter m1: disk I/O error",
    );
    expect(files()).toEqual([]);
  });

  it("drops unresolved cid references from the stored body", async () => {
    const mail = new FakeMail([
      newsletter("m1", {
        rawHtmlBody: '<p>Hi</p><img src="cid:missing"><img src=cid:logo>',
      }),
    ]);
    const summary = await coordinator(mail).run();

    expect(summary.persisted).toBe(1);
    const [file] = files();
    const html = store.get("m1")?.sanitizedHtml ?? "";
    expect(html.startsWith("<p>Hi</p>")).toBe(true);
    expect(html).toContain(`<img src="${PREFIX}/${file}" />`);
    expect(html).not.toMatch(/cid:/i);
  });

  it("records a failed dedup check against the message and continues", async () => {
    const busy: NewsletterRepository = {
      has: (id) => {
        if (id === "m1") throw new Error("SQLITE_BUSY: database is locked");
        return store.has(id);
      },
      get: (id) => store.get(id),
      listRecent: (limit) => store.listRecent(limit),
      count: () => store.count(),
      insert: (input) => store.insert(input),
      replace: (input) => store.replace(input),
      imagesFor: (id) => store.imagesFor(id),
      close: () => store.close(),
    };
    const mail = new FakeMail([newsletter("m1"), newsletter("m2")]);
    const summary = await coordinator(mail, { store: busy }).run();

    expect(summary).toMatchObject({ aborted: false, errors: 1, persisted: 1 });
    expect(summary.outcomes[0]?.reason).toBe(
      "Checking for an existing record failed: SQLITE_BUSY: database is locked",
    );
    expect(store.has("m2")).toBe(true);
    expect(mail.detailCalls).toEqual(["m2"]);
  });

  it("removes written images when sanitizing fails", async () => {
    class BrokenSanitizer extends ContentSanitizer {
      sanitize(_input: StagedHtml<"images-resolved">): StagedHtml<"sanitized"> {
        throw new Error("unexpected markup");
      }
    }
    const mail = new FakeMail([newsletter("m1")]);
    const summary = await coordinator(mail, { sanitizer: new BrokenSanitizer(PREFIX) }).run();

    expect(summary).toMatchObject({ aborted: false, errors: 1, persisted: 0 });
    expect(summary.outcomes[0]?.reason).toBe("Sanitizing body failed: unexpected markup");
    expect(files()).toEqual([]);
    expect(store.count()).toBe(0);
  });

  it("aborts with the listing error when messages cannot be listed", async () => {
    const mail: MailSource = {
      async *listMessages(): AsyncGenerator<MessageSummary> {
        throw new TransientNetworkError("Graph API error 503");
      },
      fetchDetail: async () => newsletter("m1"),
    };
    const summary = await coordinator(mail).run();

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe("Listing messages failed: Graph API error 503");
    expect(store.count()).toBe(0);
  });
});
