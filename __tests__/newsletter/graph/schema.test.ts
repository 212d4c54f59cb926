import { describe, expect, it } from "vitest";
import { MalformedContentError } from "../../../src/newsletter/core/errors.js";
import {
  decodeBase64,
  parsePage,
  textToHtml,
  toAttachmentStub,
  toMailFolder,
  toRawMessage,
} from "../../../src/newsletter/graph/schema.js";

describe("parsePage", () => {
  it("reads items and the continuation link", () => {
    expect(
      parsePage({
        value: [{ id: "a" }, "junk", { id: "b" }],
        "@odata.nextLink": "https://graph.example/next",
      }),
    ).toEqual({ items: [{ id: "a" }, { id: "b" }], nextLink: "https://graph.example/next" });
  });

  it("rejects a non-object body", () => {
    expect(() => parsePage([])).toThrow(MalformedContentError);
  });
});

describe("toMailFolder", () => {
  it("maps Graph folder fields and drops entries without an id", () => {
    expect(
      toMailFolder({ id: "f1", displayName: "Inbox", parentFolderId: null, childFolderCount: 2 }),
    ).toEqual({ id: "f1", displayName: "Inbox", parentFolderId: null, childFolderCount: 2 });
    expect(toMailFolder({ displayName: "Orphan" })).toBeNull();
  });
});

describe("toRawMessage", () => {
  it("extracts sender, body and Authentication-Results headers", () => {
    const message = toRawMessage(
      {
        id: "m1",
        subject: "  Weekly  ",
        from: { emailAddress: { address: "digest@news.example.com", name: "" } },
        receivedDateTime: "2026-03-01T08:00:00Z",
        body: { contentType: "html", content: "<p>Hi</p>" },
        internetMessageHeaders: [
          { name: "Received", value: "from mx" },
          { name: "Authentication-Results", value: "spf=pass" },
          { name: "authentication-results", value: "dkim=pass" },
        ],
      },
      [],
    );

    expect(message).toEqual({
      messageId: "m1",
      subject: "Weekly",
      senderAddress: "digest@news.example.com",
      senderName: "digest@news.example.com",
      receivedAt: "2026-03-01T08:00:00Z",
      rawHtmlBody: "<p>Hi</p>",
      authenticationResults: ["spf=pass", "dkim=pass"],
      attachments: [],
    });
  });

  it("wraps plain-text bodies in escaped HTML", () => {
    const message = toRawMessage(
      { id: "m1", body: { contentType: "text", content: "a < b\r\nnext" } },
      [],
    );
    expect(message.rawHtmlBody).toBe("<div>a &lt; b<br>next</div>");
    expect(textToHtml('"q" & r')).toBe("<div>&quot;q&quot; &amp; r</div>");
  });

  it("fails without a message id", () => {
    expect(() => toRawMessage({ subject: "x" }, [])).toThrow("Graph message detail has no id");
  });
});

describe("toAttachmentStub", () => {
  it("keeps file attachments only", () => {
    expect(
      toAttachmentStub({
        "@odata.type": "#microsoft.graph.fileAttachment",
        id: "att1",
        name: "logo.png",
        contentId: " logo@x ",
        contentType: "IMAGE/PNG",
        size: 3,
        isInline: true,
        contentBytes: "AQID",
      }),
    ).toEqual({
      attachmentId: "att1",
      name: "logo.png",
      contentId: "logo@x",
      contentType: "image/png",
      size: 3,
      isInline: true,
      contentBytes: "AQID",
    });
    expect(
      toAttachmentStub({ "@odata.type": "#microsoft.graph.itemAttachment", id: "att2" }),
    ).toBeNull();
  });
});

describe("decodeBase64", () => {
  it("decodes padded base64 with line breaks", () => {
    expect(decodeBase64("AQID\nBA==", "a")).toEqual(Buffer.from([1, 2, 3, 4]));
  });

  it("rejects malformed payloads", () => {
    expect(() => decodeBase64("not base64!", "logo.png")).toThrow(
      "Attachment logo.png is not valid base64",
    );
  });
});
