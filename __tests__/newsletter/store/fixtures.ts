import type { NewsletterInput, StoredImage } from "../../../src/newsletter/store/types.js";

export function image(fileName: string, messageId = "m1"): StoredImage {
  return {
    fileName,
    path: `/static/newsletters/${fileName}`,
    messageId,
    contentHash: "0".repeat(64),
    contentType: "image/png",
    size: 4,
  };
}

export function input(messageId: string, overrides: Partial<NewsletterInput> = {}): NewsletterInput {
  return {
    messageId,
    subject: `Issue ${messageId}`,
    senderName: "Digest",
    senderAddress: "digest@news.example.com",
    receivedAt: "2026-03-01T08:00:00Z",
    sanitizedHtml: "<p>Hello</p>",
    heroImagePath: null,
    status: "published",
    rejectionReason: null,
    authResults: { spf: "pass", dkim: "pass", dmarc: "none", overall: "partial" },
    images: [],
    ...overrides,
  };
}
