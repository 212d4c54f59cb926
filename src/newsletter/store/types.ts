/** Persisted record types. */

import type { AuthResults } from "../pipeline/types.js";

export type NewsletterStatus = "published" | "draft-rejected";

export interface StoredImage {
  fileName: string;
  /** Public path: `<urlPrefix>/<fileName>`. */
  path: string;
  messageId: string;
  contentHash: string;
  contentType: string;
  size: number;
}

export interface IngestedNewsletter {
  id: number;
  messageId: string;
  subject: string;
  senderName: string;
  senderAddress: string;
  receivedAt: string;
  sanitizedHtml: string;
  heroImagePath: string | null;
  status: NewsletterStatus;
  rejectionReason: string | null;
  authResults: AuthResults | null;
  imageFiles: string[];
  ingestedAt: string;
}

/** What the coordinator hands the store; ids and timestamps are assigned there. */
export type NewsletterInput = Omit<IngestedNewsletter, "id" | "imageFiles" | "ingestedAt"> & {
  images: StoredImage[];
};

export interface NewsletterRepository {
  has(messageId: string): boolean;
  get(messageId: string): IngestedNewsletter | null;
  listRecent(limit: number): IngestedNewsletter[];
  count(): number;
  insert(input: NewsletterInput): IngestedNewsletter;
  /** Returns the image files of the record that was replaced. */
  replace(input: NewsletterInput): { record: IngestedNewsletter; superseded: string[] };
  imagesFor(messageId: string): StoredImage[];
  close(): void;
}
