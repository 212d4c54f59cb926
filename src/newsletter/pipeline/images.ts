/**
 * Materializes inline `cid:` images as files in the image store and points
 * the body at their public URLs.
 *
 * One instance per run: the sequence counter that keeps file names unique
 * is run-local.
 */

import { createHash } from "node:crypto";
import { errorMessage } from "../core/errors.js";
import { messageSlug } from "../core/slugify.js";
import type { Logger } from "../core/types.js";
import type { Attachment } from "../graph/types.js";
import type { ImageStore } from "../store/images.js";
import type { StoredImage } from "../store/types.js";
import { elementsWithAttribute, parseHtml, renderHtml } from "./html.js";
import { type ImageResolution, type StagedHtml, staged } from "./types.js";

const HERO_TYPES: ReadonlySet<string> = new Set([
  "image/png",
  "image/jpeg",
  "image/gif",
  "image/webp",
]);

const EXTENSIONS: Record<string, string> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/bmp": ".bmp",
  "image/avif": ".avif",
};

const CID = /^cid:/i;

function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** `<Image1@Example>` and `image1%40example` both become `image1@example`. */
export function normalizeContentId(value: string): string {
  const id = value.trim().replace(/^<+/, "").replace(/>+$/, "").trim();
  return percentDecode(id).toLowerCase();
}

function extensionFor(attachment: Attachment): string {
  const byType = EXTENSIONS[attachment.contentType];
  if (byType) return byType;
  const match = /\.([a-z0-9]{1,5})$/i.exec(attachment.name);
  return match?.[1] ? `.${match[1].toLowerCase()}` : ".bin";
}

export interface InlineImageResolverOptions {
  store: ImageStore;
  maxImageBytes: number;
  logger: Logger;
  now?: () => number;
}

export class InlineImageResolver {
  private readonly store: ImageStore;
  private readonly maxImageBytes: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private sequence = 0;

  constructor(opts: InlineImageResolverOptions) {
    this.store = opts.store;
    this.maxImageBytes = opts.maxImageBytes;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
  }

  async resolve(
    input: StagedHtml<"links-unwrapped">,
    attachments: Attachment[],
    messageId: string,
  ): Promise<ImageResolution> {
    const byContentId = new Map<string, Attachment>();
    for (const attachment of attachments) {
      if (!attachment.contentId) continue;
      const key = normalizeContentId(attachment.contentId);
      if (key && !byContentId.has(key)) byContentId.set(key, attachment);
    }

    const doc = parseHtml(input.html);
    const written = new Map<string, StoredImage>();
    const orphans = new Set<string>();
    let heroImagePath: string | null = null;
    let rewritten = 0;

    try {
      for (const el of elementsWithAttribute(doc, "src")) {
        const src = el.attribs.src;
        if (src === undefined || !CID.test(src.trim())) continue;
        const contentId = normalizeContentId(src.trim().slice(4));

        let image = written.get(contentId);
        if (!image) {
          const attachment = byContentId.get(contentId);
          const skip = attachment ? this.skipReason(attachment) : "no matching attachment";
          if (!attachment || skip) {
            if (!orphans.has(contentId)) {
              this.logger.warn("Unresolved inline image", { messageId, contentId, reason: skip });
            }
            orphans.add(contentId);
            continue;
          }
          image = await this.materialize(attachment, messageId);
          written.set(contentId, image);
        }

        el.attribs.src = image.path;
        rewritten++;
        if (heroImagePath === null && HERO_TYPES.has(image.contentType)) {
          heroImagePath = image.path;
        }
      }
    } catch (err) {
      await this.discard([...written.values()]);
      throw err;
    }

    return {
      html: staged("images-resolved", rewritten > 0 ? renderHtml(doc) : input.html),
      heroImagePath,
      images: [...written.values()],
      orphans: [...orphans],
    };
  }

  /** Remove files written for a message whose record was never stored. */
  async discard(images: StoredImage[]): Promise<void> {
    for (const image of images) {
      try {
        await this.store.remove(image.fileName);
      } catch (err) {
        this.logger.error("Failed to remove orphaned image file", {
          fileName: image.fileName,
          error: errorMessage(err),
        });
      }
    }
  }

  private skipReason(attachment: Attachment): string | null {
    if (attachment.contentType === "image/svg+xml") return "svg images are not stored";
    if (attachment.bytes.length > this.maxImageBytes) {
      return `image exceeds ${this.maxImageBytes} bytes`;
    }
    return null;
  }

  private async materialize(attachment: Attachment, messageId: string): Promise<StoredImage> {
    const contentHash = createHash("sha256").update(attachment.bytes).digest("hex");
    this.sequence++;
    const fileName = [
      messageSlug(messageId),
      this.now(),
      this.sequence,
      contentHash.slice(0, 12),
    ].join("-") + extensionFor(attachment);

    const path = await this.store.save(fileName, attachment.bytes);
    return {
      fileName,
      path,
      messageId,
      contentHash,
      contentType: attachment.contentType,
      size: attachment.bytes.length,
    };
  }
}
