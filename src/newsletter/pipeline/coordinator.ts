/**
 * Drives one ingestion run over the configured folder.
 *
 * Per message:
 *   fetched → validated → links-unwrapped → images-resolved → sanitized → persisted
 * with `rejected` (sender validation), `errored` (per-message failure) and
 * `skipped` (already ingested) as terminal states. Only auth failures and an
 * unresolvable folder abort the run.
 */

import { errorMessage, isRunFatal } from "../core/errors.js";
import type { Logger, MessageOutcome, RunOptions, RunSummary } from "../core/types.js";
import type { FolderResolver } from "../graph/folders.js";
import type {
  AccessTokenSource,
  FolderSpec,
  MailSource,
  MessageSummary,
  RawMessage,
} from "../graph/types.js";
import type { ImageStore } from "../store/images.js";
import type { NewsletterInput, NewsletterRepository } from "../store/types.js";
import { hasVisibleContent } from "./html.js";
import { InlineImageResolver } from "./images.js";
import type { LinkUnwrapper } from "./links.js";
import type { ContentSanitizer } from "./sanitizer.js";
import type { SenderValidator } from "./sender.js";
import type { ImageResolution, StagedHtml, ValidationResult } from "./types.js";

const EMPTY_BODY_REASON = "Sanitized body has no visible text or images";

export interface IngestCoordinatorOptions {
  tokens: AccessTokenSource;
  folders: Pick<FolderResolver, "resolve">;
  mail: MailSource;
  validator: SenderValidator;
  links: LinkUnwrapper;
  sanitizer: ContentSanitizer;
  images: ImageStore;
  store: NewsletterRepository;
  logger: Logger;
  folder: FolderSpec;
  maxMessages: number;
  maxImageBytes: number;
  now?: () => number;
}

/** Thrown out of the message loop to end the run. */
class RunAborted extends Error {}

export class IngestCoordinator {
  private readonly opts: IngestCoordinatorOptions;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: IngestCoordinatorOptions) {
    this.opts = opts;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
  }

  async run(runOpts: RunOptions = {}): Promise<RunSummary> {
    const started = this.now();
    const summary: RunSummary = {
      folder: null,
      fetched: 0,
      skipped: 0,
      rejected: 0,
      persisted: 0,
      errors: 0,
      aborted: false,
      outcomes: [],
      startedAt: new Date(started).toISOString(),
      finishedAt: "",
      durationMs: 0,
    };

    const finish = (): RunSummary => {
      const finished = this.now();
      summary.finishedAt = new Date(finished).toISOString();
      summary.durationMs = finished - started;
      return summary;
    };
    const abort = (reason: string, err: unknown): RunSummary => {
      summary.aborted = true;
      summary.abortReason = reason;
      this.logger.error(reason, { error: errorMessage(err) });
      return finish();
    };

    try {
      await this.opts.tokens.acquire();
    } catch (err) {
      return abort(`Authentication failed: ${errorMessage(err)}`, err);
    }

    let folderId: string;
    try {
      const ref = await this.opts.folders.resolve(this.opts.folder);
      folderId = ref.folderId;
      summary.folder = ref.displayPath;
    } catch (err) {
      return abort(`Folder resolution failed: ${errorMessage(err)}`, err);
    }

    const resolver = new InlineImageResolver({
      store: this.opts.images,
      maxImageBytes: this.opts.maxImageBytes,
      logger: this.logger,
      now: this.now,
    });

    this.logger.info(`Ingesting from "${summary.folder}"`, {
      maxMessages: this.opts.maxMessages,
      force: runOpts.force ?? false,
    });

    const messages = this.opts.mail.listMessages(folderId, this.opts.maxMessages);
    for (;;) {
      let next: IteratorResult<MessageSummary>;
      try {
        next = await messages.next();
      } catch (err) {
        return abort(`Listing messages failed: ${errorMessage(err)}`, err);
      }
      if (next.done) break;

      summary.fetched++;
      let outcome: MessageOutcome;
      try {
        outcome = await this.process(next.value, resolver, runOpts.force ?? false);
      } catch (err) {
        await messages.return(undefined);
        const cause = err instanceof RunAborted ? err.cause : err;
        return abort(`Run aborted: ${errorMessage(cause)}`, cause);
      }

      summary.outcomes.push(outcome);
      switch (outcome.state) {
        case "persisted":
          summary.persisted++;
          break;
        case "skipped":
          summary.skipped++;
          break;
        case "rejected":
          summary.rejected++;
          break;
        default:
          summary.errors++;
      }
      this.logger.progress(summary.fetched, this.opts.maxMessages, "Newsletters");
    }

    this.logger.info("Ingestion finished", {
      fetched: summary.fetched,
      persisted: summary.persisted,
      skipped: summary.skipped,
      rejected: summary.rejected,
      errors: summary.errors,
    });
    return finish();
  }

  private async process(
    message: MessageSummary,
    resolver: InlineImageResolver,
    force: boolean,
  ): Promise<MessageOutcome> {
    const base = { messageId: message.messageId, subject: message.subject };
    const errored = (stage: string, err: unknown): MessageOutcome => {
      if (isRunFatal(err)) throw new RunAborted(errorMessage(err), { cause: err });
      const reason = `${stage}: ${errorMessage(err)}`;
      this.logger.error("Newsletter failed", { ...base, reason });
      return { ...base, state: "errored", reason };
    };

    let existing: boolean;
    try {
      existing = this.opts.store.has(message.messageId);
    } catch (err) {
      return errored("Checking for an existing record failed", err);
    }
    if (existing && !force) {
      return { ...base, state: "skipped", reason: "Already ingested" };
    }

    let raw: RawMessage;
    try {
      raw = await this.opts.mail.fetchDetail(message.messageId);
    } catch (err) {
      return errored("Fetching message failed", err);
    }

    let verdict: ValidationResult;
    try {
      verdict = this.opts.validator.validate(raw);
    } catch (err) {
      return errored("Validating sender failed", err);
    }
    if (!verdict.accepted) {
      this.logger.warn("Newsletter rejected", { ...base, reason: verdict.reason });
      return { ...base, state: "rejected", reason: verdict.reason };
    }

    let resolution: ImageResolution;
    try {
      const unwrapped = this.opts.links.unwrap(verdict.html);
      resolution = await resolver.resolve(unwrapped, raw.attachments, raw.messageId);
    } catch (err) {
      return errored("Processing body failed", err);
    }

    let sanitized: StagedHtml<"sanitized">;
    let visible: boolean;
    try {
      sanitized = this.opts.sanitizer.sanitize(resolution.html);
      visible = hasVisibleContent(sanitized.html);
    } catch (err) {
      await resolver.discard(resolution.images);
      return errored("Sanitizing body failed", err);
    }
    const input: NewsletterInput = {
      messageId: raw.messageId,
      subject: raw.subject,
      senderName: raw.senderName,
      senderAddress: raw.senderAddress,
      receivedAt: raw.receivedAt,
      sanitizedHtml: sanitized.html,
      heroImagePath: resolution.heroImagePath,
      status: visible ? "published" : "draft-rejected",
      rejectionReason: visible ? null : EMPTY_BODY_REASON,
      authResults: verdict.auth,
      images: resolution.images,
    };

    try {
      if (existing) {
        const { superseded } = this.opts.store.replace(input);
        await this.removeFiles(superseded);
      } else {
        this.opts.store.insert(input);
      }
    } catch (err) {
      await this.removeFiles(resolution.images.map((i) => i.fileName));
      return errored("Storing newsletter failed", err);
    }

    this.logger.info(existing ? "Newsletter re-ingested" : "Newsletter ingested", {
      ...base,
      status: input.status,
      images: resolution.images.length,
    });
    return {
      ...base,
      state: "persisted",
      ...(visible ? {} : { reason: EMPTY_BODY_REASON }),
    };
  }

  private async removeFiles(fileNames: string[]): Promise<void> {
    for (const fileName of fileNames) {
      try {
        await this.opts.images.remove(fileName);
      } catch (err) {
        this.logger.error("Failed to remove image file", {
          fileName,
          error: errorMessage(err),
        });
      }
    }
  }
}
