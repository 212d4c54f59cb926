/**
 * Composition root: builds every component from an `IngestConfig`.
 */

import * as path from "node:path";
import type { IngestConfig } from "./config.js";
import { IngestEngine } from "./core/engine.js";
import { createLogger } from "./core/logger.js";
import { createOutputWriter } from "./core/output.js";
import { GRAPH_RATE_LIMIT, createRateLimiter } from "./core/rate-limiter.js";
import { StateManager } from "./core/state.js";
import type { Logger } from "./core/types.js";
import { MailClient } from "./graph/client.js";
import { FolderResolver } from "./graph/folders.js";
import { FileTokenCache } from "./graph/token-cache.js";
import { TokenProvider } from "./graph/token-provider.js";
import type { DeviceCodePrompt, FetchLike } from "./graph/types.js";
import { IngestCoordinator } from "./pipeline/coordinator.js";
import { LinkUnwrapper } from "./pipeline/links.js";
import { ContentSanitizer } from "./pipeline/sanitizer.js";
import { SenderValidator } from "./pipeline/sender.js";
import { ImageStore } from "./store/images.js";
import { SqliteNewsletterStore } from "./store/newsletters.js";

export interface AppOptions {
  /** Allow the device-code prompt; unattended runs pass false. */
  interactive?: boolean;
  onDeviceCode?: (prompt: DeviceCodePrompt) => void;
  fetch?: FetchLike;
  logger?: (component: string) => Logger;
}

export interface App {
  config: IngestConfig;
  tokens: TokenProvider;
  mail: MailClient;
  folders: FolderResolver;
  store: SqliteNewsletterStore;
  images: ImageStore;
  state: StateManager;
  engine: IngestEngine;
  close(): void;
}

export function stateFilePath(config: IngestConfig): string {
  return path.join(config.stateDir, "_meta", "state.json");
}

export function createApp(config: IngestConfig, opts: AppOptions = {}): App {
  const logger = opts.logger ?? createLogger;

  const tokens = new TokenProvider({
    config: config.auth,
    cache: new FileTokenCache(config.tokenCachePath, logger("auth")),
    logger: logger("auth"),
    fetch: opts.fetch,
    onDeviceCode: opts.onDeviceCode,
    interactive: opts.interactive ?? true,
    requestTimeoutMs: config.graph.requestTimeoutMs,
  });

  const mail = new MailClient({
    config: config.graph,
    tokens,
    rateLimiter: createRateLimiter(GRAPH_RATE_LIMIT),
    logger: logger("graph"),
    fetch: opts.fetch,
  });

  const folders = new FolderResolver(mail, logger("graph"));
  const store = new SqliteNewsletterStore(config.databasePath);
  const images = new ImageStore(createOutputWriter(config.imageDir), config.imageUrlPrefix);
  const state = new StateManager(stateFilePath(config));

  const coordinator = new IngestCoordinator({
    tokens,
    folders,
    mail,
    validator: new SenderValidator(config.allowedDomains),
    links: new LinkUnwrapper(config.redirectors, logger("links")),
    sanitizer: new ContentSanitizer(config.imageUrlPrefix),
    images,
    store,
    logger: logger("ingest"),
    folder: config.folder,
    maxMessages: config.maxMessages,
    maxImageBytes: config.maxImageBytes,
  });

  const engine = new IngestEngine({
    runner: coordinator,
    state,
    logger: logger("engine"),
  });

  return {
    config,
    tokens,
    mail,
    folders,
    store,
    images,
    state,
    engine,
    close: () => store.close(),
  };
}
