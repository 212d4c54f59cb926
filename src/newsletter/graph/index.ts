export { MailClient, parseRetryAfter } from "./client.js";
export type { MailClientOptions } from "./client.js";
export { FolderResolver } from "./folders.js";
export { FileTokenCache } from "./token-cache.js";
export type { TokenCacheStore } from "./token-cache.js";
export { TokenProvider } from "./token-provider.js";
export type { TokenProviderOptions } from "./token-provider.js";
export type * from "./types.js";
