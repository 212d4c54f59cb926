export { IngestCoordinator } from "./coordinator.js";
export type { IngestCoordinatorOptions } from "./coordinator.js";
export { hasVisibleContent } from "./html.js";
export { InlineImageResolver, normalizeContentId } from "./images.js";
export { LinkUnwrapper } from "./links.js";
export { ContentSanitizer } from "./sanitizer.js";
export { SenderValidator, parseAuthenticationResults, senderDomain } from "./sender.js";
export { staged } from "./types.js";
export type * from "./types.js";
