export { archivePath, exportArchive, toMarkdown } from "./archive.js";
export type { ExportOptions, ExportResult } from "./archive.js";
export { ImageStore } from "./images.js";
export { SqliteNewsletterStore } from "./newsletters.js";
export type * from "./types.js";
