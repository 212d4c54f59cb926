export { IngestEngine } from "./engine.js";
export type { IngestEngineOptions } from "./engine.js";
export {
  AuthError,
  GraphHttpError,
  IngestError,
  MalformedContentError,
  NotFoundError,
  PersistenceError,
  TransientNetworkError,
  errorMessage,
  isRunFatal,
} from "./errors.js";
export { ConsoleLogger, createLogger } from "./logger.js";
export { FileOutputWriter, createOutputWriter } from "./output.js";
export { GRAPH_RATE_LIMIT, SlidingWindowRateLimiter, createRateLimiter } from "./rate-limiter.js";
export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
export { messageSlug, slugify } from "./slugify.js";
export { StateManager } from "./state.js";
export type * from "./types.js";
