/**
 * Resilience — Barrel Export
 */

export {
  executeWithRetry,
  runScheduledChat,
  buildProviderRequest,
  backoffDelayMs,
  defaultSleep,
  type RetryPolicy,
  type AttemptFailure,
} from "./retry.js";

export { runFailover, type FailoverOptions, type FailoverResult } from "./failover.js";

export { synthesizeChunks, errorChunk, chunkContent, STREAM_ERROR_MESSAGE } from "./stream.js";
