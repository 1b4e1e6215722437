/**
 * Error Taxonomy
 *
 * Retry and failover decisions are made on these types, never on message text.
 */

import type { ProviderId } from "./types.js";

export type LLMRelayErrorCode =
  | "CONFIGURATION"
  | "TRANSIENT_PROVIDER"
  | "PROVIDER_REQUEST"
  | "MODEL_UNAVAILABLE"
  | "STREAMING_UNSUPPORTED"
  | "EXHAUSTED_FAILOVER";

export abstract class LLMRelayError extends Error {
  abstract readonly code: LLMRelayErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unresolvable provider or model. Never retried, never failed over. */
export class ConfigurationError extends LLMRelayError {
  readonly code = "CONFIGURATION";
  readonly retryable = false;
}

/** Network, timeout or rate-limit failure reported by an adapter. */
export class TransientProviderError extends LLMRelayError {
  readonly code = "TRANSIENT_PROVIDER";
  readonly retryable = true;

  constructor(
    message: string,
    readonly provider?: ProviderId,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** HTTP status codes that indicate a transient failure */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/** Adapter failure carrying an HTTP-like status. */
export class ProviderRequestError extends LLMRelayError {
  readonly code = "PROVIDER_REQUEST";
  readonly retryable: boolean;

  constructor(
    readonly status: number,
    message: string,
    readonly provider?: ProviderId,
    options?: { cause?: unknown },
  ) {
    super(`API error ${status}: ${message}`, options);
    this.retryable = RETRYABLE_STATUS_CODES.has(status) || status >= 500;
  }
}

/** An explicitly requested model is not in the provider's live catalog. */
export class ModelUnavailableError extends LLMRelayError {
  readonly code = "MODEL_UNAVAILABLE";
  readonly retryable = false;

  constructor(
    readonly model: string,
    readonly provider: ProviderId,
  ) {
    super(`Model ${model} is not available for provider ${provider}`);
  }
}

/**
 * The scheduled provider has no chatStream. Not retried; on the stream path
 * it goes to failover, which answers without streaming.
 */
export class StreamingUnsupportedError extends LLMRelayError {
  readonly code = "STREAMING_UNSUPPORTED";
  readonly retryable = false;

  constructor(readonly provider: ProviderId) {
    super(`Provider ${provider} does not support streaming`);
  }
}

/**
 * Every configured fallback was attempted and failed. `cause` is the primary
 * provider's failure; `lastError` is the final fallback's.
 */
export class ExhaustedFailoverError extends LLMRelayError {
  readonly code = "EXHAUSTED_FAILOVER";
  readonly retryable = false;

  constructor(
    readonly lastError: unknown,
    readonly attempted: ProviderId[],
    originalError: unknown,
  ) {
    super(
      `All fallback providers failed (${attempted.join(", ")}): ${describeError(lastError)}`,
      { cause: originalError },
    );
  }
}

// ============================================
// HELPERS
// ============================================

/**
 * Whether another attempt against the same provider may succeed.
 * Errors that did not come from this module are assumed transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof LLMRelayError) return error.retryable;
  return true;
}

/** Errors that must reach the caller untouched, without failover. */
export function isCallerError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof ModelUnavailableError;
}

const MAX_DESCRIBED_LENGTH = 200;

/** Single-line, bounded rendering of any thrown value. */
export function describeError(error: unknown): string {
  const raw = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  const line = raw.replace(/\s+/g, " ").trim();
  return line.length > MAX_DESCRIBED_LENGTH ? `${line.substring(0, MAX_DESCRIBED_LENGTH - 3)}...` : line;
}
