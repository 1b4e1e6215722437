/**
 * Pre-flight Estimates
 *
 * Rough token, cost and latency estimates used for scheduling and scoring.
 * Good enough to rank providers against each other, not for billing.
 */

import type { ILogger } from "@llm-relay/shared/logging";
import type {
  ApiResponse,
  ChatMessage,
  ProviderHandle,
  ProviderId,
  ProviderMetrics,
  ProviderRequest,
  TokenUsage,
} from "../types.js";
import {
  DEFAULT_COMPLETION_TOKENS,
  DEFAULT_LATENCIES,
  FALLBACK_LATENCY_MS,
} from "../config.js";
import { describeError } from "../errors.js";

// ============================================
// TOKENS
// ============================================

function contentLength(message: ChatMessage): number {
  return typeof message.content === "string"
    ? message.content.length
    : JSON.stringify(message.content).length;
}

/**
 * ~4 characters per token across the whole conversation.
 */
export function estimateTokens(messages: readonly ChatMessage[]): number {
  let totalChars = 0;
  for (const message of messages) {
    totalChars += contentLength(message);
  }
  return Math.floor(totalChars / 4);
}

export function estimateUsage(request: ProviderRequest): TokenUsage {
  const promptTokens = estimateTokens(request.messages);
  const completionTokens = request.maxTokens ?? DEFAULT_COMPLETION_TOKENS;
  return {
    promptTokens,
    completionTokens,
    totalTokens: promptTokens + completionTokens,
  };
}

/**
 * True when any message carries an image part.
 */
export function hasMultimodalContent(messages: readonly ChatMessage[]): boolean {
  return messages.some(message =>
    typeof message.content !== "string" &&
    message.content.some(part => part.type === "image_url"),
  );
}

// ============================================
// COST
// ============================================

/** Zero when the adapter has no cost function. */
export function estimateCost(handle: ProviderHandle, model: string, request: ProviderRequest): number {
  if (!handle.cost) return 0;
  return handle.cost(model, estimateUsage(request));
}

// ============================================
// LATENCY
// ============================================

/**
 * Static table until the provider has completed a real attempt, then the
 * observed rolling average.
 */
export function estimateLatency(
  provider: ProviderId,
  metrics: ProviderMetrics | undefined,
  overrides?: Record<ProviderId, number>,
): number {
  if (metrics && metrics.requestCount > 0) {
    return Math.round(metrics.averageLatency);
  }
  return overrides?.[provider] ?? DEFAULT_LATENCIES[provider] ?? FALLBACK_LATENCY_MS;
}

/** Cost of a completed response from its reported usage; zero without usage or a cost function. */
export function responseCost(handle: ProviderHandle, response: ApiResponse): number {
  if (!handle.cost || !response.usage) return 0;
  return handle.cost(response.model, response.usage);
}

/** responseCost() for metrics: a throwing cost function is logged and counts as zero. */
export function metricsCost(handle: ProviderHandle, response: ApiResponse, logger: ILogger): number {
  try {
    return responseCost(handle, response);
  } catch (error) {
    logger.warn("Cost calculation failed", {
      provider: handle.id,
      model: response.model,
      error: describeError(error),
    });
    return 0;
  }
}
