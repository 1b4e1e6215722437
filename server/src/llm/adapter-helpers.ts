/**
 * Adapter Helpers
 *
 * Building blocks for ModelAdapter implementations. The manager never calls
 * these itself; adapters use them for their cost() and validateConfig().
 */

import type { PricingInfo, ProviderConfig, TokenUsage, ValidationResult } from "./types.js";

const TOKENS_PER_PRICE_UNIT = 1_000_000;

/**
 * Cost of a call from per-million-token prices. Cache writes and reads are
 * billed only when both the usage and the price are present.
 */
export function calculateCostFromPricing(pricing: PricingInfo, usage: TokenUsage): number {
  const inputCost = (usage.promptTokens / TOKENS_PER_PRICE_UNIT) * pricing.inputPrice;
  const outputCost = (usage.completionTokens / TOKENS_PER_PRICE_UNIT) * pricing.outputPrice;

  let cacheCost = 0;
  if (usage.cacheCreationInputTokens && pricing.cacheWritesPrice) {
    cacheCost += (usage.cacheCreationInputTokens / TOKENS_PER_PRICE_UNIT) * pricing.cacheWritesPrice;
  }
  if (usage.cacheReadInputTokens && pricing.cacheReadsPrice) {
    cacheCost += (usage.cacheReadInputTokens / TOKENS_PER_PRICE_UNIT) * pricing.cacheReadsPrice;
  }

  return inputCost + outputCost + cacheCost;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export interface ConfigRequirements {
  /** Local servers usually need no key (default: true) */
  requiresApiKey?: boolean;
}

export function validateProviderConfig(
  config: ProviderConfig,
  requirements: ConfigRequirements = {},
): ValidationResult {
  const errors: string[] = [];

  if ((requirements.requiresApiKey ?? true) && !config.apiKey) {
    errors.push("API key is required");
  }
  if (config.baseUrl !== undefined && !isHttpUrl(config.baseUrl)) {
    errors.push(`Invalid base URL: ${config.baseUrl}`);
  }

  return { isValid: errors.length === 0, errors };
}
