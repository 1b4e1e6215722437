/**
 * LLM Configuration — Defaults + Latency Table
 *
 * Static defaults for the provider manager. Environment parsing lives in
 * ../config.ts.
 */

import type { ProviderId, ProviderManagerSettings } from "./types.js";

// ============================================
// MANAGER DEFAULTS
// ============================================

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 1;
export const DEFAULT_MODEL_CACHE_TTL_SECONDS = 600;
export const DEFAULT_HIGH_PRIORITY_LATENCY_MS = 5000;

/** Completion tokens assumed for cost estimates when the request sets no maxTokens */
export const DEFAULT_COMPLETION_TOKENS = 1000;

// ============================================
// LATENCY TABLE
// ============================================

/**
 * Expected latency (ms) per provider before it has served a real request.
 * Once a provider has completed an attempt, the observed average replaces it.
 */
export const DEFAULT_LATENCIES: Record<ProviderId, number> = {
  openai: 2500,
  "openai-compatible": 2500,
  groq: 2000,
  zhipu: 2500,
  anthropic: 2000,
  openrouter: 3000,
  ollama: 500,
};

/** Latency assumed for providers missing from the table */
export const FALLBACK_LATENCY_MS = 3000;

// ============================================
// SETTINGS
// ============================================

/**
 * Fill in defaults for anything the caller left out.
 */
export function resolveSettings(settings: Partial<ProviderManagerSettings>): ProviderManagerSettings {
  const providerConfigs = settings.providerConfigs ?? {};
  return {
    providerConfigs,
    defaultProvider: settings.defaultProvider ?? Object.keys(providerConfigs)[0] ?? "",
    fallbackProviders: settings.fallbackProviders ?? [],
    maxRetries: settings.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryDelay: settings.retryDelay ?? DEFAULT_RETRY_DELAY_SECONDS,
    costCeiling: settings.costCeiling,
    modelCacheTtl: settings.modelCacheTtl ?? DEFAULT_MODEL_CACHE_TTL_SECONDS,
    highPriorityLatencyMs: settings.highPriorityLatencyMs ?? DEFAULT_HIGH_PRIORITY_LATENCY_MS,
    defaultLatencies: settings.defaultLatencies,
  };
}
