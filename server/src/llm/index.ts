/**
 * LLM Module — Barrel Export
 *
 * Provider orchestration over pluggable chat-completion adapters.
 *
 * Structure:
 *   types.ts          — Pure type definitions (no runtime values)
 *   config.ts         — Defaults + latency table
 *   errors.ts         — Error taxonomy driving retry and failover
 *   registry.ts       — Adapter registry + live provider set
 *   manager.ts        — ProviderManager facade
 *   factory.ts        — createProviderManager()
 *   traffic.ts        — Per-request traffic events
 *   adapter-helpers.ts — Pricing + config validation for adapter authors
 *   catalog/          — Model catalog cache with TTL eviction
 *   metrics/          — Per-provider counters
 *   selection/        — Estimates, scoring, scheduling, discovery
 *   resilience/       — Retry, failover, stream fallback chunks
 */

// Types
export type {
  ProviderId,
  RequestPriority,
  MessageRole,
  TextPart,
  ImageUrlPart,
  ContentPart,
  ChatMessage,
  ToolDefinition,
  ToolCall,
  ToolChoice,
  ProviderRequest,
  TokenUsage,
  FinishReason,
  ChatChoice,
  ApiResponse,
  ChunkDelta,
  ChunkChoice,
  ChatChunk,
  PricingInfo,
  ModelInfo,
  ProviderConfig,
  ValidationResult,
  ModelAdapter,
  ProviderHandle,
  ScheduleResult,
  Candidate,
  ProviderMetrics,
  ProviderManagerSettings,
} from "./types.js";

// Config
export {
  DEFAULT_LATENCIES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_SECONDS,
  DEFAULT_MODEL_CACHE_TTL_SECONDS,
  DEFAULT_HIGH_PRIORITY_LATENCY_MS,
  resolveSettings,
} from "./config.js";

// Errors
export {
  LLMRelayError,
  ConfigurationError,
  TransientProviderError,
  ProviderRequestError,
  ModelUnavailableError,
  StreamingUnsupportedError,
  ExhaustedFailoverError,
  isRetryableError,
  isCallerError,
  describeError,
  type LLMRelayErrorCode,
} from "./errors.js";

// Registry + manager
export { AdapterRegistry, ProviderSet, createProviderHandle, type AdapterRegistration } from "./registry.js";
export { ProviderManager, type ProviderManagerOptions } from "./manager.js";
export { createProviderManager } from "./factory.js";

// Building blocks
export { ModelCatalogCache, type ModelCatalogCacheOptions } from "./catalog/model-cache.js";
export { MetricsRegistry } from "./metrics/metrics-registry.js";
export { RequestTrace, TERMINAL_EVENTS, type TrafficEvent } from "./traffic.js";
export { calculateCostFromPricing, validateProviderConfig, type ConfigRequirements } from "./adapter-helpers.js";
export * from "./selection/index.js";
export * from "./resilience/index.js";
