/**
 * LLM Type Definitions
 *
 * Pure types and interfaces for the provider-orchestration layer.
 * No runtime values — defaults and tables live in ./config.ts.
 */

// ============================================
// CORE TYPES
// ============================================

/** Stable name of a configured backend, e.g. "openai" or "ollama". */
export type ProviderId = string;

export type RequestPriority = "low" | "medium" | "high";

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface TextPart {
  type: "text";
  text: string;
}

export interface ImageUrlPart {
  type: "image_url";
  image_url: { url: string; detail?: "auto" | "low" | "high" };
}

export type ContentPart = TextPart | ImageUrlPart;

export interface ChatMessage {
  readonly role: MessageRole;
  /** Plain text, or structured parts for multimodal input */
  readonly content: string | readonly ContentPart[];
  readonly tool_calls?: readonly ToolCall[];
  readonly tool_call_id?: string;
}

// ============================================
// NATIVE FUNCTION CALLING TYPES
// ============================================

export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>; // JSON Schema
  };
}

export interface ToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export type ToolChoice = "auto" | "none" | "required" | { type: "function"; function: { name: string } };

// ============================================
// REQUEST / RESPONSE
// ============================================

export interface ProviderRequest {
  messages: readonly ChatMessage[];
  /** Explicit model; checked against the provider's live catalog */
  model?: string;
  /** Explicit provider; defaults to the manager's configured default */
  provider?: ProviderId;
  maxTokens?: number;
  temperature?: number;
  stream?: boolean;
  /** Defaults to "medium" */
  priority?: RequestPriority;
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
  system?: string;
  reasoningBudget?: number;
  /** Correlation ids — logging and metrics only, never routing */
  userId?: string;
  sessionId?: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  cacheCreationInputTokens?: number;
  cacheReadInputTokens?: number;
}

export type FinishReason = "stop" | "length" | "tool_calls" | "content_filter" | "error" | (string & {});

export interface ChatChoice {
  index: number;
  message?: ChatMessage;
  finish_reason: FinishReason | null;
}

export interface ApiResponse {
  id: string;
  object: string;
  /** Unix seconds */
  created: number;
  model: string;
  choices: ChatChoice[];
  usage?: TokenUsage;
}

export interface ChunkDelta {
  role?: MessageRole;
  content?: string;
  tool_calls?: ToolCall[];
}

export interface ChunkChoice {
  index: number;
  delta: ChunkDelta;
  finish_reason: FinishReason | null;
}

export interface ChatChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: ChunkChoice[];
}

// ============================================
// MODEL CATALOG
// ============================================

/** Prices are per million tokens. */
export interface PricingInfo {
  inputPrice: number;
  outputPrice: number;
  cacheWritesPrice?: number;
  cacheReadsPrice?: number;
}

export interface ModelInfo {
  id: string;
  name?: string;
  contextWindow?: number;
  maxTokens?: number;
  supportsImages?: boolean;
  deprecated?: boolean;
  pricing?: PricingInfo;
}

// ============================================
// PROVIDER ADAPTER (external capability)
// ============================================

/**
 * Opaque per-provider configuration bag. The orchestration layer reads only
 * `model` (the provider's default model) and `enabled`.
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  timeout?: number;
  enabled?: boolean;
  [key: string]: unknown;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * What a vendor integration must provide. Only `chat` is required; the
 * optional members are resolved once at registration into a ProviderHandle.
 */
export interface ModelAdapter {
  chat(request: ProviderRequest): Promise<ApiResponse>;
  chatStream?(request: ProviderRequest): AsyncIterable<ChatChunk>;
  getModels?(): Promise<ModelInfo[]>;
  cost?(model: string, usage: TokenUsage): number;
  validateConfig?(config: ProviderConfig): ValidationResult;
}

/** A registered adapter with its optional capabilities resolved. */
export interface ProviderHandle {
  readonly id: ProviderId;
  /** Human-readable name for logs; the id when none was registered */
  readonly displayName: string;
  readonly adapter: ModelAdapter;
  readonly config: Readonly<ProviderConfig>;
  readonly isLocal: boolean;
  readonly listModels: (() => Promise<ModelInfo[]>) | null;
  readonly stream: ((request: ProviderRequest) => AsyncIterable<ChatChunk>) | null;
  readonly cost: ((model: string, usage: TokenUsage) => number) | null;
}

// ============================================
// SCHEDULING
// ============================================

export interface ScheduleResult {
  handle: ProviderHandle;
  provider: ProviderId;
  model: string;
  estimatedCost: number;
  /** Milliseconds */
  estimatedLatency: number;
}

export interface Candidate extends ScheduleResult {
  score: number;
}

// ============================================
// METRICS
// ============================================

export interface ProviderMetrics {
  requestCount: number;
  successCount: number;
  errorCount: number;
  /** Milliseconds */
  totalLatency: number;
  averageLatency: number;
  totalCost: number;
}

// ============================================
// MANAGER SETTINGS
// ============================================

export interface ProviderManagerSettings {
  /** Provider id → opaque config. When non-empty, only these providers are activated. */
  providerConfigs: Record<ProviderId, ProviderConfig>;
  defaultProvider: ProviderId;
  fallbackProviders: ProviderId[];
  /** Additional attempts after the first (default 3) */
  maxRetries: number;
  /** Base backoff in seconds (default 1) */
  retryDelay: number;
  costCeiling?: number;
  /** Catalog TTL in seconds (default 600) */
  modelCacheTtl: number;
  /** High-priority requests treat slower candidates as unacceptable (default 5000ms) */
  highPriorityLatencyMs: number;
  /** Overrides for the static latency table, milliseconds */
  defaultLatencies?: Record<ProviderId, number>;
}
