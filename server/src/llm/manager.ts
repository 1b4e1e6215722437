/**
 * Provider Manager
 *
 * Application-facing facade over the orchestration layer. Owns the live
 * provider set, metrics, model catalog cache and its eviction timer.
 *
 *   chat() → schedule → retry executor → metrics → response
 *                                     ↘ (exhausted) failover coordinator
 *
 * Providers are fixed at initialize(); to add one, build a new manager.
 */

import type { ILogger } from "@llm-relay/shared/logging";
import { createComponentLogger } from "../logging.js";
import type {
  ApiResponse,
  Candidate,
  ChatChunk,
  ProviderId,
  ProviderManagerSettings,
  ProviderMetrics,
  ProviderRequest,
  RequestPriority,
  ScheduleResult,
} from "./types.js";
import { resolveSettings } from "./config.js";
import { AdapterRegistry, ProviderSet, createProviderHandle } from "./registry.js";
import { ModelCatalogCache } from "./catalog/model-cache.js";
import { MetricsRegistry } from "./metrics/metrics-registry.js";
import {
  discoverCandidates,
  pickCandidate,
  scheduleForProvider,
  type SchedulingContext,
} from "./selection/scheduler.js";
import { scoreCandidate } from "./selection/scorer.js";
import { estimateLatency, metricsCost } from "./selection/estimate.js";
import { runScheduledChat, buildProviderRequest, type RetryPolicy } from "./resilience/retry.js";
import { runFailover } from "./resilience/failover.js";
import { chunkContent, errorChunk, synthesizeChunks } from "./resilience/stream.js";
import { RequestTrace } from "./traffic.js";
import { StreamingUnsupportedError, describeError, isCallerError } from "./errors.js";

export interface ProviderManagerOptions {
  /** Defaults to the "relay.providers" component logger */
  logger?: ILogger;
  /** Backoff sleep, injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Clock in ms (default Date.now) */
  now?: () => number;
}

export class ProviderManager {
  private readonly settings: ProviderManagerSettings;
  private readonly providers = new ProviderSet();
  private readonly metrics = new MetricsRegistry();
  private readonly catalog: ModelCatalogCache;
  private readonly ctx: SchedulingContext;
  private readonly log: ILogger;
  private readonly trafficLog: ILogger;
  private readonly retryPolicy: RetryPolicy;
  private readonly now: () => number;
  private defaultProvider: ProviderId;
  private initialized = false;

  constructor(
    private readonly registry: AdapterRegistry,
    settings: Partial<ProviderManagerSettings> = {},
    options: ProviderManagerOptions = {},
  ) {
    this.settings = resolveSettings(settings);
    this.defaultProvider = this.settings.defaultProvider;
    this.log = options.logger ?? createComponentLogger("providers");
    this.trafficLog = this.log.child({ component: "relay.traffic" });
    this.now = options.now ?? (() => Date.now());
    this.retryPolicy = {
      maxRetries: this.settings.maxRetries,
      retryDelay: this.settings.retryDelay,
      sleep: options.sleep,
    };
    this.catalog = new ModelCatalogCache({
      ttlSeconds: this.settings.modelCacheTtl,
      logger: this.log,
      now: options.now,
    });
    this.ctx = {
      providers: this.providers,
      catalog: this.catalog,
      metrics: this.metrics,
      settings: this.settings,
      logger: this.log,
    };
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  async initialize(): Promise<void> {
    if (this.initialized) {
      this.log.warn("Provider manager already initialized");
      return;
    }
    this.initialized = true;

    const configured = Object.keys(this.settings.providerConfigs);
    const allowed = configured.length > 0 ? new Set(configured) : null;

    for (const id of configured) {
      if (!this.registry.has(id)) {
        this.log.warn("No adapter registered for configured provider", { provider: id });
      }
    }

    this.log.info("Initializing providers", { registry: this.registry.ids() });

    for (const id of this.registry.ids()) {
      if (allowed && !allowed.has(id)) {
        this.log.debug("Skipping provider (not in active config)", { provider: id });
        continue;
      }
      await this.initializeProvider(id);
    }

    if (this.providers.size > 0 && !this.providers.has(this.defaultProvider)) {
      const replacement = this.providers.ids()[0];
      this.log.warn("Default provider is not initialized, falling back", {
        configured: this.defaultProvider || "(none)",
        replacement,
      });
      this.defaultProvider = replacement;
    }

    if (this.providers.size === 0) {
      this.log.warn("No providers initialized; requests will fail until a new manager is built");
    }

    this.catalog.startEviction();
    this.log.info("Provider manager ready", {
      providers: this.providers.ids(),
      defaultProvider: this.defaultProvider,
      fallbackProviders: this.settings.fallbackProviders,
    });
  }

  private async initializeProvider(id: ProviderId): Promise<void> {
    const registration = this.registry.get(id);
    if (!registration) return;

    const config = this.registry.mergeConfig(id, this.settings.providerConfigs[id]);
    if (config.enabled === false) {
      this.log.info("Provider disabled by config", { provider: id });
      return;
    }

    try {
      const adapter = registration.create(config);
      const validation = adapter.validateConfig?.(config);
      if (validation && !validation.isValid) {
        this.log.warn("Failed to initialize provider", { provider: id, errors: validation.errors });
        return;
      }

      const handle = createProviderHandle(id, adapter, config, registration);

      if (handle.listModels && !handle.isLocal) {
        try {
          await this.catalog.get(handle);
        } catch (error) {
          this.log.warn("Model prefetch failed", { provider: id, error: describeError(error) });
        }
      }

      this.providers.add(handle);
      this.log.info("Initialized provider", {
        provider: id,
        name: handle.displayName,
        catalogCached: this.catalog.has(id),
      });
    } catch (error) {
      this.log.error("Error initializing provider", error, { provider: id });
    }
  }

  async shutdown(): Promise<void> {
    this.catalog.stopEviction();
    this.log.info("Provider manager shut down");
    await this.log.flush();
  }

  // ============================================
  // SCHEDULING
  // ============================================

  schedule(request: ProviderRequest): Promise<ScheduleResult> {
    return scheduleForProvider(this.ctx, request.provider ?? this.defaultProvider, request);
  }

  /** Every suitable (provider, model) pair, best score first. */
  discover(request: ProviderRequest): Promise<Candidate[]> {
    return discoverCandidates(this.ctx, request);
  }

  async scheduleByScore(request: ProviderRequest): Promise<Candidate> {
    const candidates = await this.discover(request);
    return pickCandidate(this.ctx, candidates, request, this.defaultProvider);
  }

  // ============================================
  // CHAT
  // ============================================

  async chat(request: ProviderRequest): Promise<ApiResponse> {
    const trace = new RequestTrace(this.trafficLog, request);
    const schedule = await this.scheduleOrTrace(() => this.schedule(request), request, trace);
    return this.execute(schedule, request, trace);
  }

  /** Like chat(), but the provider and model come from discovery scoring. */
  async chatWithDiscovery(request: ProviderRequest): Promise<ApiResponse> {
    const trace = new RequestTrace(this.trafficLog, request);
    const schedule = await this.scheduleOrTrace(() => this.scheduleByScore(request), request, trace);
    return this.execute(schedule, request, trace);
  }

  private async scheduleOrTrace(
    schedule: () => Promise<ScheduleResult>,
    request: ProviderRequest,
    trace: RequestTrace,
  ): Promise<ScheduleResult> {
    try {
      return await schedule();
    } catch (error) {
      trace.error(
        { provider: request.provider ?? this.defaultProvider, model: request.model ?? "unknown", latencyMs: 0 },
        error,
      );
      throw error;
    }
  }

  private async execute(schedule: ScheduleResult, request: ProviderRequest, trace: RequestTrace): Promise<ApiResponse> {
    const startedAt = this.now();
    let response: ApiResponse;

    try {
      response = await runScheduledChat(schedule, request, this.retryPolicy, trace, this.log);
    } catch (error) {
      this.metrics.recordFailure(schedule.provider, this.now() - startedAt);

      if (isCallerError(error)) {
        trace.error({ provider: schedule.provider, model: schedule.model, latencyMs: this.now() - startedAt }, error);
        throw error;
      }

      this.log.warn("Request failed, handing off to fallbacks", {
        requestId: trace.requestId,
        provider: schedule.provider,
        model: schedule.model,
        error: describeError(error),
      });

      try {
        const fallback = await runFailover({
          ctx: this.ctx,
          metrics: this.metrics,
          fallbackProviders: this.settings.fallbackProviders,
          failedProvider: schedule.provider,
          request,
          originalError: error,
          logger: this.log,
          now: this.now,
        });
        trace.success(
          {
            provider: fallback.schedule.provider,
            model: fallback.schedule.model,
            latencyMs: this.now() - startedAt,
            fallbackFrom: schedule.provider,
          },
          fallback.response,
        );
        return fallback.response;
      } catch (failoverError) {
        trace.error(
          { provider: schedule.provider, model: schedule.model, latencyMs: this.now() - startedAt },
          failoverError,
        );
        throw failoverError;
      }
    }

    const latencyMs = this.now() - startedAt;
    this.metrics.recordSuccess(schedule.provider, latencyMs, metricsCost(schedule.handle, response, this.log));
    trace.success({ provider: schedule.provider, model: schedule.model, latencyMs }, response);
    return response;
  }

  // ============================================
  // STREAMING
  // ============================================

  /**
   * Proxy the provider's chunk stream. Never throws: a failed stream is
   * replaced by the failover result, or by a single error chunk. A consumer
   * that stops early still gets a stream_complete event, marked aborted.
   */
  async *chatStream(request: ProviderRequest): AsyncGenerator<ChatChunk, void, undefined> {
    const trace = new RequestTrace(this.trafficLog, request);

    let schedule: ScheduleResult;
    try {
      schedule = await this.schedule(request);
    } catch (error) {
      const model = request.model ?? "unknown";
      this.log.warn("Stream could not be scheduled", { requestId: trace.requestId, error: describeError(error) });
      trace.error({ provider: request.provider ?? this.defaultProvider, model, latencyMs: 0 }, error);
      yield errorChunk(model, trace.requestId);
      return;
    }

    const startedAt = this.now();
    let contentLength = 0;

    try {
      const stream = schedule.handle.stream;
      if (!stream) {
        throw new StreamingUnsupportedError(schedule.provider);
      }
      trace.started(schedule.provider, schedule.model);
      for await (const chunk of stream(buildProviderRequest(request, schedule.model))) {
        contentLength += chunkContent(chunk).length;
        yield chunk;
      }

      const latencyMs = this.now() - startedAt;
      this.metrics.recordSuccess(schedule.provider, latencyMs);
      trace.streamComplete({
        provider: schedule.provider,
        model: schedule.model,
        latencyMs,
        contentLength,
        synthesized: false,
      });
    } catch (error) {
      this.metrics.recordFailure(schedule.provider, this.now() - startedAt);
      this.log.warn("Stream failed", {
        requestId: trace.requestId,
        provider: schedule.provider,
        model: schedule.model,
        chunksContentLength: contentLength,
        error: describeError(error),
      });
      yield* this.streamFailover(error, request, schedule, trace, startedAt);
    } finally {
      // Reached without a terminal event only when the consumer closed the generator
      if (trace.finished === null) {
        const latencyMs = this.now() - startedAt;
        this.metrics.recordSuccess(schedule.provider, latencyMs);
        trace.streamComplete({
          provider: schedule.provider,
          model: schedule.model,
          latencyMs,
          contentLength,
          synthesized: false,
          aborted: true,
        });
      }
    }
  }

  private async *streamFailover(
    error: unknown,
    request: ProviderRequest,
    schedule: ScheduleResult,
    trace: RequestTrace,
    startedAt: number,
  ): AsyncGenerator<ChatChunk, void, undefined> {
    let chunks: ChatChunk[];
    try {
      const fallback = await runFailover({
        ctx: this.ctx,
        metrics: this.metrics,
        fallbackProviders: this.settings.fallbackProviders,
        failedProvider: schedule.provider,
        request,
        originalError: error,
        logger: this.log,
        now: this.now,
      });
      chunks = synthesizeChunks(fallback.response);
      trace.streamComplete({
        provider: fallback.schedule.provider,
        model: fallback.schedule.model,
        latencyMs: this.now() - startedAt,
        fallbackFrom: schedule.provider,
        contentLength: chunks.reduce((sum, chunk) => sum + chunkContent(chunk).length, 0),
        synthesized: true,
      });
    } catch (failoverError) {
      trace.error(
        { provider: schedule.provider, model: schedule.model, latencyMs: this.now() - startedAt },
        failoverError,
      );
      chunks = [errorChunk(schedule.model, trace.requestId)];
    }
    yield* chunks;
  }

  // ============================================
  // READ-ONLY HELPERS
  // ============================================

  score(cost: number, latencyMs: number, priority: RequestPriority = "medium"): number {
    return scoreCandidate(cost, latencyMs, priority, this.settings.costCeiling);
  }

  estimatedLatency(provider: ProviderId): number {
    return estimateLatency(provider, this.metrics.peek(provider), this.settings.defaultLatencies);
  }

  getMetrics(): Record<ProviderId, ProviderMetrics>;
  getMetrics(provider: ProviderId): ProviderMetrics;
  getMetrics(provider?: ProviderId): ProviderMetrics | Record<ProviderId, ProviderMetrics> {
    return provider === undefined ? this.metrics.snapshot() : this.metrics.get(provider);
  }

  getDefaultProvider(): ProviderId {
    return this.defaultProvider;
  }

  getAvailableProviders(): ProviderId[] {
    return this.providers.ids();
  }

  get isEvictionRunning(): boolean {
    return this.catalog.evictionRunning;
  }
}
