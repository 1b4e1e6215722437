/**
 * Scheduler
 *
 * Resolves a request to one concrete (provider, model) assignment.
 *
 * Two entry points:
 * 1. scheduleForProvider() — the named provider (request override or the
 *    configured default). This is the ordinary chat path and the failover path.
 * 2. discoverCandidates() + pickCandidate() — every initialized provider,
 *    scored. Only used when the caller asks for discovery explicitly.
 *
 * Both are plain functions over a SchedulingContext, so failover can schedule
 * against another provider without building a second manager.
 */

import type { ILogger } from "@llm-relay/shared/logging";
import type {
  Candidate,
  ModelInfo,
  ProviderHandle,
  ProviderId,
  ProviderManagerSettings,
  ProviderRequest,
  ScheduleResult,
} from "../types.js";
import type { ProviderSet } from "../registry.js";
import type { ModelCatalogCache } from "../catalog/model-cache.js";
import type { MetricsRegistry } from "../metrics/metrics-registry.js";
import { ConfigurationError, ModelUnavailableError, describeError } from "../errors.js";
import { estimateCost, estimateLatency, hasMultimodalContent } from "./estimate.js";
import { isAcceptable, rankCandidates, scoreCandidate } from "./scorer.js";

export interface SchedulingContext {
  providers: ProviderSet;
  catalog: ModelCatalogCache;
  metrics: MetricsRegistry;
  settings: Pick<ProviderManagerSettings, "costCeiling" | "highPriorityLatencyMs" | "defaultLatencies">;
  logger: ILogger;
}

// ============================================
// SINGLE-PROVIDER SCHEDULING
// ============================================

export function requireProvider(ctx: SchedulingContext, providerId: ProviderId): ProviderHandle {
  const handle = ctx.providers.get(providerId);
  if (!handle) {
    throw new ConfigurationError(
      `Provider ${providerId || "(none)"} is not initialized. Available providers: ${ctx.providers.describe()}`,
    );
  }
  return handle;
}

/**
 * Request override, else the provider's configured default model.
 */
export function resolveModel(handle: ProviderHandle, request: ProviderRequest): string {
  if (request.model) return request.model;
  const configured = handle.config.model;
  if (typeof configured === "string" && configured.length > 0) return configured;
  throw new ConfigurationError(
    `Model must be specified in the request or in the ${handle.id} provider config`,
  );
}

/**
 * Cross-check a model against the provider's live catalog. A catalog that
 * cannot be fetched, or is empty, is not grounds to refuse the request.
 */
export async function ensureModelAvailable(
  ctx: SchedulingContext,
  handle: ProviderHandle,
  model: string,
): Promise<void> {
  let models: ModelInfo[] | null;
  try {
    models = await ctx.catalog.get(handle);
  } catch (error) {
    ctx.logger.warn("Failed to fetch models, trusting requested model", {
      provider: handle.id,
      model,
      error: describeError(error),
    });
    return;
  }
  if (!models || models.length === 0) return;
  if (!models.some(m => m.id === model)) {
    throw new ModelUnavailableError(model, handle.id);
  }
}

export async function scheduleForProvider(
  ctx: SchedulingContext,
  providerId: ProviderId,
  request: ProviderRequest,
): Promise<ScheduleResult> {
  const handle = requireProvider(ctx, providerId);
  const model = resolveModel(handle, request);
  await ensureModelAvailable(ctx, handle, model);

  return {
    handle,
    provider: handle.id,
    model,
    estimatedCost: estimateCost(handle, model, request),
    estimatedLatency: estimateLatency(handle.id, ctx.metrics.peek(handle.id), ctx.settings.defaultLatencies),
  };
}

// ============================================
// DISCOVERY MODE
// ============================================

/**
 * Deprecated models never qualify; image input needs an image-capable model;
 * an explicit model narrows to that id.
 */
export function filterSuitableModels(models: ModelInfo[], request: ProviderRequest): ModelInfo[] {
  const needsImages = hasMultimodalContent(request.messages);
  return models.filter(model => {
    if (model.deprecated) return false;
    if (needsImages && !model.supportsImages) return false;
    if (request.model && model.id !== request.model) return false;
    return true;
  });
}

async function candidateModels(ctx: SchedulingContext, handle: ProviderHandle, request: ProviderRequest): Promise<ModelInfo[]> {
  const catalog = await ctx.catalog.get(handle);
  if (catalog) return filterSuitableModels(catalog, request);

  // No catalog: the configured model is the only candidate we know of
  const configured = request.model ?? handle.config.model;
  if (typeof configured !== "string" || configured.length === 0) return [];
  if (hasMultimodalContent(request.messages)) return [];
  return [{ id: configured }];
}

/**
 * Score every suitable (provider, model) pair, best first. Providers whose
 * catalog cannot be fetched are skipped with a warning.
 */
export async function discoverCandidates(
  ctx: SchedulingContext,
  request: ProviderRequest,
): Promise<Candidate[]> {
  const priority = request.priority ?? "medium";
  const candidates: Candidate[] = [];

  for (const handle of ctx.providers.all()) {
    let models: ModelInfo[];
    try {
      models = await candidateModels(ctx, handle, request);
    } catch (error) {
      ctx.logger.warn("Failed to get models, skipping provider", {
        provider: handle.id,
        error: describeError(error),
      });
      continue;
    }

    const estimatedLatency = estimateLatency(handle.id, ctx.metrics.peek(handle.id), ctx.settings.defaultLatencies);
    for (const model of models) {
      const estimatedCost = estimateCost(handle, model.id, request);
      candidates.push({
        handle,
        provider: handle.id,
        model: model.id,
        estimatedCost,
        estimatedLatency,
        score: scoreCandidate(estimatedCost, estimatedLatency, priority, ctx.settings.costCeiling),
      });
    }
  }

  return rankCandidates(candidates);
}

/**
 * Choose from ranked candidates: the configured default provider's best
 * candidate when it is acceptable, else the top-scored one.
 */
export function pickCandidate(
  ctx: SchedulingContext,
  candidates: Candidate[],
  request: ProviderRequest,
  defaultProvider: ProviderId,
): Candidate {
  const best = candidates[0];
  if (!best) {
    throw new ConfigurationError(
      `No suitable providers or models found for the request. Available providers: ${ctx.providers.describe()}`,
    );
  }

  const preferred = candidates.find(c => c.provider === defaultProvider);
  if (
    preferred &&
    isAcceptable(preferred, request.priority ?? "medium", ctx.settings.highPriorityLatencyMs, ctx.settings.costCeiling)
  ) {
    return preferred;
  }
  return best;
}
