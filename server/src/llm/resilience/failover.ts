/**
 * Failover Coordinator
 *
 * Runs only after the retry executor has given up on the primary provider.
 * Walks the configured fallback list in order, one attempt per fallback and
 * no nested retries. Fallbacks are never scored.
 */

import type { ILogger } from "@llm-relay/shared/logging";
import type { ApiResponse, ProviderId, ProviderRequest, ScheduleResult } from "../types.js";
import type { MetricsRegistry } from "../metrics/metrics-registry.js";
import { scheduleForProvider, type SchedulingContext } from "../selection/scheduler.js";
import { metricsCost } from "../selection/estimate.js";
import { ExhaustedFailoverError, describeError } from "../errors.js";
import { buildProviderRequest } from "./retry.js";

export interface FailoverOptions {
  ctx: SchedulingContext;
  metrics: MetricsRegistry;
  fallbackProviders: readonly ProviderId[];
  failedProvider: ProviderId;
  request: ProviderRequest;
  originalError: unknown;
  logger: ILogger;
  /** Clock in ms (default Date.now) */
  now?: () => number;
}

export interface FailoverResult {
  response: ApiResponse;
  schedule: ScheduleResult;
  latencyMs: number;
}

/**
 * First fallback to succeed wins. With nothing to try, the original error is
 * rethrown unchanged; when everything was tried and failed, an
 * ExhaustedFailoverError carries both the original and the last error.
 */
export async function runFailover(options: FailoverOptions): Promise<FailoverResult> {
  const { ctx, metrics, request, failedProvider, originalError, logger } = options;
  const now = options.now ?? (() => Date.now());
  const attempted: ProviderId[] = [];
  let lastError: unknown;

  // A pinned model or provider may not exist on the fallback
  const fallbackRequest: ProviderRequest = { ...request, model: undefined, provider: undefined };

  for (const fallbackProvider of options.fallbackProviders) {
    if (fallbackProvider === failedProvider) continue;
    if (!ctx.providers.has(fallbackProvider)) continue;

    attempted.push(fallbackProvider);
    logger.info("Attempting fallback provider", {
      from: failedProvider,
      to: fallbackProvider,
      name: ctx.providers.get(fallbackProvider)?.displayName,
    });

    let schedule: ScheduleResult;
    try {
      schedule = await scheduleForProvider(ctx, fallbackProvider, fallbackRequest);
    } catch (error) {
      lastError = error;
      logger.warn("Fallback provider could not be scheduled", {
        provider: fallbackProvider,
        error: describeError(error),
      });
      continue;
    }

    const startedAt = now();
    let response: ApiResponse;
    try {
      response = await schedule.handle.adapter.chat(buildProviderRequest(fallbackRequest, schedule.model));
    } catch (error) {
      metrics.recordFailure(fallbackProvider, now() - startedAt);
      lastError = error;
      logger.warn("Fallback provider also failed", {
        provider: fallbackProvider,
        name: schedule.handle.displayName,
        model: schedule.model,
        error: describeError(error),
      });
      continue;
    }

    const latencyMs = now() - startedAt;
    metrics.recordSuccess(fallbackProvider, latencyMs, metricsCost(schedule.handle, response, logger));
    logger.info("Fallback provider succeeded", {
      provider: fallbackProvider,
      name: schedule.handle.displayName,
      model: schedule.model,
      latencyMs,
    });
    return { response, schedule, latencyMs };
  }

  if (attempted.length === 0) {
    throw originalError;
  }
  throw new ExhaustedFailoverError(lastError, attempted, originalError);
}
