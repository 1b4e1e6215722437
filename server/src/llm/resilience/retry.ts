/**
 * Retry Executor
 *
 * Runs one scheduled call with bounded retries and exponential backoff:
 * up to maxRetries extra attempts, sleeping retryDelay × 2^attempt seconds
 * between them. The last failure is rethrown as-is. Errors typed as
 * non-retryable end the loop at once.
 */

import type { ILogger } from "@llm-relay/shared/logging";
import type { ApiResponse, ProviderRequest, ScheduleResult } from "../types.js";
import type { RequestTrace } from "../traffic.js";
import { describeError, isRetryableError } from "../errors.js";

export interface RetryPolicy {
  maxRetries: number;
  /** Seconds */
  retryDelay: number;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function backoffDelayMs(attempt: number, retryDelaySeconds: number): number {
  return retryDelaySeconds * 1000 * 2 ** attempt;
}

export interface AttemptFailure {
  attempt: number;
  error: unknown;
  /** 0 on the final attempt */
  nextDelayMs: number;
}

/**
 * Generic loop: `operation` receives the zero-based attempt number.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  onAttemptFailed?: (failure: AttemptFailure) => void,
): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const maxRetries = Math.max(0, policy.maxRetries);

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const canRetry = attempt < maxRetries && isRetryableError(error);
      const nextDelayMs = canRetry ? backoffDelayMs(attempt, policy.retryDelay) : 0;
      onAttemptFailed?.({ attempt, error, nextDelayMs });
      if (!canRetry) throw error;
      await sleep(nextDelayMs);
    }
  }
}

/**
 * Copy of the caller's request pinned to the scheduled model.
 */
export function buildProviderRequest(request: ProviderRequest, model: string): ProviderRequest {
  return { ...request, model };
}

/**
 * Retry loop for one scheduled chat call. Only the first attempt emits the
 * "started" traffic event.
 */
export function runScheduledChat(
  schedule: ScheduleResult,
  request: ProviderRequest,
  policy: RetryPolicy,
  trace: RequestTrace,
  logger: ILogger,
): Promise<ApiResponse> {
  const providerRequest = buildProviderRequest(request, schedule.model);
  return executeWithRetry(
    (attempt) => {
      if (attempt === 0) trace.started(schedule.provider, schedule.model);
      return schedule.handle.adapter.chat(providerRequest);
    },
    policy,
    ({ attempt, error, nextDelayMs }) => {
      logger.warn("Provider attempt failed", {
        requestId: trace.requestId,
        provider: schedule.provider,
        model: schedule.model,
        attempt: attempt + 1,
        retryInMs: nextDelayMs,
        error: describeError(error),
      });
    },
  );
}
