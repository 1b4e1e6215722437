/**
 * Provider Metrics Registry
 *
 * Per-provider request/success/error counters with cumulative latency and
 * cost. Each record* call runs to completion synchronously on the event loop,
 * which is what serializes concurrent updates: no await can split an
 * increment from its derived average.
 */

import type { ProviderId, ProviderMetrics } from "../types.js";

function emptyMetrics(): ProviderMetrics {
  return {
    requestCount: 0,
    successCount: 0,
    errorCount: 0,
    totalLatency: 0,
    averageLatency: 0,
    totalCost: 0,
  };
}

export class MetricsRegistry {
  private metrics = new Map<ProviderId, ProviderMetrics>();

  recordSuccess(provider: ProviderId, latencyMs: number, cost = 0): void {
    this.record(provider, latencyMs, true, cost);
  }

  recordFailure(provider: ProviderId, latencyMs: number): void {
    this.record(provider, latencyMs, false, 0);
  }

  private record(provider: ProviderId, latencyMs: number, ok: boolean, cost: number): void {
    const metrics = this.metrics.get(provider) ?? emptyMetrics();
    metrics.requestCount += 1;
    if (ok) {
      metrics.successCount += 1;
    } else {
      metrics.errorCount += 1;
    }
    metrics.totalLatency += Math.max(0, latencyMs);
    metrics.averageLatency = metrics.totalLatency / Math.max(1, metrics.requestCount);
    if (Number.isFinite(cost) && cost > 0) {
      metrics.totalCost += cost;
    }
    this.metrics.set(provider, metrics);
  }

  /** Live record; undefined until the provider's first attempt. */
  peek(provider: ProviderId): Readonly<ProviderMetrics> | undefined {
    return this.metrics.get(provider);
  }

  /** Copy, zeroed for providers that have not been used yet. */
  get(provider: ProviderId): ProviderMetrics {
    const metrics = this.metrics.get(provider);
    return metrics ? { ...metrics } : emptyMetrics();
  }

  snapshot(): Record<ProviderId, ProviderMetrics> {
    const result: Record<ProviderId, ProviderMetrics> = {};
    for (const [provider, metrics] of this.metrics) {
      result[provider] = { ...metrics };
    }
    return result;
  }
}
