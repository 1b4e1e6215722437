/**
 * Model Catalog Cache
 *
 * Per-provider (models, fetchedAt) with one shared TTL. Lookups fresher than
 * the TTL are served from memory; anything older is refetched and replaced.
 * A background timer drops expired entries every TTL/2 whether or not anyone
 * asks for them.
 *
 * Not locked: two callers refreshing the same stale entry both fetch and the
 * later write wins.
 */

import type { ILogger } from "@llm-relay/shared/logging";
import type { ModelInfo, ProviderHandle, ProviderId } from "../types.js";
import { describeError } from "../errors.js";

interface CatalogEntry {
  models: ModelInfo[];
  fetchedAt: number;
}

export interface ModelCatalogCacheOptions {
  ttlSeconds: number;
  logger: ILogger;
  /** Clock in ms (default Date.now) */
  now?: () => number;
}

export class ModelCatalogCache {
  private entries = new Map<ProviderId, CatalogEntry>();
  private readonly ttlMs: number;
  private readonly log: ILogger;
  private readonly now: () => number;
  private evictionTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ModelCatalogCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.log = options.logger;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Catalog for a provider, refetched when missing or stale.
   * Returns null when the adapter exposes no catalog. Fetch errors propagate.
   */
  async get(handle: ProviderHandle): Promise<ModelInfo[] | null> {
    if (!handle.listModels) return null;

    const cached = this.entries.get(handle.id);
    if (cached && this.isFresh(cached)) {
      return cached.models;
    }

    const models = await handle.listModels();
    this.entries.set(handle.id, { models, fetchedAt: this.now() });
    this.log.debug("Model catalog refreshed", { provider: handle.id, models: models.length });
    return models;
  }

  /** Whether an entry is held, fresh or not. */
  has(provider: ProviderId): boolean {
    return this.entries.has(provider);
  }

  private isFresh(entry: CatalogEntry): boolean {
    return this.now() - entry.fetchedAt <= this.ttlMs;
  }

  // ============================================
  // EVICTION
  // ============================================

  /** Drop every entry older than the TTL. Returns the evicted provider ids. */
  sweep(): ProviderId[] {
    const evicted: ProviderId[] = [];
    for (const [provider, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(provider);
        evicted.push(provider);
      }
    }
    if (evicted.length > 0) {
      this.log.debug("Evicted expired model catalogs", { providers: evicted });
    }
    return evicted;
  }

  startEviction(): void {
    if (this.evictionTimer) return;
    const intervalMs = Math.max(1, Math.floor(this.ttlMs / 2));
    this.evictionTimer = setInterval(() => {
      try {
        this.sweep();
      } catch (error) {
        this.log.error("Model catalog sweep failed", error, { reason: describeError(error) });
      }
    }, intervalMs);
    // Don't keep the process alive for cache housekeeping
    this.evictionTimer.unref?.();
  }

  stopEviction(): void {
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }
  }

  get evictionRunning(): boolean {
    return this.evictionTimer !== null;
  }
}
