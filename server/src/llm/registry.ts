/**
 * Adapter Registry + Live Provider Set
 *
 * AdapterRegistry says which vendor integrations exist; the application
 * builds one and hands it to the manager. ProviderSet holds the adapters
 * that actually initialized, in registration order.
 *
 * To add a provider:
 * 1. Implement ModelAdapter for it (outside this package)
 * 2. registry.register("your-provider", { create: config => new YourAdapter(config) })
 * 3. Add LLM_YOUR_PROVIDER_* variables to .env
 */

import type {
  ModelAdapter,
  ProviderConfig,
  ProviderHandle,
  ProviderId,
} from "./types.js";

// ============================================
// ADAPTER REGISTRY
// ============================================

export interface AdapterRegistration {
  create(config: ProviderConfig): ModelAdapter;
  /** Shallow-merged under the configured bag */
  defaultConfig?: ProviderConfig;
  /** Local providers skip the catalog prefetch at startup */
  isLocal?: boolean;
  /** Shown in log lines next to the id */
  displayName?: string;
}

export class AdapterRegistry {
  private registrations = new Map<ProviderId, AdapterRegistration>();

  register(id: ProviderId, registration: AdapterRegistration): this {
    if (this.registrations.has(id)) {
      throw new Error(`Provider adapter ${id} already registered.`);
    }
    this.registrations.set(id, registration);
    return this;
  }

  get(id: ProviderId): AdapterRegistration | undefined {
    return this.registrations.get(id);
  }

  has(id: ProviderId): boolean {
    return this.registrations.has(id);
  }

  ids(): ProviderId[] {
    return [...this.registrations.keys()];
  }

  /** Registry defaults with the configured values on top. */
  mergeConfig(id: ProviderId, config: ProviderConfig | undefined): ProviderConfig {
    const defaults = this.registrations.get(id)?.defaultConfig ?? {};
    return { ...defaults, ...config };
  }
}

// ============================================
// PROVIDER HANDLES
// ============================================

/**
 * Resolve an adapter's optional capabilities once, so nothing checks the
 * adapter on every call.
 */
export function createProviderHandle(
  id: ProviderId,
  adapter: ModelAdapter,
  config: ProviderConfig,
  options: Pick<AdapterRegistration, "isLocal" | "displayName"> = {},
): ProviderHandle {
  const { getModels, chatStream, cost } = adapter;
  return {
    id,
    displayName: options.displayName ?? id,
    adapter,
    config: Object.freeze({ ...config }),
    isLocal: options.isLocal ?? false,
    listModels: getModels ? () => getModels.call(adapter) : null,
    stream: chatStream ? (request) => chatStream.call(adapter, request) : null,
    cost: cost ? (model, usage) => cost.call(adapter, model, usage) : null,
  };
}

// ============================================
// LIVE PROVIDER SET
// ============================================

export class ProviderSet {
  private handles = new Map<ProviderId, ProviderHandle>();

  add(handle: ProviderHandle): void {
    if (this.handles.has(handle.id)) {
      throw new Error(`Provider ${handle.id} is already initialized`);
    }
    this.handles.set(handle.id, handle);
  }

  get(id: ProviderId): ProviderHandle | undefined {
    return this.handles.get(id);
  }

  has(id: ProviderId): boolean {
    return this.handles.has(id);
  }

  /** Registration order */
  ids(): ProviderId[] {
    return [...this.handles.keys()];
  }

  all(): ProviderHandle[] {
    return [...this.handles.values()];
  }

  get size(): number {
    return this.handles.size;
  }

  /** Comma-separated ids, or "none" */
  describe(): string {
    return this.size > 0 ? this.ids().join(", ") : "none";
  }
}
