/**
 * Provider Manager Factory
 *
 * Builds and initializes a manager. Settings default to the LLM_* environment
 * (see ../config.ts), with the registry's ids as the provider list when
 * LLM_PROVIDERS is unset.
 *
 * ```typescript
 * const registry = new AdapterRegistry()
 *   .register("openai", { create: config => new MyOpenAIAdapter(config) })
 *   .register("ollama", { create: config => new MyOllamaAdapter(config), isLocal: true });
 *
 * const manager = await createProviderManager(registry);
 * const response = await manager.chat({ messages: [{ role: "user", content: "Hi" }] });
 * ```
 */

import { createComponentLogger } from "../logging.js";
import { loadManagerSettings } from "../config.js";
import type { ProviderManagerSettings } from "./types.js";
import type { AdapterRegistry } from "./registry.js";
import { ProviderManager, type ProviderManagerOptions } from "./manager.js";

const log = createComponentLogger("factory");

export async function createProviderManager(
  registry: AdapterRegistry,
  settings?: Partial<ProviderManagerSettings>,
  options: ProviderManagerOptions = {},
): Promise<ProviderManager> {
  const resolved = settings ?? loadManagerSettings(process.env, registry.ids());
  log.debug("Creating provider manager", {
    providers: Object.keys(resolved.providerConfigs ?? {}),
    source: settings ? "caller" : "environment",
  });

  const manager = new ProviderManager(registry, resolved, options);
  await manager.initialize();
  return manager;
}
