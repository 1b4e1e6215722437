/**
 * Relay Configuration
 *
 * Environment variables → ProviderManagerSettings. Importable by any module
 * that needs config without pulling in the manager.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from project root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, "../../.env") });

import type { ProviderConfig, ProviderId, ProviderManagerSettings } from "./llm/types.js";
import { resolveSettings } from "./llm/config.js";
import { ConfigurationError } from "./llm/errors.js";

export type Env = Record<string, string | undefined>;

// ============================================
// PARSERS
// ============================================

class EnvReader {
  readonly errors: string[] = [];

  constructor(private env: Env) {}

  raw(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  list(name: string): string[] | undefined {
    const value = this.raw(name);
    if (value === undefined) return undefined;
    return value.split(",").map(item => item.trim()).filter(Boolean);
  }

  integer(name: string): number | undefined {
    const value = this.raw(name);
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value)) {
      this.errors.push(`${name} must be a non-negative integer (got "${value}")`);
      return undefined;
    }
    return Number(value);
  }

  number(name: string, { positive = false } = {}): number | undefined {
    const value = this.raw(name);
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || (positive && parsed === 0)) {
      const expected = positive ? "a positive number" : "a non-negative number";
      this.errors.push(`${name} must be ${expected} (got "${value}")`);
      return undefined;
    }
    return parsed;
  }

  boolean(name: string): boolean | undefined {
    const value = this.raw(name)?.toLowerCase();
    if (value === undefined) return undefined;
    if (["true", "1", "yes", "on"].includes(value)) return true;
    if (["false", "0", "no", "off"].includes(value)) return false;
    this.errors.push(`${name} must be true or false (got "${value}")`);
    return undefined;
  }
}

/** "openai-compatible" → "OPENAI_COMPATIBLE" */
export function envKeyForProvider(id: ProviderId): string {
  return id.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

function readProviderConfig(reader: EnvReader, id: ProviderId): ProviderConfig {
  const prefix = `LLM_${envKeyForProvider(id)}_`;
  const bag: ProviderConfig = {};

  const apiKey = reader.raw(`${prefix}API_KEY`);
  const baseUrl = reader.raw(`${prefix}BASE_URL`);
  const model = reader.raw(`${prefix}MODEL`);
  const timeout = reader.number(`${prefix}TIMEOUT`, { positive: true });
  const enabled = reader.boolean(`${prefix}ENABLED`);

  if (apiKey !== undefined) bag.apiKey = apiKey;
  if (baseUrl !== undefined) bag.baseUrl = baseUrl;
  if (model !== undefined) bag.model = model;
  if (timeout !== undefined) bag.timeout = timeout;
  if (enabled !== undefined) bag.enabled = enabled;
  return bag;
}

// ============================================
// MANAGER SETTINGS
// ============================================

/**
 * Parse every LLM_* variable. Providers come from LLM_PROVIDERS, else from
 * `knownProviders` (normally the adapter registry's ids). Throws one
 * ConfigurationError naming every invalid variable.
 */
export function loadManagerSettings(
  env: Env = process.env,
  knownProviders: readonly ProviderId[] = [],
): ProviderManagerSettings {
  const reader = new EnvReader(env);

  const providerIds = reader.list("LLM_PROVIDERS") ?? [...knownProviders];
  const providerConfigs: Record<ProviderId, ProviderConfig> = {};
  for (const id of providerIds) {
    providerConfigs[id] = readProviderConfig(reader, id);
  }

  const settings: Partial<ProviderManagerSettings> = {
    providerConfigs,
    defaultProvider: reader.raw("LLM_DEFAULT_PROVIDER"),
    fallbackProviders: reader.list("LLM_FALLBACK_PROVIDERS"),
    maxRetries: reader.integer("LLM_MAX_RETRIES"),
    retryDelay: reader.number("LLM_RETRY_DELAY"),
    costCeiling: reader.number("LLM_COST_CEILING"),
    modelCacheTtl: reader.number("LLM_MODEL_CACHE_TTL", { positive: true }),
    highPriorityLatencyMs: reader.number("LLM_HIGH_PRIORITY_LATENCY_MS"),
  };

  if (reader.errors.length > 0) {
    throw new ConfigurationError(`Invalid relay configuration: ${reader.errors.join("; ")}`);
  }

  return resolveSettings(settings);
}
