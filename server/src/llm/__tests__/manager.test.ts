/**
 * ProviderManager Tests
 *
 * Covers:
 * - Initialization: active set, disabled/invalid adapters, prefetch, default reassignment
 * - chat(): success, retries then failover, caller errors, exhausted failover
 * - chatStream(): proxying, synthesized fallback chunks, error chunk, never throws,
 *   consumers that stop reading early
 * - Exactly one terminal traffic event per logical request
 * - Discovery scheduling and read-only helpers
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { ProviderManager } from "../manager.js";
import { AdapterRegistry } from "../registry.js";
import {
  ConfigurationError,
  ExhaustedFailoverError,
  ModelUnavailableError,
  TransientProviderError,
} from "../errors.js";
import { STREAM_ERROR_MESSAGE } from "../resilience/stream.js";
import type { ChatChunk, ModelAdapter, ProviderManagerSettings, ProviderRequest } from "../types.js";
import {
  collect,
  makeAdapter,
  makeChunk,
  makeLogger,
  makeResponse,
  MESSAGES,
  noSleep,
  trafficEvents,
} from "./fakes.js";

// ============================================
// HELPERS
// ============================================

const managers: ProviderManager[] = [];

afterEach(async () => {
  await Promise.all(managers.splice(0).map(m => m.shutdown()));
});

async function build(
  adapters: Record<string, ModelAdapter>,
  settings: Partial<ProviderManagerSettings> = {},
) {
  const registry = new AdapterRegistry();
  for (const [id, adapter] of Object.entries(adapters)) {
    registry.register(id, { create: () => adapter });
  }
  const logger = makeLogger();
  const manager = new ProviderManager(
    registry,
    {
      providerConfigs: Object.fromEntries(Object.keys(adapters).map(id => [id, { model: `${id}-1` }])),
      retryDelay: 0,
      ...settings,
    },
    { logger, sleep: noSleep },
  );
  managers.push(manager);
  await manager.initialize();
  return { manager, logger };
}

function request(sessionId: string, extra: Partial<ProviderRequest> = {}): ProviderRequest {
  return { messages: MESSAGES, sessionId, ...extra };
}

const alwaysFailing = (message = "upstream timeout") =>
  makeAdapter({ chat: async () => { throw new TransientProviderError(message); } });

function terminalEvents(events: Array<Record<string, unknown>>) {
  return events.filter(e => e.event !== "started");
}

// ============================================
// INITIALIZATION
// ============================================

describe("initialize", () => {
  it("activates configured providers in registration order", async () => {
    const { manager } = await build({ alpha: makeAdapter(), beta: makeAdapter() });

    expect(manager.getAvailableProviders()).toEqual(["alpha", "beta"]);
    expect(manager.getDefaultProvider()).toBe("alpha");
    expect(manager.isEvictionRunning).toBe(true);
  });

  it("activates only providers named in the config", async () => {
    const { manager } = await build(
      { alpha: makeAdapter(), beta: makeAdapter() },
      { providerConfigs: { beta: { model: "beta-1" } } },
    );

    expect(manager.getAvailableProviders()).toEqual(["beta"]);
    expect(manager.getDefaultProvider()).toBe("beta");
  });

  it("skips providers disabled by config", async () => {
    const { manager } = await build(
      { alpha: makeAdapter(), beta: makeAdapter() },
      { providerConfigs: { alpha: { model: "alpha-1" }, beta: { model: "beta-1", enabled: false } } },
    );

    expect(manager.getAvailableProviders()).toEqual(["alpha"]);
  });

  it("skips adapters that reject their config", async () => {
    const beta = makeAdapter();
    beta.validateConfig = () => ({ isValid: false, errors: ["API key is required"] });

    const { manager, logger } = await build({ alpha: makeAdapter(), beta });

    expect(manager.getAvailableProviders()).toEqual(["alpha"]);
    expect(logger.getRecentLogs().find(e => e.message === "Failed to initialize provider")?.data).toEqual({
      provider: "beta",
      errors: ["API key is required"],
    });
  });

  it("skips adapters whose factory throws", async () => {
    const registry = new AdapterRegistry()
      .register("alpha", { create: () => makeAdapter() })
      .register("broken", {
        create: () => {
          throw new Error("missing SDK");
        },
      });
    const manager = new ProviderManager(registry, {}, { logger: makeLogger(), sleep: noSleep });
    managers.push(manager);

    await manager.initialize();

    expect(manager.getAvailableProviders()).toEqual(["alpha"]);
  });

  it("prefetches remote catalogs but not local ones", async () => {
    const remoteModels = vi.fn(async () => [{ id: "alpha-1" }]);
    const localModels = vi.fn(async () => [{ id: "llama3" }]);
    const registry = new AdapterRegistry()
      .register("alpha", { create: () => makeAdapter({ models: remoteModels }) })
      .register("ollama", { create: () => makeAdapter({ models: localModels }), isLocal: true });
    const manager = new ProviderManager(registry, {}, { logger: makeLogger(), sleep: noSleep });
    managers.push(manager);

    await manager.initialize();

    expect(remoteModels).toHaveBeenCalledTimes(1);
    expect(localModels).not.toHaveBeenCalled();
    expect(manager.getAvailableProviders()).toEqual(["alpha", "ollama"]);
  });

  it("keeps providers whose prefetch fails", async () => {
    const { manager } = await build({
      alpha: makeAdapter({ models: async () => { throw new Error("catalog down"); } }),
    });

    expect(manager.getAvailableProviders()).toEqual(["alpha"]);
  });

  it("reassigns a default provider that did not initialize", async () => {
    const { manager, logger } = await build(
      { alpha: makeAdapter(), beta: makeAdapter() },
      { defaultProvider: "ghost" },
    );

    expect(manager.getDefaultProvider()).toBe("alpha");
    expect(logger.getRecentLogs().some(e => e.message === "Default provider is not initialized, falling back")).toBe(true);
  });

  it("logs the registered display name", async () => {
    const registry = new AdapterRegistry().register("alpha", {
      create: () => makeAdapter({ models: async () => [{ id: "alpha-1" }] }),
      displayName: "Alpha Cloud",
    });
    const logger = makeLogger();
    const manager = new ProviderManager(registry, {}, { logger, sleep: noSleep });
    managers.push(manager);

    await manager.initialize();

    const entry = logger.getRecentLogs().find(e => e.message === "Initialized provider");
    expect(entry?.data).toEqual({ provider: "alpha", name: "Alpha Cloud", catalogCached: true });
  });

  it("stops the eviction timer on shutdown", async () => {
    const { manager } = await build({ alpha: makeAdapter() });

    await manager.shutdown();

    expect(manager.isEvictionRunning).toBe(false);
  });
});

// ============================================
// CHAT
// ============================================

describe("chat", () => {
  it("schedules and serves a high-priority request on the default provider", async () => {
    const upstream = makeResponse("model-x", "Hi", { promptTokens: 100, completionTokens: 50, totalTokens: 150 });
    const primary = makeAdapter({ cost: 0.002, chat: async () => upstream });
    const { manager } = await build({ primary }, { providerConfigs: { primary: { model: "model-x" } } });
    const req = request("s-scenario-a", { priority: "high" });

    const scheduled = await manager.schedule(req);
    expect(scheduled.model).toBe("model-x");
    expect(scheduled.estimatedCost).toBeCloseTo(0.002);

    expect(await manager.chat(req)).toBe(upstream);
    expect(manager.getMetrics("primary")).toMatchObject({ successCount: 1, errorCount: 0 });
  });

  it("returns the primary provider's response", async () => {
    const alpha = makeAdapter({ cost: 0.003 });
    alpha.chat.mockImplementation(async (req: ProviderRequest) =>
      makeResponse(req.model ?? "?", "Hello!", { promptTokens: 3, completionTokens: 2, totalTokens: 5 }),
    );
    const { manager, logger } = await build({ alpha, beta: makeAdapter() });

    const response = await manager.chat(request("s-ok"));

    expect(response.model).toBe("alpha-1");
    expect(alpha.chat).toHaveBeenCalledWith({ messages: MESSAGES, sessionId: "s-ok", model: "alpha-1" });
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, successCount: 1, errorCount: 0, totalCost: 0.003 });
    expect(trafficEvents(logger, "s-ok").map(e => e.event)).toEqual(["started", "success"]);
  });

  it("returns the response when its cost cannot be computed", async () => {
    const usage = { promptTokens: 3, completionTokens: 2, totalTokens: 5 };
    const alpha = makeAdapter({ chat: async () => makeResponse("alpha-1-0613", "Hello!", usage) });
    alpha.cost = (model: string) => {
      if (model === "alpha-1-0613") throw new Error("no price for alpha-1-0613");
      return 0;
    };
    const beta = makeAdapter();
    const { manager, logger } = await build({ alpha, beta }, { fallbackProviders: ["beta"] });

    const response = await manager.chat(request("s-cost"));

    expect(response.model).toBe("alpha-1-0613");
    expect(beta.chat).not.toHaveBeenCalled();
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, successCount: 1, totalCost: 0 });
    expect(trafficEvents(logger, "s-cost").map(e => e.event)).toEqual(["started", "success"]);
  });

  it("honours a provider override on the request", async () => {
    const beta = makeAdapter();
    const { manager } = await build({ alpha: makeAdapter(), beta });

    const response = await manager.chat(request("s-override", { provider: "beta" }));

    expect(response.model).toBe("beta-1");
    expect(beta.chat).toHaveBeenCalledTimes(1);
  });

  it("retries the primary, then fails over to the first working fallback", async () => {
    const alpha = alwaysFailing();
    const beta = makeAdapter();
    const { manager, logger } = await build(
      { alpha, beta },
      { fallbackProviders: ["beta"], maxRetries: 2 },
    );

    const response = await manager.chat(request("s-failover", { model: "alpha-1" }));

    expect(alpha.chat).toHaveBeenCalledTimes(3);
    expect(beta.chat).toHaveBeenCalledTimes(1);
    expect(beta.chat).toHaveBeenCalledWith({
      messages: MESSAGES,
      sessionId: "s-failover",
      model: "beta-1",
      provider: undefined,
    });
    expect(response.model).toBe("beta-1");

    // One logical failure for the primary, however many attempts it took
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, successCount: 0, errorCount: 1 });
    expect(manager.getMetrics("beta")).toMatchObject({ requestCount: 1, successCount: 1 });

    const events = trafficEvents(logger, "s-failover");
    expect(events.map(e => e.event)).toEqual(["started", "success"]);
    expect(events[1]).toMatchObject({ provider: "beta", model: "beta-1", fallbackFrom: "alpha" });
  });

  it("backs off exponentially between attempts", async () => {
    const registry = new AdapterRegistry().register("alpha", { create: () => alwaysFailing() });
    const sleep = vi.fn(async (_ms: number) => {});
    const manager = new ProviderManager(
      registry,
      { providerConfigs: { alpha: { model: "alpha-1" } }, maxRetries: 3, retryDelay: 1 },
      { logger: makeLogger(), sleep },
    );
    managers.push(manager);
    await manager.initialize();

    await expect(manager.chat(request("s-backoff"))).rejects.toThrow("upstream timeout");

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  it("rethrows the primary error when there is no fallback", async () => {
    const { manager, logger } = await build({ alpha: alwaysFailing("primary down") }, { maxRetries: 0 });

    await expect(manager.chat(request("s-nofallback"))).rejects.toThrow("primary down");

    const events = trafficEvents(logger, "s-nofallback");
    expect(events.map(e => e.event)).toEqual(["started", "error"]);
    expect(events[1]).toMatchObject({ provider: "alpha", error: "TransientProviderError: primary down" });
  });

  it("throws ExhaustedFailoverError when every fallback fails", async () => {
    const original = new TransientProviderError("alpha down");
    const alpha = makeAdapter({ chat: async () => { throw original; } });
    const { manager, logger } = await build(
      { alpha, beta: alwaysFailing("beta down"), gamma: alwaysFailing("gamma down") },
      { fallbackProviders: ["beta", "gamma"], maxRetries: 0 },
    );

    const error = await manager.chat(request("s-exhausted")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExhaustedFailoverError);
    if (!(error instanceof ExhaustedFailoverError)) return;
    expect(error.cause).toBe(original);
    expect(error.attempted).toEqual(["beta", "gamma"]);
    expect(terminalEvents(trafficEvents(logger, "s-exhausted")).map(e => e.event)).toEqual(["error"]);
    expect(manager.getMetrics()).toMatchObject({
      alpha: { errorCount: 1 },
      beta: { errorCount: 1 },
      gamma: { errorCount: 1 },
    });
  });

  it("passes caller errors straight through without failover", async () => {
    const alpha = makeAdapter({ chat: async () => { throw new ConfigurationError("bad tool schema"); } });
    const beta = makeAdapter();
    const { manager } = await build({ alpha, beta }, { fallbackProviders: ["beta"] });

    await expect(manager.chat(request("s-caller"))).rejects.toBeInstanceOf(ConfigurationError);

    expect(alpha.chat).toHaveBeenCalledTimes(1);
    expect(beta.chat).not.toHaveBeenCalled();
  });

  it("rejects an unknown model before calling the adapter", async () => {
    const alpha = makeAdapter({ models: async () => [{ id: "alpha-1" }] });
    const { manager, logger } = await build({ alpha, beta: makeAdapter() }, { fallbackProviders: ["beta"] });

    await expect(manager.chat(request("s-model", { model: "alpha-9" }))).rejects.toBeInstanceOf(ModelUnavailableError);

    expect(alpha.chat).not.toHaveBeenCalled();
    expect(trafficEvents(logger, "s-model").map(e => e.event)).toEqual(["error"]);
    expect(manager.getMetrics("alpha").requestCount).toBe(0);
  });

  it("rejects an uninitialized provider", async () => {
    const { manager } = await build({ alpha: makeAdapter() });

    await expect(manager.chat(request("s-ghost", { provider: "ghost" }))).rejects.toThrow(
      "Provider ghost is not initialized. Available providers: alpha",
    );
  });

  it("keeps metrics consistent under concurrent requests", async () => {
    const { manager } = await build({ alpha: makeAdapter() });

    await Promise.all(Array.from({ length: 20 }, (_, i) => manager.chat(request(`s-conc-${i}`))));

    const metrics = manager.getMetrics("alpha");
    expect(metrics.requestCount).toBe(20);
    expect(metrics.successCount + metrics.errorCount).toBe(metrics.requestCount);
  });
});

// ============================================
// STREAMING
// ============================================

describe("chatStream", () => {
  function contents(chunks: ChatChunk[]) {
    return chunks.map(c => [c.choices[0].delta.content, c.choices[0].finish_reason]);
  }

  it("proxies the provider's chunks", async () => {
    const alpha = makeAdapter({
      stream: async function* (req) {
        yield makeChunk(req.model ?? "?", "Hel");
        yield makeChunk(req.model ?? "?", "lo", "stop");
      },
    });
    const { manager, logger } = await build({ alpha });

    const chunks = await collect(manager.chatStream(request("s-stream")));

    expect(contents(chunks)).toEqual([["Hel", null], ["lo", "stop"]]);
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, successCount: 1 });
    const events = trafficEvents(logger, "s-stream");
    expect(events.map(e => e.event)).toEqual(["started", "stream_complete"]);
    expect(events[1]).toMatchObject({ contentLength: 5, synthesized: false });
  });

  it("replays the fallback response as two chunks when the stream fails", async () => {
    const alpha = makeAdapter({
      stream: async function* () {
        throw new TransientProviderError("stream reset");
      },
    });
    const beta = makeAdapter({ chat: async () => makeResponse("beta-1", "Recovered") });
    const { manager, logger } = await build({ alpha, beta }, { fallbackProviders: ["beta"] });

    const chunks = await collect(manager.chatStream(request("s-stream-fb")));

    expect(chunks).toHaveLength(2);
    expect(chunks[0].choices[0]).toEqual({ index: 0, delta: { content: "Recovered" }, finish_reason: null });
    expect(chunks[1].choices[0]).toEqual({ index: 0, delta: {}, finish_reason: "stop" });
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, errorCount: 1 });

    const terminal = terminalEvents(trafficEvents(logger, "s-stream-fb"));
    expect(terminal).toHaveLength(1);
    expect(terminal[0]).toMatchObject({
      event: "stream_complete",
      provider: "beta",
      fallbackFrom: "alpha",
      synthesized: true,
      contentLength: 9,
    });
  });

  it("ends partial output with one error chunk when nothing can recover", async () => {
    const alpha = makeAdapter({
      stream: async function* (req) {
        yield makeChunk(req.model ?? "?", "partial");
        throw new TransientProviderError("stream reset");
      },
    });
    const { manager, logger } = await build({ alpha });

    const chunks = await collect(manager.chatStream(request("s-stream-err")));

    expect(chunks).toHaveLength(2);
    expect(chunks[0].choices[0].delta.content).toBe("partial");
    const last = chunks[1];
    expect(last.id).toMatch(/^error-/);
    expect(last.model).toBe("alpha-1");
    expect(last.choices[0]).toEqual({
      index: 0,
      delta: { content: `${STREAM_ERROR_MESSAGE} (request s-stream-err)` },
      finish_reason: "error",
    });
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, errorCount: 1 });
    expect(terminalEvents(trafficEvents(logger, "s-stream-err")).map(e => e.event)).toEqual(["error"]);
  });

  it("yields a single error chunk when the stream fails before any output", async () => {
    const alpha = makeAdapter({
      stream: async function* () {
        throw new TransientProviderError("connection refused");
      },
    });
    const { manager, logger } = await build({ alpha }, { fallbackProviders: [] });

    const chunks = await collect(manager.chatStream(request("s-stream-empty")));

    expect(chunks).toHaveLength(1);
    expect(chunks[0].choices[0].finish_reason).toBe("error");
    expect(chunks[0].choices[0].delta.content).toBe(`${STREAM_ERROR_MESSAGE} (request s-stream-empty)`);
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, errorCount: 1 });
    expect(trafficEvents(logger, "s-stream-empty").map(e => e.event)).toEqual(["started", "error"]);
  });

  it("completes the trace when the consumer stops reading early", async () => {
    const alpha = makeAdapter({
      stream: async function* (req) {
        yield makeChunk(req.model ?? "?", "one");
        yield makeChunk(req.model ?? "?", "two");
        yield makeChunk(req.model ?? "?", "three", "stop");
      },
    });
    const { manager, logger } = await build({ alpha });

    const seen: Array<string | undefined> = [];
    for await (const chunk of manager.chatStream(request("s-stream-abort"))) {
      seen.push(chunk.choices[0].delta.content);
      break;
    }

    expect(seen).toEqual(["one"]);
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, successCount: 1, errorCount: 0 });
    const events = trafficEvents(logger, "s-stream-abort");
    expect(events.map(e => e.event)).toEqual(["started", "stream_complete"]);
    expect(events[1]).toMatchObject({ aborted: true, contentLength: 3, synthesized: false });
  });

  it("treats a provider without streaming as a failed stream", async () => {
    const beta = makeAdapter({ chat: async () => makeResponse("beta-1", "From beta") });
    const { manager, logger } = await build({ alpha: makeAdapter(), beta }, { fallbackProviders: ["beta"] });

    const chunks = await collect(manager.chatStream(request("s-nostream")));

    expect(contents(chunks)).toEqual([["From beta", null], [undefined, "stop"]]);
    expect(manager.getMetrics("alpha")).toMatchObject({ requestCount: 1, errorCount: 1 });
    const failed = logger.getRecentLogs().find(e => e.message === "Stream failed");
    expect(failed?.data?.error).toBe("StreamingUnsupportedError: Provider alpha does not support streaming");
  });

  it("yields an error chunk instead of throwing when scheduling fails", async () => {
    const { manager, logger } = await build({ alpha: makeAdapter() });

    const chunks = await collect(manager.chatStream(request("s-stream-ghost", { provider: "ghost" })));

    expect(chunks).toHaveLength(1);
    expect(chunks[0].model).toBe("unknown");
    expect(chunks[0].choices[0].finish_reason).toBe("error");
    expect(trafficEvents(logger, "s-stream-ghost").map(e => e.event)).toEqual(["error"]);
  });
});

// ============================================
// DISCOVERY
// ============================================

describe("discovery", () => {
  async function discoveryManager(settings: Partial<ProviderManagerSettings> = {}) {
    const alpha = makeAdapter({ cost: 0.01, models: async () => [{ id: "alpha-1" }, { id: "alpha-old", deprecated: true }] });
    const beta = makeAdapter({ cost: 0, models: async () => [{ id: "beta-1" }] });
    const built = await build({ alpha, beta }, { defaultLatencies: { alpha: 1000, beta: 200 }, ...settings });
    return { ...built, alpha, beta };
  }

  it("lists suitable candidates best first", async () => {
    const { manager } = await discoveryManager();

    const candidates = await manager.discover({ messages: MESSAGES });

    expect(candidates.map(c => c.model)).toEqual(["beta-1", "alpha-1"]);
  });

  it("prefers the default provider when it is acceptable", async () => {
    const { manager } = await discoveryManager();
    expect((await manager.scheduleByScore({ messages: MESSAGES })).provider).toBe("alpha");
  });

  it("takes the best candidate when the default is over the cost ceiling", async () => {
    const { manager, beta } = await discoveryManager({ costCeiling: 0.005 });

    const response = await manager.chatWithDiscovery(request("s-discover"));

    expect(response.model).toBe("beta-1");
    expect(beta.chat).toHaveBeenCalledTimes(1);
  });

  it("fails when no model qualifies", async () => {
    const { manager } = await discoveryManager();

    await expect(manager.scheduleByScore({ messages: MESSAGES, model: "missing" })).rejects.toThrow(
      "No suitable providers or models found for the request. Available providers: alpha, beta",
    );
  });
});

// ============================================
// READ-ONLY HELPERS
// ============================================

describe("helpers", () => {
  it("scores with the configured cost ceiling", async () => {
    const { manager } = await build({ alpha: makeAdapter() }, { costCeiling: 0.005 });

    // 100 - 50 (over the ceiling) - 10
    expect(manager.score(0.01, 2000, "low")).toBe(40);
    expect(manager.score(0.001, 0)).toBeCloseTo(100);
  });

  it("estimates latency from the table, then from observed requests", async () => {
    let clock = 0;
    const registry = new AdapterRegistry().register("openai", {
      create: () =>
        makeAdapter({
          chat: async (req) => {
            clock += 400;
            return makeResponse(req.model ?? "?");
          },
        }),
    });
    const manager = new ProviderManager(
      registry,
      { providerConfigs: { openai: { model: "gpt-test" } } },
      { logger: makeLogger(), sleep: noSleep, now: () => clock },
    );
    managers.push(manager);
    await manager.initialize();

    expect(manager.estimatedLatency("openai")).toBe(2500);
    await manager.chat(request("s-latency"));
    expect(manager.estimatedLatency("openai")).toBe(400);
  });

  it("returns metric copies", async () => {
    const { manager } = await build({ alpha: makeAdapter() });
    await manager.chat(request("s-copy"));

    manager.getMetrics("alpha").requestCount = 42;

    expect(manager.getMetrics("alpha").requestCount).toBe(1);
    expect(manager.getMetrics("never-used").requestCount).toBe(0);
  });
});
