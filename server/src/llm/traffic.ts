/**
 * Traffic Log
 *
 * Structured "started" / "success" / "stream_complete" / "error" events for
 * every logical request. A logical request spans its retries and any
 * failover, and gets exactly one terminal event.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@llm-relay/shared/logging";
import type { ApiResponse, ProviderId, ProviderRequest, TokenUsage } from "./types.js";
import { describeError } from "./errors.js";

export type TrafficEvent = "started" | "success" | "stream_complete" | "error";

export const TERMINAL_EVENTS: readonly TrafficEvent[] = ["success", "stream_complete", "error"];

interface TerminalDetails {
  provider: ProviderId;
  model: string;
  latencyMs: number;
  /** Set when a fallback provider produced the result */
  fallbackFrom?: ProviderId;
}

export class RequestTrace {
  readonly requestId: string;
  private readonly log: ILogger;
  private readonly priority: string;
  private startedEmitted = false;
  private terminal: TrafficEvent | null = null;

  constructor(logger: ILogger, request: ProviderRequest) {
    this.requestId = request.sessionId ?? `req_${nanoid(10)}`;
    this.priority = request.priority ?? "medium";
    this.log = logger.child({
      correlationId: this.requestId,
      userId: request.userId,
      sessionId: request.sessionId,
    });
  }

  /** The terminal event already emitted, if any */
  get finished(): TrafficEvent | null {
    return this.terminal;
  }

  started(provider: ProviderId, model: string): void {
    if (this.startedEmitted) return;
    this.startedEmitted = true;
    this.log.debug("LLM request started", {
      event: "started",
      requestId: this.requestId,
      provider,
      model,
      priority: this.priority,
    });
  }

  success(details: TerminalDetails, response: ApiResponse): void {
    if (!this.claimTerminal("success")) return;
    this.log.info("LLM request succeeded", {
      event: "success",
      requestId: this.requestId,
      ...details,
      responseModel: response.model,
      usage: usageRecord(response.usage),
      finishReason: response.choices[0]?.finish_reason ?? null,
    });
  }

  streamComplete(
    details: TerminalDetails & {
      contentLength: number;
      synthesized: boolean;
      /** The consumer stopped reading before the provider finished */
      aborted?: boolean;
    },
  ): void {
    if (!this.claimTerminal("stream_complete")) return;
    this.log.info("LLM stream complete", {
      event: "stream_complete",
      requestId: this.requestId,
      ...details,
    });
  }

  error(details: TerminalDetails, error: unknown): void {
    if (!this.claimTerminal("error")) return;
    this.log.warn("LLM request failed", {
      event: "error",
      requestId: this.requestId,
      ...details,
      error: describeError(error),
    });
  }

  private claimTerminal(event: TrafficEvent): boolean {
    if (this.terminal) {
      this.log.debug("Ignoring second terminal traffic event", {
        requestId: this.requestId,
        event,
        already: this.terminal,
      });
      return false;
    }
    this.terminal = event;
    return true;
  }
}

function usageRecord(usage: TokenUsage | undefined): Record<string, number> | null {
  if (!usage) return null;
  return {
    promptTokens: usage.promptTokens,
    completionTokens: usage.completionTokens,
    totalTokens: usage.totalTokens,
  };
}
