/**
 * Candidate Scorer
 *
 * Pure scoring of a (provider, model) pair:
 *
 *   score = clamp(100 − costPenalty − latencyPenalty + priorityBonus, 0, 100)
 *
 * - costPenalty:    50 over the cost ceiling, else min(30, cost × 1000)
 * - latencyPenalty: min(20, latencyMs / 200)
 * - priorityBonus:  high +20, medium +10, low 0
 */

import type { Candidate, RequestPriority } from "../types.js";

const BASE_SCORE = 100;
const OVER_CEILING_PENALTY = 50;
const MAX_COST_PENALTY = 30;
const COST_PENALTY_SCALE = 1000;
const MAX_LATENCY_PENALTY = 20;
const LATENCY_PENALTY_DIVISOR = 200;

const PRIORITY_BONUS: Record<RequestPriority, number> = {
  high: 20,
  medium: 10,
  low: 0,
};

export function scoreCandidate(
  cost: number,
  latencyMs: number,
  priority: RequestPriority,
  costCeiling?: number,
): number {
  const costPenalty = costCeiling !== undefined && cost > costCeiling
    ? OVER_CEILING_PENALTY
    : Math.min(MAX_COST_PENALTY, cost * COST_PENALTY_SCALE);
  const latencyPenalty = Math.min(MAX_LATENCY_PENALTY, latencyMs / LATENCY_PENALTY_DIVISOR);
  const score = BASE_SCORE - costPenalty - latencyPenalty + PRIORITY_BONUS[priority];
  return Math.min(BASE_SCORE, Math.max(0, score));
}

/**
 * Highest score first. Array.prototype.sort is stable, so equal scores keep
 * the order the candidates were produced in (provider registration order).
 */
export function rankCandidates<T extends Pick<Candidate, "score">>(candidates: T[]): T[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}

/**
 * Cost within the ceiling and, for high-priority requests, latency within
 * the high-priority bound.
 */
export function isAcceptable(
  candidate: Pick<Candidate, "estimatedCost" | "estimatedLatency">,
  priority: RequestPriority,
  highPriorityLatencyMs: number,
  costCeiling?: number,
): boolean {
  if (costCeiling !== undefined && candidate.estimatedCost > costCeiling) return false;
  if (priority === "high" && candidate.estimatedLatency > highPriorityLatencyMs) return false;
  return true;
}
