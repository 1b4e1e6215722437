/**
 * Selection — Barrel Export
 */

export {
  estimateTokens,
  estimateUsage,
  estimateCost,
  estimateLatency,
  hasMultimodalContent,
  responseCost,
  metricsCost,
} from "./estimate.js";

export { scoreCandidate, rankCandidates, isAcceptable } from "./scorer.js";

export {
  scheduleForProvider,
  discoverCandidates,
  pickCandidate,
  type SchedulingContext,
} from "./scheduler.js";
