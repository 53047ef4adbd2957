import type { SearchLimits } from "../interfaces/interfaces";
import type { SearchMode } from "../types/types";

export interface TrialLimits extends SearchLimits {
  trials: number;
}

/**
 * Limits per map size. Tree variants may never empty their frontier on a
 * map with cycles, so their budget shrinks as the map grows; graph
 * variants always get the full budget.
 */
export function adaptiveLimits(
  mode: SearchMode,
  size: number,
  maxTrials: number
): TrialLimits {
  let limits: TrialLimits;
  if (mode === "Graph") {
    limits = { maxIterations: 1_000_000, timeoutSeconds: 60, maxDepth: 50_000, trials: 100 };
  } else if (size <= 7) {
    limits = { maxIterations: 500_000, timeoutSeconds: 60, maxDepth: 10_000, trials: 50 };
  } else if (size <= 10) {
    limits = { maxIterations: 300_000, timeoutSeconds: 45, maxDepth: 8_000, trials: 20 };
  } else {
    limits = { maxIterations: 100_000, timeoutSeconds: 30, maxDepth: 5_000, trials: 10 };
  }
  return { ...limits, trials: Math.min(limits.trials, maxTrials) };
}
