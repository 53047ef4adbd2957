import type { BenchmarkConfig, BenchmarkRecord } from "../interfaces/interfaces";
import { GridProblem } from "../problem/Problem";
import { search } from "../search/search";
import { buildEnvironment } from "../utils/mapGen/mapGen";
import { ResultAccumulator } from "./accumulator";
import { adaptiveLimits } from "./limits";
import type { BenchmarkPlan } from "./plan";

export interface BenchmarkHooks {
  onConfig?: (index: number, total: number, config: BenchmarkConfig, trials: number) => void;
  onTrial?: (record: BenchmarkRecord, trials: number) => void;
}

export function countConfigs(plan: BenchmarkPlan) {
  return plan.maps.length * plan.motionModels.length * plan.variants.length;
}

/**
 * Sweeps maps x motion models x variants, running each configuration for
 * its adaptive number of trials, and records every result in `results`.
 */
export function runBenchmark(
  plan: BenchmarkPlan,
  hooks: BenchmarkHooks = {},
  results = new ResultAccumulator()
): ResultAccumulator {
  const total = countConfigs(plan);
  let index = 0;

  for (const map of plan.maps) {
    for (const motionModel of plan.motionModels) {
      const env = buildEnvironment(map.environmentType, map.size, motionModel, plan.seed);
      const problem = new GridProblem(env);

      for (const variant of plan.variants) {
        index++;
        const { trials, ...limits } = adaptiveLimits(variant.mode, map.size, plan.numTrials);
        const config: BenchmarkConfig = {
          ...variant,
          mapSize: map.size,
          environmentType: map.environmentType,
          motionModel,
          limits,
        };
        hooks.onConfig?.(index, total, config, trials);

        for (let trial = 0; trial < trials; trial++) {
          const result = search(problem, { ...variant, limits });
          const record = results.add(config, trial, result);
          hooks.onTrial?.(record, trials);
        }
      }
    }
  }

  return results;
}
