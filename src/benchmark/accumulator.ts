import type {
  BenchmarkConfig,
  BenchmarkRecord,
  SearchResult,
} from "../interfaces/interfaces";
import type {
  AlgoKey,
  EnvironmentType,
  HeuristicType,
  MotionModel,
  SearchMode,
} from "../types/types";
import { variantLabel } from "../utils/utils";

export interface Stat {
  mean: number;
  std: number; // sample standard deviation
}

export interface SummaryRow {
  variant: string;
  algorithm: AlgoKey;
  mode: SearchMode;
  heuristic: HeuristicType;
  motionModel: MotionModel;
  environmentType: EnvironmentType;
  mapSize: number;
  trials: number;
  successes: number;
  successRate: number;
  time: Stat;
  nodesExpanded: Stat;
  peakMemory: Stat;
  // successful runs only
  pathCost: Stat;
  pathLength: Stat;
}

export function stat(values: readonly number[]): Stat {
  const n = values.length;
  if (n === 0) return { mean: NaN, std: NaN };
  const mean = values.reduce((s, v) => s + v, 0) / n;
  if (n === 1) return { mean, std: 0 };
  const sq = values.reduce((s, v) => s + (v - mean) * (v - mean), 0);
  return { mean, std: Math.sqrt(sq / (n - 1)) };
}

/**
 * Collects one record per search run. The driver owns the instance and
 * passes it around; nothing here is global.
 */
export class ResultAccumulator {
  private rows: BenchmarkRecord[] = [];

  add(config: BenchmarkConfig, trial: number, result: SearchResult): BenchmarkRecord {
    const record: BenchmarkRecord = {
      ...config,
      variant: variantLabel(config),
      trial,
      result,
    };
    this.rows.push(record);
    return record;
  }

  get size() {
    return this.rows.length;
  }

  records(): readonly BenchmarkRecord[] {
    return this.rows;
  }

  // Grouped by algorithm x mode x heuristic x motion x environment x size
  summarize(): SummaryRow[] {
    const groups = new Map<string, BenchmarkRecord[]>();
    for (const rec of this.rows) {
      const key = [rec.variant, rec.motionModel, rec.environmentType, rec.mapSize].join("|");
      const group = groups.get(key);
      if (group) group.push(rec);
      else groups.set(key, [rec]);
    }

    return [...groups.values()].map((group) => {
      const first = group[0];
      const results = group.map((g) => g.result);
      const solved = results.filter((r) => r.success);
      return {
        variant: first.variant,
        algorithm: first.algorithm,
        mode: first.mode,
        heuristic: first.heuristic,
        motionModel: first.motionModel,
        environmentType: first.environmentType,
        mapSize: first.mapSize,
        trials: group.length,
        successes: solved.length,
        successRate: solved.length / group.length,
        time: stat(results.map((r) => r.elapsedTime)),
        nodesExpanded: stat(results.map((r) => r.nodesExpanded)),
        peakMemory: stat(results.map((r) => r.peakMemory)),
        pathCost: stat(solved.map((r) => r.pathCost)),
        pathLength: stat(solved.map((r) => r.pathLength)),
      };
    });
  }
}
