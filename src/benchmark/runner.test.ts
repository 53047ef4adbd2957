import { describe, it, expect } from "vitest";
import type { BenchmarkConfig } from "../interfaces/interfaces";
import type { BenchmarkPlan } from "./plan";
import { countConfigs, runBenchmark } from "./runner";
import { defaultPlan } from "./plan";

const plan: BenchmarkPlan = {
  maps: [{ environmentType: "Empty", size: 5 }],
  motionModels: ["4-directional"],
  variants: [
    { algorithm: "BFS", mode: "Graph", heuristic: "None" },
    { algorithm: "BFS", mode: "Tree", heuristic: "None" },
  ],
  numTrials: 2,
  seed: 42,
};

describe("runBenchmark", () => {
  it("counts the default sweep", () => {
    // (2 sizes x 2 types + 3 sizes x 5 types) x 2 motions x 8 variants
    expect(countConfigs(defaultPlan)).toBe(304);
  });

  it("runs every configuration for its trials", () => {
    const seen: [number, number, string, number][] = [];
    let trialCalls = 0;
    const results = runBenchmark(plan, {
      onConfig: (index, total, config: BenchmarkConfig, trials) =>
        seen.push([index, total, config.mode, trials]),
      onTrial: () => {
        trialCalls++;
      },
    });

    expect(seen).toEqual([
      [1, 2, "Graph", 2],
      [2, 2, "Tree", 2],
    ]);
    expect(trialCalls).toBe(4);
    expect(results.size).toBe(4);
    expect(results.records().map((r) => r.trial)).toEqual([0, 1, 0, 1]);
  });

  it("solves the empty room in every trial", () => {
    const summary = runBenchmark(plan).summarize();
    expect(summary.map((s) => s.variant)).toEqual(["BFS-Graph", "BFS-Tree"]);
    for (const row of summary) {
      expect(row.successRate).toBe(1);
      expect(row.pathCost).toEqual({ mean: 4, std: 0 });
      expect(row.pathLength).toEqual({ mean: 5, std: 0 });
    }
  });

  it("passes the adaptive limits into each record", () => {
    const [graph, , tree] = runBenchmark(plan).records();
    expect(graph.limits.maxIterations).toBe(1_000_000);
    expect(tree.limits.maxIterations).toBe(500_000);
    expect(tree.limits.maxDepth).toBe(10_000);
  });
});
