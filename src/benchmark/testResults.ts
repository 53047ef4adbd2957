import type { BenchmarkConfig, SearchResult } from "../interfaces/interfaces";

export const CONFIG: BenchmarkConfig = {
  algorithm: "BFS",
  mode: "Graph",
  heuristic: "None",
  mapSize: 5,
  environmentType: "Empty",
  motionModel: "4-directional",
  limits: { maxIterations: 100, maxDepth: 50, timeoutSeconds: 2 },
};

export const SOLVED: SearchResult = {
  algorithm: "BFS",
  mode: "Graph",
  heuristic: "None",
  success: true,
  path: [],
  actions: [],
  pathCost: 4,
  pathLength: 5,
  nodesExpanded: 9,
  iterations: 10,
  maxFrontierSize: 4,
  nodesGenerated: 14,
  peakMemory: 12,
  elapsedTime: 0.0125,
  terminationReason: "GOAL_FOUND",
};

export const FAILED: SearchResult = {
  ...SOLVED,
  success: false,
  pathCost: Infinity,
  pathLength: 0,
  nodesExpanded: 100,
  iterations: 100,
  maxFrontierSize: 30,
  nodesGenerated: 130,
  peakMemory: 60,
  elapsedTime: 0.5,
  terminationReason: "ITERATION_LIMIT",
};
