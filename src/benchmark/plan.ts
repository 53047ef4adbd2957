import type { SearchVariant } from "../interfaces/interfaces";
import type { EnvironmentType, MotionModel } from "../types/types";

export interface MapSpec {
  environmentType: EnvironmentType;
  size: number;
}

export interface BenchmarkPlan {
  maps: MapSpec[];
  motionModels: MotionModel[];
  variants: SearchVariant[];
  numTrials: number; // upper bound; tree variants get fewer on larger maps
  seed: number;
}

// Graph variants (more reliable)
export const GRAPH_VARIANTS: SearchVariant[] = [
  { algorithm: "BFS", mode: "Graph", heuristic: "None" },
  { algorithm: "UCS", mode: "Graph", heuristic: "None" },
  { algorithm: "A*", mode: "Graph", heuristic: "Euclidean" },
  { algorithm: "A*", mode: "Graph", heuristic: "Manhattan" },
];

// Tree variants only terminate through their limits on maps with cycles
export const TREE_VARIANTS: SearchVariant[] = [
  { algorithm: "BFS", mode: "Tree", heuristic: "None" },
  { algorithm: "UCS", mode: "Tree", heuristic: "None" },
  { algorithm: "A*", mode: "Tree", heuristic: "Euclidean" },
  { algorithm: "A*", mode: "Tree", heuristic: "Manhattan" },
];

// DFS is left out of the default sweep; add it through `variants`
export const DFS_VARIANTS: SearchVariant[] = [
  { algorithm: "DFS", mode: "Graph", heuristic: "None" },
  { algorithm: "DFS", mode: "Tree", heuristic: "None" },
];

export function mapMatrix(sizes: number[], types: EnvironmentType[]): MapSpec[] {
  return sizes.flatMap((size) =>
    types.map((environmentType) => ({ environmentType, size }))
  );
}

export const defaultPlan: BenchmarkPlan = {
  maps: [
    // small maps (good for tree algorithms)
    ...mapMatrix([5, 7], ["Empty", "SimpleObstacles"]),
    ...mapMatrix(
      [10, 15, 20],
      ["Empty", "SimpleObstacles", "Corridor", "Rooms", "Dense"]
    ),
  ],
  motionModels: ["4-directional", "8-directional"],
  variants: [...GRAPH_VARIANTS, ...TREE_VARIANTS],
  numTrials: 100,
  seed: 42,
};
