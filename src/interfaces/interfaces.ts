import type {
  ActionName,
  AlgoKey,
  Cell,
  EnvironmentType,
  HeuristicType,
  MotionModel,
  SearchMode,
  TerminationReason,
} from "../types/types";

export interface Action {
  readonly name: ActionName;
  readonly dr: number;
  readonly dc: number;
  readonly cost: number;
}

export interface MoveCosts {
  straight: number;
  diagonal: number;
}

export interface Successor {
  action: Action;
  state: Cell;
  cost: number;
}

export interface SearchLimits {
  maxIterations: number;
  maxDepth: number;
  timeoutSeconds: number;
}

export interface SearchOptions {
  algorithm: AlgoKey;
  mode: SearchMode;
  heuristic: HeuristicType;
  limits: SearchLimits;
  clock?: () => number; // milliseconds, defaults to performance.now
}

export interface SearchResult {
  algorithm: AlgoKey;
  mode: SearchMode;
  heuristic: HeuristicType;
  success: boolean;
  path: readonly Cell[];
  actions: readonly ActionName[];
  pathCost: number; // Infinity when no path was found
  pathLength: number;
  nodesExpanded: number;
  iterations: number; // frontier pops, settled duplicates included
  maxFrontierSize: number;
  nodesGenerated: number;
  peakMemory: number; // frontier + explored entries
  elapsedTime: number; // seconds
  terminationReason: TerminationReason;
}

// One frontier pop, for step-by-step visualization
export interface SearchStep {
  iteration: number;
  current: Cell;
  expanded: boolean; // false when discarded as a settled duplicate
  nodesExpanded: number;
  frontierSize: number;
  maxFrontierSize: number;
  elapsedMs: number;
  openStates: () => Cell[];
}

export interface SearchVariant {
  algorithm: AlgoKey;
  mode: SearchMode;
  heuristic: HeuristicType;
}

export interface BenchmarkConfig extends SearchVariant {
  mapSize: number;
  environmentType: EnvironmentType;
  motionModel: MotionModel;
  limits: SearchLimits;
}

export interface BenchmarkRecord extends BenchmarkConfig {
  variant: string;
  trial: number;
  result: SearchResult;
}
