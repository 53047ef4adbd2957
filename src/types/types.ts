export type Cell = { r: number; c: number };

export type EnvironmentType =
  | "Empty"
  | "SimpleObstacles"
  | "Corridor"
  | "Rooms"
  | "Dense"
  | "Maze";

export type AlgoKey = "BFS" | "DFS" | "UCS" | "A*";

export type SearchMode = "Tree" | "Graph";

export type HeuristicType = "None" | "Euclidean" | "Manhattan";

export type MotionModel = "4-directional" | "8-directional";

export type ActionName = "N" | "S" | "E" | "W" | "NE" | "NW" | "SE" | "SW";

export type TerminationReason =
  | "GOAL_FOUND"
  | "ITERATION_LIMIT"
  | "DEPTH_LIMIT"
  | "TIMEOUT"
  | "FRONTIER_EXHAUSTED";
