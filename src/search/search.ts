import type {
  SearchOptions,
  SearchResult,
  SearchStep,
} from "../interfaces/interfaces";
import type { SearchProblem } from "../problem/Problem";
import type {
  AlgoKey,
  HeuristicType,
  SearchMode,
  TerminationReason,
} from "../types/types";
import { InvalidConfigurationError } from "../utils/errors/errors";
import { makeExplored } from "./explored";
import { makeFrontier } from "./frontier";
import { NodeArena } from "./NodeArena";

const ALGORITHMS: readonly AlgoKey[] = ["BFS", "DFS", "UCS", "A*"];
const MODES: readonly SearchMode[] = ["Tree", "Graph"];
const HEURISTICS: readonly HeuristicType[] = ["None", "Euclidean", "Manhattan"];

export function validateOptions(options: SearchOptions): void {
  const { algorithm, mode, heuristic, limits } = options;
  if (!ALGORITHMS.includes(algorithm)) {
    throw new InvalidConfigurationError(`unknown algorithm "${algorithm}"`);
  }
  if (!MODES.includes(mode)) {
    throw new InvalidConfigurationError(`unknown search mode "${mode}"`);
  }
  if (!HEURISTICS.includes(heuristic)) {
    throw new InvalidConfigurationError(`unknown heuristic "${heuristic}"`);
  }
  if (algorithm === "A*" && heuristic === "None") {
    throw new InvalidConfigurationError(
      'A* needs a heuristic; use UCS for heuristic "None"'
    );
  }
  for (const [name, value] of Object.entries(limits)) {
    if (typeof value !== "number" || Number.isNaN(value) || value <= 0) {
      throw new InvalidConfigurationError(
        `${name} must be a positive number, got ${value}`
      );
    }
  }
}

/**
 * Runs one search to completion. Running out of iterations, depth or time
 * is not an error: it comes back as `success: false` with the matching
 * `terminationReason`.
 */
export function search(problem: SearchProblem, options: SearchOptions): SearchResult {
  validateOptions(options);
  const run = runSearch(problem, options, false);
  let next = run.next();
  while (!next.done) next = run.next();
  return next.value;
}

/**
 * Same search, yielding after every frontier pop so a caller can animate
 * it. The generator's return value is the result.
 */
export function searchSteps(
  problem: SearchProblem,
  options: SearchOptions
): Generator<SearchStep, SearchResult, void> {
  validateOptions(options);
  return runSearch(problem, options, true);
}

function* runSearch(
  problem: SearchProblem,
  options: SearchOptions,
  emitSteps: boolean
): Generator<SearchStep, SearchResult, void> {
  const { algorithm, mode, heuristic, limits } = options;
  const clock = options.clock ?? (() => performance.now());
  const h = algorithm === "A*" ? problem.heuristicFor(heuristic) : null;

  const arena = new NodeArena();
  const frontier = makeFrontier(algorithm);
  const explored = makeExplored(algorithm, mode);
  const meta = {
    iterations: 0,
    nodesExpanded: 0,
    maxFrontierSize: 0,
    peakMemory: 0,
    depthCutoff: false,
  };
  const begin = clock();

  // BFS and DFS ignore priorities
  const priorityOf = (node: number) =>
    h ? arena.pathCost(node) + h(arena.state(node)) : arena.pathCost(node);

  const track = () => {
    meta.maxFrontierSize = Math.max(meta.maxFrontierSize, frontier.size);
    meta.peakMemory = Math.max(meta.peakMemory, frontier.size + explored.size);
  };

  const finish = (
    reason: TerminationReason,
    now: number,
    goalNode?: number
  ): SearchResult => {
    const path = goalNode === undefined ? [] : arena.pathTo(goalNode);
    return Object.freeze({
      algorithm,
      mode,
      heuristic,
      success: reason === "GOAL_FOUND",
      path: Object.freeze(path),
      actions: Object.freeze(goalNode === undefined ? [] : arena.actionsTo(goalNode)),
      pathCost: goalNode === undefined ? Infinity : arena.pathCost(goalNode),
      pathLength: path.length,
      nodesExpanded: meta.nodesExpanded,
      iterations: meta.iterations,
      maxFrontierSize: meta.maxFrontierSize,
      nodesGenerated: arena.size,
      peakMemory: meta.peakMemory,
      elapsedTime: (now - begin) / 1000,
      terminationReason: reason,
    });
  };

  const stepOf = (node: number, expanded: boolean, now: number): SearchStep => ({
    iteration: meta.iterations,
    current: arena.state(node),
    expanded,
    nodesExpanded: meta.nodesExpanded,
    frontierSize: frontier.size,
    maxFrontierSize: meta.maxFrontierSize,
    elapsedMs: now - begin,
    openStates: () => frontier.values().map((n) => arena.state(n)),
  });

  const root = arena.addRoot(problem.initialState());
  frontier.pushAll([root], [priorityOf(root)]);
  track();

  while (frontier.size > 0) {
    if (meta.iterations >= limits.maxIterations) {
      return finish("ITERATION_LIMIT", clock());
    }
    const now = clock();
    if ((now - begin) / 1000 >= limits.timeoutSeconds) {
      return finish("TIMEOUT", now);
    }

    const node = frontier.pop();
    if (node === undefined) break;
    meta.iterations++;
    const state = arena.state(node);
    const cost = arena.pathCost(node);
    const key = problem.key(state);

    // stale duplicate left behind by lazy deletion
    if (explored.isSettled(key, cost)) {
      if (emitSteps) yield stepOf(node, false, now);
      continue;
    }
    meta.nodesExpanded++;

    if (problem.isGoal(state)) {
      return finish("GOAL_FOUND", clock(), node);
    }

    if (arena.depth(node) >= limits.maxDepth) {
      meta.depthCutoff = true;
      if (emitSteps) yield stepOf(node, true, now);
      continue;
    }

    explored.settle(key, cost);

    const children: number[] = [];
    const priorities: number[] = [];
    for (const s of problem.expand(state)) {
      if (!explored.admits(problem.key(s.state), cost + s.cost)) continue;
      const child = arena.addChild(node, s.action, s.state, s.cost);
      children.push(child);
      priorities.push(priorityOf(child));
    }
    frontier.pushAll(children, priorities);
    track();

    if (emitSteps) yield stepOf(node, true, now);
  }

  return finish(
    meta.depthCutoff ? "DEPTH_LIMIT" : "FRONTIER_EXHAUSTED",
    clock()
  );
}
