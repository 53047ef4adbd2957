import type { GridEnvironment } from "../environment/Environment";
import type {
  SearchResult,
  SearchStep,
  SearchVariant,
} from "../interfaces/interfaces";
import type { Cell } from "../types/types";

// What one lab panel shows; rebuilt after every step
export interface PanelState {
  variant: SearchVariant;
  closed: Set<number>; // expanded cell ids
  open: Cell[]; // frontier, duplicates included
  current?: Cell;
  path?: readonly Cell[];
  result?: SearchResult;
  nodesExpanded: number;
  peakFrontier: number;
  elapsedMs: number;
  finished: boolean;
}

export function createPanel(variant: SearchVariant): PanelState {
  return {
    variant,
    closed: new Set(),
    open: [],
    nodesExpanded: 0,
    peakFrontier: 0,
    elapsedMs: 0,
    finished: false,
  };
}

export function advancePanel(
  panel: PanelState,
  run: Generator<SearchStep, SearchResult, void>,
  env: GridEnvironment
): PanelState {
  if (panel.finished) return panel;
  const next = run.next();
  if (next.done) {
    const result = next.value;
    return {
      ...panel,
      open: [],
      current: undefined,
      path: result.success ? result.path : undefined,
      result,
      nodesExpanded: result.nodesExpanded,
      peakFrontier: result.maxFrontierSize,
      elapsedMs: result.elapsedTime * 1000,
      finished: true,
    };
  }
  const step = next.value;
  const closed = new Set(panel.closed);
  if (step.expanded) closed.add(env.idOf(step.current));
  return {
    ...panel,
    closed,
    open: step.openStates(),
    current: step.current,
    nodesExpanded: step.nodesExpanded,
    peakFrontier: step.maxFrontierSize,
    elapsedMs: step.elapsedMs,
  };
}
