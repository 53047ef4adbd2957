import type { GridEnvironment } from "../environment/Environment";
import type { Successor } from "../interfaces/interfaces";
import type { Cell, HeuristicType } from "../types/types";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { sameCell } from "../utils/utils";

/** What the search engine needs from a problem; nothing grid-specific. */
export interface SearchProblem {
  initialState(): Cell;
  goalState(): Cell;
  isGoal(state: Cell): boolean;
  /** Integer identity of a state, used by the explored set. */
  key(state: Cell): number;
  /** Successors in a fixed order. */
  expand(state: Cell): Successor[];
  heuristicFor(type: HeuristicType): (state: Cell) => number;
}

export class GridProblem implements SearchProblem {
  constructor(readonly environment: GridEnvironment) {}

  initialState(): Cell {
    return this.environment.start;
  }

  goalState(): Cell {
    return this.environment.goal;
  }

  isGoal(state: Cell): boolean {
    return sameCell(state, this.environment.goal);
  }

  key(state: Cell): number {
    return this.environment.idOf(state);
  }

  expand(state: Cell): Successor[] {
    const env = this.environment;
    const out: Successor[] = [];
    for (const action of env.actions(state)) {
      const next = { r: state.r + action.dr, c: state.c + action.dc };
      if (!env.isFree(next)) continue;
      out.push({ action, state: next, cost: env.stepCost(action) });
    }
    return out;
  }

  heuristicFor(type: HeuristicType): (state: Cell) => number {
    return buildHeuristic(this.environment.goal, type);
  }
}
