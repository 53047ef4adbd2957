import type { AlgoKey, SearchMode } from "../types/types";

/**
 * Duplicate-detection policy. Tree mode has none at all; graph mode keeps
 * the states it already expanded.
 */
export interface ExploredPolicy {
  readonly size: number;
  /** True when a popped node adds nothing: its state is settled at an equal or better cost. */
  isSettled(key: number, pathCost: number): boolean;
  settle(key: number, pathCost: number): void;
  /** Whether a generated child may enter the frontier. */
  admits(key: number, pathCost: number): boolean;
}

export class NoExplored implements ExploredPolicy {
  readonly size = 0;
  isSettled() {
    return false;
  }
  settle() {}
  admits() {
    return true;
  }
}

// BFS/DFS: once expanded, a state is never expanded again
export class VisitedSet implements ExploredPolicy {
  private seen = new Set<number>();

  get size() {
    return this.seen.size;
  }
  isSettled(key: number) {
    return this.seen.has(key);
  }
  settle(key: number) {
    this.seen.add(key);
  }
  admits(key: number) {
    return !this.seen.has(key);
  }
}

// UCS/A*: best expanded cost per state; a strictly cheaper arrival reopens it
export class BestCostMap implements ExploredPolicy {
  private best = new Map<number, number>();

  get size() {
    return this.best.size;
  }
  isSettled(key: number, pathCost: number) {
    const b = this.best.get(key);
    return b !== undefined && b <= pathCost;
  }
  settle(key: number, pathCost: number) {
    this.best.set(key, pathCost);
  }
  admits(key: number, pathCost: number) {
    return !this.isSettled(key, pathCost);
  }
}

export function makeExplored(algorithm: AlgoKey, mode: SearchMode): ExploredPolicy {
  if (mode === "Tree") return new NoExplored();
  return algorithm === "UCS" || algorithm === "A*"
    ? new BestCostMap()
    : new VisitedSet();
}
