import type { Action } from "../interfaces/interfaces";
import type { ActionName, Cell } from "../types/types";

export const NO_PARENT = -1;

/**
 * Search-tree nodes for one run, stored in parallel arrays and addressed
 * by index. A node's parent is another index, so the whole tree is
 * dropped with the arena when the run ends.
 */
export class NodeArena {
  private states: Cell[] = [];
  private parents: number[] = [];
  private actions: (Action | null)[] = [];
  private costs: number[] = [];
  private depths: number[] = [];

  get size() {
    return this.states.length;
  }

  addRoot(state: Cell): number {
    return this.push(state, NO_PARENT, null, 0, 0);
  }

  addChild(parent: number, action: Action, state: Cell, stepCost: number): number {
    return this.push(
      state,
      parent,
      action,
      this.costs[parent] + stepCost,
      this.depths[parent] + 1
    );
  }

  state(i: number): Cell {
    return this.states[i];
  }
  parent(i: number): number {
    return this.parents[i];
  }
  action(i: number): Action | null {
    return this.actions[i];
  }
  pathCost(i: number): number {
    return this.costs[i];
  }
  depth(i: number): number {
    return this.depths[i];
  }

  // Root-to-node states, walking parent indices up and reversing
  pathTo(i: number): Cell[] {
    const path: Cell[] = [];
    for (let cur = i; cur !== NO_PARENT; cur = this.parents[cur]) {
      path.push(this.states[cur]);
    }
    return path.reverse();
  }

  actionsTo(i: number): ActionName[] {
    const out: ActionName[] = [];
    for (let cur = i; cur !== NO_PARENT; cur = this.parents[cur]) {
      const a = this.actions[cur];
      if (a) out.push(a.name);
    }
    return out.reverse();
  }

  private push(
    state: Cell,
    parent: number,
    action: Action | null,
    cost: number,
    depth: number
  ): number {
    this.states.push(state);
    this.parents.push(parent);
    this.actions.push(action);
    this.costs.push(cost);
    this.depths.push(depth);
    return this.states.length - 1;
  }
}
