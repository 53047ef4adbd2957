import type { Action, MoveCosts } from "../interfaces/interfaces";
import type { ActionName, Cell, MotionModel } from "../types/types";
import { InvalidEnvironmentError } from "../utils/errors/errors";
import { cellLabel, idOf, rcOf } from "../utils/utils";

export const DEFAULT_MOVE_COSTS: MoveCosts = {
  straight: 1,
  diagonal: Math.SQRT2,
};

// Enumeration order is part of the contract: frontier tie-breaks depend on it.
const STRAIGHT: [ActionName, number, number][] = [
  ["N", -1, 0],
  ["S", 1, 0],
  ["E", 0, 1],
  ["W", 0, -1],
];
const DIAGONAL: [ActionName, number, number][] = [
  ["NE", -1, 1],
  ["NW", -1, -1],
  ["SE", 1, 1],
  ["SW", 1, -1],
];

export function buildMotionSet(
  motion: MotionModel,
  costs: MoveCosts = DEFAULT_MOVE_COSTS
): Action[] {
  // frozen: successors hand these out to callers
  const straight = STRAIGHT.map(([name, dr, dc]) =>
    Object.freeze({ name, dr, dc, cost: costs.straight })
  );
  if (motion === "4-directional") return straight;
  return straight.concat(
    DIAGONAL.map(([name, dr, dc]) =>
      Object.freeze({ name, dr, dc, cost: costs.diagonal })
    )
  );
}

export interface EnvironmentSpec {
  width: number;
  height: number;
  obstacles: Iterable<Cell>;
  start: Cell;
  goal: Cell;
  motion: MotionModel;
  moveCosts?: MoveCosts;
}

/**
 * Immutable grid maze. Cells are addressed as (row, col); `width` counts
 * columns and `height` rows.
 */
export class GridEnvironment {
  readonly width: number;
  readonly height: number;
  readonly start: Cell;
  readonly goal: Cell;
  readonly motion: MotionModel;
  readonly moveCosts: MoveCosts;
  private readonly blocks: Uint8Array; // 0 free, 1 wall
  private readonly motionSet: readonly Action[];

  constructor(spec: EnvironmentSpec) {
    const { width, height, motion } = spec;
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
      throw new InvalidEnvironmentError(
        `dimensions must be integers, got ${width}x${height}`
      );
    }
    if (width < 1 || height < 1) {
      throw new InvalidEnvironmentError(
        `dimensions must be at least 1x1, got ${width}x${height}`
      );
    }
    if (motion !== "4-directional" && motion !== "8-directional") {
      throw new InvalidEnvironmentError(`unknown motion model "${motion}"`);
    }
    const moveCosts = spec.moveCosts ?? DEFAULT_MOVE_COSTS;
    for (const [kind, cost] of Object.entries(moveCosts)) {
      if (!Number.isFinite(cost) || cost <= 0) {
        throw new InvalidEnvironmentError(
          `${kind} move cost must be a positive number, got ${cost}`
        );
      }
    }

    this.width = width;
    this.height = height;
    this.motion = motion;
    this.moveCosts = Object.freeze({ ...moveCosts });
    this.blocks = new Uint8Array(width * height);

    for (const cell of spec.obstacles) {
      if (!this.inBounds(cell)) {
        throw new InvalidEnvironmentError(
          `obstacle ${cellLabel(cell)} is outside the ${width}x${height} grid`
        );
      }
      this.blocks[this.idOf(cell)] = 1;
    }

    this.start = this.checkEndpoint("start", spec.start);
    this.goal = this.checkEndpoint("goal", spec.goal);
    this.motionSet = Object.freeze(buildMotionSet(motion, this.moveCosts));
  }

  /**
   * Parses an ASCII maze: `#` is an obstacle, `S` the start, `G` the goal,
   * any other character a free cell.
   */
  static fromRows(
    rows: readonly string[],
    motion: MotionModel,
    moveCosts?: MoveCosts
  ): GridEnvironment {
    if (rows.length === 0) {
      throw new InvalidEnvironmentError("maze has no rows");
    }
    const width = rows[0].length;
    const obstacles: Cell[] = [];
    let start: Cell | null = null;
    let goal: Cell | null = null;

    for (let r = 0; r < rows.length; r++) {
      const row = rows[r];
      if (row.length !== width) {
        throw new InvalidEnvironmentError(
          `row ${r} has ${row.length} cells, expected ${width}`
        );
      }
      for (let c = 0; c < width; c++) {
        const ch = row[c];
        if (ch === "#") obstacles.push({ r, c });
        else if (ch === "S") {
          if (start) throw new InvalidEnvironmentError("more than one start");
          start = { r, c };
        } else if (ch === "G") {
          if (goal) throw new InvalidEnvironmentError("more than one goal");
          goal = { r, c };
        }
      }
    }

    if (!start) throw new InvalidEnvironmentError("maze has no start (S)");
    if (!goal) throw new InvalidEnvironmentError("maze has no goal (G)");

    return new GridEnvironment({
      width,
      height: rows.length,
      obstacles,
      start,
      goal,
      motion,
      moveCosts,
    });
  }

  inBounds(cell: Cell): boolean {
    return (
      Number.isInteger(cell.r) &&
      Number.isInteger(cell.c) &&
      cell.r >= 0 &&
      cell.r < this.height &&
      cell.c >= 0 &&
      cell.c < this.width
    );
  }

  isFree(cell: Cell): boolean {
    return this.inBounds(cell) && this.blocks[this.idOf(cell)] === 0;
  }

  isObstacle(cell: Cell): boolean {
    return this.inBounds(cell) && this.blocks[this.idOf(cell)] === 1;
  }

  /**
   * Motion set available at `cell`. A diagonal move is listed only when
   * at least one of the two orthogonal cells it passes is free, so the
   * agent never squeezes between two obstacles touching at a corner.
   * Whether the target itself is free is left to the caller.
   */
  actions(cell: Cell): Action[] {
    const out: Action[] = [];
    for (const action of this.motionSet) {
      if (action.dr !== 0 && action.dc !== 0) {
        const viaRow = { r: cell.r + action.dr, c: cell.c };
        const viaCol = { r: cell.r, c: cell.c + action.dc };
        if (!this.isFree(viaRow) && !this.isFree(viaCol)) continue;
      }
      out.push(action);
    }
    return out;
  }

  stepCost(action: Action): number {
    return action.cost;
  }

  idOf(cell: Cell): number {
    return idOf(this.width, cell.r, cell.c);
  }

  cellOf(id: number): Cell {
    return rcOf(this.width, id);
  }

  obstacleCount(): number {
    let n = 0;
    for (const b of this.blocks) n += b;
    return n;
  }

  toRows(): string[] {
    const rows: string[] = [];
    for (let r = 0; r < this.height; r++) {
      let row = "";
      for (let c = 0; c < this.width; c++) {
        if (r === this.start.r && c === this.start.c) row += "S";
        else if (r === this.goal.r && c === this.goal.c) row += "G";
        else row += this.blocks[idOf(this.width, r, c)] ? "#" : ".";
      }
      rows.push(row);
    }
    return rows;
  }

  private checkEndpoint(kind: "start" | "goal", cell: Cell): Cell {
    if (!this.inBounds(cell)) {
      throw new InvalidEnvironmentError(
        `${kind} ${cellLabel(cell)} is outside the ${this.width}x${this.height} grid`
      );
    }
    if (this.blocks[this.idOf(cell)] === 1) {
      throw new InvalidEnvironmentError(
        `${kind} ${cellLabel(cell)} is on an obstacle`
      );
    }
    return Object.freeze({ r: cell.r, c: cell.c });
  }
}
