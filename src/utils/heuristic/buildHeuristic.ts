import type { Cell, HeuristicType } from "../../types/types";

export const manhattan = (a: Cell, b: Cell) =>
  Math.abs(a.r - b.r) + Math.abs(a.c - b.c);

export const euclidean = (a: Cell, b: Cell) => {
  const dr = a.r - b.r;
  const dc = a.c - b.c;
  return Math.sqrt(dr * dr + dc * dc);
};

const zero = () => 0;

// Estimate of the remaining cost from a cell to `goal`.
export function buildHeuristic(
  goal: Cell,
  type: HeuristicType
): (cell: Cell) => number {
  switch (type) {
    case "Euclidean":
      return (cell: Cell) => euclidean(cell, goal);
    case "Manhattan":
      return (cell: Cell) => manhattan(cell, goal);
    default:
      return zero;
  }
}
