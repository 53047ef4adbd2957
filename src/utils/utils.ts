import type { SearchVariant } from "../interfaces/interfaces";
import type { Cell } from "../types/types";

export const idOf = (width: number, r: number, c: number) => r * width + c;
export const rcOf = (width: number, id: number): Cell => ({
  r: Math.floor(id / width),
  c: id % width,
});

export const sameCell = (a: Cell, b: Cell) => a.r === b.r && a.c === b.c;

export const cellLabel = (cell: Cell) => `(${cell.r},${cell.c})`;

// "r,c" or "(r,c)" as typed into the lab; null when it is neither
export function parseCell(text: string): Cell | null {
  const m = /^\s*\(?\s*(\d+)\s*,\s*(\d+)\s*\)?\s*$/.exec(text);
  return m ? { r: Number(m[1]), c: Number(m[2]) } : null;
}

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// Integer in [0, n)
export const randomIndex = (R: Generator<number, never>, n: number) =>
  Math.floor(R.next().value * n);

// "BFS-Graph", "A*-Tree-Manhattan", ...
export function variantLabel(variant: SearchVariant): string {
  const base = `${variant.algorithm}-${variant.mode}`;
  return variant.algorithm === "A*" ? `${base}-${variant.heuristic}` : base;
}
