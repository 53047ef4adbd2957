import { describe, it, expect } from "vitest";
import { ResultAccumulator, stat } from "./accumulator";
import { CONFIG, FAILED, SOLVED } from "./testResults";

describe("stat", () => {
  it("uses the sample standard deviation", () => {
    expect(stat([2, 4, 6])).toEqual({ mean: 4, std: 2 });
  });

  it("has zero spread for a single value and none for no values", () => {
    expect(stat([7])).toEqual({ mean: 7, std: 0 });
    const empty = stat([]);
    expect(Number.isNaN(empty.mean)).toBe(true);
    expect(Number.isNaN(empty.std)).toBe(true);
  });
});

describe("ResultAccumulator", () => {
  it("labels records with their variant", () => {
    const acc = new ResultAccumulator();
    const rec = acc.add(CONFIG, 0, SOLVED);
    expect(rec.variant).toBe("BFS-Graph");
    expect(rec.trial).toBe(0);
    expect(acc.size).toBe(1);
    expect(acc.records()).toEqual([rec]);
  });

  it("summarizes path metrics over successful runs only", () => {
    const acc = new ResultAccumulator();
    acc.add(CONFIG, 0, SOLVED);
    acc.add(CONFIG, 1, FAILED);
    const [row] = acc.summarize();
    expect(row.trials).toBe(2);
    expect(row.successes).toBe(1);
    expect(row.successRate).toBe(0.5);
    expect(row.nodesExpanded.mean).toBe(54.5);
    expect(row.peakMemory.mean).toBe(36);
    expect(row.pathCost).toEqual({ mean: 4, std: 0 });
    expect(row.pathLength).toEqual({ mean: 5, std: 0 });
  });

  it("groups by variant, motion, environment and size in first-seen order", () => {
    const acc = new ResultAccumulator();
    const astar = { ...CONFIG, algorithm: "A*" as const, heuristic: "Euclidean" as const };
    acc.add(CONFIG, 0, SOLVED);
    acc.add(astar, 0, SOLVED);
    acc.add({ ...CONFIG, mapSize: 7 }, 0, FAILED);
    acc.add(CONFIG, 1, SOLVED);
    const rows = acc.summarize();
    expect(rows.map((r) => [r.variant, r.mapSize, r.trials])).toEqual([
      ["BFS-Graph", 5, 2],
      ["A*-Graph-Euclidean", 5, 1],
      ["BFS-Graph", 7, 1],
    ]);
    expect(Number.isNaN(rows[2].pathCost.mean)).toBe(true);
    expect(rows[2].successRate).toBe(0);
  });
});
