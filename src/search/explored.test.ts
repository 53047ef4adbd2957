import { describe, it, expect } from "vitest";
import { BestCostMap, NoExplored, VisitedSet, makeExplored } from "./explored";

describe("explored policies", () => {
  it("tree mode admits everything", () => {
    const e = new NoExplored();
    e.settle();
    expect(e.isSettled()).toBe(false);
    expect(e.admits()).toBe(true);
    expect(e.size).toBe(0);
  });

  it("visited set never reopens a state", () => {
    const e = new VisitedSet();
    e.settle(3);
    expect(e.isSettled(3)).toBe(true);
    expect(e.admits(3)).toBe(false);
    expect(e.admits(4)).toBe(true);
    expect(e.size).toBe(1);
  });

  it("best-cost map reopens only on a strictly cheaper arrival", () => {
    const e = new BestCostMap();
    e.settle(3, 5);
    expect(e.isSettled(3, 5)).toBe(true);
    expect(e.isSettled(3, 6)).toBe(true);
    expect(e.isSettled(3, 4)).toBe(false);
    expect(e.admits(3, 4)).toBe(true);
    expect(e.admits(3, 5)).toBe(false);
    e.settle(3, 4);
    expect(e.size).toBe(1);
    expect(e.isSettled(3, 4)).toBe(true);
  });

  it("picks the policy for each algorithm and mode", () => {
    expect(makeExplored("A*", "Tree")).toBeInstanceOf(NoExplored);
    expect(makeExplored("BFS", "Graph")).toBeInstanceOf(VisitedSet);
    expect(makeExplored("DFS", "Graph")).toBeInstanceOf(VisitedSet);
    expect(makeExplored("UCS", "Graph")).toBeInstanceOf(BestCostMap);
    expect(makeExplored("A*", "Graph")).toBeInstanceOf(BestCostMap);
  });
});
