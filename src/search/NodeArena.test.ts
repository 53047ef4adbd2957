import { describe, it, expect } from "vitest";
import { buildMotionSet } from "../environment/Environment";
import { NO_PARENT, NodeArena } from "./NodeArena";

describe("NodeArena", () => {
  const [, south, east] = buildMotionSet("4-directional");

  it("accumulates cost and depth along parent links", () => {
    const arena = new NodeArena();
    const root = arena.addRoot({ r: 0, c: 0 });
    const a = arena.addChild(root, east, { r: 0, c: 1 }, 1);
    const b = arena.addChild(a, south, { r: 1, c: 1 }, 2.5);

    expect(arena.size).toBe(3);
    expect(arena.parent(root)).toBe(NO_PARENT);
    expect(arena.parent(b)).toBe(a);
    expect(arena.pathCost(b)).toBe(3.5);
    expect(arena.depth(b)).toBe(2);
    expect(arena.action(root)).toBeNull();
  });

  it("rebuilds the path and actions from the root", () => {
    const arena = new NodeArena();
    const root = arena.addRoot({ r: 0, c: 0 });
    const a = arena.addChild(root, east, { r: 0, c: 1 }, 1);
    arena.addChild(root, south, { r: 1, c: 0 }, 1);
    const c = arena.addChild(a, south, { r: 1, c: 1 }, 1);

    expect(arena.pathTo(c)).toEqual([
      { r: 0, c: 0 },
      { r: 0, c: 1 },
      { r: 1, c: 1 },
    ]);
    expect(arena.actionsTo(c)).toEqual(["E", "S"]);
    expect(arena.pathTo(root)).toEqual([{ r: 0, c: 0 }]);
    expect(arena.actionsTo(root)).toEqual([]);
  });
});
