import { describe, it, expect } from "vitest";
import { GridEnvironment, buildMotionSet } from "./Environment";
import { InvalidEnvironmentError } from "../utils/errors/errors";

const names = (env: GridEnvironment, r: number, c: number) =>
  env.actions({ r, c }).map((a) => a.name);

describe("GridEnvironment.fromRows", () => {
  it("parses walls, start and goal", () => {
    const env = GridEnvironment.fromRows(["S.#", "..G"], "4-directional");
    expect(env.width).toBe(3);
    expect(env.height).toBe(2);
    expect(env.start).toEqual({ r: 0, c: 0 });
    expect(env.goal).toEqual({ r: 1, c: 2 });
    expect(env.isObstacle({ r: 0, c: 2 })).toBe(true);
    expect(env.isFree({ r: 1, c: 1 })).toBe(true);
    expect(env.obstacleCount()).toBe(1);
    expect(env.toRows()).toEqual(["S.#", "..G"]);
  });

  it("rejects ragged rows", () => {
    expect(() => GridEnvironment.fromRows(["S..", ".G"], "4-directional")).toThrow(
      "Invalid environment: row 1 has 2 cells, expected 3"
    );
  });

  it("needs exactly one start and one goal", () => {
    expect(() => GridEnvironment.fromRows(["...", "..G"], "4-directional")).toThrow(
      InvalidEnvironmentError
    );
    expect(() => GridEnvironment.fromRows(["S.G", "..G"], "4-directional")).toThrow(
      "more than one goal"
    );
  });
});

describe("GridEnvironment validation", () => {
  const base = {
    width: 3,
    height: 3,
    obstacles: [{ r: 1, c: 1 }],
    start: { r: 0, c: 0 },
    goal: { r: 2, c: 2 },
    motion: "4-directional" as const,
  };

  it("accepts a well-formed grid", () => {
    expect(new GridEnvironment(base).obstacleCount()).toBe(1);
  });

  it("rejects a start on an obstacle", () => {
    expect(() => new GridEnvironment({ ...base, start: { r: 1, c: 1 } })).toThrow(
      "Invalid environment: start (1,1) is on an obstacle"
    );
  });

  it("rejects a goal outside the grid", () => {
    expect(() => new GridEnvironment({ ...base, goal: { r: 3, c: 0 } })).toThrow(
      "goal (3,0) is outside the 3x3 grid"
    );
  });

  it("rejects obstacles outside the grid", () => {
    expect(
      () => new GridEnvironment({ ...base, obstacles: [{ r: -1, c: 0 }] })
    ).toThrow(InvalidEnvironmentError);
  });

  it("rejects empty or fractional dimensions", () => {
    expect(() => new GridEnvironment({ ...base, width: 0 })).toThrow(
      InvalidEnvironmentError
    );
    expect(() => new GridEnvironment({ ...base, height: 2.5 })).toThrow(
      InvalidEnvironmentError
    );
  });

  it("rejects non-positive move costs", () => {
    expect(
      () =>
        new GridEnvironment({ ...base, moveCosts: { straight: 0, diagonal: 1 } })
    ).toThrow("straight move cost must be a positive number, got 0");
  });
});

describe("motion set", () => {
  it("lists actions in a fixed order", () => {
    const rows = [".....", ".....", "..S..", ".....", "....G"];
    expect(names(GridEnvironment.fromRows(rows, "4-directional"), 2, 2)).toEqual([
      "N",
      "S",
      "E",
      "W",
    ]);
    expect(names(GridEnvironment.fromRows(rows, "8-directional"), 2, 2)).toEqual([
      "N",
      "S",
      "E",
      "W",
      "NE",
      "NW",
      "SE",
      "SW",
    ]);
  });

  it("drops a diagonal when both orthogonal cells are blocked", () => {
    const env = GridEnvironment.fromRows(["S#", "#G"], "8-directional");
    expect(names(env, 0, 0)).toEqual(["N", "S", "E", "W"]);
  });

  it("keeps a diagonal when one orthogonal cell is free", () => {
    const env = GridEnvironment.fromRows(["S.", "#G"], "8-directional");
    expect(names(env, 0, 0)).toEqual(["N", "S", "E", "W", "NE", "SE"]);
  });

  it("uses unit and sqrt(2) costs by default", () => {
    const costs = buildMotionSet("8-directional").map((a) => a.cost);
    expect(costs).toEqual([1, 1, 1, 1, Math.SQRT2, Math.SQRT2, Math.SQRT2, Math.SQRT2]);
  });

  it("hands out actions that cannot be re-priced", () => {
    const env = GridEnvironment.fromRows(["S.", ".G"], "8-directional");
    const [north] = env.actions({ r: 0, c: 0 });
    expect(Object.isFrozen(north)).toBe(true);
    expect(Reflect.set(north, "cost", 100)).toBe(false);
    expect(env.stepCost(env.actions({ r: 1, c: 0 })[0])).toBe(1);
  });

  it("takes custom move costs", () => {
    const env = GridEnvironment.fromRows(["S.", ".G"], "8-directional", {
      straight: 2,
      diagonal: 3,
    });
    const [north, , , , northEast] = env.actions({ r: 1, c: 1 });
    expect(env.stepCost(north)).toBe(2);
    expect(env.stepCost(northEast)).toBe(3);
  });
});
