import { describe, it, expect } from "vitest";
import { buildLabEnvironment, type LabMapSettings } from "./labMap";
import { buildEnvironment } from "./mapGen/mapGen";

const base: LabMapSettings = {
  type: "Empty",
  size: 7,
  motion: "4-directional",
  seed: 42,
  start: "",
  goal: "",
  densityPct: 10,
};

describe("buildLabEnvironment", () => {
  it("uses the map's endpoints when none are typed", () => {
    const { env, error } = buildLabEnvironment(base);
    expect(error).toBeUndefined();
    expect(env.start).toEqual({ r: 1, c: 1 });
    expect(env.goal).toEqual({ r: 5, c: 5 });
  });

  it("moves the endpoints to typed cells", () => {
    const { env, error } = buildLabEnvironment({ ...base, start: "2,3", goal: "(4,1)" });
    expect(error).toBeUndefined();
    expect(env.start).toEqual({ r: 2, c: 3 });
    expect(env.goal).toEqual({ r: 4, c: 1 });
  });

  it("falls back when the grid rejects an endpoint", () => {
    const onWall = buildLabEnvironment({ ...base, start: "0,0" });
    expect(onWall.error).toBe("Invalid environment: start (0,0) is on an obstacle");
    expect(onWall.env.start).toEqual({ r: 1, c: 1 });

    const outside = buildLabEnvironment({ ...base, goal: "9,9" });
    expect(outside.error).toBe("Invalid environment: goal (9,9) is outside the 7x7 grid");
    expect(outside.env.goal).toEqual({ r: 5, c: 5 });
  });

  it("reports endpoints it cannot read", () => {
    const { env, error } = buildLabEnvironment({ ...base, start: "two,three", goal: "3,3" });
    expect(error).toBe('Invalid environment: start "two,three" is not a row,col pair');
    expect(env.start).toEqual({ r: 1, c: 1 });
    expect(env.goal).toEqual({ r: 5, c: 5 });
  });

  it("applies the density only to scattered maps", () => {
    const bare = buildLabEnvironment({ ...base, type: "SimpleObstacles", size: 9, densityPct: 0 });
    expect(bare.env.obstacleCount()).toBe(32);

    const rooms = buildLabEnvironment({ ...base, type: "Rooms", size: 9, densityPct: 50 });
    expect(rooms.env.obstacleCount()).toBe(
      buildEnvironment("Rooms", 9, "4-directional", 42).obstacleCount()
    );
  });
});
