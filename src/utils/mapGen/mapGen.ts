import { GridEnvironment } from "../../environment/Environment";
import type { Cell, EnvironmentType, MotionModel } from "../../types/types";
import { InvalidEnvironmentError } from "../errors/errors";
import { idOf, randomIndex, rcOf, rngLCG } from "../utils";

// ---------- Map Generation ----------
// Square size x size maps. Every generator except Maze walls the border
// and runs from (1,1) to (size-2,size-2).

export function generateBordered(size: number) {
  const blocks = new Uint8Array(size * size); // 0 free, 1 wall
  for (let i = 0; i < size; i++) {
    blocks[idOf(size, 0, i)] = 1;
    blocks[idOf(size, size - 1, i)] = 1;
    blocks[idOf(size, i, 0)] = 1;
    blocks[idOf(size, i, size - 1)] = 1;
  }
  return blocks;
}

// Scatter `density * size^2` obstacles over the interior (repeats allowed)
export function scatterObstacles(
  blocks: Uint8Array,
  size: number,
  density: number,
  seed: number,
  keepFree: Cell[]
) {
  const R = rngLCG(seed);
  const count = Math.floor(size * size * density);
  for (let i = 0; i < count; i++) {
    const r = 1 + randomIndex(R, size - 2);
    const c = 1 + randomIndex(R, size - 2);
    if (keepFree.some((k) => k.r === r && k.c === c)) continue;
    blocks[idOf(size, r, c)] = 1;
  }
  return blocks;
}

// Horizontal walls on every other row, open at both ends
export function generateCorridor(size: number) {
  const blocks = generateBordered(size);
  for (let r = 2; r < size - 2; r += 2) {
    for (let c = 2; c < size - 3; c++) blocks[idOf(size, r, c)] = 1;
  }
  return blocks;
}

// Four rooms split by a cross of walls, one doorway per wall segment
export function generateRooms(size: number) {
  const blocks = generateBordered(size);
  const mid = Math.floor(size / 2);
  for (let i = 1; i < size - 1; i++) {
    blocks[idOf(size, i, mid)] = 1;
    blocks[idOf(size, mid, i)] = 1;
  }
  const nearDoor = Math.floor(mid / 2);
  const farDoor = Math.floor((mid + size - 1) / 2);
  for (const d of [nearDoor, farDoor]) {
    if (d > 0 && d < size - 1 && d !== mid) {
      blocks[idOf(size, d, mid)] = 0;
      blocks[idOf(size, mid, d)] = 0;
    }
  }
  return blocks;
}

// Steps between maze rooms; the wall cell halfway is carved with the room
const ROOM_STEPS: [number, number][] = [
  [-2, 0],
  [2, 0],
  [0, 2],
  [0, -2],
];

// Maze via DFS backtracker. Rooms sit on odd (r, c); everything else
// starts as wall, so an uncarved room is one not yet visited.
export function generateMaze(size: number, seed: number) {
  if (size < 3) {
    throw new InvalidEnvironmentError(`maze needs size >= 3, got ${size}`);
  }
  const blocks = new Uint8Array(size * size).fill(1);
  const R = rngLCG(seed);
  const isRoom = (r: number, c: number) =>
    r % 2 === 1 && c % 2 === 1 && r < size - 1 && c < size - 1;
  const uncarved = (r: number, c: number) =>
    isRoom(r, c) && blocks[idOf(size, r, c)] === 1;

  const stack = [idOf(size, 1, 1)];
  blocks[stack[0]] = 0;
  while (stack.length) {
    const { r, c } = rcOf(size, stack[stack.length - 1]);
    const options = ROOM_STEPS.filter(([dr, dc]) => uncarved(r + dr, c + dc));
    if (options.length === 0) {
      stack.pop();
      continue;
    }
    const [dr, dc] = options[randomIndex(R, options.length)];
    blocks[idOf(size, r + dr / 2, c + dc / 2)] = 0;
    const next = idOf(size, r + dr, c + dc);
    blocks[next] = 0;
    stack.push(next);
  }
  return blocks;
}

// First and last open cells in row-major order
export function openEndpoints(size: number, blocks: Uint8Array) {
  const first = blocks.indexOf(0);
  const last = blocks.lastIndexOf(0);
  if (first < 0) throw new InvalidEnvironmentError("map has no open cell");
  return { start: rcOf(size, first), goal: rcOf(size, last) };
}

function blocksToCells(size: number, blocks: Uint8Array): Cell[] {
  const out: Cell[] = [];
  for (let i = 0; i < blocks.length; i++) {
    if (blocks[i] === 1) out.push(rcOf(size, i));
  }
  return out;
}

// Obstacle share of the map for the scattered types
export const DEFAULT_DENSITY = { SimpleObstacles: 0.1, Dense: 0.3 } as const;

export const isScattered = (type: EnvironmentType): type is keyof typeof DEFAULT_DENSITY =>
  type === "SimpleObstacles" || type === "Dense";

export interface MapOptions {
  start?: Cell;
  goal?: Cell;
  density?: number; // SimpleObstacles and Dense only
}

/**
 * Generated map as an environment. Bordered maps run from (1,1) to
 * (size-2,size-2) and mazes between their first and last open cells,
 * unless `options` names the endpoints; an endpoint on a wall throws.
 */
export function buildEnvironment(
  type: EnvironmentType,
  size: number,
  motion: MotionModel,
  seed = 42,
  options: MapOptions = {}
): GridEnvironment {
  const { density } = options;
  if (density !== undefined && !(density >= 0 && density <= 1)) {
    throw new InvalidEnvironmentError(`density must be within [0, 1], got ${density}`);
  }
  let start: Cell = options.start ?? { r: 1, c: 1 };
  let goal: Cell = options.goal ?? { r: size - 2, c: size - 2 };
  let blocks: Uint8Array;

  switch (type) {
    case "Empty":
      blocks = generateBordered(size);
      break;
    case "SimpleObstacles":
      blocks = scatterObstacles(generateBordered(size), size, density ?? DEFAULT_DENSITY.SimpleObstacles, seed, [start, goal]);
      break;
    case "Dense":
      blocks = scatterObstacles(generateBordered(size), size, density ?? DEFAULT_DENSITY.Dense, seed, [start, goal]);
      break;
    case "Corridor":
      blocks = generateCorridor(size);
      break;
    case "Rooms":
      blocks = generateRooms(size);
      break;
    case "Maze": {
      blocks = generateMaze(size, seed);
      const ends = openEndpoints(size, blocks);
      start = options.start ?? ends.start;
      goal = options.goal ?? ends.goal;
      break;
    }
    default:
      throw new InvalidEnvironmentError(`unknown environment type "${type}"`);
  }

  return new GridEnvironment({
    width: size,
    height: size,
    obstacles: blocksToCells(size, blocks),
    start,
    goal,
    motion,
  });
}
