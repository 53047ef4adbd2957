import type { GridEnvironment } from "../environment/Environment";
import type { Cell, EnvironmentType, MotionModel } from "../types/types";
import { InvalidEnvironmentError } from "./errors/errors";
import { buildEnvironment, isScattered } from "./mapGen/mapGen";
import { parseCell } from "./utils";

// Map controls as the lab holds them; blank endpoints mean the map's own
export interface LabMapSettings {
  type: EnvironmentType;
  size: number;
  motion: MotionModel;
  seed: number;
  start: string;
  goal: string;
  densityPct: number;
}

export interface LabMap {
  env: GridEnvironment;
  error?: string;
}

function typedEndpoint(kind: "start" | "goal", text: string): Cell | undefined {
  if (text.trim() === "") return undefined;
  const cell = parseCell(text);
  if (!cell) throw new InvalidEnvironmentError(`${kind} "${text}" is not a row,col pair`);
  return cell;
}

/**
 * Map for the lab panels. Endpoints the grid rejects are reported in
 * `error` and the map falls back to its default endpoints.
 */
export function buildLabEnvironment(settings: LabMapSettings): LabMap {
  const { type, size, motion, seed } = settings;
  const density = isScattered(type) ? settings.densityPct / 100 : undefined;
  try {
    const start = typedEndpoint("start", settings.start);
    const goal = typedEndpoint("goal", settings.goal);
    return { env: buildEnvironment(type, size, motion, seed, { start, goal, density }) };
  } catch (err) {
    if (!(err instanceof InvalidEnvironmentError)) throw err;
    return {
      env: buildEnvironment(type, size, motion, seed, { density }),
      error: err.message,
    };
  }
}
