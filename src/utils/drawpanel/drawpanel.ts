import type { GridEnvironment } from "../../environment/Environment";
import { map_color_constants } from "../constants";
import type { PanelState } from "../panelState";

const {
  emptyColor,
  wallColor,
  visitedColor,
  frontierColor,
  currentColor,
  finalPathColor,
  startGoalColor,
  endGoalColor,
  gridLineColor,
} = map_color_constants;

// The slice of the 2D canvas API the panel draws with
export type PanelCanvas = Pick<
  CanvasRenderingContext2D,
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "clearRect"
  | "fillRect"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "stroke"
>;

// ---------- Canvas Drawing ----------

export const drawPanel = (
  ctx: PanelCanvas,
  env: GridEnvironment,
  sizePx: number,
  state: PanelState | null
) => {
  const cell = sizePx / Math.max(env.width, env.height);
  const w = env.width * cell;
  const h = env.height * cell;
  ctx.clearRect(0, 0, sizePx, sizePx);
  // background cells
  for (let r = 0; r < env.height; r++) {
    for (let c = 0; c < env.width; c++) {
      ctx.fillStyle = env.isObstacle({ r, c }) ? wallColor : emptyColor;
      ctx.fillRect(c * cell, r * cell, cell, cell);
    }
  }
  if (state) {
    // visited/closed
    ctx.fillStyle = visitedColor;
    state.closed.forEach((id) => {
      const { r, c } = env.cellOf(id);
      ctx.fillRect(c * cell, r * cell, cell, cell);
    });
    // open/frontier
    ctx.fillStyle = frontierColor;
    for (const { r, c } of state.open) {
      ctx.fillRect(c * cell, r * cell, cell, cell);
    }
    // current
    if (state.current) {
      const { r, c } = state.current;
      ctx.fillStyle = currentColor;
      ctx.fillRect(c * cell, r * cell, cell, cell);
    }
    // final path
    if (state.path) {
      ctx.fillStyle = finalPathColor;
      for (const { r, c } of state.path) {
        ctx.fillRect(c * cell, r * cell, cell, cell);
      }
    }
  }
  // start/goal overlays
  const s = env.start,
    g = env.goal;
  ctx.fillStyle = startGoalColor;
  ctx.fillRect(s.c * cell, s.r * cell, cell, cell);
  ctx.fillStyle = endGoalColor;
  ctx.fillRect(g.c * cell, g.r * cell, cell, cell);
  // grid lines (light)
  ctx.strokeStyle = gridLineColor;
  ctx.lineWidth = 0.5;
  for (let i = 0; i <= env.height; i++) {
    ctx.beginPath();
    ctx.moveTo(0, i * cell);
    ctx.lineTo(w, i * cell);
    ctx.stroke();
  }
  for (let j = 0; j <= env.width; j++) {
    ctx.beginPath();
    ctx.moveTo(j * cell, 0);
    ctx.lineTo(j * cell, h);
    ctx.stroke();
  }
};
