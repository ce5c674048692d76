import type { SearchSnapshot, Solution } from "../../interfaces/interfaces";
import type { Cell } from "../../types/types";
import { map_color_constants } from "../constants";
import type { Grid } from "../grid/grid";
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
// ---------- Canvas Drawing ----------

export const drawPanel = (
  ctx: CanvasRenderingContext2D,
  grid: Grid,
  sizePx: number,
  snapshot: SearchSnapshot | null,
  solution: Solution | null
) => {
  const cell = sizePx / Math.max(grid.width, grid.height);
  const fill = ({ r, c }: Cell) => ctx.fillRect(c * cell, r * cell, cell, cell);
  ctx.clearRect(0, 0, sizePx, sizePx);
  // background cells
  for (let r = 0; r < grid.height; r++) {
    for (let c = 0; c < grid.width; c++) {
      ctx.fillStyle = grid.isWall({ r, c }) ? wallColor : emptyColor;
      fill({ r, c });
    }
  }
  if (snapshot) {
    // explored
    ctx.fillStyle = visitedColor;
    snapshot.explored.forEach((k) => {
      const [r, c] = k.split(",").map(Number);
      fill({ r, c });
    });
    // frontier
    ctx.fillStyle = frontierColor;
    snapshot.frontier.states().forEach(fill);
    ctx.fillStyle = currentColor;
    fill(snapshot.current);
  }
  if (solution) {
    ctx.fillStyle = finalPathColor;
    for (const step of solution) fill(step.cell);
  }
  // start/goal overlays
  ctx.fillStyle = startGoalColor;
  fill(grid.start);
  ctx.fillStyle = endGoalColor;
  fill(grid.goal);
  // grid lines (light)
  ctx.strokeStyle = gridLineColor;
  ctx.lineWidth = 0.5;
  for (let i = 0; i <= grid.height; i++) {
    ctx.beginPath();
    ctx.moveTo(0, i * cell);
    ctx.lineTo(grid.width * cell, i * cell);
    ctx.stroke();
  }
  for (let j = 0; j <= grid.width; j++) {
    ctx.beginPath();
    ctx.moveTo(j * cell, 0);
    ctx.lineTo(j * cell, grid.height * cell);
    ctx.stroke();
  }
};
