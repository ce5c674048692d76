import type { Solution } from "../../interfaces/interfaces";
import type { Cell } from "../../types/types";
import { glyphs } from "../constants";
import type { Grid } from "../grid/grid";
import { keyOf } from "../utils";

export type CellKind = keyof typeof glyphs;

// Priority: wall, start, goal, path, open.
export function cellKind(grid: Grid, cell: Cell, pathKeys: ReadonlySet<string>): CellKind {
  if (grid.isWall(cell)) return "wall";
  if (grid.isStart(cell)) return "start";
  if (grid.isGoal(cell)) return "goal";
  if (pathKeys.has(keyOf(cell))) return "path";
  return "open";
}

export const pathKeysOf = (solution?: Solution | null): Set<string> =>
  new Set((solution ?? []).map((s) => keyOf(s.cell)));

export function renderMaze(grid: Grid, solution?: Solution | null): string {
  const pathKeys = pathKeysOf(solution);
  const rows: string[] = [];
  for (let r = 0; r < grid.height; r++) {
    let row = "";
    for (let c = 0; c < grid.width; c++) row += glyphs[cellKind(grid, { r, c }, pathKeys)];
    rows.push(row);
  }
  return rows.join("\n");
}
