import type { Cell, MapType } from "../../types/types";
import { GOAL_MARK, START_MARK, WALL_MARK } from "../grid/grid";
import { rngLCG } from "../utils";

// ---------- Map Generation ----------
// Generators work on an N×N wall matrix and emit maze text that parseMaze reads.

const toText = (walls: boolean[][], start: Cell, goal: Cell) =>
  walls
    .map((row, r) =>
      row
        .map((wall, c) => {
          if (r === start.r && c === start.c) return START_MARK;
          if (r === goal.r && c === goal.c) return GOAL_MARK;
          return wall ? WALL_MARK : " ";
        })
        .join("")
    )
    .join("\n");

const matrix = (N: number, wall: boolean) =>
  Array.from({ length: N }, () => new Array<boolean>(N).fill(wall));

export function generateEmptyText(N: number) {
  return toText(matrix(N, false), { r: 0, c: 0 }, { r: N - 1, c: N - 1 });
}

// random obstacles; may leave the goal unreachable
export function generateRandomText(N: number, density: number, seed: number) {
  const walls = matrix(N, false);
  const R = rngLCG(seed);
  for (let r = 0; r < N; r++) {
    for (let c = 0; c < N; c++) walls[r][c] = R.next().value < density;
  }
  return toText(walls, { r: 0, c: 0 }, { r: N - 1, c: N - 1 });
}

// Maze via DFS backtracker
export function generateMazeText(N: number, seed: number) {
  const walls = matrix(N, true);
  const R = rngLCG(seed);

  // rooms sit at odd coordinates
  const inBoundsCell = (r: number, c: number) =>
    r > 0 && r < N - 1 && c > 0 && c < N - 1 && r % 2 === 1 && c % 2 === 1;

  const visited = matrix(N, false);
  const stack: Cell[] = [];

  const [sr, sc] = N <= 2 ? [0, 0] : [1, 1];

  stack.push({ r: sr, c: sc });
  visited[sr][sc] = true;
  walls[sr][sc] = false;

  const cellDirs: [number, number][] = [
    [2, 0],
    [-2, 0],
    [0, 2],
    [0, -2],
  ];

  while (stack.length) {
    const cur = stack[stack.length - 1];

    for (let i = cellDirs.length - 1; i > 0; i--) {
      const j = Math.floor(R.next().value * (i + 1));
      [cellDirs[i], cellDirs[j]] = [cellDirs[j], cellDirs[i]];
    }

    let moved = false;

    for (const [dr, dc] of cellDirs) {
      const nr = cur.r + dr;
      const nc = cur.c + dc;
      if (!inBoundsCell(nr, nc)) continue;
      if (visited[nr][nc]) continue;

      visited[nr][nc] = true;
      walls[nr][nc] = false;

      walls[cur.r + dr / 2][cur.c + dc / 2] = false;

      stack.push({ r: nr, c: nc });
      moved = true;
      break;
    }

    if (!moved) {
      stack.pop();
    }
  }

  // first and last open cells, reading row by row
  const open: Cell[] = [];
  for (let r = 0; r < N; r++) {
    for (let c = 0; c < N; c++) if (!walls[r][c]) open.push({ r, c });
  }
  if (open.length < 2) {
    walls[0][0] = false;
    walls[N - 1][N - 1] = false;
    return toText(walls, { r: 0, c: 0 }, { r: N - 1, c: N - 1 });
  }
  return toText(walls, open[0], open[open.length - 1]);
}

export function generateMapText(mapType: MapType, N: number, density: number, seed: number) {
  // start and goal need distinct cells
  if (N < 2) throw new RangeError(`map size must be at least 2, got ${N}`);
  if (mapType === "Empty") return generateEmptyText(N);
  if (mapType === "Random") return generateRandomText(N, density, seed);
  return generateMazeText(N, seed);
}
