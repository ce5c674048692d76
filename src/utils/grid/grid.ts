import { MazeFormatError } from "../../errors/errors";
import type { Neighbor } from "../../interfaces/interfaces";
import type { Cell } from "../../types/types";
import { ACTIONS, moveBy, sameCell } from "../utils";

export const START_MARK = "A";
export const GOAL_MARK = "B";
export const WALL_MARK = "#";

export interface GridInit {
  walls: boolean[][]; // walls[r][c] === true means wall
  start: Cell;
  goal: Cell;
}

/**
 * Walkable-cell model of a maze. Never mutated after construction, so one
 * instance can back any number of searches.
 */
export class Grid {
  readonly height: number;
  readonly width: number;
  readonly start: Cell;
  readonly goal: Cell;
  private readonly walls: readonly (readonly boolean[])[];

  constructor({ walls, start, goal }: GridInit) {
    const height = walls.length;
    const width = height ? walls[0].length : 0;
    if (height === 0 || width === 0) {
      throw new MazeFormatError("maze must have at least one row and one column");
    }
    if (walls.some((row) => row.length !== width)) {
      throw new MazeFormatError("maze rows must all have the same width");
    }
    this.height = height;
    this.width = width;
    this.walls = Object.freeze(walls.map((row) => Object.freeze([...row])));

    for (const [label, cell] of [
      ["start", start],
      ["goal", goal],
    ] as const) {
      if (!this.inBounds(cell)) {
        throw new MazeFormatError(`${label} (${cell.r},${cell.c}) is outside the maze`);
      }
      if (this.isWall(cell)) {
        throw new MazeFormatError(`${label} (${cell.r},${cell.c}) is a wall`);
      }
    }
    this.start = Object.freeze({ ...start });
    this.goal = Object.freeze({ ...goal });
  }

  static fromText(text: string): Grid {
    return parseMaze(text);
  }

  inBounds(cell: Cell): boolean {
    return cell.r >= 0 && cell.r < this.height && cell.c >= 0 && cell.c < this.width;
  }

  isWall(cell: Cell): boolean {
    return this.walls[cell.r][cell.c];
  }

  isStart(cell: Cell): boolean {
    return sameCell(cell, this.start);
  }

  isGoal(cell: Cell): boolean {
    return sameCell(cell, this.goal);
  }

  // Order matters: it is the tie-break order of every search policy.
  neighbors(state: Cell): Neighbor[] {
    const out: Neighbor[] = [];
    for (const action of ACTIONS) {
      const next = moveBy(state, action);
      if (this.inBounds(next) && !this.isWall(next)) out.push({ action, state: next });
    }
    return out;
  }
}

const countOf = (text: string, mark: string) => text.split(mark).length - 1;

// Every line terminator a text file may carry, CRLF counted once.
const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

/**
 * Builds a Grid from maze text: `#` wall, `A` start, `B` goal, anything else
 * open floor. Rows shorter than the longest one are padded with open floor.
 */
export function parseMaze(text: string): Grid {
  if (countOf(text, START_MARK) !== 1) {
    throw new MazeFormatError("maze must have exactly one start point");
  }
  if (countOf(text, GOAL_MARK) !== 1) {
    throw new MazeFormatError("maze must have exactly one goal");
  }

  const lines = text.split(LINE_BREAK).map((line) => Array.from(line));
  // a trailing line break does not open another row
  if (lines.length > 1 && lines[lines.length - 1].length === 0) lines.pop();

  const width = lines.reduce((w, line) => Math.max(w, line.length), 0);
  let start: Cell | null = null;
  let goal: Cell | null = null;

  const walls: boolean[][] = [];
  for (let r = 0; r < lines.length; r++) {
    const line = lines[r];
    const row: boolean[] = [];
    for (let c = 0; c < width; c++) {
      // past the end of a short line: open floor
      const ch = c < line.length ? line[c] : " ";
      if (ch === START_MARK) start = { r, c };
      else if (ch === GOAL_MARK) goal = { r, c };
      row.push(ch === WALL_MARK);
    }
    walls.push(row);
  }

  // both markers were counted above, so both were seen
  if (start === null || goal === null) {
    throw new MazeFormatError("maze must have exactly one start point and one goal");
  }
  return new Grid({ walls, start, goal });
}
