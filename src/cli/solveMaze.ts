import { readFileSync } from "fs";
import { solve } from "../algorithms/search";
import { MazeFormatError } from "../errors/errors";
import type { RemovalPolicy } from "../types/types";
import { type Grid, parseMaze } from "../utils/grid/grid";
import { renderMaze } from "../utils/render/render";

export const DEFAULT_MAZE_FILE = "mazes/maze1.txt";

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_UNSOLVABLE = 2;

export interface SolveIO {
  log: (line: string) => void;
  error: (line: string) => void;
}

const consoleIO: SolveIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Loads a maze file, prints it, solves it and prints the path.
 * Returns the process exit code.
 */
export function solveMazeFile(
  file: string = DEFAULT_MAZE_FILE,
  io: SolveIO = consoleIO,
  policy: RemovalPolicy = "LIFO"
): number {
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    io.error(`Cannot read maze file: ${e.message}`);
    return EXIT_INVALID;
  }

  let grid: Grid;
  try {
    grid = parseMaze(text);
  } catch (e) {
    if (!(e instanceof MazeFormatError)) throw e;
    io.error(`Invalid maze: ${e.message}`);
    return EXIT_INVALID;
  }

  io.log("Maze:");
  io.log(`\n${renderMaze(grid)}\n`);

  io.log("Solving...");
  const outcome = solve(grid, policy);
  if (outcome.status === "exhausted") {
    io.log("No solution.");
    io.log(`States explored: ${outcome.run.exploredCount}`);
    return EXIT_UNSOLVABLE;
  }

  io.log("Solution:");
  io.log(`\n${renderMaze(grid, outcome.solution)}\n`);
  io.log(`States explored: ${outcome.run.exploredCount}`);
  io.log(`Path length: ${outcome.solution.length}`);
  return EXIT_OK;
}
