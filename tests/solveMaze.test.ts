import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";

import {
  EXIT_INVALID,
  EXIT_OK,
  EXIT_UNSOLVABLE,
  solveMazeFile,
  type SolveIO,
} from "../src/cli/solveMaze";

const mazePath = (name: string) => fileURLToPath(new URL(`../mazes/${name}`, import.meta.url));

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  const io: SolveIO = { log: (line) => out.push(line), error: (line) => err.push(line) };
  return { io, out, err };
}

describe("solveMazeFile", () => {
  it("prints the maze, the solved maze and the counts", () => {
    const { io, out, err } = capture();

    expect(solveMazeFile(mazePath("maze3.txt"), io)).toBe(EXIT_OK);
    expect(err).toEqual([]);
    expect(out).toEqual([
      "Maze:",
      "\nA   \n███ \n   B\n",
      "Solving...",
      "Solution:",
      "\nA***\n███*\n   B\n",
      "States explored: 6",
      "Path length: 5",
    ]);
  });

  it("exits with 1 on an invalid maze", () => {
    const { io, out, err } = capture();

    expect(solveMazeFile(mazePath("invalid.txt"), io)).toBe(EXIT_INVALID);
    expect(err).toEqual(["Invalid maze: maze must have exactly one start point"]);
    expect(out).toEqual([]);
  });

  it("exits with 2 when no path exists", () => {
    const { io, out } = capture();

    expect(solveMazeFile(mazePath("unsolvable.txt"), io)).toBe(EXIT_UNSOLVABLE);
    expect(out.slice(2)).toEqual(["Solving...", "No solution.", "States explored: 2"]);
  });

  it("exits with 1 when the file cannot be read", () => {
    const { io, err } = capture();

    expect(solveMazeFile(mazePath("missing.txt"), io)).toBe(EXIT_INVALID);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith("Cannot read maze file: ENOENT")).toBe(true);
  });

  it("solves breadth-first when asked", () => {
    const { io, out } = capture();

    expect(solveMazeFile(mazePath("maze1.txt"), io, "FIFO")).toBe(EXIT_OK);
    expect(out.slice(-2)).toEqual(["States explored: 11", "Path length: 10"]);
  });
});
