import { describe, expect, it } from "vitest";

import { solve } from "../src/algorithms/search";
import { parseMaze } from "../src/utils/grid/grid";
import { cellKind, pathKeysOf, renderMaze } from "../src/utils/render/render";

const SMALL = ["A #", "  #", " B"].join("\n");

describe("renderMaze", () => {
  it("draws the bare maze", () => {
    expect(renderMaze(parseMaze(SMALL))).toBe("A █\n  █\n B ");
  });

  it("overlays the path but keeps the goal glyph", () => {
    const grid = parseMaze(SMALL);
    const outcome = solve(grid);
    if (outcome.status !== "solved") throw new Error("expected a solution");

    expect(renderMaze(grid, outcome.solution)).toBe("A*█\n *█\n B ");
  });

  it("draws the breadth-first path", () => {
    const grid = parseMaze(SMALL);
    const outcome = solve(grid, "FIFO");
    if (outcome.status !== "solved") throw new Error("expected a solution");

    expect(renderMaze(grid, outcome.solution)).toBe("A █\n* █\n*B ");
  });

  it("treats a null solution as no overlay", () => {
    expect(renderMaze(parseMaze("A#B"), null)).toBe("A█B");
  });
});

describe("cellKind", () => {
  it("checks wall, start, goal, path, open in that order", () => {
    const grid = parseMaze(SMALL);
    const keys = new Set(["0,0", "2,1", "1,1", "0,2"]);

    expect(cellKind(grid, { r: 0, c: 2 }, keys)).toBe("wall");
    expect(cellKind(grid, { r: 0, c: 0 }, keys)).toBe("start");
    expect(cellKind(grid, { r: 2, c: 1 }, keys)).toBe("goal");
    expect(cellKind(grid, { r: 1, c: 1 }, keys)).toBe("path");
    expect(cellKind(grid, { r: 1, c: 0 }, keys)).toBe("open");
  });

  it("collects path keys from a solution", () => {
    expect(pathKeysOf([{ action: "down", cell: { r: 1, c: 0 } }])).toEqual(new Set(["1,0"]));
    expect(pathKeysOf(undefined).size).toBe(0);
  });
});
