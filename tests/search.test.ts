import { readFileSync } from "fs";
import { describe, expect, it } from "vitest";

import {
  algoSearch,
  isWalk,
  reconstructSolution,
  SearchEngine,
  solutionCells,
  solve,
} from "../src/algorithms/search";
import type { SearchNode } from "../src/interfaces/interfaces";
import { parseMaze } from "../src/utils/grid/grid";
import { generateMazeText } from "../src/utils/mapGen/mapGen";
import { renderMaze } from "../src/utils/render/render";

const SMALL = ["A #", "  #", " B"].join("\n");

const fixture = (name: string) =>
  readFileSync(new URL(`../mazes/${name}`, import.meta.url), "utf8");

describe("solve", () => {
  it("finds the one-step path when start touches goal", () => {
    const outcome = solve(parseMaze("AB"));

    expect(outcome.status).toBe("solved");
    if (outcome.status !== "solved") return;
    expect(outcome.solution).toEqual([{ action: "right", cell: { r: 0, c: 1 } }]);
    expect(outcome.run.exploredCount).toBe(2);
  });

  it("explores depth-first by default", () => {
    const outcome = solve(parseMaze(SMALL));

    expect(outcome.run.policy).toBe("LIFO");
    expect(outcome.run.exploredCount).toBe(4);
    expect(outcome.run.peakFrontier).toBe(2);
    if (outcome.status !== "solved") throw new Error("expected a solution");
    expect(outcome.solution).toEqual([
      { action: "right", cell: { r: 0, c: 1 } },
      { action: "down", cell: { r: 1, c: 1 } },
      { action: "down", cell: { r: 2, c: 1 } },
    ]);
  });

  it("explores breadth-first with a FIFO frontier", () => {
    const outcome = solve(parseMaze(SMALL), "FIFO");

    expect(outcome.run.exploredCount).toBe(6);
    expect(outcome.run.peakFrontier).toBe(3);
    if (outcome.status !== "solved") throw new Error("expected a solution");
    expect(solutionCells(outcome.solution)).toEqual([
      { r: 1, c: 0 },
      { r: 2, c: 0 },
      { r: 2, c: 1 },
    ]);
  });

  it("reports an enclosed goal as exhausted", () => {
    const outcome = solve(parseMaze("A  #B"));

    expect(outcome.status).toBe("exhausted");
    expect(outcome.run.exploredCount).toBe(3);
    expect([...outcome.run.explored]).toEqual(["0,0", "0,1", "0,2"]);
  });

  it("walks the corridor of maze1", () => {
    const grid = parseMaze(fixture("maze1.txt"));
    const outcome = solve(grid);

    if (outcome.status !== "solved") throw new Error("expected a solution");
    expect(outcome.solution).toHaveLength(10);
    expect(outcome.run.exploredCount).toBe(11);
    expect(renderMaze(grid, outcome.solution)).toBe(
      ["█████B█", "█████*█", "████**█", "████*██", "*****██", "A██████"].join("\n")
    );
  });

  it("uses open floor past the end of short rows", () => {
    const grid = parseMaze(fixture("maze3.txt"));
    const outcome = solve(grid);

    if (outcome.status !== "solved") throw new Error("expected a solution");
    expect(outcome.solution.map((s) => s.action)).toEqual(["right", "right", "right", "down", "down"]);
    expect(renderMaze(grid, outcome.solution)).toBe(["A***", "███*", "   B"].join("\n"));
  });

  it("returns walks that end on the goal", () => {
    const grid = parseMaze(fixture("maze2.txt"));
    for (const policy of ["LIFO", "FIFO"] as const) {
      const outcome = solve(grid, policy);
      if (outcome.status !== "solved") throw new Error(`${policy} found no path`);
      expect(isWalk(grid.start, outcome.solution)).toBe(true);
      expect(outcome.solution[outcome.solution.length - 1].cell).toEqual(grid.goal);
    }
  });

  it("gives identical results on repeated runs", () => {
    const grid = parseMaze(generateMazeText(21, 7));
    for (const policy of ["LIFO", "FIFO"] as const) {
      const first = solve(grid, policy);
      const second = solve(grid, policy);
      expect(second.run.exploredCount).toBe(first.run.exploredCount);
      expect(second).toEqual(first);
    }
  });

  it("never yields a state twice", () => {
    const grid = parseMaze(generateMazeText(15, 3));
    const seen = new Set<string>();
    const gen = algoSearch(grid, "FIFO");
    for (let res = gen.next(); !res.done; res = gen.next()) {
      const k = `${res.value.current.r},${res.value.current.c}`;
      expect(seen.has(k)).toBe(false);
      seen.add(k);
    }
  });
});

describe("algoSearch", () => {
  it("yields a snapshot per removal and returns the outcome", () => {
    const gen = algoSearch(parseMaze(SMALL), "LIFO");

    const first = gen.next();
    expect(first.done).toBe(false);
    if (first.done) return;
    expect(first.value.current).toEqual({ r: 0, c: 0 });
    expect(first.value.exploredCount).toBe(1);
    expect(first.value.frontier.size).toBe(0);

    const second = gen.next();
    if (second.done) throw new Error("search ended early");
    expect(second.value.current).toEqual({ r: 0, c: 1 });
    expect(second.value.frontier.states()).toEqual([{ r: 1, c: 0 }]);

    let res = gen.next();
    while (!res.done) res = gen.next();
    expect(res.value.status).toBe("solved");
  });
});

describe("SearchEngine", () => {
  it("moves from READY to SOLVED", () => {
    const engine = new SearchEngine();
    expect(engine.status).toBe("READY");
    expect(engine.policy).toBe("LIFO");

    engine.solve(parseMaze("AB"));
    expect(engine.status).toBe("SOLVED");
  });

  it("moves to UNSOLVABLE when the frontier runs out", () => {
    const engine = new SearchEngine("FIFO");
    const outcome = engine.solve(parseMaze("A#B"));

    expect(outcome.status).toBe("exhausted");
    expect(engine.status).toBe("UNSOLVABLE");
  });

  it("starts every run from scratch", () => {
    const engine = new SearchEngine();
    const grid = parseMaze(SMALL);

    const first = engine.solve(grid);
    const second = engine.solve(grid);
    expect(second.run.exploredCount).toBe(4);
    expect(second.run.explored).not.toBe(first.run.explored);
  });
});

describe("reconstructSolution", () => {
  it("follows parent indices back to the root", () => {
    const nodes: SearchNode[] = [
      { id: 0, state: { r: 1, c: 1 }, parent: null, action: null },
      { id: 1, state: { r: 0, c: 1 }, parent: 0, action: "up" },
      { id: 2, state: { r: 0, c: 0 }, parent: 1, action: "left" },
    ];

    expect(reconstructSolution(nodes, nodes[2])).toEqual([
      { action: "up", cell: { r: 0, c: 1 } },
      { action: "left", cell: { r: 0, c: 0 } },
    ]);
    expect(reconstructSolution(nodes, nodes[0])).toEqual([]);
  });

  it("detects a broken walk", () => {
    expect(isWalk({ r: 0, c: 0 }, [{ action: "down", cell: { r: 0, c: 1 } }])).toBe(false);
    expect(isWalk({ r: 0, c: 0 }, [{ action: "right", cell: { r: 0, c: 1 } }])).toBe(true);
  });
});
