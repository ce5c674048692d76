import type {
  SearchNode,
  SearchOutcome,
  SearchRun,
  SearchSnapshot,
  Solution,
  Step,
} from "../interfaces/interfaces";
import type { Cell, RemovalPolicy, SearchStatus } from "../types/types";
import { Frontier } from "../utils/frontier/Frontier";
import type { Grid } from "../utils/grid/grid";
import { keyOf, moveBy, sameCell } from "../utils/utils";

export const DEFAULT_POLICY: RemovalPolicy = "LIFO";

// Walk parent indices from the goal node back to the root.
export function reconstructSolution(nodes: readonly SearchNode[], goal: SearchNode): Solution {
  const steps: Step[] = [];
  let cur: SearchNode = goal;
  while (cur.parent !== null && cur.action !== null) {
    steps.push({ action: cur.action, cell: cur.state });
    cur = nodes[cur.parent];
  }
  return steps.reverse();
}

export const solutionCells = (solution: Solution): Cell[] => solution.map((s) => s.cell);

// Each cell is the previous one shifted by its step's action.
export function isWalk(start: Cell, solution: Solution): boolean {
  let prev = start;
  for (const { action, cell } of solution) {
    if (!sameCell(moveBy(prev, action), cell)) return false;
    prev = cell;
  }
  return true;
}

/**
 * Uninformed search from grid.start to grid.goal. Yields a live snapshot
 * after every removal from the frontier and returns the outcome. Running out
 * of frontier is the "exhausted" outcome, not an error.
 */
export function* algoSearch(
  grid: Grid,
  policy: RemovalPolicy = DEFAULT_POLICY
): Generator<SearchSnapshot, SearchOutcome, void> {
  const nodes: SearchNode[] = [];
  const explored = new Set<string>();
  const frontier = new Frontier(policy);
  const run: SearchRun = {
    policy,
    exploredCount: 0,
    explored,
    peakFrontier: 1,
    nodes,
  };

  const root: SearchNode = { id: 0, state: grid.start, parent: null, action: null };
  nodes.push(root);
  frontier.add(root);

  while (!frontier.isEmpty()) {
    run.peakFrontier = Math.max(run.peakFrontier, frontier.size);
    const node = frontier.remove();
    run.exploredCount++;

    yield {
      current: node.state,
      exploredCount: run.exploredCount,
      explored,
      frontier,
      peakFrontier: run.peakFrontier,
    };

    if (grid.isGoal(node.state)) {
      return { status: "solved", solution: reconstructSolution(nodes, node), run };
    }

    explored.add(keyOf(node.state));
    for (const { action, state } of grid.neighbors(node.state)) {
      if (explored.has(keyOf(state)) || frontier.containsState(state)) continue;
      const child: SearchNode = { id: nodes.length, state, parent: node.id, action };
      nodes.push(child);
      frontier.add(child);
    }
  }

  return { status: "exhausted", run };
}

/**
 * READY -> RUNNING -> SOLVED | UNSOLVABLE. The status reflects the latest
 * run; per-run data comes back in the outcome.
 */
export class SearchEngine {
  private _status: SearchStatus = "READY";

  constructor(readonly policy: RemovalPolicy = DEFAULT_POLICY) {}

  get status(): SearchStatus {
    return this._status;
  }

  solve(grid: Grid): SearchOutcome {
    this._status = "RUNNING";
    const gen = algoSearch(grid, this.policy);
    let res = gen.next();
    while (!res.done) res = gen.next();
    this._status = res.value.status === "solved" ? "SOLVED" : "UNSOLVABLE";
    return res.value;
  }
}

export function solve(grid: Grid, policy: RemovalPolicy = DEFAULT_POLICY): SearchOutcome {
  return new SearchEngine(policy).solve(grid);
}
