import type { Action, Cell, MapType, RemovalPolicy } from "../types/types";

export interface SearchNode {
  id: number; // index in the run's node arena
  state: Cell;
  parent: number | null; // arena index of the parent, null for the root
  action: Action | null; // null for the root
}

export interface Step {
  action: Action;
  cell: Cell;
}

// start-exclusive, goal-inclusive
export type Solution = readonly Step[];

export interface Neighbor {
  action: Action;
  state: Cell;
}

export interface FrontierView {
  readonly size: number;
  containsState(state: Cell): boolean;
  states(): Cell[];
}

export interface SearchRun {
  policy: RemovalPolicy;
  exploredCount: number; // nodes removed from the frontier, goal included
  explored: ReadonlySet<string>; // cell keys expanded
  peakFrontier: number;
  nodes: readonly SearchNode[];
}

export type SearchOutcome =
  | { status: "solved"; solution: Solution; run: SearchRun }
  | { status: "exhausted"; run: SearchRun };

// Live view of a run after one removal; valid until the next step.
export interface SearchSnapshot {
  current: Cell;
  exploredCount: number;
  explored: ReadonlySet<string>;
  frontier: FrontierView;
  peakFrontier: number;
}

export interface RunConfig {
  N: number;
  mapType: MapType;
  density: number; // for Random
  seed: number;
  policy: RemovalPolicy;
}
