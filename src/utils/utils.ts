import type { Action, Cell } from "../types/types";

export const keyOf = (cell: Cell) => `${cell.r},${cell.c}`;

export const sameCell = (a: Cell, b: Cell) => a.r === b.r && a.c === b.c;

// Fixed expansion order: up, down, left, right.
export const ACTIONS: readonly Action[] = ["up", "down", "left", "right"];

export const DELTAS: Record<Action, { dr: number; dc: number }> = {
  up: { dr: -1, dc: 0 },
  down: { dr: 1, dc: 0 },
  left: { dr: 0, dc: -1 },
  right: { dr: 0, dc: 1 },
};

export const moveBy = (cell: Cell, action: Action): Cell => ({
  r: cell.r + DELTAS[action].dr,
  c: cell.c + DELTAS[action].dc,
});

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}
