export const ERR = {
  MAZE_FORMAT: "MAZE_FORMAT",
  EMPTY_FRONTIER: "EMPTY_FRONTIER",
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

export class MazeError extends Error {
  constructor(public code: ErrorCode, message: string) {
    super(message);
    this.name = "MazeError";
  }
}

// Bad maze source; thrown before any search starts.
export class MazeFormatError extends MazeError {
  constructor(message: string) {
    super(ERR.MAZE_FORMAT, message);
    this.name = "MazeFormatError";
  }
}

// remove() on an empty frontier. The search loop checks isEmpty() first,
// so seeing this means a caller bug, not an unsolvable maze.
export class EmptyFrontierError extends MazeError {
  constructor() {
    super(ERR.EMPTY_FRONTIER, "empty frontier");
    this.name = "EmptyFrontierError";
  }
}
