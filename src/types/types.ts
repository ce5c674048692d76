export type Cell = { r: number; c: number };

export type Action = "up" | "down" | "left" | "right";

export type MapType = "Empty" | "Random" | "Maze";

// LIFO = depth-first, FIFO = breadth-first
export type RemovalPolicy = "LIFO" | "FIFO";

export type SearchStatus = "READY" | "RUNNING" | "SOLVED" | "UNSOLVABLE";
