// scripts/solve-maze.ts
//
// Loads a text maze, prints it, solves it and prints the path.
//
// Run with:
//   npm run solve                       (mazes/maze1.txt)
//   npm run solve -- mazes/maze2.txt

import { solveMazeFile } from "../src/cli/solveMaze";

process.exitCode = solveMazeFile(process.argv[2]);
