// experiments/experiment-runner.ts
//
// Offline experiments for the Maze Search Lab.
// Runs depth-first (LIFO) and breadth-first (FIFO) search on many generated
// maps and writes a CSV file with timings, expansions, frontier size, path
// length and whether the path is as short as the BFS one.
//
// Run with:
//   npm run experiments
//
// CSV output: experiments/results.csv

import { writeFileSync } from "fs";
import { performance } from "perf_hooks";
import { solve } from "../src/algorithms/search";
import type { RunConfig } from "../src/interfaces/interfaces";
import type { MapType, RemovalPolicy } from "../src/types/types";
import { parseMaze } from "../src/utils/grid/grid";
import { generateMapText } from "../src/utils/mapGen/mapGen";

interface PolicyResult {
  policy: RemovalPolicy;
  runtimeMs: number;
  exploredCount: number;
  peakFrontier: number;
  pathLength: number | null;
  found: boolean;
  optimal: boolean | null; // null when BFS found nothing to compare with
}

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const OUTPUT_CSV = "experiments/results.csv";

// how many seeds per configuration
const NUM_TRIALS = 20;

// grid sizes to test (odd sizes give closed maze borders)
const NS = [15, 31, 63];

const MAP_TYPES: MapType[] = ["Maze", "Random", "Empty"];

// densities for Random maps
const DENSITIES = [0.2, 0.35];

const POLICIES: RemovalPolicy[] = ["LIFO", "FIFO"];

// ---------- Runs ----------
function runPolicy(config: RunConfig): PolicyResult {
  const grid = parseMaze(generateMapText(config.mapType, config.N, config.density, config.seed));
  const begin = performance.now();
  const outcome = solve(grid, config.policy);
  const runtimeMs = performance.now() - begin;
  return {
    policy: config.policy,
    runtimeMs,
    exploredCount: outcome.run.exploredCount,
    peakFrontier: outcome.run.peakFrontier,
    pathLength: outcome.status === "solved" ? outcome.solution.length : null,
    found: outcome.status === "solved",
    optimal: null,
  };
}

function runAllPolicies(base: Omit<RunConfig, "policy">): PolicyResult[] {
  const results = POLICIES.map((policy) => runPolicy({ ...base, policy }));

  // BFS on a unit-cost grid finds a shortest path: use it as the baseline
  const baseline = results.find((r) => r.policy === "FIFO")?.pathLength ?? null;
  for (const r of results) {
    r.optimal = baseline === null ? null : r.pathLength === baseline;
  }
  return results;
}

// ---------- Main experiment loop ----------
function main() {
  const rows: string[] = [];
  rows.push([
    "trial",
    "N",
    "mapType",
    "density",
    "seed",
    "policy",
    "runtimeMs",
    "exploredCount",
    "peakFrontier",
    "pathLength",
    "found",
    "optimal",
  ].join(","));

  let trialIndex = 0;

  for (const N of NS) {
    for (const mapType of MAP_TYPES) {
      for (const density of (mapType === "Random" ? DENSITIES : [0])) {
        for (let t = 0; t < NUM_TRIALS; t++) {
          const seed = 1000 * trialIndex + t;
          const results = runAllPolicies({ N, mapType, density, seed });

          for (const r of results) {
            rows.push([
              trialIndex.toString(),
              N.toString(),
              mapType,
              density.toString(),
              seed.toString(),
              r.policy,
              r.runtimeMs.toFixed(4),
              r.exploredCount.toString(),
              r.peakFrontier.toString(),
              r.pathLength == null ? "" : r.pathLength.toString(),
              r.found ? "1" : "0",
              r.optimal == null ? "" : (r.optimal ? "1" : "0"),
            ].join(","));
          }

          trialIndex++;
          console.log(
            `Done trial ${trialIndex} :: N=${N}, map=${mapType}, density=${density}, seed=${seed}`
          );
        }
      }
    }
  }

  writeFileSync(OUTPUT_CSV, rows.join("\n"), "utf8");
  console.log(`\nWrote ${rows.length - 1} rows to ${OUTPUT_CSV}`);
}

main();
