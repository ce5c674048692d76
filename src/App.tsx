import { useEffect, useMemo, useRef, useState } from "react";
import { algoSearch } from "./algorithms/search";
import { MazeFormatError } from "./errors/errors";
import type { SearchOutcome, SearchSnapshot } from "./interfaces/interfaces";
import type { MapType, RemovalPolicy } from "./types/types";
import { DEFAULT_MAZE } from "./utils/constants";
import { drawPanel } from "./utils/drawpanel/drawpanel";
import { type Grid, parseMaze } from "./utils/grid/grid";
import { generateMapText } from "./utils/mapGen/mapGen";
import { renderMaze } from "./utils/render/render";

// =====================
// Maze Search Lab
// - paste or generate a text maze (# wall, A start, B goal)
// - depth-first (stack frontier) or breadth-first (queue frontier)
// - step-by-step animation on a canvas, plus the text rendering
// =====================

type Parsed = { grid: Grid; error: null } | { grid: null; error: string };

function parseSource(source: string): Parsed {
  try {
    return { grid: parseMaze(source), error: null };
  } catch (e) {
    if (e instanceof MazeFormatError) return { grid: null, error: e.message };
    throw e;
  }
}

const RANDOM_DENSITY = 0.25;

export default function MazeLab({ initialSource = DEFAULT_MAZE }: { initialSource?: string }) {
  // UI State
  const [source, setSource] = useState(initialSource);
  const [policy, setPolicy] = useState<RemovalPolicy>("LIFO");
  const [speed, setSpeed] = useState(10); // steps per second
  const [running, setRunning] = useState(false);
  const [mapType, setMapType] = useState<MapType>("Maze");
  const [N, setN] = useState(15);
  const [seed, setSeed] = useState(12345);

  const sizePx = 360;

  const { grid, error } = useMemo(() => parseSource(source), [source]);

  const genRef = useRef<Generator<SearchSnapshot, SearchOutcome, void> | null>(null);
  const [snapshot, setSnapshot] = useState<SearchSnapshot | null>(null);
  const [outcome, setOutcome] = useState<SearchOutcome | null>(null);

  const resetRun = () => {
    genRef.current = grid ? algoSearch(grid, policy) : null;
    setSnapshot(null);
    setOutcome(null);
    setRunning(false);
  };

  // fresh search whenever the maze or the policy changes
  useEffect(resetRun, [grid, policy]);

  // one removal from the frontier; true once the search has finished
  const advance = (): boolean => {
    const g = genRef.current;
    if (!g) return true;
    let res = g.next();
    if (!res.done) {
      setSnapshot(res.value);
      // removing the goal ends the search; finish in the same step
      if (!grid || !grid.isGoal(res.value.current)) return false;
      res = g.next();
    }
    if (!res.done) return false;
    setOutcome(res.value);
    genRef.current = null;
    return true;
  };

  const solveNow = () => {
    const g = genRef.current;
    if (!g) return;
    let res = g.next();
    let last: SearchSnapshot | null = null;
    while (!res.done) {
      last = res.value;
      res = g.next();
    }
    if (last) setSnapshot(last);
    setOutcome(res.value);
    genRef.current = null;
    setRunning(false);
  };

  // Animation loop
  useEffect(() => {
    if (!running) return;
    let handle: number;
    let acc = 0;
    const stepInterval = 1000 / speed;
    let last = performance.now();

    const tick = () => {
      const now = performance.now();
      acc += now - last;
      last = now;

      while (acc >= stepInterval) {
        acc -= stepInterval;
        if (advance()) {
          setRunning(false);
          return;
        }
      }
      handle = requestAnimationFrame(tick);
    };

    handle = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(handle);
  }, [running, speed]);

  const solution = outcome?.status === "solved" ? outcome.solution : null;

  // Canvas
  const canvasRef = useRef<HTMLCanvasElement>(null);
  useEffect(() => {
    const cvs = canvasRef.current;
    if (!cvs || !grid) return;
    const ctx = cvs.getContext("2d");
    if (!ctx) return;
    drawPanel(ctx, grid, sizePx, snapshot, solution);
  }, [grid, snapshot, solution]);

  const status = solution ? "Found" : outcome ? "No path" : running ? "Running" : "Idle";
  const explored = outcome?.run.exploredCount ?? snapshot?.exploredCount ?? 0;
  const peakFrontier = outcome?.run.peakFrontier ?? snapshot?.peakFrontier ?? 0;

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">Maze Search Lab</h1>
          <p className="text-slate-600">Depth-first and breadth-first search on text mazes</p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label htmlFor="source" className="block text-sm mb-1">Maze</label>
            <textarea
              id="source"
              rows={10}
              value={source}
              onChange={(e) => setSource(e.target.value)}
              className="maze-source"
              spellCheck={false}
            />
            <div className="text-xs text-slate-500 mt-1"># wall · A start · B goal · anything else is floor</div>
          </div>
          <div className="control-card">
            <label htmlFor="policy" className="block text-sm mb-1">Search</label>
            <select
              id="policy"
              value={policy}
              onChange={(e) => setPolicy(e.target.value === "FIFO" ? "FIFO" : "LIFO")}
            >
              <option value="LIFO">Depth-first (stack)</option>
              <option value="FIFO">Breadth-first (queue)</option>
            </select>
            <label className="block text-sm mt-4">Speed: {speed} steps/s</label>
            <input type="range" min={1} max={60} value={speed} onChange={(e) => setSpeed(Number(e.target.value))} />
          </div>
          <div className="control-card">
            <label htmlFor="mapType" className="block text-sm mb-1">Generate</label>
            <select
              id="mapType"
              value={mapType}
              onChange={(e) => {
                const v = e.target.value;
                setMapType(v === "Empty" || v === "Random" ? v : "Maze");
              }}
            >
              <option>Maze</option>
              <option>Random</option>
              <option>Empty</option>
            </select>
            <label className="block text-sm mt-2">Size (N×N)</label>
            <input type="number" value={N} min={5} max={99} onChange={(e) => setN(Math.max(5, Math.min(99, Number(e.target.value) || 15)))} />
            <label className="block text-sm mt-2">Seed</label>
            <input type="number" value={seed} onChange={(e) => setSeed(Number(e.target.value) || 0)} />
            <button onClick={() => setSource(generateMapText(mapType, N, RANDOM_DENSITY, seed))}>Generate</button>
          </div>
          <div className="control-card buttons">
            <button onClick={() => setRunning(true)} disabled={running || !grid || outcome !== null}>Start</button>
            <button onClick={() => setRunning(false)}>Pause</button>
            <button onClick={advance} disabled={running || !grid || outcome !== null}>Step</button>
            <button onClick={solveNow} disabled={!grid || outcome !== null}>Solve</button>
            <button onClick={resetRun}>Reset</button>
          </div>
        </div>

        {/* Panel */}
        <div className="panel">
          <div className="flex items-center justify-between mb-2">
            <h2 className="font-semibold">{policy === "LIFO" ? "DFS" : "BFS"}</h2>
            <div className="text-xs text-slate-500" data-testid="status">{status}</div>
          </div>
          {grid ? (
            <>
              <canvas ref={canvasRef} width={sizePx} height={sizePx} />
              <pre className="maze-text" data-testid="maze-text">{renderMaze(grid, solution)}</pre>
            </>
          ) : (
            <div role="alert" className="maze-error">Invalid maze: {error}</div>
          )}
          <div className="stats">
            <div className="text-slate-500">Explored</div><div className="font-mono" data-testid="explored">{explored}</div>
            <div className="text-slate-500">Peak frontier</div><div className="font-mono" data-testid="peak-frontier">{peakFrontier}</div>
            <div className="text-slate-500">Path length</div><div className="font-mono" data-testid="path-length">{solution ? solution.length : "—"}</div>
          </div>
        </div>

        <footer className="mt-8 text-xs text-slate-500">
          Colors — walls: slate‑900, explored: amber‑200, frontier: blue‑200, path: green‑300, current: red; start: green; goal: violet.
        </footer>
      </div>
    </div>
  );
}
