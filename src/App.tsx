import { useEffect, useMemo, useRef, useState, type RefObject } from "react";
import { DEFAULT_DENSITY, isScattered } from "./utils/mapGen/mapGen";
import { buildLabEnvironment } from "./utils/labMap";
import { GridProblem } from "./problem/Problem";
import { searchSteps } from "./search/search";
import { drawPanel } from "./utils/drawpanel/drawpanel";
import { advancePanel, createPanel, type PanelState } from "./utils/panelState";
import { cellLabel, variantLabel } from "./utils/utils";
import type {
  SearchLimits,
  SearchResult,
  SearchStep,
  SearchVariant,
} from "./interfaces/interfaces";
import type {
  AlgoKey,
  EnvironmentType,
  HeuristicType,
  MotionModel,
  SearchMode,
} from "./types/types";

// =====================
// Search Lab
// - BFS, DFS, UCS and A* side by side on the same generated map
// - Lockstep animation: every panel pops one frontier node per tick
// - Finish order is by frontier pops, not wall-clock time
// =====================

type Run = Generator<SearchStep, SearchResult, void>;

const ALGOS: readonly AlgoKey[] = ["BFS", "DFS", "UCS", "A*"];
const ENV_TYPES: readonly EnvironmentType[] = [
  "Empty",
  "SimpleObstacles",
  "Corridor",
  "Rooms",
  "Dense",
  "Maze",
];
const MOTIONS: readonly MotionModel[] = ["4-directional", "8-directional"];
const MODES: readonly SearchMode[] = ["Graph", "Tree"];
const A_STAR_HEURISTICS: readonly HeuristicType[] = ["Euclidean", "Manhattan"];

const sizePx = 320;

const byAlgo = <T,>(f: (key: AlgoKey) => T): Record<AlgoKey, T> => ({
  BFS: f("BFS"),
  DFS: f("DFS"),
  UCS: f("UCS"),
  "A*": f("A*"),
});

// <select> values come back as plain strings
const pick = <T extends string>(options: readonly T[], value: string): T | undefined =>
  options.find((o) => o === value);

const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

export default function SearchLab() {
  const [size, setSize] = useState(15);
  const [envType, setEnvType] = useState<EnvironmentType>("Rooms");
  const [seed, setSeed] = useState(42);
  const [startText, setStartText] = useState("");
  const [goalText, setGoalText] = useState("");
  const [densityPct, setDensityPct] = useState(10);
  const [motion, setMotion] = useState<MotionModel>("4-directional");
  const [mode, setMode] = useState<SearchMode>("Graph");
  const [heuristic, setHeuristic] = useState<HeuristicType>("Euclidean");
  const [maxIterations, setMaxIterations] = useState(100000);
  const [speed, setSpeed] = useState(20); // steps per second
  const [running, setRunning] = useState(false);

  const labMap = useMemo(
    () =>
      buildLabEnvironment({
        type: envType,
        size,
        motion,
        seed,
        start: startText,
        goal: goalText,
        densityPct,
      }),
    [envType, size, motion, seed, startText, goalText, densityPct]
  );
  const env = labMap.env;

  const chooseEnvType = (value: string) => {
    const next = pick(ENV_TYPES, value) ?? envType;
    setEnvType(next);
    if (isScattered(next)) setDensityPct(Math.round(DEFAULT_DENSITY[next] * 100));
  };

  const variants = useMemo(
    () =>
      byAlgo<SearchVariant>((algorithm) => ({
        algorithm,
        mode,
        heuristic: algorithm === "A*" ? heuristic : "None",
      })),
    [mode, heuristic]
  );

  const gensRef = useRef<Record<AlgoKey, Run | null>>(byAlgo(() => null));
  const panelsRef = useRef<Record<AlgoKey, PanelState>>(
    byAlgo((k) => createPanel(variants[k]))
  );
  const [panels, setPanels] = useState(panelsRef.current);

  const resetRun = () => {
    const problem = new GridProblem(env);
    // the animation is paced by frames, so only the iteration cap applies
    const limits: SearchLimits = {
      maxIterations,
      maxDepth: Infinity,
      timeoutSeconds: Infinity,
    };
    gensRef.current = byAlgo((k) => searchSteps(problem, { ...variants[k], limits }));
    panelsRef.current = byAlgo((k) => createPanel(variants[k]));
    setPanels(panelsRef.current);
    setRunning(false);
  };

  // Fresh runs whenever the map or the search settings change
  useEffect(resetRun, [env, variants, maxIterations]);

  // Animation loop (lockstep)
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
        const next = { ...panelsRef.current };
        for (const k of ALGOS) {
          const g = gensRef.current[k];
          if (!g) continue;
          next[k] = advancePanel(next[k], g, env);
          if (next[k].finished) gensRef.current[k] = null;
        }
        panelsRef.current = next;
        setPanels(next);

        if (ALGOS.every((k) => gensRef.current[k] === null)) {
          setRunning(false);
          return;
        }
      }
      handle = requestAnimationFrame(tick);
    };

    handle = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(handle);
  }, [running, speed, env]);

  // Canvas refs and drawing
  const canvasRefs: Record<AlgoKey, RefObject<HTMLCanvasElement>> = {
    BFS: useRef<HTMLCanvasElement>(null),
    DFS: useRef<HTMLCanvasElement>(null),
    UCS: useRef<HTMLCanvasElement>(null),
    "A*": useRef<HTMLCanvasElement>(null),
  };
  useEffect(() => {
    for (const key of ALGOS) {
      const ctx = canvasRefs[key].current?.getContext("2d");
      if (ctx) drawPanel(ctx, env, sizePx, panels[key]);
    }
  });

  const finishOrder = ALGOS.map((k) => panels[k])
    .filter((p) => p.result !== undefined)
    .sort((a, b) => (a.result?.iterations ?? 0) - (b.result?.iterations ?? 0));

  const statusOf = (p: PanelState) => {
    if (p.result) return p.result.success ? "Found" : p.result.terminationReason;
    return running ? "Running" : "Idle";
  };

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">Search Lab</h1>
          <p className="text-slate-600">BFS · DFS · UCS · A* on generated grid maps</p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label className="block text-sm mb-1">Map Size (N×N)</label>
            <input type="number" value={size} min={5} max={60} onChange={e=>setSize(clamp(Number(e.target.value)||15, 5, 60))} className="w-full border rounded px-3 py-2" />
            <label className="block text-sm mt-3 mb-1">Environment</label>
            <select value={envType} onChange={e=>chooseEnvType(e.target.value)} className="w-full border rounded px-3 py-2">
              {ENV_TYPES.map(t => <option key={t}>{t}</option>)}
            </select>
            <label className="block text-sm mt-3 mb-1">Seed</label>
            <input type="number" value={seed} onChange={e=>setSeed(Number(e.target.value)||0)} className="w-full border rounded px-3 py-2" />
          </div>
          <div className="control-card">
            <label className="block text-sm mb-1">Start (row,col)</label>
            <input type="text" value={startText} placeholder="map default" onChange={e=>setStartText(e.target.value)} className="w-full border rounded px-3 py-2" />
            <label className="block text-sm mt-3 mb-1">Goal (row,col)</label>
            <input type="text" value={goalText} placeholder="map default" onChange={e=>setGoalText(e.target.value)} className="w-full border rounded px-3 py-2" />
            {labMap.error && <div className="text-xs text-red-600 mt-1">{labMap.error}</div>}
            {isScattered(envType) && (
              <>
                <label className="block text-sm mt-4">Obstacle density: {densityPct}%</label>
                <input type="range" min={0} max={60} value={densityPct} onChange={e=>setDensityPct(clamp(Number(e.target.value), 0, 60))} className="w-full" />
              </>
            )}
          </div>
          <div className="control-card">
            <label className="block text-sm mb-1">Motion</label>
            <select value={motion} onChange={e=>setMotion(pick(MOTIONS, e.target.value) ?? motion)} className="w-full border rounded px-3 py-2">
              {MOTIONS.map(m => <option key={m}>{m}</option>)}
            </select>
            <label className="block text-sm mt-3 mb-1">Search Mode</label>
            <select value={mode} onChange={e=>setMode(pick(MODES, e.target.value) ?? mode)} className="w-full border rounded px-3 py-2">
              {MODES.map(m => <option key={m}>{m}</option>)}
            </select>
            <label className="block text-sm mt-3 mb-1">A* Heuristic</label>
            <select value={heuristic} onChange={e=>setHeuristic(pick(A_STAR_HEURISTICS, e.target.value) ?? heuristic)} className="w-full border rounded px-3 py-2">
              <option value="Euclidean">Euclidean (L2)</option>
              <option value="Manhattan">Manhattan (L1)</option>
            </select>
          </div>
          <div className="control-card">
            <label className="block text-sm mb-1">Max Iterations</label>
            <input type="number" value={maxIterations} min={1} onChange={e=>setMaxIterations(Math.max(1, Number(e.target.value)||1))} className="w-full border rounded px-3 py-2" />
            <div className="text-xs text-slate-500 mt-1">Tree mode blows up fast; keep maps small</div>
            <label className="block text-sm mt-4">Speed: {speed} steps/s</label>
            <input type="range" min={1} max={120} value={speed} onChange={e=>setSpeed(Number(e.target.value))} className="w-full" />
          </div>
          <div className="control-card flex flex-col gap-2">
            <button onClick={()=>setRunning(true)} disabled={running} className="px-4 py-2 rounded-xl bg-emerald-600 text-white disabled:opacity-50">Start</button>
            <button onClick={()=>setRunning(false)} className="px-4 py-2 rounded-xl bg-amber-500 text-white">Pause</button>
            <button onClick={resetRun} className="px-4 py-2 rounded-xl bg-slate-800 text-white">Reset</button>
            <div className="text-xs text-slate-500">Start: {cellLabel(env.start)} · Goal: {cellLabel(env.goal)}</div>
          </div>
        </div>

        {/* Panels */}
        <div className="panels">
          {ALGOS.map(key=>{
            const s = panels[key];
            return (
              <div key={key} className="panel">
                <div className="flex items-center justify-between mb-2">
                  <h2 className="font-semibold">{variantLabel(s.variant)}</h2>
                  <div className="text-xs text-slate-500">{statusOf(s)}</div>
                </div>
                <canvas ref={canvasRefs[key]} width={sizePx} height={sizePx} />
                <div className="stats">
                  <div className="text-slate-500">Expanded</div><div className="font-mono">{s.nodesExpanded}</div>
                  <div className="text-slate-500">Peak frontier</div><div className="font-mono">{s.peakFrontier}</div>
                  <div className="text-slate-500">Path cost</div><div className="font-mono">{s.result?.success ? s.result.pathCost.toFixed(2) : "—"}</div>
                  <div className="text-slate-500">Path length</div><div className="font-mono">{s.path ? s.path.length : "—"}</div>
                </div>
              </div>
            );
          })}
        </div>

        {/* Podium / order */}
        <div className="finish-order">
          <h3 className="font-semibold mb-2">Finish Order</h3>
          {finishOrder.length===0 ? (
            <div className="text-sm text-slate-500">No algorithm has finished yet.</div>
          ) : (
            <ol className="list-decimal list-inside space-y-1">
              {finishOrder.map((p) => (
                <li key={p.variant.algorithm} className="text-sm">
                  {variantLabel(p.variant)} — <span className="font-mono">{p.result?.iterations} iterations</span>
                  {!p.result?.success && <span className="text-sm"> ({p.result?.terminationReason})</span>}
                </li>
              ))}
            </ol>
          )}
        </div>

        <footer className="mt-8 text-xs text-slate-500">
          Colors: walls slate‑900, expanded amber‑200, frontier blue‑200, path green‑300, current red; start green; goal violet.
        </footer>
      </div>
    </div>
  );
}
