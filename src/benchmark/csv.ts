import type { BenchmarkRecord } from "../interfaces/interfaces";
import type { SummaryRow } from "./accumulator";

// Non-finite values (failed runs, empty groups) become empty cells
export const fmt = (n: number, digits: number) =>
  Number.isFinite(n) ? n.toFixed(digits) : "";

export const RECORD_HEADER = [
  "trial",
  "mapSize",
  "environmentType",
  "motionModel",
  "algorithm",
  "mode",
  "heuristic",
  "variant",
  "maxIterations",
  "maxDepth",
  "timeoutSeconds",
  "success",
  "terminationReason",
  "elapsedTime",
  "nodesExpanded",
  "iterations",
  "maxFrontierSize",
  "peakMemory",
  "pathLength",
  "pathCost",
];

export function recordsToCsv(records: readonly BenchmarkRecord[]): string {
  const rows: string[] = [RECORD_HEADER.join(",")];
  for (const rec of records) {
    const r = rec.result;
    rows.push(
      [
        rec.trial.toString(),
        rec.mapSize.toString(),
        rec.environmentType,
        rec.motionModel,
        rec.algorithm,
        rec.mode,
        rec.heuristic,
        rec.variant,
        rec.limits.maxIterations.toString(),
        rec.limits.maxDepth.toString(),
        rec.limits.timeoutSeconds.toString(),
        r.success ? "1" : "0",
        r.terminationReason,
        fmt(r.elapsedTime, 6),
        r.nodesExpanded.toString(),
        r.iterations.toString(),
        r.maxFrontierSize.toString(),
        r.peakMemory.toString(),
        r.success ? r.pathLength.toString() : "",
        fmt(r.pathCost, 4),
      ].join(",")
    );
  }
  return rows.join("\n");
}

export const SUMMARY_HEADER = [
  "variant",
  "algorithm",
  "mode",
  "heuristic",
  "motionModel",
  "environmentType",
  "mapSize",
  "trials",
  "successes",
  "successRate",
  "timeMean",
  "timeStd",
  "nodesExpandedMean",
  "nodesExpandedStd",
  "peakMemoryMean",
  "peakMemoryStd",
  "pathCostMean",
  "pathCostStd",
  "pathLengthMean",
  "pathLengthStd",
];

export function summaryToCsv(summary: readonly SummaryRow[]): string {
  const rows: string[] = [SUMMARY_HEADER.join(",")];
  for (const s of summary) {
    rows.push(
      [
        s.variant,
        s.algorithm,
        s.mode,
        s.heuristic,
        s.motionModel,
        s.environmentType,
        s.mapSize.toString(),
        s.trials.toString(),
        s.successes.toString(),
        fmt(s.successRate, 4),
        fmt(s.time.mean, 6),
        fmt(s.time.std, 6),
        fmt(s.nodesExpanded.mean, 2),
        fmt(s.nodesExpanded.std, 2),
        fmt(s.peakMemory.mean, 2),
        fmt(s.peakMemory.std, 2),
        fmt(s.pathCost.mean, 4),
        fmt(s.pathCost.std, 4),
        fmt(s.pathLength.mean, 2),
        fmt(s.pathLength.std, 2),
      ].join(",")
    );
  }
  return rows.join("\n");
}
