// experiments/experiment-runner.ts
//
// Offline benchmark for the search lab.
// Runs BFS, UCS and A* (tree and graph variants) over the default sweep of
// map sizes, environment types and motion models, then writes one CSV row
// per run plus a grouped summary.
//
// Run with:
//   npm run bench -- [trials] [outputDir] [--dfs]
//
// --dfs adds the DFS graph and tree variants to the sweep.
//
// CSV output: <outputDir>/results.csv and <outputDir>/summary.csv

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import pc from "picocolors";
import { recordsToCsv, summaryToCsv } from "../src/benchmark/csv";
import {
  displayBanner,
  displayConfig,
  displaySummary,
  displayTrial,
} from "../src/benchmark/display";
import { DFS_VARIANTS, defaultPlan, type BenchmarkPlan } from "../src/benchmark/plan";
import { runBenchmark } from "../src/benchmark/runner";

const DEFAULT_OUTPUT_DIR = "experiments/results";

function parseTrials(arg: string | undefined): number {
  if (arg === undefined) return defaultPlan.numTrials;
  const n = Number.parseInt(arg, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`trials must be a positive integer, got "${arg}"`);
  }
  return n;
}

function main() {
  const argv = process.argv.slice(2);
  const positional = argv.filter((a) => !a.startsWith("--"));
  const plan: BenchmarkPlan = {
    ...defaultPlan,
    variants: argv.includes("--dfs")
      ? [...defaultPlan.variants, ...DFS_VARIANTS]
      : defaultPlan.variants,
    numTrials: parseTrials(positional[0]),
  };
  const outputDir = positional[1] ?? DEFAULT_OUTPUT_DIR;

  displayBanner(plan);
  const startedAt = new Date();
  console.log(pc.dim(`Start time: ${startedAt.toISOString()}`));

  const results = runBenchmark(plan, {
    onConfig: displayConfig,
    onTrial: displayTrial,
  });

  const summary = results.summarize();
  displaySummary(summary);

  mkdirSync(outputDir, { recursive: true });
  const resultsFile = join(outputDir, "results.csv");
  const summaryFile = join(outputDir, "summary.csv");
  writeFileSync(resultsFile, recordsToCsv(results.records()), "utf8");
  writeFileSync(summaryFile, summaryToCsv(summary), "utf8");

  const seconds = (Date.now() - startedAt.getTime()) / 1000;
  console.log(pc.green(`✅ Wrote ${results.size} rows to ${resultsFile}`));
  console.log(pc.green(`✅ Wrote ${summary.length} rows to ${summaryFile}`));
  console.log(pc.dim(`Finished in ${seconds.toFixed(1)}s`));
}

try {
  main();
} catch (error) {
  console.error(pc.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
}
