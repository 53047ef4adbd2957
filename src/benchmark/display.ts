import pc from "picocolors";
import type { BenchmarkConfig, BenchmarkRecord } from "../interfaces/interfaces";
import { variantLabel } from "../utils/utils";
import type { SummaryRow } from "./accumulator";
import type { BenchmarkPlan } from "./plan";
import { countConfigs } from "./runner";

export function displayBanner(plan: BenchmarkPlan): void {
  console.log("");
  console.log(pc.cyan("╭──────────────────────────────────────────────╮"));
  console.log(pc.cyan("│") + pc.bold("   Grid Search Benchmark Suite                ") + pc.cyan("│"));
  console.log(pc.cyan("╰──────────────────────────────────────────────╯"));
  console.log(`  Maps: ${pc.bold(plan.maps.length.toString())}`);
  console.log(`  Motion models: ${plan.motionModels.join(", ")}`);
  console.log(`  Variants: ${plan.variants.map(variantLabel).join(", ")}`);
  console.log(`  Trials per configuration: up to ${pc.bold(plan.numTrials.toString())}`);
  console.log(`  Configurations: ${pc.bold(countConfigs(plan).toString())}`);
  console.log("");
}

export function displayConfig(
  index: number,
  total: number,
  config: BenchmarkConfig,
  trials: number
): void {
  const size = `${config.mapSize}x${config.mapSize}`;
  console.log(
    pc.dim(`[${index}/${total}] `) +
      `${pc.bold(variantLabel(config))} on ${config.environmentType} ${size} with ${config.motionModel}` +
      pc.dim(` (${trials} trials, ${config.limits.maxIterations} iterations, ${config.limits.timeoutSeconds}s)`)
  );
}

export function displayTrial(record: BenchmarkRecord, trials: number): void {
  const done = record.trial + 1;
  if (done % Math.max(5, Math.floor(trials / 4)) !== 0 && done !== trials) return;
  const r = record.result;
  const status = r.success ? pc.green("✓") : pc.yellow(r.terminationReason);
  console.log(pc.dim(`  Progress: ${done}/${trials} trials `) + status);
}

export function displaySummary(summary: readonly SummaryRow[]): void {
  console.log("");
  console.log(pc.cyan("╭─ Success rate by variant ─────────────────────╮"));
  const byVariant = new Map<string, { trials: number; successes: number }>();
  for (const row of summary) {
    const acc = byVariant.get(row.variant) ?? { trials: 0, successes: 0 };
    acc.trials += row.trials;
    acc.successes += row.successes;
    byVariant.set(row.variant, acc);
  }
  for (const [variant, { trials, successes }] of byVariant) {
    const rate = trials ? (successes / trials) * 100 : 0;
    const colour = rate === 100 ? pc.green : rate === 0 ? pc.red : pc.yellow;
    console.log(`${pc.cyan("│")} ${variant.padEnd(22)} ${colour(`${rate.toFixed(1)}%`)} ${pc.dim(`(${successes}/${trials})`)}`);
  }
  console.log(pc.cyan("╰───────────────────────────────────────────────╯"));
  console.log("");
}
