/**
 * Run an evaluation dataset through the live workflow and score the answers.
 *
 * Usage: npm run evaluate -- [dataset.json] [--preset balanced] [--metrics correctness,concision] [--out report.json]
 */

import "dotenv/config";
import { writeFile } from "fs/promises";
import { getEnvConfig, validateEnv } from "../server/config/env";
import {
  DEFAULT_METRICS,
  DEFAULT_PRESET,
  EVALUATION_PRESETS,
  METRIC_NAMES,
  createEvaluators,
  isPresetName,
  loadDataset,
  runEvaluation,
  type MetricName,
} from "../server/evaluation";
import { createGeminiServices } from "../server/gemini-client";

const DEFAULT_DATASET = "data/sample-questions.json";

interface EvaluateArgs {
  dataset: string;
  preset: string;
  metrics: string[];
  out?: string;
}

function parseArgs(argv: string[]): EvaluateArgs {
  const args: EvaluateArgs = { dataset: DEFAULT_DATASET, preset: DEFAULT_PRESET, metrics: [...DEFAULT_METRICS] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === "--preset" && value) {
      args.preset = value;
      i++;
    } else if (arg === "--metrics" && value) {
      args.metrics = value.split(",").map((metric) => metric.trim()).filter(Boolean);
      i++;
    } else if (arg === "--out" && value) {
      args.out = value;
      i++;
    } else if (!arg.startsWith("--")) {
      args.dataset = arg;
    }
  }
  return args;
}

function isMetricName(name: string): name is MetricName {
  return METRIC_NAMES.some((metric) => metric === name);
}

async function runEvaluate() {
  const args = parseArgs(process.argv.slice(2));

  if (!isPresetName(args.preset)) {
    console.error(`[Evaluate] Unknown preset "${args.preset}". Choose one of: ${Object.keys(EVALUATION_PRESETS).join(", ")}`);
    process.exitCode = 1;
    return;
  }
  const unknownMetrics = args.metrics.filter((metric) => !isMetricName(metric));
  if (unknownMetrics.length > 0 || args.metrics.length === 0) {
    console.error(`[Evaluate] Metrics must be chosen from: ${METRIC_NAMES.join(", ")}`);
    process.exitCode = 1;
    return;
  }
  const metrics = args.metrics.filter(isMetricName);

  validateEnv();
  const { gateway, workflow } = createGeminiServices(getEnvConfig());
  const dataset = await loadDataset(args.dataset);

  console.log(`[Evaluate] Dataset: ${dataset.name ?? args.dataset} (${dataset.examples.length} examples)`);
  console.log(`[Evaluate] Preset: ${args.preset}  Metrics: ${metrics.join(", ")}`);
  console.log("---------------------------------------------------");

  const report = await runEvaluation({
    workflow,
    evaluators: createEvaluators(gateway, metrics),
    examples: dataset.examples,
    config: EVALUATION_PRESETS[args.preset],
    onExample: (example, index, total) => {
      const scores = example.metrics.map(({ metric, score }) => `${metric}=${score}`).join(" ");
      console.log(`[${index + 1}/${total}] ${example.id}  ${example.status}  ${scores}`);
    },
  });

  console.log("\n=== SUMMARY ===");
  for (const { metric, mean, passed, total } of report.summary) {
    console.log(`${metric.padEnd(14)} ${mean.toFixed(3)}  (${passed}/${total})`);
  }
  console.log(`\nDuration: ${(report.durationMs / 1000).toFixed(1)}s`);

  if (args.out) {
    await writeFile(args.out, JSON.stringify(report, null, 2));
    console.log(`[Evaluate] Report written to ${args.out}`);
  }
}

runEvaluate().catch((error) => {
  console.error("[Evaluate] Failed:", error);
  process.exitCode = 1;
});
