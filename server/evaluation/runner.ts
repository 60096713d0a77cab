/**
 * Evaluation runner: answers every example of a dataset through the workflow
 * and scores each answer with the selected evaluators.
 *
 * Examples run one at a time; judges for one example run together. A
 * workflow failure is recorded against its example and the run continues.
 */

import { errorMessage, logError, logInfo } from "../utils/logger";
import type { Workflow } from "../workflow/orchestrator";
import type { WorkflowConfigInput } from "../workflow/workflowConfig";
import type { Evaluator } from "./evaluators";
import type {
  EvaluationExample,
  EvaluationReport,
  ExampleReport,
  MetricResult,
  MetricSummary,
} from "./types";

export interface EvaluationOptions {
  workflow: Workflow;
  evaluators: readonly Evaluator[];
  examples: readonly EvaluationExample[];
  config?: WorkflowConfigInput;
  /** Called after each example, e.g. for progress output. */
  onExample?: (report: ExampleReport, index: number, total: number) => void;
}

async function evaluateExample(
  example: EvaluationExample,
  { workflow, evaluators, config }: EvaluationOptions
): Promise<ExampleReport> {
  const requestId = `eval-${example.id}`;
  const startTime = Date.now();

  try {
    const result = await workflow.run(example.question, config, { requestId });
    const sample = { example, answer: result.answer, citations: result.citations };
    const metrics = await Promise.all(evaluators.map((evaluator) => evaluator.evaluate(sample, { requestId })));

    return {
      id: example.id,
      question: example.question,
      answer: result.answer,
      route: result.route,
      status: result.status,
      durationMs: Date.now() - startTime,
      metrics,
    };
  } catch (error) {
    logError("evaluation_example_failed", {
      requestId,
      stage: "evaluation",
      exampleId: example.id,
      error: errorMessage(error),
    });
    const message = errorMessage(error);
    return {
      id: example.id,
      question: example.question,
      answer: "",
      route: null,
      status: "failed",
      durationMs: Date.now() - startTime,
      metrics: evaluators.map(
        (evaluator): MetricResult => ({
          metric: evaluator.metric,
          score: 0,
          comment: `Workflow error: ${message}`,
        })
      ),
      error: message,
    };
  }
}

export function summarize(evaluators: readonly Evaluator[], examples: readonly ExampleReport[]): MetricSummary[] {
  return evaluators.map(({ metric }) => {
    const scores = examples.flatMap((report) =>
      report.metrics.filter((result) => result.metric === metric).map((result) => result.score)
    );
    const passed = scores.filter((score) => score === 1).length;
    return {
      metric,
      mean: scores.length > 0 ? passed / scores.length : 0,
      passed,
      total: scores.length,
    };
  });
}

export async function runEvaluation(options: EvaluationOptions): Promise<EvaluationReport> {
  const startedAt = new Date();
  const total = options.examples.length;

  logInfo("evaluation_started", {
    stage: "evaluation",
    examples: total,
    metrics: options.evaluators.map((evaluator) => evaluator.metric).join(","),
  });

  const reports: ExampleReport[] = [];
  for (const [index, example] of options.examples.entries()) {
    const report = await evaluateExample(example, options);
    reports.push(report);
    options.onExample?.(report, index, total);
  }

  const summary = summarize(options.evaluators, reports);
  const durationMs = Date.now() - startedAt.getTime();

  logInfo("evaluation_complete", {
    stage: "evaluation",
    examples: total,
    failed: reports.filter((report) => report.status === "failed").length,
    durationMs,
    ...Object.fromEntries(summary.map(({ metric, mean }) => [metric, Number(mean.toFixed(3))])),
  });

  return { startedAt: startedAt.toISOString(), examples: reports, summary, durationMs };
}
