import type { Citation, Route, WorkflowStatus } from "../workflow/types";

export type MetricName = "correctness" | "faithfulness" | "relevance" | "concision";

export const METRIC_NAMES: readonly MetricName[] = ["correctness", "faithfulness", "relevance", "concision"];

/**
 * One question of an evaluation set with the answer a domain expert expects.
 */
export interface EvaluationExample {
  id: string;
  question: string;
  referenceAnswer: string;
  /** Titles or URLs of the sources the reference answer draws on. */
  referenceCitations: string[];
}

/**
 * What the workflow produced for an example, as seen by the evaluators.
 */
export interface EvaluationSample {
  example: EvaluationExample;
  answer: string;
  citations: Citation[];
}

export interface MetricResult {
  metric: MetricName;
  /** 1 for pass, 0 for fail or evaluator error. */
  score: 0 | 1;
  comment: string;
}

export interface ExampleReport {
  id: string;
  question: string;
  answer: string;
  route: Route | null;
  status: WorkflowStatus | "failed";
  durationMs: number;
  metrics: MetricResult[];
  /** Set when the workflow itself threw for this example. */
  error?: string;
}

export interface MetricSummary {
  metric: MetricName;
  mean: number;
  passed: number;
  total: number;
}

export interface EvaluationReport {
  startedAt: string;
  durationMs: number;
  examples: ExampleReport[];
  summary: MetricSummary[];
}
