export {
  concisionEvaluator,
  correctnessEvaluator,
  createEvaluators,
  describeCitation,
  faithfulnessEvaluator,
  relevanceEvaluator,
  type Evaluator,
} from "./evaluators";
export { DatasetError, loadDataset, parseDataset, type EvaluationDataset } from "./dataset";
export {
  DEFAULT_METRICS,
  DEFAULT_PRESET,
  EVALUATION_PRESETS,
  isPresetName,
  type EvaluationPresetName,
} from "./presets";
export { runEvaluation, summarize, type EvaluationOptions } from "./runner";
export { METRIC_NAMES } from "./types";
export type {
  EvaluationExample,
  EvaluationReport,
  EvaluationSample,
  ExampleReport,
  MetricName,
  MetricResult,
  MetricSummary,
} from "./types";
