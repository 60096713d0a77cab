import type { WorkflowConfigInput } from "../workflow/workflowConfig";
import type { MetricName } from "./types";

export type EvaluationPresetName =
  | "quick"
  | "balanced"
  | "accuracy"
  | "minimal"
  | "no-checks"
  | "graph-only"
  | "web-fallback";

/**
 * Workflow settings to compare runs under. Limits stay within the 1..10
 * range the workflow accepts.
 */
export const EVALUATION_PRESETS: Record<EvaluationPresetName, WorkflowConfigInput> = {
  // fastest: no gates
  quick: {
    knowledgeStoreLimit: 10,
    webSearchLimit: 2,
    gates: { relevance: false, groundedness: false, usefulness: false },
  },
  balanced: {
    knowledgeStoreLimit: 10,
    webSearchLimit: 5,
    gates: { relevance: false, groundedness: true, usefulness: true },
  },
  accuracy: {
    knowledgeStoreLimit: 10,
    webSearchLimit: 8,
    gates: { relevance: true, groundedness: true, usefulness: true },
  },
  minimal: {
    knowledgeStoreLimit: 5,
    webSearchLimit: 1,
    gates: { relevance: false, groundedness: false, usefulness: false },
  },
  "no-checks": {
    knowledgeStoreLimit: 10,
    webSearchLimit: 5,
    gates: { relevance: false, groundedness: false, usefulness: false },
  },
  "graph-only": {
    knowledgeStoreLimit: 10,
    webSearchLimit: 1,
    components: ["entities", "relationships"],
    gates: { relevance: false, groundedness: true, usefulness: true },
  },
  "web-fallback": {
    knowledgeStoreLimit: 10,
    webSearchLimit: 10,
    gates: { relevance: false, groundedness: true, usefulness: true },
  },
};

export const DEFAULT_PRESET: EvaluationPresetName = "balanced";

export const DEFAULT_METRICS: readonly MetricName[] = ["correctness", "concision"];

export function isPresetName(name: string): name is EvaluationPresetName {
  return Object.hasOwn(EVALUATION_PRESETS, name);
}
