/**
 * Answer evaluators.
 *
 * Three metrics ask a judge model through the gateway; concision is a length
 * rule. An evaluator never throws: a judge failure scores 0 with the error in
 * the comment.
 */

import type { JudgeVerdict, LanguageModelGateway, TaskInputs } from "../llm/gateway";
import { errorMessage, logWarn } from "../utils/logger";
import type { Citation, PipelineLogContext } from "../workflow/types";
import type { EvaluationSample, MetricName, MetricResult } from "./types";

export interface Evaluator {
  readonly metric: MetricName;
  evaluate(sample: EvaluationSample, logContext: PipelineLogContext): Promise<MetricResult>;
}

export const DEFAULT_MAX_LENGTH_RATIO = 4;

/** "Title (url)" when both are known, otherwise whichever is. */
export function describeCitation(citation: Citation): string {
  const label = citation.title ?? citation.sourceId;
  return citation.url && citation.url !== label ? `${label} (${citation.url})` : label;
}

function fromVerdict(metric: MetricName, { verdict, reasoning }: JudgeVerdict): MetricResult {
  return { metric, score: verdict === "pass" ? 1 : 0, comment: reasoning };
}

async function judge(
  metric: MetricName,
  call: () => Promise<JudgeVerdict>,
  logContext: PipelineLogContext
): Promise<MetricResult> {
  try {
    return fromVerdict(metric, await call());
  } catch (error) {
    logWarn("evaluation_judge_failed", {
      requestId: logContext.requestId,
      stage: "evaluation",
      metric,
      error: errorMessage(error),
    });
    return { metric, score: 0, comment: `Evaluation error: ${errorMessage(error)}` };
  }
}

export function correctnessEvaluator(gateway: LanguageModelGateway): Evaluator {
  return {
    metric: "correctness",
    async evaluate({ example, answer }, logContext) {
      if (example.referenceAnswer.trim() === "") {
        return { metric: "correctness", score: 0, comment: "No reference answer to compare against" };
      }
      const input: TaskInputs["correctness-judge"] = {
        question: example.question,
        referenceAnswer: example.referenceAnswer,
        answer,
      };
      return judge("correctness", () => gateway.classify("correctness-judge", input, logContext), logContext);
    },
  };
}

export function faithfulnessEvaluator(gateway: LanguageModelGateway): Evaluator {
  return {
    metric: "faithfulness",
    async evaluate({ example, answer, citations }, logContext) {
      const input: TaskInputs["faithfulness-judge"] = {
        referenceAnswer: example.referenceAnswer,
        referenceCitations: example.referenceCitations,
        answer,
        citations: citations.map(describeCitation),
      };
      return judge("faithfulness", () => gateway.classify("faithfulness-judge", input, logContext), logContext);
    },
  };
}

export function relevanceEvaluator(gateway: LanguageModelGateway): Evaluator {
  return {
    metric: "relevance",
    async evaluate({ example, answer }, logContext) {
      const input: TaskInputs["relevance-judge"] = { question: example.question, answer };
      return judge("relevance", () => gateway.classify("relevance-judge", input, logContext), logContext);
    },
  };
}

/**
 * Passes when the answer is at most `maxRatio` times as long as the
 * reference. Without a reference there is nothing to be verbose against.
 */
export function concisionEvaluator(maxRatio = DEFAULT_MAX_LENGTH_RATIO): Evaluator {
  return {
    metric: "concision",
    async evaluate({ example, answer }) {
      const referenceLength = example.referenceAnswer.length;
      if (referenceLength === 0) {
        return { metric: "concision", score: 1, comment: "No reference answer; concision not measured" };
      }

      const ratio = answer.length / referenceLength;
      const passed = ratio <= maxRatio;
      const comment =
        `Length ratio: ${ratio.toFixed(2)} (response: ${answer.length} chars, reference: ${referenceLength} chars)` +
        (passed ? "" : ` - Exceeds max ratio of ${maxRatio}`);
      return { metric: "concision", score: passed ? 1 : 0, comment };
    },
  };
}

export function createEvaluators(gateway: LanguageModelGateway, metrics: readonly MetricName[]): Evaluator[] {
  const factories: Record<MetricName, () => Evaluator> = {
    correctness: () => correctnessEvaluator(gateway),
    faithfulness: () => faithfulnessEvaluator(gateway),
    relevance: () => relevanceEvaluator(gateway),
    concision: () => concisionEvaluator(),
  };
  return metrics.map((metric) => factories[metric]());
}
