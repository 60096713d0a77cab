import type { LanguageModelGateway } from "../llm/gateway";
import { logDebug, logWarn, errorMessage, sanitizeUserContent } from "../utils/logger";
import type { PipelineLogContext } from "./types";

export interface RefinementResult {
  question: string;
  failed: boolean;
}

/**
 * Rewrite the working question for retrieval. Only the current question is
 * given to the model; the original question is never touched.
 */
export async function refineQuestion(
  gateway: LanguageModelGateway,
  question: string,
  logContext: PipelineLogContext
): Promise<RefinementResult> {
  try {
    const { refinedQuestion } = await gateway.classify("query-rewrite", { question }, logContext);

    logDebug("query_refined", {
      requestId: logContext.requestId,
      stage: "queryRefinement",
      before: sanitizeUserContent(question, 60),
      after: sanitizeUserContent(refinedQuestion, 60),
    });

    return { question: refinedQuestion, failed: false };
  } catch (error) {
    logWarn("query_refinement_failed", {
      requestId: logContext.requestId,
      stage: "queryRefinement",
      error: errorMessage(error),
    });
    return { question, failed: true };
  }
}
