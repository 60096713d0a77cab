import type { LanguageModelGateway } from "../llm/gateway";
import { logWarn, errorMessage } from "../utils/logger";
import type { AssembledContext, PipelineLogContext, Route } from "./types";

export const ANSWER_UNAVAILABLE =
  "I apologize, but I'm unable to answer that question at the moment.";

export type GenerationMode = "context" | "context-free";

export interface GenerationRequest {
  originalQuestion: string;
  currentQuestion: string;
  /** Null selects context-free mode. */
  context: AssembledContext | null;
  /** Evidence source in use; null before routing. */
  source: Route | null;
}

export interface GenerationResult {
  answer: string;
  mode: GenerationMode;
  failed: boolean;
}

/**
 * Context mode answers the user's original question from the assembled
 * context. Context-free mode answers from model knowledge: the original
 * question on the internal-knowledge source, whose rewrites only add
 * retrieval qualifiers, and the working question otherwise.
 */
function contextFreeQuestion(request: GenerationRequest): string {
  return request.source === "internal-knowledge" ? request.originalQuestion : request.currentQuestion;
}

export async function generateAnswer(
  gateway: LanguageModelGateway,
  request: GenerationRequest,
  logContext: PipelineLogContext
): Promise<GenerationResult> {
  const mode: GenerationMode = request.context ? "context" : "context-free";
  const input = request.context
    ? { question: request.originalQuestion, context: request.context.text }
    : { question: contextFreeQuestion(request), context: null };

  try {
    const { answer } = await gateway.classify("answer-generate", input, logContext);
    if (answer.trim() === "") {
      return { answer: ANSWER_UNAVAILABLE, mode, failed: true };
    }
    return { answer, mode, failed: false };
  } catch (error) {
    logWarn("answer_generation_failed", {
      requestId: logContext.requestId,
      stage: "answerGeneration",
      mode,
      error: errorMessage(error),
    });
    return { answer: ANSWER_UNAVAILABLE, mode, failed: true };
  }
}
