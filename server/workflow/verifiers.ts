/**
 * Groundedness and usefulness verifiers.
 *
 * A grading failure is treated as a pass so a flaky grader cannot trigger
 * extra regeneration or refinement cycles.
 */

import { isPositive, type LanguageModelGateway } from "../llm/gateway";
import { logDebug, errorMessage } from "../utils/logger";
import type { PipelineLogContext } from "./types";

export interface Verification {
  passed: boolean;
  failed: boolean;
}

export async function checkGroundedness(
  gateway: LanguageModelGateway,
  context: string,
  answer: string,
  logContext: PipelineLogContext
): Promise<Verification> {
  try {
    const grade = await gateway.classify("groundedness-grade", { context, answer }, logContext);
    return { passed: isPositive(grade), failed: false };
  } catch (error) {
    logDebug("groundedness_grade_failed", {
      requestId: logContext.requestId,
      stage: "groundednessCheck",
      error: errorMessage(error),
    });
    return { passed: true, failed: true };
  }
}

/**
 * Judged against the original question, not the refined one.
 */
export async function checkUsefulness(
  gateway: LanguageModelGateway,
  originalQuestion: string,
  answer: string,
  logContext: PipelineLogContext
): Promise<Verification> {
  try {
    const grade = await gateway.classify("usefulness-grade", { question: originalQuestion, answer }, logContext);
    return { passed: isPositive(grade), failed: false };
  } catch (error) {
    logDebug("usefulness_grade_failed", {
      requestId: logContext.requestId,
      stage: "usefulnessCheck",
      error: errorMessage(error),
    });
    return { passed: true, failed: true };
  }
}
