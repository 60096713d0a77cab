/**
 * Language Model Gateway contract.
 *
 * A stateless capability: given a task kind and a structured input it returns
 * a structured decision. The workflow only depends on this interface; the
 * Gemini implementation lives in geminiGateway.ts and tests supply scripted
 * fakes.
 */

import { z } from "zod";
import type { PipelineLogContext } from "../workflow/types";

export type TaskKind =
  | "route"
  | "relevance-grade"
  | "groundedness-grade"
  | "usefulness-grade"
  | "query-rewrite"
  | "answer-generate"
  | "correctness-judge"
  | "faithfulness-judge"
  | "relevance-judge";

export type BinaryScore = "yes" | "no";

export interface RouteDecision {
  inDomain: boolean;
  requiresRecency: boolean;
}

export interface BinaryGrade {
  binaryScore: BinaryScore;
}

/** Verdict of an evaluation judge on a finished answer. */
export interface JudgeVerdict {
  verdict: "pass" | "fail";
  reasoning: string;
}

export interface TaskInputs {
  route: { question: string };
  "relevance-grade": { question: string; document: string };
  "groundedness-grade": { context: string; answer: string };
  "usefulness-grade": { question: string; answer: string };
  "query-rewrite": { question: string };
  /** A null context asks for an answer from model knowledge alone. */
  "answer-generate": { question: string; context: string | null };
  "correctness-judge": { question: string; referenceAnswer: string; answer: string };
  "faithfulness-judge": {
    referenceAnswer: string;
    referenceCitations: string[];
    answer: string;
    citations: string[];
  };
  "relevance-judge": { question: string; answer: string };
}

export interface TaskOutputs {
  route: RouteDecision;
  "relevance-grade": BinaryGrade;
  "groundedness-grade": BinaryGrade;
  "usefulness-grade": BinaryGrade;
  "query-rewrite": { refinedQuestion: string };
  "answer-generate": { answer: string };
  "correctness-judge": JudgeVerdict;
  "faithfulness-judge": JudgeVerdict;
  "relevance-judge": JudgeVerdict;
}

export interface LanguageModelGateway {
  classify<K extends TaskKind>(
    task: K,
    input: TaskInputs[K],
    logContext?: PipelineLogContext
  ): Promise<TaskOutputs[K]>;
}

const binaryScoreSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["yes", "no"]));

const binaryGradeSchema = z.object({ binaryScore: binaryScoreSchema });

const judgeVerdictSchema = z.object({
  verdict: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(["pass", "fail"])),
  reasoning: z.string().default(""),
});

type OutputSchemas = {
  [K in TaskKind]: z.ZodType<TaskOutputs[K], z.ZodTypeDef, unknown>;
};

/**
 * Shapes a model reply must parse into, per task.
 */
export const TASK_OUTPUT_SCHEMAS: OutputSchemas = {
  route: z.object({
    inDomain: z.boolean(),
    requiresRecency: z.boolean(),
  }),
  "relevance-grade": binaryGradeSchema,
  "groundedness-grade": binaryGradeSchema,
  "usefulness-grade": binaryGradeSchema,
  "query-rewrite": z.object({ refinedQuestion: z.string().trim().min(1) }),
  "answer-generate": z.object({ answer: z.string() }),
  "correctness-judge": judgeVerdictSchema,
  "faithfulness-judge": judgeVerdictSchema,
  "relevance-judge": judgeVerdictSchema,
};

export function isPositive(grade: BinaryGrade): boolean {
  return grade.binaryScore === "yes";
}
