import type { GoogleGenAI } from "@google/genai";
import type { z } from "zod";
import {
  TASK_OUTPUT_SCHEMAS,
  type LanguageModelGateway,
  type TaskInputs,
  type TaskKind,
  type TaskOutputs,
} from "./gateway";
import { PROMPT_BUILDERS, type PromptSpec } from "./prompts";
import { getModelForStage, getTemperatureForStage } from "./modelRegistry";
import { logLlmRequest, logLlmResponse, logLlmError } from "../utils/llmLogging";
import { GatewayResponseError, isQuotaError } from "../utils/geminiErrors";
import type { PipelineLogContext } from "../workflow/types";

export interface GeminiGatewayOptions {
  ai: GoogleGenAI;
  domainDescription: string;
}

export function stripJsonFences(responseText: string): string {
  return responseText
    .replace(/```json\n?/g, "")
    .replace(/```\n?/g, "")
    .trim();
}

/**
 * Parse a model reply for a task. Throws GatewayResponseError when the reply
 * is not JSON or does not match the task's shape.
 */
export function parseTaskOutput<K extends TaskKind>(task: K, responseText: string): TaskOutputs[K] {
  let json: unknown;
  try {
    json = JSON.parse(stripJsonFences(responseText));
  } catch (parseError) {
    throw new GatewayResponseError(
      `Model reply for ${task} is not JSON: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
      task,
      responseText
    );
  }

  const schema: z.ZodType<TaskOutputs[K], z.ZodTypeDef, unknown> = TASK_OUTPUT_SCHEMAS[task];
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new GatewayResponseError(
      `Model reply for ${task} has the wrong shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      task,
      responseText
    );
  }
  return parsed.data;
}

/**
 * Gateway backed by the Gemini API. Every task is a single JSON-mode
 * generateContent call; errors propagate to the workflow call sites, which
 * own the fallback policy.
 */
export class GeminiGateway implements LanguageModelGateway {
  private readonly ai: GoogleGenAI;
  private readonly domainDescription: string;

  constructor(options: GeminiGatewayOptions) {
    this.ai = options.ai;
    this.domainDescription = options.domainDescription;
  }

  async classify<K extends TaskKind>(
    task: K,
    input: TaskInputs[K],
    logContext?: PipelineLogContext
  ): Promise<TaskOutputs[K]> {
    const { model } = getModelForStage(task);
    const temperature = getTemperatureForStage(task);
    const buildPrompt: (input: TaskInputs[K], domain: string) => PromptSpec = PROMPT_BUILDERS[task];
    const { systemPrompt, userPrompt } = buildPrompt(input, this.domainDescription);

    logLlmRequest({
      requestId: logContext?.requestId,
      stage: task,
      model,
      systemPrompt,
      userPrompt,
      temperature,
    });

    const startTime = Date.now();

    try {
      const response = await this.ai.models.generateContent({
        model,
        contents: [{ role: "user", parts: [{ text: userPrompt }] }],
        config: {
          systemInstruction: systemPrompt,
          temperature,
          responseMimeType: "application/json",
        },
      });

      const responseText = response.text ?? "";

      logLlmResponse({
        requestId: logContext?.requestId,
        stage: task,
        model,
        responseText,
        durationMs: Date.now() - startTime,
      });

      return parseTaskOutput(task, responseText);
    } catch (error) {
      logLlmError({
        requestId: logContext?.requestId,
        stage: task,
        model,
        error,
        quotaExceeded: isQuotaError(error),
      });
      throw error;
    }
  }
}
