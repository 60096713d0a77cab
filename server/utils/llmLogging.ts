/**
 * LLM Call Logging Utilities
 *
 * Structured logging for every language model call made by the gateway.
 * Prompts and responses are truncated; no API keys are logged.
 */

import { logDebug, logWarn, truncate, sanitizeUserContent, type LogContext } from "./logger";

export interface LlmLogParams {
  requestId?: string;
  stage: string;
  model: string;
  systemPrompt?: string;
  userPrompt?: string;
  temperature?: number;
  extra?: Record<string, unknown>;
}

/**
 * Log an LLM request before making the API call
 */
export function logLlmRequest(params: LlmLogParams): void {
  const { requestId, stage, model, systemPrompt, userPrompt, temperature, extra } = params;

  const context: LogContext = {
    requestId,
    stage,
    model,
    temperature,
    ...extra,
  };

  if (systemPrompt) {
    context.systemPrompt = truncate(systemPrompt, 800);
  }
  if (userPrompt) {
    context.userPrompt = sanitizeUserContent(userPrompt, 400);
  }

  logDebug("llm_request", context);
}

export interface LlmResponseLogParams {
  requestId?: string;
  stage: string;
  model: string;
  responseText?: string;
  durationMs?: number;
  extra?: Record<string, unknown>;
}

export function logLlmResponse(params: LlmResponseLogParams): void {
  const { requestId, stage, model, responseText, durationMs, extra } = params;

  const context: LogContext = {
    requestId,
    stage,
    model,
    durationMs,
    ...extra,
  };

  if (responseText) {
    context.responseSnippet = truncate(responseText, 1500);
    context.responseLength = responseText.length;
  }

  logDebug("llm_response", context);
}

/**
 * Log an LLM error. Quota errors are raised to warn so they show up without
 * debug logging.
 */
export function logLlmError(params: {
  requestId?: string;
  stage: string;
  model: string;
  error: unknown;
  quotaExceeded?: boolean;
}): void {
  const { requestId, stage, model, error, quotaExceeded } = params;

  const context: LogContext = {
    requestId,
    stage,
    model,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack?.slice(0, 500) : undefined,
  };

  if (quotaExceeded) {
    logWarn("llm_quota_exceeded", context);
    return;
  }

  logDebug("llm_error", context);
}
