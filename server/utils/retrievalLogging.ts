/**
 * Retrieval Logging Utilities
 *
 * Structured logging for knowledge store and web search calls.
 * Query text and snippets are truncated; full documents are never logged.
 */

import { logDebug, logWarn, truncate, sanitizeUserContent } from "./logger";
import type { EvidenceItem } from "../workflow/types";

export function logRetrievalRequest(params: {
  requestId?: string;
  stage: string;
  source: string;
  queryText?: string;
  limit: number;
}): void {
  const { requestId, stage, source, queryText, limit } = params;

  logDebug("retrieval_request", {
    requestId,
    stage,
    source,
    queryText: sanitizeUserContent(queryText, 200),
    limit,
  });
}

export function logRetrievalResponse(params: {
  requestId?: string;
  stage: string;
  source: string;
  items: EvidenceItem[];
  durationMs: number;
}): void {
  const { requestId, stage, source, items, durationMs } = params;

  logDebug("retrieval_response", {
    requestId,
    stage,
    source,
    resultCount: items.length,
    results: items.slice(0, 5).map((item) => ({
      sourceId: truncate(item.citation.sourceId, 100),
      snippetPreview: truncate(item.content, 200),
    })),
    durationMs,
  });
}

/**
 * A failed source is logged at warn: it degrades the answer silently otherwise.
 */
export function logRetrievalError(params: {
  requestId?: string;
  stage: string;
  source: string;
  error: unknown;
}): void {
  const { requestId, stage, source, error } = params;

  logWarn("retrieval_failed", {
    requestId,
    stage,
    source,
    error: error instanceof Error ? error.message : String(error),
  });
}
