/**
 * Retriever
 *
 * Fans out one knowledge store call per enabled evidence component and runs
 * them in parallel. A failing component yields an empty list for itself
 * only; its siblings still return. Web search follows the same rule.
 */

import type { KnowledgeStoreClient, WebSearchClient } from "../clients/types";
import { logRetrievalError } from "../utils/retrievalLogging";
import type { EvidenceComponent, EvidenceItem, PipelineLogContext } from "./types";

export interface KnowledgeRetrievalResult {
  evidence: Record<EvidenceComponent, EvidenceItem[]>;
  failedComponents: EvidenceComponent[];
}

export interface WebSearchResult {
  items: EvidenceItem[];
  failed: boolean;
}

async function retrieveComponent(
  store: KnowledgeStoreClient,
  component: EvidenceComponent,
  question: string,
  limit: number,
  logContext: PipelineLogContext
): Promise<{ items: EvidenceItem[]; failed: boolean }> {
  try {
    const result = await store.retrieve(question, limit, [component], logContext);
    return { items: (result[component] ?? []).slice(0, limit), failed: false };
  } catch (error) {
    logRetrievalError({
      requestId: logContext.requestId,
      stage: "knowledgeRetrieval",
      source: component,
      error,
    });
    return { items: [], failed: true };
  }
}

export async function retrieveKnowledge(
  store: KnowledgeStoreClient,
  question: string,
  limit: number,
  components: readonly EvidenceComponent[],
  logContext: PipelineLogContext
): Promise<KnowledgeRetrievalResult> {
  const results = await Promise.all(
    components.map((component) => retrieveComponent(store, component, question, limit, logContext))
  );

  const evidence: Record<EvidenceComponent, EvidenceItem[]> = {
    entities: [],
    relationships: [],
    episodes: [],
    communities: [],
  };
  const failedComponents: EvidenceComponent[] = [];

  components.forEach((component, index) => {
    const { items, failed } = results[index];
    evidence[component] = items;
    if (failed) failedComponents.push(component);
  });

  return { evidence, failedComponents };
}

export async function searchWeb(
  client: WebSearchClient,
  question: string,
  limit: number,
  logContext: PipelineLogContext
): Promise<WebSearchResult> {
  try {
    const items = await client.search(question, limit, logContext);
    return { items: items.slice(0, limit), failed: false };
  } catch (error) {
    logRetrievalError({
      requestId: logContext.requestId,
      stage: "webSearch",
      source: "web",
      error,
    });
    return { items: [], failed: true };
  }
}
