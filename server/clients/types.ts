import type { EvidenceComponent, EvidenceItem, PipelineLogContext } from "../workflow/types";

export type ComponentEvidence = Partial<Record<EvidenceComponent, EvidenceItem[]>>;

/**
 * Knowledge store search. Ranking, embedding and graph traversal are the
 * store's business; callers only see content with citations per component.
 */
export interface KnowledgeStoreClient {
  retrieve(
    query: string,
    limit: number,
    components: readonly EvidenceComponent[],
    logContext?: PipelineLogContext
  ): Promise<ComponentEvidence>;
}

export interface WebSearchClient {
  search(query: string, limit: number, logContext?: PipelineLogContext): Promise<EvidenceItem[]>;
}
