/**
 * Knowledge store backed by Gemini File Search.
 *
 * Each evidence component (entities, relationships, episodes, communities)
 * is indexed in its own File Search store. A retrieval call asks the
 * retrieval model to pull passages for the query from one store and reads
 * the retrieved chunks from the grounding metadata.
 */

import type { GoogleGenAI } from "@google/genai";
import type { ComponentEvidence, KnowledgeStoreClient } from "./types";
import { getGroundingChunks, retrievedChunksToEvidence } from "./grounding";
import { getModelForStage } from "../llm/modelRegistry";
import { logRetrievalRequest, logRetrievalResponse } from "../utils/retrievalLogging";
import type { EvidenceComponent, EvidenceItem, PipelineLogContext } from "../workflow/types";

const COMPONENT_INSTRUCTIONS: Record<EvidenceComponent, string> = {
  entities: "Extract descriptions of the entities (pests, diseases, symptoms, treatments, plant parts) relevant to the query.",
  relationships: "Extract facts that connect entities relevant to the query: causes, symptoms, treatments, hosts.",
  episodes: "Extract the source passages most relevant to the query.",
  communities: "Extract topic summaries relevant to the query.",
};

export type FileSearchStoreNames = Partial<Record<EvidenceComponent, string>>;

export class FileSearchKnowledgeStore implements KnowledgeStoreClient {
  constructor(
    private readonly ai: GoogleGenAI,
    private readonly storeNames: FileSearchStoreNames
  ) {}

  /**
   * Components are searched one after another; the workflow retriever calls
   * once per component and runs those calls concurrently.
   */
  async retrieve(
    query: string,
    limit: number,
    components: readonly EvidenceComponent[],
    logContext?: PipelineLogContext
  ): Promise<ComponentEvidence> {
    const result: ComponentEvidence = {};
    for (const component of components) {
      result[component] = await this.searchComponent(component, query, limit, logContext);
    }
    return result;
  }

  private async searchComponent(
    component: EvidenceComponent,
    query: string,
    limit: number,
    logContext?: PipelineLogContext
  ): Promise<EvidenceItem[]> {
    const storeName = this.storeNames[component];
    if (!storeName) {
      throw new Error(`No File Search store configured for ${component}`);
    }

    const { model } = getModelForStage("knowledgeRetrieval");
    const stage = `knowledgeStore_${component}`;
    const startTime = Date.now();

    logRetrievalRequest({
      requestId: logContext?.requestId,
      stage,
      source: storeName,
      queryText: query,
      limit,
    });

    const response = await this.ai.models.generateContent({
      model,
      contents: [{ role: "user", parts: [{ text: query }] }],
      config: {
        systemInstruction: `You are a document retrieval assistant. ${COMPONENT_INSTRUCTIONS[component]}`,
        temperature: 0,
        tools: [{ fileSearch: { fileSearchStoreNames: [storeName] } }],
      },
    });

    const items = retrievedChunksToEvidence(getGroundingChunks(response), limit);

    logRetrievalResponse({
      requestId: logContext?.requestId,
      stage,
      source: storeName,
      items,
      durationMs: Date.now() - startTime,
    });

    return items;
  }
}
