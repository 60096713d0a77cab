import type { GoogleGenAI } from "@google/genai";
import type { WebSearchClient } from "./types";
import { getGroundingChunks, getGroundingSupports, webChunksToEvidence } from "./grounding";
import { getModelForStage } from "../llm/modelRegistry";
import { logRetrievalRequest, logRetrievalResponse } from "../utils/retrievalLogging";
import type { EvidenceItem, PipelineLogContext } from "../workflow/types";

/**
 * Web search through Gemini's Google Search grounding tool.
 */
export class GoogleSearchClient implements WebSearchClient {
  constructor(private readonly ai: GoogleGenAI) {}

  async search(query: string, limit: number, logContext?: PipelineLogContext): Promise<EvidenceItem[]> {
    const { model } = getModelForStage("webSearch");
    const startTime = Date.now();

    logRetrievalRequest({
      requestId: logContext?.requestId,
      stage: "webSearch",
      source: "google_search",
      queryText: query,
      limit,
    });

    const response = await this.ai.models.generateContent({
      model,
      contents: [{ role: "user", parts: [{ text: query }] }],
      config: {
        systemInstruction: "Search the web and summarise the most recent, relevant findings for the query. Cite every finding.",
        temperature: 0,
        tools: [{ googleSearch: {} }],
      },
    });

    const items = webChunksToEvidence(
      getGroundingChunks(response),
      getGroundingSupports(response),
      response.text ?? "",
      limit
    );

    logRetrievalResponse({
      requestId: logContext?.requestId,
      stage: "webSearch",
      source: "google_search",
      items,
      durationMs: Date.now() - startTime,
    });

    return items;
  }
}
