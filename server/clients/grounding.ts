/**
 * Helpers for turning Gemini grounding metadata into evidence items.
 *
 * In the Gemini API both File Search and Google Search run as tools inside a
 * generateContent call; their results only come back in the response's
 * groundingMetadata, never as a separate search result list.
 */

import type { GenerateContentResponse, GroundingChunk, GroundingSupport } from "@google/genai";
import type { EvidenceItem } from "../workflow/types";

export function getGroundingChunks(response: GenerateContentResponse): GroundingChunk[] {
  return response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];
}

export function getGroundingSupports(response: GenerateContentResponse): GroundingSupport[] {
  return response.candidates?.[0]?.groundingMetadata?.groundingSupports ?? [];
}

/**
 * File Search chunks carry the retrieved text themselves.
 */
export function retrievedChunksToEvidence(chunks: GroundingChunk[], limit: number): EvidenceItem[] {
  const items: EvidenceItem[] = [];

  for (const chunk of chunks) {
    const context = chunk.retrievedContext;
    const content = context?.text?.trim();
    const sourceId = context?.title || context?.uri;
    if (!content || !sourceId) continue;

    items.push({
      content,
      citation: {
        sourceId,
        title: context?.title || undefined,
        url: context?.uri || undefined,
      },
    });

    if (items.length >= limit) break;
  }

  return items;
}

/**
 * Web chunks only carry a title and URI; their text is the set of answer
 * segments the model attributed to them.
 */
export function webChunksToEvidence(
  chunks: GroundingChunk[],
  supports: GroundingSupport[],
  fallbackText: string,
  limit: number
): EvidenceItem[] {
  const items: EvidenceItem[] = [];

  chunks.forEach((chunk, index) => {
    const web = chunk.web;
    const sourceId = web?.uri || web?.title;
    if (!web || !sourceId || items.length >= limit) return;

    const segments = supports
      .filter((support) => support.groundingChunkIndices?.includes(index))
      .map((support) => support.segment?.text?.trim())
      .filter((text): text is string => Boolean(text));

    const content = segments.length > 0 ? segments.join(" ") : fallbackText.trim();
    if (!content) return;

    items.push({
      content,
      citation: {
        sourceId,
        title: web.title || undefined,
        url: web.uri || undefined,
      },
    });
  });

  return items;
}
