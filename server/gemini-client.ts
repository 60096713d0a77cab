import { GoogleGenAI } from "@google/genai";
import type { EnvConfig } from "./config/env";
import { FileSearchKnowledgeStore } from "./clients/fileSearchKnowledgeStore";
import { GoogleSearchClient } from "./clients/googleSearchClient";
import { GeminiGateway } from "./llm/geminiGateway";
import type { LanguageModelGateway } from "./llm/gateway";
import { createWorkflow, type Workflow } from "./workflow";

export interface GeminiServices {
  gateway: LanguageModelGateway;
  workflow: Workflow;
}

/**
 * Wire the workflow to Gemini: one client shared by the gateway, the File
 * Search knowledge store and Google Search grounding. The gateway is returned
 * as well for callers that judge answers with it.
 */
export function createGeminiServices(env: EnvConfig): GeminiServices {
  const ai = new GoogleGenAI({ apiKey: env.GEMINI_API_KEY });
  const gateway = new GeminiGateway({ ai, domainDescription: env.DOMAIN_DESCRIPTION });

  const workflow = createWorkflow({
    gateway,
    knowledgeStore: new FileSearchKnowledgeStore(ai, env.FILE_SEARCH_STORES),
    webSearch: new GoogleSearchClient(ai),
  });

  return { gateway, workflow };
}

export function createGeminiWorkflow(env: EnvConfig): Workflow {
  return createGeminiServices(env).workflow;
}
