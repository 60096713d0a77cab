/**
 * Model Registry - centralized model selection for the answer workflow
 *
 * Control steps (routing, grading, rewriting) run on the fast model; answer
 * generation and the evaluation judges run on the higher quality model. Each
 * stage can be overridden through its environment variable.
 */

import type { TaskKind } from "./gateway";

export type ModelStage = TaskKind | "knowledgeRetrieval" | "webSearch";

export interface ModelSelection {
  model: string;
  overridden: boolean;
}

const MODELS = {
  FAST: "gemini-2.5-flash",
  HIGH_QUALITY: "gemini-2.5-pro",
} as const;

const ENV_OVERRIDES: Record<ModelStage, string> = {
  route: "MODEL_ROUTER",
  "relevance-grade": "MODEL_RELEVANCE",
  "groundedness-grade": "MODEL_GROUNDEDNESS",
  "usefulness-grade": "MODEL_USEFULNESS",
  "query-rewrite": "MODEL_REWRITE",
  "answer-generate": "MODEL_ANSWER",
  "correctness-judge": "MODEL_JUDGE",
  "faithfulness-judge": "MODEL_JUDGE",
  "relevance-judge": "MODEL_JUDGE",
  knowledgeRetrieval: "MODEL_RETRIEVAL",
  webSearch: "MODEL_WEB_SEARCH",
};

const DEFAULT_MODELS: Record<ModelStage, string> = {
  route: MODELS.FAST,
  "relevance-grade": MODELS.FAST,
  "groundedness-grade": MODELS.FAST,
  "usefulness-grade": MODELS.FAST,
  "query-rewrite": MODELS.FAST,
  "answer-generate": MODELS.HIGH_QUALITY,
  "correctness-judge": MODELS.HIGH_QUALITY,
  "faithfulness-judge": MODELS.HIGH_QUALITY,
  "relevance-judge": MODELS.HIGH_QUALITY,
  knowledgeRetrieval: MODELS.FAST,
  webSearch: MODELS.FAST,
};

/**
 * Sampling temperature per stage. Grading stays deterministic; generation
 * gets a little room.
 */
const TEMPERATURES: Record<ModelStage, number> = {
  route: 0,
  "relevance-grade": 0,
  "groundedness-grade": 0,
  "usefulness-grade": 0,
  "query-rewrite": 0.2,
  "answer-generate": 0.3,
  "correctness-judge": 0,
  "faithfulness-judge": 0,
  "relevance-judge": 0,
  knowledgeRetrieval: 0,
  webSearch: 0,
};

export function getModelForStage(stage: ModelStage): ModelSelection {
  const envOverride = process.env[ENV_OVERRIDES[stage]];
  if (envOverride && envOverride.trim() !== "") {
    return { model: envOverride.trim(), overridden: true };
  }

  return { model: DEFAULT_MODELS[stage], overridden: false };
}

export function getTemperatureForStage(stage: ModelStage): number {
  return TEMPERATURES[stage];
}

export const ModelNames = MODELS;
