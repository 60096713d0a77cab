/**
 * Transition table for the answer workflow.
 *
 * Keyed by stage and outcome. Every edge that can close a cycle is guarded:
 * - relevanceFilter/noneRelevant and usefulnessCheck/notUseful spend the
 *   shared queryRefinement budget, then fall back (web search once, or stop)
 * - groundednessCheck/notGrounded spends the groundedness budget, then stops
 * - the web fallback is one-shot through state.webFallbackUsed
 * so the number of stage executions is bounded by stageBudget().
 */

import type { Pipeline } from "./stages";
import { incrementCounter } from "./state";
import type { RetryCeilings, Route, StageName, StageOutcome, WorkflowState } from "./types";

export type NextStage = StageName | "end";

export interface Transition {
  next: NextStage;
  /** Applied to the state before the next stage runs. */
  apply?: (state: WorkflowState) => WorkflowState;
  /** Marker recorded in logs when a fallback edge is taken. */
  fallback?: "webSearch" | "bestEffort";
}

export type TransitionRule = (state: WorkflowState, pipeline: Pipeline) => Transition;

export type TransitionTable = {
  readonly [S in StageName]: Readonly<Partial<Record<StageOutcome, TransitionRule>>>;
};

const to = (next: NextStage): TransitionRule => () => ({ next });

function firstEnabled(pipeline: Pipeline, candidates: StageName[]): NextStage {
  return candidates.find((name) => pipeline.has(name)) ?? "end";
}

const markBestEffort = (state: WorkflowState): WorkflowState => ({ ...state, bestEffort: true });

const RETRIEVAL_FOR_SOURCE: Record<Route, StageName> = {
  "knowledge-store": "knowledgeRetrieval",
  "web-search": "webSearch",
  "internal-knowledge": "answerGeneration",
};

function hasBudget(state: WorkflowState, loop: keyof RetryCeilings): boolean {
  return state.counters[loop] < state.config.retryCeilings[loop];
}

export const TRANSITIONS: TransitionTable = {
  route: {
    knowledgeStore: to("knowledgeRetrieval"),
    webSearch: to("webSearch"),
    internalKnowledge: to("answerGeneration"),
    routerFailed: to("answerGeneration"),
  },

  knowledgeRetrieval: {
    retrieved: (_state, pipeline) => ({
      next: firstEnabled(pipeline, ["relevanceFilter", "answerGeneration"]),
    }),
  },

  webSearch: {
    retrieved: to("answerGeneration"),
  },

  relevanceFilter: {
    relevant: to("answerGeneration"),
    noneRelevant: (state) => {
      if (hasBudget(state, "queryRefinement")) {
        return {
          next: "queryRefinement",
          apply: (s) => incrementCounter(s, "queryRefinement"),
        };
      }
      if (!state.webFallbackUsed) {
        return {
          next: "webSearch",
          apply: (s) => ({ ...s, webFallbackUsed: true, source: "web-search" }),
          fallback: "webSearch",
        };
      }
      return { next: "answerGeneration" };
    },
  },

  queryRefinement: {
    refined: (state) => ({
      next: RETRIEVAL_FOR_SOURCE[state.source ?? "internal-knowledge"],
    }),
  },

  answerGeneration: {
    generated: (_state, pipeline) => ({
      next: firstEnabled(pipeline, ["groundednessCheck", "usefulnessCheck"]),
    }),
  },

  groundednessCheck: {
    grounded: (_state, pipeline) => ({
      next: firstEnabled(pipeline, ["usefulnessCheck"]),
    }),
    notGrounded: (state) =>
      hasBudget(state, "groundedness")
        ? { next: "answerGeneration", apply: (s) => incrementCounter(s, "groundedness") }
        : { next: "end", apply: markBestEffort, fallback: "bestEffort" },
  },

  usefulnessCheck: {
    useful: to("end"),
    notUseful: (state) =>
      hasBudget(state, "queryRefinement")
        ? { next: "queryRefinement", apply: (s) => incrementCounter(s, "queryRefinement") }
        : { next: "end", apply: markBestEffort, fallback: "bestEffort" },
  },
};

/**
 * Upper bound on stage executions for a pair of ceilings.
 *
 * With R query refinements and G regenerations there are at most 1 + R
 * retrieval rounds plus one web fallback, each round runs retrieval, filter,
 * refinement and usefulness at most once, and every round or regeneration
 * produces at most one generation followed by its checks.
 */
export function stageBudget(ceilings: RetryCeilings): number {
  const rounds = ceilings.queryRefinement + 2;
  const generations = ceilings.queryRefinement + ceilings.groundedness + 2;
  return 1 + 4 * rounds + 3 * generations;
}
