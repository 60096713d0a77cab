/**
 * Workflow stages.
 *
 * Each stage is an object that takes the current state and returns the next
 * state, an outcome for the transition table and a summary for the trace.
 * Optional stages are only instantiated when their gate is enabled, so the
 * pipeline built for a request is exactly the set of stages it can run.
 */

import type { KnowledgeStoreClient, WebSearchClient } from "../clients/types";
import type { LanguageModelGateway } from "../llm/gateway";
import { generateAnswer } from "./answerGenerator";
import { assembleContext } from "./contextAssembler";
import { refineQuestion } from "./queryRefiner";
import { filterRelevant } from "./relevanceFilter";
import { retrieveKnowledge, searchWeb } from "./retriever";
import { routeQuestion } from "./router";
import { countEvidence, hasEvidence, replaceEvidence } from "./state";
import { checkGroundedness, checkUsefulness } from "./verifiers";
import type {
  PipelineLogContext,
  StageName,
  StageOutcome,
  TraceSummary,
  WorkflowConfig,
  WorkflowState,
} from "./types";

export interface StageDeps {
  gateway: LanguageModelGateway;
  knowledgeStore: KnowledgeStoreClient;
  webSearch: WebSearchClient;
  logContext: PipelineLogContext;
}

export interface StageResult {
  state: WorkflowState;
  outcome: StageOutcome;
  summary: TraceSummary;
}

export interface WorkflowStage {
  readonly name: StageName;
  run(state: WorkflowState, deps: StageDeps): Promise<StageResult>;
}

const ROUTE_OUTCOMES = {
  "knowledge-store": "knowledgeStore",
  "web-search": "webSearch",
  "internal-knowledge": "internalKnowledge",
} as const;

export const routeStage: WorkflowStage = {
  name: "route",
  async run(state, { gateway, logContext }) {
    const { route, fallback } = await routeQuestion(gateway, state.originalQuestion, logContext);
    return {
      state: { ...state, route, source: route },
      outcome: fallback ? "routerFailed" : ROUTE_OUTCOMES[route],
      summary: { route, fallback },
    };
  },
};

export const knowledgeRetrievalStage: WorkflowStage = {
  name: "knowledgeRetrieval",
  async run(state, { knowledgeStore, logContext }) {
    const { evidence, failedComponents } = await retrieveKnowledge(
      knowledgeStore,
      state.currentQuestion,
      state.config.knowledgeStoreLimit,
      state.config.components,
      logContext
    );
    const next = replaceEvidence(state.evidence, evidence);
    return {
      state: { ...state, evidence: next },
      outcome: "retrieved",
      summary: {
        ...countEvidence(next),
        failedComponents: failedComponents.length,
        queryRefinementCount: state.counters.queryRefinement,
      },
    };
  },
};

export const webSearchStage: WorkflowStage = {
  name: "webSearch",
  async run(state, { webSearch, logContext }) {
    const { items, failed } = await searchWeb(
      webSearch,
      state.currentQuestion,
      state.config.webSearchLimit,
      logContext
    );
    return {
      state: { ...state, evidence: replaceEvidence(state.evidence, { web: items }) },
      outcome: "retrieved",
      summary: { web: items.length, failed, fallback: state.webFallbackUsed },
    };
  },
};

export const relevanceFilterStage: WorkflowStage = {
  name: "relevanceFilter",
  async run(state, { gateway, logContext }) {
    const result = await filterRelevant(gateway, state.currentQuestion, state.evidence, logContext);
    return {
      state: { ...state, evidence: result.evidence },
      outcome: result.kept > 0 ? "relevant" : "noneRelevant",
      summary: {
        graded: result.graded,
        kept: result.kept,
        graderFailures: result.graderFailures,
        queryRefinementCount: state.counters.queryRefinement,
      },
    };
  },
};

export const queryRefinementStage: WorkflowStage = {
  name: "queryRefinement",
  async run(state, { gateway, logContext }) {
    const { question, failed } = await refineQuestion(gateway, state.currentQuestion, logContext);
    return {
      state: { ...state, currentQuestion: question },
      outcome: "refined",
      summary: { failed, queryRefinementCount: state.counters.queryRefinement },
    };
  },
};

export const answerGenerationStage: WorkflowStage = {
  name: "answerGeneration",
  async run(state, { gateway, logContext }) {
    const context = hasEvidence(state.evidence) ? assembleContext(state.evidence) : null;
    const { answer, mode, failed } = await generateAnswer(
      gateway,
      {
        originalQuestion: state.originalQuestion,
        currentQuestion: state.currentQuestion,
        context,
        source: state.source,
      },
      logContext
    );
    return {
      state: { ...state, answer, context },
      outcome: "generated",
      summary: {
        mode,
        failed,
        citations: context?.citations.length ?? 0,
        groundednessRetryCount: state.counters.groundedness,
      },
    };
  },
};

export const groundednessStage: WorkflowStage = {
  name: "groundednessCheck",
  async run(state, { gateway, logContext }): Promise<StageResult> {
    // a context-free answer has nothing to be grounded in
    if (!state.context || state.answer === null) {
      return {
        state,
        outcome: "grounded",
        summary: { grounded: true, skipped: true, groundednessRetryCount: state.counters.groundedness },
      };
    }

    const { passed, failed } = await checkGroundedness(gateway, state.context.text, state.answer, logContext);
    return {
      state,
      outcome: passed ? "grounded" : "notGrounded",
      summary: {
        grounded: passed,
        skipped: false,
        failed,
        groundednessRetryCount: state.counters.groundedness,
      },
    };
  },
};

export const usefulnessStage: WorkflowStage = {
  name: "usefulnessCheck",
  async run(state, { gateway, logContext }) {
    const { passed, failed } = await checkUsefulness(
      gateway,
      state.originalQuestion,
      state.answer ?? "",
      logContext
    );
    return {
      state,
      outcome: passed ? "useful" : "notUseful",
      summary: { useful: passed, failed, queryRefinementCount: state.counters.queryRefinement },
    };
  },
};

export interface Pipeline {
  readonly stages: ReadonlyMap<StageName, WorkflowStage>;
  has(name: StageName): boolean;
}

/**
 * Select the stages a configuration runs. The optional gates are composed in
 * here once; the transition table asks the pipeline which of them exist.
 */
export function buildPipeline(config: WorkflowConfig): Pipeline {
  const selected: WorkflowStage[] = [
    routeStage,
    knowledgeRetrievalStage,
    webSearchStage,
    queryRefinementStage,
    answerGenerationStage,
  ];

  if (config.gates.relevance) selected.push(relevanceFilterStage);
  if (config.gates.groundedness) selected.push(groundednessStage);
  if (config.gates.usefulness) selected.push(usefulnessStage);

  const stages = new Map(selected.map((stage) => [stage.name, stage] as const));
  return {
    stages,
    has: (name) => stages.has(name),
  };
}
