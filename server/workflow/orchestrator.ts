/**
 * Answer Workflow Orchestrator
 *
 * Entry point that runs one question through the state machine:
 *   route -> {webSearch | knowledgeRetrieval | answerGeneration}
 *         -> [relevanceFilter] -> answerGeneration
 *         -> [groundednessCheck] -> [usefulnessCheck] -> end
 * with queryRefinement looping back to retrieval. Which stage follows which
 * is decided by the transition table; this module only executes stages,
 * records the trace and applies transitions.
 */

import { randomUUID } from "crypto";
import type { KnowledgeStoreClient, WebSearchClient } from "../clients/types";
import type { LanguageModelGateway } from "../llm/gateway";
import { logDebug, logError, logInfo, logWarn, sanitizeUserContent } from "../utils/logger";
import { ANSWER_UNAVAILABLE } from "./answerGenerator";
import { buildPipeline, type Pipeline, type StageDeps, type WorkflowStage } from "./stages";
import { createInitialState } from "./state";
import { TRANSITIONS, stageBudget, type NextStage, type Transition } from "./transitions";
import {
  resolveWorkflowConfig,
  validateQuestion,
  type WorkflowConfigInput,
} from "./workflowConfig";
import type {
  PipelineLogContext,
  StageName,
  StageOutcome,
  TraceRecord,
  WorkflowConfig,
  WorkflowResult,
  WorkflowState,
} from "./types";

/**
 * Clients are owned by the caller and shared across requests; the workflow
 * keeps no other state between runs.
 */
export interface WorkflowDeps {
  gateway: LanguageModelGateway;
  knowledgeStore: KnowledgeStoreClient;
  webSearch: WebSearchClient;
}

export interface RunOptions {
  requestId?: string;
}

export interface Workflow {
  /**
   * Validates its input synchronously (throwing WorkflowConfigError) and
   * then resolves with an answer, possibly a best-effort one.
   */
  run(question: string, config?: WorkflowConfigInput, options?: RunOptions): Promise<WorkflowResult>;
}

interface StepResult {
  state: WorkflowState;
  trace: TraceRecord[];
  outcome: StageOutcome;
}

async function executeStage(
  stage: WorkflowStage,
  state: WorkflowState,
  trace: TraceRecord[],
  deps: StageDeps
): Promise<StepResult> {
  const startedAt = new Date();
  const result = await stage.run(state, deps);
  const record: TraceRecord = {
    step: trace.length + 1,
    stage: stage.name,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
    outcome: result.outcome,
    summary: result.summary,
  };

  logDebug("workflow_stage_complete", {
    requestId: deps.logContext.requestId,
    stage: stage.name,
    step: record.step,
    outcome: record.outcome,
    durationMs: record.durationMs,
    ...record.summary,
  });

  return { state: result.state, trace: [...trace, record], outcome: result.outcome };
}

function resolveTransition(
  state: WorkflowState,
  stageName: StageName,
  outcome: StageOutcome,
  deps: StageDeps,
  pipeline: Pipeline
): Transition {
  const rule = TRANSITIONS[stageName][outcome];
  if (!rule) {
    logError("workflow_missing_transition", {
      requestId: deps.logContext.requestId,
      stage: stageName,
      outcome,
    });
    return { next: "end", fallback: "bestEffort" };
  }
  return rule(state, pipeline);
}

async function executeWorkflow(
  question: string,
  config: WorkflowConfig,
  deps: WorkflowDeps,
  logContext: PipelineLogContext
): Promise<WorkflowResult> {
  const startTime = Date.now();
  const pipeline = buildPipeline(config);
  const budget = stageBudget(config.retryCeilings);
  const stageDeps: StageDeps = { ...deps, logContext };

  logInfo("workflow_started", {
    requestId: logContext.requestId,
    stage: "orchestrator",
    question: sanitizeUserContent(question, 200),
    components: config.components.join(","),
    relevanceGate: config.gates.relevance,
    groundednessGate: config.gates.groundedness,
    usefulnessGate: config.gates.usefulness,
    stageBudget: budget,
  });

  let state = createInitialState(question, config);
  let trace: TraceRecord[] = [];
  let current: NextStage = "route";

  while (current !== "end") {
    const stage = pipeline.stages.get(current);
    if (!stage || trace.length >= budget) {
      logError("workflow_aborted", {
        requestId: logContext.requestId,
        stage: current,
        reason: stage ? "stage_budget_exhausted" : "stage_not_in_pipeline",
        steps: trace.length,
      });
      state = { ...state, bestEffort: true };
      break;
    }

    const step = await executeStage(stage, state, trace, stageDeps);
    trace = step.trace;

    const transition = resolveTransition(step.state, current, step.outcome, stageDeps, pipeline);
    state = transition.apply ? transition.apply(step.state) : step.state;

    if (transition.fallback) {
      logWarn(transition.fallback === "webSearch" ? "workflow_web_fallback" : "workflow_best_effort", {
        requestId: logContext.requestId,
        stage: current,
        queryRefinementCount: state.counters.queryRefinement,
        groundednessRetryCount: state.counters.groundedness,
      });
    }

    current = transition.next;
  }

  const durationMs = Date.now() - startTime;
  const result: WorkflowResult = {
    answer: state.answer ?? ANSWER_UNAVAILABLE,
    citations: state.context?.citations ?? [],
    trace,
    route: state.source,
    status: state.bestEffort || state.answer === null ? "best-effort" : "answered",
    counters: { ...state.counters },
    durationMs,
    config,
  };

  logInfo("workflow_complete", {
    requestId: logContext.requestId,
    stage: "orchestrator",
    route: result.route,
    status: result.status,
    steps: trace.length,
    citations: result.citations.length,
    queryRefinementCount: result.counters.queryRefinement,
    groundednessRetryCount: result.counters.groundedness,
    answerLength: result.answer.length,
    durationMs,
  });

  return result;
}

export function createWorkflow(deps: WorkflowDeps): Workflow {
  return {
    run(question, configInput, options) {
      const validQuestion = validateQuestion(question);
      const config = resolveWorkflowConfig(configInput);
      const logContext: PipelineLogContext = { requestId: options?.requestId ?? randomUUID() };
      return executeWorkflow(validQuestion, config, deps, logContext);
    },
  };
}
