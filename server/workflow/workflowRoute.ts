import { randomUUID } from "crypto";
import type { Express, Request, Response } from "express";
import {
  workflowRunRequestSchema,
  type ErrorResponse,
  type HealthResponse,
  type RequestIssue,
  type WorkflowRunRequest,
  type WorkflowRunResponse,
  type WorkflowStep,
} from "@shared/schema";
import { logError, logInfo, logWarn, errorMessage, sanitizeUserContent } from "../utils/logger";
import { WorkflowConfigError } from "./errors";
import type { Workflow } from "./orchestrator";
import type { StageName, TraceRecord, WorkflowResult } from "./types";
import type { WorkflowConfigInput } from "./workflowConfig";

export interface HandlerResult {
  status: number;
  body: WorkflowRunResponse | ErrorResponse;
}

const STEP_NAMES: Record<StageName, string> = {
  route: "Route Question",
  knowledgeRetrieval: "Retrieve Knowledge",
  webSearch: "Web Search",
  relevanceFilter: "Grade Documents",
  queryRefinement: "Transform Query",
  answerGeneration: "Generate Answer",
  groundednessCheck: "Check Groundedness",
  usefulnessCheck: "Check Usefulness",
};

/** Workflow config paths reported back under the request field that set them. */
const REQUEST_FIELDS: Record<string, string> = {
  knowledgeStoreLimit: "nRetrievedDocuments",
  webSearchLimit: "nWebSearches",
  "gates.relevance": "enableRelevanceGrading",
  "gates.groundedness": "enableGroundednessCheck",
  "gates.usefulness": "enableUsefulnessCheck",
  "retryCeilings.queryRefinement": "maxQueryRefinements",
  "retryCeilings.groundedness": "maxRegenerations",
};

export function toWorkflowConfigInput(request: WorkflowRunRequest): WorkflowConfigInput {
  return {
    knowledgeStoreLimit: request.nRetrievedDocuments,
    webSearchLimit: request.nWebSearches,
    components: request.components,
    gates: {
      relevance: request.enableRelevanceGrading,
      groundedness: request.enableGroundednessCheck,
      usefulness: request.enableUsefulnessCheck,
    },
    retryCeilings: {
      queryRefinement: request.maxQueryRefinements,
      groundedness: request.maxRegenerations,
    },
  };
}

function toRequestIssue(path: string, message: string): RequestIssue {
  return { path: REQUEST_FIELDS[path] ?? path, message };
}

function toSeconds(ms: number): number {
  return Number((ms / 1000).toFixed(3));
}

export function toWorkflowStep(record: TraceRecord): WorkflowStep {
  return {
    name: STEP_NAMES[record.stage],
    timestamp: record.startedAt.slice(11, 19),
    processingTime: toSeconds(record.durationMs),
    details: { outcome: record.outcome, ...record.summary },
  };
}

export function toWorkflowRunResponse(question: string, result: WorkflowResult): WorkflowRunResponse {
  return {
    success: true,
    answer: result.answer,
    question,
    route: result.route,
    status: result.status,
    workflowSteps: result.trace.map(toWorkflowStep),
    citations: result.citations,
    metadata: {
      route: result.route,
      totalProcessingTime: toSeconds(result.durationMs),
      stepCount: result.trace.length,
      queryRefinementCount: result.counters.queryRefinement,
      groundednessRetryCount: result.counters.groundedness,
      gates: { ...result.config.gates },
    },
  };
}

/**
 * Validate a request body, run the workflow and shape the reply. Kept free of
 * express so it can be exercised directly.
 */
export async function handleWorkflowRun(
  body: unknown,
  workflow: Workflow,
  requestId: string = randomUUID()
): Promise<HandlerResult> {
  const parsed = workflowRunRequestSchema.safeParse(body);
  if (!parsed.success) {
    logWarn("workflow_invalid_request", {
      requestId,
      stage: "validation",
      issues: parsed.error.issues.length,
    });
    return {
      status: 400,
      body: {
        success: false,
        message: "Invalid request",
        issues: parsed.error.issues.map((issue) =>
          toRequestIssue(issue.path.length > 0 ? issue.path.join(".") : "body", issue.message)
        ),
      },
    };
  }

  const request = parsed.data;
  const config = toWorkflowConfigInput(request);

  logInfo("workflow_request_received", {
    requestId,
    stage: "entry",
    userQuestion: sanitizeUserContent(request.question, 200),
  });

  try {
    const result = await workflow.run(request.question, config, { requestId });
    return { status: 200, body: toWorkflowRunResponse(request.question.trim(), result) };
  } catch (error) {
    if (error instanceof WorkflowConfigError) {
      logWarn("workflow_invalid_request", {
        requestId,
        stage: "validation",
        issues: error.issues.length,
      });
      return {
        status: 400,
        body: {
          success: false,
          message: "Invalid request",
          issues: error.issues.map((issue) => toRequestIssue(issue.path, issue.message)),
        },
      };
    }

    logError("workflow_request_failed", {
      requestId,
      stage: "entry",
      error: errorMessage(error),
    });
    return {
      status: 500,
      body: { success: false, message: "An error occurred while processing your question" },
    };
  }
}

export function registerWorkflowRoutes(app: Express, workflow: Workflow, version: string): void {
  app.post("/api/workflow/run", async (req: Request, res: Response) => {
    const { status, body } = await handleWorkflowRun(req.body, workflow);
    res.status(status).json(body);
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    const body: HealthResponse = { status: "ok", version };
    res.json(body);
  });
}
