import { describe, it, expect } from "vitest";
import { createWorkflow, type Workflow } from "../orchestrator";
import { resolveWorkflowConfig } from "../workflowConfig";
import { handleWorkflowRun, toWorkflowConfigInput, toWorkflowStep } from "../workflowRoute";
import { ScriptedGateway, createKnowledgeStore, createWebSearch, item, yes } from "./fakes";

function createTestWorkflow(): Workflow {
  const gateway = new ScriptedGateway({
    route: () => ({ inDomain: true, requiresRecency: false }),
    "relevance-grade": yes,
    "groundedness-grade": yes,
    "usefulness-grade": yes,
    "answer-generate": () => ({ answer: "Prune infected bark and apply fungicide." }),
  });
  return createWorkflow({
    gateway,
    knowledgeStore: createKnowledgeStore({
      entities: [item("entity-canker", "Canker is treated by pruning.", "Canker")],
    }).store,
    webSearch: createWebSearch([]).client,
  });
}

describe("Workflow Route", () => {
  describe("toWorkflowConfigInput", () => {
    it("should map request fields onto the workflow configuration", () => {
      expect(
        toWorkflowConfigInput({
          question: "q",
          nRetrievedDocuments: 5,
          nWebSearches: 2,
          components: ["episodes"],
          enableRelevanceGrading: false,
          maxQueryRefinements: 1,
          maxRegenerations: 0,
        })
      ).toEqual({
        knowledgeStoreLimit: 5,
        webSearchLimit: 2,
        components: ["episodes"],
        gates: { relevance: false, groundedness: undefined, usefulness: undefined },
        retryCeilings: { queryRefinement: 1, groundedness: 0 },
      });
    });
  });

  describe("toWorkflowStep", () => {
    it("should format the trace record for display", () => {
      const step = toWorkflowStep({
        step: 2,
        stage: "knowledgeRetrieval",
        startedAt: "2025-03-04T09:15:42.123Z",
        durationMs: 1234,
        outcome: "retrieved",
        summary: { entities: 3, failedComponents: 0 },
      });

      expect(step).toEqual({
        name: "Retrieve Knowledge",
        timestamp: "09:15:42",
        processingTime: 1.234,
        details: { outcome: "retrieved", entities: 3, failedComponents: 0 },
      });
    });
  });

  describe("handleWorkflowRun", () => {
    it("should answer a valid request", async () => {
      const result = await handleWorkflowRun(
        { question: "  How is canker treated?  ", components: ["entities"] },
        createTestWorkflow(),
        "req-1"
      );

      expect(result.status).toBe(200);
      expect(result.body).toMatchObject({
        success: true,
        answer: "Prune infected bark and apply fungicide.",
        question: "How is canker treated?",
        route: "knowledge-store",
        status: "answered",
        citations: [{ sourceId: "entity-canker", title: "Canker" }],
        metadata: {
          route: "knowledge-store",
          stepCount: 6,
          queryRefinementCount: 0,
          groundednessRetryCount: 0,
          gates: { relevance: true, groundedness: true, usefulness: true },
        },
      });
      if (result.body.success) {
        expect(result.body.workflowSteps.map((step) => step.name)).toEqual([
          "Route Question",
          "Retrieve Knowledge",
          "Grade Documents",
          "Generate Answer",
          "Check Groundedness",
          "Check Usefulness",
        ]);
      }
    });

    it("should report the gates the workflow resolved", async () => {
      const resolved: Workflow = {
        run: async () => ({
          answer: "Keep the orchard floor dry.",
          citations: [],
          trace: [],
          route: "internal-knowledge",
          status: "answered",
          counters: { queryRefinement: 0, groundedness: 0 },
          durationMs: 12,
          config: resolveWorkflowConfig({
            gates: { relevance: false, groundedness: false, usefulness: false },
          }),
        }),
      };

      const result = await handleWorkflowRun({ question: "canker" }, resolved, "req-6");

      expect(result.status).toBe(200);
      if (result.body.success) {
        expect(result.body.metadata.gates).toEqual({
          relevance: false,
          groundedness: false,
          usefulness: false,
        });
      }
    });

    it("should reject a body without a question", async () => {
      const result = await handleWorkflowRun({ nRetrievedDocuments: 3 }, createTestWorkflow(), "req-2");

      expect(result).toEqual({
        status: 400,
        body: {
          success: false,
          message: "Invalid request",
          issues: [{ path: "question", message: "Question is required" }],
        },
      });
    });

    it("should report out of range settings under their request names", async () => {
      const result = await handleWorkflowRun(
        { question: "canker", nRetrievedDocuments: 0, maxRegenerations: 11 },
        createTestWorkflow(),
        "req-3"
      );

      expect(result.status).toBe(400);
      if (!result.body.success) {
        expect(result.body.issues?.map((issue) => issue.path)).toEqual([
          "nRetrievedDocuments",
          "maxRegenerations",
        ]);
      }
    });

    it("should reject a blank question", async () => {
      const result = await handleWorkflowRun({ question: "   " }, createTestWorkflow(), "req-4");

      expect(result.status).toBe(400);
    });

    it("should hide unexpected failures behind a 500", async () => {
      const failing: Workflow = {
        run: async () => {
          throw new Error("connection reset");
        },
      };

      const result = await handleWorkflowRun({ question: "canker" }, failing, "req-5");

      expect(result).toEqual({
        status: 500,
        body: { success: false, message: "An error occurred while processing your question" },
      });
    });
  });
});
