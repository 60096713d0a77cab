/**
 * Answer Workflow Tests
 *
 * End-to-end runs of the state machine against scripted gateway responses
 * and in-memory retrieval clients. These tests verify that:
 * 1. Routing selects the evidence path and nothing else is called
 * 2. Retry loops respect their ceilings and fall back as configured
 * 3. Every route and configuration terminates within the stage budget
 */

import { describe, it, expect } from "vitest";
import { ANSWER_UNAVAILABLE } from "../answerGenerator";
import { WorkflowConfigError } from "../errors";
import { createWorkflow } from "../orchestrator";
import { stageBudget } from "../transitions";
import type { RetryCeilings, StageName, WorkflowResult } from "../types";
import {
  ScriptedGateway,
  createKnowledgeStore,
  createWebSearch,
  item,
  no,
  sequence,
  webItem,
  yes,
  type GatewayScript,
} from "./fakes";

const inDomain = () => ({ inDomain: true, requiresRecency: false });
const recent = () => ({ inDomain: true, requiresRecency: true });
const outOfDomain = () => ({ inDomain: false, requiresRecency: false });

const storeData = {
  entities: [item("entity-canker", "Phytophthora canker attacks the trunk.", "Canker")],
  relationships: [item("rel-canker-bark", "Canker causes bark lesions.")],
};

const webResults = [webItem("https://example.org/outbreak", "An outbreak was reported this season.", "Outbreak")];

function setup(script: GatewayScript) {
  const gateway = new ScriptedGateway({
    "answer-generate": () => ({ answer: "generated answer" }),
    "query-rewrite": ({ question }) => ({ refinedQuestion: `${question} (refined)` }),
    ...script,
  });
  const knowledge = createKnowledgeStore(storeData);
  const web = createWebSearch(webResults);
  const workflow = createWorkflow({ gateway, knowledgeStore: knowledge.store, webSearch: web.client });
  return { gateway, knowledge, web, workflow };
}

function stagesOf(result: WorkflowResult): StageName[] {
  return result.trace.map((record) => record.stage);
}

function countStage(result: WorkflowResult, stage: StageName): number {
  return stagesOf(result).filter((name) => name === stage).length;
}

describe("Answer Workflow", () => {
  describe("routing", () => {
    it("should answer out of domain questions without retrieval", async () => {
      const { workflow, knowledge, web, gateway } = setup({
        route: outOfDomain,
        "usefulness-grade": yes,
      });

      const result = await workflow.run("What is the capital of France?");

      expect(knowledge.retrieve).not.toHaveBeenCalled();
      expect(web.search).not.toHaveBeenCalled();
      expect(countStage(result, "answerGeneration")).toBe(1);
      expect(stagesOf(result)).toEqual(["route", "answerGeneration", "groundednessCheck", "usefulnessCheck"]);
      expect(gateway.callsFor("answer-generate")).toEqual([
        { task: "answer-generate", input: { question: "What is the capital of France?", context: null } },
      ]);
      expect(gateway.callsFor("groundedness-grade")).toEqual([]);
      expect(result.route).toBe("internal-knowledge");
      expect(result.status).toBe("answered");
      expect(result.citations).toEqual([]);
    });

    it("should search the web with the original question for recent information", async () => {
      const { workflow, knowledge, web } = setup({
        route: recent,
        "groundedness-grade": yes,
        "usefulness-grade": yes,
      });

      const result = await workflow.run("Latest pest outbreak news 2025");

      expect(web.search).toHaveBeenCalledTimes(1);
      expect(web.search).toHaveBeenCalledWith("Latest pest outbreak news 2025", 3, {
        requestId: expect.any(String),
      });
      expect(knowledge.retrieve).not.toHaveBeenCalled();
      expect(stagesOf(result)).toEqual([
        "route",
        "webSearch",
        "answerGeneration",
        "groundednessCheck",
        "usefulnessCheck",
      ]);
      expect(result.route).toBe("web-search");
      expect(result.citations).toEqual([
        { sourceId: "https://example.org/outbreak", title: "Outbreak", url: "https://example.org/outbreak" },
      ]);
    });

    it("should answer directly when routing fails", async () => {
      const { workflow, knowledge } = setup({ "usefulness-grade": yes });

      const result = await workflow.run("How is canker treated?");

      expect(knowledge.retrieve).not.toHaveBeenCalled();
      expect(result.trace[0]).toMatchObject({ stage: "route", outcome: "routerFailed" });
      expect(result.route).toBe("internal-knowledge");
      expect(result.answer).toBe("generated answer");
    });
  });

  describe("knowledge store path", () => {
    it("should answer from relevant evidence with citations", async () => {
      const { workflow, knowledge, gateway } = setup({
        route: inDomain,
        "relevance-grade": yes,
        "groundedness-grade": yes,
        "usefulness-grade": yes,
      });

      const result = await workflow.run("Canker disease symptoms");

      expect(knowledge.retrieve).toHaveBeenCalledTimes(2);
      expect(stagesOf(result)).toEqual([
        "route",
        "knowledgeRetrieval",
        "relevanceFilter",
        "answerGeneration",
        "groundednessCheck",
        "usefulnessCheck",
      ]);
      expect(result.trace.map((record) => record.step)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(result.citations).toEqual([
        { sourceId: "entity-canker", title: "Canker" },
        { sourceId: "rel-canker-bark" },
      ]);
      expect(result.status).toBe("answered");
      expect(result.counters).toEqual({ queryRefinement: 0, groundedness: 0 });

      const [generation] = gateway.callsFor("answer-generate");
      expect(generation.input).toMatchObject({ question: "Canker disease symptoms" });
    });

    it("should refine three times then fall back to web search once", async () => {
      const { workflow, gateway, web, knowledge } = setup({
        route: inDomain,
        "relevance-grade": no,
        "groundedness-grade": yes,
        "usefulness-grade": yes,
      });

      const result = await workflow.run("X disease symptoms");

      expect(gateway.callsFor("query-rewrite")).toHaveLength(3);
      expect(web.search).toHaveBeenCalledTimes(1);
      expect(web.search).toHaveBeenCalledWith("X disease symptoms (refined) (refined) (refined)", 3, {
        requestId: expect.any(String),
      });
      expect(stagesOf(result).slice(-5)).toEqual([
        "relevanceFilter",
        "webSearch",
        "answerGeneration",
        "groundednessCheck",
        "usefulnessCheck",
      ]);
      expect(countStage(result, "answerGeneration")).toBe(1);
      expect(knowledge.retrieve).toHaveBeenCalledTimes(8);
      expect(stagesOf(result).lastIndexOf("knowledgeRetrieval")).toBeLessThan(
        stagesOf(result).indexOf("webSearch")
      );
      expect(result.route).toBe("web-search");
      expect(result.counters.queryRefinement).toBe(3);
      expect(result.citations.map((c) => c.sourceId)).toEqual(["https://example.org/outbreak"]);
    });

    it("should keep the original question for context generation after refinement", async () => {
      const { workflow, gateway } = setup({
        route: inDomain,
        "relevance-grade": sequence(no(), no(), yes()),
        "groundedness-grade": yes,
        "usefulness-grade": yes,
      });

      const result = await workflow.run("canker?");

      expect(result.counters.queryRefinement).toBe(1);
      expect(gateway.callsFor("answer-generate")[0].input).toMatchObject({ question: "canker?" });
    });
  });

  describe("quality gates", () => {
    it("should regenerate once when the first answer is not grounded", async () => {
      const { workflow } = setup({
        route: inDomain,
        "relevance-grade": yes,
        "groundedness-grade": sequence(no(), yes()),
        "usefulness-grade": yes,
        "answer-generate": sequence({ answer: "first draft" }, { answer: "second draft" }),
      });

      const result = await workflow.run("Canker disease symptoms");

      expect(countStage(result, "answerGeneration")).toBe(2);
      expect(result.answer).toBe("second draft");
      expect(result.counters.groundedness).toBe(1);
      expect(result.status).toBe("answered");
    });

    it("should return the last answer as best effort when usefulness keeps failing", async () => {
      const { workflow, gateway, knowledge } = setup({
        route: inDomain,
        "relevance-grade": yes,
        "usefulness-grade": no,
        "answer-generate": sequence({ answer: "first draft" }, { answer: "second draft" }),
      });

      const result = await workflow.run("Canker disease symptoms", {
        gates: { groundedness: false },
        retryCeilings: { queryRefinement: 1 },
      });

      expect(gateway.callsFor("query-rewrite")).toHaveLength(1);
      expect(countStage(result, "knowledgeRetrieval")).toBe(2);
      expect(knowledge.retrieve).toHaveBeenCalledTimes(4);
      expect(result.status).toBe("best-effort");
      expect(result.answer).toBe("second draft");
      expect(result.trace[result.trace.length - 1]).toMatchObject({
        stage: "usefulnessCheck",
        outcome: "notUseful",
      });
    });

    it("should stop after the groundedness ceiling with the last answer", async () => {
      const { workflow } = setup({
        route: inDomain,
        "relevance-grade": yes,
        "groundedness-grade": no,
        "usefulness-grade": yes,
        "answer-generate": sequence({ answer: "a" }, { answer: "b" }, { answer: "c" }),
      });

      const result = await workflow.run("Canker disease symptoms", { retryCeilings: { groundedness: 2 } });

      expect(countStage(result, "answerGeneration")).toBe(3);
      expect(countStage(result, "usefulnessCheck")).toBe(0);
      expect(result.answer).toBe("c");
      expect(result.status).toBe("best-effort");
    });

    it("should skip disabled gates entirely", async () => {
      const { workflow, gateway } = setup({ route: inDomain });

      const result = await workflow.run("Canker disease symptoms", {
        gates: { relevance: false, groundedness: false, usefulness: false },
      });

      expect(stagesOf(result)).toEqual(["route", "knowledgeRetrieval", "answerGeneration"]);
      expect(gateway.callsFor("relevance-grade")).toEqual([]);
      expect(result.status).toBe("answered");
    });

    it("should treat a failing grader as a pass", async () => {
      const { workflow } = setup({ route: inDomain });

      const result = await workflow.run("Canker disease symptoms");

      expect(stagesOf(result)).toEqual([
        "route",
        "knowledgeRetrieval",
        "relevanceFilter",
        "answerGeneration",
        "groundednessCheck",
        "usefulnessCheck",
      ]);
      expect(result.status).toBe("answered");
    });
  });

  describe("refinement after a not useful answer", () => {
    it("should search the web again with each refined question on the web route", async () => {
      const { workflow, gateway, web, knowledge } = setup({
        route: recent,
        "usefulness-grade": no,
      });

      const result = await workflow.run("Durian borer outbreak this month", {
        gates: { groundedness: false },
        retryCeilings: { queryRefinement: 2 },
      });

      expect(web.search.mock.calls.map(([query]) => query)).toEqual([
        "Durian borer outbreak this month",
        "Durian borer outbreak this month (refined)",
        "Durian borer outbreak this month (refined) (refined)",
      ]);
      expect(knowledge.retrieve).not.toHaveBeenCalled();
      expect(stagesOf(result)).toEqual([
        "route",
        "webSearch",
        "answerGeneration",
        "usefulnessCheck",
        "queryRefinement",
        "webSearch",
        "answerGeneration",
        "usefulnessCheck",
        "queryRefinement",
        "webSearch",
        "answerGeneration",
        "usefulnessCheck",
      ]);
      expect(gateway.callsFor("answer-generate")).toMatchObject([
        { input: { question: "Durian borer outbreak this month" } },
        { input: { question: "Durian borer outbreak this month" } },
        { input: { question: "Durian borer outbreak this month" } },
      ]);
      expect(result.route).toBe("web-search");
      expect(result.counters.queryRefinement).toBe(2);
      expect(result.status).toBe("best-effort");
    });

    it("should regenerate from the original question on the internal knowledge route", async () => {
      const { workflow, gateway, web, knowledge } = setup({
        route: outOfDomain,
        "usefulness-grade": no,
      });

      const result = await workflow.run("How do I make mango sticky rice?", {
        gates: { groundedness: false },
        retryCeilings: { queryRefinement: 2 },
      });

      expect(knowledge.retrieve).not.toHaveBeenCalled();
      expect(web.search).not.toHaveBeenCalled();
      expect(stagesOf(result)).toEqual([
        "route",
        "answerGeneration",
        "usefulnessCheck",
        "queryRefinement",
        "answerGeneration",
        "usefulnessCheck",
        "queryRefinement",
        "answerGeneration",
        "usefulnessCheck",
      ]);
      expect(gateway.callsFor("query-rewrite")).toMatchObject([
        { input: { question: "How do I make mango sticky rice?" } },
        { input: { question: "How do I make mango sticky rice? (refined)" } },
      ]);
      const original = { task: "answer-generate", input: { question: "How do I make mango sticky rice?", context: null } };
      expect(gateway.callsFor("answer-generate")).toEqual([original, original, original]);
      expect(result.route).toBe("internal-knowledge");
      expect(result.citations).toEqual([]);
      expect(result.status).toBe("best-effort");
    });
  });

  describe("failures", () => {
    it("should return the apology answer when generation fails", async () => {
      const gateway = new ScriptedGateway({ route: outOfDomain });
      const workflow = createWorkflow({
        gateway,
        knowledgeStore: createKnowledgeStore({}).store,
        webSearch: createWebSearch([]).client,
      });

      const result = await workflow.run("Tell me a joke", {
        gates: { groundedness: false, usefulness: false },
      });

      expect(result.answer).toBe(ANSWER_UNAVAILABLE);
    });

    it("should generate without context when every retrieval fails", async () => {
      const gateway = new ScriptedGateway({
        route: inDomain,
        "answer-generate": () => ({ answer: "from model knowledge" }),
        "query-rewrite": ({ question }) => ({ refinedQuestion: `${question}!` }),
        "usefulness-grade": yes,
      });
      const workflow = createWorkflow({
        gateway,
        knowledgeStore: createKnowledgeStore(storeData, ["entities", "relationships"]).store,
        webSearch: createWebSearch([], true).client,
      });

      const result = await workflow.run("canker", { retryCeilings: { queryRefinement: 1 } });

      expect(gateway.callsFor("answer-generate")).toEqual([
        { task: "answer-generate", input: { question: "canker!", context: null } },
      ]);
      expect(result.answer).toBe("from model knowledge");
      expect(result.citations).toEqual([]);
    });

    it("should reject invalid input before any stage runs", () => {
      const { workflow, gateway } = setup({});

      expect(() => workflow.run("   ")).toThrow(WorkflowConfigError);
      expect(() => workflow.run("canker", { components: ["entities", "entities"] })).toThrow(WorkflowConfigError);
      expect(gateway.calls).toEqual([]);
    });
  });

  describe("isolation", () => {
    it("should keep concurrent runs independent", async () => {
      const { workflow } = setup({
        route: ({ question }) => (question.includes("news") ? recent() : outOfDomain()),
        "groundedness-grade": yes,
        "usefulness-grade": yes,
      });

      const [news, other] = await Promise.all([
        workflow.run("durian news", {}, { requestId: "req-a" }),
        workflow.run("capital of France", {}, { requestId: "req-b" }),
      ]);

      expect(news.route).toBe("web-search");
      expect(news.citations).toHaveLength(1);
      expect(other.route).toBe("internal-knowledge");
      expect(other.citations).toEqual([]);
      expect(other.trace).toHaveLength(4);
    });
  });

  describe("termination", () => {
    const routes = [
      { name: "knowledge-store", decision: inDomain },
      { name: "web-search", decision: recent },
      { name: "internal-knowledge", decision: outOfDomain },
    ] as const;
    const gateCombinations = [false, true].flatMap((relevance) =>
      [false, true].flatMap((groundedness) =>
        [false, true].map((usefulness) => ({ relevance, groundedness, usefulness }))
      )
    );
    const ceilings = [0, 1, 2, 3];
    const cases = routes.flatMap((route) =>
      gateCombinations.flatMap((gates) =>
        ceilings.flatMap((queryRefinement) =>
          ceilings.map((groundedness) => ({
            route: route.name,
            decision: route.decision,
            gates,
            retryCeilings: { queryRefinement, groundedness },
          }))
        )
      )
    );

    type Gates = (typeof gateCombinations)[number];

    // knowledge store answers are graded for relevance and groundedness; web
    // answers skip relevance; context-free answers skip both
    function expectedCounters(route: string, gates: Gates, ceiling: RetryCeilings): RetryCeilings {
      const refinesOnUsefulness = gates.usefulness && (route === "internal-knowledge" || !gates.groundedness);
      const refinesOnRelevance = route === "knowledge-store" && gates.relevance;
      const regenerates = route !== "internal-knowledge" && gates.groundedness;
      return {
        queryRefinement: refinesOnRelevance || refinesOnUsefulness ? ceiling.queryRefinement : 0,
        groundedness: regenerates ? ceiling.groundedness : 0,
      };
    }

    function expectedStatus(route: string, gates: Gates) {
      const checksFail = gates.usefulness || (route !== "internal-knowledge" && gates.groundedness);
      return checksFail ? "best-effort" : "answered";
    }

    it.each(cases)(
      "should terminate within budget on the $route route with gates $gates and ceilings $retryCeilings",
      async ({ route, decision, gates, retryCeilings }) => {
        const { workflow } = setup({
          route: decision,
          "relevance-grade": no,
          "groundedness-grade": no,
          "usefulness-grade": no,
        });

        const result = await workflow.run("Canker disease symptoms", { gates, retryCeilings });

        expect(result.trace.length).toBeLessThanOrEqual(stageBudget(retryCeilings));
        expect(result.counters).toEqual(expectedCounters(route, gates, retryCeilings));
        expect(result.status).toBe(expectedStatus(route, gates));
        expect(result.answer).toBe("generated answer");
      }
    );
  });
});
