import { describe, it, expect } from "vitest";
import { WorkflowConfigError } from "../errors";
import {
  DEFAULT_WORKFLOW_CONFIG,
  MAX_QUESTION_LENGTH,
  resolveWorkflowConfig,
  validateQuestion,
} from "../workflowConfig";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof WorkflowConfigError) {
      return error.issues.map((issue) => issue.path);
    }
    throw error;
  }
  return [];
}

describe("Workflow Config", () => {
  describe("resolveWorkflowConfig", () => {
    it("should return the defaults when nothing is given", () => {
      expect(resolveWorkflowConfig()).toEqual(DEFAULT_WORKFLOW_CONFIG);
      expect(resolveWorkflowConfig({})).toEqual(DEFAULT_WORKFLOW_CONFIG);
    });

    it("should merge partial gates and ceilings with the defaults", () => {
      const config = resolveWorkflowConfig({
        gates: { usefulness: false },
        retryCeilings: { groundedness: 0 },
      });

      expect(config.gates).toEqual({ relevance: true, groundedness: true, usefulness: false });
      expect(config.retryCeilings).toEqual({ queryRefinement: 3, groundedness: 0 });
    });

    it("should put components in canonical order", () => {
      const config = resolveWorkflowConfig({ components: ["communities", "entities", "episodes"] });

      expect(config.components).toEqual(["entities", "episodes", "communities"]);
    });

    it("should reject a component listed twice", () => {
      expect(issuesOf(() => resolveWorkflowConfig({ components: ["entities", "entities"] }))).toEqual([
        "components.1",
      ]);
    });

    it("should reject an empty component list", () => {
      expect(issuesOf(() => resolveWorkflowConfig({ components: [] }))).toEqual(["components"]);
    });

    it("should reject out of range limits and ceilings", () => {
      expect(issuesOf(() => resolveWorkflowConfig({ knowledgeStoreLimit: 0 }))).toEqual(["knowledgeStoreLimit"]);
      expect(issuesOf(() => resolveWorkflowConfig({ webSearchLimit: 11 }))).toEqual(["webSearchLimit"]);
      expect(issuesOf(() => resolveWorkflowConfig({ retryCeilings: { queryRefinement: -1 } }))).toEqual([
        "retryCeilings.queryRefinement",
      ]);
    });

    it("should reject unknown keys", () => {
      const input = { knowledgeStoreLimit: 3, maxTokens: 5 };
      expect(issuesOf(() => resolveWorkflowConfig(input))).toEqual(["config"]);
    });
  });

  describe("validateQuestion", () => {
    it("should trim the question", () => {
      expect(validateQuestion("  What causes leaf blight?  ")).toBe("What causes leaf blight?");
    });

    it("should reject an empty question", () => {
      expect(issuesOf(() => validateQuestion("   "))).toEqual(["question"]);
    });

    it("should reject a question over the length limit", () => {
      expect(() => validateQuestion("a".repeat(MAX_QUESTION_LENGTH + 1))).toThrow(WorkflowConfigError);
      expect(validateQuestion("a".repeat(MAX_QUESTION_LENGTH))).toHaveLength(MAX_QUESTION_LENGTH);
    });

    it("should count the length limit in characters rather than UTF-16 units", () => {
      expect(validateQuestion("🌱".repeat(MAX_QUESTION_LENGTH))).toBe("🌱".repeat(MAX_QUESTION_LENGTH));
      expect(issuesOf(() => validateQuestion("🌱".repeat(MAX_QUESTION_LENGTH + 1)))).toEqual(["question"]);
    });
  });
});
