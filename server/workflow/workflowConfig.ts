/**
 * Workflow configuration: defaults and validation.
 * Centralized settings for which evidence components, gates and retry
 * ceilings a request runs with.
 */

import { z } from "zod";
import { WorkflowConfigError, type ConfigIssue } from "./errors";
import { EVIDENCE_COMPONENTS, type EvidenceComponent, type WorkflowConfig } from "./types";

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  /**
   * Results per evidence component from the knowledge store.
   */
  knowledgeStoreLimit: 3,

  webSearchLimit: 3,

  /**
   * Entities and relationships carry most of the signal; passages and topic
   * summaries are slower and noisier.
   */
  components: ["entities", "relationships"],

  /**
   * Optional quality gates. Disabling them trades answer quality for speed.
   */
  gates: {
    relevance: true,
    groundedness: true,
    usefulness: true,
  },

  /**
   * Maximum iterations per retry loop before the fallback path is taken.
   * queryRefinement is shared by the relevance and usefulness loops.
   */
  retryCeilings: {
    queryRefinement: 3,
    groundedness: 3,
  },
};

export const MAX_QUESTION_LENGTH = 2000;

const MAX_RESULT_LIMIT = 10;
const MAX_RETRY_CEILING = 10;

const componentSchema = z.enum(["entities", "relationships", "episodes", "communities"]);

const limitSchema = z.number().int().min(1).max(MAX_RESULT_LIMIT);
const ceilingSchema = z.number().int().min(0).max(MAX_RETRY_CEILING);

const workflowConfigSchema = z
  .object({
    knowledgeStoreLimit: limitSchema.default(DEFAULT_WORKFLOW_CONFIG.knowledgeStoreLimit),
    webSearchLimit: limitSchema.default(DEFAULT_WORKFLOW_CONFIG.webSearchLimit),
    components: z
      .array(componentSchema)
      .min(1, "At least one evidence component must be enabled")
      .default(DEFAULT_WORKFLOW_CONFIG.components),
    gates: z
      .object({
        relevance: z.boolean().default(DEFAULT_WORKFLOW_CONFIG.gates.relevance),
        groundedness: z.boolean().default(DEFAULT_WORKFLOW_CONFIG.gates.groundedness),
        usefulness: z.boolean().default(DEFAULT_WORKFLOW_CONFIG.gates.usefulness),
      })
      .strict()
      .default({}),
    retryCeilings: z
      .object({
        queryRefinement: ceilingSchema.default(DEFAULT_WORKFLOW_CONFIG.retryCeilings.queryRefinement),
        groundedness: ceilingSchema.default(DEFAULT_WORKFLOW_CONFIG.retryCeilings.groundedness),
      })
      .strict()
      .default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<EvidenceComponent>();
    config.components.forEach((component, index) => {
      if (seen.has(component)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["components", index],
          message: `${component} is listed more than once`,
        });
      }
      seen.add(component);
    });
  });

export type WorkflowConfigInput = z.input<typeof workflowConfigSchema>;

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "config",
    message: issue.message,
  }));
}

/**
 * Merge a partial configuration with the defaults.
 *
 * @throws WorkflowConfigError when a field is out of range, unknown or conflicting
 */
export function resolveWorkflowConfig(input: WorkflowConfigInput = {}): WorkflowConfig {
  const parsed = workflowConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new WorkflowConfigError(toIssues(parsed.error));
  }

  const config = parsed.data;
  return {
    ...config,
    // stable order regardless of how the caller listed them
    components: EVIDENCE_COMPONENTS.filter((c) => config.components.includes(c)),
  };
}

export function validateQuestion(question: string): string {
  const trimmed = question.trim();
  if (trimmed === "") {
    throw new WorkflowConfigError([{ path: "question", message: "Question is required" }]);
  }
  // counted in code points, not UTF-16 units
  if ([...trimmed].length > MAX_QUESTION_LENGTH) {
    throw new WorkflowConfigError([
      { path: "question", message: `Question must be at most ${MAX_QUESTION_LENGTH} characters` },
    ]);
  }
  return trimmed;
}
