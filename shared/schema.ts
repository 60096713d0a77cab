import { z } from "zod";

export const EVIDENCE_COMPONENT_NAMES = ["entities", "relationships", "episodes", "communities"] as const;

export const ROUTE_NAMES = ["knowledge-store", "web-search", "internal-knowledge"] as const;

export type RouteName = (typeof ROUTE_NAMES)[number];

/**
 * Body of POST /api/workflow/run. Ranges are enforced by the workflow
 * configuration; this schema only checks shapes.
 */
export const workflowRunRequestSchema = z.object({
  question: z.string({ required_error: "Question is required" }),
  nRetrievedDocuments: z.number().int().optional(),
  nWebSearches: z.number().int().optional(),
  components: z.array(z.enum(EVIDENCE_COMPONENT_NAMES)).optional(),
  enableRelevanceGrading: z.boolean().optional(),
  enableGroundednessCheck: z.boolean().optional(),
  enableUsefulnessCheck: z.boolean().optional(),
  maxQueryRefinements: z.number().int().optional(),
  maxRegenerations: z.number().int().optional(),
});

export type WorkflowRunRequest = z.infer<typeof workflowRunRequestSchema>;

export interface SourceCitation {
  sourceId: string;
  title?: string;
  url?: string;
}

export interface WorkflowStep {
  name: string;
  /** Wall clock time the step started, HH:MM:SS. */
  timestamp: string;
  /** Seconds, three decimals. */
  processingTime: number;
  details: Record<string, string | number | boolean>;
}

export interface WorkflowRunMetadata {
  route: RouteName | null;
  totalProcessingTime: number;
  stepCount: number;
  queryRefinementCount: number;
  groundednessRetryCount: number;
  gates: {
    relevance: boolean;
    groundedness: boolean;
    usefulness: boolean;
  };
}

export interface WorkflowRunResponse {
  success: true;
  answer: string;
  question: string;
  route: RouteName | null;
  status: "answered" | "best-effort";
  workflowSteps: WorkflowStep[];
  citations: SourceCitation[];
  metadata: WorkflowRunMetadata;
}

export interface RequestIssue {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  issues?: RequestIssue[];
}

export interface HealthResponse {
  status: "ok";
  version: string;
}
