export type Route = "knowledge-store" | "web-search" | "internal-knowledge";

/**
 * Sub-kinds of knowledge store content.
 */
export type EvidenceComponent = "entities" | "relationships" | "episodes" | "communities";

export const EVIDENCE_COMPONENTS: readonly EvidenceComponent[] = [
  "entities",
  "relationships",
  "episodes",
  "communities",
];

export type EvidenceSection = EvidenceComponent | "web";

export const EVIDENCE_SECTIONS: readonly EvidenceSection[] = [...EVIDENCE_COMPONENTS, "web"];

export interface Citation {
  sourceId: string;
  title?: string;
  url?: string;
}

/**
 * A retrieved piece of content and where it came from. Content and citation
 * travel together so filtering never separates them.
 */
export interface EvidenceItem {
  content: string;
  citation: Citation;
}

export type EvidenceSet = Readonly<Record<EvidenceSection, readonly EvidenceItem[]>>;

export type GateName = "relevance" | "groundedness" | "usefulness";

export interface RetryCeilings {
  queryRefinement: number;
  groundedness: number;
}

export interface WorkflowConfig {
  knowledgeStoreLimit: number;
  webSearchLimit: number;
  components: EvidenceComponent[];
  gates: Record<GateName, boolean>;
  retryCeilings: RetryCeilings;
}

export interface RetryCounters {
  queryRefinement: number;
  groundedness: number;
}

export interface AssembledContext {
  text: string;
  citations: Citation[];
}

export interface WorkflowState {
  readonly originalQuestion: string;
  readonly currentQuestion: string;
  /** Route chosen by the router; null until routing ran. */
  readonly route: Route | null;
  /** Evidence source currently feeding the answer; changes on the web fallback. */
  readonly source: Route | null;
  readonly evidence: EvidenceSet;
  readonly answer: string | null;
  readonly context: AssembledContext | null;
  readonly counters: Readonly<RetryCounters>;
  readonly webFallbackUsed: boolean;
  /** Set when a gate gave up on its loop and the current answer is kept. */
  readonly bestEffort: boolean;
  readonly config: Readonly<WorkflowConfig>;
}

export type StageName =
  | "route"
  | "knowledgeRetrieval"
  | "webSearch"
  | "relevanceFilter"
  | "queryRefinement"
  | "answerGeneration"
  | "groundednessCheck"
  | "usefulnessCheck";

export type StageOutcome =
  | "knowledgeStore"
  | "webSearch"
  | "internalKnowledge"
  | "routerFailed"
  | "retrieved"
  | "relevant"
  | "noneRelevant"
  | "refined"
  | "generated"
  | "grounded"
  | "notGrounded"
  | "useful"
  | "notUseful";

export type TraceSummary = Record<string, string | number | boolean>;

export interface TraceRecord {
  step: number;
  stage: StageName;
  startedAt: string;
  durationMs: number;
  outcome: StageOutcome;
  summary: TraceSummary;
}

export type WorkflowStatus = "answered" | "best-effort";

export interface WorkflowResult {
  answer: string;
  citations: Citation[];
  trace: TraceRecord[];
  /** Route the final evidence came from; web-search after the fallback. */
  route: Route | null;
  status: WorkflowStatus;
  counters: RetryCounters;
  durationMs: number;
  /** Configuration the run resolved to, defaults applied. */
  config: WorkflowConfig;
}

/**
 * Logging context passed through the workflow for request correlation
 */
export interface PipelineLogContext {
  requestId: string;
}
