export { createWorkflow, type Workflow, type WorkflowDeps, type RunOptions } from "./orchestrator";
export { WorkflowConfigError, type ConfigIssue } from "./errors";
export {
  DEFAULT_WORKFLOW_CONFIG,
  MAX_QUESTION_LENGTH,
  resolveWorkflowConfig,
  validateQuestion,
  type WorkflowConfigInput,
} from "./workflowConfig";
export { ANSWER_UNAVAILABLE } from "./answerGenerator";
export { stageBudget } from "./transitions";
export type {
  Citation,
  EvidenceComponent,
  EvidenceItem,
  Route,
  StageName,
  TraceRecord,
  WorkflowResult,
  WorkflowStatus,
} from "./types";
