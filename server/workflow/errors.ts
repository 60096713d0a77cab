export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Invalid or conflicting workflow input. Raised before any stage runs and
 * the only error `run` surfaces to its caller.
 */
export class WorkflowConfigError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(`Invalid workflow configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`);
    this.name = "WorkflowConfigError";
  }
}
