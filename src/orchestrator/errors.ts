/**
 * Error codes for workflow graph validation.
 */
export type WorkflowErrorCode =
  | "CYCLE_DETECTED" // dependency graph has cycles
  | "MISSING_DEPENDENCY" // entry depends on a key not in the workflow
  | "DUPLICATE_COMPONENT"; // two entries share a key

export class WorkflowError extends Error {
  constructor(
    public readonly code: WorkflowErrorCode,
    message: string,
    public readonly details?: {
      key?: string;
      missing_dep?: string;
      cycle?: string[];
    },
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}
