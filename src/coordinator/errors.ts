import { AgentCoordinatorError, ErrorCode } from '../errors';

export enum WorkflowErrorCode {
  DUPLICATE_TASK_ID = 'DUPLICATE_TASK_ID',
  UNKNOWN_DEPENDENCY = 'UNKNOWN_DEPENDENCY',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',
  NO_ROUTE_MATCH = 'NO_ROUTE_MATCH',
  MISSING_ROUTER = 'MISSING_ROUTER',
  INVALID_DEADLINE = 'INVALID_DEADLINE',
}

/**
 * Task set rejected before any task ran.
 */
export class WorkflowValidationError extends AgentCoordinatorError {
  readonly reason: WorkflowErrorCode;
  readonly taskId?: string;
  /** Task ids along the cycle, first id repeated at the end */
  readonly cycle?: readonly string[];

  constructor(
    reason: WorkflowErrorCode,
    message: string,
    details: { taskId?: string; cycle?: readonly string[] } = {}
  ) {
    super(ErrorCode.WORKFLOW_INVALID, message);
    this.name = 'WorkflowValidationError';
    this.reason = reason;
    this.taskId = details.taskId;
    this.cycle = details.cycle;
  }
}
