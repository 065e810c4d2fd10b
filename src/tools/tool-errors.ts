import { DispatchError, describeError } from '../dispatch-errors.js';

export type ToolFailureCause =
  | 'invalid_parameters'
  | 'transport_error'
  | 'status_error'
  | 'timeout'
  | 'canceled';

export interface ToolFailureMeaning {
  executed: boolean;
  summary: string;
}

export const TOOL_FAILURE_CAUSE_MEANINGS: Record<ToolFailureCause, ToolFailureMeaning> = {
  invalid_parameters: {
    executed: false,
    summary: 'Arguments do not match the tool schema; the call was not sent.',
  },
  transport_error: {
    executed: true,
    summary: 'Tool server was unreachable or the connection failed mid-call.',
  },
  status_error: {
    executed: true,
    summary: 'Tool server answered with an error result.',
  },
  timeout: {
    executed: true,
    summary: 'Tool call timed out after it was sent.',
  },
  canceled: {
    executed: false,
    summary: 'Tool call aborted by the caller.',
  },
};

export class ToolExecutionError extends DispatchError {
  readonly toolName: string;
  readonly failure: ToolFailureCause;
  readonly status?: number;

  constructor(
    toolName: string,
    failure: ToolFailureCause,
    message: string,
    opts?: { status?: number; cause?: unknown; details?: Record<string, unknown> }
  ) {
    super('tool_execution_error', message, { cause: opts?.cause, details: { ...opts?.details, toolName, failure } });
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
    this.failure = failure;
    if (opts?.status !== undefined) {
      this.status = opts.status;
    }
  }
}

export const isToolExecutionError = (value: unknown): value is ToolExecutionError =>
  value instanceof ToolExecutionError;

export const isExecutedFailure = (failure: ToolFailureCause): boolean =>
  TOOL_FAILURE_CAUSE_MEANINGS[failure].executed;

export const toToolExecutionError = (
  toolName: string,
  value: unknown,
  fallbackCause: ToolFailureCause = 'transport_error'
): ToolExecutionError => {
  if (isToolExecutionError(value)) return value;
  return new ToolExecutionError(toolName, fallbackCause, describeError(value), { cause: value });
};
