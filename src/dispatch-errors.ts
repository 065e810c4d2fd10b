export type DispatchErrorKind =
  | 'registry_unavailable'
  | 'unknown_tool'
  | 'missing_argument'
  | 'tool_execution_error'
  | 'unparseable_response'
  | 'timeout'
  | 'model_call_error'
  | 'canceled';

export interface DispatchErrorMeaning {
  // true when the dispatch keeps going after this error
  absorbed: boolean;
  summary: string;
}

export const DISPATCH_ERROR_KIND_MEANINGS: Record<DispatchErrorKind, DispatchErrorMeaning> = {
  registry_unavailable: {
    absorbed: false,
    summary: 'Tool catalog could not be fetched or was malformed.',
  },
  unknown_tool: {
    absorbed: false,
    summary: 'Model proposed a tool name that is not in the catalog.',
  },
  missing_argument: {
    absorbed: false,
    summary: 'A required tool parameter was not supplied by the model.',
  },
  tool_execution_error: {
    absorbed: false,
    summary: 'Tool call failed at the tool server or its transport.',
  },
  unparseable_response: {
    absorbed: true,
    summary: 'Tool payload has no recognizable shape; raw payload is used instead.',
  },
  timeout: {
    absorbed: false,
    summary: 'A model or tool call exceeded its time budget.',
  },
  model_call_error: {
    absorbed: false,
    summary: 'Model host was unreachable or returned malformed output.',
  },
  canceled: {
    absorbed: false,
    summary: 'Dispatch was canceled by the caller.',
  },
};

export class DispatchError extends Error {
  readonly kind: DispatchErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: DispatchErrorKind, message: string, opts?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'DispatchError';
    this.kind = kind;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

export class RegistryUnavailableError extends DispatchError {
  constructor(message: string, cause?: unknown) {
    super('registry_unavailable', message, { cause });
    this.name = 'RegistryUnavailableError';
  }
}

export class UnknownToolError extends DispatchError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('unknown_tool', `Unknown tool '${toolName}'`, { details: { toolName } });
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class MissingArgumentError extends DispatchError {
  readonly toolName: string;
  readonly parameterName: string;

  constructor(toolName: string, parameterName: string) {
    super('missing_argument', `Tool '${toolName}' requires parameter '${parameterName}'`, {
      details: { toolName, parameterName },
    });
    this.name = 'MissingArgumentError';
    this.toolName = toolName;
    this.parameterName = parameterName;
  }
}

export class UnparseableResponseError extends DispatchError {
  readonly toolName: string;

  constructor(toolName: string, reason: string) {
    super('unparseable_response', `Response from '${toolName}' is unparseable: ${reason}`, { details: { toolName, reason } });
    this.name = 'UnparseableResponseError';
    this.toolName = toolName;
  }
}

export type TimeoutStage = 'model' | 'tool';

export class TimeoutError extends DispatchError {
  readonly stage: TimeoutStage;
  readonly timeoutMs: number;

  constructor(stage: TimeoutStage, timeoutMs: number) {
    super('timeout', `${stage === 'model' ? 'Model' : 'Tool'} call timed out after ${String(timeoutMs)}ms`, {
      details: { stage, timeoutMs },
    });
    this.name = 'TimeoutError';
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

export type ModelCallErrorReason =
  | 'rate_limit'
  | 'auth_error'
  | 'quota_exceeded'
  | 'model_error'
  | 'network_error'
  | 'invalid_response';

export class ModelCallError extends DispatchError {
  readonly reason: ModelCallErrorReason;

  constructor(reason: ModelCallErrorReason, message: string, cause?: unknown) {
    super('model_call_error', message, { cause, details: { reason } });
    this.name = 'ModelCallError';
    this.reason = reason;
  }
}

export class CanceledError extends DispatchError {
  constructor(message = 'Dispatch canceled') {
    super('canceled', message);
    this.name = 'CanceledError';
  }
}

export const isDispatchError = (value: unknown): value is DispatchError =>
  value instanceof DispatchError;

export const describeError = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

export const toDispatchError = (
  value: unknown,
  fallback: (message: string, cause: unknown) => DispatchError,
): DispatchError => {
  if (isDispatchError(value)) return value;
  return fallback(describeError(value), value);
};
