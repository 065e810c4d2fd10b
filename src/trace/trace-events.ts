import type { DispatchErrorKind } from '../dispatch-errors.js';
import type { DispatchState } from '../types.js';

export type ModelCallPurpose = 'decide' | 'answer';

interface TraceEventBase {
  // the dispatch's session_id
  correlationId: string;
  dispatchId: string;
  timestamp: number;
}

export interface ModelCallStarted extends TraceEventBase {
  type: 'ModelCallStarted';
  purpose: ModelCallPurpose;
  model: string;
}

export interface ModelCallCompleted extends TraceEventBase {
  type: 'ModelCallCompleted';
  purpose: ModelCallPurpose;
  model: string;
  durationMs: number;
  outcome: 'ok' | 'error';
  toolProposed?: string;
  errorKind?: DispatchErrorKind;
}

export interface ToolCallStarted extends TraceEventBase {
  type: 'ToolCallStarted';
  toolName: string;
  argumentNames: string[];
}

export interface ToolCallCompleted extends TraceEventBase {
  type: 'ToolCallCompleted';
  toolName: string;
  durationMs: number;
  shape: string;
  truncated: boolean;
  degraded: boolean;
}

export interface ToolCallFailed extends TraceEventBase {
  type: 'ToolCallFailed';
  toolName: string;
  durationMs: number;
  errorKind: DispatchErrorKind;
  message: string;
  // the request reached the tool server, so it may have had side effects
  executed: boolean;
}

export interface DispatchCompleted extends TraceEventBase {
  type: 'DispatchCompleted';
  status: 'completed' | 'failed';
  usedTool: string | null;
  durationMs: number;
  states: DispatchState[];
  errorKind?: DispatchErrorKind;
}

export type TraceEvent =
  | ModelCallStarted
  | ModelCallCompleted
  | ToolCallStarted
  | ToolCallCompleted
  | ToolCallFailed
  | DispatchCompleted;

export type TraceEventType = TraceEvent['type'];

export interface TraceSink {
  readonly name: string;
  write(event: TraceEvent): void | Promise<void>;
  close?(): void | Promise<void>;
}

/** Anything the agent can hand events to. */
export interface TraceRecorder {
  record(event: TraceEvent): void;
}

/** Scalar attributes of an event, without the shared envelope fields. */
export function traceEventAttributes(event: TraceEvent): Record<string, string | number | boolean> {
  const attrs: Record<string, string | number | boolean> = {};
  Object.entries(event).forEach(([key, value]) => {
    if (key === 'type' || key === 'correlationId' || key === 'dispatchId' || key === 'timestamp') return;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attrs[key] = value;
    } else if (Array.isArray(value)) {
      attrs[key] = value.join(',');
    } else if (value === null) {
      attrs[key] = 'null';
    }
  });
  return attrs;
}
