import type { LogEntry, LogSink } from '../types.js';
import type { TraceEvent, TraceSink } from './trace-events.js';

import { buildLogEntry } from '../logging/log-entry.js';

import { traceEventAttributes } from './trace-events.js';

const severityOf = (event: TraceEvent): LogEntry['severity'] => {
  switch (event.type) {
    case 'ModelCallStarted':
    case 'ToolCallStarted':
      return 'TRC';
    case 'ModelCallCompleted':
      return event.outcome === 'ok' ? 'VRB' : 'WRN';
    case 'ToolCallCompleted':
      return event.degraded ? 'WRN' : 'VRB';
    case 'ToolCallFailed':
      return 'WRN';
    case 'DispatchCompleted':
      return 'FIN';
  }
};

const typeOf = (event: TraceEvent): LogEntry['type'] => {
  if (event.type === 'ModelCallStarted' || event.type === 'ModelCallCompleted') return 'llm';
  if (event.type === 'DispatchCompleted') return 'agent';
  return 'tool';
};

const remoteOf = (event: TraceEvent): string => {
  if (event.type === 'ModelCallStarted' || event.type === 'ModelCallCompleted') return event.model;
  if (event.type === 'DispatchCompleted') return 'dispatch';
  return `mcp:${event.toolName}`;
};

/** Writes every trace event to the structured log. */
export class LogTraceSink implements TraceSink {
  readonly name = 'log';
  private readonly onLog: LogSink;

  constructor(onLog: LogSink) {
    this.onLog = onLog;
  }

  write(event: TraceEvent): void {
    this.onLog(buildLogEntry({
      timestamp: event.timestamp,
      severity: severityOf(event),
      direction: event.type.endsWith('Started') ? 'request' : 'response',
      type: typeOf(event),
      remoteIdentifier: remoteOf(event),
      message: event.type,
      dispatchId: event.dispatchId,
      sessionId: event.correlationId,
      details: traceEventAttributes(event),
    }));
  }
}
