import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  remoteIdentifier?: string;
  provider?: string;
  model?: string;
  tool?: string;
  dispatchId?: string;
  sessionId?: string;
  state?: string;
  labels: Record<string, string>;
  stack?: string;
}

const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'direction',
  'remote',
  'tool',
  'provider',
  'model',
  'dispatch_id',
  'session_id',
  'state',
]);

export function buildStructuredLogEvent(entry: LogEntry): StructuredLogEvent {
  const labels: Record<string, string> = {};
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }

  const remote = entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined;
  const parsed = remote !== undefined ? parseRemoteIdentifier(remote, entry.type) : {};

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    remoteIdentifier: remote,
    provider: parsed.provider,
    model: parsed.model,
    tool: parsed.tool,
    dispatchId: entry.dispatchId,
    sessionId: entry.sessionId,
    state: entry.state,
    labels: filteredLabels,
    stack: entry.stack,
  };
}

function parseRemoteIdentifier(
  identifier: string,
  type: LogEntry['type'],
): { provider?: string; model?: string; tool?: string } {
  const idx = identifier.indexOf(':');
  if (type === 'llm') {
    if (idx === -1) return { provider: identifier };
    return { provider: identifier.slice(0, idx), model: identifier.slice(idx + 1) };
  }
  if (type === 'tool' && idx !== -1) {
    return { provider: identifier.slice(0, idx), tool: identifier.slice(idx + 1) };
  }
  return {};
}
