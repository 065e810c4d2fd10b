import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_CYAN = '\u001B[36m';
const ANSI_GRAY = '\u001B[90m';

export const COLOR_BY_SEVERITY: Record<StructuredLogEvent['severity'], string> = {
  ERR: ANSI_RED,
  WRN: ANSI_YELLOW,
  FIN: ANSI_CYAN,
  VRB: ANSI_GRAY,
  TRC: ANSI_GRAY,
};

export const colorize = (line: string, severity: StructuredLogEvent['severity']): string =>
  `${COLOR_BY_SEVERITY[severity]}${line}${ANSI_RESET}`;

function encodeValue(value: string): string {
  if (value === '') return '""';
  const needsQuotes = /\s|=|"/.test(value);
  const escaped = value.replace(/"/g, '\\"');
  return needsQuotes ? `"${escaped}"` : escaped;
}

function sanitizePayload(value: string): string {
  return value.replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

export function formatLogfmt(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const pairs: [string, string][] = [];
  const seen = new Set<string>();
  const push = (key: string, value: string | undefined): void => {
    if (value === undefined || value.length === 0) return;
    if (seen.has(key)) return;
    pairs.push([key, value]);
    seen.add(key);
  };

  push('ts', event.isoTimestamp);
  push('level', event.severity.toLowerCase());
  push('priority', String(event.priority));
  push('type', event.type);
  push('direction', event.direction);
  push('dispatch_id', event.dispatchId);
  push('session_id', event.sessionId);
  push('state', event.state);
  push('remote', event.remoteIdentifier);
  push('provider', event.provider);
  push('model', event.model);
  push('tool', event.tool);

  Object.entries(event.labels).forEach(([key, value]) => {
    push(key, sanitizePayload(value));
  });

  // Render the free-form message last for readability.
  push('message', sanitizePayload(event.message));

  const line = pairs.map(([key, value]) => `${key}=${encodeValue(value)}`).join(' ');
  return options.color === true ? colorize(line, event.severity) : line;
}
