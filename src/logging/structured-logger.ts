import type { LogEntry, LogFormat } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

const QUIET_SEVERITIES = new Set<LogEntry['severity']>(['VRB', 'TRC']);

export class StructuredLogger {
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly color: boolean;
  private readonly verbose: boolean;

  constructor(options: StructuredLoggerOptions = {}) {
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    const writer = options.writer ?? defaultWriter;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color: this.color })}\n`);
      });
    }
    if (format === 'json') {
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color: this.color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (!this.verbose && QUIET_SEVERITIES.has(entry.severity)) return;
    const event = buildStructuredLogEvent(entry);
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  /** Bound `emit`, for passing around as a `LogSink`. */
  get sink(): (entry: LogEntry) => void {
    return (entry) => {
      this.emit(entry);
    };
  }
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed; the line is lost
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('dispatch_id', event.dispatchId);
  push('session_id', event.sessionId);
  push('state', event.state);
  push('remote', event.remoteIdentifier);
  push('provider', event.provider);
  push('model', event.model);
  push('tool', event.tool);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
