import type { LogEntry } from '../types.js';

export type LogEntryInit = Pick<LogEntry, 'severity' | 'type' | 'remoteIdentifier' | 'message'>
  & Partial<Omit<LogEntry, 'severity' | 'type' | 'remoteIdentifier' | 'message'>>;

export const buildLogEntry = (init: LogEntryInit): LogEntry => ({
  timestamp: Date.now(),
  direction: 'response',
  fatal: false,
  ...init,
});
