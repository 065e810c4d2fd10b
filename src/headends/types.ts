import type { LogSink } from '../types.js';

export interface HeadendDescription {
  id: string;
  label: string;
  details?: Record<string, unknown>;
}

export type HeadendClosedEvent =
  | { reason: 'stopped'; graceful: boolean }
  | { reason: 'error'; error: Error };

export interface HeadendContext {
  log: LogSink;
  // aborts every in-flight request when the process shuts down
  shutdownSignal: AbortSignal;
}

export interface Headend {
  readonly id: string;
  readonly closed: Promise<HeadendClosedEvent>;
  describe: () => HeadendDescription;
  start: (context: HeadendContext) => Promise<void>;
  stop: () => Promise<void>;
}
