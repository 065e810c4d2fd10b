import { setImmediate as scheduleImmediate } from 'node:timers';

import type { LogEntry, LogSink } from '../types.js';
import type { TraceEvent, TraceRecorder, TraceSink } from './trace-events.js';

import { describeError } from '../dispatch-errors.js';
import { buildLogEntry } from '../logging/log-entry.js';
import { warn } from '../utils.js';

export const DEFAULT_TRACE_QUEUE_CAPACITY = 1024;

export interface TraceEmitterOptions {
  sinks: TraceSink[];
  capacity?: number;
  onLog?: LogSink;
}

export interface TraceEmitterStats {
  queued: number;
  delivered: number;
  dropped: number;
}

/**
 * Bounded queue between the dispatch path and the trace sinks.
 *
 * `record` only enqueues; a worker scheduled on the next macrotask hands
 * events to each sink in order. When the queue is full, or after `close`,
 * new events are dropped and counted. A full queue still takes a
 * `DispatchCompleted` by dropping the oldest queued non-terminal event.
 */
export class TraceEmitter implements TraceRecorder {
  private readonly sinks: TraceSink[];
  private readonly capacity: number;
  private readonly onLog?: LogSink;
  private readonly queue: TraceEvent[] = [];
  private draining?: Promise<void>;
  private closed = false;
  private delivered = 0;
  private dropped = 0;
  private dropWarned = false;

  constructor(opts: TraceEmitterOptions) {
    if (opts.capacity !== undefined && (!Number.isFinite(opts.capacity) || opts.capacity <= 0)) {
      throw new Error(`Trace queue capacity must be a positive number; received ${String(opts.capacity)}`);
    }
    this.sinks = [...opts.sinks];
    this.capacity = Math.floor(opts.capacity ?? DEFAULT_TRACE_QUEUE_CAPACITY);
    this.onLog = opts.onLog;
  }

  record(event: TraceEvent): void {
    if (this.closed) {
      this.drop(event, 'closed');
      return;
    }
    if (this.queue.length >= this.capacity) {
      // a terminal event makes room by evicting the oldest non-terminal one, so sinks can still close the dispatch
      const victim = event.type === 'DispatchCompleted'
        ? this.queue.findIndex((queued) => queued.type !== 'DispatchCompleted')
        : -1;
      if (victim === -1) {
        this.drop(event, 'full');
        return;
      }
      const [evicted] = this.queue.splice(victim, 1);
      this.drop(evicted, 'full');
    }
    this.queue.push(event);
    this.scheduleDrain();
  }

  stats(): TraceEmitterStats {
    return { queued: this.queue.length, delivered: this.delivered, dropped: this.dropped };
  }

  /** Resolves once every event recorded so far reached the sinks. */
  async flush(): Promise<void> {
    while (this.queue.length > 0 || this.draining !== undefined) {
      await (this.draining ?? this.scheduleDrain());
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
    for (const sink of this.sinks) {
      try {
        await sink.close?.();
      } catch (error) {
        this.log('WRN', `trace sink '${sink.name}' close failed: ${describeError(error)}`);
      }
    }
  }

  private scheduleDrain(): Promise<void> {
    if (this.draining !== undefined) return this.draining;
    const pending = new Promise<void>((resolve) => { scheduleImmediate(resolve); })
      .then(async () => { await this.drain(); })
      .finally(() => {
        this.draining = undefined;
        if (this.queue.length > 0) void this.scheduleDrain();
      });
    this.draining = pending;
    return pending;
  }

  private async drain(): Promise<void> {
    for (let event = this.queue.shift(); event !== undefined; event = this.queue.shift()) {
      for (const sink of this.sinks) {
        try {
          await sink.write(event);
        } catch (error) {
          this.log('WRN', `trace sink '${sink.name}' failed on ${event.type}: ${describeError(error)}`);
        }
      }
      this.delivered += 1;
    }
    // a later overflow is worth another warning
    if (this.queue.length === 0) this.dropWarned = false;
  }

  private drop(event: TraceEvent, reason: 'closed' | 'full'): void {
    this.dropped += 1;
    if (this.dropWarned) return;
    this.dropWarned = true;
    this.log('WRN', `trace queue ${reason}, dropping ${event.type}`);
  }

  private log(severity: LogEntry['severity'], message: string): void {
    const entry = buildLogEntry({ severity, type: 'agent', remoteIdentifier: 'trace', message });
    try { this.onLog?.(entry); } catch (e) { warn(`trace onLog failed: ${describeError(e)}`); }
  }
}

/** Recorder that discards everything. */
export const NOOP_TRACE_RECORDER: TraceRecorder = { record: () => { /* noop */ } };
