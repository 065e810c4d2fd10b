import { SpanStatusCode } from '@opentelemetry/api';

import type { TraceEvent, TraceSink } from './trace-events.js';
import type { Span, Tracer } from '@opentelemetry/api';

import { traceEventAttributes } from './trace-events.js';

export const DEFAULT_MAX_OPEN_SPANS = 1024;

export interface OtelTraceSinkOptions {
  maxOpenSpans?: number;
}

/**
 * One span per dispatch; every trace event becomes a span event and
 * `DispatchCompleted` ends the span.
 *
 * A dispatch whose `DispatchCompleted` was dropped upstream would keep its
 * span open forever, so past `maxOpenSpans` the oldest open span is ended
 * as incomplete.
 */
export class OtelTraceSink implements TraceSink {
  readonly name = 'otel';
  private readonly tracer: Tracer;
  private readonly maxOpenSpans: number;
  private readonly open = new Map<string, Span>();

  constructor(tracer: Tracer, opts: OtelTraceSinkOptions = {}) {
    this.tracer = tracer;
    this.maxOpenSpans = Math.max(1, Math.floor(opts.maxOpenSpans ?? DEFAULT_MAX_OPEN_SPANS));
  }

  get openSpans(): number {
    return this.open.size;
  }

  write(event: TraceEvent): void {
    let span = this.open.get(event.dispatchId);
    if (span === undefined) {
      span = this.tracer.startSpan('dispatch', {
        startTime: event.timestamp,
        attributes: { 'dispatch.id': event.dispatchId, 'session.id': event.correlationId },
      });
      this.open.set(event.dispatchId, span);
      this.evictOverflow(event.timestamp);
    }
    span.addEvent(event.type, traceEventAttributes(event), event.timestamp);

    if (event.type === 'DispatchCompleted') {
      span.setAttribute('dispatch.status', event.status);
      if (event.usedTool !== null) span.setAttribute('dispatch.used_tool', event.usedTool);
      if (event.status === 'failed') {
        span.setStatus({ code: SpanStatusCode.ERROR, message: event.errorKind });
      } else {
        span.setStatus({ code: SpanStatusCode.OK });
      }
      span.end(event.timestamp);
      this.open.delete(event.dispatchId);
    }
  }

  private evictOverflow(now: number): void {
    for (const [dispatchId, span] of this.open) {
      if (this.open.size <= this.maxOpenSpans) return;
      span.setStatus({ code: SpanStatusCode.ERROR, message: 'incomplete' });
      span.end(now);
      this.open.delete(dispatchId);
    }
  }

  close(): void {
    this.open.forEach((span) => { span.end(); });
    this.open.clear();
  }
}
