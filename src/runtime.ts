import type { ModelClient } from './llm-client.js';
import type { ToolServerClient } from './tools/types.js';
import type { TraceSink } from './trace/trace-events.js';
import type { Configuration, LogSink } from './types.js';

import { DispatchAgent } from './dispatch-agent.js';
import { DispatchService } from './dispatch-service.js';
import { AiSdkModelClient } from './llm-client.js';
import { buildLogEntry } from './logging/log-entry.js';
import { StructuredLogger } from './logging/structured-logger.js';
import { getTracer, initTelemetry, shutdownTelemetry } from './telemetry/index.js';
import { McpToolServer } from './tools/mcp-tool-server.js';
import { ToolRegistry } from './tools/tool-registry.js';
import { LogTraceSink } from './trace/log-trace-sink.js';
import { OtelTraceSink } from './trace/otel-trace-sink.js';
import { TraceEmitter } from './trace/trace-emitter.js';
import { setWarningSink } from './utils.js';

export interface RuntimeOptions {
  mode: 'cli' | 'server';
  writer?: (line: string) => void;
  color?: boolean;
  // replace the configured remote endpoints
  toolServer?: ToolServerClient;
  model?: ModelClient;
}

export interface Runtime {
  readonly config: Configuration;
  readonly log: LogSink;
  readonly registry: ToolRegistry;
  readonly agent: DispatchAgent;
  readonly service: DispatchService;
  readonly trace: TraceEmitter;
  close: () => Promise<void>;
}

/** Wire every component from a validated configuration. Nothing connects yet. */
export async function createRuntime(config: Configuration, opts: RuntimeOptions): Promise<Runtime> {
  const logger = new StructuredLogger({
    format: config.logging.format,
    verbose: config.logging.verbose,
    color: opts.color ?? false,
    ...(opts.writer !== undefined ? { writer: opts.writer } : {}),
  });
  const log = logger.sink;
  setWarningSink((message) => {
    log(buildLogEntry({ severity: 'WRN', type: 'agent', remoteIdentifier: 'runtime', message }));
  });

  const sinks: TraceSink[] = [];
  const otlpEnabled = config.trace.enabled && config.trace.otlpEndpoint !== undefined;
  if (config.trace.enabled) sinks.push(new LogTraceSink(log));
  if (otlpEnabled) {
    await initTelemetry({
      mode: opts.mode,
      otlpEndpoint: config.trace.otlpEndpoint,
      otlpTimeoutMs: config.trace.otlpTimeoutMs,
    });
    sinks.push(new OtelTraceSink(getTracer()));
  }
  const trace = new TraceEmitter({ sinks, capacity: config.trace.queueCapacity, onLog: log });

  const toolServer = opts.toolServer ?? new McpToolServer(config.toolServer, { onLog: log });
  const registry = new ToolRegistry({
    client: toolServer,
    sessionReferences: config.toolServer.sessionReferences,
    onLog: log,
  });
  const model = opts.model ?? new AiSdkModelClient(config.model, { onLog: log });
  const agent = new DispatchAgent({
    model,
    tools: registry,
    tracer: trace,
    onLog: log,
    config: {
      modelTimeoutMs: config.model.timeoutMs,
      toolTimeoutMs: config.toolServer.timeoutMs,
      summaryMaxBytes: config.dispatch.summaryMaxBytes,
      fallbackAnswer: config.dispatch.fallbackAnswer,
    },
  });
  const service = new DispatchService({ registry, agent });

  return {
    config,
    log,
    registry,
    agent,
    service,
    trace,
    close: async () => {
      await trace.close();
      await registry.close();
      if (otlpEnabled) await shutdownTelemetry();
      setWarningSink(undefined);
    },
  };
}
