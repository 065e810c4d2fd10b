import { createRequire } from 'node:module';

import { trace as otelTrace } from '@opentelemetry/api';

import type { Tracer } from '@opentelemetry/api';
import type * as OtelTrace from '@opentelemetry/sdk-trace-node';

export interface TelemetryRuntimeConfig {
  otlpEndpoint?: string;
  otlpTimeoutMs?: number;
  // 'cli' flushes spans quickly since the process exits after one dispatch
  mode: 'cli' | 'server';
}

const requireModule = createRequire(import.meta.url);
const { version: PACKAGE_VERSION } = requireModule('../../package.json') as { version: string };

export const TRACER_NAME = 'mcp-dispatch-agent';

let tracerProvider: OtelTrace.NodeTracerProvider | undefined;

const telemetryDisabledByEnv = (): boolean => {
  const flag = process.env.OTEL_SDK_DISABLED;
  return typeof flag === 'string' && flag.trim().toLowerCase() === 'true';
};

/**
 * Install an OTLP span exporter. The SDK is only loaded when tracing is on.
 */
export async function initTelemetry(config: TelemetryRuntimeConfig): Promise<void> {
  await shutdownTelemetry();
  if (telemetryDisabledByEnv()) return;

  const [api, resources, semantic, traceNode, traceBase, traceExporter] = await Promise.all([
    import('@opentelemetry/api'),
    import('@opentelemetry/resources'),
    import('@opentelemetry/semantic-conventions'),
    import('@opentelemetry/sdk-trace-node'),
    import('@opentelemetry/sdk-trace-base'),
    import('@opentelemetry/exporter-trace-otlp-grpc'),
  ]);

  api.diag.setLogger(new api.DiagConsoleLogger(), api.DiagLogLevel.ERROR);

  const resourceAttrs: Record<string, string> = {
    [semantic.ATTR_SERVICE_NAME]: TRACER_NAME,
    [semantic.ATTR_SERVICE_VERSION]: PACKAGE_VERSION,
  };

  const exporter = new traceExporter.OTLPTraceExporter({
    ...(config.otlpEndpoint !== undefined && config.otlpEndpoint.length > 0 ? { url: config.otlpEndpoint } : {}),
    ...(config.otlpTimeoutMs !== undefined ? { timeoutMillis: config.otlpTimeoutMs } : {}),
  });
  const processorOptions = config.mode === 'cli'
    ? { scheduledDelayMillis: 200, exportTimeoutMillis: config.otlpTimeoutMs ?? 2000 }
    : undefined;
  const provider = new traceNode.NodeTracerProvider({
    resource: resources.resourceFromAttributes(resourceAttrs),
    sampler: new traceBase.ParentBasedSampler({ root: new traceBase.AlwaysOnSampler() }),
    spanProcessors: [new traceBase.BatchSpanProcessor(exporter, processorOptions)],
  });
  provider.register();
  tracerProvider = provider;
}

export function getTracer(): Tracer {
  return otelTrace.getTracer(TRACER_NAME, PACKAGE_VERSION);
}

export async function shutdownTelemetry(): Promise<void> {
  const provider = tracerProvider;
  if (provider === undefined) return;
  tracerProvider = undefined;
  try {
    await provider.shutdown();
  } finally {
    otelTrace.disable();
  }
}
