// Main library exports for programmatic use
export { DispatchAgent, toWireResponse } from './dispatch-agent.js';
export { DispatchService } from './dispatch-service.js';
export { AiSdkModelClient, toDecision } from './llm-client.js';
export { inject } from './session-injector.js';
export { normalize, fallbackSummary, degradedResult, toToolResponse } from './response-normalizer.js';
export { ToolRegistry } from './tools/tool-registry.js';
export { ToolCatalog } from './tools/tool-catalog.js';
export { McpToolServer } from './tools/mcp-tool-server.js';
export { TraceEmitter } from './trace/trace-emitter.js';
export { LogTraceSink } from './trace/log-trace-sink.js';
export { OtelTraceSink } from './trace/otel-trace-sink.js';
export { RestHeadend } from './headends/rest-headend.js';
export { createRuntime } from './runtime.js';
export { ConfigError, loadConfiguration, parseConfiguration } from './config.js';
export {
  CanceledError,
  DispatchError,
  MissingArgumentError,
  ModelCallError,
  RegistryUnavailableError,
  TimeoutError,
  UnknownToolError,
  UnparseableResponseError,
} from './dispatch-errors.js';
export { ToolExecutionError } from './tools/tool-errors.js';

// Type exports
export type { DispatchAgentConfig, DispatchOutcome, ToolInvoker } from './dispatch-agent.js';
export type { ModelClient, ModelCompletion, ModelRequest } from './llm-client.js';
export type { ToolServerClient, ToolCallOptions } from './tools/types.js';
export type { TraceEvent, TraceSink, TraceRecorder } from './trace/trace-events.js';
export type {
  Configuration,
  DispatchRequest,
  DispatchResponse,
  DispatchState,
  LogEntry,
  ModelDecision,
  ParameterSpec,
  ToolDescriptor,
  ToolInvocationProposal,
  ToolInvocationResult,
} from './types.js';
