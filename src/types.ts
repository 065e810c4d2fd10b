import type { JSONSchema7 } from 'json-schema';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';
  direction: 'request' | 'response';
  type: 'llm' | 'tool' | 'agent' | 'server';
  // 'provider:model' for llm logs, 'mcp:tool' for tool logs
  remoteIdentifier: string;
  fatal: boolean;
  message: string;
  dispatchId?: string;
  sessionId?: string;
  state?: DispatchState;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface DispatchRequest {
  readonly systemPrompt: string;
  readonly userQuery: string;
  readonly sessionId: string;
}

export interface ParameterSpec {
  readonly name: string;
  readonly type: string;
  readonly required: boolean;
  readonly isSessionReference: boolean;
  readonly description?: string;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  // declaration order of the tool's input schema
  readonly parameters: readonly ParameterSpec[];
  readonly inputSchema: JSONSchema7;
}

export interface ToolInvocationProposal {
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export type ModelDecision =
  | { kind: 'no_tool'; text: string }
  | { kind: 'tool_call'; text: string; proposal: ToolInvocationProposal };

export type PayloadShape = 'scalar' | 'record' | 'records';

export interface ToolInvocationResult {
  rawPayload: unknown;
  normalizedSummary: string;
  structuredFields: Record<string, unknown>;
  shape: PayloadShape | 'raw';
  truncated: boolean;
  degraded: boolean;
}

export type DispatchState =
  | 'START'
  | 'DECIDING'
  | 'NO_TOOL'
  | 'ANSWERING_DIRECT'
  | 'TOOL_SELECTED'
  | 'INJECTING'
  | 'EXECUTING'
  | 'NORMALIZING'
  | 'ANSWERING_WITH_TOOL'
  | 'DONE'
  | 'FAILED';

/** Wire shape returned to the backend. */
export interface DispatchResponse {
  answer: string;
  tool_response?: Record<string, unknown> | null;
  used_tool?: string | null;
  error?: { kind: string; message: string };
}

export type ModelProvider = 'ollama' | 'openai';

export interface ModelConfig {
  provider: ModelProvider;
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature: number;
  timeoutMs: number;
}

export type ToolServerTransport = 'http' | 'sse' | 'stdio';

export interface ToolServerConfig {
  type: ToolServerTransport;
  url?: string;
  command?: string;
  args: string[];
  env?: Record<string, string>;
  headers: Record<string, string>;
  timeoutMs: number;
  connectRetries: number;
  sessionReferences: Record<string, string[]>;
}

export interface DispatchConfig {
  summaryMaxBytes: number;
  fallbackAnswer: string;
}

export interface ServerConfig {
  host: string;
  port: number;
  concurrency: number;
}

export interface TraceConfig {
  enabled: boolean;
  queueCapacity: number;
  otlpEndpoint?: string;
  otlpTimeoutMs?: number;
}

export type LogFormat = 'logfmt' | 'json' | 'console';

export interface LoggingConfig {
  format: LogFormat;
  verbose: boolean;
}

export interface Configuration {
  model: ModelConfig;
  toolServer: ToolServerConfig;
  dispatch: DispatchConfig;
  server: ServerConfig;
  trace: TraceConfig;
  logging: LoggingConfig;
}
