import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import Ajv from 'ajv';

import type { LogEntry, LogSink, ToolDescriptor, ToolServerConfig } from '../types.js';
import type { ToolCallOptions, ToolServerClient } from './types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions, ValidateFunction } from 'ajv';

import { describeError } from '../dispatch-errors.js';
import { buildLogEntry } from '../logging/log-entry.js';
import { isPlainObject, warn } from '../utils.js';

import { ToolExecutionError } from './tool-errors.js';

type AjvConstructor = new (options?: AjvOptions) => AjvClass;
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

export const CLIENT_INFO = { name: 'mcp-dispatch-agent', version: '1.0.0' } as const;

export type TransportFactory = () => Transport | Promise<Transport>;

export interface McpToolServerOptions {
  onLog?: LogSink;
  // replaces the configured transport, e.g. with an in-process pair
  transportFactory?: TransportFactory;
}

export function createTransport(config: ToolServerConfig): Transport {
  switch (config.type) {
    case 'stdio': {
      if (config.command === undefined) throw new Error("stdio tool server requires a 'command'");
      return new StdioClientTransport({ command: config.command, args: config.args, env: config.env, stderr: 'pipe' });
    }
    case 'http': {
      if (config.url === undefined) throw new Error("HTTP tool server requires a 'url'");
      return new StreamableHTTPClientTransport(new URL(config.url), { requestInit: { headers: config.headers } });
    }
    case 'sse': {
      if (config.url === undefined) throw new Error("SSE tool server requires a 'url'");
      const resolvedHeaders = config.headers;
      const customFetch: typeof fetch = async (input, init) => {
        const headers = new Headers(init?.headers);
        Object.entries(resolvedHeaders).forEach(([k, v]) => { headers.set(k, v); });
        return fetch(input, { ...init, headers });
      };
      // eslint-disable-next-line @typescript-eslint/no-deprecated -- SSE transport still serves legacy MCP servers
      return new SSEClientTransport(new URL(config.url), { eventSourceInit: { fetch: customFetch }, requestInit: { headers: resolvedHeaders }, fetch: customFetch });
    }
  }
}

const describeTarget = (config: ToolServerConfig): string => {
  if (config.type === 'stdio') return `stdio:${config.command ?? ''}`;
  return `${config.type}:${config.url ?? ''}`;
};

const httpStatusOf = (error: unknown): number | undefined => {
  if (!isPlainObject(error) && !(error instanceof Error)) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'number' && code >= 400 && code <= 599 ? code : undefined;
};

const formatAjvErrors = (errors: ErrorObject[] | null | undefined): string => {
  if (errors === null || errors === undefined || errors.length === 0) return 'schema validation failed';
  return errors
    .map((e) => `${e.instancePath.length > 0 ? e.instancePath : '(root)'} ${e.message ?? 'is invalid'}`)
    .join('; ');
};

/**
 * Pull the payload out of a `tools/call` result: structured content first,
 * then the text parts, then the content list itself.
 */
export function extractRawPayload(result: unknown): unknown {
  if (!isPlainObject(result)) return result;
  if (isPlainObject(result.structuredContent)) return result.structuredContent;
  // protocol 2024-10-07 servers answer with toolResult
  if (Object.prototype.hasOwnProperty.call(result, 'toolResult') && !Object.prototype.hasOwnProperty.call(result, 'content')) {
    return result.toolResult;
  }
  const content = result.content;
  if (typeof content === 'string') return content;
  if (!Array.isArray(content) || content.length === 0) return null;
  const texts = content
    .map((part) => (isPlainObject(part) && part.type === 'text' && typeof part.text === 'string' ? part.text : undefined))
    .filter((text): text is string => text !== undefined);
  if (texts.length > 0) return texts.join('\n');
  return content;
}

const errorTextOf = (result: Record<string, unknown>): string => {
  const payload = extractRawPayload(result);
  if (typeof payload === 'string' && payload.length > 0) return payload;
  return 'tool reported an error';
};

export class McpToolServer implements ToolServerClient {
  readonly remoteIdentifier: string;
  private readonly config: ToolServerConfig;
  private readonly onLog?: LogSink;
  private readonly transportFactory: TransportFactory;
  private readonly validators = new WeakMap<ToolDescriptor, ValidateFunction>();
  private readonly ajv: AjvClass;
  private clientPromise?: Promise<Client>;
  private closed = false;

  constructor(config: ToolServerConfig, opts: McpToolServerOptions = {}) {
    this.config = config;
    this.onLog = opts.onLog;
    this.transportFactory = opts.transportFactory ?? (() => createTransport(config));
    this.remoteIdentifier = `mcp:${describeTarget(config)}`;
    this.ajv = new AjvCtor({ allErrors: true, strict: false, validateFormats: false });
  }

  async listTools(): Promise<unknown[]> {
    const client = await this.ensureClient();
    const tools: unknown[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor !== undefined ? { cursor } : undefined, { timeout: this.config.timeoutMs });
      tools.push(...page.tools);
      cursor = page.nextCursor;
    } while (cursor !== undefined);
    this.log('TRC', `listTools -> ${String(tools.length)} tools`);
    return tools;
  }

  async callTool(descriptor: ToolDescriptor, args: Record<string, unknown>, opts: ToolCallOptions = {}): Promise<unknown> {
    const toolName = descriptor.name;
    this.validateArguments(descriptor, args);
    if (opts.signal?.aborted === true) {
      throw new ToolExecutionError(toolName, 'canceled', `Tool '${toolName}' canceled before it was sent`);
    }

    let client: Client;
    try {
      client = await this.ensureClient();
    } catch (error) {
      throw new ToolExecutionError(toolName, 'transport_error', `Tool server unreachable: ${describeError(error)}`, { cause: error });
    }

    const timeoutMs = opts.timeoutMs ?? this.config.timeoutMs;
    let result: unknown;
    try {
      result = await client.callTool({ name: toolName, arguments: args }, undefined, {
        signal: opts.signal,
        timeout: timeoutMs,
        maxTotalTimeout: timeoutMs,
      });
    } catch (error) {
      throw this.mapCallError(toolName, error, opts.signal, timeoutMs);
    }

    if (isPlainObject(result) && result.isError === true) {
      throw new ToolExecutionError(toolName, 'status_error', `Tool '${toolName}' failed: ${errorTextOf(result)}`);
    }
    return extractRawPayload(result);
  }

  async close(): Promise<void> {
    this.closed = true;
    const pending = this.clientPromise;
    this.clientPromise = undefined;
    if (pending === undefined) return;
    try {
      const client = await pending;
      await client.close();
    } catch (e) {
      warn(`mcp client close failed: ${describeError(e)}`);
    }
  }

  private validateArguments(descriptor: ToolDescriptor, args: Record<string, unknown>): void {
    let validate = this.validators.get(descriptor);
    if (validate === undefined) {
      try {
        validate = this.ajv.compile({ ...descriptor.inputSchema });
      } catch (error) {
        throw new ToolExecutionError(descriptor.name, 'invalid_parameters', `Tool '${descriptor.name}' schema cannot be compiled: ${describeError(error)}`, { cause: error });
      }
      this.validators.set(descriptor, validate);
    }
    if (!validate(args)) {
      throw new ToolExecutionError(
        descriptor.name,
        'invalid_parameters',
        `Arguments for '${descriptor.name}' do not match its schema: ${formatAjvErrors(validate.errors)}`
      );
    }
  }

  private mapCallError(toolName: string, error: unknown, signal: AbortSignal | undefined, timeoutMs: number): ToolExecutionError {
    if (signal?.aborted === true) {
      return new ToolExecutionError(toolName, 'canceled', `Tool '${toolName}' canceled`, { cause: error });
    }
    if (error instanceof McpError) {
      if (error.code === ErrorCode.RequestTimeout) {
        return new ToolExecutionError(toolName, 'timeout', `Tool '${toolName}' timed out after ${String(timeoutMs)}ms`, { cause: error });
      }
      if (error.code === ErrorCode.ConnectionClosed) {
        this.clientPromise = undefined;
        return new ToolExecutionError(toolName, 'transport_error', `Tool server connection closed: ${error.message}`, { cause: error });
      }
      return new ToolExecutionError(toolName, 'status_error', `Tool '${toolName}' failed: ${error.message}`, { cause: error, details: { code: error.code } });
    }
    const status = httpStatusOf(error);
    this.clientPromise = undefined;
    return new ToolExecutionError(
      toolName,
      'transport_error',
      status !== undefined ? `Tool server returned HTTP ${String(status)}: ${describeError(error)}` : `Tool transport failed: ${describeError(error)}`,
      { cause: error, ...(status !== undefined ? { status } : {}) }
    );
  }

  private async ensureClient(): Promise<Client> {
    if (this.closed) throw new Error('tool server client is closed');
    if (this.clientPromise === undefined) {
      const pending = this.connect();
      this.clientPromise = pending;
      void pending.catch(() => {
        if (this.clientPromise === pending) this.clientPromise = undefined;
      });
    }
    return await this.clientPromise;
  }

  private async connect(): Promise<Client> {
    const client = new Client({ ...CLIENT_INFO }, { capabilities: {} });
    const transport = await this.transportFactory();
    try {
      await client.connect(transport);
    } catch (e) {
      this.log('ERR', `MCP server connect failed: ${describeError(e)}`, true);
      throw e;
    }
    client.onclose = () => {
      this.log('WRN', 'MCP connection closed');
      this.clientPromise = undefined;
    };
    this.log('TRC', 'connected');
    return client;
  }

  private log(severity: LogEntry['severity'], message: string, fatal = false): void {
    const entry = buildLogEntry({ severity, type: 'tool', remoteIdentifier: this.remoteIdentifier, fatal, message });
    try { this.onLog?.(entry); } catch (e) { warn(`mcp onLog failed: ${describeError(e)}`); }
  }
}
