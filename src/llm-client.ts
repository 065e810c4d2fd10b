import { generateText, tool } from 'ai';
import { jsonSchema } from '@ai-sdk/provider-utils';

import type { LogEntry, LogSink, ModelConfig, ModelDecision } from './types.js';
import type { ModelToolSpec } from './tools/tool-catalog.js';
import type { LanguageModel, ModelMessage, ToolSet } from 'ai';

import { ModelCallError, describeError } from './dispatch-errors.js';
import { mapModelError } from './llm-providers/llm-error-mapping.js';
import { createLanguageModel, describeModel } from './llm-providers/provider-factory.js';
import { buildLogEntry } from './logging/log-entry.js';
import { tryExtractLeakedToolCalls } from './tool-call-fallback.js';
import { isPlainObject, warn } from './utils.js';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ModelRequest {
  systemPrompt: string;
  messages: ChatMessage[];
  tools?: ModelToolSpec[];
  signal?: AbortSignal;
  // for log correlation only
  dispatchId?: string;
  sessionId?: string;
}

export interface ModelCompletion {
  text: string;
  toolCall?: { name: string; arguments: Record<string, unknown> };
}

/** One model round trip. Implementations throw dispatch errors only. */
export interface ModelClient {
  readonly remoteIdentifier: string;
  complete(request: ModelRequest): Promise<ModelCompletion>;
}

export interface AiSdkModelClientOptions {
  onLog?: LogSink;
  // overrides the provider-built model, e.g. a mock in tests
  languageModel?: LanguageModel;
}

const toModelMessages = (messages: ChatMessage[]): ModelMessage[] =>
  messages.map((message) => (
    message.role === 'user'
      ? { role: 'user', content: message.content }
      : { role: 'assistant', content: message.content }
  ));

const buildToolSet = (specs: ModelToolSpec[]): ToolSet => {
  const tools: ToolSet = {};
  specs.forEach((spec) => {
    // no execute: the agent runs the call itself after injecting session values
    tools[spec.name] = tool({
      description: spec.description,
      inputSchema: jsonSchema<Record<string, unknown>>(spec.inputSchema),
    });
  });
  return tools;
};

export class AiSdkModelClient implements ModelClient {
  readonly remoteIdentifier: string;
  private readonly config: ModelConfig;
  private readonly model: LanguageModel;
  private readonly onLog?: LogSink;

  constructor(config: ModelConfig, opts: AiSdkModelClientOptions = {}) {
    this.config = config;
    this.model = opts.languageModel ?? createLanguageModel(config);
    this.onLog = opts.onLog;
    this.remoteIdentifier = describeModel(config);
  }

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    const tools = request.tools ?? [];
    const startedAt = Date.now();
    this.log('TRC', 'request', `messages=${String(request.messages.length)} tools=${String(tools.length)}`, request);

    let text: string;
    let nativeCall: { name: string; input: unknown } | undefined;
    try {
      const result = await generateText({
        model: this.model,
        system: request.systemPrompt,
        messages: toModelMessages(request.messages),
        ...(tools.length > 0 ? { tools: buildToolSet(tools), toolChoice: 'auto' as const } : {}),
        temperature: this.config.temperature,
        maxRetries: 0,
        abortSignal: request.signal,
      });
      text = result.text;
      const first = result.toolCalls.at(0);
      if (first !== undefined) nativeCall = { name: first.toolName, input: first.input };
    } catch (error) {
      if (request.signal?.aborted === true) throw error;
      const mapped = mapModelError(error, { timeoutMs: this.config.timeoutMs });
      this.log('WRN', 'response', `model call failed after ${String(Date.now() - startedAt)}ms: ${mapped.message}`, request);
      throw mapped;
    }

    this.log('VRB', 'response', `completed in ${String(Date.now() - startedAt)}ms${nativeCall !== undefined ? `, tool call '${nativeCall.name}'` : ''}`, request);

    if (nativeCall !== undefined) {
      if (!isPlainObject(nativeCall.input)) {
        throw new ModelCallError('invalid_response', `Model proposed '${nativeCall.name}' with non-object arguments`);
      }
      return { text, toolCall: { name: nativeCall.name, arguments: nativeCall.input } };
    }

    if (tools.length === 0) return { text };
    const leaked = tryExtractLeakedToolCalls(text, { knownToolNames: new Set(tools.map((spec) => spec.name)) });
    const leakedCall = leaked.toolCalls.at(0);
    if (leakedCall === undefined) return { text };
    this.log('WRN', 'response', `recovered tool call '${leakedCall.name}' from text (${leaked.patternsMatched.join(', ')})`, request);
    return { text: leaked.content ?? '', toolCall: leakedCall };
  }

  private log(severity: LogEntry['severity'], direction: LogEntry['direction'], message: string, request: ModelRequest): void {
    const entry = buildLogEntry({
      severity,
      direction,
      type: 'llm',
      remoteIdentifier: this.remoteIdentifier,
      message,
      ...(request.dispatchId !== undefined ? { dispatchId: request.dispatchId } : {}),
      ...(request.sessionId !== undefined ? { sessionId: request.sessionId } : {}),
    });
    try { this.onLog?.(entry); } catch (e) { warn(`llm onLog failed: ${describeError(e)}`); }
  }
}

/**
 * Read a completion as a tool decision. A tool call always wins over text;
 * whether the name exists in the catalog is decided by the caller.
 */
export function toDecision(completion: ModelCompletion): ModelDecision {
  if (completion.toolCall === undefined) return { kind: 'no_tool', text: completion.text };
  return {
    kind: 'tool_call',
    text: completion.text,
    proposal: { toolName: completion.toolCall.name, arguments: completion.toolCall.arguments },
  };
}
