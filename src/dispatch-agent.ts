import crypto from 'node:crypto';

import type { DispatchError, TimeoutStage } from './dispatch-errors.js';
import type { ModelClient, ModelCompletion, ModelRequest } from './llm-client.js';
import type { ToolCatalog } from './tools/tool-catalog.js';
import type { ToolCallOptions } from './tools/types.js';
import type { ModelCallPurpose, TraceEvent, TraceRecorder } from './trace/trace-events.js';
import type {
  DispatchRequest,
  DispatchResponse,
  DispatchState,
  LogEntry,
  LogSink,
  ToolInvocationResult,
} from './types.js';

import { buildDecisionPrompt, buildToolAnswerMessage } from './dispatch-prompts.js';
import {
  CanceledError,
  DISPATCH_ERROR_KIND_MEANINGS,
  ModelCallError,
  TimeoutError,
  UnknownToolError,
  describeError,
  isDispatchError,
  toDispatchError,
} from './dispatch-errors.js';
import { toDecision } from './llm-client.js';
import { mapModelError } from './llm-providers/llm-error-mapping.js';
import { buildLogEntry } from './logging/log-entry.js';
import { degradedResult, normalize, toToolResponse } from './response-normalizer.js';
import { inject } from './session-injector.js';
import { isExecutedFailure, isToolExecutionError, toToolExecutionError } from './tools/tool-errors.js';
import { NOOP_TRACE_RECORDER } from './trace/trace-emitter.js';
import { warn } from './utils.js';

/** The part of the registry a dispatch needs. */
export interface ToolInvoker {
  invoke(catalog: ToolCatalog, toolName: string, args: Record<string, unknown>, opts?: ToolCallOptions): Promise<unknown>;
}

export interface DispatchAgentConfig {
  modelTimeoutMs: number;
  toolTimeoutMs: number;
  summaryMaxBytes: number;
  fallbackAnswer: string;
}

export interface DispatchAgentOptions {
  model: ModelClient;
  tools: ToolInvoker;
  config: DispatchAgentConfig;
  tracer?: TraceRecorder;
  onLog?: LogSink;
  idFactory?: () => string;
  now?: () => number;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export type DispatchOutcome =
  | {
    status: 'completed';
    dispatchId: string;
    answer: string;
    usedTool?: string;
    toolResult?: ToolInvocationResult;
    states: DispatchState[];
  }
  | {
    status: 'failed';
    dispatchId: string;
    answer: string;
    error: DispatchError;
    states: DispatchState[];
  };

interface DispatchContext {
  readonly dispatchId: string;
  readonly request: DispatchRequest;
  readonly startedAt: number;
  readonly states: DispatchState[];
}

type CompletedRun = Omit<Extract<DispatchOutcome, { status: 'completed' }>, 'dispatchId' | 'states'>;

/**
 * Run `fn` under its own abort signal, which fires when `timeoutMs` passes or
 * the parent signal aborts. The stage settles as soon as either happens,
 * even if `fn` ignores its signal.
 */
async function runStage<T>(
  stage: TimeoutStage,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (parent?.aborted === true) throw new CanceledError();
  const controller = new AbortController();
  let timedOut = false;
  const onParentAbort = (): void => { controller.abort(); };
  parent?.addEventListener('abort', onParentAbort, { once: true });
  const interrupted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => {
      reject(timedOut ? new TimeoutError(stage, timeoutMs) : new CanceledError());
    }, { once: true });
  });
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  try {
    return await Promise.race([fn(controller.signal), interrupted]);
  } catch (error) {
    if (timedOut) throw new TimeoutError(stage, timeoutMs);
    if (parent?.aborted === true) throw new CanceledError();
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Decides, per request, between a direct answer and exactly one tool call.
 *
 * The catalog is passed in per dispatch so a concurrent reload never changes
 * the tools a running dispatch sees.
 */
export class DispatchAgent {
  private readonly model: ModelClient;
  private readonly tools: ToolInvoker;
  private readonly config: DispatchAgentConfig;
  private readonly tracer: TraceRecorder;
  private readonly onLog?: LogSink;
  private readonly idFactory: () => string;
  private readonly now: () => number;

  constructor(opts: DispatchAgentOptions) {
    this.model = opts.model;
    this.tools = opts.tools;
    this.config = opts.config;
    this.tracer = opts.tracer ?? NOOP_TRACE_RECORDER;
    this.onLog = opts.onLog;
    this.idFactory = opts.idFactory ?? (() => crypto.randomUUID());
    this.now = opts.now ?? Date.now;
  }

  async dispatch(request: DispatchRequest, catalog: ToolCatalog, opts: DispatchOptions = {}): Promise<DispatchOutcome> {
    const ctx: DispatchContext = {
      dispatchId: this.idFactory(),
      request,
      startedAt: this.now(),
      states: [],
    };
    this.transition(ctx, 'START', `catalog v${String(catalog.version)}`);

    try {
      const run = await this.run(ctx, catalog, opts.signal);
      this.transition(ctx, 'DONE', run.usedTool !== undefined ? `answered with '${run.usedTool}'` : 'answered directly');
      this.emit(ctx, {
        type: 'DispatchCompleted',
        status: 'completed',
        usedTool: run.usedTool ?? null,
        durationMs: this.now() - ctx.startedAt,
        states: [...ctx.states],
      });
      return { ...run, dispatchId: ctx.dispatchId, states: ctx.states };
    } catch (raw) {
      const error = toDispatchError(raw, (message, cause) => new ModelCallError('invalid_response', message, cause));
      this.transition(ctx, 'FAILED', `${error.kind}: ${error.message}`, 'WRN', { meaning: DISPATCH_ERROR_KIND_MEANINGS[error.kind].summary });
      this.emit(ctx, {
        type: 'DispatchCompleted',
        status: 'failed',
        usedTool: null,
        durationMs: this.now() - ctx.startedAt,
        states: [...ctx.states],
        errorKind: error.kind,
      });
      return {
        status: 'failed',
        dispatchId: ctx.dispatchId,
        answer: this.config.fallbackAnswer,
        error,
        states: ctx.states,
      };
    }
  }

  private async run(ctx: DispatchContext, catalog: ToolCatalog, signal?: AbortSignal): Promise<CompletedRun> {
    const { request } = ctx;

    this.transition(ctx, 'DECIDING');
    const modelTools = catalog.modelTools();
    const decision = toDecision(await this.callModel(ctx, 'decide', {
      systemPrompt: buildDecisionPrompt(request.systemPrompt, catalog),
      messages: [{ role: 'user', content: request.userQuery }],
      ...(modelTools.length > 0 ? { tools: modelTools } : {}),
    }, signal));

    if (decision.kind === 'no_tool') {
      this.transition(ctx, 'NO_TOOL');
      this.transition(ctx, 'ANSWERING_DIRECT');
      return { status: 'completed', answer: decision.text };
    }

    const { proposal } = decision;
    this.transition(ctx, 'TOOL_SELECTED', `'${proposal.toolName}'`);
    const descriptor = catalog.get(proposal.toolName);
    if (descriptor === undefined) throw new UnknownToolError(proposal.toolName);

    this.transition(ctx, 'INJECTING');
    const args = inject(descriptor, proposal, request.sessionId);

    this.transition(ctx, 'EXECUTING');
    const startedAt = this.now();
    const rawPayload = await this.invokeTool(ctx, catalog, descriptor.name, args, signal);

    this.transition(ctx, 'NORMALIZING');
    const invocation = this.normalizePayload(ctx, descriptor.name, rawPayload);
    this.emit(ctx, {
      type: 'ToolCallCompleted',
      toolName: descriptor.name,
      durationMs: this.now() - startedAt,
      shape: invocation.shape,
      truncated: invocation.truncated,
      degraded: invocation.degraded,
    });

    this.transition(ctx, 'ANSWERING_WITH_TOOL');
    const completion = await this.callModel(ctx, 'answer', {
      systemPrompt: request.systemPrompt,
      messages: [{ role: 'user', content: buildToolAnswerMessage(request.userQuery, descriptor.name, invocation) }],
    }, signal);

    return { status: 'completed', answer: completion.text, usedTool: descriptor.name, toolResult: invocation };
  }

  private normalizePayload(ctx: DispatchContext, toolName: string, rawPayload: unknown): ToolInvocationResult {
    try {
      return normalize(toolName, rawPayload, { maxBytes: this.config.summaryMaxBytes });
    } catch (error) {
      if (!isDispatchError(error) || !DISPATCH_ERROR_KIND_MEANINGS[error.kind].absorbed) throw error;
      this.log(ctx, 'WRN', `${error.message}; using raw payload`);
      return degradedResult(rawPayload, this.config.summaryMaxBytes);
    }
  }

  private async callModel(
    ctx: DispatchContext,
    purpose: ModelCallPurpose,
    request: Omit<ModelRequest, 'signal' | 'dispatchId' | 'sessionId'>,
    signal?: AbortSignal
  ): Promise<ModelCompletion> {
    const model = this.model.remoteIdentifier;
    const startedAt = this.now();
    this.emit(ctx, { type: 'ModelCallStarted', purpose, model });
    try {
      const completion = await runStage('model', this.config.modelTimeoutMs, signal, async (stageSignal) => await this.model.complete({
        ...request,
        signal: stageSignal,
        dispatchId: ctx.dispatchId,
        sessionId: ctx.request.sessionId,
      }));
      this.emit(ctx, {
        type: 'ModelCallCompleted',
        purpose,
        model,
        durationMs: this.now() - startedAt,
        outcome: 'ok',
        ...(completion.toolCall !== undefined ? { toolProposed: completion.toolCall.name } : {}),
      });
      return completion;
    } catch (raw) {
      const error = mapModelError(raw, { timeoutMs: this.config.modelTimeoutMs });
      this.emit(ctx, {
        type: 'ModelCallCompleted',
        purpose,
        model,
        durationMs: this.now() - startedAt,
        outcome: 'error',
        errorKind: error.kind,
      });
      throw error;
    }
  }

  private async invokeTool(
    ctx: DispatchContext,
    catalog: ToolCatalog,
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const startedAt = this.now();
    const timeoutMs = this.config.toolTimeoutMs;
    this.emit(ctx, { type: 'ToolCallStarted', toolName, argumentNames: Object.keys(args) });
    try {
      return await runStage('tool', timeoutMs, signal, async (stageSignal) =>
        await this.tools.invoke(catalog, toolName, args, { signal: stageSignal, timeoutMs }));
    } catch (raw) {
      const error = this.mapToolFailure(toolName, raw, signal);
      this.emit(ctx, {
        type: 'ToolCallFailed',
        toolName,
        durationMs: this.now() - startedAt,
        errorKind: error.kind,
        message: error.message,
        executed: isToolExecutionError(error) ? isExecutedFailure(error.failure) : error.kind === 'timeout',
      });
      throw error;
    }
  }

  private mapToolFailure(toolName: string, error: unknown, signal?: AbortSignal): DispatchError {
    if (isToolExecutionError(error)) {
      if (error.failure === 'timeout') return new TimeoutError('tool', this.config.toolTimeoutMs);
      if (error.failure === 'canceled' && signal?.aborted === true) return new CanceledError();
      return error;
    }
    if (isDispatchError(error)) return error;
    return toToolExecutionError(toolName, error);
  }

  private transition(
    ctx: DispatchContext,
    state: DispatchState,
    detail?: string,
    severity: LogEntry['severity'] = 'VRB',
    details?: LogEntry['details']
  ): void {
    ctx.states.push(state);
    this.log(ctx, severity, detail !== undefined ? `${state} ${detail}` : state, state, details);
  }

  private emit(ctx: DispatchContext, event: DistributiveOmit<TraceEvent, 'correlationId' | 'dispatchId' | 'timestamp'>): void {
    try {
      this.tracer.record({
        ...event,
        correlationId: ctx.request.sessionId,
        dispatchId: ctx.dispatchId,
        timestamp: this.now(),
      });
    } catch (error) {
      warn(`trace record failed: ${describeError(error)}`);
    }
  }

  private log(
    ctx: DispatchContext,
    severity: LogEntry['severity'],
    message: string,
    state?: DispatchState,
    details?: LogEntry['details']
  ): void {
    const entry = buildLogEntry({
      severity,
      type: 'agent',
      remoteIdentifier: 'dispatch',
      message,
      dispatchId: ctx.dispatchId,
      sessionId: ctx.request.sessionId,
      ...(state !== undefined ? { state } : {}),
      ...(details !== undefined ? { details } : {}),
    });
    try { this.onLog?.(entry); } catch (e) { warn(`dispatch onLog failed: ${describeError(e)}`); }
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** The JSON body returned to the backend. */
export function toWireResponse(outcome: DispatchOutcome): DispatchResponse {
  if (outcome.status === 'failed') {
    return { answer: outcome.answer, error: { kind: outcome.error.kind, message: outcome.error.message } };
  }
  if (outcome.usedTool === undefined || outcome.toolResult === undefined) {
    return { answer: outcome.answer, tool_response: null, used_tool: null };
  }
  return {
    answer: outcome.answer,
    tool_response: toToolResponse(outcome.usedTool, outcome.toolResult),
    used_tool: outcome.usedTool,
  };
}
