import type { LogEntry, LogSink } from '../types.js';
import type { ToolCallOptions, ToolServerClient } from './types.js';

import { RegistryUnavailableError, UnknownToolError, describeError, isDispatchError } from '../dispatch-errors.js';
import { buildLogEntry } from '../logging/log-entry.js';
import { sleepWithAbort, warn } from '../utils.js';

import { parseToolCatalog } from './descriptor-parser.js';
import { ToolCatalog } from './tool-catalog.js';

export const LOAD_BACKOFF_MS = [0, 1000, 2000, 5000, 10000, 30000, 60000] as const;

export interface ToolRegistryOptions {
  client: ToolServerClient;
  sessionReferences?: Readonly<Record<string, readonly string[]>>;
  onLog?: LogSink;
  backoffMs?: readonly number[];
  sleep?: (ms: number, signal?: AbortSignal) => Promise<'done' | 'aborted'>;
}

export interface LoadWithRetryOptions {
  attempts: number;
  signal?: AbortSignal;
}

/**
 * Owns the current catalog snapshot and the path to the tool server.
 */
export class ToolRegistry {
  private readonly client: ToolServerClient;
  private readonly sessionReferences?: Readonly<Record<string, readonly string[]>>;
  private readonly onLog?: LogSink;
  private readonly backoffMs: readonly number[];
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<'done' | 'aborted'>;
  private current: ToolCatalog = ToolCatalog.empty();
  private nextVersion = 1;
  private inflight?: Promise<ToolCatalog>;

  constructor(opts: ToolRegistryOptions) {
    this.client = opts.client;
    this.sessionReferences = opts.sessionReferences;
    this.onLog = opts.onLog;
    this.backoffMs = opts.backoffMs ?? LOAD_BACKOFF_MS;
    this.sleep = opts.sleep ?? sleepWithAbort;
  }

  /** The snapshot dispatches should use right now. */
  snapshot(): ToolCatalog {
    return this.current;
  }

  /**
   * Fetch the catalog once and install it. Throws `RegistryUnavailableError`.
   * Concurrent callers share one fetch.
   */
  async load(): Promise<ToolCatalog> {
    if (this.inflight !== undefined) return await this.inflight;
    const pending = this.fetchCatalog();
    this.inflight = pending;
    try {
      const catalog = await pending;
      this.current = catalog;
      this.log('VRB', `catalog v${String(catalog.version)} installed: ${catalog.names().join(', ') || '(empty)'}`);
      return catalog;
    } finally {
      this.inflight = undefined;
    }
  }

  /** Same as `load`; a failure leaves the previous snapshot in place. */
  async reload(): Promise<ToolCatalog> {
    const previous = this.current;
    try {
      return await this.load();
    } catch (error) {
      this.log('WRN', `catalog reload failed, keeping v${String(previous.version)}: ${describeError(error)}`);
      throw error;
    }
  }

  async loadWithRetry(opts: LoadWithRetryOptions): Promise<ToolCatalog> {
    const attempts = Math.max(1, Math.floor(opts.attempts));
    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt++) {
      const delay = this.backoffMs[Math.min(attempt, this.backoffMs.length - 1)] ?? 0;
      if (attempt > 0 && delay > 0) {
        this.log('WRN', `retrying catalog load in ${String(delay)}ms (attempt ${String(attempt + 1)}/${String(attempts)})`);
        if (await this.sleep(delay, opts.signal) === 'aborted') break;
      }
      try {
        return await this.load();
      } catch (error) {
        lastError = error;
        this.log('WRN', `catalog load attempt ${String(attempt + 1)}/${String(attempts)} failed: ${describeError(error)}`);
      }
    }
    if (lastError instanceof RegistryUnavailableError) throw lastError;
    throw new RegistryUnavailableError(
      lastError === undefined ? 'Catalog load aborted' : `Catalog load failed: ${describeError(lastError)}`,
      lastError
    );
  }

  /**
   * Run one tool call against `catalog`. Never retries.
   */
  async invoke(catalog: ToolCatalog, toolName: string, args: Record<string, unknown>, opts?: ToolCallOptions): Promise<unknown> {
    const descriptor = catalog.get(toolName);
    if (descriptor === undefined) throw new UnknownToolError(toolName);
    return await this.client.callTool(descriptor, args, opts);
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async fetchCatalog(): Promise<ToolCatalog> {
    let rawTools: unknown[];
    try {
      rawTools = await this.client.listTools();
    } catch (error) {
      if (isDispatchError(error)) throw error;
      throw new RegistryUnavailableError(`Tool server unreachable: ${describeError(error)}`, error);
    }
    const { descriptors, warnings } = parseToolCatalog(rawTools, { sessionReferences: this.sessionReferences });
    warnings.forEach((message) => { this.log('WRN', message); });
    const catalog = new ToolCatalog(descriptors, { version: this.nextVersion });
    this.nextVersion += 1;
    return catalog;
  }

  private log(severity: LogEntry['severity'], message: string): void {
    const entry = buildLogEntry({ severity, type: 'tool', remoteIdentifier: this.client.remoteIdentifier, message });
    try { this.onLog?.(entry); } catch (e) { warn(`registry onLog failed: ${describeError(e)}`); }
  }
}
