import type { ToolDescriptor } from '../types.js';

export interface ToolCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Boundary to the remote tool server. Implementations never retry a call.
 */
export interface ToolServerClient {
  readonly remoteIdentifier: string;
  /** Raw `tools/list` entries; parsing and validation happen in the registry. */
  listTools: () => Promise<unknown[]>;
  /** Returns the tool's raw payload or throws `ToolExecutionError`. */
  callTool: (descriptor: ToolDescriptor, args: Record<string, unknown>, opts?: ToolCallOptions) => Promise<unknown>;
  close: () => Promise<void>;
}
