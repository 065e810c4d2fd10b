import type { DispatchAgent, DispatchOptions, DispatchOutcome } from './dispatch-agent.js';
import type { ToolCatalog } from './tools/tool-catalog.js';
import type { ToolRegistry } from './tools/tool-registry.js';
import type { DispatchRequest } from './types.js';

/**
 * Binds the agent to the registry's current snapshot. Each dispatch takes
 * the snapshot once at its start; a reload only affects later dispatches.
 */
export class DispatchService {
  private readonly registry: ToolRegistry;
  private readonly agent: DispatchAgent;

  constructor(opts: { registry: ToolRegistry; agent: DispatchAgent }) {
    this.registry = opts.registry;
    this.agent = opts.agent;
  }

  catalog(): ToolCatalog {
    return this.registry.snapshot();
  }

  async dispatch(request: DispatchRequest, opts: DispatchOptions = {}): Promise<DispatchOutcome> {
    return await this.agent.dispatch(request, this.registry.snapshot(), opts);
  }

  async reload(): Promise<ToolCatalog> {
    return await this.registry.reload();
  }
}
