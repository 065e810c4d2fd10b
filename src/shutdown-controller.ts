import type { LogSink } from './types.js';

import { describeError } from './dispatch-errors.js';
import { buildLogEntry } from './logging/log-entry.js';

export type ShutdownTask = () => Promise<void> | void;

/**
 * Ordered process teardown. Tasks run in reverse registration order, so the
 * REST listener registered last stops before the tool server it depends on.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private shutdownPromise?: Promise<void>;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public isStopping(): boolean {
    return this.shutdownPromise !== undefined;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { logger?: LogSink } = {}): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(opts.logger);
    await this.shutdownPromise;
  }

  private async performShutdown(logger?: LogSink): Promise<void> {
    this.abortController.abort();
    const entries = Array.from(this.tasks.entries()).reverse();
    for (const [name, task] of entries) {
      try {
        await task();
        logger?.(buildLogEntry({ severity: 'VRB', type: 'server', remoteIdentifier: 'shutdown', message: `${name} stopped` }));
      } catch (error) {
        logger?.(buildLogEntry({
          severity: 'WRN',
          type: 'server',
          remoteIdentifier: 'shutdown',
          message: `shutdown task '${name}' failed: ${describeError(error)}`,
        }));
      }
    }
  }
}
