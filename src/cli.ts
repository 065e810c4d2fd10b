#!/usr/bin/env node
import crypto from 'node:crypto';
import { createRequire } from 'node:module';

import { Command, Option } from 'commander';

import type { Configuration, LogFormat } from './types.js';
import type { CommanderError } from 'commander';

import { ConfigError, loadConfiguration } from './config.js';
import { toWireResponse } from './dispatch-agent.js';
import { describeError } from './dispatch-errors.js';
import { RestHeadend } from './headends/rest-headend.js';
import { buildLogEntry } from './logging/log-entry.js';
import { createRuntime } from './runtime.js';
import { ShutdownController } from './shutdown-controller.js';

const requireModule = createRequire(import.meta.url);
const { version: VERSION } = requireModule('../package.json') as { version: string };

const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  logFormat?: LogFormat;
}

let hasExited = false;
function exitWith(code: number, reason: string): never {
  process.stderr.write(`mcp-dispatch: ${reason}\n`);
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const program = new Command();

program.exitOverride((err: CommanderError) => {
  // --help and --version exit through here with code 0
  if (err.exitCode === 0) process.exit(0);
  exitWith(err.exitCode, err.message);
});

program
  .name('mcp-dispatch')
  .description('Answer chat requests directly or through one MCP tool call')
  .version(VERSION)
  .option('-c, --config <file>', 'configuration file (default ./mcp-dispatch.json)')
  .option('-v, --verbose', 'include verbose and trace log entries')
  .addOption(new Option('--log-format <format>', 'log output format').choices(['logfmt', 'json', 'console']));

function resolveConfiguration(): Configuration {
  const globals = program.opts<GlobalOptions>();
  let config: Configuration;
  try {
    config = loadConfiguration({ configPath: globals.config });
  } catch (err) {
    if (err instanceof ConfigError) exitWith(1, err.message);
    throw err;
  }
  return {
    ...config,
    logging: {
      format: globals.logFormat ?? config.logging.format,
      verbose: globals.verbose === true || config.logging.verbose,
    },
  };
}

program
  .command('serve')
  .description('load the tool catalog and serve the REST API')
  .option('-p, --port <port>', 'listen port (overrides configuration)', (value) => Number.parseInt(value, 10))
  .action(async (opts: { port?: number }) => {
    const config = resolveConfiguration();
    const runtime = await createRuntime(config, { mode: 'server', color: process.stderr.isTTY });
    const shutdown = new ShutdownController();
    shutdown.register('runtime', async () => { await runtime.close(); });

    try {
      const catalog = await runtime.registry.loadWithRetry({ attempts: config.toolServer.connectRetries, signal: shutdown.signal });
      runtime.log(buildLogEntry({
        severity: 'FIN',
        type: 'tool',
        remoteIdentifier: 'catalog',
        message: `loaded ${String(catalog.size)} tools: ${catalog.names().join(', ')}`,
      }));
    } catch (err) {
      await shutdown.shutdown({ logger: runtime.log });
      exitWith(1, `tool catalog unavailable: ${describeError(err)}`);
    }

    const headend = new RestHeadend(runtime.service, {
      host: config.server.host,
      port: opts.port ?? config.server.port,
      concurrency: config.server.concurrency,
    });
    try {
      await headend.start({ log: runtime.log, shutdownSignal: shutdown.signal });
    } catch (err) {
      await shutdown.shutdown({ logger: runtime.log });
      exitWith(1, `failed to start REST API: ${describeError(err)}`);
    }
    shutdown.register('rest', async () => { await headend.stop(); });

    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      runtime.log(buildLogEntry({
        severity: 'WRN',
        direction: 'request',
        type: 'server',
        remoteIdentifier: 'signal',
        message: `${signal} received, shutting down`,
      }));
      await shutdown.shutdown({ logger: runtime.log });
    };
    (['SIGINT', 'SIGTERM'] as const).forEach((sig) => {
      process.once(sig, () => { void handleSignal(sig); });
    });

    const closed = await headend.closed;
    await shutdown.shutdown({ logger: runtime.log });
    if (closed.reason === 'error') exitWith(1, `REST API failed: ${closed.error.message}`);
  });

program
  .command('list-tools')
  .description('print the tool catalog')
  .option('--json', 'print descriptors as JSON')
  .action(async (opts: { json?: boolean }) => {
    const config = resolveConfiguration();
    const runtime = await createRuntime(config, { mode: 'cli', color: process.stderr.isTTY });
    try {
      const catalog = await runtime.registry.loadWithRetry({ attempts: 1 });
      if (opts.json === true) {
        process.stdout.write(`${JSON.stringify(catalog.list(), null, 2)}\n`);
        return;
      }
      catalog.list().forEach((descriptor) => {
        const params = descriptor.parameters
          .map((param) => `${param.name}${param.required ? '' : '?'}: ${param.type}${param.isSessionReference ? ' [session]' : ''}`)
          .join(', ');
        process.stdout.write(`${descriptor.name}(${params})${descriptor.description.length > 0 ? ` - ${descriptor.description}` : ''}\n`);
      });
    } catch (err) {
      process.exitCode = 1;
      process.stderr.write(`mcp-dispatch: ${describeError(err)}\n`);
    } finally {
      await runtime.close();
    }
  });

program
  .command('ask')
  .description('run one dispatch and print the JSON response')
  .argument('<query>', 'user query')
  .option('-s, --system <prompt>', 'system prompt', DEFAULT_SYSTEM_PROMPT)
  .option('--session <uuid>', 'session id passed to session-reference parameters')
  .action(async (query: string, opts: { system: string; session?: string }) => {
    const config = resolveConfiguration();
    const runtime = await createRuntime(config, { mode: 'cli', color: process.stderr.isTTY });
    const abortController = new AbortController();
    const onSigint = (): void => { abortController.abort(); };
    process.once('SIGINT', onSigint);
    try {
      await runtime.registry.loadWithRetry({ attempts: config.toolServer.connectRetries, signal: abortController.signal });
      const outcome = await runtime.service.dispatch({
        systemPrompt: opts.system,
        userQuery: query,
        sessionId: opts.session ?? crypto.randomUUID(),
      }, { signal: abortController.signal });
      process.stdout.write(`${JSON.stringify(toWireResponse(outcome), null, 2)}\n`);
      if (outcome.status === 'failed') process.exitCode = 1;
    } catch (err) {
      process.exitCode = 1;
      process.stderr.write(`mcp-dispatch: ${describeError(err)}\n`);
    } finally {
      process.off('SIGINT', onSigint);
      await runtime.close();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  exitWith(1, describeError(err));
});
