import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod/v3';

import type { Configuration, ToolServerTransport } from './types.js';

import { isPlainObject } from './utils.js';

export const DEFAULT_CONFIG_FILE = 'mcp-dispatch.json';
export const DEFAULT_FALLBACK_ANSWER = "I couldn't complete that action right now.";

const ModelSchema = z.object({
  provider: z.enum(['ollama', 'openai']).default('ollama'),
  baseUrl: z.string().url(),
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.3),
  timeoutMs: z.number().int().positive().default(300_000),
});

const ToolServerSchema = z.object({
  type: z.enum(['http', 'sse', 'stdio']).optional(),
  url: z.string().url().optional(),
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  headers: z.record(z.string(), z.string()).default({}),
  timeoutMs: z.number().int().positive().default(60_000),
  connectRetries: z.number().int().min(1).default(5),
  // tool name -> parameters that always receive the caller's session id
  sessionReferences: z.record(z.string(), z.array(z.string().min(1))).default({}),
}).superRefine((value, ctx) => {
  if (value.type === 'stdio' || (value.type === undefined && value.url === undefined)) {
    if (value.command === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'a tool server url (or a stdio command) is required' });
    }
    return;
  }
  if (value.url === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: `transport '${value.type ?? 'http'}' requires a url` });
  }
}).transform((value) => ({ ...value, type: inferTransport(value) }));

const DispatchSchema = z.object({
  summaryMaxBytes: z.number().int().min(256).default(4096),
  fallbackAnswer: z.string().min(1).default(DEFAULT_FALLBACK_ANSWER),
});

const ServerSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(8000),
  concurrency: z.number().int().positive().default(10),
});

const TraceSchema = z.object({
  enabled: z.boolean().default(true),
  queueCapacity: z.number().int().positive().default(1024),
  otlpEndpoint: z.string().url().optional(),
  otlpTimeoutMs: z.number().int().positive().optional(),
});

const LoggingSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console']).default('logfmt'),
  verbose: z.boolean().default(false),
});

export const ConfigurationSchema = z.object({
  model: ModelSchema,
  toolServer: ToolServerSchema,
  dispatch: DispatchSchema.default({}),
  server: ServerSchema.default({}),
  trace: TraceSchema.default({}),
  logging: LoggingSchema.default({}),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function inferTransport(value: { type?: ToolServerTransport; url?: string }): ToolServerTransport {
  if (value.type !== undefined) return value.type;
  if (typeof value.url === 'string' && value.url.length > 0) {
    return value.url.includes('/sse') ? 'sse' : 'http';
  }
  return 'stdio';
}

function expandEnv(str: string, env: NodeJS.ProcessEnv): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

function expandDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (isPlainObject(obj)) {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

const section = (root: Record<string, unknown>, key: string): Record<string, unknown> => {
  const existing = root[key];
  const copy = isPlainObject(existing) ? { ...existing } : {};
  root[key] = copy;
  return copy;
};

const nonEmpty = (value: string | undefined): value is string => typeof value === 'string' && value.trim().length > 0;

/**
 * Deployment environment variables win over the file.
 */
export function applyEnvironmentOverrides(raw: unknown, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const root: Record<string, unknown> = isPlainObject(raw) ? { ...raw } : {};
  if (nonEmpty(env.OLLAMA_BASE_URL)) section(root, 'model').baseUrl = env.OLLAMA_BASE_URL.trim();
  if (nonEmpty(env.OLLAMA_MODEL_NAME)) section(root, 'model').model = env.OLLAMA_MODEL_NAME.trim();
  if (nonEmpty(env.MCP_SERVER_URL)) section(root, 'toolServer').url = env.MCP_SERVER_URL.trim();
  if (nonEmpty(env.BACKEND_HOST)) section(root, 'server').host = env.BACKEND_HOST.trim();
  if (nonEmpty(env.PORT)) {
    const port = Number.parseInt(env.PORT, 10);
    // non-numeric values are left to schema validation
    section(root, 'server').port = Number.isNaN(port) ? env.PORT : port;
  }
  return root;
}

export interface LoadConfigurationOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function readConfigFile(options: LoadConfigurationOptions): { source: string; json: unknown } {
  const explicit = options.configPath;
  if (typeof explicit === 'string' && explicit.length > 0) {
    if (!fs.existsSync(explicit)) throw new ConfigError(`Configuration file not found: ${explicit}`);
    return { source: explicit, json: parseConfigFile(explicit) };
  }
  const local = path.join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  if (fs.existsSync(local)) return { source: local, json: parseConfigFile(local) };
  return { source: 'environment', json: {} };
}

function parseConfigFile(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read configuration file ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in configuration file ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function parseConfiguration(raw: unknown, source = 'configuration'): Configuration {
  const parsed = ConfigurationSchema.safeParse(raw);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed in ${source}`, msgs);
  }
  return parsed.data;
}

export function loadConfiguration(options: LoadConfigurationOptions = {}): Configuration {
  const env = options.env ?? process.env;
  const { source, json } = readConfigFile(options);
  const expanded = expandDeep(json, env);
  return parseConfiguration(applyEnvironmentOverrides(expanded, env), source);
}
