import type { PayloadShape, ToolInvocationResult } from './types.js';

import { UnparseableResponseError } from './dispatch-errors.js';
import { clipToBytes, truncateToBytes } from './truncation.js';
import { isPlainObject, isPlainRecord, parseJsonValueDetailed, utf8ByteLength } from './utils.js';

export const DEFAULT_SUMMARY_MAX_BYTES = 4096;

export interface NormalizeOptions {
  maxBytes?: number;
}

type Scalar = string | number | boolean | null;

type ShapedPayload =
  | { shape: 'scalar'; value: Scalar }
  | { shape: 'record'; value: Record<string, unknown> }
  | { shape: 'records'; value: unknown[] };

const isScalar = (value: unknown): value is Scalar =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// [{ type: 'text', text }] as produced by MCP content lists
const isTextChunkList = (value: unknown): value is { type: 'text'; text: string }[] =>
  Array.isArray(value)
  && value.length > 0
  && value.every((part) => isPlainObject(part) && part.type === 'text' && typeof part.text === 'string');

const decodeText = (text: string): unknown => {
  const parsed = parseJsonValueDetailed(text);
  return parsed.value !== undefined ? parsed.value : text;
};

function decodePayload(toolName: string, raw: unknown): unknown {
  if (raw instanceof Uint8Array) {
    let text: string;
    try {
      text = utf8Decoder.decode(raw);
    } catch {
      throw new UnparseableResponseError(toolName, 'payload bytes are not valid UTF-8');
    }
    return decodeText(text);
  }
  if (typeof raw === 'string') return decodeText(raw);
  if (isTextChunkList(raw)) return decodeText(raw.map((part) => part.text).join(''));
  // a lone content item stands for itself
  if (Array.isArray(raw) && raw.length === 1) return decodePayload(toolName, raw[0]);
  return raw;
}

// Returns a reason when the value cannot be represented as JSON data
function findUnsupported(value: unknown, path: string, ancestors: Set<object>): string | undefined {
  if (isScalar(value)) return undefined;
  if (typeof value !== 'object') return `${path} is a ${typeof value}`;
  if (ancestors.has(value)) return `${path} is a circular reference`;
  if (!Array.isArray(value) && !isPlainRecord(value)) return `${path} is not a plain record`;
  ancestors.add(value);
  try {
    const entries: [string, unknown][] = Array.isArray(value)
      ? value.map((item, idx) => [`${path}[${String(idx)}]`, item])
      : Object.entries(value).map(([key, item]) => [`${path}.${key}`, item]);
    return entries.reduce<string | undefined>(
      (found, [childPath, child]) => found ?? findUnsupported(child, childPath, ancestors),
      undefined
    );
  } finally {
    ancestors.delete(value);
  }
}

function classify(toolName: string, value: unknown): ShapedPayload {
  if (value === undefined) throw new UnparseableResponseError(toolName, 'payload is empty');
  if (isScalar(value)) return { shape: 'scalar', value };
  const reason = findUnsupported(value, '$', new Set());
  if (reason !== undefined) throw new UnparseableResponseError(toolName, reason);
  if (Array.isArray(value)) {
    const nested = value.findIndex((item) => Array.isArray(item));
    if (nested !== -1) {
      throw new UnparseableResponseError(toolName, `$[${String(nested)}] is a nested list`);
    }
    return { shape: 'records', value };
  }
  if (isPlainRecord(value)) return { shape: 'record', value };
  throw new UnparseableResponseError(toolName, 'payload has no recognizable shape');
}

const omittedTrailer = (count: number): string => `[${String(count)} more record${count === 1 ? '' : 's'} omitted]`;

const fitText = (text: string, maxBytes: number): { text: string; truncated: boolean } => {
  if (utf8ByteLength(text) <= maxBytes) return { text, truncated: false };
  return { text: truncateToBytes(text, maxBytes) ?? clipToBytes(text, maxBytes), truncated: true };
};

/**
 * Keep whole lines while they fit; a line is only cut when not even the first one fits.
 */
function summarizeLines(lines: string[], maxBytes: number): { text: string; truncated: boolean } {
  const full = lines.join('\n');
  if (utf8ByteLength(full) <= maxBytes) return { text: full, truncated: false };

  let kept = 0;
  let used = 0;
  for (let i = 0; i < lines.length; i++) {
    const lineBytes = utf8ByteLength(lines[i]) + (kept > 0 ? 1 : 0);
    const omitted = lines.length - (i + 1);
    const trailerBytes = omitted > 0 ? utf8ByteLength(omittedTrailer(omitted)) + 1 : 0;
    if (used + lineBytes + trailerBytes > maxBytes) break;
    used += lineBytes;
    kept += 1;
  }

  const omitted = lines.length - kept;
  if (kept > 0) {
    return { text: `${lines.slice(0, kept).join('\n')}\n${omittedTrailer(omitted)}`, truncated: true };
  }

  const trailer = omitted > 1 ? `\n${omittedTrailer(omitted - 1)}` : '';
  const head = fitText(lines[0], Math.max(0, maxBytes - utf8ByteLength(trailer)));
  return { text: `${head.text}${trailer}`, truncated: true };
}

/**
 * Turn a raw tool payload into a bounded summary plus structured fields.
 *
 * Accepts a scalar or string, a single record, or a list of records (scalars
 * in the list are allowed). Strings are decoded as JSON when they carry it.
 *
 * @throws UnparseableResponseError for anything else
 */
export function normalize(toolName: string, rawPayload: unknown, options: NormalizeOptions = {}): ToolInvocationResult {
  const maxBytes = options.maxBytes ?? DEFAULT_SUMMARY_MAX_BYTES;
  const shaped = classify(toolName, decodePayload(toolName, rawPayload));

  if (shaped.shape === 'scalar') {
    const { text, truncated } = fitText(shaped.value === null ? 'null' : String(shaped.value), maxBytes);
    return result(rawPayload, shaped.shape, text, { value: shaped.value }, truncated);
  }
  if (shaped.shape === 'record') {
    const { text, truncated } = fitText(JSON.stringify(shaped.value), maxBytes);
    return result(rawPayload, shaped.shape, text, shaped.value, truncated);
  }
  if (shaped.value.length === 0) {
    return result(rawPayload, shaped.shape, '[]', { items: [], count: 0 }, false);
  }
  const lines = shaped.value.map((item) => JSON.stringify(item));
  const { text, truncated } = summarizeLines(lines, maxBytes);
  return result(rawPayload, shaped.shape, text, { items: shaped.value, count: shaped.value.length }, truncated);
}

function result(
  rawPayload: unknown,
  shape: PayloadShape,
  normalizedSummary: string,
  structuredFields: Record<string, unknown>,
  truncated: boolean
): ToolInvocationResult {
  return { rawPayload, normalizedSummary, structuredFields, shape, truncated, degraded: false };
}

const stringifyLoosely = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
  const seen = new WeakSet<object>();
  try {
    const json = JSON.stringify(value, (_key, item: unknown) => {
      if (typeof item === 'bigint') return item.toString();
      if (typeof item === 'object' && item !== null) {
        if (seen.has(item)) return '[Circular]';
        seen.add(item);
      }
      return item;
    });
    // JSON.stringify returns undefined for undefined, functions and symbols
    if (typeof json === 'string') return json;
  } catch {
    return String(value);
  }
  return String(value);
};

/** Summary of a payload the normalizer rejected, bounded the same way. */
export function fallbackSummary(rawPayload: unknown, maxBytes = DEFAULT_SUMMARY_MAX_BYTES): string {
  return fitText(stringifyLoosely(rawPayload), maxBytes).text;
}

export function degradedResult(rawPayload: unknown, maxBytes = DEFAULT_SUMMARY_MAX_BYTES): ToolInvocationResult {
  const text = stringifyLoosely(rawPayload);
  const fitted = fitText(text, maxBytes);
  return {
    rawPayload,
    normalizedSummary: fitted.text,
    structuredFields: { raw: fitted.text },
    shape: 'raw',
    truncated: fitted.truncated,
    degraded: true,
  };
}

/** The `tool_response` object handed back to the caller. */
export function toToolResponse(toolName: string, invocation: ToolInvocationResult): Record<string, unknown> {
  return {
    tool: toolName,
    shape: invocation.shape,
    summary: invocation.normalizedSummary,
    data: invocation.structuredFields,
    truncated: invocation.truncated,
    degraded: invocation.degraded,
  };
}
