import { jsonrepair } from 'jsonrepair';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

// Object literal or Object.create(null); class instances, Maps and Dates are excluded
export const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  if (!isPlainObject(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

export const stripSurroundingCodeFence = (value: string): string | undefined => {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/iu.exec(value);
  return match !== null ? match[1] : undefined;
};

// Outermost span between the first `open` and the last `close`
const extractOutermostSpan = (value: string, open: string, close: string): string | undefined => {
  const start = value.indexOf(open);
  const end = value.lastIndexOf(close);
  if (start === -1 || end <= start) return undefined;
  return value.slice(start, end + 1);
};

export interface JsonParseDiagnostics {
  value?: unknown;
  repairs: string[];
  error?: string;
  originalText?: string;
}

const tryRepairJson = (text: string): Record<string, unknown> | unknown[] | undefined => {
  try {
    const value = tryParseJson(jsonrepair(text));
    return isPlainObject(value) || Array.isArray(value) ? value : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Decode text that is expected to carry JSON.
 *
 * Candidates are tried in order: the whole text, the text inside a code fence,
 * the outermost `{…}` span and the outermost `[…]` span. Each candidate is
 * parsed strictly; `jsonrepair` only runs on the whole (unfenced) text, once
 * every strict parse failed.
 */
export const parseJsonValueDetailed = (raw: unknown): JsonParseDiagnostics => {
  if (isPlainObject(raw) || Array.isArray(raw)) {
    return { value: raw, repairs: [] };
  }
  if (typeof raw !== 'string') {
    return { repairs: [], error: 'non_string' };
  }
  const originalText = raw.trim();
  if (originalText.length === 0) {
    return { repairs: [], error: 'empty', originalText };
  }

  const fenced = stripSurroundingCodeFence(originalText);
  const base = fenced ?? originalText;
  const baseSteps = fenced !== undefined ? ['stripCodeFence'] : [];
  const candidates: { text: string; steps: string[] }[] = [];
  const seen = new Set<string>();
  const enqueue = (text: string | undefined, steps: string[]): void => {
    if (text === undefined) return;
    const normalized = text.trim();
    if (normalized.length === 0 || seen.has(normalized)) return;
    seen.add(normalized);
    candidates.push({ text: normalized, steps });
  };
  enqueue(base, baseSteps);
  enqueue(extractOutermostSpan(base, '{', '}'), [...baseSteps, 'extractObject']);
  enqueue(extractOutermostSpan(base, '[', ']'), [...baseSteps, 'extractArray']);

  const strict = candidates.find((candidate) => tryParseJson(candidate.text) !== undefined);
  if (strict !== undefined) {
    return { value: tryParseJson(strict.text), repairs: strict.steps, originalText };
  }

  // jsonrepair turns almost any text into a JSON string; only accept structured results.
  // Spans cut out of prose are never repaired: they stay text unless they parse as they are.
  const repaired = /^[[{]/.test(base) ? tryRepairJson(base) : undefined;
  if (repaired !== undefined) return { value: repaired, repairs: [...baseSteps, 'jsonrepair'], originalText };

  return { repairs: [], error: 'parse_failed', originalText };
};

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* a failing warning sink has nowhere left to report */
  }
}

export const utf8ByteLength = (value: string): number => Buffer.byteLength(value, 'utf8');

export const sleepWithAbort = async (ms: number, signal?: AbortSignal): Promise<'done' | 'aborted'> => {
  if (signal?.aborted === true) return 'aborted';
  if (ms <= 0) return 'done';
  return await new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve('aborted');
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve('done');
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
