import type { DispatchError, ModelCallErrorReason } from '../dispatch-errors.js';

import { ModelCallError, TimeoutError, isDispatchError } from '../dispatch-errors.js';
import { isPlainObject } from '../utils.js';

export type ModelErrorKind = ModelCallErrorReason | 'timeout';

export const MODEL_ERROR_KIND_MEANINGS: Record<ModelErrorKind, { summary: string }> = {
  rate_limit: { summary: 'Too many requests to the model host.' },
  auth_error: { summary: 'Authentication or authorization failure at the model host.' },
  quota_exceeded: { summary: 'Quota or billing limit reached at the model host.' },
  model_error: { summary: 'Request rejected by the model host or model.' },
  network_error: { summary: 'Model host unreachable or the connection failed.' },
  invalid_response: { summary: 'Model host answered with output that cannot be used.' },
  timeout: { summary: 'Model host timed out the request.' },
};

// Matched in this order; the first kind with a hit wins
const KIND_PRECEDENCE: readonly ModelErrorKind[] = [
  'rate_limit',
  'auth_error',
  'quota_exceeded',
  'model_error',
  'timeout',
  'network_error',
  'invalid_response',
];

const MESSAGE_KIND_PATTERNS: Partial<Record<ModelErrorKind, string[]>> = {
  rate_limit: ['rate limit', 'ratelimit', 'rate_limit', 'too many requests', 'overload'],
  auth_error: ['authentication', 'unauthorized', 'invalid api key', 'unauthenticated', 'access denied', 'forbidden'],
  quota_exceeded: ['quota', 'billing', 'insufficient_quota', 'payment required', 'credits'],
  model_error: ['model not found', 'unknown model', 'invalid model', 'unsupported model', 'not available'],
  timeout: ['timeout', 'timed out', 'deadline exceeded', 'etimedout', 'econnaborted'],
  network_error: ['network', 'connection', 'socket hang up', 'econnrefused', 'enotfound', 'epipe', 'eai_again', 'fetch failed'],
  invalid_response: ['invalid json', 'json parse', 'no object generated', 'type validation'],
};

const STATUS_KIND_MAP = new Map<number, ModelErrorKind>([
  [429, 'rate_limit'],
  [401, 'auth_error'],
  [403, 'auth_error'],
  [402, 'quota_exceeded'],
  [400, 'model_error'],
  [404, 'model_error'],
  [408, 'timeout'],
]);

const NAME_KIND_MAP = new Map<string, ModelErrorKind>([
  ['ratelimiterror', 'rate_limit'],
  ['toomanyrequestserror', 'rate_limit'],
  ['authenticationerror', 'auth_error'],
  ['unauthorizederror', 'auth_error'],
  ['invalidapikeyerror', 'auth_error'],
  ['quotaexceedederror', 'quota_exceeded'],
  ['badrequesterror', 'model_error'],
  ['modelnotfounderror', 'model_error'],
  ['ai_nosuchmodelerror', 'model_error'],
  ['ai_unsupportedmodelversionerror', 'model_error'],
  ['timeouterror', 'timeout'],
  ['ai_jsonparseerror', 'invalid_response'],
  ['ai_typevalidationerror', 'invalid_response'],
  ['ai_invalidresponsedataerror', 'invalid_response'],
  ['ai_notoolcallerror', 'invalid_response'],
  ['ai_emptyresponsebodyerror', 'invalid_response'],
  ['networkerror', 'network_error'],
  ['connectionerror', 'network_error'],
  ['fetcherror', 'network_error'],
]);

const CODE_KIND_MAP = new Map<string, ModelErrorKind>([
  ['rate_limit_exceeded', 'rate_limit'],
  ['too_many_requests', 'rate_limit'],
  ['invalid_api_key', 'auth_error'],
  ['insufficient_quota', 'quota_exceeded'],
  ['model_not_found', 'model_error'],
  ['invalid_request_error', 'model_error'],
  ['etimedout', 'timeout'],
  ['und_err_headers_timeout', 'timeout'],
  ['econnreset', 'network_error'],
  ['econnrefused', 'network_error'],
  ['enotfound', 'network_error'],
  ['ehostunreach', 'network_error'],
  ['eai_again', 'network_error'],
  ['und_err_socket', 'network_error'],
]);

const lower = (value: string | undefined): string | undefined =>
  typeof value === 'string' ? value.trim().toLowerCase() : undefined;

export const classifyModelErrorKind = (input: { status: number; name: string; code?: string; message?: string }): ModelErrorKind | undefined => {
  const statusKind = STATUS_KIND_MAP.get(input.status);
  const nameKey = lower(input.name);
  const codeKey = lower(input.code);
  const nameKind = nameKey !== undefined ? NAME_KIND_MAP.get(nameKey) : undefined;
  const codeKind = codeKey !== undefined ? CODE_KIND_MAP.get(codeKey) : undefined;
  const message = lower(input.message) ?? '';
  const messageKind = KIND_PRECEDENCE.find((kind) =>
    (MESSAGE_KIND_PATTERNS[kind] ?? []).some((pattern) => message.includes(pattern)));

  const hit = KIND_PRECEDENCE.find((kind) =>
    statusKind === kind || nameKind === kind || codeKind === kind || messageKind === kind);
  if (hit !== undefined) return hit;
  if (input.status >= 500) return 'network_error';
  return undefined;
};

// RetryError keeps the real failure in lastError; fetch failures keep it in cause
const unwrap = (error: unknown): Record<string, unknown> | undefined => {
  let current: unknown = error;
  for (let depth = 0; depth < 4; depth++) {
    if (!isPlainObject(current)) break;
    const next: unknown = current.lastError ?? current.cause;
    if (next === undefined || next === null || typeof next !== 'object') break;
    current = next;
  }
  return isPlainObject(current) ? current : undefined;
};

const firstString = (...values: unknown[]): string | undefined =>
  values.find((value): value is string => typeof value === 'string' && value.length > 0);

const oneLine = (value: string): string => {
  const collapsed = value.replace(/\s+/g, ' ').trim();
  return collapsed.length > 200 ? `${collapsed.slice(0, 197)}...` : collapsed;
};

export interface ModelErrorFields {
  status: number;
  name: string;
  code?: string;
  message: string;
}

export function extractModelErrorFields(error: unknown): ModelErrorFields {
  const outer = isPlainObject(error) ? error : undefined;
  const primary = unwrap(error) ?? outer;
  const pick = (key: string): unknown => primary?.[key] ?? outer?.[key];
  const response = pick('response');
  const data = pick('data');
  const dataError = isPlainObject(data) && isPlainObject(data.error) ? data.error : undefined;

  const statusCandidate = [pick('statusCode'), pick('status'), isPlainObject(response) ? response.status : undefined]
    .find((value): value is number => typeof value === 'number' && Number.isFinite(value));
  const codeValue = pick('code') ?? dataError?.code;
  const code = typeof codeValue === 'number' ? String(codeValue) : firstString(codeValue);
  const name = firstString(primary?.name, outer?.name) ?? 'Error';
  const message = firstString(dataError?.message, primary?.message, outer?.message, typeof error === 'string' ? error : undefined)
    ?? 'Unknown error';
  return { status: statusCandidate ?? 0, name, ...(code !== undefined ? { code } : {}), message: oneLine(message) };
}

/**
 * Convert whatever the model SDK threw into a dispatch error.
 * Errors that already are dispatch errors pass through untouched.
 */
export function mapModelError(error: unknown, opts: { timeoutMs: number }): DispatchError {
  if (isDispatchError(error)) return error;
  const fields = extractModelErrorFields(error);
  const kind = classifyModelErrorKind(fields) ?? 'model_error';
  if (kind === 'timeout') return new TimeoutError('model', opts.timeoutMs);
  const prefix = [
    fields.status > 0 ? String(fields.status) : undefined,
    fields.code !== undefined ? `[${fields.code}]` : undefined,
  ].filter((part): part is string => part !== undefined).join(' ');
  return new ModelCallError(kind, prefix.length > 0 ? `${prefix}: ${fields.message}` : fields.message, error);
}
