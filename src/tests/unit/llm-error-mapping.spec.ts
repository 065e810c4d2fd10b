import { describe, expect, it } from 'vitest';

import { ModelCallError, TimeoutError, UnknownToolError } from '../../dispatch-errors.js';
import { classifyModelErrorKind, extractModelErrorFields, mapModelError } from '../../llm-providers/llm-error-mapping.js';
import { describeModel, normalizeOllamaBaseUrl } from '../../llm-providers/provider-factory.js';

const OPTS = { timeoutMs: 1000 };

describe('classifyModelErrorKind', () => {
  it('maps HTTP statuses', () => {
    expect(classifyModelErrorKind({ status: 429, name: 'Error' })).toBe('rate_limit');
    expect(classifyModelErrorKind({ status: 403, name: 'Error' })).toBe('auth_error');
    expect(classifyModelErrorKind({ status: 402, name: 'Error' })).toBe('quota_exceeded');
    expect(classifyModelErrorKind({ status: 404, name: 'Error' })).toBe('model_error');
    expect(classifyModelErrorKind({ status: 502, name: 'Error' })).toBe('network_error');
  });

  it('falls back to the message', () => {
    expect(classifyModelErrorKind({ status: 0, name: 'Error', message: 'Quota exceeded for project' })).toBe('quota_exceeded');
    expect(classifyModelErrorKind({ status: 0, name: 'Error', message: 'socket hang up' })).toBe('network_error');
  });

  it('lets the earlier kind win when several match', () => {
    expect(classifyModelErrorKind({ status: 401, name: 'Error', message: 'rate limit reached' })).toBe('rate_limit');
  });

  it('returns undefined when nothing matches', () => {
    expect(classifyModelErrorKind({ status: 418, name: 'Error', message: 'teapot' })).toBeUndefined();
  });
});

describe('extractModelErrorFields', () => {
  it('reads the last error of a retry wrapper', () => {
    const error = {
      name: 'AI_RetryError',
      message: 'Failed after 3 attempts',
      lastError: { name: 'AI_APICallError', statusCode: 503, message: 'Service Unavailable' },
    };
    expect(extractModelErrorFields(error)).toEqual({ status: 503, name: 'AI_APICallError', message: 'Service Unavailable' });
  });

  it('prefers the provider error body message', () => {
    const error = {
      name: 'AI_APICallError',
      statusCode: 400,
      message: 'Bad Request',
      data: { error: { message: 'model "llama9" not found', code: 'model_not_found' } },
    };
    expect(extractModelErrorFields(error)).toEqual({
      status: 400,
      name: 'AI_APICallError',
      code: 'model_not_found',
      message: 'model "llama9" not found',
    });
  });

  it('collapses long multi-line messages', () => {
    const fields = extractModelErrorFields(new Error(`first\n\nsecond ${'x'.repeat(300)}`));
    expect(fields.message).toBe(`first second ${'x'.repeat(184)}...`);
  });
});

describe('mapModelError', () => {
  it('passes dispatch errors through', () => {
    const original = new UnknownToolError('nope');
    expect(mapModelError(original, OPTS)).toBe(original);
  });

  it('turns timeouts into model timeouts', () => {
    const mapped = mapModelError({ name: 'TimeoutError', message: 'The operation was aborted due to timeout' }, OPTS);
    expect(mapped).toBeInstanceOf(TimeoutError);
    expect(mapped.message).toBe('Model call timed out after 1000ms');
  });

  it('prefixes status and code', () => {
    const mapped = mapModelError({
      name: 'AI_APICallError',
      statusCode: 400,
      message: 'Bad Request',
      data: { error: { message: 'model "llama9" not found', code: 'model_not_found' } },
    }, OPTS);
    expect(mapped).toBeInstanceOf(ModelCallError);
    expect(mapped).toMatchObject({ reason: 'model_error', message: '400 [model_not_found]: model "llama9" not found' });
  });

  it('unwraps fetch failures to their cause', () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), { code: 'ECONNREFUSED' });
    const mapped = mapModelError(new TypeError('fetch failed', { cause }), OPTS);
    expect(mapped).toMatchObject({ reason: 'network_error', message: '[ECONNREFUSED]: connect ECONNREFUSED 127.0.0.1:11434' });
  });

  it('treats server errors behind a retry wrapper as network errors', () => {
    const mapped = mapModelError({
      name: 'AI_RetryError',
      message: 'Failed after 3 attempts',
      lastError: { name: 'AI_APICallError', statusCode: 503, message: 'Service Unavailable' },
    }, OPTS);
    expect(mapped).toMatchObject({ reason: 'network_error', message: '503: Service Unavailable' });
  });

  it('defaults to a model error', () => {
    expect(mapModelError('weird', OPTS)).toMatchObject({ kind: 'model_call_error', reason: 'model_error', message: 'weird' });
  });
});

describe('provider factory helpers', () => {
  it('points Ollama at its native API', () => {
    expect(normalizeOllamaBaseUrl(undefined)).toBe('http://localhost:11434/api');
    expect(normalizeOllamaBaseUrl('http://ollama:11434')).toBe('http://ollama:11434/api');
    expect(normalizeOllamaBaseUrl('http://ollama:11434/')).toBe('http://ollama:11434/api');
    expect(normalizeOllamaBaseUrl('http://ollama:11434/v1')).toBe('http://ollama:11434/api');
    expect(normalizeOllamaBaseUrl('http://ollama:11434/api/')).toBe('http://ollama:11434/api');
  });

  it('describes a model as provider:model', () => {
    expect(describeModel({
      provider: 'openai',
      baseUrl: 'http://127.0.0.1:8080/v1',
      model: 'gpt-4o-mini',
      apiKey: 'test-secret',
      temperature: 0,
      timeoutMs: 1000,
    })).toBe('openai:gpt-4o-mini');
  });
});
