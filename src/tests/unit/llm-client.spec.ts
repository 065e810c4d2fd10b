import { describe, expect, it } from 'vitest';

import type { ModelConfig } from '../../types.js';
import type { LanguageModelV2Content } from '@ai-sdk/provider';

import { ModelCallError } from '../../dispatch-errors.js';
import { AiSdkModelClient, toDecision } from '../../llm-client.js';
import { FakeLanguageModel, buildCatalog, collectLogs } from '../test-doubles.js';

const CONFIG: ModelConfig = {
  provider: 'ollama',
  baseUrl: 'http://127.0.0.1:11434',
  model: 'llama3.1',
  temperature: 0.3,
  timeoutMs: 1000,
};

const tools = buildCatalog().modelTools();

function clientFor(respond: () => LanguageModelV2Content[] | Error) {
  const languageModel = new FakeLanguageModel(respond);
  const logs = collectLogs();
  const client = new AiSdkModelClient(CONFIG, { languageModel, onLog: logs.sink });
  return { client, languageModel, logs };
}

describe('AiSdkModelClient', () => {
  it('identifies itself as provider:model', () => {
    expect(clientFor(() => []).client.remoteIdentifier).toBe('ollama:llama3.1');
  });

  it('returns plain text answers', async () => {
    const { client, languageModel } = clientFor(() => [{ type: 'text', text: 'Hello there.' }]);

    const completion = await client.complete({
      systemPrompt: 'Be kind.',
      messages: [{ role: 'user', content: 'hi' }],
      tools,
    });

    expect(completion).toEqual({ text: 'Hello there.' });
    const call = languageModel.calls[0];
    expect(call.prompt[0]).toEqual({ role: 'system', content: 'Be kind.' });
    expect(call.temperature).toBe(0.3);
    expect(call.toolChoice).toEqual({ type: 'auto' });
    expect((call.tools ?? []).map((spec) => spec.name)).toEqual(['get_weather', 'get_order_status']);
  });

  it('sends no tools when none are offered', async () => {
    const { client, languageModel } = clientFor(() => [{ type: 'text', text: 'ok' }]);

    await client.complete({ systemPrompt: '', messages: [{ role: 'user', content: 'hi' }] });

    expect(languageModel.calls[0].tools).toBeUndefined();
  });

  it('returns a native tool call with parsed arguments', async () => {
    const { client } = clientFor(() => [
      { type: 'tool-call', toolCallId: 'call-1', toolName: 'get_weather', input: '{"city":"Seoul"}' },
    ]);

    const completion = await client.complete({ systemPrompt: '', messages: [{ role: 'user', content: 'weather?' }], tools });

    expect(completion).toEqual({ text: '', toolCall: { name: 'get_weather', arguments: { city: 'Seoul' } } });
  });

  it('recovers a tool call the model wrote as text', async () => {
    const { client, logs } = clientFor(() => [
      { type: 'text', text: '<tool_call>{"name":"get_weather","arguments":{"city":"Seoul"}}</tool_call>' },
    ]);

    const completion = await client.complete({ systemPrompt: '', messages: [{ role: 'user', content: 'weather?' }], tools });

    expect(completion).toEqual({ text: '', toolCall: { name: 'get_weather', arguments: { city: 'Seoul' } } });
    expect(logs.entries.some((entry) => entry.severity === 'WRN'
      && entry.message === "recovered tool call 'get_weather' from text (tool_call)")).toBe(true);
  });

  it('leaves tool-call text alone when no tools were offered', async () => {
    const text = '<tool_call>{"name":"get_weather","arguments":{}}</tool_call>';
    const { client } = clientFor(() => [{ type: 'text', text }]);

    await expect(client.complete({ systemPrompt: '', messages: [{ role: 'user', content: 'x' }] })).resolves.toEqual({ text });
  });

  it('maps provider failures to model call errors', async () => {
    const { client } = clientFor(() => Object.assign(new Error('Unauthorized'), { statusCode: 401 }));

    const failure = client.complete({ systemPrompt: '', messages: [{ role: 'user', content: 'x' }] });

    await expect(failure).rejects.toBeInstanceOf(ModelCallError);
    await expect(failure).rejects.toMatchObject({ reason: 'auth_error', message: '401: Unauthorized' });
  });
});

describe('toDecision', () => {
  it('reads text without a tool call as a direct answer', () => {
    expect(toDecision({ text: 'Hi!' })).toEqual({ kind: 'no_tool', text: 'Hi!' });
  });

  it('prefers a tool call over accompanying text', () => {
    expect(toDecision({ text: 'Let me check.', toolCall: { name: 'get_weather', arguments: { city: 'Seoul' } } })).toEqual({
      kind: 'tool_call',
      text: 'Let me check.',
      proposal: { toolName: 'get_weather', arguments: { city: 'Seoul' } },
    });
  });
});
