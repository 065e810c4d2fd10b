import { createOpenAI } from '@ai-sdk/openai';
import { createOllama } from 'ollama-ai-provider-v2';

import type { ModelConfig } from '../types.js';
import type { LanguageModel } from 'ai';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/api';

// ollama-ai-provider-v2 talks to the native /api endpoints, not the OpenAI-compatible /v1 ones
export function normalizeOllamaBaseUrl(url?: string): string {
  if (url === undefined || url.length === 0) return DEFAULT_OLLAMA_BASE_URL;
  const trimmed = url.replace(/\/+$/, '');
  if (/\/v1$/.test(trimmed)) return trimmed.replace(/\/v1$/, '/api');
  if (/\/api$/.test(trimmed)) return trimmed;
  return `${trimmed}/api`;
}

export function createLanguageModel(config: ModelConfig): LanguageModel {
  switch (config.provider) {
    case 'ollama': {
      const provider = createOllama({ baseURL: normalizeOllamaBaseUrl(config.baseUrl) });
      return provider(config.model);
    }
    case 'openai': {
      const provider = createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
      return provider.chat(config.model);
    }
  }
}

export const describeModel = (config: ModelConfig): string => `${config.provider}:${config.model}`;
