import { describe, it, expect } from 'vitest';
import type { LlmConfig } from '@/config/app.config';
import { OpenAiLlmGateway, resolveLlmProvider } from '@/services/llm-client';

const llmConfig: LlmConfig = {
  openaiModel: 'gpt-test',
  anthropicModel: 'claude-test',
  googleModel: 'gemini-test',
  temperature: 0,
};

describe('resolveLlmProvider', () => {
  it('routes Anthropic keys to the Anthropic OpenAI-compatible endpoint', () => {
    expect(resolveLlmProvider('sk-ant-test-key', llmConfig)).toEqual({
      provider: 'anthropic',
      model: 'claude-test',
      baseURL: 'https://api.anthropic.com/v1/',
    });
  });

  it('routes Google keys to the Gemini OpenAI-compatible endpoint', () => {
    expect(resolveLlmProvider('AIza-test-key', llmConfig)).toEqual({
      provider: 'google',
      model: 'gemini-test',
      baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
    });
  });

  it('treats every other key as OpenAI', () => {
    expect(resolveLlmProvider('sk-test-key', llmConfig)).toEqual({ provider: 'openai', model: 'gpt-test' });
  });
});

describe('OpenAiLlmGateway', () => {
  it('exposes the provider it resolved', () => {
    const gateway = new OpenAiLlmGateway('sk-ant-test-key', llmConfig);
    expect(gateway.provider.provider).toBe('anthropic');
  });

  it('requires a key', () => {
    expect(() => new OpenAiLlmGateway('', llmConfig)).toThrow('Missing LLM API key');
  });
});
