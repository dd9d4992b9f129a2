// src/types/llm.ts
import type { z } from 'zod';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LlmTextResult {
  content: string;
  usage?: TokenUsage;
}

export interface LlmObjectResult<T> {
  object: T;
  usage?: TokenUsage;
}

/** Chat-completion model behind a uniform free-form / structured interface. */
export interface LlmGateway {
  invoke(prompt: string): Promise<LlmTextResult>;
  /** Constrained generation; rejects with LlmOutputError when the reply does not match `schema`. */
  invokeStructured<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S,
    name: string,
  ): Promise<LlmObjectResult<z.infer<S>>>;
}

export type LlmProvider = 'openai' | 'anthropic' | 'google';
