// node/src/services/token-usage.ts — per-stage token accounting around any LlmGateway
import type { z } from 'zod';
import type { LlmGateway, LlmObjectResult, LlmTextResult, TokenUsage } from '@/types/llm';

export function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

/** Rough count (4 chars per token) for providers that report no usage. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function estimateUsage(prompt: string, completion: string): TokenUsage {
  const promptTokens = estimateTokens(prompt);
  const completionTokens = estimateTokens(completion);
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

/**
 * Wraps a gateway and sums the usage of every call made through it.
 * The stage runner creates one per stage.
 */
export class MeteredLlmGateway implements LlmGateway {
  private total: TokenUsage = emptyUsage();
  private calls = 0;

  constructor(private readonly inner: LlmGateway) {}

  get usage(): TokenUsage {
    return { ...this.total };
  }

  get callCount(): number {
    return this.calls;
  }

  async invoke(prompt: string): Promise<LlmTextResult> {
    this.calls++;
    const result = await this.inner.invoke(prompt);
    this.total = addUsage(this.total, result.usage ?? estimateUsage(prompt, result.content));
    return result;
  }

  async invokeStructured<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S,
    name: string,
  ): Promise<LlmObjectResult<z.infer<S>>> {
    this.calls++;
    const result = await this.inner.invokeStructured(prompt, schema, name);
    this.total = addUsage(this.total, result.usage ?? estimateUsage(prompt, JSON.stringify(result.object)));
    return result;
  }
}
