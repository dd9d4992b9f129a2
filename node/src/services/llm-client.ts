// node/src/services/llm-client.ts — OpenAI-SDK gateway used for every provider the key can point at

import OpenAI from 'openai';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { LlmConfig } from '@/config/app.config';
import type {
  LlmGateway,
  LlmObjectResult,
  LlmProvider,
  LlmTextResult,
  TokenUsage,
} from '@/types/llm';
import { LlmOutputError } from './errors';
import { logger } from './logger';
import { parseJsonObject } from './safe-parse-json';

export interface ResolvedLlmProvider {
  provider: LlmProvider;
  model: string;
  /** OpenAI-compatible endpoint; undefined means the SDK default. */
  baseURL?: string;
}

const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1/';
const GOOGLE_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

const ANALYST_SYSTEM =
  'You are a Senior Data Analyst with expertise in analyzing statistical data. You excel at uncovering insights from the data and identifying relationships between different datasets.';
const STRUCTURED_SYSTEM = 'You are a JSON-only extractor. Reply with one JSON object and nothing else.';

/** The key prefix decides the provider: `sk-ant-` is Anthropic, `AIza` is Google, anything else OpenAI. */
export function resolveLlmProvider(
  apiKey: string,
  config: Pick<LlmConfig, 'openaiModel' | 'anthropicModel' | 'googleModel'>,
): ResolvedLlmProvider {
  if (apiKey.startsWith('sk-ant-')) {
    return { provider: 'anthropic', model: config.anthropicModel, baseURL: ANTHROPIC_BASE_URL };
  }
  if (apiKey.startsWith('AIza')) {
    return { provider: 'google', model: config.googleModel, baseURL: GOOGLE_BASE_URL };
  }
  return { provider: 'openai', model: config.openaiModel };
}

function toTokenUsage(usage: OpenAI.CompletionUsage | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

export class OpenAiLlmGateway implements LlmGateway {
  private client: OpenAI;
  private resolved: ResolvedLlmProvider;

  constructor(
    apiKey: string,
    private readonly config: LlmConfig,
  ) {
    if (!apiKey) {
      throw new Error('Missing LLM API key. Pass apiKey in the request or set LLM_API_KEY.');
    }
    this.resolved = resolveLlmProvider(apiKey, config);
    this.client = new OpenAI({ apiKey, baseURL: this.resolved.baseURL });
    logger.debug('llm:client_ready', { provider: this.resolved.provider, model: this.resolved.model });
  }

  get provider(): ResolvedLlmProvider {
    return this.resolved;
  }

  async invoke(prompt: string): Promise<LlmTextResult> {
    const res = await this.client.chat.completions.create({
      model: this.resolved.model,
      messages: [
        { role: 'system', content: ANALYST_SYSTEM },
        { role: 'user', content: prompt },
      ],
      temperature: this.config.temperature,
    });
    return {
      content: res.choices[0]?.message?.content ?? '',
      usage: toTokenUsage(res.usage),
    };
  }

  async invokeStructured<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S,
    name: string,
  ): Promise<LlmObjectResult<z.infer<S>>> {
    const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' });
    const res = await this.client.chat.completions.create({
      model: this.resolved.model,
      messages: [
        {
          role: 'system',
          content: `${STRUCTURED_SYSTEM}\nThe object must validate against the JSON schema "${name}":\n${JSON.stringify(jsonSchema)}`,
        },
        { role: 'user', content: prompt },
      ],
      response_format: { type: 'json_object' },
      temperature: this.config.temperature,
    });

    const content = res.choices[0]?.message?.content ?? '';
    const parsed = schema.safeParse(parseJsonObject(content, name));
    if (!parsed.success) {
      throw new LlmOutputError(`${name}: reply does not match schema`, {
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    return { object: parsed.data, usage: toTokenUsage(res.usage) };
  }
}
