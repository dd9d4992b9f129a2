/** App configuration, parsed once from the environment. */
import { z } from 'zod';
import { ConfigError } from '@/services/errors';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  CORS_ORIGIN: z
    .string()
    .default('http://localhost:3000')
    .transform((v) => v.split(',').map((origin) => origin.trim()).filter(Boolean)),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),

  PLANET_SSO_URL: z.string().url().default('https://sso.araliadata.io'),
  PLANET_API_URL: z.string().url().default('https://tw-air.araliadata.io'),
  PLANET_CLIENT_ID: optionalString,
  PLANET_CLIENT_SECRET: optionalString,
  PLANET_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  LLM_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o'),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-20240620'),
  GOOGLE_MODEL: z.string().default('gemini-2.0-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),

  PIPELINE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  EXPLORATION_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
  EXPLORATION_MAX_PAGES: z.coerce.number().int().min(1).default(1),
  JSON_DATA_ROW_LIMIT: z.coerce.number().int().positive().default(400),
  CSV_EXPORT_DIR: optionalString,
});

export interface PlanetConfig {
  ssoUrl: string;
  apiUrl: string;
  clientId?: string;
  clientSecret?: string;
  timeoutMs: number;
}

export interface LlmConfig {
  defaultApiKey?: string;
  openaiModel: string;
  anthropicModel: string;
  googleModel: string;
  temperature: number;
}

export interface PipelineConfig {
  maxAttempts: number;
  explorationPageSize: number;
  explorationMaxPages: number;
  jsonDataRowLimit: number;
  csvExportDir?: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  corsOrigin: string[];
  requestTimeoutMs: number;
  planet: PlanetConfig;
  llm: LlmConfig;
  pipeline: PipelineConfig;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    planet: {
      ssoUrl: e.PLANET_SSO_URL,
      apiUrl: e.PLANET_API_URL,
      clientId: e.PLANET_CLIENT_ID,
      clientSecret: e.PLANET_CLIENT_SECRET,
      timeoutMs: e.PLANET_TIMEOUT_MS,
    },
    llm: {
      defaultApiKey: e.LLM_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      anthropicModel: e.ANTHROPIC_MODEL,
      googleModel: e.GOOGLE_MODEL,
      temperature: e.LLM_TEMPERATURE,
    },
    pipeline: {
      maxAttempts: e.PIPELINE_MAX_ATTEMPTS,
      explorationPageSize: e.EXPLORATION_PAGE_SIZE,
      explorationMaxPages: e.EXPLORATION_MAX_PAGES,
      jsonDataRowLimit: e.JSON_DATA_ROW_LIMIT,
      csvExportDir: e.CSV_EXPORT_DIR,
    },
  };
}
