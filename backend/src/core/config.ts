import 'dotenv/config';
import { z } from 'zod';
import { logger } from '../utils/logger';

const EnvironmentEnum = z.enum(['development', 'staging', 'production', 'test']);
const LlmProviderEnum = z.enum(['groq', 'ollama']);

const DEV_DEFAULTS = {
  ROOT_URL: 'http://localhost:8080',
  GROQ_MODEL: 'llama-3.1-8b-instant',
  OLLAMA_MODEL: 'llama3.2',
} as const;

const optionalNumber = (value: string | undefined) => (value ? Number(value) : undefined);
const optionalBoolean = (value: string | undefined) => {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
};

const ConfigSchema = z.object({
  env: EnvironmentEnum.default('development'),
  port: z.coerce.number().int().positive().default(8080),
  rootUrl: z.string().url().default(DEV_DEFAULTS.ROOT_URL),
  llm: z.object({
    provider: LlmProviderEnum.default('groq'),
    temperature: z.number().min(0).max(2).default(0.3),
    maxTokens: z.number().int().positive().default(800),
  }),
  groq: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default('https://api.groq.com/openai/v1'),
    model: z.string().default(DEV_DEFAULTS.GROQ_MODEL),
    requestTimeoutMs: z.number().int().positive().default(60_000),
  }),
  ollama: z.object({
    enabled: z.boolean().default(true),
    baseUrl: z.string().url().default('http://localhost:11434'),
    model: z.string().default(DEV_DEFAULTS.OLLAMA_MODEL),
  }),
  chat: z.object({
    confirmationTtlMs: z.number().int().positive().default(5 * 60_000),
    historyLimit: z.number().int().min(0).default(10),
  }),
});

const rawConfig = {
  env: process.env.SUPPORT_CHAT_ENV,
  port: process.env.PORT,
  rootUrl: process.env.ROOT_URL,
  llm: {
    provider: process.env.LLM_PROVIDER,
    temperature: optionalNumber(process.env.LLM_TEMPERATURE),
    maxTokens: optionalNumber(process.env.LLM_MAX_TOKENS),
  },
  groq: {
    apiKey: process.env.GROQ_API_KEY || undefined,
    baseUrl: process.env.GROQ_BASE_URL,
    model: process.env.GROQ_MODEL,
    requestTimeoutMs: optionalNumber(process.env.GROQ_TIMEOUT_MS),
  },
  ollama: {
    enabled: optionalBoolean(process.env.OLLAMA_ENABLED),
    baseUrl: process.env.OLLAMA_BASE_URL,
    model: process.env.OLLAMA_MODEL,
  },
  chat: {
    confirmationTtlMs: optionalNumber(process.env.ESCALATION_CONFIRMATION_TTL_MS),
    historyLimit: optionalNumber(process.env.CHAT_HISTORY_LIMIT),
  },
};

const parsed = ConfigSchema.safeParse(rawConfig);

if (!parsed.success) {
  logger.error('Invalid configuration', parsed.error.format());
  throw new Error('Configuration validation failed');
}

if (parsed.data.env === 'production' && !process.env.ROOT_URL) {
  throw new Error('Missing required configuration: ROOT_URL');
}

if (parsed.data.llm.provider === 'groq' && !parsed.data.groq.apiKey) {
  if (parsed.data.ollama.enabled) {
    logger.warn('GROQ_API_KEY not set; answers will come from the Ollama fallback');
  } else if (parsed.data.env !== 'test') {
    logger.warn('GROQ_API_KEY not set and Ollama disabled; chat requests will fail');
  }
}

export const config = parsed.data;
export type AppConfig = typeof config;
