/**
 * Server and runtime configuration.
 * Environment variables are validated once at startup; invalid values cause exit(1).
 * A missing API key is allowed here and reported when a question is asked.
 */

import { z } from 'zod';
import { ConfigurationError } from './utils/errors.ts';

export const SERVER_NAME = 'csv-chat-mcp-server';
export const SERVER_VERSION = '1.0.0';

/** Hard cap on sampled head rows in a dataset profile. */
export const MAX_HEAD_ROWS = 10;

export const DEFAULT_SYSTEM_PROMPT = `You are an expert data analyst and programmer.
Analyze the uploaded CSV data and accurately answer questions or generate code that works on it.
Be concise, and only use data provided.`;

export const REPLAY_POLICIES = ['full', 'latest'] as const;
export type ReplayPolicy = (typeof REPLAY_POLICIES)[number];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

export const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3002),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  LLM_MODEL: z.string().min(1).default('openai/gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  // setTimeout fires at once past a signed 32-bit delay
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().max(2_147_483_647).default(60_000),
  CONTEXT_REPLAY: z.enum(REPLAY_POLICIES, {
    required_error: `CONTEXT_REPLAY is required (one of: ${REPLAY_POLICIES.join(', ')})`,
  }),
  HISTORY_MAX_EXCHANGES: z.coerce.number().int().min(0).default(50),
  PROFILE_HEAD_ROWS: z.coerce.number().int().min(1).max(MAX_HEAD_ROWS).default(MAX_HEAD_ROWS),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(25),
  SYSTEM_PROMPT: optionalString,
});

export interface Config {
  port: number;
  apiKey: string | undefined;
  llmBaseUrl: string;
  llmModel: string;
  llmTemperature: number;
  llmTimeoutMs: number;
  replayPolicy: ReplayPolicy;
  /** 0 keeps every exchange. */
  historyMaxExchanges: number;
  profileHeadRows: number;
  maxUploadMb: number;
  systemPrompt: string;
}

/**
 * Validates the given environment and returns a frozen config.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return Object.freeze({
    port: parsed.PORT,
    apiKey: parsed.OPENROUTER_API_KEY ?? parsed.OPENROUTER_KEY ?? parsed.OPENAI_API_KEY,
    llmBaseUrl: parsed.LLM_BASE_URL,
    llmModel: parsed.LLM_MODEL,
    llmTemperature: parsed.LLM_TEMPERATURE,
    llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
    replayPolicy: parsed.CONTEXT_REPLAY,
    historyMaxExchanges: parsed.HISTORY_MAX_EXCHANGES,
    profileHeadRows: parsed.PROFILE_HEAD_ROWS,
    maxUploadMb: parsed.MAX_UPLOAD_MB,
    systemPrompt: parsed.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
  });
}
