/**
 * Runtime configuration read from the environment (.env is loaded by the entry points)
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_MODEL = 'mistralai/mistral-7b-instruct:free';
export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

// Blank variables count as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_BASE_URL: optionalString,
  POSTGRES_DB_URI: optionalString,
  DEFAULT_MODEL: optionalString,
  API_PORT: z.coerce.number().int().positive().default(8000),
  SQL_TOP_K: z.coerce.number().int().positive().default(10),
  AGENT_MAX_ITERATIONS: z.coerce.number().int().positive().default(15),
  AGENT_VERBOSE: z.enum(['true', 'false']).default('false'),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  MODEL_CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export interface AppConfig {
  openaiApiKey?: string;
  openrouterApiKey?: string;
  openrouterBaseUrl: string;
  databaseUri?: string;
  defaultModel: string;
  port: number;
  sqlTopK: number;
  agentMaxIterations: number;
  agentVerbose: boolean;
  llmMaxRetries: number;
  modelCatalogTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    openrouterApiKey: vars.OPENROUTER_API_KEY,
    openrouterBaseUrl: vars.OPENROUTER_BASE_URL ?? OPENROUTER_BASE_URL,
    databaseUri: vars.POSTGRES_DB_URI,
    defaultModel: vars.DEFAULT_MODEL ?? DEFAULT_MODEL,
    port: vars.API_PORT,
    sqlTopK: vars.SQL_TOP_K,
    agentMaxIterations: vars.AGENT_MAX_ITERATIONS,
    agentVerbose: vars.AGENT_VERBOSE === 'true',
    llmMaxRetries: vars.LLM_MAX_RETRIES,
    modelCatalogTimeoutMs: vars.MODEL_CATALOG_TIMEOUT_MS,
  };
}
