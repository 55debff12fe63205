/**
 * Chat model selection
 * `gpt-` models go straight to OpenAI, everything else through OpenRouter's
 * OpenAI-compatible endpoint.
 */

import { ChatOpenAI } from '@langchain/openai';
import type { AppConfig } from './config.js';
import { ConfigurationError } from './errors.js';

export type ProviderName = 'openai' | 'openrouter';

export interface ProviderSettings {
  provider: ProviderName;
  apiKey: string;
  baseURL?: string;
}

const PROVIDER_LABELS: Record<ProviderName, string> = {
  openai: 'OpenAI',
  openrouter: 'OpenRouter',
};

export function selectProvider(model: string): ProviderName {
  return model.startsWith('gpt-') ? 'openai' : 'openrouter';
}

export function resolveProviderSettings(model: string, config: AppConfig): ProviderSettings {
  const provider = selectProvider(model);

  if (provider === 'openai') {
    if (!config.openaiApiKey) {
      throw new ConfigurationError('OPENAI_API_KEY not set in environment');
    }
    return { provider, apiKey: config.openaiApiKey };
  }

  if (!config.openrouterApiKey) {
    throw new ConfigurationError('OPENROUTER_API_KEY not set in environment');
  }
  return { provider, apiKey: config.openrouterApiKey, baseURL: config.openrouterBaseUrl };
}

export function createChatModel(model: string, config: AppConfig): ChatOpenAI {
  const settings = resolveProviderSettings(model, config);
  console.log(`🔌 Using ${PROVIDER_LABELS[settings.provider]} provider for model: ${model}`);

  return new ChatOpenAI({
    model,
    apiKey: settings.apiKey,
    temperature: 0,
    maxRetries: config.llmMaxRetries,
    configuration: settings.baseURL ? { baseURL: settings.baseURL } : undefined,
  });
}
