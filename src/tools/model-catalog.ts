/**
 * Model Catalog
 * Fixed OpenAI models plus the free models OpenRouter currently lists.
 */

import fetch from 'node-fetch';
import { z } from 'zod';
import { describeError } from '../errors.js';

export const OPENROUTER_MODELS_URL = 'https://openrouter.ai/api/v1/models';

const ModelDescriptorSchema = z
  .object({
    id: z.string(),
    name: z.string().default(''),
    pricing: z
      .object({
        prompt: z.unknown(),
        completion: z.unknown(),
      })
      .partial()
      .default({}),
  })
  .passthrough();

const CatalogResponseSchema = z.object({
  data: z.array(z.unknown()).default([]),
});

export type ModelDescriptor = z.infer<typeof ModelDescriptorSchema>;

export const OPENAI_MODELS: ReadonlyArray<{ id: string; name: string }> = [
  { id: 'gpt-4o-mini', name: 'OpenAI GPT-4o Mini' },
  { id: 'gpt-3.5-turbo', name: 'OpenAI GPT-3.5 Turbo' },
  { id: 'gpt-4o', name: 'OpenAI GPT-4o' },
];

export interface ModelCatalogOptions {
  url?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export function isFreeModel(model: ModelDescriptor): boolean {
  return model.pricing.prompt === '0' && model.pricing.completion === '0';
}

function byName(a: ModelDescriptor, b: ModelDescriptor): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class ModelCatalog {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ModelCatalogOptions = {}) {
    this.url = options.url ?? OPENROUTER_MODELS_URL;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Never rejects: when OpenRouter is unavailable only the OpenAI models are returned.
   */
  async listModels(): Promise<Array<{ id: string; name: string }>> {
    const models: Array<{ id: string; name: string }> = [...OPENAI_MODELS];
    try {
      models.push(...(await this.fetchFreeOpenRouterModels()));
    } catch (error) {
      console.warn(`⚠️  Warning: Could not connect to OpenRouter: ${describeError(error)}`);
    }
    return models;
  }

  private async fetchFreeOpenRouterModels(): Promise<ModelDescriptor[]> {
    const response = await this.fetchImpl(this.url, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status !== 200) {
      console.warn(`⚠️  Warning: Failed to fetch OpenRouter models: ${response.status}`);
      return [];
    }

    const body = CatalogResponseSchema.parse(await response.json());
    const free: ModelDescriptor[] = [];
    for (const entry of body.data) {
      const parsed = ModelDescriptorSchema.safeParse(entry);
      if (parsed.success && isFreeModel(parsed.data)) {
        free.push(parsed.data);
      }
    }
    return free.sort(byName);
  }
}
