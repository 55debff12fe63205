import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import { DynamicTool } from '@langchain/core/tools';
import { z } from 'zod';
import { AgentRegistry, createSqlAgentHandle } from '../agent.js';
import type { AgentFactory, AgentHandle } from '../agent.js';
import { createApp } from '../app.js';
import { ConfigurationError } from '../errors.js';
import { CANNED_RESPONSES } from '../prompts.js';
import { ScriptedLLM } from './scripted-llm.js';

const DEFAULT_MODEL = 'mistralai/mistral-7b-instruct:free';

const catalog = {
  listModels: async () => [{ id: 'gpt-4o-mini', name: 'OpenAI GPT-4o Mini' }],
};

const ChatResponseSchema = z.object({
  response: z.string(),
  metadata: z.object({ model: z.string(), duration: z.number() }),
});

async function readChat(res: Response): Promise<z.infer<typeof ChatResponseSchema>> {
  return ChatResponseSchema.parse(await res.json());
}

let server: Server | undefined;

async function start(factory: AgentFactory): Promise<string> {
  const app = createApp({ agents: new AgentRegistry(factory), catalog, defaultModel: DEFAULT_MODEL });
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

function postChat(baseUrl: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/chat`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function answering(answer: string): AgentFactory {
  return async (model: string): Promise<AgentHandle> => ({ model, ask: async () => answer });
}

function failingWith(error: unknown): AgentFactory {
  return async (model: string): Promise<AgentHandle> => ({
    model,
    ask: async () => {
      throw error;
    },
  });
}

describe('HTTP API', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    if (server) {
      server.closeAllConnections();
      server.close();
      await once(server, 'close');
      server = undefined;
    }
  });

  it('GET / reports liveness', async () => {
    const baseUrl = await start(answering('unused'));

    const res = await fetch(`${baseUrl}/`, { headers: { Origin: 'http://localhost:5173' } });

    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(await res.json()).toEqual({ message: 'Pagila RAG API is running' });
  });

  it('GET /models returns the catalog', async () => {
    const baseUrl = await start(answering('unused'));

    const res = await fetch(`${baseUrl}/models`);

    expect(await res.json()).toEqual({ models: [{ id: 'gpt-4o-mini', name: 'OpenAI GPT-4o Mini' }] });
  });

  it('POST /chat answers with the default model when none is given', async () => {
    const factory = vi.fn(answering('There are 1000 films.'));
    const baseUrl = await start(factory);

    const res = await postChat(baseUrl, { query: 'How many films are there?' });

    expect(res.status).toBe(200);
    const body = await readChat(res);
    expect(factory).toHaveBeenCalledWith(DEFAULT_MODEL);
    expect(body.response).toBe('There are 1000 films.');
    expect(body.metadata.model).toBe(DEFAULT_MODEL);
    expect(body.metadata.duration).toBeGreaterThanOrEqual(0);
  });

  it('POST /chat treats an empty model as the default', async () => {
    const factory = vi.fn(answering('ok'));
    const baseUrl = await start(factory);

    const res = await postChat(baseUrl, { query: 'hello there', model: '' });

    expect(res.status).toBe(200);
    expect((await readChat(res)).metadata.model).toBe(DEFAULT_MODEL);
    expect(factory).toHaveBeenCalledWith(DEFAULT_MODEL);
  });

  it('POST /chat builds each model once', async () => {
    const factory = vi.fn(answering('ok'));
    const baseUrl = await start(factory);

    await readChat(await postChat(baseUrl, { query: 'one', model: 'gpt-4o' }));
    await readChat(await postChat(baseUrl, { query: 'two', model: 'gpt-4o' }));

    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('POST /chat greets the same way for every model', async () => {
    const greeting = `Final Answer: ${CANNED_RESPONSES.greeting}`;
    const baseUrl = await start(async (model) =>
      createSqlAgentHandle(model, {
        llm: new ScriptedLLM([greeting]),
        tools: [
          new DynamicTool({
            name: 'sql_db_list_tables',
            description: 'Input is an empty string, output is a comma-separated list of tables in the database.',
            func: async () => 'actor, film',
          }),
        ],
        dialect: 'postgres',
        topK: 10,
        maxIterations: 3,
      })
    );

    for (const model of ['gpt-4o-mini', 'meta-llama/llama-3-8b-instruct:free']) {
      const body = await readChat(await postChat(baseUrl, { query: 'hi', model }));
      expect(body.response).toBe(CANNED_RESPONSES.greeting);
      expect(body.metadata.model).toBe(model);
    }
  });

  it('POST /chat returns 500 when the agent cannot be built, and retries later', async () => {
    const factory = vi
      .fn<AgentFactory>()
      .mockRejectedValueOnce(new ConfigurationError('OPENAI_API_KEY not set in environment'))
      .mockImplementation(answering('recovered'));
    const baseUrl = await start(factory);

    const failed = await postChat(baseUrl, { query: 'hi', model: 'gpt-4o' });
    expect(failed.status).toBe(500);
    expect(await failed.json()).toEqual({ detail: 'Failed to initialize agent for model gpt-4o' });

    const retried = await postChat(baseUrl, { query: 'hi', model: 'gpt-4o' });
    expect(retried.status).toBe(200);
    expect((await readChat(retried)).response).toBe('recovered');
  });

  it('POST /chat maps provider rate limits to 429', async () => {
    const baseUrl = await start(failingWith(Object.assign(new Error('Too Many Requests'), { status: 429 })));

    const res = await postChat(baseUrl, { query: 'Who is the most popular actor?' });

    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({
      detail:
        'Rate limit exceeded (429). The AI model is busy or you have run out of credits. Please try again in 10-20 seconds.',
    });
  });

  it('POST /chat returns other failures as 500 with the message only', async () => {
    const baseUrl = await start(failingWith(new Error('relation "films" does not exist')));

    const res = await postChat(baseUrl, { query: 'How many films?' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: 'relation "films" does not exist' });
  });

  it('POST /chat rejects a body without a query', async () => {
    const factory = vi.fn(answering('unused'));
    const baseUrl = await start(factory);

    const res = await postChat(baseUrl, { model: 'gpt-4o' });

    expect(res.status).toBe(422);
    await res.json();
    expect(factory).not.toHaveBeenCalled();
  });

  it('POST /chat rejects malformed JSON', async () => {
    const baseUrl = await start(answering('unused'));

    const res = await fetch(`${baseUrl}/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"query": ',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: 'Malformed JSON body' });
  });
});
