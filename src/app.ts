/**
 * HTTP routes for the Pagila SQL agent
 */

import express from 'express';
import type { ErrorRequestHandler } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { AgentHandle, AgentRegistry } from './agent.js';
import { describeError, isRateLimitError, RATE_LIMIT_MESSAGE } from './errors.js';
import type { ModelCatalog } from './tools/model-catalog.js';

const ChatRequestSchema = z.object({
  query: z.string(),
  model: z.string().nullish(),
});

export interface AppDependencies {
  agents: AgentRegistry;
  catalog: Pick<ModelCatalog, 'listModels'>;
  defaultModel: string;
}

const handleBodyErrors: ErrorRequestHandler = (err, req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ detail: 'Malformed JSON body' });
    return;
  }
  next(err);
};

export function createApp({ agents, catalog, defaultModel }: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(handleBodyErrors);

  app.get('/', (req, res) => {
    res.json({ message: 'Pagila RAG API is running' });
  });

  app.get('/models', async (req, res) => {
    const models = await catalog.listModels();
    res.json({ models });
  });

  app.post('/chat', async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(422).json({ detail: parsed.error.issues });
    }

    const model = parsed.data.model || defaultModel;

    let agent: AgentHandle;
    try {
      agent = await agents.resolve(model);
    } catch (error) {
      console.error(`❌ Failed to initialize agent for ${model}: ${describeError(error)}`);
      return res.status(500).json({ detail: `Failed to initialize agent for model ${model}` });
    }

    try {
      const startTime = Date.now();
      const response = await agent.ask(parsed.data.query);
      const duration = (Date.now() - startTime) / 1000;

      return res.json({
        response,
        metadata: {
          model,
          duration: Math.round(duration * 100) / 100,
        },
      });
    } catch (error) {
      console.error('------------- ERROR IN CHAT ENDPOINT -------------');
      console.error(error);
      console.error('--------------------------------------------------');

      if (isRateLimitError(error)) {
        console.error('The LLM provider returned a 429 rate limit error.');
        return res.status(429).json({ detail: RATE_LIMIT_MESSAGE });
      }

      return res.status(500).json({ detail: describeError(error) });
    }
  });

  return app;
}
