/**
 * API Server for the Pagila SQL agent
 */

import * as dotenv from 'dotenv';
import { AgentRegistry, createSqlAgentFactory } from './agent.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { createPagilaConnection } from './tools/database.js';
import { ModelCatalog } from './tools/model-catalog.js';

dotenv.config();

const config = loadConfig();
const database = createPagilaConnection(config.databaseUri);
const agents = new AgentRegistry(createSqlAgentFactory({ config, database }));
const catalog = new ModelCatalog({ timeoutMs: config.modelCatalogTimeoutMs });

const app = createApp({ agents, catalog, defaultModel: config.defaultModel });

// Warm the default agent so the first chat request does not pay for it
agents.resolve(config.defaultModel).catch((error: unknown) => {
  console.error(`⚠️  Default agent not ready (${config.defaultModel}): ${describeError(error)}`);
});

app.listen(config.port, () => {
  console.log(`🚀 Pagila SQL agent API running on http://localhost:${config.port}`);
  console.log(`🤖 Default model: ${config.defaultModel}`);
});
