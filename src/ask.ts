/**
 * Ask the Pagila agent a single question from the command line
 *
 *   npm run ask -- "How many films are there in the database?" --model gpt-4o-mini
 */

import * as dotenv from 'dotenv';
import { parseArgs } from 'util';
import { createSqlAgentFactory } from './agent.js';
import { loadConfig } from './config.js';
import { ConfigurationError, DatabaseConnectionError, describeError } from './errors.js';
import { createPagilaConnection } from './tools/database.js';

dotenv.config();

const DEFAULT_QUESTION = 'How many films are there in the database?';

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: { model: { type: 'string', short: 'm' } },
    allowPositionals: true,
  });

  const config = loadConfig();
  const model = values.model || config.defaultModel;
  const question = positionals.join(' ').trim() || DEFAULT_QUESTION;

  console.log('Initializing Pagila Agent...');
  const buildAgent = createSqlAgentFactory({
    config,
    database: createPagilaConnection(config.databaseUri),
  });
  const agent = await buildAgent(model);

  console.log(`\n📝 Processing query: ${question}`);
  const answer = await agent.ask(question);
  console.log(`\nFinal Answer: ${answer}`);
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError || error instanceof DatabaseConnectionError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('An error occurred:', describeError(error));
    }
    process.exit(1);
  });
