/**
 * Pagila SQL Agent
 * LangChain ReAct agent over the Pagila database, one instance per model.
 */

import type { BaseLanguageModelInterface } from '@langchain/core/language_models/base';
import type { ToolInterface } from '@langchain/core/tools';
import { AgentExecutor, ZeroShotAgent } from 'langchain/agents';
import { SqlToolkit } from 'langchain/agents/toolkits/sql';
import type { SqlDatabase } from 'langchain/sql_db';
import type { AppConfig } from './config.js';
import { createChatModel } from './llm.js';
import { buildSqlAgentPrefix, SQL_AGENT_SUFFIX } from './prompts.js';
import type { SharedConnection } from './tools/database.js';
import { SqlAgentOutputParser } from './tools/output-parser.js';
import { handleParsingError } from './tools/response-sanitizer.js';

// ----------------------------------------------------------------------
// AGENT HANDLE
// ----------------------------------------------------------------------

export interface AgentHandle {
  readonly model: string;
  ask(question: string): Promise<string>;
}

export type AgentFactory = (model: string) => Promise<AgentHandle>;

class SqlAgent implements AgentHandle {
  constructor(
    readonly model: string,
    private readonly executor: AgentExecutor
  ) {}

  async ask(question: string): Promise<string> {
    const result = await this.executor.invoke({ input: question });
    const output = result.output;
    if (typeof output !== 'string') {
      throw new Error(`Agent for ${this.model} returned no text output`);
    }
    return output;
  }
}

export interface SqlAgentOptions {
  llm: BaseLanguageModelInterface;
  tools: ToolInterface[];
  dialect: string;
  topK: number;
  maxIterations: number;
  verbose?: boolean;
}

/**
 * Zero-shot ReAct executor with the Pagila prefix. Parse failures are fed back
 * to the model as observations instead of failing the run.
 */
export function buildSqlAgentExecutor(options: SqlAgentOptions): AgentExecutor {
  const agent = ZeroShotAgent.fromLLMAndTools(options.llm, options.tools, {
    prefix: buildSqlAgentPrefix(options.dialect, options.topK),
    suffix: SQL_AGENT_SUFFIX,
    inputVariables: ['input', 'agent_scratchpad'],
    outputParser: new SqlAgentOutputParser(),
  });

  return AgentExecutor.fromAgentAndTools({
    agent,
    tools: options.tools,
    maxIterations: options.maxIterations,
    handleParsingErrors: handleParsingError,
    verbose: options.verbose ?? false,
  });
}

export function createSqlAgentHandle(model: string, options: SqlAgentOptions): AgentHandle {
  return new SqlAgent(model, buildSqlAgentExecutor(options));
}

// ----------------------------------------------------------------------
// FACTORY
// ----------------------------------------------------------------------

export interface SqlAgentFactoryDeps {
  config: AppConfig;
  database: SharedConnection<SqlDatabase>;
}

export function createSqlAgentFactory({ config, database }: SqlAgentFactoryDeps): AgentFactory {
  return async (model: string) => {
    const llm = createChatModel(model, config);
    const db = await database.get();
    const toolkit = new SqlToolkit(db, llm);
    const { tools } = toolkit;

    console.log(`\n--- Agent Tools (${tools.length}) ---`);
    for (const tool of tools) {
      console.log(`- ${tool.name}: ${tool.description.trim().split('.')[0]}`);
    }
    console.log('----------------------------\n');

    return createSqlAgentHandle(model, {
      llm,
      tools,
      dialect: db.appDataSourceOptions.type,
      topK: config.sqlTopK,
      maxIterations: config.agentMaxIterations,
      verbose: config.agentVerbose,
    });
  };
}

// ----------------------------------------------------------------------
// REGISTRY
// ----------------------------------------------------------------------

/**
 * Agents keyed by model name for the life of the process. The first request
 * for a model builds its agent; concurrent requests wait on the same build and
 * a failed build is not cached.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, AgentHandle>();
  private readonly pending = new Map<string, Promise<AgentHandle>>();

  constructor(private readonly factory: AgentFactory) {}

  async resolve(model: string): Promise<AgentHandle> {
    if (model.trim().length === 0) {
      throw new RangeError('Model identifier must be a non-empty string');
    }

    const cached = this.agents.get(model);
    if (cached) {
      return cached;
    }

    const inFlight = this.pending.get(model);
    if (inFlight) {
      return inFlight;
    }

    console.log(`🤖 Initializing agent for model: ${model}`);
    const build = this.factory(model)
      .then((agent) => {
        this.agents.set(model, agent);
        return agent;
      })
      .finally(() => {
        this.pending.delete(model);
      });
    this.pending.set(model, build);
    return build;
  }

  has(model: string): boolean {
    return this.agents.has(model);
  }

  get size(): number {
    return this.agents.size;
  }
}
