/**
 * ReAct output parser for the SQL agent
 */

import { OutputParserException } from '@langchain/core/output_parsers';
import { ZeroShotAgentOutputParser } from 'langchain/agents';
import { PARSE_FAILURE_MARKER } from './response-sanitizer.js';

/**
 * Same grammar as the zero-shot parser, but every failure carries the raw model
 * output between backticks after PARSE_FAILURE_MARKER, which is the format the
 * response sanitizer extracts from.
 */
export class SqlAgentOutputParser extends ZeroShotAgentOutputParser {
  async parse(text: string) {
    try {
      return await super.parse(text);
    } catch (error) {
      if (error instanceof OutputParserException) {
        throw new OutputParserException(`${PARSE_FAILURE_MARKER}${text}\``, text);
      }
      throw error;
    }
  }
}
