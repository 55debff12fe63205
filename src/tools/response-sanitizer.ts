/**
 * Response Sanitizer
 * Turns a ReAct parse failure into an observation the agent can act on.
 *
 * Models often answer in plain prose and forget the `Final Answer:` prefix the
 * parser needs. The raw text is recovered from the parse error and handed back
 * with an instruction to repeat it in the expected shape, so the executor loop
 * continues instead of failing the request.
 */

export const PARSE_FAILURE_MARKER = 'Could not parse LLM output: `';

// @langchain/core appends this to its error messages
const TROUBLESHOOTING_FOOTER = /\n+Troubleshooting URL: \S+\s*$/;

export function extractAnswer(errorText: string): string {
  const parts = errorText.split(PARSE_FAILURE_MARKER);
  if (parts.length > 1) {
    let response = parts[1];
    if (response.endsWith('`')) {
      response = response.slice(0, -1);
    }
    return `Output parsed but format incorrect. Please repeat this EXACT answer with the prefix 'Final Answer:': ${response}`;
  }

  return `Error: ${errorText}. Please check your output format. If you have the answer, output it as 'Final Answer: [your answer]'.`;
}

/**
 * `handleParsingErrors` hook for the agent executor.
 */
export function handleParsingError(error: Error): string {
  return extractAnswer(error.message.replace(TROUBLESHOOTING_FOOTER, ''));
}
