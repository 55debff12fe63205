/**
 * Error types shared by the agent gateway and the HTTP layer
 */

import { RateLimitError } from 'openai';

/**
 * A required setting (credential, connection string) is missing or invalid.
 * Needs an operator fix; retrying the same request will not help.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The database could not be reached while opening the shared connection.
 */
export class DatabaseConnectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DatabaseConnectionError';
  }
}

export const RATE_LIMIT_MESSAGE =
  'Rate limit exceeded (429). The AI model is busy or you have run out of credits. Please try again in 10-20 seconds.';

/**
 * True when a provider rejected the call for rate or quota reasons.
 * LangChain may rethrow the client error, so the status and error code are checked too.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('status' in error && error.status === 429) {
    return true;
  }
  return 'lc_error_code' in error && error.lc_error_code === 'MODEL_RATE_LIMIT';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
