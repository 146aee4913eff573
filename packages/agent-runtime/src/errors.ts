import { ModelProviderError } from '@parley/core';

/** Thrown when no LLM provider is configured or every provider failed. */
export class LLMProviderUnavailableError extends ModelProviderError {
  constructor(message = 'All LLM providers exhausted', options?: { cause?: unknown }) {
    super(message, options);
  }
}
