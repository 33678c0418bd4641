import { LLMProvider, LLMProviderConfig, LLMRetryPolicy } from './types';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

/**
 * Build the model provider from environment configuration.
 * Fails fast when no API key is configured.
 */
export function buildProvider(config: LLMProviderConfig, retryPolicy: LLMRetryPolicy): LLMProvider {
  if (!config.apiKey) {
    throw new Error('No LLM provider configured. Set GEMINI_API_KEY in the environment or .env file.');
  }

  const provider = new GeminiProvider(config, retryPolicy);
  logger.child({ component: 'provider-factory' }).info(
    { model: config.model, retryAttempts: retryPolicy.attempts },
    'Gemini provider initialized',
  );
  return provider;
}
