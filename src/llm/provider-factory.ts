import { LlmProvider } from './types';
import { OllamaProvider } from './providers/ollama-provider';
import { OpenAIProvider } from './providers/openai-provider';
import { createContextLogger } from '../utils/logger';

const logger = createContextLogger({ step: 'provider-factory' });

export function createLlmProvider(providerName?: string): LlmProvider {
  const provider = (providerName || process.env.LLM_PROVIDER || 'openai').toLowerCase();

  logger.info('Creating LLM provider', { provider });

  switch (provider) {
    case 'ollama':
      return new OllamaProvider();
    case 'openai':
      if (!OpenAIProvider.isAvailable()) {
        logger.warn('OpenAI provider requested but OPENAI_API_KEY not available, falling back to Ollama', {
          requested_provider: provider,
          fallback_provider: 'ollama',
        });
        return new OllamaProvider();
      }
      return OpenAIProvider.fromEnv();
    case 'openrouter':
      if (!OpenAIProvider.isOpenRouterAvailable()) {
        logger.warn('OpenRouter provider requested but OPENROUTER_API_KEY not available, falling back to Ollama', {
          requested_provider: provider,
          fallback_provider: 'ollama',
        });
        return new OllamaProvider();
      }
      return OpenAIProvider.openRouterFromEnv();
    default:
      logger.warn('Unknown provider specified, defaulting to Ollama', {
        requested_provider: provider,
        default_provider: 'ollama',
      });
      return new OllamaProvider();
  }
}

/**
 * Second provider tried when the primary one fails. None unless
 * LLM_FALLBACK_PROVIDER is set.
 */
export function createFallbackProvider(): LlmProvider | undefined {
  const fallbackProvider = process.env.LLM_FALLBACK_PROVIDER;
  if (!fallbackProvider) {
    return undefined;
  }

  logger.info('Creating fallback LLM provider', { provider: fallbackProvider });

  return createLlmProvider(fallbackProvider);
}
