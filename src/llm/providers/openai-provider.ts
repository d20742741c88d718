import OpenAI from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatMessage, LlmProvider, LlmResult, LlmGenerationOptions, hasImages } from '../types';
import { createContextLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { retryWithBackoff, isRateLimitError, isRetryableError } from '../../utils/retry-handler';

export interface OpenAIProviderOptions {
  name?: string;
  apiKey: string;
  baseURL?: string;
  defaultModel: string;
  // Used instead of defaultModel when a message carries images
  visionModel?: string;
  defaultTemperature: number;
  defaultHeaders?: Record<string, string>;
}

export function toOpenAIMessage(msg: ChatMessage): ChatCompletionMessageParam {
  if (msg.role === 'user' && msg.images && msg.images.length > 0) {
    return {
      role: 'user',
      content: [
        { type: 'text', text: msg.content },
        ...msg.images.map(url => ({ type: 'image_url' as const, image_url: { url } })),
      ],
    };
  }
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
  }
}

/**
 * Chat completions over the OpenAI API, or any endpoint speaking the same
 * protocol (OpenRouter).
 */
export class OpenAIProvider implements LlmProvider {
  public readonly name: string;
  private client: OpenAI;
  private options: OpenAIProviderOptions;

  constructor(options: OpenAIProviderOptions) {
    if (!options.apiKey) {
      throw new Error(`API key is required for ${options.name || 'openai'} provider`);
    }
    this.name = options.name || 'openai';
    this.options = options;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultHeaders: options.defaultHeaders,
    });
  }

  static fromEnv(): OpenAIProvider {
    return new OpenAIProvider({
      apiKey: process.env.OPENAI_API_KEY || '',
      defaultModel: process.env.OPENAI_MODEL || 'gpt-3.5-turbo',
      visionModel: process.env.OPENAI_VISION_MODEL || 'gpt-4o',
      defaultTemperature: parseFloat(process.env.OPENAI_TEMPERATURE || '0.7'),
    });
  }

  static openRouterFromEnv(): OpenAIProvider {
    return new OpenAIProvider({
      name: 'openrouter',
      apiKey: process.env.OPENROUTER_API_KEY || '',
      baseURL: 'https://openrouter.ai/api/v1',
      defaultModel: process.env.OPENROUTER_MODEL || 'deepseek/deepseek-chat-v3.1:free',
      visionModel: process.env.OPENROUTER_VISION_MODEL || 'openai/gpt-4o',
      defaultTemperature: parseFloat(process.env.OPENROUTER_TEMPERATURE || '0.7'),
      defaultHeaders: {
        'HTTP-Referer': process.env.OPENROUTER_SITE_URL || 'http://localhost:3000',
        'X-Title': process.env.OPENROUTER_SITE_NAME || 'QA Test Case Studio',
      },
    });
  }

  static isAvailable(): boolean {
    return !!process.env.OPENAI_API_KEY;
  }

  static isOpenRouterAvailable(): boolean {
    return !!process.env.OPENROUTER_API_KEY;
  }

  async generateCompletion(messages: ChatMessage[], options?: LlmGenerationOptions): Promise<LlmResult> {
    const withImages = hasImages(messages);
    const model = options?.model || (withImages && this.options.visionModel) || this.options.defaultModel;
    const temperature = options?.temperature ?? this.options.defaultTemperature;
    const maxTokens = options?.maxTokens || parseInt(process.env.OPENAI_MAX_TOKENS || '3000', 10);

    const contextLogger = createContextLogger({
      step: 'llm-invocation',
      provider: this.name,
      model,
    });

    contextLogger.debug('Invoking chat completion', { temperature, max_tokens: maxTokens, with_images: withImages });

    const startTime = Date.now();

    try {
      const response = await retryWithBackoff(
        () =>
          this.client.chat.completions.create({
            model,
            messages: messages.map(toOpenAIMessage),
            temperature,
            max_tokens: maxTokens,
          }),
        {
          maxAttempts: 3,
          delayMs: 1000,
          exponentialBackoff: true,
          shouldRetry: isRetryableError,
          onRetry: (attempt, error) => {
            if (isRateLimitError(error)) {
              contextLogger.warn('Rate limit hit, retrying', { attempt });
            } else {
              contextLogger.warn('Retryable error encountered', { attempt, error: error.message });
            }
          },
        }
      );

      const usage = response.usage;
      const content = response.choices[0]?.message?.content;

      contextLogger.debug('Chat completion received', {
        total_tokens: usage?.total_tokens,
        duration_ms: Date.now() - startTime,
        response_length: content?.length || 0,
      });

      if (!content) {
        throw new Error(`Empty response from ${this.name}`);
      }

      return {
        content,
        model,
        temperature,
        usage: {
          prompt_tokens: usage?.prompt_tokens,
          completion_tokens: usage?.completion_tokens,
          total_tokens: usage?.total_tokens,
        },
      };
    } catch (error) {
      contextLogger.error('Chat completion failed', {
        error: errorMessage(error),
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }
}
