import { Ollama } from 'ollama';
import { ChatMessage, LlmProvider, LlmResult, LlmGenerationOptions, hasImages } from '../types';
import { createContextLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

// Ollama takes raw base64 without the data URL header
export function toOllamaImage(dataUrl: string): string {
  const commaIndex = dataUrl.indexOf(',');
  return dataUrl.startsWith('data:') && commaIndex >= 0 ? dataUrl.slice(commaIndex + 1) : dataUrl;
}

export class OllamaProvider implements LlmProvider {
  public readonly name = 'ollama';
  private client: Ollama;
  private baseUrl: string;

  constructor(baseUrl: string = process.env.OLLAMA_BASE_URL || 'http://localhost:11434') {
    this.baseUrl = baseUrl;
    this.client = new Ollama({ host: this.baseUrl });
  }

  async generateCompletion(messages: ChatMessage[], options?: LlmGenerationOptions): Promise<LlmResult> {
    const model = options?.model
      || (hasImages(messages) ? process.env.OLLAMA_VISION_MODEL || 'llava' : process.env.OLLAMA_MODEL || 'llama3');
    const temperature = options?.temperature ?? parseFloat(process.env.OLLAMA_TEMPERATURE || '0.7');
    const maxTokens = options?.maxTokens;

    const contextLogger = createContextLogger({
      step: 'llm-invocation',
      provider: this.name,
      model,
    });

    contextLogger.debug('Invoking Ollama', { temperature, max_tokens: maxTokens, base_url: this.baseUrl });

    const startTime = Date.now();

    try {
      const response = await this.client.chat({
        model,
        messages: messages.map(msg => ({
          role: msg.role,
          content: msg.content,
          ...(msg.images && msg.images.length > 0 && { images: msg.images.map(toOllamaImage) }),
        })),
        stream: false,
        options: {
          temperature,
          ...(maxTokens && { num_predict: maxTokens }),
        },
      });

      contextLogger.debug('Ollama response received', {
        duration_ms: Date.now() - startTime,
        response_length: response.message?.content?.length || 0,
      });

      if (!response.message?.content) {
        throw new Error('Empty response from Ollama');
      }

      return {
        content: response.message.content,
        model,
        temperature,
        usage: {
          prompt_tokens: response.prompt_eval_count,
          completion_tokens: response.eval_count,
          total_tokens: (response.prompt_eval_count || 0) + (response.eval_count || 0),
        },
      };
    } catch (error) {
      contextLogger.error('Ollama invocation failed', {
        error: errorMessage(error),
        duration_ms: Date.now() - startTime,
        base_url: this.baseUrl,
      });
      throw error;
    }
  }
}
