export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  // base64 data URLs sent alongside the text to a vision model
  images?: string[];
}

export function hasImages(messages: ChatMessage[]): boolean {
  return messages.some(msg => (msg.images?.length ?? 0) > 0);
}

export interface LlmResult {
  content: string;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
  model?: string;
  temperature?: number;
}

export interface LlmProvider {
  name: string;
  generateCompletion(messages: ChatMessage[], options?: LlmGenerationOptions): Promise<LlmResult>;
}

export interface LlmGenerationOptions {
  temperature?: number;
  maxTokens?: number;
  model?: string;
}
