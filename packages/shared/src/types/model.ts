export type ModelProviderName = 'anthropic' | 'openai';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ModelRequest {
  model: string;
  provider: ModelProviderName;
  system?: string;
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  responseFormat?: 'text' | 'json';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResponse {
  model: string;
  provider: ModelProviderName;
  content: string;
  tokenUsage: TokenUsage;
  latencyMs: number;
  finishReason: 'stop' | 'length' | 'error';
}
