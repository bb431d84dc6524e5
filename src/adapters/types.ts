/**
 * Type definitions for model adapters
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  json?: boolean;           // Ask the provider for a JSON object where it supports that
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
}

export type ModelProvider = 'ollama' | 'openai' | 'together' | 'anthropic';

export interface ModelAdapter {
  readonly name: string;
  readonly provider: ModelProvider;
  readonly model: string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Check if the adapter is properly configured and reachable
   */
  healthCheck(): Promise<boolean>;
}

export interface OllamaConfig {
  baseUrl: string;
  model: string;
}

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  provider?: 'openai' | 'together';
}

export interface AnthropicConfig {
  apiKey: string;
  model: string;
}
