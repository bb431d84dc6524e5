/**
 * Ollama Model Adapter
 *
 * Local models through the Ollama chat endpoint, with JSON output mode.
 */

import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  OllamaConfig,
} from './types.js';

export class OllamaAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'ollama';
  readonly model: string;

  private baseUrl: string;

  constructor(config: OllamaConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
    this.name = `ollama:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages: request.messages,
        stream: false,
        format: request.json ? 'json' : undefined,
        options: {
          temperature: request.temperature ?? 0.4,
          num_predict: request.maxTokens ?? 256,
        },
      }),
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${await response.text()}`);
    }

    const data = await response.json() as OllamaChatResponse;
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      content: data.message.content,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      finishReason: data.done ? 'stop' : 'length',
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      if (!response.ok) return false;

      const data = await response.json() as { models?: Array<{ name: string }> };
      return data.models?.some((m) => m.name.startsWith(this.model)) ?? false;
    } catch {
      return false;
    }
  }
}

interface OllamaChatResponse {
  message: { role: string; content: string };
  done: boolean;
  prompt_eval_count?: number;
  eval_count?: number;
}
