/**
 * OpenAI-compatible chat completions.
 *
 * Also serves Together and any other endpoint that speaks the same protocol;
 * only the base URL and provider label differ.
 */

import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  OpenAIConfig,
} from './types.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const TOGETHER_BASE_URL = 'https://api.together.xyz/v1';

export class OpenAIAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider: 'openai' | 'together';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.provider = config.provider ?? 'openai';
    const defaultUrl = this.provider === 'together' ? TOGETHER_BASE_URL : OPENAI_BASE_URL;
    this.baseUrl = (config.baseUrl ?? defaultUrl).replace(/\/$/, '');
    this.name = `${this.provider}:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: request.messages,
        temperature: request.temperature ?? 0.4,
        max_tokens: request.maxTokens ?? 256,
        response_format: request.json ? { type: 'json_object' } : undefined,
      }),
    });

    if (!response.ok) {
      const error = await response.json().catch(() => null) as { error?: { message?: string } } | null;
      throw new Error(`${this.provider} error: ${error?.error?.message ?? response.statusText}`);
    }

    const data = await response.json() as OpenAIResponse;
    const choice = data.choices[0];
    if (!choice) {
      throw new Error(`${this.provider} returned no choices`);
    }

    const promptTokens = data.usage?.prompt_tokens ?? 0;
    const completionTokens = data.usage?.completion_tokens ?? 0;

    return {
      content: choice.message.content ?? '',
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: data.usage?.total_tokens ?? promptTokens + completionTokens,
      },
      finishReason: mapFinishReason(choice.finish_reason),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: { 'Authorization': `Bearer ${this.apiKey}` },
        signal: AbortSignal.timeout(10000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}

function mapFinishReason(reason: string | null): CompletionResponse['finishReason'] {
  switch (reason) {
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'stop';
  }
}

interface OpenAIResponse {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}
