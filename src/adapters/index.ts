/**
 * Model Adapters
 *
 * One interface over the chat providers the model-backed agents can call.
 */

export * from './types.js';
export * from './ollama.js';
export * from './openai.js';
export * from './anthropic.js';

import type { ModelAdapter, ModelProvider } from './types.js';
import { OllamaAdapter } from './ollama.js';
import { OpenAIAdapter } from './openai.js';
import { AnthropicAdapter } from './anthropic.js';

export interface AdapterEnv {
  OPENAI_API_KEY?: string;
  TOGETHER_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
  OLLAMA_HOST?: string;
}

const PROVIDERS: readonly ModelProvider[] = ['ollama', 'openai', 'together', 'anthropic'];

export function isModelProvider(value: string): value is ModelProvider {
  return PROVIDERS.some((provider) => provider === value);
}

/**
 * Parse a model string like "ollama:llama3.2" or "together:Qwen/Qwen2.5-7B-Instruct-Turbo"
 */
export function parseModelString(modelString: string): {
  provider: string;
  model: string;
} {
  const colonIndex = modelString.indexOf(':');

  if (colonIndex === -1) {
    // No provider prefix, default to ollama
    return { provider: 'ollama', model: modelString };
  }

  return {
    provider: modelString.slice(0, colonIndex),
    model: modelString.slice(colonIndex + 1),
  };
}

export function createAdapter(
  provider: ModelProvider,
  model: string,
  env: AdapterEnv = process.env,
  baseUrl?: string
): ModelAdapter {
  switch (provider) {
    case 'ollama':
      return new OllamaAdapter({
        baseUrl: baseUrl ?? env.OLLAMA_HOST ?? 'http://127.0.0.1:11434',
        model,
      });

    case 'openai':
      if (!env.OPENAI_API_KEY) {
        throw new Error('OPENAI_API_KEY environment variable required for OpenAI models');
      }
      return new OpenAIAdapter({ apiKey: env.OPENAI_API_KEY, model, baseUrl });

    case 'together':
      if (!env.TOGETHER_API_KEY) {
        throw new Error('TOGETHER_API_KEY environment variable required for Together models');
      }
      return new OpenAIAdapter({ apiKey: env.TOGETHER_API_KEY, model, baseUrl, provider: 'together' });

    case 'anthropic':
      if (!env.ANTHROPIC_API_KEY) {
        throw new Error('ANTHROPIC_API_KEY environment variable required for Anthropic models');
      }
      return new AnthropicAdapter({ apiKey: env.ANTHROPIC_API_KEY, model });

    default: {
      const unknown: never = provider;
      throw new Error(`Unknown provider: ${String(unknown)}`);
    }
  }
}

/**
 * Create a model adapter from a model string and environment
 */
export function createAdapterFromString(
  modelString: string,
  env: AdapterEnv = process.env
): ModelAdapter {
  const { provider, model } = parseModelString(modelString);

  if (!isModelProvider(provider)) {
    throw new Error(`Unknown provider: ${provider}. Use ollama:, openai:, together: or anthropic:`);
  }

  return createAdapter(provider, model, env);
}
