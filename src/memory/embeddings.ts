// Dense text embedders used by the embedding similarity backend.

export const HASH_EMBEDDING_DIM = 256;

export interface Embedder {
  readonly name: string;
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

/**
 * Feature-hashing embedder over words and character trigrams.
 * Deterministic and offline; meant for tests and air-gapped runs, not quality.
 */
export class HashEmbedder implements Embedder {
  readonly name = 'hash';

  constructor(readonly dimensions: number = HASH_EMBEDDING_DIM) {}

  async initialize(): Promise<void> {
    // Nothing to load
  }

  async embed(text: string): Promise<Float32Array> {
    return this.hashToVector(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.hashToVector(text));
  }

  private hashToVector(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    const normalized = text.toLowerCase().trim();

    for (const word of normalized.split(/\s+/).filter(Boolean)) {
      vector[fnv1a(word) % this.dimensions] += 1;

      const padded = ` ${word} `;
      for (let i = 0; i + 3 <= padded.length; i++) {
        vector[fnv1a(padded.slice(i, i + 3)) % this.dimensions] += 0.5;
      }
    }

    return normalizeVector(vector);
  }
}

export class OllamaEmbedder implements Embedder {
  readonly name = 'ollama';

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text'
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async initialize(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(5000),
    });
    if (!response.ok) {
      throw new Error(`Ollama server at ${this.baseUrl} not responding`);
    }

    const data = await response.json() as { models?: Array<{ name: string }> };
    const hasModel = data.models?.some((m) => m.name.includes(this.model)) ?? false;
    if (!hasModel) {
      throw new Error(`Embedding model ${this.model} is not pulled on ${this.baseUrl}`);
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, input: texts }),
    });

    if (!response.ok) {
      throw new Error(`Ollama embedding failed: ${await response.text()}`);
    }

    const data = await response.json() as { embeddings: number[][] };
    return data.embeddings.map((e) => new Float32Array(e));
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';

  constructor(
    private apiKey: string,
    private model: string = 'text-embedding-3-small'
  ) {}

  async initialize(): Promise<void> {
    try {
      await this.embed('ping');
    } catch (error) {
      throw new Error(`OpenAI embeddings unavailable: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await fetch('https://api.openai.com/v1/embeddings', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ model: this.model, input: texts }),
    });

    if (!response.ok) {
      throw new Error(`OpenAI embedding failed: ${await response.text()}`);
    }

    const data = await response.json() as {
      data: Array<{ embedding: number[]; index: number }>;
    };

    // Response order is not guaranteed
    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => new Float32Array(d.embedding));
  }
}

export type EmbeddingProvider = 'simple' | 'ollama' | 'openai';

export interface EmbedderConfig {
  provider: EmbeddingProvider;
  model?: string;
  ollamaUrl?: string;
  openaiApiKey?: string;
}

/**
 * Build and initialize an embedder. Throws when the provider is unreachable;
 * the similarity backend factory decides what to fall back to.
 */
export async function createEmbedder(config: EmbedderConfig): Promise<Embedder> {
  let embedder: Embedder;

  switch (config.provider) {
    case 'simple':
      embedder = new HashEmbedder();
      break;

    case 'ollama':
      embedder = new OllamaEmbedder(
        config.ollamaUrl ?? 'http://127.0.0.1:11434',
        config.model ?? 'nomic-embed-text'
      );
      break;

    case 'openai':
      if (!config.openaiApiKey) {
        throw new Error('OpenAI API key required for OpenAI embeddings');
      }
      embedder = new OpenAIEmbedder(config.openaiApiKey, config.model ?? 'text-embedding-3-small');
      break;

    default: {
      const unknown: never = config.provider;
      throw new Error(`Unknown embedding provider: ${String(unknown)}`);
    }
  }

  await embedder.initialize();
  return embedder;
}

export function normalizeVector(vector: Float32Array): Float32Array {
  let norm = 0;
  for (let i = 0; i < vector.length; i++) {
    norm += vector[i] * vector[i];
  }
  norm = Math.sqrt(norm);

  if (norm > 0) {
    for (let i = 0; i < vector.length; i++) {
      vector[i] /= norm;
    }
  }
  return vector;
}

function fnv1a(str: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
