import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  HASH_EMBEDDING_DIM,
  HashEmbedder,
  OllamaEmbedder,
  createEmbedder,
  normalizeVector,
} from '../../src/memory/embeddings.js';

function norm(vector: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HashEmbedder', () => {
  const embedder = new HashEmbedder();

  it('produces fixed-size unit vectors', async () => {
    const emb = await embedder.embed('free coins at my channel');
    expect(emb).toBeInstanceOf(Float32Array);
    expect(emb.length).toBe(HASH_EMBEDDING_DIM);
    expect(norm(emb)).toBeCloseTo(1, 5);
  });

  it('is deterministic and case-insensitive', async () => {
    const a = await embedder.embed('Go KYS lol');
    const b = await embedder.embed('go kys lol');
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it('produces different embeddings for different text', async () => {
    const a = await embedder.embed('apples and oranges');
    const b = await embedder.embed('quantum physics theory');
    expect(Array.from(a)).not.toEqual(Array.from(b));
  });

  it('embeds an empty string as the zero vector', async () => {
    const emb = await embedder.embed('   ');
    expect(norm(emb)).toBe(0);
  });

  it('embeds batches in order', async () => {
    const [first, second] = await embedder.embedBatch(['hello chat', 'go kys lol']);
    expect(Array.from(first)).toEqual(Array.from(await embedder.embed('hello chat')));
    expect(Array.from(second)).toEqual(Array.from(await embedder.embed('go kys lol')));
  });
});

describe('normalizeVector', () => {
  it('scales to unit length in place', () => {
    const vector = Float32Array.from([3, 4]);
    const result = normalizeVector(vector);
    expect(result).toBe(vector);
    expect(result[0]).toBeCloseTo(0.6, 6);
    expect(result[1]).toBeCloseTo(0.8, 6);
  });

  it('leaves the zero vector alone', () => {
    expect(Array.from(normalizeVector(new Float32Array(3)))).toEqual([0, 0, 0]);
  });
});

describe('createEmbedder', () => {
  it('creates the offline hash embedder', async () => {
    const embedder = await createEmbedder({ provider: 'simple' });
    expect(embedder).toBeInstanceOf(HashEmbedder);
  });

  it('requires a key for OpenAI embeddings', async () => {
    await expect(createEmbedder({ provider: 'openai' })).rejects.toThrow('OpenAI API key required');
  });

  it('checks the Ollama model is pulled', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ models: [{ name: 'llama3.2:latest' }] }))));

    await expect(createEmbedder({ provider: 'ollama', ollamaUrl: 'http://localhost:11434' }))
      .rejects.toThrow('Embedding model nomic-embed-text is not pulled on http://localhost:11434');
  });

  it('embeds through Ollama once the model is available', async () => {
    const fetchMock = vi.fn(async (url: string) => {
      if (url.endsWith('/api/tags')) {
        return new Response(JSON.stringify({ models: [{ name: 'nomic-embed-text:latest' }] }));
      }
      return new Response(JSON.stringify({ embeddings: [[0.5, 0.5], [1, 0]] }));
    });
    vi.stubGlobal('fetch', fetchMock);

    const embedder = await createEmbedder({ provider: 'ollama', ollamaUrl: 'http://localhost:11434/' });
    expect(embedder).toBeInstanceOf(OllamaEmbedder);

    const vectors = await embedder.embedBatch(['a', 'b']);
    expect(vectors.map((v) => Array.from(v))).toEqual([[0.5, 0.5], [1, 0]]);
    expect(fetchMock).toHaveBeenLastCalledWith('http://localhost:11434/api/embed', expect.objectContaining({ method: 'POST' }));
  });
});
