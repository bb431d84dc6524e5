import { describe, it, expect } from 'vitest';
import {
  TfIdfBackend,
  EmbeddingBackend,
  createSimilarityBackend,
  tokenize,
  loadStopWords,
} from '../../src/memory/similarity.js';
import { HashEmbedder } from '../../src/memory/embeddings.js';
import type { Embedder } from '../../src/memory/embeddings.js';

describe('tokenize', () => {
  it('lowercases and drops stop words', () => {
    expect(tokenize('The quick brown FOX, the fox!')).toEqual(['quick', 'brown', 'fox', 'fox']);
  });

  it('keeps digits and underscores, drops single characters', () => {
    expect(tokenize('timeout_user 10m x')).toEqual(['timeout_user', '10m']);
  });

  it('ships a stop word list', () => {
    const stop = loadStopWords();
    expect(stop.has('the')).toBe(true);
    expect(stop.has('kys')).toBe(false);
  });
});

describe('TfIdfBackend', () => {
  it('scores an identical document as 1', async () => {
    const backend = new TfIdfBackend();
    await backend.fit(['go kys lol', 'nice stream tonight']);

    const [same, other] = await backend.score('go kys lol');
    expect(same).toBeCloseTo(1, 6);
    expect(other).toBe(0);
  });

  it('returns one score per document in corpus order', async () => {
    const backend = new TfIdfBackend();
    await backend.fit(['spam link free coins', 'free coins', 'hello chat']);

    const scores = await backend.score('free coins');
    expect(scores).toHaveLength(3);
    expect(scores[1]).toBeCloseTo(1, 6);
    expect(scores[0]).toBeGreaterThan(0);
    expect(scores[0]).toBeLessThan(scores[1]);
    expect(scores[2]).toBe(0);
  });

  it('ignores query terms outside the vocabulary', async () => {
    const backend = new TfIdfBackend();
    await backend.fit(['hello chat']);

    expect(await backend.score('completely unrelated words')).toEqual([0]);
  });

  it('scores nothing before fit and after reset', async () => {
    const backend = new TfIdfBackend();
    expect(await backend.score('anything')).toEqual([]);

    await backend.fit(['hello chat']);
    expect(backend.vocabularySize).toBe(2);

    backend.reset();
    expect(backend.vocabularySize).toBe(0);
    expect(await backend.score('hello')).toEqual([]);
  });

  it('refits from scratch', async () => {
    const backend = new TfIdfBackend();
    await backend.fit(['first corpus']);
    await backend.fit(['second corpus', 'third document']);

    expect(await backend.score('first')).toEqual([0, 0]);
  });
});

describe('EmbeddingBackend', () => {
  it('scores an identical text as 1 with the hash embedder', async () => {
    const backend = new EmbeddingBackend(new HashEmbedder());
    await backend.fit(['go kys lol', 'your audio is peaking']);

    const [same, other] = await backend.score('go kys lol');
    expect(backend.name).toBe('embedding:hash');
    expect(same).toBeCloseTo(1, 5);
    expect(other).toBeLessThan(same);
  });

  it('rejects an embedder that returns the wrong number of vectors', async () => {
    const broken: Embedder = {
      name: 'broken',
      initialize: async () => {},
      embed: async () => new Float32Array([1]),
      embedBatch: async () => [new Float32Array([1])],
    };
    const backend = new EmbeddingBackend(broken);

    await expect(backend.fit(['a text', 'another text'])).rejects.toThrow('1 vectors for 2 documents');
  });
});

describe('createSimilarityBackend', () => {
  it('builds the lexical backend by default configuration', async () => {
    const backend = await createSimilarityBackend({ backend: 'lexical' });
    expect(backend).toBeInstanceOf(TfIdfBackend);
  });

  it('builds an embedding backend for the offline hash embedder', async () => {
    const backend = await createSimilarityBackend({ backend: 'embedding', embeddingProvider: 'simple' });
    expect(backend).toBeInstanceOf(EmbeddingBackend);
    expect(backend.name).toBe('embedding:hash');
  });

  it('falls back to lexical when the embedder cannot start', async () => {
    const backend = await createSimilarityBackend({
      backend: 'embedding',
      embeddingProvider: 'openai',
      env: {},
    });
    expect(backend).toBeInstanceOf(TfIdfBackend);
  });
});
