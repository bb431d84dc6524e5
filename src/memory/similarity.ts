import * as fs from 'fs';
import { z } from 'zod';
import { createEmbedder, normalizeVector } from './embeddings.js';
import type { Embedder, EmbeddingProvider } from './embeddings.js';
import type { SimilarityBackendKind } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('similarity');

/**
 * Capability interface behind the similarity index. `fit` replaces whatever
 * was fitted before; `score` returns one similarity per fitted document, in
 * corpus order.
 */
export interface SimilarityBackend {
  readonly name: string;
  fit(corpus: string[]): Promise<void>;
  score(query: string): Promise<number[]>;
  reset(): void;
}

const STOP_WORDS_URL = new URL('../../data/stopwords.json', import.meta.url);

let stopWords: ReadonlySet<string> | null = null;

export function loadStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    const raw: unknown = JSON.parse(fs.readFileSync(STOP_WORDS_URL, 'utf-8'));
    stopWords = new Set(z.array(z.string()).parse(raw));
  }
  return stopWords;
}

/**
 * Lowercased word tokens of two or more characters, stop words removed.
 */
export function tokenize(text: string, stop: ReadonlySet<string> = loadStopWords()): string[] {
  const tokens = text.toLowerCase().match(/[\p{L}\p{N}_]{2,}/gu) ?? [];
  return tokens.filter((token) => !stop.has(token));
}

type SparseVector = Map<number, number>;

/**
 * Term-frequency × smoothed inverse document frequency, L2-normalised,
 * compared by cosine similarity.
 */
export class TfIdfBackend implements SimilarityBackend {
  readonly name = 'lexical';

  private vocabulary = new Map<string, number>();
  private idf: number[] = [];
  private documents: SparseVector[] = [];

  async fit(corpus: string[]): Promise<void> {
    this.reset();

    const tokenized = corpus.map((doc) => tokenize(doc));
    const documentFrequency: number[] = [];

    for (const tokens of tokenized) {
      for (const term of new Set(tokens)) {
        let index = this.vocabulary.get(term);
        if (index === undefined) {
          index = this.vocabulary.size;
          this.vocabulary.set(term, index);
          documentFrequency.push(0);
        }
        documentFrequency[index] += 1;
      }
    }

    const n = corpus.length;
    this.idf = documentFrequency.map((df) => Math.log((1 + n) / (1 + df)) + 1);
    this.documents = tokenized.map((tokens) => this.vectorize(tokens));
  }

  async score(query: string): Promise<number[]> {
    if (this.documents.length === 0) return [];

    const queryVector = this.vectorize(tokenize(query));
    return this.documents.map((doc) => Math.min(1, dot(queryVector, doc)));
  }

  reset(): void {
    this.vocabulary = new Map();
    this.idf = [];
    this.documents = [];
  }

  get vocabularySize(): number {
    return this.vocabulary.size;
  }

  // Terms outside the fitted vocabulary carry no weight
  private vectorize(tokens: string[]): SparseVector {
    const vector: SparseVector = new Map();
    for (const token of tokens) {
      const index = this.vocabulary.get(token);
      if (index === undefined) continue;
      vector.set(index, (vector.get(index) ?? 0) + 1);
    }

    let norm = 0;
    for (const [index, tf] of vector) {
      const weight = tf * this.idf[index];
      vector.set(index, weight);
      norm += weight * weight;
    }
    norm = Math.sqrt(norm);

    if (norm > 0) {
      for (const [index, weight] of vector) {
        vector.set(index, weight / norm);
      }
    }
    return vector;
  }
}

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [index, weight] of small) {
    const other = large.get(index);
    if (other !== undefined) sum += weight * other;
  }
  return sum;
}

/**
 * Dense embeddings, normalised so a dot product is the cosine.
 */
export class EmbeddingBackend implements SimilarityBackend {
  readonly name: string;
  private matrix: Float32Array[] = [];

  constructor(private embedder: Embedder) {
    this.name = `embedding:${embedder.name}`;
  }

  async fit(corpus: string[]): Promise<void> {
    this.reset();
    if (corpus.length === 0) return;

    const embeddings = await this.embedder.embedBatch(corpus);
    if (embeddings.length !== corpus.length) {
      throw new Error(`Embedder returned ${embeddings.length} vectors for ${corpus.length} documents`);
    }
    this.matrix = embeddings.map((e) => normalizeVector(Float32Array.from(e)));
  }

  async score(query: string): Promise<number[]> {
    if (this.matrix.length === 0) return [];

    const queryVector = normalizeVector(Float32Array.from(await this.embedder.embed(query)));
    return this.matrix.map((row) => {
      const length = Math.min(row.length, queryVector.length);
      let sum = 0;
      for (let i = 0; i < length; i++) {
        sum += row[i] * queryVector[i];
      }
      return sum;
    });
  }

  reset(): void {
    this.matrix = [];
  }
}

export interface SimilarityBackendOptions {
  backend: SimilarityBackendKind;
  embeddingProvider?: EmbeddingProvider;
  embeddingModel?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Pick the backend named by configuration. An embedding provider that cannot
 * be reached degrades to the lexical backend instead of failing the run.
 */
export async function createSimilarityBackend(
  options: SimilarityBackendOptions
): Promise<SimilarityBackend> {
  if (options.backend === 'lexical') {
    return new TfIdfBackend();
  }

  const env = options.env ?? process.env;
  try {
    const embedder = await createEmbedder({
      provider: options.embeddingProvider ?? 'ollama',
      model: options.embeddingModel,
      ollamaUrl: env.OLLAMA_HOST,
      openaiApiKey: env.OPENAI_API_KEY,
    });
    return new EmbeddingBackend(embedder);
  } catch (error) {
    log.warn('Embedding backend unavailable, using lexical similarity', error);
    return new TfIdfBackend();
  }
}
