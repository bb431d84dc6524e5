import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SnapshotError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { SimilarityBackend } from './similarity.js';
import type { MemoryRecord, PersistedRecord, SearchResult } from './types.js';

const log = createLogger('memory');

const nonBlank = z.string().refine((s) => s.trim().length > 0, 'key must not be empty');

// Fields beyond `state` default so snapshots from older layouts still load
const PersistedRecordSchema = z.object({
  state: nonBlank,
  comment: z.string().default(''),
  stateMetrics: z.string().default(''),
  reasoning: z.string().default(''),
  plan: z.string().default(''),
  persona: z.string().default(''),
});

const SnapshotSchema = z.array(PersistedRecordSchema);

export function toPersisted(record: MemoryRecord): PersistedRecord {
  return {
    state: record.key,
    comment: record.sourceText,
    stateMetrics: record.stateSnapshot,
    reasoning: record.correctionReasoning,
    plan: record.correctionPlan,
    persona: record.tag,
  };
}

export function fromPersisted(entry: PersistedRecord): MemoryRecord {
  return {
    key: entry.state,
    sourceText: entry.comment,
    stateSnapshot: entry.stateMetrics,
    correctionReasoning: entry.reasoning,
    correctionPlan: entry.plan,
    tag: entry.persona,
  };
}

/**
 * Text-keyed store of past corrections with ranked similarity search.
 *
 * The backend is refitted over every key after each insertion, so a search
 * issued after `add` resolves always sees the new record. Searching never
 * throws: an empty, unfitted or failing index answers with no results.
 */
export class SimilarityIndex {
  private records: MemoryRecord[] = [];
  private fitted = false;

  constructor(private backend: SimilarityBackend) {}

  get size(): number {
    return this.records.length;
  }

  get backendName(): string {
    return this.backend.name;
  }

  get isFitted(): boolean {
    return this.fitted;
  }

  list(): MemoryRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  async add(record: MemoryRecord): Promise<void> {
    assertKey(record);
    this.records.push(Object.freeze({ ...record }));
    await this.refit();
  }

  async bulkLoad(records: MemoryRecord[]): Promise<void> {
    records.forEach(assertKey);
    for (const record of records) {
      this.records.push(Object.freeze({ ...record }));
    }
    await this.refit();
  }

  async search(query: string, topK: number, minSimilarity: number): Promise<SearchResult[]> {
    if (this.records.length === 0 || !this.fitted || topK <= 0) {
      return [];
    }

    let scores: number[];
    try {
      scores = await this.backend.score(query);
    } catch (error) {
      log.warn(`Scoring failed on ${this.backend.name}, returning no matches`, error);
      return [];
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order
    return scores
      .map((similarity, position) => ({ similarity, position }))
      .filter((candidate) => candidate.similarity >= minSimilarity)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK)
      .map(({ similarity, position }) => ({
        record: { ...this.records[position] },
        similarity,
        position,
      }));
  }

  save(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const payload = this.records.map(toPersisted);
    fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), 'utf-8');
  }

  /**
   * Append records from a snapshot. Returns how many were loaded; a missing
   * file loads nothing.
   */
  async load(filePath: string): Promise<number> {
    if (!fs.existsSync(filePath)) {
      return 0;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new SnapshotError(filePath, error instanceof Error ? error.message : 'unreadable');
    }

    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SnapshotError(filePath, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }

    await this.bulkLoad(parsed.data.map(fromPersisted));
    return parsed.data.length;
  }

  private async refit(): Promise<void> {
    try {
      await this.backend.fit(this.records.map((record) => record.key));
      this.fitted = true;
    } catch (error) {
      log.warn(`Refit failed on ${this.backend.name}; searches return nothing until the next fit`, error);
      this.backend.reset();
      this.fitted = false;
    }
  }
}

function assertKey(record: MemoryRecord): void {
  if (record.key.trim().length === 0) {
    throw new Error('Memory record key must not be empty');
  }
}
