import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { SimilarityIndex } from '../../src/memory/index-store.js';
import { TfIdfBackend } from '../../src/memory/similarity.js';
import type { SimilarityBackend } from '../../src/memory/similarity.js';
import type { MemoryRecord } from '../../src/memory/types.js';
import { SnapshotError } from '../../src/errors.js';

function tmpDir(): string {
  const dir = path.join(os.tmpdir(), `warden-index-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function record(key: string, plan: string = 'warn_user'): MemoryRecord {
  return {
    key,
    sourceText: key,
    stateSnapshot: 'bans:0, warnings:0',
    correctionReasoning: 'test reasoning',
    correctionPlan: plan,
    tag: 'firm_professional',
  };
}

describe('SimilarityIndex', () => {
  let index: SimilarityIndex;

  beforeEach(() => {
    index = new SimilarityIndex(new TfIdfBackend());
  });

  it('returns nothing from an empty index', async () => {
    expect(await index.search('hello', 3, 0.05)).toEqual([]);
  });

  it('finds an exact key with similarity 1', async () => {
    await index.add(record('go kys lol', 'ban_user'));

    const results = await index.search('go kys lol', 1, 0.05);
    expect(results).toHaveLength(1);
    expect(results[0].record.correctionPlan).toBe('ban_user');
    expect(results[0].similarity).toBeCloseTo(1, 6);
    expect(results[0].position).toBe(0);
  });

  it('rejects an empty key', async () => {
    await expect(index.add(record('   '))).rejects.toThrow('must not be empty');
    expect(index.size).toBe(0);
  });

  it('ranks by descending similarity and drops scores under the threshold', async () => {
    await index.bulkLoad([
      record('spam link free coins'),
      record('free coins'),
      record('hello chat'),
    ]);

    const results = await index.search('free coins', 3, 0.05);
    expect(results.map((r) => r.position)).toEqual([1, 0]);
    expect(results.every((r) => r.similarity >= 0.05)).toBe(true);
  });

  it('breaks ties by insertion order', async () => {
    await index.add(record('same words here', 'first'));
    await index.add(record('unrelated chatter'));
    await index.add(record('same words here', 'second'));

    const results = await index.search('same words here', 3, 0.5);
    expect(results.map((r) => r.record.correctionPlan)).toEqual(['first', 'second']);
    expect(results.map((r) => r.position)).toEqual([0, 2]);
  });

  it('returns at most topK results', async () => {
    await index.bulkLoad([record('free coins'), record('free coins now'), record('free coins today')]);

    expect(await index.search('free coins', 2, 0)).toHaveLength(2);
    expect(await index.search('free coins', 0, 0)).toEqual([]);
  });

  it('hands out copies', async () => {
    await index.add(record('go kys lol'));
    const [listed] = index.list();
    expect(Object.isFrozen(listed)).toBe(false);
    expect(listed).toEqual(record('go kys lol'));
  });

  it('searches nothing after a failed refit', async () => {
    let failing = false;
    const inner = new TfIdfBackend();
    const flaky: SimilarityBackend = {
      name: 'flaky',
      fit: async (corpus) => {
        if (failing) throw new Error('backend down');
        await inner.fit(corpus);
      },
      score: (query) => inner.score(query),
      reset: () => inner.reset(),
    };

    const flakyIndex = new SimilarityIndex(flaky);
    await flakyIndex.add(record('go kys lol'));
    expect(flakyIndex.isFitted).toBe(true);

    failing = true;
    await flakyIndex.add(record('free coins'));
    expect(flakyIndex.size).toBe(2);
    expect(flakyIndex.isFitted).toBe(false);
    expect(await flakyIndex.search('go kys lol', 3, 0)).toEqual([]);
  });

  it('treats a scoring failure as no matches', async () => {
    const broken: SimilarityBackend = {
      name: 'broken',
      fit: async () => {},
      score: async () => { throw new Error('scoring exploded'); },
      reset: () => {},
    };
    const brokenIndex = new SimilarityIndex(broken);
    await brokenIndex.add(record('go kys lol'));

    expect(await brokenIndex.search('go kys lol', 3, 0)).toEqual([]);
  });
});

describe('SimilarityIndex persistence', () => {
  let dir: string;

  beforeEach(() => { dir = tmpDir(); });
  afterEach(() => {
    try { fs.rmSync(dir, { recursive: true, force: true }); } catch { /* ignore */ }
  });

  it('round-trips through a snapshot', async () => {
    const snapshot = path.join(dir, 'nested', 'memory.json');
    const index = new SimilarityIndex(new TfIdfBackend());
    await index.add(record('go kys lol', 'ban_user'));
    await index.add(record('free coins', 'delete_comment'));
    index.save(snapshot);

    const restored = new SimilarityIndex(new TfIdfBackend());
    expect(await restored.load(snapshot)).toBe(2);
    expect(restored.list()).toEqual(index.list());

    const [top] = await restored.search('free coins', 1, 0.05);
    expect(top.record.correctionPlan).toBe('delete_comment');
  });

  it('writes the snapshot field names', async () => {
    const snapshot = path.join(dir, 'memory.json');
    const index = new SimilarityIndex(new TfIdfBackend());
    await index.add(record('go kys lol', 'ban_user'));
    index.save(snapshot);

    const written: unknown = JSON.parse(fs.readFileSync(snapshot, 'utf-8'));
    expect(written).toEqual([{
      state: 'go kys lol',
      comment: 'go kys lol',
      stateMetrics: 'bans:0, warnings:0',
      reasoning: 'test reasoning',
      plan: 'ban_user',
      persona: 'firm_professional',
    }]);
  });

  it('loads the older four-field layout', async () => {
    const snapshot = path.join(dir, 'memory.json');
    fs.writeFileSync(snapshot, JSON.stringify([
      { state: 'go kys lol', reasoning: 'threat', plan: 'ban_user', persona: 'firm_professional' },
    ]));

    const index = new SimilarityIndex(new TfIdfBackend());
    await index.load(snapshot);
    expect(index.list()).toEqual([{
      key: 'go kys lol',
      sourceText: '',
      stateSnapshot: '',
      correctionReasoning: 'threat',
      correctionPlan: 'ban_user',
      tag: 'firm_professional',
    }]);
  });

  it('starts empty when the snapshot is missing', async () => {
    const index = new SimilarityIndex(new TfIdfBackend());
    expect(await index.load(path.join(dir, 'absent.json'))).toBe(0);
    expect(index.size).toBe(0);
  });

  it('rejects malformed snapshots', async () => {
    const badJson = path.join(dir, 'bad.json');
    fs.writeFileSync(badJson, '{not json');
    const blankKey = path.join(dir, 'blank.json');
    fs.writeFileSync(blankKey, JSON.stringify([{ state: '  ', plan: 'ban_user' }]));

    const index = new SimilarityIndex(new TfIdfBackend());
    await expect(index.load(badJson)).rejects.toBeInstanceOf(SnapshotError);
    await expect(index.load(blankKey)).rejects.toThrow('0.state');
    expect(index.size).toBe(0);
  });
});
