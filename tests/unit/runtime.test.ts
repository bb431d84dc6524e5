import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigSchema, initProject, WARDEN_DIR } from '../../src/config/index.js';
import { readEventLog } from '../../src/core/event-log.js';
import { createRuntime, resolveRuntimePaths, unreachableAgents } from '../../src/core/runtime.js';
import { KeywordProposer, RuleReviewer } from '../../src/agents/heuristic.js';
import { conservativeDecision } from '../../src/agents/types.js';
import type { Proposer, Reviewer } from '../../src/agents/types.js';

describe('runtime', () => {
  let dir: string;

  beforeEach(() => {
    dir = path.join(os.tmpdir(), `warden-runtime-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    fs.mkdirSync(dir, { recursive: true });
    initProject(dir);
  });

  afterEach(() => {
    try { fs.rmSync(dir, { recursive: true, force: true }); } catch { /* ignore */ }
  });

  it('resolves the configured files under .warden', () => {
    const paths = resolveRuntimePaths(ConfigSchema.parse({}), dir);
    expect(paths).toEqual({
      memory: path.join(dir, WARDEN_DIR, 'memory.json'),
      ledger: path.join(dir, WARDEN_DIR, 'ledger.json'),
      log: path.join(dir, WARDEN_DIR, 'events.jsonl'),
      data: path.join(dir, WARDEN_DIR, 'events.json'),
    });
  });

  it('wires heuristic agents and carries memory across runs', async () => {
    const config = ConfigSchema.parse({});
    const events = [
      { subjectId: 'bot_1', text: 'check out my channel www.example.test', persona: 'firm_professional' },
    ];

    const first = await createRuntime(config, dir, { env: {} });
    expect(first.restored).toEqual({ records: 0, subjects: 0 });
    expect(first.proposer).toBeInstanceOf(KeywordProposer);
    expect(first.reviewer).toBeInstanceOf(RuleReviewer);
    expect(await unreachableAgents(first)).toEqual([]);

    const summary = await first.orchestrator.run(events);
    expect(summary.memoryAdded).toBe(1);

    const second = await createRuntime(config, dir, { env: {} });
    expect(second.restored).toEqual({ records: 1, subjects: 1 });
    expect(second.ledger.getStateView('bot_1').warningCount).toBe(1);
    expect(readEventLog(second.paths.log)).toHaveLength(1);
  });

  it('reports agents whose backend does not answer', async () => {
    const proposer = new KeywordProposer();
    const reviewer: Reviewer & Proposer = {
      name: 'ollama:llama3.1:70b',
      review: async () => ({ agrees: true }),
      propose: async () => conservativeDecision('unused'),
      healthCheck: async () => false,
    };

    expect(await unreachableAgents({ proposer, reviewer })).toEqual(['ollama:llama3.1:70b']);
  });
});
