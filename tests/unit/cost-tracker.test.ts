import { describe, it, expect } from 'vitest';
import { CostTracker } from '../../src/core/cost-tracker.js';
import { RunContext } from '../../src/core/run-context.js';

const usage = (totalTokens: number) => ({ promptTokens: totalTokens, completionTokens: 0, totalTokens });

describe('CostTracker', () => {
  it('starts empty', () => {
    expect(new CostTracker().getStats()).toEqual({
      totalCalls: 0,
      totalTokens: 0,
      totalCost: 0,
      avgCostPerCall: 0,
      byModel: {},
    });
  });

  it('prices calls per thousand tokens', () => {
    const costs = new CostTracker();
    expect(costs.record('ollama:small', usage(1500), 0.0002)).toBeCloseTo(0.0003, 10);
  });

  it('aggregates totals and per-model spend', () => {
    const costs = new CostTracker();
    costs.record('ollama:small', usage(1500), 0.0002);
    costs.record('ollama:small', usage(500), 0.0002);
    costs.record('openai:large', usage(1000), 0.0007);

    const stats = costs.getStats();
    expect(stats.totalCalls).toBe(3);
    expect(stats.totalTokens).toBe(3000);
    expect(stats.totalCost).toBe(0.0011);
    expect(stats.avgCostPerCall).toBe(0.000367);
    expect(stats.byModel).toEqual({
      'ollama:small': { calls: 2, tokens: 2000, cost: 0.0004 },
      'openai:large': { calls: 1, tokens: 1000, cost: 0.0007 },
    });
  });

  it('forgets everything on reset', () => {
    const costs = new CostTracker();
    costs.record('m', usage(1000), 1);
    costs.reset();
    expect(costs.totalCalls).toBe(0);
    expect(costs.totalCost).toBe(0);
  });
});

describe('RunContext', () => {
  it('starts a new run on reset', () => {
    const context = new RunContext();
    const first = context.runId;
    context.costs.record('m', usage(1000), 1);

    context.reset();

    expect(context.runId).not.toBe(first);
    expect(context.runId).toHaveLength(12);
    expect(context.costs.totalCalls).toBe(0);
  });
});
