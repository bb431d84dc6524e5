import type { TokenUsage } from '../adapters/types.js';

export interface ModelCostStats {
  calls: number;
  tokens: number;
  cost: number;
}

export interface CostStats {
  totalCalls: number;
  totalTokens: number;
  totalCost: number;
  avgCostPerCall: number;
  byModel: Record<string, ModelCostStats>;
}

interface ApiCall {
  model: string;
  tokens: number;
  cost: number;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Token spend across model calls, priced per thousand tokens.
 */
export class CostTracker {
  private calls: ApiCall[] = [];

  record(model: string, usage: TokenUsage, pricePer1kTokens: number): number {
    const cost = (usage.totalTokens / 1000) * pricePer1kTokens;
    this.calls.push({ model, tokens: usage.totalTokens, cost });
    return cost;
  }

  get totalCalls(): number {
    return this.calls.length;
  }

  get totalCost(): number {
    return this.calls.reduce((sum, call) => sum + call.cost, 0);
  }

  getStats(): CostStats {
    const byModel: Record<string, ModelCostStats> = {};
    let totalTokens = 0;

    for (const call of this.calls) {
      totalTokens += call.tokens;
      const entry = byModel[call.model] ?? { calls: 0, tokens: 0, cost: 0 };
      entry.calls += 1;
      entry.tokens += call.tokens;
      entry.cost += call.cost;
      byModel[call.model] = entry;
    }

    for (const entry of Object.values(byModel)) {
      entry.cost = round(entry.cost, 6);
    }

    const totalCost = this.totalCost;
    return {
      totalCalls: this.calls.length,
      totalTokens,
      totalCost: round(totalCost, 4),
      avgCostPerCall: this.calls.length > 0 ? round(totalCost / this.calls.length, 6) : 0,
      byModel,
    };
  }

  reset(): void {
    this.calls = [];
  }
}
