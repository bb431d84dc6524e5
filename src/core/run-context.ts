import { nanoid } from 'nanoid';
import { CostTracker } from './cost-tracker.js';
import type { EventResult, RunSummary } from './types.js';

export interface RunReporter {
  onEvent?(result: EventResult): void;
  onComplete?(summary: RunSummary): void;
}

/**
 * Run-wide state shared by the orchestrator and the model agents.
 */
export class RunContext {
  readonly costs = new CostTracker();
  private id: string;

  constructor(readonly reporter: RunReporter = {}) {
    this.id = nanoid(12);
  }

  get runId(): string {
    return this.id;
  }

  // Starts a fresh run: new id, cost history cleared
  reset(): void {
    this.id = nanoid(12);
    this.costs.reset();
  }
}
