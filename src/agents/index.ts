export * from './types.js';
export * from './decision.js';
export * from './prompts.js';
export * from './heuristic.js';
export * from './llm.js';

import { createAdapter } from '../adapters/index.js';
import type { AdapterEnv } from '../adapters/index.js';
import type { AgentConfig } from '../config/index.js';
import type { CostTracker } from '../core/cost-tracker.js';
import { KeywordProposer, RuleReviewer } from './heuristic.js';
import { ModelProposer, ModelReviewer } from './llm.js';
import type { Proposer, Reviewer } from './types.js';

export interface AgentFactoryOptions {
  env?: AdapterEnv;
  costs?: CostTracker;
}

export function createProposer(config: AgentConfig, options: AgentFactoryOptions = {}): Proposer {
  if (config.provider === 'heuristic') {
    return new KeywordProposer();
  }
  const adapter = createAdapter(config.provider, config.name, options.env);
  return new ModelProposer(adapter, config, options.costs);
}

/**
 * The reviewer also answers `propose`, which compare mode uses to get an
 * independent reference decision.
 */
export function createReviewer(
  config: AgentConfig,
  options: AgentFactoryOptions = {}
): Reviewer & Proposer {
  if (config.provider === 'heuristic') {
    return new RuleReviewer();
  }
  const adapter = createAdapter(config.provider, config.name, options.env);
  return new ModelReviewer(adapter, config, options.costs);
}
