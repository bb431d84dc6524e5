import type { Message, ModelAdapter } from '../adapters/types.js';
import type { CostTracker } from '../core/cost-tracker.js';
import { DecisionParseError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { parseDecision, parseReview } from './decision.js';
import { buildProposerMessages, buildReferenceMessages, buildReviewerMessages } from './prompts.js';
import type {
  Decision,
  ProposalRequest,
  Proposer,
  ReviewRequest,
  ReviewResult,
  Reviewer,
} from './types.js';

const log = createLogger('agents');

export interface ModelAgentSettings {
  temperature: number;
  maxTokens: number;
  pricePer1kTokens: number;
}

/**
 * One JSON-mode completion, charged to the run's cost tracker. Parse
 * failures are logged with the raw reply and rethrown for the caller's
 * fallback.
 */
async function completeAndParse<T>(
  adapter: ModelAdapter,
  settings: ModelAgentSettings,
  costs: CostTracker | undefined,
  messages: Message[],
  parse: (content: string) => T
): Promise<T> {
  const response = await adapter.complete({
    messages,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    json: true,
  });
  costs?.record(adapter.name, response.usage, settings.pricePer1kTokens);

  try {
    return parse(response.content);
  } catch (error) {
    if (error instanceof DecisionParseError) {
      log.warn(`${adapter.name} returned unusable output: ${error.message}`);
      if (log.isLevelEnabled('debug')) {
        log.debug('Raw reply', error.raw);
      }
    }
    throw error;
  }
}

export class ModelProposer implements Proposer {
  readonly name: string;

  constructor(
    private adapter: ModelAdapter,
    private settings: ModelAgentSettings,
    private costs?: CostTracker
  ) {
    this.name = adapter.name;
  }

  async propose(request: ProposalRequest): Promise<Decision> {
    return completeAndParse(
      this.adapter,
      this.settings,
      this.costs,
      buildProposerMessages(request),
      parseDecision
    );
  }

  healthCheck(): Promise<boolean> {
    return this.adapter.healthCheck();
  }
}

export class ModelReviewer implements Reviewer, Proposer {
  readonly name: string;

  constructor(
    private adapter: ModelAdapter,
    private settings: ModelAgentSettings,
    private costs?: CostTracker
  ) {
    this.name = adapter.name;
  }

  async review(request: ReviewRequest): Promise<ReviewResult> {
    return completeAndParse(
      this.adapter,
      this.settings,
      this.costs,
      buildReviewerMessages(request),
      parseReview
    );
  }

  // Reference decision for compare mode
  async propose(request: ProposalRequest): Promise<Decision> {
    return completeAndParse(
      this.adapter,
      this.settings,
      this.costs,
      buildReferenceMessages(request),
      parseDecision
    );
  }

  healthCheck(): Promise<boolean> {
    return this.adapter.healthCheck();
  }
}
