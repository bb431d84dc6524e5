import type { SearchResult } from '../memory/types.js';
import type { SubjectStateView } from '../state/ledger.js';

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;
export type ConfidenceLevel = typeof CONFIDENCE_LEVELS[number];

export interface Decision {
  reasoning: string;
  plan: string;               // Short label, compared verbatim in compare mode
  actions: string[];          // Free-text tokens, parsed by the action applier
  confidenceLevel: ConfidenceLevel;
}

export type ReviewResult =
  | { agrees: true }
  | { agrees: false; replacement: Decision };

export interface ProposalRequest {
  eventText: string;
  persona: string;
  state?: SubjectStateView;      // Absent when state-blind
  retrieved?: SearchResult[];    // Absent when retrieval is off
}

export interface ReviewRequest {
  eventText: string;
  persona: string;
  state: SubjectStateView;
  proposal: Decision;
}

export interface Proposer {
  readonly name: string;
  propose(request: ProposalRequest): Promise<Decision>;
  healthCheck?(): Promise<boolean>;   // Only agents backed by a remote model
}

export interface Reviewer {
  readonly name: string;
  review(request: ReviewRequest): Promise<ReviewResult>;
  healthCheck?(): Promise<boolean>;
}

export const CONSERVATIVE_PLAN = 'log_incident';

/**
 * What the loop falls back to when a model call fails: record the incident,
 * touch no counters.
 */
export function conservativeDecision(reason: string): Decision {
  return {
    reasoning: `Fallback decision: ${reason}`,
    plan: CONSERVATIVE_PLAN,
    actions: [CONSERVATIVE_PLAN],
    confidenceLevel: 'medium',
  };
}

export function planFromActions(actions: string[]): string {
  return actions.join(' + ');
}

// Separators inside a reply payload's parentheses do not split
export function actionsFromPlan(plan: string): string[] {
  const tokens: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of plan) {
    if (char === '(') depth += 1;
    if (char === ')') depth = Math.max(0, depth - 1);

    if (depth === 0 && (char === '+' || char === ',' || char === ';')) {
      tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  tokens.push(current);

  return tokens.map((token) => token.trim()).filter((token) => token.length > 0);
}
