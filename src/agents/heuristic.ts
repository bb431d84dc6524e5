/**
 * Rule-table agents that need no model.
 *
 * The keyword proposer knows only the blunt cases and leans on retrieved
 * corrections for everything else; the rule reviewer weighs the subject's
 * history. Together they let the learning loop run offline.
 */

import { emptyStateView } from '../state/ledger.js';
import type { SubjectStateView } from '../state/ledger.js';
import { actionsFromPlan, planFromActions } from './types.js';
import type {
  ConfidenceLevel,
  Decision,
  ProposalRequest,
  Proposer,
  ReviewRequest,
  ReviewResult,
  Reviewer,
} from './types.js';

export type MessageSignal = 'severe' | 'spam' | 'hostile' | 'benign';

const SIGNAL_PATTERNS: Array<[Exclude<MessageSignal, 'benign'>, RegExp[]]> = [
  ['severe', [
    /\bkys\b/i,
    /\bkill\s+(?:your|ur)\s*self\b/i,
    /\bhope\s+(?:you|u)\s+die\b/i,
    /\bi\s+know\s+where\s+(?:you|u)\s+live\b/i,
  ]],
  ['spam', [
    /https?:\/\//i,
    /\bwww\./i,
    /\bfree\s+(?:coins|subs|followers|gift\s*cards?)\b/i,
    /\bfollow\s+(?:me|my)\b/i,
    /\bcheck\s+out\s+my\b/i,
    /(.)\1{9,}/,
  ]],
  ['hostile', [
    /\bidiot\b/i,
    /\bstupid\b/i,
    /\btrash\b/i,
    /\bshut\s+up\b/i,
    /\bloser\b/i,
    /\bclown\b/i,
    /\bgarbage\b/i,
    /\bnobody\s+asked\b/i,
  ]],
];

export function classifyMessage(text: string): MessageSignal {
  for (const [signal, patterns] of SIGNAL_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(text))) {
      return signal;
    }
  }
  return 'benign';
}

// Plans are compared on their action tokens, ignoring case and spacing
export function normalizePlan(plan: string): string {
  return planFromActions(actionsFromPlan(plan.toLowerCase()));
}

function decision(actions: string[], reasoning: string, confidenceLevel: ConfidenceLevel): Decision {
  return { reasoning, plan: planFromActions(actions), actions, confidenceLevel };
}

export interface KeywordProposerOptions {
  adoptThreshold?: number;
}

export const DEFAULT_ADOPT_THRESHOLD = 0.5;

export class KeywordProposer implements Proposer {
  readonly name = 'heuristic:keyword';
  private adoptThreshold: number;

  constructor(options: KeywordProposerOptions = {}) {
    this.adoptThreshold = options.adoptThreshold ?? DEFAULT_ADOPT_THRESHOLD;
  }

  async propose(request: ProposalRequest): Promise<Decision> {
    const top = request.retrieved?.[0];
    if (top && top.similarity >= this.adoptThreshold && top.record.correctionPlan.trim()) {
      const pct = (top.similarity * 100).toFixed(0);
      return {
        reasoning: `Follows a past correction (${pct}% similar): ${top.record.correctionReasoning}`.trim(),
        plan: top.record.correctionPlan,
        actions: actionsFromPlan(top.record.correctionPlan),
        confidenceLevel: top.similarity >= 0.8 ? 'high' : 'medium',
      };
    }

    switch (classifyMessage(request.eventText)) {
      case 'severe':
        return decision(['ban_user'], 'Threat of self-harm or violence', 'high');
      case 'spam':
        return decision(['delete_comment'], 'Looks like spam', 'medium');
      default:
        return decision(['let_comment_stand'], 'Nothing obviously wrong', 'low');
    }
  }
}

/**
 * Escalating rule table. Agrees exactly when its own plan matches the
 * proposal's, so it doubles as the reference proposer in compare mode.
 */
export class RuleReviewer implements Reviewer, Proposer {
  readonly name = 'heuristic:rules';

  decide(eventText: string, persona: string, state: SubjectStateView): Decision {
    switch (classifyMessage(eventText)) {
      case 'severe':
        return decision(['ban_user'], 'Threats are never tolerated', 'high');

      case 'spam':
        if (state.deletedCount > 0 || state.timeoutCount > 0) {
          return decision(['delete_comment', 'timeout_user_10m'], 'Repeat spam after earlier removals', 'high');
        }
        return decision(['delete_comment', 'warn_user'], 'First spam offence: remove and warn', 'medium');

      case 'hostile':
        if (state.warningCount >= 2) {
          return decision(['timeout_user_10m'], `Hostile again after ${state.warningCount} warnings`, 'high');
        }
        if (persona.includes('lenient')) {
          return decision(["reply('Please keep it friendly')"], 'Hostile tone, nudging first', 'medium');
        }
        return decision(['warn_user'], 'Hostile tone toward others', 'medium');

      case 'benign':
        return decision(['let_comment_stand'], 'Ordinary chat', 'high');
    }
  }

  async review(request: ReviewRequest): Promise<ReviewResult> {
    const own = this.decide(request.eventText, request.persona, request.state);
    if (normalizePlan(own.plan) === normalizePlan(request.proposal.plan)) {
      return { agrees: true };
    }
    return { agrees: false, replacement: own };
  }

  async propose(request: ProposalRequest): Promise<Decision> {
    return this.decide(request.eventText, request.persona, request.state ?? emptyStateView());
  }
}
