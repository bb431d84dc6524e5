import type { Message } from '../adapters/types.js';
import type { SearchResult } from '../memory/types.js';
import type { SubjectStateView } from '../state/ledger.js';
import type { Decision, ProposalRequest, ReviewRequest } from './types.js';

const ACTION_VOCABULARY = `Available actions (use these tokens in "actions"):
- ban_user
- timeout_user_<N>m (for example timeout_user_10m)
- warn_user
- delete_comment
- reply('<message>')
- log_incident
- let_comment_stand`;

const DECISION_FORMAT = `Respond with a single JSON object and nothing else:
{"reasoning": "<one or two sentences>", "plan": "<short label>", "actions": ["<token>", ...], "confidence": "low" | "medium" | "high"}`;

const REVIEW_FORMAT = `Respond with a single JSON object and nothing else.
If the proposal is right: {"agrees": true}
Otherwise: {"agrees": false, "reasoning": "...", "plan": "<short label>", "actions": ["<token>", ...], "confidence": "low" | "medium" | "high"}`;

function personaLine(persona: string): string {
  return `Moderation persona: ${persona.replace(/_/g, ' ')}.`;
}

export function formatState(state: SubjectStateView): string {
  const lines = [
    `- bans: ${state.banCount}`,
    `- warnings: ${state.warningCount}`,
    `- timeouts: ${state.timeoutCount}`,
    `- deleted comments: ${state.deletedCount}`,
    `- replies received: ${state.replyCount}`,
    `- followers: ${state.followerCount}`,
    `- viewers: ${state.viewerCount}`,
  ];
  if (state.currentTopic) lines.push(`- stream topic: ${state.currentTopic}`);
  if (state.lastAction) lines.push(`- last action: ${state.lastAction}`);
  return lines.join('\n');
}

/**
 * Past reviewer corrections, most similar first.
 */
export function formatCorrections(retrieved: SearchResult[]): string {
  if (retrieved.length === 0) {
    return 'No similar past corrections.';
  }

  return retrieved
    .map(({ record, similarity }, i) => {
      const lines = [
        `${i + 1}. "${record.sourceText || record.key}" (similarity: ${(similarity * 100).toFixed(0)}%)`,
        `   corrected plan: ${record.correctionPlan}`,
      ];
      if (record.correctionReasoning) lines.push(`   why: ${record.correctionReasoning}`);
      if (record.stateSnapshot) lines.push(`   user state then: ${record.stateSnapshot}`);
      return lines.join('\n');
    })
    .join('\n');
}

function formatDecision(decision: Decision): string {
  return [
    `plan: ${decision.plan}`,
    `actions: ${decision.actions.join(', ') || '(none)'}`,
    `confidence: ${decision.confidenceLevel}`,
    `reasoning: ${decision.reasoning || '(none)'}`,
  ].join('\n');
}

export function buildProposerMessages(request: ProposalRequest): Message[] {
  const sections = [`Chat message:\n"${request.eventText}"`];

  if (request.state) {
    sections.push(`User history:\n${formatState(request.state)}`);
  }
  if (request.retrieved) {
    sections.push(`## Relevant Past Corrections\n${formatCorrections(request.retrieved)}`);
  }

  return [
    {
      role: 'system',
      content: [
        'You moderate a live-stream chat. Decide what to do with one message.',
        personaLine(request.persona),
        'Where a past correction closely matches, follow its plan.',
        ACTION_VOCABULARY,
        DECISION_FORMAT,
      ].join('\n\n'),
    },
    { role: 'user', content: sections.join('\n\n') },
  ];
}

export function buildReviewerMessages(request: ReviewRequest): Message[] {
  return [
    {
      role: 'system',
      content: [
        'You are a senior chat moderator reviewing a junior moderator\'s decision.',
        personaLine(request.persona),
        'Agree unless the proposal is clearly too lenient, too harsh, or ignores the user\'s history.',
        ACTION_VOCABULARY,
        REVIEW_FORMAT,
      ].join('\n\n'),
    },
    {
      role: 'user',
      content: [
        `Chat message:\n"${request.eventText}"`,
        `User history:\n${formatState(request.state)}`,
        `Proposed decision:\n${formatDecision(request.proposal)}`,
      ].join('\n\n'),
    },
  ];
}

// Compare mode: the senior moderator decides without seeing the proposal
export function buildReferenceMessages(request: ProposalRequest): Message[] {
  const sections = [`Chat message:\n"${request.eventText}"`];
  if (request.state) {
    sections.push(`User history:\n${formatState(request.state)}`);
  }

  return [
    {
      role: 'system',
      content: [
        'You are a senior chat moderator. Decide what to do with one message.',
        personaLine(request.persona),
        ACTION_VOCABULARY,
        DECISION_FORMAT,
      ].join('\n\n'),
    },
    { role: 'user', content: sections.join('\n\n') },
  ];
}
