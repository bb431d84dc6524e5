import { z } from 'zod';
import { DecisionParseError } from '../errors.js';
import { CONFIDENCE_LEVELS, actionsFromPlan } from './types.js';
import type { ConfidenceLevel, Decision, ReviewResult } from './types.js';

const optionalText = z.string().nullish();

// Models name the confidence field several ways
const RawDecisionSchema = z.object({
  reasoning: optionalText,
  plan: optionalText,
  actions: z.union([z.array(z.string()), z.string()]).nullish(),
  confidence: optionalText,
  confidenceLevel: optionalText,
  confidence_level: optionalText,
  safety_level: optionalText,
});

const RawReviewSchema = RawDecisionSchema.extend({
  agrees: z.union([z.boolean(), z.string()]),
});

type RawDecision = z.infer<typeof RawDecisionSchema>;

/**
 * Pull the first JSON object out of a model reply, tolerating code fences
 * and chatter around it.
 */
export function extractJson(content: string): unknown {
  const unfenced = content.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new DecisionParseError('no JSON object found', content);
  }

  try {
    return JSON.parse(unfenced.slice(start, end + 1));
  } catch (error) {
    throw new DecisionParseError(error instanceof Error ? error.message : 'invalid JSON', content);
  }
}

export function normalizeConfidence(value: string | null | undefined): ConfidenceLevel {
  const lowered = value?.trim().toLowerCase();
  return CONFIDENCE_LEVELS.find((level) => level === lowered) ?? 'medium';
}

function toDecision(raw: RawDecision, content: string): Decision {
  const plan = raw.plan?.trim() ?? '';
  let actions: string[];
  if (Array.isArray(raw.actions)) {
    actions = raw.actions.map((a) => a.trim()).filter((a) => a.length > 0);
  } else if (typeof raw.actions === 'string') {
    actions = actionsFromPlan(raw.actions);
  } else {
    actions = [];
  }

  if (!plan && actions.length === 0) {
    throw new DecisionParseError('decision has neither plan nor actions', content);
  }

  return {
    reasoning: raw.reasoning?.trim() ?? '',
    plan: plan || actions.join(' + '),
    actions: actions.length > 0 ? actions : actionsFromPlan(plan),
    confidenceLevel: normalizeConfidence(
      raw.confidenceLevel ?? raw.confidence_level ?? raw.confidence ?? raw.safety_level
    ),
  };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return `${issue.path.join('.') || '(root)'}: ${issue.message}`;
}

export function parseDecision(content: string): Decision {
  const parsed = RawDecisionSchema.safeParse(extractJson(content));
  if (!parsed.success) {
    throw new DecisionParseError(firstIssue(parsed.error), content);
  }
  return toDecision(parsed.data, content);
}

export function parseReview(content: string): ReviewResult {
  const parsed = RawReviewSchema.safeParse(extractJson(content));
  if (!parsed.success) {
    throw new DecisionParseError(firstIssue(parsed.error), content);
  }

  const { agrees } = parsed.data;
  const agreed = typeof agrees === 'boolean'
    ? agrees
    : ['true', 'yes', 'agree'].includes(agrees.trim().toLowerCase());

  if (agreed) {
    return { agrees: true };
  }
  return { agrees: false, replacement: toDecision(parsed.data, content) };
}
