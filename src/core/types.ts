import type { ActionOutcome } from '../actions/applier.js';
import type { Decision } from '../agents/types.js';
import type { SubjectContext } from '../state/ledger.js';
import type { CostStats } from './cost-tracker.js';

export interface ModerationEvent {
  subjectId: string;
  text: string;
  persona: string;
  context?: SubjectContext;
}

export interface EventResult {
  seq: number;
  subjectId: string;
  eventText: string;
  persona: string;
  proposal: Decision;
  effective: Decision;
  agrees: boolean | null;        // null when the review itself failed
  memoryAdded: boolean;
  retrievedCount: number;
  proposalFallback: boolean;
  reviewFailed: boolean;
  outcomes: ActionOutcome[];
  memorySize: number;
  costs: CostStats;
}

export interface RunSummary {
  runId: string;
  processed: number;
  failed: number;
  agreements: number;
  disagreements: number;
  memoryAdded: number;
  reviewFailures: number;
  agreementRate: number;
  memorySize: number;
  cost: CostStats;
}
