import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { EventResult } from './types.js';

export const EventLogEntrySchema = z.object({
  runId: z.string(),
  seq: z.number().int(),
  timestamp: z.string(),
  subjectId: z.string(),
  eventText: z.string(),
  persona: z.string(),
  proposedPlan: z.string(),
  effectivePlan: z.string(),
  agrees: z.boolean().nullable(),
  memoryAdded: z.boolean(),
  retrievedCount: z.number().int().nonnegative(),
  proposalFallback: z.boolean(),
  reviewFailed: z.boolean(),
  actionOutcomes: z.array(z.object({
    action: z.string(),
    succeeded: z.boolean(),
    message: z.string(),
    newCount: z.number().int().optional(),
  })),
  memorySize: z.number().int().nonnegative(),
  cumulativeCost: z.number().nonnegative(),
  cumulativeCalls: z.number().int().nonnegative(),
});

export type EventLogEntry = z.infer<typeof EventLogEntrySchema>;

export function toLogEntry(runId: string, result: EventResult, now: Date = new Date()): EventLogEntry {
  return {
    runId,
    seq: result.seq,
    timestamp: now.toISOString(),
    subjectId: result.subjectId,
    eventText: result.eventText,
    persona: result.persona,
    proposedPlan: result.proposal.plan,
    effectivePlan: result.effective.plan,
    agrees: result.agrees,
    memoryAdded: result.memoryAdded,
    retrievedCount: result.retrievedCount,
    proposalFallback: result.proposalFallback,
    reviewFailed: result.reviewFailed,
    actionOutcomes: result.outcomes.map((outcome) => ({
      action: outcome.actionToken,
      succeeded: outcome.succeeded,
      message: outcome.message,
      ...(outcome.newCount !== undefined ? { newCount: outcome.newCount } : {}),
    })),
    memorySize: result.memorySize,
    cumulativeCost: result.costs.totalCost,
    cumulativeCalls: result.costs.totalCalls,
  };
}

/**
 * Append-only JSONL log, one line per processed event.
 */
export class EventLog {
  constructor(readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  append(entry: EventLogEntry): void {
    fs.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
  }
}

/**
 * Read a JSONL event log. Blank lines are skipped; a line that is not a log
 * entry fails with its line number.
 */
export function readEventLog(filePath: string): EventLogEntry[] {
  const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
  const entries: EventLogEntry[] = [];

  lines.forEach((line, i) => {
    if (!line.trim()) return;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new Error(`Invalid JSON on line ${i + 1} of ${filePath}`);
    }

    const parsed = EventLogEntrySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid log entry on line ${i + 1} of ${filePath}: ${issue.path.join('.')}: ${issue.message}`);
    }
    entries.push(parsed.data);
  });

  return entries;
}
