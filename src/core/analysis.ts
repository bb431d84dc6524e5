import * as fs from 'fs';
import { readEventLog } from './event-log.js';
import type { EventLogEntry } from './event-log.js';

export interface LogAnalysis {
  totalEvents: number;
  disagreements: number;
  reviewFailures: number;
  agreementRate: number;
  memoryGrowth: number;
  initialMemorySize: number;
  finalMemorySize: number;
  totalCost: number;
  totalCalls: number;
  avgCostPerEvent: number;
  actionDistribution: Record<string, number>;
  agreementOverTime: number[];
  finalAgreementRate: number;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function rollingWindowSize(totalEvents: number): number {
  return Math.max(10, Math.floor(totalEvents / 10));
}

// A failed review is neither an agreement nor a disagreement
function agreed(entry: EventLogEntry): boolean {
  return !entry.memoryAdded && !entry.reviewFailed;
}

/**
 * Summary metrics over the lines of one or more runs. An event counts as a
 * disagreement when it added a memory record; the agreement rate is agreed
 * events over all events, as in the run summary. Cost and call totals are
 * the cumulative values on the last line.
 */
export function analyzeEvents(entries: EventLogEntry[]): LogAnalysis | null {
  if (entries.length === 0) {
    return null;
  }

  const totalEvents = entries.length;
  const first = entries[0];
  const last = entries[entries.length - 1];
  const disagreements = entries.filter((e) => e.memoryAdded).length;
  const reviewFailures = entries.filter((e) => e.reviewFailed).length;

  const actionDistribution: Record<string, number> = {};
  for (const entry of entries) {
    for (const outcome of entry.actionOutcomes) {
      actionDistribution[outcome.action] = (actionDistribution[outcome.action] ?? 0) + 1;
    }
  }

  const windowSize = rollingWindowSize(totalEvents);
  const agreementOverTime: number[] = [];
  for (let end = windowSize; end <= totalEvents; end++) {
    const window = entries.slice(end - windowSize, end);
    agreementOverTime.push(window.filter(agreed).length / window.length);
  }

  return {
    totalEvents,
    disagreements,
    reviewFailures,
    agreementRate: round(entries.filter(agreed).length / totalEvents, 3),
    memoryGrowth: last.memorySize - first.memorySize,
    initialMemorySize: first.memorySize,
    finalMemorySize: last.memorySize,
    totalCost: round(last.cumulativeCost, 4),
    totalCalls: last.cumulativeCalls,
    avgCostPerEvent: round(last.cumulativeCost / totalEvents, 6),
    actionDistribution,
    agreementOverTime,
    finalAgreementRate: agreementOverTime.length > 0 ? agreementOverTime[agreementOverTime.length - 1] : 0,
  };
}

export function analyzeLog(filePath: string): LogAnalysis | null {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Log file not found: ${filePath}`);
  }
  return analyzeEvents(readEventLog(filePath));
}
