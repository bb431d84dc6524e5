import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SnapshotError } from '../errors.js';

export const COUNTER_KINDS = ['ban', 'warning', 'timeout', 'deletedComment', 'reply'] as const;
export type CounterKind = typeof COUNTER_KINDS[number];

export interface SubjectContext {
  followerCount?: number;
  viewerCount?: number;
  currentTopic?: string;
}

// What the proposer and reviewer see. Carries no subject identifier.
export interface SubjectStateView {
  banCount: number;
  warningCount: number;
  timeoutCount: number;
  deletedCount: number;
  replyCount: number;
  followerCount: number;
  viewerCount: number;
  currentTopic: string;
  lastAction: CounterKind | null;
}

export interface SubjectStats extends SubjectStateView {
  subjectId: string;
}

const COUNTER_FIELD: Record<CounterKind, 'banCount' | 'warningCount' | 'timeoutCount' | 'deletedCount' | 'replyCount'> = {
  ban: 'banCount',
  warning: 'warningCount',
  timeout: 'timeoutCount',
  deletedComment: 'deletedCount',
  reply: 'replyCount',
};

// Older snapshots used snake_case keys and different action names
const LEGACY_ACTION_NAMES: Record<string, CounterKind> = {
  ban: 'ban',
  warn: 'warning',
  warning: 'warning',
  timeout: 'timeout',
  delete_comment: 'deletedComment',
  deletedComment: 'deletedComment',
  reply: 'reply',
};

const count = z.number().int().nonnegative().optional();

const SnapshotEntrySchema = z.object({
  subjectId: z.string().optional(),
  user_id: z.string().optional(),
  banCount: count,
  ban_count: count,
  warningCount: count,
  warning_count: count,
  timeoutCount: count,
  timeout_count: count,
  deletedCount: count,
  deleted_comments: count,
  replyCount: count,
  replies_sent: count,
  followerCount: z.number().nonnegative().optional(),
  follower_count: z.number().nonnegative().optional(),
  viewerCount: z.number().nonnegative().optional(),
  viewer_count: z.number().nonnegative().optional(),
  currentTopic: z.string().optional(),
  current_topic: z.string().optional(),
  lastAction: z.string().nullable().optional(),
  last_action: z.string().nullable().optional(),
});

const SnapshotSchema = z.record(z.string(), SnapshotEntrySchema);

type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;

export function emptyStateView(): SubjectStateView {
  return {
    banCount: 0,
    warningCount: 0,
    timeoutCount: 0,
    deletedCount: 0,
    replyCount: 0,
    followerCount: 0,
    viewerCount: 0,
    currentTopic: '',
    lastAction: null,
  };
}

function fromSnapshotEntry(entry: SnapshotEntry): SubjectStateView {
  const lastAction = entry.lastAction ?? entry.last_action ?? null;
  return {
    banCount: entry.banCount ?? entry.ban_count ?? 0,
    warningCount: entry.warningCount ?? entry.warning_count ?? 0,
    timeoutCount: entry.timeoutCount ?? entry.timeout_count ?? 0,
    deletedCount: entry.deletedCount ?? entry.deleted_comments ?? 0,
    replyCount: entry.replyCount ?? entry.replies_sent ?? 0,
    followerCount: entry.followerCount ?? entry.follower_count ?? 0,
    viewerCount: entry.viewerCount ?? entry.viewer_count ?? 0,
    currentTopic: entry.currentTopic ?? entry.current_topic ?? '',
    lastAction: lastAction !== null && Object.hasOwn(LEGACY_ACTION_NAMES, lastAction)
      ? LEGACY_ACTION_NAMES[lastAction]
      : null,
  };
}

/**
 * Cumulative per-subject history.
 *
 * Subjects are created on first reference. Counters only grow through
 * `increment`; `load` is the one way to set them directly. Read methods hand
 * out copies.
 */
export class SubjectLedger {
  private subjects = new Map<string, SubjectStateView>();

  constructor(private persistencePath?: string) {}

  get size(): number {
    return this.subjects.size;
  }

  has(subjectId: string): boolean {
    return this.subjects.has(subjectId);
  }

  subjectIds(): string[] {
    return [...this.subjects.keys()];
  }

  increment(kind: CounterKind, subjectId: string): number {
    const state = this.getOrCreate(subjectId);
    const field = COUNTER_FIELD[kind];
    state[field] += 1;
    state.lastAction = kind;
    return state[field];
  }

  updateContext(subjectId: string, context: SubjectContext): void {
    const state = this.getOrCreate(subjectId);
    if (context.followerCount !== undefined) state.followerCount = context.followerCount;
    if (context.viewerCount !== undefined) state.viewerCount = context.viewerCount;
    if (context.currentTopic !== undefined) state.currentTopic = context.currentTopic;
  }

  getStateView(subjectId: string): SubjectStateView {
    return { ...this.getOrCreate(subjectId) };
  }

  getFullStats(subjectId: string): SubjectStats {
    return { subjectId, ...this.getOrCreate(subjectId) };
  }

  getAllStats(): Record<string, SubjectStats> {
    const all: Record<string, SubjectStats> = {};
    for (const subjectId of this.subjects.keys()) {
      all[subjectId] = this.getFullStats(subjectId);
    }
    return all;
  }

  /**
   * Compact one-line summary, used in similarity keys and memory snapshots.
   */
  stateSummary(subjectId: string): string {
    const state = this.getOrCreate(subjectId);
    const parts = [
      `bans:${state.banCount}`,
      `warnings:${state.warningCount}`,
      `timeouts:${state.timeoutCount}`,
      `deleted:${state.deletedCount}`,
      `replies:${state.replyCount}`,
      `followers:${state.followerCount}`,
      `viewers:${state.viewerCount}`,
    ];
    if (state.currentTopic) parts.push(`topic:${state.currentTopic}`);
    if (state.lastAction) parts.push(`last_action:${state.lastAction}`);
    return parts.join(', ');
  }

  save(filePath: string | undefined = this.persistencePath): void {
    if (!filePath) return;

    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(this.getAllStats(), null, 2), 'utf-8');
  }

  /**
   * Merge a snapshot into the live ledger; snapshot entries replace live
   * subjects with the same id. Returns the number of subjects loaded.
   */
  load(filePath: string): number {
    if (!fs.existsSync(filePath)) {
      return 0;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new SnapshotError(filePath, error instanceof Error ? error.message : 'unreadable');
    }

    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SnapshotError(filePath, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }

    for (const [subjectId, entry] of Object.entries(parsed.data)) {
      this.subjects.set(subjectId, fromSnapshotEntry(entry));
    }
    return Object.keys(parsed.data).length;
  }

  private getOrCreate(subjectId: string): SubjectStateView {
    let state = this.subjects.get(subjectId);
    if (!state) {
      state = emptyStateView();
      this.subjects.set(subjectId, state);
    }
    return state;
  }
}
