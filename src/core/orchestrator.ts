import { ActionApplier } from '../actions/applier.js';
import { conservativeDecision } from '../agents/types.js';
import type { Decision, Proposer, Reviewer } from '../agents/types.js';
import type { SimilarityIndex } from '../memory/index-store.js';
import type { SearchResult } from '../memory/types.js';
import type { SubjectLedger, SubjectStateView } from '../state/ledger.js';
import { createLogger } from '../utils/logger.js';
import type { EventLog } from './event-log.js';
import { toLogEntry } from './event-log.js';
import type { RunContext } from './run-context.js';
import type { EventResult, ModerationEvent, RunSummary } from './types.js';

const log = createLogger('orchestrator');

export type OrchestratorMode = 'review' | 'compare';

export interface OrchestratorOptions {
  topK: number;
  minSimilarity: number;
  mode?: OrchestratorMode;
  useState?: boolean;             // Off: the proposer is state-blind
  useRetrieval?: boolean;         // Off: nothing is retrieved
  includeStateInKey?: boolean;    // Compose "text | state summary" as the similarity key
  memoryPath?: string;
  ledgerPath?: string;
}

export interface OrchestratorDeps {
  index: SimilarityIndex;
  ledger: SubjectLedger;
  proposer: Proposer;
  reviewer?: Reviewer;            // Required in review mode
  reference?: Proposer;           // Required in compare mode
  context: RunContext;
  eventLog?: EventLog;
}

export interface RunOptions {
  maxEvents?: number;
}

type Verdict =
  | { status: 'agreed' }
  | { status: 'overridden'; decision: Decision }
  | { status: 'failed'; decision: Decision };

/**
 * Proposer → reviewer → apply → learn, one event at a time.
 *
 * Effects of an event (ledger counters, memory record, log line) are
 * committed before the next event starts. Only disagreements are learned,
 * so the memory grows by exactly the number of overridden proposals.
 */
export class DecisionOrchestrator {
  private applier: ActionApplier;
  private options: Required<Omit<OrchestratorOptions, 'memoryPath' | 'ledgerPath'>>
    & Pick<OrchestratorOptions, 'memoryPath' | 'ledgerPath'>;
  private sequence = 0;
  private sequenceRunId: string | null = null;

  constructor(private deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.options = {
      topK: options.topK,
      minSimilarity: options.minSimilarity,
      mode: options.mode ?? 'review',
      useState: options.useState ?? true,
      useRetrieval: options.useRetrieval ?? true,
      includeStateInKey: options.includeStateInKey ?? false,
      memoryPath: options.memoryPath,
      ledgerPath: options.ledgerPath,
    };

    if (this.options.mode === 'review' && !deps.reviewer) {
      throw new Error('Review mode needs a reviewer');
    }
    if (this.options.mode === 'compare' && !deps.reference) {
      throw new Error('Compare mode needs a reference proposer');
    }

    this.applier = new ActionApplier(deps.ledger);
  }

  get context(): RunContext {
    return this.deps.context;
  }

  /**
   * Load the memory and ledger snapshots, when paths are configured.
   */
  async restore(): Promise<{ records: number; subjects: number }> {
    const { memoryPath, ledgerPath } = this.options;
    const records = memoryPath ? await this.deps.index.load(memoryPath) : 0;
    const subjects = ledgerPath ? this.deps.ledger.load(ledgerPath) : 0;
    return { records, subjects };
  }

  persist(): void {
    const { memoryPath, ledgerPath } = this.options;
    if (memoryPath) this.deps.index.save(memoryPath);
    if (ledgerPath) this.deps.ledger.save(ledgerPath);
  }

  async processEvent(event: ModerationEvent): Promise<EventResult> {
    const { index, ledger, proposer, context } = this.deps;

    // A blank text cannot become a memory key; refuse before touching the ledger
    if (event.text.trim().length === 0) {
      throw new Error(`Event for ${event.subjectId} has blank text`);
    }

    // Sequence numbers restart with each run id
    if (context.runId !== this.sequenceRunId) {
      this.sequenceRunId = context.runId;
      this.sequence = 0;
    }
    const seq = this.sequence++;

    if (event.context) {
      ledger.updateContext(event.subjectId, event.context);
    }

    const state = ledger.getStateView(event.subjectId);
    const stateSummary = ledger.stateSummary(event.subjectId);
    const query = this.options.includeStateInKey ? `${event.text} | ${stateSummary}` : event.text;

    let retrieved: SearchResult[] | undefined;
    if (this.options.useRetrieval) {
      retrieved = await index.search(query, this.options.topK, this.options.minSimilarity);
    }

    let proposal: Decision;
    let proposalFallback = false;
    try {
      proposal = await proposer.propose({
        eventText: event.text,
        persona: event.persona,
        state: this.options.useState ? state : undefined,
        retrieved,
      });
    } catch (error) {
      log.warn(`Proposer ${proposer.name} failed on event ${seq}, using conservative decision`, error);
      proposal = conservativeDecision('proposer unavailable');
      proposalFallback = true;
    }

    const verdict = await this.judge(event, state, proposal, seq);
    const effective = verdict.status === 'agreed' ? proposal : verdict.decision;

    const outcomes = this.applier.applyActions(effective.actions, event.subjectId, event.text);

    let memoryAdded = false;
    if (verdict.status === 'overridden') {
      await index.add({
        key: query,
        sourceText: event.text,
        stateSnapshot: stateSummary,
        correctionReasoning: effective.reasoning,
        correctionPlan: effective.plan,
        tag: event.persona,
      });
      memoryAdded = true;
    }

    const result: EventResult = {
      seq,
      subjectId: event.subjectId,
      eventText: event.text,
      persona: event.persona,
      proposal,
      effective,
      agrees: verdict.status === 'failed' ? null : verdict.status === 'agreed',
      memoryAdded,
      retrievedCount: retrieved?.length ?? 0,
      proposalFallback,
      reviewFailed: verdict.status === 'failed',
      outcomes,
      memorySize: index.size,
      costs: context.costs.getStats(),
    };

    log.debug(`#${seq} ${event.subjectId}: ${proposal.plan} -> ${effective.plan}`);
    this.deps.eventLog?.append(toLogEntry(context.runId, result));
    context.reporter.onEvent?.(result);
    return result;
  }

  async run(events: ModerationEvent[], options: RunOptions = {}): Promise<RunSummary> {
    const limit = Math.min(options.maxEvents ?? events.length, events.length);
    let processed = 0;
    let failed = 0;
    let agreements = 0;
    let disagreements = 0;
    let memoryAdded = 0;
    let reviewFailures = 0;

    for (const event of events.slice(0, limit)) {
      try {
        const result = await this.processEvent(event);
        processed++;
        if (result.agrees === true) agreements++;
        if (result.agrees === false) disagreements++;
        if (result.memoryAdded) memoryAdded++;
        if (result.reviewFailed) reviewFailures++;
      } catch (error) {
        failed++;
        log.error(`Event for ${event.subjectId} failed`, error);
      }
    }

    this.persist();

    const summary: RunSummary = {
      runId: this.deps.context.runId,
      processed,
      failed,
      agreements,
      disagreements,
      memoryAdded,
      reviewFailures,
      agreementRate: processed > 0 ? agreements / processed : 0,
      memorySize: this.deps.index.size,
      cost: this.deps.context.costs.getStats(),
    };

    this.deps.context.reporter.onComplete?.(summary);
    return summary;
  }

  private async judge(
    event: ModerationEvent,
    state: SubjectStateView,
    proposal: Decision,
    seq: number
  ): Promise<Verdict> {
    try {
      if (this.options.mode === 'compare') {
        return await this.compare(event, state, proposal);
      }
      return await this.review(event, state, proposal);
    } catch (error) {
      log.warn(`Review failed on event ${seq}, using conservative decision`, error);
      return { status: 'failed', decision: conservativeDecision('reviewer unavailable') };
    }
  }

  private async review(event: ModerationEvent, state: SubjectStateView, proposal: Decision): Promise<Verdict> {
    const { reviewer } = this.deps;
    if (!reviewer) {
      throw new Error('Review mode needs a reviewer');
    }

    const result = await reviewer.review({
      eventText: event.text,
      persona: event.persona,
      state,
      proposal,
    });
    return result.agrees ? { status: 'agreed' } : { status: 'overridden', decision: result.replacement };
  }

  private async compare(event: ModerationEvent, state: SubjectStateView, proposal: Decision): Promise<Verdict> {
    const { reference } = this.deps;
    if (!reference) {
      throw new Error('Compare mode needs a reference proposer');
    }

    const decision = await reference.propose({
      eventText: event.text,
      persona: event.persona,
      state,
    });
    return decision.plan.trim() === proposal.plan.trim()
      ? { status: 'agreed' }
      : { status: 'overridden', decision };
  }
}
