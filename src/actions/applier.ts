import type { CounterKind, SubjectLedger } from '../state/ledger.js';
import { parseAction } from './parser.js';
import type { ParsedAction } from './parser.js';

export interface ActionOutcome {
  actionToken: string;
  action: ParsedAction;
  succeeded: boolean;
  message: string;
  subjectId: string;
  counter?: CounterKind;
  newCount?: number;
}

const EXCERPT_LENGTH = 40;

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}

/**
 * Applies action tokens to one subject, in order, against the ledger.
 * Best effort: an unrecognised token is reported and the rest still run.
 */
export class ActionApplier {
  constructor(private ledger: SubjectLedger) {}

  applyActions(tokens: string[], subjectId: string, eventText: string = ''): ActionOutcome[] {
    return tokens.map((token) => this.applyOne(token, subjectId, eventText));
  }

  private applyOne(token: string, subjectId: string, eventText: string): ActionOutcome {
    const action = parseAction(token);
    const base = { actionToken: token, action, subjectId };

    switch (action.kind) {
      case 'ban': {
        const newCount = this.ledger.increment('ban', subjectId);
        return {
          ...base,
          succeeded: true,
          message: `User ${subjectId} banned (total bans: ${newCount})`,
          counter: 'ban',
          newCount,
        };
      }

      case 'timeout': {
        const newCount = this.ledger.increment('timeout', subjectId);
        return {
          ...base,
          succeeded: true,
          message: `User ${subjectId} timed out for ${action.durationMinutes}m (total timeouts: ${newCount})`,
          counter: 'timeout',
          newCount,
        };
      }

      case 'warn': {
        const newCount = this.ledger.increment('warning', subjectId);
        return {
          ...base,
          succeeded: true,
          message: `User ${subjectId} warned (total warnings: ${newCount})`,
          counter: 'warning',
          newCount,
        };
      }

      case 'delete': {
        const newCount = this.ledger.increment('deletedComment', subjectId);
        return {
          ...base,
          succeeded: true,
          message: `Deleted "${excerpt(eventText)}" from ${subjectId} (total deleted: ${newCount})`,
          counter: 'deletedComment',
          newCount,
        };
      }

      case 'reply': {
        const newCount = this.ledger.increment('reply', subjectId);
        return {
          ...base,
          succeeded: true,
          message: `Replied to ${subjectId}: '${action.message}' (total replies: ${newCount})`,
          counter: 'reply',
          newCount,
        };
      }

      case 'logIncident':
        return {
          ...base,
          succeeded: true,
          message: `Incident logged for ${subjectId}: "${excerpt(eventText)}"`,
        };

      case 'letStand':
        return {
          ...base,
          succeeded: true,
          message: `No action taken for ${subjectId}`,
        };

      case 'unknown':
        return {
          ...base,
          succeeded: false,
          message: `Unknown action: ${token}`,
        };
    }
  }
}
