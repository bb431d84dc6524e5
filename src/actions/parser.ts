/**
 * Free-text action tokens from a proposer mapped onto the closed action set.
 * Matching is by keyword so phrasing like "timeout_user_10m", "Timeout 10 min"
 * or "ban the user" all land in the same family.
 */

export type ParsedAction =
  | { kind: 'ban' }
  | { kind: 'timeout'; durationMinutes: number }
  | { kind: 'warn' }
  | { kind: 'delete' }
  | { kind: 'reply'; message: string }
  | { kind: 'logIncident' }
  | { kind: 'letStand' }
  | { kind: 'unknown' };

export type ActionKind = ParsedAction['kind'];

export const DEFAULT_TIMEOUT_MINUTES = 5;
export const DEFAULT_REPLY_MESSAGE = 'Please follow community guidelines';

// Letters only count as a word boundary; `_`, `-`, digits and spaces separate words
function hasKeyword(token: string, keywords: string): boolean {
  return new RegExp(`(?:^|[^a-z])(?:${keywords})(?![a-z])`).test(token);
}

const BAN = 'ban|bans|banned';
const TIMEOUT = 'timeout|timeouts|timed[\\s_-]*out|time[\\s_-]*out|mute|muted';
const WARN = 'warn|warns|warned|warning';
const DELETE = 'delete|deleted|remove|removed';

const NEGATED_ACTION = new RegExp(
  `(?:^|[^a-z])(?:no|not|never|dont|don't|do[\\s_-]*not)[\\s_-]+(?:${[BAN, TIMEOUT, WARN, DELETE].join('|')})(?![a-z])`
);

function isLetStand(token: string): boolean {
  return /let[\s_-]*(comment[\s_-]*)?stand/.test(token)
    || /(?:^|[^a-z])no[\s_-]*action/.test(token)
    || hasKeyword(token, 'ignore|ignored')
    || NEGATED_ACTION.test(token);
}

export function parseTimeoutMinutes(token: string): number {
  const match = token.match(/(\d+)\s*(h|hr|hrs|hours?|m|min|mins|minutes?|s|sec|secs|seconds?)(?![a-z])/);
  if (!match) return DEFAULT_TIMEOUT_MINUTES;

  const amount = parseInt(match[1], 10);
  const unit = match[2];
  if (unit.startsWith('h')) return amount * 60;
  if (unit.startsWith('s')) return Math.max(1, Math.ceil(amount / 60));
  return amount;
}

export function parseReplyMessage(token: string): string {
  const match = token.match(/reply\s*\(\s*(['"]?)(.*?)\1\s*\)/i);
  const message = match?.[2]?.trim();
  return message ? message : DEFAULT_REPLY_MESSAGE;
}

export function parseAction(token: string): ParsedAction {
  const normalized = token.toLowerCase().trim();

  // A reply payload may mention other keywords ("reply('no bans today')")
  if (normalized.startsWith('reply')) {
    return { kind: 'reply', message: parseReplyMessage(token) };
  }

  // "no_ban_needed" or "let_stand_no_ban" must not reach the counter families
  if (isLetStand(normalized)) {
    return { kind: 'letStand' };
  }

  if (hasKeyword(normalized, BAN)) {
    return { kind: 'ban' };
  }
  if (hasKeyword(normalized, TIMEOUT)) {
    return { kind: 'timeout', durationMinutes: parseTimeoutMinutes(normalized) };
  }
  if (hasKeyword(normalized, WARN)) {
    return { kind: 'warn' };
  }
  if (hasKeyword(normalized, DELETE)) {
    return { kind: 'delete' };
  }
  if (hasKeyword(normalized, 'reply')) {
    return { kind: 'reply', message: parseReplyMessage(token) };
  }
  if (/log[\s_-]*incident/.test(normalized)) {
    return { kind: 'logIncident' };
  }

  return { kind: 'unknown' };
}

export function describeAction(action: ParsedAction): string {
  switch (action.kind) {
    case 'timeout':
      return `timeout(${action.durationMinutes}m)`;
    case 'reply':
      return `reply(${JSON.stringify(action.message)})`;
    default:
      return action.kind;
  }
}
