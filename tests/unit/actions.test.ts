import { describe, it, expect, beforeEach } from 'vitest';
import {
  parseAction,
  parseTimeoutMinutes,
  parseReplyMessage,
  describeAction,
  DEFAULT_REPLY_MESSAGE,
} from '../../src/actions/parser.js';
import { ActionApplier } from '../../src/actions/applier.js';
import { SubjectLedger } from '../../src/state/ledger.js';

describe('parseAction', () => {
  it('matches keywords case-insensitively across separators', () => {
    expect(parseAction('ban_user')).toEqual({ kind: 'ban' });
    expect(parseAction('BAN')).toEqual({ kind: 'ban' });
    expect(parseAction('warn_user')).toEqual({ kind: 'warn' });
    expect(parseAction('delete_comment')).toEqual({ kind: 'delete' });
    expect(parseAction('remove message')).toEqual({ kind: 'delete' });
    expect(parseAction('log_incident')).toEqual({ kind: 'logIncident' });
    expect(parseAction('let_comment_stand')).toEqual({ kind: 'letStand' });
    expect(parseAction('no_action')).toEqual({ kind: 'letStand' });
  });

  it('only matches keywords at a word start', () => {
    expect(parseAction('unban_user')).toEqual({ kind: 'unknown' });
    expect(parseAction('frobnicate_xyz')).toEqual({ kind: 'unknown' });
  });

  it('needs a whole word, allowing inflections', () => {
    expect(parseAction('banner_ok')).toEqual({ kind: 'unknown' });
    expect(parseAction('user_banned')).toEqual({ kind: 'ban' });
    expect(parseAction('timed out for 10m')).toEqual({ kind: 'timeout', durationMinutes: 10 });
    expect(parseAction('warning issued')).toEqual({ kind: 'warn' });
    expect(parseAction('warnings_off_topic')).toEqual({ kind: 'unknown' });
  });

  it('never applies a counter for negated or no-action tokens', () => {
    expect(parseAction('no_ban_needed')).toEqual({ kind: 'letStand' });
    expect(parseAction('let_stand_no_ban')).toEqual({ kind: 'letStand' });
    expect(parseAction('ignore_banter')).toEqual({ kind: 'letStand' });
    expect(parseAction("don't timeout")).toEqual({ kind: 'letStand' });
    expect(parseAction('do not delete')).toEqual({ kind: 'letStand' });
  });

  it('parses timeout durations', () => {
    expect(parseAction('timeout_user_10m')).toEqual({ kind: 'timeout', durationMinutes: 10 });
    expect(parseAction('Timeout 10 min')).toEqual({ kind: 'timeout', durationMinutes: 10 });
    expect(parseAction('timeout_user')).toEqual({ kind: 'timeout', durationMinutes: 5 });
    expect(parseAction('mute 1h')).toEqual({ kind: 'timeout', durationMinutes: 60 });
  });

  it('rounds second durations up to a minute', () => {
    expect(parseTimeoutMinutes('timeout 30s')).toBe(1);
    expect(parseTimeoutMinutes('timeout 150 seconds')).toBe(3);
  });

  it('parses reply payloads keeping their casing', () => {
    expect(parseAction("reply('Please Keep It Friendly')")).toEqual({
      kind: 'reply',
      message: 'Please Keep It Friendly',
    });
    expect(parseReplyMessage('reply("hi there")')).toBe('hi there');
    expect(parseReplyMessage('reply(hello chat)')).toBe('hello chat');
    expect(parseAction('send reply')).toEqual({ kind: 'reply', message: DEFAULT_REPLY_MESSAGE });
  });

  it('treats a reply mentioning other keywords as a reply', () => {
    expect(parseAction("reply('no bans today, just warnings')")).toEqual({
      kind: 'reply',
      message: 'no bans today, just warnings',
    });
  });

  it('describes parsed actions', () => {
    expect(describeAction({ kind: 'timeout', durationMinutes: 10 })).toBe('timeout(10m)');
    expect(describeAction({ kind: 'reply', message: 'hi' })).toBe('reply("hi")');
    expect(describeAction({ kind: 'ban' })).toBe('ban');
  });
});

describe('ActionApplier', () => {
  let ledger: SubjectLedger;
  let applier: ActionApplier;

  beforeEach(() => {
    ledger = new SubjectLedger();
    applier = new ActionApplier(ledger);
  });

  it('reports unknown tokens and keeps going', () => {
    const outcomes = applier.applyActions(['ban_user', 'frobnicate_xyz'], 'u1', 'text');

    expect(outcomes).toHaveLength(2);
    expect(outcomes[0]).toMatchObject({
      succeeded: true,
      newCount: 1,
      counter: 'ban',
      message: 'User u1 banned (total bans: 1)',
    });
    expect(outcomes[1]).toMatchObject({
      succeeded: false,
      message: 'Unknown action: frobnicate_xyz',
      action: { kind: 'unknown' },
    });
    expect(ledger.getStateView('u1').banCount).toBe(1);
  });

  it('leaves the ban counter alone for a negated ban', () => {
    const [outcome] = applier.applyActions(['no_ban_needed'], 'u1', 'text');

    expect(outcome.message).toBe('No action taken for u1');
    expect(ledger.getStateView('u1').banCount).toBe(0);
  });

  it('applies tokens in order', () => {
    const outcomes = applier.applyActions(['delete_comment', 'timeout_user_10m'], 'u1', 'spam spam');

    expect(outcomes.map((o) => o.message)).toEqual([
      'Deleted "spam spam" from u1 (total deleted: 1)',
      'User u1 timed out for 10m (total timeouts: 1)',
    ]);
    expect(ledger.getStateView('u1').lastAction).toBe('timeout');
  });

  it('shortens long comments in messages', () => {
    const text = 'a'.repeat(45);
    const [outcome] = applier.applyActions(['delete_comment'], 'u1', text);
    expect(outcome.message).toBe(`Deleted "${'a'.repeat(40)}..." from u1 (total deleted: 1)`);
  });

  it('counts warnings and replies', () => {
    applier.applyActions(['warn_user'], 'u1');
    const [warned] = applier.applyActions(['warn_user'], 'u1');
    const [replied] = applier.applyActions(["reply('Please keep it friendly')"], 'u1');

    expect(warned.message).toBe('User u1 warned (total warnings: 2)');
    expect(replied.message).toBe("Replied to u1: 'Please keep it friendly' (total replies: 1)");
  });

  it('leaves counters alone for incidents and no-ops', () => {
    const outcomes = applier.applyActions(['log_incident', 'let_comment_stand'], 'u1', 'hmm');

    expect(outcomes.map((o) => o.message)).toEqual([
      'Incident logged for u1: "hmm"',
      'No action taken for u1',
    ]);
    expect(outcomes.every((o) => o.succeeded && o.newCount === undefined)).toBe(true);
    expect(ledger.stateSummary('u1')).toBe(
      'bans:0, warnings:0, timeouts:0, deleted:0, replies:0, followers:0, viewers:0'
    );
  });

  it('returns nothing for an empty action list', () => {
    expect(applier.applyActions([], 'u1')).toEqual([]);
  });
});
