import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DEFAULT_CLOSURE_PHRASES,
  DEFAULT_URGENT_KEYWORDS,
  findUrgentKeyword,
  hasUnansweredFollowups,
  isClosureCommand,
  isInactive,
  trailingCustomerRun,
} from './predicates.js';

const C = { isAdmin: false };
const A = { isAdmin: true };
const open = { status: 'open' as const };

describe('isInactive', () => {
  const now = new Date('2024-05-10T12:00:00.000Z');
  const hours48 = 48 * 60 * 60 * 1000;

  it('should fire one second past 48 hours', () => {
    const lastMessageAt = new Date(now.getTime() - hours48 - 1000).toISOString();
    assert.strictEqual(isInactive({ status: 'open', lastMessageAt }, now, 48), true);
  });

  it('should not fire one second before 48 hours', () => {
    const lastMessageAt = new Date(now.getTime() - hours48 + 1000).toISOString();
    assert.strictEqual(isInactive({ status: 'open', lastMessageAt }, now, 48), false);
  });

  it('should not fire at exactly 48 hours', () => {
    const lastMessageAt = new Date(now.getTime() - hours48).toISOString();
    assert.strictEqual(isInactive({ status: 'open', lastMessageAt }, now, 48), false);
  });

  it('should never fire for a closed case', () => {
    assert.strictEqual(isInactive({ status: 'closed', lastMessageAt: '2020-01-01T00:00:00.000Z' }, now, 48), false);
  });

  it('should respect a configured threshold', () => {
    assert.strictEqual(isInactive({ status: 'open', lastMessageAt: '2024-05-10T09:59:00.000Z' }, now, 2), true);
  });
});

describe('trailingCustomerRun', () => {
  it('should count consecutive customer messages from the end', () => {
    assert.strictEqual(trailingCustomerRun([C, C, C, A, C, C]), 2);
    assert.strictEqual(trailingCustomerRun([C, C, C, C]), 4);
  });

  it('should be zero when the last message is from an admin', () => {
    assert.strictEqual(trailingCustomerRun([C, C, A]), 0);
    assert.strictEqual(trailingCustomerRun([]), 0);
  });
});

describe('hasUnansweredFollowups', () => {
  it('should fire for four customer messages in a row', () => {
    assert.strictEqual(hasUnansweredFollowups(open, [C, C, C, C], 3), true);
  });

  it('should not fire for three customer messages in a row', () => {
    assert.strictEqual(hasUnansweredFollowups(open, [C, C, C], 3), false);
  });

  it('should not fire when an admin replied before the last two messages', () => {
    assert.strictEqual(hasUnansweredFollowups(open, [C, C, C, A, C, C], 3), false);
  });

  it('should reset after an admin reply', () => {
    assert.strictEqual(hasUnansweredFollowups(open, [C, C, C, C, A, C], 3), false);
  });

  it('should never fire for a closed case', () => {
    assert.strictEqual(hasUnansweredFollowups({ status: 'closed' }, [C, C, C, C, C], 3), false);
  });
});

describe('findUrgentKeyword', () => {
  it('should match case-insensitively', () => {
    assert.strictEqual(findUrgentKeyword('this is URGENT please help', DEFAULT_URGENT_KEYWORDS), 'urgent');
  });

  it('should match as a substring, not a whole word', () => {
    assert.strictEqual(findUrgentKeyword('nothing urgent here', DEFAULT_URGENT_KEYWORDS), 'urgent');
    assert.strictEqual(findUrgentKeyword('a nonurgent question', DEFAULT_URGENT_KEYWORDS), 'urgent');
  });

  it('should find each default keyword', () => {
    assert.strictEqual(findUrgentKeyword('Reply immediately', DEFAULT_URGENT_KEYWORDS), 'immediately');
    assert.strictEqual(findUrgentKeyword('medical Emergency', DEFAULT_URGENT_KEYWORDS), 'emergency');
    assert.strictEqual(findUrgentKeyword('critical bug', DEFAULT_URGENT_KEYWORDS), 'critical');
  });

  it('should return null when nothing matches', () => {
    assert.strictEqual(findUrgentKeyword('need help asap', DEFAULT_URGENT_KEYWORDS), null);
  });

  it('should ignore blank keywords', () => {
    assert.strictEqual(findUrgentKeyword('hello', ['', '  ']), null);
  });
});

describe('isClosureCommand', () => {
  it('should accept the canonical phrase and its variants', () => {
    for (const body of [
      "I'm closing this case.",
      'I am closing this case.',
      'Closing this case.',
      'Case closed.',
      "I'll close this case.",
    ]) {
      assert.strictEqual(isClosureCommand(body, DEFAULT_CLOSURE_PHRASES), true, body);
    }
  });

  it('should match inside a longer reply, ignoring case', () => {
    assert.strictEqual(isClosureCommand("Thanks Jane, all sorted. I'M CLOSING THIS CASE. Have a good day", DEFAULT_CLOSURE_PHRASES), true);
  });

  it('should require the trailing period', () => {
    assert.strictEqual(isClosureCommand("I'm closing this case soon", DEFAULT_CLOSURE_PHRASES), false);
  });

  it('should not match ordinary replies', () => {
    assert.strictEqual(isClosureCommand('Looking into it now', DEFAULT_CLOSURE_PHRASES), false);
  });
});
