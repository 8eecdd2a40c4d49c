import { describe, expect, it } from 'vitest';

import {
  formatTimeDelta,
  isMessageTooOld,
  parseLastMessageTime,
  secondsSince,
  shouldStartNewThread,
  threadTitleFrom,
} from './retention';

const now = new Date('2025-03-01T12:00:00Z');

describe('shouldStartNewThread', () => {
  it('starts a new thread when the user has none', () => {
    expect(shouldStartNewThread(null, null, 3, now)).toBe(true);
  });

  it('starts a new thread when there is no last message time', () => {
    expect(shouldStartNewThread('thread-1', null, 3, now)).toBe(true);
  });

  it('reuses a thread idle exactly for the retention window', () => {
    const last = new Date(now.getTime() - 3 * 3600 * 1000);
    expect(shouldStartNewThread('thread-1', last, 3, now)).toBe(false);
  });

  it('starts a new thread one second past the retention window', () => {
    const last = new Date(now.getTime() - (3 * 3600 + 1) * 1000);
    expect(shouldStartNewThread('thread-1', last, 3, now)).toBe(true);
  });

  it('supports fractional retention hours', () => {
    const last = new Date(now.getTime() - 45 * 60 * 1000);
    expect(shouldStartNewThread('thread-1', last, 0.5, now)).toBe(true);
    expect(shouldStartNewThread('thread-1', last, 1, now)).toBe(false);
  });
});

describe('isMessageTooOld', () => {
  const nowSeconds = now.getTime() / 1000;

  it('accepts a message exactly at the threshold', () => {
    expect(isMessageTooOld(nowSeconds - 86_400, 86_400, now)).toBe(false);
  });

  it('rejects a message one second past the threshold', () => {
    expect(isMessageTooOld(nowSeconds - 86_401, 86_400, now)).toBe(true);
  });

  it('never rejects a message without a timestamp', () => {
    expect(isMessageTooOld(undefined, 86_400, now)).toBe(false);
  });
});

describe('parseLastMessageTime', () => {
  it('reads values without a zone as UTC', () => {
    expect(parseLastMessageTime('2025-03-01T09:00:00')?.toISOString()).toBe('2025-03-01T09:00:00.000Z');
  });

  it('keeps explicit offsets', () => {
    expect(parseLastMessageTime('2025-03-01T09:00:00+02:00')?.toISOString()).toBe('2025-03-01T07:00:00.000Z');
    expect(parseLastMessageTime('2025-03-01T09:00:00.250Z')?.toISOString()).toBe('2025-03-01T09:00:00.250Z');
  });

  it('returns null for missing or unreadable values', () => {
    expect(parseLastMessageTime(null)).toBeNull();
    expect(parseLastMessageTime('')).toBeNull();
    expect(parseLastMessageTime('yesterday')).toBeNull();
  });
});

describe('secondsSince', () => {
  it('is infinite without a previous message', () => {
    expect(secondsSince(null, now)).toBe(Number.POSITIVE_INFINITY);
  });

  it('measures elapsed seconds', () => {
    expect(secondsSince(new Date('2025-03-01T11:59:30Z'), now)).toBe(30);
  });
});

describe('formatTimeDelta', () => {
  it.each([
    [Number.POSITIVE_INFINITY, 'never'],
    [5.24, '5.2 seconds'],
    [90, '1.5 minutes'],
    [9000, '2.5 hours'],
    [129_600, '1.5 days'],
  ])('formats %s seconds as %s', (seconds, expected) => {
    expect(formatTimeDelta(seconds)).toBe(expected);
  });
});

describe('threadTitleFrom', () => {
  it('keeps the first six words', () => {
    expect(threadTitleFrom('  what   is the best way to learn a language  ')).toBe('what is the best way to');
  });
});
