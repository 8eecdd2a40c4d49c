/** Seconds elapsed since `lastMessageTime`; infinite when there is none. */
export function secondsSince(lastMessageTime: Date | null, now: Date): number {
  if (!lastMessageTime) {
    return Number.POSITIVE_INFINITY;
  }

  return (now.getTime() - lastMessageTime.getTime()) / 1000;
}

export function shouldStartNewThread(
  threadId: string | null,
  lastMessageTime: Date | null,
  retentionHours: number,
  now: Date,
): boolean {
  return threadId === null || secondsSince(lastMessageTime, now) > retentionHours * 3600;
}

export function isMessageTooOld(
  messageUnixTime: number | undefined,
  thresholdSeconds: number,
  now: Date,
): boolean {
  if (!messageUnixTime) {
    return false;
  }

  return now.getTime() / 1000 - messageUnixTime > thresholdSeconds;
}

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Read the backend's ISO-8601 `last_message_time`. Values without a zone are
 * UTC; anything unreadable is treated as no previous message.
 */
export function parseLastMessageTime(value: string | null): Date | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  const hasZone = DATE_ONLY.test(trimmed) || ZONE_DESIGNATOR.test(trimmed);
  const parsed = new Date(hasZone ? trimmed : `${trimmed}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Human-readable duration for logs: "5.2 seconds", "3.1 minutes", "2.5 hours", "1.2 days". */
export function formatTimeDelta(seconds: number): string {
  if (!Number.isFinite(seconds)) {
    return 'never';
  }
  if (seconds < 60) {
    return `${seconds.toFixed(1)} seconds`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)} minutes`;
  }
  if (seconds < 86_400) {
    return `${(seconds / 3600).toFixed(1)} hours`;
  }
  return `${(seconds / 86_400).toFixed(1)} days`;
}

/** First six words of the message, used as a new thread's title. */
export function threadTitleFrom(text: string): string {
  return text.split(/\s+/).filter(Boolean).slice(0, 6).join(' ');
}
