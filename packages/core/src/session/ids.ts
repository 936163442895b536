/**
 * Session and event identifiers.
 *
 * Session ids are rendered once per session from the start time; event ids
 * are `evt_` plus a zero-padded sequence number scoped to the session.
 */

import { v4 as uuidv4 } from 'uuid';

export const DEFAULT_SESSION_ID_FORMAT = 'session_%Y%m%d_%H%M%S';
export const DEFAULT_EVENT_ID_WIDTH = 3;

const EVENT_ID_PREFIX = 'evt_';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a session id from a strftime-style format, in UTC.
 *
 * Tokens: `%Y %m %d %H %M %S` (date and time), `%L` (milliseconds),
 * `%u` (8 random hex characters), `%%` (a literal percent sign).
 * Unknown tokens are left as written.
 */
export function formatSessionId(format: string, date: Date = new Date()): string {
  return format.replace(/%([YmdHMSLu%])/g, (_match, token: string) => {
    switch (token) {
      case 'Y':
        return String(date.getUTCFullYear());
      case 'm':
        return pad(date.getUTCMonth() + 1);
      case 'd':
        return pad(date.getUTCDate());
      case 'H':
        return pad(date.getUTCHours());
      case 'M':
        return pad(date.getUTCMinutes());
      case 'S':
        return pad(date.getUTCSeconds());
      case 'L':
        return pad(date.getUTCMilliseconds(), 3);
      case 'u':
        return uuidv4().replace(/-/g, '').slice(0, 8);
      default:
        return '%';
    }
  });
}

/** A fresh session id for the current time. */
export function newSessionId(format: string = DEFAULT_SESSION_ID_FORMAT): string {
  return formatSessionId(format, new Date());
}

/** UTC ISO-8601 timestamp with millisecond precision, e.g. `2025-11-02T15:30:45.123Z`. */
export function isoTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/** Sequence number of an event id, or null if it is not one. */
export function parseEventSequence(eventId: string): number | null {
  if (!eventId.startsWith(EVENT_ID_PREFIX)) return null;
  const digits = eventId.slice(EVENT_ID_PREFIX.length);
  if (!/^\d+$/.test(digits)) return null;
  return Number(digits);
}

/**
 * Sequential event id generator for one session.
 *
 * Producers run on the event loop, so `next()` is never interleaved with
 * another call; ids come out in the order the allocator was asked.
 */
export class EventIdAllocator {
  private counter = 0;

  constructor(private readonly width: number = DEFAULT_EVENT_ID_WIDTH) {}

  /** Allocate the next id: `evt_001`, `evt_002`, … */
  next(): string {
    this.counter += 1;
    // Past 999 the width grows to at least six digits.
    const width = this.counter < 1000
      ? this.width
      : Math.max(this.width, 6, String(this.counter).length);
    return `${EVENT_ID_PREFIX}${pad(this.counter, width)}`;
  }

  /** Number of ids handed out so far. */
  count(): number {
    return this.counter;
  }

  reset(): void {
    this.counter = 0;
  }
}
