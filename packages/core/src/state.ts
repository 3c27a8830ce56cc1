/**
 * ShortUrl state and event application.
 *
 * `applyEvent` is a pure function of (state, event). Replaying a stream in
 * version order rebuilds any aggregate without touching storage.
 */

import { ShortUrlStatus, type DisableReason, type ShortUrlEvent } from "./events.js";

/**
 * Materialized state of one short URL (the read model).
 */
export interface ShortUrlRecord {
  readonly id: string;
  readonly shortCode: string;
  readonly originalUrl: string;
  readonly status: ShortUrlStatus;
  readonly createdAt: Date;
  readonly expiresAt: Date | null;
  readonly lastAccessedAt: Date | null;
  readonly accessCount: number;
  readonly createdBy: string;
  readonly metadata: Readonly<Record<string, string>>;
  readonly isCustomAlias: boolean;
  readonly disabledReason: DisableReason | null;
  readonly disabledAt: Date | null;
  /** Version of the last applied event */
  readonly version: number;
}

export class EventSequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventSequenceError";
  }
}

function expectNextVersion(state: ShortUrlRecord, event: ShortUrlEvent): void {
  if (event.version !== state.version + 1) {
    throw new EventSequenceError(
      `Event ${event.type} has version ${event.version}, expected ${state.version + 1}`
    );
  }
}

/**
 * Apply one event to the current state and return the next state.
 *
 * @throws EventSequenceError when the event does not follow `state`
 */
export function applyEvent(state: ShortUrlRecord | null, event: ShortUrlEvent): ShortUrlRecord {
  if (event.type === "ShortUrlCreated") {
    if (state !== null) {
      throw new EventSequenceError(`Aggregate ${event.aggregateId} is already created`);
    }
    if (event.version !== 1) {
      throw new EventSequenceError(`ShortUrlCreated must be version 1, got ${event.version}`);
    }
    return {
      id: event.aggregateId,
      shortCode: event.shortCode,
      originalUrl: event.originalUrl,
      status: ShortUrlStatus.ACTIVE,
      createdAt: event.occurredAt,
      expiresAt: event.expiresAt,
      lastAccessedAt: null,
      accessCount: 0,
      createdBy: event.createdBy,
      metadata: event.metadata,
      isCustomAlias: event.isCustomAlias,
      disabledReason: null,
      disabledAt: null,
      version: 1,
    };
  }

  if (state === null) {
    throw new EventSequenceError(`${event.type} applied before ShortUrlCreated`);
  }
  expectNextVersion(state, event);

  switch (event.type) {
    case "ShortUrlAccessed":
      return {
        ...state,
        accessCount: state.accessCount + 1,
        lastAccessedAt: event.occurredAt,
        version: event.version,
      };
    case "ShortUrlExpired":
      return {
        ...state,
        status: ShortUrlStatus.EXPIRED,
        version: event.version,
      };
    case "ShortUrlDisabled":
      return {
        ...state,
        status: ShortUrlStatus.DISABLED,
        disabledReason: event.reason,
        disabledAt: event.occurredAt,
        version: event.version,
      };
    default: {
      const unhandled: never = event;
      throw new EventSequenceError(`Unhandled event: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Fold an event stream into state. Events are sorted by version first.
 *
 * @throws EventSequenceError on an empty stream or a version gap
 */
export function replayEvents(events: readonly ShortUrlEvent[]): ShortUrlRecord {
  const ordered = [...events].sort((a, b) => a.version - b.version);

  let state: ShortUrlRecord | null = null;
  for (const event of ordered) {
    state = applyEvent(state, event);
  }

  if (state === null) {
    throw new EventSequenceError("Cannot replay an empty event stream");
  }
  return state;
}

export function isExpiredAt(record: ShortUrlRecord, now: Date): boolean {
  return record.expiresAt !== null && record.expiresAt.getTime() <= now.getTime();
}

/**
 * Whether a redirect for this record should be served at `now`.
 */
export function isAccessibleAt(record: ShortUrlRecord, now: Date): boolean {
  return record.status === ShortUrlStatus.ACTIVE && !isExpiredAt(record, now);
}
