/**
 * ShortUrl Aggregate
 *
 * Decides which events to emit; `applyEvent` decides what they mean.
 *
 * State machine:
 *
 *   Active ──► Expired     (first access past expiresAt)
 *   Active ──► Disabled    (owner/admin action)
 *   Active ──► Suspended   (reserved for policy use)
 *
 * Expired and Disabled are terminal.
 */

import { randomUUID } from "node:crypto";
import {
  validateCustomAlias,
  validateExpiry,
  validateMetadata,
  validateOriginalUrl,
  type AccessContext,
  type CodeGenerator,
  type ValidationResult,
} from "@snaplink/shared";
import { NotFoundError, ValidationError } from "./errors.js";
import { ShortUrlStatus, type DisableReason, type ShortUrlEvent } from "./events.js";
import { applyEvent, isAccessibleAt, isExpiredAt, replayEvents, type ShortUrlRecord } from "./state.js";

export interface CreateShortUrlInput {
  originalUrl: string;
  ownerId: string;
  customAlias?: string;
  expiresAt?: Date | null;
  metadata?: Record<string, string>;
}

export interface CreateOptions {
  now: Date;
  generator: CodeGenerator;
}

/** Which event an access produced. */
export type AccessOutcome = "accessed" | "expired";

function collect(details: Record<string, string[]>, field: string, result: ValidationResult): void {
  if (!result.valid) {
    details[field] = [...(details[field] ?? []), result.error ?? "Invalid value"];
  }
}

export class ShortUrlAggregate {
  private state: ShortUrlRecord;
  private persistedVersion: number;
  private pending: ShortUrlEvent[] = [];

  private constructor(state: ShortUrlRecord, persistedVersion: number) {
    this.state = state;
    this.persistedVersion = persistedVersion;
  }

  // ===========================================================================
  // Factories
  // ===========================================================================

  /**
   * Validate input and emit ShortUrlCreated.
   *
   * @throws ValidationError listing every failing field
   */
  static create(input: CreateShortUrlInput, options: CreateOptions): ShortUrlAggregate {
    const details: Record<string, string[]> = {};

    collect(details, "originalUrl", validateOriginalUrl(input.originalUrl));
    if (input.ownerId.trim().length === 0) {
      collect(details, "ownerId", { valid: false, error: "Owner is required" });
    }
    if (input.customAlias !== undefined) {
      collect(details, "customAlias", validateCustomAlias(input.customAlias));
    }
    if (input.expiresAt) {
      collect(details, "expiresAt", validateExpiry(input.expiresAt, options.now));
    }
    if (input.metadata) {
      collect(details, "metadata", validateMetadata(input.metadata));
    }

    if (Object.keys(details).length > 0) {
      throw new ValidationError(details);
    }

    const created: ShortUrlEvent = {
      type: "ShortUrlCreated",
      aggregateId: randomUUID(),
      eventId: randomUUID(),
      version: 1,
      occurredAt: options.now,
      shortCode: input.customAlias ?? options.generator.next(),
      originalUrl: input.originalUrl,
      createdBy: input.ownerId,
      expiresAt: input.expiresAt ?? null,
      metadata: { ...(input.metadata ?? {}) },
      isCustomAlias: input.customAlias !== undefined,
    };

    const aggregate = new ShortUrlAggregate(applyEvent(null, created), 0);
    aggregate.pending.push(created);
    return aggregate;
  }

  /**
   * Rebuild from a stored event stream (any order; sorted by version).
   */
  static fromEvents(events: readonly ShortUrlEvent[]): ShortUrlAggregate {
    const state = replayEvents(events);
    return new ShortUrlAggregate(state, state.version);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Record one visit. Past expiry this emits ShortUrlExpired instead and the
   * visit is not counted.
   *
   * @throws NotFoundError (reason "inactive") unless the record is Active
   */
  recordAccess(context: AccessContext, now: Date): AccessOutcome {
    if (this.state.status !== ShortUrlStatus.ACTIVE) {
      throw new NotFoundError(this.state.shortCode, "inactive");
    }

    if (isExpiredAt(this.state, now)) {
      this.raise({ ...this.envelope(now), type: "ShortUrlExpired", expiredAt: now });
      return "expired";
    }

    this.raise({
      ...this.envelope(now),
      type: "ShortUrlAccessed",
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      referrer: context.referrer,
      geo: context.geo,
      device: context.device,
    });
    return "accessed";
  }

  /**
   * Move an Active record past its expiry to Expired without an access.
   * Returns false, emitting nothing, when it is not Active or not yet expired.
   */
  expire(now: Date): boolean {
    if (this.state.status !== ShortUrlStatus.ACTIVE || !isExpiredAt(this.state, now)) {
      return false;
    }

    this.raise({ ...this.envelope(now), type: "ShortUrlExpired", expiredAt: now });
    return true;
  }

  /**
   * Disable the record. Returns false, emitting nothing, when it is already
   * Disabled or otherwise no longer Active.
   */
  disable(reason: DisableReason, adminNotes: string | undefined, now: Date): boolean {
    if (this.state.status !== ShortUrlStatus.ACTIVE) {
      return false;
    }

    this.raise({ ...this.envelope(now), type: "ShortUrlDisabled", reason, adminNotes });
    return true;
  }

  // ===========================================================================
  // Persistence support
  // ===========================================================================

  /** Events emitted since the last commit, in version order. */
  get uncommittedEvents(): readonly ShortUrlEvent[] {
    return [...this.pending];
  }

  /** Version the store holds; pass as expectedVersion when saving. */
  get committedVersion(): number {
    return this.persistedVersion;
  }

  /** Called by a repository once the pending events are durable. */
  markCommitted(): void {
    this.persistedVersion = this.state.version;
    this.pending = [];
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get id(): string {
    return this.state.id;
  }

  get shortCode(): string {
    return this.state.shortCode;
  }

  get status(): ShortUrlStatus {
    return this.state.status;
  }

  get version(): number {
    return this.state.version;
  }

  get record(): ShortUrlRecord {
    return this.state;
  }

  isExpired(now: Date): boolean {
    return isExpiredAt(this.state, now);
  }

  isAccessible(now: Date): boolean {
    return isAccessibleAt(this.state, now);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private envelope(now: Date): { aggregateId: string; eventId: string; version: number; occurredAt: Date } {
    return {
      aggregateId: this.state.id,
      eventId: randomUUID(),
      version: this.state.version + 1,
      occurredAt: now,
    };
  }

  private raise(event: ShortUrlEvent): void {
    this.state = applyEvent(this.state, event);
    this.pending.push(event);
  }
}
