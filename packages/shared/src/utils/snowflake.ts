/**
 * Snowflake Short Code Generator
 *
 * Composite layout (most significant first):
 *
 *   | milliseconds since epoch | machine id (10) | sequence (12) |
 *
 * The composite is built as a bigint and Base62-encoded, which gives codes
 * of 10-11 characters today. No coordination with other instances is needed:
 * the machine id separates hosts, the sequence separates calls within a host.
 *
 * The durable store's unique index stays the final arbiter. The recent-codes
 * set here only short-circuits collisions that are visible in-process.
 */

import { createHash } from "node:crypto";
import { hostname } from "node:os";
import { SNOWFLAKE_CONFIG } from "../constants/index.js";
import { decodeBase62, encodeBase62 } from "./base62.js";

const MACHINE_ID_MASK = (1 << SNOWFLAKE_CONFIG.MACHINE_ID_BITS) - 1;
const SEQUENCE_SIZE = 1 << SNOWFLAKE_CONFIG.SEQUENCE_BITS;
const SEQUENCE_MASK = SEQUENCE_SIZE - 1;
const MACHINE_SHIFT = BigInt(SNOWFLAKE_CONFIG.SEQUENCE_BITS);
const TIMESTAMP_SHIFT = BigInt(SNOWFLAKE_CONFIG.SEQUENCE_BITS + SNOWFLAKE_CONFIG.MACHINE_ID_BITS);

// =============================================================================
// TYPES
// =============================================================================

/**
 * Anything that can mint short codes. The service depends on this, not on
 * the Snowflake implementation.
 */
export interface CodeGenerator {
  /** Mint a new code. */
  next(): string;
  /** Mark a code as taken so the generator never hands it out. */
  reserve(code: string): void;
}

export interface SnowflakeOptions {
  /** Custom epoch in Unix ms (default 2024-01-01) */
  epochMs?: number;
  /** 10-bit machine id; derived from the hostname when omitted */
  machineId?: number;
  /** Millisecond clock, injectable for tests */
  clock?: () => number;
  /** Capacity of the recent-codes set */
  recentCapacity?: number;
}

export interface SnowflakeParts {
  timestamp: number;
  machineId: number;
  sequence: number;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Derive a stable 10-bit machine id from a hostname.
 */
export function deriveMachineId(host: string = hostname()): number {
  const digest = createHash("sha256").update(host).digest();
  return digest.readUInt16BE(0) & MACHINE_ID_MASK;
}

export function composeSnowflake(parts: SnowflakeParts): bigint {
  return (
    (BigInt(parts.timestamp) << TIMESTAMP_SHIFT) |
    (BigInt(parts.machineId & MACHINE_ID_MASK) << MACHINE_SHIFT) |
    BigInt(parts.sequence & SEQUENCE_MASK)
  );
}

/**
 * Split a generated code back into its components.
 * `timestamp` is relative to the generator's epoch.
 */
export function parseSnowflakeCode(code: string): SnowflakeParts {
  const value = decodeBase62(code);
  return {
    timestamp: Number(value >> TIMESTAMP_SHIFT),
    machineId: Number((value >> MACHINE_SHIFT) & BigInt(MACHINE_ID_MASK)),
    sequence: Number(value & BigInt(SEQUENCE_MASK)),
  };
}

/**
 * Insertion-ordered set that forgets its oldest entries past `capacity`.
 */
export class RecentCodes {
  private readonly codes = new Set<string>();

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError("RecentCodes capacity must be at least 1");
    }
  }

  has(code: string): boolean {
    return this.codes.has(code);
  }

  add(code: string): void {
    this.codes.delete(code);
    this.codes.add(code);
    while (this.codes.size > this.capacity) {
      const oldest = this.codes.values().next();
      if (oldest.done) break;
      this.codes.delete(oldest.value);
    }
  }

  get size(): number {
    return this.codes.size;
  }
}

// =============================================================================
// GENERATOR
// =============================================================================

export class SnowflakeCodeGenerator implements CodeGenerator {
  readonly machineId: number;
  private readonly epochMs: number;
  private readonly clock: () => number;
  private readonly recent: RecentCodes;

  private sequence = 0;
  private lastTimestamp = -1;
  private issuedInTick = 0;
  private collisions = 0;

  constructor(options: SnowflakeOptions = {}) {
    this.epochMs = options.epochMs ?? SNOWFLAKE_CONFIG.DEFAULT_EPOCH_MS;
    this.machineId = (options.machineId ?? deriveMachineId()) & MACHINE_ID_MASK;
    this.clock = options.clock ?? Date.now;
    this.recent = new RecentCodes(options.recentCapacity ?? SNOWFLAKE_CONFIG.RECENT_CODES_CAPACITY);
  }

  next(): string {
    // One full sequence cycle is always enough to leave a tick behind.
    for (let attempt = 0; attempt <= SEQUENCE_SIZE; attempt++) {
      const code = encodeBase62(
        composeSnowflake({
          timestamp: this.tick(),
          machineId: this.machineId,
          sequence: this.nextSequence(),
        })
      );

      if (!this.recent.has(code)) {
        this.recent.add(code);
        return code;
      }
      this.collisions++;
    }

    throw new Error("Snowflake generator could not produce a fresh code");
  }

  reserve(code: string): void {
    this.recent.add(code);
  }

  /** Number of in-process collisions seen so far. */
  get collisionCount(): number {
    return this.collisions;
  }

  private nextSequence(): number {
    const current = this.sequence;
    this.sequence = (this.sequence + 1) & SEQUENCE_MASK;
    return current;
  }

  /**
   * Logical timestamp: never goes backwards, and moves forward by one once a
   * tick has issued a full sequence cycle.
   */
  private tick(): number {
    const now = Math.max(this.clock() - this.epochMs, 0);

    if (now > this.lastTimestamp) {
      this.lastTimestamp = now;
      this.issuedInTick = 0;
    } else if (this.issuedInTick >= SEQUENCE_SIZE) {
      this.lastTimestamp += 1;
      this.issuedInTick = 0;
    }

    this.issuedInTick++;
    return this.lastTimestamp;
  }
}
