/**
 * In-process stand-in for a pg pool.
 *
 * Every statement is recorded; `respond` decides the result for each one and
 * may throw to simulate a server error.
 */

import type { Database, QueryOutcome, TransactionClient } from "../src/index.js";

export interface RecordedQuery {
  text: string;
  values: readonly unknown[] | undefined;
}

export type Responder = (text: string, values: readonly unknown[] | undefined) => QueryOutcome | undefined;

const EMPTY: QueryOutcome = { rows: [], rowCount: 0 };

export class FakeDatabase implements Database {
  readonly queries: RecordedQuery[] = [];
  readonly releases: Array<Error | undefined> = [];
  ended = false;

  constructor(public respond: Responder = () => undefined) {}

  async query(text: string, values?: readonly unknown[]): Promise<QueryOutcome> {
    this.queries.push({ text, values });
    return this.respond(text, values) ?? EMPTY;
  }

  async connect(): Promise<TransactionClient> {
    return {
      query: (text, values) => this.query(text, values),
      release: (error) => {
        this.releases.push(error);
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  /** First word of each statement, for asserting statement order. */
  get statements(): string[] {
    return this.queries.map((q) => q.text.trim().split(/\s+/)[0] ?? "");
  }
}

/**
 * A pg-style server error.
 */
export function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, constraint });
}
