/**
 * Database client helper tests
 */

import { describe, it, expect } from "@jest/globals";
import { createMemoryLogger } from "@snaplink/logger";
import { checkDbConnection } from "../src/index.js";
import { FakeDatabase } from "./fake-database.js";

describe("checkDbConnection", () => {
  it("should report a working connection", async () => {
    const { logger, entries } = createMemoryLogger();
    const db = new FakeDatabase();

    expect(await checkDbConnection(db, logger)).toBe(true);
    expect(db.queries.map((q) => q.text)).toEqual(["SELECT 1"]);
    expect(entries).toEqual([]);
  });

  it("should log the failure at warn and report false", async () => {
    const { logger, entries } = createMemoryLogger();
    const db = new FakeDatabase(() => {
      throw new Error("password authentication failed");
    });

    expect(await checkDbConnection(db, logger)).toBe(false);

    const logged = entries.map((line) => JSON.parse(line));
    expect(logged).toHaveLength(1);
    expect(logged[0]).toMatchObject({
      level: 40,
      msg: "Database connectivity check failed",
      err: { message: "password authentication failed" },
    });
  });
});
