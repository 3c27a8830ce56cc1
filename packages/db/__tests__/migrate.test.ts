/**
 * Migration runner tests
 */

import { describe, it, expect } from "@jest/globals";
import { createSilentLogger } from "@snaplink/logger";
import { listMigrations, migrate } from "../src/index.js";
import { FakeDatabase } from "./fake-database.js";

describe("migrate", () => {
  it("should find the bundled migrations", async () => {
    expect(await listMigrations()).toEqual(["001_init.sql"]);
  });

  it("should apply pending migrations and record them", async () => {
    const db = new FakeDatabase();

    const ran = await migrate(db, createSilentLogger());

    expect(ran).toEqual(["001_init.sql"]);
    const recorded = db.queries.find((q) => q.text.startsWith("INSERT INTO schema_migrations"));
    expect(recorded?.values).toEqual(["001_init.sql"]);
  });

  it("should size access_log.ip_hash for the 16-character IP hash", async () => {
    const db = new FakeDatabase();

    await migrate(db, createSilentLogger());

    const schema = db.queries.find((q) => q.text.includes("CREATE TABLE IF NOT EXISTS access_log"));
    expect(schema?.text).toMatch(/ip_hash\s+CHAR\(16\),/);
  });

  it("should skip migrations already applied", async () => {
    const db = new FakeDatabase((text) =>
      text.startsWith("SELECT name") ? { rows: [{ name: "001_init.sql" }], rowCount: 1 } : undefined
    );

    expect(await migrate(db, createSilentLogger())).toEqual([]);
  });
});
