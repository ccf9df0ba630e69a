import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { Pool } from "pg";
import { createPostgresBundleSource, createPostgresPool } from "./index.js";

const shouldRun =
  process.env.RUN_PG_TESTS === "1" && Boolean(process.env.DATABASE_URL);
const describePg = shouldRun ? describe : describe.skip;

describePg("postgres bundle source", () => {
  let pool: Pool;

  beforeAll(async () => {
    pool = createPostgresPool();
    const migrationSql = readFileSync(
      resolve(process.cwd(), "db/migrations/0001_message_bundles.sql"),
      "utf8",
    );
    await pool.query(migrationSql);
    await pool.query(
      `DELETE FROM message_bundle_entries WHERE bundle_name = $1`,
      ["it.messages"],
    );
    await pool.query(
      `INSERT INTO message_bundle_entries (bundle_name, locale_suffix, message_key, message_value)
       VALUES ($1, '', 'greeting', 'Hello'), ($1, '_de', 'greeting', 'Hallo')`,
      ["it.messages"],
    );
  });

  afterAll(async () => {
    await pool.end();
  });

  it("reads one candidate per locale suffix", async () => {
    const source = createPostgresBundleSource(pool);

    await expect(source.read("it.messages", "_de")).resolves.toEqual({
      greeting: "Hallo",
    });
    await expect(source.read("it.messages", "")).resolves.toEqual({
      greeting: "Hello",
    });
    await expect(source.read("it.messages", "_fr")).resolves.toBeNull();
  });
});
