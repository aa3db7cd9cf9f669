import { readFile } from "node:fs/promises";
import { PGlite } from "@electric-sql/pglite";
import { vector } from "@electric-sql/pglite/vector";
import { drizzle } from "drizzle-orm/pglite";
import type { Database } from "../client.js";
import * as schema from "../schema/index.js";

const MIGRATION_URL = new URL("../../migrations/0000_init.sql", import.meta.url);

export interface TestDatabase {
  db: Database;
  close: () => Promise<void>;
}

/**
 * Fresh in-process Postgres with pgvector and the project schema applied.
 */
export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite({ extensions: { vector } });
  const migration = await readFile(MIGRATION_URL, "utf8");
  await client.exec(migration);

  return {
    db: drizzle(client, { schema }),
    close: () => client.close(),
  };
}
