import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_WORKER_POOL = { max: 10 };

/**
 * Any drizzle Postgres handle over this schema: a pooled client, a PGlite
 * instance in tests, or an open transaction.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DbClient {
  db: Database;
  close: () => Promise<void>;
}

export function createWorkerDbClient(options: DbClientOptions): DbClient {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}

const UNIQUE_VIOLATION = "23505";

function pgCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

/** True for a Postgres unique_violation, raised directly or wrapped as `cause`. */
export function isUniqueViolation(err: unknown): boolean {
  if (pgCode(err) === UNIQUE_VIOLATION) return true;
  const cause = err instanceof Error ? err.cause : undefined;
  return pgCode(cause) === UNIQUE_VIOLATION;
}
