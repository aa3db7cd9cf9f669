import type { ConnectionOptions } from "bullmq";

/**
 * bullmq connection options from a `redis://` or `rediss://` URL.
 */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.replace(/^\//, "");
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: db ? Number(db) : undefined,
    tls: parsed.protocol === "rediss:" ? {} : undefined,
    // Required by bullmq workers for blocking commands.
    maxRetriesPerRequest: null,
  };
}
