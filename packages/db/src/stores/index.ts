import type { Database } from "../client.js";
import { DrizzleChunkStore } from "./chunk-store.js";
import { DrizzleEmbeddingStore } from "./embedding-store.js";
import { DrizzleEventLog } from "./event-log.js";
import type { IndexStores } from "./interfaces.js";
import { DrizzleJobStore } from "./job-store.js";

export * from "./interfaces.js";
export { DrizzleJobStore } from "./job-store.js";
export { DrizzleEventLog } from "./event-log.js";
export { DrizzleChunkStore } from "./chunk-store.js";
export { DrizzleEmbeddingStore } from "./embedding-store.js";
export { stampForStatus, activeJobConflictMessage } from "./job-fields.js";

/** Stores bound to one handle; pass a transaction to scope every write to it. */
export function createDrizzleStores(db: Database): IndexStores {
  return {
    jobs: new DrizzleJobStore(db),
    events: new DrizzleEventLog(db),
    chunks: new DrizzleChunkStore(db),
    embeddings: new DrizzleEmbeddingStore(db),
  };
}
