import type { EmbeddingStore } from "@indexflow/db";
import type { Logger } from "@indexflow/logger";

export interface DeindexDeps {
  embeddings: EmbeddingStore;
  logger: Logger;
}

/**
 * Removes a file from search by switching off its vectors. Rows are kept.
 */
export async function deindexFile(
  fileId: string,
  reason: string,
  deps: DeindexDeps,
): Promise<{ deactivated: number }> {
  const deactivated = await deps.embeddings.deactivateByFile(fileId);
  deps.logger.info({ fileId, reason, deactivated }, "file de-indexed");
  return { deactivated };
}
