import type { ChunkStore, EmbeddingStore } from "@indexflow/db";
import type { IntegrationResult } from "@indexflow/types";
import { runPhase, type PhaseContext } from "./phase-runner.js";

export interface IntegrateDeps extends PhaseContext {
  chunks: ChunkStore;
  embeddings: EmbeddingStore;
}

/**
 * Confirms the file has searchable vectors. A count mismatch between chunks
 * and active embeddings is reported but does not block readiness.
 */
export async function integrateVectorIndex(deps: IntegrateDeps): Promise<IntegrationResult> {
  const { result } = await runPhase(
    "integrate",
    deps,
    async () => {
      const chunkCount = await deps.chunks.countByFile(deps.fileId);
      const activeCount = await deps.embeddings.countByFile(deps.fileId, { onlyActive: true });
      const integrityValid = activeCount === chunkCount;
      if (!integrityValid) {
        deps.logger.warn({ chunkCount, activeCount }, "active embeddings do not match chunk count");
      }
      const integration: IntegrationResult = {
        activated: 0,
        deactivated: 0,
        ready: activeCount > 0,
        integrityValid,
      };
      return { result: integration, chunkCount, activeCount };
    },
    ({ result: integration, chunkCount, activeCount }) => ({
      message: `Integration completed: ${String(activeCount)} active vectors for ${String(chunkCount)} chunks`,
      payload: { ...integration, chunkCount, activeCount },
    }),
  );
  return result;
}
