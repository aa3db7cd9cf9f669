import { deindexFile } from "@indexflow/core";
import type { Logger } from "@indexflow/logger";
import type { DeindexFileJobData } from "@indexflow/types";
import type { RunInTransaction } from "../transaction.js";

export interface DeindexProcessorDeps {
  runInTransaction: RunInTransaction;
  logger: Logger;
}

export async function processDeindexFile(
  data: DeindexFileJobData,
  deps: DeindexProcessorDeps,
): Promise<{ deactivated: number }> {
  return deps.runInTransaction(({ stores }) =>
    deindexFile(data.fileId, data.reason, { embeddings: stores.embeddings, logger: deps.logger }),
  );
}
