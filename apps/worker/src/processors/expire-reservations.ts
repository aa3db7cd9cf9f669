import type { Logger } from "@indexflow/logger";
import type { RunInTransaction } from "../transaction.js";

export interface ExpireReservationsDeps {
  runInTransaction: RunInTransaction;
  logger: Logger;
  now?: () => Date;
}

/** Releases credit holds left behind by jobs that never settled. */
export async function processExpireReservations(
  deps: ExpireReservationsDeps,
): Promise<{ expired: number }> {
  const now = deps.now?.() ?? new Date();
  const expired = await deps.runInTransaction(({ ledger }) => ledger.expireStale(now));
  if (expired > 0) {
    deps.logger.info({ expired }, "released expired credit reservations");
  }
  return { expired };
}
