import type { CreditLedger } from "@indexflow/credits";
import { DrizzleCreditLedger } from "@indexflow/credits";
import { createDrizzleStores, type Database, type IndexStores } from "@indexflow/db";

/** Everything a processor writes through, bound to one transaction. */
export interface TransactionScope {
  stores: IndexStores;
  ledger: CreditLedger;
}

export type RunInTransaction = <T>(work: (scope: TransactionScope) => Promise<T>) => Promise<T>;

/**
 * Commits when `work` resolves and rolls back when it throws.
 */
export function drizzleTransactionRunner(db: Database): RunInTransaction {
  return (work) =>
    db.transaction((tx) => work({ stores: createDrizzleStores(tx), ledger: new DrizzleCreditLedger(tx) }));
}
