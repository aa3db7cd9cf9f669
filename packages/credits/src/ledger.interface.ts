import type { CreditBalance, CreditReservation } from "@indexflow/types";

export interface CreateReservationInput {
  userId: string;
  credits: number;
  /** Idempotency key; repeating it returns the existing reservation. */
  operationId: string;
  ttlMinutes: number;
}

export interface ConsumeReservationInput {
  operationId: string;
  /** Unique id of the resulting ledger transaction. */
  ledgerOperationId: string;
  /** Amount actually charged; at most the reserved amount. */
  credits: number;
}

export interface GrantCreditsInput {
  userId: string;
  credits: number;
  operationId: string;
  reason: string;
}

/**
 * Two-phase credit accounting: hold credits up front, then either charge
 * (consume) or release (cancel / expire) the hold exactly once.
 */
export interface CreditLedger {
  /** Throws InsufficientCreditsError when balance - reserved < credits. */
  createReservation(input: CreateReservationInput): Promise<CreditReservation>;
  /** Idempotent for an already consumed reservation; Conflict when it was released. */
  consumeReservation(input: ConsumeReservationInput): Promise<CreditReservation>;
  /** No-op when absent or already released; Conflict when consumed. */
  cancelReservation(operationId: string): Promise<CreditReservation | null>;
  getReservation(operationId: string): Promise<CreditReservation | null>;
  grantCredits(input: GrantCreditsInput): Promise<CreditBalance>;
  getBalance(userId: string): Promise<CreditBalance>;
  /** Releases active reservations whose TTL has passed. Returns how many. */
  expireStale(now?: Date): Promise<number>;
}
