import { and, eq, lt, sql } from "drizzle-orm";
import {
  ConflictError,
  InsufficientCreditsError,
  NotFoundError,
  ValidationError,
} from "@indexflow/errors";
import {
  creditReservations,
  creditTransactions,
  creditWallets,
  isUniqueViolation,
  type Database,
} from "@indexflow/db";
import type { CreditBalance, CreditReservation } from "@indexflow/types";
import type {
  ConsumeReservationInput,
  CreateReservationInput,
  CreditLedger,
  GrantCreditsInput,
} from "./ledger.interface.js";
import { assertCreditAmount, consumeReason, expiryFrom } from "./validation.js";

type ReservationRow = typeof creditReservations.$inferSelect;

function toReservation(row: ReservationRow): CreditReservation {
  return {
    reservationId: row.reservationId,
    userId: row.userId,
    operationId: row.operationId,
    creditsReserved: row.creditsReserved,
    creditsConsumed: row.creditsConsumed,
    status: row.status,
    expiresAt: row.expiresAt,
    consumedAt: row.consumedAt,
    releasedAt: row.releasedAt,
    createdAt: row.createdAt,
  };
}

/**
 * Ledger over the credit_* tables. Wallet changes are single conditional
 * UPDATE statements so concurrent reservations cannot overdraw a wallet.
 */
export class DrizzleCreditLedger implements CreditLedger {
  constructor(private readonly db: Database) {}

  async createReservation(input: CreateReservationInput): Promise<CreditReservation> {
    assertCreditAmount("credits", input.credits);

    const existing = await this.getReservation(input.operationId);
    if (existing) {
      return existing;
    }

    const [wallet] = await this.db
      .update(creditWallets)
      .set({
        reserved: sql`${creditWallets.reserved} + ${input.credits}`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(creditWallets.userId, input.userId),
          sql`${creditWallets.balance} - ${creditWallets.reserved} >= ${input.credits}`,
        ),
      )
      .returning();
    if (!wallet) {
      const balance = await this.getBalance(input.userId);
      throw new InsufficientCreditsError(input.credits, balance.available, {
        details: { userId: input.userId, operationId: input.operationId },
      });
    }

    const [row] = await this.db
      .insert(creditReservations)
      .values({
        operationId: input.operationId,
        userId: input.userId,
        creditsReserved: input.credits,
        expiresAt: expiryFrom(new Date(), input.ttlMinutes),
      })
      .returning();
    if (!row) {
      throw new Error("Reservation insert returned no row");
    }
    return toReservation(row);
  }

  async consumeReservation(input: ConsumeReservationInput): Promise<CreditReservation> {
    assertCreditAmount("credits", input.credits, true);

    const reservation = await this.getReservation(input.operationId);
    if (!reservation) {
      throw new NotFoundError(`Reservation ${input.operationId} not found`);
    }
    if (reservation.status === "consumed") {
      return reservation;
    }
    if (reservation.status !== "active") {
      throw new ConflictError(
        `Reservation ${input.operationId} is ${reservation.status} and cannot be consumed`,
      );
    }
    if (input.credits > reservation.creditsReserved) {
      throw new ValidationError("Consumed credits exceed the reservation", {
        credits: `${String(input.credits)} > ${String(reservation.creditsReserved)}`,
      });
    }

    const now = new Date();
    const [row] = await this.db
      .update(creditReservations)
      .set({ status: "consumed", creditsConsumed: input.credits, consumedAt: now })
      .where(
        and(
          eq(creditReservations.operationId, input.operationId),
          eq(creditReservations.status, "active"),
        ),
      )
      .returning();
    if (!row) {
      throw new ConflictError(`Reservation ${input.operationId} was settled concurrently`);
    }

    const [wallet] = await this.db
      .update(creditWallets)
      .set({
        balance: sql`${creditWallets.balance} - ${input.credits}`,
        reserved: sql`${creditWallets.reserved} - ${reservation.creditsReserved}`,
        updatedAt: now,
      })
      .where(eq(creditWallets.userId, reservation.userId))
      .returning();
    if (!wallet) {
      throw new NotFoundError(`Wallet for ${reservation.userId} not found`);
    }

    try {
      await this.db.insert(creditTransactions).values({
        operationId: input.ledgerOperationId,
        userId: reservation.userId,
        delta: -input.credits,
        balanceAfter: wallet.balance,
        reason: consumeReason(input.operationId),
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Ledger operation ${input.ledgerOperationId} already recorded`, {
          cause: error,
        });
      }
      throw error;
    }

    return toReservation(row);
  }

  async cancelReservation(operationId: string): Promise<CreditReservation | null> {
    return this.release(operationId, "cancelled");
  }

  async getReservation(operationId: string): Promise<CreditReservation | null> {
    const [row] = await this.db
      .select()
      .from(creditReservations)
      .where(eq(creditReservations.operationId, operationId))
      .limit(1);
    return row ? toReservation(row) : null;
  }

  async grantCredits(input: GrantCreditsInput): Promise<CreditBalance> {
    assertCreditAmount("credits", input.credits);

    const [seen] = await this.db
      .select({ transactionId: creditTransactions.transactionId })
      .from(creditTransactions)
      .where(eq(creditTransactions.operationId, input.operationId))
      .limit(1);
    if (seen) {
      return this.getBalance(input.userId);
    }

    const [wallet] = await this.db
      .insert(creditWallets)
      .values({ userId: input.userId, balance: input.credits })
      .onConflictDoUpdate({
        target: creditWallets.userId,
        set: { balance: sql`${creditWallets.balance} + ${input.credits}`, updatedAt: new Date() },
      })
      .returning();
    if (!wallet) {
      throw new Error("Wallet upsert returned no row");
    }

    await this.db.insert(creditTransactions).values({
      operationId: input.operationId,
      userId: input.userId,
      delta: input.credits,
      balanceAfter: wallet.balance,
      reason: input.reason,
    });

    return {
      userId: wallet.userId,
      balance: wallet.balance,
      reserved: wallet.reserved,
      available: wallet.balance - wallet.reserved,
    };
  }

  async getBalance(userId: string): Promise<CreditBalance> {
    const [wallet] = await this.db
      .select()
      .from(creditWallets)
      .where(eq(creditWallets.userId, userId))
      .limit(1);
    if (!wallet) {
      return { userId, balance: 0, reserved: 0, available: 0 };
    }
    return {
      userId,
      balance: wallet.balance,
      reserved: wallet.reserved,
      available: wallet.balance - wallet.reserved,
    };
  }

  async expireStale(now: Date = new Date()): Promise<number> {
    const stale = await this.db
      .select({ operationId: creditReservations.operationId })
      .from(creditReservations)
      .where(and(eq(creditReservations.status, "active"), lt(creditReservations.expiresAt, now)));

    let expired = 0;
    for (const { operationId } of stale) {
      const released = await this.release(operationId, "expired", now);
      if (released?.status === "expired") {
        expired += 1;
      }
    }
    return expired;
  }

  private async release(
    operationId: string,
    status: "cancelled" | "expired",
    now: Date = new Date(),
  ): Promise<CreditReservation | null> {
    const reservation = await this.getReservation(operationId);
    if (!reservation) {
      return null;
    }
    if (reservation.status === "consumed") {
      throw new ConflictError(`Reservation ${operationId} was already consumed`);
    }
    if (reservation.status !== "active") {
      return reservation;
    }

    const [row] = await this.db
      .update(creditReservations)
      .set({ status, releasedAt: now })
      .where(
        and(
          eq(creditReservations.operationId, operationId),
          eq(creditReservations.status, "active"),
        ),
      )
      .returning();
    if (!row) {
      return this.getReservation(operationId);
    }

    await this.db
      .update(creditWallets)
      .set({
        reserved: sql`${creditWallets.reserved} - ${reservation.creditsReserved}`,
        updatedAt: now,
      })
      .where(eq(creditWallets.userId, reservation.userId));

    return toReservation(row);
  }
}
