import { randomUUID } from "node:crypto";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  ConflictError,
  InsufficientCreditsError,
  NotFoundError,
  ValidationError,
} from "@indexflow/errors";
import { createTestDatabase, type TestDatabase } from "@indexflow/db/testing";
import { DrizzleCreditLedger } from "./drizzle-ledger.js";
import type { CreditLedger } from "./ledger.interface.js";
import { InMemoryCreditLedger } from "./testing/index.js";

interface Harness {
  ledger: () => CreditLedger;
  setup: () => Promise<void>;
  teardown: () => Promise<void>;
}

function pgliteHarness(): Harness {
  let database: TestDatabase | undefined;
  let ledger: CreditLedger | undefined;
  return {
    ledger: () => {
      if (!ledger) throw new Error("harness not set up");
      return ledger;
    },
    setup: async () => {
      database = await createTestDatabase();
      ledger = new DrizzleCreditLedger(database.db);
    },
    teardown: async () => {
      await database?.close();
    },
  };
}

function memoryHarness(): Harness {
  const ledger = new InMemoryCreditLedger();
  return {
    ledger: () => ledger,
    setup: async () => {},
    teardown: async () => {},
  };
}

async function fundedUser(ledger: CreditLedger, credits: number): Promise<string> {
  const userId = randomUUID();
  await ledger.grantCredits({ userId, credits, operationId: `grant_${userId}`, reason: "top-up" });
  return userId;
}

describe.each([
  ["drizzle on PGlite", pgliteHarness()],
  ["in-memory", memoryHarness()],
])("credit ledger (%s)", (_name, harness) => {
  beforeAll(async () => {
    await harness.setup();
  });

  afterAll(async () => {
    await harness.teardown();
  });

  it("grants credits once per operation id", async () => {
    const ledger = harness.ledger();
    const userId = randomUUID();

    await ledger.grantCredits({ userId, credits: 50, operationId: `g_${userId}`, reason: "top-up" });
    const again = await ledger.grantCredits({
      userId,
      credits: 50,
      operationId: `g_${userId}`,
      reason: "top-up",
    });

    expect(again).toEqual({ userId, balance: 50, reserved: 0, available: 50 });
  });

  it("reports an empty balance for unknown users", async () => {
    const userId = randomUUID();
    expect(await harness.ledger().getBalance(userId)).toEqual({
      userId,
      balance: 0,
      reserved: 0,
      available: 0,
    });
  });

  it("holds credits and is idempotent per operation id", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const operationId = `rag_job_${randomUUID()}`;

    const first = await ledger.createReservation({ userId, credits: 35, operationId, ttlMinutes: 30 });
    const second = await ledger.createReservation({ userId, credits: 35, operationId, ttlMinutes: 30 });

    expect(second.reservationId).toBe(first.reservationId);
    expect(first.status).toBe("active");
    expect(await ledger.getBalance(userId)).toEqual({ userId, balance: 100, reserved: 35, available: 65 });
  });

  it("refuses to reserve more than is available", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 30);
    await ledger.createReservation({ userId, credits: 20, operationId: randomUUID(), ttlMinutes: 30 });

    const attempt = ledger.createReservation({
      userId,
      credits: 15,
      operationId: randomUUID(),
      ttlMinutes: 30,
    });

    await expect(attempt).rejects.toBeInstanceOf(InsufficientCreditsError);
    await expect(attempt).rejects.toMatchObject({ requested: 15, available: 10 });
  });

  it("rejects non-positive reservations", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 10);
    await expect(
      ledger.createReservation({ userId, credits: 0, operationId: randomUUID(), ttlMinutes: 30 }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("consumes the charged amount and releases the rest of the hold", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const operationId = `rag_job_${randomUUID()}`;
    await ledger.createReservation({ userId, credits: 45, operationId, ttlMinutes: 30 });

    const consumed = await ledger.consumeReservation({
      operationId,
      ledgerOperationId: `${operationId}:consume`,
      credits: 35,
    });

    expect(consumed.status).toBe("consumed");
    expect(consumed.creditsConsumed).toBe(35);
    expect(consumed.consumedAt).toBeInstanceOf(Date);
    expect(await ledger.getBalance(userId)).toEqual({ userId, balance: 65, reserved: 0, available: 65 });
  });

  it("treats a repeated consume as a no-op", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const operationId = randomUUID();
    await ledger.createReservation({ userId, credits: 20, operationId, ttlMinutes: 30 });
    const input = { operationId, ledgerOperationId: `${operationId}:consume`, credits: 20 };

    await ledger.consumeReservation(input);
    await ledger.consumeReservation(input);

    expect((await ledger.getBalance(userId)).balance).toBe(80);
  });

  it("refuses to charge more than was reserved", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const operationId = randomUUID();
    await ledger.createReservation({ userId, credits: 20, operationId, ttlMinutes: 30 });

    await expect(
      ledger.consumeReservation({ operationId, ledgerOperationId: `${operationId}:c`, credits: 21 }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("fails to consume an unknown reservation", async () => {
    await expect(
      harness.ledger().consumeReservation({
        operationId: randomUUID(),
        ledgerOperationId: randomUUID(),
        credits: 1,
      }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("cancels a hold and ignores repeated or unknown cancels", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const operationId = randomUUID();
    await ledger.createReservation({ userId, credits: 40, operationId, ttlMinutes: 30 });

    const cancelled = await ledger.cancelReservation(operationId);
    const again = await ledger.cancelReservation(operationId);

    expect(cancelled?.status).toBe("cancelled");
    expect(again?.status).toBe("cancelled");
    expect(await ledger.cancelReservation(randomUUID())).toBeNull();
    expect(await ledger.getBalance(userId)).toEqual({ userId, balance: 100, reserved: 0, available: 100 });
  });

  it("will not cancel a consumed reservation or consume a cancelled one", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const consumedOp = randomUUID();
    const cancelledOp = randomUUID();
    await ledger.createReservation({ userId, credits: 10, operationId: consumedOp, ttlMinutes: 30 });
    await ledger.createReservation({ userId, credits: 10, operationId: cancelledOp, ttlMinutes: 30 });
    await ledger.consumeReservation({
      operationId: consumedOp,
      ledgerOperationId: `${consumedOp}:consume`,
      credits: 10,
    });
    await ledger.cancelReservation(cancelledOp);

    await expect(ledger.cancelReservation(consumedOp)).rejects.toBeInstanceOf(ConflictError);
    await expect(
      ledger.consumeReservation({
        operationId: cancelledOp,
        ledgerOperationId: `${cancelledOp}:consume`,
        credits: 10,
      }),
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("expires holds past their TTL", async () => {
    const ledger = harness.ledger();
    const userId = await fundedUser(ledger, 100);
    const operationId = randomUUID();
    await ledger.createReservation({ userId, credits: 25, operationId, ttlMinutes: 1 });

    const later = new Date(Date.now() + 5 * 60_000);
    const expired = await ledger.expireStale(later);

    expect(expired).toBeGreaterThanOrEqual(1);
    expect((await ledger.getReservation(operationId))?.status).toBe("expired");
    expect((await ledger.getBalance(userId)).reserved).toBe(0);
  });
});
