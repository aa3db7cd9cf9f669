import { pgTable, text, timestamp, integer, pgEnum, index } from "drizzle-orm/pg-core";
import { RESERVATION_STATUSES } from "@indexflow/types";

export const reservationStatusEnum = pgEnum("credit_reservation_status", RESERVATION_STATUSES);

export const creditWallets = pgTable("credit_wallets", {
  userId: text("user_id").primaryKey(),
  balance: integer("balance").notNull().default(0),
  reserved: integer("reserved").notNull().default(0),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const creditReservations = pgTable(
  "credit_reservations",
  {
    reservationId: text("reservation_id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    operationId: text("operation_id").notNull().unique(),
    userId: text("user_id")
      .notNull()
      .references(() => creditWallets.userId),
    creditsReserved: integer("credits_reserved").notNull(),
    creditsConsumed: integer("credits_consumed").notNull().default(0),
    status: reservationStatusEnum("status").notNull().default("active"),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    consumedAt: timestamp("consumed_at", { withTimezone: true }),
    releasedAt: timestamp("released_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_credit_reservations_expiry").on(table.status, table.expiresAt)],
);

export const creditTransactions = pgTable("credit_transactions", {
  transactionId: text("transaction_id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  operationId: text("operation_id").notNull().unique(),
  userId: text("user_id")
    .notNull()
    .references(() => creditWallets.userId),
  delta: integer("delta").notNull(),
  balanceAfter: integer("balance_after").notNull(),
  reason: text("reason").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
