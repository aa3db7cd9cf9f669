export const RESERVATION_STATUSES = ["active", "consumed", "cancelled", "expired"] as const;

export type ReservationStatus = (typeof RESERVATION_STATUSES)[number];

export interface CreditReservation {
  reservationId: string;
  userId: string;
  operationId: string;
  creditsReserved: number;
  creditsConsumed: number;
  status: ReservationStatus;
  expiresAt: Date;
  consumedAt: Date | null;
  releasedAt: Date | null;
  createdAt: Date;
}

export interface CreditBalance {
  userId: string;
  balance: number;
  reserved: number;
  available: number;
}

export interface CreditTransaction {
  transactionId: string;
  userId: string;
  operationId: string;
  delta: number;
  balanceAfter: number;
  reason: string;
  createdAt: Date;
}
