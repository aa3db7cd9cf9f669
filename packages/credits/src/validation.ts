import { ValidationError } from "@indexflow/errors";

export function assertCreditAmount(field: string, value: number, allowZero = false): void {
  const valid = Number.isInteger(value) && (allowZero ? value >= 0 : value > 0);
  if (!valid) {
    throw new ValidationError(`${field} must be a ${allowZero ? "non-negative" : "positive"} integer`, {
      [field]: String(value),
    });
  }
}

export function expiryFrom(now: Date, ttlMinutes: number): Date {
  return new Date(now.getTime() + ttlMinutes * 60_000);
}

export function consumeReason(operationId: string): string {
  return `consume:${operationId}`;
}
