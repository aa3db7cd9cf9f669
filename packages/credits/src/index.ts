export type {
  CreditLedger,
  CreateReservationInput,
  ConsumeReservationInput,
  GrantCreditsInput,
} from "./ledger.interface.js";
export { DrizzleCreditLedger } from "./drizzle-ledger.js";
