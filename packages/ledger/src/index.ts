/**
 * @tally/ledger — Ledger primitives for two-legged journals.
 *
 * Provides:
 * - Decimal-string arithmetic on bigint (no floating point)
 * - Account classes and the account rules of each transaction type
 * - Leg pair resolution (source = negative, destination = positive)
 * - An account registry and a type-directed account validator
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws LedgerError
 */

// Account registry
export { AccountRegistry } from "./accounts.js";

// Account rules and validation
export { ACCOUNT_RULES, transactionTypeFor } from "./account-rules.js";
export type { AccountRule } from "./account-rules.js";
export { TypeDirectedAccountValidator } from "./account-validator.js";
export type { AccountValidator } from "./account-validator.js";

// Legs
export { resolveLegPair, isBetweenAssetAndLiability } from "./legs.js";
export type { LegPair, SignedLine } from "./legs.js";

// Money arithmetic
export {
  isDecimalString,
  parseAmount,
  formatAmount,
  normalizeAmount,
  isZeroAmount,
  signOf,
  positive,
  negative,
} from "./money-math.js";

// Types
export type {
  AccountClass,
  AccountCandidate,
  AccountRole,
  NewAccount,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, ACCOUNT_CLASS, LIABILITY_TYPES } from "./types.js";
