/**
 * @tally/types — Shared domain types for the ledger stack.
 *
 * These types are used across all packages:
 * - Accounts and currencies
 * - Journals, their two legs, and the groups they belong to
 * - Attached entities (bills, categories, budgets, tags)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  Account,
  AccountType,
  Currency,
  TransactionType,
  TransactionTypeName,
  Leg,
  Journal,
  TransactionGroup,
  NamedEntity,
  Bill,
  Category,
  Budget,
  Tag,
} from "./financial.js";

// Runtime type guards
export {
  ACCOUNT_TYPES,
  TRANSACTION_TYPE_NAMES,
  isAccountType,
  isTransactionTypeName,
  isAccount,
  isCurrency,
  isLeg,
  isJournal,
} from "./guards.js";
