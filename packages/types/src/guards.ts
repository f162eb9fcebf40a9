/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (repository rows, deserialized data, external integrations).
 */

import type {
  Account,
  AccountType,
  Currency,
  Journal,
  Leg,
  TransactionTypeName,
} from "./financial.js";

// =============================================================================
// Enumerations
// =============================================================================

export const ACCOUNT_TYPES: readonly AccountType[] = [
  "asset",
  "expense",
  "revenue",
  "cash",
  "loan",
  "debt",
  "mortgage",
  "initial-balance",
  "reconciliation",
  "liability-credit",
];

export const TRANSACTION_TYPE_NAMES: readonly TransactionTypeName[] = [
  "Withdrawal",
  "Deposit",
  "Transfer",
  "Opening balance",
  "Reconciliation",
  "Liability credit",
  "Invalid",
];

const ACCOUNT_TYPE_SET = new Set<string>(ACCOUNT_TYPES);
const TRANSACTION_TYPE_SET = new Set<string>(TRANSACTION_TYPE_NAMES);

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPE_SET.has(value);
}

export function isTransactionTypeName(value: unknown): value is TransactionTypeName {
  return typeof value === "string" && TRANSACTION_TYPE_SET.has(value);
}

// =============================================================================
// Record guards
// =============================================================================

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.userId === "string" &&
    typeof v.name === "string" &&
    isAccountType(v.type)
  );
}

export function isCurrency(value: unknown): value is Currency {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.code === "string" &&
    v.code.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

const nullableString = (v: unknown): boolean => v === null || typeof v === "string";

export function isLeg(value: unknown): value is Leg {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.journalId === "string" &&
    typeof v.accountId === "string" &&
    typeof v.amount === "string" &&
    typeof v.currencyId === "string" &&
    nullableString(v.foreignAmount) &&
    nullableString(v.foreignCurrencyId) &&
    typeof v.reconciled === "boolean" &&
    typeof v.balanceDirty === "boolean"
  );
}

export function isJournal(value: unknown): value is Journal {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.groupId === "string" &&
    typeof v.userId === "string" &&
    isTransactionTypeName(v.type) &&
    typeof v.description === "string" &&
    typeof v.date === "string" &&
    typeof v.dateTz === "string" &&
    typeof v.order === "number" &&
    Number.isInteger(v.order) &&
    typeof v.currencyId === "string" &&
    nullableString(v.billId) &&
    nullableString(v.categoryId) &&
    nullableString(v.budgetId) &&
    Array.isArray(v.tagIds) &&
    v.tagIds.every((t) => typeof t === "string") &&
    nullableString(v.notes) &&
    v.meta !== null &&
    typeof v.meta === "object"
  );
}
