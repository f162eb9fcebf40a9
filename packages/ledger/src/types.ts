/**
 * @tally/ledger — Internal types for the ledger primitives.
 *
 * These extend the shared @tally/types with ledger-specific
 * structures: account classes, account candidates, and the
 * structured error every ledger primitive throws.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { Account, AccountType } from "@tally/types";

// ─── Account Classes ─────────────────────────────────────────────────────

/**
 * Balance-sheet class of an account type.
 *
 * - asset: the user's own accounts
 * - liability: loans, debts and mortgages
 * - nominal: counterparties and bookkeeping accounts (expense, revenue, …)
 */
export type AccountClass = "asset" | "liability" | "nominal";

export const ACCOUNT_CLASS: Readonly<Record<AccountType, AccountClass>> = {
  asset: "asset",
  loan: "liability",
  debt: "liability",
  mortgage: "liability",
  expense: "nominal",
  revenue: "nominal",
  cash: "nominal",
  "initial-balance": "nominal",
  reconciliation: "nominal",
  "liability-credit": "nominal",
} as const;

/** Account types that count as liabilities. */
export const LIABILITY_TYPES: readonly AccountType[] = ["loan", "debt", "mortgage"];

// ─── Account Candidates ──────────────────────────────────────────────────

/**
 * Identifying information for an account that may or may not exist yet.
 * Any subset of fields may be present.
 */
export interface AccountCandidate {
  readonly id?: string | null | undefined;
  readonly name?: string | null | undefined;
  readonly iban?: string | null | undefined;
  readonly number?: string | null | undefined;
  readonly bic?: string | null | undefined;
}

/** Which side of a journal an account is resolved for. */
export type AccountRole = "source" | "destination";

/**
 * Input for creating an account on demand.
 */
export type NewAccount = Omit<Account, "id"> & { readonly id?: string | undefined };

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "UNKNOWN_ACCOUNT"
  | "DUPLICATE_ACCOUNT_ID"
  | "MISSING_SOURCE_LEG"
  | "MISSING_DESTINATION_LEG"
  | "MALFORMED_JOURNAL";

/**
 * Structured error from the ledger primitives.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
