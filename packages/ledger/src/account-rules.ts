/**
 * @tally/ledger — Account rules per transaction type.
 *
 * Each transaction type constrains which account types may appear as
 * its source and destination, and which side may create a missing
 * counterparty account by name. The pairing of source and destination
 * types determines the transaction type a journal must carry.
 */

import type { AccountType, TransactionTypeName } from "@tally/types";
import { ACCOUNT_CLASS, LIABILITY_TYPES } from "./types.js";

export interface AccountRule {
  readonly source: readonly AccountType[];
  readonly destination: readonly AccountType[];
  /** Account type created for an unknown source name, if any. */
  readonly createSource?: AccountType | undefined;
  /** Account type created for an unknown destination name, if any. */
  readonly createDestination?: AccountType | undefined;
}

const OWN_ACCOUNTS: readonly AccountType[] = ["asset", ...LIABILITY_TYPES];

export const ACCOUNT_RULES: Readonly<Record<TransactionTypeName, AccountRule>> = {
  Withdrawal: {
    source: OWN_ACCOUNTS,
    destination: ["expense", "cash", ...LIABILITY_TYPES],
    createDestination: "expense",
  },
  Deposit: {
    source: ["revenue", "cash", ...LIABILITY_TYPES],
    destination: OWN_ACCOUNTS,
    createSource: "revenue",
  },
  Transfer: {
    source: OWN_ACCOUNTS,
    destination: OWN_ACCOUNTS,
  },
  "Opening balance": {
    source: ["initial-balance", ...OWN_ACCOUNTS],
    destination: ["initial-balance", ...OWN_ACCOUNTS],
  },
  Reconciliation: {
    source: ["reconciliation", "asset"],
    destination: ["reconciliation", "asset"],
  },
  "Liability credit": {
    source: ["liability-credit"],
    destination: LIABILITY_TYPES,
  },
  Invalid: {
    source: [],
    destination: [],
  },
};

/**
 * The transaction type implied by moving money from an account of
 * `source` type to one of `destination` type.
 *
 * Between own accounts: same class is a transfer, asset → liability a
 * withdrawal, liability → asset a deposit.
 */
export function transactionTypeFor(
  source: AccountType,
  destination: AccountType,
): TransactionTypeName {
  const from = ACCOUNT_CLASS[source];
  const to = ACCOUNT_CLASS[destination];

  if (from !== "nominal" && to !== "nominal") {
    if (from === to) return "Transfer";
    return from === "asset" ? "Withdrawal" : "Deposit";
  }

  if (from !== "nominal") {
    switch (destination) {
      case "expense":
      case "cash":
        return "Withdrawal";
      case "initial-balance":
        return "Opening balance";
      case "reconciliation":
        return from === "asset" ? "Reconciliation" : "Invalid";
      default:
        return "Invalid";
    }
  }

  if (to !== "nominal") {
    switch (source) {
      case "revenue":
      case "cash":
        return "Deposit";
      case "initial-balance":
        return "Opening balance";
      case "reconciliation":
        return to === "asset" ? "Reconciliation" : "Invalid";
      case "liability-credit":
        return to === "liability" ? "Liability credit" : "Invalid";
      default:
        return "Invalid";
    }
  }

  return "Invalid";
}
