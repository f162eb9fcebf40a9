/**
 * Financial Types
 *
 * Core records of a two-legged double-entry ledger: accounts, currencies,
 * journals and their legs, and the groups journals are split into.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - A leg's sign tells its role: negative = source, positive = destination
 * - Currency is always explicit on every leg
 */

/**
 * Account types known to the ledger.
 *
 * `loan`, `debt` and `mortgage` are liabilities; `asset` is the only
 * asset type; everything else is a nominal (counterparty) account.
 */
export type AccountType =
  | "asset"
  | "expense"
  | "revenue"
  | "cash"
  | "loan"
  | "debt"
  | "mortgage"
  | "initial-balance"
  | "reconciliation"
  | "liability-credit";

/**
 * An account owned by a user.
 */
export interface Account {
  readonly id: string;
  readonly userId: string;
  readonly name: string;
  readonly type: AccountType;
  readonly iban?: string | null | undefined;
  readonly accountNumber?: string | null | undefined;
  readonly bic?: string | null | undefined;
}

/**
 * A currency. `decimals` bounds the fractional digits of amounts in it.
 */
export interface Currency {
  readonly id: string;
  /** ISO 4217 code or token symbol (e.g. "EUR", "USD") */
  readonly code: string;
  readonly decimals: number;
}

/**
 * Display names of the transaction types.
 */
export type TransactionTypeName =
  | "Withdrawal"
  | "Deposit"
  | "Transfer"
  | "Opening balance"
  | "Reconciliation"
  | "Liability credit"
  | "Invalid";

export interface TransactionType {
  readonly id: string;
  readonly type: TransactionTypeName;
}

/**
 * One signed ledger line of a journal, bound to one account.
 */
export interface Leg {
  readonly id: string;
  readonly journalId: string;
  readonly accountId: string;

  /** Signed decimal string. Negative on the source leg, positive on the destination leg. */
  readonly amount: string;
  readonly currencyId: string;

  readonly foreignAmount: string | null;
  readonly foreignCurrencyId: string | null;

  readonly reconciled: boolean;

  /** Set when the amount changed and cached account balances must be recomputed. */
  readonly balanceDirty: boolean;
}

/**
 * One logical financial event, made of exactly two legs.
 */
export interface Journal {
  readonly id: string;
  readonly groupId: string;
  readonly userId: string;
  readonly type: TransactionTypeName;
  readonly description: string;

  /** ISO 8601 timestamp with offset, in the zone named by `dateTz` */
  readonly date: string;
  readonly dateTz: string;

  readonly order: number;
  readonly currencyId: string;

  readonly billId: string | null;
  readonly categoryId: string | null;
  readonly budgetId: string | null;
  readonly tagIds: readonly string[];
  readonly notes: string | null;

  /** Free-form metadata keyed by a fixed set of names. */
  readonly meta: Readonly<Record<string, string>>;
}

/**
 * An ordered collection of one or more journals (splits).
 */
export interface TransactionGroup {
  readonly id: string;
  readonly userId: string;
  readonly title: string | null;
  readonly journalIds: readonly string[];
}

/**
 * Entities attached to a journal by reference.
 */
export interface NamedEntity {
  readonly id: string;
  readonly name: string;
}

export type Bill = NamedEntity;
export type Category = NamedEntity;
export type Budget = NamedEntity;

export interface Tag {
  readonly id: string;
  readonly tag: string;
}
