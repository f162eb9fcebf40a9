/**
 * @tally/ledger — Account registry.
 *
 * Manages the chart of accounts of every user. Accounts can be
 * registered up front or created on demand when a journal names a
 * counterparty that does not exist yet.
 *
 * Rules:
 * - No duplicate account IDs
 * - Lookups by name, IBAN or number are scoped to one user
 * - Once created, accounts are not modified or removed
 */

import { randomUUID } from "node:crypto";
import type { Account, AccountType } from "@tally/types";
import type { AccountClass, NewAccount } from "./types.js";
import { ACCOUNT_CLASS, LedgerError } from "./types.js";

export class AccountRegistry {
  private readonly _accounts: Map<string, Account> = new Map();

  /**
   * Register an existing account.
   * Throws if account ID already exists.
   */
  register(account: Account): Account {
    if (this._accounts.has(account.id)) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT_ID",
        `Account already exists: "${account.id}"`,
      );
    }

    const stored: Account = { ...account };
    this._accounts.set(stored.id, stored);
    return stored;
  }

  /**
   * Create a new account, generating an ID when none is given.
   */
  create(input: NewAccount): Account {
    return this.register({ ...input, id: input.id ?? randomUUID() });
  }

  get(id: string): Account | undefined {
    return this._accounts.get(id);
  }

  has(id: string): boolean {
    return this._accounts.has(id);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(id: string): Account {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  getType(id: string): AccountType {
    return this.assertExists(id).type;
  }

  getClass(id: string): AccountClass {
    return ACCOUNT_CLASS[this.getType(id)];
  }

  // ─── Scoped Lookups ──────────────────────────────────────────────────

  /**
   * Find a user's account by exact (trimmed) name, optionally limited
   * to some account types.
   */
  findByName(
    userId: string,
    name: string,
    types?: readonly AccountType[],
  ): Account | undefined {
    const wanted = name.trim();
    return this._find(userId, types, (a) => a.name === wanted);
  }

  findByIban(
    userId: string,
    iban: string,
    types?: readonly AccountType[],
  ): Account | undefined {
    const wanted = normalizeIban(iban);
    return this._find(
      userId,
      types,
      (a) => typeof a.iban === "string" && normalizeIban(a.iban) === wanted,
    );
  }

  findByNumber(
    userId: string,
    accountNumber: string,
    types?: readonly AccountType[],
  ): Account | undefined {
    const wanted = accountNumber.trim();
    return this._find(userId, types, (a) => a.accountNumber === wanted);
  }

  getAll(): readonly Account[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }

  getByType(type: AccountType): readonly Account[] {
    return [...this._accounts.values()].filter((a) => a.type === type);
  }

  private _find(
    userId: string,
    types: readonly AccountType[] | undefined,
    match: (account: Account) => boolean,
  ): Account | undefined {
    for (const account of this._accounts.values()) {
      if (account.userId !== userId) continue;
      if (types !== undefined && !types.includes(account.type)) continue;
      if (match(account)) return account;
    }
    return undefined;
  }
}

function normalizeIban(iban: string): string {
  return iban.replace(/\s+/g, "").toUpperCase();
}
