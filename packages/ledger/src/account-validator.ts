/**
 * @tally/ledger — Type-directed account validation.
 *
 * Decides whether an account candidate may serve as the source or
 * destination of a transaction type, and resolves the candidate to a
 * concrete account (creating a counterparty where the type allows it).
 */

import type { Account, AccountType } from "@tally/types";
import { isTransactionTypeName } from "@tally/types";
import type { AccountRegistry } from "./accounts.js";
import type { AccountRule } from "./account-rules.js";
import { ACCOUNT_RULES, transactionTypeFor } from "./account-rules.js";
import type { AccountCandidate, AccountRole } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Account validation as the journal update engine consumes it.
 *
 * `userId` is the owner of the journal being updated; only that user's
 * accounts are found, and created counterparties belong to them.
 * `type` is the expected transaction type in display form
 * ("Withdrawal", "Opening balance", …). Unknown types never validate.
 */
export interface AccountValidator {
  validateSource(userId: string, type: string, candidate: AccountCandidate): Promise<boolean>;
  validateDestination(
    userId: string,
    type: string,
    candidate: AccountCandidate,
    source: Account,
  ): Promise<boolean>;
  /** Throws when the candidate cannot be resolved for this type and role. */
  resolve(
    userId: string,
    type: string,
    role: AccountRole,
    candidate: AccountCandidate,
  ): Promise<Account>;
}

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim() !== "";
}

/**
 * AccountValidator backed by an AccountRegistry and the per-type
 * account rules.
 */
export class TypeDirectedAccountValidator implements AccountValidator {
  private readonly _registry: AccountRegistry;

  constructor(registry: AccountRegistry) {
    this._registry = registry;
  }

  async validateSource(
    userId: string,
    type: string,
    candidate: AccountCandidate,
  ): Promise<boolean> {
    const rule = ruleFor(type);
    if (rule === undefined) return false;

    return (
      this._prospectiveType(userId, candidate, rule.source, rule.createSource) !== undefined
    );
  }

  async validateDestination(
    userId: string,
    type: string,
    candidate: AccountCandidate,
    source: Account,
  ): Promise<boolean> {
    const rule = ruleFor(type);
    if (rule === undefined) return false;

    const destinationType = this._prospectiveType(
      userId,
      candidate,
      rule.destination,
      rule.createDestination,
    );
    if (destinationType === undefined) return false;

    return transactionTypeFor(source.type, destinationType) === type;
  }

  async resolve(
    userId: string,
    type: string,
    role: AccountRole,
    candidate: AccountCandidate,
  ): Promise<Account> {
    const rule = ruleFor(type);
    if (rule === undefined) {
      throw new LedgerError(
        "UNKNOWN_ACCOUNT",
        `No ${role} account can be resolved for transaction type "${type}"`,
      );
    }

    const allowed = role === "source" ? rule.source : rule.destination;
    const existing = this._find(userId, candidate, allowed);
    if (existing !== undefined) return existing;

    const createType = role === "source" ? rule.createSource : rule.createDestination;
    if (createType !== undefined && hasText(candidate.name)) {
      return this._registry.create({
        userId,
        name: candidate.name.trim(),
        type: createType,
        iban: candidate.iban ?? null,
        accountNumber: candidate.number ?? null,
        bic: candidate.bic ?? null,
      });
    }

    throw new LedgerError(
      "UNKNOWN_ACCOUNT",
      `Cannot resolve ${role} account (id: ${String(candidate.id ?? null)}, name: ${String(candidate.name ?? null)}) for "${type}"`,
    );
  }

  /**
   * The type the candidate's account has, or would have once created.
   */
  private _prospectiveType(
    userId: string,
    candidate: AccountCandidate,
    allowed: readonly AccountType[],
    createType: AccountType | undefined,
  ): AccountType | undefined {
    const existing = this._find(userId, candidate, allowed);
    if (existing !== undefined) return existing.type;
    if (createType !== undefined && hasText(candidate.name)) return createType;
    return undefined;
  }

  /**
   * Find the candidate among the owner's accounts of allowed types:
   * by id, then name, then IBAN, then account number.
   */
  private _find(
    userId: string,
    candidate: AccountCandidate,
    allowed: readonly AccountType[],
  ): Account | undefined {
    if (hasText(candidate.id)) {
      const byId = this._registry.get(candidate.id);
      if (
        byId !== undefined &&
        byId.userId === userId &&
        allowed.includes(byId.type)
      ) {
        return byId;
      }
    }
    if (hasText(candidate.name)) {
      const byName = this._registry.findByName(userId, candidate.name, allowed);
      if (byName !== undefined) return byName;
    }
    if (hasText(candidate.iban)) {
      const byIban = this._registry.findByIban(userId, candidate.iban, allowed);
      if (byIban !== undefined) return byIban;
    }
    if (hasText(candidate.number)) {
      return this._registry.findByNumber(userId, candidate.number, allowed);
    }
    return undefined;
  }
}

function ruleFor(type: string): AccountRule | undefined {
  return isTransactionTypeName(type) ? ACCOUNT_RULES[type] : undefined;
}
