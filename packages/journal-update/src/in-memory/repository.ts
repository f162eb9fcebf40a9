/**
 * @tally/journal-update — In-memory JournalRepository.
 *
 * Stores groups, journals and legs in maps; accounts come from an
 * AccountRegistry shared with the account validator. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Transactions snapshot journals and legs and restore them when the
 * work throws. Nested transactions restore to their own start.
 * Accounts created through the registry are not rolled back.
 */

import type { Account, Journal, Leg, TransactionGroup } from "@tally/types";
import type { AccountRegistry } from "@tally/ledger";
import type {
  GroupSnapshot,
  JournalPatch,
  JournalRepository,
  JournalWithLegs,
  LegPatch,
} from "../collaborators.js";

interface StoreState {
  readonly groups: Map<string, TransactionGroup>;
  readonly journals: Map<string, Journal>;
  readonly legs: Map<string, Leg>;
}

export class InMemoryJournalRepository implements JournalRepository {
  private readonly _accounts: AccountRegistry;
  private _state: StoreState = { groups: new Map(), journals: new Map(), legs: new Map() };

  constructor(accounts: AccountRegistry) {
    this._accounts = accounts;
  }

  // ─── Seeding ────────────────────────────────────────────────────────

  addGroup(group: TransactionGroup): void {
    this._state.groups.set(group.id, group);
  }

  /** Store a journal with its legs. */
  addJournal(journal: Journal, legs: readonly Leg[]): void {
    this._state.journals.set(journal.id, journal);
    for (const leg of legs) {
      this._state.legs.set(leg.id, leg);
    }
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  async findJournal(id: string): Promise<Journal | undefined> {
    return this._state.journals.get(id);
  }

  async findLegs(journalId: string): Promise<readonly Leg[]> {
    return [...this._state.legs.values()].filter((leg) => leg.journalId === journalId);
  }

  async findAccount(id: string): Promise<Account | undefined> {
    return this._accounts.get(id);
  }

  async loadGroup(groupId: string): Promise<GroupSnapshot | undefined> {
    const group = this._state.groups.get(groupId);
    if (group === undefined) {
      return undefined;
    }
    const journals: JournalWithLegs[] = [];
    for (const journalId of group.journalIds) {
      const journal = this._state.journals.get(journalId);
      if (journal !== undefined) {
        journals.push({ journal, legs: await this.findLegs(journalId) });
      }
    }
    return { group, journals };
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  async updateJournal(id: string, patch: JournalPatch): Promise<Journal> {
    const current = this._state.journals.get(id);
    if (current === undefined) {
      throw new Error(`Journal "${id}" does not exist`);
    }

    const next: Journal = {
      ...current,
      type: patch.type ?? current.type,
      description: patch.description ?? current.description,
      date: patch.date ?? current.date,
      dateTz: patch.dateTz ?? current.dateTz,
      order: patch.order ?? current.order,
      currencyId: patch.currencyId ?? current.currencyId,
      billId: patch.billId === undefined ? current.billId : patch.billId,
      categoryId: patch.categoryId === undefined ? current.categoryId : patch.categoryId,
      budgetId: patch.budgetId === undefined ? current.budgetId : patch.budgetId,
      tagIds: patch.tagIds ?? current.tagIds,
      notes: patch.notes === undefined ? current.notes : patch.notes,
      meta: patch.meta === undefined ? current.meta : mergeMeta(current.meta, patch.meta),
    };
    this._state.journals.set(id, next);
    return next;
  }

  async updateLeg(id: string, patch: LegPatch): Promise<Leg> {
    const current = this._state.legs.get(id);
    if (current === undefined) {
      throw new Error(`Leg "${id}" does not exist`);
    }

    const next: Leg = {
      ...current,
      accountId: patch.accountId ?? current.accountId,
      amount: patch.amount ?? current.amount,
      currencyId: patch.currencyId ?? current.currencyId,
      foreignAmount:
        patch.foreignAmount === undefined ? current.foreignAmount : patch.foreignAmount,
      foreignCurrencyId:
        patch.foreignCurrencyId === undefined
          ? current.foreignCurrencyId
          : patch.foreignCurrencyId,
      reconciled: patch.reconciled ?? current.reconciled,
      balanceDirty: patch.balanceDirty ?? current.balanceDirty,
    };
    this._state.legs.set(id, next);
    return next;
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    const saved = this._copyState();
    try {
      return await work();
    } catch (err) {
      this._state = saved;
      throw err;
    }
  }

  private _copyState(): StoreState {
    return {
      groups: new Map(this._state.groups),
      journals: new Map(this._state.journals),
      legs: new Map(this._state.legs),
    };
  }
}

function mergeMeta(
  current: Readonly<Record<string, string>>,
  patch: Readonly<Record<string, string | null>>,
): Readonly<Record<string, string>> {
  const next: Record<string, string> = { ...current };
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete next[key];
    } else {
      next[key] = value;
    }
  }
  return next;
}
