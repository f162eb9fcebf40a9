/**
 * @tally/journal-update — Collaborator interfaces.
 *
 * The engine owns none of the storage or lookup machinery it uses. It
 * talks to a repository for journals and legs, to resolvers for the
 * entities a journal references, to an account validator, and to an
 * audit sink. In-memory implementations live under `in-memory/`.
 */

import type {
  Account,
  Bill,
  Budget,
  Category,
  Currency,
  Journal,
  Leg,
  Tag,
  TransactionGroup,
  TransactionType,
  TransactionTypeName,
} from "@tally/types";
import type { AccountValidator } from "@tally/ledger";
import type { AuditEvent } from "./types.js";

// ─── Repository ──────────────────────────────────────────────────────────

/**
 * Changes to a journal. Absent keys are left alone; a `meta` entry set
 * to null is deleted.
 */
export interface JournalPatch {
  readonly type?: TransactionTypeName | undefined;
  readonly description?: string | undefined;
  readonly date?: string | undefined;
  readonly dateTz?: string | undefined;
  readonly order?: number | undefined;
  readonly currencyId?: string | undefined;
  readonly billId?: string | null | undefined;
  readonly categoryId?: string | null | undefined;
  readonly budgetId?: string | null | undefined;
  readonly tagIds?: readonly string[] | undefined;
  readonly notes?: string | null | undefined;
  readonly meta?: Readonly<Record<string, string | null>> | undefined;
}

/** Changes to a leg. Absent keys are left alone. */
export interface LegPatch {
  readonly accountId?: string | undefined;
  readonly amount?: string | undefined;
  readonly currencyId?: string | undefined;
  readonly foreignAmount?: string | null | undefined;
  readonly foreignCurrencyId?: string | null | undefined;
  readonly reconciled?: boolean | undefined;
  readonly balanceDirty?: boolean | undefined;
}

/** A group with its journals (in group order) and their legs. */
export interface GroupSnapshot {
  readonly group: TransactionGroup;
  readonly journals: readonly JournalWithLegs[];
}

export interface JournalWithLegs {
  readonly journal: Journal;
  readonly legs: readonly Leg[];
}

export interface JournalRepository {
  findJournal(id: string): Promise<Journal | undefined>;
  findLegs(journalId: string): Promise<readonly Leg[]>;
  findAccount(id: string): Promise<Account | undefined>;
  loadGroup(groupId: string): Promise<GroupSnapshot | undefined>;

  /** Persist a journal change and return the stored journal. */
  updateJournal(id: string, patch: JournalPatch): Promise<Journal>;

  /** Persist a leg change and return the stored leg. */
  updateLeg(id: string, patch: LegPatch): Promise<Leg>;

  /**
   * Run `work` atomically: if it throws, every journal and leg change
   * made inside it is undone and the error is rethrown.
   */
  transaction<T>(work: () => Promise<T>): Promise<T>;
}

// ─── Resolvers ───────────────────────────────────────────────────────────

/** Identifies an entity by id, else by name. */
export interface EntityQuery {
  readonly id?: string | null | undefined;
  readonly name?: string | null | undefined;
}

export interface CurrencyQuery {
  readonly id?: string | null | undefined;
  readonly code?: string | null | undefined;
}

export interface BillResolver {
  find(userId: string, query: EntityQuery): Promise<Bill | null>;
}

export interface CategoryResolver {
  /** Creates the category when a name is given and none matches. */
  findOrCreate(userId: string, query: EntityQuery): Promise<Category | null>;
}

export interface BudgetResolver {
  find(userId: string, query: EntityQuery): Promise<Budget | null>;
}

export interface TagResolver {
  findOrCreate(userId: string, tag: string): Promise<Tag>;
}

export interface CurrencyResolver {
  find(query: CurrencyQuery): Promise<Currency | null>;
}

export interface TransactionTypeLookup {
  find(name: string): Promise<TransactionType | null>;
}

// ─── Audit ───────────────────────────────────────────────────────────────

export interface AuditSink {
  record(event: AuditEvent): void | Promise<void>;
}

// ─── Bundle ──────────────────────────────────────────────────────────────

export interface JournalUpdateDependencies {
  readonly repository: JournalRepository;
  readonly accountValidator: AccountValidator;
  readonly bills: BillResolver;
  readonly categories: CategoryResolver;
  readonly budgets: BudgetResolver;
  readonly tags: TagResolver;
  readonly currencies: CurrencyResolver;
  readonly transactionTypes: TransactionTypeLookup;
  readonly audit: AuditSink;
}
