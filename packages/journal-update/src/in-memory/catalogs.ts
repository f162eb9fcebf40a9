/**
 * @tally/journal-update — In-memory resolvers.
 *
 * Per-user catalogs of bills, categories, budgets and tags, a shared
 * currency catalog and the transaction type table.
 */

import { randomUUID } from "node:crypto";
import type {
  Bill,
  Budget,
  Category,
  Currency,
  NamedEntity,
  Tag,
  TransactionType,
} from "@tally/types";
import { TRANSACTION_TYPE_NAMES } from "@tally/types";
import type {
  BillResolver,
  BudgetResolver,
  CategoryResolver,
  CurrencyQuery,
  CurrencyResolver,
  EntityQuery,
  TagResolver,
  TransactionTypeLookup,
} from "../collaborators.js";

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim() !== "";
}

// ─── Named Entities ──────────────────────────────────────────────────────

/**
 * Entities owned by users, looked up by id, else by trimmed name.
 */
export class NamedEntityCatalog {
  private readonly _byUser = new Map<string, Map<string, NamedEntity>>();

  add(userId: string, entity: NamedEntity): NamedEntity {
    const entities = this._byUser.get(userId) ?? new Map<string, NamedEntity>();
    entities.set(entity.id, entity);
    this._byUser.set(userId, entities);
    return entity;
  }

  lookup(userId: string, query: EntityQuery): NamedEntity | null {
    const entities = this._byUser.get(userId);
    if (entities === undefined) {
      return null;
    }
    if (hasText(query.id)) {
      const byId = entities.get(query.id);
      if (byId !== undefined) return byId;
    }
    if (hasText(query.name)) {
      const wanted = query.name.trim();
      for (const entity of entities.values()) {
        if (entity.name === wanted) return entity;
      }
    }
    return null;
  }

  list(userId: string): readonly NamedEntity[] {
    return [...(this._byUser.get(userId)?.values() ?? [])];
  }
}

export class InMemoryBillCatalog extends NamedEntityCatalog implements BillResolver {
  async find(userId: string, query: EntityQuery): Promise<Bill | null> {
    return this.lookup(userId, query);
  }
}

export class InMemoryBudgetCatalog extends NamedEntityCatalog implements BudgetResolver {
  async find(userId: string, query: EntityQuery): Promise<Budget | null> {
    return this.lookup(userId, query);
  }
}

/** Creates a category for a name that matches none. */
export class InMemoryCategoryCatalog extends NamedEntityCatalog implements CategoryResolver {
  async findOrCreate(userId: string, query: EntityQuery): Promise<Category | null> {
    const found = this.lookup(userId, query);
    if (found !== null) {
      return found;
    }
    if (!hasText(query.name)) {
      return null;
    }
    return this.add(userId, { id: randomUUID(), name: query.name.trim() });
  }
}

// ─── Tags ────────────────────────────────────────────────────────────────

export class InMemoryTagCatalog implements TagResolver {
  private readonly _byUser = new Map<string, Tag[]>();

  add(userId: string, tag: Tag): Tag {
    const tags = this._byUser.get(userId) ?? [];
    tags.push(tag);
    this._byUser.set(userId, tags);
    return tag;
  }

  async findOrCreate(userId: string, tag: string): Promise<Tag> {
    const wanted = tag.trim();
    const existing = this._byUser.get(userId)?.find((t) => t.tag === wanted);
    return existing ?? this.add(userId, { id: randomUUID(), tag: wanted });
  }

  list(userId: string): readonly Tag[] {
    return [...(this._byUser.get(userId) ?? [])];
  }
}

// ─── Currencies ──────────────────────────────────────────────────────────

/** Looks up by id, else by code (case-insensitive). */
export class InMemoryCurrencyCatalog implements CurrencyResolver {
  private readonly _currencies: readonly Currency[];

  constructor(currencies: readonly Currency[]) {
    this._currencies = currencies;
  }

  async find(query: CurrencyQuery): Promise<Currency | null> {
    if (hasText(query.id)) {
      const byId = this._currencies.find((c) => c.id === query.id);
      if (byId !== undefined) return byId;
    }
    if (hasText(query.code)) {
      const code = query.code.trim().toUpperCase();
      const byCode = this._currencies.find((c) => c.code.toUpperCase() === code);
      if (byCode !== undefined) return byCode;
    }
    return null;
  }
}

// ─── Transaction Types ───────────────────────────────────────────────────

/**
 * The transaction type table. Ids are the type names in kebab case
 * ("opening-balance").
 */
export class InMemoryTransactionTypeCatalog implements TransactionTypeLookup {
  private readonly _types: readonly TransactionType[] = TRANSACTION_TYPE_NAMES.map((type) => ({
    id: type.toLowerCase().replace(/\s+/g, "-"),
    type,
  }));

  async find(name: string): Promise<TransactionType | null> {
    return this._types.find((t) => t.type === name) ?? null;
  }
}
