/**
 * Tests for the in-memory repository and resolvers.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccountRegistry } from "@tally/ledger";
import { InMemoryJournalRepository } from "../src/in-memory/repository.js";
import {
  InMemoryBillCatalog,
  InMemoryCategoryCatalog,
  InMemoryCurrencyCatalog,
  InMemoryTagCatalog,
  InMemoryTransactionTypeCatalog,
} from "../src/in-memory/catalogs.js";
import { createHarness, EUR, seedJournal, USD } from "./setup.js";

// =============================================================================
// Repository
// =============================================================================

describe("InMemoryJournalRepository", () => {
  it("patches only the given journal fields", async () => {
    const h = createHarness();
    seedJournal(h, { journal: { notes: "keep", billId: "b1" } });

    const updated = await h.repository.updateJournal("j1", { description: "Rent", billId: null });

    expect(updated.description).toBe("Rent");
    expect(updated.billId).toBeNull();
    expect(updated.notes).toBe("keep");
    expect(updated.type).toBe("Withdrawal");
  });

  it("merges metadata and deletes null entries", async () => {
    const h = createHarness();
    seedJournal(h, { journal: { meta: { sepa_cc: "A", external_id: "x-1" } } });

    const updated = await h.repository.updateJournal("j1", {
      meta: { sepa_cc: null, book_date: "2024-01-01T00:00:00Z" },
    });

    expect(updated.meta).toEqual({ external_id: "x-1", book_date: "2024-01-01T00:00:00Z" });
  });

  it("patches legs and clears foreign fields with null", async () => {
    const h = createHarness();
    seedJournal(h, { sourceLeg: { foreignAmount: "-50.00", foreignCurrencyId: USD.id } });

    const leg = await h.repository.updateLeg("j1-s", {
      foreignAmount: null,
      foreignCurrencyId: null,
      balanceDirty: true,
    });

    expect(leg).toMatchObject({
      amount: "-45.00",
      foreignAmount: null,
      foreignCurrencyId: null,
      balanceDirty: true,
    });
  });

  it("loads a group with its journals in group order", async () => {
    const h = createHarness();
    seedJournal(h, { id: "a" });
    seedJournal(h, { id: "b" });
    h.repository.addGroup({ id: "split", userId: "u1", title: "Split", journalIds: ["b", "a"] });

    const snapshot = await h.repository.loadGroup("split");

    expect(snapshot?.journals.map((j) => j.journal.id)).toEqual(["b", "a"]);
    expect(snapshot?.journals[0]!.legs).toHaveLength(2);
    expect(await h.repository.loadGroup("missing")).toBeUndefined();
  });

  it("rolls back journal and leg changes when the work throws", async () => {
    const h = createHarness();
    seedJournal(h);

    await expect(
      h.repository.transaction(async () => {
        await h.repository.updateJournal("j1", { description: "Changed" });
        await h.repository.updateLeg("j1-d", { amount: "99.00" });
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect((await h.repository.findJournal("j1"))?.description).toBe("Groceries");
    const legs = await h.repository.findLegs("j1");
    expect(legs.map((l) => l.amount)).toEqual(["-45.00", "45.00"]);
  });

  it("keeps an inner rollback local to the inner transaction", async () => {
    const h = createHarness();
    seedJournal(h);

    await h.repository.transaction(async () => {
      await h.repository.updateJournal("j1", { description: "Outer" });
      await h.repository
        .transaction(async () => {
          await h.repository.updateJournal("j1", { notes: "Inner" });
          throw new Error("inner");
        })
        .catch((err: unknown) => {
          expect(err).toBeInstanceOf(Error);
        });
    });

    const journal = await h.repository.findJournal("j1");
    expect(journal?.description).toBe("Outer");
    expect(journal?.notes).toBeNull();
  });

  it("throws for unknown records", async () => {
    const repository = new InMemoryJournalRepository(new AccountRegistry());
    await expect(repository.updateJournal("nope", {})).rejects.toThrow('Journal "nope" does not exist');
    await expect(repository.updateLeg("nope", {})).rejects.toThrow('Leg "nope" does not exist');
  });
});

// =============================================================================
// Resolvers
// =============================================================================

describe("in-memory resolvers", () => {
  let bills: InMemoryBillCatalog;
  let categories: InMemoryCategoryCatalog;

  beforeEach(() => {
    bills = new InMemoryBillCatalog();
    bills.add("u1", { id: "rent", name: "Rent" });
    categories = new InMemoryCategoryCatalog();
    categories.add("u1", { id: "food", name: "Food" });
  });

  it("finds entities by id, then name, per user", async () => {
    expect(await bills.find("u1", { id: "rent" })).toEqual({ id: "rent", name: "Rent" });
    expect(await bills.find("u1", { id: "gone", name: " Rent " })).toEqual({ id: "rent", name: "Rent" });
    expect(await bills.find("u2", { id: "rent" })).toBeNull();
    expect(await bills.find("u1", { id: null, name: null })).toBeNull();
  });

  it("creates categories by name only", async () => {
    const created = await categories.findOrCreate("u1", { name: "Travel" });
    expect(created?.name).toBe("Travel");
    expect(categories.list("u1")).toHaveLength(2);
    expect(await categories.findOrCreate("u1", { id: "gone", name: "" })).toBeNull();
  });

  it("creates each tag once", async () => {
    const tags = new InMemoryTagCatalog();
    const first = await tags.findOrCreate("u1", "holiday");
    const second = await tags.findOrCreate("u1", " holiday ");
    expect(second.id).toBe(first.id);
    expect(tags.list("u1")).toHaveLength(1);
  });

  it("finds currencies by id, then case-insensitive code", async () => {
    const currencies = new InMemoryCurrencyCatalog([EUR, USD]);
    expect(await currencies.find({ id: "usd" })).toEqual(USD);
    expect(await currencies.find({ id: "xxx", code: "eur" })).toEqual(EUR);
    expect(await currencies.find({ code: "GBP" })).toBeNull();
  });

  it("knows every transaction type by display name", async () => {
    const types = new InMemoryTransactionTypeCatalog();
    expect(await types.find("Opening balance")).toEqual({
      id: "opening-balance",
      type: "Opening balance",
    });
    expect(await types.find("Refund")).toBeNull();
  });
});
