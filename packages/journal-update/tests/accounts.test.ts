/**
 * Tests for account and type updates.
 */

import { describe, it, expect } from "vitest";
import type { Account } from "@tally/types";
import type { AccountValidator } from "@tally/ledger";
import { JournalUpdateService } from "../src/journal-update-service.js";
import { createHarness, seedJournal, USER } from "./setup.js";

describe("JournalUpdateService — accounts", () => {
  it("creates a new expense account for a withdrawal by name", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { destination_name: "Bakery" });

    const bakery = h.registry.findByName(USER, "Bakery", ["expense"]);
    expect(bakery?.type).toBe("expense");
    expect(result.legs.destination.accountId).toBe(bakery?.id);
    expect(result.legs.source.accountId).toBe("checking");
    expect(result.outcomes).toContainEqual(
      expect.objectContaining({ step: "accounts", status: "applied" }),
    );
  });

  it("books the counterparty on the journal owner's accounts", async () => {
    const h = createHarness();
    h.registry.register({ id: "u2-checking", userId: "u2", name: "Checking", type: "asset" });
    h.registry.register({ id: "u2-grocer", userId: "u2", name: "Grocer", type: "expense" });
    seedJournal(h, {
      source: "u2-checking",
      destination: "u2-grocer",
      journal: { userId: "u2" },
    });

    const result = await h.service.update("j1", { destination_name: "Bakery" });

    const bakery = h.registry.findByName("u2", "Bakery");
    expect(bakery?.userId).toBe("u2");
    expect(result.legs.destination.accountId).toBe(bakery?.id);
    expect(h.registry.findByName(USER, "Bakery")).toBeUndefined();
  });

  it("does not book on another user's account", async () => {
    const h = createHarness();
    h.registry.register({ id: "u2-checking", userId: "u2", name: "Checking", type: "asset" });
    h.registry.register({ id: "u2-savings", userId: "u2", name: "Savings", type: "asset" });
    seedJournal(h, {
      type: "Transfer",
      source: "u2-checking",
      destination: "u2-savings",
      journal: { userId: "u2" },
    });

    const result = await h.service.update("j1", { destination_id: "savings" });

    expect(result.legs.destination.accountId).toBe("u2-savings");
    expect(result.outcomes[0]).toMatchObject({ step: "accounts", code: "INVALID_ACCOUNTS" });
  });

  it("moves the source to another own account by id", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { source_id: "savings" });

    expect(result.legs.source.accountId).toBe("savings");
    expect(result.legs.destination.accountId).toBe("grocer");
  });

  it("refuses a self-transfer and keeps the legs", async () => {
    const h = createHarness();
    seedJournal(h, { type: "Transfer", destination: "savings" });

    const result = await h.service.update("j1", { destination_id: "checking" });

    expect(result.legs.source.accountId).toBe("checking");
    expect(result.legs.destination.accountId).toBe("savings");
    expect(result.outcomes).toEqual([
      expect.objectContaining({ step: "accounts", status: "failed", code: "SAME_ACCOUNT" }),
    ]);
    expect(result.changed).toBe(false);
  });

  it("keeps the type when the current accounts do not fit the new one", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { type: "transfer" });

    expect(result.journal.type).toBe("Withdrawal");
    expect(result.outcomes.map((o) => [o.step, o.status, o.code])).toEqual([
      ["accounts", "failed", "INVALID_ACCOUNTS"],
      ["type", "skipped", "INVALID_ACCOUNTS"],
    ]);
  });

  it("changes type and accounts together when they fit", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", {
      type: "transfer",
      destination_name: "Savings",
    });

    expect(result.journal.type).toBe("Transfer");
    expect(result.legs.destination.accountId).toBe("savings");
    expect(result.outcomes.map((o) => [o.step, o.status])).toEqual([
      ["accounts", "applied"],
      ["type", "applied"],
    ]);
  });

  it("changes only the type when the current accounts fit it", async () => {
    const h = createHarness();
    seedJournal(h, { type: "Transfer", destination: "car-loan" });

    const result = await h.service.update("j1", { type: "withdrawal" });

    expect(result.journal.type).toBe("Withdrawal");
    expect(result.legs.destination.accountId).toBe("car-loan");
    expect(result.outcomes).toEqual([expect.objectContaining({ step: "type", status: "applied" })]);
  });

  it("rejects an unknown type through account validation", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { type: "refund" });

    expect(result.journal.type).toBe("Withdrawal");
    expect(result.outcomes[0]).toMatchObject({ step: "accounts", code: "INVALID_ACCOUNTS" });
  });

  it("does not rewrite accounts for an IBAN alone", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { destination_iban: "NL00TEST0000000000" });

    expect(result.legs.destination.accountId).toBe("grocer");
    expect(result.outcomes).toEqual([]);
  });

  it("falls back to the current accounts when resolution fails", async () => {
    const h = createHarness();
    seedJournal(h);
    const permissive: AccountValidator = {
      validateSource: async () => true,
      validateDestination: async () => true,
      resolve: async (): Promise<Account> => {
        throw new Error("directory offline");
      },
    };
    const service = new JournalUpdateService(
      { ...h.deps, accountValidator: permissive },
      { timezone: "UTC", forceUtc: false },
    );

    const result = await service.update("j1", { source_id: "x", destination_id: "y" });

    expect(result.legs.source.accountId).toBe("checking");
    expect(result.legs.destination.accountId).toBe("grocer");
    expect(result.outcomes.map((o) => [o.status, o.code, o.field])).toEqual([
      ["failed", "RESOLUTION_FAILED", "source"],
      ["failed", "RESOLUTION_FAILED", "destination"],
      ["applied", undefined, undefined],
    ]);
    expect(result.changed).toBe(false);
  });
});
