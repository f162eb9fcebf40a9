/**
 * Tests for amount and foreign-amount updates.
 */

import { describe, it, expect } from "vitest";
import { getAmount, getForeignAmount } from "../src/updaters/amounts.js";
import { createHarness, EUR, JPY, seedJournal, USD } from "./setup.js";

// =============================================================================
// Parsing
// =============================================================================

describe("getAmount", () => {
  it("returns the absolute amount at currency precision", () => {
    expect(getAmount("-12.5", EUR)).toBe("12.50");
    expect(getAmount("7", JPY)).toBe("7");
  });

  it("rejects empty, zero and malformed amounts", () => {
    for (const value of ["", "  ", null, undefined, "0", "0.00", "abc"]) {
      expect(() => getAmount(value, EUR)).toThrow(
        expect.objectContaining({ code: "INVALID_AMOUNT" }),
      );
    }
  });

  it("accepts zero digits past the currency's precision", () => {
    expect(getAmount("45.00", JPY)).toBe("45");
    expect(getAmount("12.500", EUR)).toBe("12.50");
  });

  it("rejects more decimals than the currency has", () => {
    expect(() => getAmount("1.234", EUR)).toThrow(expect.objectContaining({ code: "INVALID_AMOUNT" }));
  });
});

describe("getForeignAmount", () => {
  it("treats empty and zero as no foreign amount", () => {
    expect(getForeignAmount(null)).toBeNull();
    expect(getForeignAmount("")).toBeNull();
    expect(getForeignAmount("0")).toBeNull();
  });

  it("returns the absolute value", () => {
    expect(getForeignAmount("-50")).toBe("50");
  });

  it("rejects malformed input", () => {
    expect(() => getForeignAmount("ten")).toThrow(expect.objectContaining({ code: "INVALID_AMOUNT" }));
  });
});

// =============================================================================
// Amount
// =============================================================================

describe("JournalUpdateService — amount", () => {
  it("books the negated amount on the source and marks both legs dirty", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { amount: "-12.5" });

    expect(result.legs.source).toMatchObject({ amount: "-12.50", balanceDirty: true });
    expect(result.legs.destination).toMatchObject({ amount: "12.50", balanceDirty: true });
    expect(result.changed).toBe(true);
  });

  it("accepts a numeric amount in a currency without decimals", async () => {
    const h = createHarness();
    seedJournal(h, { amount: "1000", journal: { currencyId: JPY.id } });

    const result = await h.service.update("j1", { amount: 2500 });

    expect(result.legs.source.amount).toBe("-2500");
    expect(result.legs.destination.amount).toBe("2500");
  });

  it("writes back an exact amount after relabelling to a currency without decimals", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { currency_code: "JPY", amount: "45.00" });

    expect(result.legs.source).toMatchObject({ currencyId: JPY.id, amount: "-45" });
    expect(result.legs.destination).toMatchObject({ currencyId: JPY.id, amount: "45" });
    expect(result.outcomes.map((o) => [o.step, o.status])).toEqual([
      ["currency", "applied"],
      ["amount", "applied"],
    ]);
  });

  it("stores an exact foreign amount in a currency without decimals", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", {
      foreign_amount: "50.00",
      foreign_currency_code: "JPY",
    });

    expect(result.legs.source.foreignAmount).toBe("-50");
    expect(result.legs.destination).toMatchObject({ foreignCurrencyId: JPY.id, foreignAmount: "50" });
  });

  it("keeps the amounts for a zero amount", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { amount: "0" });

    expect(result.legs.destination.amount).toBe("45.00");
    expect(result.legs.destination.balanceDirty).toBe(false);
    expect(result.outcomes[0]).toMatchObject({ step: "amount", code: "INVALID_AMOUNT" });
  });

  it("reports a journal currency that does not exist", async () => {
    const h = createHarness();
    seedJournal(h, { journal: { currencyId: "xau" } });

    const result = await h.service.update("j1", { amount: "1.00" });

    expect(result.outcomes[0]).toMatchObject({ step: "amount", code: "CURRENCY_NOT_FOUND" });
  });
});

// =============================================================================
// Foreign amount
// =============================================================================

describe("JournalUpdateService — foreign amount", () => {
  it("swaps the destination into the foreign currency for a transfer into a liability", async () => {
    const h = createHarness();
    seedJournal(h, { type: "Transfer", destination: "car-loan" });

    const result = await h.service.update("j1", {
      foreign_amount: "50.00",
      foreign_currency_code: "USD",
    });

    expect(result.legs.source).toMatchObject({
      currencyId: EUR.id,
      amount: "-45.00",
      foreignCurrencyId: USD.id,
      foreignAmount: "-50.00",
    });
    expect(result.legs.destination).toMatchObject({
      currencyId: USD.id,
      amount: "50.00",
      foreignCurrencyId: EUR.id,
      foreignAmount: "45.00",
    });
    expect(result.outcomes[0]).toMatchObject({
      step: "foreign_amount",
      status: "applied",
      message: "Destination amount swapped",
    });
  });

  it("swaps for a withdrawal between an asset and a liability", async () => {
    const h = createHarness();
    seedJournal(h, { destination: "car-loan" });

    const result = await h.service.update("j1", {
      foreign_amount: "50",
      foreign_currency_id: "usd",
    });

    expect(result.legs.destination).toMatchObject({
      currencyId: USD.id,
      amount: "50.00",
      foreignAmount: "45.00",
    });
  });

  it("keeps the primary amounts of a plain withdrawal", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", {
      foreign_amount: "50.00",
      foreign_currency_code: "USD",
    });

    expect(result.legs.source).toMatchObject({ foreignCurrencyId: USD.id, foreignAmount: "-50.00" });
    expect(result.legs.destination).toMatchObject({
      currencyId: EUR.id,
      amount: "45.00",
      foreignCurrencyId: USD.id,
      foreignAmount: "50.00",
    });
  });

  it("clears the foreign amount for an explicit zero", async () => {
    const h = createHarness();
    seedJournal(h, {
      sourceLeg: { foreignAmount: "-50.00", foreignCurrencyId: USD.id },
      destinationLeg: { foreignAmount: "50.00", foreignCurrencyId: USD.id },
    });

    const result = await h.service.update("j1", { foreign_amount: 0 });

    expect(result.legs.source).toMatchObject({ foreignAmount: null, foreignCurrencyId: null });
    expect(result.legs.destination).toMatchObject({ foreignAmount: null, foreignCurrencyId: null });
    expect(result.outcomes[0]).toMatchObject({ message: "Foreign amount cleared" });
  });

  it("refuses a foreign currency equal to the journal currency", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", {
      foreign_amount: "10",
      foreign_currency_code: "EUR",
    });

    expect(result.legs.source.foreignAmount).toBeNull();
    expect(result.outcomes[0]).toMatchObject({ code: "FOREIGN_CURRENCY_EQUALS_PRIMARY" });
  });

  it("skips an amount without any known currency", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", { foreign_amount: "10.00" });

    expect(result.legs.destination.foreignAmount).toBeNull();
    expect(result.outcomes[0]).toMatchObject({
      status: "skipped",
      code: "INSUFFICIENT_FOREIGN_DATA",
    });
  });

  it("uses the current foreign currency when the request names none", async () => {
    const h = createHarness();
    seedJournal(h, {
      sourceLeg: { foreignAmount: "-50.00", foreignCurrencyId: USD.id },
      destinationLeg: { foreignAmount: "50.00", foreignCurrencyId: USD.id },
    });

    const result = await h.service.update("j1", { foreign_amount: "60" });

    expect(result.legs.source.foreignAmount).toBe("-60.00");
    expect(result.legs.destination.foreignAmount).toBe("60.00");
  });

  it("reports a malformed foreign amount", async () => {
    const h = createHarness();
    seedJournal(h);

    const result = await h.service.update("j1", {
      foreign_amount: "ten",
      foreign_currency_code: "USD",
    });

    expect(result.outcomes[0]).toMatchObject({ step: "foreign_amount", code: "INVALID_AMOUNT" });
  });

  it("applies the new amount before the swap", async () => {
    const h = createHarness();
    seedJournal(h, { type: "Transfer", destination: "savings" });

    const result = await h.service.update("j1", {
      amount: "20.00",
      foreign_amount: "22.00",
      foreign_currency_code: "USD",
    });

    expect(result.legs.source).toMatchObject({ amount: "-20.00", foreignAmount: "-22.00" });
    expect(result.legs.destination).toMatchObject({
      currencyId: USD.id,
      amount: "22.00",
      foreignCurrencyId: EUR.id,
      foreignAmount: "20.00",
    });
  });
});
