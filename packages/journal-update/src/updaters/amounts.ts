/**
 * Amount and foreign-amount reconciliation.
 *
 * The source leg always carries the negated amount and the destination
 * leg the positive one. For transfers, and for any journal between an
 * asset and a liability account, a foreign amount becomes the
 * destination's own amount and the source's primary amount becomes the
 * destination's foreign one.
 */

import type { Currency } from "@tally/types";
import {
  isBetweenAssetAndLiability,
  isDecimalString,
  isZeroAmount,
  LedgerError,
  negative,
  normalizeAmount,
  positive,
} from "@tally/ledger";
import type { UpdateContext } from "../context.js";
import { describeError } from "../context.js";
import { JournalUpdateError } from "../types.js";

// ─── Parsing ─────────────────────────────────────────────────────────────

/**
 * Absolute amount formatted to the currency's decimals.
 *
 * @throws {JournalUpdateError} INVALID_AMOUNT for empty, zero, malformed
 *   or over-precise input
 */
export function getAmount(value: string | null | undefined, currency: Currency): string {
  if (value === null || value === undefined || value.trim() === "") {
    throw new JournalUpdateError("INVALID_AMOUNT", "Amount is empty");
  }
  if (!isDecimalString(value)) {
    throw new JournalUpdateError("INVALID_AMOUNT", `Invalid amount: "${value}"`);
  }
  if (isZeroAmount(value)) {
    throw new JournalUpdateError("INVALID_AMOUNT", "Amount cannot be zero");
  }
  return toCurrencyPrecision(positive(value), currency);
}

/**
 * Absolute foreign amount, or null when there is none (`""`, null or
 * zero). The result is not yet scaled to a currency.
 *
 * @throws {JournalUpdateError} INVALID_AMOUNT for malformed input
 */
export function getForeignAmount(value: string | null | undefined): string | null {
  if (value === null || value === undefined || value.trim() === "") {
    return null;
  }
  if (!isDecimalString(value)) {
    throw new JournalUpdateError("INVALID_AMOUNT", `Invalid foreign amount: "${value}"`);
  }
  return isZeroAmount(value) ? null : positive(value);
}

function toCurrencyPrecision(amount: string, currency: Currency): string {
  try {
    return normalizeAmount(amount, currency.decimals);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new JournalUpdateError("INVALID_AMOUNT", `${err.message} (${currency.code})`);
    }
    throw err;
  }
}

async function findCurrency(ctx: UpdateContext, id: string): Promise<Currency | null> {
  return ctx.deps.currencies.find({ id });
}

// ─── Amount ──────────────────────────────────────────────────────────────

export async function updateAmount(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("amount")) {
    return;
  }

  const currency = await findCurrency(ctx, ctx.journal.currencyId);
  if (currency === null) {
    ctx.failed(
      "amount",
      "CURRENCY_NOT_FOUND",
      `Journal currency "${ctx.journal.currencyId}" does not exist`,
    );
    return;
  }

  let amount: string;
  try {
    amount = getAmount(ctx.request.amount, currency);
  } catch (err) {
    ctx.failed("amount", "INVALID_AMOUNT", describeError(err));
    return;
  }

  await ctx.patchLeg("source", { amount: negative(amount), balanceDirty: true });
  await ctx.patchLeg("destination", { amount, balanceDirty: true });
  ctx.logger.debug({ amount }, "Updated amount");
  ctx.applied("amount");
}

// ─── Foreign Amount ──────────────────────────────────────────────────────

/**
 * The foreign currency to use: the requested one when it resolves,
 * else the source leg's current one.
 */
async function resolveForeignCurrency(ctx: UpdateContext): Promise<Currency | null> {
  const { foreign_currency_id: id, foreign_currency_code: code } = ctx.request;
  if ((id !== null && id !== undefined) || (code !== null && code !== undefined)) {
    const requested = await ctx.deps.currencies.find({ id, code });
    if (requested !== null) {
      return requested;
    }
  }
  const { source } = await ctx.legs();
  return source.foreignCurrencyId === null ? null : findCurrency(ctx, source.foreignCurrencyId);
}

export async function updateForeignAmount(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("foreign_currency_id", "foreign_currency_code", "foreign_amount")) {
    return;
  }
  const raw = ctx.request.foreign_amount;

  let foreignAmount: string | null;
  let foreignCurrency: Currency | null;
  try {
    foreignAmount = getForeignAmount(raw);
    foreignCurrency = await resolveForeignCurrency(ctx);
  } catch (err) {
    const code = err instanceof JournalUpdateError ? err.code : "RESOLUTION_FAILED";
    ctx.failed("foreign_amount", code, describeError(err));
    return;
  }

  if (foreignCurrency !== null && foreignCurrency.id === ctx.journal.currencyId) {
    ctx.logger.error({ code: foreignCurrency.code }, "Foreign currency is equal to primary currency");
    ctx.failed(
      "foreign_amount",
      "FOREIGN_CURRENCY_EQUALS_PRIMARY",
      `Foreign currency ${foreignCurrency.code} is the journal's primary currency`,
    );
    return;
  }

  if (foreignCurrency !== null && foreignAmount !== null) {
    let amount: string;
    try {
      amount = toCurrencyPrecision(foreignAmount, foreignCurrency);
    } catch (err) {
      ctx.failed("foreign_amount", "INVALID_AMOUNT", describeError(err));
      return;
    }
    await applyForeignAmount(ctx, foreignCurrency, amount);
    return;
  }

  if (raw === "0") {
    await ctx.patchLeg("source", { foreignCurrencyId: null, foreignAmount: null });
    await ctx.patchLeg("destination", { foreignCurrencyId: null, foreignAmount: null });
    ctx.logger.debug("Removed foreign amount");
    ctx.applied("foreign_amount", undefined, "Foreign amount cleared");
    return;
  }

  ctx.skipped("foreign_amount", "Not enough information to update the foreign amount", {
    code: "INSUFFICIENT_FOREIGN_DATA",
  });
  await ctx.refreshLegs();
}

async function applyForeignAmount(
  ctx: UpdateContext,
  currency: Currency,
  amount: string,
): Promise<void> {
  const legs = await ctx.legs();
  const sourceAccount = await ctx.accountOf(legs.source);
  const destinationAccount = await ctx.accountOf(legs.destination);

  const source = await ctx.patchLeg("source", {
    foreignCurrencyId: currency.id,
    foreignAmount: negative(amount),
  });

  const swap =
    ctx.journal.type === "Transfer" ||
    isBetweenAssetAndLiability(sourceAccount.type, destinationAccount.type);

  if (swap) {
    await ctx.patchLeg("destination", {
      currencyId: currency.id,
      amount,
      foreignCurrencyId: source.currencyId,
      foreignAmount: positive(source.amount),
    });
  } else {
    await ctx.patchLeg("destination", {
      foreignCurrencyId: currency.id,
      foreignAmount: amount,
    });
  }

  ctx.logger.debug({ currency: currency.code, amount, swap }, "Updated foreign amount");
  ctx.applied("foreign_amount", undefined, swap ? "Destination amount swapped" : undefined);
}
