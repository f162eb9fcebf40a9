/**
 * Primary currency update. Relabels the journal and both legs; amounts
 * are not converted.
 */

import type { Currency } from "@tally/types";
import type { UpdateContext } from "../context.js";
import { describeError } from "../context.js";

export async function updateCurrency(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("currency_id", "currency_code")) {
    return;
  }

  let currency: Currency | null;
  try {
    currency = await ctx.deps.currencies.find({
      id: ctx.request.currency_id,
      code: ctx.request.currency_code,
    });
  } catch (err) {
    ctx.failed("currency", "RESOLUTION_FAILED", `Currency lookup failed: ${describeError(err)}`);
    return;
  }
  if (currency === null) {
    ctx.failed(
      "currency",
      "CURRENCY_NOT_FOUND",
      `No currency with id ${String(ctx.request.currency_id ?? null)} or code ${String(ctx.request.currency_code ?? null)}`,
    );
    return;
  }

  await ctx.patchJournal({ currencyId: currency.id });
  await ctx.patchLeg("source", { currencyId: currency.id });
  await ctx.patchLeg("destination", { currencyId: currency.id });
  ctx.logger.debug({ currencyId: currency.id, code: currency.code }, "Updated currency");
  ctx.applied("currency");
}
