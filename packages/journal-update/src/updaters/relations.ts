/**
 * Relationship updates: bill, category, budget, tags, reconciled flag
 * and notes. Each is gated on its own request fields.
 */

import type { UpdateContext } from "../context.js";
import { describeError } from "../context.js";

/**
 * Bills only attach to withdrawals. Looked up by id, then name; a
 * lookup that finds nothing clears the bill.
 */
export async function updateBill(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("bill_id", "bill_name")) {
    return;
  }
  if (ctx.journal.type !== "Withdrawal") {
    ctx.skipped("bill", `A ${ctx.journal.type} cannot carry a bill`);
    return;
  }

  let billId: string | null;
  try {
    const bill = await ctx.deps.bills.find(ctx.journal.userId, {
      id: ctx.request.bill_id,
      name: ctx.request.bill_name,
    });
    billId = bill?.id ?? null;
  } catch (err) {
    ctx.failed("bill", "RESOLUTION_FAILED", `Bill lookup failed: ${describeError(err)}`);
    return;
  }

  await ctx.patchJournal({ billId });
  ctx.applied("bill");
}

export async function updateCategory(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("category_id", "category_name")) {
    return;
  }

  let categoryId: string | null;
  try {
    const category = await ctx.deps.categories.findOrCreate(ctx.journal.userId, {
      id: ctx.request.category_id,
      name: ctx.request.category_name,
    });
    categoryId = category?.id ?? null;
  } catch (err) {
    ctx.failed("category", "RESOLUTION_FAILED", `Category lookup failed: ${describeError(err)}`);
    return;
  }

  await ctx.patchJournal({ categoryId });
  ctx.applied("category");
}

/**
 * Budgets follow the request, except that a transfer never keeps one.
 */
export async function updateBudget(ctx: UpdateContext): Promise<void> {
  if (ctx.has("budget_id", "budget_name")) {
    let budgetId: string | null | undefined;
    try {
      const budget = await ctx.deps.budgets.find(ctx.journal.userId, {
        id: ctx.request.budget_id,
        name: ctx.request.budget_name,
      });
      budgetId = budget?.id ?? null;
    } catch (err) {
      ctx.failed("budget", "RESOLUTION_FAILED", `Budget lookup failed: ${describeError(err)}`);
    }
    if (budgetId !== undefined) {
      await ctx.patchJournal({ budgetId });
      ctx.applied("budget");
    }
  }

  if (ctx.journal.type === "Transfer" && ctx.journal.budgetId !== null) {
    await ctx.patchJournal({ budgetId: null });
    ctx.applied("budget", undefined, "Transfers cannot carry a budget");
  }
}

/**
 * Replace the journal's tags. Tags are created on demand; blanks and
 * duplicates are dropped. `null` leaves the tags alone.
 */
export async function updateTags(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("tags")) {
    return;
  }
  const names = ctx.request.tags;
  if (names === null || names === undefined) {
    ctx.skipped("tags", "Null tags leave the journal unchanged");
    return;
  }

  const tagIds: string[] = [];
  try {
    for (const name of new Set(names.map((n) => n.trim()))) {
      if (name === "") continue;
      const tag = await ctx.deps.tags.findOrCreate(ctx.journal.userId, name);
      if (!tagIds.includes(tag.id)) {
        tagIds.push(tag.id);
      }
    }
  } catch (err) {
    ctx.failed("tags", "RESOLUTION_FAILED", `Tag lookup failed: ${describeError(err)}`);
    return;
  }

  await ctx.patchJournal({ tagIds });
  ctx.applied("tags");
}

/** Only a genuine boolean applies; it is set on both legs. */
export async function updateReconciled(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("reconciled")) {
    return;
  }
  const reconciled = ctx.request.reconciled;
  if (typeof reconciled !== "boolean") {
    ctx.skipped("reconciled", "Reconciled must be a boolean");
    return;
  }

  await ctx.patchLeg("source", { reconciled });
  await ctx.patchLeg("destination", { reconciled });
  ctx.applied("reconciled");
}

/** `""` and null clear the notes. */
export async function updateNotes(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("notes")) {
    return;
  }
  const value = ctx.request.notes;
  const notes = value === null || value === undefined || value === "" ? null : value;

  await ctx.patchJournal({ notes });
  ctx.applied("notes");
}
