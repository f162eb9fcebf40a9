/**
 * Scalar journal fields: description, date and order.
 *
 * A field applies when present with a non-empty string form; `""` and
 * null mean "leave it". Every applied change raises an audit event.
 */

import type { UpdateContext } from "../context.js";
import { describeError } from "../context.js";
import { resolveDate } from "../dates.js";
import type { ResolvedDate } from "../dates.js";
import { JournalUpdateError } from "../types.js";
import type { AuditAction } from "../types.js";

export type ScalarField = "description" | "date" | "order";

const ORDER_PATTERN = /^-?\d+$/;

function audit(
  ctx: UpdateContext,
  action: AuditAction,
  before: string | number,
  after: string | number,
): void {
  ctx.audit({
    action,
    resourceType: "journal",
    resourceId: ctx.journal.id,
    actor: ctx.journal.userId,
    before,
    after,
  });
}

function parseOrder(value: string | number): number {
  if (typeof value === "number") {
    return value;
  }
  const trimmed = value.trim();
  if (!ORDER_PATTERN.test(trimmed)) {
    throw new JournalUpdateError("INVALID_ORDER", `Order must be an integer, got "${value}"`);
  }
  return Number.parseInt(trimmed, 10);
}

export async function updateField(ctx: UpdateContext, field: ScalarField): Promise<void> {
  if (!ctx.has(field)) {
    return;
  }
  const value = ctx.request[field];
  if (value === null || value === undefined || String(value) === "") {
    ctx.skipped(field, `Empty ${field} leaves the journal unchanged`);
    return;
  }

  const before = ctx.journal;
  switch (field) {
    case "description": {
      const description = String(value);
      audit(ctx, "update_description", before.description, description);
      await ctx.patchJournal({ description });
      break;
    }
    case "date": {
      let resolved: ResolvedDate;
      try {
        resolved = resolveDate(String(value), ctx.config);
      } catch (err) {
        ctx.failed("date", "INVALID_DATE", describeError(err));
        return;
      }
      audit(ctx, "update_date", before.date, resolved.value);
      await ctx.patchJournal({ date: resolved.value, dateTz: resolved.timezone });
      break;
    }
    case "order": {
      let order: number;
      try {
        order = parseOrder(value);
      } catch (err) {
        ctx.failed("order", "INVALID_ORDER", describeError(err));
        return;
      }
      audit(ctx, "update_order", before.order, order);
      await ctx.patchJournal({ order });
      break;
    }
  }
  ctx.logger.debug({ field }, "Updated field");
  ctx.applied(field);
}
