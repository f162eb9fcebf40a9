/**
 * Metadata updates.
 *
 * String entries are upserted, or deleted by `""`/null. Date entries
 * are normalized to the application zone and stored with a `<name>_tz`
 * companion; an unparseable date stops the remaining date entries.
 */

import type { UpdateContext } from "../context.js";
import { describeError } from "../context.js";
import { resolveDate } from "../dates.js";
import type { ResolvedDate } from "../dates.js";
import { META_DATE_FIELDS, META_STRING_FIELDS } from "../request.js";

export async function updateMetaStrings(ctx: UpdateContext): Promise<void> {
  const present = META_STRING_FIELDS.filter((field) => ctx.has(field));
  if (present.length === 0) {
    return;
  }

  const meta: Record<string, string | null> = {};
  for (const field of present) {
    const value = ctx.request[field];
    meta[field] = value === null || value === undefined || value === "" ? null : value;
  }

  await ctx.patchJournal({ meta });
  for (const field of present) {
    ctx.applied("meta", field);
  }
}

export async function updateMetaDates(ctx: UpdateContext): Promise<void> {
  const present = META_DATE_FIELDS.filter((field) => ctx.has(field));

  for (const [index, field] of present.entries()) {
    const value = ctx.request[field];
    const tzKey = `${field}_tz`;

    if (value === null || value === undefined || value.trim() === "") {
      await ctx.patchJournal({ meta: { [field]: null, [tzKey]: null } });
      ctx.applied("meta_date", field);
      continue;
    }

    let resolved: ResolvedDate;
    try {
      resolved = resolveDate(value, { timezone: ctx.config.timezone, forceUtc: false });
    } catch (err) {
      ctx.failed("meta_date", "INVALID_DATE", describeError(err), field);
      for (const rest of present.slice(index + 1)) {
        ctx.skipped("meta_date", `Skipped after invalid "${field}"`, { field: rest });
      }
      return;
    }

    await ctx.patchJournal({
      meta: { [field]: resolved.value, [tzKey]: resolved.timezone },
    });
    ctx.applied("meta_date", field);
  }
}
