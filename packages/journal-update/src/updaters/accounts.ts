/**
 * Account and type updates.
 *
 * Account validity depends on the transaction type, so both sides are
 * re-validated against the prospective type (the requested one, else
 * the journal's current one) whenever accounts or the type change. The
 * journal's current accounts are validated too when the request leaves
 * them alone: a new type can invalidate them.
 */

import type { Account } from "@tally/types";
import type { AccountCandidate, AccountRole } from "@tally/ledger";
import type { UpdateContext } from "../context.js";
import { describeError } from "../context.js";
import type { RequestField } from "../request.js";
import { normalizeTypeName } from "../request.js";

const SOURCE_FIELDS = ["source_id", "source_name"] as const satisfies readonly RequestField[];
const DESTINATION_FIELDS = [
  "destination_id",
  "destination_name",
] as const satisfies readonly RequestField[];

/**
 * The type accounts are validated against: the requested type in
 * display form, else the journal's current type.
 */
export function expectedType(ctx: UpdateContext): string {
  if (ctx.has("type")) {
    return normalizeTypeName(ctx.request.type ?? "");
  }
  return ctx.journal.type;
}

// ─── Candidates ──────────────────────────────────────────────────────────

function requestedCandidate(ctx: UpdateContext, role: AccountRole): AccountCandidate {
  const r = ctx.request;
  return role === "source"
    ? {
        id: r.source_id,
        name: r.source_name,
        iban: r.source_iban,
        number: r.source_number,
        bic: r.source_bic,
      }
    : {
        id: r.destination_id,
        name: r.destination_name,
        iban: r.destination_iban,
        number: r.destination_number,
        bic: r.destination_bic,
      };
}

function isRequested(ctx: UpdateContext, role: AccountRole): boolean {
  return ctx.has(...(role === "source" ? SOURCE_FIELDS : DESTINATION_FIELDS));
}

async function originalAccount(ctx: UpdateContext, role: AccountRole): Promise<Account> {
  const legs = await ctx.legs();
  return ctx.accountOf(legs[role]);
}

/**
 * Id and name to validate: the requested ones, else the current
 * account's.
 */
async function validationCandidate(
  ctx: UpdateContext,
  role: AccountRole,
): Promise<AccountCandidate> {
  if (isRequested(ctx, role)) {
    const { id, name } = requestedCandidate(ctx, role);
    return { id, name };
  }
  const account = await originalAccount(ctx, role);
  return { id: account.id, name: account.name };
}

// ─── Validation ──────────────────────────────────────────────────────────

export async function hasValidSourceAccount(
  ctx: UpdateContext,
  type: string = expectedType(ctx),
): Promise<boolean> {
  const candidate = await validationCandidate(ctx, "source");
  const valid = await ctx.deps.accountValidator.validateSource(
    ctx.journal.userId,
    type,
    candidate,
  );
  ctx.logger.debug({ type, candidate, valid }, "Validated source account");
  return valid;
}

/**
 * Destination validity can depend on the source account's type, so the
 * validator also receives the source the update would book on.
 */
export async function hasValidDestinationAccount(
  ctx: UpdateContext,
  type: string,
  source: Account,
): Promise<boolean> {
  const candidate = await validationCandidate(ctx, "destination");
  const valid = await ctx.deps.accountValidator.validateDestination(
    ctx.journal.userId,
    type,
    candidate,
    source,
  );
  ctx.logger.debug({ type, candidate, valid }, "Validated destination account");
  return valid;
}

// ─── Resolution ──────────────────────────────────────────────────────────

/**
 * The account to book one side on. Falls back to the current account
 * when the request names none or when resolution fails.
 */
export async function resolveAccount(
  ctx: UpdateContext,
  role: AccountRole,
  type: string = expectedType(ctx),
): Promise<Account> {
  if (!isRequested(ctx, role)) {
    return originalAccount(ctx, role);
  }
  try {
    return await ctx.deps.accountValidator.resolve(
      ctx.journal.userId,
      type,
      role,
      requestedCandidate(ctx, role),
    );
  } catch (err) {
    ctx.failed(
      "accounts",
      "RESOLUTION_FAILED",
      `Could not resolve the ${role} account, keeping the current one: ${describeError(err)}`,
      role,
    );
    return originalAccount(ctx, role);
  }
}

/**
 * Book the legs on the resolved accounts. Refuses (with a SAME_ACCOUNT
 * outcome) when both sides resolve to one account.
 */
export async function updateAccounts(
  ctx: UpdateContext,
  type: string,
  source: Account,
): Promise<void> {
  const destination = await resolveAccount(ctx, "destination", type);

  if (source.id === destination.id) {
    ctx.logger.error(
      { accountId: source.id, name: source.name },
      "Source and destination accounts are equal",
    );
    ctx.failed(
      "accounts",
      "SAME_ACCOUNT",
      `Source and destination resolve to the same account "${source.id}"`,
    );
    return;
  }

  await ctx.patchLeg("source", { accountId: source.id });
  await ctx.patchLeg("destination", { accountId: destination.id });
  ctx.logger.debug(
    { sourceId: source.id, destinationId: destination.id },
    "Updated accounts",
  );
  ctx.applied("accounts");
}

/**
 * Switch the journal to the requested type. A type the lookup does not
 * know is a failed outcome; the journal keeps its type.
 */
export async function updateType(ctx: UpdateContext): Promise<void> {
  if (!ctx.has("type")) {
    return;
  }
  const name = normalizeTypeName(ctx.request.type ?? "");
  const found = await ctx.deps.transactionTypes.find(name);
  if (found === null) {
    ctx.failed("type", "UNKNOWN_TYPE", `Unknown transaction type "${name}"`);
    return;
  }

  await ctx.patchJournal({ type: found.type });
  ctx.logger.debug({ type: found.type }, "Changed transaction type");
  ctx.applied("type");
}

/**
 * Run the account and type updates as one step: both accounts must be
 * valid for the prospective type before either the accounts or the
 * type change.
 */
export async function updateAccountsAndType(ctx: UpdateContext): Promise<void> {
  const touchesAccounts = isRequested(ctx, "source") || isRequested(ctx, "destination");
  const touchesType = ctx.has("type");
  if (!touchesAccounts && !touchesType) {
    return;
  }

  const type = expectedType(ctx);
  const rejected = (message: string): void => {
    ctx.failed("accounts", "INVALID_ACCOUNTS", message);
    if (touchesType) {
      ctx.skipped("type", `Type stays "${ctx.journal.type}": accounts are not valid for "${type}"`, {
        code: "INVALID_ACCOUNTS",
      });
    }
  };

  if (!(await hasValidSourceAccount(ctx, type))) {
    rejected(`Source account is not valid for a ${type}`);
    return;
  }

  const source = await resolveAccount(ctx, "source", type);
  if (!(await hasValidDestinationAccount(ctx, type, source))) {
    rejected(`Destination account is not valid for a ${type}`);
    return;
  }

  if (touchesAccounts) {
    await updateAccounts(ctx, type, source);
  }
  await updateType(ctx);
}
