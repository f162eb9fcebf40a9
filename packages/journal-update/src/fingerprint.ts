/**
 * @tally/journal-update — Group comparison fingerprint.
 *
 * A content-addressed digest of everything observable about a group:
 * 1. Project the group and its journals onto their observable fields
 * 2. Canonicalize the projection (RFC 8785 / JCS)
 * 3. SHA-256 the canonical form
 *
 * Equal fingerprints mean no observable change. The balance-dirty
 * marker is bookkeeping, not content, and is left out.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Journal, Leg } from "@tally/types";
import type { GroupSnapshot, JournalWithLegs } from "./collaborators.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

function projectLeg(leg: Leg) {
  return {
    id: leg.id,
    accountId: leg.accountId,
    amount: leg.amount,
    currencyId: leg.currencyId,
    foreignAmount: leg.foreignAmount,
    foreignCurrencyId: leg.foreignCurrencyId,
    reconciled: leg.reconciled,
  };
}

function projectJournal({ journal, legs }: JournalWithLegs) {
  return {
    id: journal.id,
    type: journal.type,
    description: journal.description,
    date: journal.date,
    dateTz: journal.dateTz,
    order: journal.order,
    currencyId: journal.currencyId,
    billId: journal.billId,
    categoryId: journal.categoryId,
    budgetId: journal.budgetId,
    tagIds: [...journal.tagIds].sort(),
    notes: journal.notes,
    meta: journal.meta,
    legs: [...legs].sort((a, b) => compareIds(a.id, b.id)).map(projectLeg),
  };
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Fingerprint of a group. Journals are ordered by (order, id) so the
 * storage order does not matter.
 */
export function computeGroupFingerprint(snapshot: GroupSnapshot): string {
  const journals = [...snapshot.journals].sort(
    (a, b) => a.journal.order - b.journal.order || compareIds(a.journal.id, b.journal.id),
  );
  return sha256(
    canonicalize({
      title: snapshot.group.title,
      journals: journals.map(projectJournal),
    }),
  );
}

/**
 * Fingerprint of a journal that belongs to no stored group: it is
 * treated as a group of one.
 */
export function computeJournalFingerprint(journal: Journal, legs: readonly Leg[]): string {
  return computeGroupFingerprint({
    group: { id: journal.groupId, userId: journal.userId, title: null, journalIds: [journal.id] },
    journals: [{ journal, legs }],
  });
}
