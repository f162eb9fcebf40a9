/**
 * @tally/ledger — Leg pair resolution.
 *
 * A journal has exactly one negative leg (the source) and one positive
 * leg (the destination). Resolving the pair turns that runtime
 * arrangement into a typed structure; anything else is corrupt data.
 */

import type { AccountType, Leg } from "@tally/types";
import { signOf } from "./money-math.js";
import { ACCOUNT_CLASS, LedgerError } from "./types.js";

/** Anything carrying a signed amount. */
export interface SignedLine {
  readonly amount: string;
}

/**
 * The two legs of a journal, by role.
 */
export interface LegPair<T extends SignedLine = Leg> {
  readonly source: T;
  readonly destination: T;
}

/**
 * Split a journal's legs into its source and destination.
 *
 * Throws LedgerError if the journal does not have exactly two legs,
 * or lacks a negative or a positive one.
 */
export function resolveLegPair<T extends SignedLine>(
  journalId: string,
  legs: readonly T[],
): LegPair<T> {
  if (legs.length !== 2) {
    throw new LedgerError(
      "MALFORMED_JOURNAL",
      `Journal "${journalId}" has ${String(legs.length)} legs, expected exactly 2`,
    );
  }

  const source = legs.find((leg) => signOf(leg.amount) < 0);
  if (source === undefined) {
    throw new LedgerError(
      "MISSING_SOURCE_LEG",
      `Journal "${journalId}" has no leg with a negative amount`,
    );
  }

  const destination = legs.find((leg) => signOf(leg.amount) > 0);
  if (destination === undefined) {
    throw new LedgerError(
      "MISSING_DESTINATION_LEG",
      `Journal "${journalId}" has no leg with a positive amount`,
    );
  }

  return { source, destination };
}

/**
 * True when one side is a liability and the other an asset, in either
 * direction.
 */
export function isBetweenAssetAndLiability(
  sourceType: AccountType,
  destinationType: AccountType,
): boolean {
  const source = ACCOUNT_CLASS[sourceType];
  const destination = ACCOUNT_CLASS[destinationType];
  return (
    (source === "liability" && destination === "asset") ||
    (source === "asset" && destination === "liability")
  );
}
