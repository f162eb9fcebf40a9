/**
 * Property-Based Tests for @tally/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Bigint arithmetic roundtrip (parse → format → parse = identity)
 * 2. positive/negative are idempotent and opposite
 * 3. A resolved leg pair always has a negative source and positive destination
 * 4. Every pairing allowed by a rule classifies into a known type
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { AccountType } from "@tally/types";
import { ACCOUNT_TYPES } from "@tally/types";
import {
  parseAmount,
  formatAmount,
  positive,
  negative,
  signOf,
} from "../src/money-math.js";
import { resolveLegPair } from "../src/legs.js";
import { transactionTypeFor } from "../src/account-rules.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Generate a valid decimal count (0-8, typical for fiat and tokens). */
const arbDecimals = fc.integer({ min: 0, max: 8 });

/**
 * Generate a valid positive amount string with the given decimals.
 */
function arbPositiveAmount(decimals: number): fc.Arbitrary<string> {
  const intPart = fc.integer({ min: 1, max: 999_999_999 });
  const fracPart =
    decimals > 0
      ? fc.integer({ min: 0, max: 10 ** decimals - 1 }).map((f) =>
          f.toString().padStart(decimals, "0"),
        )
      : fc.constant("");

  return fc.tuple(intPart, fracPart).map(([int, frac]) =>
    frac ? `${int}.${frac}` : `${int}`,
  );
}

const arbAccountType: fc.Arbitrary<AccountType> = fc.constantFrom(...ACCOUNT_TYPES);

// =============================================================================
// Properties
// =============================================================================

describe("money-math properties", () => {
  it("parse → format → parse is the identity", () => {
    fc.assert(
      fc.property(
        arbDecimals.chain((d) => fc.tuple(fc.constant(d), arbPositiveAmount(d))),
        ([decimals, amount]) => {
          const scaled = parseAmount(amount, decimals);
          expect(formatAmount(scaled, decimals)).toBe(amount);
          expect(parseAmount(formatAmount(scaled, decimals), decimals)).toBe(scaled);
        },
      ),
    );
  });

  it("positive and negative are idempotent and opposite", () => {
    fc.assert(
      fc.property(
        arbDecimals.chain((d) => arbPositiveAmount(d)),
        (amount) => {
          expect(positive(positive(amount))).toBe(amount);
          expect(negative(negative(amount))).toBe(negative(amount));
          expect(positive(negative(amount))).toBe(amount);
          expect(signOf(negative(amount))).toBe(-1);
        },
      ),
    );
  });
});

describe("leg pair properties", () => {
  it("resolves source and destination whatever the leg order", () => {
    fc.assert(
      fc.property(
        arbPositiveAmount(2),
        fc.boolean(),
        (amount, reversed) => {
          const legs = [
            { id: "s", amount: negative(amount) },
            { id: "d", amount },
          ];
          const pair = resolveLegPair("j", reversed ? [...legs].reverse() : legs);
          expect(pair.source.id).toBe("s");
          expect(pair.destination.id).toBe("d");
        },
      ),
    );
  });
});

describe("account pairing properties", () => {
  it("classifies every pairing into a known type", () => {
    const known = [
      "Withdrawal",
      "Deposit",
      "Transfer",
      "Opening balance",
      "Reconciliation",
      "Liability credit",
      "Invalid",
    ];
    fc.assert(
      fc.property(arbAccountType, arbAccountType, (source, destination) => {
        expect(known).toContain(transactionTypeFor(source, destination));
      }),
    );
  });

  it("two nominal accounts never form a valid type", () => {
    const nominal: readonly AccountType[] = [
      "expense",
      "revenue",
      "cash",
      "initial-balance",
      "reconciliation",
      "liability-credit",
    ];
    fc.assert(
      fc.property(fc.constantFrom(...nominal), fc.constantFrom(...nominal), (s, d) => {
        expect(transactionTypeFor(s, d)).toBe("Invalid");
      }),
    );
  });
});
