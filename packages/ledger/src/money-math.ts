/**
 * @tally/ledger — Deterministic decimal arithmetic.
 *
 * All scaling uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Sign helpers work on the string form and preserve its precision
 */

import { LedgerError } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const ZERO_PATTERN = /^-?0+(\.0+)?$/;

/**
 * Check whether a string is a plain decimal ("12", "-0.50").
 */
export function isDecimalString(amount: string): boolean {
  return DECIMAL_PATTERN.test(amount.trim());
}

function assertDecimal(amount: string): string {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }
  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }
  return trimmed;
}

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 * "45.00" with decimals=0 → 45n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = assertDecimal(amount);

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  let fracPart = parts[1] ?? "";

  // Trailing zeros past the currency's precision carry no value.
  if (fracPart.length > decimals) {
    if (!/^0+$/.test(fracPart.slice(decimals))) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
      );
    }
    fracPart = fracPart.slice(0, decimals);
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Re-format an amount to exactly `decimals` fractional digits.
 *
 * "45" with decimals=2 → "45.00"
 * "045.5" with decimals=2 → "45.50"
 */
export function normalizeAmount(amount: string, decimals: number): string {
  return formatAmount(parseAmount(amount, decimals), decimals);
}

// ─── Sign Helpers ────────────────────────────────────────────────────────

/**
 * Check if an amount is zero, in any precision ("0", "-0.00").
 */
export function isZeroAmount(amount: string): boolean {
  return ZERO_PATTERN.test(assertDecimal(amount));
}

/**
 * Sign of an amount: -1, 0 or 1.
 */
export function signOf(amount: string): -1 | 0 | 1 {
  const trimmed = assertDecimal(amount);
  if (ZERO_PATTERN.test(trimmed)) return 0;
  return trimmed.startsWith("-") ? -1 : 1;
}

/**
 * Absolute value of an amount, keeping its precision.
 *
 * "-45.00" → "45.00"
 */
export function positive(amount: string): string {
  const trimmed = assertDecimal(amount);
  return trimmed.startsWith("-") ? trimmed.slice(1) : trimmed;
}

/**
 * Negated absolute value of an amount, keeping its precision.
 * Zero stays unsigned.
 *
 * "45.00" → "-45.00", "-45.00" → "-45.00", "0.00" → "0.00"
 */
export function negative(amount: string): string {
  const abs = positive(amount);
  return ZERO_PATTERN.test(abs) ? abs : `-${abs}`;
}
