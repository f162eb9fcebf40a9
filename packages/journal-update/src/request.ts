/**
 * Sparse update request with Zod validation.
 *
 * Every key is optional. A key that is present (even with `null`) asks
 * its step to run; a key that is absent leaves that part of the journal
 * alone. Unknown keys are stripped.
 */

import { z } from "zod";
import { JournalUpdateError } from "./types.js";

// =============================================================================
// Field Schemas
// =============================================================================

/** Identifiers arrive as strings or integers; stored as strings. */
const IdSchema = z
  .union([z.string(), z.number().int()])
  .transform((value) => String(value))
  .nullable()
  .optional();

const TextSchema = z.string().nullable().optional();

/** Amounts arrive as strings or numbers; kept as strings. */
const AmountSchema = z
  .union([z.string(), z.number().finite()])
  .transform((value) => String(value))
  .nullable()
  .optional();

// =============================================================================
// Metadata Keys
// =============================================================================

export const META_STRING_FIELDS = [
  "sepa_cc",
  "sepa_ct_op",
  "sepa_ct_id",
  "sepa_db",
  "sepa_country",
  "sepa_ep",
  "sepa_ci",
  "sepa_batch_id",
  "recurrence_id",
  "internal_reference",
  "bunq_payment_id",
  "external_id",
  "external_url",
] as const;

export const META_DATE_FIELDS = [
  "interest_date",
  "book_date",
  "process_date",
  "due_date",
  "payment_date",
  "invoice_date",
] as const;

export type MetaStringField = (typeof META_STRING_FIELDS)[number];
export type MetaDateField = (typeof META_DATE_FIELDS)[number];

// =============================================================================
// Request
// =============================================================================

export const JournalUpdateRequestSchema = z.object({
  type: TextSchema,

  source_id: IdSchema,
  source_name: TextSchema,
  source_iban: TextSchema,
  source_number: TextSchema,
  source_bic: TextSchema,
  destination_id: IdSchema,
  destination_name: TextSchema,
  destination_iban: TextSchema,
  destination_number: TextSchema,
  destination_bic: TextSchema,

  description: TextSchema,
  date: TextSchema,
  order: z.union([z.number().int(), z.string()]).nullable().optional(),

  bill_id: IdSchema,
  bill_name: TextSchema,
  category_id: IdSchema,
  category_name: TextSchema,
  budget_id: IdSchema,
  budget_name: TextSchema,
  tags: z.array(z.string()).nullable().optional(),
  reconciled: z.unknown(),
  notes: TextSchema,

  sepa_cc: TextSchema,
  sepa_ct_op: TextSchema,
  sepa_ct_id: TextSchema,
  sepa_db: TextSchema,
  sepa_country: TextSchema,
  sepa_ep: TextSchema,
  sepa_ci: TextSchema,
  sepa_batch_id: TextSchema,
  recurrence_id: TextSchema,
  internal_reference: TextSchema,
  bunq_payment_id: TextSchema,
  external_id: TextSchema,
  external_url: TextSchema,

  interest_date: TextSchema,
  book_date: TextSchema,
  process_date: TextSchema,
  due_date: TextSchema,
  payment_date: TextSchema,
  invoice_date: TextSchema,

  currency_id: IdSchema,
  currency_code: TextSchema,
  amount: AmountSchema,
  foreign_currency_id: IdSchema,
  foreign_currency_code: TextSchema,
  foreign_amount: AmountSchema,
});

export type JournalUpdateRequest = z.output<typeof JournalUpdateRequestSchema>;
export type RequestField = keyof JournalUpdateRequest;

/**
 * Validate raw input into a request.
 *
 * @throws {JournalUpdateError} INVALID_REQUEST with the Zod issues as details
 */
export function parseUpdateRequest(input: unknown): JournalUpdateRequest {
  const result = JournalUpdateRequestSchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new JournalUpdateError("INVALID_REQUEST", `Invalid update request: ${summary}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * True if any of the fields is present. `null` counts as present;
 * `undefined` does not.
 */
export function hasFields(
  request: JournalUpdateRequest,
  fields: readonly RequestField[],
): boolean {
  return fields.some(
    (field) => Object.hasOwn(request, field) && request[field] !== undefined,
  );
}

/**
 * Display form of a requested type: "opening-balance" becomes
 * "Opening balance", anything else gets an upper-case first letter.
 */
export function normalizeTypeName(raw: string): string {
  const name = raw === "opening-balance" ? "opening balance" : raw;
  return name.charAt(0).toUpperCase() + name.slice(1);
}
