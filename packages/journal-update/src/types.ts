/**
 * @tally/journal-update — Types for the journal update engine.
 *
 * Rules:
 * - All types are readonly
 * - Fatal conditions throw JournalUpdateError (or LedgerError for
 *   corrupt leg data); everything else becomes a StepOutcome
 */

import type { Journal, Leg } from "@tally/types";
import type { LegPair } from "@tally/ledger";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Explicit configuration handed to every update.
 */
export interface UpdateConfig {
  /** IANA zone dates are normalized to (e.g. "Europe/Amsterdam"). */
  readonly timezone: string;

  /** Store the journal date in UTC instead of `timezone`. */
  readonly forceUtc: boolean;
}

// ─── Step Outcomes ───────────────────────────────────────────────────────

/** The update steps, in the order the service runs them. */
export type UpdateStep =
  | "accounts"
  | "type"
  | "bill"
  | "description"
  | "date"
  | "order"
  | "category"
  | "budget"
  | "tags"
  | "reconciled"
  | "notes"
  | "meta"
  | "meta_date"
  | "currency"
  | "amount"
  | "foreign_amount";

export type StepStatus = "applied" | "skipped" | "failed";

/**
 * What happened to one step (or one field of a multi-field step).
 */
export interface StepOutcome {
  readonly step: UpdateStep;
  readonly field?: string | undefined;
  readonly status: StepStatus;
  readonly code?: JournalUpdateErrorCode | undefined;
  readonly message?: string | undefined;
}

// ─── Audit ───────────────────────────────────────────────────────────────

export type AuditAction = "update_description" | "update_date" | "update_order";

/**
 * A field-level change of a journal, delivered after commit.
 */
export interface AuditEvent {
  readonly action: AuditAction;
  readonly resourceType: "journal";
  readonly resourceId: string;
  /** Owner of the journal. */
  readonly actor: string;
  readonly before: string | number;
  readonly after: string | number;
}

// ─── Result ──────────────────────────────────────────────────────────────

export interface JournalUpdateResult {
  readonly journal: Journal;
  readonly legs: LegPair<Leg>;

  /** False when the group's content fingerprint did not move. */
  readonly changed: boolean;
  readonly fingerprintBefore: string;
  readonly fingerprintAfter: string;

  readonly outcomes: readonly StepOutcome[];
  readonly auditEvents: readonly AuditEvent[];
}

// ─── Errors ──────────────────────────────────────────────────────────────

/** Error codes for journal updates. */
export type JournalUpdateErrorCode =
  | "INVALID_REQUEST"
  | "JOURNAL_NOT_FOUND"
  | "ACCOUNT_NOT_FOUND"
  | "INVALID_ACCOUNTS"
  | "SAME_ACCOUNT"
  | "UNKNOWN_TYPE"
  | "RESOLUTION_FAILED"
  | "CURRENCY_NOT_FOUND"
  | "INVALID_AMOUNT"
  | "INVALID_DATE"
  | "INVALID_ORDER"
  | "FOREIGN_CURRENCY_EQUALS_PRIMARY"
  | "INSUFFICIENT_FOREIGN_DATA";

/**
 * Structured error from the update engine.
 */
export class JournalUpdateError extends Error {
  public readonly code: JournalUpdateErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: JournalUpdateErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "JournalUpdateError";
    this.code = code;
    this.details = details;
  }
}
