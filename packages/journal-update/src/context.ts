/**
 * @tally/journal-update — Per-update context.
 *
 * Built once per `update()` call and passed explicitly to every step.
 * It carries the request, configuration and collaborators, the current
 * journal state, the leg pair cached for the call, and the outcomes and
 * audit events collected on the way. Nothing in it outlives the call.
 */

import type { Account, Journal, Leg } from "@tally/types";
import type { LegPair } from "@tally/ledger";
import { resolveLegPair } from "@tally/ledger";
import type { Logger } from "pino";
import type {
  JournalPatch,
  JournalUpdateDependencies,
  LegPatch,
} from "./collaborators.js";
import type { JournalUpdateRequest, RequestField } from "./request.js";
import { hasFields } from "./request.js";
import type {
  AuditEvent,
  JournalUpdateErrorCode,
  StepOutcome,
  UpdateConfig,
  UpdateStep,
} from "./types.js";
import { JournalUpdateError } from "./types.js";

export type LegRole = keyof LegPair;

export class UpdateContext {
  readonly request: JournalUpdateRequest;
  readonly config: UpdateConfig;
  readonly deps: JournalUpdateDependencies;
  readonly logger: Logger;

  private _journal: Journal;
  private _legs: LegPair<Leg> | undefined;
  private readonly _outcomes: StepOutcome[] = [];
  private readonly _auditEvents: AuditEvent[] = [];

  constructor(options: {
    readonly journal: Journal;
    readonly request: JournalUpdateRequest;
    readonly config: UpdateConfig;
    readonly deps: JournalUpdateDependencies;
    readonly logger: Logger;
  }) {
    this._journal = options.journal;
    this.request = options.request;
    this.config = options.config;
    this.deps = options.deps;
    this.logger = options.logger;
  }

  // ─── Journal ─────────────────────────────────────────────────────────

  get journal(): Journal {
    return this._journal;
  }

  has(...fields: RequestField[]): boolean {
    return hasFields(this.request, fields);
  }

  async patchJournal(patch: JournalPatch): Promise<Journal> {
    this._journal = await this.deps.repository.updateJournal(this._journal.id, patch);
    return this._journal;
  }

  // ─── Legs ────────────────────────────────────────────────────────────

  /**
   * The journal's source and destination legs, loaded once per call.
   *
   * @throws {LedgerError} when the journal does not hold exactly one
   *   negative and one positive leg
   */
  async legs(): Promise<LegPair<Leg>> {
    if (this._legs === undefined) {
      return this.refreshLegs();
    }
    return this._legs;
  }

  /** Reload the leg pair from the repository. */
  async refreshLegs(): Promise<LegPair<Leg>> {
    const legs = await this.deps.repository.findLegs(this._journal.id);
    this._legs = resolveLegPair(this._journal.id, legs);
    return this._legs;
  }

  /**
   * Persist a change to one leg. The cached pair keeps its roles: a leg
   * stays the source (or destination) for the rest of the call.
   */
  async patchLeg(role: LegRole, patch: LegPatch): Promise<Leg> {
    const pair = await this.legs();
    const updated = await this.deps.repository.updateLeg(pair[role].id, patch);
    this._legs = role === "source"
      ? { source: updated, destination: pair.destination }
      : { source: pair.source, destination: updated };
    return updated;
  }

  /**
   * The account a leg is booked on.
   *
   * @throws {JournalUpdateError} ACCOUNT_NOT_FOUND
   */
  async accountOf(leg: Leg): Promise<Account> {
    const account = await this.deps.repository.findAccount(leg.accountId);
    if (account === undefined) {
      throw new JournalUpdateError(
        "ACCOUNT_NOT_FOUND",
        `Account "${leg.accountId}" of leg "${leg.id}" does not exist`,
      );
    }
    return account;
  }

  // ─── Outcomes ────────────────────────────────────────────────────────

  get outcomes(): readonly StepOutcome[] {
    return this._outcomes;
  }

  applied(step: UpdateStep, field?: string, message?: string): void {
    this._outcomes.push({ step, field, status: "applied", message });
  }

  skipped(
    step: UpdateStep,
    message: string,
    options?: { readonly field?: string | undefined; readonly code?: JournalUpdateErrorCode },
  ): void {
    this.logger.debug({ step, field: options?.field }, message);
    this._outcomes.push({
      step,
      field: options?.field,
      status: "skipped",
      code: options?.code,
      message,
    });
  }

  failed(
    step: UpdateStep,
    code: JournalUpdateErrorCode,
    message: string,
    field?: string,
  ): void {
    this.logger.warn({ step, field, code }, message);
    this._outcomes.push({ step, field, status: "failed", code, message });
  }

  // ─── Audit ───────────────────────────────────────────────────────────

  get auditEvents(): readonly AuditEvent[] {
    return this._auditEvents;
  }

  /** Buffer an audit event; the service delivers them after commit. */
  audit(event: AuditEvent): void {
    this._auditEvents.push(event);
  }
}

/** Message of a thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
