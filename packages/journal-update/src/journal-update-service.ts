/**
 * @tally/journal-update — JournalUpdateService.
 *
 * Applies a sparse update request to one journal and its two legs:
 * 1. Validate the request
 * 2. Inside one repository transaction: fingerprint the group, run
 *    every step in a fixed order, fingerprint again
 * 3. After commit, deliver the buffered audit events
 *
 * A step whose fields are absent does nothing. A step that cannot apply
 * records a StepOutcome and the update carries on; only an invalid
 * request, a missing journal or account, or corrupt legs abort it.
 */

import type { Journal } from "@tally/types";
import type { Logger } from "pino";
import type { JournalUpdateDependencies } from "./collaborators.js";
import { UpdateContext } from "./context.js";
import { computeGroupFingerprint, computeJournalFingerprint } from "./fingerprint.js";
import { silentLogger } from "./logger.js";
import { parseUpdateRequest } from "./request.js";
import type { JournalUpdateResult, UpdateConfig } from "./types.js";
import { JournalUpdateError } from "./types.js";
import { updateAccountsAndType } from "./updaters/accounts.js";
import { updateField } from "./updaters/fields.js";
import {
  updateBill,
  updateBudget,
  updateCategory,
  updateNotes,
  updateReconciled,
  updateTags,
} from "./updaters/relations.js";
import { updateMetaDates, updateMetaStrings } from "./updaters/meta.js";
import { updateCurrency } from "./updaters/currency.js";
import { updateAmount, updateForeignAmount } from "./updaters/amounts.js";

type Step = (ctx: UpdateContext) => Promise<void>;

const STEPS: readonly Step[] = [
  updateAccountsAndType,
  updateBill,
  (ctx) => updateField(ctx, "description"),
  (ctx) => updateField(ctx, "date"),
  (ctx) => updateField(ctx, "order"),
  updateCategory,
  updateBudget,
  updateTags,
  updateReconciled,
  updateNotes,
  updateMetaStrings,
  updateMetaDates,
  updateCurrency,
  updateAmount,
  updateForeignAmount,
];

export class JournalUpdateService {
  private readonly _deps: JournalUpdateDependencies;
  private readonly _config: UpdateConfig;
  private readonly _logger: Logger;

  constructor(deps: JournalUpdateDependencies, config: UpdateConfig, logger?: Logger) {
    this._deps = deps;
    this._config = config;
    this._logger = logger ?? silentLogger();
  }

  /**
   * Update one journal.
   *
   * @throws {JournalUpdateError} INVALID_REQUEST, JOURNAL_NOT_FOUND or
   *   ACCOUNT_NOT_FOUND; nothing is committed
   * @throws {LedgerError} when the journal's legs are not one negative
   *   and one positive leg; nothing is committed
   */
  async update(journalId: string, input: unknown): Promise<JournalUpdateResult> {
    const request = parseUpdateRequest(input);
    const logger = this._logger.child({ journalId });
    logger.debug({ fields: Object.keys(request) }, "Updating journal");

    const result = await this._deps.repository.transaction(async () => {
      const journal = await this._deps.repository.findJournal(journalId);
      if (journal === undefined) {
        throw new JournalUpdateError("JOURNAL_NOT_FOUND", `Journal "${journalId}" does not exist`);
      }

      const ctx = new UpdateContext({
        journal,
        request,
        config: this._config,
        deps: this._deps,
        logger,
      });
      await ctx.legs();

      const fingerprintBefore = await this._fingerprint(journal);
      for (const step of STEPS) {
        await step(ctx);
      }
      const legs = await ctx.refreshLegs();
      const fingerprintAfter = await this._fingerprint(ctx.journal);

      return {
        journal: ctx.journal,
        legs,
        changed: fingerprintBefore !== fingerprintAfter,
        fingerprintBefore,
        fingerprintAfter,
        outcomes: ctx.outcomes,
        auditEvents: ctx.auditEvents,
      } satisfies JournalUpdateResult;
    });

    for (const event of result.auditEvents) {
      await this._deps.audit.record(event);
    }

    logger.info(
      {
        changed: result.changed,
        failed: result.outcomes.filter((o) => o.status === "failed").length,
      },
      "Journal update done",
    );
    return result;
  }

  private async _fingerprint(journal: Journal): Promise<string> {
    const snapshot = await this._deps.repository.loadGroup(journal.groupId);
    if (snapshot !== undefined) {
      return computeGroupFingerprint(snapshot);
    }
    const legs = await this._deps.repository.findLegs(journal.id);
    return computeJournalFingerprint(journal, legs);
  }
}
