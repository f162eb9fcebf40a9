/**
 * @tally/journal-update — Partial updates of two-legged journals.
 *
 * Provides:
 * - JournalUpdateService: applies a sparse request to one journal
 * - The request schema, configuration loader and logger factory
 * - Collaborator interfaces and their in-memory implementations
 * - The group comparison fingerprint
 *
 * Design rules:
 * - One update runs in one repository transaction
 * - Absent fields are never touched; failed steps are reported, not thrown
 */

// Service
export { JournalUpdateService } from "./journal-update-service.js";
export { UpdateContext, describeError } from "./context.js";
export type { LegRole } from "./context.js";

// Steps
export {
  expectedType,
  hasValidSourceAccount,
  hasValidDestinationAccount,
  resolveAccount,
  updateAccounts,
  updateType,
  updateAccountsAndType,
} from "./updaters/accounts.js";
export { updateField } from "./updaters/fields.js";
export type { ScalarField } from "./updaters/fields.js";
export {
  updateBill,
  updateCategory,
  updateBudget,
  updateTags,
  updateReconciled,
  updateNotes,
} from "./updaters/relations.js";
export { updateMetaStrings, updateMetaDates } from "./updaters/meta.js";
export { updateCurrency } from "./updaters/currency.js";
export {
  getAmount,
  getForeignAmount,
  updateAmount,
  updateForeignAmount,
} from "./updaters/amounts.js";

// Request
export {
  JournalUpdateRequestSchema,
  META_STRING_FIELDS,
  META_DATE_FIELDS,
  parseUpdateRequest,
  hasFields,
  normalizeTypeName,
} from "./request.js";
export type {
  JournalUpdateRequest,
  RequestField,
  MetaStringField,
  MetaDateField,
} from "./request.js";

// Dates and fingerprint
export { resolveDate, STORED_DATE_FORMAT } from "./dates.js";
export type { ResolvedDate } from "./dates.js";
export { computeGroupFingerprint, computeJournalFingerprint } from "./fingerprint.js";

// Configuration and logging
export { ConfigSchema, loadConfig, toUpdateConfig, isValidTimeZone } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Collaborators
export type {
  JournalPatch,
  LegPatch,
  GroupSnapshot,
  JournalWithLegs,
  JournalRepository,
  EntityQuery,
  CurrencyQuery,
  BillResolver,
  CategoryResolver,
  BudgetResolver,
  TagResolver,
  CurrencyResolver,
  TransactionTypeLookup,
  AuditSink,
  JournalUpdateDependencies,
} from "./collaborators.js";

// In-memory implementations
export { InMemoryAuditLog } from "./audit-log.js";
export type { AuditLogEntry, AuditLogQuery } from "./audit-log.js";
export { InMemoryJournalRepository } from "./in-memory/repository.js";
export {
  NamedEntityCatalog,
  InMemoryBillCatalog,
  InMemoryBudgetCatalog,
  InMemoryCategoryCatalog,
  InMemoryTagCatalog,
  InMemoryCurrencyCatalog,
  InMemoryTransactionTypeCatalog,
} from "./in-memory/catalogs.js";

// Types
export type {
  UpdateConfig,
  UpdateStep,
  StepStatus,
  StepOutcome,
  AuditAction,
  AuditEvent,
  JournalUpdateResult,
  JournalUpdateErrorCode,
} from "./types.js";
export { JournalUpdateError } from "./types.js";
