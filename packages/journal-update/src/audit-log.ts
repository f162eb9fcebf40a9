/**
 * Append-only audit log for recording who-changed-what-when.
 *
 * Receives the field-level events of committed journal updates.
 * In-memory only — survives as long as the process.
 */

import type { AuditSink } from "./collaborators.js";
import type { AuditAction, AuditEvent } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry extends AuditEvent {
  readonly timestamp: string;
}

export interface AuditLogQuery {
  readonly actor?: string | undefined;
  readonly action?: AuditAction | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// InMemoryAuditLog
// =============================================================================

export class InMemoryAuditLog implements AuditSink {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this._clock = clock;
  }

  /**
   * Append an event to the audit log.
   */
  record(event: AuditEvent): void {
    this._entries.push({
      ...event,
      timestamp: this._clock().toISOString(),
    });
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.actor !== undefined) {
      results = results.filter((e) => e.actor === filter.actor);
    }
    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.resourceId !== undefined) {
      results = results.filter((e) => e.resourceId === filter.resourceId);
    }

    // Newest first
    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  /**
   * Total number of entries.
   */
  get size(): number {
    return this._entries.length;
  }
}
