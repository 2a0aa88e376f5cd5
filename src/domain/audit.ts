/**
 * Audit ledger domain model.
 *
 * Write-once records of every creation and transition attempt, granted or
 * denied. Entries are never updated or deleted.
 */

import { Role } from './request';

export type AuditOutcome = 'granted' | 'denied';

/** An immutable audit entry. */
export interface AuditEntry {
  id: string;
  requestId: string;
  actorId: string;
  actorRole: Role;
  /** Transition action, or "create" for the creation attempt. */
  action: string;
  /** Null for creation and for requests that could not be loaded. */
  fromRole: Role | null;
  toRole: Role | null;
  outcome: AuditOutcome;
  /** Free text for denials (e.g. "no_matching_grant", "persistence_failed"). */
  reason?: string;
  timestamp: string;
  details?: Record<string, unknown>;
}

/** Input for recording an entry; id and timestamp are assigned by the ledger. */
export type AuditInput = Omit<AuditEntry, 'id' | 'timestamp'> & { timestamp?: string };

/** Audit query filter. Time bounds are inclusive ISO-8601 timestamps. */
export interface AuditFilter {
  requestId?: string;
  actorId?: string;
  from?: string;
  to?: string;
  /** Page size; omitted means no limit. */
  limit?: number;
  offset?: number;
}
